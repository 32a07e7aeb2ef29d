/**
 * Readable text sources for tokenizers.
 *
 * A source is consumed front to back: `readLine()` hands out one line at a
 * time and `readRest()` returns whatever has not been read yet. Tokenizers
 * that skip a prefix (such as a mail header) read lines and then pass the
 * same source on to their downstream tokenizer.
 */

import { readFileSync } from "node:fs";

/**
 * Raised when a document cannot be read.
 */
export class SourceReadError extends Error {
  public readonly source: string;

  constructor(source: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : "";
    super(`Failed to read source ${source}${detail}`, { cause });
    this.name = "SourceReadError";
    this.source = source;
  }
}

export interface TextSource {
  /** Identity reported in diagnostics (file path or label) */
  readonly name: string;
  /** Next line including its line end (\n, \r\n or \r), or null at end of input */
  readLine(): string | null;
  /** Remaining unread text ("" at end of input) */
  readRest(): string;
}

const LINE_END = /\r\n|\r|\n/g;

abstract class BufferedSource implements TextSource {
  private text: string | null = null;
  private position = 0;

  constructor(public readonly name: string) {}

  protected abstract load(): string;

  private contents(): string {
    if (this.text === null) {
      this.text = this.load();
    }
    return this.text;
  }

  readLine(): string | null {
    const text = this.contents();
    if (this.position >= text.length) {
      return null;
    }
    LINE_END.lastIndex = this.position;
    const match = LINE_END.exec(text);
    const end = match === null ? text.length : match.index + match[0].length;
    const line = text.slice(this.position, end);
    this.position = end;
    return line;
  }

  readRest(): string {
    const text = this.contents();
    const rest = text.slice(this.position);
    this.position = text.length;
    return rest;
  }
}

/**
 * In-memory source.
 */
export class StringSource extends BufferedSource {
  constructor(
    private readonly value: string,
    name = "<string>"
  ) {
    super(name);
  }

  protected load(): string {
    return this.value;
  }
}

/**
 * UTF-8 file, read lazily on first access.
 */
export class FileSource extends BufferedSource {
  constructor(public readonly path: string) {
    super(path);
  }

  protected load(): string {
    try {
      return readFileSync(this.path, "utf-8");
    } catch (err) {
      throw new SourceReadError(this.path, err);
    }
  }
}
