/**
 * Tokenizers for corpus import pipelines.
 *
 * Every tokenizer maps a text source to its tokens in document order.
 * Tokenizers that post-process or pre-process text take their downstream
 * tokenizer as a defaulted second parameter, so they compose by passing
 * one into another:
 *
 *   html(source, (s) => news(s, simple))
 *
 * strips markup first, then the mail header, then normalizes words.
 */

import { createLogger, type Logger } from "../logging/index.js";
import { StringSource, type TextSource } from "./source.js";

export type Tokenizer = (source: TextSource) => string[];

export const TOKENIZER_NAMES = ["split", "simple", "news", "html"] as const;

export type TokenizerName = (typeof TOKENIZER_NAMES)[number];

let diagnostics: Logger = createLogger({ scope: "tokenize", file: false, level: "error" });

/**
 * Replace the logger that reports unreadable sources.
 */
export function setTokenizerLogger(logger: Logger): void {
  diagnostics = logger;
}

/**
 * Whitespace split, no filtering.
 */
export function split(source: TextSource): string[] {
  return source.readRest().split(/\s+/).filter((token) => token.length > 0);
}

/**
 * Split, lower-case, and drop every character outside a-z.
 * Tokens left empty (numbers, punctuation) are dropped.
 */
export function simple(source: TextSource, splitter: Tokenizer = split): string[] {
  return splitter(source)
    .map((token) => token.toLowerCase().replace(/[^a-z]/g, ""))
    .filter((token) => token.length > 0);
}

/**
 * Skip the header (everything through the first blank line) and tokenize
 * the body. A document without a blank line has no body.
 * Failures are reported with the source name and rethrown unchanged.
 */
export function news(source: TextSource, tokenizer: Tokenizer = simple): string[] {
  try {
    let line = source.readLine();
    while (line !== null && line.trim() !== "") {
      line = source.readLine();
    }
    return tokenizer(source);
  } catch (err) {
    diagnostics.error("Failed to tokenize source", { source: source.name });
    throw err;
  }
}

/**
 * Extract the text of an HTML document and tokenize it.
 */
export function html(source: TextSource, tokenizer: Tokenizer = simple): string[] {
  const text = source
    .readRest()
    .trim()
    .replace(/<(script|style).*?>.*?(<\/\1>)/gis, "")
    .replace(/<!--(.*?)-->\n?/gs, "")
    .replace(/<.*?>/gs, " ")
    .replace(/&nbsp;/g, " ")
    .replace(/ {2}/g, " ")
    .replace(/ {2}/g, " ")
    .trim();

  return tokenizer(new StringSource(text, source.name));
}

/**
 * Raised for a tokenizer chain that cannot be built.
 */
export class TokenizerCompositionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TokenizerCompositionError";
  }
}

const WRAPPERS: Record<Exclude<TokenizerName, "split">, (source: TextSource, downstream: Tokenizer) => string[]> = {
  simple,
  news,
  html,
};

const BASES: Record<TokenizerName, Tokenizer> = {
  split,
  simple: (source) => simple(source),
  news: (source) => news(source),
  html: (source) => html(source),
};

/**
 * Build a tokenizer from an outer-to-inner list of names.
 *
 *   composeTokenizers(["html", "news"])  // html over news over simple
 *   composeTokenizers(["simple", "split"]) // same as simple
 *
 * The innermost name keeps its own default downstream.
 */
export function composeTokenizers(names: readonly TokenizerName[]): Tokenizer {
  const [outer, ...rest] = names;
  if (outer === undefined) {
    throw new TokenizerCompositionError("A tokenizer chain needs at least one tokenizer");
  }
  if (rest.length === 0) {
    return BASES[outer];
  }
  if (outer === "split") {
    throw new TokenizerCompositionError("split takes no downstream tokenizer");
  }
  const wrap = WRAPPERS[outer];
  const inner = composeTokenizers(rest);
  return (source) => wrap(source, inner);
}
