/**
 * Corpus pipeline configuration loader.
 *
 * Responsible for:
 * - Reading the pipeline JSON from disk
 * - Validating it with fail-fast, path-formatted errors
 * - Resolving relative paths against the config file's directory
 * - Freezing the result
 */

import { createHash } from "node:crypto";
import { readFileSync } from "node:fs";
import { dirname, isAbsolute, resolve } from "node:path";
import type { ZodIssue } from "zod";
import { CorpusConfigSchema, type CorpusConfig, type PipelineStage } from "./schema.js";

/**
 * Structured validation error for the corpus pipeline configuration.
 */
export class CorpusConfigError extends Error {
  public readonly issues: CorpusConfigIssue[];

  constructor(message: string, issues: CorpusConfigIssue[]) {
    super(message);
    this.name = "CorpusConfigError";
    this.issues = issues;
  }

  format(): string {
    const lines = ["Corpus configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

export interface CorpusConfigIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code, or "io" / "json" for file problems */
  code: string;
}

function formatZodIssues(zodIssues: ZodIssue[]): CorpusConfigIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  const propNames = Reflect.ownKeys(obj);
  for (const name of propNames) {
    const value: unknown = Reflect.get(obj, name);
    if (value && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

function resolveStagePaths(stage: PipelineStage, baseDir: string): PipelineStage {
  const at = (p: string) => (isAbsolute(p) ? p : resolve(baseDir, p));
  switch (stage.stage) {
    case "readDirectory":
      return { ...stage, directory: at(stage.directory) };
    case "filterStopwords":
    case "combineWords":
      return { ...stage, path: at(stage.path) };
    case "filterRarewords":
    case "filterCommonwords":
      return stage;
  }
}

/**
 * Validate and load a corpus pipeline configuration.
 *
 * @param input   - Raw configuration object
 * @param baseDir - Directory relative paths are resolved against
 * @throws CorpusConfigError if validation fails
 */
export function loadCorpusConfig(
  input: unknown,
  baseDir: string = process.cwd()
): Readonly<CorpusConfig> {
  const result = CorpusConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new CorpusConfigError(
      `Invalid corpus configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze({
    ...result.data,
    stages: result.data.stages.map((stage) => resolveStagePaths(stage, baseDir)),
  });
}

/**
 * Read, validate and load a corpus pipeline configuration file.
 * Relative paths inside the file resolve against the file's directory.
 */
export function loadCorpusConfigFile(filePath: string): Readonly<CorpusConfig> {
  const absolute = resolve(filePath);

  let text: string;
  try {
    text = readFileSync(absolute, "utf-8");
  } catch (err) {
    throw new CorpusConfigError(`Cannot read corpus configuration: ${absolute}`, [
      { path: [], message: err instanceof Error ? err.message : String(err), code: "io" },
    ]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new CorpusConfigError(`Corpus configuration is not valid JSON: ${absolute}`, [
      { path: [], message: err instanceof Error ? err.message : String(err), code: "json" },
    ]);
  }

  return loadCorpusConfig(parsed, dirname(absolute));
}

/**
 * Short content hash of a pipeline configuration.
 * Folded into persistent cache names so a changed pipeline never reads
 * a corpus built by an older one.
 */
export function corpusFingerprint(corpus: CorpusConfig): string {
  return createHash("sha256").update(JSON.stringify(corpus.stages)).digest("hex").slice(0, 12);
}
