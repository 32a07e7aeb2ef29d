/**
 * Corpus pipeline tests.
 *
 * Run: node --import tsx src/corpus/corpus.test.ts
 *
 * Tests cover:
 *   1. Dataset construction: vocabulary order, document frequency, co-occurrence
 *   2. Individual stages
 *   3. A full pipeline over files on disk
 *   4. Tokenizer failures: read errors skip a document, anything else stops the build
 */

import { strict as assert } from "node:assert";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import {
  buildDataset,
  runPipeline,
  filterRarewords,
  filterCommonwords,
  DatasetSchema,
  type CorpusDocument,
} from "./index.js";
import { loadCorpusConfig } from "../config/corpus/index.js";
import { silentLogger, type Logger } from "../logging/index.js";
import { news, SourceReadError, type Tokenizer } from "../tokenize/index.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

interface LogRecord {
  level: string;
  message: string;
  context?: Record<string, unknown>;
}

function recordingLogger(records: LogRecord[]): Logger {
  const logger: Logger = {
    debug: (message, context) => records.push({ level: "debug", message, context }),
    info: (message, context) => records.push({ level: "info", message, context }),
    warn: (message, context) => records.push({ level: "warn", message, context }),
    error: (message, context) => records.push({ level: "error", message, context }),
    child: () => logger,
  };
  return logger;
}

function assertMatrixClose(actual: number[][], expected: number[][]): void {
  assert.equal(actual.length, expected.length, "row count");
  actual.forEach((row, i) => {
    const want = expected[i] ?? [];
    assert.equal(row.length, want.length, `row ${i} length`);
    row.forEach((value, j) => {
      const target = want[j] ?? NaN;
      assert.ok(Math.abs(value - target) < 1e-12, `[${i}][${j}] = ${value}, expected ${target}`);
    });
  });
}

const doc = (name: string, tokens: string[]): CorpusDocument => ({ name, tokens });

const TEST_DIR = join(tmpdir(), `itm-corpus-test-${Date.now()}`);

// ═══════════════════════════════════════════════════════════════════════════
// DATASET
// ═══════════════════════════════════════════════════════════════════════════

section("buildDataset");

const SMALL = [doc("d1", ["a", "b"]), doc("d2", ["b", "c", "b"]), doc("d3", ["c"])];

test("vocabulary is sorted and unique", () => {
  assert.deepStrictEqual(buildDataset([doc("x", ["c", "a", "b", "a"])]).vocab, ["a", "b", "c"]);
});

test("counts documents per term", () => {
  const dataset = buildDataset(SMALL);
  assert.deepStrictEqual(dataset.documentFrequency, [1, 2, 2]);
  assert.equal(dataset.documentCount, 3);
});

test("co-occurrence is normalized to sum to one", () => {
  const dataset = buildDataset(SMALL);
  assertMatrixClose(dataset.cooccurrences, [
    [0, 0.25, 0],
    [0.25, 1 / 6, 1 / 6],
    [0, 1 / 6, 0],
  ]);
});

test("single-token documents add no co-occurrence", () => {
  const dataset = buildDataset([doc("only", ["a"])]);
  assert.deepStrictEqual(dataset.cooccurrences, [[0]]);
});

test("the dataset is frozen", () => {
  const dataset = buildDataset(SMALL);
  assert.ok(Object.isFrozen(dataset));
  assert.ok(Object.isFrozen(dataset.vocab));
  assert.ok(Object.isFrozen(dataset.cooccurrences[0]));
});

test("the schema accepts built datasets and rejects ragged matrices", () => {
  assert.ok(DatasetSchema.safeParse(buildDataset(SMALL)).success);
  const ragged = { vocab: ["a", "b"], cooccurrences: [[0, 1], [1]], documentFrequency: [1, 1], documentCount: 1 };
  assert.equal(DatasetSchema.safeParse(ragged).success, false);
});

section("stages");

test("filterRarewords drops terms below the document threshold", () => {
  const result = filterRarewords([doc("1", ["x", "y"]), doc("2", ["x"])], 2);
  assert.deepStrictEqual(result, [doc("1", ["x"]), doc("2", ["x"])]);
});

test("filterCommonwords drops terms above the document threshold", () => {
  const result = filterCommonwords([doc("1", ["x", "y"]), doc("2", ["x"])], 1);
  assert.deepStrictEqual(result, [doc("1", ["y"]), doc("2", [])]);
});

// ═══════════════════════════════════════════════════════════════════════════
// FULL PIPELINE
// ═══════════════════════════════════════════════════════════════════════════

section("runPipeline");

test("reads, filters, combines and builds", () => {
  const documents = join(TEST_DIR, "documents");
  mkdirSync(documents, { recursive: true });
  writeFileSync(join(documents, "01.txt"), "From: x\n\nApple banana apple cherry\n");
  writeFileSync(join(documents, "02.txt"), "From: y\n\nBanana cherry the date\n");
  writeFileSync(join(documents, "03.txt"), "From: z\n\nThe apple and Bob\n");
  writeFileSync(join(documents, "notes.md"), "From: w\n\nelderberry\n");
  writeFileSync(join(TEST_DIR, "stopwords.txt"), "the\nand\n");
  writeFileSync(join(TEST_DIR, "names.txt"), "Bob\nAlice\n");

  const corpus = loadCorpusConfig(
    {
      name: "fruit",
      stages: [
        { stage: "readDirectory", directory: "documents", pattern: "\\.txt$", tokenizer: ["news"] },
        { stage: "filterStopwords", path: "stopwords.txt" },
        { stage: "combineWords", path: "names.txt", replacement: "<name>" },
        { stage: "filterRarewords", threshold: 2 },
        { stage: "filterCommonwords", threshold: 2 },
      ],
    },
    TEST_DIR
  );

  const dataset = runPipeline(corpus, { logger: silentLogger() });
  assert.deepStrictEqual(dataset.vocab, ["apple", "banana", "cherry"]);
  assert.deepStrictEqual(dataset.documentFrequency, [2, 2, 2]);
  assert.equal(dataset.documentCount, 3);
});

test("combineWords replaces listed words before frequency filters see them", () => {
  const documents = join(TEST_DIR, "names");
  mkdirSync(documents, { recursive: true });
  writeFileSync(join(documents, "a.txt"), "alice met bob");
  writeFileSync(join(documents, "b.txt"), "bob met carol");
  writeFileSync(join(TEST_DIR, "people.txt"), "Alice\nBob\nCarol\n");

  const corpus = loadCorpusConfig(
    {
      name: "people",
      stages: [
        { stage: "readDirectory", directory: "names" },
        { stage: "combineWords", path: "people.txt", replacement: "<name>" },
      ],
    },
    TEST_DIR
  );

  const dataset = runPipeline(corpus, { logger: silentLogger() });
  assert.deepStrictEqual(dataset.vocab, ["<name>", "met"]);
  assert.deepStrictEqual(dataset.documentFrequency, [2, 2]);
});

section("tokenizer failures");

function failingCorpus(directory: string) {
  const documents = join(TEST_DIR, directory);
  mkdirSync(documents, { recursive: true });
  writeFileSync(join(documents, "a.txt"), "From: x\n\norbit launch\n");
  writeFileSync(join(documents, "b.txt"), "From: y\n\norbit comet\n");
  return loadCorpusConfig(
    { name: directory, stages: [{ stage: "readDirectory", directory, tokenizer: ["news"] }] },
    TEST_DIR
  );
}

test("a read failure skips the document and is reported to the pipeline logger", () => {
  const records: LogRecord[] = [];
  const unreadableFirst: Tokenizer = (source) =>
    news(source, (body) => {
      if (source.name.endsWith("a.txt")) {
        throw new SourceReadError(source.name);
      }
      return body.readRest().trim().split(" ");
    });

  const dataset = runPipeline(failingCorpus("skip-read"), {
    logger: recordingLogger(records),
    tokenizerFor: () => unreadableFirst,
  });

  assert.deepStrictEqual(dataset.vocab, ["comet", "orbit"]);
  assert.equal(dataset.documentCount, 1);
  assert.deepStrictEqual(
    records.filter((record) => record.level !== "debug" && record.level !== "info").map((record) => record.message),
    ["Failed to tokenize source", "Skipping unreadable document"]
  );
});

test("any other tokenizer failure stops the build", () => {
  const bug = new TypeError("tokens is not iterable");
  assert.throws(
    () =>
      runPipeline(failingCorpus("stop-bug"), {
        logger: silentLogger(),
        tokenizerFor: () => (source) =>
          news(source, () => {
            throw bug;
          }),
      }),
    (err: unknown) => err === bug
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

rmSync(TEST_DIR, { recursive: true, force: true });

console.log(`\n${passed} passed, ${failed} failed`);

if (failed > 0) {
  process.exit(1);
}
