/**
 * Tokenizer tests.
 *
 * Run: node --import tsx src/tokenize/tokenize.test.ts
 *
 * Tests cover:
 *   1. split / simple normalization
 *   2. news header skipping and read failures
 *   3. html text extraction
 *   4. Composition by name
 */

import { strict as assert } from "node:assert";
import { join } from "node:path";
import { tmpdir } from "node:os";

import {
  split,
  simple,
  news,
  html,
  composeTokenizers,
  setTokenizerLogger,
  SourceReadError,
  StringSource,
  FileSource,
  TokenizerCompositionError,
  type TextSource,
} from "./index.js";
import type { Logger } from "../logging/index.js";

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

const text = (value: string, name?: string) => new StringSource(value, name);

// ═══════════════════════════════════════════════════════════════════════════
// TESTS
// ═══════════════════════════════════════════════════════════════════════════

section("StringSource");

test("readLine ends lines at \\n, \\r\\n and a lone \\r", () => {
  const source = text("one\ntwo\r\nthree\rfour");
  assert.equal(source.readLine(), "one\n");
  assert.equal(source.readLine(), "two\r\n");
  assert.equal(source.readLine(), "three\r");
  assert.equal(source.readLine(), "four");
  assert.equal(source.readLine(), null);
  assert.equal(source.readRest(), "");
});

section("split");

test("splits on runs of whitespace", () => {
  assert.deepStrictEqual(split(text("  Hello,  world!\n\tfoo ")), ["Hello,", "world!", "foo"]);
});

test("empty input yields no tokens", () => {
  assert.deepStrictEqual(split(text("   \n ")), []);
});

section("simple");

test("lower-cases and strips non-letters", () => {
  assert.deepStrictEqual(
    simple(text("The Quick-Brown fox 42 jumped! ... C3PO")),
    ["the", "quickbrown", "fox", "jumped", "cpo"]
  );
});

test("is idempotent", () => {
  const first = simple(text("Re: It's 9:30, Dr. Smith's E-MAIL arrived!! 2nd try"));
  const second = simple(text(first.join(" ")));
  assert.deepStrictEqual(second, first);
});

test("keeps duplicates in document order", () => {
  assert.deepStrictEqual(simple(text("b a B a")), ["b", "a", "b", "a"]);
});

test("uses the given splitter", () => {
  const commas = (source: TextSource) => source.readRest().split(",");
  assert.deepStrictEqual(simple(text("Alpha,BETA 2,,gamma"), commas), ["alpha", "beta", "gamma"]);
});

section("news");

test("skips the header through the first blank line", () => {
  const doc = "From: someone@example.test\nSubject: Hi there\n\nBody text here.\nMore 123 words\n";
  assert.deepStrictEqual(news(text(doc)), ["body", "text", "here", "more", "words"]);
});

test("a whitespace-only line ends the header", () => {
  assert.deepStrictEqual(news(text("Header: x\n   \nbody")), ["body"]);
});

test("a document without a blank line has no tokens", () => {
  assert.deepStrictEqual(news(text("Header: one\nStill header\n")), []);
  assert.deepStrictEqual(news(text("a\nb")), []);
});

test("an empty header tokenizes like the inner tokenizer", () => {
  const doc = "\nThe body, here\nand 2 more lines\n";
  assert.deepStrictEqual(news(text(doc)), simple(text(doc)));
});

test("passes the body to the given tokenizer", () => {
  assert.deepStrictEqual(news(text("H: 1\n\nKeep THIS, as-is"), split), ["Keep", "THIS,", "as-is"]);
});

test("reports and rethrows an unreadable file", () => {
  const records: LogRecord[] = [];
  setTokenizerLogger(recordingLogger(records));
  const missing = join(tmpdir(), `itm-missing-${Date.now()}.txt`);

  assert.throws(
    () => news(new FileSource(missing)),
    (err: unknown) => err instanceof SourceReadError && err.source === missing
  );
  assert.equal(records.length, 1);
  assert.equal(records[0]?.level, "error");
  assert.deepStrictEqual(records[0]?.context, { source: missing });
});

test("rethrows a downstream failure unchanged", () => {
  const records: LogRecord[] = [];
  setTokenizerLogger(recordingLogger(records));
  const bug = new TypeError("boom");
  assert.throws(
    () =>
      news(text("\nbody", "doc-7"), () => {
        throw bug;
      }),
    (err: unknown) => err === bug
  );
  assert.deepStrictEqual(records, [{ level: "error", message: "Failed to tokenize source", context: { source: "doc-7" } }]);
});

test("a header ended by carriage returns alone is still skipped", () => {
  assert.deepStrictEqual(news(text("From: x\rSubject: y\r\rOrbit Launch\r")), ["orbit", "launch"]);
  assert.deepStrictEqual(news(text("From: x\r\n\r\nOrbit\r\n")), ["orbit"]);
});

section("html");

test("drops script, style, comments and tags", () => {
  const doc =
    "<html><head><style>p { color: red; }</style><SCRIPT type='x'>var a = 1;</SCRIPT></head>" +
    "<body><!-- hidden note -->\n<p>Hello&nbsp;World</p><p>Second   para</p></body></html>";
  assert.deepStrictEqual(html(text(doc)), ["hello", "world", "second", "para"]);
});

test("script removal spans lines and ignores case", () => {
  const doc = "before<Script>\nline one\nline two\n</Script>after";
  assert.deepStrictEqual(html(text(doc)), ["beforeafter"]);
});

test("plain text tokenizes like simple", () => {
  const doc = "Plain text, no tags at all.  Really 2 spaces";
  assert.deepStrictEqual(html(text(doc)), simple(text(doc)));
});

section("composeTokenizers");

test("html over news strips markup, then the header", () => {
  const tokenize = composeTokenizers(["html", "news"]);
  assert.deepStrictEqual(tokenize(text("<b>Subject</b>: hi\n\n<p>Body words</p>")), ["body", "words"]);
});

test("simple over split matches simple", () => {
  assert.deepStrictEqual(composeTokenizers(["simple", "split"])(text("A-b C")), ["ab", "c"]);
});

test("rejects split with a downstream and an empty chain", () => {
  assert.throws(() => composeTokenizers(["split", "simple"]), TokenizerCompositionError);
  assert.throws(() => composeTokenizers([]), TokenizerCompositionError);
});

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${passed} passed, ${failed} failed`);

if (failed > 0) {
  process.exit(1);
}
