/**
 * Environment configuration tests.
 *
 * Run: node --import tsx src/config/env.test.ts
 */

import { strict as assert } from "node:assert";

import { optionalEnv, optionalEnvInt, optionalEnvBool } from "./env.js";
import { validateConfig, ConfigError, type AppConfig } from "./index.js";

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

function withEnv(key: string, value: string | undefined, fn: () => void): void {
  const previous = process.env[key];
  if (value === undefined) {
    delete process.env[key];
  } else {
    process.env[key] = value;
  }
  try {
    fn();
  } finally {
    if (previous === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = previous;
    }
  }
}

function isConfigErrorFor(variable: string): (err: unknown) => boolean {
  return (err) => err instanceof ConfigError && err.variable === variable;
}

const KEY = "ITM_TEST_VALUE";

const BASE: AppConfig = {
  env: "test",
  logLevel: "info",
  logDir: "var/log",
  logToFile: false,
  host: "127.0.0.1",
  port: 5000,
  cacheDir: "var/cache",
  corpusConfigPath: "config/corpus.json",
  anchorCount: 20,
  candidateCount: 500,
  userDataDir: "var/user-data",
  staticDir: "public",
};

console.log("\n── env readers ──");

test("unset or blank variables fall back to the default", () => {
  withEnv(KEY, undefined, () => assert.equal(optionalEnv(KEY, "fallback"), "fallback"));
  withEnv(KEY, "   ", () => assert.equal(optionalEnvInt(KEY, 7), 7));
});

test("integers are parsed and range checked", () => {
  withEnv(KEY, " 8080 ", () => assert.equal(optionalEnvInt(KEY, 5000, { min: 0, max: 65535 }), 8080));
  withEnv(KEY, "70000", () =>
    assert.throws(() => optionalEnvInt(KEY, 5000, { min: 0, max: 65535 }), /must be between 0 and 65535, got: 70000/)
  );
  withEnv(KEY, "12abc", () => assert.throws(() => optionalEnvInt(KEY, 1), isConfigErrorFor(KEY)));
});

test("booleans accept the usual spellings", () => {
  withEnv(KEY, "YES", () => assert.equal(optionalEnvBool(KEY, false), true));
  withEnv(KEY, "0", () => assert.equal(optionalEnvBool(KEY, true), false));
  withEnv(KEY, "maybe", () => assert.throws(() => optionalEnvBool(KEY, true), isConfigErrorFor(KEY)));
});

console.log("\n── validateConfig ──");

test("accepts a consistent configuration", () => {
  validateConfig(BASE);
});

test("names the variable at fault", () => {
  assert.throws(() => validateConfig({ ...BASE, env: "staging" }), isConfigErrorFor("NODE_ENV"));
  assert.throws(() => validateConfig({ ...BASE, logLevel: "verbose" }), isConfigErrorFor("LOG_LEVEL"));
  assert.throws(
    () => validateConfig({ ...BASE, anchorCount: 30, candidateCount: 10 }),
    isConfigErrorFor("ANCHOR_CANDIDATES")
  );
});

console.log(`\n${passed} passed, ${failed} failed`);

if (failed > 0) {
  process.exit(1);
}
