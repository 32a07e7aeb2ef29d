/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import { ConfigError, optionalEnv, optionalEnvInt, optionalEnvBool } from "./env.js";
import { isLogLevel, type LogLevel } from "../logging/index.js";

export { ConfigError } from "./env.js";

// Corpus pipeline configuration
export * from "./corpus/index.js";

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Log level */
  readonly logLevel: string;
  /** Directory for the server log file */
  readonly logDir: string;
  /** Write log lines to a file as well as the console */
  readonly logToFile: boolean;
  /** Interface the HTTP server binds to */
  readonly host: string;
  /** Port the HTTP server listens on */
  readonly port: number;
  /** Directory holding persistent cache files */
  readonly cacheDir: string;
  /** Path to the corpus pipeline JSON */
  readonly corpusConfigPath: string;
  /** Number of default anchors to select */
  readonly anchorCount: number;
  /** Number of candidate terms considered during anchor selection */
  readonly candidateCount: number;
  /** Directory where submitted user data is stored */
  readonly userDataDir: string;
  /** Directory served as static files (the browser client) */
  readonly staticDir: string;
}

/**
 * Read the configuration from the environment.
 * @throws ConfigError for a malformed numeric or boolean variable
 */
export function loadConfig(): AppConfig {
  return {
    env: optionalEnv("NODE_ENV", "development"),
    logLevel: optionalEnv("LOG_LEVEL", "info"),
    logDir: optionalEnv("LOG_DIR", "var/log"),
    logToFile: optionalEnvBool("LOG_TO_FILE", true),
    host: optionalEnv("HOST", "0.0.0.0"),
    port: optionalEnvInt("PORT", 5000, { min: 0, max: 65535 }),
    cacheDir: optionalEnv("CACHE_DIR", "var/cache"),
    corpusConfigPath: optionalEnv("CORPUS_CONFIG", "config/corpus.json"),
    anchorCount: optionalEnvInt("ANCHOR_COUNT", 20, { min: 1 }),
    candidateCount: optionalEnvInt("ANCHOR_CANDIDATES", 500, { min: 1 }),
    userDataDir: optionalEnv("USER_DATA_DIR", "var/user-data"),
    staticDir: optionalEnv("STATIC_DIR", "public"),
  };
}

let cached: AppConfig | null = null;

/** Application configuration singleton, read on first use. */
export function getConfig(): AppConfig {
  if (cached === null) {
    cached = loadConfig();
  }
  return cached;
}

/** Configured log level, narrowed. Call after `validateConfig()`. */
export function configuredLogLevel(config: AppConfig = getConfig()): LogLevel {
  return isLogLevel(config.logLevel) ? config.logLevel : "info";
}

/**
 * Validate the loaded configuration.
 * Call this at application startup to fail fast.
 */
export function validateConfig(config: AppConfig = getConfig()): void {
  if (!["development", "production", "test"].includes(config.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${config.env}. Must be development, production, or test.`,
      "NODE_ENV"
    );
  }

  if (!isLogLevel(config.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${config.logLevel}. Must be debug, info, warn, or error.`,
      "LOG_LEVEL"
    );
  }

  if (config.candidateCount < config.anchorCount) {
    throw new ConfigError(
      `ANCHOR_CANDIDATES (${config.candidateCount}) must be >= ANCHOR_COUNT (${config.anchorCount}).`,
      "ANCHOR_CANDIDATES"
    );
  }
}
