/**
 * Environment variable loading and validation.
 * `.env` in the working directory is loaded on import; variables already
 * set in the environment take precedence.
 */

import "dotenv/config";

export class ConfigError extends Error {
  constructor(
    message: string,
    /** Environment variable at fault, when there is one */
    public readonly variable?: string
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

function readEnv(key: string): string | undefined {
  const value = process.env[key]?.trim();
  return value === undefined || value === "" ? undefined : value;
}

/**
 * Get an optional environment variable with a default value.
 */
export function optionalEnv(key: string, defaultValue: string): string {
  return readEnv(key) ?? defaultValue;
}

export interface IntRange {
  min?: number;
  max?: number;
}

/**
 * Get an optional environment variable as an integer within `range`.
 */
export function optionalEnvInt(key: string, defaultValue: number, range: IntRange = {}): number {
  const value = readEnv(key);
  if (value === undefined) {
    return defaultValue;
  }
  if (!/^-?\d+$/.test(value)) {
    throw new ConfigError(`Environment variable ${key} must be an integer, got: ${value}`, key);
  }
  const parsed = parseInt(value, 10);
  const { min = Number.MIN_SAFE_INTEGER, max = Number.MAX_SAFE_INTEGER } = range;
  if (parsed < min || parsed > max) {
    throw new ConfigError(`Environment variable ${key} must be between ${min} and ${max}, got: ${parsed}`, key);
  }
  return parsed;
}

/**
 * Get an optional environment variable as a boolean.
 * Recognizes: true, false, 1, 0, yes, no (case-insensitive)
 */
export function optionalEnvBool(key: string, defaultValue: boolean): boolean {
  const value = readEnv(key)?.toLowerCase();
  switch (value) {
    case undefined:
      return defaultValue;
    case "true":
    case "1":
    case "yes":
      return true;
    case "false":
    case "0":
    case "no":
      return false;
    default:
      throw new ConfigError(`Environment variable ${key} must be a boolean (true/false/1/0/yes/no), got: ${value}`, key);
  }
}
