/**
 * Persistent named caching.
 *
 * `persistentCache(name, builder, { store, schema })` wraps an expensive,
 * argument-free builder. The first call in a fresh deployment builds the
 * value and writes it to `<store.directory>/<name>.json`; later calls, in
 * this process or the next, read the file instead of building.
 *
 * The file is keyed by name only. A builder whose result depends on
 * anything but the code must fold that input into the name.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * FILE FORMAT
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   {
 *     "name": "fcc-1a2b3c4d5e6f",
 *     "formatVersion": 1,
 *     "createdAt": "2024-01-15T10:00:00.000Z",
 *     "checksum": "<sha-256 of payload>",
 *     "payload": "<JSON text of the value>"
 *   }
 *
 * The payload is kept as text so the checksum covers the exact bytes that
 * were written. A file that fails to parse, fails the checksum or fails
 * the value schema is corrupt: it is reported, rebuilt and overwritten.
 * Writes go to a temporary file that is renamed into place.
 */

import { createHash, randomBytes } from "node:crypto";
import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { z } from "zod";
import type { Logger } from "../logging/index.js";

export const CACHE_FORMAT_VERSION = 1;

const CacheEnvelopeSchema = z
  .object({
    name: z.string(),
    formatVersion: z.literal(CACHE_FORMAT_VERSION),
    createdAt: z.string(),
    checksum: z.string().regex(/^[0-9a-f]{64}$/),
    payload: z.string(),
  })
  .strict();

export type CacheEnvelope = z.infer<typeof CacheEnvelopeSchema>;

/**
 * A persistent cache file exists but cannot be trusted.
 */
export class CacheCorruptionError extends Error {
  constructor(
    public readonly cacheName: string,
    public readonly path: string,
    reason: string
  ) {
    super(`Persistent cache "${cacheName}" is corrupt (${path}): ${reason}`);
    this.name = "CacheCorruptionError";
  }
}

function checksumOf(payload: string): string {
  return createHash("sha256").update(payload, "utf-8").digest("hex");
}

function reasonOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Directory of named cache files.
 */
export class PersistentStore {
  public readonly directory: string;

  constructor(directory: string) {
    this.directory = resolve(directory);
  }

  pathFor(name: string): string {
    if (!/^[A-Za-z0-9][A-Za-z0-9._-]*$/.test(name)) {
      throw new Error(`Invalid persistent cache name: ${name}`);
    }
    return join(this.directory, `${name}.json`);
  }

  has(name: string): boolean {
    return existsSync(this.pathFor(name));
  }

  /**
   * Read and validate a cached value.
   *
   * @returns `{ found: false }` when no file exists
   * @throws CacheCorruptionError when the file exists but is unusable
   */
  read<T>(name: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): { found: true; value: T } | { found: false } {
    const filePath = this.pathFor(name);
    if (!existsSync(filePath)) {
      return { found: false };
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(filePath, "utf-8"));
    } catch (err) {
      throw new CacheCorruptionError(name, filePath, reasonOf(err));
    }

    const envelope = CacheEnvelopeSchema.safeParse(raw);
    if (!envelope.success) {
      const detail = envelope.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      throw new CacheCorruptionError(name, filePath, `invalid envelope: ${detail}`);
    }
    if (envelope.data.name !== name) {
      throw new CacheCorruptionError(name, filePath, `envelope belongs to "${envelope.data.name}"`);
    }
    if (checksumOf(envelope.data.payload) !== envelope.data.checksum) {
      throw new CacheCorruptionError(name, filePath, "checksum mismatch");
    }

    let payload: unknown;
    try {
      payload = JSON.parse(envelope.data.payload);
    } catch (err) {
      throw new CacheCorruptionError(name, filePath, reasonOf(err));
    }

    const value = schema.safeParse(payload);
    if (!value.success) {
      throw new CacheCorruptionError(name, filePath, `payload does not match schema: ${value.error.message}`);
    }
    return { found: true, value: value.data };
  }

  /**
   * Write a value under `name`, replacing any existing file.
   * @returns The path written
   */
  write(name: string, value: unknown): string {
    const filePath = this.pathFor(name);
    const payload = JSON.stringify(value);
    if (payload === undefined) {
      throw new TypeError(`Persistent cache "${name}" cannot store a value JSON has no form for`);
    }

    const envelope: CacheEnvelope = {
      name,
      formatVersion: CACHE_FORMAT_VERSION,
      createdAt: new Date().toISOString(),
      checksum: checksumOf(payload),
      payload,
    };

    if (!existsSync(this.directory)) {
      mkdirSync(this.directory, { recursive: true });
    }

    const tempPath = `${filePath}.${process.pid}-${randomBytes(4).toString("hex")}.tmp`;
    try {
      writeFileSync(tempPath, JSON.stringify(envelope), "utf-8");
      renameSync(tempPath, filePath);
    } catch (err) {
      rmSync(tempPath, { force: true });
      throw err;
    }
    return filePath;
  }

  /** Delete a cache file. Returns whether one existed. */
  remove(name: string): boolean {
    const filePath = this.pathFor(name);
    if (!existsSync(filePath)) {
      return false;
    }
    rmSync(filePath);
    return true;
  }
}

export interface PersistentCacheOptions<T> {
  store: PersistentStore;
  /** Validates the decoded payload; its output is what callers receive */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  logger?: Logger;
}

/**
 * Wrap an argument-free builder with a persistent, name-keyed cache.
 *
 * @throws TypeError if `builder` declares parameters
 */
export function persistentCache<T>(
  name: string,
  builder: () => T,
  options: PersistentCacheOptions<T>
): () => T {
  if (builder.length !== 0) {
    throw new TypeError(
      `persistentCache("${name}") only wraps builders without parameters; fold inputs into the name`
    );
  }
  const { store, schema, logger } = options;
  // Validate the name up front rather than on first call
  store.pathFor(name);

  return (): T => {
    try {
      const cached = store.read(name, schema);
      if (cached.found) {
        logger?.debug("Persistent cache hit", { name });
        return cached.value;
      }
    } catch (err) {
      if (!(err instanceof CacheCorruptionError)) {
        throw err;
      }
      logger?.warn("Discarding corrupt persistent cache", { name, path: err.path, reason: err.message });
    }

    logger?.info("Building value for persistent cache", { name });
    const value = builder();
    const filePath = store.write(name, value);
    logger?.info("Persistent cache written", { name, path: filePath });
    return value;
  };
}
