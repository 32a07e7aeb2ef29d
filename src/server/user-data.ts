/**
 * Storage for the data a client submits when a user finishes a session.
 */

import { randomBytes } from "node:crypto";
import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";

/**
 * Copy of a JSON value with object keys in sorted order at every depth.
 */
export function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, entry]) => [key, sortKeys(entry)])
    );
  }
  return value;
}

/** File name for one submission, e.g. "itm-user-data-20240115T093000Z-a1b2c3d4.json" */
export function userDataFileName(now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, "").replace(/\.\d{3}/, "");
  return `itm-user-data-${stamp}-${randomBytes(4).toString("hex")}.json`;
}

/**
 * Write a submission to a new file under `directory`, creating the
 * directory when missing. Keys are sorted and the output is indented.
 *
 * @returns The path written
 */
export function saveUserData(directory: string, data: unknown): string {
  if (!existsSync(directory)) {
    mkdirSync(directory, { recursive: true });
  }
  const filePath = join(directory, userDataFileName());
  writeFileSync(filePath, `${JSON.stringify(sortKeys(data), null, 2)}\n`, { encoding: "utf-8", flag: "wx" });
  return filePath;
}
