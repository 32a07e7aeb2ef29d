/**
 * Run ID generation and management.
 * Each server process gets a run ID so log lines from one boot can be
 * told apart from the next.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short run ID.
 * Format: date prefix + random suffix (e.g., "20240115-a1b2c3")
 */
export function generateRunId(): string {
  const datePart = new Date().toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}

let currentRunId: string | null = null;

/**
 * Initialize the run ID for this process.
 * Called once at startup, before the first logger writes.
 */
export function initRunId(): string {
  currentRunId = generateRunId();
  return currentRunId;
}

/** Current run ID, or null before `initRunId()`. */
export function getRunId(): string | null {
  return currentRunId;
}
