/**
 * Run and operation IDs.
 * Each process gets a run ID; each engine operation gets its own short ID
 * so the log lines of one merge or generation can be grepped together.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short, unique run ID.
 * Format: date prefix + random suffix (e.g., "20240115-a1b2c3")
 */
export function generateRunId(): string {
  const datePart = new Date().toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}

/**
 * Generate an operation ID (e.g., "op-9f3a1c2b").
 */
export function generateOperationId(): string {
  return `op-${randomBytes(4).toString("hex")}`;
}

/** Current run ID for this process */
let currentRunId: string | null = null;

/**
 * Initialize a new run ID for this process.
 * Should be called once at startup.
 */
export function initRunId(): string {
  currentRunId = generateRunId();
  return currentRunId;
}

/**
 * Get the current run ID, or null before initRunId().
 */
export function getRunId(): string | null {
  return currentRunId;
}
