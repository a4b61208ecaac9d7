/**
 * Debug logging utilities for the workbench
 *
 * Mirrors tagged messages to the console and, when enabled, appends them to a
 * debug log file. Configured via CMV_DEBUG_LOG_FILE / CMV_DEBUG_LOG_PATH.
 *
 * @module debug
 */

import * as fs from "fs";
import * as path from "path";

// ============================================================================
// CONFIGURATION
// ============================================================================

const DEBUG_LOG_PATH =
  process.env.CMV_DEBUG_LOG_PATH || path.join(process.cwd(), "debug-workbench.log");

const DEBUG_LOG_FILE_ENABLED =
  (process.env.CMV_DEBUG_LOG_FILE ?? "false").toLowerCase() === "true";

const DEBUG_LOG_MAX_DATA_CHARS = 4000;

let fileWriteWarned = false;

// ============================================================================
// DEBUG LOGGING FUNCTIONS
// ============================================================================

/**
 * Serialize a log payload, capped at DEBUG_LOG_MAX_DATA_CHARS.
 */
export function formatDebugPayload(data: unknown): string {
  let payload: string;
  try {
    payload = typeof data === "string" ? data : (JSON.stringify(data, null, 2) ?? String(data));
  } catch {
    payload = "[unserializable]";
  }
  if (payload.length > DEBUG_LOG_MAX_DATA_CHARS) {
    payload = payload.slice(0, DEBUG_LOG_MAX_DATA_CHARS) + "…[truncated]";
  }
  return payload;
}

/**
 * Log a message to the debug file and console
 */
export function debugLog(message: string, data?: unknown): void {
  const timestamp = new Date().toISOString();
  let logLine = `[${timestamp}] ${message}`;
  if (data !== undefined) {
    logLine += ` | ${formatDebugPayload(data)}`;
  }

  // Fire-and-forget; a failed write warns once
  if (DEBUG_LOG_FILE_ENABLED) {
    fs.promises.appendFile(DEBUG_LOG_PATH, logLine + "\n").catch((err: unknown) => {
      if (fileWriteWarned) return;
      fileWriteWarned = true;
      console.warn(`[Debug] Cannot write ${DEBUG_LOG_PATH}: ${err instanceof Error ? err.message : String(err)}`);
    });
  }

  console.log(logLine);
}
