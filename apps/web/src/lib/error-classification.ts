/**
 * Error Classification
 *
 * Classifies action failures so the page can tell the operator whether to fix
 * configuration, wait, or retry.
 *
 * @module error-classification
 */

import { ForumUnavailableError } from "./cmv/forum";
import { MissingApiKeyError } from "./cmv/llm";

export type ErrorCategory =
  | "configuration"
  | "auth"
  | "rate_limit"
  | "timeout"
  | "forum_unavailable"
  | "unknown";

export type ErrorSource = "forum" | "llm";

export type ClassifiedError = {
  category: ErrorCategory;
  source: ErrorSource | null;
  message: string;
  retriable: boolean;
};

/** Patterns indicating LLM provider rate limiting or outage */
const RATE_LIMIT_PATTERNS = [
  /status\s*(?:code\s*)?429/i,
  /status\s*(?:code\s*)?529/i,
  /status\s*(?:code\s*)?503/i,
  /rate\s*limit/i,
  /too\s*many\s*requests/i,
  /overloaded/i,
  /quota/i,
];

const AUTH_PATTERNS = [
  /api\s*key/i,
  /authentication/i,
  /unauthorized/i,
  /invalid.*key/i,
  /status\s*(?:code\s*)?401/i,
  /status\s*(?:code\s*)?403/i,
];

const TIMEOUT_PATTERNS = [
  /timeout/i,
  /timed?\s*out/i,
  /AbortError/i,
  /ETIMEDOUT/i,
  /ECONNRESET/i,
];

function statusOf(error: unknown): number | null {
  if (!error || typeof error !== "object") return null;
  const candidate = "statusCode" in error ? error.statusCode : "status" in error ? error.status : null;
  return typeof candidate === "number" ? candidate : null;
}

/**
 * Classify an error by its type, HTTP status and message.
 */
export function classifyError(error: unknown): ClassifiedError {
  const msg = error instanceof Error ? error.message : String(error);
  const name = error instanceof Error ? error.name : "";

  if (error instanceof MissingApiKeyError) {
    return { category: "configuration", source: "llm", message: msg, retriable: false };
  }

  if (error instanceof ForumUnavailableError) {
    if (error.status === 401 || error.status === 403) {
      return { category: "auth", source: "forum", message: msg, retriable: false };
    }
    if (error.status === 429) {
      return { category: "rate_limit", source: "forum", message: msg, retriable: true };
    }
    if (TIMEOUT_PATTERNS.some((p) => p.test(msg))) {
      return { category: "timeout", source: "forum", message: msg, retriable: true };
    }
    return { category: "forum_unavailable", source: "forum", message: msg, retriable: true };
  }

  // Everything else comes from the text-generation side
  if (name === "TimeoutError" || name === "AbortError" || TIMEOUT_PATTERNS.some((p) => p.test(msg))) {
    return { category: "timeout", source: "llm", message: msg, retriable: true };
  }

  const status = statusOf(error);
  if (status === 401 || status === 403 || AUTH_PATTERNS.some((p) => p.test(msg))) {
    return { category: "auth", source: "llm", message: msg, retriable: false };
  }
  if (status === 429 || status === 529 || status === 503 || RATE_LIMIT_PATTERNS.some((p) => p.test(msg))) {
    return { category: "rate_limit", source: "llm", message: msg, retriable: true };
  }

  return { category: "unknown", source: null, message: msg, retriable: false };
}
