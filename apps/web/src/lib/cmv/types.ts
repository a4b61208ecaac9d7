/**
 * Rebuttal Workbench - Shared Types
 *
 * Threads come from the forum, analyses and rebuttals from the LLM.
 * Everything here is plain data so it can cross the API boundary as JSON.
 *
 * @module cmv/types
 */

import { z } from "zod";

// ============================================================================
// FETCH OPTIONS
// ============================================================================

export const SORT_ORDERS = ["top", "new", "hot", "rising"] as const;
export const TIME_WINDOWS = ["day", "week", "month", "year", "all"] as const;
export const FETCH_LIMITS = [3, 5, 10] as const;

export type SortOrder = (typeof SORT_ORDERS)[number];
export type TimeWindow = (typeof TIME_WINDOWS)[number];

export interface FetchOptions {
  sortOrder: SortOrder;
  timeWindow: TimeWindow;
  limit: number;
}

export function isSortOrder(value: unknown): value is SortOrder {
  return typeof value === "string" && SORT_ORDERS.some((s) => s === value);
}

export function isTimeWindow(value: unknown): value is TimeWindow {
  return typeof value === "string" && TIME_WINDOWS.some((w) => w === value);
}

/**
 * Unknown sort orders behave like "top" (lenient, matches the forum UI).
 */
export function normalizeSortOrder(value: unknown): SortOrder {
  return isSortOrder(value) ? value : "top";
}

export function normalizeTimeWindow(value: unknown): TimeWindow {
  return isTimeWindow(value) ? value : "all";
}

// ============================================================================
// THREADS
// ============================================================================

export interface Thread {
  id: string;
  title: string;
  /** Body text; empty for link posts */
  selftext: string;
  author?: string | null;
  permalink?: string | null;
  score?: number | null;
  numComments?: number | null;
  createdUtc?: number | null;
}

// ============================================================================
// ANALYSIS
// ============================================================================

export const AnalysisSchema = z.object({
  main_position: z.string(),
  rationale: z.array(z.string()),
});

export type Analysis = z.infer<typeof AnalysisSchema>;

/**
 * Sentinel analysis used when the model reply cannot be parsed.
 * Returns a fresh object each call so callers may keep it in session state.
 */
export function createFallbackAnalysis(): Analysis {
  return {
    main_position: "Could not extract main position",
    rationale: ["Could not extract rationale"],
  };
}

/** Recoverable: the summarizer fell back to createFallbackAnalysis() */
export interface ParseFailure {
  message: string;
  rawText: string;
}

export interface AnalysisOutcome {
  analysis: Analysis;
  rebuttal: string;
  parseFailure: ParseFailure | null;
}

// ============================================================================
// SESSION ENTRIES
// ============================================================================

export type ThreadSessionEntry =
  | { analyzed: false; visible: boolean; analysis: null; rebuttal: null }
  | { analyzed: true; visible: boolean; analysis: Analysis; rebuttal: string };
