/**
 * Workbench Actions
 *
 * Top-level handlers for the operator's actions (set key, fetch, toggle,
 * publish). Each runs to completion against one session and returns an
 * ActionResult; no handler throws. Failures without a sane default become
 * error results; parse failures become warnings on a successful result.
 *
 * @module cmv/workbench
 */

import { z } from "zod";
import { classifyError, type ErrorCategory } from "../error-classification";
import type { WorkbenchConfig } from "../config";
import type { ForumClient } from "./forum";
import { fetchCacheKey, withTtlCache } from "./fetch-cache";
import { MissingApiKeyError, type TextGeneratorFactory } from "./llm";
import { createAnalysisPipeline, type AnalysisPipeline } from "./pipeline";
import { publishRebuttal as publishToForum } from "./publisher";
import {
  checkFetchCooldown,
  getOrCreateEntry,
  markFetched,
  snapshotSession,
  toggleThread as toggleSessionThread,
  type SessionSnapshot,
  type WorkbenchSession,
} from "./session-store";
import { FETCH_LIMITS, normalizeSortOrder, normalizeTimeWindow, type FetchOptions, type ThreadSessionEntry } from "./types";

// ============================================================================
// TYPES
// ============================================================================

export interface WorkbenchDeps {
  forum: ForumClient;
  createGenerator: TextGeneratorFactory;
  config: WorkbenchConfig;
  now: () => number;
}

export type ActionSuccess<T> = { ok: true; status: 200; data: T; warnings: string[] };
export type ActionFailure = {
  ok: false;
  status: number;
  error: string;
  category: ErrorCategory;
  remainingSeconds?: number;
};
export type ActionResult<T> = ActionSuccess<T> | ActionFailure;

function success<T>(data: T, warnings: string[] = []): ActionSuccess<T> {
  return { ok: true, status: 200, data, warnings };
}

const STATUS_BY_CATEGORY: Record<ErrorCategory, number> = {
  configuration: 401,
  auth: 401,
  rate_limit: 429,
  timeout: 504,
  forum_unavailable: 502,
  unknown: 502,
};

function failureFrom(error: unknown, action: string): ActionFailure {
  const classified = classifyError(error);
  console.error(`[Workbench] ${action} failed (${classified.category}): ${classified.message}`);
  return {
    ok: false,
    status: STATUS_BY_CATEGORY[classified.category],
    error: classified.message,
    category: classified.category,
  };
}

// ============================================================================
// REQUEST SCHEMAS
// ============================================================================

export const FetchRequestSchema = z.object({
  sortOrder: z.unknown().optional().transform(normalizeSortOrder),
  timeWindow: z.unknown().optional().transform(normalizeTimeWindow),
  limit: z
    .number()
    .int()
    .refine((n) => FETCH_LIMITS.some((allowed) => allowed === n), { message: `must be one of ${FETCH_LIMITS.join(", ")}` })
    .default(5),
});

export const ApiKeyRequestSchema = z.object({
  apiKey: z.string().max(500),
});

// ============================================================================
// ACTIONS
// ============================================================================

export function getSnapshot(deps: WorkbenchDeps, session: WorkbenchSession): ActionResult<SessionSnapshot> {
  return success(snapshotSession(session, deps.now(), deps.config.fetchCooldownSeconds));
}

/**
 * Store (or clear, with an empty string) the session's OpenAI key.
 */
export function setApiKey(
  deps: WorkbenchDeps,
  session: WorkbenchSession,
  input: unknown,
): ActionResult<SessionSnapshot> {
  const parsed = ApiKeyRequestSchema.safeParse(input);
  if (!parsed.success) {
    return { ok: false, status: 400, error: "Expected { apiKey: string }", category: "configuration" };
  }
  const key = parsed.data.apiKey.trim();
  session.apiKey = key ? key : null;
  console.log(`[Workbench] API key ${session.apiKey ? "set" : "cleared"} for session ${session.id.slice(0, 8)}…`);
  return getSnapshot(deps, session);
}

export async function fetchThreads(
  deps: WorkbenchDeps,
  session: WorkbenchSession,
  input: unknown,
): Promise<ActionResult<SessionSnapshot>> {
  const parsed = FetchRequestSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "root"}: ${i.message}`);
    return { ok: false, status: 400, error: `Invalid fetch options: ${issues.join("; ")}`, category: "unknown" };
  }

  const options: FetchOptions = {
    sortOrder: parsed.data.sortOrder,
    // The time window only means something for "top"
    timeWindow: parsed.data.sortOrder === "top" ? parsed.data.timeWindow : "all",
    limit: parsed.data.limit,
  };

  const now = deps.now();
  const cooldown = checkFetchCooldown(session, now, deps.config.fetchCooldownSeconds);
  if (!cooldown.allowed) {
    return {
      ok: false,
      status: 429,
      error: `Please wait ${cooldown.remainingSeconds} seconds before fetching again.`,
      category: "rate_limit",
      remainingSeconds: cooldown.remainingSeconds,
    };
  }

  const cachedFetch = withTtlCache(
    (opts: FetchOptions) => deps.forum.fetchThreads(opts),
    fetchCacheKey,
    session.fetchCache,
  );

  try {
    session.threads = await cachedFetch(options);
  } catch (error) {
    return failureFrom(error, "Fetch");
  }

  markFetched(session, now);
  return getSnapshot(deps, session);
}

export interface ToggleData {
  threadId: string;
  entry: ThreadSessionEntry;
  analyzedNow: boolean;
}

export async function toggleThread(
  deps: WorkbenchDeps,
  session: WorkbenchSession,
  threadId: string,
): Promise<ActionResult<ToggleData>> {
  const thread = session.threads.find((t) => t.id === threadId);
  if (!thread) {
    return { ok: false, status: 404, error: `Unknown thread: ${threadId}`, category: "unknown" };
  }

  // Built on demand: hiding an analyzed thread needs no key
  const pipeline: AnalysisPipeline = {
    analyze: async (t) => {
      const apiKey = session.apiKey;
      if (!apiKey) throw new MissingApiKeyError();
      return createAnalysisPipeline(deps.createGenerator(apiKey), deps.config.model).analyze(t);
    },
  };

  try {
    const { entry, outcome } = await toggleSessionThread(session, thread, pipeline);
    const warnings = outcome?.parseFailure ? [outcome.parseFailure.message] : [];
    return success({ threadId, entry: { ...entry }, analyzedNow: outcome !== null }, warnings);
  } catch (error) {
    return failureFrom(error, "Analysis");
  }
}

export interface PublishData {
  threadId: string;
  commentId: string;
}

export async function publishRebuttal(
  deps: WorkbenchDeps,
  session: WorkbenchSession,
  threadId: string,
): Promise<ActionResult<PublishData>> {
  const thread = session.threads.find((t) => t.id === threadId);
  if (!thread) {
    return { ok: false, status: 404, error: `Unknown thread: ${threadId}`, category: "unknown" };
  }

  const entry = getOrCreateEntry(session, threadId);
  if (!entry.analyzed || !entry.rebuttal.trim()) {
    return { ok: false, status: 409, error: "Analyze the thread before publishing.", category: "unknown" };
  }

  const result = await publishToForum(deps.forum, thread, entry.rebuttal);
  if (!result.ok) {
    return { ok: false, status: 502, error: result.message, category: "forum_unavailable" };
  }
  return success({ threadId, commentId: result.commentId });
}
