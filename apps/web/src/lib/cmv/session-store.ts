/**
 * Session State Store
 *
 * One WorkbenchSession per browser session, keyed by the session cookie.
 * Sessions live in a globalThis slot (survives dev hot reloads) and are never
 * persisted. Each session owns its thread entries, fetch cache and cooldown.
 * Sessions idle longer than `sessionIdleSeconds` are dropped on the next lookup.
 *
 * Entry lifecycle: created lazily with defaults on first access, mutated in
 * place by toggles, never removed while the session lives.
 *
 * @module cmv/session-store
 */

import { TtlCache } from "./fetch-cache";
import type { AnalysisPipeline } from "./pipeline";
import type { Analysis, AnalysisOutcome, Thread, ThreadSessionEntry } from "./types";

export const DEFAULT_FETCH_COOLDOWN_SECONDS = 60;
export const DEFAULT_FETCH_CACHE_TTL_SECONDS = 3600;
export const DEFAULT_SESSION_IDLE_SECONDS = 6 * 3600;

export interface WorkbenchSession {
  id: string;
  apiKey: string | null;
  threads: Thread[];
  entries: Map<string, ThreadSessionEntry>;
  /** Epoch ms of the last successful fetch, null before the first one */
  lastFetchTime: number | null;
  fetchCache: TtlCache<Thread[]>;
  /** Analyses currently running, by thread id */
  inFlight: Map<string, Promise<AnalysisOutcome>>;
  createdAt: number;
  lastSeenAt: number;
}

export interface SessionStoreOptions {
  fetchCacheTtlSeconds?: number;
  sessionIdleSeconds?: number;
  now?: () => number;
}

// ============================================================================
// STORE
// ============================================================================

export class SessionStore {
  private readonly sessions = new Map<string, WorkbenchSession>();
  private readonly fetchCacheTtlMs: number;
  private readonly idleMs: number;
  private readonly now: () => number;

  constructor(options: SessionStoreOptions = {}) {
    this.fetchCacheTtlMs = (options.fetchCacheTtlSeconds ?? DEFAULT_FETCH_CACHE_TTL_SECONDS) * 1000;
    this.idleMs = (options.sessionIdleSeconds ?? DEFAULT_SESSION_IDLE_SECONDS) * 1000;
    this.now = options.now ?? Date.now;
  }

  /** Returns the session for `id`, creating an empty one on first access. */
  getSession(id: string): WorkbenchSession {
    const now = this.now();
    this.evictIdle(now);

    let session = this.sessions.get(id);
    if (!session) {
      session = {
        id,
        apiKey: null,
        threads: [],
        entries: new Map(),
        lastFetchTime: null,
        fetchCache: new TtlCache<Thread[]>(this.fetchCacheTtlMs),
        inFlight: new Map(),
        createdAt: now,
        lastSeenAt: now,
      };
      this.sessions.set(id, session);
      console.log(`[Session] Created session ${id.slice(0, 8)}…`);
    }
    session.lastSeenAt = now;
    return session;
  }

  private evictIdle(now: number): void {
    let evicted = 0;
    for (const [id, session] of this.sessions) {
      if (now - session.lastSeenAt > this.idleMs) {
        this.sessions.delete(id);
        evicted++;
      }
    }
    if (evicted > 0) {
      console.log(`[Session] Evicted ${evicted} idle session(s), ${this.sessions.size} remaining`);
    }
  }

  hasSession(id: string): boolean {
    return this.sessions.has(id);
  }

  get size(): number {
    return this.sessions.size;
  }
}

declare global {
  var __cmvSessionStore: SessionStore | undefined;
}

export function getSessionStore(options?: SessionStoreOptions): SessionStore {
  if (!globalThis.__cmvSessionStore) {
    globalThis.__cmvSessionStore = new SessionStore(options);
  }
  return globalThis.__cmvSessionStore;
}

/** Drop every session. Test-only. */
export function resetSessions(): void {
  globalThis.__cmvSessionStore = undefined;
}

// ============================================================================
// THREAD ENTRIES
// ============================================================================

export function getOrCreateEntry(session: WorkbenchSession, threadId: string): ThreadSessionEntry {
  let entry = session.entries.get(threadId);
  if (!entry) {
    entry = { analyzed: false, visible: false, analysis: null, rebuttal: null };
    session.entries.set(threadId, entry);
  }
  return entry;
}

export function toggleVisibility(session: WorkbenchSession, threadId: string): ThreadSessionEntry {
  const entry = getOrCreateEntry(session, threadId);
  entry.visible = !entry.visible;
  return entry;
}

/**
 * Store an analysis and its rebuttal together; they are never set one at a time.
 */
export function recordAnalysis(
  session: WorkbenchSession,
  threadId: string,
  analysis: Analysis,
  rebuttal: string,
): ThreadSessionEntry {
  const entry = getOrCreateEntry(session, threadId);
  Object.assign(entry, { analyzed: true, analysis, rebuttal });
  return entry;
}

export interface ToggleResult {
  entry: ThreadSessionEntry;
  /** Set only when this toggle ran the pipeline */
  outcome: AnalysisOutcome | null;
}

/**
 * The "Analyze"/"Hide" button: analyze on first use, then flip visibility.
 * If the pipeline rejects, the entry is left untouched.
 *
 * A toggle that arrives while the same thread is being analyzed waits for
 * that analysis and returns the entry as the first toggle leaves it.
 */
export async function toggleThread(
  session: WorkbenchSession,
  thread: Thread,
  pipeline: AnalysisPipeline,
): Promise<ToggleResult> {
  const pending = session.inFlight.get(thread.id);
  if (pending) {
    await pending;
    return { entry: getOrCreateEntry(session, thread.id), outcome: null };
  }

  const current = getOrCreateEntry(session, thread.id);
  let outcome: AnalysisOutcome | null = null;

  if (!current.analyzed) {
    const run = pipeline.analyze(thread);
    session.inFlight.set(thread.id, run);
    try {
      outcome = await run;
    } finally {
      session.inFlight.delete(thread.id);
    }
    recordAnalysis(session, thread.id, outcome.analysis, outcome.rebuttal);
  }

  const entry = toggleVisibility(session, thread.id);
  return { entry, outcome };
}

// ============================================================================
// FETCH COOLDOWN
// ============================================================================

export type CooldownCheck =
  | { allowed: true }
  | { allowed: false; remainingSeconds: number };

export function checkFetchCooldown(
  session: WorkbenchSession,
  now: number,
  cooldownSeconds: number = DEFAULT_FETCH_COOLDOWN_SECONDS,
): CooldownCheck {
  if (session.lastFetchTime === null) return { allowed: true };
  const elapsedSeconds = (now - session.lastFetchTime) / 1000;
  if (elapsedSeconds >= cooldownSeconds) return { allowed: true };
  return { allowed: false, remainingSeconds: Math.floor(cooldownSeconds - elapsedSeconds) };
}

export function markFetched(session: WorkbenchSession, now: number): void {
  session.lastFetchTime = now;
}

// ============================================================================
// SNAPSHOT
// ============================================================================

export interface ThreadView {
  thread: Thread;
  entry: ThreadSessionEntry;
}

export interface SessionSnapshot {
  hasApiKey: boolean;
  threads: ThreadView[];
  cooldownRemainingSeconds: number;
}

/**
 * JSON-safe view for the page. Listing a thread creates its entry.
 */
export function snapshotSession(
  session: WorkbenchSession,
  now: number,
  cooldownSeconds: number = DEFAULT_FETCH_COOLDOWN_SECONDS,
): SessionSnapshot {
  const cooldown = checkFetchCooldown(session, now, cooldownSeconds);
  return {
    hasApiKey: session.apiKey !== null,
    threads: session.threads.map((thread) => ({
      thread,
      entry: { ...getOrCreateEntry(session, thread.id) },
    })),
    cooldownRemainingSeconds: cooldown.allowed ? 0 : cooldown.remainingSeconds,
  };
}
