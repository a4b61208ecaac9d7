/**
 * Browser-side wrappers for the /api/cmv routes.
 * Every call resolves to an ActionResult; network failures become error results.
 */

import type { ActionResult, PublishData, ToggleData } from "./cmv/workbench";
import type { SessionSnapshot } from "./cmv/session-store";
import type { SortOrder, TimeWindow } from "./cmv/types";

async function call<T>(url: string, init?: RequestInit): Promise<ActionResult<T>> {
  try {
    const res = await fetch(url, {
      ...init,
      cache: "no-store",
      headers: { "Content-Type": "application/json", ...init?.headers },
    });
    const body: ActionResult<T> = await res.json();
    return body;
  } catch (err) {
    return {
      ok: false,
      status: 0,
      error: err instanceof Error ? err.message : String(err),
      category: "unknown",
    };
  }
}

export function loadSession(): Promise<ActionResult<SessionSnapshot>> {
  return call<SessionSnapshot>("/api/cmv/session");
}

export function saveApiKey(apiKey: string): Promise<ActionResult<SessionSnapshot>> {
  return call<SessionSnapshot>("/api/cmv/session", { method: "POST", body: JSON.stringify({ apiKey }) });
}

export function requestThreads(options: {
  sortOrder: SortOrder;
  timeWindow: TimeWindow;
  limit: number;
}): Promise<ActionResult<SessionSnapshot>> {
  return call<SessionSnapshot>("/api/cmv/threads", { method: "POST", body: JSON.stringify(options) });
}

export function requestToggle(threadId: string): Promise<ActionResult<ToggleData>> {
  return call<ToggleData>(`/api/cmv/threads/${encodeURIComponent(threadId)}/toggle`, { method: "POST" });
}

export function requestPublish(threadId: string): Promise<ActionResult<PublishData>> {
  return call<PublishData>(`/api/cmv/threads/${encodeURIComponent(threadId)}/publish`, { method: "POST" });
}
