/**
 * Shared helpers for the workbench API routes.
 *
 * Provides:
 * - resolveSession: session id from the cookie, or a fresh one
 * - readJsonBody: JSON body parsing with an "Invalid JSON" outcome
 * - actionResponse: ActionResult → NextResponse, re-issuing the cookie when new
 * - threadIdFrom: the `[id]` route segment, or a 400 response
 */

import { randomUUID } from "node:crypto";
import { NextResponse } from "next/server";
import type { ActionFailure, ActionResult } from "./cmv/workbench";

export const SESSION_COOKIE = "cmv_session";

const SESSION_ID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export interface SessionRef {
  sessionId: string;
  isNew: boolean;
}

export function readCookie(req: Request, name: string): string | null {
  const header = req.headers.get("cookie");
  if (!header) return null;
  for (const part of header.split(";")) {
    const eq = part.indexOf("=");
    if (eq <= 0) continue;
    if (part.slice(0, eq).trim() !== name) continue;
    const raw = part.slice(eq + 1).trim();
    try {
      return decodeURIComponent(raw);
    } catch {
      return raw;
    }
  }
  return null;
}

/**
 * Unknown or malformed cookies get a new session rather than an error.
 */
export function resolveSession(req: Request): SessionRef {
  const existing = readCookie(req, SESSION_COOKIE);
  if (existing && SESSION_ID_PATTERN.test(existing)) {
    return { sessionId: existing, isNew: false };
  }
  return { sessionId: randomUUID(), isNew: true };
}

export type JsonBody = { ok: true; value: unknown } | { ok: false };

export async function readJsonBody(req: Request): Promise<JsonBody> {
  const text = await req.text();
  if (!text.trim()) return { ok: true, value: {} };
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function attachSession(res: NextResponse, ref: SessionRef): NextResponse {
  if (ref.isNew) {
    res.cookies.set(SESSION_COOKIE, ref.sessionId, {
      httpOnly: true,
      sameSite: "lax",
      path: "/",
      secure: process.env.NODE_ENV === "production",
    });
  }
  return res;
}

export function invalidJsonResponse(ref: SessionRef): NextResponse {
  return attachSession(NextResponse.json({ ok: false, error: "Invalid JSON" }, { status: 400 }), ref);
}

export function actionResponse<T>(result: ActionResult<T>, ref: SessionRef): NextResponse {
  return attachSession(NextResponse.json(result, { status: result.status }), ref);
}

/**
 * Trimmed `[id]` segment, or the 400 response to return when it is blank.
 */
export async function threadIdFrom(
  params: Promise<{ id?: string }>,
  ref: SessionRef,
): Promise<{ ok: true; threadId: string } | { ok: false; response: NextResponse }> {
  const { id } = await params;
  const threadId = typeof id === "string" ? id.trim() : "";
  if (threadId) return { ok: true, threadId };
  const failure: ActionFailure = { ok: false, status: 400, error: "Missing thread id", category: "unknown" };
  return { ok: false, response: actionResponse(failure, ref) };
}
