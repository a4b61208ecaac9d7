import { getWorkbenchDeps, getWorkbenchSessions } from "@/lib/cmv/services";
import { fetchThreads } from "@/lib/cmv/workbench";
import { actionResponse, invalidJsonResponse, readJsonBody, resolveSession } from "@/lib/route-helpers";

export const runtime = "nodejs";

/**
 * Fetch threads into the session.
 * Body: { sortOrder?: "top" | "new" | "hot" | "rising", timeWindow?: "day" | ... | "all", limit?: number }
 */
export async function POST(req: Request) {
  const ref = resolveSession(req);
  const body = await readJsonBody(req);
  if (!body.ok) return invalidJsonResponse(ref);

  const session = getWorkbenchSessions().getSession(ref.sessionId);
  const result = await fetchThreads(getWorkbenchDeps(), session, body.value);
  return actionResponse(result, ref);
}
