import { getWorkbenchDeps, getWorkbenchSessions } from "@/lib/cmv/services";
import { getSnapshot, setApiKey } from "@/lib/cmv/workbench";
import { actionResponse, invalidJsonResponse, readJsonBody, resolveSession } from "@/lib/route-helpers";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET(req: Request) {
  const ref = resolveSession(req);
  const session = getWorkbenchSessions().getSession(ref.sessionId);
  return actionResponse(getSnapshot(getWorkbenchDeps(), session), ref);
}

/** Body: { apiKey: string }; an empty key clears it. */
export async function POST(req: Request) {
  const ref = resolveSession(req);
  const body = await readJsonBody(req);
  if (!body.ok) return invalidJsonResponse(ref);

  const session = getWorkbenchSessions().getSession(ref.sessionId);
  return actionResponse(setApiKey(getWorkbenchDeps(), session, body.value), ref);
}
