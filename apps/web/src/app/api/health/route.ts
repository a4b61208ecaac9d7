import { NextResponse } from "next/server";
import { getEnv, loadWorkbenchConfig } from "@/lib/config";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET() {
  const config = loadWorkbenchConfig();
  const checks = {
    REDDIT_CLIENT_ID_present: getEnv("REDDIT_CLIENT_ID") !== "",
    REDDIT_CLIENT_SECRET_present: getEnv("REDDIT_CLIENT_SECRET") !== "",
    REDDIT_USERNAME_present: getEnv("REDDIT_USERNAME") !== "",
    REDDIT_PASSWORD_present: getEnv("REDDIT_PASSWORD") !== "",
    subreddit: config.subreddit,
    model: config.model,
    fetchCooldownSeconds: config.fetchCooldownSeconds,
    fetchCacheTtlSeconds: config.fetchCacheTtlSeconds,
  };

  const ok =
    checks.REDDIT_CLIENT_ID_present &&
    checks.REDDIT_CLIENT_SECRET_present &&
    checks.REDDIT_USERNAME_present &&
    checks.REDDIT_PASSWORD_present;

  return NextResponse.json({ ok, checks }, { status: ok ? 200 : 503 });
}
