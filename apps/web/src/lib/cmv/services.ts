/**
 * Process-wide collaborators for the route handlers, built once from env.
 *
 * @module cmv/services
 */

import { loadRedditCredentials, loadWorkbenchConfig } from "../config";
import { createAiSdkTextGenerator } from "./llm";
import { RedditForumClient } from "./reddit-client";
import { getSessionStore, type SessionStore } from "./session-store";
import type { WorkbenchDeps } from "./workbench";

let deps: WorkbenchDeps | null = null;

export function getWorkbenchDeps(): WorkbenchDeps {
  if (deps) return deps;
  const config = loadWorkbenchConfig();
  const credentials = loadRedditCredentials();
  if (!credentials) {
    console.warn("[Workbench] Reddit credentials missing; fetch and publish will fail until they are set");
  }
  deps = {
    forum: new RedditForumClient(credentials, { subreddit: config.subreddit, timeoutMs: config.httpTimeoutMs }),
    createGenerator: createAiSdkTextGenerator,
    config,
    now: Date.now,
  };
  return deps;
}

export function getWorkbenchSessions(): SessionStore {
  const { config } = getWorkbenchDeps();
  return getSessionStore({
    fetchCacheTtlSeconds: config.fetchCacheTtlSeconds,
    sessionIdleSeconds: config.sessionIdleSeconds,
  });
}
