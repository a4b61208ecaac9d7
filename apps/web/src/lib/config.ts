/**
 * Workbench Configuration
 *
 * Reads process configuration (Reddit credentials, model id, cooldown, cache
 * and session-idle windows) from environment variables and validates it with zod.
 * The OpenAI key is NOT read here: the operator enters it per session.
 *
 * @module config
 */

import { z } from "zod";

// ============================================================================
// ENV HELPERS
// ============================================================================

/**
 * Safely reads an environment variable, returning empty string if missing or whitespace-only.
 */
export function getEnv(name: string): string {
  const v = process.env[name];
  return v && v.trim() ? v.trim() : "";
}

function parsePositiveInt(name: string, fallback: number): number {
  const raw = getEnv(name);
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    console.warn(`[Config] Ignoring ${name}="${raw}" (expected a positive integer), using ${fallback}`);
    return fallback;
  }
  return parsed;
}

// ============================================================================
// SCHEMA
// ============================================================================

export const RedditCredentialsSchema = z.object({
  clientId: z.string().min(1),
  clientSecret: z.string().min(1),
  username: z.string().min(1),
  password: z.string().min(1),
  userAgent: z.string().min(1),
});

export type RedditCredentials = z.infer<typeof RedditCredentialsSchema>;

export const WorkbenchConfigSchema = z.object({
  subreddit: z.string().regex(/^[A-Za-z0-9_]+$/),
  model: z.string().min(1),
  fetchCooldownSeconds: z.number().int().positive(),
  fetchCacheTtlSeconds: z.number().int().positive(),
  httpTimeoutMs: z.number().int().min(1000).max(120_000),
  sessionIdleSeconds: z.number().int().min(60),
});

export type WorkbenchConfig = z.infer<typeof WorkbenchConfigSchema>;

export const DEFAULT_WORKBENCH_CONFIG: WorkbenchConfig = {
  subreddit: "changemyview",
  model: "gpt-4o-2024-08-06",
  fetchCooldownSeconds: 60,
  fetchCacheTtlSeconds: 3600,
  httpTimeoutMs: 15_000,
  sessionIdleSeconds: 6 * 3600,
};

export const DEFAULT_USER_AGENT = "node:changemyview_llm:v1.0";

// ============================================================================
// LOADERS
// ============================================================================

/**
 * Build the workbench config from env, falling back to defaults field by field.
 */
export function loadWorkbenchConfig(): WorkbenchConfig {
  const candidate = {
    subreddit: getEnv("CMV_SUBREDDIT") || DEFAULT_WORKBENCH_CONFIG.subreddit,
    model: getEnv("CMV_MODEL") || DEFAULT_WORKBENCH_CONFIG.model,
    fetchCooldownSeconds: parsePositiveInt("CMV_FETCH_COOLDOWN_SECONDS", DEFAULT_WORKBENCH_CONFIG.fetchCooldownSeconds),
    fetchCacheTtlSeconds: parsePositiveInt("CMV_FETCH_CACHE_TTL_SECONDS", DEFAULT_WORKBENCH_CONFIG.fetchCacheTtlSeconds),
    httpTimeoutMs: parsePositiveInt("CMV_HTTP_TIMEOUT_MS", DEFAULT_WORKBENCH_CONFIG.httpTimeoutMs),
    sessionIdleSeconds: parsePositiveInt("CMV_SESSION_IDLE_SECONDS", DEFAULT_WORKBENCH_CONFIG.sessionIdleSeconds),
  };

  const result = WorkbenchConfigSchema.safeParse(candidate);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "root"}: ${i.message}`);
    console.warn(`[Config] Invalid workbench config, using defaults: ${issues.join("; ")}`);
    return { ...DEFAULT_WORKBENCH_CONFIG };
  }
  return result.data;
}

/**
 * Reddit credentials, or null when any required variable is missing.
 */
export function loadRedditCredentials(): RedditCredentials | null {
  const result = RedditCredentialsSchema.safeParse({
    clientId: getEnv("REDDIT_CLIENT_ID"),
    clientSecret: getEnv("REDDIT_CLIENT_SECRET"),
    username: getEnv("REDDIT_USERNAME"),
    password: getEnv("REDDIT_PASSWORD"),
    userAgent: getEnv("REDDIT_USER_AGENT") || DEFAULT_USER_AGENT,
  });
  return result.success ? result.data : null;
}
