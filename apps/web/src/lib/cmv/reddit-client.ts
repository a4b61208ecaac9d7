/**
 * Reddit API client
 *
 * Script-app OAuth (password grant) against reddit.com, listings and comments
 * against oauth.reddit.com.
 *
 * https://github.com/reddit-archive/reddit/wiki/OAuth2
 */

import type { RedditCredentials } from "../config";
import { ForumUnavailableError, type ForumClient } from "./forum";
import type { FetchOptions, Thread } from "./types";
import { normalizeSortOrder } from "./types";

type RedditTokenResponse = {
  access_token?: string;
  expires_in?: number;
  error?: string;
};

type RedditListingChild = {
  kind?: string;
  data?: {
    id?: string;
    title?: string;
    selftext?: string;
    author?: string;
    permalink?: string;
    score?: number;
    num_comments?: number;
    created_utc?: number;
  };
};

type RedditListingResponse = {
  data?: {
    children?: Array<RedditListingChild | null>;
  };
};

type RedditCommentResponse = {
  json?: {
    /** Normally `[code, message, field]` triples */
    errors?: unknown;
    data?: {
      things?: Array<{ data?: { id?: string; name?: string } }>;
    };
  };
};

function describeRedditError(entry: unknown): string {
  return Array.isArray(entry) ? entry.map((part: unknown) => String(part)).join(": ") : String(entry);
}

const REDDIT_AUTH_URL = "https://www.reddit.com/api/v1/access_token";
const REDDIT_API_BASE = "https://oauth.reddit.com";
const DEFAULT_TIMEOUT_MS = 15_000;
// Refresh the bearer token this long before Reddit says it expires
const TOKEN_EXPIRY_MARGIN_MS = 60_000;

export interface RedditClientOptions {
  subreddit: string;
  timeoutMs?: number;
}

export class RedditForumClient implements ForumClient {
  private readonly credentials: RedditCredentials | null;
  private readonly subreddit: string;
  private readonly timeoutMs: number;
  private token: { value: string; expiresAt: number } | null = null;

  constructor(credentials: RedditCredentials | null, options: RedditClientOptions) {
    this.credentials = credentials;
    this.subreddit = options.subreddit;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async fetchThreads(options: FetchOptions): Promise<Thread[]> {
    const sortOrder = normalizeSortOrder(options.sortOrder);
    const params = new URLSearchParams({
      limit: String(options.limit),
      raw_json: "1",
    });
    if (sortOrder === "top") {
      params.set("t", options.timeWindow);
    }

    const path = `/r/${this.subreddit}/${sortOrder}?${params.toString()}`;
    console.log(`[Forum] Fetching ${path}`);

    const startTime = Date.now();
    const res = await this.authorizedRequest(path, { method: "GET" });
    const data = (await this.readJson(res)) as RedditListingResponse | null;
    const children = data?.data?.children;
    if (!Array.isArray(children)) {
      throw new ForumUnavailableError("Reddit returned an unexpected listing shape", res.status);
    }

    const threads: Thread[] = [];
    for (const child of children) {
      const d = child?.data;
      if (!d?.id || typeof d.title !== "string") continue;
      threads.push({
        id: d.id,
        title: d.title,
        selftext: d.selftext ?? "",
        author: d.author ?? null,
        permalink: d.permalink ?? null,
        score: d.score ?? null,
        numComments: d.num_comments ?? null,
        createdUtc: d.created_utc ?? null,
      });
    }

    console.log(`[Forum] Received ${threads.length} threads in ${Date.now() - startTime}ms`);
    // Reddit can over-deliver when stickied posts are included
    return threads.slice(0, options.limit);
  }

  async reply(threadId: string, text: string): Promise<string> {
    const body = new URLSearchParams({
      api_type: "json",
      thing_id: `t3_${threadId}`,
      text,
    });

    console.log(`[Forum] Posting reply to ${threadId} (${text.length} chars)`);
    const res = await this.authorizedRequest("/api/comment", {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body: body.toString(),
    });
    const data = (await this.readJson(res)) as RedditCommentResponse | null;

    const rawErrors = data?.json?.errors;
    const errors: unknown[] = Array.isArray(rawErrors) ? rawErrors : rawErrors ? [rawErrors] : [];
    if (errors.length > 0) {
      const detail = errors.map(describeRedditError).join("; ");
      throw new ForumUnavailableError(`Reddit rejected the comment: ${detail}`, res.status);
    }

    const things = data?.json?.data?.things;
    const created = Array.isArray(things) ? things[0]?.data : undefined;
    return created?.name ?? created?.id ?? "";
  }

  // ==========================================================================
  // HTTP PLUMBING
  // ==========================================================================

  private async authorizedRequest(path: string, init: RequestInit): Promise<Response> {
    const creds = this.requireCredentials();
    const token = await this.getAccessToken();
    const headers = new Headers(init.headers);
    headers.set("Authorization", `Bearer ${token}`);
    headers.set("User-Agent", creds.userAgent);
    headers.set("Accept", "application/json");

    const res = await this.send(`${REDDIT_API_BASE}${path}`, { ...init, headers });
    if (res.status === 401) {
      // Token revoked or expired early; next call re-authenticates
      this.token = null;
    }
    if (!res.ok) {
      throw await this.httpError(res, "Reddit API");
    }
    return res;
  }

  private async getAccessToken(): Promise<string> {
    if (this.token && Date.now() < this.token.expiresAt) {
      return this.token.value;
    }

    const creds = this.requireCredentials();
    const basic = Buffer.from(`${creds.clientId}:${creds.clientSecret}`).toString("base64");
    const body = new URLSearchParams({
      grant_type: "password",
      username: creds.username,
      password: creds.password,
    });

    const res = await this.send(REDDIT_AUTH_URL, {
      method: "POST",
      headers: {
        "Authorization": `Basic ${basic}`,
        "Content-Type": "application/x-www-form-urlencoded",
        "User-Agent": creds.userAgent,
      },
      body: body.toString(),
    });
    if (!res.ok) {
      throw await this.httpError(res, "Reddit auth");
    }

    // Reddit answers bad credentials with HTTP 200 and an error field
    const data = (await this.readJson(res)) as RedditTokenResponse | null;
    if (!data?.access_token) {
      throw new ForumUnavailableError(`Reddit auth failed: ${data?.error ?? "no access token in response"}`, 401);
    }

    const ttlMs = (data.expires_in ?? 3600) * 1000;
    this.token = {
      value: data.access_token,
      expiresAt: Date.now() + Math.max(0, ttlMs - TOKEN_EXPIRY_MARGIN_MS),
    };
    console.log("[Forum] Obtained Reddit access token");
    return this.token.value;
  }

  private requireCredentials(): RedditCredentials {
    if (!this.credentials) {
      throw new ForumUnavailableError(
        "Reddit credentials are not configured (REDDIT_CLIENT_ID, REDDIT_CLIENT_SECRET, REDDIT_USERNAME, REDDIT_PASSWORD)",
      );
    }
    return this.credentials;
  }

  private async send(url: string, init: RequestInit): Promise<Response> {
    try {
      return await fetch(url, { ...init, signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      if (error instanceof Error && error.name === "TimeoutError") {
        throw new ForumUnavailableError(`Reddit request timed out after ${this.timeoutMs}ms`, null, { cause: error });
      }
      throw new ForumUnavailableError(`Reddit request failed: ${errorMsg}`, null, { cause: error });
    }
  }

  private async readJson(res: Response): Promise<unknown> {
    try {
      return await res.json();
    } catch (error) {
      throw new ForumUnavailableError("Reddit returned a non-JSON response", res.status, { cause: error });
    }
  }

  private async httpError(res: Response, label: string): Promise<ForumUnavailableError> {
    let errorBody = "";
    try {
      errorBody = await res.text();
    } catch (e) {
      console.warn(`[Forum] Could not read error body: ${e instanceof Error ? e.message : String(e)}`);
    }
    console.error(`[Forum] ${label} HTTP error: ${res.status} ${res.statusText}`);
    return new ForumUnavailableError(
      `${label} HTTP ${res.status}: ${errorBody.substring(0, 200) || res.statusText}`,
      res.status,
    );
  }
}
