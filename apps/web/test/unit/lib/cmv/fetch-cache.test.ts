/**
 * Fetch cache tests: TTL expiry, keying, and the loader wrapper.
 */

import { describe, it, expect, vi } from "vitest";
import { TtlCache, fetchCacheKey, withTtlCache } from "@/lib/cmv/fetch-cache";
import type { FetchOptions } from "@/lib/cmv/types";

const HOUR_MS = 3_600_000;

describe("TtlCache", () => {
  it("returns a stored value until the TTL elapses", () => {
    let now = 0;
    const cache = new TtlCache<string>(HOUR_MS, () => now);
    cache.set("k", "v");

    now = HOUR_MS - 1;
    expect(cache.get("k")).toBe("v");

    now = HOUR_MS;
    expect(cache.get("k")).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it("clear() drops every entry", () => {
    const cache = new TtlCache<number>(HOUR_MS);
    cache.set("a", 1);
    cache.set("b", 2);
    cache.clear();
    expect(cache.get("a")).toBeUndefined();
    expect(cache.size).toBe(0);
  });
});

describe("fetchCacheKey", () => {
  it("joins sort order, time window and limit", () => {
    expect(fetchCacheKey({ sortOrder: "top", timeWindow: "all", limit: 5 })).toBe("top|all|5");
  });
});

describe("withTtlCache", () => {
  const topAll: FetchOptions = { sortOrder: "top", timeWindow: "all", limit: 5 };

  it("reuses the first result for the same key within the TTL", async () => {
    let now = 0;
    const loader = vi.fn(async (opts: FetchOptions) => [`${opts.sortOrder}-${now}`]);
    const cached = withTtlCache(loader, fetchCacheKey, new TtlCache<string[]>(HOUR_MS, () => now));

    const first = await cached(topAll);
    now = 30 * 60_000;
    const second = await cached(topAll);

    expect(second).toBe(first);
    expect(second).toEqual(["top-0"]);
    expect(loader).toHaveBeenCalledTimes(1);
  });

  it("calls the loader again after the TTL", async () => {
    let now = 0;
    const loader = vi.fn(async (_opts: FetchOptions) => [`load-${now}`]);
    const cached = withTtlCache(loader, fetchCacheKey, new TtlCache<string[]>(HOUR_MS, () => now));

    await cached(topAll);
    now = HOUR_MS + 1;
    const fresh = await cached(topAll);

    expect(fresh).toEqual([`load-${HOUR_MS + 1}`]);
    expect(loader).toHaveBeenCalledTimes(2);
  });

  it("keeps different keys apart", async () => {
    const loader = vi.fn(async (opts: FetchOptions) => [opts.sortOrder]);
    const cached = withTtlCache(loader, fetchCacheKey, new TtlCache<string[]>(HOUR_MS));

    await cached(topAll);
    await cached({ ...topAll, limit: 3 });
    await cached({ ...topAll, sortOrder: "new" });

    expect(loader).toHaveBeenCalledTimes(3);
  });

  it("does not cache rejections", async () => {
    const loader = vi
      .fn<(opts: FetchOptions) => Promise<string[]>>()
      .mockRejectedValueOnce(new Error("down"))
      .mockResolvedValueOnce(["ok"]);
    const cached = withTtlCache(loader, fetchCacheKey, new TtlCache<string[]>(HOUR_MS));

    await expect(cached(topAll)).rejects.toThrow("down");
    await expect(cached(topAll)).resolves.toEqual(["ok"]);
    expect(loader).toHaveBeenCalledTimes(2);
  });
});
