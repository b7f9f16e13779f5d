import { createHash } from "crypto";
import type { CacheProvider } from "../cache/CacheProvider.js";

/**
 * Cache key for an object key: its MD5 hex digest.
 */
export function toCacheKey(key: string): string {
  return createHash("md5").update(key).digest("hex");
}

/**
 * Wraps a lookup so that only the values `shouldCache` accepts are remembered.
 * Rejected values are not stored, so the next call looks them up again.
 */
export function cacheAsyncFunc<Args extends unknown[], Value>(
  fn: (...args: Args) => Promise<Value>,
  keySelector: (...args: Args) => string,
  cache: CacheProvider<Value>,
  shouldCache: (value: Value) => boolean = () => true
): (...args: Args) => Promise<{ value: Value; cached: boolean }> {
  return async (...args: Args) => {
    const key = keySelector(...args);
    const hit = await cache.get(key);
    if (hit !== undefined) {
      return { value: hit, cached: true };
    }

    const value = await fn(...args);
    if (shouldCache(value)) {
      await cache.set(key, value);
    }
    return { value, cached: false };
  };
}
