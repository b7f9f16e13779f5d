/**
 * Store for S3 metadata probes, keyed by `toCacheKey(objectKey)`.
 *
 * Async so that a shared store (Redis, KV) can stand behind it.
 */
export interface CacheProvider<V> {
  get(key: string): Promise<V | undefined>;
  set(key: string, value: V): Promise<void>;
  /** Drops a stale entry after a write or delete through the adapter. */
  delete(key: string): Promise<void>;
}
