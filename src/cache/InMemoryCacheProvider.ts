import type { CacheProvider } from "./CacheProvider.js";

/**
 * Default metadata cache: a Map scoped to one adapter instance, with no
 * eviction.
 */
export class InMemoryCacheProvider<V> implements CacheProvider<V> {
  private entries = new Map<string, V>();

  async get(key: string): Promise<V | undefined> {
    return this.entries.get(key);
  }

  async set(key: string, value: V): Promise<void> {
    this.entries.set(key, value);
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }
}
