import type { Cache, CacheEntry } from "./types";

export class MemoryCache<T = unknown> implements Cache<T> {
  private readonly map = new Map<string, CacheEntry<T>>();

  async get(key: string): Promise<CacheEntry<T> | null> {
    const e = this.map.get(key);
    if (!e) return null;
    if (e.expiresAt <= Date.now()) {
      this.map.delete(key);
      return null;
    }
    return e;
  }

  async set(key: string, value: T, ttlSeconds: number): Promise<void> {
    const now = Date.now();
    this.map.set(key, {
      value,
      storedAt: now,
      expiresAt: now + ttlSeconds * 1000,
    });
  }

  get size(): number {
    return this.map.size;
  }
}
