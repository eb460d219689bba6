import type { Cache, CacheEntry } from "./types";

/**
 * Multi-layer cache:
 * - get(): first hit wins, then backfills the faster layers above it
 * - set(): write-through to all layers
 */
export class LayeredCache<T = unknown> implements Cache<T> {
  private readonly layers: readonly Cache<T>[];

  constructor(layers: readonly Cache<T>[]) {
    this.layers = layers;
  }

  async get(key: string): Promise<CacheEntry<T> | null> {
    for (const [i, layer] of this.layers.entries()) {
      const v = await layer.get(key);
      if (!v) continue;
      // Preserve the remaining lifetime, not the original TTL
      const ttlSeconds = Math.floor((v.expiresAt - Date.now()) / 1000);
      if (ttlSeconds > 0) {
        await Promise.all(this.layers.slice(0, i).map((prev) => prev.set(key, v.value, ttlSeconds)));
      }
      return v;
    }
    return null;
  }

  async set(key: string, value: T, ttlSeconds: number): Promise<void> {
    await Promise.all(this.layers.map((l) => l.set(key, value, ttlSeconds)));
  }
}
