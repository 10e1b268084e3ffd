import type { Cache, Clock } from './types';

export interface MemoryLRUConfig {
  maxItems?: number; // Default: 1,000
  defaultTtlMs?: number; // Default: 300,000 (5 minutes)
  enableBackgroundCleanup?: boolean; // Default: true
  cleanupIntervalMs?: number; // Default: 60,000 (1 minute)
  clock?: Clock; // Default: Date.now
}

interface LocalEntry<V> {
  value: V;
  expiresAt: number;
}

/**
 * In-process LRU table with per-entry expiry.
 *
 * Map insertion order doubles as recency order: a read re-inserts the
 * entry at the tail, so the head is always the eviction candidate.
 * Every operation runs synchronously against the Map, so concurrent
 * callers on the event loop never see a half-written entry.
 */
export class MemoryLRU<V> implements Cache<V> {
  private readonly cache: Map<string, LocalEntry<V>>;
  private readonly maxItems: number;
  private readonly defaultTtlMs: number;
  private readonly clock: Clock;
  private cleanupTimer?: NodeJS.Timeout;

  constructor(config: MemoryLRUConfig = {}) {
    this.cache = new Map();
    this.maxItems = Math.max(1, config.maxItems ?? 1000);
    this.defaultTtlMs = config.defaultTtlMs ?? 300000;
    this.clock = config.clock ?? Date.now;

    const enableCleanup = config.enableBackgroundCleanup ?? true;
    if (enableCleanup) {
      const interval = config.cleanupIntervalMs ?? 60000;
      this.cleanupTimer = setInterval(() => this.pruneExpired(), interval);
      // Allow process to exit even if timer is active
      this.cleanupTimer.unref?.();
    }
  }

  async get(key: string): Promise<V | undefined> {
    const entry = this.cache.get(key);
    if (!entry) {
      return undefined;
    }

    if (this.clock() >= entry.expiresAt) {
      this.cache.delete(key);
      return undefined;
    }

    // Move to end (most recent)
    this.cache.delete(key);
    this.cache.set(key, entry);
    return entry.value;
  }

  async set(key: string, value: V, ttlMs: number): Promise<boolean> {
    const expiresAt = this.clock() + (ttlMs > 0 ? ttlMs : this.defaultTtlMs);

    if (this.cache.has(key)) {
      this.cache.delete(key);
    } else if (this.cache.size >= this.maxItems) {
      this.pruneExpired();
      if (this.cache.size >= this.maxItems) {
        this.evictOldest();
      }
    }

    this.cache.set(key, { value, expiresAt });
    return true;
  }

  async del(key: string): Promise<boolean> {
    return this.cache.delete(key);
  }

  async clear(): Promise<boolean> {
    this.cache.clear();
    return true;
  }

  /**
   * Remove expired entries
   */
  pruneExpired(): number {
    const now = this.clock();
    const toDelete: string[] = [];

    for (const [key, entry] of this.cache.entries()) {
      if (now >= entry.expiresAt) {
        toDelete.push(key);
      }
    }

    for (const key of toDelete) {
      this.cache.delete(key);
    }
    return toDelete.length;
  }

  /**
   * Evict the least recently used entry
   */
  private evictOldest(): void {
    const firstKey = this.cache.keys().next().value;
    if (firstKey !== undefined) {
      this.cache.delete(firstKey);
    }
  }

  /**
   * Number of live entries
   */
  size(): number {
    this.pruneExpired();
    return this.cache.size;
  }

  capacity(): number {
    return this.maxItems;
  }

  /**
   * Cleanup resources
   */
  destroy(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = undefined;
    }
    this.cache.clear();
  }
}
