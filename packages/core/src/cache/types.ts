/**
 * Common interface of a single cache tier
 */
export interface Cache<V> {
  get(key: string): Promise<V | undefined>;
  set(key: string, value: V, ttlMs: number): Promise<boolean>;
  del(key: string): Promise<boolean>;
  clear(): Promise<boolean>;
}

/**
 * Snapshot of both tiers, recomputed on every request
 */
export interface CacheStats {
  localSize: number;
  localCapacity: number;
  remoteEnabled: boolean;
  remoteConnected: boolean;
  remoteUsedMemory?: string;
  remoteKeyspaceHits?: number;
  remoteKeyspaceMisses?: number;
}

/**
 * Zero-argument producer used on a cache miss
 */
export type Producer<V> = () => V | Promise<V>;

/**
 * Milliseconds since the epoch
 */
export type Clock = () => number;
