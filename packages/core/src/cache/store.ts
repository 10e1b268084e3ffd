import type { CacheConfig } from '../config';
import type { Logger } from '../logger';
import { createConsoleLogger } from '../logger';
import { deriveKey, type KeyPart } from './key';
import { MemoryLRU } from './memory';
import { RedisCache, createRedisClient, type RedisClient } from './redis';
import type { CacheStats, Clock, Producer } from './types';

export interface CacheStoreOptions {
  logger?: Logger; // Default: console logger at config.logLevel
  clock?: Clock; // Default: Date.now (local tier only)
  client?: RedisClient; // Default: built from config.remote
  enableBackgroundCleanup?: boolean; // Default: true
}

interface CacheStoreParts {
  config: CacheConfig;
  logger: Logger;
  local: MemoryLRU<string>;
  remote?: RedisCache<unknown>;
  client?: RedisClient;
}

/**
 * Two-tier cache: a shared Redis tier when configured and reachable,
 * an in-process LRU tier otherwise. Both tiers hold the JSON form of a
 * value, so a read returns a fresh copy with the same shape whichever
 * tier answers.
 *
 * No method rejects because of the remote tier. Remote failures are
 * logged and degrade to a miss or to a local-only write. Errors thrown
 * by a producer passed to getOrCompute() are not caught.
 *
 * getOrCompute() holds no lock between the miss and the write, so
 * concurrent misses on one key may each run their producer.
 */
export class CacheStore {
  private readonly config: CacheConfig;
  private readonly logger: Logger;
  private readonly local: MemoryLRU<string>;
  private readonly remote?: RedisCache<unknown>;
  private readonly client?: RedisClient;

  private constructor(parts: CacheStoreParts) {
    this.config = parts.config;
    this.logger = parts.logger;
    this.local = parts.local;
    this.remote = parts.remote;
    this.client = parts.client;
  }

  /**
   * Build a store and, when the remote tier is enabled, check that it
   * answers within the connect timeout. A store whose remote tier did
   * not answer stays local-only for its whole lifetime.
   */
  static async create(config: CacheConfig, options: CacheStoreOptions = {}): Promise<CacheStore> {
    const logger = options.logger ?? createConsoleLogger({ level: config.logLevel });
    const local = new MemoryLRU<string>({
      maxItems: config.localCapacity,
      defaultTtlMs: config.defaultTtlSeconds * 1000,
      enableBackgroundCleanup: options.enableBackgroundCleanup,
      clock: options.clock,
    });

    if (!config.remote.enabled) {
      return new CacheStore({ config, logger, local });
    }

    const client = options.client ?? createRedisClient(config.remote, logger);
    try {
      await withTimeout(openConnection(client), config.remote.connectTimeoutMs, 'Redis connection');
      logger.info?.(`Remote cache tier connected at ${config.remote.host}:${config.remote.port}`);
    } catch (error) {
      logger.warn('Remote cache tier unavailable, using local tier only:', error);
      client.disconnect();
      return new CacheStore({ config, logger, local });
    }

    const remote = new RedisCache<unknown>({
      client,
      prefix: config.remote.keyPrefix,
      defaultTtlMs: config.defaultTtlSeconds * 1000,
      logger,
    });
    return new CacheStore({ config, logger, local, remote, client });
  }

  /**
   * Whether operations go to the remote tier first
   */
  get remoteActive(): boolean {
    return this.remote !== undefined;
  }

  // Callers own the shape of what they stored under a key, the same
  // way a JSON decode owns it.
  async get<T = unknown>(key: string): Promise<T | undefined> {
    if (this.remote) {
      const value = await this.remote.get(key);
      if (value !== undefined) {
        return value as T;
      }
    }
    const encoded = await this.local.get(key);
    return encoded === undefined ? undefined : (JSON.parse(encoded) as T);
  }

  async set<T>(key: string, value: T, ttlSeconds: number = this.config.defaultTtlSeconds): Promise<boolean> {
    const ttlMs = ttlSeconds * 1000;

    let encoded: string | undefined;
    try {
      encoded = JSON.stringify(value);
    } catch (error) {
      this.logger.warn(`CacheStore.set: cannot serialize value for key ${key}:`, error);
      return false;
    }
    if (encoded === undefined) {
      this.logger.warn(`CacheStore.set: value for key ${key} has no JSON representation`);
      return false;
    }

    if (this.remote && (await this.remote.set(key, value, ttlMs))) {
      // Drop any copy left behind by an earlier local-only write
      await this.local.del(key);
      return true;
    }

    return this.local.set(key, encoded, ttlMs);
  }

  async delete(key: string): Promise<boolean> {
    const removedRemote = this.remote ? await this.remote.del(key) : false;
    const removedLocal = await this.local.del(key);
    return removedRemote || removedLocal;
  }

  async clear(): Promise<boolean> {
    const clearedRemote = this.remote ? await this.remote.clear() : true;
    await this.local.clear();
    return clearedRemote;
  }

  async getOrCompute<T>(key: string, producer: Producer<T>, ttlSeconds?: number): Promise<T> {
    const cached = await this.get<T>(key);
    if (cached !== undefined) {
      return cached;
    }

    const value = await producer();
    await this.set(key, value, ttlSeconds);
    return value;
  }

  async stats(): Promise<CacheStats> {
    const stats: CacheStats = {
      localSize: this.local.size(),
      localCapacity: this.local.capacity(),
      remoteEnabled: this.config.remote.enabled,
      remoteConnected: false,
    };

    if (this.remote) {
      const info = await this.remote.info();
      if (info) {
        stats.remoteConnected = true;
        stats.remoteUsedMemory = info.usedMemory;
        stats.remoteKeyspaceHits = info.keyspaceHits;
        stats.remoteKeyspaceMisses = info.keyspaceMisses;
      }
    }

    return stats;
  }

  deriveKey(
    namespace: string,
    positional: readonly KeyPart[] = [],
    named: Readonly<Record<string, KeyPart>> = {}
  ): string {
    return deriveKey(namespace, positional, named);
  }

  /**
   * Stop the prune timer and drop the remote connection
   */
  destroy(): void {
    this.local.destroy();
    this.client?.disconnect();
  }
}

async function openConnection(client: RedisClient): Promise<void> {
  if (client.status === 'wait') {
    await client.connect();
  }
  await client.ping();
}

async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timeout after ${timeoutMs}ms`)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}
