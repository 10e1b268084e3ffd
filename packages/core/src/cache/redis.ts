import { Redis } from 'ioredis';
import type { Cache } from './types';
import type { Logger } from '../logger';
import { consoleLogger } from '../logger';
import type { RemoteConfig } from '../config';

/**
 * The part of the ioredis client the remote tier talks to
 */
export interface RedisClient {
  status: string;
  connect(): Promise<void>;
  ping(): Promise<string>;
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<string>;
  del(...keys: string[]): Promise<number>;
  scan(
    cursor: string,
    matchToken: 'MATCH',
    pattern: string,
    countToken: 'COUNT',
    count: number
  ): Promise<[cursor: string, elements: string[]]>;
  info(): Promise<string>;
  disconnect(): void;
}

export interface RedisCacheConfig {
  client: RedisClient;
  prefix?: string; // Default: "repolens:"
  defaultTtlMs?: number; // Default: 300,000 (5 minutes)
  logger?: Logger; // Default: consoleLogger
}

/**
 * Figures the remote tier reports about itself
 */
export interface RedisInfo {
  usedMemory: string;
  keyspaceHits: number;
  keyspaceMisses: number;
}

/**
 * Build an ioredis client that fails fast instead of queueing while
 * the server is unreachable. The connection is opened by the caller.
 * Connection errors raised between commands, such as failed reconnect
 * attempts, go to the logger.
 */
export function createRedisClient(config: RemoteConfig, logger: Logger = consoleLogger): Redis {
  const client = new Redis({
    host: config.host,
    port: config.port,
    password: config.password,
    db: config.db,
    lazyConnect: true,
    connectTimeout: config.connectTimeoutMs,
    commandTimeout: config.commandTimeoutMs,
    enableOfflineQueue: false,
    maxRetriesPerRequest: 1,
  });
  client.on('error', (error: Error) => logger.warn('Remote cache tier error:', error));
  return client;
}

/**
 * Redis-based cache tier
 *
 * Error handling: all errors are logged but not thrown
 * - get() on error → return undefined (cache miss)
 * - set() on error → return false (caller falls back to the local tier)
 * - del() on error → return false
 * - info() on error → return undefined (not connected)
 */
export class RedisCache<V> implements Cache<V> {
  private readonly client: RedisClient;
  private readonly prefix: string;
  private readonly defaultTtlMs: number;
  private readonly logger: Logger;

  constructor(config: RedisCacheConfig) {
    this.client = config.client;
    this.prefix = config.prefix ?? 'repolens:';
    this.defaultTtlMs = config.defaultTtlMs ?? 300000;
    this.logger = config.logger ?? consoleLogger;
  }

  async get(key: string): Promise<V | undefined> {
    try {
      const value = await this.client.get(this.prefix + key);

      if (value === null) {
        return undefined;
      }

      return JSON.parse(value) as V;
    } catch (error) {
      this.logger.warn(`RedisCache.get error for key ${key}:`, error);
      return undefined;
    }
  }

  async set(key: string, value: V, ttlMs: number): Promise<boolean> {
    try {
      const serialized = JSON.stringify(value);
      if (serialized === undefined) {
        throw new Error('value has no JSON representation');
      }
      const ttlSeconds = Math.max(1, Math.ceil((ttlMs || this.defaultTtlMs) / 1000));

      // SETEX sets value and expiry atomically
      await this.client.setex(this.prefix + key, ttlSeconds, serialized);
      return true;
    } catch (error) {
      this.logger.warn(`RedisCache.set error for key ${key}:`, error);
      return false;
    }
  }

  async del(key: string): Promise<boolean> {
    try {
      const removed = await this.client.del(this.prefix + key);
      return removed > 0;
    } catch (error) {
      this.logger.warn(`RedisCache.del error for key ${key}:`, error);
      return false;
    }
  }

  /**
   * Delete every key under this cache's prefix.
   * Not atomic: keys written during the scan may survive.
   */
  async clear(): Promise<boolean> {
    try {
      const pattern = this.prefix + '*';
      let cursor = '0';

      do {
        const [nextCursor, keys] = await this.client.scan(cursor, 'MATCH', pattern, 'COUNT', 100);
        cursor = nextCursor;

        if (keys.length > 0) {
          await this.client.del(...keys);
        }
      } while (cursor !== '0');
      return true;
    } catch (error) {
      this.logger.warn('RedisCache.clear error:', error);
      return false;
    }
  }

  async info(): Promise<RedisInfo | undefined> {
    try {
      return parseRedisInfo(await this.client.info());
    } catch (error) {
      this.logger.warn('RedisCache.info error:', error);
      return undefined;
    }
  }
}

/**
 * Pull memory and keyspace counters out of an INFO reply
 */
export function parseRedisInfo(raw: string): RedisInfo {
  const fields = new Map<string, string>();
  for (const line of raw.split(/\r?\n/)) {
    if (line === '' || line.startsWith('#')) continue;
    const separator = line.indexOf(':');
    if (separator > 0) {
      fields.set(line.slice(0, separator), line.slice(separator + 1));
    }
  }

  const counter = (name: string): number => {
    const parsed = Number.parseInt(fields.get(name) ?? '', 10);
    return Number.isNaN(parsed) ? 0 : parsed;
  };

  return {
    usedMemory: fields.get('used_memory_human') ?? 'N/A',
    keyspaceHits: counter('keyspace_hits'),
    keyspaceMisses: counter('keyspace_misses'),
  };
}
