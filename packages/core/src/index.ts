/**
 * @repolens/core
 *
 * Logger, configuration and the two-tier cache
 */

// Types
export * from './cache/types';
export * from './logger';

// Configuration
export { loadConfig, resolveConfig, configFromEnv, DEFAULT_CONFIG } from './config';
export type { CacheConfig, CacheConfigInput, RemoteConfig, ConfigSource } from './config';

// Cache implementations
export { CacheStore } from './cache/store';
export type { CacheStoreOptions } from './cache/store';
export { MemoryLRU } from './cache/memory';
export type { MemoryLRUConfig } from './cache/memory';
export { RedisCache, createRedisClient, parseRedisInfo } from './cache/redis';
export type { RedisCacheConfig, RedisClient, RedisInfo } from './cache/redis';
export { deriveKey } from './cache/key';
export type { KeyPart } from './cache/key';
