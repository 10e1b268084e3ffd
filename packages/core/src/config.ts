import { readFile } from 'fs/promises';
import { isLogLevel, type LogLevel } from './logger';

export interface RemoteConfig {
  enabled: boolean;
  host: string;
  port: number;
  password?: string;
  db: number;
  keyPrefix: string;
  connectTimeoutMs: number;
  commandTimeoutMs: number;
}

export interface CacheConfig {
  localCapacity: number;
  defaultTtlSeconds: number;
  logLevel: LogLevel;
  remote: RemoteConfig;
}

/**
 * Partial configuration as written in a file or passed inline
 */
export interface CacheConfigInput {
  localCapacity?: number;
  defaultTtlSeconds?: number;
  logLevel?: string;
  remote?: Partial<RemoteConfig>;
}

export interface ConfigSource {
  file?: string;
  json?: CacheConfigInput;
  env?: NodeJS.ProcessEnv;
}

export const DEFAULT_CONFIG: CacheConfig = {
  localCapacity: 1000,
  defaultTtlSeconds: 300,
  logLevel: 'info',
  remote: {
    enabled: false,
    host: 'localhost',
    port: 6379,
    db: 0,
    keyPrefix: 'repolens:',
    connectTimeoutMs: 5000,
    commandTimeoutMs: 5000,
  },
};

/**
 * Load and validate cache configuration
 * Priority: file > json > env
 */
export async function loadConfig(source: ConfigSource = {}): Promise<CacheConfig> {
  let input: CacheConfigInput;

  if (source.file) {
    try {
      const content = await readFile(source.file, 'utf-8');
      input = JSON.parse(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to load config from ${source.file}: ${reason}`);
    }
  } else if (source.json) {
    input = source.json;
  } else {
    input = configFromEnv(source.env ?? process.env);
  }

  return resolveConfig(input);
}

/**
 * Read the recognized environment variables. Unset variables are left
 * out so the defaults apply.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): CacheConfigInput {
  const remote: Partial<RemoteConfig> = {};
  const enabled = parseBoolean(env.USE_REDIS_CACHE, 'USE_REDIS_CACHE');
  if (enabled !== undefined) remote.enabled = enabled;
  if (env.REDIS_HOST) remote.host = env.REDIS_HOST;
  const port = parseInteger(env.REDIS_PORT, 'REDIS_PORT');
  if (port !== undefined) remote.port = port;
  if (env.REDIS_PASSWORD) remote.password = env.REDIS_PASSWORD;
  const db = parseInteger(env.REDIS_DB, 'REDIS_DB');
  if (db !== undefined) remote.db = db;
  if (env.REDIS_KEY_PREFIX !== undefined) remote.keyPrefix = env.REDIS_KEY_PREFIX;
  const connectTimeoutMs = parseInteger(env.REDIS_CONNECT_TIMEOUT_MS, 'REDIS_CONNECT_TIMEOUT_MS');
  if (connectTimeoutMs !== undefined) remote.connectTimeoutMs = connectTimeoutMs;
  const commandTimeoutMs = parseInteger(env.REDIS_COMMAND_TIMEOUT_MS, 'REDIS_COMMAND_TIMEOUT_MS');
  if (commandTimeoutMs !== undefined) remote.commandTimeoutMs = commandTimeoutMs;

  return {
    localCapacity: parseInteger(env.CACHE_LOCAL_CAPACITY, 'CACHE_LOCAL_CAPACITY'),
    defaultTtlSeconds: parseInteger(env.CACHE_TTL, 'CACHE_TTL'),
    logLevel: env.LOG_LEVEL ? env.LOG_LEVEL.trim().toLowerCase() : undefined,
    remote,
  };
}

/**
 * Fill defaults and validate
 */
export function resolveConfig(input: CacheConfigInput): CacheConfig {
  const logLevel = input.logLevel ?? DEFAULT_CONFIG.logLevel;
  if (!isLogLevel(logLevel)) {
    throw new Error(`Invalid config: logLevel must be one of debug, info, warn, error, silent, got '${logLevel}'`);
  }

  const config: CacheConfig = {
    localCapacity: input.localCapacity ?? DEFAULT_CONFIG.localCapacity,
    defaultTtlSeconds: input.defaultTtlSeconds ?? DEFAULT_CONFIG.defaultTtlSeconds,
    logLevel,
    remote: { ...DEFAULT_CONFIG.remote, ...input.remote },
  };

  requirePositiveInteger(config.localCapacity, 'localCapacity');
  requirePositiveInteger(config.defaultTtlSeconds, 'defaultTtlSeconds');
  requirePositiveInteger(config.remote.connectTimeoutMs, 'remote.connectTimeoutMs');
  requirePositiveInteger(config.remote.commandTimeoutMs, 'remote.commandTimeoutMs');

  if (typeof config.remote.enabled !== 'boolean') {
    throw new Error('Invalid config: remote.enabled must be a boolean');
  }
  if (config.remote.enabled && (!config.remote.host || typeof config.remote.host !== 'string')) {
    throw new Error('Invalid config: remote.host is required when the remote tier is enabled');
  }
  if (!Number.isInteger(config.remote.port) || config.remote.port < 1 || config.remote.port > 65535) {
    throw new Error(`Invalid config: remote.port must be between 1 and 65535, got ${config.remote.port}`);
  }
  if (!Number.isInteger(config.remote.db) || config.remote.db < 0) {
    throw new Error(`Invalid config: remote.db must be a non-negative integer, got ${config.remote.db}`);
  }

  return config;
}

function requirePositiveInteger(value: number, field: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid config: ${field} must be a positive integer, got ${value}`);
  }
}

function parseInteger(raw: string | undefined, name: string): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`Invalid config: ${name} must be an integer, got '${raw}'`);
  }
  return value;
}

function parseBoolean(raw: string | undefined, name: string): boolean | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  switch (raw.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
    case 'on':
      return true;
    case 'false':
    case '0':
    case 'no':
    case 'off':
      return false;
    default:
      throw new Error(`Invalid config: ${name} must be a boolean, got '${raw}'`);
  }
}
