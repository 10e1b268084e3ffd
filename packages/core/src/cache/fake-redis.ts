import type { RedisClient } from './redis';

interface StoredValue {
  value: string;
  expiresAt: number;
}

/**
 * In-process stand-in for the ioredis client used by tests.
 * Set `failing` to make every command reject as if the server went away.
 */
export class FakeRedis implements RedisClient {
  status = 'wait';
  failing = false;
  hits = 0;
  misses = 0;
  readonly store = new Map<string, StoredValue>();
  readonly commands: string[] = [];

  constructor(private readonly clock: () => number = Date.now) {}

  async connect(): Promise<void> {
    this.check('connect');
    this.status = 'ready';
  }

  async ping(): Promise<string> {
    this.check('ping');
    return 'PONG';
  }

  async get(key: string): Promise<string | null> {
    this.check('get');
    const entry = this.live(key);
    if (entry) this.hits++;
    else this.misses++;
    return entry ? entry.value : null;
  }

  async setex(key: string, seconds: number, value: string): Promise<string> {
    this.check('setex');
    this.store.set(key, { value, expiresAt: this.clock() + seconds * 1000 });
    return 'OK';
  }

  async del(...keys: string[]): Promise<number> {
    this.check('del');
    let removed = 0;
    for (const key of keys) {
      if (this.live(key) && this.store.delete(key)) removed++;
    }
    return removed;
  }

  async scan(
    cursor: string,
    _matchToken: 'MATCH',
    pattern: string,
    _countToken: 'COUNT',
    _count: number
  ): Promise<[cursor: string, elements: string[]]> {
    this.check('scan');
    const prefix = pattern.endsWith('*') ? pattern.slice(0, -1) : pattern;
    const keys = Array.from(this.store.keys()).filter((key) =>
      pattern.endsWith('*') ? key.startsWith(prefix) : key === prefix
    );
    return cursor === '0' ? ['0', keys] : ['0', []];
  }

  async info(): Promise<string> {
    this.check('info');
    return [
      '# Memory',
      'used_memory:1048576',
      'used_memory_human:1.00M',
      '# Stats',
      `keyspace_hits:${this.hits}`,
      `keyspace_misses:${this.misses}`,
      '',
    ].join('\r\n');
  }

  disconnect(): void {
    this.status = 'end';
  }

  private check(command: string): void {
    this.commands.push(command);
    if (this.failing) {
      throw new Error(`Connection is closed (${command})`);
    }
  }

  private live(key: string): StoredValue | undefined {
    const entry = this.store.get(key);
    if (entry && this.clock() >= entry.expiresAt) {
      this.store.delete(key);
      return undefined;
    }
    return entry;
  }
}
