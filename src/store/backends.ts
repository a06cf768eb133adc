import type { Redis } from "ioredis";

/** The subset of a key-value client the transcript store needs. */
export interface KeyValueBackend {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  keys?(pattern: string): Promise<string[]>;
}

// In-memory storage - nothing survives the process
export class MemoryBackend implements KeyValueBackend {
  private readonly entries = new Map<string, string>();

  async get(key: string): Promise<string | null> {
    return this.entries.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<void> {
    this.entries.set(key, value);
  }

  async keys(pattern: string): Promise<string[]> {
    const prefix = pattern.endsWith("*") ? pattern.slice(0, -1) : pattern;
    return [...this.entries.keys()].filter((k) =>
      pattern.endsWith("*") ? k.startsWith(prefix) : k === pattern
    );
  }

  get size(): number {
    return this.entries.size;
  }
}

export class RedisBackend implements KeyValueBackend {
  constructor(private readonly redis: Redis) {}

  get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  set(key: string, value: string): Promise<unknown> {
    return this.redis.set(key, value);
  }

  keys(pattern: string): Promise<string[]> {
    return this.redis.keys(pattern);
  }
}
