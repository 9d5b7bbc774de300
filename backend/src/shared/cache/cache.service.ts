import { Inject, Injectable, OnModuleDestroy, Optional } from '@nestjs/common';
import type { Redis } from 'ioredis';

/** Injection token for the in-process memory Keyv store. */
export const MEMORY_STORE = Symbol('MEMORY_STORE');
/** Injection token for the raw ioredis client (null when Redis is not configured). */
export const REDIS_STORE = Symbol('REDIS_STORE');

/** Minimal async K/V interface implemented by Keyv (used for memory store). */
export interface KeyvStore {
  get<T>(key: string): Promise<T | undefined>;
  set(key: string, value: unknown, ttl?: number): Promise<boolean | undefined>;
  delete(key: string): Promise<boolean>;
  clear?(): Promise<void>;
}

/**
 * Short-lived key/value storage.
 *
 * Values go to Redis (JSON-serialised) when a client is configured, so every
 * replica sees them; otherwise they stay in the in-process LRU.
 *
 * TTL parameters are in **seconds** (0 = no expiry).
 */
@Injectable()
export class CacheService implements OnModuleDestroy {
  constructor(
    @Inject(MEMORY_STORE) private readonly memory: KeyvStore,
    @Optional() @Inject(REDIS_STORE) private readonly redis: Redis | null = null,
  ) {}

  async set<T>(key: string, value: T, ttlSeconds = 0): Promise<void> {
    if (this.redis) {
      const payload = JSON.stringify(value);
      if (ttlSeconds) {
        await this.redis.set(key, payload, 'EX', ttlSeconds);
      } else {
        await this.redis.set(key, payload);
      }
      return;
    }

    await this.memory.set(
      key,
      value,
      ttlSeconds ? ttlSeconds * 1_000 : undefined,
    );
  }

  async get<T>(key: string): Promise<T | undefined> {
    if (this.redis) {
      const raw = await this.redis.get(key);
      if (raw === null) return undefined;
      return JSON.parse(raw) as T;
    }
    return this.memory.get<T>(key);
  }

  async delete(key: string): Promise<void> {
    if (this.redis) {
      await this.redis.del(key);
      return;
    }
    await this.memory.delete(key);
  }

  /** Reads and removes a key. Returns undefined on miss. */
  async take<T>(key: string): Promise<T | undefined> {
    const value = await this.get<T>(key);
    if (value !== undefined) await this.delete(key);
    return value;
  }

  /** True when a Redis client was successfully provided. */
  get hasRedis(): boolean {
    return this.redis !== null;
  }

  async onModuleDestroy() {
    if (this.redis && this.redis.status === 'ready') {
      await this.redis.quit();
    }
  }
}
