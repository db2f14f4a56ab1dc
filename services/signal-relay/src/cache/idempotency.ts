import type { Logger } from '../logger.js';
import { errorMessage } from '../errors.js';

/**
 * Duplicate suppression within a TTL window.
 *
 * `admit` is a single check-and-insert: it resolves true for the first caller
 * of a key inside the window and false for every other one.
 */
export interface IdempotencyStore {
  admit(key: string): Promise<boolean>;
  /** Forgets a key so the next admission of it succeeds. */
  release(key: string): Promise<void>;
}

export type MemoryCacheOptions = {
  ttlMs: number;
  sweepIntervalMs?: number;
  now?: () => number;
  logger?: Pick<Logger, 'debug' | 'warn'>;
};

export class MemoryIdempotencyCache implements IdempotencyStore {
  private readonly entries = new Map<string, number>(); // key -> expiry (epoch ms)
  private readonly ttlMs: number;
  private readonly sweepIntervalMs: number;
  private readonly now: () => number;
  private readonly logger?: Pick<Logger, 'debug' | 'warn'>;
  private timer: NodeJS.Timeout | null = null;

  constructor(opts: MemoryCacheOptions) {
    this.ttlMs = opts.ttlMs;
    this.sweepIntervalMs = opts.sweepIntervalMs ?? 60_000;
    this.now = opts.now ?? Date.now;
    this.logger = opts.logger;
  }

  // no await between the lookup and the set: concurrent callers cannot interleave here
  admitSync(key: string): boolean {
    const now = this.now();
    const expiry = this.entries.get(key);
    if (expiry !== undefined && expiry > now) return false;
    this.entries.set(key, now + this.ttlMs);
    return true;
  }

  async admit(key: string): Promise<boolean> {
    return this.admitSync(key);
  }

  async release(key: string): Promise<void> {
    this.entries.delete(key);
  }

  get size(): number {
    return this.entries.size;
  }

  /** Removes expired entries; returns how many were dropped. */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, expiry] of this.entries) {
      if (expiry <= now) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      try {
        const removed = this.sweep();
        this.logger?.debug({ removed, size: this.entries.size }, 'idempotency sweep');
      } catch (err) {
        // lookups still evict lazily; the next tick tries again
        this.logger?.warn({ err: errorMessage(err) }, 'idempotency sweep failed');
      }
    }, this.sweepIntervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}

/** The subset of the ioredis client the redis store needs. */
export interface RedisSetNx {
  set(key: string, value: string, px: 'PX', ttlMs: number, nx: 'NX'): Promise<'OK' | null>;
  del(key: string): Promise<number>;
}

/**
 * Shared store for several relay instances: `SET key 1 PX ttl NX` is the
 * atomic check-and-insert, and Redis expires the key.
 */
export class RedisIdempotencyCache implements IdempotencyStore {
  constructor(
    private readonly redis: RedisSetNx,
    private readonly opts: { ttlMs: number; prefix?: string },
  ) {}

  private k(key: string) {
    return `${this.opts.prefix ?? 'idem:'}${key}`;
  }

  async admit(key: string): Promise<boolean> {
    const res = await this.redis.set(this.k(key), '1', 'PX', this.opts.ttlMs, 'NX');
    return res === 'OK';
  }

  async release(key: string): Promise<void> {
    await this.redis.del(this.k(key));
  }
}
