import Redis from "ioredis";
import type { Logger } from "./logger.js";
import type { Clock } from "./types.js";

export type RateDecision = { allowed: true } | { allowed: false; retryAfterSeconds: number };

export interface WindowHit {
  allowed: boolean;
  /** Admitted hits in the window, this one included when allowed. */
  count: number;
  /** When the oldest admitted hit leaves the window (epoch ms). */
  resetAt: number;
}

/** Records a hit only when it is admitted, so denied callers never hold the window shut. */
export interface CounterBackend {
  hit(key: string, limit: number, windowMs: number, now: number): Promise<WindowHit>;
  close?(): Promise<void>;
}

export type FailMode = "open" | "closed";

export interface RateLimiterOptions {
  name: string;
  limit: number;
  windowMs: number;
  backend: CounterBackend;
  logger: Logger;
  failMode?: FailMode;
  clock?: Clock;
}

export class RateLimiter {
  readonly name: string;
  private readonly limit: number;
  private readonly windowMs: number;
  private readonly backend: CounterBackend;
  private readonly logger: Logger;
  private readonly failMode: FailMode;
  private readonly clock: Clock;

  constructor(options: RateLimiterOptions) {
    this.name = options.name;
    this.limit = options.limit;
    this.windowMs = options.windowMs;
    this.backend = options.backend;
    this.logger = options.logger;
    this.failMode = options.failMode ?? "open";
    this.clock = options.clock ?? Date.now;
  }

  async check(key: string): Promise<RateDecision> {
    const now = this.clock();
    let hit: WindowHit;
    try {
      hit = await this.backend.hit(`${this.name}:${key}`, this.limit, this.windowMs, now);
    } catch (error) {
      if (this.failMode === "open") {
        this.logger.error({ err: error, limiter: this.name, key }, "rate limit backend failed, allowing request");
        return { allowed: true };
      }
      this.logger.error({ err: error, limiter: this.name, key }, "rate limit backend failed, rejecting request");
      return { allowed: false, retryAfterSeconds: Math.ceil(this.windowMs / 1000) };
    }

    if (hit.allowed) {
      return { allowed: true };
    }
    this.logger.debug({ limiter: this.name, key, count: hit.count, limit: this.limit }, "rate limit exceeded");
    return {
      allowed: false,
      retryAfterSeconds: Math.max(1, Math.ceil((hit.resetAt - now) / 1000)),
    };
  }
}

interface WindowState {
  count: number;
  resetAt: number;
}

export class MemoryCounterBackend implements CounterBackend {
  private readonly windows = new Map<string, WindowState>();
  private readonly sweepThreshold: number;

  constructor(sweepThreshold = 10_000) {
    this.sweepThreshold = sweepThreshold;
  }

  async hit(key: string, limit: number, windowMs: number, now: number): Promise<WindowHit> {
    const current = this.windows.get(key);
    if (!current || now >= current.resetAt) {
      if (this.windows.size >= this.sweepThreshold) {
        this.sweep(now);
      }
      const fresh = { count: 1, resetAt: now + windowMs };
      this.windows.set(key, fresh);
      return { allowed: true, ...fresh };
    }
    if (current.count >= limit) {
      return { allowed: false, ...current };
    }
    current.count += 1;
    return { allowed: true, ...current };
  }

  get size(): number {
    return this.windows.size;
  }

  private sweep(now: number): void {
    for (const [key, window] of this.windows) {
      if (now >= window.resetAt) {
        this.windows.delete(key);
      }
    }
  }
}

export interface SortedSetClient {
  multi(commands: (string | number)[][]): { exec(): Promise<[Error | null, unknown][] | null> };
  zrem(key: string, member: string): Promise<number>;
  quit(): Promise<unknown>;
}

/** Sliding window log in a Redis sorted set, one member per admitted hit. */
export class RedisCounterBackend implements CounterBackend {
  private readonly redis: SortedSetClient;

  constructor(redis: SortedSetClient) {
    this.redis = redis;
  }

  static fromUrl(url: string, logger: Logger): RedisCounterBackend {
    const redis = new Redis(url, {
      maxRetriesPerRequest: 1,
      enableOfflineQueue: false,
      retryStrategy: (times) => Math.min(times * 50, 2000),
    });
    redis.on("error", (error) => {
      logger.error({ err: error }, "redis connection error");
    });
    return new RedisCounterBackend(redis);
  }

  async hit(key: string, limit: number, windowMs: number, now: number): Promise<WindowHit> {
    const redisKey = `ratelimit:${key}`;
    const member = `${now}-${Math.random().toString(36).slice(2, 11)}`;

    const results = await this.redis
      .multi([
        ["zremrangebyscore", redisKey, "-inf", now - windowMs],
        ["zadd", redisKey, now, member],
        ["zcard", redisKey],
        ["zrange", redisKey, 0, 0, "WITHSCORES"],
        ["pexpire", redisKey, windowMs * 2],
      ])
      .exec();

    if (!results) {
      throw new Error("rate limit transaction was discarded");
    }
    for (const [error] of results) {
      if (error) throw error;
    }

    const count = Number(results[2]?.[1]);
    const oldest = results[3]?.[1];
    const oldestScore = Array.isArray(oldest) && oldest.length >= 2 ? Number(oldest[1]) : now;
    if (!Number.isFinite(count)) {
      throw new Error("rate limit transaction returned no count");
    }

    if (count > limit) {
      await this.redis.zrem(redisKey, member);
      return { allowed: false, count: count - 1, resetAt: oldestScore + windowMs };
    }
    return { allowed: true, count, resetAt: oldestScore + windowMs };
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
