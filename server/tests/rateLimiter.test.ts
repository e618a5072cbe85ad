import { describe, expect, it, vi } from "vitest";
import { silentLogger } from "../src/logger.js";
import {
  type CounterBackend,
  MemoryCounterBackend,
  RateLimiter,
  RedisCounterBackend,
  type SortedSetClient,
} from "../src/rateLimiter.js";
import { manualClock } from "./helpers.js";

type Command = (string | number)[];

/** Sorted sets in a Map, answering the commands the Redis backend sends. */
class SortedSetMemory implements SortedSetClient {
  readonly sets = new Map<string, Map<string, number>>();
  discardNext = false;
  quitCalls = 0;

  multi(commands: Command[]) {
    return {
      exec: async (): Promise<[Error | null, unknown][] | null> => {
        if (this.discardNext) {
          this.discardNext = false;
          return null;
        }
        return commands.map((command): [Error | null, unknown] => [null, this.run(command)]);
      },
    };
  }

  async zrem(key: string, member: string): Promise<number> {
    return this.members(key).delete(member) ? 1 : 0;
  }

  async quit(): Promise<string> {
    this.quitCalls += 1;
    return "OK";
  }

  private members(key: string): Map<string, number> {
    let set = this.sets.get(key);
    if (!set) {
      set = new Map();
      this.sets.set(key, set);
    }
    return set;
  }

  private run([name, key, ...args]: Command): unknown {
    const set = this.members(String(key));
    switch (name) {
      case "zremrangebyscore": {
        let removed = 0;
        for (const [member, score] of set) {
          if (score <= Number(args[1])) {
            set.delete(member);
            removed += 1;
          }
        }
        return removed;
      }
      case "zadd":
        set.set(String(args[1]), Number(args[0]));
        return 1;
      case "zcard":
        return set.size;
      case "zrange":
        return [...set]
          .sort((a, b) => a[1] - b[1])
          .slice(0, 1)
          .flatMap(([member, score]) => [member, String(score)]);
      case "pexpire":
        return 1;
      default:
        throw new Error(`unexpected command ${String(name)}`);
    }
  }
}

const limiter = (options: { limit: number; windowMs: number; backend?: CounterBackend; name?: string }) => {
  const clock = manualClock();
  return {
    clock,
    limiter: new RateLimiter({
      name: options.name ?? "endpoint",
      limit: options.limit,
      windowMs: options.windowMs,
      backend: options.backend ?? new MemoryCounterBackend(),
      logger: silentLogger(),
      clock: clock.now,
    }),
  };
};

const brokenBackend: CounterBackend = {
  hit: async () => {
    throw new Error("connection refused");
  },
};

describe("RateLimiter", () => {
  it("allows up to the limit inside one window", async () => {
    const { limiter: rl } = limiter({ limit: 2, windowMs: 60_000 });

    expect(await rl.check("ep-1")).toEqual({ allowed: true });
    expect(await rl.check("ep-1")).toEqual({ allowed: true });
    expect(await rl.check("ep-1")).toEqual({ allowed: false, retryAfterSeconds: 60 });
  });

  it("reports the time left in the window and reopens after it", async () => {
    const { limiter: rl, clock } = limiter({ limit: 1, windowMs: 60_000 });
    await rl.check("ep-1");

    clock.advance(15_000);
    expect(await rl.check("ep-1")).toEqual({ allowed: false, retryAfterSeconds: 45 });

    clock.advance(45_000);
    expect(await rl.check("ep-1")).toEqual({ allowed: true });
  });

  it("never asks to retry sooner than one second", async () => {
    const { limiter: rl, clock } = limiter({ limit: 1, windowMs: 1000 });
    await rl.check("ep-1");

    clock.advance(999);

    expect(await rl.check("ep-1")).toEqual({ allowed: false, retryAfterSeconds: 1 });
  });

  it("counts keys separately", async () => {
    const { limiter: rl } = limiter({ limit: 1, windowMs: 60_000 });

    await rl.check("a");

    expect((await rl.check("a")).allowed).toBe(false);
    expect((await rl.check("b")).allowed).toBe(true);
  });

  it("keeps limiters sharing a backend apart by name", async () => {
    const backend = new MemoryCounterBackend();
    const { limiter: endpoints } = limiter({ limit: 1, windowMs: 60_000, backend, name: "endpoint" });
    const { limiter: addresses } = limiter({ limit: 1, windowMs: 60_000, backend, name: "ip" });

    await endpoints.check("x");

    expect((await addresses.check("x")).allowed).toBe(true);
    expect(backend.size).toBe(2);
  });

  it("allows traffic when the backend fails in open mode", async () => {
    const { limiter: rl } = limiter({ limit: 1, windowMs: 60_000, backend: brokenBackend });

    expect(await rl.check("ep-1")).toEqual({ allowed: true });
  });

  it("rejects traffic when the backend fails in closed mode", async () => {
    const hit = vi.fn(brokenBackend.hit);
    const rl = new RateLimiter({
      name: "endpoint",
      limit: 5,
      windowMs: 30_000,
      backend: { hit },
      logger: silentLogger(),
      failMode: "closed",
    });

    expect(await rl.check("ep-1")).toEqual({ allowed: false, retryAfterSeconds: 30 });
    expect(hit).toHaveBeenCalledWith("endpoint:ep-1", 5, 30_000, expect.any(Number));
  });
});

describe("MemoryCounterBackend", () => {
  it("sweeps finished windows once the map reaches its threshold", async () => {
    const backend = new MemoryCounterBackend(2);
    await backend.hit("a", 5, 100, 0);
    await backend.hit("b", 5, 100, 0);

    await backend.hit("c", 5, 100, 200);

    expect(backend.size).toBe(1);
  });

  it("reports the running count and window end", async () => {
    const backend = new MemoryCounterBackend();

    expect(await backend.hit("k", 2, 1000, 50)).toEqual({ allowed: true, count: 1, resetAt: 1050 });
    expect(await backend.hit("k", 2, 1000, 400)).toEqual({ allowed: true, count: 2, resetAt: 1050 });
    expect(await backend.hit("k", 2, 1000, 500)).toEqual({ allowed: false, count: 2, resetAt: 1050 });
    expect(await backend.hit("k", 2, 1000, 1050)).toEqual({ allowed: true, count: 1, resetAt: 2050 });
  });
});

describe("RedisCounterBackend", () => {
  const redisLimiter = (limit: number) => {
    const redis = new SortedSetMemory();
    return { redis, ...limiter({ limit, windowMs: 60_000, backend: new RedisCounterBackend(redis) }) };
  };

  it("admits up to the limit and reports when the oldest hit leaves the window", async () => {
    const { limiter: rl, clock } = redisLimiter(2);

    expect(await rl.check("ep-1")).toEqual({ allowed: true });
    clock.advance(10_000);
    expect(await rl.check("ep-1")).toEqual({ allowed: true });
    clock.advance(5_000);

    expect(await rl.check("ep-1")).toEqual({ allowed: false, retryAfterSeconds: 45 });
  });

  it("keeps only admitted hits in the log", async () => {
    const { limiter: rl, redis } = redisLimiter(1);

    await rl.check("ep-1");
    await rl.check("ep-1");
    await rl.check("ep-1");

    expect(redis.sets.get("ratelimit:endpoint:ep-1")?.size).toBe(1);
  });

  it("admits a sender that waits out each Retry-After it is given", async () => {
    const { limiter: rl, clock } = redisLimiter(1);
    expect(await rl.check("ep-1")).toEqual({ allowed: true });

    for (let round = 0; round < 3; round += 1) {
      clock.advance(1_000);
      const denied = await rl.check("ep-1");
      expect(denied).toEqual({ allowed: false, retryAfterSeconds: 59 });

      clock.advance(59_000);
      expect(await rl.check("ep-1")).toEqual({ allowed: true });
    }
  });

  it("drops hits once they are a full window old", async () => {
    const { limiter: rl, clock } = redisLimiter(1);
    await rl.check("ep-1");

    clock.advance(60_000);

    expect(await rl.check("ep-1")).toEqual({ allowed: true });
  });

  it("fails a discarded transaction so the limiter's fail mode applies", async () => {
    const redis = new SortedSetMemory();
    const backend = new RedisCounterBackend(redis);
    redis.discardNext = true;

    await expect(backend.hit("k", 1, 1000, 0)).rejects.toThrow("rate limit transaction was discarded");
    await expect(backend.hit("k", 1, 1000, 0)).resolves.toEqual({ allowed: true, count: 1, resetAt: 1000 });
  });

  it("quits the client on close", async () => {
    const redis = new SortedSetMemory();

    await new RedisCounterBackend(redis).close();

    expect(redis.quitCalls).toBe(1);
  });
});
