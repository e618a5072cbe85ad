import { describe, expect, it, vi } from "vitest";
import { ConflictError, GoneError, NotFoundError, QuotaExceededError } from "../src/errors.js";
import { silentLogger } from "../src/logger.js";
import { EndpointRegistry, generateEndpointId } from "../src/registry.js";
import { InMemoryStore } from "../src/store.js";
import { T0, makeRecord, manualClock } from "./helpers.js";

const setup = (
  options: { generateId?: () => string; cascadeLimit?: number; quotaRetryAfterSeconds?: number } = {}
) => {
  const clock = manualClock();
  const store = new InMemoryStore();
  const registry = new EndpointRegistry({
    store,
    logger: silentLogger(),
    clock: clock.now,
    ...options,
  });
  return { clock, store, registry };
};

describe("generateEndpointId", () => {
  it("produces 24 url-safe characters", () => {
    const id = generateEndpointId();

    expect(id).toMatch(/^[A-Za-z0-9_-]{24}$/);
    expect(generateEndpointId()).not.toBe(id);
  });
});

describe("EndpointRegistry.create", () => {
  it("stores an active endpoint with its expiry and quota", async () => {
    const { registry, store } = setup({ generateId: () => "ep-new" });

    const endpoint = await registry.create({ ttlMs: 3_600_000, maxRequests: 2, owner: "alice", name: "orders" });

    expect(endpoint).toEqual({
      id: "ep-new",
      owner: "alice",
      name: "orders",
      description: null,
      createdAt: "2026-03-01T12:00:00.000Z",
      expiresAt: "2026-03-01T13:00:00.000Z",
      maxRequests: 2,
      requestCount: 0,
      status: "active",
      statusChangedAt: "2026-03-01T12:00:00.000Z",
      schema: null,
      recordTtlMs: null,
    });
    expect(await store.getEndpoint("ep-new")).toEqual(endpoint);
  });

  it("leaves expiresAt empty without a ttl", async () => {
    const { registry } = setup();

    const endpoint = await registry.create({ ttlMs: null });

    expect(endpoint.expiresAt).toBeNull();
    expect(endpoint.maxRequests).toBeNull();
  });

  it("draws a new id after a collision", async () => {
    const generateId = vi
      .fn<() => string>()
      .mockReturnValueOnce("taken")
      .mockReturnValueOnce("taken")
      .mockReturnValueOnce("fresh");
    const { registry } = setup({ generateId });

    await registry.create({ ttlMs: null });
    const second = await registry.create({ ttlMs: null });

    expect(second.id).toBe("fresh");
    expect(generateId).toHaveBeenCalledTimes(3);
  });

  it("gives up with ConflictError when every attempt collides", async () => {
    const generateId = vi.fn(() => "same");
    const { registry } = setup({ generateId });
    await registry.create({ ttlMs: null });

    await expect(registry.create({ ttlMs: null })).rejects.toBeInstanceOf(ConflictError);
    expect(generateId).toHaveBeenCalledTimes(6);
  });
});

describe("EndpointRegistry.resolve and list", () => {
  it("rejects unknown ids with NotFoundError", async () => {
    const { registry } = setup();

    await expect(registry.resolve("nope")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("lists live endpoints newest first and filters by owner", async () => {
    const ids = ["one", "two", "three"];
    const { registry, clock } = setup({ generateId: () => ids.shift() ?? "extra" });

    await registry.create({ ttlMs: null, owner: "alice" });
    clock.advance(1000);
    await registry.create({ ttlMs: null, owner: "bob" });
    clock.advance(1000);
    await registry.create({ ttlMs: null, owner: "alice" });

    expect((await registry.list()).map((endpoint) => endpoint.id)).toEqual(["three", "two", "one"]);
    expect((await registry.list("alice")).map((endpoint) => endpoint.id)).toEqual(["three", "one"]);
  });
});

describe("EndpointRegistry.touchCount", () => {
  it("counts up to the quota and then refuses", async () => {
    const { registry, store } = setup({ generateId: () => "ep-q" });
    await registry.create({ ttlMs: null, maxRequests: 2 });

    expect((await registry.touchCount("ep-q")).requestCount).toBe(1);
    expect((await registry.touchCount("ep-q")).requestCount).toBe(2);
    await expect(registry.touchCount("ep-q")).rejects.toBeInstanceOf(QuotaExceededError);
    expect((await store.getEndpoint("ep-q"))?.requestCount).toBe(2);
  });

  it("tells a refused sender to retry when the ttl ends", async () => {
    const { registry, clock } = setup({ generateId: () => "ep-q" });
    await registry.create({ ttlMs: 3_600_000, maxRequests: 1 });
    await registry.touchCount("ep-q");

    clock.advance(600_500);

    await expect(registry.touchCount("ep-q")).rejects.toMatchObject({
      code: "quota_exceeded",
      maxRequests: 1,
      retryAfterSeconds: 3000,
    });
  });

  it("falls back to the configured retry hint without a ttl", async () => {
    const { registry } = setup({ generateId: () => "ep-q", quotaRetryAfterSeconds: 900 });
    await registry.create({ ttlMs: null, maxRequests: 1 });
    await registry.touchCount("ep-q");

    await expect(registry.touchCount("ep-q")).rejects.toMatchObject({ retryAfterSeconds: 900 });
  });

  it("admits exactly the quota when calls race", async () => {
    const { registry, store } = setup({ generateId: () => "ep-race" });
    await registry.create({ ttlMs: null, maxRequests: 3 });

    const results = await Promise.allSettled(
      Array.from({ length: 8 }, () => registry.touchCount("ep-race"))
    );

    expect(results.filter((result) => result.status === "fulfilled")).toHaveLength(3);
    expect(results.filter((result) => result.status === "rejected")).toHaveLength(5);
    expect((await store.getEndpoint("ep-race"))?.requestCount).toBe(3);
  });

  it("refuses once the ttl has passed", async () => {
    const { registry, clock } = setup({ generateId: () => "ep-ttl" });
    await registry.create({ ttlMs: 1000 });

    clock.advance(1000);

    await expect(registry.touchCount("ep-ttl")).rejects.toBeInstanceOf(GoneError);
  });

  it("refuses unknown endpoints", async () => {
    const { registry } = setup();

    await expect(registry.touchCount("nope")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("releases a count without going below zero", async () => {
    const { registry, store } = setup({ generateId: () => "ep-r" });
    await registry.create({ ttlMs: null });
    await registry.touchCount("ep-r");

    await registry.releaseCount("ep-r");
    await registry.releaseCount("ep-r");

    expect((await store.getEndpoint("ep-r"))?.requestCount).toBe(0);
  });
});

describe("EndpointRegistry.markExpired", () => {
  it("transitions once when the ttl has passed", async () => {
    const { registry, store, clock } = setup({ generateId: () => "ep-x" });
    await registry.create({ ttlMs: 5000 });

    expect(await registry.markExpired("ep-x")).toBe(false);
    clock.advance(5000);
    expect(await registry.markExpired("ep-x")).toBe(true);
    expect(await registry.markExpired("ep-x")).toBe(false);

    const stored = await store.getEndpoint("ep-x");
    expect(stored?.status).toBe("expired");
    expect(stored?.statusChangedAt).toBe(new Date(T0 + 5000).toISOString());
  });

  it("transitions when the quota is spent", async () => {
    const { registry } = setup({ generateId: () => "ep-y" });
    await registry.create({ ttlMs: null, maxRequests: 1 });
    await registry.touchCount("ep-y");

    expect(await registry.markExpired("ep-y")).toBe(true);
  });
});

describe("EndpointRegistry.delete", () => {
  it("removes the endpoint together with its records", async () => {
    const { registry, store } = setup({ generateId: () => "ep-1" });
    await registry.create({ ttlMs: null });
    await store.saveRecord(makeRecord({ id: "r1" }));
    await store.saveRecord(makeRecord({ id: "r2" }));

    expect(await registry.delete("ep-1")).toEqual({ recordsDeleted: 2, deferred: false });
    expect(await store.getEndpoint("ep-1")).toBeUndefined();
    expect(await store.countRecords("ep-1")).toBe(0);
    await expect(registry.delete("ep-1")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("leaves large record sets to the reaper", async () => {
    const { registry, store } = setup({ generateId: () => "ep-1", cascadeLimit: 1 });
    await registry.create({ ttlMs: null });
    await store.saveRecord(makeRecord({ id: "r1" }));
    await store.saveRecord(makeRecord({ id: "r2" }));

    expect(await registry.delete("ep-1")).toEqual({ recordsDeleted: 0, deferred: true });
    expect((await store.getEndpoint("ep-1"))?.status).toBe("deleted");
    expect(await store.countRecords("ep-1")).toBe(2);
    expect(await registry.list()).toEqual([]);
    await expect(registry.touchCount("ep-1")).rejects.toBeInstanceOf(GoneError);
  });
});
