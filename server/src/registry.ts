import { randomBytes } from "node:crypto";
import { admission, quotaRetryAfter, quotaSpent, ttlElapsed } from "./admission.js";
import { ConflictError, GoneError, NotFoundError, QuotaExceededError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { Storage } from "./store.js";
import type { Clock, Endpoint, NewEndpoint } from "./types.js";

const MAX_ID_ATTEMPTS = 5;

/** 18 random bytes, 144 bits, rendered as 24 url-safe characters. */
export const generateEndpointId = (): string => randomBytes(18).toString("base64url");

export interface RegistryOptions {
  store: Storage;
  logger: Logger;
  clock?: Clock;
  generateId?: () => string;
  /** Deleting an endpoint with more records than this leaves them to the reaper. */
  cascadeLimit?: number;
  /** Retry-After for a spent quota on an endpoint without a TTL. */
  quotaRetryAfterSeconds?: number;
}

export interface DeleteResult {
  recordsDeleted: number;
  deferred: boolean;
}

export class EndpointRegistry {
  private readonly store: Storage;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly generateId: () => string;
  private readonly cascadeLimit: number;
  private readonly quotaRetryAfterSeconds: number;

  constructor(options: RegistryOptions) {
    this.store = options.store;
    this.logger = options.logger;
    this.clock = options.clock ?? Date.now;
    this.generateId = options.generateId ?? generateEndpointId;
    this.cascadeLimit = options.cascadeLimit ?? 500;
    this.quotaRetryAfterSeconds = options.quotaRetryAfterSeconds ?? 3600;
  }

  async create(input: NewEndpoint): Promise<Endpoint> {
    const now = this.clock();
    const createdAt = new Date(now).toISOString();

    for (let attempt = 1; attempt <= MAX_ID_ATTEMPTS; attempt += 1) {
      const endpoint: Endpoint = {
        id: this.generateId(),
        owner: input.owner ?? null,
        name: input.name ?? null,
        description: input.description ?? null,
        createdAt,
        expiresAt: input.ttlMs === null ? null : new Date(now + input.ttlMs).toISOString(),
        maxRequests: input.maxRequests ?? null,
        requestCount: 0,
        status: "active",
        statusChangedAt: createdAt,
        schema: input.schema ?? null,
        recordTtlMs: input.recordTtlMs ?? null,
      };
      if (await this.store.insertEndpoint(endpoint)) {
        this.logger.info({ endpointId: endpoint.id, owner: endpoint.owner }, "endpoint created");
        return endpoint;
      }
      this.logger.warn({ attempt }, "endpoint id collision, regenerating");
    }

    throw new ConflictError(MAX_ID_ATTEMPTS);
  }

  /** Looks the endpoint up without judging whether it still accepts captures. */
  async resolve(id: string): Promise<Endpoint> {
    const endpoint = await this.store.getEndpoint(id);
    if (!endpoint) {
      throw new NotFoundError(id);
    }
    return endpoint;
  }

  async list(owner?: string): Promise<Endpoint[]> {
    const endpoints = await this.store.listEndpoints();
    return endpoints
      .filter((endpoint) => endpoint.status !== "deleted")
      .filter((endpoint) => owner === undefined || endpoint.owner === owner)
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  async touchCount(id: string): Promise<Endpoint> {
    const now = this.clock();
    const updated = await this.store.updateEndpoint(id, (current) => {
      switch (admission(current, now)) {
        case "closed":
        case "elapsed":
          throw new GoneError(id);
        case "exhausted":
          throw new QuotaExceededError(
            id,
            current.maxRequests ?? 0,
            quotaRetryAfter(current, now, this.quotaRetryAfterSeconds)
          );
        case "open":
          return { ...current, requestCount: current.requestCount + 1 };
      }
    });
    if (!updated) {
      throw new NotFoundError(id);
    }
    return updated;
  }

  /** Gives back a count taken by `touchCount` whose capture was never stored. */
  async releaseCount(id: string): Promise<void> {
    await this.store.updateEndpoint(id, (current) =>
      current.requestCount > 0 ? { ...current, requestCount: current.requestCount - 1 } : undefined
    );
  }

  /** Resolves true only for the call that made the transition. */
  async markExpired(id: string): Promise<boolean> {
    const now = this.clock();
    let transitioned = false;
    await this.store.updateEndpoint(id, (current) => {
      if (current.status !== "active" || !(ttlElapsed(current, now) || quotaSpent(current))) {
        return undefined;
      }
      transitioned = true;
      return { ...current, status: "expired", statusChangedAt: new Date(now).toISOString() };
    });
    if (transitioned) {
      this.logger.info({ endpointId: id }, "endpoint expired");
    }
    return transitioned;
  }

  async delete(id: string): Promise<DeleteResult> {
    const now = this.clock();
    const updated = await this.store.updateEndpoint(id, (current) =>
      current.status === "deleted"
        ? undefined
        : { ...current, status: "deleted", statusChangedAt: new Date(now).toISOString() }
    );
    if (!updated) {
      throw new NotFoundError(id);
    }

    const pending = await this.store.countRecords(id);
    if (pending > this.cascadeLimit) {
      this.logger.info({ endpointId: id, records: pending }, "endpoint deleted, records left to reaper");
      return { recordsDeleted: 0, deferred: true };
    }

    let recordsDeleted = 0;
    for (const record of await this.store.listRecords(id)) {
      if (await this.store.deleteRecord(record.id)) {
        recordsDeleted += 1;
      }
    }
    await this.store.deleteEndpoint(id, (current) => current.status === "deleted");
    this.logger.info({ endpointId: id, recordsDeleted }, "endpoint deleted");
    return { recordsDeleted, deferred: false };
  }
}
