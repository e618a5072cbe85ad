import { randomUUID } from "node:crypto";
import { admission } from "./admission.js";
import { GoneError, RateLimitedError, StorageError } from "./errors.js";
import type { FanoutHub } from "./hub.js";
import type { Logger } from "./logger.js";
import { headerValue, normalizeBody, parseJsonBody, resolveSourceIp } from "./normalize.js";
import type { RateLimiter } from "./rateLimiter.js";
import type { EndpointRegistry } from "./registry.js";
import type { Storage } from "./store.js";
import type {
  CaptureRecord,
  Clock,
  Endpoint,
  GeoLocation,
  InboundRequest,
  ValidationResult,
} from "./types.js";
import type { PayloadValidator } from "./validation.js";

export type GeoLocator = (ip: string) => Promise<GeoLocation | undefined>;

export const unknownLocation: GeoLocator = async () => undefined;

export interface CapturePipelineOptions {
  registry: EndpointRegistry;
  store: Storage;
  hub: FanoutHub;
  logger: Logger;
  validator: PayloadValidator;
  maxBodyBytes: number;
  trustProxy?: boolean;
  endpointLimiter?: RateLimiter;
  sourceIpLimiter?: RateLimiter;
  geolocate?: GeoLocator;
  clock?: Clock;
}

export class CapturePipeline {
  private readonly options: CapturePipelineOptions;
  private readonly clock: Clock;
  private readonly geolocate: GeoLocator;

  constructor(options: CapturePipelineOptions) {
    this.options = options;
    this.clock = options.clock ?? Date.now;
    this.geolocate = options.geolocate ?? unknownLocation;
  }

  /**
   * Admits, stores and announces one inbound request. Rejects with
   * NotFoundError, GoneError, RateLimitedError, QuotaExceededError or
   * StorageError; a failed schema check is recorded, not raised.
   */
  async capture(endpointId: string, inbound: InboundRequest): Promise<CaptureRecord> {
    const { registry, store, hub, logger } = this.options;

    const endpoint = await registry.resolve(endpointId);
    const state = admission(endpoint, this.clock());
    if (state === "closed" || state === "elapsed") {
      if (state === "elapsed") {
        await registry.markExpired(endpointId);
      }
      throw new GoneError(endpointId);
    }

    const sourceIp = resolveSourceIp(inbound.headers, inbound.remoteAddress, this.options.trustProxy ?? false);
    await this.admitRate(endpointId, sourceIp);

    // the quota is taken before anything is stored
    let counted: Endpoint;
    try {
      counted = await registry.touchCount(endpointId);
    } catch (error) {
      if (error instanceof GoneError) {
        await registry.markExpired(endpointId);
      }
      throw error;
    }

    const record = await this.buildRecord(counted, inbound, sourceIp);

    try {
      await store.saveRecord(record);
    } catch (error) {
      await this.releaseCount(endpointId);
      logger.error({ err: error, endpointId, recordId: record.id }, "failed to persist capture");
      throw error instanceof StorageError ? error : new StorageError("Failed to persist capture", error);
    }

    try {
      const delivered = hub.publish(endpointId, { type: "capture", record });
      logger.debug({ endpointId, recordId: record.id, subscribers: delivered }, "capture published");
    } catch (error) {
      logger.warn({ err: error, endpointId, recordId: record.id }, "capture fan-out failed");
    }

    return record;
  }

  private async admitRate(endpointId: string, sourceIp: string): Promise<void> {
    const { endpointLimiter, sourceIpLimiter } = this.options;
    if (endpointLimiter) {
      const decision = await endpointLimiter.check(endpointId);
      if (!decision.allowed) throw new RateLimitedError(decision.retryAfterSeconds);
    }
    if (sourceIpLimiter) {
      const decision = await sourceIpLimiter.check(sourceIp);
      if (!decision.allowed) throw new RateLimitedError(decision.retryAfterSeconds);
    }
  }

  private async buildRecord(
    endpoint: Endpoint,
    inbound: InboundRequest,
    sourceIp: string
  ): Promise<CaptureRecord> {
    const body = normalizeBody(inbound.body, this.options.maxBodyBytes);
    const headers = Object.freeze(inbound.headers.map(([name, value]) => Object.freeze([name, value] as const)));

    let validation: ValidationResult | null = null;
    if (endpoint.schema) {
      validation = this.options.validator(endpoint.schema, parseJsonBody(body.body, body.bodyEncoding));
    }

    return Object.freeze({
      id: randomUUID(),
      endpointId: endpoint.id,
      receivedAt: new Date(this.clock()).toISOString(),
      method: inbound.method.toUpperCase(),
      path: inbound.path,
      query: inbound.query,
      headers,
      ...body,
      contentType: headerValue(inbound.headers, "content-type") ?? null,
      userAgent: headerValue(inbound.headers, "user-agent") ?? null,
      sourceIp,
      geo: await this.locate(sourceIp),
      validation,
    });
  }

  private async locate(ip: string): Promise<GeoLocation | null> {
    try {
      return (await this.geolocate(ip)) ?? null;
    } catch (error) {
      this.options.logger.debug({ err: error, ip }, "geolocation lookup failed");
      return null;
    }
  }

  private async releaseCount(endpointId: string): Promise<void> {
    try {
      await this.options.registry.releaseCount(endpointId);
    } catch (error) {
      this.options.logger.error({ err: error, endpointId }, "failed to release request count");
    }
  }
}
