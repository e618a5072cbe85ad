import fastifyCors from "@fastify/cors";
import Fastify, {
  type FastifyError,
  type FastifyRequest,
  type RawReplyDefaultExpression,
  type RawRequestDefaultExpression,
  type RawServerDefault,
  type RouteHandlerMethod,
} from "fastify";
import { z } from "zod";
import { requestsRemaining } from "./admission.js";
import { type Config, loadConfig, parseConfig } from "./config.js";
import { NotFoundError, QuotaExceededError, RateLimitedError, isHooktrapError } from "./errors.js";
import { FanoutHub } from "./hub.js";
import { type Logger, createLogger } from "./logger.js";
import { flattenHeaders, pairRawHeaders } from "./normalize.js";
import { CapturePipeline, type GeoLocator } from "./pipeline.js";
import {
  type CounterBackend,
  MemoryCounterBackend,
  RateLimiter,
  RedisCounterBackend,
} from "./rateLimiter.js";
import { ExpiryReaper } from "./reaper.js";
import { summarizeRecords } from "./stats.js";
import { EndpointRegistry } from "./registry.js";
import { createSseChannel, formatSseEvent, sseHeaders, writeSseComment } from "./sse.js";
import { FileStore, InMemoryStore, type Storage } from "./store.js";
import type { CaptureRecord, Clock, Endpoint, InboundRequest } from "./types.js";
import { type PayloadValidator, createAjvValidator, schemaProblem } from "./validation.js";

export interface Services {
  config: Config;
  store: Storage;
  registry: EndpointRegistry;
  hub: FanoutHub;
  pipeline: CapturePipeline;
  reaper: ExpiryReaper;
}

declare module "fastify" {
  interface FastifyInstance {
    services: Services;
  }
}

export interface BuildServerOptions {
  config?: Config;
  logger?: Logger;
  store?: Storage;
  counterBackend?: CounterBackend;
  validator?: PayloadValidator;
  geolocate?: GeoLocator;
  generateId?: () => string;
  clock?: Clock;
}

interface EndpointParams {
  id: string;
}

interface CaptureParams extends EndpointParams {
  "*"?: string;
}

const listQuery = z.object({
  owner: z.string().min(1).optional(),
});

const recordsQuery = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

const createEndpointBody = (config: Config) =>
  z
    .object({
      owner: z.string().min(1).max(200).optional(),
      name: z.string().max(200).optional(),
      description: z.string().max(2000).optional(),
      ttlSeconds: z
        .number()
        .int()
        .positive()
        .max(Math.floor(config.MAX_ENDPOINT_TTL_MS / 1000))
        .optional(),
      maxRequests: z.number().int().min(1).max(config.MAX_REQUESTS_LIMIT).optional(),
      recordTtlSeconds: z.number().int().positive().optional(),
      schema: z.record(z.unknown()).optional(),
    })
    .strict();

const toInboundRequest = (request: FastifyRequest<{ Params: CaptureParams }>): InboundRequest => {
  const rawUrl = request.raw.url ?? request.url;
  const queryStart = rawUrl.indexOf("?");
  const rawHeaders = request.raw.rawHeaders;

  return {
    method: request.method,
    path: `/${request.params["*"] ?? ""}`,
    query: queryStart >= 0 ? rawUrl.slice(queryStart + 1) : "",
    headers: rawHeaders.length > 0 ? pairRawHeaders(rawHeaders) : flattenHeaders(request.headers),
    body: Buffer.isBuffer(request.body) ? request.body : Buffer.alloc(0),
    remoteAddress: request.raw.socket.remoteAddress ?? request.ip,
  };
};

const newestFirst = (records: CaptureRecord[], limit: number): CaptureRecord[] =>
  [...records].sort((a, b) => b.receivedAt.localeCompare(a.receivedAt)).slice(0, limit);

export const buildServer = (options: BuildServerOptions = {}) => {
  const config = options.config ?? parseConfig();
  const logger = options.logger ?? createLogger(config);
  const app = Fastify({
    logger,
    trustProxy: config.TRUST_PROXY,
    bodyLimit: config.BODY_HARD_LIMIT_BYTES,
    forceCloseConnections: true,
  });

  const clock = options.clock ?? Date.now;
  const store = options.store ?? (config.STORE_FILE ? new FileStore(config.STORE_FILE, logger) : new InMemoryStore());
  const counterBackend: CounterBackend =
    options.counterBackend ??
    (config.REDIS_URL ? RedisCounterBackend.fromUrl(config.REDIS_URL, logger) : new MemoryCounterBackend());

  const registry = new EndpointRegistry({
    store,
    logger: logger.child({ component: "registry" }),
    clock,
    generateId: options.generateId,
    cascadeLimit: config.DELETE_CASCADE_LIMIT,
    quotaRetryAfterSeconds: config.QUOTA_RETRY_AFTER_SECONDS,
  });
  const hub = new FanoutHub({
    logger: logger.child({ component: "hub" }),
    bufferSize: config.SUBSCRIBER_BUFFER_SIZE,
    overflow: config.SUBSCRIBER_OVERFLOW,
  });
  const limiterLogger = logger.child({ component: "rate-limiter" });
  const makeLimiter = (name: string, limit: number) =>
    limit > 0
      ? new RateLimiter({
          name,
          limit,
          windowMs: config.RATE_LIMIT_WINDOW_MS,
          backend: counterBackend,
          failMode: config.RATE_LIMIT_FAIL_MODE,
          logger: limiterLogger,
          clock,
        })
      : undefined;
  const pipeline = new CapturePipeline({
    registry,
    store,
    hub,
    logger: logger.child({ component: "pipeline" }),
    validator: options.validator ?? createAjvValidator(),
    maxBodyBytes: config.MAX_BODY_BYTES,
    trustProxy: config.TRUST_PROXY,
    endpointLimiter: makeLimiter("endpoint", config.RATE_LIMIT_PER_ENDPOINT),
    sourceIpLimiter: makeLimiter("ip", config.RATE_LIMIT_PER_IP),
    geolocate: options.geolocate,
    clock,
  });
  const reaper = new ExpiryReaper({
    store,
    logger: logger.child({ component: "reaper" }),
    intervalMs: config.REAPER_INTERVAL_MS,
    retentionGraceMs: config.RETENTION_GRACE_MS,
    recordTtlMs: config.RECORD_TTL_MS,
    hub,
    clock,
  });

  app.decorate("services", { config, store, registry, hub, pipeline, reaper });

  const endpointView = (endpoint: Endpoint) => ({
    ...endpoint,
    requestsRemaining: requestsRemaining(endpoint),
    url: `${config.PUBLIC_BASE_URL ?? ""}/hooks/${endpoint.id}`,
    streamUrl: `${config.PUBLIC_BASE_URL ?? ""}/api/endpoints/${endpoint.id}/stream`,
  });

  const findVisible = async (id: string): Promise<Endpoint> => {
    const endpoint = await registry.resolve(id);
    if (endpoint.status === "deleted") {
      throw new NotFoundError(id);
    }
    return endpoint;
  };

  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (isHooktrapError(error)) {
      if (error instanceof RateLimitedError || error instanceof QuotaExceededError) {
        reply.header("retry-after", String(error.retryAfterSeconds));
      }
      if (error.statusCode >= 500) {
        request.log.error({ err: error }, error.message);
      } else {
        request.log.debug({ code: error.code }, error.message);
      }
      return reply.code(error.statusCode).send({ error: error.code, message: error.message });
    }
    if (error.statusCode === 413) {
      return reply.code(413).send({ error: "payload_too_large", message: error.message });
    }
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.code(error.statusCode).send({ error: "bad_request", message: error.message });
    }
    request.log.error({ err: error }, "unhandled error");
    return reply.code(500).send({ error: "internal_error", message: "Internal server error" });
  });

  app.addHook("preClose", async () => {
    hub.closeAll();
  });

  app.addHook("onClose", async () => {
    await reaper.stop();
    await counterBackend.close?.();
  });

  app.get("/health", async () => ({
    status: "ok",
    endpoints: (await registry.list()).length,
    subscribers: hub.subscriberCount(),
  }));

  app.post("/api/endpoints", async (request, reply) => {
    const parsed = createEndpointBody(config).safeParse(request.body ?? {});
    if (!parsed.success) {
      return reply.code(400).send({ error: "invalid_request", issues: parsed.error.issues });
    }
    const input = parsed.data;
    if (input.schema) {
      const problem = schemaProblem(input.schema);
      if (problem) {
        return reply.code(400).send({ error: "invalid_schema", message: problem });
      }
    }

    const endpoint = await registry.create({
      owner: input.owner,
      name: input.name,
      description: input.description,
      ttlMs: input.ttlSeconds !== undefined ? input.ttlSeconds * 1000 : config.DEFAULT_ENDPOINT_TTL_MS,
      maxRequests: input.maxRequests,
      recordTtlMs: input.recordTtlSeconds !== undefined ? input.recordTtlSeconds * 1000 : undefined,
      schema: input.schema,
    });
    return reply.code(201).send({ item: endpointView(endpoint) });
  });

  app.get("/api/endpoints", async (request, reply) => {
    const parsed = listQuery.safeParse(request.query);
    if (!parsed.success) {
      return reply.code(400).send({ error: "invalid_request", issues: parsed.error.issues });
    }
    const endpoints = await registry.list(parsed.data.owner);
    return { items: endpoints.map(endpointView) };
  });

  app.get<{ Params: EndpointParams }>("/api/endpoints/:id", async (request) => {
    const endpoint = await findVisible(request.params.id);
    return { item: endpointView(endpoint) };
  });

  app.delete<{ Params: EndpointParams }>("/api/endpoints/:id", async (request, reply) => {
    await findVisible(request.params.id);
    const result = await registry.delete(request.params.id);
    hub.closeEndpoint(request.params.id);
    return reply.code(result.deferred ? 202 : 200).send(result);
  });

  app.get<{ Params: EndpointParams }>("/api/endpoints/:id/requests", async (request, reply) => {
    const parsed = recordsQuery.safeParse(request.query);
    if (!parsed.success) {
      return reply.code(400).send({ error: "invalid_request", issues: parsed.error.issues });
    }
    const endpoint = await findVisible(request.params.id);
    const records = await store.listRecords(endpoint.id);
    return { items: newestFirst(records, parsed.data.limit) };
  });

  app.get<{ Params: EndpointParams & { requestId: string } }>(
    "/api/endpoints/:id/requests/:requestId",
    async (request, reply) => {
      const endpoint = await findVisible(request.params.id);
      const record = await store.getRecord(request.params.requestId);
      if (!record || record.endpointId !== endpoint.id) {
        return reply.code(404).send({ error: "not_found", message: "Request not found" });
      }
      return { item: record };
    }
  );

  app.get<{ Params: EndpointParams }>("/api/endpoints/:id/stats", async (request) => {
    const endpoint = await findVisible(request.params.id);
    return { item: summarizeRecords(await store.listRecords(endpoint.id)) };
  });

  app.get<{ Params: EndpointParams }>("/api/endpoints/:id/stream", async (request, reply) => {
    const endpoint = await findVisible(request.params.id);

    reply.hijack();
    const response = reply.raw;
    response.writeHead(200, sseHeaders);

    // captures published from here on wait in the hub queue until the snapshot is out
    const ready = store.listRecords(endpoint.id).then((records) => {
      const snapshot = {
        item: endpointView(endpoint),
        stats: summarizeRecords(records),
        recent: newestFirst(records, config.STREAM_RECENT_LIMIT),
      };
      response.write(formatSseEvent("ready", JSON.stringify(snapshot)));
    });
    ready.catch((error: unknown) => {
      request.log.error({ err: error, endpointId: endpoint.id }, "could not open live stream");
      if (!response.writableEnded) response.end();
    });

    const handle = hub.subscribe(endpoint.id, createSseChannel(response, ready));
    const heartbeat = setInterval(() => writeSseComment(response, "keep-alive"), config.SSE_HEARTBEAT_MS);
    heartbeat.unref();

    response.on("close", () => {
      clearInterval(heartbeat);
      hub.unsubscribe(handle);
      request.log.debug({ endpointId: endpoint.id }, "live stream closed");
    });
  });

  const handleCapture: RouteHandlerMethod<
    RawServerDefault,
    RawRequestDefaultExpression,
    RawReplyDefaultExpression,
    { Params: CaptureParams }
  > = async (request, reply) => {
    const record = await pipeline.capture(request.params.id, toInboundRequest(request));
    return reply.code(200).send({ status: "captured", id: record.id });
  };

  app.register(
    async (hooks) => {
      // every OPTIONS to a webhook url is a browser preflight, never a capture
      await hooks.register(fastifyCors, {
        origin: "*",
        methods: ["GET", "HEAD", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
        strictPreflight: false,
        maxAge: 3600,
      });

      hooks.removeAllContentTypeParsers();
      hooks.addContentTypeParser("*", { parseAs: "buffer" }, (_request, body, done) => {
        done(null, body);
      });

      const routeOptions = { exposeHeadRoute: false };
      hooks.all<{ Params: CaptureParams }>("/:id", routeOptions, handleCapture);
      hooks.all<{ Params: CaptureParams }>("/:id/*", routeOptions, handleCapture);
    },
    { prefix: "/hooks" }
  );

  return app;
};

const start = async () => {
  const config = loadConfig();
  const app = buildServer({ config });

  try {
    await app.listen({ port: config.PORT, host: config.HOST });
    app.services.reaper.start();
  } catch (error) {
    app.log.error(error);
    process.exit(1);
  }

  const shutdown = (signal: NodeJS.Signals) => {
    app.log.info({ signal }, "shutting down");
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        app.log.error({ err: error }, "shutdown failed");
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
};

if (process.env.NODE_ENV !== "test") {
  void start();
}
