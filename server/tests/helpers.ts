import { parseConfig, type Config } from "../src/config.js";
import type { SubscriberChannel } from "../src/hub.js";
import type { CaptureRecord, Endpoint, InboundRequest } from "../src/types.js";

export const T0 = Date.parse("2026-03-01T12:00:00.000Z");

/** A clock the test moves by hand. */
export const manualClock = (start = T0) => {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
};

export const testConfig = (overrides: Record<string, string> = {}): Config =>
  parseConfig({ NODE_ENV: "test", LOG_LEVEL: "silent", ...overrides });

export const makeEndpoint = (overrides: Partial<Endpoint> = {}): Endpoint => ({
  id: "ep-1",
  owner: null,
  name: null,
  description: null,
  createdAt: new Date(T0).toISOString(),
  expiresAt: null,
  maxRequests: null,
  requestCount: 0,
  status: "active",
  statusChangedAt: new Date(T0).toISOString(),
  schema: null,
  recordTtlMs: null,
  ...overrides,
});

export const makeRecord = (overrides: Partial<CaptureRecord> = {}): CaptureRecord => ({
  id: "rec-1",
  endpointId: "ep-1",
  receivedAt: new Date(T0).toISOString(),
  method: "POST",
  path: "/",
  query: "",
  headers: [["content-type", "application/json"]],
  body: '{"ok":true}',
  bodyEncoding: "utf8",
  bodySize: 11,
  truncated: false,
  contentType: "application/json",
  userAgent: null,
  sourceIp: "127.0.0.1",
  geo: null,
  validation: null,
  ...overrides,
});

export const makeInbound = (overrides: Partial<InboundRequest> = {}): InboundRequest => ({
  method: "POST",
  path: "/",
  query: "",
  headers: [["Content-Type", "application/json"]],
  body: Buffer.from('{"ok":true}'),
  remoteAddress: "10.0.0.5",
  ...overrides,
});

/** Records every message; sends complete immediately. */
export class RecordingChannel implements SubscriberChannel {
  readonly sent: string[] = [];
  closed = false;

  send(message: string): void {
    this.sent.push(message);
  }

  close(): void {
    this.closed = true;
  }

  recordIds(): string[] {
    return this.sent.map((message) => {
      const event: { record: { id: string } } = JSON.parse(message);
      return event.record.id;
    });
  }
}

/** Holds every send until `open()` is called. */
export class GatedChannel extends RecordingChannel {
  private opened = false;
  private readonly waiters: Array<() => void> = [];

  override send(message: string): Promise<void> {
    super.send(message);
    if (this.opened) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  open(): void {
    this.opened = true;
    for (const resolve of this.waiters.splice(0)) {
      resolve();
    }
  }
}
