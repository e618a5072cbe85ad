export type EndpointStatus = "active" | "expired" | "deleted";

export type JsonSchema = Record<string, unknown>;

export interface Endpoint {
  id: string;
  owner: string | null;
  name: string | null;
  description: string | null;
  createdAt: string;
  expiresAt: string | null;
  maxRequests: number | null;
  requestCount: number;
  status: EndpointStatus;
  statusChangedAt: string;
  schema: JsonSchema | null;
  recordTtlMs: number | null;
}

export interface NewEndpoint {
  owner?: string | null;
  ttlMs: number | null;
  maxRequests?: number | null;
  name?: string | null;
  description?: string | null;
  schema?: JsonSchema | null;
  recordTtlMs?: number | null;
}

export type HeaderEntry = readonly [name: string, value: string];

export interface ValidationIssue {
  path: string;
  message: string;
}

export type ValidationResult =
  | { valid: true }
  | { valid: false; errors: ValidationIssue[] };

export interface GeoLocation {
  country?: string;
  region?: string;
  city?: string;
  latitude?: number;
  longitude?: number;
}

export type BodyEncoding = "utf8" | "base64";

export interface CaptureRecord {
  id: string;
  endpointId: string;
  receivedAt: string;
  method: string;
  path: string;
  query: string;
  headers: readonly HeaderEntry[];
  body: string;
  bodyEncoding: BodyEncoding;
  bodySize: number;
  truncated: boolean;
  contentType: string | null;
  userAgent: string | null;
  sourceIp: string;
  geo: GeoLocation | null;
  validation: ValidationResult | null;
}

export interface InboundRequest {
  method: string;
  /** Path below the endpoint, always starting with "/". */
  path: string;
  /** Raw query string without the leading "?". */
  query: string;
  headers: readonly HeaderEntry[];
  body: Buffer;
  remoteAddress: string;
}

export interface CaptureEvent {
  type: "capture";
  record: CaptureRecord;
}

export type Clock = () => number;
