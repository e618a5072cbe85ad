import type { Endpoint } from "./types.js";

export type Admission = "open" | "closed" | "elapsed" | "exhausted";

export const ttlElapsed = (endpoint: Readonly<Endpoint>, now: number): boolean =>
  endpoint.expiresAt !== null && now >= Date.parse(endpoint.expiresAt);

export const quotaSpent = (endpoint: Readonly<Endpoint>): boolean =>
  endpoint.maxRequests !== null && endpoint.requestCount >= endpoint.maxRequests;

/**
 * Whether an endpoint may take one more capture at `now`. "closed" covers
 * expired and deleted endpoints; "elapsed" an active one whose TTL has passed.
 */
export const admission = (endpoint: Readonly<Endpoint>, now: number): Admission => {
  if (endpoint.status !== "active") return "closed";
  if (ttlElapsed(endpoint, now)) return "elapsed";
  if (quotaSpent(endpoint)) return "exhausted";
  return "open";
};

export const requestsRemaining = (endpoint: Readonly<Endpoint>): number | null =>
  endpoint.maxRequests === null ? null : Math.max(0, endpoint.maxRequests - endpoint.requestCount);

/** Seconds until the endpoint's TTL ends, or `fallbackSeconds` when it has none. */
export const quotaRetryAfter = (endpoint: Readonly<Endpoint>, now: number, fallbackSeconds: number): number =>
  endpoint.expiresAt === null
    ? fallbackSeconds
    : Math.max(1, Math.ceil((Date.parse(endpoint.expiresAt) - now) / 1000));
