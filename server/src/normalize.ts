import type { BodyEncoding, HeaderEntry } from "./types.js";

export const headerValue = (
  headers: readonly HeaderEntry[],
  name: string
): string | undefined => {
  const wanted = name.toLowerCase();
  return headers.find(([key]) => key.toLowerCase() === wanted)?.[1];
};

// rawHeaders keeps the sender's order, casing and repeats
export const pairRawHeaders = (rawHeaders: readonly string[]): HeaderEntry[] => {
  const result: HeaderEntry[] = [];
  for (let i = 0; i + 1 < rawHeaders.length; i += 2) {
    result.push([rawHeaders[i] ?? "", rawHeaders[i + 1] ?? ""]);
  }
  return result;
};

export const flattenHeaders = (
  headers: Record<string, string | string[] | number | undefined>
): HeaderEntry[] => {
  const result: HeaderEntry[] = [];
  for (const [key, value] of Object.entries(headers)) {
    if (Array.isArray(value)) {
      for (const item of value) {
        result.push([key, item]);
      }
    } else if (value !== undefined) {
      result.push([key, String(value)]);
    }
  }
  return result;
};

export interface NormalizedBody {
  body: string;
  bodyEncoding: BodyEncoding;
  bodySize: number;
  truncated: boolean;
}

export const normalizeBody = (raw: Buffer, maxBytes: number): NormalizedBody => {
  const truncated = raw.byteLength > maxBytes;
  const kept = truncated ? raw.subarray(0, maxBytes) : raw;
  const text = kept.toString("utf8");
  const roundTrips = Buffer.byteLength(text, "utf8") === kept.byteLength && Buffer.from(text, "utf8").equals(kept);

  return {
    body: roundTrips ? text : kept.toString("base64"),
    bodyEncoding: roundTrips ? "utf8" : "base64",
    bodySize: raw.byteLength,
    truncated,
  };
};

export const resolveSourceIp = (
  headers: readonly HeaderEntry[],
  remoteAddress: string,
  trustProxy: boolean
): string => {
  if (trustProxy) {
    const forwarded = headerValue(headers, "x-forwarded-for");
    const first = forwarded?.split(",")[0]?.trim();
    if (first) {
      return first;
    }
  }
  return remoteAddress;
};

/** Parses a body for schema validation; undefined when it is not JSON. */
export const parseJsonBody = (body: string, encoding: BodyEncoding): unknown => {
  if (encoding !== "utf8" || body.trim().length === 0) {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(body);
    return parsed;
  } catch {
    return undefined;
  }
};
