import type { CaptureRecord } from "./types.js";

export interface EndpointStats {
  totalRequests: number;
  totalBytes: number;
  averageRequestSize: number;
  lastRequestAt: string | null;
  methods: Record<string, number>;
  contentTypes: Record<string, number>;
}

const tally = (counts: Record<string, number>, key: string) => {
  counts[key] = (counts[key] ?? 0) + 1;
};

/** Figures over the records still stored; sizes are the received body sizes, before truncation. */
export const summarizeRecords = (records: readonly CaptureRecord[]): EndpointStats => {
  const methods: Record<string, number> = {};
  const contentTypes: Record<string, number> = {};
  let totalBytes = 0;
  let lastRequestAt: string | null = null;

  for (const record of records) {
    totalBytes += record.bodySize;
    tally(methods, record.method);
    if (record.contentType) {
      tally(contentTypes, record.contentType);
    }
    if (lastRequestAt === null || record.receivedAt > lastRequestAt) {
      lastRequestAt = record.receivedAt;
    }
  }

  return {
    totalRequests: records.length,
    totalBytes,
    averageRequestSize: records.length === 0 ? 0 : Math.round(totalBytes / records.length),
    lastRequestAt,
    methods,
    contentTypes,
  };
};
