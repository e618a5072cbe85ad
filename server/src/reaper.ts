import { quotaSpent, ttlElapsed } from "./admission.js";
import type { FanoutHub } from "./hub.js";
import type { Logger } from "./logger.js";
import type { Storage } from "./store.js";
import type { CaptureRecord, Clock, Endpoint } from "./types.js";

export interface ReaperOptions {
  store: Storage;
  logger: Logger;
  intervalMs: number;
  /** How long expired endpoints stay readable before they are purged. */
  retentionGraceMs: number;
  recordTtlMs?: number;
  hub?: FanoutHub;
  clock?: Clock;
}

export interface SweepReport {
  expired: number;
  endpointsDeleted: number;
  recordsDeleted: number;
  failures: number;
}

const emptyReport = (): SweepReport => ({
  expired: 0,
  endpointsDeleted: 0,
  recordsDeleted: 0,
  failures: 0,
});

export class ExpiryReaper {
  private readonly options: ReaperOptions;
  private readonly clock: Clock;
  private timer: NodeJS.Timeout | undefined;
  private running: Promise<void> | undefined;

  constructor(options: ReaperOptions) {
    this.options = options;
    this.clock = options.clock ?? Date.now;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.options.intervalMs);
    this.timer.unref();
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    await this.running;
  }

  async sweep(): Promise<SweepReport> {
    const { store, logger } = this.options;
    const now = this.clock();
    const report = emptyReport();

    const endpoints = await store.listEndpoints();
    const known = new Set<string>();

    for (const endpoint of endpoints) {
      known.add(endpoint.id);
      try {
        await this.sweepEndpoint(endpoint, now, report);
      } catch (error) {
        report.failures += 1;
        logger.warn({ err: error, endpointId: endpoint.id }, "reaper could not process endpoint");
      }
    }

    try {
      await this.sweepOrphans(known, report);
    } catch (error) {
      report.failures += 1;
      logger.warn({ err: error }, "reaper could not remove orphaned records");
    }

    if (report.expired || report.endpointsDeleted || report.recordsDeleted || report.failures) {
      logger.info(report, "reaper pass finished");
    }
    return report;
  }

  /** Runs a pass unless one is still in flight. */
  private tick(): Promise<void> {
    if (!this.running) {
      this.running = this.sweep()
        .then(
          () => undefined,
          (error: unknown) => {
            this.options.logger.error({ err: error }, "reaper pass failed");
          }
        )
        .finally(() => {
          this.running = undefined;
        });
    }
    return this.running;
  }

  private async sweepEndpoint(endpoint: Endpoint, now: number, report: SweepReport): Promise<void> {
    const { store, retentionGraceMs } = this.options;
    let current = endpoint;

    if (current.status === "active" && (ttlElapsed(current, now) || quotaSpent(current))) {
      let transitioned = false;
      const updated = await store.updateEndpoint(current.id, (latest) => {
        if (latest.status !== "active" || !(ttlElapsed(latest, now) || quotaSpent(latest))) {
          return undefined;
        }
        transitioned = true;
        return { ...latest, status: "expired", statusChangedAt: new Date(now).toISOString() };
      });
      if (!updated) return;
      if (transitioned) report.expired += 1;
      current = updated;
    }

    const purge =
      current.status === "deleted" ||
      (current.status === "expired" && Date.parse(current.statusChangedAt) + retentionGraceMs <= now);

    if (purge) {
      const records = await store.listRecords(current.id);
      await this.deleteRecords(records, report);
      const removed = await store.deleteEndpoint(current.id, (latest) => latest.status !== "active");
      if (removed) {
        report.endpointsDeleted += 1;
        this.options.hub?.closeEndpoint(current.id);
      }
      return;
    }

    const recordTtlMs = current.recordTtlMs ?? this.options.recordTtlMs;
    if (recordTtlMs !== undefined) {
      const records = await store.listRecords(current.id);
      const stale = records.filter((record) => Date.parse(record.receivedAt) + recordTtlMs <= now);
      await this.deleteRecords(stale, report);
    }
  }

  /** Records left behind by a capture that raced a purge. */
  private async sweepOrphans(known: Set<string>, report: SweepReport): Promise<void> {
    const { store } = this.options;
    const records = await store.listRecords();
    const candidates = new Map<string, CaptureRecord[]>();
    for (const record of records) {
      if (known.has(record.endpointId)) continue;
      const group = candidates.get(record.endpointId) ?? [];
      group.push(record);
      candidates.set(record.endpointId, group);
    }
    for (const [endpointId, group] of candidates) {
      // created after the endpoint listing was taken
      if (await store.getEndpoint(endpointId)) continue;
      await this.deleteRecords(group, report);
    }
  }

  private async deleteRecords(records: CaptureRecord[], report: SweepReport): Promise<void> {
    for (const record of records) {
      if (await this.options.store.deleteRecord(record.id)) {
        report.recordsDeleted += 1;
      }
    }
  }
}
