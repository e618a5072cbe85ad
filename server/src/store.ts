import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { StorageError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { CaptureRecord, Endpoint } from "./types.js";

/**
 * Returns the replacement endpoint, or undefined to leave it untouched.
 * Throwing aborts the update without writing anything.
 */
export type EndpointUpdate = (current: Readonly<Endpoint>) => Endpoint | undefined;

/**
 * The persistence primitives the capture core depends on. Implementations must
 * apply `updateEndpoint` and guarded `deleteEndpoint` atomically with respect to
 * every other call on the same endpoint.
 */
export interface Storage {
  /** Resolves false when the id is already taken. */
  insertEndpoint(endpoint: Endpoint): Promise<boolean>;
  getEndpoint(id: string): Promise<Endpoint | undefined>;
  listEndpoints(): Promise<Endpoint[]>;
  /** Resolves the endpoint as stored after the update, or undefined when it does not exist. */
  updateEndpoint(id: string, update: EndpointUpdate): Promise<Endpoint | undefined>;
  deleteEndpoint(id: string, guard?: (current: Readonly<Endpoint>) => boolean): Promise<boolean>;

  saveRecord(record: CaptureRecord): Promise<void>;
  getRecord(id: string): Promise<CaptureRecord | undefined>;
  /** Oldest first. Without an endpoint id, every stored record. */
  listRecords(endpointId?: string): Promise<CaptureRecord[]>;
  countRecords(endpointId: string): Promise<number>;
  deleteRecord(id: string): Promise<boolean>;
}

interface PersistedStore {
  version: 1;
  endpoints: Endpoint[];
  records: CaptureRecord[];
}

export class InMemoryStore implements Storage {
  protected readonly endpoints = new Map<string, Endpoint>();
  protected readonly records = new Map<string, CaptureRecord>();
  protected readonly recordIdsByEndpoint = new Map<string, Set<string>>();

  async insertEndpoint(endpoint: Endpoint): Promise<boolean> {
    if (this.endpoints.has(endpoint.id)) {
      return false;
    }
    this.endpoints.set(endpoint.id, { ...endpoint });
    this.commit(() => {
      this.endpoints.delete(endpoint.id);
    });
    return true;
  }

  async getEndpoint(id: string): Promise<Endpoint | undefined> {
    const endpoint = this.endpoints.get(id);
    return endpoint ? { ...endpoint } : undefined;
  }

  async listEndpoints(): Promise<Endpoint[]> {
    return [...this.endpoints.values()].map((endpoint) => ({ ...endpoint }));
  }

  async updateEndpoint(id: string, update: EndpointUpdate): Promise<Endpoint | undefined> {
    const current = this.endpoints.get(id);
    if (!current) {
      return undefined;
    }
    const next = update({ ...current });
    if (!next) {
      return { ...current };
    }
    const stored = { ...next, id };
    this.endpoints.set(id, stored);
    this.commit(() => {
      this.endpoints.set(id, current);
    });
    return { ...stored };
  }

  async deleteEndpoint(
    id: string,
    guard?: (current: Readonly<Endpoint>) => boolean
  ): Promise<boolean> {
    const current = this.endpoints.get(id);
    if (!current || (guard && !guard(current))) {
      return false;
    }
    this.endpoints.delete(id);
    this.commit(() => {
      this.endpoints.set(id, current);
    });
    return true;
  }

  async saveRecord(record: CaptureRecord): Promise<void> {
    this.records.set(record.id, record);
    this.indexRecord(record);
    this.commit(() => {
      this.forgetRecord(record);
    });
  }

  async getRecord(id: string): Promise<CaptureRecord | undefined> {
    return this.records.get(id);
  }

  async listRecords(endpointId?: string): Promise<CaptureRecord[]> {
    if (endpointId === undefined) {
      return [...this.records.values()];
    }
    const ids = this.recordIdsByEndpoint.get(endpointId);
    if (!ids) {
      return [];
    }
    const result: CaptureRecord[] = [];
    for (const id of ids) {
      const record = this.records.get(id);
      if (record) {
        result.push(record);
      }
    }
    return result;
  }

  async countRecords(endpointId: string): Promise<number> {
    return this.recordIdsByEndpoint.get(endpointId)?.size ?? 0;
  }

  async deleteRecord(id: string): Promise<boolean> {
    const record = this.records.get(id);
    if (!record) {
      return false;
    }
    this.forgetRecord(record);
    this.commit(() => {
      this.records.set(record.id, record);
      this.indexRecord(record);
    });
    return true;
  }

  /**
   * Called after every in-memory mutation. Subclasses that write elsewhere
   * call `undo` and throw when that write fails.
   */
  protected commit(_undo: () => void): void {}

  protected hydrate(snapshot: PersistedStore): void {
    for (const endpoint of snapshot.endpoints) {
      this.endpoints.set(endpoint.id, endpoint);
    }
    const ordered = [...snapshot.records].sort((a, b) => a.receivedAt.localeCompare(b.receivedAt));
    for (const record of ordered) {
      const frozen = Object.freeze({ ...record, headers: Object.freeze([...record.headers]) });
      this.records.set(frozen.id, frozen);
      this.indexRecord(frozen);
    }
  }

  protected snapshot(): PersistedStore {
    return {
      version: 1,
      endpoints: [...this.endpoints.values()],
      records: [...this.records.values()],
    };
  }

  private indexRecord(record: CaptureRecord): void {
    const ids = this.recordIdsByEndpoint.get(record.endpointId) ?? new Set<string>();
    ids.add(record.id);
    this.recordIdsByEndpoint.set(record.endpointId, ids);
  }

  private forgetRecord(record: CaptureRecord): void {
    this.records.delete(record.id);
    const ids = this.recordIdsByEndpoint.get(record.endpointId);
    if (!ids) return;
    ids.delete(record.id);
    if (ids.size === 0) {
      this.recordIdsByEndpoint.delete(record.endpointId);
    }
  }
}

const isPersistedStore = (value: unknown): value is PersistedStore => {
  if (value === null || typeof value !== "object") return false;
  return (
    "version" in value &&
    value.version === 1 &&
    "endpoints" in value &&
    Array.isArray(value.endpoints) &&
    "records" in value &&
    Array.isArray(value.records)
  );
};

/**
 * Keeps everything in memory and rewrites a JSON snapshot after each change.
 * Writes go to a temporary file first and are renamed into place.
 */
export class FileStore extends InMemoryStore {
  private readonly filePath: string;
  private readonly logger: Logger | undefined;

  constructor(filePath: string, logger?: Logger) {
    super();
    this.filePath = filePath;
    this.logger = logger;
    this.load();
  }

  protected override commit(undo: () => void): void {
    try {
      this.persist();
    } catch (error) {
      undo();
      throw new StorageError(`Failed to write ${this.filePath}`, error);
    }
  }

  private load(): void {
    if (!existsSync(this.filePath)) return;

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(this.filePath, "utf8"));
    } catch (error) {
      this.logger?.warn({ err: error, file: this.filePath }, "store file unreadable, starting empty");
      return;
    }
    if (!isPersistedStore(parsed)) {
      this.logger?.warn({ file: this.filePath }, "store file has an unknown layout, starting empty");
      return;
    }
    this.hydrate(parsed);
  }

  private persist(): void {
    mkdirSync(dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.tmp`;
    writeFileSync(tmpPath, JSON.stringify(this.snapshot()), "utf8");
    renameSync(tmpPath, this.filePath);
  }
}
