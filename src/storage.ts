import { randomUUID } from "crypto";
import { z } from "zod";
import { StoreLoadError } from "./errors";
import { preserveCopy, readJsonFile, writeJsonFile } from "./jsonFile";
import { type Logger, silentLogger } from "./logger";
import { describeIssues } from "./schemas";
import { compactTimestamp } from "./timeUtils";
import type { StoreFile } from "./types";

export interface RecordStoreOptions {
  file: string;
  logger?: Logger;
  clock?: () => Date;
  idFactory?: () => string;
}

export type LoadResult =
  | { status: "missing" }
  | { status: "loaded"; count: number }
  | { status: "corrupt"; error: StoreLoadError };

interface Timestamped {
  created_at: string;
  updated_at: string;
}

/**
 * One JSON file holding `{ [id]: record }`, mirrored by an in-memory map.
 * Every mutation rewrites the whole file; there is no locking, so the last
 * writer wins when two processes share a data directory.
 */
export abstract class RecordStore<TRecord extends { id: string }, TPatch> {
  readonly file: string;
  protected readonly logger: Logger;
  protected readonly clock: () => Date;
  private readonly idFactory: () => string;
  private readonly records = new Map<string, TRecord>();
  private lastLoad: LoadResult = { status: "missing" };
  // Set by a corrupt load; the first save copies the unreadable file aside.
  private unreadableFilePending = false;

  protected abstract readonly entityName: string;
  protected abstract readonly schema: z.ZodType<TRecord, z.ZodTypeDef, unknown>;

  constructor(options: RecordStoreOptions) {
    this.file = options.file;
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? (() => new Date());
    this.idFactory = options.idFactory ?? randomUUID;
  }

  /** Copies the patch's known fields onto `record`; anything else is ignored. */
  protected abstract applyPatch(record: TRecord, patch: TPatch): TRecord;

  /** Throws when a record would break an invariant of the entity. */
  protected validate(_record: TRecord): void {}

  protected touch(record: TRecord, _now: string): TRecord {
    return record;
  }

  // #region Loading

  async load(): Promise<LoadResult> {
    this.records.clear();
    this.unreadableFilePending = false;
    const read = await readJsonFile(this.file);

    if (read.status === "missing") {
      this.lastLoad = { status: "missing" };
      this.logger.debug(`no ${this.entityName} file at ${this.file}`);
      return this.lastLoad;
    }

    if (read.status === "invalid") {
      return this.markCorrupt(new StoreLoadError(this.file, read.reason, read.cause));
    }

    const value = read.value;
    if (!value || typeof value !== "object" || Array.isArray(value)) {
      return this.markCorrupt(
        new StoreLoadError(this.file, "expected an object keyed by id")
      );
    }

    const loaded = new Map<string, TRecord>();
    for (const [key, raw] of Object.entries(value)) {
      const parsed = this.schema.safeParse(raw);
      if (!parsed.success) {
        const issues = describeIssues(parsed.error).join("; ");
        return this.markCorrupt(
          new StoreLoadError(this.file, `record ${key} is invalid (${issues})`, parsed.error)
        );
      }
      if (parsed.data.id !== key) {
        return this.markCorrupt(
          new StoreLoadError(this.file, `record ${key} carries id ${parsed.data.id}`)
        );
      }
      loaded.set(key, parsed.data);
    }

    for (const [id, record] of loaded) {
      this.records.set(id, record);
    }
    this.lastLoad = { status: "loaded", count: loaded.size };
    this.logger.debug(`loaded ${loaded.size} ${this.entityName} record(s)`);
    return this.lastLoad;
  }

  getLoadResult(): LoadResult {
    return this.lastLoad;
  }

  private markCorrupt(error: StoreLoadError): LoadResult {
    this.records.clear();
    this.lastLoad = { status: "corrupt", error };
    this.unreadableFilePending = true;
    this.logger.warn(
      `${error.message}; starting with an empty ${this.entityName} store (the next write keeps a copy as ${this.file}.corrupt-<timestamp>)`
    );
    return this.lastLoad;
  }

  // #endregion

  // #region CRUD

  get(id: string): TRecord | undefined {
    const record = this.records.get(id);
    return record ? { ...record } : undefined;
  }

  has(id: string): boolean {
    return this.records.has(id);
  }

  list(): TRecord[] {
    return Array.from(this.records.values(), (record) => ({ ...record }));
  }

  count(): number {
    return this.records.size;
  }

  async update(id: string, patch: TPatch): Promise<TRecord | undefined> {
    const existing = this.records.get(id);
    if (!existing) {
      return undefined;
    }
    const patched = this.applyPatch({ ...existing }, patch);
    this.validate(patched);
    const updated = this.touch(patched, this.now());
    this.records.set(id, updated);
    await this.save();
    return { ...updated };
  }

  async delete(id: string): Promise<boolean> {
    if (!this.records.delete(id)) {
      return false;
    }
    await this.save();
    return true;
  }

  /** Removes every matching record with a single write; returns how many went. */
  async deleteWhere(predicate: (record: TRecord) => boolean): Promise<number> {
    let removed = 0;
    for (const [id, record] of this.records) {
      if (predicate(record)) {
        this.records.delete(id);
        removed++;
      }
    }
    if (removed > 0) {
      await this.save();
    }
    return removed;
  }

  protected async insert(build: (id: string, now: string) => TRecord): Promise<TRecord> {
    const record = build(this.newId(), this.now());
    this.validate(record);
    this.records.set(record.id, record);
    await this.save();
    return { ...record };
  }

  protected async replace(record: TRecord): Promise<TRecord> {
    this.validate(record);
    this.records.set(record.id, record);
    await this.save();
    return { ...record };
  }

  // #endregion

  // #region Persistence

  toJSON(): StoreFile<TRecord> {
    const data: StoreFile<TRecord> = {};
    for (const [id, record] of this.records) {
      data[id] = record;
    }
    return data;
  }

  async save(): Promise<void> {
    if (this.unreadableFilePending) {
      const copy = await preserveCopy(this.file, compactTimestamp(this.clock()));
      this.unreadableFilePending = false;
      if (copy) {
        this.logger.warn(`kept the unreadable ${this.entityName} file as ${copy}`);
      }
    }
    await writeJsonFile(this.file, this.toJSON());
  }

  protected now(): string {
    return this.clock().toISOString();
  }

  private newId(): string {
    let id = this.idFactory();
    while (this.records.has(id)) {
      id = this.idFactory();
    }
    return id;
  }

  // #endregion
}

export abstract class TimestampedStore<
  TRecord extends { id: string } & Timestamped,
  TPatch,
> extends RecordStore<TRecord, TPatch> {
  protected touch(record: TRecord, now: string): TRecord {
    return { ...record, updated_at: now };
  }
}
