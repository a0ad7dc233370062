/**
 * Source: one templated file set read and written as a table of records
 *
 * Records returned by a source carry their path binding as fields; writing a
 * record routes it back to the file its binding names.
 *
 * @example
 * ```typescript
 * const contacts = new Source({
 *   locator: new Locator({ storage, template: "/data/{country}/{company}/info.json" }),
 *   codec: new JsonCodec(),
 * });
 *
 * const rows = await contacts.readRecords({ country: "France" });
 * await contacts.writeRecords([{ country: "France", company: "ACME", phone: "555-0100" }]);
 * ```
 */

import { ContentCache } from "./cache.js";
import { fromRecordList } from "./codecs/shape.js";
import { NotFoundError, NotWritableError, SingletonExpectedError } from "./errors.js";
import { LockManager, type LockManagerOptions } from "./lock.js";
import { Locator, scalarEquals } from "./locator.js";
import { noopSink } from "./observability/events.js";
import type {
  CacheMemo,
  CacheStats,
  Codec,
  Constraints,
  DataRecord,
  EventSink,
  KeyBinding,
  Stamp,
  WriteOptions,
} from "./types.js";

export interface SourceOptions {
  locator: Locator;
  codec: Codec;
  /** Memo for decoded content (default: none) */
  memo?: CacheMemo;
  /** Further restricts writes on top of the locator's own flag */
  writable?: boolean;
  /** Field that receives each file's modification time on read */
  timestampField?: string;
  events?: EventSink;
}

/**
 * Content records per target path
 */
export type WritePlan = Map<string, DataRecord[]>;

export class Source {
  readonly locator: Locator;
  readonly codec: Codec;
  readonly cache: ContentCache;
  readonly writable: boolean;
  readonly timestampField?: string;
  #events: EventSink;

  constructor(options: SourceOptions) {
    this.locator = options.locator;
    this.codec = options.codec;
    this.writable = this.locator.writable && (options.writable ?? true);
    this.timestampField = options.timestampField;
    this.#events = options.events ?? noopSink;
    this.cache = new ContentCache(this.locator.storage, this.codec, {
      memo: options.memo,
      events: this.#events,
    });
  }

  placeholderNames(): readonly string[] {
    return this.locator.placeholderNames();
  }

  /**
   * Every record of every file matching the constraints
   *
   * Constraints on placeholders select files; other constraints drop content
   * rows that carry the field with a different value. Files that vanish
   * between listing and reading are skipped.
   * @throws {TypeMismatchError} If a constrained placeholder value has the wrong type
   */
  async readRecords(constraints: Constraints = {}): Promise<DataRecord[]> {
    const contentConstraints = Object.entries(constraints).filter(
      ([key]) => !this.locator.template.has(key) && key !== this.timestampField
    );

    const result: DataRecord[] = [];
    for await (const { path, binding } of this.locator.findPathsAndBindings(constraints)) {
      let read: { records: DataRecord[]; stamp: Stamp };
      try {
        read = await this.cache.readWithStamp(path);
      } catch (err) {
        if (err instanceof NotFoundError) {
          this.#events.emit({ type: "read.skip", path, reason: "vanished after listing" });
          continue;
        }
        throw err;
      }

      for (const content of read.records) {
        const accepted = contentConstraints.every(
          ([key, value]) => !Object.hasOwn(content, key) || scalarEquals(content[key], value)
        );
        if (accepted) {
          result.push(this.#toRecord(content, binding, read.stamp));
        }
      }
    }

    await this.cache.flush();
    return result;
  }

  /**
   * The single record stored under a full binding
   * @throws {NotFoundError} If no file exists for the binding
   * @throws {SingletonExpectedError} If the file holds zero or several records
   */
  async readRecord(binding: Constraints): Promise<DataRecord> {
    const path = this.locator.buildPath(binding);
    const { records, stamp } = await this.cache.readWithStamp(path);
    await this.cache.flush();

    const [first] = records;
    if (!first || records.length > 1) {
      throw new SingletonExpectedError(path, records.length);
    }
    const parsed = this.locator.parsePath(path) ?? {};
    return this.#toRecord(first, parsed, stamp);
  }

  /**
   * Write records back to the files their bindings name
   *
   * Records sharing a binding land in the same file. Key and timestamp fields
   * are not stored in the content. Every record is checked before anything is
   * written.
   * @returns The paths written (or, on a dry run, that would be written)
   * @throws {NotWritableError} If the source is read-only
   * @throws {MissingKeyError} If a record lacks a placeholder field
   */
  async writeRecords(records: readonly DataRecord[], options: WriteOptions = {}): Promise<string[]> {
    return this.applyWrite(this.prepareWrite(records), options);
  }

  /**
   * Group records by target path and check them without writing anything
   * @throws {NotWritableError} If the source is read-only
   * @throws {MissingKeyError} If a record lacks a placeholder field
   * @throws {SingletonExpectedError} If differing records target one singleton file
   */
  prepareWrite(records: readonly DataRecord[]): WritePlan {
    if (!this.writable) {
      throw new NotWritableError(this.locator.template.source);
    }

    const plan: WritePlan = new Map();
    for (const record of records) {
      const path = this.locator.buildPath(record);
      const contents = plan.get(path) ?? [];
      contents.push(this.#stripKeys(record));
      plan.set(path, contents);
    }

    for (const [path, contents] of plan) {
      fromRecordList(contents, this.codec.mode, path);
    }
    return plan;
  }

  /**
   * Write a plan made by prepareWrite()
   * @returns The paths written (or, on a dry run, that would be written)
   */
  async applyWrite(plan: WritePlan, options: WriteOptions = {}): Promise<string[]> {
    for (const [path, contents] of plan) {
      await this.cache.writeRecords(path, contents, options);
    }
    return [...plan.keys()];
  }

  async writeRecord(record: DataRecord, options?: WriteOptions): Promise<string[]> {
    return this.writeRecords([record], options);
  }

  /**
   * Delete every file matching the constraints
   * @throws {NotWritableError} If the source is read-only
   */
  async delete(constraints: Constraints = {}, options: WriteOptions = {}): Promise<string[]> {
    if (!this.writable) {
      throw new NotWritableError(this.locator.template.source);
    }
    const paths = await this.locator.delete(constraints, options);
    if (!options.dryRun) {
      for (const path of paths) {
        await this.cache.invalidate(path);
      }
    }
    return paths;
  }

  /**
   * Drop memoized content for every file matching the constraints
   * @returns The invalidated paths
   */
  async invalidateCache(constraints: Constraints = {}): Promise<string[]> {
    const paths = await this.listPaths(constraints);
    for (const path of paths) {
      await this.cache.invalidate(path);
    }
    await this.cache.flush();
    return paths;
  }

  async listPaths(constraints: Constraints = {}): Promise<string[]> {
    const paths: string[] = [];
    for await (const path of this.locator.findPaths(constraints)) {
      paths.push(path);
    }
    return paths;
  }

  /**
   * Lock manager whose sentinels live in the template's root folder
   */
  lockManager(options: Omit<LockManagerOptions, "directory"> = {}): LockManager {
    return new LockManager(this.locator.storage, {
      events: this.#events,
      ...options,
      directory: this.locator.template.rootFolder(),
    });
  }

  stats(): CacheStats {
    return this.cache.stats();
  }

  #toRecord(content: DataRecord, binding: KeyBinding, stamp: Stamp): DataRecord {
    const record: DataRecord = { ...content, ...binding };
    if (this.timestampField) {
      record[this.timestampField] = stamp.mtimeMs;
    }
    return record;
  }

  #stripKeys(record: DataRecord): DataRecord {
    const content: DataRecord = {};
    for (const [field, value] of Object.entries(record)) {
      if (this.locator.template.has(field) || field === this.timestampField) continue;
      content[field] = value;
    }
    return content;
  }
}
