/**
 * Content cache: decoded records memoized by (path, stamp)
 *
 * Staleness is detected lazily: every read stats the path and only reuses a
 * memo entry whose stamp equals the live one.
 */

import { toRecordList, fromRecordList } from "./codecs/shape.js";
import { SingletonExpectedError } from "./errors.js";
import { noopSink } from "./observability/events.js";
import type {
  CacheMemo,
  CacheStats,
  Codec,
  DataRecord,
  EventSink,
  Stamp,
  StorageProvider,
  WriteOptions,
} from "./types.js";

/**
 * Two stamps denote the same file state
 */
export function sameStamp(a: Stamp, b: Stamp): boolean {
  return (
    Number.isFinite(a.mtimeMs) &&
    Number.isFinite(a.size) &&
    a.mtimeMs === b.mtimeMs &&
    a.size === b.size
  );
}

export function cloneRecords(records: readonly DataRecord[]): DataRecord[] {
  return records.map((record) => ({ ...record }));
}

/**
 * Memo that keeps nothing: every read decodes (the default)
 */
export class NoopMemo implements CacheMemo {
  async get(): Promise<DataRecord[] | null> {
    return null;
  }

  async set(): Promise<void> {}

  async delete(): Promise<void> {}

  async flush(): Promise<void> {}
}

/**
 * Configuration options for the in-process memo
 */
export interface MemoryMemoOptions {
  /** Maximum number of paths to keep (default: 10000) */
  maxSize?: number;
}

interface MemoEntry {
  stamp: Stamp;
  records: DataRecord[];
}

/**
 * In-process LRU memo
 *
 * Uses native Map with insertion-order for O(1) LRU operations.
 */
export class MemoryMemo implements CacheMemo {
  #entries = new Map<string, MemoEntry>();
  #maxSize: number;
  #evicted = 0;

  constructor(options: MemoryMemoOptions = {}) {
    this.#maxSize = options.maxSize ?? 10000;

    // Respect PATHTABLE_CACHE_SIZE environment variable
    const envCacheSize = process.env.PATHTABLE_CACHE_SIZE;
    if (envCacheSize !== undefined) {
      const size = Number.parseInt(envCacheSize, 10);
      if (!Number.isNaN(size)) {
        this.#maxSize = size;
      }
    }
  }

  async get(path: string, stamp: Stamp): Promise<DataRecord[] | null> {
    const entry = this.#entries.get(path);
    if (!entry) {
      return null;
    }

    if (!sameStamp(entry.stamp, stamp)) {
      this.#entries.delete(path);
      return null;
    }

    // LRU: Move to end (most recently used)
    this.#entries.delete(path);
    this.#entries.set(path, entry);
    return cloneRecords(entry.records);
  }

  async set(path: string, stamp: Stamp, records: DataRecord[]): Promise<void> {
    // Guard against invalid metadata
    if (!Number.isFinite(stamp.mtimeMs) || !Number.isFinite(stamp.size)) {
      return;
    }

    this.#entries.delete(path);
    this.#entries.set(path, { stamp: { ...stamp }, records: cloneRecords(records) });

    while (this.#entries.size > this.#maxSize) {
      const oldest = this.#entries.keys().next();
      if (oldest.done) break;
      this.#entries.delete(oldest.value);
      this.#evicted++;
    }
  }

  async delete(path: string): Promise<void> {
    this.#entries.delete(path);
  }

  async flush(): Promise<void> {}

  clear(): void {
    this.#entries.clear();
  }

  get size(): number {
    return this.#entries.size;
  }

  get evicted(): number {
    return this.#evicted;
  }
}

export interface ContentCacheOptions {
  /** Memo backing the cache (default: NoopMemo, i.e. no caching) */
  memo?: CacheMemo;
  events?: EventSink;
}

/**
 * Reads and writes records of individual files through a codec, reusing
 * decoded content while a file's stamp is unchanged
 *
 * The memo is per process and not lock-protected: concurrent writers must
 * wrap read-modify-write sequences in a LockManager.
 */
export class ContentCache {
  readonly storage: StorageProvider;
  readonly codec: Codec;
  readonly memo: CacheMemo;
  #events: EventSink;
  #hits = 0;
  #misses = 0;

  constructor(storage: StorageProvider, codec: Codec, options: ContentCacheOptions = {}) {
    this.storage = storage;
    this.codec = codec;
    this.memo = options.memo ?? new NoopMemo();
    this.#events = options.events ?? noopSink;
  }

  /**
   * Read every record of a file
   * @throws {NotFoundError} If the path does not exist
   */
  async readRecords(path: string): Promise<DataRecord[]> {
    const { records } = await this.readWithStamp(path);
    return records;
  }

  /**
   * Read a file's records along with the stamp they were read at
   */
  async readWithStamp(path: string): Promise<{ records: DataRecord[]; stamp: Stamp }> {
    this.#events.emit({ type: "read.start", path });

    const stamp = await this.storage.stat(path);
    const cached = await this.memo.get(path, stamp);
    if (cached) {
      this.#hits++;
      this.#events.emit({ type: "cache.hit", path });
      this.#events.emit({ type: "read.end", path, records: cached.length, cached: true });
      return { records: cached, stamp };
    }

    this.#misses++;
    this.#events.emit({ type: "cache.miss", path });

    const bytes = await this.storage.read(path);
    const records = toRecordList(this.codec.decode(bytes, path));
    await this.memo.set(path, stamp, records);

    this.#events.emit({ type: "read.end", path, records: records.length, cached: false });
    return { records, stamp };
  }

  /**
   * Read the single record of a file
   * @throws {SingletonExpectedError} If the file holds zero or several records
   */
  async readRecord(path: string): Promise<DataRecord> {
    const records = await this.readRecords(path);
    const [first] = records;
    if (!first || records.length > 1) {
      throw new SingletonExpectedError(path, records.length);
    }
    return first;
  }

  /**
   * Replace a file's content with the given records
   */
  async writeRecords(path: string, records: readonly DataRecord[], options: WriteOptions = {}): Promise<void> {
    const dryRun = options.dryRun ?? false;
    const bytes = this.codec.encode(fromRecordList(records, this.codec.mode, path), path);

    this.#events.emit({ type: "write.start", path, records: records.length, dryRun });
    if (!dryRun) {
      await this.storage.write(path, bytes);
      await this.memo.delete(path);
    }
    this.#events.emit({ type: "write.end", path, records: records.length, dryRun });
  }

  async writeRecord(path: string, record: DataRecord, options?: WriteOptions): Promise<void> {
    await this.writeRecords(path, [record], options);
  }

  async invalidate(path: string): Promise<void> {
    await this.memo.delete(path);
  }

  /**
   * Persist the memo, if it is storage-backed
   */
  async flush(): Promise<void> {
    await this.memo.flush();
  }

  stats(): CacheStats {
    const total = this.#hits + this.#misses;
    return {
      hits: this.#hits,
      misses: this.#misses,
      hitRate: total > 0 ? this.#hits / total : 0,
    };
  }
}
