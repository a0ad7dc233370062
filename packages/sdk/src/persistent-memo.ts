/**
 * File-backed memo that survives process restarts
 *
 * The location may itself be a template keyed by some of the data template's
 * placeholders, so cache shards sit alongside the data they mirror:
 *
 * ```typescript
 * const memo = new PersistentMemo({
 *   storage,
 *   location: "/cache/{country}.cache.json",
 *   dataTemplate: compileTemplate("/data/{country}/{company}/info.json"),
 * });
 * ```
 *
 * Shard layout: `{ "version": 1, "entries": [{ "path", "stamp", "records" }] }`.
 * Shards load lazily on first use of a path they cover; changes are written on flush().
 */

import { z } from "zod";
import { cloneRecords, sameStamp } from "./cache.js";
import { DataRecordSchema } from "./codecs/shape.js";
import { NotFoundError, TemplateError } from "./errors.js";
import { safeParseJson, stableStringify } from "./format.js";
import { noopSink } from "./observability/events.js";
import { compileTemplate, type CompiledTemplate } from "./template.js";
import type { CacheMemo, DataRecord, EventSink, Stamp, StorageProvider } from "./types.js";

const SHARD_VERSION = 1;

const ShardSchema = z.object({
  version: z.literal(SHARD_VERSION),
  entries: z.array(
    z.object({
      path: z.string(),
      stamp: z.object({ mtimeMs: z.number(), size: z.number() }),
      records: z.array(DataRecordSchema),
    })
  ),
});

interface Shard {
  entries: Map<string, { stamp: Stamp; records: DataRecord[] }>;
  dirty: boolean;
}

export interface PersistentMemoOptions {
  storage: StorageProvider;
  /** Shard location, a plain path or a template */
  location: string | CompiledTemplate;
  /** Template of the cached data; required when the location has placeholders */
  dataTemplate?: CompiledTemplate;
  events?: EventSink;
}

export class PersistentMemo implements CacheMemo {
  readonly location: CompiledTemplate;
  #storage: StorageProvider;
  #dataTemplate?: CompiledTemplate;
  #events: EventSink;
  #shards = new Map<string, Promise<Shard>>();

  constructor(options: PersistentMemoOptions) {
    this.location = typeof options.location === "string" ? compileTemplate(options.location) : options.location;
    this.#storage = options.storage;
    this.#dataTemplate = options.dataTemplate;
    this.#events = options.events ?? noopSink;

    const keys = this.location.placeholderNames();
    if (keys.length > 0) {
      const dataTemplate = this.#dataTemplate;
      if (!dataTemplate) {
        throw new TemplateError(this.location.source, "a templated cache location needs the data template");
      }
      const foreign = keys.filter((key) => !dataTemplate.has(key));
      if (foreign.length > 0) {
        throw new TemplateError(
          this.location.source,
          `placeholder(s) ${foreign.join(", ")} do not appear in data template "${dataTemplate.source}"`
        );
      }
    }
  }

  /**
   * Storage path of the shard that holds a data path's entry
   */
  shardPathFor(path: string): string {
    if (this.location.placeholderNames().length === 0) {
      return this.location.source;
    }
    const binding = this.#dataTemplate?.match(path);
    if (!binding) {
      throw new TemplateError(this.location.source, `cannot derive a cache shard for "${path}"`);
    }
    return this.location.build(binding);
  }

  async get(path: string, stamp: Stamp): Promise<DataRecord[] | null> {
    const shard = await this.#shard(path);
    const entry = shard.entries.get(path);
    if (!entry || !sameStamp(entry.stamp, stamp)) {
      return null;
    }
    return cloneRecords(entry.records);
  }

  async set(path: string, stamp: Stamp, records: DataRecord[]): Promise<void> {
    const shard = await this.#shard(path);
    shard.entries.set(path, { stamp: { ...stamp }, records: cloneRecords(records) });
    shard.dirty = true;
  }

  async delete(path: string): Promise<void> {
    const shard = await this.#shard(path);
    if (shard.entries.delete(path)) {
      shard.dirty = true;
    }
  }

  async flush(): Promise<void> {
    for (const [shardPath, pending] of this.#shards) {
      const shard = await pending;
      if (!shard.dirty) {
        continue;
      }
      const payload = {
        version: SHARD_VERSION,
        entries: [...shard.entries].map(([path, entry]) => ({ path, stamp: entry.stamp, records: entry.records })),
      };
      await this.#storage.write(shardPath, Buffer.from(stableStringify(payload, 2, "preserve"), "utf-8"));
      shard.dirty = false;
    }
  }

  #shard(path: string): Promise<Shard> {
    const shardPath = this.shardPathFor(path);
    let pending = this.#shards.get(shardPath);
    if (!pending) {
      pending = this.#load(shardPath);
      this.#shards.set(shardPath, pending);
    }
    return pending;
  }

  async #load(shardPath: string): Promise<Shard> {
    const shard: Shard = { entries: new Map(), dirty: false };

    let bytes: Uint8Array;
    try {
      bytes = await this.#storage.read(shardPath);
    } catch (err) {
      if (err instanceof NotFoundError) {
        return shard;
      }
      this.#shards.delete(shardPath);
      throw err;
    }

    const json = safeParseJson(Buffer.from(bytes).toString("utf-8"));
    const parsed = json.success ? ShardSchema.safeParse(json.data) : null;
    if (!parsed?.success) {
      // A corrupt shard is rebuilt from scratch on the next flush
      this.#events.emit({
        type: "cache.corrupt",
        path: shardPath,
        reason: json.success ? "unexpected shard layout" : json.error,
      });
      shard.dirty = true;
      return shard;
    }

    for (const entry of parsed.data.entries) {
      shard.entries.set(entry.path, { stamp: entry.stamp, records: entry.records });
    }
    return shard;
  }
}
