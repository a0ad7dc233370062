/**
 * Composite engine: several sources joined into one table
 *
 * Sources are joined on the placeholders every template has in common (the
 * shared keys, fixed at construction). The join is a full outer join: a key
 * tuple seen in any source produces rows, and a source with several entries
 * for a tuple yields one row per combination.
 *
 * Columns are `shared.<placeholder>` for every path key and
 * `<source>.<field>` for content fields.
 *
 * @example
 * ```typescript
 * const engine = new CompositeEngine({
 *   contact: { locator: new Locator({ storage, template: "/data/{c}/{k}/info.json" }), codec: new JsonCodec() },
 *   finance: { locator: new Locator({ storage, template: "/data/{c}/{k}/{year:int}_revenue.json" }), codec: new JsonCodec() },
 * });
 *
 * const rows = await engine.readAll({ c: "France" });
 * // [{ "shared.c": "France", "shared.k": "OVH", "contact.phone": "...", "shared.year": 2019, "finance.revenue": 10 }, ...]
 * ```
 */

import { sameRecord } from "./codecs/shape.js";
import { ConfigurationError, IncompleteKeyError, JoinKeyError, NotWritableError } from "./errors.js";
import { noopSink } from "./observability/events.js";
import { Source, type SourceOptions, type WritePlan } from "./source.js";
import type { Constraints, DataRecord, EventSink, KeyBinding, Scalar, WriteOptions } from "./types.js";

/**
 * Column prefix of path keys
 */
export const SHARED_PREFIX = "shared";

export type CompositeRow = { [column: string]: Scalar };

/**
 * A source given by its parts instead of a ready Source
 */
export type SourceDefinition = Omit<SourceOptions, "events">;

export interface CompositeEngineOptions {
  /** Sink handed to sources built from definitions */
  events?: EventSink;
}

interface KeyGroup {
  tuple: KeyBinding;
  entries: Map<string, DataRecord[]>;
}

/**
 * Grouping id of a key tuple; keeps NaN, the infinities and 1 versus "1" apart
 */
function tupleId(values: readonly (Scalar | undefined)[]): string {
  return JSON.stringify(values.map((value) => `${typeof value}:${String(value)}`));
}

function validateSourceName(name: string): void {
  if (name === "" || name.includes(".") || name === SHARED_PREFIX) {
    throw new ConfigurationError(
      `Invalid source name "${name}": names must be non-empty, contain no "." and not be "${SHARED_PREFIX}"`
    );
  }
}

export class CompositeEngine {
  readonly sources: ReadonlyMap<string, Source>;
  /** Placeholders common to every source, in the first source's order */
  readonly sharedKeys: readonly string[];
  /** Owner source of each placeholder that is not shared */
  #extraKeys = new Map<string, string>();

  constructor(sources: Record<string, Source | SourceDefinition>, options: CompositeEngineOptions = {}) {
    const events = options.events ?? noopSink;
    const resolved = new Map<string, Source>();
    for (const [name, entry] of Object.entries(sources)) {
      validateSourceName(name);
      resolved.set(name, entry instanceof Source ? entry : new Source({ ...entry, events }));
    }
    if (resolved.size === 0) {
      throw new ConfigurationError("A composite needs at least one source");
    }
    this.sources = resolved;

    const all = [...resolved.values()];
    const [first] = all;
    const shared = (first?.placeholderNames() ?? []).filter((key) =>
      all.every((source) => source.placeholderNames().includes(key))
    );
    if (resolved.size > 1 && shared.length === 0) {
      throw new JoinKeyError(`Sources ${[...resolved.keys()].join(", ")} have no placeholder in common`);
    }
    this.sharedKeys = Object.freeze(shared);

    for (const [name, source] of resolved) {
      for (const key of source.placeholderNames()) {
        if (shared.includes(key)) continue;
        const owner = this.#extraKeys.get(key);
        if (owner !== undefined) {
          throw new JoinKeyError(
            `Placeholder "${key}" appears in sources "${owner}" and "${name}" but is not shared by all sources`
          );
        }
        this.#extraKeys.set(key, name);
      }
    }
  }

  /**
   * Read and join every source
   *
   * Each source only sees the constraints on its own placeholders. Sources
   * are read concurrently; the join starts once all of them are done.
   */
  async readAll(constraints: Constraints = {}): Promise<CompositeRow[]> {
    const tables = await Promise.all(
      [...this.sources].map(async ([name, source]) => {
        const restricted: KeyBinding = {};
        for (const key of source.placeholderNames()) {
          const value = constraints[key];
          if (Object.hasOwn(constraints, key) && value !== undefined) {
            restricted[key] = value;
          }
        }
        return { name, source, records: await source.readRecords(restricted) };
      })
    );

    // Group by shared-key tuple, first seen first
    const groups = new Map<string, KeyGroup>();
    for (const { name, records } of tables) {
      for (const record of records) {
        const tuple: KeyBinding = {};
        for (const key of this.sharedKeys) {
          tuple[key] = record[key] ?? null;
        }
        const id = tupleId(this.sharedKeys.map((key) => tuple[key]));
        let group = groups.get(id);
        if (!group) {
          group = { tuple, entries: new Map() };
          groups.set(id, group);
        }
        const entries = group.entries.get(name) ?? [];
        entries.push(record);
        group.entries.set(name, entries);
      }
    }

    const rows: CompositeRow[] = [];
    for (const group of groups.values()) {
      const base: CompositeRow = {};
      for (const key of this.sharedKeys) {
        base[`${SHARED_PREFIX}.${key}`] = group.tuple[key] ?? null;
      }

      let combinations: CompositeRow[] = [base];
      for (const [name, source] of this.sources) {
        const entries = group.entries.get(name);
        if (!entries) continue;
        const next: CompositeRow[] = [];
        for (const partial of combinations) {
          for (const record of entries) {
            next.push({ ...partial, ...this.#prefixRecord(name, source, record) });
          }
        }
        combinations = next;
      }
      rows.push(...combinations);
    }
    return rows;
  }

  /**
   * Split rows by source and write each source's files
   *
   * A source takes part in a row when the row has at least one of its
   * columns. Every row is checked before any file is written.
   * @returns Written paths per source
   * @throws {NotWritableError} If a row targets a read-only source
   * @throws {IncompleteKeyError} If a row lacks a key a target source needs
   */
  async writeAll(rows: readonly CompositeRow[], options: WriteOptions = {}): Promise<Map<string, string[]>> {
    const perSource = new Map<string, DataRecord[]>();

    rows.forEach((row, index) => {
      for (const [name, source] of this.sources) {
        const prefix = `${name}.`;
        const record: DataRecord = {};
        let participates = false;
        for (const [column, value] of Object.entries(row)) {
          if (column.startsWith(prefix)) {
            record[column.slice(prefix.length)] = value;
            participates = true;
          }
        }
        if (!participates) continue;
        if (!source.writable) {
          throw new NotWritableError(name);
        }

        for (const key of source.placeholderNames()) {
          const sharedColumn = `${SHARED_PREFIX}.${key}`;
          const value = Object.hasOwn(row, sharedColumn) ? row[sharedColumn] : record[key];
          if (value === undefined || value === null) {
            throw new IncompleteKeyError(name, key, index);
          }
          record[key] = value;
        }

        const records = perSource.get(name) ?? [];
        // The same entry repeats across the rows of a combination
        if (!records.some((existing) => sameRecord(existing, record))) {
          records.push(record);
        }
        perSource.set(name, records);
      }
    });

    const plans: Array<[string, Source, WritePlan]> = [];
    for (const [name, records] of perSource) {
      const source = this.#source(name);
      plans.push([name, source, source.prepareWrite(records)]);
    }

    const written = new Map<string, string[]>();
    for (const [name, source, plan] of plans) {
      written.set(name, await source.applyWrite(plan, options));
    }
    return written;
  }

  /**
   * Ordered column list for a set of rows: shared keys first, then each
   * source's fields in source order
   */
  columns(rows: readonly CompositeRow[] = []): string[] {
    const shared = new Set(this.sharedKeys.map((key) => `${SHARED_PREFIX}.${key}`));
    const perSource = new Map<string, Set<string>>([...this.sources.keys()].map((name) => [name, new Set()]));

    for (const row of rows) {
      for (const column of Object.keys(row)) {
        const dot = column.indexOf(".");
        const owner = column.slice(0, dot);
        if (owner === SHARED_PREFIX) {
          shared.add(column);
        } else {
          perSource.get(owner)?.add(column);
        }
      }
    }

    const columns = [...shared];
    for (const fields of perSource.values()) {
      columns.push(...fields);
    }
    return columns;
  }

  #prefixRecord(name: string, source: Source, record: DataRecord): CompositeRow {
    const keys = source.placeholderNames();
    const row: CompositeRow = {};
    for (const [field, value] of Object.entries(record)) {
      if (keys.includes(field)) {
        if (!this.sharedKeys.includes(field)) {
          row[`${SHARED_PREFIX}.${field}`] = value;
        }
      } else {
        row[`${name}.${field}`] = value;
      }
    }
    return row;
  }

  #source(name: string): Source {
    const source = this.sources.get(name);
    if (!source) {
      throw new ConfigurationError(`Unknown source "${name}"`);
    }
    return source;
  }
}
