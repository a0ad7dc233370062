/**
 * Locator: finds the files of one templated file set
 *
 * Pairs a compiled template with a storage provider. Listing is scoped to the
 * deepest directory the constraints pin down, then filtered by template match.
 */

import { NotWritableError } from "./errors.js";
import { LOCK_PREFIX } from "./lock.js";
import { noopSink } from "./observability/events.js";
import { compileTemplate, directoryOf, type CompiledTemplate } from "./template.js";
import type { Constraints, EventSink, KeyBinding, Scalar, StorageProvider, WriteOptions } from "./types.js";

export interface LocatorOptions {
  storage: StorageProvider;
  template: string | CompiledTemplate;
  /** Whether delete (and writes through a Source) are allowed (default: true) */
  writable?: boolean;
  events?: EventSink;
}

export interface LocatedPath {
  path: string;
  binding: KeyBinding;
}

/**
 * Equality of two scalars as used for constraint checks (NaN equals NaN)
 */
export function scalarEquals(a: Scalar | undefined, b: Scalar | undefined): boolean {
  if (typeof a === "number" && typeof b === "number" && Number.isNaN(a) && Number.isNaN(b)) {
    return true;
  }
  return a === b;
}

function isLockSentinel(path: string): boolean {
  return path.slice(path.lastIndexOf("/") + 1).startsWith(LOCK_PREFIX);
}

export class Locator {
  readonly storage: StorageProvider;
  readonly template: CompiledTemplate;
  readonly writable: boolean;
  #events: EventSink;

  constructor(options: LocatorOptions) {
    this.storage = options.storage;
    this.template = typeof options.template === "string" ? compileTemplate(options.template) : options.template;
    this.writable = options.writable ?? true;
    this.#events = options.events ?? noopSink;
  }

  placeholderNames(): readonly string[] {
    return this.template.placeholderNames();
  }

  /**
   * Concrete path for a full binding; does not touch storage
   * @throws {MissingKeyError} If a placeholder is unbound
   * @throws {TypeMismatchError} If a value does not fit its placeholder
   */
  buildPath(binding: Constraints): string {
    return this.template.build(binding);
  }

  parsePath(path: string): KeyBinding | null {
    return this.template.match(path);
  }

  /**
   * Restrict constraints to this locator's placeholders, type-checking each value
   */
  placeholderConstraints(constraints: Constraints): KeyBinding {
    const restricted: KeyBinding = {};
    for (const name of this.template.placeholderNames()) {
      if (!Object.hasOwn(constraints, name)) continue;
      const value = constraints[name];
      if (value === undefined) continue;
      this.template.checkValue(name, value);
      restricted[name] = value;
    }
    return restricted;
  }

  /**
   * Paths matching the template whose binding agrees with every constrained placeholder
   *
   * Constraint keys that are not placeholders are ignored, and lock sentinels
   * are never listed. The sequence follows the storage provider's listing
   * order and can be consumed once.
   * @throws {TypeMismatchError} If a constrained value does not fit its placeholder
   */
  async *findPathsAndBindings(constraints: Constraints = {}): AsyncGenerator<LocatedPath> {
    const restricted = this.placeholderConstraints(constraints);
    const entries = Object.entries(restricted);
    const dir = directoryOf(this.template.prefixFor(restricted));

    for await (const path of this.storage.list(dir)) {
      if (isLockSentinel(path)) continue;
      const binding = this.template.match(path);
      if (!binding) continue;
      if (entries.every(([name, value]) => scalarEquals(binding[name], value))) {
        yield { path, binding };
      }
    }
  }

  async *findPaths(constraints: Constraints = {}): AsyncGenerator<string> {
    for await (const { path } of this.findPathsAndBindings(constraints)) {
      yield path;
    }
  }

  async exists(binding: Constraints): Promise<boolean> {
    return this.storage.exists(this.buildPath(binding));
  }

  /**
   * Delete every file matching the constraints
   * @returns The deleted (or, on a dry run, the would-be deleted) paths
   * @throws {NotWritableError} If the locator is read-only
   */
  async delete(constraints: Constraints = {}, options: WriteOptions = {}): Promise<string[]> {
    if (!this.writable) {
      throw new NotWritableError(this.template.source);
    }
    const dryRun = options.dryRun ?? false;

    // Collect first so deletions do not disturb the listing
    const paths: string[] = [];
    for await (const path of this.findPaths(constraints)) {
      paths.push(path);
    }

    for (const path of paths) {
      if (!dryRun) {
        await this.storage.delete(path);
      }
      this.#events.emit({ type: "delete", path, dryRun });
    }
    return paths;
  }
}
