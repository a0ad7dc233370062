/**
 * Configuration file support
 *
 * A `pathtable.config.json` names the storage root and the sources:
 *
 * ```json
 * {
 *   "root": "./data",
 *   "sources": {
 *     "contact": { "template": "/{country}/{company}/info.json" },
 *     "finance": {
 *       "template": "/{country}/{company}/{year:int}_revenue.json",
 *       "cache": { "location": "/.cache/{country}.json" }
 *     }
 *   },
 *   "lock": { "timeoutMs": 5000 }
 * }
 * ```
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { z } from "zod";
import { MemoryMemo } from "./cache.js";
import { createCodec } from "./codecs/index.js";
import { CompositeEngine } from "./composite.js";
import { ConfigurationError, isErrnoException } from "./errors.js";
import { safeParseJson } from "./format.js";
import { LockManager } from "./lock.js";
import { Locator } from "./locator.js";
import { noopSink } from "./observability/events.js";
import { PersistentMemo } from "./persistent-memo.js";
import { Source } from "./source.js";
import { LocalStorage } from "./storage/local.js";
import type { CacheMemo, EventSink, StorageProvider } from "./types.js";

export const DEFAULT_CONFIG_FILE = "pathtable.config.json";

const EncodingSchema = z.custom<BufferEncoding>(
  (value) => typeof value === "string" && Buffer.isEncoding(value),
  { message: "unknown text encoding" }
);

const CacheSchema = z.union([
  z.literal("memory"),
  z.object({
    /** Shard location template; its placeholders must belong to the source template */
    location: z.string().min(1),
  }),
]);

const SourceConfigSchema = z.object({
  template: z.string().min(1),
  codec: z.enum(["json", "jsonl", "yaml", "yml"]).default("json"),
  mode: z.enum(["singleton", "multi"]).optional(),
  encoding: EncodingSchema.optional(),
  writable: z.boolean().default(true),
  timestampField: z.string().min(1).optional(),
  cache: CacheSchema.optional(),
});

const LockConfigSchema = z.object({
  directory: z.string().default(""),
  timeoutMs: z.number().int().nonnegative().default(30000),
  pollIntervalMs: z.number().int().positive().default(100),
});

export const ConfigSchema = z.object({
  root: z.string().min(1).optional(),
  sources: z.record(z.string(), SourceConfigSchema).refine((sources) => Object.keys(sources).length > 0, {
    message: "at least one source is required",
  }),
  lock: LockConfigSchema.default({}),
});

export type SourceConfig = z.infer<typeof SourceConfigSchema>;

export type PathTableConfig = z.infer<typeof ConfigSchema> & {
  /** Absolute storage root */
  root: string;
};

export type LockDefaults = Omit<PathTableConfig["lock"], "directory">;

/**
 * Validate raw configuration data
 * @param baseDir - Directory a relative root is resolved against
 * @throws {ConfigurationError} If the data does not match the schema
 */
export function parseConfig(data: unknown, baseDir: string = process.cwd()): PathTableConfig {
  const parsed = ConfigSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`);
  }
  return { ...parsed.data, root: path.resolve(baseDir, parsed.data.root ?? ".") };
}

/**
 * Read and validate a configuration file
 *
 * Resolution order: explicit path, then PATHTABLE_CONFIG, then
 * `pathtable.config.json` in the working directory. A relative root is
 * resolved against the file's directory.
 * @throws {ConfigurationError} If the file is missing or invalid
 */
export async function loadConfig(configPath?: string): Promise<PathTableConfig> {
  const file = path.resolve(configPath ?? process.env.PATHTABLE_CONFIG ?? DEFAULT_CONFIG_FILE);

  let raw: string;
  try {
    raw = await fs.readFile(file, "utf-8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      throw new ConfigurationError(`Configuration file not found: ${file}`, { cause: err });
    }
    throw new ConfigurationError(`Cannot read configuration file: ${file}`, { cause: err });
  }

  const json = safeParseJson(raw);
  if (!json.success) {
    throw new ConfigurationError(`Invalid JSON in ${file}: ${json.error}`);
  }
  return parseConfig(json.data, path.dirname(file));
}

export interface OpenOptions {
  /** Replaces the configured root */
  root?: string;
  /** Replaces the local-disk storage built from the root */
  storage?: StorageProvider;
  events?: EventSink;
}

/**
 * Everything a configuration describes, ready to use
 */
export interface PathTable {
  config: PathTableConfig;
  storage: StorageProvider;
  sources: ReadonlyMap<string, Source>;
  locks: LockManager;
  lockDefaults: LockDefaults;
  /** Look up a source by name */
  source(name: string): Source;
  /** Join every configured source (built on first call) */
  composite(): CompositeEngine;
}

function createMemo(
  config: SourceConfig,
  locator: Locator,
  storage: StorageProvider,
  events: EventSink
): CacheMemo | undefined {
  if (config.cache === undefined) {
    return undefined;
  }
  if (config.cache === "memory") {
    return new MemoryMemo();
  }
  return new PersistentMemo({
    storage,
    location: config.cache.location,
    dataTemplate: locator.template,
    events,
  });
}

/**
 * Build storage, sources and locks from a configuration
 * @throws {TemplateError} If a template does not compile
 * @throws {ConfigurationError} If a codec setting is not supported
 */
export function openFromConfig(config: PathTableConfig, options: OpenOptions = {}): PathTable {
  const events = options.events ?? noopSink;
  const root = options.root ? path.resolve(options.root) : config.root;
  const storage = options.storage ?? new LocalStorage({ root });

  const sources = new Map<string, Source>();
  for (const [name, sourceConfig] of Object.entries(config.sources)) {
    const locator = new Locator({
      storage,
      template: sourceConfig.template,
      writable: sourceConfig.writable,
      events,
    });
    const codec = createCodec(sourceConfig.codec, { mode: sourceConfig.mode, encoding: sourceConfig.encoding });
    sources.set(
      name,
      new Source({
        locator,
        codec,
        memo: createMemo(sourceConfig, locator, storage, events),
        timestampField: sourceConfig.timestampField,
        events,
      })
    );
  }

  const { directory, ...lockDefaults } = config.lock;
  let engine: CompositeEngine | undefined;

  return {
    config: { ...config, root },
    storage,
    sources,
    locks: new LockManager(storage, { directory, events }),
    lockDefaults,
    source(name) {
      const source = sources.get(name);
      if (!source) {
        throw new ConfigurationError(`Unknown source "${name}" (configured: ${[...sources.keys()].join(", ")})`);
      }
      return source;
    },
    composite() {
      engine ??= new CompositeEngine(Object.fromEntries(sources));
      return engine;
    },
  };
}
