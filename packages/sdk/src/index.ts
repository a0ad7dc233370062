/**
 * pathtable SDK
 *
 * Treats a tree of files whose paths embed typed placeholders as a queryable,
 * writable table
 */

// Re-export types
export type {
  Scalar,
  KeyBinding,
  Constraints,
  DataRecord,
  Content,
  Stamp,
  PlaceholderType,
  CodecMode,
  Codec,
  StorageProvider,
  CacheMemo,
  CacheStats,
  PathTableEvent,
  EventSink,
  WriteOptions,
} from "./types.js";

// Templates and locating
export {
  CompiledTemplate,
  compileTemplate,
  directoryOf,
  joinPath,
  type TemplateSegment,
} from "./template.js";
export { Locator, scalarEquals, type LocatorOptions, type LocatedPath } from "./locator.js";

// Storage providers
export { LocalStorage, type LocalStorageOptions } from "./storage/local.js";
export { MemoryStorage } from "./storage/memory.js";

// Codecs
export {
  JsonCodec,
  JsonLinesCodec,
  YamlCodec,
  CODEC_NAMES,
  createCodec,
  toRecordList,
  fromRecordList,
  sameRecord,
  validateContent,
  type CodecName,
  type CodecOptions,
  type JsonCodecOptions,
  type JsonLinesCodecOptions,
  type YamlCodecOptions,
} from "./codecs/index.js";

// Cache
export {
  ContentCache,
  NoopMemo,
  MemoryMemo,
  sameStamp,
  type ContentCacheOptions,
  type MemoryMemoOptions,
} from "./cache.js";
export { PersistentMemo, type PersistentMemoOptions } from "./persistent-memo.js";

// Sources and joins
export { Source, type SourceOptions, type WritePlan } from "./source.js";
export {
  CompositeEngine,
  SHARED_PREFIX,
  type CompositeRow,
  type CompositeEngineOptions,
  type SourceDefinition,
} from "./composite.js";

// Locks
export {
  LockManager,
  LockHandle,
  type LockInfo,
  type LockManagerOptions,
  type AcquireOptions,
} from "./lock.js";

// Configuration
export {
  ConfigSchema,
  DEFAULT_CONFIG_FILE,
  loadConfig,
  parseConfig,
  openFromConfig,
  type PathTable,
  type PathTableConfig,
  type SourceConfig,
  type LockDefaults,
  type OpenOptions,
} from "./config.js";

// Formatting
export { stableStringify, safeParseJson, type KeyOrder } from "./format.js";

// Observability
export { Logger, createLogger, type LogLevel, type LogEntry, type LogWriter, type LoggerOptions } from "./observability/logs.js";
export { noopSink, combineSinks, loggerSink } from "./observability/events.js";

// Errors
export {
  PathTableError,
  TemplateError,
  MissingKeyError,
  TypeMismatchError,
  IncompleteKeyError,
  StorageError,
  NotFoundError,
  JoinKeyError,
  NotWritableError,
  LockTimeoutError,
  LockAbortedError,
  CodecError,
  SingletonExpectedError,
  ConfigurationError,
} from "./errors.js";
