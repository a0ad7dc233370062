/**
 * Core types for pathtable
 */

/**
 * Closed set of values a record field or placeholder may hold
 */
export type Scalar = string | number | boolean | null;

/**
 * Placeholder name to value mapping extracted from (or used to build) a path
 *
 * A partial binding is used as a query constraint; a full binding is required
 * to build a concrete path.
 */
export type KeyBinding = { [placeholder: string]: Scalar };

/**
 * Equality constraints applied while locating and reading files
 */
export type Constraints = Readonly<KeyBinding>;

/**
 * One file's decoded content, or one row of a multi-entry file
 */
export type DataRecord = { [field: string]: Scalar };

/**
 * Decoded content as produced by a codec
 */
export type Content = DataRecord | DataRecord[];

/**
 * Last-modification marker reported by a storage provider
 */
export interface Stamp {
  /** Modification time in milliseconds */
  mtimeMs: number;
  /** Size in bytes */
  size: number;
}

/**
 * Declared value type of a placeholder
 */
export type PlaceholderType = "string" | "integer" | "float";

/**
 * Whether a codec stores one record per file or a sequence of records
 */
export type CodecMode = "singleton" | "multi";

/**
 * Content codec contract: bytes to records and back
 */
export interface Codec {
  /** Short name used in configuration (e.g. "json") */
  readonly name: string;
  /** One record per file, or a sequence */
  readonly mode: CodecMode;
  /**
   * Decode raw bytes
   * @throws {CodecError} If the bytes are not valid for this codec
   */
  decode(bytes: Uint8Array, path: string): Content;
  /**
   * Encode content to raw bytes
   * @throws {CodecError} If the content cannot be represented
   */
  encode(content: Content, path: string): Uint8Array;
}

/**
 * Storage provider contract
 *
 * All paths are strings using "/" separators regardless of the transport.
 */
export interface StorageProvider {
  /**
   * List every file below a directory, recursively
   * Missing directories produce an empty listing.
   */
  list(dir: string): AsyncIterable<string>;
  /**
   * @throws {NotFoundError} If the path does not exist
   */
  stat(path: string): Promise<Stamp>;
  /**
   * @throws {NotFoundError} If the path does not exist
   */
  read(path: string): Promise<Uint8Array>;
  /** Create or replace a file, creating parent directories as needed */
  write(path: string, data: Uint8Array): Promise<void>;
  /**
   * @throws {NotFoundError} If the path does not exist
   */
  delete(path: string): Promise<void>;
  /**
   * Atomically create a file only if nothing exists at the path
   * @returns true if this call created it, false if it already existed
   */
  createIfAbsent(path: string, data?: Uint8Array): Promise<boolean>;
  exists(path: string): Promise<boolean>;
}

/**
 * Memo of decoded content keyed by path and stamp
 */
export interface CacheMemo {
  /** Records for the path if memoized under exactly this stamp */
  get(path: string, stamp: Stamp): Promise<DataRecord[] | null>;
  set(path: string, stamp: Stamp, records: DataRecord[]): Promise<void>;
  delete(path: string): Promise<void>;
  /** Persist pending changes, if the memo is backed by storage */
  flush(): Promise<void>;
}

/**
 * Cache statistics for monitoring and debugging
 */
export interface CacheStats {
  /** Reads answered from the memo */
  hits: number;
  /** Reads that had to decode */
  misses: number;
  /** Cache hit rate (hits / total requests) */
  hitRate: number;
}

/**
 * Events emitted by components at defined points
 */
export type PathTableEvent =
  | { type: "read.start"; path: string }
  | { type: "read.end"; path: string; records: number; cached: boolean }
  | { type: "read.skip"; path: string; reason: string }
  | { type: "write.start"; path: string; records: number; dryRun: boolean }
  | { type: "write.end"; path: string; records: number; dryRun: boolean }
  | { type: "delete"; path: string; dryRun: boolean }
  | { type: "cache.hit"; path: string }
  | { type: "cache.miss"; path: string }
  | { type: "cache.corrupt"; path: string; reason: string }
  | { type: "lock.waiting"; name: string; path: string; elapsedMs: number }
  | { type: "lock.acquired"; name: string; path: string }
  | { type: "lock.released"; name: string; path: string; external: boolean };

/**
 * Receiver for component events, invoked synchronously
 */
export interface EventSink {
  emit(event: PathTableEvent): void;
}

/**
 * Options shared by write operations
 */
export interface WriteOptions {
  /** Log what would be written without touching storage */
  dryRun?: boolean;
}
