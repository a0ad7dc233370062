/**
 * Error types for pathtable operations
 *
 * Invariants:
 * - Every error names the path, placeholder or source it concerns
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all pathtable errors
 */
export abstract class PathTableError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a path template cannot be compiled
 */
export class TemplateError extends PathTableError {
  readonly code = "E_TEMPLATE";

  constructor(
    public readonly template: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Invalid path template "${template}": ${reason}`, options);
  }
}

/**
 * Thrown when a binding lacks a placeholder required to build a path
 */
export class MissingKeyError extends PathTableError {
  readonly code = "E_MISSING_KEY";

  constructor(
    public readonly template: string,
    public readonly missing: readonly string[],
    options?: ErrorOptions
  ) {
    super(`Missing value for placeholder(s) ${missing.join(", ")} in template "${template}"`, options);
  }
}

/**
 * Thrown when a bound value does not fit the declared placeholder type
 */
export class TypeMismatchError extends PathTableError {
  readonly code = "E_TYPE_MISMATCH";

  constructor(
    public readonly placeholder: string,
    public readonly expected: string,
    public readonly value: unknown,
    options?: ErrorOptions
  ) {
    super(
      `Placeholder "${placeholder}" expects ${expected}, got ${JSON.stringify(value) ?? String(value)}`,
      options
    );
  }
}

/**
 * Thrown when a composite row lacks a key needed to build a source path
 */
export class IncompleteKeyError extends PathTableError {
  readonly code = "E_INCOMPLETE_KEY";

  constructor(
    public readonly source: string,
    public readonly key: string,
    public readonly row: number,
    options?: ErrorOptions
  ) {
    super(`Row ${row} has no value for key "${key}" required by source "${source}"`, options);
  }
}

/**
 * Thrown when the storage provider fails
 */
export class StorageError extends PathTableError {
  readonly code = "E_STORAGE";

  constructor(
    public readonly operation: string,
    public readonly path: string,
    options?: ErrorOptions
  ) {
    super(`Storage ${operation} failed: ${path}`, options);
  }
}

/**
 * Thrown when a path does not exist (or vanished after being listed)
 */
export class NotFoundError extends PathTableError {
  readonly code = "ENOENT";

  constructor(
    public readonly path: string,
    options?: ErrorOptions
  ) {
    super(`Not found: ${path}`, options);
  }
}

/**
 * Thrown when composed sources cannot be joined
 */
export class JoinKeyError extends PathTableError {
  readonly code = "E_JOIN_KEY";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

/**
 * Thrown when a write or delete targets a read-only source
 */
export class NotWritableError extends PathTableError {
  readonly code = "E_NOT_WRITABLE";

  constructor(
    public readonly target: string,
    options?: ErrorOptions
  ) {
    super(`Not writable: ${target}`, options);
  }
}

/**
 * Thrown when a lock cannot be acquired within its time budget
 */
export class LockTimeoutError extends PathTableError {
  readonly code = "E_LOCK_TIMEOUT";

  constructor(
    public readonly lockPath: string,
    public readonly timeoutMs: number,
    options?: ErrorOptions
  ) {
    super(
      `Failed to acquire lock after ${timeoutMs}ms. Lock file: ${lockPath}. ` +
        `A stale lock left by a crashed process can be removed with forceRelease().`,
      options
    );
  }
}

/**
 * Thrown when a lock acquisition is abandoned through its abort signal
 */
export class LockAbortedError extends PathTableError {
  readonly code = "E_LOCK_ABORTED";

  constructor(
    public readonly lockPath: string,
    options?: ErrorOptions
  ) {
    super(`Lock acquisition aborted: ${lockPath}`, options);
  }
}

/**
 * Thrown when file content cannot be decoded or encoded
 */
export class CodecError extends PathTableError {
  readonly code = "E_CODEC";

  constructor(
    public readonly path: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Codec failure for ${path}: ${reason}`, options);
  }
}

/**
 * Thrown when exactly one record was expected
 */
export class SingletonExpectedError extends PathTableError {
  readonly code = "E_SINGLETON";

  constructor(
    public readonly path: string,
    public readonly count: number,
    options?: ErrorOptions
  ) {
    super(`Expected a single record for ${path}, got ${count}`, options);
  }
}

/**
 * Thrown when a configuration or source definition is invalid
 */
export class ConfigurationError extends PathTableError {
  readonly code = "E_CONFIG";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

/**
 * Narrow an unknown error to a Node.js system error with a `code`
 */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err && typeof err.code === "string";
}
