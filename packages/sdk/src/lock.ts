/**
 * Advisory locks backed by sentinel files on a storage provider
 *
 * A lock is held while its sentinel exists. Acquisition creates the sentinel
 * with an atomic create-if-absent and polls until a timeout while another
 * holder has it. Only callers that go through a LockManager on the same
 * storage location are excluded; nothing stops a writer that ignores the lock.
 */

import { hostname } from "node:os";
import { setTimeout as sleep } from "node:timers/promises";
import { z } from "zod";
import { LockAbortedError, LockTimeoutError, NotFoundError, StorageError } from "./errors.js";
import { safeParseJson } from "./format.js";
import { noopSink } from "./observability/events.js";
import { joinPath } from "./template.js";
import type { EventSink, StorageProvider } from "./types.js";

/** File name prefix of lock sentinels; locators never list such files */
export const LOCK_PREFIX = ".lock_";
const LOCK_NAME = /^[A-Za-z0-9_.-]+$/;

const LockFileSchema = z.object({
  pid: z.number().int(),
  host: z.string(),
  acquiredAt: z.string(),
});

/**
 * What a sentinel tells about its holder
 */
export interface LockInfo {
  name: string;
  path: string;
  /** Holder details; null when the sentinel was not written by a LockManager */
  pid: number | null;
  host: string | null;
  acquiredAt: string | null;
  /** Sentinel modification time in milliseconds */
  modifiedMs: number;
}

export interface LockManagerOptions {
  /** Directory holding the sentinels (default: storage root) */
  directory?: string;
  events?: EventSink;
}

export interface AcquireOptions {
  /** Give up after this long (default: 30000ms) */
  timeoutMs?: number;
  /** Delay between attempts (default: 100ms) */
  pollIntervalMs?: number;
  /** Abandons the acquisition when aborted */
  signal?: AbortSignal;
}

/**
 * A held lock
 */
export class LockHandle {
  readonly name: string;
  readonly path: string;
  #release: () => Promise<void>;
  #released = false;

  constructor(name: string, path: string, release: () => Promise<void>) {
    this.name = name;
    this.path = path;
    this.#release = release;
  }

  get released(): boolean {
    return this.#released;
  }

  /**
   * Delete the sentinel; calling it again does nothing
   */
  async release(): Promise<void> {
    if (this.#released) {
      return;
    }
    this.#released = true;
    await this.#release();
  }
}

export class LockManager {
  readonly storage: StorageProvider;
  readonly directory: string;
  #events: EventSink;

  constructor(storage: StorageProvider, options: LockManagerOptions = {}) {
    this.storage = storage;
    this.directory = options.directory ?? "";
    this.#events = options.events ?? noopSink;
  }

  /**
   * Storage path of a lock's sentinel
   * @throws {StorageError} If the name is not usable as a file name
   */
  lockPath(name: string): string {
    if (!LOCK_NAME.test(name) || name === "." || name === "..") {
      throw new StorageError("lock", name, {
        cause: new Error("Lock names may only contain letters, digits, '.', '_' and '-'"),
      });
    }
    return joinPath(this.directory, `${LOCK_PREFIX}${name}`);
  }

  /**
   * Acquire a lock, waiting while another holder has it
   * @throws {LockTimeoutError} If the lock is still held after the timeout
   * @throws {LockAbortedError} If the signal aborts before the lock is acquired
   */
  async acquire(name: string, options: AcquireOptions = {}): Promise<LockHandle> {
    const { timeoutMs = 30000, pollIntervalMs = 100, signal } = options;
    const path = this.lockPath(name);
    const startTime = Date.now();

    while (true) {
      if (signal?.aborted) {
        throw new LockAbortedError(path, { cause: signal.reason });
      }

      const info = { pid: process.pid, host: hostname(), acquiredAt: new Date().toISOString() };
      const created = await this.storage.createIfAbsent(path, Buffer.from(JSON.stringify(info), "utf-8"));

      if (created) {
        // Aborted while the create was in flight: give the lock back
        if (signal?.aborted) {
          await this.#remove(name, path);
          throw new LockAbortedError(path, { cause: signal.reason });
        }
        this.#events.emit({ type: "lock.acquired", name, path });
        return new LockHandle(name, path, () => this.#remove(name, path));
      }

      const elapsedMs = Date.now() - startTime;
      if (elapsedMs >= timeoutMs) {
        throw new LockTimeoutError(path, timeoutMs);
      }
      this.#events.emit({ type: "lock.waiting", name, path, elapsedMs });

      try {
        await sleep(Math.min(pollIntervalMs, timeoutMs - elapsedMs), undefined, { signal });
      } catch (err) {
        if (signal?.aborted) {
          throw new LockAbortedError(path, { cause: err });
        }
        throw err;
      }
    }
  }

  /**
   * Run a function with the lock held, releasing it on every exit path
   */
  async withLock<T>(name: string, fn: (handle: LockHandle) => Promise<T>, options?: AcquireOptions): Promise<T> {
    const handle = await this.acquire(name, options);
    try {
      return await fn(handle);
    } finally {
      await handle.release();
    }
  }

  /**
   * Holder details of a lock, or null if it is free
   */
  async info(name: string): Promise<LockInfo | null> {
    const path = this.lockPath(name);

    let bytes: Uint8Array;
    let modifiedMs: number;
    try {
      const stamp = await this.storage.stat(path);
      modifiedMs = stamp.mtimeMs;
      bytes = await this.storage.read(path);
    } catch (err) {
      if (err instanceof NotFoundError) {
        return null;
      }
      throw err;
    }

    const json = safeParseJson(Buffer.from(bytes).toString("utf-8"));
    const parsed = json.success ? LockFileSchema.safeParse(json.data) : null;
    if (!parsed?.success) {
      return { name, path, pid: null, host: null, acquiredAt: null, modifiedMs };
    }
    return { name, path, ...parsed.data, modifiedMs };
  }

  /**
   * Remove a sentinel regardless of who holds it
   *
   * Only safe when the holder is known to be gone.
   * @returns Whether a sentinel existed
   */
  async forceRelease(name: string): Promise<boolean> {
    const path = this.lockPath(name);
    try {
      await this.storage.delete(path);
    } catch (err) {
      if (err instanceof NotFoundError) {
        return false;
      }
      throw err;
    }
    this.#events.emit({ type: "lock.released", name, path, external: true });
    return true;
  }

  async #remove(name: string, path: string): Promise<void> {
    let external = false;
    try {
      await this.storage.delete(path);
    } catch (err) {
      // Already removed by someone else (e.g. forceRelease)
      if (!(err instanceof NotFoundError)) {
        throw err;
      }
      external = true;
    }
    this.#events.emit({ type: "lock.released", name, path, external });
  }
}
