/**
 * Atomic file I/O operations for crash-safe writes on local disk
 *
 * Invariants:
 * - Writes are atomic: never observe partial file contents
 * - Temp files always reside in the same directory as target (same filesystem for atomic rename)
 * - Temp files are removed on failure paths
 * - Missing files throw NotFoundError, other failures StorageError
 *
 * Pattern: write → fsync → rename → fsync directory
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import { dirname, basename, join } from "node:path";
import { NotFoundError, StorageError, isErrnoException } from "./errors.js";

/**
 * Feature flag to control directory fsync (can be disabled on problematic platforms)
 */
const ENABLE_DIR_FSYNC = true;

/**
 * Prefix of the temp files written next to their target
 */
export const TEMP_FILE_MARKER = ".tmp-";

/**
 * Ensure a directory exists, creating it and parent directories as needed
 * @param dirPath - Directory path to create
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (err) {
    throw new StorageError("mkdir", dirPath, { cause: err });
  }
}

/**
 * Atomically write content to a file using write-rename-sync pattern
 * @param filePath - Target file path
 * @param content - Bytes to write
 */
export async function atomicWrite(filePath: string, content: Uint8Array): Promise<void> {
  const dir = dirname(filePath);
  const tmp = join(dir, `${TEMP_FILE_MARKER}${basename(filePath)}.${randomUUID()}`);

  await ensureDirectory(dir);

  let fileHandle: fs.FileHandle | null = null;

  try {
    fileHandle = await fs.open(tmp, "w", 0o644);
    await fileHandle.writeFile(content);

    // Sync file data to disk (prefer datasync for performance, fall back to sync)
    try {
      await fileHandle.datasync();
    } catch (err) {
      // ENOTSUP/ENOSYS: not supported on this platform
      // EINVAL: some CIFS/FUSE mounts report this instead
      if (isErrnoException(err) && (err.code === "ENOTSUP" || err.code === "ENOSYS" || err.code === "EINVAL")) {
        await fileHandle.sync();
      } else {
        throw err;
      }
    }

    await fileHandle.close();
    fileHandle = null;

    // Atomic rename (last-writer-wins for concurrent writes)
    try {
      await fs.rename(tmp, filePath);
    } catch (err) {
      // On Windows, rename may fail transiently when antivirus or indexing grabs the file
      if (
        isErrnoException(err) &&
        (err.code === "EPERM" || err.code === "EACCES" || err.code === "EBUSY") &&
        process.platform === "win32"
      ) {
        await new Promise((resolve) => setTimeout(resolve, 10));
        await fs.rename(tmp, filePath);
      } else {
        throw err;
      }
    }

    if (ENABLE_DIR_FSYNC) {
      await syncDirectory(dir);
    }
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch(() => undefined);
    }
    // Temp file may not exist yet
    await fs.rm(tmp, { force: true }).catch(() => undefined);

    throw new StorageError("write", filePath, { cause: err });
  }
}

/**
 * Best-effort fsync of a directory after a rename
 */
async function syncDirectory(dir: string): Promise<void> {
  try {
    const dirHandle = await fs.open(dir, "r");
    try {
      await dirHandle.sync();
    } finally {
      await dirHandle.close();
    }
  } catch (err) {
    // Platforms that can't fsync directories report one of these
    if (isErrnoException(err) && (err.code === "EINVAL" || err.code === "ENOTSUP" || err.code === "EBADF" || err.code === "EPERM")) {
      return;
    }
    if (process.env.PATHTABLE_DEBUG) {
      console.warn(`Directory fsync failed for ${dir}:`, err);
    }
  }
}

/**
 * Create a file only if it does not exist yet (exclusive open)
 * @returns true if created, false if something already exists at the path
 */
export async function createExclusive(filePath: string, content: Uint8Array): Promise<boolean> {
  await ensureDirectory(dirname(filePath));

  let handle: fs.FileHandle;
  try {
    handle = await fs.open(filePath, "wx");
  } catch (err) {
    if (isErrnoException(err) && err.code === "EEXIST") {
      return false;
    }
    throw new StorageError("create", filePath, { cause: err });
  }

  try {
    await handle.writeFile(content);
    await handle.sync();
  } catch (err) {
    throw new StorageError("create", filePath, { cause: err });
  } finally {
    await handle.close();
  }
  return true;
}

/**
 * Read a file's bytes
 * @throws NotFoundError if the file doesn't exist
 * @throws StorageError for other read failures
 */
export async function readBytes(filePath: string): Promise<Uint8Array> {
  try {
    return await fs.readFile(filePath);
  } catch (err) {
    throw translateError("read", filePath, err);
  }
}

/**
 * Remove a file
 * @throws NotFoundError if the file doesn't exist
 */
export async function removeFile(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath);
  } catch (err) {
    throw translateError("delete", filePath, err);
  }
}

/**
 * Walk every regular file below a directory, depth-first, entries sorted by name
 *
 * Symlinks and in-flight temp files are skipped; a missing directory yields nothing.
 * @param dirPath - Directory to walk
 */
export async function* walkFiles(dirPath: string): AsyncGenerator<string> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dirPath, { withFileTypes: true });
  } catch (err) {
    if (isErrnoException(err) && (err.code === "ENOENT" || err.code === "ENOTDIR")) {
      return;
    }
    throw new StorageError("list", dirPath, { cause: err });
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const full = join(dirPath, entry.name);
    if (entry.isDirectory()) {
      yield* walkFiles(full);
    } else if (entry.isFile() && !entry.name.startsWith(TEMP_FILE_MARKER)) {
      yield full;
    }
  }
}

/**
 * Map a Node.js error to the pathtable error taxonomy
 */
export function translateError(operation: string, filePath: string, err: unknown): Error {
  if (isErrnoException(err) && err.code === "ENOENT") {
    return new NotFoundError(filePath, { cause: err });
  }
  return new StorageError(operation, filePath, { cause: err });
}
