/**
 * Local disk storage provider
 *
 * Storage paths are "/"-separated and resolved below a root directory; a
 * leading "/" is optional. Listing yields paths in the same style as the
 * directory asked for.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { StorageError, isErrnoException } from "../errors.js";
import {
  atomicWrite,
  createExclusive,
  readBytes,
  removeFile,
  translateError,
  walkFiles,
} from "../io.js";
import { joinPath } from "../template.js";
import type { Stamp, StorageProvider } from "../types.js";

export interface LocalStorageOptions {
  /** Directory that storage paths are resolved against */
  root: string;
}

export class LocalStorage implements StorageProvider {
  readonly root: string;

  constructor(options: LocalStorageOptions) {
    this.root = path.resolve(options.root);
  }

  /**
   * Resolve a storage path to an absolute filesystem path
   * @throws {StorageError} If the path tries to escape the root
   */
  resolve(storagePath: string): string {
    const segments = storagePath.split("/").filter((segment) => segment !== "" && segment !== ".");
    if (segments.some((segment) => segment === ".." || segment.includes("\\"))) {
      throw new StorageError("resolve", storagePath, {
        cause: new Error('Path cannot contain ".." segments or backslashes'),
      });
    }
    return path.join(this.root, ...segments);
  }

  async *list(dir: string): AsyncGenerator<string> {
    const fsDir = this.resolve(dir);
    for await (const full of walkFiles(fsDir)) {
      const relative = path.relative(fsDir, full).split(path.sep).join("/");
      yield joinPath(dir, relative);
    }
  }

  async stat(storagePath: string): Promise<Stamp> {
    const filePath = this.resolve(storagePath);
    try {
      const stats = await fs.stat(filePath);
      return { mtimeMs: stats.mtimeMs, size: stats.size };
    } catch (err) {
      throw translateError("stat", storagePath, err);
    }
  }

  async read(storagePath: string): Promise<Uint8Array> {
    return readBytes(this.resolve(storagePath));
  }

  async write(storagePath: string, data: Uint8Array): Promise<void> {
    await atomicWrite(this.resolve(storagePath), data);
  }

  async delete(storagePath: string): Promise<void> {
    await removeFile(this.resolve(storagePath));
  }

  async createIfAbsent(storagePath: string, data: Uint8Array = new Uint8Array()): Promise<boolean> {
    return createExclusive(this.resolve(storagePath), data);
  }

  async exists(storagePath: string): Promise<boolean> {
    try {
      await fs.access(this.resolve(storagePath));
      return true;
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") {
        return false;
      }
      throw new StorageError("access", storagePath, { cause: err });
    }
  }
}
