/**
 * In-memory storage provider
 *
 * Keeps files in a Map. Every write advances a logical clock so stamps change
 * on each modification, even when the bytes are identical.
 */

import { NotFoundError } from "../errors.js";
import type { Stamp, StorageProvider } from "../types.js";

interface MemoryFile {
  data: Uint8Array;
  stamp: Stamp;
}

export class MemoryStorage implements StorageProvider {
  #files = new Map<string, MemoryFile>();
  #clock = 0;

  async *list(dir: string): AsyncGenerator<string> {
    const prefix = dir === "" || dir.endsWith("/") ? dir : `${dir}/`;
    const paths = [...this.#files.keys()].filter((p) => p.startsWith(prefix)).sort();
    for (const p of paths) {
      // Entries deleted while the listing is consumed are skipped
      if (this.#files.has(p)) {
        yield p;
      }
    }
  }

  async stat(path: string): Promise<Stamp> {
    return { ...this.#get(path).stamp };
  }

  async read(path: string): Promise<Uint8Array> {
    return new Uint8Array(this.#get(path).data);
  }

  async write(path: string, data: Uint8Array): Promise<void> {
    this.#put(path, data);
  }

  async delete(path: string): Promise<void> {
    if (!this.#files.delete(path)) {
      throw new NotFoundError(path);
    }
  }

  async createIfAbsent(path: string, data: Uint8Array = new Uint8Array()): Promise<boolean> {
    if (this.#files.has(path)) {
      return false;
    }
    this.#put(path, data);
    return true;
  }

  async exists(path: string): Promise<boolean> {
    return this.#files.has(path);
  }

  /**
   * Number of stored files
   */
  get size(): number {
    return this.#files.size;
  }

  #get(path: string): MemoryFile {
    const file = this.#files.get(path);
    if (!file) {
      throw new NotFoundError(path);
    }
    return file;
  }

  #put(path: string, data: Uint8Array): void {
    this.#clock++;
    this.#files.set(path, {
      data: new Uint8Array(data),
      stamp: { mtimeMs: this.#clock, size: data.byteLength },
    });
  }
}
