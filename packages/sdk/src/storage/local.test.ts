/**
 * Tests for LocalStorage
 */

import { describe, it, expect } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { withTempDir, writeTree } from "@pathtable/testkit";
import { LocalStorage } from "./local.js";
import { NotFoundError, StorageError } from "../errors.js";

const bytes = (text: string) => Buffer.from(text, "utf-8");

async function collect(iterable: AsyncIterable<string>): Promise<string[]> {
  const items: string[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

describe("LocalStorage", () => {
  it("should resolve storage paths below the root", async () => {
    await withTempDir(async (dir) => {
      const storage = new LocalStorage({ root: dir });
      expect(storage.resolve("/a/b.json")).toBe(path.join(dir, "a", "b.json"));
      expect(storage.resolve("a/b.json")).toBe(path.join(dir, "a", "b.json"));
      expect(storage.resolve("/")).toBe(path.resolve(dir));
    });
  });

  it("should refuse paths escaping the root", async () => {
    await withTempDir(async (dir) => {
      const storage = new LocalStorage({ root: dir });
      expect(() => storage.resolve("/a/../../etc/passwd")).toThrow(StorageError);
      expect(() => storage.resolve("a\\b")).toThrow(StorageError);
    });
  });

  it("should list files recursively in sorted order, in the style asked for", async () => {
    await withTempDir(async (dir) => {
      await writeTree(dir, {
        "data/b/2.json": "{}",
        "data/a/1.json": "{}",
        "data/a/sub/3.json": "{}",
        "other.json": "{}",
      });
      const storage = new LocalStorage({ root: dir });

      expect(await collect(storage.list("/data"))).toEqual([
        "/data/a/1.json",
        "/data/a/sub/3.json",
        "/data/b/2.json",
      ]);
      expect(await collect(storage.list("data/b"))).toEqual(["data/b/2.json"]);
      expect(await collect(storage.list(""))).toHaveLength(4);
      expect(await collect(storage.list("/missing"))).toEqual([]);
    });
  });

  it("should skip in-flight temp files", async () => {
    await withTempDir(async (dir) => {
      await writeTree(dir, { "a.json": "{}", ".tmp-a.json.1234": "partial" });
      const storage = new LocalStorage({ root: dir });
      expect(await collect(storage.list("/"))).toEqual(["/a.json"]);
    });
  });

  it("should write, stat, read and delete", async () => {
    await withTempDir(async (dir) => {
      const storage = new LocalStorage({ root: dir });
      await storage.write("/x/y/z.json", bytes("hello"));

      expect(await fs.readFile(path.join(dir, "x", "y", "z.json"), "utf-8")).toBe("hello");
      expect(Buffer.from(await storage.read("/x/y/z.json")).toString("utf-8")).toBe("hello");
      expect((await storage.stat("/x/y/z.json")).size).toBe(5);
      expect(await storage.exists("/x/y/z.json")).toBe(true);

      await storage.delete("/x/y/z.json");
      expect(await storage.exists("/x/y/z.json")).toBe(false);
    });
  });

  it("should raise NotFoundError for missing files", async () => {
    await withTempDir(async (dir) => {
      const storage = new LocalStorage({ root: dir });
      await expect(storage.read("/nope.json")).rejects.toThrow(NotFoundError);
      await expect(storage.stat("/nope.json")).rejects.toThrow(NotFoundError);
      await expect(storage.delete("/nope.json")).rejects.toThrow(NotFoundError);
    });
  });

  it("should create a file only once", async () => {
    await withTempDir(async (dir) => {
      const storage = new LocalStorage({ root: dir });
      expect(await storage.createIfAbsent("/locks/.lock_a", bytes("first"))).toBe(true);
      expect(await storage.createIfAbsent("/locks/.lock_a", bytes("second"))).toBe(false);
      expect(Buffer.from(await storage.read("/locks/.lock_a")).toString("utf-8")).toBe("first");
    });
  });

  it("should let exactly one concurrent creator win", async () => {
    await withTempDir(async (dir) => {
      const storage = new LocalStorage({ root: dir });
      const results = await Promise.all(
        Array.from({ length: 8 }, () => storage.createIfAbsent("/.lock_race"))
      );
      expect(results.filter(Boolean)).toHaveLength(1);
    });
  });
});
