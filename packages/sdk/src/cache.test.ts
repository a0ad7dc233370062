/**
 * Tests for ContentCache and the in-process memos
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { CountingCodec, RecordingSink } from "@pathtable/testkit";
import { ContentCache, MemoryMemo, NoopMemo, sameStamp } from "./cache.js";
import { JsonCodec } from "./codecs/json.js";
import { JsonLinesCodec } from "./codecs/jsonl.js";
import { MemoryStorage } from "./storage/memory.js";
import { NotFoundError, SingletonExpectedError } from "./errors.js";

const bytes = (text: string) => Buffer.from(text, "utf-8");

describe("sameStamp", () => {
  it("should compare both fields", () => {
    expect(sameStamp({ mtimeMs: 1, size: 2 }, { mtimeMs: 1, size: 2 })).toBe(true);
    expect(sameStamp({ mtimeMs: 1, size: 2 }, { mtimeMs: 1, size: 3 })).toBe(false);
    expect(sameStamp({ mtimeMs: 1, size: 2 }, { mtimeMs: 2, size: 2 })).toBe(false);
  });

  it("should never treat non-finite stamps as equal", () => {
    expect(sameStamp({ mtimeMs: Number.NaN, size: 2 }, { mtimeMs: Number.NaN, size: 2 })).toBe(false);
    expect(sameStamp({ mtimeMs: Infinity, size: 2 }, { mtimeMs: Infinity, size: 2 })).toBe(false);
  });
});

describe("MemoryMemo", () => {
  let originalCacheSize: string | undefined;

  beforeEach(() => {
    originalCacheSize = process.env.PATHTABLE_CACHE_SIZE;
    delete process.env.PATHTABLE_CACHE_SIZE;
  });

  afterEach(() => {
    if (originalCacheSize !== undefined) {
      process.env.PATHTABLE_CACHE_SIZE = originalCacheSize;
    } else {
      delete process.env.PATHTABLE_CACHE_SIZE;
    }
  });

  it("should return entries only for the stored stamp", async () => {
    const memo = new MemoryMemo();
    await memo.set("/a.json", { mtimeMs: 1, size: 10 }, [{ x: 1 }]);

    expect(await memo.get("/a.json", { mtimeMs: 1, size: 10 })).toEqual([{ x: 1 }]);
    expect(await memo.get("/a.json", { mtimeMs: 2, size: 10 })).toBeNull();
    // The stale entry is dropped on mismatch
    expect(memo.size).toBe(0);
  });

  it("should hand out copies", async () => {
    const memo = new MemoryMemo();
    const stamp = { mtimeMs: 1, size: 10 };
    await memo.set("/a.json", stamp, [{ x: 1 }]);

    const first = await memo.get("/a.json", stamp);
    if (first?.[0]) first[0].x = 99;
    expect(await memo.get("/a.json", stamp)).toEqual([{ x: 1 }]);
  });

  it("should evict the least recently used entry", async () => {
    const memo = new MemoryMemo({ maxSize: 2 });
    const stamp = { mtimeMs: 1, size: 1 };
    await memo.set("/a", stamp, []);
    await memo.set("/b", stamp, []);
    await memo.get("/a", stamp);
    await memo.set("/c", stamp, []);

    expect(await memo.get("/a", stamp)).toEqual([]);
    expect(await memo.get("/b", stamp)).toBeNull();
    expect(memo.evicted).toBe(1);
  });

  it("should respect PATHTABLE_CACHE_SIZE", async () => {
    process.env.PATHTABLE_CACHE_SIZE = "1";
    const memo = new MemoryMemo({ maxSize: 100 });
    const stamp = { mtimeMs: 1, size: 1 };
    await memo.set("/a", stamp, []);
    await memo.set("/b", stamp, []);
    expect(memo.size).toBe(1);
  });
});

describe("ContentCache", () => {
  let storage: MemoryStorage;
  let codec: CountingCodec;

  beforeEach(async () => {
    storage = new MemoryStorage();
    codec = new CountingCodec(new JsonCodec());
    await storage.write("/a.json", bytes('{"name":"a","n":1}'));
  });

  it("should decode at most once while a file is unchanged", async () => {
    const cache = new ContentCache(storage, codec, { memo: new MemoryMemo() });

    expect(await cache.readRecords("/a.json")).toEqual([{ name: "a", n: 1 }]);
    expect(await cache.readRecords("/a.json")).toEqual([{ name: "a", n: 1 }]);
    expect(codec.decodeCount).toBe(1);
    expect(cache.stats()).toEqual({ hits: 1, misses: 1, hitRate: 0.5 });
  });

  it("should decode again after the file changes", async () => {
    const cache = new ContentCache(storage, codec, { memo: new MemoryMemo() });

    await cache.readRecords("/a.json");
    await storage.write("/a.json", bytes('{"name":"a","n":2}'));
    expect(await cache.readRecords("/a.json")).toEqual([{ name: "a", n: 2 }]);
    expect(codec.decodeCount).toBe(2);
  });

  it("should decode every time without a memo", async () => {
    const cache = new ContentCache(storage, codec);
    expect(cache.memo).toBeInstanceOf(NoopMemo);

    await cache.readRecords("/a.json");
    await cache.readRecords("/a.json");
    expect(codec.decodeCount).toBe(2);
  });

  it("should fail for a vanished path instead of serving a stale entry", async () => {
    const cache = new ContentCache(storage, codec, { memo: new MemoryMemo() });
    await cache.readRecords("/a.json");
    await storage.delete("/a.json");

    await expect(cache.readRecords("/a.json")).rejects.toThrow(NotFoundError);
  });

  it("should emit read and cache events", async () => {
    const events = new RecordingSink();
    const cache = new ContentCache(storage, codec, { memo: new MemoryMemo(), events });

    await cache.readRecords("/a.json");
    await cache.readRecords("/a.json");
    expect(events.types()).toEqual([
      "read.start",
      "cache.miss",
      "read.end",
      "read.start",
      "cache.hit",
      "read.end",
    ]);
    expect(events.ofType("read.end").map((event) => event.cached)).toEqual([false, true]);
  });

  it("should read a single record", async () => {
    const cache = new ContentCache(storage, codec);
    expect(await cache.readRecord("/a.json")).toEqual({ name: "a", n: 1 });
  });

  it("should reject readRecord on multi-record files", async () => {
    await storage.write("/many.jsonl", bytes('{"n":1}\n{"n":2}\n'));
    const cache = new ContentCache(storage, new JsonLinesCodec());
    await expect(cache.readRecord("/many.jsonl")).rejects.toThrow(SingletonExpectedError);
  });

  it("should write through and invalidate the memo", async () => {
    const memo = new MemoryMemo();
    const cache = new ContentCache(storage, codec, { memo });
    await cache.readRecords("/a.json");

    await cache.writeRecord("/a.json", { name: "a", n: 5 });
    expect(memo.size).toBe(0);
    expect(Buffer.from(await storage.read("/a.json")).toString("utf-8")).toBe('{\n  "name": "a",\n  "n": 5\n}\n');
    expect(await cache.readRecords("/a.json")).toEqual([{ name: "a", n: 5 }]);
  });

  it("should not touch storage on a dry run", async () => {
    const events = new RecordingSink();
    const cache = new ContentCache(storage, codec, { events });

    await cache.writeRecord("/b.json", { name: "b" }, { dryRun: true });
    expect(await storage.exists("/b.json")).toBe(false);
    expect(events.ofType("write.end")).toEqual([{ type: "write.end", path: "/b.json", records: 1, dryRun: true }]);
  });
});
