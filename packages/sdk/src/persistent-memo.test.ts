/**
 * Tests for the file-backed memo
 */

import { describe, it, expect, beforeEach } from "vitest";
import { CountingCodec, RecordingSink } from "@pathtable/testkit";
import { ContentCache } from "./cache.js";
import { JsonCodec } from "./codecs/json.js";
import { PersistentMemo } from "./persistent-memo.js";
import { MemoryStorage } from "./storage/memory.js";
import { compileTemplate } from "./template.js";
import { TemplateError } from "./errors.js";

const bytes = (text: string) => Buffer.from(text, "utf-8");
const text = async (storage: MemoryStorage, path: string) => Buffer.from(await storage.read(path)).toString("utf-8");

describe("PersistentMemo", () => {
  const dataTemplate = compileTemplate("/data/{country}/{company}/info.json");
  let storage: MemoryStorage;

  beforeEach(async () => {
    storage = new MemoryStorage();
    await storage.write("/data/France/OVH/info.json", bytes('{"phone":"555-0100"}'));
    await storage.write("/data/Germany/DF/info.json", bytes('{"phone":"555-0199"}'));
  });

  it("should reject a location keyed by foreign placeholders", () => {
    expect(
      () => new PersistentMemo({ storage, location: "/cache/{region}.json", dataTemplate })
    ).toThrow(TemplateError);
  });

  it("should require the data template for a templated location", () => {
    expect(() => new PersistentMemo({ storage, location: "/cache/{country}.json" })).toThrow(TemplateError);
  });

  it("should shard entries by the location template", () => {
    const memo = new PersistentMemo({ storage, location: "/cache/{country}.json", dataTemplate });
    expect(memo.shardPathFor("/data/France/OVH/info.json")).toBe("/cache/France.json");
    expect(memo.shardPathFor("/data/Germany/DF/info.json")).toBe("/cache/Germany.json");
  });

  it("should use a single file for a plain location", () => {
    const memo = new PersistentMemo({ storage, location: "/cache/all.json" });
    expect(memo.shardPathFor("/data/France/OVH/info.json")).toBe("/cache/all.json");
  });

  it("should persist entries on flush", async () => {
    const memo = new PersistentMemo({ storage, location: "/cache/{country}.json", dataTemplate });
    const stamp = await storage.stat("/data/France/OVH/info.json");
    await memo.set("/data/France/OVH/info.json", stamp, [{ phone: "555-0100" }]);

    expect(await storage.exists("/cache/France.json")).toBe(false);
    await memo.flush();

    expect(JSON.parse(await text(storage, "/cache/France.json"))).toEqual({
      version: 1,
      entries: [{ path: "/data/France/OVH/info.json", stamp, records: [{ phone: "555-0100" }] }],
    });
    expect(await storage.exists("/cache/Germany.json")).toBe(false);
  });

  it("should survive a restart and skip decoding", async () => {
    const firstCodec = new CountingCodec(new JsonCodec());
    const first = new ContentCache(storage, firstCodec, {
      memo: new PersistentMemo({ storage, location: "/cache/{country}.json", dataTemplate }),
    });
    await first.readRecords("/data/France/OVH/info.json");
    await first.flush();
    expect(firstCodec.decodeCount).toBe(1);

    // A fresh memo over the same storage, as after a process restart
    const secondCodec = new CountingCodec(new JsonCodec());
    const second = new ContentCache(storage, secondCodec, {
      memo: new PersistentMemo({ storage, location: "/cache/{country}.json", dataTemplate }),
    });
    expect(await second.readRecords("/data/France/OVH/info.json")).toEqual([{ phone: "555-0100" }]);
    expect(secondCodec.decodeCount).toBe(0);
  });

  it("should ignore entries whose stamp is outdated", async () => {
    const memo = new PersistentMemo({ storage, location: "/cache/{country}.json", dataTemplate });
    await memo.set("/data/France/OVH/info.json", { mtimeMs: 1, size: 1 }, [{ phone: "old" }]);

    const live = await storage.stat("/data/France/OVH/info.json");
    expect(await memo.get("/data/France/OVH/info.json", live)).toBeNull();
  });

  it("should treat a corrupt shard as empty and report it", async () => {
    await storage.write("/cache/France.json", bytes("{ not json"));
    const events = new RecordingSink();
    const memo = new PersistentMemo({ storage, location: "/cache/{country}.json", dataTemplate, events });

    const stamp = await storage.stat("/data/France/OVH/info.json");
    expect(await memo.get("/data/France/OVH/info.json", stamp)).toBeNull();
    expect(events.ofType("cache.corrupt").map((event) => event.path)).toEqual(["/cache/France.json"]);

    // The shard is rewritten in a valid layout on the next flush
    await memo.flush();
    expect(JSON.parse(await text(storage, "/cache/France.json"))).toEqual({ version: 1, entries: [] });
  });

  it("should report a shard with an unexpected layout", async () => {
    await storage.write("/cache/France.json", bytes('{"version":2,"entries":[]}'));
    const events = new RecordingSink();
    const memo = new PersistentMemo({ storage, location: "/cache/{country}.json", dataTemplate, events });

    await memo.get("/data/France/OVH/info.json", { mtimeMs: 1, size: 1 });
    expect(events.ofType("cache.corrupt")).toEqual([
      { type: "cache.corrupt", path: "/cache/France.json", reason: "unexpected shard layout" },
    ]);
  });

  it("should drop deleted entries from the shard", async () => {
    const memo = new PersistentMemo({ storage, location: "/cache/all.json" });
    await memo.set("/a", { mtimeMs: 1, size: 1 }, [{ x: 1 }]);
    await memo.set("/b", { mtimeMs: 1, size: 1 }, [{ x: 2 }]);
    await memo.delete("/a");
    await memo.flush();

    const shard = JSON.parse(await text(storage, "/cache/all.json"));
    expect(shard.entries.map((entry: { path: string }) => entry.path)).toEqual(["/b"]);
  });
});
