import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { SelectionEngine, compareNewestFirst } from "../src/core/selection.js";
import { SourceError } from "../src/errors.js";
import { JsonDedupStore } from "../src/state/json.js";
import type { DedupStore, MediaCandidate, MediaSource } from "../src/types.js";
import { MemoryDedupStore, StaticSource, candidate } from "./helpers.js";

async function preparedEngine(store: DedupStore = new MemoryDedupStore()): Promise<SelectionEngine> {
  const engine = new SelectionEngine(store);
  await engine.prepare();
  return engine;
}

describe("compareNewestFirst", () => {
  it("orders by modification time, newest first, then by name", () => {
    const items = [
      candidate("b.mp4", "2024-02-01T00:00:00Z"),
      candidate("c.mp4", "2024-03-01T00:00:00Z"),
      candidate("a.mp4", "2024-02-01T00:00:00Z"),
    ];

    expect([...items].sort(compareNewestFirst).map((item) => item.name)).toEqual([
      "c.mp4",
      "a.mp4",
      "b.mp4",
    ]);
  });
});

describe("SelectionEngine", () => {
  it("selects the newest unposted candidate", async () => {
    const source = new StaticSource([
      candidate("old.mp4", "2024-01-01T00:00:00Z"),
      candidate("new.mp4", "2024-03-01T00:00:00Z"),
      candidate("mid.mp4", "2024-02-01T00:00:00Z"),
    ]);
    const engine = await preparedEngine();

    const { candidates, selected } = await engine.selectNext(source, 1);

    expect(candidates.map((item) => item.name)).toEqual(["new.mp4", "mid.mp4", "old.mp4"]);
    expect(selected.map((item) => item.name)).toEqual(["new.mp4"]);
  });

  it("skips candidates already recorded as posted", async () => {
    const store = new MemoryDedupStore();
    await store.recordPosted(candidate("new.mp4", "2024-03-01T00:00:00Z"), "p-1");
    const engine = await preparedEngine(store);
    const source = new StaticSource([
      candidate("new.mp4", "2024-03-01T00:00:00Z"),
      candidate("mid.mp4", "2024-02-01T00:00:00Z"),
      candidate("old.mp4", "2024-01-01T00:00:00Z"),
    ]);

    const newest = candidate("new.mp4", "2024-03-01T00:00:00Z");
    expect(engine.isPosted(newest)).toBe(true);

    const { selected } = await engine.selectNext(source, 2);
    expect(selected.map((item) => item.name)).toEqual(["mid.mp4", "old.mp4"]);
  });

  it("returns every unposted candidate without a limit and none for a zero limit", async () => {
    const source = new StaticSource([
      candidate("a.mp4", "2024-01-01T00:00:00Z"),
      candidate("b.mp4", "2024-01-02T00:00:00Z"),
    ]);
    const engine = await preparedEngine();

    expect((await engine.selectNext(source)).selected.map((item) => item.name)).toEqual([
      "b.mp4",
      "a.mp4",
    ]);
    expect((await engine.selectNext(source, 0)).selected).toEqual([]);
  });

  it("returns nothing when every candidate was posted", async () => {
    const store = new MemoryDedupStore();
    const only = candidate("a.mp4", "2024-01-01T00:00:00Z");
    await store.recordPosted(only, "p-1");
    const engine = await preparedEngine(store);

    const { candidates, selected } = await engine.selectNext(new StaticSource([only]), 5);

    expect(candidates).toHaveLength(1);
    expect(selected).toEqual([]);
  });

  it("picks one candidate per name when the store keys by name", async () => {
    const tempDir = await mkdtemp(path.join(os.tmpdir(), "selection-test-"));
    try {
      const store = new JsonDedupStore({ jsonPath: path.join(tempDir, "posted.json") });
      await store.init();
      const engine = await preparedEngine(store);
      const source = new StaticSource([
        candidate("clip.mp4", "2024-03-01T00:00:00Z", { handle: "a/clip.mp4" }),
        candidate("clip.mp4", "2024-02-01T00:00:00Z", { handle: "b/clip.mp4" }),
        candidate("other.mp4", "2024-01-01T00:00:00Z"),
      ]);

      const { selected } = await engine.selectNext(source, 3);

      expect(selected.map((item) => item.handle)).toEqual(["a/clip.mp4", "other.mp4"]);
    } finally {
      await rm(tempDir, { recursive: true, force: true });
    }
  });

  it("always offers the single item of a source that cannot enumerate", async () => {
    const store = new MemoryDedupStore();
    const shared = candidate("shared.mp4", "2024-01-01T00:00:00Z", {
      sourceKind: "mega",
      handle: null,
    });
    await store.recordPosted(shared, "p-1");
    const engine = await preparedEngine(store);
    const source = new StaticSource([shared], { kind: "mega", enumerable: false });

    const { selected } = await engine.selectNext(source, 1);

    expect(selected.map((item) => item.name)).toEqual(["shared.mp4"]);
  });

  it("does not record posts for a source that cannot enumerate", async () => {
    const store = new MemoryDedupStore();
    const engine = await preparedEngine(store);
    const shared = candidate("shared.mp4", "2024-01-01T00:00:00Z", { sourceKind: "mega" });
    const source = new StaticSource([shared], { kind: "mega", enumerable: false });

    expect(await engine.recordPosted(source, shared, "p-9")).toBe(false);
    expect(store.recordCalls).toBe(0);
  });

  it("records a post once and treats repeats as no-ops", async () => {
    const store = new MemoryDedupStore();
    const engine = await preparedEngine(store);
    const source = new StaticSource([]);
    const item = candidate("a.mp4", "2024-01-01T00:00:00Z");

    expect(await engine.recordPosted(source, item, "p-1")).toBe(true);
    expect(await engine.recordPosted(source, item, "p-2")).toBe(false);

    expect(engine.isPosted(item)).toBe(true);
    expect(store.recordCalls).toBe(1);
    expect(await store.listRecords()).toEqual([
      {
        sourceKind: "local",
        handle: "a.mp4",
        name: "a.mp4",
        postId: "p-1",
        postedAt: "2024-01-01T00:00:00.000Z",
      },
    ]);
  });

  it("wraps enumeration failures in SourceError", async () => {
    const failing: MediaSource = {
      kind: "google-drive",
      canEnumerate: () => true,
      listCandidates: async (): Promise<MediaCandidate[]> => {
        throw new Error("quota exceeded");
      },
      download: async () => {
        throw new Error("unused");
      },
    };
    const engine = await preparedEngine();

    await expect(engine.selectNext(failing)).rejects.toBeInstanceOf(SourceError);
    await expect(engine.selectNext(failing)).rejects.toThrow(
      "Cannot list google-drive candidates: quota exceeded",
    );
  });

  it("refuses to select before prepare", async () => {
    const engine = new SelectionEngine(new MemoryDedupStore());

    expect(() => engine.isPosted(candidate("a.mp4", "2024-01-01T00:00:00Z"))).toThrow(
      "prepare()",
    );
  });
});
