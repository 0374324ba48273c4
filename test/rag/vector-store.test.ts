import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { openVectorIndex, splitStoredMetadata } from "../../src/rag/vector-store.js";
import type { IndexedEntry } from "../../src/rag/types.js";

function entry(id: string, vector: number[], document = `text ${id}`): IndexedEntry {
  return { id, vector, document, metadata: { source_type: "guideline_pdf", chunk_index: 0 } };
}

describe("openVectorIndex", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "rag-vectors-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("returns nothing from a collection that was never written", async () => {
    const index = await openVectorIndex(dir, "empty");

    expect(await index.query([1, 0], 5)).toEqual([]);
    expect(await index.count()).toBe(0);
  });

  it("returns the nearest entries first with cosine distances", async () => {
    const index = await openVectorIndex(dir, "ranked");
    await index.upsert([entry("far", [0, 1]), entry("near", [1, 0]), entry("mid", [1, 1])]);

    const matches = await index.query([1, 0], 2);

    expect(matches.map((m) => m.id)).toEqual(["near", "mid"]);
    expect(matches[0]?.distance).toBeCloseTo(0, 6);
    expect(matches[1]?.distance).toBeCloseTo(1 - Math.SQRT1_2, 6);
    expect(matches[0]?.document).toBe("text near");
    expect(matches[0]?.metadata).toEqual({ source_type: "guideline_pdf", chunk_index: 0 });
  });

  it("overwrites an entry written again under the same id", async () => {
    const index = await openVectorIndex(dir, "upsert");
    await index.upsert([entry("a", [1, 0], "first")]);
    await index.upsert([entry("a", [1, 0], "second"), entry("b", [0, 1])]);

    expect(await index.count()).toBe(2);
    const [top] = await index.query([1, 0], 1);
    expect(top?.document).toBe("second");
  });

  it("persists entries for a later open", async () => {
    const first = await openVectorIndex(dir, "persisted");
    await first.upsert([entry("a", [1, 0])]);

    const second = await openVectorIndex(dir, "persisted");

    expect(await second.count()).toBe(1);
  });

  it("drops everything on reset", async () => {
    const index = await openVectorIndex(dir, "reset");
    await index.upsert([entry("a", [1, 0])]);

    await index.reset();

    expect(await index.count()).toBe(0);
    expect(await index.query([1, 0], 3)).toEqual([]);
    await index.upsert([entry("b", [0, 1])]);
    expect(await index.count()).toBe(1);
  });

  it("returns nothing for a non-positive topK", async () => {
    const index = await openVectorIndex(dir, "topk");
    await index.upsert([entry("a", [1, 0])]);

    expect(await index.query([1, 0], 0)).toEqual([]);
  });
});

describe("splitStoredMetadata", () => {
  it("separates the document from scalar metadata", () => {
    expect(
      splitStoredMetadata({ document: "body", title: "T", year: 2020, flag: true, nested: { x: 1 } }),
    ).toEqual({ document: "body", metadata: { title: "T", year: 2020, flag: true } });
  });
});
