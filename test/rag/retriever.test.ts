import { beforeEach, describe, it, expect } from "vitest";
import { retrieve } from "../../src/rag/retriever.js";
import { InMemoryVectorIndex, KeywordEmbedder, embedKeywords } from "../helpers/fakes.js";

const documents: Record<string, string> = {
  a: "Temozolomide with radiotherapy after resection.",
  b: "MGMT promoter methylation predicts temozolomide benefit.",
  c: "Bevacizumab at recurrence.",
  d: "Imaging surveillance every three months.",
};

describe("retrieve", () => {
  let index: InMemoryVectorIndex;
  const embedder = new KeywordEmbedder();

  beforeEach(async () => {
    index = new InMemoryVectorIndex();
    await index.upsert(
      Object.entries(documents).map(([id, text]) => ({
        id,
        vector: embedKeywords(text),
        document: text,
        metadata: { source_type: "guideline_pdf", file_name: `${id}.pdf` },
      })),
    );
  });

  it("returns at most topK results, nearest first", async () => {
    const results = await retrieve("temozolomide and radiotherapy", 2, { embedder, index });

    expect(results).toHaveLength(2);
    expect(results[0]?.text).toBe(documents["a"]);
    expect(results[0]?.metadata["file_name"]).toBe("a.pdf");
    expect(results[0]?.distance).toBeCloseTo(0, 6);
    expect(results[1]?.text).toBe(documents["b"]);
  });

  it("orders results by non-decreasing distance", async () => {
    const results = await retrieve("bevacizumab imaging", 4, { embedder, index });

    expect(results).toHaveLength(4);
    for (let i = 1; i < results.length; i++) {
      expect(results[i]?.distance ?? 0).toBeGreaterThanOrEqual(results[i - 1]?.distance ?? 0);
    }
  });

  it("returns fewer results when the collection is small", async () => {
    expect(await retrieve("mgmt", 10, { embedder, index })).toHaveLength(4);
  });

  it("returns nothing for an empty collection", async () => {
    expect(await retrieve("mgmt", 5, { embedder, index: new InMemoryVectorIndex() })).toEqual([]);
  });
});
