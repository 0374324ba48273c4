import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { buildIndex } from "../../src/rag/indexer.js";
import { createRagPipeline } from "../../src/rag/pipeline.js";
import { loadSources } from "../../src/rag/sources.js";
import type { RecordCollection } from "../../src/rag/types.js";
import {
  InMemoryVectorIndex,
  KeywordEmbedder,
  RecordingGenerator,
  testConfig,
} from "../helpers/fakes.js";

describe("RAG pipeline", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "rag-pipeline-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("ranks the full-text record first for a question about its content", async () => {
    const config = testConfig({}, dir);
    const embedder = new KeywordEmbedder();
    const index = new InMemoryVectorIndex();
    const generator = new RecordingGenerator();
    const literature: RecordCollection = {
      family: "literature",
      records: [
        {
          pmid: "1001",
          title: "Standard therapy",
          abstract: "Short summary.",
          clean_text: "Temozolomide with radiotherapy is standard after resection.",
          year: 2020,
          mesh_terms: [],
          pub_types: ["Guideline"],
          source_type: "pubmed_guideline",
        },
        {
          pmid: "1002",
          title: "Imaging surveillance",
          abstract: "MRI imaging surveillance schedule.",
          year: 2019,
          mesh_terms: [],
          pub_types: [],
          source_type: "pubmed_guideline",
        },
      ],
    };

    await buildIndex([literature], {
      chunkSize: config.rag.chunkSize,
      chunkOverlap: config.rag.chunkOverlap,
      embedder,
      index,
    });
    const pipeline = await createRagPipeline(config, { embedder, index, generator });

    const { answer, sources } = await pipeline.answerQuestion(
      "Is temozolomide given with radiotherapy?",
      2,
    );

    expect(answer).toBe("test answer [source_1]");
    expect(sources.map((s) => s.metadata["pmid"])).toEqual(["1001", "1002"]);
    expect(sources[0]?.metadata["has_fulltext"]).toBe(true);
    expect(generator.prompts).toHaveLength(1);
    expect(generator.prompts[0]).toContain(
      "[source_1] PubMed PMID 1001 (2020) - Standard therapy\n" +
        "Temozolomide with radiotherapy is standard after resection.\n\n" +
        "[source_2] PubMed PMID 1002 (2019) - Imaging surveillance\n" +
        "Imaging surveillance\n\nMRI imaging surveillance schedule.",
    );
    expect(generator.prompts[0]).toContain("Question: Is temozolomide given with radiotherapy?");
  });

  it("indexes nothing when both input files are absent", async () => {
    const config = testConfig({}, dir);
    const index = new InMemoryVectorIndex();
    const embedder = new KeywordEmbedder();
    const lines: string[] = [];

    const sources = await loadSources(config.paths, (msg) => lines.push(msg));
    const report = await buildIndex(sources.collections, {
      chunkSize: config.rag.chunkSize,
      chunkOverlap: config.rag.chunkOverlap,
      embedder,
      index,
    });

    expect(report.chunks).toBe(0);
    expect(await index.count()).toBe(0);
    expect(embedder.calls).toEqual([]);
    expect(lines).toEqual([
      `sources: file not found, skipping: ${config.paths.literatureFile}`,
      `sources: file not found, skipping: ${config.paths.guidelinesFile}`,
    ]);
  });

  it("answers from an empty collection with an empty-context prompt", async () => {
    const config = testConfig({}, dir);
    const generator = new RecordingGenerator("The retrieved evidence is insufficient.");
    const pipeline = await createRagPipeline(config, {
      embedder: new KeywordEmbedder(),
      generator,
    });

    const result = await pipeline.answerQuestion("What about MGMT?");

    expect(result).toEqual({ answer: "The retrieved evidence is insufficient.", sources: [] });
    expect(await pipeline.chunkCount()).toBe(0);
    expect(generator.prompts[0]).toContain("Question: What about MGMT?");
    expect(generator.prompts[0]?.endsWith("excerpts below:\n")).toBe(true);
  });

  it("uses the configured topK by default", async () => {
    const config = testConfig({ rag: { topK: 1 } }, dir);
    const index = new InMemoryVectorIndex();
    const embedder = new KeywordEmbedder();
    await index.upsert([
      { id: "x", vector: [1, 0, 0, 0, 0, 0, 0.01], document: "x", metadata: {} },
      { id: "y", vector: [0, 1, 0, 0, 0, 0, 0.01], document: "y", metadata: {} },
    ]);
    const pipeline = await createRagPipeline(config, { embedder, index, generator: new RecordingGenerator() });

    const { sources } = await pipeline.answerQuestion("temozolomide");

    expect(sources).toHaveLength(1);
    expect(sources[0]?.text).toBe("x");
  });

  it("propagates generation failures", async () => {
    const pipeline = await createRagPipeline(testConfig({}, dir), {
      embedder: new KeywordEmbedder(),
      index: new InMemoryVectorIndex(),
      generator: {
        model: "broken",
        generate: () => Promise.reject(new Error("generation unavailable")),
      },
    });

    await expect(pipeline.answerQuestion("q")).rejects.toThrow("generation unavailable");
  });
});
