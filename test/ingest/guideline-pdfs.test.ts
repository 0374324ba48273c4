import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { writeGuidelineRecords } from "../../src/ingest/guideline-output.js";
import { listPdfFiles, nameGuideline, runGuidelinePdfStage } from "../../src/ingest/guideline-pdfs.js";
import { guidelineRecordSchema, readJsonl, type GuidelineRecord } from "../../src/rag/records.js";
import { testConfig } from "../helpers/fakes.js";

describe("nameGuideline", () => {
  it("names known guideline families from the file name", () => {
    expect(nameGuideline("NCCN_CNS_v1.2024.pdf")).toEqual({
      name: "NCCN Guidelines: Central Nervous System Cancers",
      year: "2024",
    });
    expect(nameGuideline("eano-glioma-guideline.pdf")).toEqual({
      name: "EANO guideline for diffuse/malignant glioma",
      year: null,
    });
    expect(nameGuideline("ESMO_High_Grade_Glioma.pdf").name).toBe(
      "ESMO Clinical Practice Guideline for high-grade glioma",
    );
  });

  it("falls back to the file name", () => {
    expect(nameGuideline("local-protocol.pdf")).toEqual({ name: "local-protocol.pdf", year: null });
  });
});

describe("guideline PDF stage", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "rag-guidelines-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reports a missing directory", async () => {
    expect(await listPdfFiles(path.join(dir, "absent"))).toBeNull();

    const report = await runGuidelinePdfStage(testConfig({}, dir), () => {});
    expect(report).toEqual({ stage: "guidelines", read: 0, written: 0, skipped: [], output: null });
  });

  it("extracts each PDF and names it", async () => {
    const config = testConfig({}, dir);
    const pdfDir = config.paths.guidelinePdfDir;
    await mkdir(pdfDir, { recursive: true });
    for (const name of ["NCCN_CNS_2024.pdf", "eano-glioma.PDF", "blank.pdf", "broken.pdf", "notes.txt"]) {
      await writeFile(path.join(pdfDir, name), "placeholder");
    }
    const extract = async (filePath: string): Promise<string> => {
      const name = path.basename(filePath);
      if (name === "broken.pdf") throw new Error("corrupt xref");
      if (name === "blank.pdf") return "\n";
      return ` Text of ${name} `;
    };

    const report = await runGuidelinePdfStage(config, () => {}, {}, extract);

    expect(report).toEqual({
      stage: "guidelines",
      read: 4,
      written: 2,
      skipped: [
        { ref: "blank.pdf", reason: "empty text" },
        { ref: "broken.pdf", reason: "text extraction failed (corrupt xref)" },
      ],
      output: config.paths.guidelinesFile,
    });
    const written = await readJsonl(config.paths.guidelinesFile, guidelineRecordSchema);
    expect(written.records).toEqual([
      {
        guideline_name: "NCCN Guidelines: Central Nervous System Cancers",
        year: "2024",
        text: "Text of NCCN_CNS_2024.pdf",
        source_type: "guideline_pdf",
        file_name: "NCCN_CNS_2024.pdf",
      },
      {
        guideline_name: "EANO guideline for diffuse/malignant glioma",
        year: null,
        text: "Text of eano-glioma.PDF",
        source_type: "guideline_pdf",
        file_name: "eano-glioma.PDF",
      },
    ]);
  });
});

describe("writeGuidelineRecords", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "rag-guideline-out-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const record = (fileName: string, text: string): GuidelineRecord => ({
    file_name: fileName,
    text,
    source_type: "guideline_pdf",
  });

  it("overwrites the output by default", async () => {
    const output = path.join(dir, "guidelines.jsonl");
    await writeGuidelineRecords(output, [record("a.pdf", "old")], false);

    await writeGuidelineRecords(output, [record("b.pdf", "new")], false);

    const result = await readJsonl(output, guidelineRecordSchema);
    expect(result.records.map((r) => r.file_name)).toEqual(["b.pdf"]);
  });

  it("merges by file name when appending", async () => {
    const output = path.join(dir, "guidelines.jsonl");
    await writeGuidelineRecords(output, [record("a.pdf", "keep"), record("b.pdf", "stale")], false);

    const count = await writeGuidelineRecords(
      output,
      [record("b.pdf", "fresh"), record("c.pdf", "added")],
      true,
    );

    expect(count).toBe(2);
    const result = await readJsonl(output, guidelineRecordSchema);
    expect(result.records.map((r) => [r.file_name, r.text])).toEqual([
      ["a.pdf", "keep"],
      ["b.pdf", "fresh"],
      ["c.pdf", "added"],
    ]);
  });
});
