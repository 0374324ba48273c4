import { describe, it, expect } from "vitest";
import { logStageReport } from "../../src/ingest/report.js";

describe("logStageReport", () => {
  it("summarizes skips by reason and lists them", () => {
    const lines: string[] = [];

    logStageReport((msg) => lines.push(msg), {
      stage: "pdfs",
      read: 3,
      written: 1,
      skipped: [
        { ref: "PMID 1", reason: "download failed (timeout)" },
        { ref: "PMID 2", reason: "download failed (HTTP 403)" },
      ],
      output: "/data/guidelines.jsonl",
    });

    expect(lines).toEqual([
      "[pdfs] read 3, wrote 1, skipped 2 -> /data/guidelines.jsonl",
      "[pdfs]   2 x download failed",
      "[pdfs]   skip PMID 1: download failed (timeout)",
      "[pdfs]   skip PMID 2: download failed (HTTP 403)",
    ]);
  });

  it("truncates long skip lists", () => {
    const lines: string[] = [];
    const skipped = Array.from({ length: 12 }, (_, i) => ({ ref: `line ${i + 1}`, reason: "empty text" }));

    logStageReport((msg) => lines.push(msg), { stage: "dataset", read: 12, written: 0, skipped, output: null });

    expect(lines[0]).toBe("[dataset] read 12, wrote 0, skipped 12");
    expect(lines[1]).toBe("[dataset]   12 x empty text");
    expect(lines).toHaveLength(13);
    expect(lines[12]).toBe("[dataset]   ... 2 more");
  });
});
