import { z } from "zod";
import type { RagConfig } from "../rag/config.js";
import { readJsonl, type GuidelineRecord } from "../rag/records.js";
import type { Log, SkippedItem } from "../rag/types.js";
import { writeGuidelineRecords } from "./guideline-output.js";
import type { StageReport } from "./report.js";

export const BRAIN_TUMOUR_KEYWORDS = [
  "glioblastoma",
  "gbm",
  "glioma",
  "anaplastic glioma",
  "brain tumour",
  "brain tumor",
  "malignant glioma",
  "central nervous system tumour",
  "central nervous system tumor",
  "cns tumour",
  "cns tumor",
];

export const datasetRowSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String).nullish(),
  source: z.string().nullish(),
  title: z.string().nullish(),
  url: z.string().nullish(),
  raw_text: z.string().nullish(),
  clean_text: z.string().nullish(),
});

export type DatasetRow = z.infer<typeof datasetRowSchema>;

export function isBrainTumourRelated(title: string, text: string): boolean {
  const t = title.toLowerCase();
  const body = text.toLowerCase();
  return BRAIN_TUMOUR_KEYWORDS.some((k) => t.includes(k) || body.includes(k));
}

export function toGuidelineRecord(row: DatasetRow): GuidelineRecord {
  return {
    guideline_name: row.title || row.id,
    year: null,
    text: (row.clean_text || row.raw_text || "").trim(),
    source_type: "dataset_guideline",
    file_name: row.id,
    url: row.url,
    source_tag: row.source,
  };
}

export interface DatasetStageOptions {
  input?: string;
  output?: string;
  append?: boolean;
}

/** Filters the curated guideline dataset down to brain-tumour guidelines. */
export async function runDatasetStage(
  config: RagConfig,
  log: Log,
  options: DatasetStageOptions = {},
): Promise<StageReport> {
  const input = options.input ?? config.paths.datasetFile;
  const output = options.output ?? config.paths.guidelinesFile;

  const source = await readJsonl(input, datasetRowSchema);
  if (source.missing) {
    log(`[dataset] input not found, skipping: ${input}`);
    return { stage: "dataset", read: 0, written: 0, skipped: [], output: null };
  }
  log(`[dataset] ${source.lines} line(s) read from ${input}`);

  const skipped: SkippedItem[] = [...source.skipped];
  const selected: GuidelineRecord[] = [];

  for (const row of source.records) {
    const ref = row.id ?? row.title ?? "row";
    const text = row.clean_text || row.raw_text || "";
    if (!text.trim()) {
      skipped.push({ ref, reason: "empty text" });
      continue;
    }
    if (!isBrainTumourRelated(row.title ?? "", text)) {
      skipped.push({ ref, reason: "not brain-tumour related" });
      continue;
    }
    selected.push(toGuidelineRecord(row));
  }

  log(`[dataset] ${selected.length} brain-tumour guideline(s) selected`);
  if (selected.length === 0) {
    return { stage: "dataset", read: source.lines, written: 0, skipped, output: null };
  }

  const written = await writeGuidelineRecords(output, selected, options.append ?? false);
  return { stage: "dataset", read: source.lines, written, skipped, output };
}
