import { readdir } from "node:fs/promises";
import path from "node:path";
import type { RagConfig } from "../rag/config.js";
import { errorMessage } from "../rag/errors.js";
import { extractPdfText } from "../rag/pdf-extractor.js";
import type { GuidelineRecord } from "../rag/records.js";
import type { Log, SkippedItem } from "../rag/types.js";
import { writeGuidelineRecords } from "./guideline-output.js";
import type { StageReport } from "./report.js";

interface NamingRule {
  /** Every keyword must appear in the lower-cased file name. */
  keywords: string[];
  name: string;
  year: string | null;
}

export const GUIDELINE_NAMING_RULES: NamingRule[] = [
  { keywords: ["nccn", "cns"], name: "NCCN Guidelines: Central Nervous System Cancers", year: "2024" },
  { keywords: ["eano", "glioma"], name: "EANO guideline for diffuse/malignant glioma", year: null },
  { keywords: ["esmo", "glioma"], name: "ESMO Clinical Practice Guideline for high-grade glioma", year: null },
];

export function nameGuideline(fileName: string): { name: string; year: string | null } {
  const lower = fileName.toLowerCase();
  const rule = GUIDELINE_NAMING_RULES.find((r) => r.keywords.every((k) => lower.includes(k)));
  return rule ? { name: rule.name, year: rule.year } : { name: fileName, year: null };
}

export async function listPdfFiles(dir: string): Promise<string[] | null> {
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw err;
  }
  return entries.filter((f) => f.toLowerCase().endsWith(".pdf")).sort();
}

export interface GuidelinePdfStageOptions {
  dir?: string;
  output?: string;
  append?: boolean;
}

/** Extracts the text of each guideline PDF in the guideline directory. */
export async function runGuidelinePdfStage(
  config: RagConfig,
  log: Log,
  options: GuidelinePdfStageOptions = {},
  extract: (filePath: string) => Promise<string> = extractPdfText,
): Promise<StageReport> {
  const dir = options.dir ?? config.paths.guidelinePdfDir;
  const output = options.output ?? config.paths.guidelinesFile;

  const files = await listPdfFiles(dir);
  if (files === null) {
    log(`[guidelines] directory not found, skipping: ${dir}`);
    return { stage: "guidelines", read: 0, written: 0, skipped: [], output: null };
  }

  const records: GuidelineRecord[] = [];
  const skipped: SkippedItem[] = [];

  for (const fileName of files) {
    const { name, year } = nameGuideline(fileName);
    log(`[guidelines] processing ${fileName} -> ${name}`);

    let text: string;
    try {
      text = (await extract(path.join(dir, fileName))).trim();
    } catch (err) {
      skipped.push({ ref: fileName, reason: `text extraction failed (${errorMessage(err)})` });
      continue;
    }
    if (!text) {
      skipped.push({ ref: fileName, reason: "empty text" });
      continue;
    }

    records.push({
      guideline_name: name,
      year,
      text,
      source_type: "guideline_pdf",
      file_name: fileName,
    });
  }

  if (records.length === 0) {
    return { stage: "guidelines", read: files.length, written: 0, skipped, output: null };
  }
  const written = await writeGuidelineRecords(output, records, options.append ?? false);
  return { stage: "guidelines", read: files.length, written, skipped, output };
}
