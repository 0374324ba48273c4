import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { SkippedItem } from "./types.js";

const identifier = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim());

const year = z.union([z.string(), z.number()]).nullish();

export const literatureRecordSchema = z.object({
  pmid: identifier.nullish(),
  pmcid: z.string().nullish(),
  doi: z.string().nullish(),
  title: z.string().nullish(),
  abstract: z.string().nullish(),
  journal: z.string().nullish(),
  year,
  mesh_terms: z.array(z.string()).default([]),
  pub_types: z.array(z.string()).default([]),
  clean_text: z.string().nullish(),
  fulltext: z.string().nullish(),
  pdf_url: z.string().nullish(),
  source_type: z.literal("pubmed_guideline").default("pubmed_guideline"),
});

export const guidelineRecordSchema = z.object({
  guideline_name: z.string().nullish(),
  year,
  text: z.string().default(""),
  source_type: z.enum(["guideline_pdf", "dataset_guideline"]).default("guideline_pdf"),
  file_name: z.string().nullish(),
  url: z.string().nullish(),
  pmid: identifier.nullish(),
  journal: z.string().nullish(),
  doi: z.string().nullish(),
  source_tag: z.string().nullish(),
});

export type LiteratureRecord = z.infer<typeof literatureRecordSchema>;
export type GuidelineRecord = z.infer<typeof guidelineRecordSchema>;

export interface JsonlReadResult<T> {
  records: T[];
  skipped: SkippedItem[];
  /** True when the file does not exist; the source then contributes nothing. */
  missing: boolean;
  lines: number;
}

/**
 * Reads a line-delimited JSON file. Blank lines are ignored; lines that fail to
 * parse or validate are skipped and reported, never thrown.
 */
export async function readJsonl<S extends z.ZodTypeAny>(
  filePath: string,
  schema: S,
): Promise<JsonlReadResult<z.output<S>>> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) {
      return { records: [], skipped: [], missing: true, lines: 0 };
    }
    throw err;
  }

  const records: z.output<S>[] = [];
  const skipped: SkippedItem[] = [];
  const lines = content.split(/\r?\n/);
  let counted = 0;

  lines.forEach((line, i) => {
    const trimmed = line.trim();
    if (!trimmed) return;
    counted++;
    const ref = `line ${i + 1}`;

    let json: unknown;
    try {
      json = JSON.parse(trimmed);
    } catch (err) {
      skipped.push({ ref, reason: `invalid JSON (${err instanceof Error ? err.message : String(err)})` });
      return;
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue?.path.join(".") || "record";
      skipped.push({ ref, reason: `invalid record (${where}: ${issue?.message ?? "unknown"})` });
      return;
    }
    records.push(parsed.data);
  });

  return { records, skipped, missing: false, lines: counted };
}

export async function writeJsonl(filePath: string, records: readonly object[]): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  const body = records.map((r) => JSON.stringify(r)).join("\n");
  await writeFile(filePath, records.length > 0 ? `${body}\n` : "", "utf-8");
}

export function resolveLiteratureText(record: LiteratureRecord): string {
  const text =
    record.clean_text ||
    record.fulltext ||
    `${record.title ?? ""}\n\n${record.abstract ?? ""}`;
  return text.trim();
}

export function resolveGuidelineText(record: GuidelineRecord): string {
  return record.text.trim();
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
