import { createHash } from "node:crypto";
import { access, mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { RagConfig } from "../rag/config.js";
import { errorMessage } from "../rag/errors.js";
import { ensureOk, fetchWithTimeout, readBody } from "../rag/http.js";
import { extractPdfText } from "../rag/pdf-extractor.js";
import {
  literatureRecordSchema,
  readJsonl,
  type GuidelineRecord,
  type LiteratureRecord,
} from "../rag/records.js";
import type { Log, SkippedItem } from "../rag/types.js";
import type { StageReport } from "./report.js";
import { writeGuidelineRecords } from "./guideline-output.js";

export type DownloadOutcome =
  | { status: "saved"; path: string }
  | { status: "not-pdf"; contentType: string };

export interface PdfStageDeps {
  extract?: (filePath: string) => Promise<string>;
  download?: (url: string, destPath: string) => Promise<DownloadOutcome>;
}

export interface PdfStageOptions {
  input?: string;
  output?: string;
  /** Keep guideline records already in the output file. */
  append?: boolean;
}

/** Keeps letters, digits, `_`, `.` and `-`; spaces become `_`. */
export function safeFilename(name: string): string {
  return name.trim().replace(/ /g, "_").replace(/[^0-9A-Za-z_.-]/g, "");
}

/**
 * Local file name for a record's PDF: the PMID, else the DOI, else a hash of
 * the download URL, so records with different identifiers never share a file.
 */
export function pdfFileName(record: LiteratureRecord, url: string): string {
  if (record.pmid) return safeFilename(`${record.pmid}.pdf`);
  if (record.doi) return safeFilename(`doi-${record.doi.replace(/\//g, "_")}.pdf`);
  return `url-${createHash("sha256").update(url).digest("hex").slice(0, 16)}.pdf`;
}

function recordRef(record: LiteratureRecord, url: string | null): string {
  if (record.pmid) return `PMID ${record.pmid}`;
  if (record.doi) return `DOI ${record.doi}`;
  return url ?? record.title ?? "record without identifier";
}

/** An explicit `pdf_url` wins; otherwise the DOI resolver. */
export function guessPdfUrl(record: LiteratureRecord): string | null {
  if (record.pdf_url) return record.pdf_url;
  if (record.doi) return `https://doi.org/${record.doi}`;
  return null;
}

/**
 * Downloads `url`, following redirects. A response that is not a PDF is an
 * expected outcome, reported as `not-pdf` and nothing is written.
 */
export async function downloadPdf(
  url: string,
  destPath: string,
  timeoutMs: number,
): Promise<DownloadOutcome> {
  const options = { service: "download" as const, timeoutMs };
  const res = await fetchWithTimeout(url, { method: "GET", redirect: "follow" }, options);
  await ensureOk(res, options);

  const contentType = res.headers.get("content-type") ?? "";
  if (!contentType.toLowerCase().includes("pdf")) {
    return { status: "not-pdf", contentType };
  }

  await mkdir(path.dirname(destPath), { recursive: true });
  const body = await readBody(() => res.arrayBuffer(), options);
  await writeFile(destPath, Buffer.from(body));
  return { status: "saved", path: destPath };
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * For every literature record with a PDF link or DOI, downloads the article PDF
 * (reusing one already on disk), extracts its text and writes it as a
 * guideline record.
 */
export async function runPdfStage(
  config: RagConfig,
  log: Log,
  options: PdfStageOptions = {},
  deps: PdfStageDeps = {},
): Promise<StageReport> {
  const input = options.input ?? config.paths.literatureFile;
  const output = options.output ?? config.paths.guidelinesFile;
  const extract = deps.extract ?? extractPdfText;
  const download =
    deps.download ?? ((url: string, dest: string) => downloadPdf(url, dest, config.llm.timeoutMs));

  const source = await readJsonl(input, literatureRecordSchema);
  if (source.missing) {
    log(`[pdfs] input not found, skipping: ${input}`);
    return { stage: "pdfs", read: 0, written: 0, skipped: [], output: null };
  }
  log(`[pdfs] loaded ${source.records.length} literature record(s) from ${input}`);

  const collected: GuidelineRecord[] = [];
  const skipped: SkippedItem[] = [...source.skipped];

  for (const record of source.records) {
    const url = guessPdfUrl(record);
    const ref = recordRef(record, url);
    if (!url) {
      skipped.push({ ref, reason: "no pdf_url or doi" });
      continue;
    }

    const fileName = pdfFileName(record, url);
    const pdfPath = path.join(config.paths.articlePdfDir, fileName);

    if (!(await fileExists(pdfPath))) {
      log(`[pdfs] trying ${url}`);
      let outcome: DownloadOutcome;
      try {
        outcome = await download(url, pdfPath);
      } catch (err) {
        skipped.push({ ref, reason: `download failed (${errorMessage(err)})` });
        continue;
      }
      if (outcome.status === "not-pdf") {
        skipped.push({ ref, reason: `not a PDF (Content-Type=${outcome.contentType || "none"})` });
        continue;
      }
    }

    let text: string;
    try {
      text = (await extract(pdfPath)).trim();
    } catch (err) {
      skipped.push({ ref, reason: `text extraction failed (${errorMessage(err)})` });
      continue;
    }
    if (!text) {
      skipped.push({ ref, reason: "empty text" });
      continue;
    }

    collected.push({
      guideline_name: record.title,
      year: record.year,
      text,
      source_type: "guideline_pdf",
      file_name: fileName,
      pmid: record.pmid,
      journal: record.journal,
      doi: record.doi,
      url,
    });
  }

  if (collected.length === 0) {
    log("[pdfs] no full-text records collected, nothing written");
    return { stage: "pdfs", read: source.records.length, written: 0, skipped, output: null };
  }

  const written = await writeGuidelineRecords(output, collected, options.append ?? false);
  return { stage: "pdfs", read: source.records.length, written, skipped, output };
}
