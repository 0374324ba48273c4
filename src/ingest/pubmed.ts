import { XMLParser } from "fast-xml-parser";
import { z } from "zod";
import type { RagConfig } from "../rag/config.js";
import { ServiceError } from "../rag/errors.js";
import { ensureOk, fetchWithTimeout, parseResponse, readBody } from "../rag/http.js";
import { writeJsonl, type LiteratureRecord } from "../rag/records.js";
import type { Log, SkippedItem } from "../rag/types.js";
import type { StageReport } from "./report.js";

export const EUTILS_BASE = "https://eutils.ncbi.nlm.nih.gov/entrez/eutils/";

export const DEFAULT_PUBMED_QUERY =
  '("glioblastoma"[Title/Abstract] OR "glioblastoma"[MeSH Terms]) ' +
  "AND (Practice Guideline[pt] OR Guideline[pt] OR Consensus Development Conference[pt]) " +
  "AND free full text[sb]";

export interface PubmedSearch {
  term: string;
  /** YYYY/MM/DD, publication date. */
  minDate: string;
  maxDate: string;
  retmax: number;
}

export const DEFAULT_SEARCH: PubmedSearch = {
  term: DEFAULT_PUBMED_QUERY,
  minDate: "2010/01/01",
  maxDate: "2025/12/31",
  retmax: 2000,
};

const FETCH_BATCH_SIZE = 200;
// NCBI allows three requests per second without an API key.
const REQUEST_PAUSE_MS = 340;

type PubmedSettings = RagConfig["pubmed"];

export function buildParams(
  settings: PubmedSettings,
  extra: Record<string, string | number>,
): URLSearchParams {
  const params = new URLSearchParams({ tool: settings.tool, email: settings.email });
  for (const [key, value] of Object.entries(extra)) {
    params.set(key, String(value));
  }
  if (settings.apiKey) params.set("api_key", settings.apiKey);
  return params;
}

async function getText(url: string, settings: PubmedSettings): Promise<string> {
  const options = { service: "pubmed" as const, timeoutMs: settings.timeoutMs };
  const res = await fetchWithTimeout(url, { method: "GET" }, options);
  await ensureOk(res, options);
  return readBody(() => res.text(), options);
}

const esearchSchema = z.object({
  esearchresult: z.object({ idlist: z.array(z.string()).default([]) }),
});

export async function searchPubmedIds(
  search: PubmedSearch,
  settings: PubmedSettings,
): Promise<string[]> {
  const params = buildParams(settings, {
    db: "pubmed",
    term: search.term,
    mindate: search.minDate,
    maxdate: search.maxDate,
    datetype: "pdat",
    retmax: search.retmax,
    retmode: "json",
  });
  const body = await getText(`${EUTILS_BASE}esearch.fcgi?${params}`, settings);

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (err) {
    throw new ServiceError("pubmed", "ESearch returned invalid JSON", { cause: err });
  }
  return parseResponse(json, esearchSchema, "pubmed").esearchresult.idlist;
}

export async function fetchPubmedXml(pmids: string[], settings: PubmedSettings): Promise<string> {
  if (pmids.length === 0) return "";
  const params = buildParams(settings, { db: "pubmed", id: pmids.join(","), retmode: "xml" });
  return getText(`${EUTILS_BASE}efetch.fcgi?${params}`, settings);
}

// ── XML ─────────────────────────────────────────────────────────────────────

const ARRAY_TAGS = new Set([
  "PubmedArticle",
  "AbstractText",
  "MeshHeading",
  "PublicationType",
  "ArticleId",
]);

// Titles and abstract sections carry inline markup (<i>, <sup>, <sub>); they are
// kept as raw XML and flattened in document order by markupText.
const MARKUP_TAGS = ["ArticleTitle", "AbstractText"];

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  parseTagValue: false,
  isArray: (tagName: string) => ARRAY_TAGS.has(tagName),
  stopNodes: MARKUP_TAGS.map((tag) => `*.${tag}`),
});

const inlineParser = new XMLParser({
  preserveOrder: true,
  trimValues: false,
  parseTagValue: false,
  htmlEntities: true,
});

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function child(node: unknown, ...keys: string[]): unknown {
  let current = node;
  for (const key of keys) {
    if (!isNode(current)) return undefined;
    current = current[key];
  }
  return current;
}

function children(node: unknown, ...keys: string[]): unknown[] {
  const value = child(node, ...keys);
  if (value === undefined || value === "") return [];
  return Array.isArray(value) ? value : [value];
}

function attr(node: unknown, name: string): string | undefined {
  const value = child(node, `@_${name}`);
  return typeof value === "string" ? value : undefined;
}

/** Concatenated text of a node, including inline markup such as <i>. */
export function textOf(node: unknown): string {
  if (typeof node === "string") return node;
  if (typeof node === "number" || typeof node === "boolean") return String(node);
  if (Array.isArray(node)) return node.map(textOf).filter(Boolean).join(" ");
  if (isNode(node)) {
    return Object.entries(node)
      .filter(([key]) => !key.startsWith("@_"))
      .map(([, value]) => textOf(value))
      .filter(Boolean)
      .join(" ");
  }
  return "";
}

function orderedText(nodes: unknown): string {
  if (!Array.isArray(nodes)) return "";
  return nodes
    .map((entry) => {
      if (!isNode(entry)) return "";
      return Object.entries(entry)
        .map(([key, value]) => {
          if (key === "#text") return textOf(value);
          if (key === ":@") return "";
          return orderedText(value);
        })
        .join("");
    })
    .join("");
}

/** Text of an element kept as raw XML, with inline tags dropped and entities decoded. */
export function markupText(node: unknown): string {
  const raw = textOf(node);
  if (!raw.includes("<") && !raw.includes("&")) return raw.replace(/\s+/g, " ").trim();
  const doc: unknown = inlineParser.parse(`<markup>${raw}</markup>`);
  return orderedText(doc).replace(/\s+/g, " ").trim();
}

function parseArticle(article: unknown): LiteratureRecord {
  const medline = child(article, "MedlineCitation");
  const info = child(medline, "Article");

  const abstract = children(info, "Abstract", "AbstractText")
    .map((part) => {
      const label = attr(part, "Label");
      const text = markupText(part);
      return label ? `${label}: ${text}` : text;
    })
    .join("\n")
    .trim();

  const pubDate = child(info, "Journal", "JournalIssue", "PubDate");
  const year = textOf(child(pubDate, "Year")) || textOf(child(pubDate, "MedlineDate"));

  const meshTerms = children(medline, "MeshHeadingList", "MeshHeading")
    .map((heading) => textOf(child(heading, "DescriptorName")).trim())
    .filter(Boolean);

  const pubTypes = children(info, "PublicationTypeList", "PublicationType")
    .map((pt) => textOf(pt).trim())
    .filter(Boolean);

  let pmcid: string | null = null;
  let doi: string | null = null;
  for (const id of children(article, "PubmedData", "ArticleIdList", "ArticleId")) {
    const idType = attr(id, "IdType")?.toLowerCase();
    const value = textOf(id).trim();
    if (!value) continue;
    if (idType === "pmc" || idType === "pmcid") pmcid = value;
    else if (idType === "doi") doi = value;
  }

  return {
    pmid: textOf(child(medline, "PMID")).trim(),
    pmcid,
    doi,
    title: markupText(child(info, "ArticleTitle")),
    abstract,
    journal: textOf(child(info, "Journal", "Title")).trim(),
    year,
    mesh_terms: meshTerms,
    pub_types: pubTypes,
    source_type: "pubmed_guideline",
  };
}

/** Parses an EFetch PubmedArticleSet document into literature records. */
export function parsePubmedXml(xml: string): LiteratureRecord[] {
  if (!xml.trim()) return [];
  const doc: unknown = parser.parse(xml);
  return children(doc, "PubmedArticleSet", "PubmedArticle").map(parseArticle);
}

// ── Stage ───────────────────────────────────────────────────────────────────

export interface PubmedStageOptions {
  search?: Partial<PubmedSearch>;
  output?: string;
  pauseMs?: number;
}

export async function runPubmedStage(
  config: RagConfig,
  log: Log,
  options: PubmedStageOptions = {},
): Promise<StageReport> {
  const search: PubmedSearch = { ...DEFAULT_SEARCH, ...options.search };
  const output = options.output ?? config.paths.literatureFile;
  const pauseMs = options.pauseMs ?? REQUEST_PAUSE_MS;

  const pmids = await searchPubmedIds(search, config.pubmed);
  log(`[pubmed] ESearch returned ${pmids.length} PMID(s)`);
  if (pmids.length === 0) {
    return { stage: "pubmed", read: 0, written: 0, skipped: [], output: null };
  }

  const records: LiteratureRecord[] = [];
  const totalBatches = Math.ceil(pmids.length / FETCH_BATCH_SIZE);
  for (let i = 0; i < pmids.length; i += FETCH_BATCH_SIZE) {
    const batch = pmids.slice(i, i + FETCH_BATCH_SIZE);
    const xml = await fetchPubmedXml(batch, config.pubmed);
    records.push(...parsePubmedXml(xml));
    log(`[pubmed] fetched batch ${i / FETCH_BATCH_SIZE + 1}/${totalBatches} (${records.length} parsed)`);
    if (pauseMs > 0 && i + FETCH_BATCH_SIZE < pmids.length) {
      await new Promise((resolve) => setTimeout(resolve, pauseMs));
    }
  }

  const kept: LiteratureRecord[] = [];
  const skipped: SkippedItem[] = [];
  for (const record of records) {
    if (!record.title && !record.abstract) {
      skipped.push({ ref: `PMID ${record.pmid ?? "?"}`, reason: "no title or abstract" });
      continue;
    }
    kept.push(record);
  }

  await writeJsonl(output, kept);
  return { stage: "pubmed", read: records.length, written: kept.length, skipped, output };
}
