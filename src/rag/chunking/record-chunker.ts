import { randomBytes } from "node:crypto";
import { cleanMetadata } from "../metadata.js";
import { resolveGuidelineText, resolveLiteratureText } from "../records.js";
import type {
  GuidelineRecord,
  LiteratureRecord,
  RecordCollection,
  SkippedItem,
  TextChunk,
} from "../types.js";
import { chunkText } from "./window-chunker.js";

export interface ChunkSettings {
  chunkSize: number;
  chunkOverlap: number;
}

export interface ChunkedCollection {
  chunks: TextChunk[];
  /** Records that produced at least one chunk. */
  records: number;
  skipped: SkippedItem[];
}

interface ResolvedRecord {
  ref: string;
  text: string;
  idPrefix: string;
  /** Stable identifier, or null when ids need a random suffix. */
  stableId: string | null;
  baseMetadata: Record<string, unknown>;
}

// Placeholder names that do not identify a record.
const PLACEHOLDER_IDS = new Set(["unknown", "unknown.pdf"]);

function stableIdOf(value: string | null | undefined): string | null {
  if (!value || PLACEHOLDER_IDS.has(value.toLowerCase())) return null;
  return value;
}

function resolveLiterature(record: LiteratureRecord, position: number): ResolvedRecord {
  const pmid = stableIdOf(record.pmid);
  return {
    ref: pmid ? `PMID ${pmid}` : `literature record ${position + 1}`,
    text: resolveLiteratureText(record),
    idPrefix: "pubmed",
    stableId: pmid,
    baseMetadata: {
      source_type: record.source_type,
      pmid: record.pmid,
      pmcid: record.pmcid,
      doi: record.doi,
      title: record.title,
      journal: record.journal,
      year: record.year,
      mesh_terms: record.mesh_terms,
      pub_types: record.pub_types,
      has_fulltext: Boolean(record.clean_text || record.fulltext),
    },
  };
}

function resolveGuideline(record: GuidelineRecord, position: number): ResolvedRecord {
  const fileName = stableIdOf(record.file_name);
  return {
    ref: record.file_name || record.guideline_name || `guideline record ${position + 1}`,
    text: resolveGuidelineText(record),
    idPrefix: "guideline",
    stableId: fileName,
    baseMetadata: {
      source_type: record.source_type,
      guideline_name: record.guideline_name,
      year: record.year,
      file_name: record.file_name,
      url: record.url,
      pmid: record.pmid,
      source_tag: record.source_tag,
    },
  };
}

function resolveCollection(collection: RecordCollection): ResolvedRecord[] {
  switch (collection.family) {
    case "literature":
      return collection.records.map(resolveLiterature);
    case "guideline":
      return collection.records.map(resolveGuideline);
  }
}

export function chunkCollection(
  collection: RecordCollection,
  settings: ChunkSettings,
): ChunkedCollection {
  const chunks: TextChunk[] = [];
  const skipped: SkippedItem[] = [];
  let records = 0;

  for (const resolved of resolveCollection(collection)) {
    if (!resolved.text) {
      skipped.push({ ref: resolved.ref, reason: "empty text" });
      continue;
    }

    const pieces = chunkText(resolved.text, settings.chunkSize, settings.chunkOverlap);
    const suffix = resolved.stableId ? null : randomBytes(4).toString("hex");
    const base = resolved.stableId
      ? `${resolved.idPrefix}-${resolved.stableId}`
      : `${resolved.idPrefix}-unknown`;

    pieces.forEach((text, chunkIndex) => {
      chunks.push({
        id: suffix ? `${base}-${chunkIndex}-${suffix}` : `${base}-${chunkIndex}`,
        text,
        chunkIndex,
        metadata: cleanMetadata({ ...resolved.baseMetadata, chunk_index: chunkIndex }),
      });
    });
    records++;
  }

  return { chunks, records, skipped };
}
