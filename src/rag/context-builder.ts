import { metadataString } from "./metadata.js";
import type { ChunkMetadata, RetrievedChunk } from "./types.js";

const LITERATURE_TYPES = new Set(["pubmed", "pubmed_guideline"]);

/** `source_1`, `source_2`, ... in retrieval order. */
export function sourceLabel(position: number): string {
  return `source_${position + 1}`;
}

function isLiterature(meta: ChunkMetadata): boolean {
  return LITERATURE_TYPES.has(metadataString(meta, "source_type"));
}

function guidelineName(meta: ChunkMetadata): string {
  return metadataString(meta, "guideline_name") || metadataString(meta, "file_name") || "Guideline";
}

export function formatSourceHeader(chunk: RetrievedChunk, position: number): string {
  const label = `[${sourceLabel(position)}]`;
  const meta = chunk.metadata;
  const year = metadataString(meta, "year");

  if (isLiterature(meta)) {
    const pmid = metadataString(meta, "pmid");
    const title = metadataString(meta, "title");
    return `${label} PubMed PMID ${pmid} (${year}) - ${title}`;
  }
  return `${label} Guideline ${guidelineName(meta)} (${year})`;
}

/**
 * Renders retrieved chunks as labeled blocks separated by blank lines. The
 * i-th chunk is always `source_i`, whatever its metadata.
 */
export function assembleContext(chunks: RetrievedChunk[]): string {
  return chunks
    .map((chunk, i) => `${formatSourceHeader(chunk, i)}\n${chunk.text.trim()}`)
    .join("\n\n");
}

/** One display line per source, using the same labels as the context. */
export function describeSource(chunk: RetrievedChunk, position: number): string {
  const meta = chunk.metadata;
  const title = metadataString(meta, "title") || guidelineName(meta);
  const extra = metadataString(meta, "pmid") || metadataString(meta, "file_name");
  return (
    `[${sourceLabel(position)}] ${metadataString(meta, "source_type")} | ${title} | ` +
    `${metadataString(meta, "year")} | extra=${extra} | distance=${chunk.distance.toFixed(3)}`
  );
}

export function formatSources(chunks: RetrievedChunk[]): string[] {
  return chunks.map(describeSource);
}
