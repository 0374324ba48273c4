import type { GuidelineRecord, LiteratureRecord } from "./records.js";

export type { GuidelineRecord, LiteratureRecord } from "./records.js";

export type SourceType = "pubmed_guideline" | "guideline_pdf" | "dataset_guideline";

/** The only value types the vector index accepts as metadata. */
export type MetadataValue = string | number | boolean;

export type ChunkMetadata = Record<string, MetadataValue>;

export type RecordCollection =
  | { family: "literature"; records: LiteratureRecord[] }
  | { family: "guideline"; records: GuidelineRecord[] };

export interface TextChunk {
  id: string;
  text: string;
  chunkIndex: number;
  metadata: ChunkMetadata;
}

export interface IndexedEntry {
  id: string;
  vector: number[];
  document: string;
  metadata: ChunkMetadata;
}

export interface RetrievedChunk {
  text: string;
  metadata: ChunkMetadata;
  /** Cosine distance; smaller is closer. */
  distance: number;
}

export interface Answer {
  answer: string;
  sources: RetrievedChunk[];
}

export interface SkippedItem {
  /** Record identifier, file name or 1-based line number. */
  ref: string;
  reason: string;
}

export type Log = (msg: string) => void;
