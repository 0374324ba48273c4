import { mkdir, rm } from "node:fs/promises";
import path from "node:path";
import { LocalIndex } from "vectra";
import type { ChunkMetadata, IndexedEntry } from "./types.js";

/** Metadata key the chunk text is stored under. */
export const DOCUMENT_KEY = "document";

export interface VectorMatch {
  id: string;
  document: string;
  metadata: ChunkMetadata;
  /** Cosine distance (1 - similarity). */
  distance: number;
}

export interface VectorIndex {
  readonly collection: string;
  /** Inserts or overwrites entries by id. All entries are written or none. */
  upsert(entries: IndexedEntry[]): Promise<void>;
  /** Up to `topK` nearest entries, closest first. Empty when the collection is missing. */
  query(vector: number[], topK: number): Promise<VectorMatch[]>;
  count(): Promise<number>;
  /** Drops the collection; the next upsert recreates it. */
  reset(): Promise<void>;
}

export function collectionPath(vectorDir: string, collection: string): string {
  return path.join(vectorDir, collection);
}

/**
 * Opens a vectra collection stored in `<vectorDir>/<collection>`. The storage
 * directory is created if absent; the collection itself is created on first
 * write and reused afterwards. vectra ranks by cosine similarity.
 */
export async function openVectorIndex(
  vectorDir: string,
  collection: string,
): Promise<VectorIndex> {
  await mkdir(vectorDir, { recursive: true });
  const folder = collectionPath(vectorDir, collection);
  let index = new LocalIndex(folder);

  async function ensureCreated(): Promise<void> {
    if (!(await index.isIndexCreated())) {
      await index.createIndex();
    }
  }

  return {
    collection,

    async upsert(entries: IndexedEntry[]) {
      if (entries.length === 0) return;
      await ensureCreated();

      await index.beginUpdate();
      try {
        for (const entry of entries) {
          await index.upsertItem({
            id: entry.id,
            vector: entry.vector,
            metadata: { ...entry.metadata, [DOCUMENT_KEY]: entry.document },
          });
        }
      } catch (err) {
        index.cancelUpdate();
        throw err;
      }
      await index.endUpdate();
    },

    async query(vector: number[], topK: number) {
      if (topK <= 0 || !(await index.isIndexCreated())) return [];
      const results = await index.queryItems(vector, topK);
      return results.map((r) => {
        const { document, metadata } = splitStoredMetadata(r.item.metadata);
        return { id: r.item.id, document, metadata, distance: 1 - r.score };
      });
    },

    async count() {
      if (!(await index.isIndexCreated())) return 0;
      const items = await index.listItems();
      return items.length;
    },

    async reset() {
      await rm(folder, { recursive: true, force: true });
      index = new LocalIndex(folder);
    },
  };
}

export function splitStoredMetadata(stored: Record<string, unknown>): {
  document: string;
  metadata: ChunkMetadata;
} {
  const metadata: ChunkMetadata = {};
  let document = "";
  for (const [key, value] of Object.entries(stored)) {
    if (key === DOCUMENT_KEY) {
      document = typeof value === "string" ? value : String(value);
      continue;
    }
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      metadata[key] = value;
    }
  }
  return { document, metadata };
}
