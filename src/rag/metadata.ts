import type { ChunkMetadata, MetadataValue } from "./types.js";

export const LIST_SEPARATOR = "; ";

/**
 * Coerces arbitrary metadata into scalar values the vector index can store:
 * null/undefined become "", lists are joined with "; ", other objects are
 * serialized. Applying it twice gives the same result as applying it once.
 */
export function cleanMetadata(meta: Record<string, unknown>): ChunkMetadata {
  const cleaned: ChunkMetadata = {};
  for (const [key, value] of Object.entries(meta)) {
    cleaned[key] = toMetadataValue(value);
  }
  return cleaned;
}

export function toMetadataValue(value: unknown): MetadataValue {
  if (value === null || value === undefined) return "";
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => (typeof item === "string" ? item : stringify(item))).join(LIST_SEPARATOR);
  }
  return stringify(value);
}

function stringify(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

export function metadataString(meta: ChunkMetadata, key: string): string {
  const value = meta[key];
  return value === undefined ? "" : String(value);
}
