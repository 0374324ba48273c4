/**
 * Splits text into fixed-size character windows. Consecutive windows share
 * `overlap` characters; the last window ends exactly at the end of the text.
 * Purely positional: sentence and paragraph boundaries are ignored.
 */
export function chunkText(text: string, size: number, overlap: number): string[] {
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(`chunk size must be a positive integer, got ${size}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= size) {
    throw new RangeError(`chunk overlap must be in [0, ${size}), got ${overlap}`);
  }

  const trimmed = text.trim();
  if (!trimmed) return [];

  const chunks: string[] = [];
  const length = trimmed.length;
  let start = 0;

  while (start < length) {
    const end = Math.min(start + size, length);
    chunks.push(trimmed.slice(start, end));
    if (end === length) break;
    start = end - overlap;
  }

  return chunks;
}
