import {
  guidelineRecordSchema,
  readJsonl,
  writeJsonl,
  type GuidelineRecord,
} from "../rag/records.js";

/**
 * Writes guideline records to `output`. With `append`, records already in the
 * file are kept unless an incoming record has the same `file_name`.
 * Returns the number of incoming records written.
 */
export async function writeGuidelineRecords(
  output: string,
  records: GuidelineRecord[],
  append: boolean,
): Promise<number> {
  let existing: GuidelineRecord[] = [];
  if (append) {
    const incomingFiles = new Set(records.map((r) => r.file_name).filter(Boolean));
    const current = await readJsonl(output, guidelineRecordSchema);
    existing = current.records.filter((r) => !r.file_name || !incomingFiles.has(r.file_name));
  }
  await writeJsonl(output, [...existing, ...records]);
  return records.length;
}
