import { guidelineRecordSchema, literatureRecordSchema, readJsonl } from "./records.js";
import type { Log, RecordCollection, SkippedItem } from "./types.js";

export interface SourceFiles {
  literatureFile: string;
  guidelinesFile: string;
}

export interface LoadedSources {
  collections: RecordCollection[];
  /** Malformed lines, by file. */
  skipped: SkippedItem[];
}

/**
 * Loads the literature and guideline record files. A missing file contributes
 * no records; malformed lines are skipped and reported.
 */
export async function loadSources(files: SourceFiles, log: Log): Promise<LoadedSources> {
  const skipped: SkippedItem[] = [];

  const literature = await readJsonl(files.literatureFile, literatureRecordSchema);
  const guidelines = await readJsonl(files.guidelinesFile, guidelineRecordSchema);

  for (const [file, result] of [
    [files.literatureFile, literature],
    [files.guidelinesFile, guidelines],
  ] as const) {
    if (result.missing) {
      log(`sources: file not found, skipping: ${file}`);
      continue;
    }
    log(
      `sources: ${result.records.length} record(s) from ${file}` +
        (result.skipped.length > 0 ? ` (${result.skipped.length} malformed line(s) skipped)` : ""),
    );
    skipped.push(...result.skipped.map((s) => ({ ref: `${file} ${s.ref}`, reason: s.reason })));
  }

  return {
    collections: [
      { family: "literature", records: literature.records },
      { family: "guideline", records: guidelines.records },
    ],
    skipped,
  };
}
