import type { Log, SkippedItem } from "../rag/types.js";

export interface StageReport {
  stage: string;
  /** Inputs considered: records, rows or files. */
  read: number;
  written: number;
  skipped: SkippedItem[];
  /** File written, or null when the stage wrote nothing. */
  output: string | null;
}

const MAX_LISTED_SKIPS = 10;

export function logStageReport(log: Log, report: StageReport): void {
  log(
    `[${report.stage}] read ${report.read}, wrote ${report.written}, skipped ${report.skipped.length}` +
      (report.output ? ` -> ${report.output}` : ""),
  );

  const byReason = new Map<string, number>();
  for (const item of report.skipped) {
    const reason = item.reason.replace(/\s*\(.*\)$/, "");
    byReason.set(reason, (byReason.get(reason) ?? 0) + 1);
  }
  for (const [reason, count] of byReason) {
    log(`[${report.stage}]   ${count} x ${reason}`);
  }
  for (const item of report.skipped.slice(0, MAX_LISTED_SKIPS)) {
    log(`[${report.stage}]   skip ${item.ref}: ${item.reason}`);
  }
  if (report.skipped.length > MAX_LISTED_SKIPS) {
    log(`[${report.stage}]   ... ${report.skipped.length - MAX_LISTED_SKIPS} more`);
  }
}
