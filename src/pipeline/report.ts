import { secondsBetween } from "../utils/date";
import type { RunLayout } from "../export/types";

export interface RunCounters {
  processed: number;
  matched: number;
  almostMatched: number;
  notMatched: number;
  errors: number;
}

export function createCounters(): RunCounters {
  return { processed: 0, matched: 0, almostMatched: 0, notMatched: 0, errors: 0 };
}

export interface RunSummary extends RunCounters {
  startedAt: string;
  endedAt: string;
  durationSeconds: number;
  /** Photos per second; absent for a zero-length run */
  rate?: number;
}

export function summarize(counters: RunCounters, startedAt: Date, endedAt: Date): RunSummary {
  const durationSeconds = secondsBetween(startedAt, endedAt);
  const summary: RunSummary = {
    ...counters,
    startedAt: startedAt.toISOString(),
    endedAt: endedAt.toISOString(),
    durationSeconds,
  };
  if (durationSeconds > 0) {
    summary.rate = counters.processed / durationSeconds;
  }
  return summary;
}

export interface SummaryLocations {
  layout: RunLayout;
  mainLogPath?: string | null;
}

export function formatSummary(summary: RunSummary, locations?: SummaryLocations): string[] {
  const saved = (dir?: string) => (dir ? ` (saved to ${dir})` : "");
  const layout = locations?.layout;

  const lines = [
    "Summary:",
    `  Images processed: ${summary.processed}`,
    `  Matches found: ${summary.matched}${saved(layout?.buckets.matched)}`,
    `  Almost matches: ${summary.almostMatched}${saved(layout?.buckets.almost_matched)}`,
    `  Not matched: ${summary.notMatched}${saved(layout?.buckets.not_matched)}`,
    `  Errors encountered: ${summary.errors}`,
  ];

  if (layout) {
    lines.push(`  Results saved to: ${layout.runDir}`);
    lines.push(`  Run log file: ${layout.runLogPath}`);
  }
  if (locations?.mainLogPath) {
    lines.push(`  Main log file: ${locations.mainLogPath}`);
  }

  lines.push(`  Duration: ${summary.durationSeconds.toFixed(2)} seconds`);
  if (summary.rate !== undefined && summary.processed > 0) {
    lines.push(`  Processing rate: ${summary.rate.toFixed(2)} images per second`);
  }
  return lines;
}
