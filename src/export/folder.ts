import { existsSync, mkdirSync, rmSync, writeFileSync } from "fs";
import { copyFile, stat, utimes } from "fs/promises";
import { basename, dirname, join } from "path";
import { Bucket, BUCKETS } from "../matching/types";
import { FileAccessError, errorMessage } from "../errors";
import { formatRunTimestamp } from "../utils/date";
import type { Logger } from "../logger";
import type { BucketRouter, FileCopier, RunLayout } from "./types";

export const RUN_LOG_FILENAME = "run.log";
export const SUMMARY_FILENAME = "summary.json";

/**
 * Copy keeping access and modification times. Overwrites a file of the
 * same name in the destination.
 */
export const copyPreservingTimes: FileCopier = async (sourcePath, destinationDir) => {
  const destPath = join(destinationDir, basename(sourcePath));
  try {
    await copyFile(sourcePath, destPath);
    const stats = await stat(sourcePath);
    await utimes(destPath, stats.atime, stats.mtime);
  } catch (error) {
    throw new FileAccessError(`Failed to copy ${sourcePath} to ${destinationDir}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  return destPath;
};

/**
 * Create `<root>_<timestamp>` next to `outputRoot` with one directory per
 * bucket. A leftover directory with the same name is removed first.
 */
export function prepareRunLayout(outputRoot: string, now: Date = new Date(), log?: Logger): RunLayout {
  const runDir = join(dirname(outputRoot), `${basename(outputRoot)}_${formatRunTimestamp(now)}`);

  try {
    if (existsSync(runDir)) {
      log?.info({ runDir }, "Removing existing output directory");
      rmSync(runDir, { recursive: true, force: true });
    }

    mkdirSync(runDir, { recursive: true });
    const buckets: Record<Bucket, string> = {
      [Bucket.MATCHED]: join(runDir, Bucket.MATCHED),
      [Bucket.ALMOST_MATCHED]: join(runDir, Bucket.ALMOST_MATCHED),
      [Bucket.NOT_MATCHED]: join(runDir, Bucket.NOT_MATCHED),
    };
    for (const bucket of BUCKETS) {
      mkdirSync(buckets[bucket]);
    }

    return {
      runDir,
      buckets,
      runLogPath: join(runDir, RUN_LOG_FILENAME),
      summaryPath: join(runDir, SUMMARY_FILENAME),
    };
  } catch (error) {
    throw new FileAccessError(`Cannot create output directory ${runDir}: ${errorMessage(error)}`, { cause: error });
  }
}

export function writeSummary(summaryPath: string, summary: object): void {
  try {
    writeFileSync(summaryPath, JSON.stringify(summary, null, 2) + "\n");
  } catch (error) {
    throw new FileAccessError(`Failed to write summary ${summaryPath}: ${errorMessage(error)}`, { cause: error });
  }
}

export class FolderBucketRouter implements BucketRouter {
  private buckets: Record<Bucket, string>;
  private copy: FileCopier;

  constructor(buckets: Record<Bucket, string>, copy: FileCopier = copyPreservingTimes) {
    this.buckets = buckets;
    this.copy = copy;
  }

  describeDestination(bucket: Bucket): string {
    return this.buckets[bucket];
  }

  async route(photoPath: string, bucket: Bucket): Promise<string> {
    return this.copy(photoPath, this.buckets[bucket]);
  }
}
