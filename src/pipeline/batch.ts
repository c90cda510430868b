import { readFile } from "fs/promises";
import { basename } from "path";
import type { Logger } from "../logger";
import type { DetectedFace, FaceEngine } from "../recognition/types";
import type { ReferenceStore } from "../references/store";
import type { BucketRouter } from "../export/types";
import { classifyFaces, describeClassification } from "../matching/classifier";
import { Bucket, type ClassificationResult, type Thresholds } from "../matching/types";
import { ConfigError, InvalidImageFormatError, PhotoProcessingError } from "../errors";
import { isSupportedImage } from "../sources/local";
import { withTimeout } from "../utils/timeout";
import { createCounters, type RunCounters } from "./report";

export const DEFAULT_BATCH_SIZE = 20;
export const DEFAULT_PHOTO_TIMEOUT_MS = 60_000;

export interface BatchProgress {
  total: number;
  processed: number;
  current: string;
  counters: Readonly<RunCounters>;
}

export type ProgressCallback = (progress: BatchProgress) => void;

export type PhotoOutcome =
  | { ok: true; path: string; result: ClassificationResult; destination: string }
  | { ok: false; path: string; error: PhotoProcessingError };

export interface BatchOptions {
  /** Photos handled per chunk; does not affect results */
  batchSize?: number;
  /** Limit on detection, embedding and comparison for a single photo */
  photoTimeoutMs?: number;
  /** Checked between photos */
  signal?: AbortSignal;
  onProgress?: ProgressCallback;
  onOutcome?: (outcome: PhotoOutcome) => void;
  onComplete?: (counters: Readonly<RunCounters>) => void;
}

export interface BatchFailure {
  path: string;
  message: string;
}

export interface BatchOutcome {
  counters: RunCounters;
  failures: BatchFailure[];
  cancelled: boolean;
}

function countOutcome(counters: RunCounters, outcome: PhotoOutcome): void {
  counters.processed++;
  if (!outcome.ok) {
    counters.errors++;
    return;
  }
  switch (outcome.result.bucket) {
    case Bucket.MATCHED:
      counters.matched++;
      break;
    case Bucket.ALMOST_MATCHED:
      counters.almostMatched++;
      break;
    case Bucket.NOT_MATCHED:
      counters.notMatched++;
      break;
  }
}

export class BatchOrchestrator<E> {
  private engine: FaceEngine<E>;
  private router: BucketRouter;
  private log: Logger;

  constructor(engine: FaceEngine<E>, router: BucketRouter, log: Logger) {
    this.engine = engine;
    this.router = router;
    this.log = log;
  }

  /**
   * Classify and route every photo, one at a time, in the given order.
   * A photo that fails is counted and logged; it never stops the run.
   */
  async run(
    photoPaths: readonly string[],
    store: ReferenceStore<E>,
    thresholds: Thresholds,
    options: BatchOptions = {}
  ): Promise<BatchOutcome> {
    const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new ConfigError(`Batch size must be a positive integer, got ${batchSize}`);
    }
    const timeoutMs = options.photoTimeoutMs ?? DEFAULT_PHOTO_TIMEOUT_MS;
    const total = photoPaths.length;
    const counters = createCounters();
    const failures: BatchFailure[] = [];
    let cancelled = false;

    this.log.info({ total, batchSize, references: store.size, ...thresholds }, "Starting batch");

    for (let start = 0; start < total && !cancelled; start += batchSize) {
      const chunk = photoPaths.slice(start, start + batchSize);
      this.log.debug({ chunk: start / batchSize + 1, size: chunk.length }, "Processing chunk");

      for (const photoPath of chunk) {
        if (options.signal?.aborted) {
          this.log.warn({ processed: counters.processed, total }, "Run cancelled");
          cancelled = true;
          break;
        }

        const outcome = await this.processPhoto(photoPath, store, thresholds, timeoutMs);
        countOutcome(counters, outcome);

        if (!outcome.ok) {
          failures.push({ path: photoPath, message: outcome.error.message });
          this.log.error({ photo: photoPath, error: outcome.error.message }, outcome.error.message);
        }

        options.onOutcome?.(outcome);
        options.onProgress?.({
          total,
          processed: counters.processed,
          current: photoPath,
          counters,
        });
      }
    }

    this.log.info({ ...counters, cancelled }, "Batch complete");
    options.onComplete?.(counters);
    return { counters, failures, cancelled };
  }

  /** Never rejects: any failure becomes an `ok: false` outcome. */
  async processPhoto(
    photoPath: string,
    store: ReferenceStore<E>,
    thresholds: Thresholds,
    timeoutMs: number = DEFAULT_PHOTO_TIMEOUT_MS
  ): Promise<PhotoOutcome> {
    try {
      if (!isSupportedImage(photoPath)) {
        throw new InvalidImageFormatError(`Unsupported image type: ${photoPath}`);
      }

      const image = await readFile(photoPath);
      const result = await withTimeout(
        this.analyse(image, store, thresholds),
        timeoutMs,
        `Face analysis for ${photoPath}`
      );
      const destination = await this.router.route(photoPath, result.bucket);

      this.log.info(
        {
          photo: photoPath,
          bucket: result.bucket,
          reason: result.reason,
          faceCount: result.faceCount,
          bestConfidence: result.bestConfidence,
          matches: result.matches,
          almostMatches: result.almostMatches,
          perFaceTopK: result.perFaceTopK,
          destination,
        },
        `${describeClassification(basename(photoPath), result, thresholds)}\n` +
          `Copied to ${this.router.describeDestination(result.bucket)}`
      );

      return { ok: true, path: photoPath, result, destination };
    } catch (error) {
      return { ok: false, path: photoPath, error: new PhotoProcessingError(photoPath, error) };
    }
  }

  private async analyse(
    image: Buffer,
    store: ReferenceStore<E>,
    thresholds: Thresholds
  ): Promise<ClassificationResult> {
    const regions = await this.engine.detectFaces(image);
    const faces: DetectedFace<E>[] = [];
    for (const region of regions) {
      faces.push({ region, embedding: await this.engine.embed(image, region) });
    }
    return classifyFaces(faces, store, thresholds, (a, b) => this.engine.distance(a, b), this.log);
  }
}
