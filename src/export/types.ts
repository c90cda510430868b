import type { Bucket } from "../matching/types";

export interface RunLayout {
  runDir: string;
  buckets: Record<Bucket, string>;
  runLogPath: string;
  summaryPath: string;
}

/** Copies a file into a directory and returns the new path. Never touches the source. */
export type FileCopier = (sourcePath: string, destinationDir: string) => Promise<string>;

export interface BucketRouter {
  route(photoPath: string, bucket: Bucket): Promise<string>;
  describeDestination(bucket: Bucket): string;
}
