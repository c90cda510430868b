export const Bucket = {
  MATCHED: "matched",
  ALMOST_MATCHED: "almost_matched",
  NOT_MATCHED: "not_matched",
} as const;

export type Bucket = (typeof Bucket)[keyof typeof Bucket];

export const BUCKETS: readonly Bucket[] = [Bucket.MATCHED, Bucket.ALMOST_MATCHED, Bucket.NOT_MATCHED];

export interface ConfidenceEntry {
  reference: string;
  confidence: number; // 0..1
}

export interface FaceTopK {
  faceIndex: number;
  entries: readonly ConfidenceEntry[];
}

export type ClassificationReason = "matched" | "almost-matched" | "below-threshold" | "no-faces";

export interface ClassificationResult {
  bucket: Bucket;
  reason: ClassificationReason;
  faceCount: number;
  /** null when no face was detected */
  bestConfidence: number | null;
  matches: readonly ConfidenceEntry[];
  almostMatches: readonly ConfidenceEntry[];
  perFaceTopK: readonly FaceTopK[];
}

export interface Thresholds {
  threshold: number;
  almostThreshold: number;
}
