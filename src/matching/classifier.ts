import type { Logger } from "../logger";
import type { ReferenceStore } from "../references/store";
import type { DetectedFace } from "../recognition/types";
import { ConfigError } from "../errors";
import { rankReferences, sortByConfidence, topK, type DistanceFn } from "./similarity";
import {
  Bucket,
  type ClassificationResult,
  type ConfidenceEntry,
  type FaceTopK,
  type Thresholds,
} from "./types";

/** Width of the almost-matched band below the threshold. */
export const ALMOST_MARGIN = 0.1;

// 0.8 - 0.1 is 0.7000000000000001 in binary floating point
function roundThreshold(value: number): number {
  return Math.round(value * 1e9) / 1e9;
}

export function deriveThresholds(threshold: number): Thresholds {
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    throw new ConfigError(`Threshold must be between 0.0 and 1.0, got ${threshold}`);
  }
  return {
    threshold,
    almostThreshold: Math.max(0, roundThreshold(threshold - ALMOST_MARGIN)),
  };
}

/**
 * Decide the bucket of one photo from the rankings of each of its faces.
 * Each ranking must be ordered best first, as rankReferences returns it.
 *
 * Every (face, reference) pair at or above the threshold is a match and
 * every pair in [almostThreshold, threshold) an almost-match, pooled over
 * all faces. A reference matched by two faces appears twice.
 */
export function classifyRankings(
  rankings: readonly (readonly ConfidenceEntry[])[],
  thresholds: Thresholds
): ClassificationResult {
  const { threshold, almostThreshold } = thresholds;

  if (rankings.length === 0) {
    return {
      bucket: Bucket.NOT_MATCHED,
      reason: "no-faces",
      faceCount: 0,
      bestConfidence: null,
      matches: [],
      almostMatches: [],
      perFaceTopK: [],
    };
  }

  const matches: ConfidenceEntry[] = [];
  const almostMatches: ConfidenceEntry[] = [];
  const perFaceTopK: FaceTopK[] = [];
  let highest = 0;

  rankings.forEach((ranked, faceIndex) => {
    if (ranked.length > 0) {
      perFaceTopK.push({ faceIndex, entries: topK(ranked) });
      highest = Math.max(highest, ranked[0].confidence);
    }

    for (const entry of ranked) {
      if (entry.confidence >= threshold) {
        matches.push(entry);
      } else if (entry.confidence >= almostThreshold) {
        almostMatches.push(entry);
      }
    }
  });

  sortByConfidence(matches);
  sortByConfidence(almostMatches);

  const base = { faceCount: rankings.length, matches, almostMatches, perFaceTopK };

  if (matches.length > 0) {
    return { ...base, bucket: Bucket.MATCHED, reason: "matched", bestConfidence: matches[0].confidence };
  }
  if (almostMatches.length > 0) {
    return {
      ...base,
      bucket: Bucket.ALMOST_MATCHED,
      reason: "almost-matched",
      bestConfidence: almostMatches[0].confidence,
    };
  }
  return { ...base, bucket: Bucket.NOT_MATCHED, reason: "below-threshold", bestConfidence: highest };
}

export async function classifyFaces<E>(
  faces: readonly DetectedFace<E>[],
  store: ReferenceStore<E>,
  thresholds: Thresholds,
  distance: DistanceFn<E>,
  log?: Logger
): Promise<ClassificationResult> {
  const rankings: ConfidenceEntry[][] = [];
  for (const [faceIndex, face] of faces.entries()) {
    const ranked = await rankReferences(face.embedding, store, distance);
    log?.debug(
      { faceIndex, top: ranked[0]?.reference, confidence: ranked[0]?.confidence },
      "Face ranked"
    );
    rankings.push(ranked);
  }
  return classifyRankings(rankings, thresholds);
}

const fmt = (value: number): string => value.toFixed(2);

function almostRange({ threshold, almostThreshold }: Thresholds): string {
  return `${fmt(almostThreshold)}-${fmt(threshold - 0.01)}`;
}

function entryLines(entries: readonly ConfidenceEntry[], indent: string): string {
  return entries.map((e) => `\n${indent}${e.reference} (${fmt(e.confidence)})`).join("");
}

function perFaceLines(perFace: readonly FaceTopK[]): string {
  return perFace
    .map((face) => `\n    Face #${face.faceIndex + 1} best scores:${entryLines(face.entries, "        ")}`)
    .join("");
}

/** Human readable account of why a photo landed in its bucket. */
export function describeClassification(
  photoName: string,
  result: ClassificationResult,
  thresholds: Thresholds
): string {
  const faces = `${result.faceCount} face(s)`;

  switch (result.reason) {
    case "no-faces":
      return `Not matched: ${photoName} - No faces detected`;
    case "matched":
      return (
        `Matched: ${photoName} with ${faces}, ` +
        `confidence ${fmt(result.bestConfidence ?? 0)} against:${entryLines(result.matches, "    ")}`
      );
    case "almost-matched":
      return (
        `Almost matched: ${photoName} with ${faces} - ` +
        `Best match score ${fmt(result.bestConfidence ?? 0)} ` +
        `(threshold ${thresholds.threshold}, almost range ${almostRange(thresholds)}).` +
        `\nAlmost matches:${entryLines(result.almostMatches, "    ")}` +
        perFaceLines(result.perFaceTopK)
      );
    case "below-threshold":
      return (
        `Not matched: ${photoName} with ${faces} - ` +
        `No matches above threshold ${thresholds.threshold} or in almost range ${almostRange(thresholds)}.` +
        perFaceLines(result.perFaceTopK)
      );
  }
}

export function describeThresholdRanges(thresholds: Thresholds): string {
  const { threshold, almostThreshold } = thresholds;
  return [
    "Confidence threshold ranges:",
    `  MATCHED:        >= ${fmt(threshold)}`,
    `  ALMOST MATCHED: ${fmt(almostThreshold)} to ${fmt(threshold - 0.01)}`,
    `  NOT MATCHED:    < ${fmt(almostThreshold)}`,
  ].join("\n");
}
