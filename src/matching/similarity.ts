import type { ReferenceStore } from "../references/store";
import type { Embedding } from "../recognition/types";
import type { ConfidenceEntry } from "./types";

export const TOP_K = 5;

export type DistanceFn<E = Embedding> = (a: E, b: E) => number | Promise<number>;

/** 1 - distance, kept inside [0, 1]. Non-finite values count as no similarity. */
export function confidenceFromDistance(distance: number): number {
  const confidence = 1 - distance;
  if (!Number.isFinite(confidence)) return 0;
  return Math.min(1, Math.max(0, confidence));
}

/**
 * Score one face against every reference, best first. Distances are
 * requested together so a rate-limited engine can overlap them.
 * Array#sort is stable, so equal confidences keep the store's insertion order.
 */
export async function rankReferences<E>(
  embedding: E,
  store: ReferenceStore<E>,
  distance: DistanceFn<E>
): Promise<ConfidenceEntry[]> {
  const entries = await Promise.all(
    store.references().map(async (reference) => ({
      reference: reference.identity,
      confidence: confidenceFromDistance(await distance(embedding, reference.embedding)),
    }))
  );
  return sortByConfidence(entries);
}

export function sortByConfidence(entries: ConfidenceEntry[]): ConfidenceEntry[] {
  return entries.sort((a, b) => b.confidence - a.confidence);
}

export function topK(entries: readonly ConfidenceEntry[], k: number = TOP_K): ConfidenceEntry[] {
  return entries.slice(0, k);
}
