import { describe, it, expect } from "vitest";
import { confidenceFromDistance, rankReferences, topK } from "../../../src/matching/similarity";
import { ReferenceStore } from "../../../src/references/store";

const distance = (a: readonly number[], b: readonly number[]) => Math.abs(a[0] - b[0]);

describe("confidenceFromDistance", () => {
  it("is one minus the distance", () => {
    expect(confidenceFromDistance(0)).toBe(1);
    expect(confidenceFromDistance(0.25)).toBe(0.75);
  });

  it("clamps out-of-range distances", () => {
    expect(confidenceFromDistance(1.4)).toBe(0);
    expect(confidenceFromDistance(-0.5)).toBe(1);
    expect(confidenceFromDistance(Number.NaN)).toBe(0);
    expect(confidenceFromDistance(Number.POSITIVE_INFINITY)).toBe(0);
  });
});

describe("rankReferences", () => {
  it("orders references best first", async () => {
    const store = new ReferenceStore();
    store.add("far.jpg", [0.9]);
    store.add("near.jpg", [0.25]);
    store.add("middle.jpg", [0.5]);

    const ranked = await rankReferences([0], store, distance);
    expect(ranked).toEqual([
      { reference: "near.jpg", confidence: 0.75 },
      { reference: "middle.jpg", confidence: 0.5 },
      { reference: "far.jpg", confidence: 1 - 0.9 },
    ]);
  });

  it("keeps load order between equally distant references", async () => {
    const store = new ReferenceStore();
    store.add("zeta.jpg", [0.5]);
    store.add("alpha.jpg", [0.5]);
    store.add("mid.jpg", [0.5]);

    const ranked = await rankReferences([0.25], store, distance);
    expect(ranked.map((e) => e.reference)).toEqual(["zeta.jpg", "alpha.jpg", "mid.jpg"]);
  });

  it("keeps load order when distances resolve out of order", async () => {
    const store = new ReferenceStore();
    store.add("slow.jpg", [0.5]);
    store.add("fast.jpg", [0.5]);
    const slow = store.references()[0].embedding;
    const delayed = (a: readonly number[], b: readonly number[]) =>
      new Promise<number>((resolve) => {
        setTimeout(() => resolve(distance(a, b)), b === slow ? 20 : 0);
      });

    const ranked = await rankReferences([0.25], store, delayed);
    expect(ranked.map((e) => e.reference)).toEqual(["slow.jpg", "fast.jpg"]);
  });
});

describe("topK", () => {
  it("keeps at most five entries by default", () => {
    const entries = Array.from({ length: 8 }, (_, i) => ({ reference: `r${i}`, confidence: 1 - i / 10 }));
    expect(topK(entries).map((e) => e.reference)).toEqual(["r0", "r1", "r2", "r3", "r4"]);
    expect(topK(entries.slice(0, 2))).toHaveLength(2);
  });
});
