import type { Logger } from "../logger";
import type { Embedding } from "../recognition/types";

export interface ReferenceFace<E = Embedding> {
  readonly identity: string;
  readonly embedding: E;
}

function vectorLength(embedding: unknown): number | undefined {
  return Array.isArray(embedding) ? embedding.length : undefined;
}

/**
 * Reference embeddings in load order. One embedding per identity: the
 * first one added is kept and later ones are rejected. Vector embeddings
 * must all have the length of the first.
 */
export class ReferenceStore<E = Embedding> {
  private faces: ReferenceFace<E>[] = [];
  private identities = new Set<string>();
  private log?: Logger;

  constructor(log?: Logger) {
    this.log = log;
  }

  /** Returns false when the identity is already present. */
  add(identity: string, embedding: E): boolean {
    if (this.identities.has(identity)) {
      this.log?.warn({ identity }, "Duplicate reference identity, keeping the first face");
      return false;
    }

    const expected = this.faces.length > 0 ? vectorLength(this.faces[0].embedding) : undefined;
    const actual = vectorLength(embedding);
    if (expected !== undefined && actual !== expected) {
      throw new Error(`Reference ${identity} has an embedding of length ${actual}, expected ${expected}`);
    }

    this.identities.add(identity);
    this.faces.push(Object.freeze({ identity, embedding }));
    return true;
  }

  has(identity: string): boolean {
    return this.identities.has(identity);
  }

  get size(): number {
    return this.faces.length;
  }

  references(): readonly ReferenceFace<E>[] {
    return this.faces;
  }
}
