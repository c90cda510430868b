export interface BoundingBox {
  width: number;
  height: number;
  left: number;
  top: number;
}

export interface FaceRegion {
  /** Relative to the image, 0-1 */
  boundingBox: BoundingBox;
  /** Detector confidence, 0-100 */
  confidence: number;
}

/** Numeric face descriptor, for engines that produce one. */
export type Embedding = readonly number[];

/**
 * Face detection and embedding capability the matcher depends on.
 * `detectFaces` resolves to an empty list when there are no faces; it only
 * rejects when the image cannot be processed at all.
 *
 * `E` is whatever the engine needs to compare two faces later: a vector,
 * or a face crop for engines that compare remotely.
 */
export interface FaceEngine<E = Embedding> {
  readonly name: string;
  detectFaces(image: Buffer): Promise<FaceRegion[]>;
  embed(image: Buffer, region: FaceRegion): Promise<E>;
  /** Non-negative identity distance; 0 is the same person, 1 or more is unrelated. */
  distance(a: E, b: E): number | Promise<number>;
}

export interface DetectedFace<E = Embedding> {
  region: FaceRegion;
  embedding: E;
}
