import { readFile } from "fs/promises";
import { basename } from "path";
import type { Logger } from "../logger";
import type { FaceEngine } from "../recognition/types";
import { EmptyReferenceSetError, FileAccessError, NoFacesDetectedError, errorMessage } from "../errors";
import { assertImageDirectory, assertImageFile, listImageFiles, type InputSource } from "../sources/local";
import { ReferenceStore } from "./store";

export const DEFAULT_MAX_REFERENCE_IMAGES = 100;

export type ReferenceSource = InputSource;

export interface ReferenceLoadReport {
  loaded: number;
  /** Candidates without a usable face */
  skipped: number;
  /** Candidates never looked at because the cap was reached */
  overCap: number;
}

export interface LoadedReferences<E> {
  store: ReferenceStore<E>;
  report: ReferenceLoadReport;
}

export interface LoadReferencesOptions {
  maxImages?: number;
  onReference?: (path: string, loaded: number) => void;
}

type ReferenceFaceResult = { status: "loaded" } | { status: "no-faces" };

async function readImage(path: string): Promise<Buffer> {
  try {
    return await readFile(path);
  } catch (error) {
    throw new FileAccessError(`Cannot read ${path}: ${errorMessage(error)}`, { cause: error });
  }
}

/** Embed the first face of one reference image into the store. */
async function addReferenceImage<E>(
  path: string,
  store: ReferenceStore<E>,
  engine: FaceEngine<E>,
  log: Logger
): Promise<ReferenceFaceResult> {
  const image = await readImage(path);
  const faces = await engine.detectFaces(image);

  if (faces.length === 0) {
    return { status: "no-faces" };
  }
  if (faces.length > 1) {
    log.warn({ path, faceCount: faces.length }, "Multiple faces detected in reference image, using the first face");
  }

  const embedding = await engine.embed(image, faces[0]);
  store.add(basename(path), embedding);
  return { status: "loaded" };
}

/**
 * Build the reference store from one image or a directory of images.
 *
 * A single image must contain a face. In a directory every candidate is
 * tried in path order; failures are logged and skipped, and loading stops
 * once `maxImages` references are in the store.
 */
export async function loadReferences<E>(
  source: ReferenceSource,
  engine: FaceEngine<E>,
  log: Logger,
  options: LoadReferencesOptions = {}
): Promise<LoadedReferences<E>> {
  const store = new ReferenceStore<E>(log);
  const report: ReferenceLoadReport = { loaded: 0, skipped: 0, overCap: 0 };

  if (source.kind === "file") {
    assertImageFile(source.path, "Reference image");
    try {
      const result = await addReferenceImage(source.path, store, engine, log);
      if (result.status === "no-faces") {
        throw new NoFacesDetectedError(source.path);
      }
    } catch (error) {
      log.error({ path: source.path, error: errorMessage(error) }, "Error processing reference image");
      throw error;
    }
    report.loaded = store.size;
    options.onReference?.(source.path, report.loaded);
    log.info({ path: source.path }, "Loaded reference face");
    return { store, report };
  }

  assertImageDirectory(source.path, "Reference directory");
  const maxImages = options.maxImages ?? DEFAULT_MAX_REFERENCE_IMAGES;
  const candidates = listImageFiles(source.path);

  for (let i = 0; i < candidates.length; i++) {
    if (store.size >= maxImages) {
      report.overCap = candidates.length - i;
      log.warn(
        { maxImages, remaining: report.overCap },
        `Reached limit of ${maxImages} reference images. Skipping remaining images.`
      );
      break;
    }

    const path = candidates[i];
    try {
      const result = await addReferenceImage(path, store, engine, log);
      if (result.status === "no-faces") {
        log.warn({ path }, "No faces detected in reference image, skipping");
        report.skipped++;
      }
    } catch (error) {
      log.error({ path, error: errorMessage(error) }, "Error processing reference image");
      report.skipped++;
    }
    options.onReference?.(path, store.size);
  }

  report.loaded = store.size;
  if (store.size === 0) {
    throw new EmptyReferenceSetError(source.path);
  }

  log.info(report, `Loaded ${report.loaded} reference faces, skipped ${report.skipped} invalid images`);
  return { store, report };
}
