import { readdirSync, statSync } from "fs";
import { join, extname } from "path";
import { InputNotFoundError, InvalidImageFormatError } from "../errors";

export const IMAGE_EXTENSIONS: ReadonlySet<string> = new Set([".jpg", ".jpeg", ".png"]);

export type InputSource = { kind: "file"; path: string } | { kind: "directory"; path: string };

export function isSupportedImage(filePath: string): boolean {
  return IMAGE_EXTENSIONS.has(extname(filePath).toLowerCase());
}

function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Accepted images directly inside a directory (no recursion, hidden files
 * skipped), sorted by path.
 */
export function listImageFiles(dirPath: string): string[] {
  let entries;
  try {
    entries = readdirSync(dirPath, { withFileTypes: true });
  } catch {
    throw new InputNotFoundError(`Directory not found: ${dirPath}`);
  }

  const files: string[] = [];
  for (const entry of entries) {
    if (entry.name.startsWith(".") || !entry.isFile()) {
      continue;
    }
    if (isSupportedImage(entry.name)) {
      files.push(join(dirPath, entry.name));
    }
  }
  return files.sort(compareCodeUnits);
}

function isDirectory(p: string): boolean {
  try {
    return statSync(p).isDirectory();
  } catch {
    return false;
  }
}

function isFile(p: string): boolean {
  try {
    return statSync(p).isFile();
  } catch {
    return false;
  }
}

/** Check that a single image path exists and has an accepted extension. */
export function assertImageFile(filePath: string, label: string): void {
  if (!isFile(filePath)) {
    throw new InputNotFoundError(`${label} not found: ${filePath}`);
  }
  if (!isSupportedImage(filePath)) {
    throw new InvalidImageFormatError(`${label} must be JPEG or PNG: ${filePath}`);
  }
}

/** Check that a directory exists and holds at least one accepted image. */
export function assertImageDirectory(dirPath: string, label: string): void {
  if (!isDirectory(dirPath)) {
    throw new InputNotFoundError(`${label} not found: ${dirPath}`);
  }
  if (listImageFiles(dirPath).length === 0) {
    throw new InputNotFoundError(`No valid JPEG/PNG images found in ${label.toLowerCase()}: ${dirPath}`);
  }
}

/** Photos to classify, in processing order. */
export function listInputPhotos(input: InputSource): string[] {
  if (input.kind === "file") {
    assertImageFile(input.path, "Input file");
    return [input.path];
  }
  assertImageDirectory(input.path, "Input directory");
  return listImageFiles(input.path);
}
