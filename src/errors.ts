export type ErrorCode =
  | "INPUT_NOT_FOUND"
  | "INVALID_IMAGE_FORMAT"
  | "NO_FACES_DETECTED"
  | "EMPTY_REFERENCE_SET"
  | "PHOTO_PROCESSING"
  | "FILE_ACCESS"
  | "CONFIG"
  | "TIMEOUT";

export class FacesortError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InputNotFoundError extends FacesortError {
  constructor(message: string) {
    super("INPUT_NOT_FOUND", message);
  }
}

export class InvalidImageFormatError extends FacesortError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INVALID_IMAGE_FORMAT", message, options);
  }
}

/** Raised only while loading a single reference image. */
export class NoFacesDetectedError extends FacesortError {
  constructor(readonly imagePath: string) {
    super("NO_FACES_DETECTED", `No faces detected in reference image: ${imagePath}`);
  }
}

export class EmptyReferenceSetError extends FacesortError {
  constructor(directory: string) {
    super("EMPTY_REFERENCE_SET", `No valid reference faces found in the reference directory: ${directory}`);
  }
}

export class FileAccessError extends FacesortError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("FILE_ACCESS", message, options);
  }
}

export class ConfigError extends FacesortError {
  constructor(message: string) {
    super("CONFIG", message);
  }
}

export class TimeoutError extends FacesortError {
  constructor(operation: string, readonly timeoutMs: number) {
    super("TIMEOUT", `${operation} timed out after ${timeoutMs}ms`);
  }
}

/**
 * Wraps whatever went wrong while handling one photo of a batch, so the
 * orchestrator can count and log it with the offending path.
 */
export class PhotoProcessingError extends FacesortError {
  constructor(readonly photoPath: string, cause: unknown) {
    super("PHOTO_PROCESSING", `Error processing image ${photoPath}: ${errorMessage(cause)}`, { cause });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
