export type ErrorCode =
  | "MALFORMED_INPUT"
  | "RESOLUTION"
  | "DOWNLOAD"
  | "STORAGE"
  | "DATASET";

export class PipelineError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Source table is missing a required column or holds a non-string value */
export class MalformedInputError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("MALFORMED_INPUT", message, options);
  }
}

/** Search returned nothing, or the search itself failed */
export class ResolutionError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("RESOLUTION", message, options);
  }
}

/** Resolve succeeded but the clip could not be produced */
export class DownloadError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("DOWNLOAD", message, options);
  }
}

/** Storage root cannot be created or listed */
export class StorageError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("STORAGE", message, options);
  }
}

export class DatasetError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("DATASET", message, options);
  }
}

export const errorMessage = (e: unknown): string =>
  e instanceof Error ? e.message : String(e);
