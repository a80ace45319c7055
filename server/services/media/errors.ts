/**
 * Media pipeline — Error taxonomy
 *
 * Each failure mode has its own class and a machine-readable `code`, so
 * callers can branch on `instanceof` and log the code.
 */

export type MediaErrorCode =
  | "PROBE_FAILED"
  | "DOWNLOAD_FAILED"
  | "STORE_FAILED"
  | "VALIDATION_FAILED"
  | "THUMBNAIL_FAILED"
  | "INGEST_FAILED";

export class MediaPipelineError extends Error {
  constructor(
    readonly code: MediaErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "MediaPipelineError";
  }
}

/** Clip reference is unreachable, unrecognised or has no playable media. */
export class ProbeError extends MediaPipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PROBE_FAILED", message, options);
    this.name = "ProbeError";
  }
}

/** Downloader exited non-zero or left no usable files. */
export class DownloadError extends MediaPipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("DOWNLOAD_FAILED", message, options);
    this.name = "DownloadError";
  }
}

export type StoreOperation =
  | "put"
  | "list"
  | "listVersions"
  | "head"
  | "delete"
  | "deleteVersion";

/** Transport or auth failure on a single object-store call. */
export class StoreError extends MediaPipelineError {
  constructor(
    readonly operation: StoreOperation,
    readonly target: string,
    options?: { cause?: unknown }
  ) {
    super("STORE_FAILED", `Object store ${operation} failed for "${target}": ${describeError(options?.cause)}`, options);
    this.name = "StoreError";
  }
}

/** User-supplied input was rejected; the message is safe to show verbatim. */
export class ValidationError extends MediaPipelineError {
  constructor(message: string) {
    super("VALIDATION_FAILED", message);
    this.name = "ValidationError";
  }
}

export class ThumbnailError extends MediaPipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("THUMBNAIL_FAILED", message, options);
    this.name = "ThumbnailError";
  }
}

/** Ingestion failed at `step`; compensations have already run when this is thrown by a saga. */
export class IngestError extends MediaPipelineError {
  /** Compensations that failed during rollback; non-zero means cleanup was incomplete. */
  compensationFailures = 0;

  constructor(
    readonly eventId: number,
    readonly step: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super("INGEST_FAILED", message, options);
    this.name = "IngestError";
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (err === undefined) return "unknown error";
  return String(err);
}
