/**
 * Media pipeline — Type Definitions
 *
 * Shared interfaces and type aliases for ingestion, storage and teardown.
 */

export interface ClipProbeResult {
  /** Extractor id, reduced to characters that are safe inside a storage key. */
  canonicalId: string;
  durationSeconds: number;
  /** Best thumbnail URL the extractor offered, if any. */
  thumbnailHint?: string;
}

export interface DownloadedFile {
  path: string;
  filename: string;
  /** Pixel height parsed back out of the filename; null when unknown. */
  height: number | null;
  size: number;
}

export interface StreamInfo {
  height: number;
  durationSeconds: number;
}

export interface VariantDescriptor {
  qualityLabel: string;
  mime: string;
  filesize: number;
  durationSeconds: number;
  storageKey: string;
  publicUrl: string;
}

export interface ObjectVersion {
  key: string;
  versionId: string;
  isDeleteMarker: boolean;
}

export interface PurgeResult {
  deleted: number;
  errors: number;
}

export interface ProcessedIcon {
  path: string;
  /** Edge length in pixels after any downscale. */
  size: number;
}

export type IngestStage =
  | "created"
  | "probed"
  | "downloading"
  | "uploading"
  | "committed"
  | "done"
  | "failed";
