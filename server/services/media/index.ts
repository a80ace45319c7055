/**
 * Media Pipeline
 *
 * Turns remote clip references and uploaded files into multi-quality video
 * assets in object storage, and tears them down again.
 *
 * Prerequisites: yt-dlp, ffmpeg and ffprobe must be installed on the host.
 *
 * Architecture:
 *   1. ClipProbe             — resolve a clip reference via yt-dlp metadata
 *   2. VariantDownloader     — fetch one MP4 per available height
 *   3. ThumbnailExtractor    — grab one JPEG frame with ffmpeg
 *   4. StreamProbe           — read height/duration of a local file via ffprobe
 *   5. IngestionOrchestrator — probe → download → upload → commit
 *   6. DeletionPurger        — five-layer version-aware purge
 *   7. MediaPipeline         — caller-facing entry points and admin sagas
 *
 * @module services/media
 */

export type {
  ClipProbeResult,
  DownloadedFile,
  StreamInfo,
  VariantDescriptor,
  ObjectVersion,
  PurgeResult,
  ProcessedIcon,
  IngestStage,
} from "./types";

export {
  MediaPipelineError,
  ProbeError,
  DownloadError,
  StoreError,
  ValidationError,
  ThumbnailError,
  IngestError,
  describeError,
} from "./errors";
export type { MediaErrorCode, StoreOperation } from "./errors";

export * from "./keys";
export * from "./quality";

export { runTool, checkToolsAvailable } from "./commands";
export type { ToolRunner, ExecResult, RunOptions } from "./commands";

export { S3ObjectStore, createS3Client } from "./objectStore";
export type { ObjectStore } from "./objectStore";

export { ClipProbe } from "./clipProbe";
export { VariantDownloader } from "./variantDownloader";
export { ThumbnailExtractor } from "./thumbnail";
export { StreamProbe } from "./ffprobe";
export { IconProcessor } from "./iconProcessor";
export { Saga, OutcomeTally } from "./saga";
export { IngestionOrchestrator } from "./ingestion";
export type { IngestionDeps } from "./ingestion";
export { DeletionPurger } from "./purge";
export { MediaPipeline } from "./pipeline";
export type { MediaPipelineDeps, EventDeletionResult } from "./pipeline";
