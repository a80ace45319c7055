/**
 * Media pipeline configuration
 *
 * Turns the validated environment into the immutable struct that is handed to
 * each pipeline component at construction. Nothing below the composition root
 * reads `process.env`.
 */

import { tmpdir } from "node:os";
import { basename, dirname, join } from "node:path";
import type { Env } from "./env";

export interface StorageConfig {
  bucket: string;
  endpoint: string;
  region: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  forcePathStyle: boolean;
}

export interface ToolPaths {
  ffmpeg: string;
  ffprobe: string;
  ytdlp: string;
  /** Passed verbatim to yt-dlp's `--extractor-args` when set. */
  ytdlpExtractorArgs?: string;
}

export interface ToolTimeouts {
  probeMs: number;
  downloadMs: number;
  ffmpegMs: number;
}

export interface MediaConfig {
  storage: StorageConfig;
  publicBaseUrl: string;
  tools: ToolPaths;
  timeouts: ToolTimeouts;
  scratchRoot: string;
}

/**
 * Derive the ffprobe binary from an ffmpeg path, keeping its directory and
 * extension (`/opt/ff/bin/ffmpeg.exe` → `/opt/ff/bin/ffprobe.exe`).
 */
export function deriveFfprobePath(ffmpegPath: string): string {
  const name = basename(ffmpegPath);
  if (!name.startsWith("ffmpeg")) return "ffprobe";
  const probeName = `ffprobe${name.slice("ffmpeg".length)}`;
  return name === ffmpegPath ? probeName : join(dirname(ffmpegPath), probeName);
}

export function loadMediaConfig(env: Env): MediaConfig {
  return Object.freeze({
    storage: Object.freeze({
      bucket: env.S3_BUCKET,
      endpoint: env.S3_ENDPOINT,
      region: env.S3_REGION,
      accessKeyId: env.S3_ACCESS_KEY_ID,
      secretAccessKey: env.S3_SECRET_ACCESS_KEY,
      forcePathStyle: env.S3_FORCE_PATH_STYLE,
    }),
    publicBaseUrl: env.MEDIA_PUBLIC_BASE_URL,
    tools: Object.freeze({
      ffmpeg: env.FFMPEG_PATH,
      ffprobe: env.FFPROBE_PATH ?? deriveFfprobePath(env.FFMPEG_PATH),
      ytdlp: env.YTDLP_PATH,
      ytdlpExtractorArgs: env.YTDLP_EXTRACTOR_ARGS,
    }),
    timeouts: Object.freeze({
      probeMs: env.PROBE_TIMEOUT_MS,
      downloadMs: env.DOWNLOAD_TIMEOUT_MS,
      ffmpegMs: env.FFMPEG_TIMEOUT_MS,
    }),
    scratchRoot: env.SCRATCH_DIR ?? tmpdir(),
  });
}
