/**
 * Media pipeline — Remote clip probe
 *
 * Resolves a clip reference to its canonical id, duration and best thumbnail
 * by asking yt-dlp for metadata only (`--skip-download`).
 */

import type { Logger } from "../../logger";
import { describeError, ProbeError } from "./errors";
import type { ToolRunner } from "./commands";
import type { ClipProbeResult } from "./types";

export interface YtDlpOptions {
  bin: string;
  timeoutMs: number;
  extractorArgs?: string;
}

// Clip hosts reject requests that lack a browser-like referer and agent.
const REQUEST_HEADERS = {
  referer: "https://www.twitch.tv/",
  userAgent: "Mozilla/5.0",
};

export function requestHeaderArgs(extractorArgs?: string): string[] {
  const args = ["--referer", REQUEST_HEADERS.referer, "--user-agent", REQUEST_HEADERS.userAgent];
  if (extractorArgs) args.push("--extractor-args", extractorArgs);
  return args;
}

export function assertClipUrl(clipRef: string): URL {
  let url: URL;
  try {
    url = new URL(clipRef);
  } catch {
    throw new ProbeError(`Unrecognised clip reference "${clipRef}"`);
  }
  if (url.protocol !== "https:" && url.protocol !== "http:") {
    throw new ProbeError(`Unsupported clip reference scheme "${url.protocol}"`);
  }
  return url;
}

/** Keep ids usable as filename and key fragments. */
export function sanitizeClipId(raw: unknown): string {
  const cleaned = typeof raw === "string" || typeof raw === "number" ? String(raw).replace(/[^A-Za-z0-9_-]/g, "") : "";
  return cleaned || "clip";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Highest candidate by height wins; the single `thumbnail` field is the fallback.
function pickThumbnail(info: Record<string, unknown>): string | undefined {
  const candidates: unknown[] = Array.isArray(info.thumbnails) ? info.thumbnails : [];
  let best: { url: string; height: number } | undefined;
  for (const candidate of candidates) {
    if (!isRecord(candidate) || typeof candidate.url !== "string") continue;
    const height = typeof candidate.height === "number" ? candidate.height : 0;
    if (!best || height > best.height) best = { url: candidate.url, height };
  }
  if (best) return best.url;
  return typeof info.thumbnail === "string" && info.thumbnail ? info.thumbnail : undefined;
}

function hasPlayableMedia(info: Record<string, unknown>): boolean {
  const formats = info.formats;
  if (Array.isArray(formats) && formats.length > 0) return true;
  const requested = info.requested_formats;
  if (Array.isArray(requested) && requested.length > 0) return true;
  return typeof info.url === "string" && info.url.length > 0;
}

export class ClipProbe {
  constructor(
    private readonly ytdlp: YtDlpOptions,
    private readonly run: ToolRunner,
    private readonly logger: Logger
  ) {}

  async probe(clipRef: string): Promise<ClipProbeResult> {
    assertClipUrl(clipRef);

    let stdout: string;
    try {
      ({ stdout } = await this.run(
        this.ytdlp.bin,
        [
          "--dump-single-json",
          "--skip-download",
          "--no-warnings",
          "--no-playlist",
          ...requestHeaderArgs(this.ytdlp.extractorArgs),
          clipRef,
        ],
        { timeoutMs: this.ytdlp.timeoutMs }
      ));
    } catch (err) {
      throw new ProbeError(`Could not resolve clip: ${describeError(err)}`, { cause: err });
    }

    let info: unknown;
    try {
      info = JSON.parse(stdout);
    } catch (err) {
      throw new ProbeError("Clip metadata was not valid JSON", { cause: err });
    }
    if (!isRecord(info)) {
      throw new ProbeError("Clip metadata was not an object");
    }

    if (!hasPlayableMedia(info)) {
      throw new ProbeError("Clip has no playable media");
    }

    const result: ClipProbeResult = {
      canonicalId: sanitizeClipId(info.id),
      durationSeconds: typeof info.duration === "number" && info.duration > 0 ? info.duration : 0,
    };
    const thumbnailHint = pickThumbnail(info);
    if (thumbnailHint) result.thumbnailHint = thumbnailHint;

    this.logger.info("[ClipProbe] Resolved clip", {
      clipRef,
      canonicalId: result.canonicalId,
      durationSeconds: result.durationSeconds,
    });
    return result;
  }
}
