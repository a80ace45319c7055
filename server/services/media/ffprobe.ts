/**
 * Media pipeline — Stream probe
 *
 * Reads the first video stream's height and the container duration with
 * ffprobe. Never throws: a file ffprobe cannot read yields `null`.
 */

import type { Logger } from "../../logger";
import type { ToolRunner } from "./commands";
import { describeError } from "./errors";
import type { StreamInfo } from "./types";

export interface FfprobeOptions {
  bin: string;
  timeoutMs: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ffprobe prints numbers in `format` as strings ("12.345000")
function toNumber(value: unknown): number {
  if (typeof value === "number") return value;
  if (typeof value === "string") return parseFloat(value);
  return NaN;
}

export function parseStreamInfo(stdout: string): StreamInfo | null {
  let data: unknown;
  try {
    data = JSON.parse(stdout);
  } catch {
    return null;
  }
  if (!isRecord(data)) return null;

  const streams = Array.isArray(data.streams) ? data.streams : [];
  const first: unknown = streams[0];
  const height = isRecord(first) ? toNumber(first.height) : NaN;
  if (!Number.isFinite(height) || height <= 0) return null;

  const duration = isRecord(data.format) ? toNumber(data.format.duration) : NaN;
  return {
    height: Math.round(height),
    durationSeconds: Number.isFinite(duration) && duration > 0 ? duration : 0,
  };
}

export class StreamProbe {
  constructor(
    private readonly ffprobe: FfprobeOptions,
    private readonly run: ToolRunner,
    private readonly logger: Logger
  ) {}

  async probeStream(videoPath: string): Promise<StreamInfo | null> {
    try {
      const { stdout } = await this.run(
        this.ffprobe.bin,
        [
          "-v",
          "error",
          "-select_streams",
          "v:0",
          "-show_entries",
          "stream=height:format=duration",
          "-of",
          "json",
          videoPath,
        ],
        { timeoutMs: this.ffprobe.timeoutMs }
      );
      const info = parseStreamInfo(stdout);
      if (!info) {
        this.logger.warn("[StreamProbe] No video stream height reported", { videoPath });
      }
      return info;
    } catch (err) {
      this.logger.warn("[StreamProbe] ffprobe failed", { videoPath, error: describeError(err) });
      return null;
    }
  }
}
