/**
 * Media pipeline — Thumbnail extraction
 *
 * Grabs exactly one JPEG frame from a local video with ffmpeg.
 */

import { stat } from "node:fs/promises";
import type { Logger } from "../../logger";
import type { ToolRunner } from "./commands";
import { describeError, ThumbnailError } from "./errors";

export interface FfmpegOptions {
  bin: string;
  timeoutMs: number;
}

export class ThumbnailExtractor {
  constructor(
    private readonly ffmpeg: FfmpegOptions,
    private readonly run: ToolRunner,
    private readonly logger: Logger
  ) {}

  async extractFrame(videoPath: string, atSeconds: number, outputPath: string): Promise<string> {
    try {
      await this.run(
        this.ffmpeg.bin,
        ["-y", "-ss", String(atSeconds), "-i", videoPath, "-frames:v", "1", "-q:v", "2", outputPath],
        { timeoutMs: this.ffmpeg.timeoutMs }
      );
    } catch (err) {
      throw new ThumbnailError(`Frame extraction failed: ${describeError(err)}`, { cause: err });
    }

    // ffmpeg exits 0 without writing a frame when the seek lands past the end
    const info = await stat(outputPath).catch(() => null);
    if (!info?.isFile() || info.size === 0) {
      throw new ThumbnailError(`No frame written at ${atSeconds}s`);
    }

    this.logger.debug("[ThumbnailExtractor] Frame extracted", { videoPath, atSeconds, size: info.size });
    return outputPath;
  }
}
