/**
 * Media pipeline — Variant downloader
 *
 * Downloads every quality rendition of a clip into a scratch directory with
 * yt-dlp, one file per height, remuxed to MP4. The output template embeds the
 * height so it can be parsed back out of the filename
 * (`<clipId>_720p.mp4`); when the extractor cannot enumerate heights, the
 * format selector falls back to its single best format (`<clipId>_NAp.mp4`).
 */

import { readdir, stat } from "node:fs/promises";
import { join } from "node:path";
import type { Logger } from "../../logger";
import type { ToolRunner } from "./commands";
import { requestHeaderArgs, type YtDlpOptions } from "./clipProbe";
import { DownloadError, describeError } from "./errors";
import { heightFromFilename } from "./quality";
import type { DownloadedFile } from "./types";

// All renditions that expose a positive height, else the best single format.
export const FORMAT_SELECTOR = "all[height>0]/b";

const PARTIAL_SUFFIXES = [".part", ".ytdl", ".download", ".temp"];

function isPartial(filename: string): boolean {
  return PARTIAL_SUFFIXES.some((suffix) => filename.endsWith(suffix)) || filename.includes(".part-Frag");
}

export class VariantDownloader {
  constructor(
    private readonly ytdlp: YtDlpOptions & { ffmpegLocation: string },
    private readonly run: ToolRunner,
    private readonly logger: Logger
  ) {}

  async download(clipRef: string, clipId: string, scratchDir: string): Promise<DownloadedFile[]> {
    const outputTemplate = join(scratchDir, `${clipId}_%(height)sp.%(ext)s`);

    try {
      await this.run(
        this.ytdlp.bin,
        [
          "-f",
          FORMAT_SELECTOR,
          "-o",
          outputTemplate,
          "--merge-output-format",
          "mp4",
          "--remux-video",
          "mp4",
          "--no-overwrites",
          "--no-playlist",
          "--no-progress",
          "--quiet",
          "--ffmpeg-location",
          this.ytdlp.ffmpegLocation,
          ...requestHeaderArgs(this.ytdlp.extractorArgs),
          clipRef,
        ],
        { timeoutMs: this.ytdlp.timeoutMs }
      );
    } catch (err) {
      throw new DownloadError(`Download failed: ${describeError(err)}`, { cause: err });
    }

    const files = await this.collect(scratchDir, `${clipId}_`);
    if (files.length === 0) {
      throw new DownloadError("Downloader produced no files");
    }

    this.logger.info("[VariantDownloader] Downloaded renditions", {
      clipId,
      files: files.map((f) => f.filename),
    });
    return files;
  }

  private async collect(scratchDir: string, namePrefix: string): Promise<DownloadedFile[]> {
    const names = (await readdir(scratchDir)).filter((name) => name.startsWith(namePrefix) && !isPartial(name)).sort();

    const files: DownloadedFile[] = [];
    for (const filename of names) {
      const path = join(scratchDir, filename);
      const info = await stat(path).catch(() => null);
      if (!info?.isFile() || info.size <= 0) {
        this.logger.debug("[VariantDownloader] Skipping unusable output", { filename });
        continue;
      }
      files.push({ path, filename, height: heightFromFilename(filename), size: info.size });
    }
    return files;
  }
}
