/**
 * Media pipeline — Streamer icon processing
 *
 * Validates an uploaded image as a square icon and re-encodes it as PNG,
 * downscaling anything larger than {@link ICON_MAX_EDGE}. Checks run in a
 * fixed order: decode, square, minimum edge, resize, encode.
 */

import { join } from "node:path";
import sharp from "sharp";
import type { Logger } from "../../logger";
import { ValidationError } from "./errors";
import { ICON_MAX_EDGE, ICON_MIN_EDGE } from "./quality";
import type { ProcessedIcon } from "./types";

export const ICON_FILENAME = "icon.png";

export class IconProcessor {
  constructor(private readonly logger: Logger) {}

  async processIcon(inputPath: string, outputDir: string): Promise<ProcessedIcon> {
    let width: number | undefined;
    let height: number | undefined;
    try {
      ({ width, height } = await sharp(inputPath).metadata());
    } catch {
      throw new ValidationError("Icon could not be read as an image");
    }
    if (!width || !height) {
      throw new ValidationError("Icon could not be read as an image");
    }

    if (width !== height) {
      throw new ValidationError(`Icon must be square (got ${width}x${height})`);
    }
    if (width < ICON_MIN_EDGE) {
      throw new ValidationError(`Icon must be at least ${ICON_MIN_EDGE}x${ICON_MIN_EDGE} pixels (got ${width}x${height})`);
    }

    const outputPath = join(outputDir, ICON_FILENAME);
    let pipeline = sharp(inputPath);
    if (width > ICON_MAX_EDGE) {
      pipeline = pipeline.resize(ICON_MAX_EDGE, ICON_MAX_EDGE, { fit: "inside", withoutEnlargement: true });
    }
    const info = await pipeline.png().toFile(outputPath);

    this.logger.info("[IconProcessor] Icon processed", { from: width, to: info.width });
    return { path: outputPath, size: info.width };
  }
}
