/**
 * Media pipeline — Quality labels & constants
 *
 * Variants are labelled by pixel height ("720p"). Labels without a height
 * ("source", "best") rank as height 0, i.e. after every measured rendition.
 */

export const VIDEO_MIME = "video/mp4";
export const THUMBNAIL_MIME = "image/jpeg";
export const ICON_MIME = "image/png";

// Stored media never changes under a given key, so it is cached for a year.
export const IMMUTABLE_CACHE_CONTROL = "public, max-age=31536000, immutable";

export const SOURCE_LABEL = "source";
export const BEST_LABEL = "best";

export const THUMBNAIL_AT_SECONDS = 1;

export const ICON_MIN_EDGE = 32;
export const ICON_MAX_EDGE = 128;

const LABEL_HEIGHT = /(\d{3,4})p/;
const FILENAME_HEIGHT = /_(\d{3,4})p\./;

export function qualityHeight(label: string | null | undefined): number {
  const match = LABEL_HEIGHT.exec(label ?? "");
  return match ? Number(match[1]) : 0;
}

export function heightFromFilename(filename: string): number | null {
  const match = FILENAME_HEIGHT.exec(filename);
  return match ? Number(match[1]) : null;
}

export function qualityLabelFromFilename(filename: string): string {
  const height = heightFromFilename(filename);
  return height === null ? BEST_LABEL : labelForHeight(height);
}

export function labelForHeight(height: number): string {
  return `${height}p`;
}

/**
 * Best-first ordering. `Array.prototype.sort` is stable, so equal heights
 * keep their upload order.
 */
export function sortByQuality<T extends { qualityLabel: string }>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => qualityHeight(b.qualityLabel) - qualityHeight(a.qualityLabel));
}
