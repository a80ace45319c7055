/**
 * Media pipeline — Storage key builders
 *
 * Every object that belongs to an event lives under `clips/<eventId>/`; the
 * event id is the only namespace key. Streamer icons live at a fixed path and
 * are overwritten on re-upload.
 *
 *   clips/{eventId}/{clipId}_{height}p.mp4      remote-ingest variant
 *   clips/{eventId}/{clipId}_thumb_{label}.jpg  per-variant thumbnail
 *   clips/{eventId}/{eventId}.mp4               manual upload
 *   clips/{eventId}/thumb.jpg                   manual-upload thumbnail
 *   assets/icons/streamer_{streamerId}.png      streamer icon
 */

function assertId(id: number, what: string): void {
  if (!Number.isSafeInteger(id) || id <= 0) {
    throw new RangeError(`${what} must be a positive integer, got ${id}`);
  }
}

export function clipPrefix(eventId: number): string {
  assertId(eventId, "eventId");
  return `clips/${eventId}/`;
}

export function clipObjectKey(eventId: number, filename: string): string {
  if (!filename || filename.includes("/") || filename.includes("\\") || filename === "." || filename === "..") {
    throw new RangeError(`Invalid object filename "${filename}"`);
  }
  return `${clipPrefix(eventId)}${filename}`;
}

export function uploadVideoKey(eventId: number): string {
  return clipObjectKey(eventId, `${eventId}.mp4`);
}

export function uploadThumbnailKey(eventId: number): string {
  return clipObjectKey(eventId, "thumb.jpg");
}

export function variantThumbnailName(clipId: string, qualityLabel: string): string {
  return `${clipId}_thumb_${qualityLabel}.jpg`;
}

/** Zero-byte "folder" objects some clients create for the event prefix. */
export function folderMarkerKeys(eventId: number): [string, string] {
  assertId(eventId, "eventId");
  return [`clips/${eventId}`, `clips/${eventId}/`];
}

export function streamerIconKey(streamerId: number): string {
  assertId(streamerId, "streamerId");
  return `assets/icons/streamer_${streamerId}.png`;
}

export function publicUrlFor(baseUrl: string, key: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/${key}`;
}

/** Rejects a variant key that would escape its event's prefix. */
export function assertUnderPrefix(key: string, eventId: number): void {
  if (!isUnderPrefix(key, eventId)) {
    throw new RangeError(`Storage key "${key}" is outside ${clipPrefix(eventId)}`);
  }
}

export function isUnderPrefix(key: string, eventId: number): boolean {
  return key.startsWith(clipPrefix(eventId));
}
