/**
 * Media pipeline — Ingestion orchestrator
 *
 * Turns a remote clip reference (or an already-uploaded local file) into
 * stored variants plus metadata rows for an existing placeholder event.
 *
 * Remote path:
 *   created → probed → downloading → uploading → committed → done
 *                                                    └──────→ failed
 *
 * The orchestrator does not undo anything itself: any failure surfaces as an
 * {@link IngestError} naming the step, and the caller (see `pipeline.ts`)
 * deletes the placeholder and purges the event prefix.
 */

import { mkdtemp, rename, rm, stat } from "node:fs/promises";
import { basename, dirname, extname, join } from "node:path";
import type { Logger } from "../../logger";
import type { EventMediaStore } from "../../storage/types";
import type { ClipProbe } from "./clipProbe";
import { describeError, IngestError, ThumbnailError } from "./errors";
import type { StreamProbe } from "./ffprobe";
import {
  clipObjectKey,
  clipPrefix,
  publicUrlFor,
  uploadThumbnailKey,
  uploadVideoKey,
  variantThumbnailName,
} from "./keys";
import type { ObjectStore } from "./objectStore";
import {
  IMMUTABLE_CACHE_CONTROL,
  labelForHeight,
  qualityHeight,
  qualityLabelFromFilename,
  SOURCE_LABEL,
  sortByQuality,
  THUMBNAIL_AT_SECONDS,
  THUMBNAIL_MIME,
  VIDEO_MIME,
} from "./quality";
import { OutcomeTally } from "./saga";
import type { ThumbnailExtractor } from "./thumbnail";
import type { DownloadedFile, IngestStage, VariantDescriptor } from "./types";
import type { VariantDownloader } from "./variantDownloader";

export interface IngestionDeps {
  objects: ObjectStore;
  events: EventMediaStore;
  probe: Pick<ClipProbe, "probe">;
  downloader: Pick<VariantDownloader, "download">;
  thumbnails: Pick<ThumbnailExtractor, "extractFrame">;
  streams: Pick<StreamProbe, "probeStream">;
  publicBaseUrl: string;
  scratchRoot: string;
  logger: Logger;
}

interface ThumbnailCandidate {
  height: number;
  url: string;
}

export class IngestionOrchestrator {
  private readonly logger: Logger;

  constructor(private readonly deps: IngestionDeps) {
    this.logger = deps.logger;
  }

  async ingestRemoteClip(clipRef: string, eventId: number): Promise<VariantDescriptor[]> {
    this.transition(eventId, "created", { clipRef });
    try {
      const variants = await this.runRemote(clipRef, eventId);
      this.transition(eventId, "done");
      return variants;
    } catch (err) {
      this.transition(eventId, "failed", { error: describeError(err) });
      throw err;
    }
  }

  private async runRemote(clipRef: string, eventId: number): Promise<VariantDescriptor[]> {
    await this.stage(eventId, "validate", async () => clipPrefix(eventId));
    const probed = await this.stage(eventId, "probe", () => this.deps.probe.probe(clipRef));
    this.transition(eventId, "probed", { canonicalId: probed.canonicalId });

    const scratchDir = await this.stage(eventId, "scratch", () =>
      mkdtemp(join(this.deps.scratchRoot, "ingest_clip_"))
    );
    try {
      this.transition(eventId, "downloading");
      const files = await this.stage(eventId, "download", () =>
        this.deps.downloader.download(clipRef, probed.canonicalId, scratchDir)
      );

      this.transition(eventId, "uploading", { files: files.length });
      const { variants, thumbnails, tally } = await this.stage(eventId, "upload", () =>
        this.uploadVariants(files, eventId, probed.canonicalId, probed.durationSeconds, scratchDir)
      );

      const ordered = sortByQuality(variants);
      const best = ordered[0];
      if (!best) {
        throw new IngestError(
          eventId,
          "upload",
          `No variants could be stored (${tally.failed} of ${files.length} uploads failed)`
        );
      }
      const thumbnail = pickEventThumbnail(thumbnails);

      await this.stage(eventId, "commit", async () => {
        await this.deps.events.updateEventMedia(eventId, {
          originalClipUrl: clipRef,
          videoUrl: best.publicUrl,
          ...(thumbnail ? { thumbnailUrl: thumbnail.url } : {}),
        });
        for (const variant of ordered) {
          await this.deps.events.addVideoVariant(eventId, variant);
        }
      });
      this.transition(eventId, "committed", {
        variants: ordered.map((v) => v.qualityLabel),
        skipped: tally.failed,
      });
      return ordered;
    } finally {
      await this.removeScratch(scratchDir);
    }
  }

  async ingestLocalFile(localPath: string, eventId: number): Promise<VariantDescriptor> {
    const key = await this.stage(eventId, "validate", async () => uploadVideoKey(eventId));
    const publicUrl = publicUrlFor(this.deps.publicBaseUrl, key);

    const size = await this.stage(eventId, "upload", async () => {
      const info = await stat(localPath);
      await this.deps.objects.put(localPath, key, VIDEO_MIME, IMMUTABLE_CACHE_CONTROL);
      return info.size;
    });

    const stream = await this.deps.streams.probeStream(localPath);
    const variant: VariantDescriptor = {
      qualityLabel: stream ? labelForHeight(stream.height) : SOURCE_LABEL,
      mime: VIDEO_MIME,
      filesize: size,
      durationSeconds: stream?.durationSeconds ?? 0,
      storageKey: key,
      publicUrl,
    };

    const thumbnailUrl = await this.uploadLocalThumbnail(localPath, eventId);

    await this.stage(eventId, "commit", async () => {
      await this.deps.events.updateEventMedia(eventId, {
        videoUrl: publicUrl,
        ...(thumbnailUrl ? { thumbnailUrl } : {}),
      });
      await this.deps.events.addVideoVariant(eventId, variant);
    });

    this.logger.info("[Ingestion] Local upload stored", {
      eventId,
      qualityLabel: variant.qualityLabel,
      size,
      thumbnail: Boolean(thumbnailUrl),
    });
    return variant;
  }

  private async uploadVariants(
    files: DownloadedFile[],
    eventId: number,
    clipId: string,
    durationSeconds: number,
    scratchDir: string
  ): Promise<{ variants: VariantDescriptor[]; thumbnails: ThumbnailCandidate[]; tally: OutcomeTally }> {
    const variants: VariantDescriptor[] = [];
    const thumbnails: ThumbnailCandidate[] = [];
    const tally = new OutcomeTally();
    const usedKeys = new Set<string>();

    for (const file of files) {
      const qualityLabel = qualityLabelFromFilename(file.filename);
      const local = mp4Target(file);
      const key = clipObjectKey(eventId, local.filename);

      // A renamed rendition must not land on a sibling that already has the mp4 name.
      if (usedKeys.has(key) || (local.path !== file.path && (await pathExists(local.path)))) {
        this.logger.warn("[Ingestion] Skipping duplicate rendition", { eventId, filename: file.filename });
        continue;
      }
      if (local.path !== file.path) await rename(file.path, local.path);

      try {
        await this.deps.objects.put(local.path, key, VIDEO_MIME, IMMUTABLE_CACHE_CONTROL);
      } catch (err) {
        tally.failure(key, err);
        this.logger.warn("[Ingestion] Variant upload failed, skipping", {
          eventId,
          key,
          error: describeError(err),
        });
        continue;
      }
      usedKeys.add(key);
      tally.success();

      const publicUrl = publicUrlFor(this.deps.publicBaseUrl, key);
      variants.push({
        qualityLabel,
        mime: VIDEO_MIME,
        filesize: file.size,
        durationSeconds,
        storageKey: key,
        publicUrl,
      });

      const thumbKey = clipObjectKey(eventId, variantThumbnailName(clipId, qualityLabel));
      const thumbUrl = await this.uploadThumbnail(local.path, join(scratchDir, basename(thumbKey)), thumbKey);
      if (thumbUrl) {
        thumbnails.push({ height: qualityHeight(qualityLabel), url: thumbUrl });
      }
    }

    return { variants, thumbnails, tally };
  }

  private async uploadLocalThumbnail(localPath: string, eventId: number): Promise<string | undefined> {
    let scratchDir: string;
    try {
      scratchDir = await mkdtemp(join(this.deps.scratchRoot, "ingest_upload_"));
    } catch (err) {
      this.logger.warn("[Ingestion] No scratch space for thumbnail", { eventId, error: describeError(err) });
      return undefined;
    }
    try {
      const key = uploadThumbnailKey(eventId);
      return await this.uploadThumbnail(localPath, join(scratchDir, "thumb.jpg"), key);
    } finally {
      await this.removeScratch(scratchDir);
    }
  }

  // Best-effort: a failed frame grab or thumbnail upload only costs the thumbnail.
  private async uploadThumbnail(videoPath: string, imagePath: string, key: string): Promise<string | undefined> {
    try {
      await this.deps.thumbnails.extractFrame(videoPath, THUMBNAIL_AT_SECONDS, imagePath);
      await this.deps.objects.put(imagePath, key, THUMBNAIL_MIME, IMMUTABLE_CACHE_CONTROL);
      return publicUrlFor(this.deps.publicBaseUrl, key);
    } catch (err) {
      const reason = err instanceof ThumbnailError ? "extract" : "upload";
      this.logger.warn(`[Ingestion] Thumbnail ${reason} failed`, { key, error: describeError(err) });
      return undefined;
    }
  }

  private async stage<T>(eventId: number, step: string, action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (err) {
      if (err instanceof IngestError) throw err;
      throw new IngestError(eventId, step, `Ingestion failed at ${step}: ${describeError(err)}`, { cause: err });
    }
  }

  private transition(eventId: number, stage: IngestStage, context: Record<string, unknown> = {}): void {
    if (stage === "failed") {
      this.logger.warn(`[Ingestion] ${stage}`, { eventId, ...context });
    } else {
      this.logger.info(`[Ingestion] ${stage}`, { eventId, ...context });
    }
  }

  private async removeScratch(dir: string): Promise<void> {
    await rm(dir, { recursive: true, force: true }).catch((err: unknown) => {
      this.logger.warn("[Ingestion] Failed to remove scratch directory", { dir, error: describeError(err) });
    });
  }
}

/** Where a rendition lives once it carries the `.mp4` extension it is stored under. */
function mp4Target(file: DownloadedFile): { path: string; filename: string } {
  const ext = extname(file.filename);
  if (ext.toLowerCase() === ".mp4") return { path: file.path, filename: file.filename };

  const filename = `${ext ? file.filename.slice(0, -ext.length) : file.filename}.mp4`;
  return { path: join(dirname(file.path), filename), filename };
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

/** Highest thumbnail wins; the first one recorded wins a tie. */
export function pickEventThumbnail<T extends { height: number }>(candidates: readonly T[]): T | undefined {
  let best: T | undefined;
  for (const candidate of candidates) {
    if (!best || candidate.height > best.height) best = candidate;
  }
  return best;
}
