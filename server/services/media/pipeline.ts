/**
 * Media pipeline — Caller-facing facade
 *
 * The four entry points a host needs (`ingestRemoteClip`, `ingestLocalFile`,
 * `processIcon`, `purgeEventMedia`) plus the admin flows that wrap them:
 * creating an event from a clip or an upload, deleting an event with its
 * media, and replacing a streamer icon.
 *
 * Event creation runs as a saga. The placeholder row owns the event prefix,
 * so its compensation purges `clips/<id>/` first (while variant rows still
 * name their keys) and then deletes the row.
 */

import { mkdtemp, rm } from "node:fs/promises";
import { join } from "node:path";
import { insertEventSchema } from "@shared/schema";
import type { Logger } from "../../logger";
import type { EventDraft, EventMediaStore, EventRecord } from "../../storage/types";
import { describeError, ValidationError } from "./errors";
import type { IconProcessor } from "./iconProcessor";
import type { IngestionOrchestrator } from "./ingestion";
import { publicUrlFor, streamerIconKey } from "./keys";
import type { ObjectStore } from "./objectStore";
import type { DeletionPurger } from "./purge";
import { ICON_MIME, IMMUTABLE_CACHE_CONTROL } from "./quality";
import { Saga } from "./saga";
import type { ProcessedIcon, PurgeResult, VariantDescriptor } from "./types";

export interface MediaPipelineDeps {
  objects: ObjectStore;
  events: EventMediaStore;
  orchestrator: IngestionOrchestrator;
  purger: DeletionPurger;
  icons: IconProcessor;
  publicBaseUrl: string;
  scratchRoot: string;
  logger: Logger;
}

export interface EventDeletionResult extends PurgeResult {
  removed: boolean;
  /** Set when storage cleanup was incomplete; safe to show to an admin. */
  warning?: string;
}

export class MediaPipeline {
  private readonly logger: Logger;

  constructor(private readonly deps: MediaPipelineDeps) {
    this.logger = deps.logger;
  }

  /**
   * Ingest a remote clip into an existing placeholder event. On failure the
   * event prefix is purged before the error surfaces; the row is left to
   * the caller.
   */
  async ingestRemoteClip(clipRef: string, eventId: number): Promise<VariantDescriptor[]> {
    try {
      return await this.deps.orchestrator.ingestRemoteClip(clipRef, eventId);
    } catch (err) {
      await this.purgeAfterFailure(eventId);
      throw err;
    }
  }

  async ingestLocalFile(localPath: string, eventId: number): Promise<VariantDescriptor> {
    try {
      return await this.deps.orchestrator.ingestLocalFile(localPath, eventId);
    } catch (err) {
      await this.purgeAfterFailure(eventId);
      throw err;
    }
  }

  processIcon(inputPath: string, outputDir: string): Promise<ProcessedIcon> {
    return this.deps.icons.processIcon(inputPath, outputDir);
  }

  purgeEventMedia(eventId: number): Promise<PurgeResult> {
    return this.deps.purger.purge(eventId);
  }

  async createEventFromClip(
    draft: EventDraft,
    clipRef: string
  ): Promise<{ event: EventRecord; variants: VariantDescriptor[] }> {
    const valid = validateDraft(draft);
    const saga = new Saga("create-event-from-clip", this.logger);

    const placeholder = await saga.step("create-placeholder", () => this.createPlaceholder(saga, valid));
    const variants = await saga.step("ingest", async () => ({
      value: await this.deps.orchestrator.ingestRemoteClip(clipRef, placeholder.id),
    }));
    const event = await saga.step("reload", () => this.reload(placeholder.id));
    return { event, variants };
  }

  async createEventFromUpload(
    draft: EventDraft,
    localPath: string
  ): Promise<{ event: EventRecord; variant: VariantDescriptor }> {
    const valid = validateDraft(draft);
    const saga = new Saga("create-event-from-upload", this.logger);

    const placeholder = await saga.step("create-placeholder", () => this.createPlaceholder(saga, valid));
    const variant = await saga.step("ingest", async () => ({
      value: await this.deps.orchestrator.ingestLocalFile(localPath, placeholder.id),
    }));
    const event = await saga.step("reload", () => this.reload(placeholder.id));
    return { event, variant };
  }

  /**
   * Purge storage first, while the variant rows still name their keys, then
   * drop the row. Storage errors never block the row removal.
   */
  async deleteEventWithMedia(eventId: number): Promise<EventDeletionResult> {
    const { deleted, errors } = await this.deps.purger.purge(eventId);
    const removed = await this.deps.events.deleteEvent(eventId);

    const result: EventDeletionResult = { removed, deleted, errors };
    if (errors > 0) {
      result.warning = `Event ${eventId} removed, but ${errors} storage operation(s) failed; some media may remain.`;
    }
    this.logger.info("[MediaPipeline] Event deleted", { eventId, removed, deleted, errors });
    return result;
  }

  async uploadStreamerIcon(inputPath: string, streamerId: number): Promise<string> {
    const key = streamerIconKey(streamerId);
    const scratchDir = await mkdtemp(join(this.deps.scratchRoot, "icon_"));
    try {
      const icon = await this.deps.icons.processIcon(inputPath, scratchDir);
      await this.deps.objects.put(icon.path, key, ICON_MIME, IMMUTABLE_CACHE_CONTROL);
      const url = publicUrlFor(this.deps.publicBaseUrl, key);
      this.logger.info("[MediaPipeline] Streamer icon stored", { streamerId, key, size: icon.size });
      return url;
    } finally {
      await rm(scratchDir, { recursive: true, force: true }).catch((err: unknown) => {
        this.logger.warn("[MediaPipeline] Failed to remove icon scratch directory", {
          scratchDir,
          error: describeError(err),
        });
      });
    }
  }

  private async createPlaceholder(saga: Saga, draft: EventDraft) {
    const event = await this.deps.events.createPlaceholderEvent(draft);
    saga.eventId = event.id;
    return {
      value: event,
      compensate: async () => {
        await this.purgeAfterFailure(event.id);
        await this.deps.events.deleteEvent(event.id);
      },
    };
  }

  private async reload(eventId: number): Promise<{ value: EventRecord }> {
    const event = await this.deps.events.getEvent(eventId);
    if (!event) throw new Error(`Event ${eventId} disappeared during ingestion`);
    return { value: event };
  }

  private async purgeAfterFailure(eventId: number): Promise<void> {
    const { deleted, errors } = await this.deps.purger.purge(eventId);
    if (errors > 0) {
      this.logger.warn("[MediaPipeline] Rollback purge incomplete", { eventId, deleted, errors });
    }
  }
}

function validateDraft(draft: EventDraft): EventDraft {
  const parsed = insertEventSchema.safeParse(draft);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new ValidationError(`${field}${issue?.message ?? "Invalid event"}`);
  }
  return parsed.data;
}
