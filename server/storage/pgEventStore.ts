import { asc, eq } from "drizzle-orm";
import { eventVideos, events, type Event, type EventVideo } from "@shared/schema";
import { getDb, type Database } from "../db";
import { assertUnderPrefix } from "../services/media/keys";
import { sortByQuality } from "../services/media/quality";
import type { VariantDescriptor } from "../services/media/types";
import type { EventDraft, EventMediaStore, EventMediaUpdate, EventRecord, VideoVariantRecord } from "./types";

function toVariantRecord(row: EventVideo): VideoVariantRecord {
  return {
    id: row.id,
    eventId: row.eventId,
    qualityLabel: row.qualityLabel,
    mime: row.mime,
    filesize: row.filesize,
    durationSeconds: row.durationS,
    storageKey: row.storageKey,
    publicUrl: row.publicUrl,
    createdAt: row.createdAt,
  };
}

function toEventRecord(row: Event): EventRecord {
  return {
    id: row.id,
    slug: row.slug,
    title: row.title,
    body: row.body,
    videoUrl: row.videoUrl,
    originalClipUrl: row.originalClipUrl,
    thumbnailUrl: row.thumbnailUrl,
    createdAt: row.createdAt,
  };
}

export class PgEventMediaStore implements EventMediaStore {
  constructor(private readonly db: () => Database = getDb) {}

  async createPlaceholderEvent(draft: EventDraft): Promise<EventRecord> {
    const [row] = await this.db()
      .insert(events)
      .values({
        title: draft.title,
        body: draft.body,
        slug: draft.slug ?? null,
        videoUrl: "",
        ...(draft.createdAt ? { createdAt: draft.createdAt } : {}),
      })
      .returning();
    if (!row) throw new Error("Event insert returned no row");
    return toEventRecord(row);
  }

  async getEvent(id: number): Promise<EventRecord | undefined> {
    const [row] = await this.db().select().from(events).where(eq(events.id, id)).limit(1);
    return row ? toEventRecord(row) : undefined;
  }

  async updateEventMedia(id: number, media: EventMediaUpdate): Promise<void> {
    await this.db()
      .update(events)
      .set({
        videoUrl: media.videoUrl,
        ...(media.thumbnailUrl !== undefined ? { thumbnailUrl: media.thumbnailUrl } : {}),
        ...(media.originalClipUrl !== undefined ? { originalClipUrl: media.originalClipUrl } : {}),
      })
      .where(eq(events.id, id));
  }

  async addVideoVariant(eventId: number, variant: VariantDescriptor): Promise<VideoVariantRecord> {
    assertUnderPrefix(variant.storageKey, eventId);
    const [row] = await this.db()
      .insert(eventVideos)
      .values({
        eventId,
        qualityLabel: variant.qualityLabel,
        mime: variant.mime,
        filesize: variant.filesize,
        durationS: variant.durationSeconds,
        storageKey: variant.storageKey,
        publicUrl: variant.publicUrl,
      })
      .returning();
    if (!row) throw new Error("Variant insert returned no row");
    return toVariantRecord(row);
  }

  async listVariants(eventId: number): Promise<VideoVariantRecord[]> {
    // Insertion order first; the quality sort is stable on top of it.
    const rows = await this.db()
      .select()
      .from(eventVideos)
      .where(eq(eventVideos.eventId, eventId))
      .orderBy(asc(eventVideos.id));
    return sortByQuality(rows.map(toVariantRecord));
  }

  async listVariantKeys(eventId: number): Promise<string[]> {
    const rows = await this.db()
      .select({ storageKey: eventVideos.storageKey })
      .from(eventVideos)
      .where(eq(eventVideos.eventId, eventId))
      .orderBy(asc(eventVideos.id));
    return rows.map((row) => row.storageKey);
  }

  async deleteEvent(id: number): Promise<boolean> {
    const removed = await this.db().delete(events).where(eq(events.id, id)).returning({ id: events.id });
    return removed.length > 0;
  }
}
