import { assertUnderPrefix } from "../services/media/keys";
import { sortByQuality } from "../services/media/quality";
import type { VariantDescriptor } from "../services/media/types";
import type { EventDraft, EventMediaStore, EventMediaUpdate, EventRecord, VideoVariantRecord } from "./types";

export class MemEventMediaStore implements EventMediaStore {
  private events: Map<number, EventRecord>;
  private variants: Map<number, VideoVariantRecord>;
  private currentEventId: number;
  private currentVariantId: number;

  constructor() {
    this.events = new Map();
    this.variants = new Map();
    this.currentEventId = 1;
    this.currentVariantId = 1;
  }

  async createPlaceholderEvent(draft: EventDraft): Promise<EventRecord> {
    const slug = draft.slug ?? null;
    if (slug !== null && Array.from(this.events.values()).some((event) => event.slug === slug)) {
      throw new Error(`duplicate key value violates unique constraint "IDX_events_slug"`);
    }
    const id = this.currentEventId++;
    const event: EventRecord = {
      id,
      slug,
      title: draft.title,
      body: draft.body,
      videoUrl: "",
      originalClipUrl: null,
      thumbnailUrl: null,
      createdAt: draft.createdAt ?? new Date(),
    };
    this.events.set(id, event);
    return { ...event };
  }

  async getEvent(id: number): Promise<EventRecord | undefined> {
    const event = this.events.get(id);
    return event ? { ...event } : undefined;
  }

  async updateEventMedia(id: number, media: EventMediaUpdate): Promise<void> {
    const event = this.events.get(id);
    if (!event) throw new Error(`Event ${id} not found`);
    event.videoUrl = media.videoUrl;
    if (media.thumbnailUrl !== undefined) event.thumbnailUrl = media.thumbnailUrl;
    if (media.originalClipUrl !== undefined) event.originalClipUrl = media.originalClipUrl;
  }

  async addVideoVariant(eventId: number, variant: VariantDescriptor): Promise<VideoVariantRecord> {
    if (!this.events.has(eventId)) {
      throw new Error(`insert on "event_videos" violates foreign key constraint (event ${eventId})`);
    }
    assertUnderPrefix(variant.storageKey, eventId);
    const id = this.currentVariantId++;
    const record: VideoVariantRecord = { ...variant, id, eventId, createdAt: new Date() };
    this.variants.set(id, record);
    return { ...record };
  }

  async listVariants(eventId: number): Promise<VideoVariantRecord[]> {
    const rows = Array.from(this.variants.values())
      .filter((variant) => variant.eventId === eventId)
      .sort((a, b) => a.id - b.id)
      .map((variant) => ({ ...variant }));
    return sortByQuality(rows);
  }

  async listVariantKeys(eventId: number): Promise<string[]> {
    return (await this.listVariants(eventId)).map((variant) => variant.storageKey);
  }

  async deleteEvent(id: number): Promise<boolean> {
    if (!this.events.delete(id)) return false;
    for (const [variantId, variant] of Array.from(this.variants.entries())) {
      if (variant.eventId === id) this.variants.delete(variantId);
    }
    return true;
  }

  /** Number of events held; tests use it to assert rollback. */
  get eventCount(): number {
    return this.events.size;
  }

  get variantCount(): number {
    return this.variants.size;
  }
}
