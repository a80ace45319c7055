import type { InsertEvent } from "@shared/schema";
import type { VariantDescriptor } from "../services/media/types";

export type EventDraft = InsertEvent;

export interface EventRecord {
  id: number;
  slug: string | null;
  title: string;
  body: string;
  videoUrl: string;
  originalClipUrl: string | null;
  thumbnailUrl: string | null;
  createdAt: Date;
}

export interface EventMediaUpdate {
  videoUrl: string;
  thumbnailUrl?: string;
  originalClipUrl?: string;
}

export type VideoVariantRecord = VariantDescriptor & {
  id: number;
  eventId: number;
  createdAt: Date;
};

/**
 * Metadata-store collaborator of the media pipeline. Deleting an event
 * removes its variant rows with it.
 */
export interface EventMediaStore {
  createPlaceholderEvent(draft: EventDraft): Promise<EventRecord>;
  getEvent(id: number): Promise<EventRecord | undefined>;
  updateEventMedia(id: number, media: EventMediaUpdate): Promise<void>;
  addVideoVariant(eventId: number, variant: VariantDescriptor): Promise<VideoVariantRecord>;
  /** Best first; equal heights keep insertion order. */
  listVariants(eventId: number): Promise<VideoVariantRecord[]>;
  listVariantKeys(eventId: number): Promise<string[]>;
  deleteEvent(id: number): Promise<boolean>;
}
