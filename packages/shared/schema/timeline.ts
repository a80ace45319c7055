import { z } from "zod";
import {
  pgTable,
  text,
  serial,
  integer,
  bigint,
  doublePrecision,
  timestamp,
  varchar,
  index,
  uniqueIndex,
} from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";

// Timeline entries. `videoUrl` is a denormalised pointer to the best variant and
// stays empty while the event is a placeholder awaiting media.
export const events = pgTable(
  "events",
  {
    id: serial("id").primaryKey(),
    slug: varchar("slug", { length: 200 }),
    title: text("title").notNull(),
    body: text("body").notNull(),
    videoUrl: varchar("video_url", { length: 1000 }).notNull().default(""),
    originalClipUrl: varchar("original_clip_url", { length: 1000 }),
    thumbnailUrl: varchar("thumbnail_url", { length: 1000 }),
    createdAt: timestamp("created_at").defaultNow().notNull(),
  },
  (table) => ({
    slugIdx: uniqueIndex("IDX_events_slug").on(table.slug),
    createdAtIdx: index("IDX_events_created_at").on(table.createdAt),
  })
);

// One row per quality rendition. Rows go away with their event.
export const eventVideos = pgTable(
  "event_videos",
  {
    id: serial("id").primaryKey(),
    eventId: integer("event_id")
      .notNull()
      .references(() => events.id, { onDelete: "cascade" }),
    qualityLabel: varchar("quality_label", { length: 20 }).notNull(),
    mime: varchar("mime", { length: 100 }).notNull(),
    filesize: bigint("filesize", { mode: "number" }).notNull().default(0),
    durationS: doublePrecision("duration_s").notNull().default(0),
    storageKey: varchar("storage_key", { length: 1000 }).notNull(),
    publicUrl: varchar("public_url", { length: 1000 }).notNull(),
    createdAt: timestamp("created_at").defaultNow().notNull(),
  },
  (table) => ({
    eventIdx: index("IDX_event_videos_event_id").on(table.eventId),
  })
);

export const streamers = pgTable("streamers", {
  id: serial("id").primaryKey(),
  name: varchar("name", { length: 200 }).notNull().unique(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

const SLUG_PATTERN = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;

export const insertEventSchema = createInsertSchema(events, {
  title: z.string().trim().min(1, "Title is required").max(300),
  body: z.string().trim().min(1, "Body is required"),
  slug: z
    .string()
    .trim()
    .max(200)
    .regex(SLUG_PATTERN, "Slug may only contain lowercase letters, digits and dashes")
    .nullable()
    .optional(),
}).pick({
  title: true,
  body: true,
  slug: true,
  createdAt: true,
});

export type Event = typeof events.$inferSelect;
export type InsertEvent = z.infer<typeof insertEventSchema>;
export type EventVideo = typeof eventVideos.$inferSelect;
export type InsertEventVideo = typeof eventVideos.$inferInsert;
export type Streamer = typeof streamers.$inferSelect;
