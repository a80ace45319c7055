import { describe, it, expect, beforeEach } from "vitest";
import { DeletionPurger } from "../purge";
import { MemEventMediaStore } from "../../../storage/memEventStore";
import { MemObjectStore } from "../../../__tests__/helpers/memObjectStore";
import { createMockLogger, type MockLogger } from "../../../__tests__/helpers/mockLogger";

async function addVariant(events: MemEventMediaStore, eventId: number, key: string, qualityLabel: string) {
  await events.addVideoVariant(eventId, {
    qualityLabel,
    mime: "video/mp4",
    filesize: 10,
    durationSeconds: 5,
    storageKey: key,
    publicUrl: `https://media.test/${key}`,
  });
}

describe("DeletionPurger", () => {
  let objects: MemObjectStore;
  let events: MemEventMediaStore;
  let logger: MockLogger;
  let purger: DeletionPurger;
  let eventId: number;

  beforeEach(async () => {
    objects = new MemObjectStore();
    events = new MemEventMediaStore();
    logger = createMockLogger();
    purger = new DeletionPurger(objects, events, logger);
    eventId = (await events.createPlaceholderEvent({ title: "Purge me", body: "b" })).id;
  });

  async function seedIngestedEvent(): Promise<void> {
    for (const label of ["720p", "360p"]) {
      const key = `clips/${eventId}/c_${label}.mp4`;
      objects.seed(key);
      objects.seed(`clips/${eventId}/c_thumb_${label}.jpg`);
      await addVariant(events, eventId, key, label);
    }
  }

  it("removes every object, version and delete-marker under the prefix", async () => {
    await seedIngestedEvent();

    // 2 recorded videos + 2 swept thumbnails, then 4 versions + 4 markers
    await expect(purger.purge(eventId)).resolves.toEqual({ deleted: 12, errors: 0 });
    await expect(objects.listAllVersions(`clips/${eventId}/`)).resolves.toEqual([]);
  });

  it("is idempotent", async () => {
    await seedIngestedEvent();
    await purger.purge(eventId);

    await expect(purger.purge(eventId)).resolves.toEqual({ deleted: 0, errors: 0 });
  });

  it("leaves sibling prefixes alone", async () => {
    await seedIngestedEvent();
    objects.seed(`clips/${eventId}0/keep.mp4`);
    objects.seed(`clips/${eventId}0`);

    await purger.purge(eventId);

    expect(objects.liveKeys()).toEqual([`clips/${eventId}0`, `clips/${eventId}0/keep.mp4`]);
  });

  it("purges both folder-marker spellings and their history", async () => {
    objects.seed(`clips/${eventId}`, "");
    objects.seed(`clips/${eventId}/`, "");

    // 2 marker deletes, then 2 versions of each spelling
    await expect(purger.purge(eventId)).resolves.toEqual({ deleted: 6, errors: 0 });
    await expect(objects.listAllVersions(`clips/${eventId}`)).resolves.toEqual([]);
  });

  it("keeps going past individual failures and counts them", async () => {
    await addVariant(events, eventId, `clips/${eventId}/c_720p.mp4`, "720p");
    await addVariant(events, eventId, `clips/${eventId}/c_360p.mp4`, "360p");
    objects.seed(`clips/${eventId}/c_720p.mp4`);
    objects.seed(`clips/${eventId}/c_360p.mp4`);
    objects.failOn = (operation, target) =>
      operation === "deleteVersion" && target.startsWith(`clips/${eventId}/c_720p.mp4@`);

    await expect(purger.purge(eventId)).resolves.toEqual({ deleted: 4, errors: 2 });
    expect(logger.warn).toHaveBeenCalledWith(
      "[Purge] Event media purged with errors",
      expect.objectContaining({ eventId, deleted: 4, errors: 2 })
    );
  });

  it("still sweeps the prefix when variant keys cannot be read", async () => {
    const failingEvents = {
      listVariantKeys: async (): Promise<string[]> => {
        throw new Error("connection refused");
      },
    };
    objects.seed(`clips/${eventId}/a.mp4`);

    const result = await new DeletionPurger(objects, failingEvents, logger).purge(eventId);

    expect(result).toEqual({ deleted: 3, errors: 1 });
    expect(objects.liveKeys(`clips/${eventId}/`)).toEqual([]);
  });

  it("counts a failed listing and continues with the version purge", async () => {
    objects.seed(`clips/${eventId}/a.mp4`);
    objects.failOn = (operation) => operation === "list";

    // live object survives the sweep but its version is hard-deleted
    await expect(purger.purge(eventId)).resolves.toEqual({ deleted: 1, errors: 1 });
    await expect(objects.listAllVersions(`clips/${eventId}/`)).resolves.toEqual([]);
  });

  it("never deletes recorded keys that belong to another event", async () => {
    const recorded = {
      listVariantKeys: async (): Promise<string[]> => ["clips/2/other.mp4", `clips/${eventId}/a.mp4`],
    };
    objects.seed("clips/2/other.mp4");
    objects.seed(`clips/${eventId}/a.mp4`);

    const result = await new DeletionPurger(objects, recorded, logger).purge(eventId);

    expect(result).toEqual({ deleted: 3, errors: 0 });
    expect(objects.liveKeys("clips/2/")).toEqual(["clips/2/other.mp4"]);
    expect(logger.warn).toHaveBeenCalledWith("[Purge] Skipping variant keys outside the event prefix", {
      eventId,
      keys: ["clips/2/other.mp4"],
    });
  });

  it("never throws for an invalid event id", async () => {
    await expect(purger.purge(0)).resolves.toEqual({ deleted: 0, errors: 1 });
  });

  describe("purgePrefix", () => {
    it("hard-deletes every version under the prefix, or the whole bucket", async () => {
      objects.seed("clips/1/a.mp4");
      objects.seed("clips/1/a.mp4");
      objects.seed("assets/icons/streamer_1.png");
      await objects.deleteCurrent("clips/1/a.mp4");

      await expect(purger.purgePrefix("clips/")).resolves.toEqual({ deleted: 3, errors: 0 });
      await expect(purger.purgePrefix("")).resolves.toEqual({ deleted: 1, errors: 0 });
      await expect(objects.listAllVersions("")).resolves.toEqual([]);
    });
  });
});
