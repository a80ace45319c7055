/**
 * Media pipeline — Deletion purger
 *
 * Removes every object, historical version and delete-marker belonging to an
 * event. Layers run in a fixed order and each one sweeps up what the one
 * before it could not see:
 *
 *   1. keys the metadata store knows about, plus the conventional ones
 *   2. whatever is still live under `clips/<id>/`
 *   3. every version and delete-marker under `clips/<id>/`
 *   4. every version of the two folder-marker spellings
 *   5. one last plain delete of the folder markers (uncounted)
 *
 * Never throws. Failures are counted and logged; the caller decides whether
 * to warn.
 */

import type { Logger } from "../../logger";
import type { EventMediaStore } from "../../storage/types";
import { describeError } from "./errors";
import { clipPrefix, folderMarkerKeys, isUnderPrefix, uploadThumbnailKey } from "./keys";
import type { ObjectStore } from "./objectStore";
import { OutcomeTally } from "./saga";
import type { ObjectVersion, PurgeResult } from "./types";

export class DeletionPurger {
  constructor(
    private readonly objects: ObjectStore,
    private readonly events: Pick<EventMediaStore, "listVariantKeys">,
    private readonly logger: Logger
  ) {}

  async purge(eventId: number): Promise<PurgeResult> {
    let prefix: string;
    let markers: [string, string];
    try {
      prefix = clipPrefix(eventId);
      markers = folderMarkerKeys(eventId);
    } catch (err) {
      this.logger.error("[Purge] Refusing to purge invalid event id", { eventId, error: describeError(err) });
      return { deleted: 0, errors: 1 };
    }

    const tally = new OutcomeTally();

    // 1. Known keys
    let variantKeys: string[] = [];
    try {
      variantKeys = await this.events.listVariantKeys(eventId);
    } catch (err) {
      tally.failure(`variants:${eventId}`, err);
    }
    const foreign = variantKeys.filter((key) => !isUnderPrefix(key, eventId));
    if (foreign.length > 0) {
      this.logger.warn("[Purge] Skipping variant keys outside the event prefix", { eventId, keys: foreign });
      variantKeys = variantKeys.filter((key) => isUnderPrefix(key, eventId));
    }
    const explicit = Array.from(new Set([...variantKeys, uploadThumbnailKey(eventId), ...markers]));
    await this.deleteLive(explicit, tally);

    // 2. Live sweep
    try {
      await this.deleteLive(await this.objects.listKeys(prefix), tally);
    } catch (err) {
      tally.failure(prefix, err);
    }

    // 3. Version purge
    await this.deleteVersions(prefix, tally);

    // 4. Marker versions; a marker key is also a prefix of its siblings, so match exactly
    for (const marker of markers) {
      await this.deleteVersions(marker, tally, (key) => key === marker);
    }

    // 5. Final marker cleanup
    for (const marker of markers) {
      try {
        await this.objects.deleteCurrent(marker);
      } catch (err) {
        this.logger.warn("[Purge] Final marker delete failed", { key: marker, error: describeError(err) });
      }
    }

    const result = { deleted: tally.succeeded, errors: tally.failed };
    if (result.errors > 0) {
      this.logger.warn("[Purge] Event media purged with errors", {
        eventId,
        ...result,
        failures: tally.failures.slice(0, 10),
      });
    } else {
      this.logger.info("[Purge] Event media purged", { eventId, ...result });
    }
    return result;
  }

  /** Hard-delete every version under `prefix`; `""` means the whole bucket. */
  async purgePrefix(prefix: string): Promise<PurgeResult> {
    const tally = new OutcomeTally();
    await this.deleteVersions(prefix, tally);
    this.logger.info("[Purge] Prefix purged", { prefix, deleted: tally.succeeded, errors: tally.failed });
    return { deleted: tally.succeeded, errors: tally.failed };
  }

  private async deleteLive(keys: string[], tally: OutcomeTally): Promise<void> {
    for (const key of keys) {
      try {
        if (await this.objects.deleteCurrent(key)) tally.success();
      } catch (err) {
        tally.failure(key, err);
      }
    }
  }

  private async deleteVersions(
    prefix: string,
    tally: OutcomeTally,
    filter: (key: string) => boolean = () => true
  ): Promise<void> {
    let versions: ObjectVersion[];
    try {
      versions = await this.objects.listAllVersions(prefix);
    } catch (err) {
      tally.failure(prefix, err);
      return;
    }
    for (const version of versions) {
      if (!filter(version.key)) continue;
      try {
        await this.objects.deleteObjectVersion(version.key, version.versionId);
        tally.success();
      } catch (err) {
        tally.failure(`${version.key}@${version.versionId}`, err);
      }
    }
  }
}
