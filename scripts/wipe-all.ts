/**
 * Wipe Script - Reset all media and timeline data
 *
 * Hard-deletes every object version in the media bucket, then truncates the
 * timeline tables and restarts their ids at 1. There is no undo.
 *
 * Usage: npx tsx scripts/wipe-all.ts --yes
 *
 * Prerequisites:
 * 1. DATABASE_URL, S3_BUCKET and MEDIA_PUBLIC_BASE_URL are set
 * 2. S3 credentials allow ListObjectVersions and versioned DeleteObject
 */

import { pathToFileURL } from "node:url";
import { sql } from "drizzle-orm";
import { eventVideos, events, streamers } from "../packages/shared/schema/index";
import { describeError } from "../server/services/media/errors";
import type { DeletionPurger } from "../server/services/media/purge";
import type { PurgeResult } from "../server/services/media/types";

export interface WipeDeps {
  purger: Pick<DeletionPurger, "purgePrefix">;
  truncateTables: () => Promise<void>;
}

export interface WipeOutcome {
  storage: PurgeResult | null;
  databaseWiped: boolean;
}

export const CONFIRM_FLAG = "--yes";

export async function wipeAll(deps: WipeDeps): Promise<WipeOutcome> {
  let storage: PurgeResult | null = null;

  console.log("🗑️  Purging every object version in the bucket...");
  try {
    storage = await deps.purger.purgePrefix("");
    console.log(`   Deleted ${storage.deleted} version(s), ${storage.errors} error(s)`);
  } catch (error) {
    console.error(`⚠️  Storage purge failed: ${describeError(error)}`);
    console.error("   Continuing with the database wipe.");
  }

  console.log("💾 Truncating timeline tables...");
  try {
    await deps.truncateTables();
    console.log("   ✅ events, event_videos and streamers truncated");
    return { storage, databaseWiped: true };
  } catch (error) {
    console.error(`❌ Database wipe failed: ${describeError(error)}`);
    return { storage, databaseWiped: false };
  }
}

export function exitCodeFor(outcome: WipeOutcome): number {
  if (!outcome.databaseWiped) return 1;
  if (!outcome.storage || outcome.storage.errors > 0) return 1;
  return 0;
}

export async function main(argv: string[]): Promise<number> {
  if (!argv.includes(CONFIRM_FLAG)) {
    console.error(`❌ Refusing to wipe without ${CONFIRM_FLAG}.`);
    console.error("   This deletes ALL media objects (every version) and ALL timeline rows.");
    return 2;
  }

  // Loaded lazily so the refusal path needs no configuration.
  const { getDb, closeDatabase, isDatabaseAvailable } = await import("../server/db");
  const { createS3Client, S3ObjectStore } = await import("../server/services/media/objectStore");
  const { DeletionPurger } = await import("../server/services/media/purge");
  const { loadMediaConfig } = await import("../server/config/media");
  const { env } = await import("../server/config/env");
  const { createChildLogger } = await import("../server/logger");

  if (!isDatabaseAvailable()) {
    console.error("❌ Database is not available; check DATABASE_URL.");
    return 1;
  }

  const config = loadMediaConfig(env);
  const log = createChildLogger({ module: "wipe" });
  const objects = new S3ObjectStore(createS3Client(config.storage), config.storage.bucket);
  // Whole-bucket purge never consults variant rows.
  const purger = new DeletionPurger(objects, { listVariantKeys: async () => [] }, log);
  try {
    const outcome = await wipeAll({
      purger,
      truncateTables: async () => {
        await getDb().execute(sql`TRUNCATE TABLE ${eventVideos}, ${events}, ${streamers} RESTART IDENTITY CASCADE`);
      },
    });
    return exitCodeFor(outcome);
  } finally {
    await closeDatabase();
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main(process.argv.slice(2))
    .then((code) => process.exit(code))
    .catch((error: unknown) => {
      console.error("❌ ERROR:", describeError(error));
      process.exit(1);
    });
}
