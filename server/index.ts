/**
 * Composition root
 *
 * Wires configuration, the S3 client, the metadata store and the external
 * tool wrappers into a {@link MediaPipeline}. Hosts call
 * {@link createMediaPipeline} once at startup and share the result.
 */

import { env } from "./config/env";
import { loadMediaConfig, type MediaConfig } from "./config/media";
import { createChildLogger, type Logger } from "./logger";
import {
  checkToolsAvailable,
  ClipProbe,
  createS3Client,
  DeletionPurger,
  IconProcessor,
  IngestionOrchestrator,
  MediaPipeline,
  runTool,
  S3ObjectStore,
  StreamProbe,
  ThumbnailExtractor,
  VariantDownloader,
  type ObjectStore,
  type ToolRunner,
} from "./services/media";
import { PgEventMediaStore } from "./storage/pgEventStore";
import type { EventMediaStore } from "./storage/types";

export interface MediaPipelineOptions {
  config?: MediaConfig;
  objects?: ObjectStore;
  events?: EventMediaStore;
  runner?: ToolRunner;
  logger?: Logger;
}

export function createMediaPipeline(options: MediaPipelineOptions = {}): MediaPipeline {
  const config = options.config ?? loadMediaConfig(env);
  const run = options.runner ?? runTool;
  const log = options.logger ?? createChildLogger({ module: "media" });
  const objects = options.objects ?? new S3ObjectStore(createS3Client(config.storage), config.storage.bucket);
  const events = options.events ?? new PgEventMediaStore();

  const ytdlp = {
    bin: config.tools.ytdlp,
    timeoutMs: config.timeouts.probeMs,
    extractorArgs: config.tools.ytdlpExtractorArgs,
  };

  const orchestrator = new IngestionOrchestrator({
    objects,
    events,
    probe: new ClipProbe(ytdlp, run, log.child({ component: "clipProbe" })),
    downloader: new VariantDownloader(
      { ...ytdlp, timeoutMs: config.timeouts.downloadMs, ffmpegLocation: config.tools.ffmpeg },
      run,
      log.child({ component: "downloader" })
    ),
    thumbnails: new ThumbnailExtractor(
      { bin: config.tools.ffmpeg, timeoutMs: config.timeouts.ffmpegMs },
      run,
      log.child({ component: "thumbnail" })
    ),
    streams: new StreamProbe(
      { bin: config.tools.ffprobe, timeoutMs: config.timeouts.probeMs },
      run,
      log.child({ component: "streamProbe" })
    ),
    publicBaseUrl: config.publicBaseUrl,
    scratchRoot: config.scratchRoot,
    logger: log.child({ component: "ingestion" }),
  });

  return new MediaPipeline({
    objects,
    events,
    orchestrator,
    purger: new DeletionPurger(objects, events, log.child({ component: "purge" })),
    icons: new IconProcessor(log.child({ component: "icons" })),
    publicBaseUrl: config.publicBaseUrl,
    scratchRoot: config.scratchRoot,
    logger: log,
  });
}

/** Logs which external tools are missing. Never throws. */
export async function reportToolAvailability(
  config: MediaConfig = loadMediaConfig(env),
  runner: ToolRunner = runTool,
  log: Logger = createChildLogger({ module: "media" })
): Promise<boolean> {
  const status = await checkToolsAvailable(config.tools, runner);
  const missing = Object.entries(status)
    .filter(([, ok]) => !ok)
    .map(([tool]) => tool);
  if (missing.length > 0) {
    log.warn("External media tools unavailable; ingestion will fail until installed", { missing });
    return false;
  }
  log.info("External media tools available", status);
  return true;
}

export * from "./services/media";
export { PgEventMediaStore } from "./storage/pgEventStore";
export { MemEventMediaStore } from "./storage/memEventStore";
export type { EventDraft, EventMediaStore, EventMediaUpdate, EventRecord, VideoVariantRecord } from "./storage/types";
