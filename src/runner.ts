import { createXClients } from "./adapters/x.js";
import { loadConfig, type AppConfig } from "./config/index.js";
import { CaptionResolver } from "./core/caption.js";
import { PostPipeline } from "./core/pipeline.js";
import { logger } from "./logger.js";
import { createMediaSource } from "./sources/index.js";
import { createDedupStore, createRemoteStoreCopy } from "./state/index.js";
import type { RunSummary } from "./types.js";

/** Wires one posting run from configuration and releases every resource afterwards. */
export async function runPostOnce(
  trigger: string,
  config: AppConfig = loadConfig(),
): Promise<RunSummary> {
  const { api, uploader } = createXClients(config);
  const source = createMediaSource(config);
  const store = createDedupStore(config, createRemoteStoreCopy(config));

  try {
    const pipeline = new PostPipeline({
      config,
      source,
      store,
      uploader,
      postClient: api,
      captions: new CaptionResolver(config.captionDir),
    });

    logger.info({ trigger, source: config.mediaSource, dryRun: config.dryRun }, "Starting post run");
    const summary = await pipeline.run();
    logger.info(
      {
        trigger,
        candidates: summary.candidates,
        selected: summary.selected,
        posted: summary.posted,
        failed: summary.failed,
      },
      "Post run completed",
    );
    return summary;
  } finally {
    try {
      await store.close();
    } finally {
      await source.close?.();
    }
  }
}
