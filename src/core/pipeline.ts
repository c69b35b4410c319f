import type { AppConfig } from "../config/index.js";
import { StoreError, describeFailure, errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import type {
  DedupStore,
  LocalMediaFile,
  MediaCandidate,
  MediaSource,
  MediaUploader,
  PostClient,
  RunItemResult,
  RunSummary,
} from "../types.js";
import { ensureDir, removeFileSafe } from "../utils/fs.js";
import type { CaptionResolver } from "./caption.js";
import { SelectionEngine } from "./selection.js";

export type PipelineConfig = Pick<AppConfig, "postLimit" | "downloadTmpDir" | "dryRun">;

interface PostPipelineDeps {
  config: PipelineConfig;
  source: MediaSource;
  store: DedupStore;
  uploader: MediaUploader;
  postClient: PostClient;
  captions: CaptionResolver;
}

type Stage = "download" | "caption" | "upload" | "post";

export function effectiveLimit(
  postLimit: number | null,
  sourceCap: number | undefined,
): number {
  const limits = [postLimit, sourceCap].filter(
    (value): value is number => typeof value === "number",
  );
  return limits.length > 0 ? Math.min(...limits) : Number.POSITIVE_INFINITY;
}

export function formatRunReport(summary: RunSummary): string {
  const lines = [
    "✅ Media post report",
    `started: ${summary.startedAt}`,
    `finished: ${summary.finishedAt}`,
    `source=${summary.source} candidates=${summary.candidates} selected=${summary.selected} posted=${summary.posted} failed=${summary.failed}`,
  ];

  for (const item of summary.items) {
    const detail =
      item.outcome === "posted"
        ? `post=${item.postId ?? ""}`
        : item.outcome === "failed"
          ? `kind=${item.failureKind ?? "unknown"}`
          : "not posted";
    lines.push(`${item.outcome} ${item.name} ${detail}`);
  }

  return lines.join("\n");
}

export class PostPipeline {
  private readonly selection: SelectionEngine;

  constructor(private readonly deps: PostPipelineDeps) {
    this.selection = new SelectionEngine(deps.store);
  }

  private failed(
    item: RunItemResult,
    candidate: MediaCandidate,
    stage: Stage,
    error: unknown,
  ): RunItemResult {
    item.outcome = "failed";
    item.failureKind = describeFailure(error);
    item.error = errorMessage(error);
    logger.error(
      { err: error, name: candidate.name, handle: candidate.handle, stage, kind: item.failureKind },
      "Failed to post media, continuing with next candidate",
    );
    return item;
  }

  private async processCandidate(candidate: MediaCandidate): Promise<RunItemResult> {
    const { source } = this.deps;
    const item: RunItemResult = {
      name: candidate.name,
      handle: candidate.handle,
      outcome: "failed",
    };

    let local: LocalMediaFile;
    try {
      local = await source.download(candidate, this.deps.config.downloadTmpDir);
    } catch (error) {
      return this.failed(item, candidate, "download", error);
    }

    let stage: Stage = "caption";
    let postId: string;
    try {
      const text = await this.deps.captions.resolve(candidate.name, local.path);

      stage = "upload";
      const mediaId = await this.deps.uploader.upload({
        path: local.path,
        mimeType: candidate.mimeType,
        category: candidate.mimeCategory,
      });

      stage = "post";
      postId = (await this.deps.postClient.createPost({ text, mediaIds: [mediaId] })).id;
    } catch (error) {
      if (local.temporary) {
        await removeFileSafe(local.path);
      }
      return this.failed(item, candidate, stage, error);
    }

    item.outcome = "posted";
    item.postId = postId;

    try {
      await this.selection.recordPosted(source, candidate, postId);
    } catch (error) {
      if (local.temporary) {
        await removeFileSafe(local.path);
      }
      throw new StoreError(
        `Post ${postId} for ${candidate.name} succeeded but could not be recorded: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    try {
      await source.cleanup?.(candidate, local.path);
    } catch (error) {
      logger.warn(
        { err: error, name: candidate.name, handle: candidate.handle },
        "Posted media but source cleanup failed",
      );
    } finally {
      if (local.temporary) {
        await removeFileSafe(local.path);
      }
    }

    logger.info({ name: candidate.name, postId }, "Posted media");
    return item;
  }

  async run(): Promise<RunSummary> {
    const startedAt = new Date().toISOString();
    const { source, config } = this.deps;

    await this.deps.store.init();
    await this.selection.prepare();
    await ensureDir(config.downloadTmpDir);

    // The limit bounds successful posts; a failed candidate hands its slot to the next one.
    const limit = effectiveLimit(config.postLimit, source.maxPostsPerRun);
    const { candidates, selected: pending } = await this.selection.selectNext(source);

    logger.info(
      {
        source: source.kind,
        candidates: candidates.length,
        unposted: pending.length,
        limit: Number.isFinite(limit) ? limit : "unlimited",
        dryRun: config.dryRun,
      },
      "Selected media to post",
    );

    const items: RunItemResult[] = [];
    let posted = 0;
    for (const candidate of pending) {
      if (posted >= limit) {
        break;
      }

      if (config.dryRun) {
        logger.info(
          { name: candidate.name, handle: candidate.handle, modifiedAt: candidate.modifiedAt },
          "Dry run, would post media",
        );
        items.push({ name: candidate.name, handle: candidate.handle, outcome: "dry-run" });
        posted += 1;
        continue;
      }

      const item = await this.processCandidate(candidate);
      items.push(item);
      if (item.outcome === "posted") {
        posted += 1;
      }
    }

    if (pending.length === 0) {
      logger.info({ source: source.kind }, "No unposted media available");
    }

    const summary: RunSummary = {
      startedAt,
      finishedAt: new Date().toISOString(),
      source: source.kind,
      candidates: candidates.length,
      selected: items.length,
      posted: items.filter((item) => item.outcome === "posted").length,
      failed: items.filter((item) => item.outcome === "failed").length,
      items,
    };

    logger.info(
      {
        source: summary.source,
        candidates: summary.candidates,
        selected: summary.selected,
        posted: summary.posted,
        failed: summary.failed,
        items: summary.items,
      },
      "Media post report",
    );
    return summary;
  }
}
