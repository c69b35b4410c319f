import path from "node:path";

import { z } from "zod";

import {
  MediaUploadError,
  errorMessage,
  isTransientError,
  type UploadFailureReason,
} from "../errors.js";
import { logger } from "../logger.js";
import type {
  MediaCategory,
  MediaUploader,
  UploadMediaInput,
  UploadSession,
  UploadState,
} from "../types.js";
import { fileSize, readFileChunks } from "../utils/fs.js";
import { sleep as defaultSleep, withRetry } from "../utils/retry.js";
import { parseResponse, type SignedHttpClient } from "./http.js";

export const UPLOAD_URL = "https://upload.twitter.com/1.1/media/upload.json";

const processingInfoSchema = z.object({
  state: z.enum(["pending", "in_progress", "succeeded", "failed"]),
  check_after_secs: z.number().nonnegative().optional(),
  progress_percent: z.number().optional(),
  error: z
    .object({
      code: z.number().optional(),
      name: z.string().optional(),
      message: z.string().optional(),
    })
    .optional(),
});

type ProcessingInfo = z.infer<typeof processingInfoSchema>;

const initResponseSchema = z.object({
  media_id_string: z.string().min(1),
});

const finalizeResponseSchema = z.object({
  media_id_string: z.string().optional(),
  processing_info: processingInfoSchema.optional(),
});

const statusResponseSchema = z.object({
  processing_info: processingInfoSchema.optional(),
});

export interface AppendRetryPolicy {
  retries: number;
  baseDelayMs: number;
  factor: number;
  maxDelayMs: number;
  jitterMs: number;
}

export interface ChunkedMediaUploaderOptions {
  http: SignedHttpClient;
  chunkBytes: number;
  appendRetry: AppendRetryPolicy;
  /** Poll interval when STATUS gives no `check_after_secs`. */
  defaultCheckAfterSecs: number;
  maxProcessingWaitSeconds: number;
  sleep?: (ms: number) => Promise<void>;
}

export function mediaCategoryFor(category: MediaCategory, mimeType: string): string {
  if (category === "video") {
    return "tweet_video";
  }
  return mimeType === "image/gif" ? "tweet_gif" : "tweet_image";
}

export class ChunkedMediaUploader implements MediaUploader {
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: ChunkedMediaUploaderOptions) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  async upload(input: UploadMediaInput): Promise<string> {
    const session = await this.run(input);
    if (!session.mediaId) {
      throw new MediaUploadError({
        reason: "init-rejected",
        message: `Upload of ${input.path} finished without a media id`,
      });
    }
    return session.mediaId;
  }

  /** Drives one upload to a terminal state and returns the final session. */
  async run(input: UploadMediaInput): Promise<UploadSession> {
    const session: UploadSession = {
      mediaId: null,
      totalBytes: await fileSize(input.path),
      bytesSent: 0,
      chunkIndex: 0,
      state: "idle",
    };

    logger.info(
      { path: input.path, totalBytes: session.totalBytes, category: input.category },
      "Starting chunked media upload",
    );

    await this.init(session, input);
    await this.appendAll(session, input.path);
    const processingInfo = await this.finalize(session);

    if (processingInfo) {
      await this.waitForProcessing(session, processingInfo);
    }

    this.transition(session, "succeeded");
    logger.info({ mediaId: session.mediaId, path: input.path }, "Media upload succeeded");
    return session;
  }

  private transition(session: UploadSession, next: UploadState): void {
    logger.debug(
      { mediaId: session.mediaId, from: session.state, to: next },
      "Upload state transition",
    );
    session.state = next;
  }

  private fail(
    session: UploadSession,
    reason: UploadFailureReason,
    message: string,
    cause?: unknown,
  ): MediaUploadError {
    this.transition(session, "failed");
    logger.warn(
      { mediaId: session.mediaId, reason, bytesSent: session.bytesSent, err: cause },
      "Media upload failed",
    );
    return new MediaUploadError({ reason, message, mediaId: session.mediaId, cause });
  }

  private async init(session: UploadSession, input: UploadMediaInput): Promise<void> {
    try {
      const response = await this.options.http.send({
        method: "POST",
        url: UPLOAD_URL,
        label: "INIT",
        body: {
          kind: "form",
          params: {
            command: "INIT",
            total_bytes: String(session.totalBytes),
            media_type: input.mimeType,
            media_category: mediaCategoryFor(input.category, input.mimeType),
          },
        },
      });
      session.mediaId = parseResponse(initResponseSchema, response, "INIT").media_id_string;
    } catch (error) {
      throw this.fail(session, "init-rejected", `INIT rejected: ${errorMessage(error)}`, error);
    }

    this.transition(session, "initiated");
    logger.info({ mediaId: session.mediaId }, "INIT complete");
  }

  private async appendAll(session: UploadSession, filePath: string): Promise<void> {
    const mediaId = session.mediaId ?? "";
    const fileName = path.basename(filePath);

    for await (const chunk of readFileChunks(filePath, this.options.chunkBytes)) {
      if (session.state !== "appending") {
        this.transition(session, "appending");
      }

      const segmentIndex = session.chunkIndex;
      try {
        await withRetry(
          () => {
            const form = new FormData();
            form.append("command", "APPEND");
            form.append("media_id", mediaId);
            form.append("segment_index", String(segmentIndex));
            form.append(
              "media",
              new Blob([new Uint8Array(chunk)], { type: "application/octet-stream" }),
              fileName,
            );
            return this.options.http.send({
              method: "POST",
              url: UPLOAD_URL,
              label: "APPEND",
              body: { kind: "multipart", form },
            });
          },
          {
            ...this.options.appendRetry,
            shouldRetry: isTransientError,
            sleep: this.sleep,
            onRetry: ({ attempt, delayMs, error }) => {
              logger.warn(
                { mediaId, segmentIndex, attempt, delayMs: Math.round(delayMs), err: error },
                "APPEND failed, retrying",
              );
            },
          },
        );
      } catch (error) {
        throw this.fail(
          session,
          "chunk-upload-exhausted",
          `APPEND of segment ${segmentIndex} failed: ${errorMessage(error)}`,
          error,
        );
      }

      session.bytesSent += chunk.length;
      session.chunkIndex += 1;
      logger.debug(
        {
          mediaId,
          segmentIndex,
          bytesSent: session.bytesSent,
          totalBytes: session.totalBytes,
        },
        "APPEND ok",
      );
    }
  }

  private async finalize(session: UploadSession): Promise<ProcessingInfo | null> {
    let processingInfo: ProcessingInfo | undefined;
    try {
      const response = await this.options.http.send({
        method: "POST",
        url: UPLOAD_URL,
        label: "FINALIZE",
        body: {
          kind: "form",
          params: { command: "FINALIZE", media_id: session.mediaId ?? "" },
        },
      });
      processingInfo = parseResponse(finalizeResponseSchema, response, "FINALIZE").processing_info;
    } catch (error) {
      throw this.fail(
        session,
        "finalize-rejected",
        `FINALIZE rejected: ${errorMessage(error)}`,
        error,
      );
    }

    this.transition(session, "finalized");
    logger.debug({ mediaId: session.mediaId, processingInfo }, "FINALIZE complete");
    return processingInfo ?? null;
  }

  private async fetchStatus(session: UploadSession): Promise<ProcessingInfo | null> {
    const response = await this.options.http.send({
      method: "GET",
      url: UPLOAD_URL,
      label: "STATUS",
      query: { command: "STATUS", media_id: session.mediaId ?? "" },
    });
    return parseResponse(statusResponseSchema, response, "STATUS").processing_info ?? null;
  }

  private async waitForProcessing(
    session: UploadSession,
    initial: ProcessingInfo,
  ): Promise<void> {
    this.transition(session, "processing");
    const maxWaitMs = this.options.maxProcessingWaitSeconds * 1000;
    let info: ProcessingInfo | null = initial;
    let waitedMs = 0;

    while (info && info.state !== "succeeded") {
      if (info.state === "failed") {
        const detail = info.error?.message ?? info.error?.name ?? "no detail";
        throw this.fail(session, "processing-failed", `Media processing failed: ${detail}`);
      }

      // A zero hint would spin without ever reaching the ceiling.
      const delayMs =
        Math.max(1, info.check_after_secs ?? this.options.defaultCheckAfterSecs) * 1000;
      if (waitedMs + delayMs > maxWaitMs) {
        throw this.fail(
          session,
          "processing-timeout",
          `Media processing did not finish within ${this.options.maxProcessingWaitSeconds}s`,
        );
      }

      logger.debug(
        {
          mediaId: session.mediaId,
          state: info.state,
          progress: info.progress_percent,
          delayMs,
        },
        "Waiting for media processing",
      );
      await this.sleep(delayMs);
      waitedMs += delayMs;

      try {
        info = await this.fetchStatus(session);
      } catch (error) {
        throw this.fail(
          session,
          "processing-failed",
          `STATUS check failed: ${errorMessage(error)}`,
          error,
        );
      }
    }

    logger.info({ mediaId: session.mediaId, waitedMs }, "Media processing succeeded");
  }
}
