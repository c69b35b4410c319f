import { z } from "zod";

import type { AppConfig } from "../config/index.js";
import { ChunkedMediaUploader } from "../core/uploader.js";
import { SignedHttpClient, parseResponse, type FetchLike } from "../core/http.js";
import { OAuth1Signer } from "../core/oauth.js";
import { logger } from "../logger.js";
import type { CreatePostInput, PostClient } from "../types.js";

export const TWEETS_URL = "https://api.twitter.com/2/tweets";
export const USERS_ME_URL = "https://api.twitter.com/2/users/me";

const createPostResponseSchema = z.object({
  data: z.object({
    id: z.string().min(1),
    text: z.string().optional(),
  }),
});

const usersMeResponseSchema = z.object({
  data: z.object({
    id: z.string(),
    username: z.string(),
  }),
});

export class XApiClient implements PostClient {
  constructor(private readonly http: SignedHttpClient) {}

  async createPost(input: CreatePostInput): Promise<{ id: string }> {
    const payload: { text?: string; media?: { media_ids: string[] } } = {};
    if (input.text) {
      payload.text = input.text;
    }
    if (input.mediaIds.length > 0) {
      payload.media = { media_ids: input.mediaIds };
    }

    logger.info(
      { textLength: input.text?.length ?? 0, mediaCount: input.mediaIds.length },
      "Creating post",
    );

    const response = await this.http.send({
      method: "POST",
      url: TWEETS_URL,
      label: "Create post",
      body: { kind: "json", value: payload },
    });
    const { data } = parseResponse(createPostResponseSchema, response, "Create post");

    logger.info({ postId: data.id }, "Post created");
    return { id: data.id };
  }

  async verifyCredentials(): Promise<{ id: string; username: string }> {
    const response = await this.http.send({
      method: "GET",
      url: USERS_ME_URL,
      label: "Verify credentials",
    });
    return parseResponse(usersMeResponseSchema, response, "Verify credentials").data;
  }
}

export interface XClients {
  http: SignedHttpClient;
  api: XApiClient;
  uploader: ChunkedMediaUploader;
}

export function createXClients(
  config: AppConfig,
  options: { fetchFn?: FetchLike; sleep?: (ms: number) => Promise<void> } = {},
): XClients {
  const signer = new OAuth1Signer(config.credentials);
  const http = new SignedHttpClient({
    signer,
    timeoutMs: config.httpTimeoutSeconds * 1000,
    fetchFn: options.fetchFn,
  });

  return {
    http,
    api: new XApiClient(http),
    uploader: new ChunkedMediaUploader({
      http,
      chunkBytes: config.uploadChunkBytes,
      appendRetry: {
        retries: config.appendRetries,
        baseDelayMs: 5000,
        factor: 2,
        maxDelayMs: 60_000,
        jitterMs: 500,
      },
      defaultCheckAfterSecs: 5,
      maxProcessingWaitSeconds: config.processingMaxWaitSeconds,
      sleep: options.sleep,
    }),
  };
}
