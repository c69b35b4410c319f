import { z } from "zod";

import { ProtocolError, TransientNetworkError, errorMessage } from "../errors.js";
import type { OAuth1Signer, RequestParams } from "./oauth.js";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type SignedRequestBody =
  | { kind: "none" }
  | { kind: "form"; params: RequestParams }
  | { kind: "multipart"; form: FormData }
  | { kind: "json"; value: unknown };

export interface SignedRequest {
  method: "GET" | "POST";
  url: string;
  query?: RequestParams;
  body?: SignedRequestBody;
  /** Used in error messages, e.g. "APPEND". */
  label: string;
}

export interface SignedResponse {
  status: number;
  payload: unknown;
}

export interface SignedHttpClientOptions {
  signer: OAuth1Signer;
  timeoutMs: number;
  fetchFn?: FetchLike;
}

const apiErrorSchema = z.object({
  errors: z
    .array(z.object({ message: z.string().optional(), detail: z.string().optional() }))
    .optional(),
  detail: z.string().optional(),
  error: z.string().optional(),
  title: z.string().optional(),
});

function extractApiError(payload: unknown): string | null {
  const parsed = apiErrorSchema.safeParse(payload);
  if (!parsed.success) {
    return null;
  }

  const messages = (parsed.data.errors ?? [])
    .map((item) => item.message ?? item.detail)
    .filter((item): item is string => Boolean(item));
  if (messages.length > 0) {
    return messages.join("; ");
  }

  return parsed.data.detail ?? parsed.data.error ?? parsed.data.title ?? null;
}

function parsePayload(text: string): unknown {
  if (!text) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export function isRetryableStatus(status: number): boolean {
  return status >= 500 || status === 429;
}

export class SignedHttpClient {
  private readonly fetchFn: FetchLike;

  constructor(private readonly options: SignedHttpClientOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async send(request: SignedRequest): Promise<SignedResponse> {
    const body: SignedRequestBody = request.body ?? { kind: "none" };
    const url = new URL(request.url);
    for (const [key, value] of Object.entries(request.query ?? {})) {
      url.searchParams.set(key, value);
    }

    const headers = new Headers();
    headers.set(
      "authorization",
      this.options.signer.sign({
        method: request.method,
        url: url.toString(),
        params: body.kind === "form" ? body.params : undefined,
        formEncoded: body.kind === "form",
      }),
    );

    let payloadBody: RequestInit["body"];
    if (body.kind === "form") {
      headers.set("content-type", "application/x-www-form-urlencoded");
      payloadBody = new URLSearchParams(body.params).toString();
    } else if (body.kind === "json") {
      headers.set("content-type", "application/json");
      payloadBody = JSON.stringify(body.value);
    } else if (body.kind === "multipart") {
      payloadBody = body.form;
    }

    let response: Response;
    let text: string;
    try {
      response = await this.fetchFn(url.toString(), {
        method: request.method,
        headers,
        body: payloadBody,
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
      text = await response.text();
    } catch (error) {
      throw new TransientNetworkError(
        `${request.label} request failed: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    const payload = parsePayload(text);

    if (!response.ok) {
      const detail = extractApiError(payload) ?? `HTTP ${response.status}`;
      const message = `${request.label} failed (${response.status}): ${detail}`;
      if (isRetryableStatus(response.status)) {
        throw new TransientNetworkError(message, { status: response.status });
      }
      throw new ProtocolError(message, { status: response.status });
    }

    return { status: response.status, payload };
  }
}

export function parseResponse<T extends z.ZodTypeAny>(
  schema: T,
  response: SignedResponse,
  label: string,
): z.output<T> {
  const parsed = schema.safeParse(response.payload);
  if (!parsed.success) {
    throw new ProtocolError(
      `${label} returned an unexpected response: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "body"} ${issue.message}`)
        .join(", ")}`,
      { status: response.status },
    );
  }
  return parsed.data;
}
