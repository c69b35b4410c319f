import { describe, expect, it } from "vitest";

import { TWEETS_URL, USERS_ME_URL, XApiClient, createXClients } from "../src/adapters/x.js";
import { loadConfig } from "../src/config/index.js";
import { SignedHttpClient } from "../src/core/http.js";
import { OAuth1Signer } from "../src/core/oauth.js";
import { ProtocolError, TransientNetworkError } from "../src/errors.js";

interface CapturedRequest {
  url: string;
  method: string;
  headers: Headers;
  body: unknown;
}

function fakeFetch(
  status: number,
  body: unknown,
): {
  requests: CapturedRequest[];
  fetchFn: (url: string, init: RequestInit) => Promise<Response>;
} {
  const requests: CapturedRequest[] = [];
  const fetchFn = async (url: string, init: RequestInit): Promise<Response> => {
    requests.push({
      url,
      method: init.method ?? "GET",
      headers: new Headers(init.headers),
      body: init.body,
    });
    return new Response(typeof body === "string" ? body : JSON.stringify(body), { status });
  };
  return { requests, fetchFn };
}

function httpClient(fetchFn: (url: string, init: RequestInit) => Promise<Response>): SignedHttpClient {
  const signer = new OAuth1Signer(
    {
      consumerKey: "test-consumer-key",
      consumerSecret: "test-consumer-secret",
      accessToken: "test-access-token",
      accessSecret: "test-access-secret",
    },
    { nonce: () => "test-nonce", now: () => 0 },
  );
  return new SignedHttpClient({ signer, timeoutMs: 1000, fetchFn });
}

describe("XApiClient", () => {
  it("creates a post with text and media ids", async () => {
    const { requests, fetchFn } = fakeFetch(201, { data: { id: "post-1", text: "hello" } });
    const client = new XApiClient(httpClient(fetchFn));

    await expect(client.createPost({ text: "hello", mediaIds: ["m-1"] })).resolves.toEqual({
      id: "post-1",
    });

    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe(TWEETS_URL);
    expect(requests[0].method).toBe("POST");
    expect(requests[0].headers.get("content-type")).toBe("application/json");
    expect(requests[0].headers.get("authorization")).toMatch(/^OAuth oauth_consumer_key="test-consumer-key"/);
    expect(JSON.parse(String(requests[0].body))).toEqual({
      text: "hello",
      media: { media_ids: ["m-1"] },
    });
  });

  it("omits the text when there is no caption", async () => {
    const { requests, fetchFn } = fakeFetch(201, { data: { id: "post-2" } });
    const client = new XApiClient(httpClient(fetchFn));

    await client.createPost({ text: null, mediaIds: ["m-1"] });

    expect(JSON.parse(String(requests[0].body))).toEqual({ media: { media_ids: ["m-1"] } });
  });

  it("raises ProtocolError with the API detail on rejection", async () => {
    const { fetchFn } = fakeFetch(403, {
      detail: "You are not permitted to perform this action.",
    });
    const client = new XApiClient(httpClient(fetchFn));

    const error = await client
      .createPost({ text: "hi", mediaIds: ["m-1"] })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ProtocolError);
    expect(error instanceof ProtocolError && error.message).toBe(
      "Create post failed (403): You are not permitted to perform this action.",
    );
    expect(error instanceof ProtocolError && error.status).toBe(403);
  });

  it("raises TransientNetworkError on server errors and rate limits", async () => {
    for (const status of [429, 502]) {
      const { fetchFn } = fakeFetch(status, "upstream trouble");
      const client = new XApiClient(httpClient(fetchFn));

      await expect(client.createPost({ text: "hi", mediaIds: [] })).rejects.toBeInstanceOf(
        TransientNetworkError,
      );
    }
  });

  it("raises TransientNetworkError when the request never completes", async () => {
    const client = new XApiClient(
      httpClient(async () => {
        throw new TypeError("fetch failed");
      }),
    );

    await expect(client.verifyCredentials()).rejects.toThrow(
      new TransientNetworkError("Verify credentials request failed: fetch failed"),
    );
  });

  it("rejects a success response without a post id", async () => {
    const { fetchFn } = fakeFetch(200, { data: {} });
    const client = new XApiClient(httpClient(fetchFn));

    await expect(client.createPost({ text: "hi", mediaIds: [] })).rejects.toBeInstanceOf(
      ProtocolError,
    );
  });

  it("verifies credentials against the account endpoint", async () => {
    const { requests, fetchFn } = fakeFetch(200, { data: { id: "42", username: "poster" } });
    const client = new XApiClient(httpClient(fetchFn));

    await expect(client.verifyCredentials()).resolves.toEqual({ id: "42", username: "poster" });
    expect(requests[0].url).toBe(USERS_ME_URL);
    expect(requests[0].method).toBe("GET");
  });
});

describe("SignedHttpClient", () => {
  it("encodes form bodies and query strings", async () => {
    const { requests, fetchFn } = fakeFetch(200, {});
    const http = httpClient(fetchFn);

    await http.send({
      method: "POST",
      url: "https://upload.example.com/media.json",
      label: "INIT",
      body: { kind: "form", params: { command: "INIT", total_bytes: "10" } },
    });
    await http.send({
      method: "GET",
      url: "https://upload.example.com/media.json",
      label: "STATUS",
      query: { command: "STATUS", media_id: "m 1" },
    });

    expect(requests[0].headers.get("content-type")).toBe("application/x-www-form-urlencoded");
    expect(requests[0].body).toBe("command=INIT&total_bytes=10");
    expect(requests[1].url).toBe("https://upload.example.com/media.json?command=STATUS&media_id=m+1");
    expect(requests[1].body).toBeUndefined();
  });
});

describe("createXClients", () => {
  it("wires the clients from configuration", () => {
    const config = loadConfig({
      X_API_KEY: "test-consumer-key",
      X_API_SECRET: "test-consumer-secret",
      X_ACCESS_TOKEN: "test-access-token",
      X_ACCESS_SECRET: "test-access-secret",
    });

    const clients = createXClients(config, { fetchFn: fakeFetch(200, {}).fetchFn });

    expect(clients.api).toBeInstanceOf(XApiClient);
    expect(clients.http).toBeInstanceOf(SignedHttpClient);
  });
});
