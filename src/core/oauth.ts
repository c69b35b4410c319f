import { createHmac, randomBytes } from "node:crypto";

import type { XCredentials } from "../config/index.js";
import { ConfigurationError } from "../errors.js";

export const SIGNATURE_METHOD = "HMAC-SHA1";

const CREDENTIAL_FIELDS: ReadonlyArray<keyof XCredentials> = [
  "consumerKey",
  "consumerSecret",
  "accessToken",
  "accessSecret",
];

export type RequestParams = Record<string, string>;

export interface SignRequestInput {
  method: string;
  url: string;
  params?: RequestParams;
  /**
   * Sign `params` along with the OAuth fields. True for form-encoded bodies
   * and query strings; multipart and JSON bodies are left out of the base string.
   */
  formEncoded?: boolean;
}

export interface OAuth1SignerOptions {
  nonce?: () => string;
  /** Milliseconds since epoch. */
  now?: () => number;
}

export function percentEncode(value: string): string {
  return encodeURIComponent(value)
    .replace(/!/g, "%21")
    .replace(/\*/g, "%2A")
    .replace(/'/g, "%27")
    .replace(/\(/g, "%28")
    .replace(/\)/g, "%29");
}

export function buildParameterString(params: Array<[string, string]>): string {
  return params
    .map(([key, value]) => [percentEncode(key), percentEncode(value)] as const)
    .sort(([leftKey, leftValue], [rightKey, rightValue]) => {
      if (leftKey !== rightKey) {
        return leftKey < rightKey ? -1 : 1;
      }
      if (leftValue === rightValue) {
        return 0;
      }
      return leftValue < rightValue ? -1 : 1;
    })
    .map(([key, value]) => `${key}=${value}`)
    .join("&");
}

function splitUrl(url: string): { baseUrl: string; queryParams: Array<[string, string]> } {
  const parsed = new URL(url);
  const queryParams = [...parsed.searchParams.entries()];
  parsed.search = "";
  parsed.hash = "";
  return { baseUrl: parsed.toString(), queryParams };
}

export function buildSignatureBaseString(
  method: string,
  url: string,
  params: Array<[string, string]>,
): string {
  const { baseUrl, queryParams } = splitUrl(url);
  const parameterString = buildParameterString([...queryParams, ...params]);
  return [
    method.toUpperCase(),
    percentEncode(baseUrl),
    percentEncode(parameterString),
  ].join("&");
}

export function defaultNonce(): string {
  return randomBytes(16).toString("hex");
}

export class OAuth1Signer {
  private readonly nonce: () => string;
  private readonly now: () => number;

  constructor(
    private readonly credentials: XCredentials,
    options: OAuth1SignerOptions = {},
  ) {
    const empty = CREDENTIAL_FIELDS.filter((field) => !credentials[field]);
    if (empty.length > 0) {
      throw new ConfigurationError("OAuth credentials must not be empty", empty);
    }

    this.nonce = options.nonce ?? defaultNonce;
    this.now = options.now ?? Date.now;
  }

  /** Returns the value for the `Authorization` header. */
  sign(input: SignRequestInput): string {
    const oauthParams: RequestParams = {
      oauth_consumer_key: this.credentials.consumerKey,
      oauth_nonce: this.nonce(),
      oauth_signature_method: SIGNATURE_METHOD,
      oauth_timestamp: Math.floor(this.now() / 1000).toString(),
      oauth_token: this.credentials.accessToken,
      oauth_version: "1.0",
    };

    const requestParams = input.formEncoded ? Object.entries(input.params ?? {}) : [];
    const baseString = buildSignatureBaseString(input.method, input.url, [
      ...Object.entries(oauthParams),
      ...requestParams,
    ]);
    const signingKey = `${percentEncode(this.credentials.consumerSecret)}&${percentEncode(
      this.credentials.accessSecret,
    )}`;

    oauthParams.oauth_signature = createHmac("sha1", signingKey)
      .update(baseString)
      .digest("base64");

    const headerParts = Object.keys(oauthParams)
      .sort()
      .map((key) => `${percentEncode(key)}="${percentEncode(oauthParams[key])}"`)
      .join(", ");

    return `OAuth ${headerParts}`;
  }
}
