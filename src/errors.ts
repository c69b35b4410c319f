export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

export class TransientNetworkError extends Error {
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "TransientNetworkError";
    this.status = options.status;
  }
}

export class ProtocolError extends Error {
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "ProtocolError";
    this.status = options.status;
  }
}

export type UploadFailureReason =
  | "init-rejected"
  | "chunk-upload-exhausted"
  | "finalize-rejected"
  | "processing-failed"
  | "processing-timeout";

export class MediaUploadError extends Error {
  readonly reason: UploadFailureReason;
  readonly mediaId: string | null;

  constructor(params: {
    reason: UploadFailureReason;
    message: string;
    mediaId?: string | null;
    cause?: unknown;
  }) {
    super(params.message, { cause: params.cause });
    this.name = "MediaUploadError";
    this.reason = params.reason;
    this.mediaId = params.mediaId ?? null;
  }
}

export class SourceError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "SourceError";
  }
}

export class StoreError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "StoreError";
  }
}

export function isTransientError(error: unknown): error is TransientNetworkError {
  return error instanceof TransientNetworkError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Short failure kind used in logs and run reports. */
export function describeFailure(error: unknown): string {
  if (error instanceof MediaUploadError) {
    return error.reason;
  }
  if (error instanceof TransientNetworkError) {
    return "transient-network";
  }
  if (error instanceof ProtocolError) {
    return "protocol";
  }
  if (error instanceof SourceError) {
    return "source";
  }
  if (error instanceof StoreError) {
    return "store";
  }
  if (error instanceof ConfigurationError) {
    return "configuration";
  }
  return "unknown";
}
