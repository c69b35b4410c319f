export type SourceKind = "local" | "google-drive" | "mega";

export type MediaCategory = "video" | "image";

export interface MediaCandidate {
  sourceKind: SourceKind;
  handle: string | null;
  name: string;
  sizeBytes: number;
  mimeCategory: MediaCategory;
  mimeType: string;
  modifiedAt: Date;
}

export interface LocalMediaFile {
  path: string;
  sizeBytes: number;
  /** True when the file is a downloaded copy the run must remove. */
  temporary: boolean;
}

export interface MediaSource {
  readonly kind: SourceKind;
  /** Upper bound on posts per run that the backend imposes on its own. */
  readonly maxPostsPerRun?: number;
  canEnumerate(): boolean;
  listCandidates(): Promise<MediaCandidate[]>;
  download(candidate: MediaCandidate, destDir: string): Promise<LocalMediaFile>;
  cleanup?(candidate: MediaCandidate, localPath: string): Promise<void>;
  close?(): Promise<void>;
}

export interface PostedRecord {
  /** Null for stores that keep only the name. */
  sourceKind: SourceKind | null;
  handle: string | null;
  name: string;
  postId: string;
  postedAt: string;
}

export interface DedupStore {
  init(): Promise<void>;
  keyFor(candidate: Pick<MediaCandidate, "sourceKind" | "handle" | "name">): string;
  listSeen(): Promise<string[]>;
  /** Persists durably before resolving. Recording an existing key is a no-op. */
  recordPosted(candidate: MediaCandidate, postId: string): Promise<void>;
  listRecords(): Promise<PostedRecord[]>;
  close(): Promise<void>;
}

/** A copy of a file-backed store kept in remote storage. */
export interface RemoteStoreCopy {
  readonly kind: string;
  /** Downloads the remote copy to `localPath`; false when there is none yet. */
  pull(localPath: string): Promise<boolean>;
  /** Uploads `localPath`, replacing the earlier remote copy. */
  push(localPath: string): Promise<void>;
  close?(): Promise<void>;
}

export type UploadState =
  | "idle"
  | "initiated"
  | "appending"
  | "finalized"
  | "processing"
  | "succeeded"
  | "failed";

export interface UploadSession {
  mediaId: string | null;
  totalBytes: number;
  bytesSent: number;
  chunkIndex: number;
  state: UploadState;
}

export interface UploadMediaInput {
  path: string;
  mimeType: string;
  category: MediaCategory;
}

export interface MediaUploader {
  upload(input: UploadMediaInput): Promise<string>;
}

export interface CreatePostInput {
  text: string | null;
  mediaIds: string[];
}

export interface PostClient {
  createPost(input: CreatePostInput): Promise<{ id: string }>;
}

export type ItemOutcome = "posted" | "failed" | "dry-run";

export interface RunItemResult {
  name: string;
  handle: string | null;
  outcome: ItemOutcome;
  postId?: string;
  failureKind?: string;
  error?: string;
}

export interface RunSummary {
  startedAt: string;
  finishedAt: string;
  source: SourceKind;
  candidates: number;
  /** Candidates the run worked on, failures included. */
  selected: number;
  posted: number;
  failed: number;
  items: RunItemResult[];
}
