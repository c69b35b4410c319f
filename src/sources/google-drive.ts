import { createReadStream } from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";

import { google, type drive_v3 } from "googleapis";
import { z } from "zod";

import type { GoogleDriveSourceConfig } from "../config/index.js";
import { ConfigurationError, SourceError, errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import type { LocalMediaFile, MediaCandidate, MediaSource, RemoteStoreCopy } from "../types.js";
import { classifyMedia } from "../utils/media.js";
import { saveStream } from "./download.js";

const FOLDER_MIME_TYPE = "application/vnd.google-apps.folder";
const DRIVE_SCOPES = ["https://www.googleapis.com/auth/drive"];
const FILE_FIELDS = "id, name, mimeType, size, modifiedTime, createdTime";

const serviceAccountSchema = z.object({
  client_email: z.string().min(1),
  private_key: z.string().min(1),
});

type DriveScope = Pick<
  drive_v3.Params$Resource$Files$List,
  "supportsAllDrives" | "includeItemsFromAllDrives" | "driveId" | "corpora"
>;

export function escapeDriveQuery(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
}

/** Reads the file id from `/file/d/<id>/...` or `?id=<id>` share links. */
export function extractDriveFileId(url: string): string | null {
  const match = /\/d\/([A-Za-z0-9_-]+)/.exec(url) ?? /[?&]id=([A-Za-z0-9_-]+)/.exec(url);
  return match?.[1] ?? null;
}

export function toDriveCandidate(file: drive_v3.Schema$File): MediaCandidate | null {
  if (!file.id || !file.name) {
    return null;
  }

  const media = classifyMedia(file.name);
  if (!media) {
    return null;
  }

  const modifiedAt = new Date(file.modifiedTime ?? file.createdTime ?? 0);
  return {
    sourceKind: "google-drive",
    handle: file.id,
    name: file.name,
    sizeBytes: Number(file.size ?? 0),
    mimeCategory: media.category,
    mimeType: file.mimeType?.startsWith(`${media.category}/`) ? file.mimeType : media.mimeType,
    modifiedAt: Number.isNaN(modifiedAt.getTime()) ? new Date(0) : modifiedAt,
  };
}

async function loadServiceAccount(
  config: GoogleDriveSourceConfig,
): Promise<z.infer<typeof serviceAccountSchema>> {
  let raw = config.serviceAccountJson;
  if (!raw && config.serviceAccountFile) {
    raw = await readFile(config.serviceAccountFile, "utf8");
  }
  if (!raw) {
    throw new ConfigurationError("Google Drive service account credentials are missing");
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Service account JSON is not valid JSON: ${errorMessage(error)}`);
  }

  const account = serviceAccountSchema.safeParse(parsed);
  if (!account.success) {
    throw new ConfigurationError("Service account JSON needs client_email and private_key");
  }
  return account.data;
}

/** Service-account Drive client shared by the sources and the store copy. */
class DriveSession {
  private drive: drive_v3.Drive | null = null;
  private folderId: string | null;

  constructor(private readonly config: GoogleDriveSourceConfig) {
    this.folderId = config.folderId;
  }

  async client(): Promise<drive_v3.Drive> {
    if (this.drive) {
      return this.drive;
    }

    const credentials = await loadServiceAccount(this.config);
    const auth = new google.auth.GoogleAuth({ credentials, scopes: DRIVE_SCOPES });
    this.drive = google.drive({ version: "v3", auth });
    logger.info(
      { folderId: this.config.folderId, folderName: this.config.dirName },
      "Google Drive client initialized",
    );
    return this.drive;
  }

  scope(): DriveScope {
    if (this.config.driveId) {
      return {
        supportsAllDrives: true,
        includeItemsFromAllDrives: true,
        driveId: this.config.driveId,
        corpora: "drive",
      };
    }
    return { corpora: "user" };
  }

  async mediaFolderId(): Promise<string> {
    if (this.folderId) {
      return this.folderId;
    }

    const drive = await this.client();
    const response = await drive.files.list({
      q: `name = '${escapeDriveQuery(this.config.dirName)}' and mimeType = '${FOLDER_MIME_TYPE}' and trashed = false`,
      pageSize: 1,
      fields: "files(id, name)",
      ...this.scope(),
    });
    const folderId = response.data.files?.[0]?.id;
    if (!folderId) {
      throw new SourceError(`Google Drive folder "${this.config.dirName}" not found`);
    }

    this.folderId = folderId;
    return folderId;
  }

  async downloadFile(
    fileId: string,
    outputPath: string,
    options: { timeoutMs: number; label: string },
  ): Promise<number> {
    const drive = await this.client();
    return saveStream(
      async (signal) =>
        (
          await drive.files.get(
            { fileId, alt: "media", supportsAllDrives: true },
            { responseType: "stream", signal },
          )
        ).data,
      outputPath,
      options,
    );
  }
}

async function downloadCandidate(
  session: DriveSession,
  candidate: MediaCandidate,
  destDir: string,
  timeoutMs: number,
): Promise<LocalMediaFile> {
  if (!candidate.handle) {
    throw new SourceError(`Google Drive candidate ${candidate.name} has no file id`);
  }

  const outputPath = path.join(destDir, path.basename(candidate.name));
  const sizeBytes = await session.downloadFile(candidate.handle, outputPath, {
    timeoutMs,
    label: `${candidate.name} from Google Drive`,
  });
  logger.info({ name: candidate.name, outputPath, sizeBytes }, "Downloaded Google Drive media");
  return { path: outputPath, sizeBytes, temporary: true };
}

function wrapListError(error: unknown, what: string): Error {
  if (error instanceof SourceError || error instanceof ConfigurationError) {
    return error;
  }
  return new SourceError(`Cannot list ${what}: ${errorMessage(error)}`, { cause: error });
}

export class GoogleDriveSource implements MediaSource {
  readonly kind = "google-drive" as const;
  private readonly session: DriveSession;

  constructor(
    private readonly config: GoogleDriveSourceConfig,
    private readonly timeoutMs: number,
  ) {
    this.session = new DriveSession(config);
  }

  canEnumerate(): boolean {
    return true;
  }

  private async listChildren(
    drive: drive_v3.Drive,
    folderId: string,
  ): Promise<drive_v3.Schema$File[]> {
    const files: drive_v3.Schema$File[] = [];
    let pageToken: string | undefined;

    do {
      const response = await drive.files.list({
        q: `'${escapeDriveQuery(folderId)}' in parents and trashed = false`,
        pageSize: 1000,
        pageToken,
        fields: `nextPageToken, files(${FILE_FIELDS})`,
        ...this.session.scope(),
      });
      files.push(...(response.data.files ?? []));
      pageToken = response.data.nextPageToken ?? undefined;
    } while (pageToken);

    return files;
  }

  async listCandidates(): Promise<MediaCandidate[]> {
    try {
      const drive = await this.session.client();
      const rootId = await this.session.mediaFolderId();
      const queue = [rootId];
      const visited = new Set<string>();
      const candidates: MediaCandidate[] = [];

      while (queue.length > 0) {
        const folderId = queue.shift();
        if (!folderId || visited.has(folderId)) {
          continue;
        }
        visited.add(folderId);

        for (const file of await this.listChildren(drive, folderId)) {
          if (file.mimeType === FOLDER_MIME_TYPE && file.id) {
            queue.push(file.id);
            continue;
          }
          const candidate = toDriveCandidate(file);
          if (candidate) {
            candidates.push(candidate);
          }
        }
      }

      logger.debug({ folderId: rootId, found: candidates.length }, "Listed Google Drive media");
      return candidates;
    } catch (error) {
      throw wrapListError(error, "Google Drive media");
    }
  }

  async download(candidate: MediaCandidate, destDir: string): Promise<LocalMediaFile> {
    return downloadCandidate(this.session, candidate, destDir, this.timeoutMs);
  }

  async cleanup(candidate: MediaCandidate): Promise<void> {
    if (!candidate.handle) {
      return;
    }

    const drive = await this.session.client();
    if (this.config.hardDelete) {
      await drive.files.delete({ fileId: candidate.handle, supportsAllDrives: true });
      logger.info({ name: candidate.name, fileId: candidate.handle }, "Deleted Google Drive file");
      return;
    }

    await drive.files.update({
      fileId: candidate.handle,
      supportsAllDrives: true,
      requestBody: { trashed: true },
    });
    logger.info({ name: candidate.name, fileId: candidate.handle }, "Moved Google Drive file to trash");
  }
}

/**
 * One shared Drive file. It cannot be enumerated, so every run offers the
 * same file; the shared file is never trashed.
 */
export class GoogleDrivePublicLinkSource implements MediaSource {
  readonly kind = "google-drive" as const;
  readonly maxPostsPerRun = 1;
  readonly fileId: string;
  private readonly session: DriveSession;

  constructor(
    config: GoogleDriveSourceConfig,
    publicUrl: string,
    private readonly timeoutMs: number,
  ) {
    const fileId = extractDriveFileId(publicUrl);
    if (!fileId) {
      throw new ConfigurationError(`GDRIVE_PUBLIC_URL has no Drive file id: ${publicUrl}`);
    }
    this.fileId = fileId;
    this.session = new DriveSession(config);
  }

  canEnumerate(): boolean {
    return false;
  }

  async listCandidates(): Promise<MediaCandidate[]> {
    let file: drive_v3.Schema$File;
    try {
      const drive = await this.session.client();
      file = (
        await drive.files.get({ fileId: this.fileId, fields: FILE_FIELDS, supportsAllDrives: true })
      ).data;
    } catch (error) {
      throw wrapListError(error, `shared Drive file ${this.fileId}`);
    }

    const candidate = toDriveCandidate(file);
    if (!candidate) {
      throw new SourceError(`Shared Drive file ${this.fileId} is not a supported media file`);
    }
    return [candidate];
  }

  async download(candidate: MediaCandidate, destDir: string): Promise<LocalMediaFile> {
    return downloadCandidate(this.session, candidate, destDir, this.timeoutMs);
  }
}

/** Keeps the dedup file in a Drive folder, replacing older copies on push. */
export class DriveStoreCopy implements RemoteStoreCopy {
  readonly kind = "google-drive";
  private readonly session: DriveSession;

  constructor(
    private readonly config: GoogleDriveSourceConfig,
    private readonly remoteName: string,
    private readonly timeoutMs: number,
  ) {
    this.session = new DriveSession(config);
  }

  private async folderId(): Promise<string> {
    return this.config.dbFolderId ?? this.session.mediaFolderId();
  }

  /** Ids of existing copies, newest first. */
  private async existing(drive: drive_v3.Drive, folderId: string): Promise<string[]> {
    const response = await drive.files.list({
      q: `name = '${escapeDriveQuery(this.remoteName)}' and '${escapeDriveQuery(folderId)}' in parents and trashed = false`,
      orderBy: "modifiedTime desc",
      fields: "files(id)",
      ...this.session.scope(),
    });
    return (response.data.files ?? [])
      .map((file) => file.id)
      .filter((id): id is string => typeof id === "string");
  }

  async pull(localPath: string): Promise<boolean> {
    const drive = await this.session.client();
    const [latest] = await this.existing(drive, await this.folderId());
    if (!latest) {
      return false;
    }

    await this.session.downloadFile(latest, localPath, {
      timeoutMs: this.timeoutMs,
      label: `${this.remoteName} from Google Drive`,
    });
    return true;
  }

  async push(localPath: string): Promise<void> {
    const drive = await this.session.client();
    const folderId = await this.folderId();
    const previous = await this.existing(drive, folderId);

    await drive.files.create(
      {
        requestBody: { name: this.remoteName, parents: [folderId] },
        media: { mimeType: "application/json", body: createReadStream(localPath) },
        fields: "id",
        supportsAllDrives: true,
      },
      { signal: AbortSignal.timeout(this.timeoutMs) },
    );

    for (const fileId of previous) {
      try {
        await drive.files.delete({ fileId, supportsAllDrives: true });
      } catch (error) {
        logger.warn({ err: error, fileId }, "Cannot delete older remote copy of the dedup store");
      }
    }
    logger.debug({ name: this.remoteName, folderId }, "Pushed dedup store to Google Drive");
  }
}
