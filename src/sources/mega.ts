import { readFile } from "node:fs/promises";
import path from "node:path";

import { File, Storage, type MutableFile } from "megajs";

import type { MegaSourceConfig } from "../config/index.js";
import { ConfigurationError, SourceError, errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import type { LocalMediaFile, MediaCandidate, MediaSource, RemoteStoreCopy } from "../types.js";
import { classifyMedia, isVideoFile } from "../utils/media.js";
import { saveStream } from "./download.js";

export interface MegaNodeLike {
  nodeId?: string;
  name: string | null;
  directory: boolean;
  size?: number;
  timestamp?: number;
  children?: MegaNodeLike[];
}

export function toMegaCandidate(node: MegaNodeLike): MediaCandidate | null {
  if (node.directory || !node.name || !isVideoFile(node.name)) {
    return null;
  }
  const media = classifyMedia(node.name);
  if (!media) {
    return null;
  }

  return {
    sourceKind: "mega",
    handle: node.nodeId ?? null,
    name: node.name,
    sizeBytes: node.size ?? 0,
    mimeCategory: media.category,
    mimeType: media.mimeType,
    modifiedAt: new Date((node.timestamp ?? 0) * 1000),
  };
}

/** Collects video candidates under `folder`, descending into subfolders. */
export function collectMegaVideos(folder: MegaNodeLike): MediaCandidate[] {
  const candidates: MediaCandidate[] = [];
  const queue = [...(folder.children ?? [])];

  while (queue.length > 0) {
    const node = queue.shift();
    if (!node) {
      continue;
    }
    if (node.directory) {
      queue.push(...(node.children ?? []));
      continue;
    }
    const candidate = toMegaCandidate(node);
    if (candidate) {
      candidates.push(candidate);
    }
  }

  return candidates;
}

async function downloadNode(
  file: File,
  candidate: MediaCandidate,
  destDir: string,
  timeoutMs: number,
): Promise<LocalMediaFile> {
  const outputPath = path.join(destDir, path.basename(candidate.name));
  const sizeBytes = await saveStream(() => file.download({}), outputPath, {
    timeoutMs,
    label: `${candidate.name} from MEGA`,
  });
  logger.info({ name: candidate.name, outputPath, sizeBytes }, "Downloaded MEGA media");
  return { path: outputPath, sizeBytes, temporary: true };
}

/** Logged-in MEGA account and its configured folder. */
class MegaSession {
  private storage: Storage | null = null;

  constructor(private readonly config: MegaSourceConfig) {}

  async open(): Promise<Storage> {
    if (this.storage) {
      return this.storage;
    }
    if (!this.config.email || !this.config.password) {
      throw new ConfigurationError("MEGA_EMAIL and MEGA_PASSWORD are required");
    }

    const storage = new Storage({ email: this.config.email, password: this.config.password });
    await storage.ready;
    this.storage = storage;
    logger.info({ folder: this.config.dirName }, "Logged in to MEGA");
    return storage;
  }

  async folder(): Promise<MutableFile> {
    const storage = await this.open();
    const folder = Object.values(storage.files).find(
      (node) => node.directory && node.name === this.config.dirName,
    );
    if (!folder) {
      throw new SourceError(`MEGA folder "${this.config.dirName}" not found`);
    }
    return folder;
  }

  async close(): Promise<void> {
    if (this.storage) {
      await this.storage.close();
      this.storage = null;
    }
  }
}

/** Videos in a MEGA account folder. Posts at most one item per run. */
export class MegaAccountSource implements MediaSource {
  readonly kind = "mega" as const;
  readonly maxPostsPerRun = 1;
  private readonly session: MegaSession;

  constructor(
    private readonly config: MegaSourceConfig,
    private readonly timeoutMs: number,
  ) {
    this.session = new MegaSession(config);
  }

  canEnumerate(): boolean {
    return true;
  }

  private async findNode(candidate: MediaCandidate): Promise<MutableFile> {
    const storage = await this.session.open();
    const node = candidate.handle ? storage.files[candidate.handle] : undefined;
    if (!node) {
      throw new SourceError(`MEGA node for ${candidate.name} no longer exists`);
    }
    return node;
  }

  async listCandidates(): Promise<MediaCandidate[]> {
    try {
      const candidates = collectMegaVideos(await this.session.folder());
      logger.debug({ folder: this.config.dirName, found: candidates.length }, "Listed MEGA videos");
      return candidates;
    } catch (error) {
      if (error instanceof SourceError || error instanceof ConfigurationError) {
        throw error;
      }
      throw new SourceError(`Cannot list MEGA videos: ${errorMessage(error)}`, { cause: error });
    }
  }

  async download(candidate: MediaCandidate, destDir: string): Promise<LocalMediaFile> {
    return downloadNode(await this.findNode(candidate), candidate, destDir, this.timeoutMs);
  }

  async cleanup(candidate: MediaCandidate): Promise<void> {
    const node = await this.findNode(candidate);
    await node.delete(this.config.hardDelete);
    logger.info(
      { name: candidate.name, nodeId: candidate.handle, permanent: this.config.hardDelete },
      this.config.hardDelete ? "Destroyed MEGA file" : "Moved MEGA file to rubbish bin",
    );
  }

  async close(): Promise<void> {
    await this.session.close();
  }
}

/**
 * A single shared MEGA link. It cannot be enumerated, so runs always post
 * the same file and nothing is recorded in the dedup store.
 */
export class MegaPublicLinkSource implements MediaSource {
  readonly kind = "mega" as const;
  readonly maxPostsPerRun = 1;
  private file: File | null = null;

  constructor(
    private readonly publicUrl: string,
    private readonly timeoutMs: number,
  ) {}

  canEnumerate(): boolean {
    return false;
  }

  private async linkedFile(): Promise<File> {
    if (this.file) {
      return this.file;
    }
    const file = File.fromURL(this.publicUrl);
    await file.loadAttributes();
    this.file = file;
    return file;
  }

  async listCandidates(): Promise<MediaCandidate[]> {
    let file: File;
    try {
      file = await this.linkedFile();
    } catch (error) {
      throw new SourceError(`Cannot open MEGA public link: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const name = file.name ?? "mega-video.mp4";
    const media = classifyMedia(name) ?? { category: "video" as const, mimeType: "video/mp4" };
    return [
      {
        sourceKind: this.kind,
        handle: null,
        name,
        sizeBytes: file.size ?? 0,
        mimeCategory: media.category,
        mimeType: media.mimeType,
        modifiedAt: new Date((file.timestamp ?? 0) * 1000),
      },
    ];
  }

  async download(candidate: MediaCandidate, destDir: string): Promise<LocalMediaFile> {
    return downloadNode(await this.linkedFile(), candidate, destDir, this.timeoutMs);
  }
}

/** Keeps the dedup file in the MEGA folder; a push uploads first, then drops older copies. */
export class MegaStoreCopy implements RemoteStoreCopy {
  readonly kind = "mega";
  private readonly session: MegaSession;

  constructor(
    config: MegaSourceConfig,
    private readonly remoteName: string,
    private readonly timeoutMs: number,
  ) {
    this.session = new MegaSession(config);
  }

  private copiesIn(folder: MutableFile): MutableFile[] {
    return (folder.children ?? []).filter(
      (node) => !node.directory && node.name === this.remoteName,
    );
  }

  async pull(localPath: string): Promise<boolean> {
    const [latest] = this.copiesIn(await this.session.folder()).sort(
      (left, right) => (right.timestamp ?? 0) - (left.timestamp ?? 0),
    );
    if (!latest) {
      return false;
    }

    await saveStream(() => latest.download({}), localPath, {
      timeoutMs: this.timeoutMs,
      label: `${this.remoteName} from MEGA`,
    });
    return true;
  }

  async push(localPath: string): Promise<void> {
    const folder = await this.session.folder();
    const previous = this.copiesIn(folder);
    const data = await readFile(localPath);

    await folder.upload({ name: this.remoteName, size: data.length }, data).complete;

    for (const node of previous) {
      try {
        await node.delete(true);
      } catch (error) {
        logger.warn({ err: error, nodeId: node.nodeId }, "Cannot delete older remote copy of the dedup store");
      }
    }
    logger.debug({ name: this.remoteName, folder: folder.name }, "Pushed dedup store to MEGA");
  }

  async close(): Promise<void> {
    await this.session.close();
  }
}
