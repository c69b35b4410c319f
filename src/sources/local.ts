import { readdir, stat } from "node:fs/promises";
import path from "node:path";

import type { LocalSourceConfig } from "../config/index.js";
import { SourceError, errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import type { LocalMediaFile, MediaCandidate, MediaSource } from "../types.js";
import { removeFileSafe } from "../utils/fs.js";
import { classifyMedia } from "../utils/media.js";

export class LocalFolderSource implements MediaSource {
  readonly kind = "local" as const;

  constructor(private readonly options: LocalSourceConfig) {}

  canEnumerate(): boolean {
    return true;
  }

  async listCandidates(): Promise<MediaCandidate[]> {
    try {
      return await this.walk(this.options.mediaDir);
    } catch (error) {
      throw new SourceError(
        `Cannot enumerate ${this.options.mediaDir}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  private async walk(directory: string): Promise<MediaCandidate[]> {
    const entries = await readdir(directory, { withFileTypes: true });
    const candidates: MediaCandidate[] = [];

    for (const entry of entries) {
      const fullPath = path.join(directory, entry.name);
      if (entry.isDirectory()) {
        candidates.push(...(await this.walk(fullPath)));
        continue;
      }
      if (!entry.isFile()) {
        continue;
      }

      const media = classifyMedia(entry.name);
      if (!media) {
        continue;
      }

      const info = await stat(fullPath);
      candidates.push({
        sourceKind: this.kind,
        handle: path.relative(this.options.mediaDir, fullPath).split(path.sep).join("/"),
        name: entry.name,
        sizeBytes: info.size,
        mimeCategory: media.category,
        mimeType: media.mimeType,
        modifiedAt: info.mtime,
      });
    }

    return candidates;
  }

  async download(candidate: MediaCandidate): Promise<LocalMediaFile> {
    const filePath = this.pathOf(candidate);
    try {
      const info = await stat(filePath);
      return { path: filePath, sizeBytes: info.size, temporary: false };
    } catch (error) {
      throw new SourceError(`Local media ${filePath} is not readable: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  async cleanup(candidate: MediaCandidate, localPath: string): Promise<void> {
    if (!this.options.deleteAfterPost) {
      return;
    }
    await removeFileSafe(localPath);
    logger.info({ name: candidate.name, path: localPath }, "Deleted posted local media");
  }

  private pathOf(candidate: MediaCandidate): string {
    return path.join(this.options.mediaDir, candidate.handle ?? candidate.name);
  }
}
