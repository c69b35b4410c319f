import { rename } from "node:fs/promises";

import { StoreError, errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import type { DedupStore, MediaCandidate, PostedRecord, RemoteStoreCopy } from "../types.js";
import { ensureParentDir, removeFileSafe } from "../utils/fs.js";

interface SyncedDedupStoreOptions {
  store: DedupStore;
  remote: RemoteStoreCopy;
  /** The file `store` reads and writes. */
  localPath: string;
}

/**
 * Wraps a file-backed store for hosts without a persistent disk. The remote
 * copy replaces the local file before `init`, and each new record is pushed
 * back. A failed push is retried on `close`, which throws if it fails again.
 */
export class SyncedDedupStore implements DedupStore {
  private pushPending = false;

  constructor(private readonly options: SyncedDedupStoreOptions) {}

  async init(): Promise<void> {
    const { remote, localPath } = this.options;
    const downloadPath = `${localPath}.download`;

    let pulled: boolean;
    try {
      await ensureParentDir(localPath);
      pulled = await remote.pull(downloadPath);
      if (pulled) {
        await rename(downloadPath, localPath);
      }
    } catch (error) {
      await removeFileSafe(downloadPath);
      throw new StoreError(`Cannot pull ${localPath} from ${remote.kind}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    logger.info(
      { remote: remote.kind, path: localPath, pulled },
      pulled ? "Pulled dedup store from remote copy" : "No remote dedup store yet, using local file",
    );
    await this.options.store.init();
  }

  keyFor(candidate: Pick<MediaCandidate, "sourceKind" | "handle" | "name">): string {
    return this.options.store.keyFor(candidate);
  }

  async listSeen(): Promise<string[]> {
    return this.options.store.listSeen();
  }

  async listRecords(): Promise<PostedRecord[]> {
    return this.options.store.listRecords();
  }

  async recordPosted(candidate: MediaCandidate, postId: string): Promise<void> {
    await this.options.store.recordPosted(candidate, postId);

    try {
      await this.options.remote.push(this.options.localPath);
      this.pushPending = false;
    } catch (error) {
      this.pushPending = true;
      logger.warn(
        { err: error, remote: this.options.remote.kind, name: candidate.name },
        "Cannot push dedup store to remote copy, retrying on close",
      );
    }
  }

  async close(): Promise<void> {
    const { remote, localPath } = this.options;
    try {
      if (this.pushPending) {
        try {
          await remote.push(localPath);
        } catch (error) {
          throw new StoreError(
            `Remote copy of ${localPath} on ${remote.kind} is out of date: ${errorMessage(error)}`,
            { cause: error },
          );
        }
        this.pushPending = false;
      }
    } finally {
      await this.options.store.close();
      await remote.close?.();
    }
  }
}
