import path from "node:path";

import type { AppConfig } from "../config/index.js";
import { ConfigurationError } from "../errors.js";
import { DriveStoreCopy } from "../sources/google-drive.js";
import { MegaStoreCopy } from "../sources/mega.js";
import type { DedupStore, RemoteStoreCopy } from "../types.js";
import { JsonDedupStore } from "./json.js";
import { SqliteDedupStore } from "./sqlite.js";
import { SyncedDedupStore } from "./synced.js";

export function createRemoteStoreCopy(
  config: Pick<AppConfig, "storeSync" | "postedJsonPath" | "gdrive" | "mega" | "httpTimeoutSeconds">,
): RemoteStoreCopy | null {
  const remoteName = path.basename(config.postedJsonPath);
  const timeoutMs = config.httpTimeoutSeconds * 1000;

  switch (config.storeSync) {
    case "mega":
      return new MegaStoreCopy(config.mega, remoteName, timeoutMs);
    case "gdrive":
      return new DriveStoreCopy(config.gdrive, remoteName, timeoutMs);
    case "none":
      return null;
  }
}

/** Only the JSON store, kept as a single file, can be backed by a remote copy. */
export function createDedupStore(
  config: Pick<AppConfig, "dedupStore" | "dbPath" | "postedJsonPath">,
  remote: RemoteStoreCopy | null = null,
): DedupStore {
  if (config.dedupStore === "json") {
    const store = new JsonDedupStore({ jsonPath: config.postedJsonPath });
    return remote
      ? new SyncedDedupStore({ store, remote, localPath: config.postedJsonPath })
      : store;
  }
  if (remote) {
    throw new ConfigurationError(`A ${remote.kind} remote copy needs DEDUP_STORE=json`);
  }
  return new SqliteDedupStore({ dbPath: config.dbPath });
}
