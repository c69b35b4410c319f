import type { AppConfig } from "../config/index.js";
import type { MediaSource } from "../types.js";
import { GoogleDrivePublicLinkSource, GoogleDriveSource } from "./google-drive.js";
import { LocalFolderSource } from "./local.js";
import { MegaAccountSource, MegaPublicLinkSource } from "./mega.js";

export function createMediaSource(
  config: Pick<AppConfig, "mediaSource" | "local" | "gdrive" | "mega" | "httpTimeoutSeconds">,
): MediaSource {
  const timeoutMs = config.httpTimeoutSeconds * 1000;

  switch (config.mediaSource) {
    case "gdrive":
      return config.gdrive.publicUrl
        ? new GoogleDrivePublicLinkSource(config.gdrive, config.gdrive.publicUrl, timeoutMs)
        : new GoogleDriveSource(config.gdrive, timeoutMs);
    case "mega":
      return config.mega.publicUrl
        ? new MegaPublicLinkSource(config.mega.publicUrl, timeoutMs)
        : new MegaAccountSource(config.mega, timeoutMs);
    case "local":
      return new LocalFolderSource(config.local);
  }
}
