import { readFile, readdir } from "node:fs/promises";
import path from "node:path";

import { logger } from "../logger.js";
import { stemOf } from "../utils/media.js";

const FALLBACK_CAPTION_FILE = "caption.txt";

async function readCaptionFile(filePath: string): Promise<string | null> {
  try {
    const text = (await readFile(filePath, "utf8")).trim();
    return text || null;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

async function listTextFiles(directory: string): Promise<string[]> {
  try {
    const entries = await readdir(directory, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith(".txt"))
      .map((entry) => entry.name)
      .sort();
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return [];
    }
    throw error;
  }
}

/**
 * Caption lookup, first match wins:
 * `<stem>.txt` next to the media, `<stem>.txt` in the caption dir,
 * `caption.txt` in the caption dir, then the first other `.txt` there.
 */
export class CaptionResolver {
  constructor(private readonly captionDir: string) {}

  async resolve(mediaName: string, localPath: string): Promise<string | null> {
    const stem = stemOf(mediaName);
    const candidates = [
      path.join(path.dirname(localPath), `${stem}.txt`),
      path.join(this.captionDir, `${stem}.txt`),
      path.join(this.captionDir, FALLBACK_CAPTION_FILE),
    ];

    for (const candidate of new Set(candidates)) {
      const text = await readCaptionFile(candidate);
      if (text) {
        logger.debug({ mediaName, captionFile: candidate }, "Resolved caption");
        return text;
      }
    }

    for (const fileName of await listTextFiles(this.captionDir)) {
      if (fileName.toLowerCase() === FALLBACK_CAPTION_FILE) {
        continue;
      }
      const text = await readCaptionFile(path.join(this.captionDir, fileName));
      if (text) {
        logger.debug({ mediaName, captionFile: fileName }, "Resolved fallback caption");
        return text;
      }
    }

    return null;
  }
}
