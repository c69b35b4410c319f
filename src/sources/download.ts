import { createWriteStream } from "node:fs";
import path from "node:path";
import type { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";

import { SourceError, errorMessage } from "../errors.js";
import { ensureDir, fileSize, removeFileSafe } from "../utils/fs.js";

export interface SaveStreamOptions {
  timeoutMs: number;
  /** Names the download in errors, e.g. `clip.mp4 from MEGA`. */
  label: string;
}

/**
 * Writes the stream returned by `open` to `outputPath` and returns its size.
 * One deadline covers opening and draining the stream; a partial file is
 * removed on failure.
 */
export async function saveStream(
  open: (signal: AbortSignal) => Promise<Readable> | Readable,
  outputPath: string,
  options: SaveStreamOptions,
): Promise<number> {
  const signal = AbortSignal.timeout(options.timeoutMs);

  try {
    await ensureDir(path.dirname(outputPath));
    const stream = await open(signal);
    await pipeline(stream, createWriteStream(outputPath), { signal });
  } catch (error) {
    await removeFileSafe(outputPath);
    const reason = signal.aborted ? `timed out after ${options.timeoutMs} ms` : errorMessage(error);
    throw new SourceError(`Cannot download ${options.label}: ${reason}`, { cause: error });
  }

  return fileSize(outputPath);
}
