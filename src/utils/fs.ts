import { mkdir, open, rm, stat } from "node:fs/promises";
import path from "node:path";

export async function ensureDir(directory: string): Promise<void> {
  await mkdir(directory, { recursive: true });
}

export async function ensureParentDir(filePath: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
}

export async function removeFileSafe(filePath: string): Promise<void> {
  await rm(filePath, { force: true });
}

export async function fileSize(filePath: string): Promise<number> {
  const info = await stat(filePath);
  return info.size;
}

/** Yields consecutive slices of exactly `chunkBytes` bytes; only the last may be shorter. */
export async function* readFileChunks(
  filePath: string,
  chunkBytes: number,
): AsyncGenerator<Buffer> {
  const handle = await open(filePath, "r");
  try {
    let position = 0;
    while (true) {
      const buffer = Buffer.alloc(chunkBytes);
      let filled = 0;
      while (filled < chunkBytes) {
        const { bytesRead } = await handle.read(buffer, filled, chunkBytes - filled, position);
        if (bytesRead === 0) {
          break;
        }
        filled += bytesRead;
        position += bytesRead;
      }

      if (filled === 0) {
        return;
      }
      yield filled === chunkBytes ? buffer : buffer.subarray(0, filled);
      if (filled < chunkBytes) {
        return;
      }
    }
  } finally {
    await handle.close();
  }
}
