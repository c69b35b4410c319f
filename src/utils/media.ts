import path from "node:path";

import type { MediaCategory } from "../types.js";

const mimeByExtension: Record<string, { category: MediaCategory; mimeType: string }> = {
  ".jpg": { category: "image", mimeType: "image/jpeg" },
  ".jpeg": { category: "image", mimeType: "image/jpeg" },
  ".png": { category: "image", mimeType: "image/png" },
  ".gif": { category: "image", mimeType: "image/gif" },
  ".webp": { category: "image", mimeType: "image/webp" },
  ".mp4": { category: "video", mimeType: "video/mp4" },
  ".mov": { category: "video", mimeType: "video/quicktime" },
  ".mkv": { category: "video", mimeType: "video/x-matroska" },
  ".webm": { category: "video", mimeType: "video/webm" },
};

export function classifyMedia(
  fileName: string,
): { category: MediaCategory; mimeType: string } | null {
  return mimeByExtension[path.extname(fileName).toLowerCase()] ?? null;
}

export function isVideoFile(fileName: string): boolean {
  return classifyMedia(fileName)?.category === "video";
}

export function stemOf(fileName: string): string {
  return path.basename(fileName, path.extname(fileName));
}
