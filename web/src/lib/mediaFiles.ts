import { readdir } from "node:fs/promises";
import path from "node:path";
import type { MediaKind } from "@/types";

export const VIDEO_EXTENSIONS = [".mp4", ".avi", ".mov", ".mkv", ".wmv", ".flv", ".webm"];
export const IMAGE_EXTENSIONS = [".jpg", ".jpeg", ".png", ".bmp", ".tiff", ".tif", ".webp"];

export function mediaKind(filePath: string): MediaKind | null {
  const ext = path.extname(filePath).toLowerCase();
  if (VIDEO_EXTENSIONS.includes(ext)) return "video";
  if (IMAGE_EXTENSIONS.includes(ext)) return "image";
  return null;
}

/** Supported media directly inside `dir`, sorted by file name. */
export async function listMediaFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && mediaKind(entry.name) !== null)
    .map((entry) => entry.name)
    .sort()
    .map((name) => path.join(dir, name));
}
