import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { Detection, Detector, FrameDetections, FrameOutcome } from "@/types";

const CLASS_IDS: Record<string, number> = {
  Wolf: 0,
  Coyote: 1,
  Fox: 2,
  Deer: 3,
  Elk: 4,
  Moose: 5,
  Bear: 6,
  Raccoon: 11,
};

export function det(label: string, score: number, classId = CLASS_IDS[label] ?? 99): Detection {
  return { label, score, classId };
}

export function frames(...perFrame: Detection[][]): FrameDetections[] {
  return perFrame.map((detections, frameIndex) => ({ frameIndex, detections }));
}

/** One single-detection frame per label; `null` is an empty frame. */
export function labelledFrames(labels: (string | null)[], score = 0.9): FrameDetections[] {
  return frames(...labels.map((label) => (label ? [det(label, score)] : [])));
}

export async function makeTempDir(prefix = "trailsort-"): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function touch(filePath: string, contents = "media"): Promise<string> {
  await writeFile(filePath, contents);
  return filePath;
}

type FakeMedia = {
  image?: Detection[] | Error;
  video?: FrameOutcome[];
};

/** In-process detector answering from a table keyed by file name. */
export function fakeDetector(table: Record<string, FakeMedia>): Detector {
  const lookup = (filePath: string): FakeMedia => {
    const entry = table[path.basename(filePath)];
    if (!entry) throw new Error(`No fake detections for ${filePath}`);
    return entry;
  };

  return {
    detectImage: async (filePath) => {
      const image = lookup(filePath).image;
      if (image instanceof Error) throw image;
      return image ?? [];
    },
    detectVideo: async function* (filePath) {
      for (const outcome of lookup(filePath).video ?? []) yield outcome;
    },
  };
}
