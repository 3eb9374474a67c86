import type { Detection } from "@/types";

/**
 * Keeps the detections that meet `threshold`. Detections below it are
 * dropped outright, never carried forward with a low score.
 */
export function filterDetections(detections: readonly Detection[], threshold: number): Detection[] {
  return detections.filter((d) => Number.isFinite(d.score) && d.score >= threshold);
}

/** Highest score first; equal scores resolve to the lowest class id. */
export function compareDetections(a: Detection, b: Detection): number {
  return b.score - a.score || a.classId - b.classId;
}

export function leadingDetection(detections: readonly Detection[]): Detection | null {
  let best: Detection | null = null;
  for (const det of detections) {
    if (!best || compareDetections(det, best) < 0) best = det;
  }
  return best;
}
