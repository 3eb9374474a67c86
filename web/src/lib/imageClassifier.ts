import type { ClassificationLabel, DecisionReason, Detection, ImageClassification } from "@/types";
import { compareDetections, filterDetections } from "./frameFilter";
import type { ThresholdPolicy } from "./thresholdPolicy";

/**
 * Single-frame rules for still images. `detections` must already be
 * filtered by `imageConfidenceThreshold`.
 */
export function classifyImage(detections: readonly Detection[], policy: ThresholdPolicy): ImageClassification {
  const ranked = [...detections].sort(compareDetections);
  const top = ranked[0];

  if (!top || ranked.length < policy.imageMinDetections) {
    // Too few detections still report the best score seen.
    return build({ kind: "no_animal" }, top ? top.score : 0, "below_min_detections", ranked.length);
  }

  const second = ranked.find((d) => d.classId !== top.classId);
  if (second && top.score - second.score < policy.imageMultiSpeciesThreshold) {
    return build({ kind: "unsorted" }, top.score, "multi_species", ranked.length);
  }

  if (top.score >= policy.imageUnsortedMinConfidence && top.score <= policy.imageUnsortedMaxConfidence) {
    return build({ kind: "unsorted" }, top.score, "low_confidence_band", ranked.length);
  }

  return build({ kind: "species", species: top.label }, top.score, "confident_detection", ranked.length);
}

export function classifyImageDetections(raw: readonly Detection[], policy: ThresholdPolicy): ImageClassification {
  return classifyImage(filterDetections(raw, policy.imageConfidenceThreshold), policy);
}

function build(
  label: ClassificationLabel,
  confidence: number,
  reason: DecisionReason,
  detectionCount: number
): ImageClassification {
  const result: ImageClassification = { sourceKind: "image", label, confidence, reason, detectionCount };
  return Object.freeze(result);
}
