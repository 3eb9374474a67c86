import type { ClassificationLabel, DecisionReason, FrameDetections, VideoClassification } from "@/types";
import { filterDetections, leadingDetection } from "./frameFilter";
import type { ThresholdPolicy } from "./thresholdPolicy";

/**
 * Folds a video's per-frame detections, in frame order, into one
 * classification.
 *
 * Each non-empty frame contributes its leading species (highest score,
 * lowest class id on ties) to the per-species frame counts. A change of
 * leading species between two non-empty frames is a transition; empty
 * frames in between neither count as one nor reset the previous species.
 * Frames with two or more distinct species are tallied as mixed but still
 * reduce to their leading species.
 *
 * The final label is decided once, in {@link VideoAggregator.finish}.
 */
export class VideoAggregator {
  private readonly counts = new Map<string, number>();
  private readonly classIds = new Map<string, number>();
  private previousSpecies: string | null = null;
  private lastFrameIndex = -1;
  private transitions = 0;
  private emptyRun = 0;
  private sawEmptyRun = false;
  private framesAnalyzed = 0;
  private mixedFrames = 0;
  private skippedFrames = 0;

  constructor(private readonly policy: ThresholdPolicy) {}

  /** `frame.detections` must already be filtered by `confidenceThreshold`. */
  push(frame: FrameDetections): void {
    this.advanceTo(frame.frameIndex);
    this.framesAnalyzed += 1;

    const leading = leadingDetection(frame.detections);
    if (!leading) {
      this.emptyRun += 1;
      if (this.emptyRun >= this.policy.consecutiveEmptyFrames) this.sawEmptyRun = true;
      return;
    }

    this.emptyRun = 0;
    const species = leading.label;
    this.counts.set(species, (this.counts.get(species) ?? 0) + 1);

    for (const det of frame.detections) {
      const known = this.classIds.get(det.label);
      if (known === undefined || det.classId < known) this.classIds.set(det.label, det.classId);
    }

    if (new Set(frame.detections.map((d) => d.label)).size > 1) this.mixedFrames += 1;

    if (this.previousSpecies !== null && this.previousSpecies !== species) this.transitions += 1;
    this.previousSpecies = species;
  }

  /** Records a frame the detector could not read. */
  skip(frameIndex: number): void {
    this.advanceTo(frameIndex);
    this.skippedFrames += 1;
  }

  get failedFrames(): number {
    return this.skippedFrames;
  }

  finish(): VideoClassification {
    const speciesFrameCounts = Object.freeze(Object.fromEntries(this.counts));
    const base = {
      sourceKind: "video" as const,
      speciesFrameCounts,
      transitions: this.transitions,
      framesAnalyzed: this.framesAnalyzed,
      framesWithAnimals: 0,
      mixedFrames: this.mixedFrames,
      skippedFrames: this.skippedFrames,
      sawEmptyRun: this.sawEmptyRun,
    };

    const top = this.topSpecies();
    if (!top) {
      const result: VideoClassification = {
        ...base,
        label: { kind: "no_animal" },
        confidence: 0,
        reason: "no_detections",
      };
      return Object.freeze(result);
    }

    const topShare = top.count / top.total;
    let label: ClassificationLabel;
    let reason: DecisionReason;
    if (this.transitions > this.policy.maxSpeciesTransitions) {
      label = { kind: "unsorted" };
      reason = "too_many_transitions";
    } else if (topShare >= this.policy.dominantSpeciesThreshold) {
      label = { kind: "species", species: top.species };
      reason = "dominant_species";
    } else {
      label = { kind: "unsorted" };
      reason = "no_dominant_species";
    }

    const result: VideoClassification = {
      ...base,
      framesWithAnimals: top.total,
      label,
      confidence: topShare,
      reason,
    };
    return Object.freeze(result);
  }

  private advanceTo(frameIndex: number): void {
    if (!Number.isInteger(frameIndex) || frameIndex <= this.lastFrameIndex) {
      throw new Error(`Frame index ${frameIndex} does not follow ${this.lastFrameIndex}`);
    }
    this.lastFrameIndex = frameIndex;
  }

  private topSpecies(): { species: string; count: number; total: number } | null {
    let total = 0;
    let best: { species: string; count: number } | null = null;

    for (const [species, count] of this.counts) {
      total += count;
      if (!best || count > best.count || (count === best.count && this.ranksBefore(species, best.species))) {
        best = { species, count };
      }
    }
    return best ? { ...best, total } : null;
  }

  private ranksBefore(a: string, b: string): boolean {
    const idA = this.classIds.get(a) ?? Number.MAX_SAFE_INTEGER;
    const idB = this.classIds.get(b) ?? Number.MAX_SAFE_INTEGER;
    if (idA !== idB) return idA < idB;
    return a < b;
  }
}

/** Filters and folds a complete frame sequence. */
export function aggregateVideo(frames: Iterable<FrameDetections>, policy: ThresholdPolicy): VideoClassification {
  const aggregator = new VideoAggregator(policy);
  for (const frame of frames) {
    aggregator.push({
      frameIndex: frame.frameIndex,
      detections: filterDetections(frame.detections, policy.confidenceThreshold),
    });
  }
  return aggregator.finish();
}
