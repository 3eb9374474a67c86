import { describe, expect, it } from "vitest";
import { compareDetections, filterDetections, leadingDetection } from "@/lib/frameFilter";
import { classifyImage, classifyImageDetections } from "@/lib/imageClassifier";
import { createThresholdPolicy } from "@/lib/thresholdPolicy";
import { det } from "./helpers";

describe("frame filter", () => {
  it("keeps detections at or above the threshold, in order", () => {
    const raw = [det("Wolf", 0.4), det("Deer", 0.39), det("Elk", 0.8)];
    expect(filterDetections(raw, 0.4)).toEqual([det("Wolf", 0.4), det("Elk", 0.8)]);
  });

  it("drops non-finite scores", () => {
    expect(filterDetections([det("Wolf", Number.NaN), det("Fox", 0.9)], 0)).toEqual([det("Fox", 0.9)]);
  });

  it("breaks score ties on the lowest class id", () => {
    expect(leadingDetection([det("Deer", 0.7), det("Wolf", 0.7)])).toEqual(det("Wolf", 0.7));
    expect([det("Elk", 0.5), det("Bear", 0.9)].sort(compareDetections).map((d) => d.label)).toEqual(["Bear", "Elk"]);
  });

  it("has no leading detection for an empty frame", () => {
    expect(leadingDetection([])).toBeNull();
  });
});

describe("classifyImage", () => {
  const policy = createThresholdPolicy({
    imageConfidenceThreshold: 0.3,
    imageUnsortedMinConfidence: 0.35,
    imageUnsortedMaxConfidence: 0.65,
    imageMultiSpeciesThreshold: 0.6,
  });

  it("sends a single detection inside the unsorted band to Unsorted", () => {
    const result = classifyImage([det("Wolf", 0.5)], policy);
    expect(result.label).toEqual({ kind: "unsorted" });
    expect(result.confidence).toBe(0.5);
    expect(result.reason).toBe("low_confidence_band");
  });

  it("treats both ends of the band as inside it", () => {
    expect(classifyImage([det("Wolf", 0.35)], policy).reason).toBe("low_confidence_band");
    expect(classifyImage([det("Wolf", 0.65)], policy).reason).toBe("low_confidence_band");
  });

  it("marks two close species as ambiguous", () => {
    const result = classifyImage([det("Wolf", 0.78), det("Bear", 0.8)], policy);
    expect(result.label).toEqual({ kind: "unsorted" });
    expect(result.confidence).toBe(0.8);
    expect(result.reason).toBe("multi_species");
  });

  it("classifies the top species when the runner-up is far enough behind", () => {
    const result = classifyImage([det("Bear", 0.95), det("Wolf", 0.3)], createThresholdPolicy({ imageMultiSpeciesThreshold: 0.5 }));
    expect(result.label).toEqual({ kind: "species", species: "Bear" });
    expect(result.confidence).toBe(0.95);
  });

  it("ignores extra detections of the same species when looking for a runner-up", () => {
    const result = classifyImage([det("Elk", 0.9), det("Elk", 0.88)], policy);
    expect(result).toEqual({
      sourceKind: "image",
      label: { kind: "species", species: "Elk" },
      confidence: 0.9,
      reason: "confident_detection",
      detectionCount: 2,
    });
  });

  it("returns No_Animal with zero confidence for an empty frame", () => {
    const result = classifyImage([], policy);
    expect(result.label).toEqual({ kind: "no_animal" });
    expect(result.confidence).toBe(0);
    expect(result.detectionCount).toBe(0);
  });

  it("keeps the best confidence when there are too few detections", () => {
    const strict = createThresholdPolicy({ imageMinDetections: 2 });
    const result = classifyImage([det("Fox", 0.9)], strict);
    expect(result.label).toEqual({ kind: "no_animal" });
    expect(result.confidence).toBe(0.9);
    expect(result.reason).toBe("below_min_detections");
  });

  it("returns a frozen result", () => {
    expect(Object.isFrozen(classifyImage([det("Fox", 0.9)], policy))).toBe(true);
  });
});

describe("classifyImageDetections", () => {
  it("applies the image confidence threshold before the rules", () => {
    const policy = createThresholdPolicy();
    const result = classifyImageDetections([det("Wolf", 0.9), det("Deer", 0.64)], policy);
    expect(result.label).toEqual({ kind: "species", species: "Wolf" });
    expect(result.detectionCount).toBe(1);
  });

  it("finds nothing when every detection is below the threshold", () => {
    const result = classifyImageDetections([det("Wolf", 0.5)], createThresholdPolicy());
    expect(result.label).toEqual({ kind: "no_animal" });
    expect(result.confidence).toBe(0);
  });
});
