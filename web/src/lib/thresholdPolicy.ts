import { z } from "zod";
import { InvalidPolicyError } from "./errors";

const probability = z.number().finite().min(0, "must be within [0, 1]").max(1, "must be within [0, 1]");
const count = z.number().int("must be an integer").min(1, "must be at least 1");

const ThresholdPolicyFields = z.object({
  confidenceThreshold: probability,
  dominantSpeciesThreshold: z
    .number()
    .finite()
    .min(0.5, "must be within [0.5, 1]")
    .max(1, "must be within [0.5, 1]"),
  maxSpeciesTransitions: count,
  consecutiveEmptyFrames: count,
  imageConfidenceThreshold: probability,
  imageMinDetections: count,
  imageMultiSpeciesThreshold: probability,
  imageUnsortedMinConfidence: probability,
  imageUnsortedMaxConfidence: probability,
  maxFailedFrames: z.number().int("must be an integer").min(0, "must not be negative"),
});

const ThresholdPolicySchema = ThresholdPolicyFields.strict().superRefine((policy, ctx) => {
  if (policy.imageUnsortedMinConfidence >= policy.imageUnsortedMaxConfidence) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["imageUnsortedMinConfidence"],
      message: "must be lower than imageUnsortedMaxConfidence",
    });
  }
});

/** Shape check for partial overrides arriving from outside (request bodies, files). */
export const ThresholdPolicyOverridesSchema = ThresholdPolicyFields.partial().strict();

export type ThresholdPolicyInput = z.input<typeof ThresholdPolicySchema>;
export type ThresholdPolicy = Readonly<z.output<typeof ThresholdPolicySchema>>;

export const DEFAULT_THRESHOLD_POLICY: ThresholdPolicyInput = {
  confidenceThreshold: 0.4,
  dominantSpeciesThreshold: 0.9,
  maxSpeciesTransitions: 5,
  consecutiveEmptyFrames: 15,
  imageConfidenceThreshold: 0.65,
  imageMinDetections: 1,
  imageMultiSpeciesThreshold: 0.6,
  imageUnsortedMinConfidence: 0.35,
  imageUnsortedMaxConfidence: 0.65,
  maxFailedFrames: 10,
};

export const PROCESSING_MODES = ["balanced", "high_precision", "high_recall", "fast"] as const;
export type ProcessingMode = (typeof PROCESSING_MODES)[number];

export type PolicyParseResult =
  | { success: true; policy: ThresholdPolicy }
  | { success: false; error: InvalidPolicyError };

export function safeParseThresholdPolicy(input: Partial<ThresholdPolicyInput> = {}): PolicyParseResult {
  const parsed = ThresholdPolicySchema.safeParse({ ...DEFAULT_THRESHOLD_POLICY, ...input });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    );
    return { success: false, error: new InvalidPolicyError(issues) };
  }
  return { success: true, policy: Object.freeze(parsed.data) };
}

/**
 * Merges `input` over the defaults and validates the result. The returned
 * policy is frozen; classifiers rely on it without re-checking ranges.
 */
export function createThresholdPolicy(input: Partial<ThresholdPolicyInput> = {}): ThresholdPolicy {
  const result = safeParseThresholdPolicy(input);
  if (!result.success) throw result.error;
  return result.policy;
}

// Mode presets are applied on top of explicit overrides.
export function applyProcessingMode(
  input: Partial<ThresholdPolicyInput>,
  mode: ProcessingMode
): Partial<ThresholdPolicyInput> {
  const confidence = input.confidenceThreshold ?? DEFAULT_THRESHOLD_POLICY.confidenceThreshold;

  switch (mode) {
    case "high_precision":
      return {
        ...input,
        confidenceThreshold: roundThreshold(Math.min(confidence + 0.1, 0.95)),
        dominantSpeciesThreshold: 0.95,
      };
    case "high_recall":
      return {
        ...input,
        confidenceThreshold: roundThreshold(Math.max(confidence - 0.1, 0.1)),
        dominantSpeciesThreshold: 0.7,
      };
    case "fast":
      return { ...input, consecutiveEmptyFrames: 5 };
    case "balanced":
      return { ...input };
  }
}

export function isProcessingMode(value: string): value is ProcessingMode {
  return PROCESSING_MODES.some((mode) => mode === value);
}

// Keeps 0.4 + 0.1 at 0.5 rather than 0.5000000000000001.
function roundThreshold(value: number): number {
  return Math.round(value * 1000) / 1000;
}
