import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { Detection, Detector, FrameOutcome } from "@/types";
import { DetectorFailureError, describeError } from "./errors";

export const SIDECAR_SUFFIX = ".detections.json";

const SidecarDetectionSchema = z.object({
  classId: z.number().int().min(0),
  score: z.number().min(0).max(1),
  label: z.string().min(1).optional(),
  box: z.tuple([z.number(), z.number(), z.number(), z.number()]).optional(),
});

const SidecarFrameSchema = z.union([
  z.object({ frameIndex: z.number().int().min(0), error: z.string() }),
  z.object({ frameIndex: z.number().int().min(0), detections: z.array(SidecarDetectionSchema) }),
]);

const SidecarSchema = z.object({
  frames: z.array(SidecarFrameSchema),
});

type SidecarFrame = z.infer<typeof SidecarFrameSchema>;

type SidecarOptions = {
  labelFor?: (classId: number) => string;
};

/**
 * Reads detections the external detector wrote next to each media file as
 * `<file>.detections.json`. Images use the first frame of the document.
 */
export function createSidecarDetector(options: SidecarOptions = {}): Detector {
  const labelFor = options.labelFor ?? ((classId: number) => `class_${classId}`);

  const toDetections = (frame: Extract<SidecarFrame, { detections: unknown }>): Detection[] =>
    frame.detections.map((d) => ({
      classId: d.classId,
      score: d.score,
      label: d.label ?? labelFor(d.classId),
      box: d.box,
    }));

  const detectImage = async (filePath: string): Promise<Detection[]> => {
    const frames = await readSidecar(filePath);
    const frame = frames[0];
    if (!frame) return [];
    if ("error" in frame) throw new DetectorFailureError(`Detector failed on ${filePath}: ${frame.error}`);
    return toDetections(frame);
  };

  async function* detectVideo(filePath: string): AsyncGenerator<FrameOutcome> {
    const frames = await readSidecar(filePath);
    for (const frame of frames) {
      if ("error" in frame) {
        yield {
          frameIndex: frame.frameIndex,
          error: new DetectorFailureError(`Frame ${frame.frameIndex}: ${frame.error}`),
        };
      } else {
        yield { frameIndex: frame.frameIndex, detections: toDetections(frame) };
      }
    }
  }

  return { detectImage, detectVideo };
}

async function readSidecar(filePath: string): Promise<SidecarFrame[]> {
  const sidecarPath = `${filePath}${SIDECAR_SUFFIX}`;
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(sidecarPath, "utf8"));
  } catch (err) {
    throw new DetectorFailureError(`Could not read detections for ${filePath}: ${describeError(err)}`, err);
  }

  const parsed = SidecarSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DetectorFailureError(`Malformed detections for ${filePath}: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }
  return [...parsed.data.frames].sort((a, b) => a.frameIndex - b.frameIndex);
}
