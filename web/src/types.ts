export type SpeciesCounts = Record<string, number>;

export type Detection = {
  box?: [number, number, number, number]; // [x1, y1, x2, y2] in detector input resolution
  score: number;
  classId: number;
  label: string;
};

export type FrameDetections = {
  frameIndex: number;
  detections: Detection[];
};

export type FrameOutcome =
  | { frameIndex: number; detections: Detection[] }
  | { frameIndex: number; error: Error };

/**
 * Boundary to the external object detector. Inference itself never runs in
 * this project; implementations hand over detections already produced.
 */
export type Detector = {
  detectImage: (filePath: string) => Promise<Detection[]>;
  detectVideo: (filePath: string) => AsyncIterable<FrameOutcome>;
};

export type MediaKind = "video" | "image";

export type ClassificationLabel =
  | { kind: "species"; species: string }
  | { kind: "unsorted" }
  | { kind: "no_animal" };

export type DecisionReason =
  | "no_detections"
  | "too_many_transitions"
  | "dominant_species"
  | "no_dominant_species"
  | "below_min_detections"
  | "multi_species"
  | "low_confidence_band"
  | "confident_detection";

type ClassificationBase = {
  label: ClassificationLabel;
  confidence: number;
  reason: DecisionReason;
};

export type VideoClassification = ClassificationBase & {
  sourceKind: "video";
  speciesFrameCounts: SpeciesCounts;
  transitions: number;
  framesAnalyzed: number;
  framesWithAnimals: number;
  mixedFrames: number;
  skippedFrames: number;
  sawEmptyRun: boolean;
};

export type ImageClassification = ClassificationBase & {
  sourceKind: "image";
  detectionCount: number;
};

export type ClassificationResult = VideoClassification | ImageClassification;

export type RoutingDecision = {
  category: string | null;
  species: string | null;
  destinationDir: string;
};

export type ErrorInfo = {
  code: string;
  message: string;
};

export type BatchReportEntry = {
  filePath: string;
  fileType: MediaKind | null;
  result: ClassificationResult | null;
  routing: RoutingDecision | null;
  destinationPath: string | null;
  elapsedMs: number;
  error: ErrorInfo | null;
};

export type BatchStatus = "idle" | "running" | "completed" | "cancelled" | "failed";

export type BatchSummary = {
  totalFiles: number;
  succeeded: number;
  failed: number;
  successRate: number;
  classificationCounts: Record<string, number>;
  speciesCounts: SpeciesCounts;
  fileTypeCounts: Record<string, number>;
  averageConfidence: number;
  totalElapsedMs: number;
  averageElapsedMs: number;
};

export type BatchOutcome = {
  runId: string;
  status: Exclude<BatchStatus, "idle" | "running">;
  report: BatchReportEntry[];
  summary: BatchSummary;
  error?: ErrorInfo;
};

export type ClassificationRecord = {
  run_id: string;
  file_name: string;
  file_path: string;
  file_type: MediaKind | null;
  classification: string | null;
  confidence: number | null;
  reason: DecisionReason | null;
  category: string | null;
  destination_path: string | null;
  species_frame_counts: SpeciesCounts | null;
  transitions: number | null;
  elapsed_ms: number;
  error_code: string | null;
  error_message: string | null;
  created_at?: string;
};
