import { mkdir } from "node:fs/promises";
import path from "node:path";
import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import { v4 as uuidv4 } from "uuid";
import type {
  BatchOutcome,
  BatchReportEntry,
  BatchStatus,
  ClassificationResult,
  Detector,
  ErrorInfo,
  MediaKind,
  RoutingDecision,
  VideoClassification,
} from "@/types";
import { summarizeReport } from "./batchReport";
import {
  ConfigurationError,
  DetectorFailureError,
  InvalidTaxonomyError,
  TrailsortError,
  describeError,
  toErrorInfo,
} from "./errors";
import { filterDetections } from "./frameFilter";
import { classifyImageDetections } from "./imageClassifier";
import { mediaKind } from "./mediaFiles";
import { moveToDestination, type MoveFile } from "./router";
import type { Taxonomy } from "./taxonomy";
import { TaxonomyResolver, type EnsureDirectory } from "./taxonomyResolver";
import {
  applyProcessingMode,
  createThresholdPolicy,
  type ProcessingMode,
  type ThresholdPolicy,
  type ThresholdPolicyInput,
} from "./thresholdPolicy";
import { VideoAggregator } from "./videoAggregator";

export type BatchOrchestratorOptions = {
  taxonomy: Taxonomy;
  outputRoot: string;
  detector: Detector;
  policy?: Partial<ThresholdPolicyInput>;
  mode?: ProcessingMode;
  moveFile?: MoveFile;
  ensureDir?: EnsureDirectory;
};

export type BatchCallbacks = {
  onStart?: (runId: string, totalFiles: number) => void;
  onProgress?: (filesDone: number, totalFiles: number) => void;
  onFileProcessed?: (entry: BatchReportEntry, index: number) => void;
};

const ensureDirectory: EnsureDirectory = async (dir) => {
  await mkdir(dir, { recursive: true });
};

/**
 * Drives files one at a time through detection, classification and routing.
 *
 * `run` rejects only for configuration problems found before the first file
 * (invalid policy, empty taxonomy, missing output root). Anything that goes
 * wrong with a single file lands in that file's report entry and the batch
 * carries on. `cancel` is honoured between files.
 */
export class BatchOrchestrator {
  private state: BatchStatus = "idle";
  private cancelRequested = false;
  private entries: BatchReportEntry[] = [];
  private readonly moveFile: MoveFile;
  private readonly ensureDir: EnsureDirectory;

  constructor(private readonly options: BatchOrchestratorOptions) {
    this.moveFile = options.moveFile ?? moveToDestination;
    this.ensureDir = options.ensureDir ?? ensureDirectory;
  }

  get status(): BatchStatus {
    return this.state;
  }

  get report(): readonly BatchReportEntry[] {
    return [...this.entries];
  }

  cancel(): void {
    if (this.state !== "running") return;
    this.cancelRequested = true;
    console.log("[Batch] Cancellation requested; stopping after the current file");
  }

  async run(files: readonly string[], callbacks: BatchCallbacks = {}): Promise<BatchOutcome> {
    if (this.state === "running") throw new Error("A batch is already running");

    const policy = this.resolvePolicy();
    const { taxonomy, outputRoot } = this.options;
    if (!taxonomy.categories.some((entry) => entry.species.size > 0)) {
      throw new InvalidTaxonomyError("Taxonomy does not list any species");
    }
    if (!outputRoot.trim()) throw new ConfigurationError("An output root is required");

    const runId = uuidv4();
    const resolver = new TaxonomyResolver(taxonomy, outputRoot, this.ensureDir);
    const total = files.length;
    this.entries = [];
    this.cancelRequested = false;
    this.state = "running";
    console.log(`[Batch] Run ${runId}: ${total} files -> ${outputRoot}`);

    let status: BatchOutcome["status"] = "completed";
    let error: ErrorInfo | undefined;
    try {
      callbacks.onStart?.(runId, total);
      await this.ensureDir(outputRoot);
      for (let i = 0; i < total; i++) {
        if (this.cancelRequested) {
          status = "cancelled";
          break;
        }
        const entry = await this.processFile(files[i], policy, resolver);
        this.entries.push(entry);
        callbacks.onFileProcessed?.(entry, i);
        callbacks.onProgress?.(i + 1, total);
        await yieldToEventLoop();
      }
    } catch (err) {
      console.error(`[Batch] Run ${runId} failed:`, err);
      status = "failed";
      error = toErrorInfo(err);
    }

    this.state = status;
    const report = [...this.entries];
    const summary = summarizeReport(report);
    console.log(
      `[Batch] Run ${runId} ${status}: ${summary.succeeded}/${total} routed, ${summary.failed} failed`
    );
    return error ? { runId, status, report, summary, error } : { runId, status, report, summary };
  }

  private resolvePolicy(): ThresholdPolicy {
    const input = this.options.policy ?? {};
    return createThresholdPolicy(this.options.mode ? applyProcessingMode(input, this.options.mode) : input);
  }

  private async processFile(
    filePath: string,
    policy: ThresholdPolicy,
    resolver: TaxonomyResolver
  ): Promise<BatchReportEntry> {
    const started = performance.now();
    const fileType: MediaKind | null = mediaKind(filePath);
    let result: ClassificationResult | null = null;
    let routing: RoutingDecision | null = null;

    try {
      if (!fileType) throw new TrailsortError("UNSUPPORTED_FILE", `Unsupported file type: ${filePath}`);

      result = fileType === "video" ? await this.classifyVideo(filePath, policy) : await this.classifyImage(filePath, policy);
      routing = await resolver.resolve(result.label);
      const destinationPath = await this.moveFile(filePath, routing);

      return { filePath, fileType, result, routing, destinationPath, elapsedMs: performance.now() - started, error: null };
    } catch (err) {
      console.warn(`[Batch] ${path.basename(filePath)}: ${describeError(err)}`);
      return {
        filePath,
        fileType,
        result,
        routing,
        destinationPath: null,
        elapsedMs: performance.now() - started,
        error: toErrorInfo(err),
      };
    }
  }

  private async classifyImage(filePath: string, policy: ThresholdPolicy): Promise<ClassificationResult> {
    const detections = await this.options.detector.detectImage(filePath).catch((err: unknown) => {
      throw asDetectorFailure(err, filePath);
    });
    return classifyImageDetections(detections, policy);
  }

  private async classifyVideo(filePath: string, policy: ThresholdPolicy): Promise<VideoClassification> {
    const aggregator = new VideoAggregator(policy);
    const name = path.basename(filePath);

    try {
      for await (const outcome of this.options.detector.detectVideo(filePath)) {
        if ("error" in outcome) {
          aggregator.skip(outcome.frameIndex);
          console.warn(`[Batch] ${name}: skipping unreadable frame ${outcome.frameIndex}: ${outcome.error.message}`);
          if (aggregator.failedFrames > policy.maxFailedFrames) {
            throw new DetectorFailureError(
              `${aggregator.failedFrames} unreadable frames in ${name} (limit ${policy.maxFailedFrames})`
            );
          }
          continue;
        }
        aggregator.push({
          frameIndex: outcome.frameIndex,
          detections: filterDetections(outcome.detections, policy.confidenceThreshold),
        });
      }
    } catch (err) {
      throw asDetectorFailure(err, filePath);
    }

    return aggregator.finish();
  }
}

function asDetectorFailure(err: unknown, filePath: string): TrailsortError {
  if (err instanceof TrailsortError) return err;
  return new DetectorFailureError(`Detector failed on ${filePath}: ${describeError(err)}`, err);
}
