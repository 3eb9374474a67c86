import type { BatchOutcome, BatchReportEntry, ErrorInfo } from "@/types";
import type { BatchOrchestrator } from "./batchOrchestrator";
import { describeError, toErrorInfo } from "./errors";

export type BatchEvent =
  | { type: "started"; runId: string; total: number }
  | { type: "file"; index: number; entry: BatchReportEntry }
  | { type: "progress"; done: number; total: number }
  | { type: "complete"; outcome: BatchOutcome; stored: number | null; storeError: string | null }
  | { type: "error"; error: ErrorInfo };

type StreamOptions = {
  signal?: AbortSignal;
  persist?: (outcome: BatchOutcome) => Promise<number>;
};

/**
 * Runs the batch and reports it as newline-delimited JSON, one event per
 * line, in the order the orchestrator emits them. Aborting `signal` cancels
 * the batch after the file in flight.
 */
export function streamBatch(
  orchestrator: BatchOrchestrator,
  files: readonly string[],
  options: StreamOptions = {}
): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  let readerGone = false;

  return new ReadableStream<Uint8Array>({
    async start(controller) {
      const send = (event: BatchEvent) => {
        if (!readerGone) controller.enqueue(encoder.encode(`${JSON.stringify(event)}\n`));
      };
      const onAbort = () => orchestrator.cancel();
      options.signal?.addEventListener("abort", onAbort);

      try {
        const outcome = await orchestrator.run(files, {
          onStart: (runId, total) => send({ type: "started", runId, total }),
          onFileProcessed: (entry, index) => send({ type: "file", index, entry }),
          onProgress: (done, total) => send({ type: "progress", done, total }),
        });

        let stored: number | null = null;
        let storeError: string | null = null;
        if (options.persist) {
          try {
            stored = await options.persist(outcome);
          } catch (err) {
            console.error("[ClassifyBatch] Failed to store classification records:", err);
            storeError = describeError(err);
          }
        }
        send({ type: "complete", outcome, stored, storeError });
      } catch (err) {
        console.error("[ClassifyBatch] Batch did not start:", err);
        send({ type: "error", error: toErrorInfo(err) });
      } finally {
        options.signal?.removeEventListener("abort", onAbort);
        if (!readerGone) controller.close();
      }
    },
    cancel() {
      readerGone = true;
      orchestrator.cancel();
    },
  });
}
