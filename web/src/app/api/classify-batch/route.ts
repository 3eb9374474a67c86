import { NextResponse } from "next/server";
import { z } from "zod";
import { BatchOrchestrator } from "@/lib/batchOrchestrator";
import { streamBatch } from "@/lib/batchStream";
import { createSupabaseClassificationStore, persistBatchOutcome } from "@/lib/classificationStore";
import { TrailsortError, errorCodeOf } from "@/lib/errors";
import { listMediaFiles } from "@/lib/mediaFiles";
import { getServerConfig } from "@/lib/serverConfig";
import { createSidecarDetector } from "@/lib/sidecarDetector";
import { getSupabaseAdmin } from "@/lib/supabaseAdmin";
import { labelForClass, loadTaxonomyFile } from "@/lib/taxonomy";
import {
  PROCESSING_MODES,
  ThresholdPolicyOverridesSchema,
  applyProcessingMode,
  createThresholdPolicy,
} from "@/lib/thresholdPolicy";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

const ClassifyBatchRequestSchema = z.object({
  inputDir: z.string().min(1),
  outputRoot: z.string().min(1).optional(),
  taxonomyPath: z.string().min(1).optional(),
  mode: z.enum(PROCESSING_MODES).optional(),
  policy: ThresholdPolicyOverridesSchema.optional(),
});

export async function POST(request: Request) {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return NextResponse.json({ error: "Request body must be JSON" }, { status: 400 });
  }

  const parsed = ClassifyBatchRequestSchema.safeParse(body);
  if (!parsed.success) {
    return NextResponse.json(
      { error: "Invalid request", issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`) },
      { status: 400 }
    );
  }

  const config = getServerConfig();
  const { inputDir, policy = {} } = parsed.data;
  const mode = parsed.data.mode ?? config.processingMode;
  const outputRoot = parsed.data.outputRoot ?? config.outputRoot;

  try {
    // Configuration problems are answered before any file is touched.
    createThresholdPolicy(applyProcessingMode(policy, mode));
    const taxonomy = await loadTaxonomyFile(parsed.data.taxonomyPath ?? config.taxonomyPath);

    let files: string[];
    try {
      files = await listMediaFiles(inputDir);
    } catch (err) {
      const code = errorCodeOf(err);
      if (code === "ENOENT" || code === "ENOTDIR") {
        return NextResponse.json({ error: `Input folder not found: ${inputDir}` }, { status: 400 });
      }
      throw err;
    }

    const orchestrator = new BatchOrchestrator({
      taxonomy,
      outputRoot,
      policy,
      mode,
      detector: createSidecarDetector({ labelFor: (classId) => labelForClass(taxonomy, classId) }),
    });

    const supabase = getSupabaseAdmin();
    const store = supabase ? createSupabaseClassificationStore(supabase, config.classificationsTable) : null;

    console.log(`[ClassifyBatch] ${files.length} files in ${inputDir} (mode: ${mode})`);
    const stream = streamBatch(orchestrator, files, {
      signal: request.signal,
      persist: store ? (outcome) => persistBatchOutcome(store, outcome) : undefined,
    });

    return new NextResponse(stream, {
      headers: {
        "Content-Type": "application/x-ndjson; charset=utf-8",
        "Cache-Control": "no-store",
      },
    });
  } catch (err) {
    if (err instanceof TrailsortError) {
      return NextResponse.json({ error: err.message, code: err.code }, { status: 400 });
    }
    console.error("API Error:", err);
    return NextResponse.json({ error: "Internal Server Error" }, { status: 500 });
  }
}
