import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import type { BatchOutcome, ClassificationRecord } from "@/types";
import { toClassificationRecords } from "./batchReport";

const INSERT_CHUNK_SIZE = 500;
export const MAX_LIST_LIMIT = 500;

export type RecordFilter = {
  runId?: string;
  classification?: string;
  limit?: number;
};

export type ClassificationStore = {
  saveRecords: (records: ClassificationRecord[]) => Promise<void>;
  listRecords: (filter: RecordFilter) => Promise<ClassificationRecord[]>;
};

const ClassificationRecordSchema = z.object({
  run_id: z.string(),
  file_name: z.string(),
  file_path: z.string(),
  file_type: z.enum(["video", "image"]).nullable(),
  classification: z.string().nullable(),
  confidence: z.number().nullable(),
  reason: z
    .enum([
      "no_detections",
      "too_many_transitions",
      "dominant_species",
      "no_dominant_species",
      "below_min_detections",
      "multi_species",
      "low_confidence_band",
      "confident_detection",
    ])
    .nullable(),
  category: z.string().nullable(),
  destination_path: z.string().nullable(),
  species_frame_counts: z.record(z.string(), z.number()).nullable(),
  transitions: z.number().nullable(),
  elapsed_ms: z.number(),
  error_code: z.string().nullable(),
  error_message: z.string().nullable(),
  created_at: z.string().optional(),
});

/** Reads `runId`, `classification` and `limit` query parameters; `limit` is clamped to 1..500. */
export function parseRecordFilter(params: URLSearchParams): RecordFilter {
  const requested = Number(params.get("limit") || MAX_LIST_LIMIT);
  return {
    runId: params.get("runId") || undefined,
    classification: params.get("classification") || undefined,
    limit: Number.isInteger(requested) && requested > 0 ? Math.min(requested, MAX_LIST_LIMIT) : MAX_LIST_LIMIT,
  };
}

export function createSupabaseClassificationStore(client: SupabaseClient, table: string): ClassificationStore {
  const saveRecords = async (records: ClassificationRecord[]) => {
    for (let i = 0; i < records.length; i += INSERT_CHUNK_SIZE) {
      const chunk = records.slice(i, i + INSERT_CHUNK_SIZE);
      const { error } = await client.from(table).insert(chunk);
      if (error) throw new Error(`Failed to store classifications: ${error.message}`);
    }
  };

  const listRecords = async ({ runId, classification, limit = MAX_LIST_LIMIT }: RecordFilter) => {
    let query = client.from(table).select("*").order("created_at", { ascending: false }).limit(limit);
    if (runId) query = query.eq("run_id", runId);
    if (classification) query = query.eq("classification", classification);

    const { data, error } = await query;
    if (error) throw new Error(`Failed to load classifications: ${error.message}`);
    return z.array(ClassificationRecordSchema).parse(data ?? []);
  };

  return { saveRecords, listRecords };
}

/** Stores one row per report entry, keyed by the run id. */
export async function persistBatchOutcome(store: ClassificationStore, outcome: BatchOutcome): Promise<number> {
  const records = toClassificationRecords(outcome.runId, outcome.report);
  if (records.length === 0) return 0;
  await store.saveRecords(records);
  console.log(`[Store] Saved ${records.length} classification records for run ${outcome.runId}`);
  return records.length;
}
