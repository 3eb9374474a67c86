import { isProcessingMode, type ProcessingMode } from "./thresholdPolicy";

export type ServerConfig = {
  outputRoot: string;
  taxonomyPath: string;
  processingMode: ProcessingMode;
  supabaseUrl: string | null;
  supabaseServiceRoleKey: string | null;
  classificationsTable: string;
};

type Env = Record<string, string | undefined>;

export function getServerConfig(env: Env = process.env): ServerConfig {
  const mode = env.TRAILSORT_PROCESSING_MODE || "balanced";
  if (!isProcessingMode(mode)) {
    console.warn(`[Config] Unknown TRAILSORT_PROCESSING_MODE "${mode}", using "balanced"`);
  }

  return {
    outputRoot: env.TRAILSORT_OUTPUT_ROOT || "./output",
    taxonomyPath: env.TRAILSORT_TAXONOMY_PATH || "./taxonomy.yaml",
    processingMode: isProcessingMode(mode) ? mode : "balanced",
    supabaseUrl: env.NEXT_PUBLIC_SUPABASE_URL || null,
    supabaseServiceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY || null,
    classificationsTable: env.TRAILSORT_CLASSIFICATIONS_TABLE || "classifications",
  };
}
