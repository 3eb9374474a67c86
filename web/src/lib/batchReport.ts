import path from "node:path";
import type {
  BatchReportEntry,
  BatchSummary,
  ClassificationLabel,
  ClassificationRecord,
} from "@/types";

export function classificationName(label: ClassificationLabel): string {
  switch (label.kind) {
    case "species":
      return label.species;
    case "unsorted":
      return "Unsorted";
    case "no_animal":
      return "No_Animal";
  }
}

/**
 * Run-level statistics, computed from the report alone. Confidence is
 * averaged over classified files; timing covers every file.
 */
export function summarizeReport(report: readonly BatchReportEntry[]): BatchSummary {
  const classificationCounts = new Map<string, number>();
  const speciesCounts = new Map<string, number>();
  const fileTypeCounts = new Map<string, number>();
  let succeeded = 0;
  let confidenceSum = 0;
  let classified = 0;
  let totalElapsedMs = 0;

  for (const entry of report) {
    totalElapsedMs += entry.elapsedMs;
    increment(fileTypeCounts, entry.fileType ?? "unknown");

    if (entry.result) {
      classified += 1;
      confidenceSum += entry.result.confidence;
      const name = classificationName(entry.result.label);
      increment(classificationCounts, name);
      if (entry.result.label.kind === "species") increment(speciesCounts, name);
    }
    if (!entry.error) succeeded += 1;
  }

  const totalFiles = report.length;
  return {
    totalFiles,
    succeeded,
    failed: totalFiles - succeeded,
    successRate: totalFiles > 0 ? succeeded / totalFiles : 0,
    classificationCounts: Object.fromEntries(classificationCounts),
    speciesCounts: Object.fromEntries(speciesCounts),
    fileTypeCounts: Object.fromEntries(fileTypeCounts),
    averageConfidence: classified > 0 ? confidenceSum / classified : 0,
    totalElapsedMs,
    averageElapsedMs: totalFiles > 0 ? totalElapsedMs / totalFiles : 0,
  };
}

export type DirectoryRank = {
  directory: string;
  count: number;
  /** Share of the directory's species-classified files. */
  share: number;
};

export type SpeciesRanking = {
  species: string;
  directories: DirectoryRank[];
};

/**
 * Compares several input directories: for every species seen, the
 * directories holding the most files of it, highest count first. Species
 * are listed by name; equal counts keep the order of `summaries`.
 */
export function rankDirectories(
  summaries: ReadonlyMap<string, BatchSummary>,
  top = 5
): SpeciesRanking[] {
  const bySpecies = new Map<string, DirectoryRank[]>();

  for (const [directory, summary] of summaries) {
    const counts = Object.entries(summary.speciesCounts);
    const total = counts.reduce((sum, [, count]) => sum + count, 0);
    for (const [species, count] of counts) {
      const ranks = bySpecies.get(species) ?? [];
      ranks.push({ directory, count, share: count / total });
      bySpecies.set(species, ranks);
    }
  }

  return [...bySpecies.keys()].sort().map((species) => ({
    species,
    directories: (bySpecies.get(species) ?? []).sort((a, b) => b.count - a.count).slice(0, top),
  }));
}

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

export function toClassificationRecords(runId: string, report: readonly BatchReportEntry[]): ClassificationRecord[] {
  return report.map((entry) => {
    const result = entry.result;
    return {
      run_id: runId,
      file_name: path.basename(entry.filePath),
      file_path: entry.filePath,
      file_type: entry.fileType,
      classification: result ? classificationName(result.label) : null,
      confidence: result ? result.confidence : null,
      reason: result ? result.reason : null,
      category: entry.routing ? entry.routing.category : null,
      destination_path: entry.destinationPath,
      species_frame_counts: result && result.sourceKind === "video" ? { ...result.speciesFrameCounts } : null,
      transitions: result && result.sourceKind === "video" ? result.transitions : null,
      elapsed_ms: Math.round(entry.elapsedMs),
      error_code: entry.error ? entry.error.code : null,
      error_message: entry.error ? entry.error.message : null,
    };
  });
}
