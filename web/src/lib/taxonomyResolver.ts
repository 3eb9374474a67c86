import { mkdir } from "node:fs/promises";
import path from "node:path";
import type { ClassificationLabel, RoutingDecision } from "@/types";
import { findCategory, type Taxonomy } from "./taxonomy";

export const SORTED_DIR = "Sorted";
export const UNSORTED_DIR = "Unsorted";
export const NO_ANIMAL_DIR = "No_Animal";
export const OTHER_CATEGORY = "Other";

export type EnsureDirectory = (dir: string) => Promise<void>;

const ensureDirectory: EnsureDirectory = async (dir) => {
  await mkdir(dir, { recursive: true });
};

/** Replaces characters that cannot appear in a single path segment. */
export function toPathSegment(name: string): string {
  const cleaned = name.trim().replace(/[\\/:*?"<>|\u0000-\u001f]/g, "_");
  if (cleaned === "" || cleaned === "." || cleaned === "..") return "_";
  return cleaned;
}

/**
 * Maps a decided label to its directory under `outputRoot`. Species missing
 * from the taxonomy go to `Sorted/Other/<Species>`, which is created here;
 * every other directory is left to the router.
 */
export class TaxonomyResolver {
  private readonly ensured = new Set<string>();

  constructor(
    private readonly taxonomy: Taxonomy,
    private readonly outputRoot: string,
    private readonly ensureDir: EnsureDirectory = ensureDirectory
  ) {}

  async resolve(label: ClassificationLabel): Promise<RoutingDecision> {
    switch (label.kind) {
      case "no_animal":
        return { category: null, species: null, destinationDir: path.join(this.outputRoot, NO_ANIMAL_DIR) };
      case "unsorted":
        return { category: null, species: null, destinationDir: path.join(this.outputRoot, UNSORTED_DIR) };
      case "species":
        return this.resolveSpecies(label.species);
    }
  }

  private async resolveSpecies(species: string): Promise<RoutingDecision> {
    const category = findCategory(this.taxonomy, species);
    if (category !== null) {
      return {
        category,
        species,
        destinationDir: path.join(this.outputRoot, SORTED_DIR, toPathSegment(category), toPathSegment(species)),
      };
    }

    const destinationDir = path.join(this.outputRoot, SORTED_DIR, OTHER_CATEGORY, toPathSegment(species));
    if (!this.ensured.has(destinationDir)) {
      await this.ensureDir(destinationDir);
      this.ensured.add(destinationDir);
      console.log(`[Taxonomy] "${species}" is not in the taxonomy; routing to ${destinationDir}`);
    }
    return { category: OTHER_CATEGORY, species, destinationDir };
  }
}
