import { readFile } from "node:fs/promises";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { InvalidTaxonomyError, describeError } from "./errors";

export type TaxonomyCategory = {
  category: string;
  species: ReadonlySet<string>;
};

export type Taxonomy = {
  categories: readonly TaxonomyCategory[];
  names: ReadonlyMap<number, string>;
};

export type ClassNames = string[] | Record<string, string>;

const TaxonomyDocumentSchema = z.object({
  taxonomy: z.record(z.string(), z.array(z.string())),
  names: z.union([z.array(z.string()), z.record(z.string().regex(/^\d+$/, "class ids must be integers"), z.string())]).optional(),
});

/**
 * Builds the category → species grouping. Category order is kept; a species
 * listed under more than one category stays with the first and later
 * mentions are dropped.
 */
export function createTaxonomy(
  categories: Readonly<Record<string, readonly string[]>>,
  names?: ClassNames
): Taxonomy {
  const claimedBy = new Map<string, string>();
  const built: TaxonomyCategory[] = [];

  for (const [rawCategory, speciesList] of Object.entries(categories)) {
    const category = rawCategory.trim();
    if (!category) continue;

    const species = new Set<string>();
    for (const rawSpecies of speciesList) {
      const name = rawSpecies.trim();
      if (!name) continue;
      const owner = claimedBy.get(name);
      if (owner !== undefined) {
        if (owner !== category) {
          console.warn(`[Taxonomy] "${name}" is listed under both "${owner}" and "${category}"; keeping "${owner}"`);
        }
        continue;
      }
      claimedBy.set(name, category);
      species.add(name);
    }
    built.push({ category, species });
  }

  if (claimedBy.size === 0) {
    throw new InvalidTaxonomyError("Taxonomy does not list any species");
  }

  return { categories: built, names: toNameMap(names) };
}

/** Linear search in category order; the first category listing `species` wins. */
export function findCategory(taxonomy: Taxonomy, species: string): string | null {
  for (const entry of taxonomy.categories) {
    if (entry.species.has(species)) return entry.category;
  }
  return null;
}

export function labelForClass(taxonomy: Taxonomy, classId: number): string {
  return taxonomy.names.get(classId) ?? `class_${classId}`;
}

export function parseTaxonomyDocument(text: string, format: "yaml" | "json"): Taxonomy {
  let raw: unknown;
  try {
    raw = format === "json" ? JSON.parse(text) : parseYaml(text);
  } catch (err) {
    throw new InvalidTaxonomyError(`Could not parse taxonomy ${format}: ${describeError(err)}`);
  }

  const parsed = TaxonomyDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new InvalidTaxonomyError(`Invalid taxonomy document: ${detail}`);
  }
  return createTaxonomy(parsed.data.taxonomy, parsed.data.names);
}

export async function loadTaxonomyFile(filePath: string): Promise<Taxonomy> {
  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  } catch (err) {
    throw new InvalidTaxonomyError(`Could not read taxonomy file ${filePath}: ${describeError(err)}`);
  }
  const format = path.extname(filePath).toLowerCase() === ".json" ? "json" : "yaml";
  const taxonomy = parseTaxonomyDocument(text, format);
  console.log(`[Taxonomy] Loaded ${taxonomy.categories.length} categories from ${filePath}`);
  return taxonomy;
}

function toNameMap(names?: ClassNames): Map<number, string> {
  const map = new Map<number, string>();
  if (!names) return map;
  if (Array.isArray(names)) {
    names.forEach((name, index) => map.set(index, name));
    return map;
  }
  for (const [id, name] of Object.entries(names)) {
    map.set(Number(id), name);
  }
  return map;
}
