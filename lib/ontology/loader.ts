import { readFileSync, existsSync } from "fs";
import { join } from "path";
import { parse } from "yaml";
import { CatalogueError } from "@/lib/errors";
import { OBJECT_TYPES } from "@/types";
import type { EntityDefinition, ObjectTypeDefinition, ObjectTypeName, RelationDefinition, TraversalPattern } from "@/types";
import { CatalogueSchema, checkCatalogue, formatZodIssues } from "./validator";
import type { CatalogueFile } from "./validator";
import { Ontology } from "./ontology";
import type { Catalogue } from "./ontology";

const ONTOLOGY_DIR = join(process.cwd(), "context", "ontology");
export const DEFAULT_CATALOGUE_PATH = join(ONTOLOGY_DIR, "brick.yaml");

const cache = new Map<string, Ontology>();

export function parseCatalogue(content: string, source: string): Catalogue {
  let raw: unknown;
  try {
    raw = parse(content);
  } catch (error) {
    throw new CatalogueError(`invalid YAML (${error instanceof Error ? error.message : String(error)})`, source);
  }

  const result = CatalogueSchema.safeParse(raw);
  if (!result.success) {
    throw new CatalogueError(formatZodIssues(result.error).join("; "), source);
  }

  const problems = checkCatalogue(result.data);
  if (problems.length > 0) {
    throw new CatalogueError(problems.join("; "), source);
  }

  return toCatalogue(result.data);
}

function toCatalogue(file: CatalogueFile): Catalogue {
  const objectTypes = new Map<ObjectTypeName, ObjectTypeDefinition>();
  for (const name of OBJECT_TYPES) {
    const def = file.object_types[name];
    objectTypes.set(name, {
      name,
      single: def.single,
      collection: def.collection,
      fields: def.fields.map(f => ({
        name: f.name,
        type: f.type,
        description: f.description,
        relation: f.relation,
        related: f.related,
        default: f.default,
      })),
    });
  }

  const entities: EntityDefinition[] = file.entities.map(e => ({
    type: e.type,
    label: e.label,
    name: e.name,
    category: e.category,
    subtype: e.subtype,
    objectType: e.object_type,
    description: e.description,
    synonyms: e.synonyms,
  }));

  const relations: RelationDefinition[] = file.relations.map(r => ({ ...r }));

  const traversals: TraversalPattern[] = file.traversals.map(t => ({
    name: t.name,
    description: t.description,
    path: t.path,
    returnFields: t.return_fields,
    keywords: t.keywords,
  }));

  return {
    id: file.id,
    version: file.version,
    labelNamespace: file.label_namespace,
    objectTypes,
    entities,
    relations,
    traversals,
    intentKeywords: file.intent_keywords,
    parameterLiterals: {
      building_name: file.parameter_literals.building_name,
      zone_name: file.parameter_literals.zone_name,
      equipment_name: file.parameter_literals.equipment_name,
    },
  };
}

/**
 * Load and validate the catalogue. The result is cached per path; the
 * returned ontology is immutable and safe to share between requests.
 */
export function loadOntology(path: string = DEFAULT_CATALOGUE_PATH): Ontology {
  const cached = cache.get(path);
  if (cached) {
    return cached;
  }

  if (!existsSync(path)) {
    throw new CatalogueError("file not found", path);
  }

  const ontology = new Ontology(parseCatalogue(readFileSync(path, "utf-8"), path));
  cache.set(path, ontology);
  console.log(`[Ontology] Loaded ${ontology.listEntities().length} entity types from ${path}`);
  return ontology;
}
