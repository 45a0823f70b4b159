import type { Ontology } from "@/lib/ontology";
import type { EntityType, GeneratedQuery, IntentKind, ParameterMap } from "@/types";
import { getGeneratorForIntent } from "./registry";
import type { GenerationInput } from "./operations/shared";

/**
 * Deterministic intent -> GraphQL step. Identical input always yields
 * byte-identical query text; there is no failure path.
 */
export function generateQuery(input: GenerationInput, ontology: Ontology): GeneratedQuery {
  return getGeneratorForIntent(input.kind)(input, ontology);
}

export function generate(
  ontology: Ontology,
  kind: IntentKind,
  entityType: EntityType | null,
  parameters: ParameterMap,
  requestedFields: string[] = []
): GeneratedQuery {
  return generateQuery({ kind, entityType, parameters, requestedFields }, ontology);
}
