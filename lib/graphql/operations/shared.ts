import type { Ontology } from "@/lib/ontology";
import type { EntityCategory, EntityDefinition, EntityType, IntentKind, ParameterMap, Scalar, GeneratedQuery } from "@/types";

export interface GenerationInput {
  kind: IntentKind;
  entityType: EntityType | null;
  parameters: ParameterMap;
  requestedFields: string[];
  traversalHint?: string | null;
}

export type QueryGenerator = (input: GenerationInput, ontology: Ontology) => GeneratedQuery;

// Filter argument carried by each concrete sub-type category
const SUBTYPE_ARGUMENTS: Partial<Record<EntityCategory, string>> = {
  sensor: "sensorType",
  equipment: "equipmentType",
  system: "systemType",
  meter: "meterType",
};

export function subtypeFilter(entity: EntityDefinition): { arg: string; value: string } | null {
  const arg = SUBTYPE_ARGUMENTS[entity.category];
  return arg ? { arg, value: entity.subtype } : null;
}

export function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export function pluralize(name: string): string {
  if (name.endsWith("s")) return name;
  if (name.endsWith("x")) return `${name}es`;
  return `${name}s`;
}

/** Requested scalar fields the object type declares, in request order; defaults when none survive. */
export function selectFields(ontology: Ontology, entityType: EntityType, requested: string[]): string[] {
  const declared = new Set(ontology.getFields(entityType).filter(f => !f.relation).map(f => f.name));
  const kept = requested.filter((field, index) => declared.has(field) && requested.indexOf(field) === index);
  return kept.length > 0 ? kept : ontology.defaultFields(entityType);
}

/** Name filter for a lookup: an explicit name, else the literal naming that kind of entity. */
export function nameParameter(entity: EntityDefinition, parameters: ParameterMap): Scalar | undefined {
  if (parameters.name !== undefined) return parameters.name;
  if (entity.type === "Building") return parameters.building_name;
  if (entity.type === "HVACZone") return parameters.zone_name;
  return undefined;
}
