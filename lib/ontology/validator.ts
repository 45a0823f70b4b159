import { z } from "zod";
import { ENTITY_CATEGORIES, ENTITY_TYPES, INTENT_KINDS, OBJECT_TYPES, RELATION_TYPES } from "@/types";

const LocalizedList = z.object({
  en: z.array(z.string().min(1)),
  no: z.array(z.string().min(1)),
});

const FieldSchema = z.object({
  name: z.string().min(1),
  type: z.string().min(1),
  description: z.string(),
  relation: z.boolean().default(false),
  related: z.enum(OBJECT_TYPES).optional(),
  default: z.boolean().default(true),
});

const ObjectTypeSchema = z.object({
  single: z.string().min(1),
  collection: z.string().min(1),
  fields: z.array(FieldSchema).min(1),
});

const EntitySchema = z.object({
  type: z.enum(ENTITY_TYPES),
  label: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "label must be identifier-safe"),
  name: z.string().min(1),
  category: z.enum(ENTITY_CATEGORIES),
  subtype: z.string().min(1),
  object_type: z.enum(OBJECT_TYPES),
  description: z.string(),
  synonyms: LocalizedList,
});

const RelationSchema = z.object({
  type: z.enum(RELATION_TYPES),
  label: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/),
  inverse: z.enum(RELATION_TYPES),
});

const TraversalSchema = z.object({
  name: z.string().regex(/^[a-z_]+$/),
  description: z.string().min(1),
  path: z.string().min(1),
  return_fields: z.array(z.string()).min(1),
  keywords: LocalizedList,
});

const IntentKeywordSchema = z.object({
  kind: z.enum(INTENT_KINDS).exclude(["unknown"]),
  keywords: LocalizedList,
});

export const CatalogueSchema = z.object({
  id: z.string(),
  version: z.string(),
  label_namespace: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/),
  object_types: z.object({
    Building: ObjectTypeSchema,
    Floor: ObjectTypeSchema,
    HVACZone: ObjectTypeSchema,
    System: ObjectTypeSchema,
    Equipment: ObjectTypeSchema,
    Sensor: ObjectTypeSchema,
    Meter: ObjectTypeSchema,
    Timeseries: ObjectTypeSchema,
  }),
  entities: z.array(EntitySchema),
  relations: z.array(RelationSchema),
  traversals: z.array(TraversalSchema),
  intent_keywords: z.array(IntentKeywordSchema),
  parameter_literals: z.object({
    building_name: z.array(z.string()),
    zone_name: z.array(z.string()),
    equipment_name: z.array(z.string()),
  }),
});

export type CatalogueFile = z.infer<typeof CatalogueSchema>;

/**
 * Cross-reference checks the schema cannot express: every entity type defined
 * exactly once, relation inverses pointing back, unique traversal names.
 */
export function checkCatalogue(catalogue: CatalogueFile): string[] {
  const errors: string[] = [];

  const seen = new Set<string>();
  for (const entity of catalogue.entities) {
    if (seen.has(entity.type)) {
      errors.push(`entity ${entity.type} is defined more than once`);
    }
    seen.add(entity.type);
  }
  for (const type of ENTITY_TYPES) {
    if (!seen.has(type)) {
      errors.push(`entity ${type} is missing`);
    }
  }

  const relations = new Map(catalogue.relations.map(r => [r.type, r]));
  for (const type of RELATION_TYPES) {
    const relation = relations.get(type);
    if (!relation) {
      errors.push(`relation ${type} is missing`);
      continue;
    }
    if (relations.get(relation.inverse)?.inverse !== type) {
      errors.push(`relation ${type} and its inverse ${relation.inverse} do not point at each other`);
    }
  }

  const traversalNames = new Set<string>();
  for (const traversal of catalogue.traversals) {
    if (traversalNames.has(traversal.name)) {
      errors.push(`traversal ${traversal.name} is defined more than once`);
    }
    traversalNames.add(traversal.name);
  }

  for (const [typeName, objectType] of Object.entries(catalogue.object_types)) {
    if (!objectType.fields.some(f => f.name === "id")) {
      errors.push(`object type ${typeName} has no id field`);
    }
  }

  return errors;
}

export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}
