import { CatalogueError } from "@/lib/errors";
import { LOCALES } from "@/types";
import type {
  EntityCategory,
  EntityDefinition,
  EntityField,
  EntityType,
  IntentKind,
  Locale,
  ObjectTypeDefinition,
  ObjectTypeName,
  RelationDefinition,
  RelationType,
  TraversalPattern,
} from "@/types";

export type KeywordIntent = Exclude<IntentKind, "unknown">;
export type LiteralParameter = "building_name" | "zone_name" | "equipment_name";

// Fixed priority for keyword detection; the first kind with a hit wins
export const INTENT_PRIORITY: readonly KeywordIntent[] = ["aggregate", "path", "traverse", "list", "entity"];

export interface Catalogue {
  id: string;
  version: string;
  labelNamespace: string;
  objectTypes: ReadonlyMap<ObjectTypeName, ObjectTypeDefinition>;
  entities: readonly EntityDefinition[];
  relations: readonly RelationDefinition[];
  traversals: readonly TraversalPattern[];
  intentKeywords: ReadonlyArray<{ kind: KeywordIntent; keywords: Record<Locale, string[]> }>;
  parameterLiterals: Record<LiteralParameter, readonly string[]>;
}

const IDENTIFIER = /^[A-Za-z][A-Za-z0-9_]*$/;

function normalize(value: string): string {
  return value.toLowerCase().replace(/[\s_-]+/g, "");
}

// Freezes nested arrays, objects and Map values
function deepFreeze<T>(value: T): T {
  if (typeof value !== "object" || value === null || Object.isFrozen(value)) {
    return value;
  }
  if (value instanceof Map) {
    for (const inner of value.values()) {
      deepFreeze(inner);
    }
  } else {
    for (const inner of Object.values(value)) {
      deepFreeze(inner);
    }
  }
  Object.freeze(value);
  return value;
}

function allKeywords(keywords: Record<Locale, string[]>): string[] {
  return LOCALES.flatMap(locale => keywords[locale]).map(k => k.toLowerCase());
}

/**
 * Read-only view over the Brick catalogue. Every lookup is a pure function of
 * its argument; nothing is cached or mutated after construction.
 */
export class Ontology {
  readonly id: string;
  readonly version: string;
  readonly labelNamespace: string;

  private readonly entities: readonly EntityDefinition[];
  private readonly byType: ReadonlyMap<EntityType, EntityDefinition>;
  private readonly objectTypes: ReadonlyMap<ObjectTypeName, ObjectTypeDefinition>;
  private readonly relations: ReadonlyMap<RelationType, RelationDefinition>;
  private readonly traversals: readonly TraversalPattern[];
  private readonly intentTable: ReadonlyArray<{ kind: KeywordIntent; keywords: string[] }>;
  private readonly literals: Record<LiteralParameter, readonly string[]>;

  constructor(catalogue: Catalogue) {
    deepFreeze(catalogue);
    this.id = catalogue.id;
    this.version = catalogue.version;
    this.labelNamespace = catalogue.labelNamespace;
    this.entities = Object.freeze([...catalogue.entities]);
    this.byType = new Map(catalogue.entities.map(e => [e.type, e]));
    this.objectTypes = catalogue.objectTypes;
    this.relations = new Map(catalogue.relations.map(r => [r.type, r]));
    this.traversals = Object.freeze([...catalogue.traversals]);
    this.literals = catalogue.parameterLiterals;

    this.intentTable = INTENT_PRIORITY.map(kind => ({
      kind,
      keywords: catalogue.intentKeywords
        .filter(entry => entry.kind === kind)
        .flatMap(entry => allKeywords(entry.keywords)),
    }));
  }

  /** First entity, in definition order, whose name or any synonym occurs in the text. */
  findEntityByText(text: string): EntityType | null {
    const lower = text.toLowerCase();
    for (const entity of this.entities) {
      if (lower.includes(entity.name.toLowerCase())) {
        return entity.type;
      }
      if (allKeywords(entity.synonyms).some(s => lower.includes(s))) {
        return entity.type;
      }
    }
    return null;
  }

  findTraversalByKeyword(text: string): TraversalPattern | null {
    const lower = text.toLowerCase();
    return this.traversals.find(t => allKeywords(t.keywords).some(k => lower.includes(k))) ?? null;
  }

  detectIntentKeyword(text: string): IntentKind {
    const lower = text.toLowerCase();
    for (const { kind, keywords } of this.intentTable) {
      if (keywords.some(k => lower.includes(k))) {
        return kind;
      }
    }
    return "unknown";
  }

  getEntity(type: EntityType): EntityDefinition {
    const entity = this.byType.get(type);
    if (!entity) {
      throw new CatalogueError(`entity ${type} is not defined`, this.id);
    }
    return entity;
  }

  listEntities(): readonly EntityDefinition[] {
    return this.entities;
  }

  getObjectType(name: ObjectTypeName): ObjectTypeDefinition {
    const objectType = this.objectTypes.get(name);
    if (!objectType) {
      throw new CatalogueError(`object type ${name} is not defined`, this.id);
    }
    return objectType;
  }

  listObjectTypes(): ObjectTypeDefinition[] {
    return Array.from(this.objectTypes.values());
  }

  objectTypeFor(type: EntityType): ObjectTypeDefinition {
    return this.getObjectType(this.getEntity(type).objectType);
  }

  getFields(type: EntityType): EntityField[] {
    return this.objectTypeFor(type).fields;
  }

  defaultFields(type: EntityType): string[] {
    return this.getFields(type)
      .filter(f => !f.relation && f.default)
      .map(f => f.name);
  }

  /** Accepts a variant name ("TemperatureSensor") or a graph label ("brick_Temperature_Sensor"). */
  entityFromIdentifier(text: string): EntityType | null {
    const wanted = text.trim().toLowerCase();
    if (!wanted) {
      return null;
    }
    const entity = this.entities.find(e => e.type.toLowerCase() === wanted || e.label.toLowerCase() === wanted);
    return entity?.type ?? null;
  }

  /**
   * Graph label for a sub-type filter value. Known sub-types come from the
   * catalogue; anything else is namespaced only when it is identifier-safe.
   */
  labelForSubtype(category: EntityCategory, subtype: string): string | null {
    const wanted = normalize(subtype);
    if (!wanted) {
      return null;
    }
    for (const entity of this.entities) {
      if (entity.category !== category) {
        continue;
      }
      const candidates = [
        entity.subtype,
        entity.type,
        entity.label.slice(this.labelNamespace.length),
        entity.subtype.replace(new RegExp(`_${category}$`, "i"), ""),
        ...entity.synonyms.en,
      ];
      if (candidates.some(c => normalize(c) === wanted)) {
        return entity.label;
      }
    }
    return IDENTIFIER.test(subtype) ? `${this.labelNamespace}${subtype}` : null;
  }

  labelsInCategory(category: EntityCategory): string[] {
    return this.entities.filter(e => e.category === category).map(e => e.label);
  }

  getTraversal(name: string): TraversalPattern | null {
    return this.traversals.find(t => t.name === name) ?? null;
  }

  listTraversals(): readonly TraversalPattern[] {
    return this.traversals;
  }

  relationLabel(type: RelationType): string {
    const relation = this.relations.get(type);
    if (!relation) {
      throw new CatalogueError(`relation ${type} is not defined`, this.id);
    }
    return relation.label;
  }

  inverseOf(type: RelationType): RelationType {
    const relation = this.relations.get(type);
    if (!relation) {
      throw new CatalogueError(`relation ${type} is not defined`, this.id);
    }
    return relation.inverse;
  }

  parameterLiterals(parameter: LiteralParameter): readonly string[] {
    return this.literals[parameter];
  }

  /** Catalogue summary embedded in the intent-extraction prompt. */
  describeForPrompt(): string {
    const lines: string[] = ["Entity types (name: synonyms):"];
    for (const entity of this.entities) {
      const synonyms = LOCALES.flatMap(locale => entity.synonyms[locale]);
      lines.push(`- ${entity.type} (${entity.label}): ${[entity.name.toLowerCase(), ...synonyms].join(", ")}`);
    }

    lines.push("", "Relations:");
    for (const relation of this.relations.values()) {
      lines.push(`- ${relation.type} (inverse ${relation.inverse})`);
    }

    lines.push("", "Traversal patterns:");
    for (const traversal of this.traversals) {
      lines.push(`- ${traversal.name}: ${traversal.description} -> ${traversal.returnFields.join(", ")}`);
    }

    return lines.join("\n");
  }
}
