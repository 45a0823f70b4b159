// Shared TypeScript types for the Brick knowledge-graph query compiler

export const LOCALES = ["en", "no"] as const;
export type Locale = (typeof LOCALES)[number];

export const INTENT_KINDS = ["entity", "list", "traverse", "aggregate", "path", "unknown"] as const;
export type IntentKind = (typeof INTENT_KINDS)[number];

export const ENTITY_TYPES = [
  "Building",
  "Floor",
  "HVACZone",
  "HVACSystem",
  "ElectricalSystem",
  "LightingSystem",
  "AirHandlingUnit",
  "VAVBox",
  "Chiller",
  "Boiler",
  "Pump",
  "Fan",
  "ElectricalMeter",
  "ThermalEnergyMeter",
  "WaterMeter",
  "TemperatureSensor",
  "HumiditySensor",
  "CO2Sensor",
  "PowerSensor",
  "EnergySensor",
  "FlowSensor",
  "PressureSensor",
  "Timeseries",
] as const;
export type EntityType = (typeof ENTITY_TYPES)[number];

export const RELATION_TYPES = [
  "hasPart",
  "isPartOf",
  "hasLocation",
  "isLocationOf",
  "hasPoint",
  "isPointOf",
  "hasMember",
  "isMemberOf",
  "feeds",
  "isFedBy",
  "meters",
  "isMeteredBy",
  "hasTimeseries",
  "isTimeseriesOf",
] as const;
export type RelationType = (typeof RELATION_TYPES)[number];

export const ENTITY_CATEGORIES = ["location", "system", "equipment", "meter", "sensor", "timeseries"] as const;
export type EntityCategory = (typeof ENTITY_CATEGORIES)[number];

// GraphQL-facing object types; several entity types share one (all sensors are a Sensor)
export const OBJECT_TYPES = [
  "Building",
  "Floor",
  "HVACZone",
  "System",
  "Equipment",
  "Sensor",
  "Meter",
  "Timeseries",
] as const;
export type ObjectTypeName = (typeof OBJECT_TYPES)[number];

export interface EntityField {
  name: string;
  type: string; // GraphQL type, e.g. "String" or "[Sensor]"
  description: string;
  relation: boolean;
  related?: ObjectTypeName;
  default: boolean;
}

export interface ObjectTypeDefinition {
  name: ObjectTypeName;
  single: string; // root field for a single lookup
  collection: string; // root field for a listing
  fields: EntityField[];
}

export interface EntityDefinition {
  type: EntityType;
  label: string; // graph label, e.g. brick_Temperature_Sensor
  name: string;
  category: EntityCategory;
  subtype: string;
  objectType: ObjectTypeName;
  description: string;
  synonyms: Record<Locale, string[]>;
}

export interface RelationDefinition {
  type: RelationType;
  label: string;
  inverse: RelationType;
}

export interface TraversalPattern {
  name: string;
  description: string;
  path: string;
  returnFields: string[];
  keywords: Record<Locale, string[]>;
}

export type Scalar = string | number | boolean;
export type ParameterMap = Record<string, Scalar>;

export interface ExtractedIntent {
  kind: IntentKind;
  entityType: EntityType | null;
  parameters: ParameterMap;
  requestedFields: string[]; // empty means the default fields
  confidence: number;
  question: string;
  traversalHint: string | null;
  source: "llm" | "rules";
  notes: string[];
}

export interface GeneratedQuery {
  query: string;
  variables: ParameterMap;
  operationName: string;
  description: string;
  fields: string[];
}

export interface ResolvedQuery {
  cypher: string;
  parameters: ParameterMap;
  description: string;
  fallback: boolean; // true when no known shape matched
}

export type RowValue = string | number | boolean | null | RowValue[] | { [key: string]: RowValue };
export type Row = Record<string, RowValue>;

export type PipelineStage =
  | "Received"
  | "IntentExtracted"
  | "LowConfidence"
  | "QueryGenerated"
  | "QueryResolved"
  | "ExecutionFailed"
  | "ResultsFormatted"
  | "Terminated";

export interface DebugTrail {
  stages: PipelineStage[];
  intentKind?: IntentKind;
  entityType?: EntityType | null;
  confidence?: number;
  intentSource?: "llm" | "rules";
  operationName?: string;
  resolvedDescription?: string;
  resultCount?: number;
  latencyMs?: number;
  error?: string;
}

export interface PipelineResult {
  success: boolean;
  question: string;
  locale: Locale;
  intent: ExtractedIntent;
  generatedQuery: GeneratedQuery | null;
  resolvedQuery: ResolvedQuery | null;
  rows: Row[] | null;
  response: string;
  debug: DebugTrail;
}

export interface ExplainResult {
  intent: ExtractedIntent;
  generatedQuery: GeneratedQuery | null;
  resolvedQuery: ResolvedQuery | null;
  error?: string;
}

export interface RunRecord {
  run_id: string;
  timestamp: string;
  question: string;
  locale: Locale;
  success: boolean;
  intent_json: ExtractedIntent;
  operation_name?: string;
  executed_cypher?: string;
  parameters?: ParameterMap;
  execution_metrics: {
    latency_ms: number;
    row_count: number;
    error?: string;
  };
}
