// Parameterized Cypher templates for each supported query shape

import type { Ontology } from "@/lib/ontology";
import type { EntityCategory, EntityType, ParameterMap, RelationType } from "@/types";

export interface TemplateContext {
  ontology: Ontology;
  variables: ParameterMap;
  single: boolean; // the query used the singular root field
}

export interface TemplateOutput {
  cypher: string;
  parameters: ParameterMap;
  description: string;
}

export type CypherTemplate = (ctx: TemplateContext) => TemplateOutput;

/** String value of the first variable that is set, or "" (the no-filter sentinel). */
export function readVariable(variables: ParameterMap, ...keys: string[]): string {
  for (const key of keys) {
    const value = variables[key];
    if (value !== undefined && value !== "") {
      return String(value);
    }
  }
  return "";
}

function label(ctx: TemplateContext, type: EntityType): string {
  return ctx.ontology.getEntity(type).label;
}

function rel(ctx: TemplateContext, type: RelationType): string {
  return ctx.ontology.relationLabel(type);
}

function labelPredicate(variable: string, labels: string[]): string {
  if (labels.length === 1) {
    return `${variable}:${labels[0]}`;
  }
  return `(${labels.map(l => `${variable}:${l}`).join(" OR ")})`;
}

/**
 * Restrict a node to a category, or to one sub-type of it. Sub-types that
 * cannot be spliced in as a label are compared as a parameter instead.
 */
function subtypePredicate(ctx: TemplateContext, category: EntityCategory, variable: string, key: string): string {
  const value = readVariable(ctx.variables, key);
  if (!value) {
    return labelPredicate(variable, ctx.ontology.labelsInCategory(category));
  }
  const subtypeLabel = ctx.ontology.labelForSubtype(category, value);
  return subtypeLabel ? `${variable}:${subtypeLabel}` : `$${key} IN labels(${variable})`;
}

function identityGuard(variable: string): string {
  return `($id = '' OR ${variable}.id = $id) AND ($name = '' OR toLower(${variable}.name) CONTAINS toLower($name))`;
}

function identityParameters(ctx: TemplateContext): ParameterMap {
  return {
    id: readVariable(ctx.variables, "id"),
    name: readVariable(ctx.variables, "name"),
  };
}

function lines(...parts: Array<string | false>): string {
  return parts.filter((p): p is string => p !== false).join("\n");
}

function limitOne(ctx: TemplateContext): string | false {
  return ctx.single && "LIMIT 1";
}

export const buildingTemplate: CypherTemplate = ctx => {
  const hasPart = rel(ctx, "hasPart");
  return {
    cypher: lines(
      `MATCH (b:${label(ctx, "Building")})`,
      `WHERE ${identityGuard("b")}`,
      `OPTIONAL MATCH (b)-[:${hasPart}]->(f:${label(ctx, "Floor")})`,
      `OPTIONAL MATCH (f)-[:${hasPart}]->(z:${label(ctx, "HVACZone")})`,
      "WITH b, f, collect(DISTINCT z {.id, .name}) AS zones",
      "WITH b, collect(DISTINCT f {.id, .name, .level, zones: zones}) AS floors",
      `OPTIONAL MATCH (b)-[:${hasPart}]->(sys)`,
      `WHERE NOT sys:${label(ctx, "Floor")}`,
      `OPTIONAL MATCH (sys)-[:${rel(ctx, "hasMember")}]->(eq)`,
      "WITH b, floors, sys, collect(DISTINCT eq {.id, .name, equipmentType: labels(eq)[0]}) AS equipment",
      "WITH b, floors, collect(DISTINCT sys {.id, .name, systemType: labels(sys)[0], equipment: equipment}) AS systems",
      `OPTIONAL MATCH (b)-[:${rel(ctx, "isMeteredBy")}]->(m)`,
      "WITH b, floors, systems, collect(DISTINCT m {.id, .name, .unit, meterType: labels(m)[0]}) AS meters",
      "RETURN b {.id, .name, .description, .address, .area_sqm, .year_built, .energy_class, floors: floors, systems: systems, meters: meters} AS building",
      "LIMIT 1"
    ),
    parameters: identityParameters(ctx),
    description: "Get building with related entities",
  };
};

export const buildingsTemplate: CypherTemplate = ctx => ({
  cypher: lines(
    `MATCH (b:${label(ctx, "Building")})`,
    "RETURN b {.id, .name, .address, .area_sqm, .energy_class} AS building"
  ),
  parameters: {},
  description: "Get all buildings",
});

export const floorsTemplate: CypherTemplate = ctx => {
  const hasPart = rel(ctx, "hasPart");
  const buildingId = readVariable(ctx.variables, "buildingId", "building_id");
  return {
    cypher: lines(
      buildingId
        ? `MATCH (:${label(ctx, "Building")} {id: $buildingId})-[:${hasPart}]->(f:${label(ctx, "Floor")})`
        : `MATCH (f:${label(ctx, "Floor")})`,
      `WHERE ${identityGuard("f")}`,
      `OPTIONAL MATCH (f)-[:${hasPart}]->(z:${label(ctx, "HVACZone")})`,
      "RETURN f {.id, .name, .level, zones: collect(DISTINCT z {.id, .name})} AS floor",
      "ORDER BY floor.level",
      limitOne(ctx)
    ),
    parameters: { ...identityParameters(ctx), ...(buildingId ? { buildingId } : {}) },
    description: buildingId ? "Get floors for building" : "Get all floors",
  };
};

export const zonesTemplate: CypherTemplate = ctx => {
  const hasPart = rel(ctx, "hasPart");
  const zone = label(ctx, "HVACZone");
  const floorId = readVariable(ctx.variables, "floorId", "floor_id");
  const buildingId = readVariable(ctx.variables, "buildingId", "building_id");

  let match = `MATCH (z:${zone})`;
  let description = "Get all zones";
  const scope: ParameterMap = {};
  if (floorId) {
    match = `MATCH (:${label(ctx, "Floor")} {id: $floorId})-[:${hasPart}]->(z:${zone})`;
    description = "Get zones for floor";
    scope.floorId = floorId;
  } else if (buildingId) {
    match = `MATCH (:${label(ctx, "Building")} {id: $buildingId})-[:${hasPart}]->(:${label(ctx, "Floor")})-[:${hasPart}]->(z:${zone})`;
    description = "Get zones for building";
    scope.buildingId = buildingId;
  }

  return {
    cypher: lines(
      match,
      `WHERE ${identityGuard("z")}`,
      `OPTIONAL MATCH (z)-[:${rel(ctx, "hasPoint")}]->(s)`,
      `OPTIONAL MATCH (eq)-[:${rel(ctx, "feeds")}]->(z)`,
      "RETURN z {.id, .name, sensors: collect(DISTINCT s {.id, .name, .unit, sensorType: labels(s)[0]}), fedBy: collect(DISTINCT eq {.id, .name, equipmentType: labels(eq)[0]})} AS zone",
      limitOne(ctx)
    ),
    parameters: { ...identityParameters(ctx), ...scope },
    description,
  };
};

export const systemsTemplate: CypherTemplate = ctx => {
  const buildingId = readVariable(ctx.variables, "buildingId", "building_id");
  return {
    cypher: lines(
      buildingId
        ? `MATCH (:${label(ctx, "Building")} {id: $buildingId})-[:${rel(ctx, "hasPart")}]->(sys)`
        : "MATCH (sys)",
      `WHERE ${subtypePredicate(ctx, "system", "sys", "systemType")} AND ${identityGuard("sys")}`,
      `OPTIONAL MATCH (sys)-[:${rel(ctx, "hasMember")}]->(eq)`,
      "RETURN sys {.id, .name, systemType: labels(sys)[0], equipment: collect(DISTINCT eq {.id, .name, equipmentType: labels(eq)[0]})} AS system",
      limitOne(ctx)
    ),
    parameters: { ...identityParameters(ctx), ...(buildingId ? { buildingId } : {}) },
    description: buildingId ? "Get systems for building" : "Get systems",
  };
};

export const equipmentTemplate: CypherTemplate = ctx => {
  const systemId = readVariable(ctx.variables, "systemId", "system_id");
  return {
    cypher: lines(
      systemId ? `MATCH ({id: $systemId})-[:${rel(ctx, "hasMember")}]->(eq)` : "MATCH (eq)",
      `WHERE ${subtypePredicate(ctx, "equipment", "eq", "equipmentType")} AND ${identityGuard("eq")}`,
      `OPTIONAL MATCH (eq)-[:${rel(ctx, "hasPoint")}]->(s)`,
      `OPTIONAL MATCH (eq)-[:${rel(ctx, "feeds")}]->(z:${label(ctx, "HVACZone")})`,
      "RETURN eq {.id, .name, equipmentType: labels(eq)[0], .manufacturer, .model, .capacity, .capacity_unit, sensors: collect(DISTINCT s {.id, .name, .unit, sensorType: labels(s)[0]}), zones: collect(DISTINCT z {.id, .name})} AS equipment",
      limitOne(ctx)
    ),
    parameters: { ...identityParameters(ctx), ...(systemId ? { systemId } : {}) },
    description: systemId ? "Get equipment for system" : "Get equipment",
  };
};

export const sensorsTemplate: CypherTemplate = ctx => {
  const hasPoint = rel(ctx, "hasPoint");
  const zoneId = readVariable(ctx.variables, "zoneId", "zone_id");
  const equipmentId = readVariable(ctx.variables, "equipmentId", "equipment_id");

  let match = "MATCH (s)";
  let description = "Get sensors";
  const scope: ParameterMap = {};
  if (zoneId) {
    match = `MATCH (:${label(ctx, "HVACZone")} {id: $zoneId})-[:${hasPoint}]->(s)`;
    description = "Get sensors for zone";
    scope.zoneId = zoneId;
  } else if (equipmentId) {
    match = `MATCH ({id: $equipmentId})-[:${hasPoint}]->(s)`;
    description = "Get sensors for equipment";
    scope.equipmentId = equipmentId;
  }

  return {
    cypher: lines(
      match,
      `WHERE ${subtypePredicate(ctx, "sensor", "s", "sensorType")} AND ${identityGuard("s")}`,
      `OPTIONAL MATCH (s)-[:${rel(ctx, "hasTimeseries")}]->(ts)`,
      "RETURN s {.id, .name, .unit, sensorType: labels(s)[0], timeseries: collect(DISTINCT ts {.id, .external_id, .resolution})} AS sensor",
      limitOne(ctx)
    ),
    parameters: { ...identityParameters(ctx), ...scope },
    description,
  };
};

export const metersTemplate: CypherTemplate = ctx => {
  const buildingId = readVariable(ctx.variables, "buildingId", "building_id");
  return {
    cypher: lines(
      buildingId
        ? `MATCH (:${label(ctx, "Building")} {id: $buildingId})-[:${rel(ctx, "isMeteredBy")}]->(m)`
        : "MATCH (m)",
      `WHERE ${subtypePredicate(ctx, "meter", "m", "meterType")} AND ${identityGuard("m")}`,
      `OPTIONAL MATCH (m)-[:${rel(ctx, "hasPoint")}]->(s)`,
      "RETURN m {.id, .name, .unit, meterType: labels(m)[0], sensors: collect(DISTINCT s {.id, .name, .unit})} AS meter",
      limitOne(ctx)
    ),
    parameters: { ...identityParameters(ctx), ...(buildingId ? { buildingId } : {}) },
    description: buildingId ? "Get meters for building" : "Get meters",
  };
};

export const timeseriesTemplate: CypherTemplate = ctx => ({
  cypher: lines(
    `MATCH (s)-[:${rel(ctx, "hasTimeseries")}]->(ts:${label(ctx, "Timeseries")})`,
    "WHERE ($sensorId = '' OR s.id = $sensorId) AND ($id = '' OR ts.id = $id)",
    "RETURN s.name AS sensor, ts {.id, .external_id, .resolution} AS timeseries",
    limitOne(ctx)
  ),
  parameters: {
    id: readVariable(ctx.variables, "id"),
    sensorId: readVariable(ctx.variables, "sensorId", "sensor_id"),
  },
  description: "Get timeseries references",
});

function countTemplate(
  category: EntityCategory,
  variable: string,
  subtypeKey: string | null,
  description: string
): CypherTemplate {
  return ctx => {
    const predicate = subtypeKey
      ? subtypePredicate(ctx, category, variable, subtypeKey)
      : labelPredicate(variable, ctx.ontology.labelsInCategory(category));
    const subtype = subtypeKey ? readVariable(ctx.variables, subtypeKey) : "";
    return {
      cypher: lines(`MATCH (${variable})`, `WHERE ${predicate}`, `RETURN count(${variable}) AS count`),
      parameters: {},
      description: subtype ? `${description} (${subtype})` : description,
    };
  };
}

function singleLabelCount(type: "Floor" | "HVACZone" | "Building" | "Timeseries", description: string): CypherTemplate {
  return ctx => ({
    cypher: lines(`MATCH (n:${label(ctx, type)})`, "RETURN count(n) AS count"),
    parameters: {},
    description,
  });
}

export const sensorCountTemplate = countTemplate("sensor", "s", "sensorType", "Count sensors");
export const equipmentCountTemplate = countTemplate("equipment", "eq", "equipmentType", "Count equipment");
export const systemCountTemplate = countTemplate("system", "sys", "systemType", "Count systems");
export const meterCountTemplate = countTemplate("meter", "m", "meterType", "Count meters");
export const floorCountTemplate = singleLabelCount("Floor", "Count floors");
export const zoneCountTemplate = singleLabelCount("HVACZone", "Count zones");
export const buildingCountTemplate = singleLabelCount("Building", "Count buildings");
export const timeseriesCountTemplate = singleLabelCount("Timeseries", "Count timeseries");

export const FALLBACK_CYPHER = "MATCH (n) RETURN labels(n)[0] AS type, count(*) AS count";
