import type { Ontology } from "@/lib/ontology";
import type { EntityDefinition, GeneratedQuery, ObjectTypeName, Scalar } from "@/types";
import { pickVariables, renderOperation } from "../document";
import type { Selection } from "../document";
import { subtypeFilter } from "./shared";
import type { GenerationInput, QueryGenerator } from "./shared";

type TraversalShape = "BuildingWithDetails" | "ZoneWithSensors" | "EquipmentWithZones" | "SensorsWithTimeseries" | "AllSensors";

const BUILDING_DETAILS: Selection[] = [
  "id",
  "name",
  "address",
  "areaSqm",
  "energyClass",
  { name: "floors", children: ["id", "name", "level", { name: "zones", children: ["id", "name"] }] },
  { name: "systems", children: ["id", "name", "systemType", { name: "equipment", children: ["id", "name", "equipmentType"] }] },
  { name: "meters", children: ["id", "name", "meterType"] },
];

const ZONE_SENSORS: Selection[] = [
  "id",
  "name",
  {
    name: "sensors",
    children: ["id", "name", "unit", "sensorType", { name: "timeseries", children: ["externalId", "resolution"] }],
  },
  { name: "fedBy", children: ["id", "name", "equipmentType"] },
];

const EQUIPMENT_ZONES: Selection[] = [
  "id",
  "name",
  "equipmentType",
  "manufacturer",
  "model",
  { name: "sensors", children: ["id", "name", "unit", "sensorType"] },
  { name: "zones", children: ["id", "name"] },
];

const SENSOR_TIMESERIES: Selection[] = [
  "id",
  "name",
  "unit",
  "sensorType",
  { name: "timeseries", children: ["id", "externalId", "resolution"] },
];

const ALL_SENSORS: Selection[] = ["id", "name", "unit", "sensorType", { name: "timeseries", children: ["externalId"] }];

const SHAPE_BY_HINT: Record<string, TraversalShape> = {
  building_sensors: "BuildingWithDetails",
  building_meters: "BuildingWithDetails",
  full_hierarchy: "BuildingWithDetails",
  zone_sensors: "ZoneWithSensors",
  ahu_zones: "EquipmentWithZones",
  equipment_timeseries: "SensorsWithTimeseries",
};

function shapeForEntity(entity: EntityDefinition): TraversalShape {
  switch (entity.category) {
    case "equipment":
      return "EquipmentWithZones";
    case "sensor":
    case "timeseries":
      return "SensorsWithTimeseries";
    case "system":
    case "meter":
      return "BuildingWithDetails";
    case "location":
      return entity.type === "Building" ? "BuildingWithDetails" : "ZoneWithSensors";
  }
}

/** Entity type first, then the traversal hint, then parameter hints, then all sensors. */
function chooseShape(input: GenerationInput, entity: EntityDefinition | null): TraversalShape {
  if (entity) return shapeForEntity(entity);
  const byHint = input.traversalHint ? SHAPE_BY_HINT[input.traversalHint] : undefined;
  if (byHint) return byHint;
  if (input.parameters.building_name !== undefined) return "BuildingWithDetails";
  if (input.parameters.zone_name !== undefined) return "ZoneWithSensors";
  if (input.parameters.equipment_name !== undefined) return "EquipmentWithZones";
  return "AllSensors";
}

// A quoted name filters the shape's root only when it names that kind of entity
function ownName(input: GenerationInput, entity: EntityDefinition | null, root: ObjectTypeName): Scalar | undefined {
  return !entity || entity.objectType === root ? input.parameters.name : undefined;
}

function headerFor(input: GenerationInput, ontology: Ontology, fallback: string): string {
  const traversal = input.traversalHint ? ontology.getTraversal(input.traversalHint) : null;
  return traversal?.description ?? fallback;
}

export const generateTraversalQuery: QueryGenerator = (input, ontology): GeneratedQuery => {
  const entity = input.entityType ? ontology.getEntity(input.entityType) : null;
  const shape = chooseShape(input, entity);
  const params = input.parameters;

  switch (shape) {
    case "BuildingWithDetails": {
      const variables = pickVariables([["name", ownName(input, entity, "Building") ?? params.building_name]]);
      return {
        query: renderOperation({
          operationName: shape,
          root: ontology.getObjectType("Building").single,
          args: [{ name: "name", variable: "name" }],
          variables,
          selection: BUILDING_DETAILS,
        }),
        variables,
        operationName: shape,
        description: headerFor(input, ontology, "Building with floors, systems and meters"),
        fields: ["id", "name", "floors", "systems", "meters"],
      };
    }
    case "ZoneWithSensors": {
      const variables = pickVariables([["name", params.zone_name ?? ownName(input, entity, "HVACZone")]]);
      return {
        query: renderOperation({
          operationName: shape,
          root: ontology.getObjectType("HVACZone").collection,
          args: [{ name: "name", variable: "name" }],
          variables,
          selection: ZONE_SENSORS,
        }),
        variables,
        operationName: shape,
        description: headerFor(input, ontology, "Zones with sensors and feeding equipment"),
        fields: ["id", "name", "sensors", "fedBy"],
      };
    }
    case "EquipmentWithZones": {
      const filter = entity ? subtypeFilter(entity) : null;
      const variables = pickVariables([
        ["equipmentType", filter?.value],
        ["name", params.name],
      ]);
      return {
        query: renderOperation({
          operationName: shape,
          root: ontology.getObjectType("Equipment").collection,
          args: [
            { name: "equipmentType", variable: "equipmentType" },
            { name: "name", variable: "name" },
          ],
          variables,
          selection: EQUIPMENT_ZONES,
        }),
        variables,
        operationName: shape,
        description: headerFor(input, ontology, `${entity?.name ?? "Equipment"} with sensors and zones fed`),
        fields: ["id", "name", "sensors", "zones"],
      };
    }
    case "SensorsWithTimeseries": {
      const filter = entity && entity.category === "sensor" ? subtypeFilter(entity) : null;
      const variables = pickVariables([["sensorType", filter?.value]]);
      return {
        query: renderOperation({
          operationName: shape,
          root: ontology.getObjectType("Sensor").collection,
          args: [{ name: "sensorType", variable: "sensorType" }],
          variables,
          selection: SENSOR_TIMESERIES,
        }),
        variables,
        operationName: shape,
        description: headerFor(input, ontology, `${entity?.category === "sensor" ? entity.name : "Sensor"}s with timeseries`),
        fields: ["id", "name", "unit", "timeseries"],
      };
    }
    case "AllSensors":
      return {
        query: renderOperation({
          operationName: shape,
          root: ontology.getObjectType("Sensor").collection,
          variables: {},
          selection: ALL_SENSORS,
        }),
        variables: {},
        operationName: shape,
        description: headerFor(input, ontology, "All sensors with timeseries"),
        fields: ["id", "name", "unit", "sensorType"],
      };
  }
};
