import { describe, expect, it } from "vitest";
import { generate, generateQuery } from "@/lib/graphql";
import { loadOntology } from "@/lib/ontology";

const ontology = loadOntology();

describe("generateQuery", () => {
  it("lists sensors filtered by sub-type", () => {
    const result = generate(ontology, "list", "TemperatureSensor", {});
    expect(result.query).toBe(
      [
        "query ListSensors($sensorType: String) {",
        "  sensors(sensorType: $sensorType) {",
        "    id",
        "    name",
        "    unit",
        "    sensorType",
        "  }",
        "}",
      ].join("\n")
    );
    expect(result.variables).toEqual({ sensorType: "Temperature_Sensor" });
    expect(result.operationName).toBe("ListSensors");
    expect(result.description).toBe("List all temperature sensors");
  });

  it("declares a building filter after the sub-type filter", () => {
    const result = generate(ontology, "list", "TemperatureSensor", { building_id: "b1" });
    expect(result.query.split("\n")[0]).toBe("query ListSensors($sensorType: String, $buildingId: String) {");
    expect(result.variables).toEqual({ sensorType: "Temperature_Sensor", buildingId: "b1" });
  });

  it("lists buildings when no entity is known", () => {
    const result = generate(ontology, "list", null, {});
    expect(result.operationName).toBe("ListBuildings");
    expect(result.query).toBe("query ListBuildings {\n  buildings {\n    id\n    name\n    address\n  }\n}");
  });

  it("counts floors with a scalar root", () => {
    const result = generate(ontology, "aggregate", "Floor", {});
    expect(result.query).toBe("query CountFloors {\n  floorCount\n}");
    expect(result.variables).toEqual({});
    expect(result.description).toBe("Count floors");
  });

  it("counts sensors of one sub-type", () => {
    const result = generate(ontology, "aggregate", "TemperatureSensor", {});
    expect(result.query).toBe("query CountSensors($sensorType: String) {\n  sensorCount(sensorType: $sensorType)\n}");
    expect(result.description).toBe("Count temperature sensors");
  });

  it("counts every sensor when no entity is known", () => {
    const result = generate(ontology, "aggregate", null, {});
    expect(result.query).toBe("query CountSensors {\n  sensorCount\n}");
    expect(result.description).toBe("Count all sensors");
  });

  it("looks a building up by its literal name", () => {
    const result = generate(ontology, "entity", "Building", { building_name: "operahuset" });
    expect(result.query).toBe(
      [
        "query GetBuilding($name: String) {",
        "  building(name: $name) {",
        "    id",
        "    name",
        "    address",
        "    areaSqm",
        "    yearBuilt",
        "    energyClass",
        "  }",
        "}",
      ].join("\n")
    );
    expect(result.variables).toEqual({ name: "operahuset" });
    expect(result.description).toBe("Get Building by ID or name");
  });

  it("keeps only declared scalar fields, once, in request order", () => {
    const result = generate(ontology, "entity", "Floor", { id: "f2" }, ["level", "name", "level", "zones", "bogus"]);
    expect(result.fields).toEqual(["level", "name"]);
    expect(result.query).toBe("query GetFloor($id: String) {\n  floor(id: $id) {\n    level\n    name\n  }\n}");
  });

  it("degrades path and unknown intents to the building overview", () => {
    for (const kind of ["path", "unknown"] as const) {
      const result = generate(ontology, kind, "Pump", { id: "p1" });
      expect(result.operationName).toBe("Overview");
      expect(result.variables).toEqual({});
      expect(result.query).toBe("query Overview {\n  buildings {\n    id\n    name\n    address\n  }\n}");
    }
  });

  it("picks the traversal shape from the hint when no entity is known", () => {
    const result = generateQuery(
      { kind: "traverse", entityType: null, parameters: {}, requestedFields: [], traversalHint: "building_sensors" },
      ontology
    );
    expect(result.operationName).toBe("BuildingWithDetails");
    expect(result.description).toBe("All sensors in a building, through systems and equipment");
    expect(result.query.split("\n").slice(0, 2)).toEqual(["query BuildingWithDetails {", "  building {"]);
  });

  it("prefers the entity over the hint for the traversal shape", () => {
    const result = generateQuery(
      { kind: "traverse", entityType: "AirHandlingUnit", parameters: {}, requestedFields: [], traversalHint: "zone_sensors" },
      ontology
    );
    expect(result.operationName).toBe("EquipmentWithZones");
    expect(result.description).toBe("All sensors in a specific zone");
  });

  it("falls back to all sensors without entity, hint or parameters", () => {
    const result = generate(ontology, "traverse", null, {});
    expect(result.operationName).toBe("AllSensors");
    expect(result.description).toBe("All sensors with timeseries");
  });

  it("uses the zone literal for zone traversals", () => {
    const result = generate(ontology, "traverse", null, { zone_name: "foyer" });
    expect(result.operationName).toBe("ZoneWithSensors");
    expect(result.variables).toEqual({ name: "foyer" });
  });

  it("filters the traversal root by name only when the entity is that root", () => {
    expect(generate(ontology, "traverse", "Building", { name: "Operahuset" }).variables).toEqual({ name: "Operahuset" });
    expect(generate(ontology, "traverse", "HVACZone", { name: "Foyer" }).variables).toEqual({ name: "Foyer" });

    const floor = generate(ontology, "traverse", "Floor", { name: "Plan 2" });
    expect(floor.operationName).toBe("ZoneWithSensors");
    expect(floor.variables).toEqual({});

    const meter = generate(ontology, "traverse", "ElectricalMeter", { name: "M1", building_name: "operahuset" });
    expect(meter.operationName).toBe("BuildingWithDetails");
    expect(meter.variables).toEqual({ name: "operahuset" });
  });

  it("is byte-identical for identical input", () => {
    const first = generate(ontology, "traverse", "Building", { building_name: "operahuset" });
    const second = generate(ontology, "traverse", "Building", { building_name: "operahuset" });
    expect(second).toEqual(first);
  });
});
