import { beforeEach, describe, expect, it, vi } from "vitest";
import type { GraphEngine } from "@/lib/cypher";
import { GraphConnectionError, GraphQueryError } from "@/lib/errors";
import type { QueryGenerator } from "@/lib/graphql";
import { createIntentExtractor, extractRuleBased } from "@/lib/intent";
import type { IntentExtractor } from "@/lib/intent";
import { loadOntology } from "@/lib/ontology";
import { createPipeline } from "@/lib/pipeline";
import { lowConfidenceMessage } from "@/lib/response";
import type { ParameterMap, Row } from "@/types";

const ontology = loadOntology();
const extractor = createIntentExtractor({ ontology });

class FakeEngine implements GraphEngine {
  calls: Array<{ cypher: string; parameters: ParameterMap }> = [];

  constructor(private readonly outcome: Row[] | Error) {}

  async query(cypher: string, parameters: ParameterMap): Promise<Row[]> {
    this.calls.push({ cypher, parameters });
    if (this.outcome instanceof Error) {
      throw this.outcome;
    }
    return this.outcome;
  }

  async close(): Promise<void> {}
}

function unsureExtractor(confidence: number): IntentExtractor {
  return {
    usesModel: false,
    extractRuleBased: question => extractRuleBased(question, ontology),
    extract: async question => ({ ...extractRuleBased(question, ontology), confidence }),
  };
}

// Emits a root field no Cypher template answers
const spaceshipGenerator: QueryGenerator = () => ({
  query: "query ListSpaceships {\n  spaceships {\n    id\n  }\n}",
  variables: {},
  operationName: "ListSpaceships",
  description: "Spaceships",
  fields: ["id"],
});

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
  return () => vi.restoreAllMocks();
});

describe("createPipeline", () => {
  it("answers a sensor listing end to end", async () => {
    const engine = new FakeEngine([
      { sensor: { id: "s1", name: "T1", unit: "°C", sensorType: "brick_Temperature_Sensor", timeseries: [] } },
    ]);
    const pipeline = createPipeline({ ontology, extractor, engine });

    const result = await pipeline.process("Vis alle temperatursensorer");

    expect(result.success).toBe(true);
    expect(result.locale).toBe("no");
    expect(result.response).toBe("Fant 1 resultater:\n\n  1. T1 | Enhet: °C | Sensortype: brick_Temperature_Sensor");
    expect(result.debug.stages).toEqual([
      "Received",
      "IntentExtracted",
      "QueryGenerated",
      "QueryResolved",
      "ResultsFormatted",
      "Terminated",
    ]);
    expect(result.debug.operationName).toBe("ListSensors");
    expect(result.debug.resultCount).toBe(1);
    expect(engine.calls).toHaveLength(1);
    expect(engine.calls[0].cypher).toContain("WHERE s:brick_Temperature_Sensor AND");
    expect(engine.calls[0].parameters).toEqual({ sensorType: "Temperature_Sensor", id: "", name: "" });
  });

  it("counts floors in the requested locale", async () => {
    const engine = new FakeEngine([{ count: 3 }]);
    const pipeline = createPipeline({ ontology, extractor, engine });

    const norwegian = await pipeline.process("Hvor mange etasjer har bygningen?");
    const english = await pipeline.process("Hvor mange etasjer har bygningen?", "en");

    expect(norwegian.resolvedQuery?.cypher).toBe("MATCH (n:brick_Floor)\nRETURN count(n) AS count");
    expect(norwegian.response).toBe("Antall: 3");
    expect(english.response).toBe("Count: 3");
  });

  it("uses the configured default locale", async () => {
    const pipeline = createPipeline({ ontology, extractor, engine: new FakeEngine([{ count: 3 }]), locale: "en" });
    expect((await pipeline.process("Hvor mange etasjer har bygningen?")).response).toBe("Count: 3");
  });

  it("stops before querying when confidence is low", async () => {
    const engine = new FakeEngine([]);
    const pipeline = createPipeline({ ontology, extractor: unsureExtractor(0.2), engine });

    const result = await pipeline.process("Hmm?");

    expect(result.success).toBe(false);
    expect(result.rows).toBeNull();
    expect(result.generatedQuery).toBeNull();
    expect(result.response).toBe(lowConfidenceMessage("Hmm?", "no"));
    expect(result.debug.stages).toEqual(["Received", "IntentExtracted", "LowConfidence", "Terminated"]);
    expect(engine.calls).toHaveLength(0);
  });

  it("queries at exactly the threshold", async () => {
    const engine = new FakeEngine([{ count: 1 }]);
    const pipeline = createPipeline({ ontology, extractor: unsureExtractor(0.3), engine });
    expect((await pipeline.process("Hvor mange etasjer har bygningen?")).success).toBe(true);
  });

  it("reports connection failures", async () => {
    const engine = new FakeEngine(new GraphConnectionError("connect ECONNREFUSED 127.0.0.1:6379"));
    const result = await createPipeline({ ontology, extractor, engine }).process("Vis alle temperatursensorer");

    expect(result.success).toBe(false);
    expect(result.rows).toBeNull();
    expect(result.response.split("\n")[0]).toBe("Kunne ikke koble til grafdatabasen.");
    expect(result.debug.error).toBe("connect ECONNREFUSED 127.0.0.1:6379");
    expect(result.debug.stages.slice(-3)).toEqual(["QueryResolved", "ExecutionFailed", "Terminated"]);
  });

  it("reports query failures with the engine message", async () => {
    const engine = new FakeEngine(new GraphQueryError("Query timed out"));
    const result = await createPipeline({ ontology, extractor, engine }).process("Vis alle temperatursensorer");
    expect(result.response).toBe("Feil ved kjøring av spørring: Query timed out");
  });

  it("fails without an engine", async () => {
    const result = await createPipeline({ ontology, extractor }).process("Vis alle temperatursensorer", "en");
    expect(result.success).toBe(false);
    expect(result.debug.error).toBe("No graph engine configured");
    expect(result.response.split("\n")[0]).toBe("Could not connect to the graph database.");
  });

  it("keeps no state between calls", async () => {
    const pipeline = createPipeline({ ontology, extractor, engine: new FakeEngine([{ count: 3 }]) });
    const first = await pipeline.process("Hvor mange etasjer har bygningen?");
    const second = await pipeline.process("Hvor mange etasjer har bygningen?");
    expect(second.debug).not.toBe(first.debug);
    expect(second.debug.stages).toEqual(first.debug.stages);
    expect(second.debug.stages).toHaveLength(6);
  });
});

describe("explain", () => {
  it("shows intent, GraphQL and Cypher without touching the engine", async () => {
    const engine = new FakeEngine([]);
    const result = await createPipeline({ ontology, extractor, engine }).explain("Vis alle sensorer i bygget");

    expect(result.intent.traversalHint).toBe("building_sensors");
    expect(result.generatedQuery?.operationName).toBe("BuildingWithDetails");
    expect(result.resolvedQuery?.cypher.split("\n")[0]).toBe("MATCH (b:brick_Building)");
    expect(result.error).toBeUndefined();
    expect(engine.calls).toHaveLength(0);
  });
});

describe("unresolved queries", () => {
  it("terminates with the localized message under the error policy", async () => {
    const engine = new FakeEngine([{ count: 1 }]);
    const pipeline = createPipeline({ ontology, extractor, engine, resolverPolicy: "error", generator: spaceshipGenerator });

    const result = await pipeline.process("Hvor mange etasjer har bygningen?");

    expect(result.success).toBe(false);
    expect(result.rows).toBeNull();
    expect(result.resolvedQuery).toBeNull();
    expect(result.generatedQuery?.operationName).toBe("ListSpaceships");
    expect(result.response).toBe('Spørringen kunne ikke oversettes til Cypher: No Cypher template for root field "spaceships"');
    expect(result.debug.stages).toEqual(["Received", "IntentExtracted", "QueryGenerated", "Terminated"]);
    expect(result.debug.operationName).toBe("ListSpaceships");
    expect(result.debug.error).toBe('No Cypher template for root field "spaceships"');
    expect(engine.calls).toHaveLength(0);
  });

  it("uses the English message for an English caller", async () => {
    const pipeline = createPipeline({ ontology, extractor, resolverPolicy: "error", generator: spaceshipGenerator });
    const result = await pipeline.process("Hvor mange etasjer har bygningen?", "en");
    expect(result.response).toBe('The query could not be translated to Cypher: No Cypher template for root field "spaceships"');
  });

  it("runs the node-count fallback under the default policy", async () => {
    const engine = new FakeEngine([{ type: "brick_Floor", count: 3 }]);
    const pipeline = createPipeline({ ontology, extractor, engine, generator: spaceshipGenerator });

    const result = await pipeline.process("Hvor mange etasjer har bygningen?");

    expect(result.success).toBe(true);
    expect(result.resolvedQuery?.fallback).toBe(true);
    expect(engine.calls[0].cypher).toBe("MATCH (n) RETURN labels(n)[0] AS type, count(*) AS count");
  });

  it("reports the resolver error from explain", async () => {
    const pipeline = createPipeline({ ontology, extractor, resolverPolicy: "error", generator: spaceshipGenerator });
    const result = await pipeline.explain("Hvor mange etasjer har bygningen?");
    expect(result.resolvedQuery).toBeNull();
    expect(result.generatedQuery?.operationName).toBe("ListSpaceships");
    expect(result.error).toBe('No Cypher template for root field "spaceships"');
  });
});
