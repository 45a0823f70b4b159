import { beforeEach, describe, expect, it, vi } from "vitest";
import { loadConfig } from "@/lib/config";
import type { GraphEngine } from "@/lib/cypher";
import { GraphConnectionError } from "@/lib/errors";
import { createIntentExtractor } from "@/lib/intent";
import { loadOntology } from "@/lib/ontology";
import { createPipeline } from "@/lib/pipeline";
import { MemoryRunStore } from "@/lib/runs/store";
import type { ExtractedIntent, ParameterMap, Row, RunRecord } from "@/types";
import {
  handleCypher,
  handleExamples,
  handleExplain,
  handleGetRun,
  handleHealth,
  handleListRuns,
  handleQuery,
  handleSchema,
} from "../handlers";
import type { HandlerContext } from "../handlers";

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

const ontology = loadOntology();
const config = loadConfig({});

function context(engine: GraphEngine): HandlerContext {
  const extractor = createIntentExtractor({ ontology });
  return {
    config,
    ontology,
    engine,
    pipeline: createPipeline({ ontology, extractor, engine }),
    runs: new MemoryRunStore(),
    usesModel: false,
  };
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
  return () => vi.restoreAllMocks();
});

describe("handleHealth", () => {
  it("reports graph, locale and catalogue", () => {
    expect(handleHealth(context(new FakeEngine([])))).toEqual({
      status: 200,
      body: {
        status: "ok",
        graph: "energy_graph",
        locale: "no",
        llm: null,
        ontology: { id: "brick", version: "1.0.0" },
      },
    });
  });
});

describe("handleQuery", () => {
  it("rejects a missing question", async () => {
    const result = await handleQuery(context(new FakeEngine([])), { question: "   " });
    expect(result.status).toBe(400);
    expect(result.body).toMatchObject({ error: "Missing or invalid 'question' parameter" });
  });

  it("answers and records the run", async () => {
    const ctx = context(new FakeEngine([{ count: 3 }]));
    const result = await handleQuery(ctx, { question: "Hvor mange etasjer har bygningen?" });

    expect(result.status).toBe(200);
    expect(result.body).toMatchObject({
      success: true,
      answer: "Antall: 3",
      graphql: "query CountFloors {\n  floorCount\n}",
      cypher: "MATCH (n:brick_Floor)\nRETURN count(n) AS count",
      rows: undefined,
    });

    const [run] = ctx.runs.list();
    expect(run.operation_name).toBe("CountFloors");
    expect(result.body).toMatchObject({ run_id: run.run_id });
  });

  it("includes rows on request and honours the locale", async () => {
    const ctx = context(new FakeEngine([{ count: 3 }]));
    const result = await handleQuery(ctx, { question: "Hvor mange etasjer har bygningen?", locale: "en", include_rows: true });
    expect(result.body).toMatchObject({ answer: "Count: 3", rows: [{ count: 3 }] });
  });

  it("maps execution failures to 502", async () => {
    const ctx = context(new FakeEngine(new GraphConnectionError("connect ECONNREFUSED")));
    const result = await handleQuery(ctx, { question: "Vis alle temperatursensorer" });
    expect(result.status).toBe(502);
    expect(ctx.runs.list()[0].execution_metrics.error).toBe("connect ECONNREFUSED");
  });
});

describe("handleExplain", () => {
  it("returns the compiled query without executing it", async () => {
    const engine = new FakeEngine([]);
    const result = await handleExplain(context(engine), { question: "Vis alle sensorer i bygget" });
    expect(result.status).toBe(200);
    expect(result.body).toMatchObject({ operation_name: "BuildingWithDetails", fallback: false });
    expect(engine.calls).toHaveLength(0);
  });
});

describe("handleCypher", () => {
  it("rejects write queries", async () => {
    const result = await handleCypher(context(new FakeEngine([])), { query: "MATCH (n) DELETE n RETURN n" });
    expect(result).toEqual({
      status: 400,
      body: { error: "Query validation failed", errors: ["Forbidden operation detected: DELETE"] },
    });
  });

  it("runs read queries with parameters and passes warnings on", async () => {
    const engine = new FakeEngine([{ name: "Plan 1" }]);
    const result = await handleCypher(context(engine), {
      query: "MATCH (f:brick_Floor) WHERE f.level = $level RETURN f.name AS name",
      parameters: { level: 1 },
    });
    expect(result.status).toBe(200);
    expect(result.body).toMatchObject({
      rows: [{ name: "Plan 1" }],
      row_count: 1,
      warnings: ["Query missing LIMIT clause - results may be large"],
    });
    expect(engine.calls[0].parameters).toEqual({ level: 1 });
  });

  it("maps connection failures to 503", async () => {
    const engine = new FakeEngine(new GraphConnectionError("connect ECONNREFUSED"));
    const result = await handleCypher(context(engine), { query: "MATCH (n) RETURN n LIMIT 1" });
    expect(result).toEqual({ status: 503, body: { error: "connect ECONNREFUSED", warnings: [] } });
  });
});

describe("handleSchema", () => {
  it("lists the catalogue", () => {
    const result = handleSchema(context(new FakeEngine([])));
    expect(result.status).toBe(200);
    expect(result.body).toMatchObject({ id: "brick", label_namespace: "brick_" });
  });
});

describe("handleExamples", () => {
  it("returns examples for the requested or default locale", () => {
    const ctx = context(new FakeEngine([]));
    expect(handleExamples(ctx, "en").body).toMatchObject({ locale: "en", examples: expect.arrayContaining(["Show all temperature sensors"]) });
    expect(handleExamples(ctx, undefined).body).toMatchObject({ locale: "no" });
    expect(handleExamples(ctx, "de")).toEqual({ status: 400, body: { error: "Unsupported locale: de" } });
  });
});

describe("handleGetRun", () => {
  it("returns 404 for unknown runs", () => {
    expect(handleGetRun(context(new FakeEngine([])), "nope")).toEqual({
      status: 404,
      body: { error: "Run record not found: nope" },
    });
  });
});

describe("handleListRuns", () => {
  const intent: ExtractedIntent = {
    kind: "aggregate",
    entityType: "Floor",
    parameters: {},
    requestedFields: [],
    confidence: 0.8,
    question: "q",
    traversalHint: null,
    source: "rules",
    notes: [],
  };

  function record(run_id: string, timestamp: string, success: boolean, operation_name: string): RunRecord {
    return {
      run_id,
      timestamp,
      question: "q",
      locale: "no",
      success,
      intent_json: intent,
      operation_name,
      execution_metrics: { latency_ms: 1, row_count: 0 },
    };
  }

  function seeded(): HandlerContext {
    const ctx = context(new FakeEngine([]));
    ctx.runs.save(record("run-1", "2026-01-01T10:00:00.000Z", true, "CountFloors"));
    ctx.runs.save(record("run-2", "2026-01-02T10:00:00.000Z", false, "ListSensors"));
    ctx.runs.save(record("run-3", "2026-01-03T10:00:00.000Z", true, "ListSensors"));
    return ctx;
  }

  function ids(body: unknown): string[] {
    return Array.isArray(body) ? body.map((r: RunRecord) => r.run_id) : [];
  }

  it("lists every run newest first without filters", () => {
    const result = handleListRuns(seeded(), {});
    expect(result.status).toBe(200);
    expect(ids(result.body)).toEqual(["run-3", "run-2", "run-1"]);
  });

  it("filters on success, operation, date range and limit", () => {
    const ctx = seeded();
    expect(ids(handleListRuns(ctx, { success: "true" }).body)).toEqual(["run-3", "run-1"]);
    expect(ids(handleListRuns(ctx, { operation: "ListSensors" }).body)).toEqual(["run-3", "run-2"]);
    expect(
      ids(handleListRuns(ctx, { start: "2026-01-01T12:00:00.000Z", end: "2026-01-02T12:00:00.000Z" }).body)
    ).toEqual(["run-2"]);
    expect(ids(handleListRuns(ctx, { limit: "1" }).body)).toEqual(["run-3"]);
  });

  it("rejects malformed filters", () => {
    const ctx = seeded();
    expect(handleListRuns(ctx, { success: "yes" }).status).toBe(400);
    expect(handleListRuns(ctx, { limit: "0" }).body).toMatchObject({ error: "Missing or invalid 'filter' parameter" });
    expect(handleListRuns(ctx, { start: "not a date", end: "2026-01-02" }).status).toBe(400);
  });
});
