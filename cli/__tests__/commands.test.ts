import { beforeEach, describe, expect, it, vi } from "vitest";
import { loadConfig } from "@/lib/config";
import type { GraphEngine } from "@/lib/cypher";
import { createIntentExtractor } from "@/lib/intent";
import { loadOntology } from "@/lib/ontology";
import { createPipeline } from "@/lib/pipeline";
import type { Row } from "@/types";
import { renderExplain, runAsk, runCypher, runExplain } from "../commands";
import type { CliContext } from "../commands";

const ontology = loadOntology();

function cli(rows: Row[]): { ctx: CliContext; output: string[]; engine: GraphEngine } {
  const output: string[] = [];
  const engine: GraphEngine = {
    query: vi.fn(async () => rows),
    close: async () => undefined,
  };
  const pipeline = createPipeline({ ontology, extractor: createIntentExtractor({ ontology }), engine });
  return { ctx: { config: loadConfig({}), pipeline, engine, print: text => output.push(text) }, output, engine };
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  return () => vi.restoreAllMocks();
});

describe("runAsk", () => {
  it("prints the answer", async () => {
    const { ctx, output } = cli([{ count: 3 }]);
    expect(await runAsk(ctx, "Hvor mange etasjer har bygningen?", "en", false)).toBe(0);
    expect(output).toEqual(["Count: 3"]);
  });
});

describe("runExplain", () => {
  it("prints intent, GraphQL and Cypher", async () => {
    const { ctx, output, engine } = cli([]);
    expect(await runExplain(ctx, "Hvor mange etasjer har bygningen?", false)).toBe(0);
    expect(output[0]).toBe(
      [
        "Intent:",
        "  kind: aggregate",
        "  entity: Floor",
        "  confidence: 0.8",
        "  source: rules",
        "",
        "GraphQL (CountFloors):",
        "query CountFloors {",
        "  floorCount",
        "}",
        "",
        "Cypher:",
        "MATCH (n:brick_Floor)",
        "RETURN count(n) AS count",
      ].join("\n")
    );
    expect(engine.query).not.toHaveBeenCalled();
  });
});

describe("renderExplain", () => {
  it("lists parameters and errors", () => {
    const intent = createIntentExtractor({ ontology }).extractRuleBased("Vis sensor med id TS-101");
    const text = renderExplain({
      intent,
      generatedQuery: null,
      resolvedQuery: { cypher: "MATCH (n) RETURN n", parameters: { id: "TS-101" }, description: "", fallback: true },
      error: "boom",
    });
    expect(text.split("\n").slice(-8)).toEqual([
      "",
      "Cypher (fallback):",
      "MATCH (n) RETURN n",
      "",
      "Parameters:",
      '  $id = "TS-101"',
      "",
      "Error: boom",
    ]);
  });
});

describe("runCypher", () => {
  it("refuses write queries without touching the engine", async () => {
    const { ctx, output, engine } = cli([]);
    expect(await runCypher(ctx, "MATCH (n) SET n.x = 1 RETURN n", false)).toBe(2);
    expect(output).toEqual(["Query rejected:\n  - Forbidden operation detected: SET"]);
    expect(engine.query).not.toHaveBeenCalled();
  });

  it("prints rows and warnings", async () => {
    const { ctx, output } = cli([{ name: "Plan 1" }]);
    expect(await runCypher(ctx, "MATCH (f:brick_Floor) RETURN f.name AS name", false)).toBe(0);
    expect(output.slice(0, 2)).toEqual(['Warning: Query missing LIMIT clause - results may be large', '1. {"name":"Plan 1"}']);
  });
});
