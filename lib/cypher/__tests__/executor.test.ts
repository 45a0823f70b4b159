import { describe, expect, it } from "vitest";
import { executeCypher, toRow, toRowValue } from "@/lib/cypher";
import type { GraphEngine } from "@/lib/cypher";
import { GraphConnectionError, GraphQueryError } from "@/lib/errors";
import type { ParameterMap, Row } from "@/types";

class FakeEngine implements GraphEngine {
  calls: Array<{ cypher: string; parameters: ParameterMap; timeoutMs: number }> = [];

  constructor(private readonly outcome: Row[] | Error) {}

  async query(cypher: string, parameters: ParameterMap, timeoutMs: number): Promise<Row[]> {
    this.calls.push({ cypher, parameters, timeoutMs });
    if (this.outcome instanceof Error) {
      throw this.outcome;
    }
    return this.outcome;
  }

  async close(): Promise<void> {}
}

describe("toRowValue", () => {
  it("reduces nodes and edges to their properties", () => {
    const node = { id: 4, labels: ["brick_Floor"], properties: { name: "Plan 1", level: 1 } };
    const edge = { id: 9, relationshipType: "brick_hasPart", properties: { since: 2020 } };
    expect(toRowValue(node)).toEqual({ name: "Plan 1", level: 1 });
    expect(toRowValue([edge])).toEqual([{ since: 2020 }]);
  });

  it("keeps integers beyond the safe range as strings", () => {
    expect(toRowValue(BigInt("9007199254740993"))).toBe("9007199254740993");
    expect(toRowValue(BigInt(-42))).toBe(-42);
  });

  it("copies plain maps and converts odd scalars", () => {
    expect(toRowValue({ count: BigInt(12), missing: undefined, nested: { ok: true } })).toEqual({
      count: 12,
      missing: null,
      nested: { ok: true },
    });
  });
});

describe("toRow", () => {
  it("keeps map records and wraps anything else", () => {
    expect(toRow({ name: "AHU-1" })).toEqual({ name: "AHU-1" });
    expect(toRow(7)).toEqual({ value: 7 });
    expect(toRow(["a", "b"])).toEqual({ value: ["a", "b"] });
  });
});

describe("executeCypher", () => {
  it("returns rows with a row count", async () => {
    const engine = new FakeEngine([{ count: 3 }]);
    const result = await executeCypher(engine, "MATCH (n) RETURN count(n) AS count", { id: "" }, 500);

    expect(result.rows).toEqual([{ count: 3 }]);
    expect(result.row_count).toBe(1);
    expect(result.error).toBeUndefined();
    expect(result.latency_ms).toBeGreaterThanOrEqual(0);
    expect(engine.calls).toEqual([{ cypher: "MATCH (n) RETURN count(n) AS count", parameters: { id: "" }, timeoutMs: 500 }]);
  });

  it("flags connection failures", async () => {
    const result = await executeCypher(new FakeEngine(new GraphConnectionError("connect ECONNREFUSED")), "RETURN 1", {}, 500);
    expect(result).toMatchObject({ rows: null, row_count: 0, error: "connect ECONNREFUSED", connection_error: true });
  });

  it("reports query failures without the connection flag", async () => {
    const result = await executeCypher(new FakeEngine(new GraphQueryError("Query timed out")), "RETURN 1", {}, 500);
    expect(result).toMatchObject({ rows: null, error: "Query timed out", connection_error: false });
  });
});
