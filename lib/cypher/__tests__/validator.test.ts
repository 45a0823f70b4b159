import { describe, expect, it } from "vitest";
import { validateCypher } from "@/lib/cypher";

const guardrails = { max_limit: 1000 };

describe("validateCypher", () => {
  it("accepts a bounded read query", () => {
    expect(validateCypher("MATCH (n:brick_Floor) RETURN n LIMIT 10", guardrails)).toEqual({
      valid: true,
      errors: [],
      warnings: [],
    });
  });

  it("rejects write clauses", () => {
    const result = validateCypher("MATCH (n) DETACH DELETE n", guardrails);
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      "Forbidden operation detected: DELETE",
      "Forbidden operation detected: DETACH",
      "Query must RETURN results",
    ]);
  });

  it("rejects lower-case writes and procedure calls", () => {
    expect(validateCypher("create (n) return n limit 1", guardrails).errors).toEqual(["Forbidden operation detected: CREATE"]);
    expect(validateCypher("CALL db.labels() YIELD label RETURN label", guardrails).errors).toEqual([
      "Forbidden operation detected: CALL db.*",
    ]);
  });

  it("ignores keywords inside string literals", () => {
    const result = validateCypher("MATCH (n) WHERE n.name = 'CREATE SET' RETURN n LIMIT 5", guardrails);
    expect(result.valid).toBe(true);
  });

  it("does not flag property names that contain keywords", () => {
    expect(validateCypher("MATCH (n) RETURN n.dataset LIMIT 5", guardrails).valid).toBe(true);
  });

  it("warns about missing and oversized limits", () => {
    expect(validateCypher("MATCH (n) RETURN n", guardrails).warnings).toEqual([
      "Query missing LIMIT clause - results may be large",
    ]);
    expect(validateCypher("MATCH (n) RETURN n LIMIT 5000", guardrails).warnings).toEqual([
      "LIMIT 5000 exceeds max_limit 1000",
    ]);
  });

  it("rejects an empty query", () => {
    expect(validateCypher("   ", guardrails)).toEqual({ valid: false, errors: ["Query is empty"], warnings: [] });
  });
});
