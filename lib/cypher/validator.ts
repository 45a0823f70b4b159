// Cypher safety validation for raw queries

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export interface CypherGuardrails {
  max_limit: number;
}

const FORBIDDEN_CLAUSES: Array<{ name: string; pattern: RegExp }> = [
  { name: "CREATE", pattern: /\bCREATE\b/ },
  { name: "MERGE", pattern: /\bMERGE\b/ },
  { name: "DELETE", pattern: /\bDELETE\b/ },
  { name: "DETACH", pattern: /\bDETACH\b/ },
  { name: "SET", pattern: /\bSET\b/ },
  { name: "REMOVE", pattern: /\bREMOVE\b/ },
  { name: "DROP", pattern: /\bDROP\b/ },
  { name: "LOAD CSV", pattern: /\bLOAD\s+CSV\b/ },
  { name: "CALL db.*", pattern: /\bCALL\s+DB\./ },
];

// String literals may mention keywords without executing them
function stripLiterals(query: string): string {
  return query.replace(/'(?:[^'\\]|\\.)*'/g, "''").replace(/"(?:[^"\\]|\\.)*"/g, '""');
}

export function validateCypher(query: string, guardrails: CypherGuardrails): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const upperQuery = stripLiterals(query).toUpperCase();

  if (!upperQuery.trim()) {
    return { valid: false, errors: ["Query is empty"], warnings };
  }

  for (const clause of FORBIDDEN_CLAUSES) {
    if (clause.pattern.test(upperQuery)) {
      errors.push(`Forbidden operation detected: ${clause.name}`);
    }
  }

  if (!/\bRETURN\b/.test(upperQuery)) {
    errors.push("Query must RETURN results");
  }

  const limitMatch = upperQuery.match(/\bLIMIT\s+(\d+)/);
  if (!limitMatch) {
    warnings.push("Query missing LIMIT clause - results may be large");
  } else {
    const limitValue = parseInt(limitMatch[1], 10);
    if (limitValue > guardrails.max_limit) {
      warnings.push(`LIMIT ${limitValue} exceeds max_limit ${guardrails.max_limit}`);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
