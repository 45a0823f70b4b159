// Plain-text GraphQL rendering with stable two-space indentation

import type { ParameterMap, Scalar } from "@/types";

export type Selection = string | { name: string; children: Selection[] };

export interface OperationSpec {
  operationName: string;
  root: string;
  // Argument name -> variable name; only arguments whose variable is set are rendered
  args?: Array<{ name: string; variable: string }>;
  variables: ParameterMap;
  selection?: Selection[]; // omitted for scalar roots such as counts
}

function graphqlType(value: Scalar): string {
  if (typeof value === "boolean") return "Boolean";
  if (typeof value === "number") return Number.isInteger(value) ? "Int" : "Float";
  return "String";
}

function renderSelection(selection: Selection[], depth: number): string[] {
  const indent = "  ".repeat(depth);
  const lines: string[] = [];
  for (const item of selection) {
    if (typeof item === "string") {
      lines.push(`${indent}${item}`);
    } else {
      lines.push(`${indent}${item.name} {`, ...renderSelection(item.children, depth + 1), `${indent}}`);
    }
  }
  return lines;
}

export function renderOperation(spec: OperationSpec): string {
  const args = (spec.args ?? []).filter(a => spec.variables[a.variable] !== undefined);

  const declarations = args.map(a => `$${a.variable}: ${graphqlType(spec.variables[a.variable])}`);
  const header = declarations.length
    ? `query ${spec.operationName}(${declarations.join(", ")}) {`
    : `query ${spec.operationName} {`;

  const argText = args.length ? `(${args.map(a => `${a.name}: $${a.variable}`).join(", ")})` : "";

  if (!spec.selection) {
    return [header, `  ${spec.root}${argText}`, "}"].join("\n");
  }
  return [header, `  ${spec.root}${argText} {`, ...renderSelection(spec.selection, 2), "  }", "}"].join("\n");
}

/** Copy only the entries that are set; "" counts as unset. */
export function pickVariables(entries: Array<[string, Scalar | undefined]>): ParameterMap {
  const variables: ParameterMap = {};
  for (const [key, value] of entries) {
    if (value !== undefined && value !== "") {
      variables[key] = value;
    }
  }
  return variables;
}
