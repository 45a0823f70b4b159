import * as readline from "readline";
import type { AppConfig } from "@/lib/config";
import { executeCypher } from "@/lib/cypher/executor";
import type { GraphEngine } from "@/lib/cypher/executor";
import { formatCypher } from "@/lib/cypher/formatter";
import { validateCypher } from "@/lib/cypher/validator";
import type { Pipeline } from "@/lib/pipeline";
import type { ExplainResult, Locale, ParameterMap, PipelineResult } from "@/types";

export interface CliContext {
  config: AppConfig;
  pipeline: Pipeline;
  engine: GraphEngine;
  print: (text: string) => void;
}

function parameterLines(parameters: ParameterMap): string[] {
  return Object.entries(parameters).map(([key, value]) => `  $${key} = ${JSON.stringify(value)}`);
}

export function renderExplain(result: ExplainResult): string {
  const { intent } = result;
  const lines = [
    "Intent:",
    `  kind: ${intent.kind}`,
    `  entity: ${intent.entityType ?? "-"}`,
    `  confidence: ${intent.confidence}`,
    `  source: ${intent.source}`,
  ];
  if (intent.traversalHint) {
    lines.push(`  traversal: ${intent.traversalHint}`);
  }
  if (Object.keys(intent.parameters).length > 0) {
    lines.push(`  parameters: ${JSON.stringify(intent.parameters)}`);
  }
  for (const note of intent.notes) {
    lines.push(`  note: ${note}`);
  }

  if (result.generatedQuery) {
    lines.push("", `GraphQL (${result.generatedQuery.operationName}):`, result.generatedQuery.query);
  }
  if (result.resolvedQuery) {
    lines.push("", result.resolvedQuery.fallback ? "Cypher (fallback):" : "Cypher:", formatCypher(result.resolvedQuery.cypher));
    const params = parameterLines(result.resolvedQuery.parameters);
    if (params.length > 0) {
      lines.push("", "Parameters:", ...params);
    }
  }
  if (result.error) {
    lines.push("", `Error: ${result.error}`);
  }
  return lines.join("\n");
}

export function renderDebug(result: PipelineResult): string {
  const { debug } = result;
  const lines = [`Stages: ${debug.stages.join(" -> ")}`];
  if (debug.intentKind) lines.push(`Intent: ${debug.intentKind} (${debug.entityType ?? "-"}, ${debug.confidence}, ${debug.intentSource})`);
  if (debug.operationName) lines.push(`Operation: ${debug.operationName}`);
  if (debug.resultCount !== undefined) lines.push(`Rows: ${debug.resultCount}`);
  if (debug.latencyMs !== undefined) lines.push(`Latency: ${debug.latencyMs}ms`);
  if (debug.error) lines.push(`Error: ${debug.error}`);
  return lines.join("\n");
}

/** Exit code 0 on success, 1 when the pipeline did not produce an answer. */
export async function runAsk(ctx: CliContext, question: string, locale: Locale | undefined, json: boolean): Promise<number> {
  const result = await ctx.pipeline.process(question, locale ?? ctx.config.locale);
  ctx.print(json ? JSON.stringify(result, null, 2) : result.response);
  return result.success ? 0 : 1;
}

export async function runExplain(ctx: CliContext, question: string, json: boolean): Promise<number> {
  const result = await ctx.pipeline.explain(question);
  ctx.print(json ? JSON.stringify(result, null, 2) : renderExplain(result));
  return result.error ? 1 : 0;
}

export async function runCypher(ctx: CliContext, query: string, json: boolean): Promise<number> {
  const validation = validateCypher(query, { max_limit: ctx.config.maxLimit });
  if (!validation.valid) {
    ctx.print(`Query rejected:\n${validation.errors.map(e => `  - ${e}`).join("\n")}`);
    return 2;
  }
  for (const warning of validation.warnings) {
    ctx.print(`Warning: ${warning}`);
  }

  const execution = await executeCypher(ctx.engine, query, {}, ctx.config.queryTimeoutMs);
  if (!execution.rows) {
    ctx.print(`Error: ${execution.error ?? "query failed"}`);
    return 1;
  }
  if (json) {
    ctx.print(JSON.stringify(execution.rows, null, 2));
  } else {
    execution.rows.forEach((row, index) => ctx.print(`${index + 1}. ${JSON.stringify(row)}`));
    ctx.print(`(${execution.row_count} rows, ${execution.latency_ms}ms)`);
  }
  return 0;
}

const REPL_HELP = `Commands:
  <question>          Ask a question
  explain <question>  Show intent, GraphQL and Cypher
  graphql <question>  Show only the generated GraphQL
  cypher <query>      Run a read-only Cypher query
  debug               Toggle the debug trail after each answer
  help                Show this help
  exit                Leave the session`;

export async function runRepl(ctx: CliContext, locale: Locale | undefined): Promise<number> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: "brick-kg> ",
  });
  let debug = false;

  ctx.print(`Brick knowledge graph (${ctx.config.falkordb.graph}). Type "help" for commands.`);
  rl.prompt();

  for await (const line of rl) {
    const trimmed = line.trim();
    if (!trimmed) {
      rl.prompt();
      continue;
    }
    const [word] = trimmed.split(/\s+/, 1);
    const rest = trimmed.slice(word.length).trim();

    if (trimmed === "exit" || trimmed === "quit") {
      break;
    } else if (trimmed === "help") {
      ctx.print(REPL_HELP);
    } else if (trimmed === "debug") {
      debug = !debug;
      ctx.print(`Debug ${debug ? "on" : "off"}`);
    } else if (word === "explain" && rest) {
      await runExplain(ctx, rest, false);
    } else if (word === "graphql" && rest) {
      const result = await ctx.pipeline.explain(rest);
      ctx.print(result.generatedQuery?.query ?? "(no query)");
    } else if (word === "cypher" && rest) {
      await runCypher(ctx, rest, false);
    } else {
      const result = await ctx.pipeline.process(trimmed, locale ?? ctx.config.locale);
      ctx.print(result.response);
      if (debug) {
        ctx.print(`\n${renderDebug(result)}`);
      }
    }
    rl.prompt();
  }

  rl.close();
  return 0;
}
