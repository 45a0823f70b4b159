// Request handlers for the HTTP API. Each returns a status and a JSON body;
// express wiring lives in app.ts.

import { z } from "zod";
import type { AppConfig } from "@/lib/config";
import { executeCypher } from "@/lib/cypher/executor";
import type { GraphEngine } from "@/lib/cypher/executor";
import { formatCypher } from "@/lib/cypher/formatter";
import { validateCypher } from "@/lib/cypher/validator";
import type { Ontology } from "@/lib/ontology";
import type { Pipeline } from "@/lib/pipeline";
import { isLocale, loadLocale } from "@/lib/response/locale";
import { toRunRecord } from "@/lib/runs/store";
import type { RunFilters, RunStore } from "@/lib/runs/types";
import { LOCALES } from "@/types";
import type { Locale, PipelineResult } from "@/types";

export interface HandlerContext {
  config: AppConfig;
  ontology: Ontology;
  engine: GraphEngine;
  pipeline: Pipeline;
  runs: RunStore;
  usesModel: boolean;
}

export interface HandlerResult {
  status: number;
  body: unknown;
}

const QueryRequestSchema = z.object({
  question: z.string().trim().min(1),
  locale: z.enum(LOCALES).optional(),
  include_rows: z.boolean().optional(),
});

const ExplainRequestSchema = z.object({
  question: z.string().trim().min(1),
});

const CypherRequestSchema = z.object({
  query: z.string().trim().min(1),
  parameters: z.record(z.union([z.string(), z.number(), z.boolean()])).default({}),
});

const isoDate = z.string().refine(value => !Number.isNaN(Date.parse(value)), "Invalid date");

const ListRunsQuerySchema = z.object({
  success: z.enum(["true", "false"]).optional(),
  operation: z.string().trim().min(1).optional(),
  start: isoDate.optional(),
  end: isoDate.optional(),
  limit: z.coerce.number().int().positive().max(500).optional(),
});

function invalid(parameter: string, error: z.ZodError): HandlerResult {
  return {
    status: 400,
    body: {
      error: `Missing or invalid '${parameter}' parameter`,
      issues: error.issues.map(issue => `${issue.path.join(".") || "(body)"}: ${issue.message}`),
    },
  };
}

function statusFor(result: PipelineResult): number {
  if (result.success) return 200;
  if (result.debug.stages.includes("LowConfidence")) return 422;
  if (result.debug.stages.includes("ExecutionFailed")) return 502;
  return 500;
}

export function handleHealth(ctx: HandlerContext): HandlerResult {
  return {
    status: 200,
    body: {
      status: "ok",
      graph: ctx.config.falkordb.graph,
      locale: ctx.config.locale,
      llm: ctx.usesModel ? ctx.config.llm.provider : null,
      ontology: { id: ctx.ontology.id, version: ctx.ontology.version },
    },
  };
}

export async function handleQuery(ctx: HandlerContext, body: unknown): Promise<HandlerResult> {
  const parsed = QueryRequestSchema.safeParse(body);
  if (!parsed.success) {
    return invalid("question", parsed.error);
  }

  const { question, locale, include_rows } = parsed.data;
  const result = await ctx.pipeline.process(question, locale ?? ctx.config.locale);
  const record = toRunRecord(result);
  ctx.runs.save(record);

  return {
    status: statusFor(result),
    body: {
      run_id: record.run_id,
      success: result.success,
      answer: result.response,
      intent: result.intent,
      graphql: result.generatedQuery?.query ?? null,
      variables: result.generatedQuery?.variables ?? null,
      cypher: result.resolvedQuery?.cypher ?? null,
      parameters: result.resolvedQuery?.parameters ?? null,
      rows: include_rows ? result.rows : undefined,
      debug: result.debug,
    },
  };
}

export async function handleExplain(ctx: HandlerContext, body: unknown): Promise<HandlerResult> {
  const parsed = ExplainRequestSchema.safeParse(body);
  if (!parsed.success) {
    return invalid("question", parsed.error);
  }

  const result = await ctx.pipeline.explain(parsed.data.question);
  return {
    status: result.error ? 422 : 200,
    body: {
      intent: result.intent,
      graphql: result.generatedQuery?.query ?? null,
      variables: result.generatedQuery?.variables ?? null,
      operation_name: result.generatedQuery?.operationName ?? null,
      cypher: result.resolvedQuery ? formatCypher(result.resolvedQuery.cypher) : null,
      parameters: result.resolvedQuery?.parameters ?? null,
      fallback: result.resolvedQuery?.fallback ?? false,
      error: result.error,
    },
  };
}

export async function handleCypher(ctx: HandlerContext, body: unknown): Promise<HandlerResult> {
  const parsed = CypherRequestSchema.safeParse(body);
  if (!parsed.success) {
    return invalid("query", parsed.error);
  }

  const { query, parameters } = parsed.data;
  const validation = validateCypher(query, { max_limit: ctx.config.maxLimit });
  if (!validation.valid) {
    return { status: 400, body: { error: "Query validation failed", errors: validation.errors } };
  }

  const execution = await executeCypher(ctx.engine, query, parameters, ctx.config.queryTimeoutMs);
  if (!execution.rows) {
    return {
      status: execution.connection_error ? 503 : 502,
      body: { error: execution.error, warnings: validation.warnings },
    };
  }

  return {
    status: 200,
    body: {
      rows: execution.rows,
      row_count: execution.row_count,
      latency_ms: execution.latency_ms,
      warnings: validation.warnings,
    },
  };
}

export function handleSchema(ctx: HandlerContext): HandlerResult {
  const { ontology } = ctx;
  return {
    status: 200,
    body: {
      id: ontology.id,
      version: ontology.version,
      label_namespace: ontology.labelNamespace,
      entities: ontology.listEntities().map(e => ({
        type: e.type,
        label: e.label,
        category: e.category,
        object_type: e.objectType,
        description: e.description,
      })),
      object_types: ontology.listObjectTypes().map(t => ({
        name: t.name,
        single: t.single,
        collection: t.collection,
        fields: t.fields.map(f => f.name),
      })),
      traversals: ontology.listTraversals().map(t => ({
        name: t.name,
        description: t.description,
        path: t.path,
        return_fields: t.returnFields,
      })),
    },
  };
}

export function handleExamples(ctx: HandlerContext, locale: string | undefined): HandlerResult {
  if (locale !== undefined && !isLocale(locale)) {
    return { status: 400, body: { error: `Unsupported locale: ${locale}` } };
  }
  const selected: Locale = locale ?? ctx.config.locale;
  return { status: 200, body: { locale: selected, examples: loadLocale(selected).examples } };
}

export function handleGetRun(ctx: HandlerContext, runId: string): HandlerResult {
  const record = ctx.runs.get(runId);
  if (!record) {
    return { status: 404, body: { error: `Run record not found: ${runId}` } };
  }
  return { status: 200, body: record };
}

export function handleListRuns(ctx: HandlerContext, query: Record<string, string | undefined>): HandlerResult {
  const parsed = ListRunsQuerySchema.safeParse(query);
  if (!parsed.success) {
    return invalid("filter", parsed.error);
  }

  const { success, operation, start, end, limit } = parsed.data;
  const filters: RunFilters = {};
  if (success) filters.success = success === "true";
  if (operation) filters.operation_name = operation;
  if (start && end) {
    filters.date_range = { start, end };
  }
  if (limit) filters.limit = limit;

  return { status: 200, body: ctx.runs.list(filters) };
}
