import { createResolver } from "@/lib/cypher/resolver";
import type { ResolverPolicy } from "@/lib/cypher/resolver";
import { executeCypher } from "@/lib/cypher/executor";
import type { GraphEngine } from "@/lib/cypher/executor";
import { UnresolvedQueryError } from "@/lib/errors";
import { generateQuery } from "@/lib/graphql/generator";
import type { QueryGenerator } from "@/lib/graphql/operations/shared";
import type { IntentExtractor } from "@/lib/intent/extractor";
import type { Ontology } from "@/lib/ontology";
import {
  connectionErrorMessage,
  executionErrorMessage,
  formatResponse,
  lowConfidenceMessage,
  unresolvedQueryMessage,
} from "@/lib/response/formatter";
import type {
  DebugTrail,
  ExplainResult,
  ExtractedIntent,
  GeneratedQuery,
  Locale,
  PipelineResult,
  ResolvedQuery,
} from "@/types";

export const LOW_CONFIDENCE_THRESHOLD = 0.3;
const DEFAULT_QUERY_TIMEOUT_MS = 25000;

export interface PipelineOptions {
  ontology: Ontology;
  extractor: IntentExtractor;
  engine?: GraphEngine | null; // no engine: execution fails with the connection message
  locale?: Locale;
  resolverPolicy?: ResolverPolicy;
  generator?: QueryGenerator; // replaces the per-intent GraphQL generators
  timeoutMs?: number;
  confidenceThreshold?: number;
}

export interface Pipeline {
  process(question: string, locale?: Locale): Promise<PipelineResult>;
  explain(question: string): Promise<ExplainResult>;
}

function generateFor(intent: ExtractedIntent, ontology: Ontology, generator: QueryGenerator): GeneratedQuery {
  return generator(
    {
      kind: intent.kind,
      entityType: intent.entityType,
      parameters: intent.parameters,
      requestedFields: intent.requestedFields,
      traversalHint: intent.traversalHint,
    },
    ontology
  );
}

/**
 * NL question -> intent -> GraphQL -> Cypher -> rows -> answer. Each call
 * builds its own result and debug trail; nothing carries over between calls.
 */
export function createPipeline(options: PipelineOptions): Pipeline {
  const { ontology, extractor } = options;
  const engine = options.engine ?? null;
  const defaultLocale = options.locale ?? "no";
  const timeoutMs = options.timeoutMs ?? DEFAULT_QUERY_TIMEOUT_MS;
  const threshold = options.confidenceThreshold ?? LOW_CONFIDENCE_THRESHOLD;
  const generator = options.generator ?? generateQuery;
  const resolver = createResolver(ontology, { policy: options.resolverPolicy ?? "fallback" });

  async function processQuestion(question: string, locale: Locale = defaultLocale): Promise<PipelineResult> {
    const debug: DebugTrail = { stages: ["Received"] };
    let generatedQuery: GeneratedQuery | null = null;
    let resolvedQuery: ResolvedQuery | null = null;

    const intent = await extractor.extract(question);
    debug.stages.push("IntentExtracted");
    debug.intentKind = intent.kind;
    debug.entityType = intent.entityType;
    debug.confidence = intent.confidence;
    debug.intentSource = intent.source;

    const fail = (response: string, error?: string): PipelineResult => {
      debug.stages.push("Terminated");
      if (error) {
        debug.error = error;
      }
      return { success: false, question, locale, intent, generatedQuery, resolvedQuery, rows: null, response, debug };
    };

    if (intent.confidence < threshold) {
      console.log(`[Pipeline] Confidence ${intent.confidence} below ${threshold}, not querying`);
      debug.stages.push("LowConfidence");
      return fail(lowConfidenceMessage(question, locale));
    }

    generatedQuery = generateFor(intent, ontology, generator);
    debug.stages.push("QueryGenerated");
    debug.operationName = generatedQuery.operationName;

    try {
      resolvedQuery = resolver.resolve(generatedQuery.query, generatedQuery.variables);
    } catch (error) {
      if (error instanceof UnresolvedQueryError) {
        console.error(`[Pipeline] ${error.message}`);
        return fail(unresolvedQueryMessage(error.message, locale), error.message);
      }
      throw error;
    }
    debug.stages.push("QueryResolved");
    debug.resolvedDescription = resolvedQuery.description;

    if (!engine) {
      debug.stages.push("ExecutionFailed");
      return fail(connectionErrorMessage(locale), "No graph engine configured");
    }

    const execution = await executeCypher(engine, resolvedQuery.cypher, resolvedQuery.parameters, timeoutMs);
    debug.latencyMs = execution.latency_ms;

    if (!execution.rows) {
      const error = execution.error ?? "Unknown execution error";
      console.error(`[Pipeline] Execution failed: ${error}`);
      debug.stages.push("ExecutionFailed");
      const response = execution.connection_error
        ? connectionErrorMessage(locale)
        : executionErrorMessage(error, locale);
      return fail(response, error);
    }

    debug.resultCount = execution.row_count;
    console.log(`[Pipeline] ${generatedQuery.operationName}: ${execution.row_count} rows in ${execution.latency_ms}ms`);

    const response = formatResponse({
      rows: execution.rows,
      intentKind: intent.kind,
      description: generatedQuery.description,
      locale,
      question,
    });
    debug.stages.push("ResultsFormatted", "Terminated");

    return {
      success: true,
      question,
      locale,
      intent,
      generatedQuery,
      resolvedQuery,
      rows: execution.rows,
      response,
      debug,
    };
  }

  /** Intent, GraphQL and Cypher for a question without touching the graph engine. */
  async function explain(question: string): Promise<ExplainResult> {
    const intent = await extractor.extract(question);
    const generatedQuery = generateFor(intent, ontology, generator);
    try {
      const resolvedQuery = resolver.resolve(generatedQuery.query, generatedQuery.variables);
      return { intent, generatedQuery, resolvedQuery };
    } catch (error) {
      if (error instanceof UnresolvedQueryError) {
        return { intent, generatedQuery, resolvedQuery: null, error: error.message };
      }
      throw error;
    }
  }

  return { process: processQuestion, explain };
}
