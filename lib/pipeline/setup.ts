import type { AppConfig } from "@/lib/config";
import { FalkorDBEngine } from "@/lib/cypher/executor";
import type { GraphEngine } from "@/lib/cypher/executor";
import { createIntentExtractor } from "@/lib/intent/extractor";
import { createIntentModel } from "@/lib/intent/model";
import { loadOntology } from "@/lib/ontology";
import type { Ontology } from "@/lib/ontology";
import { createPipeline } from "./pipeline";
import type { Pipeline } from "./pipeline";

export interface Runtime {
  config: AppConfig;
  ontology: Ontology;
  engine: GraphEngine;
  pipeline: Pipeline;
  usesModel: boolean;
}

export interface RuntimeOptions {
  useModel?: boolean;
  engine?: GraphEngine;
}

/** Wire the configured catalogue, model and FalkorDB engine into one pipeline. */
export function createRuntime(config: AppConfig, options: RuntimeOptions = {}): Runtime {
  const ontology = loadOntology();
  const model = options.useModel === false ? null : createIntentModel(config.llm);
  const extractor = createIntentExtractor({ ontology, model, timeoutMs: config.llm.timeoutMs });
  const engine = options.engine ?? new FalkorDBEngine(config.falkordb);

  if (!model) {
    console.log("[Pipeline] No language model configured, using rule-based intent extraction");
  }

  const pipeline = createPipeline({
    ontology,
    extractor,
    engine,
    locale: config.locale,
    resolverPolicy: config.resolverPolicy,
    timeoutMs: config.queryTimeoutMs,
  });

  return { config, ontology, engine, pipeline, usesModel: extractor.usesModel };
}
