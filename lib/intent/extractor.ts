import type { Ontology } from "@/lib/ontology";
import type { ExtractedIntent } from "@/types";
import { extractWithModel } from "./llm-extractor";
import type { IntentModel } from "./llm-extractor";
import { extractRuleBased } from "./rule-extractor";

export interface IntentExtractorOptions {
  ontology: Ontology;
  model?: IntentModel | null; // no model means rules only
  timeoutMs?: number;
}

export interface IntentExtractor {
  extract(question: string): Promise<ExtractedIntent>;
  extractRuleBased(question: string): ExtractedIntent;
  readonly usesModel: boolean;
}

const DEFAULT_TIMEOUT_MS = 15000;

export function createIntentExtractor(options: IntentExtractorOptions): IntentExtractor {
  const { ontology, model } = options;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  const rules = (question: string) => extractRuleBased(question, ontology);

  return {
    usesModel: Boolean(model),
    extractRuleBased: rules,

    async extract(question: string): Promise<ExtractedIntent> {
      if (!model) {
        return rules(question);
      }

      const result = await extractWithModel(question, ontology, model, timeoutMs);
      if (result.intent) {
        console.log(`[Intent] Model intent: ${result.intent.kind}/${result.intent.entityType ?? "-"} (${result.intent.confidence})`);
        return result.intent;
      }

      console.warn(`[Intent] ${result.error ?? "Model extraction failed"}, using rule-based fallback`);
      const fallback = rules(question);
      return {
        ...fallback,
        notes: [...fallback.notes, `fallback: ${result.error ?? "model extraction failed"}`],
      };
    },
  };
}
