import type { LiteralParameter, Ontology } from "@/lib/ontology";
import type { ExtractedIntent, ParameterMap } from "@/types";

// Confidence is accumulated in hundredths so the reported value is exact
const BASE_CONFIDENCE = 50;
const ENTITY_BONUS = 20;
const TRAVERSAL_BONUS = 15;
const INTENT_BONUS = 10;
const MAX_RULE_CONFIDENCE = 85;

// "id 42", "nummer: TS-101", "id='main'". Unquoted ids need a digit so "number of" is not an id.
const ID_PATTERN = /\b(?:id|nummer|number)\s*[=:]?\s*(?:(['"])([\w-]+)\1|([\w-]*\d[\w-]*))/i;
const DOUBLE_QUOTED = /["“«]([^"“”«»]+)["”»]/;
// Single quotes only count at word edges, so "building's" is not a quote
const SINGLE_QUOTED = /(?<!\w)['‘]([^'‘’]+)['’](?!\w)/;

const LITERAL_PASSES: readonly LiteralParameter[] = ["building_name", "zone_name", "equipment_name"];

export interface RuleSignals {
  entity: boolean;
  traversal: boolean;
  intent: boolean;
}

export function ruleConfidence(signals: RuleSignals): number {
  let hundredths = BASE_CONFIDENCE;
  if (signals.entity) hundredths += ENTITY_BONUS;
  if (signals.traversal) hundredths += TRAVERSAL_BONUS;
  if (signals.intent) hundredths += INTENT_BONUS;
  return Math.min(hundredths, MAX_RULE_CONFIDENCE) / 100;
}

/**
 * Fixed parameter passes. The id and quoted-name passes read the question as
 * written; the literal passes read it lower-cased. A key is never overwritten.
 */
export function extractParameters(question: string, ontology: Ontology): ParameterMap {
  const params: ParameterMap = {};

  const idMatch = question.match(ID_PATTERN);
  const id = idMatch ? idMatch[2] ?? idMatch[3] : undefined;
  if (id) {
    params.id = id;
  }

  const quoted = question.match(DOUBLE_QUOTED) ?? question.match(SINGLE_QUOTED);
  const name = quoted?.[1]?.trim();
  if (name) {
    params.name = name;
  }

  const lower = question.toLowerCase();
  for (const key of LITERAL_PASSES) {
    const literal = ontology.parameterLiterals(key).find(l => lower.includes(l));
    if (literal) {
      params[key] = literal;
    }
  }

  return params;
}

/** Deterministic keyword, synonym and regex extraction. Never throws. */
export function extractRuleBased(question: string, ontology: Ontology): ExtractedIntent {
  const lower = question.toLowerCase();

  const kind = ontology.detectIntentKeyword(lower);
  const entityType = ontology.findEntityByText(lower);
  const traversal = ontology.findTraversalByKeyword(lower);
  const parameters = extractParameters(question, ontology);

  return {
    kind,
    entityType,
    parameters,
    requestedFields: [],
    confidence: ruleConfidence({
      entity: entityType !== null,
      traversal: traversal !== null,
      intent: kind !== "unknown",
    }),
    question,
    traversalHint: traversal?.name ?? null,
    source: "rules",
    notes: [],
  };
}
