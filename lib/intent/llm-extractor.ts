import { z } from "zod";
import { errorMessage } from "@/lib/errors";
import { withTimeout } from "@/lib/llm/timeout";
import type { Ontology } from "@/lib/ontology";
import { INTENT_KINDS } from "@/types";
import type { EntityType, ExtractedIntent, IntentKind, ParameterMap } from "@/types";
import { buildSystemPrompt } from "./prompt";

/** The model boundary: system prompt and question in, raw completion text out. */
export type IntentModel = (system: string, user: string, timeoutMs: number) => Promise<string>;

export interface ModelExtractionResult {
  intent?: ExtractedIntent;
  used_llm: boolean;
  error?: string;
}

const DEFAULT_MODEL_CONFIDENCE = 0.7;

const ModelIntentSchema = z.object({
  intent_type: z.string(),
  entity_type: z.string().nullable().optional(),
  parameters: z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])).default({}),
  fields: z.array(z.string()).default([]),
  traversal_hint: z.string().nullable().optional(),
  confidence: z.number().min(0).max(1).default(DEFAULT_MODEL_CONFIDENCE),
});

function isIntentKind(value: string): value is IntentKind {
  return INTENT_KINDS.some(kind => kind === value);
}

// "query_list", "LIST" and "traversal" are all accepted spellings
export function normalizeIntentKind(value: string): IntentKind | null {
  const cleaned = value.trim().toLowerCase().replace(/^query_/, "");
  const kind = cleaned === "traversal" ? "traverse" : cleaned;
  return isIntentKind(kind) ? kind : null;
}

function stripCodeFences(text: string): string {
  return text
    .trim()
    .replace(/^```(?:json)?\s*/i, "")
    .replace(/\s*```$/, "")
    .trim();
}

/** Parse the completion as JSON, falling back to the first {...} block inside prose. */
export function parseJsonObject(text: string): unknown {
  const cleaned = stripCodeFences(text);
  try {
    return JSON.parse(cleaned);
  } catch {
    const block = cleaned.match(/\{[\s\S]*\}/);
    if (!block) {
      throw new Error("No JSON object in model output");
    }
    return JSON.parse(block[0]);
  }
}

/**
 * Validate model output against the intent shape. Returns an error string
 * instead of throwing; every failure is treated like a transport failure.
 */
export function parseModelIntent(
  text: string,
  question: string,
  ontology: Ontology
): { intent: ExtractedIntent } | { error: string } {
  let raw: unknown;
  try {
    raw = parseJsonObject(text);
  } catch (error) {
    return { error: `Unparsable model output: ${errorMessage(error)}` };
  }

  const parsed = ModelIntentSchema.safeParse(raw);
  if (!parsed.success) {
    return { error: `Model output does not match the intent shape: ${parsed.error.issues[0]?.message ?? "invalid"}` };
  }
  const output = parsed.data;

  const kind = normalizeIntentKind(output.intent_type);
  if (!kind) {
    return { error: `Unknown intent type "${output.intent_type}"` };
  }

  let entityType: EntityType | null = null;
  if (output.entity_type) {
    entityType = ontology.entityFromIdentifier(output.entity_type);
    if (!entityType) {
      return { error: `Unknown entity type "${output.entity_type}"` };
    }
  }

  const parameters: ParameterMap = {};
  for (const [key, value] of Object.entries(output.parameters)) {
    if (value !== null && value !== "") {
      parameters[key] = value;
    }
  }

  const notes: string[] = [];
  let traversalHint: string | null = null;
  if (output.traversal_hint) {
    if (ontology.getTraversal(output.traversal_hint)) {
      traversalHint = output.traversal_hint;
    } else {
      notes.push(`ignored unknown traversal hint "${output.traversal_hint}"`);
    }
  }

  return {
    intent: {
      kind,
      entityType,
      parameters,
      requestedFields: output.fields,
      confidence: output.confidence,
      question,
      traversalHint,
      source: "llm",
      notes,
    },
  };
}

export async function extractWithModel(
  question: string,
  ontology: Ontology,
  model: IntentModel,
  timeoutMs: number
): Promise<ModelExtractionResult> {
  let completion: string;
  try {
    completion = await withTimeout(model(buildSystemPrompt(ontology), question, timeoutMs), timeoutMs);
  } catch (error) {
    return { used_llm: false, error: `Model call failed: ${errorMessage(error)}` };
  }

  const result = parseModelIntent(completion, question, ontology);
  if ("error" in result) {
    return { used_llm: false, error: result.error };
  }
  return { intent: result.intent, used_llm: true };
}
