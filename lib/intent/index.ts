export { createIntentExtractor } from "./extractor";
export type { IntentExtractor, IntentExtractorOptions } from "./extractor";
export { extractRuleBased, extractParameters, ruleConfidence } from "./rule-extractor";
export { extractWithModel, parseModelIntent, normalizeIntentKind } from "./llm-extractor";
export type { IntentModel } from "./llm-extractor";
export { createIntentModel } from "./model";
export { buildSystemPrompt } from "./prompt";
