export {
  formatResponse,
  targetedAnswer,
  findFieldValue,
  lowConfidenceMessage,
  connectionErrorMessage,
  executionErrorMessage,
  unresolvedQueryMessage,
} from "./formatter";
export type { FormatInput } from "./formatter";
export { cleanRows, cleanValue, unwrapRow } from "./cleanup";
export { loadLocale, parseLocaleTable, isLocale, fill } from "./locale";
export type { LocaleTable, LocaleMessages } from "./locale";
