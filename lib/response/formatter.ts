// Turns result rows into the answer text, one renderer per intent kind

import type { IntentKind, Locale, Row, RowValue } from "@/types";
import { cleanRows, isMap, unwrapRow } from "./cleanup";
import type { RowMap } from "./cleanup";
import { fill, loadLocale, message } from "./locale";
import type { LocaleTable } from "./locale";

export interface FormatInput {
  rows: readonly Row[];
  intentKind: IntentKind;
  description: string;
  locale: Locale;
  question?: string;
}

const LIST_ROW_LIMIT = 15;
const LIST_FIELD_LIMIT = 6;
const TRAVERSAL_ROW_LIMIT = 20;
const DEFAULT_ROW_LIMIT = 10;
const NESTED_ITEM_LIMIT = 5;
const SHORT_LIST_LIMIT = 3;
const SEARCH_DEPTH = 4;

const OTHER_LOCALE: Record<Locale, Locale> = { en: "no", no: "en" };

type Scalar = string | number | boolean;

function isScalar(value: RowValue | undefined): value is Scalar {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

function normalizeKey(key: string): string {
  return key.toLowerCase().replace(/[_\s]/g, "");
}

export function fieldLabel(table: LocaleTable, key: string): string {
  const known = table.fieldLabels[key];
  if (known) {
    return known;
  }
  const words = key
    .replace(/_/g, " ")
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .trim();
  return words.charAt(0).toUpperCase() + words.slice(1);
}

export function extractName(row: RowMap): string | null {
  if (isScalar(row.name)) {
    return String(row.name);
  }
  for (const [key, value] of Object.entries(row)) {
    if (key.toLowerCase().includes("name") && isScalar(value)) {
      return String(value);
    }
  }
  return null;
}

/** Depth-first search for a scalar field, comparing keys without case or underscores. */
export function findFieldValue(value: RowValue, field: string, depth = SEARCH_DEPTH): Scalar | null {
  if (depth < 0) {
    return null;
  }
  const wanted = normalizeKey(field);
  if (Array.isArray(value)) {
    for (const item of value) {
      const found = findFieldValue(item, field, depth - 1);
      if (found !== null) {
        return found;
      }
    }
    return null;
  }
  if (!isMap(value)) {
    return null;
  }
  for (const [key, inner] of Object.entries(value)) {
    if (normalizeKey(key) === wanted && isScalar(inner)) {
      return inner;
    }
  }
  for (const inner of Object.values(value)) {
    if (typeof inner === "object" && inner !== null) {
      const found = findFieldValue(inner, field, depth - 1);
      if (found !== null) {
        return found;
      }
    }
  }
  return null;
}

/**
 * One-line answer when the question asks for a single known field and the
 * first row carries it. The caller's locale is tried before the other one.
 */
export function targetedAnswer(rows: readonly Row[], question: string, locale: Locale): string | null {
  if (rows.length === 0 || !question) {
    return null;
  }
  const lower = question.toLowerCase();
  const first = unwrapRow(rows[0]);

  for (const table of [loadLocale(locale), loadLocale(OTHER_LOCALE[locale])]) {
    for (const entry of table.targetedAnswers) {
      if (!lower.includes(entry.pattern)) {
        continue;
      }
      const value = findFieldValue(first, entry.field);
      if (value !== null) {
        return fill(entry.template, { value: String(value) });
      }
    }
  }
  return null;
}

function itemName(item: RowValue): string {
  if (isMap(item)) {
    const name = extractName(item);
    if (name) return name;
    if (isScalar(item.id)) return String(item.id);
    return JSON.stringify(item);
  }
  return isScalar(item) ? String(item) : JSON.stringify(item);
}

function shortList(table: LocaleTable, items: RowValue[]): string {
  const shown = items.slice(0, SHORT_LIST_LIMIT).map(itemName).join(", ");
  const hidden = items.length - SHORT_LIST_LIMIT;
  return hidden > 0 ? `${shown} ${fill(table.messages.more_items, { count: hidden })}` : shown;
}

function formatAggregate(table: LocaleTable, rows: readonly Row[]): string {
  const first = unwrapRow(rows[0]);
  const count = isScalar(first.count) ? first.count : rows.length;
  return fill(table.messages.count, { count: String(count) });
}

function formatList(table: LocaleTable, rows: readonly Row[]): string {
  const lines = [fill(table.messages.list_header, { count: rows.length }), ""];

  rows.slice(0, LIST_ROW_LIMIT).forEach((raw, index) => {
    const row = unwrapRow(raw);
    const parts: string[] = [];
    const name = extractName(row);
    if (name) {
      parts.push(name);
    }

    let fields = 0;
    for (const [key, value] of Object.entries(row)) {
      if (fields >= LIST_FIELD_LIMIT) break;
      if (key === "name" || key === "id" || value === "" || isMap(value)) continue;
      if (isScalar(value)) {
        if (String(value) === name) continue;
        parts.push(`${fieldLabel(table, key)}: ${value}`);
        fields++;
      } else if (Array.isArray(value)) {
        parts.push(`${fieldLabel(table, key)}: ${shortList(table, value)}`);
        fields++;
      }
    }

    lines.push(`  ${index + 1}. ${parts.join(" | ")}`);
  });

  if (rows.length > LIST_ROW_LIMIT) {
    lines.push("", `  ${fill(table.messages.more_results, { count: rows.length - LIST_ROW_LIMIT })}`);
  }
  return lines.join("\n");
}

function nestedLines(table: LocaleTable, items: RowValue[], indent: string): string[] {
  const lines = items.slice(0, NESTED_ITEM_LIMIT).map(item => {
    if (isMap(item)) {
      const detail = [item.type, item.level, item.sensorType, item.equipmentType].find(isScalar);
      return detail !== undefined ? `${indent}• ${itemName(item)} (${detail})` : `${indent}• ${itemName(item)}`;
    }
    return `${indent}• ${itemName(item)}`;
  });
  if (items.length > NESTED_ITEM_LIMIT) {
    lines.push(`${indent}${fill(table.messages.more_items, { count: items.length - NESTED_ITEM_LIMIT })}`);
  }
  return lines;
}

function formatEntity(table: LocaleTable, rows: readonly Row[]): string {
  const entity = unwrapRow(rows[0]);
  const lines: string[] = [];

  const name = extractName(entity);
  if (name) {
    lines.push(name, "");
  }

  for (const [key, value] of Object.entries(entity)) {
    if (key === "name" || key === "id") continue;
    const label = fieldLabel(table, key);

    if (isMap(value)) {
      lines.push(`  ${label}:`);
      for (const [innerKey, inner] of Object.entries(value)) {
        lines.push(`    • ${fieldLabel(table, innerKey)}: ${isScalar(inner) ? inner : itemName(inner)}`);
      }
    } else if (Array.isArray(value)) {
      lines.push(`  ${label}:`, ...nestedLines(table, value, "    "));
    } else if (isScalar(value)) {
      lines.push(`  ${label}: ${value}`);
    }
  }

  return lines.join("\n");
}

function formatTraversal(table: LocaleTable, rows: readonly Row[], description: string): string {
  const lines = [description, ""];

  for (const raw of rows.slice(0, TRAVERSAL_ROW_LIMIT)) {
    const row = unwrapRow(raw);
    const name = extractName(row);
    lines.push(name ? `  • ${name}` : "  •");

    for (const [key, value] of Object.entries(row)) {
      if (key === "name" || key === "id" || value === "") continue;
      const label = fieldLabel(table, key);

      if (isMap(value)) {
        const pairs = Object.entries(value)
          .filter(([, inner]) => isScalar(inner))
          .map(([innerKey, inner]) => `${innerKey}=${inner}`);
        if (pairs.length > 0) {
          lines.push(`      ${label}: ${pairs.join(", ")}`);
        }
      } else if (Array.isArray(value)) {
        if (isMap(value[0])) {
          lines.push(`      ${label}:`, ...nestedLines(table, value, "        "));
        } else {
          lines.push(`      ${label}: ${shortList(table, value)}`);
        }
      } else if (isScalar(value) && String(value) !== name) {
        lines.push(`      ${label}: ${value}`);
      }
    }
    lines.push("");
  }

  if (rows.length > TRAVERSAL_ROW_LIMIT) {
    lines.push(fill(table.messages.more_results, { count: rows.length - TRAVERSAL_ROW_LIMIT }));
  }
  return lines.join("\n").trimEnd();
}

function formatDefault(table: LocaleTable, rows: readonly Row[]): string {
  const lines = [fill(table.messages.results_header, { count: rows.length }), ""];
  for (const raw of rows.slice(0, DEFAULT_ROW_LIMIT)) {
    const row = unwrapRow(raw);
    const name = extractName(row);
    const parts = name ? [name] : [];
    for (const [key, value] of Object.entries(row)) {
      if (key !== "name" && isScalar(value)) {
        parts.push(`${key}: ${value}`);
      }
    }
    lines.push(`  • ${parts.join(", ")}`);
  }
  if (rows.length > DEFAULT_ROW_LIMIT) {
    lines.push("", `  ${fill(table.messages.more_results, { count: rows.length - DEFAULT_ROW_LIMIT })}`);
  }
  return lines.join("\n");
}

export function formatResponse(input: FormatInput): string {
  const table = loadLocale(input.locale);
  const rows = cleanRows(input.rows);

  if (rows.length === 0) {
    return table.messages.no_results;
  }

  const targeted = targetedAnswer(rows, input.question ?? "", input.locale);
  if (targeted) {
    return targeted;
  }

  switch (input.intentKind) {
    case "aggregate":
      return formatAggregate(table, rows);
    case "list":
      return formatList(table, rows);
    case "entity":
      return formatEntity(table, rows);
    case "traverse":
      return formatTraversal(table, rows, input.description);
    default:
      return formatDefault(table, rows);
  }
}

export function lowConfidenceMessage(question: string, locale: Locale): string {
  return message(locale, "low_confidence", { question });
}

export function connectionErrorMessage(locale: Locale): string {
  return message(locale, "connection_error");
}

export function executionErrorMessage(error: string, locale: Locale): string {
  return message(locale, "execution_error", { error });
}

export function unresolvedQueryMessage(error: string, locale: Locale): string {
  return message(locale, "unresolved_query", { error });
}
