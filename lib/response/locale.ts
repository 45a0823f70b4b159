import { readFileSync, existsSync } from "fs";
import { join } from "path";
import { parse } from "yaml";
import { z } from "zod";
import { CatalogueError } from "@/lib/errors";
import { formatZodIssues } from "@/lib/ontology/validator";
import { LOCALES } from "@/types";
import type { Locale } from "@/types";

const LOCALES_DIR = join(process.cwd(), "context", "locales");

const MessagesSchema = z.object({
  no_results: z.string(),
  low_confidence: z.string(),
  connection_error: z.string(),
  execution_error: z.string(),
  unresolved_query: z.string(),
  count: z.string(),
  list_header: z.string(),
  results_header: z.string(),
  more_results: z.string(),
  more_items: z.string(),
});

const LocaleFileSchema = z.object({
  locale: z.enum(LOCALES),
  label: z.string(),
  messages: MessagesSchema,
  field_labels: z.record(z.string()).default({}),
  targeted_answers: z
    .array(
      z.object({
        pattern: z.string().min(1),
        field: z.string().min(1),
        template: z.string().includes("{value}"),
      })
    )
    .default([]),
  examples: z.array(z.string()).default([]),
});

export type LocaleMessages = z.infer<typeof MessagesSchema>;
export type MessageKey = keyof LocaleMessages;
type LocaleFile = z.infer<typeof LocaleFileSchema>;
export type TargetedAnswer = LocaleFile["targeted_answers"][number];

export interface LocaleTable {
  locale: Locale;
  label: string;
  messages: LocaleMessages;
  fieldLabels: Record<string, string>;
  targetedAnswers: TargetedAnswer[];
  examples: string[];
}

const cache = new Map<Locale, LocaleTable>();

export function parseLocaleTable(content: string, source: string): LocaleTable {
  let raw: unknown;
  try {
    raw = parse(content);
  } catch (error) {
    throw new CatalogueError(`invalid YAML (${error instanceof Error ? error.message : String(error)})`, source);
  }

  const result = LocaleFileSchema.safeParse(raw);
  if (!result.success) {
    throw new CatalogueError(formatZodIssues(result.error).join("; "), source);
  }

  const file = result.data;
  return {
    locale: file.locale,
    label: file.label,
    messages: file.messages,
    fieldLabels: file.field_labels,
    targetedAnswers: file.targeted_answers,
    examples: file.examples,
  };
}

export function loadLocale(locale: Locale, dir: string = LOCALES_DIR): LocaleTable {
  const cached = cache.get(locale);
  if (cached && dir === LOCALES_DIR) {
    return cached;
  }

  const path = join(dir, `${locale}.yaml`);
  if (!existsSync(path)) {
    throw new CatalogueError("file not found", path);
  }

  const table = parseLocaleTable(readFileSync(path, "utf-8"), path);
  if (table.locale !== locale) {
    throw new CatalogueError(`declares locale "${table.locale}", expected "${locale}"`, path);
  }
  if (dir === LOCALES_DIR) {
    cache.set(locale, table);
  }
  return table;
}

export function isLocale(value: string): value is Locale {
  return LOCALES.some(locale => locale === value);
}

/** Replace {placeholders}; unknown placeholders are left as they are. */
export function fill(template: string, values: Record<string, string | number>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => {
    const value = values[key];
    return value === undefined ? match : String(value);
  });
}

export function message(
  locale: Locale,
  key: MessageKey,
  values: Record<string, string | number> = {}
): string {
  return fill(loadLocale(locale).messages[key], values);
}
