import type { Row, RowValue } from "@/types";

export type RowMap = { [key: string]: RowValue };

export function isMap(value: RowValue | undefined): value is RowMap {
  return value !== null && value !== undefined && typeof value === "object" && !Array.isArray(value);
}

/** Returns undefined for values that carry nothing: null, and maps or lists left empty after cleaning. */
export function cleanValue(value: RowValue): RowValue | undefined {
  if (value === null) {
    return undefined;
  }
  if (Array.isArray(value)) {
    const items: RowValue[] = [];
    for (const item of value) {
      const cleaned = cleanValue(item);
      if (cleaned !== undefined) {
        items.push(cleaned);
      }
    }
    return items.length > 0 ? items : undefined;
  }
  if (isMap(value)) {
    const out: RowMap = {};
    let kept = 0;
    for (const [key, inner] of Object.entries(value)) {
      const cleaned = cleanValue(inner);
      if (cleaned !== undefined) {
        out[key] = cleaned;
        kept++;
      }
    }
    return kept > 0 ? out : undefined;
  }
  return value;
}

export function cleanRows(rows: readonly Row[]): Row[] {
  const cleaned: Row[] = [];
  for (const row of rows) {
    const value = cleanValue(row);
    if (isMap(value)) {
      cleaned.push(value);
    }
  }
  return cleaned;
}

/** A row holding one map under a single alias (`RETURN b {...} AS building`) is read as that map. */
export function unwrapRow(row: Row): Row {
  const keys = Object.keys(row);
  if (keys.length === 1) {
    const inner = row[keys[0]];
    if (isMap(inner)) {
      return inner;
    }
  }
  return row;
}
