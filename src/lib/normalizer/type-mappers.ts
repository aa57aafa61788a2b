/**
 * Raw scalar to typed cell mappers
 */

import type { CellValue, FieldType, RawValue } from "../../types/data-model.js";
import { NULL_CELL } from "../../types/data-model.js";

/**
 * Widening order used by type inference; string accepts every value
 */
export const INFERENCE_ORDER: readonly FieldType[] = ["integer", "float", "date", "string"];

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;
const US_DATE_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

/**
 * Missing, null and blank values carry no data
 */
export function isBlank(value: RawValue | undefined): value is null | undefined | "" {
  return value === undefined || value === null || (typeof value === "string" && value.trim() === "");
}

export function parseInteger(value: RawValue): number | null {
  if (typeof value === "number") {
    return Number.isSafeInteger(value) ? value : null;
  }
  if (typeof value !== "string") return null;

  const trimmed = value.trim();
  if (!INTEGER_PATTERN.test(trimmed)) return null;
  const parsed = Number(trimmed);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

export function parseFloatValue(value: RawValue): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== "string") return null;

  const trimmed = value.trim();
  if (!FLOAT_PATTERN.test(trimmed)) return null;
  const parsed = Number(trimmed);
  if (!Number.isFinite(parsed)) return null;
  // Integer text past 2^53 would be stored rounded
  if (INTEGER_PATTERN.test(trimmed) && !Number.isSafeInteger(parsed)) return null;
  return parsed;
}

function formatDate(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12 || day < 1) return null;
  const date = new Date(Date.UTC(year, month - 1, day));
  // Rejects 2/30 and friends, which Date.UTC rolls over
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
}

/**
 * Parse an ISO-8601 date (time part ignored) or an FDIC M/D/YYYY date into YYYY-MM-DD
 */
export function parseDate(value: RawValue): string | null {
  if (typeof value !== "string") return null;
  const trimmed = value.trim();

  const iso = ISO_DATE_PATTERN.exec(trimmed);
  if (iso) {
    return formatDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  }

  const us = US_DATE_PATTERN.exec(trimmed);
  if (us) {
    return formatDate(Number(us[3]), Number(us[1]), Number(us[2]));
  }

  return null;
}

export function stringifyValue(value: Exclude<RawValue, null>): string {
  return typeof value === "string" ? value : String(value);
}

/**
 * Whether a non-blank value parses under the given type
 */
export function acceptsValue(type: FieldType, value: RawValue): boolean {
  switch (type) {
    case "integer":
      return parseInteger(value) !== null;
    case "float":
      return parseFloatValue(value) !== null;
    case "date":
      return parseDate(value) !== null;
    case "string":
    case "categorical":
      return value !== null;
  }
}

/**
 * Infer a column type from its observed values: the first type in
 * integer → float → date → string that accepts every non-blank value.
 * A column with no values at all is a string column.
 */
export function inferColumnType(values: Iterable<RawValue | undefined>): FieldType {
  const viable = new Set<FieldType>(INFERENCE_ORDER);
  let seen = false;

  for (const value of values) {
    if (isBlank(value)) continue;
    seen = true;
    for (const type of viable) {
      if (type !== "string" && !acceptsValue(type, value)) {
        viable.delete(type);
      }
    }
    if (viable.size === 1) break;
  }

  if (!seen) return "string";
  return INFERENCE_ORDER.find((type) => viable.has(type)) ?? "string";
}

/**
 * Coerce a raw value to a typed cell. Missing values and empty strings become
 * null, as do whitespace-only strings outside string columns;
 * `undefined` is returned when a present value does not parse.
 */
export function coerceValue(value: RawValue | undefined, type: FieldType): CellValue | undefined {
  if (value === undefined || value === null || value === "") return NULL_CELL;
  if (type === "string" || type === "categorical") {
    return { kind: "string", value: stringifyValue(value) };
  }
  if (isBlank(value)) return NULL_CELL;

  switch (type) {
    case "integer": {
      const parsed = parseInteger(value);
      return parsed === null ? undefined : { kind: "integer", value: parsed };
    }
    case "float": {
      const parsed = parseFloatValue(value);
      return parsed === null ? undefined : { kind: "float", value: parsed };
    }
    case "date": {
      const parsed = parseDate(value);
      return parsed === null ? undefined : { kind: "date", value: parsed };
    }
  }
}

/**
 * Plain JavaScript value of a cell, null for null cells
 */
export function cellToJs(cell: CellValue): string | number | null {
  return cell.kind === "null" ? null : cell.value;
}
