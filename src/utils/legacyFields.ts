// src/utils/legacyFields.ts

import { AnswerValue } from "../types/migrationTypes";

export const isPlainRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Returns the value under the first key present in `doc`, checking `keys` in
 * priority order. A key holding `null` still counts as present.
 */
export function pickField(doc: unknown, keys: readonly string[]): unknown {
  if (!isPlainRecord(doc)) return undefined;
  for (const key of keys) {
    if (Object.prototype.hasOwnProperty.call(doc, key)) {
      return doc[key];
    }
  }
  return undefined;
}

/**
 * Like {@link pickField} but a key holding `null` falls through to the next
 * one. Falsy values such as `0` are kept.
 */
export function pickDefined(doc: unknown, keys: readonly string[]): unknown {
  if (!isPlainRecord(doc)) return undefined;
  for (const key of keys) {
    const value = doc[key];
    if (value !== undefined && value !== null) return value;
  }
  return undefined;
}

const isFilled = (value: unknown): boolean => {
  if (value === undefined || value === null || value === false) return false;
  if (typeof value === "string") return value.length > 0;
  if (typeof value === "number") return value !== 0 && !Number.isNaN(value);
  if (Array.isArray(value)) return value.length > 0;
  return true;
};

/**
 * Like {@link pickField} but skips keys whose value is empty (null, "", 0,
 * false, []), so a blank legacy spelling falls through to the next one.
 */
export function pickFilled(doc: unknown, keys: readonly string[]): unknown {
  if (!isPlainRecord(doc)) return undefined;
  for (const key of keys) {
    if (isFilled(doc[key])) return doc[key];
  }
  return undefined;
}

export const normalizeText = (value: unknown): string | null =>
  value === undefined || value === null ? null : String(value).trim();

// Case and whitespace insensitive form used for option matching
export const normalizeForMatch = (value: unknown): string | null => {
  const text = normalizeText(value);
  return text === null ? null : text.toLowerCase();
};

const DECIMAL_FLOAT = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export function toFloatOrNull(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  if (!DECIMAL_FLOAT.test(trimmed)) return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

export const isNumberLike = (value: unknown): boolean => toFloatOrNull(value) !== null;

/**
 * Projects a raw answer value onto exactly one of `value_number` and
 * `value_text`. Booleans count as numbers (1 and 0). Returns null for values
 * that have no scalar form (absent, arrays, nested objects).
 */
export function coerceAnswerValue(raw: unknown): AnswerValue | null {
  if (raw === undefined || raw === null) return null;
  if (typeof raw === "boolean") {
    return { value_text: null, value_number: raw ? 1 : 0 };
  }
  const asNumber = toFloatOrNull(raw);
  if (asNumber !== null) {
    return { value_text: null, value_number: asNumber };
  }
  if (typeof raw === "string") {
    return { value_text: raw, value_number: null };
  }
  return null;
}

export function toIntegerOrNull(value: unknown): number | null {
  const parsed = toFloatOrNull(value);
  return parsed !== null && Number.isInteger(parsed) ? parsed : null;
}
