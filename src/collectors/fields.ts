/**
 * Field Access Helpers
 *
 * Sources return loosely shaped entries. These helpers read them
 * through explicit lookups instead of assuming a shape.
 */

import type { DateWindow } from '../types/index.js';

/**
 * Outcome of a field lookup
 */
export type FieldLookup =
  | { found: true; key: string; value: unknown }
  | { found: false };

/**
 * Keys probed when a text value arrives as an object
 */
const TEXT_KEYS = ['title', 'value', 'label', 'name', 'text', '#text'] as const;

const textDecoder = new TextDecoder('utf-8');

/**
 * Check if a value is a plain key/value object
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Wrap a possibly repeated element as an array
 */
export function asArray(value: unknown): unknown[] {
  if (Array.isArray(value)) return value;
  if (value === undefined || value === null) return [];
  return [value];
}

function isPresent(value: unknown): boolean {
  if (value === undefined || value === null) return false;
  if (typeof value === 'string') return value.trim().length > 0;
  if (Array.isArray(value)) return value.length > 0;
  return true;
}

/**
 * Return the first present, non-empty field among `keys`.
 *
 * Null, undefined, blank strings and empty arrays count as absent.
 * Non-objects have no fields.
 *
 * @param value - Opaque entry
 * @param keys - Field names, in priority order
 */
export function pickField(value: unknown, keys: readonly string[]): FieldLookup {
  if (!isRecord(value)) {
    return { found: false };
  }

  for (const key of keys) {
    if (Object.hasOwn(value, key) && isPresent(value[key])) {
      return { found: true, key, value: value[key] };
    }
  }
  return { found: false };
}

function textOf(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (value instanceof Uint8Array) return textDecoder.decode(value);
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);

  if (isRecord(value)) {
    for (const key of TEXT_KEYS) {
      const field = pickField(value, [key]);
      if (field.found && (typeof field.value === 'string' || field.value instanceof Uint8Array)) {
        return textOf(field.value);
      }
    }
  }
  return null;
}

/**
 * Reduce a feed value to plain text.
 *
 * Bytes are decoded as UTF-8, objects are probed for a text field, HTML
 * tags become spaces and whitespace is collapsed.
 *
 * @returns Cleaned text, or null when nothing textual remains
 */
export function cleanText(value: unknown): string | null {
  const text = textOf(value);
  if (text === null) {
    return null;
  }

  const cleaned = text
    .replace(/<[^>]+>/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
  return cleaned.length > 0 ? cleaned : null;
}

/**
 * Decide whether a dated record belongs to the window.
 * Undated records are kept.
 */
export function clampToWindow(
  date: Date | null,
  window: DateWindow
): { keep: true; date: Date | null } | { keep: false } {
  if (date === null) {
    return { keep: true, date: null };
  }

  const time = date.getTime();
  if (time < window.since.getTime() || time > window.until.getTime()) {
    return { keep: false };
  }
  return { keep: true, date };
}
