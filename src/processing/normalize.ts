/**
 * Record Normalization
 *
 * Coerces schema-incomplete RawRecords into canonical records:
 * missing columns become null, values become text, publication dates
 * are resolved from any of the shapes sources emit, and the link's
 * host is derived for deduplication.
 *
 * Nothing here throws on bad input; unusable values become null.
 */

import type { NormalizedRecord, RawRecord, TextColumn } from '../schemas/index.js';

// ============================================
// Value Coercion
// ============================================

/**
 * Coerce a cell value to text.
 *
 * Strings pass through, finite numbers and booleans become their string
 * form, valid Dates become ISO strings. Anything else is null.
 *
 * @param value - Any cell value
 * @returns Text or null
 */
export function coerceText(value: unknown): string | null {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? String(value) : null;
  }
  if (typeof value === 'boolean') {
    return String(value);
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  return null;
}

/**
 * Coerce to a trimmed string, "" when absent
 */
function coerceTrimmed(value: unknown): string {
  return (coerceText(value) ?? '').trim();
}

// ============================================
// Date Parsing
// ============================================

/** Epoch values below this are seconds, above are milliseconds */
const EPOCH_SECONDS_LIMIT = 1e11;

const COMPACT_DATE = /^(\d{4})(\d{2})(\d{2})$/;
const COMPACT_TIMESTAMP = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})Z$/;
const DIGITS_ONLY = /^\d+$/;
const NUMERIC_YMD = /^(\d{4})[-/.](\d{1,2})[-/.](\d{1,2})$/;
const LOCAL_DATE_TIME = /^(\d{4}-\d{2}-\d{2})[ T](\d{2}:\d{2}(:\d{2}(\.\d+)?)?)$/;

/** Free text reaches Date.parse only with one of these shapes */
const HAS_FULL_YMD = /\b\d{4}[-/.]\d{1,2}[-/.]\d{1,2}/;
const HAS_YEAR = /\b\d{4}\b/;
const HAS_MONTH_NAME =
  /\b(jan|feb|mar|apr|may|jun|jul|aug|sep|sept|oct|nov|dec|january|february|march|april|june|july|august|september|october|november|december)\b/i;

function validDate(ms: number): Date | null {
  const date = new Date(ms);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Build a UTC date, rejecting components Date.UTC would roll over
 */
function utcDate(
  year: number,
  month: number,
  day: number,
  hours = 0,
  minutes = 0,
  seconds = 0
): Date | null {
  if (month < 1 || month > 12 || hours > 23 || minutes > 59 || seconds > 59) {
    return null;
  }

  const date = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds));
  if (date.getUTCDate() !== day || date.getUTCMonth() !== month - 1) {
    return null;
  }
  return date;
}

function fromEpoch(value: number): Date | null {
  return validDate(Math.abs(value) < EPOCH_SECONDS_LIMIT ? value * 1000 : value);
}

function parseDateString(value: string): Date | null {
  const text = value.trim();
  if (text.length === 0) {
    return null;
  }

  if (DIGITS_ONLY.test(text)) {
    switch (text.length) {
      case 8: {
        const [, year, month, day] = COMPACT_DATE.exec(text) ?? [];
        return utcDate(Number(year), Number(month), Number(day));
      }
      case 10:
        return validDate(Number(text) * 1000);
      case 13:
        return validDate(Number(text));
      default:
        return null;
    }
  }

  const compact = COMPACT_TIMESTAMP.exec(text);
  if (compact) {
    const [, year, month, day, hours, minutes, seconds] = compact.map(Number);
    return utcDate(year, month, day, hours, minutes, seconds);
  }

  const ymd = NUMERIC_YMD.exec(text);
  if (ymd) {
    const [, year, month, day] = ymd.map(Number);
    return utcDate(year, month, day);
  }

  // No offset means UTC
  const local = LOCAL_DATE_TIME.exec(text);
  if (local) {
    return validDate(Date.parse(`${local[1]}T${local[2]}Z`));
  }

  const datelike =
    HAS_FULL_YMD.test(text) || (HAS_YEAR.test(text) && HAS_MONTH_NAME.test(text));
  return datelike ? validDate(Date.parse(text)) : null;
}

/**
 * Resolve a publication date from any supported shape.
 *
 * Accepted: Date instances, epoch numbers (seconds below 1e11, else
 * milliseconds), YYYYMMDD, 10-digit seconds and 13-digit milliseconds
 * strings, compact YYYYMMDDTHHMMSSZ timestamps, ISO 8601, and free
 * text Date.parse understands that carries a numeric year-month-day or a
 * four-digit year with a month name. Date-only strings are UTC midnight
 * and date-times without an offset are UTC.
 *
 * @param value - Raw date value
 * @returns Parsed date, or null when unresolvable
 */
export function parsePublicationDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return validDate(value.getTime());
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? fromEpoch(value) : null;
  }
  if (typeof value === 'string') {
    return parseDateString(value);
  }
  return null;
}

// ============================================
// Domain Derivation
// ============================================

/**
 * Derive host[:port] from an absolute link.
 *
 * @param link - Trimmed link
 * @returns Lowercased host, or null for empty, relative or host-less links
 */
export function extractDomain(link: string): string | null {
  if (link.length === 0) {
    return null;
  }

  let url: URL;
  try {
    url = new URL(link);
  } catch {
    return null;
  }

  return url.host.length > 0 ? url.host : null;
}

// ============================================
// Record Normalization
// ============================================

function textColumns(raw: RawRecord): Record<TextColumn, string | null> {
  return {
    type_source: coerceText(raw.type_source),
    langue: coerceText(raw.langue),
    controverse: coerceText(raw.controverse),
    secteur: coerceText(raw.secteur),
    territoire: coerceText(raw.territoire),
    acteurs: coerceText(raw.acteurs),
    role_acteurs: coerceText(raw.role_acteurs),
    rapports_pouvoir: coerceText(raw.rapports_pouvoir),
    issue: coerceText(raw.issue),
    mots_cles: coerceText(raw.mots_cles),
    extrait_citation: coerceText(raw.extrait_citation),
    note_analytique: coerceText(raw.note_analytique),
    source_name: coerceText(raw.source_name),
    source_type: coerceText(raw.source_type),
    source_country: coerceText(raw.source_country),
  };
}

/**
 * Normalize a single RawRecord. Any input `id` is ignored.
 */
export function normalizeRecord(raw: RawRecord): NormalizedRecord {
  const lien = coerceTrimmed(raw.lien);

  return {
    date_pub: parsePublicationDate(raw.date_pub),
    titre: coerceTrimmed(raw.titre),
    lien,
    ...textColumns(raw),
    domain: extractDomain(lien),
  };
}

/**
 * Normalize records, preserving order.
 *
 * @param raw - Records from the table loader or adapters
 * @returns One NormalizedRecord per input record
 */
export function normalizeRecords(raw: RawRecord[]): NormalizedRecord[] {
  return raw.map(normalizeRecord);
}

/**
 * Remove records with an empty title.
 *
 * @param records - Normalized records
 * @returns Kept records (order preserved) and the number dropped
 */
export function dropUntitled(records: NormalizedRecord[]): {
  records: NormalizedRecord[];
  dropped: number;
} {
  const kept = records.filter((record) => record.titre.length > 0);
  return { records: kept, dropped: records.length - kept.length };
}
