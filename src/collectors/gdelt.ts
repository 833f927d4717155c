/**
 * GDELT DOC 2.0 Article List Adapter
 *
 * Issues one ArtList request per calendar month of the window. A month
 * that fails (including plain-text error bodies) is logged and skipped.
 */

import { z } from 'zod';
import { TYPE_SOURCE, type GdeltConfig, type HarvestedRecord } from '../schemas/index.js';
import type { DateWindow } from '../types/index.js';
import { parsePublicationDate } from '../processing/normalize.js';
import { httpGetText, sleep } from '../utils/http.js';
import { logVerbose, logWarning } from '../utils/logger.js';
import { clampToWindow } from './fields.js';
import { ADAPTER_LABELS, type AdapterContext, type SourceAdapter } from './types.js';

// ============================================
// Constants
// ============================================

export const GDELT_DOC_URL = 'https://api.gdeltproject.org/api/v2/doc/doc';

/** Largest maxrecords the DOC API honours */
export const GDELT_MAX_RECORDS = 250;

// ============================================
// Response Schemas
// ============================================

const nullableString = z.string().nullish();

export const GdeltArticleSchema = z.object({
  url: nullableString,
  title: nullableString,
  seendate: nullableString,
  domain: nullableString,
  language: nullableString,
  sourcecountry: nullableString,
});

export type GdeltArticle = z.infer<typeof GdeltArticleSchema>;

const GdeltResponseSchema = z.object({
  articles: z.array(z.unknown()).nullish(),
});

// ============================================
// Month Windows
// ============================================

/**
 * A single request window
 */
export interface MonthWindow {
  start: Date;
  end: Date;
}

/**
 * Split the window into calendar months (UTC). Each month ends at
 * 23:59:59 of its last day; the first and last months are clipped to
 * the window.
 */
export function monthWindows(window: DateWindow): MonthWindow[] {
  const months: MonthWindow[] = [];
  let year = window.since.getUTCFullYear();
  let month = window.since.getUTCMonth();

  for (;;) {
    const monthStart = new Date(Date.UTC(year, month, 1));
    if (monthStart.getTime() > window.until.getTime()) {
      break;
    }

    // Day 0 of the next month is the last day of this one
    const monthEnd = new Date(Date.UTC(year, month + 1, 0, 23, 59, 59));

    months.push({
      start: monthStart.getTime() < window.since.getTime() ? window.since : monthStart,
      end: monthEnd.getTime() > window.until.getTime() ? window.until : monthEnd,
    });

    month++;
    if (month === 12) {
      month = 0;
      year++;
    }
  }

  return months;
}

/**
 * Format a date as YYYYMMDDHHMMSS (UTC)
 */
export function formatGdeltTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace(/[-T:]/g, '');
}

// ============================================
// Mapping
// ============================================

/**
 * Map an article to a record.
 *
 * @param article - Validated article
 * @param window - Inclusive date window
 * @returns Record, or null when the article is dated outside the window
 */
export function mapArticle(article: GdeltArticle, window: DateWindow): HarvestedRecord | null {
  const clamped = clampToWindow(parsePublicationDate(article.seendate), window);
  if (!clamped.keep) {
    return null;
  }

  return {
    date_pub: clamped.date === null ? null : clamped.date.toISOString(),
    type_source: TYPE_SOURCE.PRESS,
    titre: article.title ?? null,
    lien: article.url ?? null,
    langue: article.language ?? null,
    mots_cles: null,
    extrait_citation: null,
    source_name: article.domain || article.sourcecountry || null,
    source_type: 'gdelt',
    source_country: article.sourcecountry ?? null,
  };
}

/**
 * Parse a DOC API body. The API reports some errors as plain text.
 */
export function parseArticleList(
  body: string
): { success: true; articles: unknown[] } | { success: false; error: string } {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return { success: false, error: `Non-JSON response: ${body.slice(0, 120).trim()}` };
  }

  const parsed = GdeltResponseSchema.safeParse(json);
  if (!parsed.success) {
    return { success: false, error: 'Unexpected response shape' };
  }
  return { success: true, articles: parsed.data.articles ?? [] };
}

// ============================================
// Adapter
// ============================================

async function* harvestArticles(
  config: GdeltConfig,
  context: AdapterContext
): AsyncGenerator<HarvestedRecord> {
  const maxRecords = Math.min(config.max_records, GDELT_MAX_RECORDS);

  for (const month of monthWindows(context.window)) {
    const startdatetime = formatGdeltTimestamp(month.start);
    const response = await httpGetText(GDELT_DOC_URL, {
      params: {
        query: config.gkg_search,
        mode: 'ArtList',
        format: 'json',
        maxrecords: maxRecords,
        startdatetime,
        enddatetime: formatGdeltTimestamp(month.end),
      },
      timeoutMs: context.timeoutMs,
    });
    await sleep(context.sleepMs);

    if (!response.success) {
      logWarning(`GDELT month ${startdatetime} skipped (${response.reason}): ${response.message}`);
      continue;
    }

    const list = parseArticleList(response.data);
    if (!list.success) {
      logWarning(`GDELT month ${startdatetime} skipped (parse): ${list.error}`);
      continue;
    }

    let kept = 0;
    for (const item of list.articles) {
      const article = GdeltArticleSchema.safeParse(item);
      if (!article.success) continue;

      const record = mapArticle(article.data, context.window);
      if (record !== null) {
        kept++;
        yield record;
      }
    }
    logVerbose(`GDELT month ${startdatetime}: ${kept}/${list.articles.length} articles`);
  }
}

/**
 * Create the GDELT adapter.
 *
 * @param config - The sources.gdelt section
 */
export function createGdeltAdapter(config: GdeltConfig): SourceAdapter {
  return {
    label: ADAPTER_LABELS.GDELT,
    harvest: (context) => harvestArticles(config, context),
  };
}
