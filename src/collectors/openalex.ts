/**
 * OpenAlex Works Adapter
 *
 * Pages through the OpenAlex works search for the configured query and
 * window. A failed or malformed page stops paging; records already
 * yielded are kept.
 *
 * @see https://docs.openalex.org/api-entities/works
 */

import { z } from 'zod';
import { TYPE_SOURCE, type HarvestedRecord, type OpenAlexConfig } from '../schemas/index.js';
import type { DateWindow } from '../types/index.js';
import { getApiKey } from '../config.js';
import { parsePublicationDate } from '../processing/normalize.js';
import { httpGetJson, sleep } from '../utils/http.js';
import { logVerbose, logWarning } from '../utils/logger.js';
import { clampToWindow } from './fields.js';
import { ADAPTER_LABELS, type AdapterContext, type SourceAdapter } from './types.js';

// ============================================
// Constants
// ============================================

export const OPENALEX_WORKS_URL = 'https://api.openalex.org/works';

/** Concepts kept in mots_cles */
const MAX_KEYWORDS = 10;

// ============================================
// Response Schemas
// ============================================

const nullableString = z.string().nullish();

const NamedEntitySchema = z.object({ display_name: nullableString });

export const OpenAlexWorkSchema = z.object({
  id: nullableString,
  title: nullableString,
  display_name: nullableString,
  doi: nullableString,
  publication_date: nullableString,
  from_indexed_date: nullableString,
  language: nullableString,
  primary_location: z
    .object({
      source: z
        .object({
          display_name: nullableString,
          homepage_url: nullableString,
        })
        .nullish(),
    })
    .nullish(),
  concepts: z.array(NamedEntitySchema).nullish(),
  keywords: z.array(NamedEntitySchema).nullish(),
});

export type OpenAlexWork = z.infer<typeof OpenAlexWorkSchema>;

const OpenAlexPageSchema = z.object({
  meta: z.object({ count: z.number().nullish() }).nullish(),
  results: z.array(z.unknown()).nullish(),
});

// ============================================
// Mapping
// ============================================

function keywordList(work: OpenAlexWork): string | null {
  const entities = work.concepts && work.concepts.length > 0 ? work.concepts : (work.keywords ?? []);
  const names = entities
    .slice(0, MAX_KEYWORDS)
    .map((entity) => entity.display_name?.trim() ?? '')
    .filter((name) => name.length > 0);
  return names.length > 0 ? names.join(',') : null;
}

/**
 * Resolve a work's publication date string
 */
function workDate(work: OpenAlexWork): string | null {
  if (work.publication_date) {
    return work.publication_date;
  }
  if (work.from_indexed_date) {
    return work.from_indexed_date.split('T')[0];
  }
  return null;
}

/**
 * Map a work to a record.
 *
 * @param work - Validated work
 * @param window - Inclusive date window
 * @returns Record, or null when the work is dated outside the window
 */
export function mapWork(work: OpenAlexWork, window: DateWindow): HarvestedRecord | null {
  const clamped = clampToWindow(parsePublicationDate(workDate(work)), window);
  if (!clamped.keep) {
    return null;
  }

  const source = work.primary_location?.source;

  return {
    date_pub: clamped.date === null ? null : clamped.date.toISOString(),
    type_source: TYPE_SOURCE.ACADEMIC,
    titre: work.title ?? work.display_name ?? null,
    lien: work.doi || source?.homepage_url || work.id || null,
    langue: work.language ?? null,
    mots_cles: keywordList(work),
    extrait_citation: null,
    source_name: source?.display_name ?? null,
    source_type: 'openalex',
    source_country: null,
  };
}

/**
 * Query parameters for one page
 */
export function buildWorksParams(
  config: OpenAlexConfig,
  window: DateWindow,
  page: number
): Record<string, string | number | undefined> {
  const from = window.since.toISOString().slice(0, 10);
  const to = window.until.toISOString().slice(0, 10);
  const apiKey = getApiKey('OPENALEX_API_KEY');

  return {
    search: config.query,
    filter: `from_publication_date:${from},to_publication_date:${to}`,
    'per-page': config.per_page,
    page,
    mailto: config.mailto.length > 0 ? config.mailto : undefined,
    api_key: apiKey !== undefined && apiKey.trim().length > 0 ? apiKey : undefined,
  };
}

// ============================================
// Adapter
// ============================================

async function* harvestWorks(
  config: OpenAlexConfig,
  context: AdapterContext
): AsyncGenerator<HarvestedRecord> {
  for (let page = 1; ; page++) {
    const response = await httpGetJson(OPENALEX_WORKS_URL, {
      params: buildWorksParams(config, context.window, page),
      timeoutMs: context.timeoutMs,
    });
    await sleep(context.sleepMs);

    if (!response.success) {
      logWarning(`OpenAlex page ${page} failed (${response.reason}): ${response.message}`);
      return;
    }

    const parsed = OpenAlexPageSchema.safeParse(response.data);
    if (!parsed.success) {
      logWarning(`OpenAlex page ${page} failed (parse): unexpected response shape`);
      return;
    }

    const results = parsed.data.results ?? [];
    for (const item of results) {
      const work = OpenAlexWorkSchema.safeParse(item);
      if (!work.success) {
        logVerbose(`OpenAlex: skipping malformed work on page ${page}`);
        continue;
      }

      const record = mapWork(work.data, context.window);
      if (record !== null) {
        yield record;
      }
    }

    const total = parsed.data.meta?.count ?? 0;
    logVerbose(`OpenAlex page ${page}: ${results.length} works (total ${total})`);

    if (results.length === 0 || total <= page * config.per_page) {
      return;
    }
  }
}

/**
 * Create the OpenAlex adapter.
 *
 * @param config - The sources.openalex section
 */
export function createOpenAlexAdapter(config: OpenAlexConfig): SourceAdapter {
  return {
    label: ADAPTER_LABELS.OPENALEX,
    harvest: (context) => harvestWorks(config, context),
  };
}
