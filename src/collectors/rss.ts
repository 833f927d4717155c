/**
 * RSS / Atom / RDF Feed Adapter
 *
 * Fetches each configured feed, parses it with fast-xml-parser and maps
 * every entry to a press record. A feed that fails to download or parse
 * is logged and skipped.
 */

import { XMLParser } from 'fast-xml-parser';
import { TYPE_SOURCE, type HarvestedRecord } from '../schemas/index.js';
import type { DateWindow } from '../types/index.js';
import { parsePublicationDate } from '../processing/normalize.js';
import { httpGetText, sleep, BROWSER_USER_AGENT } from '../utils/http.js';
import { logVerbose, logWarning } from '../utils/logger.js';
import { asArray, cleanText, clampToWindow, isRecord, pickField } from './fields.js';
import type { AdapterContext, SourceAdapter } from './types.js';

// ============================================
// Constants
// ============================================

/** Date fields, in priority order */
const DATE_KEYS = ['pubDate', 'published', 'updated', 'dc:date', 'issued', 'modified'] as const;

const SUMMARY_KEYS = ['description', 'summary', 'content'] as const;

const FEED_ACCEPT = 'application/rss+xml, application/atom+xml, application/xml;q=0.9, */*;q=0.8';

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  parseTagValue: false,
  parseAttributeValue: false,
  htmlEntities: true,
  isArray: (name) => name === 'item' || name === 'entry',
});

// ============================================
// Parsing
// ============================================

/**
 * Result of parsing a feed document
 */
export type FeedParseResult =
  | { success: true; format: 'rss' | 'atom' | 'rdf'; entries: unknown[] }
  | { success: false; error: string };

/**
 * Parse feed XML and list its entries.
 *
 * @param xml - Feed document
 */
export function parseFeed(xml: string): FeedParseResult {
  let document: unknown;
  try {
    document = parser.parse(xml);
  } catch (error) {
    return { success: false, error: error instanceof Error ? error.message : String(error) };
  }

  const rss = pickField(document, ['rss']);
  if (rss.found) {
    const channel = pickField(rss.value, ['channel']);
    const items = channel.found ? pickField(channel.value, ['item']) : { found: false as const };
    return { success: true, format: 'rss', entries: items.found ? asArray(items.value) : [] };
  }

  const feed = pickField(document, ['feed']);
  if (feed.found) {
    const entries = pickField(feed.value, ['entry']);
    return { success: true, format: 'atom', entries: entries.found ? asArray(entries.value) : [] };
  }

  const rdf = pickField(document, ['rdf:RDF']);
  if (rdf.found) {
    const items = pickField(rdf.value, ['item']);
    return { success: true, format: 'rdf', entries: items.found ? asArray(items.value) : [] };
  }

  return { success: false, error: 'No rss, feed or rdf:RDF root element' };
}

// ============================================
// Entry Mapping
// ============================================

/**
 * First resolvable date among the entry's date fields
 */
export function entryDate(entry: unknown): Date | null {
  for (const key of DATE_KEYS) {
    const field = pickField(entry, [key]);
    if (!field.found) continue;

    const date = parsePublicationDate(cleanText(field.value));
    if (date !== null) {
      return date;
    }
  }
  return null;
}

function isUrl(value: string): boolean {
  return /^https?:\/\//i.test(value);
}

/**
 * Entry link: a plain <link>, the Atom alternate link, or a URL guid
 */
export function entryLink(entry: unknown): string | null {
  const link = pickField(entry, ['link']);

  if (link.found) {
    for (const candidate of asArray(link.value)) {
      if (typeof candidate === 'string' && candidate.trim().length > 0) {
        return candidate.trim();
      }

      if (isRecord(candidate)) {
        const rel = candidate['@_rel'];
        const href = candidate['@_href'];
        if (
          typeof href === 'string' &&
          href.trim().length > 0 &&
          (rel === undefined || rel === 'alternate')
        ) {
          return href.trim();
        }

        const text = cleanText(candidate['#text']);
        if (text !== null) {
          return text;
        }
      }
    }
  }

  const guid = pickField(entry, ['guid', 'id']);
  if (guid.found) {
    const text = cleanText(guid.value);
    if (text !== null && isUrl(text)) {
      return text;
    }
  }

  return null;
}

function firstText(entry: unknown, keys: readonly string[]): string | null {
  for (const key of keys) {
    const field = pickField(entry, [key]);
    if (!field.found) continue;

    const text = cleanText(field.value);
    if (text !== null) {
      return text;
    }
  }
  return null;
}

/**
 * Map a feed entry to a record.
 *
 * @param entry - Parsed <item> or <entry>
 * @param window - Inclusive date window
 * @returns Record, or null when the entry is dated outside the window
 */
export function mapFeedEntry(entry: unknown, window: DateWindow): HarvestedRecord | null {
  const clamped = clampToWindow(entryDate(entry), window);
  if (!clamped.keep) {
    return null;
  }

  return {
    date_pub: clamped.date === null ? null : clamped.date.toISOString(),
    type_source: TYPE_SOURCE.PRESS,
    titre: firstText(entry, ['title']),
    lien: entryLink(entry),
    langue: null,
    mots_cles: null,
    extrait_citation: firstText(entry, SUMMARY_KEYS),
    source_name: firstText(entry, ['source', 'author', 'dc:creator']),
    source_type: 'rss',
    source_country: null,
  };
}

// ============================================
// Adapter
// ============================================

async function* harvestFeeds(
  feedUrls: readonly string[],
  context: AdapterContext
): AsyncGenerator<HarvestedRecord> {
  for (const url of feedUrls) {
    const response = await httpGetText(url, {
      timeoutMs: context.timeoutMs,
      headers: { Accept: FEED_ACCEPT, 'User-Agent': BROWSER_USER_AGENT },
    });
    await sleep(context.sleepMs);

    if (!response.success) {
      logWarning(`Feed skipped (${response.reason}): ${url} - ${response.message}`);
      continue;
    }

    const feed = parseFeed(response.data);
    if (!feed.success) {
      logWarning(`Feed skipped (parse): ${url} - ${feed.error}`);
      continue;
    }

    let kept = 0;
    for (const entry of feed.entries) {
      const record = mapFeedEntry(entry, context.window);
      if (record !== null) {
        kept++;
        yield record;
      }
    }
    logVerbose(`${url}: ${kept}/${feed.entries.length} ${feed.format} entries in window`);
  }
}

/**
 * Create an adapter over a list of feeds.
 *
 * @param label - Adapter label (e.g. rss-news)
 * @param feedUrls - Feed URLs, fetched in order
 */
export function createRssAdapter(label: string, feedUrls: readonly string[]): SourceAdapter {
  return {
    label,
    harvest: (context) => harvestFeeds(feedUrls, context),
  };
}
