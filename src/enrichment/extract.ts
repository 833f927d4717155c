/**
 * Article Text Extraction
 *
 * Fetches a record's linked page and extracts its body text with
 * cheerio: boilerplate removal, then article > main > body.
 * Failures are reported as typed results, never thrown.
 */

import * as cheerio from 'cheerio';
import type { CorpusRow } from '../schemas/index.js';
import { httpGetText, BROWSER_USER_AGENT } from '../utils/http.js';
import { logProgress, logVerbose, logWarning } from '../utils/logger.js';

// ============================================
// Types
// ============================================

/**
 * Why no text was extracted
 */
export type ExtractionFailureReason = 'timeout' | 'http_status' | 'network' | 'empty';

/**
 * Result of extracting one page
 */
export type ExtractionResult =
  | { success: true; text: string }
  | { success: false; reason: ExtractionFailureReason; message: string; status?: number };

/**
 * Injectable text extraction capability
 */
export type TextExtractor = (url: string) => Promise<string | null>;

export interface ExtractOptions {
  /** Hard per-request timeout in milliseconds */
  timeoutMs: number;
}

/**
 * Elements removed before reading text
 */
export const BOILERPLATE_SELECTORS = [
  'script',
  'style',
  'noscript',
  'iframe',
  'nav',
  'header',
  'footer',
  'aside',
  'form',
  'table',
  '.navigation',
  '.sidebar',
  '.menu',
  '.cookie-banner',
  '.comments',
  '#comments',
  '.comment',
  '[role="navigation"]',
  '[role="banner"]',
  '[role="contentinfo"]',
] as const;

/** Progress is logged every this many records */
const PROGRESS_INTERVAL = 25;

// ============================================
// HTML Extraction
// ============================================

/**
 * Extract readable body text from an HTML document.
 *
 * @param html - Page source
 * @returns Text with paragraphs separated by blank lines, or null when empty
 */
export function extractArticleText(html: string): string | null {
  const $ = cheerio.load(html);

  for (const selector of BOILERPLATE_SELECTORS) {
    $(selector).remove();
  }

  // Extract main content (prefer article, main, or body)
  let contentElement = $('article').first();
  if (contentElement.length === 0) {
    contentElement = $('main').first();
  }
  if (contentElement.length === 0) {
    contentElement = $('body');
  }

  const paragraphs = contentElement
    .find('p')
    .map((_, el) => $(el).text().replace(/\s+/g, ' ').trim())
    .get()
    .filter((text) => text.length > 0);

  const text =
    paragraphs.length > 0
      ? paragraphs.join('\n\n')
      : contentElement
          .text()
          .replace(/[ \t]+/g, ' ')
          .replace(/\s*\n\s*/g, '\n')
          .replace(/\n{2,}/g, '\n\n')
          .trim();

  return text.length > 0 ? text : null;
}

// ============================================
// Fetching
// ============================================

/**
 * Fetch a page and extract its text. Not retried.
 *
 * @param url - Page URL
 * @param options - Timeout
 */
export async function fetchArticleText(
  url: string,
  options: ExtractOptions
): Promise<ExtractionResult> {
  const response = await httpGetText(url, {
    timeoutMs: options.timeoutMs,
    headers: {
      'User-Agent': BROWSER_USER_AGENT,
      Accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8',
    },
  });

  if (!response.success) {
    return {
      success: false,
      reason: response.reason === 'parse' ? 'empty' : response.reason,
      message: response.message,
      status: response.status,
    };
  }

  const text = extractArticleText(response.data);
  if (text === null) {
    return { success: false, reason: 'empty', message: 'No text found in page' };
  }
  return { success: true, text };
}

/**
 * Wrap fetchArticleText as a TextExtractor; failures become null.
 */
export function createTextExtractor(options: ExtractOptions): TextExtractor {
  return async (url) => {
    const result = await fetchArticleText(url, options);
    if (result.success) {
      return result.text;
    }
    logVerbose(`No text for ${url} (${result.reason}): ${result.message}`);
    return null;
  };
}

// ============================================
// Enrichment
// ============================================

/**
 * Set `fulltext` on every row, one request at a time.
 *
 * Rows without a link get null without a request. An extractor that
 * throws is logged and yields null.
 *
 * @param rows - Assembled rows
 * @param extractor - Text extraction capability
 * @returns New rows with fulltext, and how many got text
 */
export async function enrichRecords(
  rows: CorpusRow[],
  extractor: TextExtractor
): Promise<{ rows: CorpusRow[]; enriched: number }> {
  const enrichedRows: CorpusRow[] = [];
  let enriched = 0;

  for (const [index, row] of rows.entries()) {
    let fulltext: string | null = null;

    if (row.lien.length > 0) {
      try {
        fulltext = await extractor(row.lien);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logWarning(`Text extraction failed for ${row.lien}: ${message}`);
      }
    }

    if (fulltext !== null) {
      enriched++;
    }
    enrichedRows.push({ ...row, fulltext });

    if ((index + 1) % PROGRESS_INTERVAL === 0 || index + 1 === rows.length) {
      logProgress(index + 1, rows.length, `${enriched} pages extracted`);
    }
  }

  return { rows: enrichedRows, enriched };
}
