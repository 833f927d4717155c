/**
 * Source Adapter Types
 *
 * Every source is an adapter: a label plus an async generator of
 * HarvestedRecords for a date window.
 */

import type { DateWindow, HarvestedRecord } from '../types/index.js';

/**
 * Per-run inputs shared by every adapter
 */
export interface AdapterContext {
  /** Inclusive publication date window */
  window: DateWindow;

  /** Pause after each request */
  sleepMs: number;

  /** Hard timeout for each request */
  timeoutMs: number;
}

/**
 * A source of records
 */
export interface SourceAdapter {
  /** Identifies the adapter in logs and batch file names */
  readonly label: string;

  harvest(context: AdapterContext): AsyncIterable<HarvestedRecord>;
}

/**
 * Labels of the built-in adapters
 */
export const ADAPTER_LABELS = {
  RSS_NEWS: 'rss-news',
  RSS_NGO: 'rss-ngo',
  OPENALEX: 'openalex',
  GDELT: 'gdelt',
} as const;
