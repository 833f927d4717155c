/**
 * Harvest Orchestrator
 *
 * Main entry point for the harvest stage.
 * Runs adapters one after another, writes one batch table per adapter
 * and treats a failing adapter as zero rows.
 */

import type { CorpusConfig, HarvestedRecord, HarvestSummary, AdapterOutcome } from '../types/index.js';
import { HarvestedRecordSchema } from '../schemas/index.js';
import { writeBatch } from '../utils/fileWriter.js';
import {
  logStage,
  logProgress,
  logWarning,
  logVerbose,
  logSuccess,
  logInfo,
} from '../utils/logger.js';
import { createRssAdapter } from './rss.js';
import { createOpenAlexAdapter } from './openalex.js';
import { createGdeltAdapter } from './gdelt.js';
import { ADAPTER_LABELS, type AdapterContext, type SourceAdapter } from './types.js';

// ============================================
// Types
// ============================================

/**
 * Inputs of a harvest run
 */
export interface HarvestOptions extends AdapterContext {
  /** Directory receiving batch tables */
  rawDir: string;
}

// ============================================
// Adapter Selection
// ============================================

/**
 * Build the adapter list from the source configuration.
 *
 * Feed groups with no URLs and API sections that are absent or have an
 * empty query are skipped.
 *
 * @param config - Validated source configuration
 */
export function buildAdapters(config: CorpusConfig): SourceAdapter[] {
  const adapters: SourceAdapter[] = [];
  const { rss, ngo_rss, openalex, gdelt } = config.sources;

  if (rss.length > 0) {
    adapters.push(createRssAdapter(ADAPTER_LABELS.RSS_NEWS, rss));
  }

  if (ngo_rss.length > 0) {
    adapters.push(createRssAdapter(ADAPTER_LABELS.RSS_NGO, ngo_rss));
  }

  if (openalex !== undefined && openalex.query.trim().length > 0) {
    adapters.push(createOpenAlexAdapter(openalex));
  } else {
    logVerbose('OpenAlex skipped: no query configured');
  }

  if (gdelt !== undefined && gdelt.gkg_search.trim().length > 0) {
    adapters.push(createGdeltAdapter(gdelt));
  } else {
    logVerbose('GDELT skipped: no query configured');
  }

  return adapters;
}

// ============================================
// Main Orchestrator
// ============================================

/**
 * Drain one adapter into a buffer, dropping records that fail the schema
 */
async function drain(adapter: SourceAdapter, context: AdapterContext): Promise<HarvestedRecord[]> {
  const buffer: HarvestedRecord[] = [];
  let invalid = 0;
  for await (const record of adapter.harvest(context)) {
    const parsed = HarvestedRecordSchema.safeParse(record);
    if (parsed.success) {
      buffer.push(parsed.data);
    } else {
      invalid++;
    }
  }
  if (invalid > 0) {
    logVerbose(`${adapter.label}: ${invalid} invalid record(s) dropped`);
  }
  return buffer;
}

/**
 * Run every adapter and persist its output.
 *
 * Execution flow:
 * 1. Run adapters SEQUENTIALLY, each drained into its own buffer
 * 2. An adapter that throws is logged and recorded with zero rows;
 *    its partial buffer is discarded
 * 3. A non-empty buffer is written as <label>_<timestamp>_<id>.csv
 *
 * @param adapters - Adapters to run, in order
 * @param options - Window, pacing, timeout and output directory
 * @returns Per-adapter outcomes and the total row count
 * @throws Error if a batch table cannot be written
 */
export async function harvestAll(
  adapters: SourceAdapter[],
  options: HarvestOptions
): Promise<HarvestSummary> {
  logStage('Harvest');

  if (adapters.length === 0) {
    logWarning('No sources configured; nothing to harvest');
    return { adapters: [], totalRows: 0 };
  }

  logInfo(`Harvesting from: ${adapters.map((a) => a.label).join(', ')}`);

  const { rawDir, ...context } = options;
  const outcomes: AdapterOutcome[] = [];

  for (const [index, adapter] of adapters.entries()) {
    let records: HarvestedRecord[];
    try {
      records = await drain(adapter, context);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logWarning(`${adapter.label} failed: ${message}`);
      outcomes.push({ label: adapter.label, rows: 0, error: message });
      continue;
    }

    if (records.length === 0) {
      logProgress(index + 1, adapters.length, `${adapter.label}: no records`);
      outcomes.push({ label: adapter.label, rows: 0 });
      continue;
    }

    const file = await writeBatch(rawDir, adapter.label, records);
    logProgress(index + 1, adapters.length, `${adapter.label}: ${records.length} records`);
    outcomes.push({ label: adapter.label, rows: records.length, file });
  }

  const totalRows = outcomes.reduce((sum, outcome) => sum + outcome.rows, 0);
  const failed = outcomes.filter((outcome) => outcome.error !== undefined).length;

  logSuccess(`Harvest complete: ${totalRows} records from ${adapters.length - failed} source(s)`);
  if (failed > 0) {
    logInfo(`Failed sources: ${failed}`);
  }

  return { adapters: outcomes, totalRows };
}

// ============================================
// Re-exports
// ============================================

export { createRssAdapter, parseFeed, mapFeedEntry } from './rss.js';
export { createOpenAlexAdapter, mapWork } from './openalex.js';
export { createGdeltAdapter, mapArticle, monthWindows } from './gdelt.js';
export { pickField, cleanText, clampToWindow } from './fields.js';
export { ADAPTER_LABELS, type AdapterContext, type SourceAdapter } from './types.js';
