/**
 * Pipeline Orchestration
 *
 * Stage functions behind the harvest, clean and run commands:
 * 1. Harvest - Run source adapters into intermediate tables
 * 2. Load - Read every intermediate table
 * 3. Normalize - Canonical schema, dates, domains; drop untitled
 * 4. Deduplicate - Greedy title clustering
 * 5. Assemble - Dense ids
 * 6. Enrich - Article text (optional)
 * 7. Write - Corpus table and pipeline_status.json
 *
 * This module focuses on the happy path - errors propagate to the
 * error handler (errorHandler.ts) for centralized handling.
 */

import type {
  CleanCounts,
  CleanSummary,
  CommandName,
  CorpusConfig,
  CorpusRow,
  HarvestSummary,
  PipelineConfig,
  PipelineStatus,
  RawRecord,
} from '../types/index.js';
import { buildAdapters, harvestAll } from '../collectors/index.js';
import { normalizeRecords, dropUntitled, deduplicate, assemble } from '../processing/index.js';
import { createTextExtractor, enrichRecords, type TextExtractor } from '../enrichment/index.js';
import { loadTables } from '../utils/tableLoader.js';
import { writeCorpus, writePipelineStatus, statusPathFor } from '../utils/fileWriter.js';
import {
  logStage,
  logSuccess,
  logInfo,
  logVerbose,
  logPipelineResult,
} from '../utils/logger.js';
import { completePipelineStatus, createPipelineStatus } from './errorHandler.js';

// ============================================
// Types
// ============================================

/**
 * Options for running a command
 */
export interface PipelineOptions {
  /** Replaces the HTTP text extractor */
  extractor?: TextExtractor;

  /** Receives each stage name as it starts */
  onStage?: (stage: string) => void;
}

/**
 * Complete command result
 */
export interface PipelineResult {
  harvest?: HarvestSummary;
  clean?: CleanSummary;
  status?: PipelineStatus;
}

// ============================================
// Stages
// ============================================

/**
 * Run every configured adapter into the raw directory.
 *
 * @param config - Run configuration
 * @param corpusConfig - Validated source configuration
 */
export async function runHarvest(
  config: PipelineConfig,
  corpusConfig: CorpusConfig
): Promise<HarvestSummary> {
  return harvestAll(buildAdapters(corpusConfig), {
    rawDir: config.rawDir,
    window: config.window,
    sleepMs: Math.round(corpusConfig.rate_limit.sleep_seconds * 1000),
    timeoutMs: config.requestTimeoutMs,
  });
}

/**
 * Normalize, filter, deduplicate and assemble raw records.
 *
 * @param raw - Records from the intermediate tables
 * @param threshold - Same-domain similarity threshold
 * @returns Final rows (without fulltext) and row counts
 */
export function cleanRecords(
  raw: RawRecord[],
  threshold: number
): { rows: CorpusRow[]; counts: CleanCounts } {
  const normalized = normalizeRecords(raw);
  const titled = dropUntitled(normalized);
  logVerbose(`Dropped ${titled.dropped} records without a title`);

  const deduped = deduplicate(titled.records, threshold);
  logVerbose(
    `Duplicates removed: ${deduped.duplicatesRemoved} ` +
      `(${deduped.sameDomainMatches} same-domain, ${deduped.crossDomainMatches} cross-domain)`
  );

  const rows = assemble(deduped.records);

  return {
    rows,
    counts: {
      inputRows: raw.length,
      droppedUntitled: titled.dropped,
      duplicatesRemoved: deduped.duplicatesRemoved,
      outputRows: rows.length,
    },
  };
}

/**
 * Build the corpus from the raw directory.
 *
 * @param config - Run configuration
 * @param options - Extractor override and stage callback
 * @throws NoInputTablesError when the raw directory holds no tables
 */
export async function runClean(
  config: PipelineConfig,
  options: PipelineOptions = {}
): Promise<CleanSummary> {
  const enterStage = options.onStage ?? (() => undefined);

  enterStage('load');
  logStage('Clean');
  const { tables, records } = await loadTables(config.rawDir);
  logInfo(`Loaded ${records.length} records from ${tables.length} table(s)`);

  enterStage('deduplicate');
  const cleaned = cleanRecords(records, config.threshold);
  let rows = cleaned.rows;
  const counts: CleanCounts = { ...cleaned.counts };

  if (config.extractText) {
    enterStage('enrich');
    logStage('Text Extraction');
    const extractor =
      options.extractor ?? createTextExtractor({ timeoutMs: config.extractTimeoutMs });
    const enrichment = await enrichRecords(rows, extractor);
    rows = enrichment.rows;
    counts.enriched = enrichment.enriched;
  }

  enterStage('write');
  await writeCorpus(config.outPath, rows, config.extractText);

  logSuccess(
    `Corpus written: ${counts.outputRows} records ` +
      `(${counts.inputRows} read, ${counts.droppedUntitled} untitled, ${counts.duplicatesRemoved} duplicates)`
  );

  return { counts, outPath: config.outPath, tables };
}

// ============================================
// Main Pipeline Function
// ============================================

/**
 * Run a command's stages in order.
 *
 * Commands that clean write a success pipeline_status.json next to the
 * corpus; failures are written by the error handler.
 *
 * @param command - harvest, clean or run
 * @param config - Run configuration
 * @param corpusConfig - Source configuration (required when the command harvests)
 * @param options - Extractor override and stage callback
 */
export async function runPipeline(
  command: CommandName,
  config: PipelineConfig,
  corpusConfig: CorpusConfig | undefined,
  options: PipelineOptions = {}
): Promise<PipelineResult> {
  const startTime = Date.now();
  const result: PipelineResult = {};

  if (command === 'harvest' || command === 'run') {
    if (corpusConfig === undefined) {
      throw new Error(`Source configuration is required for ${command}`);
    }
    options.onStage?.('harvest');
    result.harvest = await runHarvest(config, corpusConfig);
  }

  if (command === 'clean' || command === 'run') {
    result.clean = await runClean(config, options);

    const status: PipelineStatus = {
      ...completePipelineStatus(
        createPipelineStatus(command, config, startTime),
        true,
        Date.now() - startTime
      ),
      harvestedRows: result.harvest?.totalRows,
      counts: result.clean.counts,
    };
    await writePipelineStatus(statusPathFor(config.outPath), status);
    result.status = status;
  }

  logPipelineResult(
    true,
    Date.now() - startTime,
    result.clean !== undefined ? config.outPath : config.rawDir
  );

  return result;
}
