/**
 * Type Definitions
 *
 * Re-exports all Zod-inferred types from schemas
 * and defines run configuration and stage result types.
 */

// ============================================
// Re-export all schema types
// ============================================

export type {
  // Adapter output
  SourceTag,
  RawRecord,
  BatchColumn,
  HarvestedRecord,

  // Canonical records
  CorpusColumn,
  TextColumn,
  NormalizedRecord,
  CorpusRow,
  TableCell,

  // YAML configuration
  OpenAlexConfig,
  GdeltConfig,
  CorpusConfig,

  // Run status
  CommandName,
  CleanCounts,
  PipelineStatus,
} from '../schemas/index.js';

import type { CleanCounts } from '../schemas/index.js';

// ============================================
// Pipeline Configuration
// ============================================

/**
 * Inclusive harvest window
 */
export interface DateWindow {
  since: Date;
  until: Date;
}

/**
 * Run configuration - built once from CLI options and passed
 * explicitly into every stage.
 */
export interface PipelineConfig {
  /** Inclusive date window applied by the adapters */
  window: DateWindow;

  /** Path of the YAML source configuration */
  configPath: string;

  /** Directory holding the intermediate batch tables */
  rawDir: string;

  /** Path of the final corpus table */
  outPath: string;

  /** Fetch linked pages and add a fulltext column */
  extractText: boolean;

  /** Same-domain similarity threshold (0-100) */
  threshold: number;

  /** Per-request timeout for adapter requests */
  requestTimeoutMs: number;

  /** Per-request timeout for text extraction */
  extractTimeoutMs: number;

  /** Enable verbose logging */
  verbose: boolean;

  /** Validate config and exit without running */
  dryRun: boolean;
}

/**
 * Earliest publication date harvested by default
 */
export const DEFAULT_SINCE = '2015-05-01';

/**
 * Default similarity threshold for same-domain duplicates
 */
export const DEFAULT_THRESHOLD = 90;

/**
 * Score at which two titles are duplicates regardless of domain
 */
export const CROSS_DOMAIN_THRESHOLD = 98;

/**
 * Default configuration values (the window is computed at build time)
 */
export const DEFAULT_CONFIG: Omit<PipelineConfig, 'window'> = {
  configPath: 'config.yaml',
  rawDir: 'data/raw',
  outPath: 'data/clean/corpus.csv',
  extractText: false,
  threshold: DEFAULT_THRESHOLD,
  requestTimeoutMs: 30000,
  extractTimeoutMs: 25000,
  verbose: false,
  dryRun: false,
};

// ============================================
// Stage Result Types
// ============================================

/**
 * Outcome of one adapter during harvest
 */
export interface AdapterOutcome {
  label: string;
  rows: number;

  /** Batch file written, absent when the adapter produced nothing */
  file?: string;

  /** Failure message when the adapter threw */
  error?: string;
}

/**
 * Harvest stage result
 */
export interface HarvestSummary {
  adapters: AdapterOutcome[];
  totalRows: number;
}

/**
 * Clean stage result
 */
export interface CleanSummary {
  counts: CleanCounts;
  outPath: string;

  /** Tables read from the raw directory */
  tables: string[];
}
