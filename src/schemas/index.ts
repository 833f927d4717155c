// ============================================
// Re-export all schemas and types
// ============================================

// RawRecord - adapter output
export {
  SourceTagSchema,
  TYPE_SOURCE,
  BATCH_COLUMNS,
  HarvestedRecordSchema,
  type SourceTag,
  type RawRecord,
  type BatchColumn,
  type HarvestedRecord,
} from './rawRecord.js';

// Canonical records
export {
  CORPUS_COLUMNS,
  FULLTEXT_COLUMN,
  TEXT_COLUMNS,
  NormalizedRecordSchema,
  CorpusRowSchema,
  type CorpusColumn,
  type TextColumn,
  type NormalizedRecord,
  type CorpusRow,
  type TableCell,
} from './corpusRecord.js';

// YAML configuration
export {
  OpenAlexConfigSchema,
  GdeltConfigSchema,
  CorpusConfigSchema,
  type OpenAlexConfig,
  type GdeltConfig,
  type CorpusConfig,
} from './corpusConfig.js';

// Run status
export {
  CommandNameSchema,
  CleanCountsSchema,
  PipelineStatusSchema,
  type CommandName,
  type CleanCounts,
  type PipelineStatus,
} from './pipelineStatus.js';
