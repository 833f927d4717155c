/**
 * CLI Module Exports
 *
 * Barrel export for all CLI components.
 * This is the main entry point for importing CLI functionality.
 */

// ============================================
// Program Configuration
// ============================================

export { createProgram, parseCliOptions, type CommandHandler } from './program.js';

// ============================================
// Pre-flight Checks
// ============================================

export {
  runPreflightChecks,
  printDryRunSummary,
  commandHarvests,
  commandCleans,
  type PreflightResult,
} from './preflight.js';

// ============================================
// Pipeline Execution
// ============================================

export {
  runPipeline,
  runHarvest,
  runClean,
  cleanRecords,
  type PipelineOptions,
  type PipelineResult,
} from './runPipeline.js';

export { executeCommand } from './execute.js';

// ============================================
// Error Handling
// ============================================

export {
  withErrorHandling,
  handlePipelineError,
  EXIT_CODES,
  isConfigError,
  getExitCode,
  createPipelineStatus,
  completePipelineStatus,
  createErrorContext,
  type ExitCode,
  type ErrorContext,
  type ErrorHandlingResult,
} from './errorHandler.js';
