/**
 * CLI Error Handler
 *
 * Provides error handling utilities for the CLI pipeline execution.
 * Handles error logging, status file writing, and exit code management.
 */

import type { CommandName, PipelineConfig, PipelineStatus } from '../types/index.js';
import { ConfigError } from '../config.js';
import { sanitize, logError, logPipelineResult } from '../utils/logger.js';
import { writePipelineStatus, safeWrite } from '../utils/fileWriter.js';

// ============================================
// Exit Codes
// ============================================

/**
 * Exit codes for CLI.
 *
 * 0: Success - Command completed successfully
 * 1: Pipeline error - Runtime failure, including no input tables
 * 2: Configuration error - Invalid options, config file or date window
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  PIPELINE_ERROR: 1,
  CONFIG_ERROR: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================
// Error Context
// ============================================

/**
 * Error context for pipeline failures.
 * Provides information needed for status file writing.
 */
export interface ErrorContext {
  command: CommandName;
  /** Current pipeline stage when error occurred */
  stage?: string;
  /** Where pipeline_status.json goes, when the command writes one */
  statusPath?: string;
  /** Pipeline configuration */
  config: PipelineConfig;
  /** Pipeline start time (Date.now()) */
  startTime: number;
}

// ============================================
// Error Classification
// ============================================

/**
 * Patterns that indicate a configuration error.
 * These errors should exit with CONFIG_ERROR (2) instead of PIPELINE_ERROR (1).
 */
const CONFIG_ERROR_PATTERNS = [
  /invalid.*option/i,
  /invalid yaml/i,
  /invalid config/i,
  /config file/i,
  /environment.*variable/i,
];

/**
 * Determine if an error is a configuration error.
 *
 * Configuration errors are issues with setup (bad options, unreadable
 * or invalid config file) that the user needs to fix before running.
 *
 * @param error - The error to classify
 * @returns true if this is a configuration error
 */
export function isConfigError(error: Error): boolean {
  if (error instanceof ConfigError) {
    return true;
  }

  return CONFIG_ERROR_PATTERNS.some((pattern) => pattern.test(error.message));
}

/**
 * Get the appropriate exit code for an error.
 *
 * @param error - The error that occurred
 * @returns Exit code (1 for pipeline errors, 2 for config errors)
 */
export function getExitCode(error: Error): ExitCode {
  return isConfigError(error) ? EXIT_CODES.CONFIG_ERROR : EXIT_CODES.PIPELINE_ERROR;
}

// ============================================
// Pipeline Status Helpers
// ============================================

/**
 * Create initial pipeline status for tracking.
 *
 * @param command - Command being run
 * @param config - Pipeline configuration
 * @param startTime - Pipeline start time (Date.now())
 * @returns Initial PipelineStatus object
 */
export function createPipelineStatus(
  command: CommandName,
  config: PipelineConfig,
  startTime: number
): PipelineStatus {
  return {
    command,
    success: false,
    startedAt: new Date(startTime).toISOString(),
    window: {
      since: config.window.since.toISOString(),
      until: config.window.until.toISOString(),
    },
    rawDir: config.rawDir,
    outPath: config.outPath,
    threshold: config.threshold,
    extractText: config.extractText,
  };
}

/**
 * Update pipeline status on completion.
 *
 * @param status - Current pipeline status
 * @param success - Whether pipeline succeeded
 * @param durationMs - Total duration in milliseconds
 * @param error - Optional error message (sanitized)
 * @returns Updated PipelineStatus
 */
export function completePipelineStatus(
  status: PipelineStatus,
  success: boolean,
  durationMs: number,
  error?: string
): PipelineStatus {
  return {
    ...status,
    success,
    completedAt: new Date().toISOString(),
    durationMs,
    error: error ? sanitize(error) : undefined,
  };
}

// ============================================
// Error Handling
// ============================================

/**
 * Handle pipeline error - log, write status, and return exit code.
 *
 * This function:
 * 1. Logs the sanitized error message
 * 2. Writes pipeline_status.json with error details (if the command has one)
 * 3. Returns the appropriate exit code
 *
 * @param error - The error that occurred
 * @param context - Error context for status writing
 * @returns Exit code (1 or 2)
 */
export async function handlePipelineError(
  error: Error,
  context: ErrorContext
): Promise<ExitCode> {
  const durationMs = Date.now() - context.startTime;
  const sanitizedMessage = sanitize(error.message);

  logError(sanitizedMessage);
  logPipelineResult(false, durationMs, context.statusPath ?? 'N/A', sanitizedMessage);

  const statusPath = context.statusPath;
  if (statusPath !== undefined) {
    const status = createPipelineStatus(context.command, context.config, context.startTime);
    const finalStatus = completePipelineStatus(status, false, durationMs, error.message);

    if (context.stage) {
      finalStatus.stage = context.stage;
    }

    // Use safeWrite to avoid throwing on write failure
    await safeWrite(() => writePipelineStatus(statusPath, finalStatus), 'pipeline_status.json');
  }

  return getExitCode(error);
}

// ============================================
// Execution Wrapper
// ============================================

/**
 * Result type for withErrorHandling.
 */
export type ErrorHandlingResult<T> =
  | { success: true; result: T }
  | { success: false; exitCode: ExitCode };

/**
 * Wrap pipeline execution with error handling.
 *
 * This wrapper catches all errors from the pipeline execution,
 * handles them appropriately (logging, status file writing),
 * and returns a structured result.
 *
 * @param fn - Async function to execute
 * @param context - Error context for handling failures
 * @returns Success with result, or failure with exit code
 *
 * @example
 * ```typescript
 * const result = await withErrorHandling(
 *   () => runClean(config),
 *   { command: 'clean', config, startTime: Date.now() }
 * );
 *
 * if (!result.success) {
 *   process.exit(result.exitCode);
 * }
 * ```
 */
export async function withErrorHandling<T>(
  fn: () => Promise<T>,
  context: ErrorContext
): Promise<ErrorHandlingResult<T>> {
  try {
    const result = await fn();
    return { success: true, result };
  } catch (error) {
    // Ensure we have an Error object
    const err = error instanceof Error ? error : new Error(String(error));

    const exitCode = await handlePipelineError(err, context);
    return { success: false, exitCode };
  }
}

/**
 * Create an error context from common parameters.
 *
 * @param command - Command being run
 * @param config - Pipeline configuration
 * @param startTime - Pipeline start time
 * @param statusPath - Optional pipeline_status.json path
 * @returns ErrorContext object
 */
export function createErrorContext(
  command: CommandName,
  config: PipelineConfig,
  startTime: number,
  statusPath?: string
): ErrorContext {
  return {
    command,
    config,
    startTime,
    statusPath,
  };
}
