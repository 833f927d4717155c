/**
 * Command Execution
 *
 * Turns parsed CLI options into a finished command and its exit code:
 * configuration, pre-flight checks, then the pipeline under the error
 * handler. Nothing here calls process.exit.
 */

import type { CommandName, PipelineConfig } from '../types/index.js';
import { buildConfig, type CliOptions } from '../config.js';
import { statusPathFor } from '../utils/fileWriter.js';
import { setVerbose, logError, sanitize } from '../utils/logger.js';
import { runPreflightChecks, commandCleans } from './preflight.js';
import { runPipeline, type PipelineOptions } from './runPipeline.js';
import {
  EXIT_CODES,
  createErrorContext,
  getExitCode,
  withErrorHandling,
  type ExitCode,
} from './errorHandler.js';

/**
 * Run one command to completion.
 *
 * @param command - harvest, clean or run
 * @param options - Parsed CLI options
 * @param runOptions - Extractor override, used by tests
 * @param now - Reference time for the default window end
 * @returns Exit code (0 success, 1 pipeline error, 2 config error)
 */
export async function executeCommand(
  command: CommandName,
  options: CliOptions,
  runOptions: Omit<PipelineOptions, 'onStage'> = {},
  now: Date = new Date()
): Promise<ExitCode> {
  setVerbose(options.verbose ?? false);

  let config: PipelineConfig;
  try {
    config = buildConfig(options, now);
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logError(sanitize(err.message));
    return getExitCode(err);
  }

  const startTime = Date.now();
  const context = createErrorContext(
    command,
    config,
    startTime,
    commandCleans(command) ? statusPathFor(config.outPath) : undefined
  );

  // Config problems found before anything ran do not get a status file
  const preflight = await withErrorHandling(() => runPreflightChecks(config, command), {
    ...context,
    statusPath: undefined,
  });
  if (!preflight.success) {
    return preflight.exitCode;
  }
  if (!preflight.result.shouldContinue) {
    return preflight.result.exitCode === EXIT_CODES.SUCCESS
      ? EXIT_CODES.SUCCESS
      : EXIT_CODES.PIPELINE_ERROR;
  }

  const corpusConfig = preflight.result.corpusConfig;
  const result = await withErrorHandling(
    () =>
      runPipeline(command, config, corpusConfig, {
        ...runOptions,
        onStage: (stage) => {
          context.stage = stage;
        },
      }),
    context
  );

  return result.success ? EXIT_CODES.SUCCESS : result.exitCode;
}
