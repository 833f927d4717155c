/**
 * Pre-flight Checks
 *
 * Loads the source configuration and reports what a command would do
 * before anything runs. Supports --dry-run for validation-only runs.
 */

import type { CommandName, CorpusConfig, PipelineConfig } from '../types/index.js';
import { hasApiKey, loadCorpusConfig } from '../config.js';
import { buildAdapters } from '../collectors/index.js';
import { listTables } from '../utils/tableLoader.js';
import {
  logConfig,
  logWarning,
  logInfo,
  logSuccess,
  logNewline,
  logVerbose,
} from '../utils/logger.js';

// ============================================
// Types
// ============================================

/**
 * Result of pre-flight checks.
 */
export interface PreflightResult {
  /** Whether to continue with pipeline execution */
  shouldContinue: boolean;
  /** Exit code if shouldContinue is false */
  exitCode?: number;
  /** Source configuration, loaded for commands that harvest */
  corpusConfig?: CorpusConfig;
}

/**
 * Whether a command runs the harvest stage
 */
export function commandHarvests(command: CommandName): boolean {
  return command === 'harvest' || command === 'run';
}

/**
 * Whether a command runs the clean stage
 */
export function commandCleans(command: CommandName): boolean {
  return command === 'clean' || command === 'run';
}

// ============================================
// Pre-flight Functions
// ============================================

/**
 * Run pre-flight checks before pipeline execution.
 *
 * Handles:
 * - Loading and validating the YAML config (harvest, run)
 * - --dry-run (summarize and exit with code 0)
 *
 * @param config - Resolved pipeline configuration
 * @param command - Command about to run
 * @returns PreflightResult indicating whether to continue
 * @throws ConfigError when the YAML config is missing or invalid
 */
export async function runPreflightChecks(
  config: PipelineConfig,
  command: CommandName
): Promise<PreflightResult> {
  let corpusConfig: CorpusConfig | undefined;

  if (commandHarvests(command)) {
    corpusConfig = await loadCorpusConfig(config.configPath);
    logVerbose(`Loaded source configuration from ${config.configPath}`);

    if (corpusConfig.sources.openalex !== undefined) {
      logVerbose(
        hasApiKey('OPENALEX_API_KEY')
          ? 'OpenAlex API key configured'
          : 'OpenAlex API key not set; using the anonymous pool'
      );
    }
  }

  if (config.dryRun) {
    await printDryRunSummary(config, command, corpusConfig);
    return { shouldContinue: false, exitCode: 0, corpusConfig };
  }

  return { shouldContinue: true, corpusConfig };
}

/**
 * Print dry-run summary (config validation only).
 *
 * Used when --dry-run flag is provided.
 * Shows which sources would be harvested and which tables cleaned.
 *
 * @param config - Pipeline configuration
 * @param command - Command being validated
 * @param corpusConfig - Source configuration, when the command harvests
 */
export async function printDryRunSummary(
  config: PipelineConfig,
  command: CommandName,
  corpusConfig?: CorpusConfig
): Promise<void> {
  logNewline();
  logInfo('Dry Run Mode - Validating configuration only');

  logConfig(config, command);

  if (corpusConfig !== undefined) {
    const adapters = buildAdapters(corpusConfig);
    if (adapters.length === 0) {
      logWarning('No sources configured in ' + config.configPath);
    } else {
      logInfo(`Sources: ${adapters.map((adapter) => adapter.label).join(', ')}`);
    }
    logInfo(`Pause between requests: ${corpusConfig.rate_limit.sleep_seconds}s`);
  }

  // Tables are produced by harvest, so only a plain clean needs them now
  if (command === 'clean') {
    const tables = await listTables(config.rawDir);
    if (tables.length === 0) {
      logWarning(`No input tables in ${config.rawDir}`);
    } else {
      logInfo(`Input tables: ${tables.length}`);
    }
  }

  logNewline();
  logSuccess('Configuration is valid.');
  logNewline();
}
