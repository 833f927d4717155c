/**
 * Configuration & Environment Variables
 *
 * Handles environment loading, the YAML source configuration, and
 * building the run configuration from CLI options.
 */

import 'dotenv/config';
import { readFile } from 'node:fs/promises';
import { load, YAMLException } from 'js-yaml';
import type { ZodIssue } from 'zod';
import { CorpusConfigSchema, type CorpusConfig } from './schemas/index.js';
import type { DateWindow, PipelineConfig } from './types/index.js';
import { DEFAULT_CONFIG, DEFAULT_SINCE, DEFAULT_THRESHOLD } from './types/index.js';
import { logWarning } from './utils/logger.js';

// ============================================
// Environment Variable Names
// ============================================

/**
 * Environment variable names for API keys
 */
export const ENV_KEYS = {
  OPENALEX_API_KEY: 'OPENALEX_API_KEY',
} as const;

// ============================================
// API Key Access (Sanitized)
// ============================================

/**
 * Get an API key from environment.
 * SECURITY: Keys are retrieved but never logged.
 *
 * @param key - The environment variable name
 * @returns The API key value or undefined
 */
export function getApiKey(key: keyof typeof ENV_KEYS): string | undefined {
  return process.env[ENV_KEYS[key]];
}

/**
 * Check if an API key is set (non-empty)
 */
export function hasApiKey(key: keyof typeof ENV_KEYS): boolean {
  const value = getApiKey(key);
  return value !== undefined && value.trim().length > 0;
}

// ============================================
// Errors
// ============================================

/**
 * Invalid CLI option, config file or date window.
 * Mapped to exit code 2 by the CLI.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ============================================
// YAML Source Configuration
// ============================================

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Parse YAML text into a validated CorpusConfig.
 * An empty document yields all defaults.
 *
 * @param text - YAML source
 * @param origin - Name used in error messages
 * @throws ConfigError on invalid YAML or schema violations
 */
export function parseCorpusConfig(text: string, origin = 'config'): CorpusConfig {
  let document: unknown;
  try {
    document = load(text);
  } catch (error) {
    if (error instanceof YAMLException) {
      throw new ConfigError(`Invalid YAML in ${origin}: ${error.reason}`);
    }
    throw error;
  }

  const result = CorpusConfigSchema.safeParse(document ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid config in ${origin}: ${formatIssues(result.error.issues)}`);
  }
  return result.data;
}

/**
 * Read and validate the YAML source configuration.
 *
 * @param configPath - Path to the YAML file
 * @throws ConfigError when the file is missing or invalid
 */
export async function loadCorpusConfig(configPath: string): Promise<CorpusConfig> {
  let text: string;
  try {
    text = await readFile(configPath, 'utf-8');
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    if (code === 'ENOENT') {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    throw new ConfigError(
      `Cannot read config file ${configPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseCorpusConfig(text, configPath);
}

// ============================================
// Configuration Building
// ============================================

/**
 * CLI options that can be parsed from command line
 */
export interface CliOptions {
  since?: string;
  until?: string;
  config?: string;
  rawDir?: string;
  out?: string;
  extractText?: boolean;
  threshold?: string;
  verbose?: boolean;
  dryRun?: boolean;
}

const DATE_ONLY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parse a --since/--until value.
 *
 * Date-only strings are UTC: the start of the day for 'start', the last
 * millisecond of the day for 'end'. Other values go through Date.parse.
 *
 * @param value - Option value
 * @param edge - Which end of the window the value bounds
 * @param optionName - Name used in error messages
 * @throws ConfigError on an unparsable or impossible date
 */
export function parseDateOption(value: string, edge: 'start' | 'end', optionName: string): Date {
  const trimmed = value.trim();
  const match = DATE_ONLY_PATTERN.exec(trimmed);

  if (match) {
    const year = Number(match[1]);
    const month = Number(match[2]);
    const day = Number(match[3]);
    const date =
      edge === 'start'
        ? new Date(Date.UTC(year, month - 1, day))
        : new Date(Date.UTC(year, month - 1, day, 23, 59, 59, 999));

    // Date.UTC rolls over impossible days (2024-02-31 -> March 2)
    if (
      date.getUTCFullYear() !== year ||
      date.getUTCMonth() !== month - 1 ||
      date.getUTCDate() !== day
    ) {
      throw new ConfigError(`Invalid ${optionName} date '${value}'`);
    }
    return date;
  }

  const ms = Date.parse(trimmed);
  if (trimmed.length === 0 || Number.isNaN(ms)) {
    throw new ConfigError(`Invalid ${optionName} date '${value}'. Expected YYYY-MM-DD or ISO 8601`);
  }
  return new Date(ms);
}

/**
 * Parse the --threshold value.
 * Invalid values warn and fall back to the default.
 *
 * @param value - Option value
 * @returns Integer in [0, 100]
 */
export function parseThreshold(value: string | undefined): number {
  if (value === undefined) {
    return DEFAULT_THRESHOLD;
  }

  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (trimmed.length === 0 || !Number.isInteger(parsed) || parsed < 0 || parsed > 100) {
    logWarning(
      `Invalid --threshold value '${value}'. Using default: ${DEFAULT_THRESHOLD}. Valid range: 0-100`
    );
    return DEFAULT_THRESHOLD;
  }
  return parsed;
}

/**
 * Build the inclusive harvest window.
 *
 * @param since - --since value, defaults to 2015-05-01
 * @param until - --until value, defaults to today (whole day, UTC)
 * @param now - Reference clock for the default until
 * @throws ConfigError on bad dates or since > until
 */
export function buildWindow(
  since: string | undefined,
  until: string | undefined,
  now: Date = new Date()
): DateWindow {
  const window: DateWindow = {
    since: parseDateOption(since ?? DEFAULT_SINCE, 'start', '--since'),
    until: parseDateOption(until ?? now.toISOString().slice(0, 10), 'end', '--until'),
  };

  if (window.since.getTime() > window.until.getTime()) {
    throw new ConfigError(
      `--since (${window.since.toISOString()}) is after --until (${window.until.toISOString()})`
    );
  }
  return window;
}

/**
 * Build a complete PipelineConfig from CLI options.
 *
 * Merging order (later overrides earlier):
 * 1. DEFAULT_CONFIG
 * 2. Explicit CLI options
 *
 * @param options - Parsed CLI options
 * @param now - Reference clock for the default window end
 * @returns Complete, resolved PipelineConfig
 */
export function buildConfig(options: CliOptions, now: Date = new Date()): PipelineConfig {
  const config: PipelineConfig = {
    ...DEFAULT_CONFIG,
    window: buildWindow(options.since, options.until, now),
  };

  if (options.config !== undefined) {
    config.configPath = options.config;
  }

  if (options.rawDir !== undefined) {
    config.rawDir = options.rawDir;
  }

  if (options.out !== undefined) {
    config.outPath = options.out;
  }

  if (options.extractText !== undefined) {
    config.extractText = options.extractText;
  }

  config.threshold = parseThreshold(options.threshold);

  if (options.verbose !== undefined) {
    config.verbose = options.verbose;
  }

  if (options.dryRun !== undefined) {
    config.dryRun = options.dryRun;
  }

  return config;
}

// ============================================
// Re-exports for convenience
// ============================================

export { DEFAULT_CONFIG, DEFAULT_SINCE, DEFAULT_THRESHOLD } from './types/index.js';

export type { PipelineConfig, DateWindow, CorpusConfig } from './types/index.js';
