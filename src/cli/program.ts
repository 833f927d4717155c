/**
 * Commander Program Definition
 *
 * Configures the CLI program: the harvest, clean and run commands and
 * their options. This file focuses only on Commander setup - no
 * pipeline execution logic.
 */

import { Command } from 'commander';
import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import type { CliOptions } from '../config.js';
import { DEFAULT_CONFIG, DEFAULT_SINCE, DEFAULT_THRESHOLD } from '../types/index.js';
import type { CommandName } from '../types/index.js';
import { logWarning } from '../utils/logger.js';

// Get package.json version (two levels up from src/cli, three from dist/src/cli)
const moduleDir = dirname(fileURLToPath(import.meta.url));
const packageJsonCandidates = [
  join(moduleDir, '..', '..', 'package.json'),
  join(moduleDir, '..', '..', '..', 'package.json'),
];

const PackageJsonSchema = z.object({ version: z.string() });

function getVersion(): string {
  for (const candidate of packageJsonCandidates) {
    if (!existsSync(candidate)) continue;
    try {
      const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(candidate, 'utf-8')));
      if (parsed.success) {
        return parsed.data.version;
      }
    } catch {
      return '1.0.0';
    }
  }
  return '1.0.0';
}

/**
 * Called once Commander has parsed a command
 */
export type CommandHandler = (command: CommandName, options: CliOptions) => Promise<void>;

// ============================================
// Option Groups
// ============================================

function addWindowOptions(command: Command): Command {
  return command
    .option('--since <date>', `Earliest publication date, YYYY-MM-DD (default: ${DEFAULT_SINCE})`)
    .option('--until <date>', 'Latest publication date, whole day when date-only (default: today)')
    .option('--config <path>', `YAML source configuration (default: ${DEFAULT_CONFIG.configPath})`);
}

function addCleanOptions(command: Command): Command {
  return command
    .option('--out <path>', `Corpus CSV path (default: ${DEFAULT_CONFIG.outPath})`)
    .option('--extract-text', 'Fetch linked pages and add a fulltext column')
    .option(
      '--threshold <n>',
      `Same-domain title similarity threshold, 0-100 (default: ${DEFAULT_THRESHOLD})`
    );
}

function addCommonOptions(command: Command): Command {
  return command
    .option('--raw-dir <dir>', `Intermediate table directory (default: ${DEFAULT_CONFIG.rawDir})`)
    .option('--verbose', 'Show detailed progress')
    .option('--dry-run', 'Validate config and exit without running');
}

/**
 * Create and configure the Commander program.
 *
 * @param onCommand - Receives the parsed command and options
 * @returns Configured Commander program instance
 */
export function createProgram(onCommand: CommandHandler): Command {
  const program = new Command();

  program
    .name('corpus-builder')
    .description('Harvest, normalize and deduplicate a research corpus from feeds, OpenAlex and GDELT')
    .version(getVersion(), '-V, --version', 'Show version number');

  const harvest = program
    .command('harvest')
    .description('Fetch records from every configured source into intermediate tables');
  addCommonOptions(addWindowOptions(harvest)).action((opts: Record<string, unknown>) =>
    onCommand('harvest', parseCliOptions(opts))
  );

  const clean = program
    .command('clean')
    .description('Normalize, deduplicate and write the corpus from intermediate tables');
  addCommonOptions(addCleanOptions(clean)).action((opts: Record<string, unknown>) =>
    onCommand('clean', parseCliOptions(opts))
  );

  const run = program.command('run').description('Harvest, then clean');
  addCommonOptions(addCleanOptions(addWindowOptions(run))).action(
    (opts: Record<string, unknown>) => onCommand('run', parseCliOptions(opts))
  );

  program.addHelpText(
    'after',
    `
Examples:
  # Harvest 2024 into data/raw
  $ npx tsx src/index.ts harvest --since 2024-01-01 --until 2024-12-31

  # Build the corpus from existing tables, with article text
  $ npx tsx src/index.ts clean --extract-text

  # Everything, stricter same-domain matching
  $ npx tsx src/index.ts run --threshold 95 --verbose

  # Validate config and exit
  $ npx tsx src/index.ts run --dry-run

Notes:
  - Records with no parsable date are kept whatever the window
  - Identical titles (score >= 98) are merged across domains
  - OPENALEX_API_KEY is read from the environment or .env
`
  );

  return program;
}

// ============================================
// Option Parsing
// ============================================

const OPTION_KINDS = {
  since: 'string',
  until: 'string',
  config: 'string',
  rawDir: 'string',
  out: 'string',
  extractText: 'boolean',
  threshold: 'string',
  verbose: 'boolean',
  dryRun: 'boolean',
} as const satisfies Record<keyof CliOptions, 'string' | 'boolean'>;

function stringOption(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function booleanOption(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

/**
 * Parse Commander options to the CliOptions interface.
 *
 * Values of an unexpected type are dropped with a warning.
 *
 * @param opts - Raw options from Commander
 * @returns Normalized options
 */
export function parseCliOptions(opts: Record<string, unknown>): CliOptions {
  const unexpected = Object.entries(OPTION_KINDS)
    .filter(([key, kind]) => opts[key] !== undefined && typeof opts[key] !== kind)
    .map(([key]) => key);

  if (unexpected.length > 0) {
    logWarning(`Unexpected option types ignored: ${unexpected.join(', ')}`);
  }

  return {
    since: stringOption(opts.since),
    until: stringOption(opts.until),
    config: stringOption(opts.config),
    rawDir: stringOption(opts.rawDir),
    out: stringOption(opts.out),
    extractText: booleanOption(opts.extractText),
    threshold: stringOption(opts.threshold),
    verbose: booleanOption(opts.verbose),
    dryRun: booleanOption(opts.dryRun),
  };
}
