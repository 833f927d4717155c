/**
 * Logger with Secrets Sanitization
 *
 * All logging functions sanitize output to prevent API key leakage.
 * Supports verbose mode for detailed debugging output.
 */

import chalk from 'chalk';
import { ENV_KEYS } from '../config.js';
import type { PipelineConfig } from '../types/index.js';

// ============================================
// Logger State
// ============================================

/**
 * Global verbose mode flag.
 * Set via setVerbose() before running pipeline.
 */
let verboseMode = false;

/**
 * Enable or disable verbose logging
 */
export function setVerbose(enabled: boolean): void {
  verboseMode = enabled;
}

// ============================================
// Secrets Sanitization
// ============================================

/**
 * Patterns that look like API keys (to catch unknown keys)
 */
const API_KEY_PATTERNS = [
  /(api_key=)[^&\s]+/gi, // Query-string keys in logged URLs
  /sk-[a-zA-Z0-9]{20,}/g,
];

/**
 * Sanitize text to remove API keys and sensitive data.
 *
 * SECURITY: This function MUST be called before any console output.
 * It removes:
 * 1. Known API keys from environment variables
 * 2. Patterns that look like API keys
 *
 * @param text - Text to sanitize
 * @returns Sanitized text with keys replaced by [REDACTED]
 */
export function sanitize(text: string): string {
  let sanitized = text;

  // Remove known API keys from environment
  for (const envKey of Object.values(ENV_KEYS)) {
    const keyValue = process.env[envKey];
    if (keyValue && keyValue.length > 0) {
      // Use global replace for all occurrences
      sanitized = sanitized.split(keyValue).join('[REDACTED]');
    }
  }

  // Remove patterns that look like API keys
  for (const pattern of API_KEY_PATTERNS) {
    sanitized = sanitized.replace(pattern, (match: string, prefix?: string) =>
      typeof prefix === 'string' ? `${prefix}[REDACTED]` : '[REDACTED]'
    );
  }

  return sanitized;
}

// ============================================
// Timestamp Formatting
// ============================================

/**
 * Get current timestamp in HH:MM:SS format
 */
function timestamp(): string {
  const now = new Date();
  return now.toTimeString().slice(0, 8);
}

/**
 * Format duration in human-readable format
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}

// ============================================
// Logging Functions
// ============================================

/**
 * Log a stage header with timestamp.
 * Used to mark the start of pipeline stages.
 *
 * @param name - Stage name (e.g., "Harvest", "Deduplication")
 */
export function logStage(name: string): void {
  const line = '─'.repeat(50);
  console.log('');
  console.log(chalk.cyan(line));
  console.log(chalk.cyan.bold(`  ${sanitize(name)}`));
  console.log(chalk.cyan(`  ${timestamp()}`));
  console.log(chalk.cyan(line));
}

/**
 * Log progress indicator.
 * Shows current/total and optional message.
 *
 * Handles edge cases:
 * - total <= 0: Shows "0/0" without progress bar to prevent divide-by-zero
 * - current > total: Clamps percentage to 100%
 *
 * @param current - Current item number
 * @param total - Total items
 * @param message - Optional progress message
 */
export function logProgress(current: number, total: number, message?: string): void {
  const msg = message ? ` ${sanitize(message)}` : '';

  // Guard against divide-by-zero: when total is 0 or negative, show simple message
  if (total <= 0) {
    console.log(chalk.gray(`  [${' '.repeat(20)}] ${current}/${total}${msg}`));
    return;
  }

  // Clamp percent to 0-100 range to handle edge cases
  const percent = Math.min(100, Math.max(0, Math.round((current / total) * 100)));
  const filled = Math.floor(percent / 5);
  const bar = '█'.repeat(filled) + '░'.repeat(20 - filled);
  console.log(chalk.gray(`  [${bar}] ${current}/${total} (${percent}%)${msg}`));
}

/**
 * Log success message in green.
 *
 * @param message - Success message
 */
export function logSuccess(message: string): void {
  console.log(chalk.green(`✓ ${sanitize(message)}`));
}

/**
 * Log warning message in yellow.
 *
 * @param message - Warning message
 */
export function logWarning(message: string): void {
  console.log(chalk.yellow(`⚠ ${sanitize(message)}`));
}

/**
 * Log error message in red.
 *
 * @param message - Error message
 */
export function logError(message: string): void {
  console.log(chalk.red(`✗ ${sanitize(message)}`));
}

/**
 * Log info message (default color).
 *
 * @param message - Info message
 */
export function logInfo(message: string): void {
  console.log(chalk.white(`  ${sanitize(message)}`));
}

/**
 * Log verbose message (only if verbose mode enabled).
 *
 * @param message - Verbose debug message
 */
export function logVerbose(message: string): void {
  if (verboseMode) {
    console.log(chalk.gray(`  [verbose] ${sanitize(message)}`));
  }
}

/**
 * Log a horizontal divider line
 */
export function logDivider(): void {
  console.log(chalk.gray('─'.repeat(50)));
}

/**
 * Log an empty line
 */
export function logNewline(): void {
  console.log('');
}

// ============================================
// Specialized Logging
// ============================================

/**
 * Log run configuration summary
 */
export function logConfig(config: PipelineConfig, command: string): void {
  console.log('');
  console.log(chalk.cyan.bold(`  Run Configuration (${command}):`));
  console.log(chalk.gray('  ─────────────────────────────'));
  console.log(
    chalk.white(
      `  Window:        ${config.window.since.toISOString()} → ${config.window.until.toISOString()}`
    )
  );
  console.log(chalk.white(`  Config:        ${sanitize(config.configPath)}`));
  console.log(chalk.white(`  Raw dir:       ${sanitize(config.rawDir)}`));
  console.log(chalk.white(`  Output:        ${sanitize(config.outPath)}`));
  console.log(chalk.white(`  Threshold:     ${config.threshold}`));

  if (config.extractText) {
    console.log(chalk.yellow('  Extracting:    full text of linked pages'));
  }
  console.log('');
}

/**
 * Log final pipeline result
 */
export function logPipelineResult(
  success: boolean,
  durationMs: number,
  output: string,
  error?: string
): void {
  console.log('');
  logDivider();

  if (success) {
    logSuccess(`Pipeline completed in ${formatDuration(durationMs)}`);
    console.log(chalk.green(`  Output: ${sanitize(output)}`));
  } else {
    logError(`Pipeline failed after ${formatDuration(durationMs)}`);
    if (error) {
      console.log(chalk.red(`  Error: ${sanitize(error)}`));
    }
  }

  logDivider();
  console.log('');
}
