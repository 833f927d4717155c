/**
 * File Writer
 *
 * Handles all file output operations with optional schema validation:
 * intermediate batch tables, the final corpus table and the run status.
 *
 * Tables are CSV with a UTF-8 byte order mark, written through xlsx.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join, dirname } from 'node:path';
import * as XLSX from 'xlsx';
import { v4 as uuidv4 } from 'uuid';
import type { z } from 'zod';
import {
  BATCH_COLUMNS,
  CorpusRowSchema,
  PipelineStatusSchema,
  type CorpusRow,
  type HarvestedRecord,
  type PipelineStatus,
  type TableCell,
} from '../schemas/index.js';
import { projectRows } from '../processing/assemble.js';
import { logVerbose, logError } from './logger.js';

/** Byte order mark prefixed to every table */
export const UTF8_BOM = '\uFEFF';

/** Name of the run summary written next to the corpus */
export const STATUS_FILE_NAME = 'pipeline_status.json';

// ============================================
// Directory Management
// ============================================

/**
 * Ensure parent directory exists for a file path
 */
async function ensureParentDir(filePath: string): Promise<void> {
  const dir = dirname(filePath);
  await mkdir(dir, { recursive: true });
}

/**
 * Path of pipeline_status.json for a given corpus path
 */
export function statusPathFor(outPath: string): string {
  return join(dirname(outPath), STATUS_FILE_NAME);
}

// ============================================
// JSON Writing
// ============================================

/**
 * Write JSON data to file with optional schema validation.
 *
 * @param filePath - Full path to output file
 * @param data - Data to write
 * @param schema - Optional Zod schema to validate before writing
 * @throws Error if validation fails or write fails
 */
export async function writeJSON<T>(
  filePath: string,
  data: T,
  schema?: z.ZodSchema<T>
): Promise<void> {
  // Validate if schema provided
  if (schema) {
    const result = schema.safeParse(data);
    if (!result.success) {
      const errors = result.error.issues
        .map((e) => `${e.path.join('.')}: ${e.message}`)
        .join('; ');
      throw new Error(`Validation failed before writing ${filePath}: ${errors}`);
    }
  }

  await ensureParentDir(filePath);

  const content = JSON.stringify(data, null, 2);
  await writeFile(filePath, content, 'utf-8');

  logVerbose(`Wrote JSON: ${filePath} (${content.length} bytes)`);
}

// ============================================
// Table Writing
// ============================================

/**
 * Serialize a header and rows to CSV text (without BOM).
 * Null cells are written empty; fields holding commas, quotes or
 * newlines are quoted.
 */
export function serializeTable(header: readonly string[], rows: TableCell[][]): string {
  const sheet = XLSX.utils.aoa_to_sheet([[...header], ...rows]);
  return `${XLSX.utils.sheet_to_csv(sheet)}\n`;
}

/**
 * Write a table to a CSV file, creating parent directories.
 *
 * @param filePath - Full path to output file
 * @param header - Column names, in order
 * @param rows - One array of cells per row, aligned with header
 */
export async function writeTable(
  filePath: string,
  header: readonly string[],
  rows: TableCell[][]
): Promise<void> {
  await ensureParentDir(filePath);

  const content = UTF8_BOM + serializeTable(header, rows);
  await writeFile(filePath, content, 'utf-8');

  logVerbose(`Wrote table: ${filePath} (${rows.length} rows)`);
}

// ============================================
// Intermediate Batches
// ============================================

/**
 * Format a UTC timestamp as YYYYMMDD-HHMMSS
 */
function batchTimestamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replaceAll('-', '')}-${iso.slice(11, 19).replaceAll(':', '')}`;
}

/**
 * Build a collision-free batch file name: <label>_<YYYYMMDD-HHMMSS>_<8 hex>.csv
 *
 * @param label - Adapter label
 * @param now - Timestamp for the name
 */
export function batchFileName(label: string, now: Date = new Date()): string {
  const suffix = uuidv4().replaceAll('-', '').slice(0, 8);
  return `${label}_${batchTimestamp(now)}_${suffix}.csv`;
}

/**
 * Write one adapter's records as an intermediate batch table.
 *
 * @param rawDir - Directory holding batch tables
 * @param label - Adapter label, used in the file name
 * @param records - Records yielded by the adapter
 * @returns Path of the written file
 */
export async function writeBatch(
  rawDir: string,
  label: string,
  records: HarvestedRecord[]
): Promise<string> {
  const filePath = join(rawDir, batchFileName(label));
  const rows = records.map((record) => BATCH_COLUMNS.map((column) => record[column]));
  await writeTable(filePath, BATCH_COLUMNS, rows);
  return filePath;
}

// ============================================
// Final Corpus
// ============================================

/**
 * Validate and write the final corpus table.
 *
 * @param outPath - Path of the corpus CSV
 * @param rows - Assembled rows, in output order
 * @param includeFulltext - Append the fulltext column
 * @throws Error if any row fails CorpusRowSchema
 */
export async function writeCorpus(
  outPath: string,
  rows: CorpusRow[],
  includeFulltext: boolean
): Promise<void> {
  rows.forEach((row, index) => {
    const result = CorpusRowSchema.safeParse(row);
    if (!result.success) {
      const errors = result.error.issues
        .map((e) => `${e.path.join('.')}: ${e.message}`)
        .join('; ');
      throw new Error(`Validation failed for corpus row ${index + 1}: ${errors}`);
    }
  });

  const table = projectRows(rows, includeFulltext);
  await writeTable(outPath, table.header, table.rows);
}

// ============================================
// Pipeline Status
// ============================================

/**
 * Write pipeline_status.json with run metadata.
 *
 * Validates the status object against PipelineStatusSchema before writing
 * to ensure consistent, debuggable output.
 *
 * @param filePath - Full path to pipeline_status.json
 * @param status - Pipeline status object
 */
export async function writePipelineStatus(
  filePath: string,
  status: PipelineStatus
): Promise<void> {
  await writeJSON(filePath, status, PipelineStatusSchema);
}

/**
 * Safe write wrapper that logs errors but doesn't throw.
 * Use for non-critical writes that shouldn't fail the pipeline.
 */
export async function safeWrite(
  writeFn: () => Promise<void>,
  description: string
): Promise<boolean> {
  try {
    await writeFn();
    return true;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logError(`Failed to write ${description}: ${message}`);
    return false;
  }
}
