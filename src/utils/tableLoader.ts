/**
 * Table Loader
 *
 * Reads every intermediate CSV table in the raw directory and
 * concatenates their rows into RawRecords. Cell values are kept as
 * strings (or null for empty cells); typing happens in the normalizer.
 */

import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import * as XLSX from 'xlsx';
import type { RawRecord } from '../schemas/index.js';
import { logVerbose } from './logger.js';

const BOM_BYTES = Buffer.from([0xef, 0xbb, 0xbf]);

/**
 * Raised by clean when the raw directory holds no tables
 */
export class NoInputTablesError extends Error {
  constructor(public readonly rawDir: string) {
    super(`No input tables found in ${rawDir}`);
    this.name = 'NoInputTablesError';
  }
}

/**
 * Tables read by one loadTables call
 */
export interface LoadedTables {
  /** Table paths, in read order */
  tables: string[];
  records: RawRecord[];
}

/**
 * List the CSV tables of a directory, sorted by file name.
 * A missing directory has no tables.
 *
 * @param rawDir - Directory to scan
 */
export async function listTables(rawDir: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(rawDir);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }

  return entries
    .filter((name) => name.toLowerCase().endsWith('.csv'))
    .sort()
    .map((name) => join(rawDir, name));
}

/**
 * Parse CSV content into records keyed by the header row.
 * Content is decoded as UTF-8 with or without a byte order mark.
 *
 * @param content - File bytes or text
 */
export function parseTable(content: Buffer | string): RawRecord[] {
  const bytes = typeof content === 'string' ? Buffer.from(content, 'utf-8') : content;

  // The BOM makes xlsx decode the plain-text table as UTF-8
  const withBom = bytes.subarray(0, 3).equals(BOM_BYTES) ? bytes : Buffer.concat([BOM_BYTES, bytes]);

  const workbook = XLSX.read(withBom, { type: 'buffer', raw: true });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (sheet === undefined) {
    return [];
  }

  const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, {
    defval: null,
    raw: true,
  });

  return rows.map((row) => {
    const record: RawRecord = {};
    for (const [key, value] of Object.entries(row)) {
      record[key.replace(/^\uFEFF/, '')] = value;
    }
    return record;
  });
}

/**
 * Load and concatenate every table of the raw directory.
 *
 * @param rawDir - Directory holding batch tables
 * @throws NoInputTablesError when the directory holds no tables
 */
export async function loadTables(rawDir: string): Promise<LoadedTables> {
  const tables = await listTables(rawDir);
  if (tables.length === 0) {
    throw new NoInputTablesError(rawDir);
  }

  const records: RawRecord[] = [];
  for (const table of tables) {
    const rows = parseTable(await readFile(table));
    logVerbose(`Loaded ${rows.length} rows from ${table}`);
    records.push(...rows);
  }

  return { tables, records };
}
