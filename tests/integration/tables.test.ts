/**
 * Integration Tests for Table Files
 *
 * CSV writing and loading through the file system.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile, mkdir } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  writeTable,
  writeCorpus,
  serializeTable,
  batchFileName,
  statusPathFor,
  writePipelineStatus,
  safeWrite,
} from '../../src/utils/fileWriter.js';
import {
  listTables,
  loadTables,
  parseTable,
  NoInputTablesError,
} from '../../src/utils/tableLoader.js';
import { assemble } from '../../src/processing/assemble.js';
import { normalizeRecords } from '../../src/processing/normalize.js';
import type { PipelineStatus } from '../../src/schemas/index.js';
import { logError } from '../../src/utils/logger.js';

vi.mock('../../src/utils/logger.js', () => ({
  logVerbose: vi.fn(),
  logError: vi.fn(),
}));

describe('serializeTable', () => {
  it('quotes fields with commas, quotes and newlines', () => {
    expect(
      serializeTable(['a', 'b', 'c'], [
        ['x, y', 'say "hi"', 'two\nlines'],
        [1, null, 'plain'],
      ])
    ).toBe('a,b,c\n"x, y","say ""hi""","two\nlines"\n1,,plain\n');
  });
});

describe('batchFileName', () => {
  it('combines label, UTC timestamp and a random suffix', () => {
    const name = batchFileName('gdelt', new Date('2024-03-01T09:05:07.000Z'));
    expect(name).toMatch(/^gdelt_20240301-090507_[0-9a-f]{8}\.csv$/);
  });

  it('does not repeat names within the same second', () => {
    const now = new Date('2024-03-01T09:05:07.000Z');
    expect(batchFileName('gdelt', now)).not.toBe(batchFileName('gdelt', now));
  });
});

describe('statusPathFor', () => {
  it('places the status file next to the corpus', () => {
    expect(statusPathFor(join('data', 'clean', 'corpus.csv'))).toBe(
      join('data', 'clean', 'pipeline_status.json')
    );
  });
});

describe('table files', () => {
  let dir: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    dir = await mkdtemp(join(tmpdir(), 'corpus-tables-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes UTF-8 with a byte order mark', async () => {
    const path = join(dir, 'nested', 'table.csv');
    await writeTable(path, ['titre'], [['Énergie']]);

    const bytes = await readFile(path);
    expect([...bytes.subarray(0, 3)]).toEqual([0xef, 0xbb, 0xbf]);
    expect(bytes.subarray(3).toString('utf-8')).toBe('titre\nÉnergie\n');
  });

  it('reads back awkward values unchanged', async () => {
    const path = join(dir, 'batch.csv');
    await writeTable(
      path,
      ['titre', 'extrait_citation', 'source_name'],
      [
        ['Débat : l’eau, un bien commun', 'He said "no"\nthen left', null],
        ['Ünïcödé – 東京', '', 'Agence'],
      ]
    );

    expect(parseTable(await readFile(path))).toEqual([
      {
        titre: 'Débat : l’eau, un bien commun',
        extrait_citation: 'He said "no"\nthen left',
        source_name: null,
      },
      { titre: 'Ünïcödé – 東京', extrait_citation: null, source_name: 'Agence' },
    ]);
  });

  it('reads tables without a byte order mark', () => {
    expect(parseTable('titre,lien\nÉté,https://a.example/1\n')).toEqual([
      { titre: 'Été', lien: 'https://a.example/1' },
    ]);
  });

  it('keeps numeric-looking cells as text', () => {
    expect(parseTable('id,date_pub\n7,20240301\n')).toEqual([{ id: '7', date_pub: '20240301' }]);
  });

  it('lists only CSV files, sorted by name', async () => {
    await writeFile(join(dir, 'b.csv'), 'titre\nB\n');
    await writeFile(join(dir, 'a.csv'), 'titre\nA\n');
    await writeFile(join(dir, 'notes.txt'), 'ignored');
    await mkdir(join(dir, 'sub'));

    expect(await listTables(dir)).toEqual([join(dir, 'a.csv'), join(dir, 'b.csv')]);
  });

  it('concatenates every table, including headers that differ', async () => {
    await writeFile(join(dir, 'a.csv'), 'titre,lien\nA,https://a.example/1\n');
    await writeFile(join(dir, 'b.csv'), 'titre,langue\nB,fr\n');

    const loaded = await loadTables(dir);

    expect(loaded.tables).toHaveLength(2);
    expect(loaded.records).toEqual([
      { titre: 'A', lien: 'https://a.example/1' },
      { titre: 'B', langue: 'fr' },
    ]);
  });

  it('throws NoInputTablesError for empty or missing directories', async () => {
    await expect(loadTables(dir)).rejects.toThrow(NoInputTablesError);
    await expect(loadTables(join(dir, 'missing'))).rejects.toThrow(
      `No input tables found in ${join(dir, 'missing')}`
    );
  });

  it('writes the corpus and rejects rows without a title', async () => {
    const rows = assemble(
      normalizeRecords([{ titre: 'Kept', lien: 'https://a.example/1', date_pub: '2024-03-01' }])
    );
    const path = join(dir, 'corpus.csv');

    await writeCorpus(path, rows, false);
    const [row] = parseTable(await readFile(path));

    expect(row).toMatchObject({
      id: '1',
      titre: 'Kept',
      date_pub: '2024-03-01T00:00:00.000Z',
      controverse: null,
    });

    await expect(writeCorpus(path, [{ ...rows[0], titre: '' }], false)).rejects.toThrow(
      'Validation failed for corpus row 1: titre: titre cannot be empty'
    );
  });

  it('validates pipeline status before writing', async () => {
    const status: PipelineStatus = {
      command: 'clean',
      success: true,
      startedAt: '2024-03-01T00:00:00.000Z',
      window: { since: '2015-05-01T00:00:00.000Z', until: '2024-03-01T23:59:59.999Z' },
      rawDir: 'data/raw',
      outPath: 'data/clean/corpus.csv',
      threshold: 90,
      extractText: false,
    };
    const path = join(dir, 'pipeline_status.json');

    await writePipelineStatus(path, status);
    expect(JSON.parse(await readFile(path, 'utf-8'))).toEqual(status);

    await expect(writePipelineStatus(path, { ...status, threshold: 150 })).rejects.toThrow(
      'Validation failed before writing'
    );
  });

  it('safeWrite logs failures instead of throwing', async () => {
    const ok = await safeWrite(async () => {
      throw new Error('disk full');
    }, 'pipeline_status.json');

    expect(ok).toBe(false);
    expect(logError).toHaveBeenCalledWith('Failed to write pipeline_status.json: disk full');
  });
});
