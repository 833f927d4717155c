/**
 * Unit Tests for Corpus Assembly
 */

import { describe, it, expect } from 'vitest';
import { assemble, corpusHeader, projectRows } from '../../src/processing/assemble.js';
import { normalizeRecord } from '../../src/processing/normalize.js';
import { CORPUS_COLUMNS } from '../../src/schemas/index.js';

describe('assemble', () => {
  it('assigns dense ids in order and drops the domain', () => {
    const rows = assemble([
      normalizeRecord({ titre: 'first', lien: 'https://a.example/1' }),
      normalizeRecord({ titre: 'second' }),
      normalizeRecord({ titre: 'third' }),
    ]);

    expect(rows.map((row) => row.id)).toEqual([1, 2, 3]);
    expect(rows.map((row) => row.titre)).toEqual(['first', 'second', 'third']);
    expect(Object.hasOwn(rows[0], 'domain')).toBe(false);
  });

  it('returns no rows for no records', () => {
    expect(assemble([])).toEqual([]);
  });
});

describe('corpusHeader', () => {
  it('lists the canonical columns starting with id', () => {
    const header = corpusHeader(false);
    expect(header).toHaveLength(19);
    expect(header[0]).toBe('id');
    expect(header[18]).toBe('source_country');
  });

  it('appends fulltext when enrichment ran', () => {
    expect(corpusHeader(true)).toEqual([...CORPUS_COLUMNS, 'fulltext']);
  });
});

describe('projectRows', () => {
  const rows = assemble([
    normalizeRecord({
      titre: 'Dated',
      lien: 'https://a.example/1',
      date_pub: '2024-03-01T10:30:00Z',
      langue: 'en',
    }),
    normalizeRecord({ titre: 'Undated' }),
  ]);

  it('writes dates as ISO 8601 and missing values as null', () => {
    const table = projectRows(rows, false);

    expect(table.header).toEqual([...CORPUS_COLUMNS]);
    expect(table.rows[0].slice(0, 6)).toEqual([
      1,
      '2024-03-01T10:30:00.000Z',
      null,
      'Dated',
      'https://a.example/1',
      'en',
    ]);
    expect(table.rows[1].slice(0, 5)).toEqual([2, null, null, 'Undated', '']);
  });

  it('adds a fulltext cell per row when requested', () => {
    const table = projectRows([{ ...rows[0], fulltext: 'Body text' }, rows[1]], true);

    expect(table.rows[0]).toHaveLength(20);
    expect(table.rows[0][19]).toBe('Body text');
    expect(table.rows[1][19]).toBeNull();
  });
});
