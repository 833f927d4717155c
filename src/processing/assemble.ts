/**
 * Corpus Assembly
 *
 * Turns deduplicated records into persisted rows: dense 1-based ids in
 * output order, then projection onto the canonical column set.
 */

import {
  CORPUS_COLUMNS,
  FULLTEXT_COLUMN,
  type CorpusColumn,
  type CorpusRow,
  type NormalizedRecord,
  type TableCell,
} from '../schemas/index.js';

/**
 * Assign ids 1..N in the current order and drop derived fields.
 *
 * @param deduped - Cluster representatives, in output order
 * @returns Finalized rows
 */
export function assemble(deduped: NormalizedRecord[]): CorpusRow[] {
  return deduped.map(({ domain: _domain, ...record }, index) => ({
    id: index + 1,
    ...record,
  }));
}

/**
 * Persisted header, with the fulltext column when enrichment ran
 */
export function corpusHeader(includeFulltext: boolean): string[] {
  return includeFulltext ? [...CORPUS_COLUMNS, FULLTEXT_COLUMN] : [...CORPUS_COLUMNS];
}

function cellFor(row: CorpusRow, column: CorpusColumn): TableCell {
  switch (column) {
    case 'id':
      return row.id;
    case 'date_pub':
      return row.date_pub === null ? null : row.date_pub.toISOString();
    default:
      return row[column];
  }
}

/**
 * Project rows onto the persisted table.
 *
 * @param rows - Assembled rows
 * @param includeFulltext - Append the fulltext column
 * @returns Header and cells; dates are ISO 8601
 */
export function projectRows(
  rows: CorpusRow[],
  includeFulltext: boolean
): { header: string[]; rows: TableCell[][] } {
  return {
    header: corpusHeader(includeFulltext),
    rows: rows.map((row) => {
      const cells = CORPUS_COLUMNS.map((column) => cellFor(row, column));
      if (includeFulltext) {
        cells.push(row.fulltext ?? null);
      }
      return cells;
    }),
  };
}
