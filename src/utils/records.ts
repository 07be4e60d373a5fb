import type { InputRecord } from '../concurrent/types.js';

/**
 * Column names used to read records out of a tabular source
 */
export interface RecordColumns {
  idColumn: string;
  contentColumn: string;
}

export type SourceRow = Record<string, unknown>;

export function cellText(value: unknown): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  return null;
}

/**
 * Turn source rows into input records
 *
 * A row without an id gets the positional id `index<i>`.
 */
export function rowsToInputRecords(rows: readonly SourceRow[], columns: RecordColumns): InputRecord[] {
  return rows.map((row, index) => {
    const id = cellText(row[columns.idColumn]);

    return {
      recordId: id !== null && id.trim() !== '' ? id.trim() : `index${index}`,
      content: cellText(row[columns.contentColumn]),
    };
  });
}
