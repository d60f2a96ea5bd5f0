import * as Papa from 'papaparse';
import { cellOf, plainValue } from './table';
import { Cell, Table } from '../types/dashboard';

/**
 * Comma-separated copy of a result table; sentinels and missing values become
 * empty cells. No trailing newline, and an empty table yields the header line.
 */
export function toCsv(table: Table<Cell>): string {
  const data = table.rows.map((row) =>
    table.columns.map((col) => {
      const value = plainValue(cellOf(row, col));
      return value === null ? '' : value;
    }),
  );
  // unparse with `fields` and no data appends a newline after the header
  if (data.length === 0) return Papa.unparse([[...table.columns]], { newline: '\n' });
  return Papa.unparse({ fields: [...table.columns], data }, { newline: '\n' });
}
