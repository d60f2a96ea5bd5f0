import path from 'path';
import { makeTable } from '@/lib/table';
import { CellValue, Table } from '@/types/dashboard';

export const FIXTURES_DIR = path.resolve(__dirname, 'fixtures');
export const DASHBOARD_FIXTURES = path.join(FIXTURES_DIR, 'dashboard');

/** Builds a table whose columns are the union of the row keys, in first-seen order. */
export function tableOf(rows: Record<string, CellValue>[], columns?: string[]): Table {
  const cols = columns ?? [...new Set(rows.flatMap((r) => Object.keys(r)))];
  return makeTable(cols, rows);
}
