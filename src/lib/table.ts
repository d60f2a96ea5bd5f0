import { Cell, CellValue, Column, MISSING, Row, Sentinel, Table, UNDEFINED } from '../types/dashboard';

export function isSentinel(value: unknown): value is Sentinel {
  return value === MISSING || value === UNDEFINED;
}

/** True for `null`, `undefined`, `NaN` and both sentinels. */
export function isMissing(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'number' && Number.isNaN(value)) return true;
  return isSentinel(value);
}

export function makeTable<C = CellValue>(columns: readonly string[], rows: readonly Row<C>[]): Table<C> {
  return { columns: [...columns], rows: [...rows] };
}

export function hasColumn<C>(table: Table<C>, name: string): boolean {
  return table.columns.includes(name);
}

/**
 * The only column-capability check: returns the column's values in row order,
 * or `null` when the table does not carry the column.
 */
export function columnOrAbsent<C>(table: Table<C>, name: string): Column<C | null> | null {
  if (!hasColumn(table, name)) return null;
  return { name, values: table.rows.map((row) => cellOf(row, name)) };
}

export function cellOf<C>(row: Row<C>, column: string): C | null {
  const value = row[column];
  return value === undefined ? null : value;
}

/** Numeric view of a cell; anything that is not a finite number is `null`. */
export function toNumber(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

export function numericValues(column: Column<unknown>): number[] {
  const out: number[] = [];
  for (const v of column.values) {
    const n = toNumber(v);
    if (n !== null) out.push(n);
  }
  return out;
}

function typeRank(value: CellValue): number {
  if (typeof value === 'number') return 0;
  if (typeof value === 'boolean') return 1;
  return 2;
}

/** Total order over present values: numbers, then booleans, then strings. */
export function compareValues(a: CellValue, b: CellValue): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  const ra = typeRank(a);
  const rb = typeRank(b);
  if (ra !== rb) return ra - rb;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  const sa = String(a);
  const sb = String(b);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

export function compareKeys(a: readonly CellValue[], b: readonly CellValue[]): number {
  for (let i = 0; i < Math.min(a.length, b.length); i++) {
    const c = compareValues(a[i], b[i]);
    if (c !== 0) return c;
  }
  return a.length - b.length;
}

/** Plain value of a derived cell, or `null` for sentinels. */
export function plainValue(cell: Cell): CellValue {
  return isSentinel(cell) ? null : cell;
}

/** Sorted distinct present values of a column; empty when the column is absent. */
export function distinctValues(table: Table, name: string): CellValue[] {
  const column = columnOrAbsent(table, name);
  if (!column) return [];
  const seen = new Set<CellValue>();
  for (const v of column.values) {
    if (!isMissing(v)) seen.add(v);
  }
  return [...seen].sort(compareValues);
}

export function head<C>(table: Table<C>, n: number): Table<C> {
  return makeTable(table.columns, table.rows.slice(0, Math.max(0, n)));
}
