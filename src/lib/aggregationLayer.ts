import { getLogger } from './logger';
import { distinctCount, meanOrMissing, ratio, sumOrMissing } from './kpi';
import { cellOf, compareKeys, hasColumn, isMissing, makeTable, plainValue, toNumber } from './table';
import { Cell, CellValue, GroupSlice, MISSING, Measure, Row, Scalar, Table } from '../types/dashboard';

const log = getLogger('aggregationLayer');

// ─── Grouping ─────────────────────────────────────────────────────────────────

/**
 * Partitions rows by the group-by columns. Rows missing any key value are
 * dropped; slices come back in ascending key order.
 */
export function groupTables(table: Table, groupBy: readonly string[]): GroupSlice[] {
  const groups = new Map<string, { key: CellValue[]; rows: Row[] }>();

  for (const row of table.rows) {
    const key = groupBy.map((g) => cellOf(row, g));
    if (key.some((k) => isMissing(k))) continue;

    const id = JSON.stringify(key);
    let group = groups.get(id);
    if (!group) {
      group = { key, rows: [] };
      groups.set(id, group);
    }
    group.rows.push(row);
  }

  return [...groups.values()]
    .sort((a, b) => compareKeys(a.key, b.key))
    .map((g) => ({ key: g.key, table: makeTable(table.columns, g.rows) }));
}

function reduceMeasure(slice: Table, measure: Measure, present: boolean): Scalar {
  if (measure.op === 'count') return slice.rows.length;
  if (!present) return MISSING;
  if (measure.op === 'nunique') return distinctCount(slice, measure.column);

  const values: number[] = [];
  for (const row of slice.rows) {
    const n = toNumber(cellOf(row, measure.column));
    if (n !== null) values.push(n);
  }
  return measure.op === 'sum' ? sumOrMissing(values) : meanOrMissing(values);
}

export function aggregate(table: Table, groupBy: readonly string[], measures: readonly Measure[]): Table<Cell> {
  const aliases = measures.map((m) => m.as ?? m.column);
  const columns = [...groupBy, ...aliases];

  const absent = measures.filter((m) => m.op !== 'count' && !hasColumn(table, m.column));
  if (absent.length > 0) {
    log.warn('Aggregating over absent columns', { columns: absent.map((m) => m.column) });
  }

  const rows = groupTables(table, groupBy).map((slice) => {
    const out: Record<string, Cell> = {};
    groupBy.forEach((g, i) => {
      out[g] = slice.key[i];
    });
    measures.forEach((m, i) => {
      out[aliases[i]] = reduceMeasure(slice.table, m, hasColumn(table, m.column));
    });
    return out;
  });

  return makeTable<Cell>(columns, rows);
}

// ─── Ranking ──────────────────────────────────────────────────────────────────

/**
 * Sorts by `measure` descending (non-numeric cells last), breaks ties by the
 * tie columns ascending and keeps the first `n` rows.
 */
export function topN(
  table: Table<Cell>,
  measure: string,
  n: number,
  tieColumns: readonly string[] = [],
): Table<Cell> {
  const tieKey = (row: Row<Cell>): CellValue[] => tieColumns.map((c) => plainValue(cellOf(row, c)));

  const sorted = [...table.rows].sort((a, b) => {
    const av = toNumber(cellOf(a, measure));
    const bv = toNumber(cellOf(b, measure));
    if (av !== bv) {
      if (av === null) return 1;
      if (bv === null) return -1;
      return bv - av;
    }
    return compareKeys(tieKey(a), tieKey(b));
  });

  return makeTable(table.columns, sorted.slice(0, Math.max(0, n)));
}

// ─── Derived rates ────────────────────────────────────────────────────────────

function scalarOf(cell: Cell): Scalar {
  const n = toNumber(cell);
  return n === null ? MISSING : n;
}

/** Adds `as` = numerator / denominator per row. */
export function deriveRate(table: Table<Cell>, numerator: string, denominator: string, as: string): Table<Cell> {
  const columns = table.columns.includes(as) ? table.columns : [...table.columns, as];
  const rows = table.rows.map((row) => ({
    ...row,
    [as]: ratio(scalarOf(cellOf(row, numerator)), scalarOf(cellOf(row, denominator))),
  }));
  return makeTable<Cell>(columns, rows);
}
