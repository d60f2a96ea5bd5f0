/**
 * Customer (RFM) views
 *
 * Re-slices the pre-computed customer RFM table: segment, cluster and recency
 * filters, headline KPIs, segment summaries and a reproducible scatter sample.
 * Segments and clusters come from upstream; nothing here re-scores customers.
 */

import { APP_CONFIG, DATASET_FILES } from './config';
import { aggregate, topN } from './aggregationLayer';
import { available, missingColumn, unavailable } from './errors';
import { applyPredicates, categoricalPredicate, rangePredicate } from './filterEngine';
import { distinctCount, mean, total } from './kpi';
import { getLogger } from './logger';
import { cellOf, columnOrAbsent, compareValues, distinctValues, hasColumn, makeTable, numericValues, plainValue, toNumber } from './table';
import { Availability, Cell, CellValue, Predicate, RfmFilter, Row, Scalar, Table } from '../types/dashboard';

const log = getLogger('rfmViews');

export const RFM_COLUMNS = {
  customer: 'Customer_ID',
  segment: 'RFM_Segment',
  cluster: 'kmeans_cluster',
  recency: 'recency_days',
  frequency: 'frequency',
  monetary: 'monetary',
} as const;

export interface RfmKpis {
  customers: Scalar;
  totalMonetary: Scalar;
  avgMonetary: Scalar;
  avgFrequency: Scalar;
}

export interface RfmFilterOptions {
  segments: CellValue[];
  clusters: CellValue[];
  recency: { min: number; max: number } | null;
}

export interface SegmentClusterBreakdown {
  segmentOrder: CellValue[];
  table: Table<Cell>;
}

// ─── Filters ──────────────────────────────────────────────────────────────────

export function recencyBounds(table: Table): { min: number; max: number } | null {
  const column = columnOrAbsent(table, RFM_COLUMNS.recency);
  if (!column) return null;
  const values = numericValues(column);
  if (values.length === 0) return null;
  let min = values[0];
  let max = values[0];
  for (const v of values) {
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return { min: Math.floor(min), max: Math.ceil(max) };
}

export function rfmFilterOptions(table: Table): RfmFilterOptions {
  return {
    segments: distinctValues(table, RFM_COLUMNS.segment),
    clusters: distinctValues(table, RFM_COLUMNS.cluster),
    recency: recencyBounds(table),
  };
}

export function filterCustomers(table: Table, filter: RfmFilter): Table {
  const predicates: Predicate[] = [
    categoricalPredicate(RFM_COLUMNS.segment, filter.segments),
    categoricalPredicate(RFM_COLUMNS.cluster, filter.clusters),
  ];
  if (filter.recency) {
    predicates.push(rangePredicate(RFM_COLUMNS.recency, filter.recency.min, filter.recency.max));
  }
  return applyPredicates(table, predicates);
}

// ─── KPIs ─────────────────────────────────────────────────────────────────────

export function customerKpis(table: Table): RfmKpis {
  return {
    customers: hasColumn(table, RFM_COLUMNS.customer)
      ? distinctCount(table, RFM_COLUMNS.customer)
      : table.rows.length,
    totalMonetary: total(table, RFM_COLUMNS.monetary),
    avgMonetary: mean(table, RFM_COLUMNS.monetary),
    avgFrequency: mean(table, RFM_COLUMNS.frequency),
  };
}

// ─── Summaries ────────────────────────────────────────────────────────────────

function requireColumns(table: Table, columns: readonly string[]): Availability<true> {
  const absent = columns.filter((c) => !hasColumn(table, c));
  if (absent.length > 0) {
    log.warn('RFM view skipped', { absent });
    return unavailable(missingColumn(DATASET_FILES.rfmCustomers, ...absent));
  }
  return available(true);
}

/** Distinct customers and total monetary per segment, by monetary descending. */
export function segmentSummary(table: Table): Availability<Table<Cell>> {
  const { segment, customer, monetary } = RFM_COLUMNS;
  const check = requireColumns(table, [segment, monetary, customer]);
  if (check.status === 'unavailable') return check;

  const summary = aggregate(table, [segment], [
    { column: customer, op: 'nunique', as: 'customers' },
    { column: monetary, op: 'sum', as: 'monetary' },
  ]);
  return available(topN(summary, 'monetary', Infinity, [segment]));
}

/**
 * Distinct customers per (segment, cluster). Segments are ordered by their
 * customer total descending, clusters ascending within a segment.
 */
export function segmentClusterBreakdown(table: Table): Availability<SegmentClusterBreakdown> {
  const { segment, cluster, customer } = RFM_COLUMNS;
  const check = requireColumns(table, [segment, cluster, customer]);
  if (check.status === 'unavailable') return check;

  const counts = aggregate(table, [segment, cluster], [{ column: customer, op: 'nunique', as: 'customers' }]);

  const totals = new Map<CellValue, number>();
  for (const row of counts.rows) {
    const seg = plainValue(cellOf(row, segment));
    totals.set(seg, (totals.get(seg) ?? 0) + (toNumber(cellOf(row, 'customers')) ?? 0));
  }
  const segmentOrder = [...totals.entries()]
    .sort((a, b) => b[1] - a[1] || compareValues(a[0], b[0]))
    .map(([seg]) => seg);
  const rank = new Map(segmentOrder.map((seg, i) => [seg, i] as const));

  const rankOf = (row: Row<Cell>): number => rank.get(plainValue(cellOf(row, segment))) ?? segmentOrder.length;
  const rows = [...counts.rows].sort(
    (a, b) =>
      rankOf(a) - rankOf(b) ||
      compareValues(plainValue(cellOf(a, cluster)), plainValue(cellOf(b, cluster))),
  );

  return available({ segmentOrder, table: makeTable(counts.columns, rows) });
}

// ─── Scatter sample ───────────────────────────────────────────────────────────

// Mulberry32
function createPRNG(seed: number): () => number {
  let s = seed >>> 0;
  return function next(): number {
    s += 0x6d2b79f5;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t ^= t + Math.imul(t ^ (t >>> 7), 61 | t);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** At most `size` rows chosen with a seeded generator, kept in table order. */
export function sampleRows(table: Table, size: number, seed: number): Table {
  const n = table.rows.length;
  if (n <= size) return makeTable(table.columns, table.rows);

  const rng = createPRNG(seed);
  const indices = table.rows.map((_, i) => i);
  for (let i = 0; i < size; i++) {
    const j = i + Math.floor(rng() * (n - i));
    [indices[i], indices[j]] = [indices[j], indices[i]];
  }
  const picked = indices.slice(0, size).sort((a, b) => a - b);
  return makeTable(table.columns, picked.map((i) => table.rows[i]));
}

export function recencyMonetarySample(
  table: Table,
  size: number = APP_CONFIG.scatterSampleSize,
  seed: number = APP_CONFIG.scatterSampleSeed,
): Availability<Table> {
  const check = requireColumns(table, [RFM_COLUMNS.recency, RFM_COLUMNS.monetary]);
  if (check.status === 'unavailable') return check;
  return available(sampleRows(table, size, seed));
}
