import { APP_CONFIG, DATASET_FILES } from './config';
import { FatalConfigurationError } from './errors';
import { getLogger } from './logger';
import { cellOf, compareValues, distinctValues, hasColumn, isMissing, makeTable } from './table';
import {
  CategoricalPredicate,
  CellValue,
  FilterOptions,
  FilterSpec,
  Predicate,
  RangePredicate,
  Row,
  Table,
} from '../types/dashboard';

const log = getLogger('filterEngine');

/** Dimension columns of the primary table, keyed by their filter field. */
export const CATEGORICAL_COLUMNS = {
  company: 'Company',
  brands: 'Brands',
  shop: 'shop',
  shippingCountry: 'shipping_country',
  campaignType: 'campaign_type_clean',
} as const;

export const COUPON_COLUMN = 'has_coupon';

// ─── Predicates ───────────────────────────────────────────────────────────────

function matchesRange(row: Row, p: RangePredicate): boolean {
  const value = cellOf(row, p.column);
  if (isMissing(value)) return false;
  return compareValues(p.lower, value) <= 0 && compareValues(value, p.upper) <= 0;
}

function matchesCategorical(row: Row, p: CategoricalPredicate): boolean {
  if (p.values.length === 0) return true;
  const value = cellOf(row, p.column);
  if (isMissing(value)) return false;
  return p.values.includes(value);
}

function matches(row: Row, p: Predicate): boolean {
  switch (p.kind) {
    case 'range':
      return matchesRange(row, p);
    case 'in':
      return matchesCategorical(row, p);
  }
}

/**
 * Keeps rows that satisfy every applicable predicate. A predicate whose column
 * the table lacks, or a categorical predicate with no selected values, is
 * skipped, so the result does not depend on predicate order.
 */
export function applyPredicates(table: Table, predicates: readonly Predicate[]): Table {
  const active = predicates.filter((p) => {
    if (!hasColumn(table, p.column)) {
      log.debug('Skipping predicate on absent column', { column: p.column, kind: p.kind });
      return false;
    }
    return !(p.kind === 'in' && p.values.length === 0);
  });
  if (active.length === 0) return makeTable(table.columns, table.rows);

  const rows = table.rows.filter((row) => active.every((p) => matches(row, p)));
  return makeTable(table.columns, rows);
}

export function applyFilters(
  table: Table,
  range: RangePredicate | null,
  categoricals: readonly CategoricalPredicate[],
): Table {
  return applyPredicates(table, range ? [range, ...categoricals] : categoricals);
}

// ─── Dashboard filter specification ──────────────────────────────────────────

export function rangePredicate(column: string, lower: CellValue, upper: CellValue): RangePredicate {
  return { kind: 'range', column, lower, upper };
}

export function categoricalPredicate(column: string, values: readonly CellValue[]): CategoricalPredicate {
  return { kind: 'in', column, values };
}

export function buildPredicates(spec: FilterSpec): { range: RangePredicate; categoricals: CategoricalPredicate[] } {
  const categoricals = [
    categoricalPredicate(CATEGORICAL_COLUMNS.company, spec.company),
    categoricalPredicate(CATEGORICAL_COLUMNS.brands, spec.brands),
    categoricalPredicate(CATEGORICAL_COLUMNS.shop, spec.shop),
    categoricalPredicate(CATEGORICAL_COLUMNS.shippingCountry, spec.shippingCountry),
    categoricalPredicate(CATEGORICAL_COLUMNS.campaignType, spec.campaignType),
    categoricalPredicate(COUPON_COLUMN, spec.hasCoupon === 'all' ? [] : [spec.hasCoupon]),
  ];
  return {
    range: rangePredicate(APP_CONFIG.timeColumn, spec.yearMonth.from, spec.yearMonth.to),
    categoricals,
  };
}

export function filterPrimary(table: Table, spec: FilterSpec): Table {
  const { range, categoricals } = buildPredicates(spec);
  return applyFilters(table, range, categoricals);
}

/** Sorted distinct time keys; a primary table without any is unusable. */
export function requireYearMonths(table: Table): string[] {
  const column = APP_CONFIG.timeColumn;
  const months = distinctValues(table, column).map((v) => String(v));
  if (months.length === 0) {
    log.error('Primary table has no time keys', { file: DATASET_FILES.primary, column });
    throw new FatalConfigurationError(
      `Column \`${column}\` is missing or empty in ${DATASET_FILES.primary}.`,
      DATASET_FILES.primary,
      column,
    );
  }
  return months;
}

function dimensionOptions(table: Table, column: string): string[] {
  return distinctValues(table, column).map((v) => String(v));
}

/**
 * Selectable values per control, as strings. They match the dimension cells of
 * a table that went through `preparePrimaryTable`.
 */
export function filterOptions(table: Table): FilterOptions {
  return {
    yearMonths: requireYearMonths(table),
    company: dimensionOptions(table, CATEGORICAL_COLUMNS.company),
    brands: dimensionOptions(table, CATEGORICAL_COLUMNS.brands),
    shop: dimensionOptions(table, CATEGORICAL_COLUMNS.shop),
    shippingCountry: dimensionOptions(table, CATEGORICAL_COLUMNS.shippingCountry),
    campaignType: dimensionOptions(table, CATEGORICAL_COLUMNS.campaignType),
  };
}

export function defaultFilterSpec(table: Table): FilterSpec {
  const months = requireYearMonths(table);
  return {
    yearMonth: { from: months[0], to: months[months.length - 1] },
    company: [],
    brands: [],
    shop: [],
    shippingCountry: [],
    campaignType: [],
    hasCoupon: 'all',
  };
}
