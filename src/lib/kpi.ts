import { columnOrAbsent, isMissing, isSentinel, numericValues, toNumber } from './table';
import { CellValue, MISSING, Scalar, Table, UNDEFINED } from '../types/dashboard';

// KPI functions never throw: an absent column or a column without data yields
// MISSING, a zero or absent denominator yields UNDEFINED.

export function isValue(s: Scalar): s is number {
  return typeof s === 'number';
}

export function sumOrMissing(values: readonly number[]): Scalar {
  if (values.length === 0) return MISSING;
  let acc = 0;
  for (const v of values) acc += v;
  return acc;
}

export function meanOrMissing(values: readonly number[]): Scalar {
  const sum = sumOrMissing(values);
  return isValue(sum) ? sum / values.length : sum;
}

export function total(table: Table, col: string): Scalar {
  const column = columnOrAbsent(table, col);
  if (!column) return MISSING;
  return sumOrMissing(numericValues(column));
}

export function mean(table: Table, col: string): Scalar {
  const column = columnOrAbsent(table, col);
  if (!column) return MISSING;
  return meanOrMissing(numericValues(column));
}

export function ratio(numerator: Scalar, denominator: Scalar): Scalar {
  if (isSentinel(denominator) || denominator === 0) return UNDEFINED;
  if (isSentinel(numerator)) return numerator;
  return numerator / denominator;
}

export function ratioOf(table: Table, numeratorCol: string, denominatorCol: string): Scalar {
  return ratio(total(table, numeratorCol), total(table, denominatorCol));
}

/**
 * Sum of `col` over rows whose `predicateCol` equals `predicateValue`. When the
 * columns exist and `col` has data, an empty match sums to 0.
 */
export function conditionalTotal(
  table: Table,
  col: string,
  predicateCol: string,
  predicateValue: CellValue,
): Scalar {
  const values = columnOrAbsent(table, col);
  const predicate = columnOrAbsent(table, predicateCol);
  if (!values || !predicate) return MISSING;

  let any = false;
  let acc = 0;
  for (let i = 0; i < values.values.length; i++) {
    const n = toNumber(values.values[i]);
    if (n === null) continue;
    any = true;
    if (predicate.values[i] === predicateValue) acc += n;
  }
  return any ? acc : MISSING;
}

export function distinctCount(table: Table, col: string): Scalar {
  const column = columnOrAbsent(table, col);
  if (!column) return MISSING;
  const seen = new Set<CellValue>();
  for (const v of column.values) {
    if (!isMissing(v)) seen.add(v);
  }
  return seen.size;
}
