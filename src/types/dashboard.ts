// ─── Cells & Sentinels ────────────────────────────────────────────────────────

/** A raw value read from a dataset. `null` marks a missing value. */
export type CellValue = string | number | boolean | null;

/** Data absence: the column is absent, or held no usable value. */
export const MISSING = Object.freeze({ kind: 'missing' as const });

/** Computed but undefined, e.g. a ratio whose denominator is zero. */
export const UNDEFINED = Object.freeze({ kind: 'undefined' as const });

export type Missing = typeof MISSING;
export type Undefined = typeof UNDEFINED;
export type Sentinel = Missing | Undefined;

/** KPI result. */
export type Scalar = number | Sentinel;

/** A cell of a derived table. */
export type Cell = CellValue | Sentinel;

export type Row<C = CellValue> = Readonly<Record<string, C>>;

export interface Table<C = CellValue> {
  readonly columns: readonly string[];
  readonly rows: readonly Row<C>[];
}

export interface Column<C = CellValue> {
  name: string;
  values: C[];
}

// ─── Filtering ────────────────────────────────────────────────────────────────

export interface RangePredicate {
  kind: 'range';
  column: string;
  lower: CellValue;
  upper: CellValue;
}

export interface CategoricalPredicate {
  kind: 'in';
  column: string;
  values: readonly CellValue[];
}

export type Predicate = RangePredicate | CategoricalPredicate;

export type CouponFlag = 'all' | boolean;

export interface FilterSpec {
  yearMonth: { from: string; to: string };
  company: string[];
  brands: string[];
  shop: string[];
  shippingCountry: string[];
  campaignType: string[];
  hasCoupon: CouponFlag;
}

export interface FilterOptions {
  yearMonths: string[];
  company: string[];
  brands: string[];
  shop: string[];
  shippingCountry: string[];
  campaignType: string[];
}

// ─── Aggregation ──────────────────────────────────────────────────────────────

export type AggregateOp = 'sum' | 'mean' | 'count' | 'nunique';

export interface Measure {
  column: string;
  op: AggregateOp;
  /** Output column name; defaults to the source column. */
  as?: string;
}

export interface GroupSlice {
  key: CellValue[];
  table: Table;
}

// ─── Association Rules ────────────────────────────────────────────────────────

export interface AssociationRule {
  antecedent: string;
  consequent: string;
  support: number;
  confidence: number;
  lift: number;
  pairOrderCount: number;
}

export interface RuleThresholds {
  minSupport: number;
  minConfidence: number;
  minLift: number;
}

export interface RuleBounds {
  maxSupport: number;
  maxLift: number;
}

// ─── Customers ────────────────────────────────────────────────────────────────

export interface RfmFilter {
  segments: CellValue[];
  clusters: CellValue[];
  recency?: { min: number; max: number };
}

// ─── Availability ─────────────────────────────────────────────────────────────

export type UnavailableCode = 'missing_column' | 'missing_dataset';

export interface UnavailableReason {
  code: UnavailableCode;
  message: string;
}

export type Availability<T> =
  | { status: 'available'; data: T }
  | { status: 'unavailable'; reason: UnavailableReason };
