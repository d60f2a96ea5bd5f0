/**
 * Dashboard view composer
 *
 * `computeViews` is the single entry point the presentation layer calls on
 * every control change. It re-derives all six report views from the immutable
 * base tables:
 * - Executive Overview
 * - Revenue Drivers
 * - Promotions & Coupons
 * - Customer (RFM)
 * - Products & Basket
 * - Data Quality
 */

import { APP_CONFIG, DATASET_FILES } from './config';
import { aggregate, deriveRate, groupTables, topN } from './aggregationLayer';
import { BaseTables } from './datasetLoader';
import { dataQualityViews, DataQualityViews } from './dataQualityViews';
import { available, missingColumn, missingDataset, unavailable } from './errors';
import { COUPON_COLUMN, CATEGORICAL_COLUMNS, defaultFilterSpec, filterOptions, filterPrimary } from './filterEngine';
import { conditionalTotal, mean, ratio, total } from './kpi';
import { getLogger } from './logger';
import {
  customerKpis,
  filterCustomers,
  recencyMonetarySample,
  RfmFilterOptions,
  rfmFilterOptions,
  RfmKpis,
  segmentClusterBreakdown,
  SegmentClusterBreakdown,
  segmentSummary,
} from './rfmViews';
import {
  relatedRules,
  resolveThresholds,
  RULE_COLUMNS,
  ruleEntities,
  thresholdBounds,
  thresholdRules,
  toAssociationRules,
} from './ruleThresholdEngine';
import { hasColumn, head } from './table';
import { validateFilterSpec, validateRfmFilter, validateThresholds, validateTopSkuCount } from './validation';
import {
  AssociationRule,
  Availability,
  Cell,
  FilterOptions,
  FilterSpec,
  Measure,
  RfmFilter,
  RuleBounds,
  RuleThresholds,
  Scalar,
  Table,
} from '../types/dashboard';

const log = getLogger('dashboardViews');

export const PRIMARY_COLUMNS = {
  yearMonth: APP_CONFIG.timeColumn,
  orders: 'orders',
  netRevenue: 'net_revenue_gbp',
  refund: 'refund_gbp',
  orderTotal: 'order_total_gbp',
  refundRate: 'refund_rate',
  aov: 'aov_gbp',
  avgDiscountRate: 'avg_discount_rate',
} as const;

// ─── Types ────────────────────────────────────────────────────────────────────

export interface ViewRequest {
  filters: FilterSpec;
  rfm?: RfmFilter;
  thresholds?: Partial<RuleThresholds>;
  topSkuCount?: number;
  drillDownEntity?: string | null;
}

export interface OverviewKpis {
  netRevenue: Scalar;
  orders: Scalar;
  aov: Scalar;
  refund: Scalar;
  refundRate: Scalar;
  couponUsage: Scalar;
}

export interface OverviewView {
  kpis: OverviewKpis;
  netRevenueByMonth: Table<Cell>;
  topBrands: Availability<Table<Cell>>;
  topCountries: Availability<Table<Cell>>;
}

export interface RevenueDriversView {
  shopPivot: Availability<Table<Cell>>;
  netRevenueByCampaign: Availability<Table<Cell>>;
  refundRateByMonth: Availability<Table<Cell>>;
}

export interface PromotionKpis {
  netRevenueCoupon: Scalar;
  netRevenueNoCoupon: Scalar;
  avgDiscountRate: Scalar;
}

export interface PromotionsView {
  kpis: PromotionKpis;
  topCampaigns: Availability<Table<Cell>>;
  couponUsageByMonth: Availability<Table<Cell>>;
}

export interface CustomersView {
  options: RfmFilterOptions;
  filter: RfmFilter;
  customerCount: number;
  kpis: RfmKpis;
  monetaryBySegment: Availability<Table<Cell>>;
  customersBySegmentCluster: Availability<SegmentClusterBreakdown>;
  recencyMonetary: Availability<Table>;
  targetList: Availability<Table>;
}

export interface RulesView {
  bounds: RuleBounds;
  thresholds: RuleThresholds;
  rules: AssociationRule[];
  entities: string[];
  drillDownEntity: string | null;
  related: AssociationRule[];
}

export interface ProductsView {
  topSkuCount: number;
  topSkus: Availability<Table<Cell>>;
  rules: Availability<RulesView>;
}

export interface ViewsBundle {
  period: { from: string; to: string };
  options: FilterOptions;
  filteredRowCount: number;
  overview: OverviewView;
  revenueDrivers: RevenueDriversView;
  promotions: PromotionsView;
  customers: Availability<CustomersView>;
  products: Availability<ProductsView>;
  dataQuality: DataQualityViews;
}

// ─── Primary table views ──────────────────────────────────────────────────────

function netRevenueRanking(filtered: Table, dimension: string, limit: number): Availability<Table<Cell>> {
  if (!hasColumn(filtered, dimension)) {
    return unavailable(missingColumn(DATASET_FILES.primary, dimension));
  }
  const grouped = aggregate(filtered, [dimension], [
    { column: PRIMARY_COLUMNS.netRevenue, op: 'sum', as: 'net_revenue' },
  ]);
  return available(topN(grouped, 'net_revenue', limit, [dimension]));
}

export function overviewView(filtered: Table): OverviewView {
  const { orders, netRevenue, refund, orderTotal, yearMonth } = PRIMARY_COLUMNS;
  const netRev = total(filtered, netRevenue);
  const orderCount = total(filtered, orders);
  const refundTotal = total(filtered, refund);
  const couponOrders = conditionalTotal(filtered, orders, COUPON_COLUMN, true);

  return {
    kpis: {
      netRevenue: netRev,
      orders: orderCount,
      aov: ratio(netRev, orderCount),
      refund: refundTotal,
      refundRate: ratio(refundTotal, total(filtered, orderTotal)),
      couponUsage: ratio(couponOrders, orderCount),
    },
    netRevenueByMonth: aggregate(filtered, [yearMonth], [
      { column: netRevenue, op: 'sum', as: 'net_revenue' },
      { column: orders, op: 'sum', as: 'orders' },
    ]),
    topBrands: netRevenueRanking(filtered, CATEGORICAL_COLUMNS.brands, APP_CONFIG.topBrands),
    topCountries: netRevenueRanking(filtered, CATEGORICAL_COLUMNS.shippingCountry, APP_CONFIG.topCountries),
  };
}

export function revenueDriversView(filtered: Table): RevenueDriversView {
  const { shop } = CATEGORICAL_COLUMNS;
  const { netRevenue, orders, aov, refundRate, yearMonth } = PRIMARY_COLUMNS;

  let shopPivot: Availability<Table<Cell>>;
  if (hasColumn(filtered, shop)) {
    const measures: Measure[] = [
      { column: netRevenue, op: 'sum', as: 'net_revenue' },
      { column: orders, op: 'sum', as: 'orders' },
    ];
    if (hasColumn(filtered, aov)) measures.push({ column: aov, op: 'mean', as: 'aov' });
    if (hasColumn(filtered, refundRate)) measures.push({ column: refundRate, op: 'mean', as: 'refund_rate' });
    shopPivot = available(topN(aggregate(filtered, [shop], measures), 'net_revenue', Infinity, [shop]));
  } else {
    shopPivot = unavailable(missingColumn(DATASET_FILES.primary, shop));
  }

  return {
    shopPivot,
    netRevenueByCampaign: netRevenueRanking(filtered, CATEGORICAL_COLUMNS.campaignType, APP_CONFIG.topCampaigns),
    refundRateByMonth: hasColumn(filtered, refundRate)
      ? available(aggregate(filtered, [yearMonth], [{ column: refundRate, op: 'mean' }]))
      : unavailable(missingColumn(DATASET_FILES.primary, refundRate)),
  };
}

/** Orders, coupon orders and their ratio per month; zero-order months are UNDEFINED. */
export function couponUsageByMonth(filtered: Table): Availability<Table<Cell>> {
  const { orders, yearMonth } = PRIMARY_COLUMNS;
  const absent = [COUPON_COLUMN, orders].filter((c) => !hasColumn(filtered, c));
  if (absent.length > 0) return unavailable(missingColumn(DATASET_FILES.primary, ...absent));

  const rows = groupTables(filtered, [yearMonth]).map((slice) => ({
    [yearMonth]: slice.key[0],
    orders: total(slice.table, orders),
    coupon_orders: conditionalTotal(slice.table, orders, COUPON_COLUMN, true),
  }));
  const table: Table<Cell> = { columns: [yearMonth, 'orders', 'coupon_orders'], rows };
  return available(deriveRate(table, 'coupon_orders', 'orders', 'coupon_usage'));
}

export function promotionsView(filtered: Table): PromotionsView {
  const { netRevenue, avgDiscountRate } = PRIMARY_COLUMNS;
  return {
    kpis: {
      netRevenueCoupon: conditionalTotal(filtered, netRevenue, COUPON_COLUMN, true),
      netRevenueNoCoupon: conditionalTotal(filtered, netRevenue, COUPON_COLUMN, false),
      avgDiscountRate: mean(filtered, avgDiscountRate),
    },
    topCampaigns: netRevenueRanking(filtered, CATEGORICAL_COLUMNS.campaignType, APP_CONFIG.topCampaigns),
    couponUsageByMonth: couponUsageByMonth(filtered),
  };
}

// ─── Optional dataset views ───────────────────────────────────────────────────

export function customersView(
  rfmCustomers: Table | null,
  rfmTargets: Table | null,
  filter: RfmFilter = { segments: [], clusters: [] },
): Availability<CustomersView> {
  if (!rfmCustomers) return unavailable(missingDataset(DATASET_FILES.rfmCustomers));

  // The recency slider always applies; left alone it spans the full range,
  // which still excludes customers without a recency value.
  const options = rfmFilterOptions(rfmCustomers);
  const recency = filter.recency ?? options.recency;
  const validFilter = validateRfmFilter(recency ? { ...filter, recency } : filter);
  const rf = filterCustomers(rfmCustomers, validFilter);

  return available({
    options,
    filter: validFilter,
    customerCount: rf.rows.length,
    kpis: customerKpis(rf),
    monetaryBySegment: segmentSummary(rf),
    customersBySegmentCluster: segmentClusterBreakdown(rf),
    recencyMonetary: recencyMonetarySample(rf),
    targetList: rfmTargets
      ? available(head(rfmTargets, APP_CONFIG.tablePreviewRows))
      : unavailable(missingDataset(DATASET_FILES.rfmTargets)),
  });
}

export function rulesView(
  skuRules: Table,
  overrides: Partial<RuleThresholds> = {},
  drillDownEntity?: string | null,
): Availability<RulesView> {
  const rules = toAssociationRules(skuRules);
  if (!rules) {
    const absent = RULE_COLUMNS.filter((c) => !hasColumn(skuRules, c));
    return unavailable(missingColumn(DATASET_FILES.skuRules, ...absent));
  }

  const thresholds = validateThresholds(resolveThresholds(rules, overrides));
  const kept = thresholdRules(rules, thresholds);
  const entities = ruleEntities(rules);
  const entity = drillDownEntity ?? entities[0] ?? null;

  return available({
    bounds: thresholdBounds(rules),
    thresholds,
    rules: kept,
    entities,
    drillDownEntity: entity,
    related: entity === null ? [] : relatedRules(kept, entity),
  });
}

export function productsView(
  skuSummary: Table | null,
  skuRules: Table | null,
  request: Pick<ViewRequest, 'thresholds' | 'topSkuCount' | 'drillDownEntity'> = {},
): Availability<ProductsView> {
  if (!skuSummary || !skuRules) {
    return unavailable(missingDataset(DATASET_FILES.skuSummary, DATASET_FILES.skuRules));
  }

  const topSkuCount = validateTopSkuCount(request.topSkuCount ?? APP_CONFIG.skuTopN.default);
  const absent = ['sku', 'revenue_alloc_gbp'].filter((c) => !hasColumn(skuSummary, c));

  return available({
    topSkuCount,
    topSkus:
      absent.length > 0
        ? unavailable(missingColumn(DATASET_FILES.skuSummary, ...absent))
        : available(topN(skuSummary, 'revenue_alloc_gbp', topSkuCount, ['sku'])),
    rules: rulesView(skuRules, request.thresholds, request.drillDownEntity),
  });
}

// ─── Entry point ──────────────────────────────────────────────────────────────

export function initialViewRequest(base: BaseTables): ViewRequest {
  return { filters: defaultFilterSpec(base.primary) };
}

/**
 * Recomputes every view from the base tables. Throws only for a primary table
 * without usable time keys or for malformed request input.
 */
export function computeViews(base: BaseTables, request: ViewRequest): ViewsBundle {
  const options = filterOptions(base.primary);
  const filters = validateFilterSpec(request.filters);
  const filtered = filterPrimary(base.primary, filters);

  log.debug('Recomputing views', {
    from: filters.yearMonth.from,
    to: filters.yearMonth.to,
    rows: filtered.rows.length,
  });
  if (filtered.rows.length === 0) {
    log.info('Filters matched no rows', { from: filters.yearMonth.from, to: filters.yearMonth.to });
  }

  return {
    period: { ...filters.yearMonth },
    options,
    filteredRowCount: filtered.rows.length,
    overview: overviewView(filtered),
    revenueDrivers: revenueDriversView(filtered),
    promotions: promotionsView(filtered),
    customers: customersView(base.rfmCustomers, base.rfmTargets, request.rfm),
    products: productsView(base.skuSummary, base.skuRules, request),
    dataQuality: dataQualityViews(base),
  };
}
