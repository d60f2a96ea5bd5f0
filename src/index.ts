export * from './types/dashboard';
export { APP_CONFIG, DATASET_FILES } from './lib/config';
export type { DatasetKey } from './lib/config';
export { getLogger, Logger } from './lib/logger';
export type { LogFields, LogLevel } from './lib/logger';
export { FatalConfigurationError, available, unavailable, missingColumn, missingDataset } from './lib/errors';
export {
  ValidationError,
  validateFilterSpec,
  validateRfmFilter,
  validateThresholds,
  validateTopSkuCount,
} from './lib/validation';
export { columnOrAbsent, distinctValues, isMissing, isSentinel, makeTable } from './lib/table';
export { coerceCell, loadBaseTables, loadOptional, parseCsv, preparePrimaryTable, readTable } from './lib/datasetLoader';
export type { BaseTables } from './lib/datasetLoader';
export { getDatasetCache } from './lib/datasetCache';
export {
  applyFilters,
  applyPredicates,
  buildPredicates,
  categoricalPredicate,
  defaultFilterSpec,
  filterOptions,
  filterPrimary,
  rangePredicate,
} from './lib/filterEngine';
export { aggregate, deriveRate, groupTables, topN } from './lib/aggregationLayer';
export { conditionalTotal, distinctCount, isValue, mean, ratio, ratioOf, total } from './lib/kpi';
export {
  defaultThresholds,
  relatedRules,
  resolveThresholds,
  ruleEntities,
  thresholdBounds,
  thresholdRules,
  toAssociationRules,
} from './lib/ruleThresholdEngine';
export {
  customerKpis,
  filterCustomers,
  recencyMonetarySample,
  rfmFilterOptions,
  segmentClusterBreakdown,
  segmentSummary,
} from './lib/rfmViews';
export { auditView, dataQualityViews, missingnessView, outlierView } from './lib/dataQualityViews';
export { computeViews, initialViewRequest } from './lib/dashboardViews';
export type { ViewRequest, ViewsBundle } from './lib/dashboardViews';
export { formatMetric } from './lib/formatting';
export type { MetricStyle } from './lib/formatting';
export { chartStyle, resolveDarkMode } from './lib/chartTheme';
export type { ChartStyle, ThemeMode } from './lib/chartTheme';
export { toCsv } from './lib/csvExport';
