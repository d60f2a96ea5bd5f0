import path from 'path';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

function parseLogLevel(raw: string | undefined): LogLevel {
  switch (raw) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return raw;
    default:
      return 'info';
  }
}

export const DATASET_FILES = {
  primary: 'monthly_aggregates.csv',
  rfmCustomers: 'rfm_customer_table.csv',
  rfmTargets: 'rfm_target_list.csv',
  skuSummary: 'sku_summary.csv',
  skuRules: 'sku_pair_rules_top200.csv',
  missingProfile: 'missing_profile_current.csv',
  outlierProfile: 'outlier_profile_iqr_key_metrics.csv',
  auditTopOrders: 'audit_top_orders_by_order_total_gbp.csv',
} as const;

export type DatasetKey = keyof typeof DATASET_FILES;

export const APP_CONFIG = {
  dataDir: path.resolve(process.env.DASHBOARD_DATA_DIR || 'data'),
  logLevel: parseLogLevel(process.env.LOG_LEVEL),
  timeColumn: 'YearMonth',
  drillDownLimit: 50,
  tablePreviewRows: 200,
  topBrands: 10,
  topCountries: 15,
  topCampaigns: 15,
  topMissingColumns: 20,
  scatterSampleSize: parseInt(process.env.SCATTER_SAMPLE_SIZE || '5000', 10),
  scatterSampleSeed: 42,
  skuTopN: { min: 10, max: 50, step: 5, default: 20 },
  defaultMinConfidence: 0.2,
  defaultMinLift: 5,
  placeholder: '—',
} as const;
