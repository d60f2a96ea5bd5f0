import { APP_CONFIG } from './config';
import { isValue } from './kpi';
import { Scalar } from '../types/dashboard';

export type MetricStyle = 'integer' | 'currency' | 'decimal' | 'percent';

const FORMATTERS: Record<MetricStyle, Intl.NumberFormat> = {
  integer: new Intl.NumberFormat('en-GB', { maximumFractionDigits: 0 }),
  currency: new Intl.NumberFormat('en-GB', { maximumFractionDigits: 0 }),
  decimal: new Intl.NumberFormat('en-GB', { minimumFractionDigits: 2, maximumFractionDigits: 2 }),
  percent: new Intl.NumberFormat('en-GB', { style: 'percent', minimumFractionDigits: 2, maximumFractionDigits: 2 }),
};

/** Display text for a KPI; both sentinels render as the placeholder glyph. */
export function formatMetric(value: Scalar, style: MetricStyle): string {
  if (!isValue(value)) return APP_CONFIG.placeholder;
  return FORMATTERS[style].format(value);
}
