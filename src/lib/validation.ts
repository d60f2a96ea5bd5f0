import { APP_CONFIG } from './config';
import { FilterSpec, RfmFilter, RuleThresholds } from '../types/dashboard';

export class ValidationError extends Error {
  constructor(
    public readonly field: string,
    message: string,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

export function validateFilterSpec(spec: FilterSpec): FilterSpec {
  const { from, to } = spec.yearMonth;
  if (typeof from !== 'string' || from.trim().length === 0) {
    throw new ValidationError('yearMonth.from', 'Range start is required');
  }
  if (typeof to !== 'string' || to.trim().length === 0) {
    throw new ValidationError('yearMonth.to', 'Range end is required');
  }
  if (from > to) {
    throw new ValidationError('yearMonth', `Range start ${from} is after range end ${to}`);
  }
  if (spec.hasCoupon !== 'all' && typeof spec.hasCoupon !== 'boolean') {
    throw new ValidationError('hasCoupon', 'Coupon flag must be "all", true or false');
  }
  return spec;
}

export function validateThresholds(thresholds: RuleThresholds): RuleThresholds {
  const { minSupport, minConfidence, minLift } = thresholds;
  if (!isFiniteNumber(minSupport) || minSupport < 0 || minSupport > 1) {
    throw new ValidationError('minSupport', 'Min support must be between 0 and 1');
  }
  if (!isFiniteNumber(minConfidence) || minConfidence < 0 || minConfidence > 1) {
    throw new ValidationError('minConfidence', 'Min confidence must be between 0 and 1');
  }
  if (!isFiniteNumber(minLift) || minLift < 0) {
    throw new ValidationError('minLift', 'Min lift must be zero or greater');
  }
  return thresholds;
}

export function validateTopSkuCount(value: unknown): number {
  const { min, max, step } = APP_CONFIG.skuTopN;
  if (!isFiniteNumber(value) || !Number.isInteger(value)) {
    throw new ValidationError('topSkuCount', 'Top N must be an integer');
  }
  if (value < min || value > max) {
    throw new ValidationError('topSkuCount', `Top N must be between ${min} and ${max}`);
  }
  if ((value - min) % step !== 0) {
    throw new ValidationError('topSkuCount', `Top N must move in steps of ${step}`);
  }
  return value;
}

export function validateRfmFilter(filter: RfmFilter): RfmFilter {
  if (filter.recency) {
    const { min, max } = filter.recency;
    if (!isFiniteNumber(min) || !isFiniteNumber(max)) {
      throw new ValidationError('recency', 'Recency bounds must be numbers');
    }
    if (min > max) {
      throw new ValidationError('recency', `Recency minimum ${min} is above maximum ${max}`);
    }
  }
  return filter;
}
