import { APP_CONFIG } from './config';
import { getLogger } from './logger';
import { cellOf, compareValues, hasColumn, toNumber } from './table';
import { AssociationRule, RuleBounds, RuleThresholds, Table } from '../types/dashboard';

const log = getLogger('ruleThresholdEngine');

export const RULE_COLUMNS = ['antecedent', 'consequent', 'support', 'confidence', 'lift', 'pair_order_count'] as const;

// ─── Typing ───────────────────────────────────────────────────────────────────

/**
 * Reads the pair-rules table into typed rules, or `null` when a required column
 * is absent. Rows without a usable entity or metric are dropped.
 */
export function toAssociationRules(table: Table): AssociationRule[] | null {
  const absent = RULE_COLUMNS.filter((c) => !hasColumn(table, c));
  if (absent.length > 0) {
    log.warn('Rule table lacks required columns', { absent });
    return null;
  }

  const rules: AssociationRule[] = [];
  let dropped = 0;
  for (const row of table.rows) {
    const antecedent = cellOf(row, 'antecedent');
    const consequent = cellOf(row, 'consequent');
    const support = toNumber(cellOf(row, 'support'));
    const confidence = toNumber(cellOf(row, 'confidence'));
    const lift = toNumber(cellOf(row, 'lift'));
    const pairOrderCount = toNumber(cellOf(row, 'pair_order_count'));
    if (
      antecedent === null ||
      consequent === null ||
      support === null ||
      confidence === null ||
      lift === null ||
      pairOrderCount === null
    ) {
      dropped++;
      continue;
    }
    rules.push({
      antecedent: String(antecedent),
      consequent: String(consequent),
      support,
      confidence,
      lift,
      pairOrderCount,
    });
  }

  if (dropped > 0) log.warn('Dropped incomplete rule rows', { dropped });
  return rules;
}

// ─── Thresholds ───────────────────────────────────────────────────────────────

export function thresholdRules(rules: readonly AssociationRule[], thresholds: RuleThresholds): AssociationRule[] {
  const { minSupport, minConfidence, minLift } = thresholds;
  return rules.filter((r) => r.support >= minSupport && r.confidence >= minConfidence && r.lift >= minLift);
}

/** Median with linear interpolation between the two middle values. */
export function median(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

export function thresholdBounds(rules: readonly AssociationRule[]): RuleBounds {
  let maxSupport = 0;
  let maxLift = 0;
  for (const r of rules) {
    maxSupport = Math.max(maxSupport, r.support);
    maxLift = Math.max(maxLift, r.lift);
  }
  return { maxSupport, maxLift };
}

/**
 * Defaults derived from the table itself: support starts at the observed
 * median, lift at the configured default capped at the largest observed lift.
 */
export function defaultThresholds(rules: readonly AssociationRule[]): RuleThresholds {
  const { maxLift } = thresholdBounds(rules);
  return {
    minSupport: median(rules.map((r) => r.support)) ?? 0,
    minConfidence: APP_CONFIG.defaultMinConfidence,
    minLift: Math.min(APP_CONFIG.defaultMinLift, maxLift),
  };
}

export function resolveThresholds(
  rules: readonly AssociationRule[],
  overrides: Partial<RuleThresholds> = {},
): RuleThresholds {
  const defaults = defaultThresholds(rules);
  return {
    minSupport: overrides.minSupport ?? defaults.minSupport,
    minConfidence: overrides.minConfidence ?? defaults.minConfidence,
    minLift: overrides.minLift ?? defaults.minLift,
  };
}

// ─── Drill-down ───────────────────────────────────────────────────────────────

/** Sorted distinct entities appearing on either side of a rule. */
export function ruleEntities(rules: readonly AssociationRule[]): string[] {
  const set = new Set<string>();
  for (const r of rules) {
    set.add(r.antecedent);
    set.add(r.consequent);
  }
  return [...set].sort(compareValues);
}

export function relatedRules(
  rules: readonly AssociationRule[],
  entity: string,
  limit: number = APP_CONFIG.drillDownLimit,
): AssociationRule[] {
  return rules
    .filter((r) => r.antecedent === entity || r.consequent === entity)
    .sort((a, b) => b.lift - a.lift || b.confidence - a.confidence || b.support - a.support)
    .slice(0, Math.max(0, limit));
}
