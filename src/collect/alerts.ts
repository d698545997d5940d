import type { AlertRule } from '../shared/config.js';
import { isRecord } from '../shared/utils.js';

export interface AlertCandidate {
  source_key: string;
  kind: string;
  severity: string;
  threshold: number;
  observed_value: number;
  message: string;
}

const COMPARATORS: Record<AlertRule['comparator'], { test: (a: number, b: number) => boolean; symbol: string }> = {
  gt: { test: (a, b) => a > b, symbol: '>' },
  gte: { test: (a, b) => a >= b, symbol: '>=' },
  lt: { test: (a, b) => a < b, symbol: '<' },
  lte: { test: (a, b) => a <= b, symbol: '<=' },
};

function lookup(data: unknown, field: string): unknown {
  let node = data;
  for (const segment of field.split('.')) {
    if (!isRecord(node)) return undefined;
    node = node[segment];
  }
  return node;
}

/** Numbers, or numeric strings as government APIs often send them. */
export function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value.trim().replace(',', '.'));
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

/**
 * Evaluate every rule independently against one structured record.
 * Each matching rule yields exactly one candidate.
 */
export function evaluateAlerts(sourceKey: string, data: unknown, rules: readonly AlertRule[]): AlertCandidate[] {
  const out: AlertCandidate[] = [];
  for (const rule of rules) {
    if (rule.sources && !rule.sources.includes(sourceKey)) continue;
    const value = toNumber(lookup(data, rule.field));
    if (value === null) continue;

    const comparator = COMPARATORS[rule.comparator];
    if (!comparator.test(value, rule.threshold)) continue;

    out.push({
      source_key: sourceKey,
      kind: rule.kind,
      severity: rule.severity,
      threshold: rule.threshold,
      observed_value: value,
      message: `${rule.kind}: ${rule.field} = ${value} (${comparator.symbol} ${rule.threshold})`,
    });
  }
  return out;
}
