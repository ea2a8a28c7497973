import type { MonthBucketPolicy, MonthKey, PerformancePoint, Valuation } from '../types';
import { DEFAULT_ENGINE_CONFIG } from '../config/engineConfig';
import { monthsBetween, previousMonthKey, toMonthKey } from './dates';
import { ConfigurationError } from './errors';

export function cumulativeReturnOf(value: number, firstValue: number): number {
  return value / firstValue - 1;
}

/**
 * Keep one valuation per calendar month.
 * 'latest' keeps the last valuation by date, 'earliest' the first; on equal
 * dates 'latest' keeps the later array element.
 * Valuations with zero coverage priced nothing and are left out, so their month
 * reads as missing rather than as a zero value.
 */
export function bucketByMonth(
  valuations: Valuation[],
  policy: MonthBucketPolicy = DEFAULT_ENGINE_CONFIG.monthBucketPolicy
): Valuation[] {
  const sorted = [...valuations].sort((a, b) => a.date.localeCompare(b.date));
  const buckets = new Map<MonthKey, Valuation>();

  for (const valuation of sorted) {
    if (valuation.coveredQuantityFraction === 0) continue;
    const month = toMonthKey(valuation.date);
    if (policy === 'latest' || !buckets.has(month)) {
      buckets.set(month, valuation);
    }
  }

  return [...buckets.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([, valuation]) => valuation);
}

/**
 * Month-indexed performance series for one entity.
 *
 * monthlyReturn is null for the first month and for any month whose preceding
 * calendar month has no valuation. cumulativeReturn is always measured against
 * the first month's value.
 */
export function trackPerformance(
  entityId: string,
  valuations: Valuation[],
  policy: MonthBucketPolicy = DEFAULT_ENGINE_CONFIG.monthBucketPolicy
): PerformancePoint[] {
  const foreign = valuations.find(v => v.entityId !== entityId);
  if (foreign) {
    throw new ConfigurationError(entityId, `Valuation for ${foreign.entityId} passed to series of ${entityId}`);
  }

  const monthly = bucketByMonth(valuations, policy);
  if (monthly.length === 0) return [];

  const firstValue = monthly[0].totalValue;
  const points: PerformancePoint[] = [];

  for (const valuation of monthly) {
    const month = toMonthKey(valuation.date);
    const previous = points.length > 0 ? points[points.length - 1] : null;
    const monthlyReturn =
      previous && previous.month === previousMonthKey(month)
        ? valuation.totalValue / previous.value - 1
        : null;

    points.push({
      entityId,
      month,
      date: valuation.date,
      value: valuation.totalValue,
      monthlyReturn,
      cumulativeReturn: cumulativeReturnOf(valuation.totalValue, firstValue),
      coveredQuantityFraction: valuation.coveredQuantityFraction,
    });
  }

  return points;
}

/**
 * Months without a point, from the first scheduled month (or first observed,
 * if earlier) through the last scheduled month (or last observed, if later).
 * Without a schedule only the observed range is checked.
 */
export function findMissingMonths(points: PerformancePoint[], schedule: string[] = []): MonthKey[] {
  const bounds = [...points.map(p => p.month), ...schedule.map(toMonthKey)].sort();
  if (bounds.length === 0) return [];
  const observed = new Set(points.map(p => p.month));
  return monthsBetween(bounds[0], bounds[bounds.length - 1]).filter(m => !observed.has(m));
}
