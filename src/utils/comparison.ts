import type {
  AlphaSummary,
  ComparisonRow,
  ComparisonSummary,
  EntityMetrics,
  MonthKey,
  MonthLeaders,
  MonthReturn,
  PerformancePoint,
  RollingVolatility,
} from '../types';
import { DEFAULT_ENGINE_CONFIG } from '../config/engineConfig';

function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  let sum = 0;
  for (const value of values) {
    sum += value;
  }
  return sum / values.length;
}

// Sample standard deviation (n - 1 denominator)
export function sampleStdDev(values: number[]): number | null {
  if (values.length < 2) return null;
  const avg = values.reduce((sum, v) => sum + v, 0) / values.length;
  let sumSquares = 0;
  for (const value of values) {
    sumSquares += (value - avg) ** 2;
  }
  return Math.sqrt(sumSquares / (values.length - 1));
}

/**
 * Align every entity on the union of their months and rank them.
 *
 * An entity without a point in a month gets no row for it. Rank uses
 * competition ranking on cumulative return among the entities present that
 * month. Alpha against a benchmark is null whenever the benchmark has no point
 * in that month; a benchmark carries no alpha against itself.
 */
export function compare(
  entitySeries: Record<string, PerformancePoint[]>,
  benchmarkIds: Iterable<string>
): ComparisonRow[] {
  const benchmarks = [...new Set(benchmarkIds)].sort();
  const benchmarkSet = new Set(benchmarks);
  const entityIds = Object.keys(entitySeries).sort();

  const byEntity = new Map<string, Map<MonthKey, PerformancePoint>>();
  const allMonths = new Set<MonthKey>();
  for (const entityId of entityIds) {
    const byMonth = new Map<MonthKey, PerformancePoint>();
    for (const point of entitySeries[entityId]) {
      byMonth.set(point.month, point);
      allMonths.add(point.month);
    }
    byEntity.set(entityId, byMonth);
  }

  const rows: ComparisonRow[] = [];

  for (const month of [...allMonths].sort()) {
    const present: PerformancePoint[] = [];
    for (const entityId of entityIds) {
      const point = byEntity.get(entityId)?.get(month);
      if (point) present.push(point);
    }

    const monthRows = present.map((point): ComparisonRow => {
      const rank = 1 + present.filter(other => other.cumulativeReturn > point.cumulativeReturn).length;

      const alphaVsBenchmark: Record<string, number | null> = {};
      for (const benchmarkId of benchmarks) {
        if (benchmarkId === point.entityId) continue;
        const benchmarkPoint = byEntity.get(benchmarkId)?.get(month);
        alphaVsBenchmark[benchmarkId] = benchmarkPoint
          ? point.cumulativeReturn - benchmarkPoint.cumulativeReturn
          : null;
      }

      return {
        month,
        entityId: point.entityId,
        isBenchmark: benchmarkSet.has(point.entityId),
        value: point.value,
        cumulativeReturn: point.cumulativeReturn,
        rank,
        alphaVsBenchmark,
      };
    });

    monthRows.sort((a, b) => a.rank - b.rank || a.entityId.localeCompare(b.entityId));
    rows.push(...monthRows);
  }

  return rows;
}

export function rollingVolatility(points: PerformancePoint[], window: number): RollingVolatility[] {
  return points.map((point, i) => {
    if (i < window - 1) {
      return { month: point.month, volatility: null };
    }
    const returns: number[] = [];
    for (const p of points.slice(i - window + 1, i + 1)) {
      if (p.monthlyReturn === null) {
        return { month: point.month, volatility: null };
      }
      returns.push(p.monthlyReturn);
    }
    return { month: point.month, volatility: sampleStdDev(returns) };
  });
}

// Largest peak-to-trough fall of the growth curve (cumulativeReturn + 1), as a positive fraction
export function maxDrawdown(points: PerformancePoint[]): number {
  let peak = -Infinity;
  let worst = 0;
  for (const point of points) {
    const level = point.cumulativeReturn + 1;
    if (level > peak) {
      peak = level;
    } else if (peak > 0) {
      worst = Math.max(worst, (peak - level) / peak);
    }
  }
  return worst;
}

export function calculateEntityMetrics(
  entityId: string,
  points: PerformancePoint[],
  window: number = DEFAULT_ENGINE_CONFIG.volatilityWindow
): EntityMetrics {
  if (points.length < 2) {
    return {
      entityId,
      status: 'not-applicable',
      reason: 'insufficient-history',
      monthsObserved: points.length,
    };
  }

  const returns: MonthReturn[] = [];
  for (const point of points) {
    if (point.monthlyReturn !== null) {
      returns.push({ month: point.month, monthlyReturn: point.monthlyReturn });
    }
  }

  let bestMonth: MonthReturn | null = null;
  let worstMonth: MonthReturn | null = null;
  for (const entry of returns) {
    if (!bestMonth || entry.monthlyReturn > bestMonth.monthlyReturn) bestMonth = entry;
    if (!worstMonth || entry.monthlyReturn < worstMonth.monthlyReturn) worstMonth = entry;
  }

  const volatility = rollingVolatility(points, window);
  const knownVolatility: number[] = [];
  for (const entry of volatility) {
    if (entry.volatility !== null) knownVolatility.push(entry.volatility);
  }

  return {
    entityId,
    status: 'ok',
    monthsObserved: points.length,
    returnMonths: returns.length,
    averageMonthlyReturn: mean(returns.map(r => r.monthlyReturn)),
    bestMonth,
    worstMonth,
    risingMonths: returns.filter(r => r.monthlyReturn > 0).length,
    fallingMonths: returns.filter(r => r.monthlyReturn < 0).length,
    flatMonths: returns.filter(r => r.monthlyReturn === 0).length,
    rollingVolatility: volatility,
    averageVolatility: mean(knownVolatility),
    maxDrawdown: maxDrawdown(points),
    finalCumulativeReturn: points[points.length - 1].cumulativeReturn,
  };
}

/**
 * Alpha statistics per (entity, benchmark) pair, over the months where both
 * have data. Months without benchmark data are left out rather than counted
 * as zero alpha.
 */
export function summarizeAlpha(rows: ComparisonRow[], benchmarkIds: Iterable<string>): AlphaSummary[] {
  const benchmarks = [...new Set(benchmarkIds)].sort();
  const entityIds = [...new Set(rows.map(r => r.entityId))].sort();
  const summaries: AlphaSummary[] = [];

  for (const entityId of entityIds) {
    const entityRows = rows
      .filter(r => r.entityId === entityId)
      .sort((a, b) => a.month.localeCompare(b.month));

    for (const benchmarkId of benchmarks) {
      if (benchmarkId === entityId) continue;

      const alphas: number[] = [];
      for (const row of entityRows) {
        const alpha = row.alphaVsBenchmark[benchmarkId];
        if (alpha !== null && alpha !== undefined) alphas.push(alpha);
      }

      const outperformMonths = alphas.filter(a => a > 0).length;
      summaries.push({
        entityId,
        benchmarkId,
        comparedMonths: alphas.length,
        outperformMonths,
        outperformRate: alphas.length > 0 ? outperformMonths / alphas.length : null,
        finalAlpha: alphas.length > 0 ? alphas[alphas.length - 1] : null,
        averageAlpha: mean(alphas),
      });
    }
  }

  return summaries;
}

/**
 * Leader and laggard of every month by cumulative return, plus the best and
 * worst performer of the final month. Ties go to the alphabetically first id.
 */
export function findBestAndWorst(rows: ComparisonRow[]): ComparisonSummary {
  const byMonth = new Map<MonthKey, ComparisonRow[]>();
  for (const row of rows) {
    const monthRows = byMonth.get(row.month) ?? [];
    monthRows.push(row);
    byMonth.set(row.month, monthRows);
  }

  const monthLeaders: MonthLeaders[] = [];
  for (const month of [...byMonth.keys()].sort()) {
    const monthRows = [...(byMonth.get(month) ?? [])].sort((a, b) => a.entityId.localeCompare(b.entityId));
    let best = monthRows[0];
    let worst = monthRows[0];
    for (const row of monthRows) {
      if (row.cumulativeReturn > best.cumulativeReturn) best = row;
      if (row.cumulativeReturn < worst.cumulativeReturn) worst = row;
    }
    monthLeaders.push({
      month,
      best: { entityId: best.entityId, cumulativeReturn: best.cumulativeReturn },
      worst: { entityId: worst.entityId, cumulativeReturn: worst.cumulativeReturn },
    });
  }

  const final = monthLeaders.length > 0 ? monthLeaders[monthLeaders.length - 1] : null;
  return {
    finalMonth: final?.month ?? null,
    bestPerformer: final?.best ?? null,
    worstPerformer: final?.worst ?? null,
    monthLeaders,
  };
}
