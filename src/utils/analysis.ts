import type {
  AlphaSummary,
  BenchmarkDefinition,
  ComparisonRow,
  ComparisonSummary,
  EntityGapReport,
  EntityMetrics,
  ExcludedConstituent,
  Holding,
  PerformancePoint,
  Valuation,
} from '../types';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../config/engineConfig';
import { calculateEntityMetrics, compare, findBestAndWorst, summarizeAlpha } from './comparison';
import { buildValuationSchedule } from './dates';
import { ConfigurationError, isConfigurationError } from './errors';
import { buildGapReport } from './gapReport';
import { logger, perf } from './logger';
import { trackPerformance } from './performance';
import type { PriceSeriesProvider } from './priceSeries';
import type { TickerResolver } from './tickerResolver';
import { holdingsFromWeights, valuateSchedule, type ValuationContext } from './valuation';

export interface ComparisonInput {
  investors: Holding[];
  benchmarks: BenchmarkDefinition[];
  endDate: string;
  resolver: TickerResolver;
  prices: PriceSeriesProvider;
  config?: EngineConfig;
}

export interface EntityFailure {
  entityId: string;
  code: string;
  message: string;
}

export interface ComparisonResult {
  schedule: string[];
  series: Record<string, PerformancePoint[]>;
  rows: ComparisonRow[];
  metrics: EntityMetrics[];
  alphaSummaries: AlphaSummary[];
  summary: ComparisonSummary;
  gapReports: EntityGapReport[];
  failures: EntityFailure[];
}

interface EntityRun {
  points: PerformancePoint[];
  gapReport: EntityGapReport;
}

export function groupHoldingsByInvestor(holdings: Holding[]): Map<string, Holding[]> {
  const groups = new Map<string, Holding[]>();
  for (const holding of holdings) {
    const group = groups.get(holding.investorId) ?? [];
    group.push(holding);
    groups.set(holding.investorId, group);
  }
  return groups;
}

function runEntity(
  entityId: string,
  holdings: Holding[],
  schedule: string[],
  context: ValuationContext,
  config: EngineConfig,
  excluded?: { excludedConstituents: ExcludedConstituent[]; excludedWeight: number }
): EntityRun {
  // A benchmark whose constituents all failed to price has nothing to value
  const valuations: Valuation[] = holdings.length > 0 ? valuateSchedule(holdings, schedule, context) : [];
  const points = trackPerformance(entityId, valuations, config.monthBucketPolicy);
  const gapReport = buildGapReport({
    entityId,
    holdings,
    valuations,
    points,
    schedule,
    resolver: context.resolver,
    excludedConstituents: excluded?.excludedConstituents,
    excludedWeight: excluded?.excludedWeight,
  });
  return { points, gapReport };
}

/**
 * Value every investor and benchmark on the monthly schedule and compare them.
 *
 * Entities are processed independently. A ConfigurationError stops only the
 * entity it names and is reported in `failures`; every other error propagates.
 */
export function runComparison(input: ComparisonInput): ComparisonResult {
  const config = input.config ?? DEFAULT_ENGINE_CONFIG;
  const context: ValuationContext = { resolver: input.resolver, prices: input.prices };
  const schedule = buildValuationSchedule(config.investmentDate, input.endDate);

  const runs = new Map<string, EntityRun>();
  const failures: EntityFailure[] = [];

  const recordFailure = (entityId: string, error: unknown): void => {
    if (!isConfigurationError(error)) throw error;
    logger.warn(`Skipping ${entityId}: ${error.message}`);
    failures.push({ entityId, code: error.code, message: error.message });
  };

  perf.measureSync('runComparison:investors', () => {
    for (const [investorId, holdings] of groupHoldingsByInvestor(input.investors)) {
      try {
        runs.set(investorId, runEntity(investorId, holdings, schedule, context, config));
      } catch (error) {
        recordFailure(investorId, error);
      }
    }
  });

  const benchmarkIds: string[] = [];
  perf.measureSync('runComparison:benchmarks', () => {
    for (const benchmark of input.benchmarks) {
      try {
        if (runs.has(benchmark.id) || benchmarkIds.includes(benchmark.id)) {
          throw new ConfigurationError(benchmark.id, 'Benchmark id collides with another entity');
        }
        benchmarkIds.push(benchmark.id);
        const weighted = holdingsFromWeights(
          benchmark.id,
          benchmark.weights,
          config.benchmarkNotional,
          config.investmentDate,
          context
        );
        if (weighted.holdings.length === 0) {
          logger.warn(`No constituent of ${benchmark.id} could be priced on ${config.investmentDate}`);
        }
        runs.set(benchmark.id, runEntity(benchmark.id, weighted.holdings, schedule, context, config, weighted));
      } catch (error) {
        recordFailure(benchmark.id, error);
      }
    }
  });

  const entityIds = [...runs.keys()].sort();
  const series: Record<string, PerformancePoint[]> = {};
  for (const entityId of entityIds) {
    const run = runs.get(entityId);
    if (run) series[entityId] = run.points;
  }

  const rows = perf.measureSync('runComparison:compare', () => compare(series, benchmarkIds));
  const metrics = entityIds.map(entityId => calculateEntityMetrics(entityId, series[entityId], config.volatilityWindow));
  const gapReports: EntityGapReport[] = [];
  for (const entityId of entityIds) {
    const run = runs.get(entityId);
    if (run) gapReports.push(run.gapReport);
  }

  logger.info(
    `Compared ${entityIds.length} entities over ${schedule.length} valuation dates (${failures.length} failed)`
  );

  return {
    schedule,
    series,
    rows,
    metrics,
    alphaSummaries: summarizeAlpha(rows, benchmarkIds),
    summary: findBestAndWorst(rows),
    gapReports,
    failures: failures.sort((a, b) => a.entityId.localeCompare(b.entityId)),
  };
}
