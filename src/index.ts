export type * from './types';

export {
  DEFAULT_ENGINE_CONFIG,
  IsoDateSchema,
  loadEngineConfig,
  type EngineConfig,
} from './config/engineConfig';
export { getDefaultRegistry, parseRegistry } from './config/instrumentRegistry';
export {
  MARKET_INDEX_ID,
  MID_SMALL_CAP_FUND_ID,
  MULTI_CAP_FUND_ID,
  buildDefaultBenchmarks,
  marketIndexBenchmark,
} from './config/benchmarks';

export { ConfigurationError, EngineError, getErrorMessage, isConfigurationError } from './utils/errors';
export { logger, perf } from './utils/logger';
export {
  TickerResolver,
  normalizeSecurityName,
  similarityScore,
  type TickerResolverOptions,
} from './utils/tickerResolver';
export {
  InMemoryPriceSeriesProvider,
  createPriceProvider,
  findPriceOnOrBefore,
  type PriceSeriesProvider,
} from './utils/priceSeries';
export {
  holdingsFromWeights,
  valuate,
  valuateSchedule,
  type ValuationContext,
  type WeightedHoldings,
} from './utils/valuation';
export { bucketByMonth, cumulativeReturnOf, findMissingMonths, trackPerformance } from './utils/performance';
export {
  calculateEntityMetrics,
  compare,
  findBestAndWorst,
  maxDrawdown,
  rollingVolatility,
  sampleStdDev,
  summarizeAlpha,
} from './utils/comparison';
export { buildGapReport, type GapReportInput } from './utils/gapReport';
export { buildValuationSchedule, monthsBetween, toMonthKey } from './utils/dates';
export {
  parseHoldingsCSV,
  parseWeightsCSV,
  type HoldingsParseResult,
  type SkippedRow,
  type WeightsParseResult,
} from './utils/csvParser';
export { fetchInstrumentHistory, fetchPriceHistory } from './utils/marketData';
export {
  groupHoldingsByInvestor,
  runComparison,
  type ComparisonInput,
  type ComparisonResult,
  type EntityFailure,
} from './utils/analysis';
export { loadComparison, type LoadComparisonOptions, type LoadedComparison } from './utils/loadComparison';
