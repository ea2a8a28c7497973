export type { Holding, WeightEntry } from './Holding';
export type {
  ResolutionConfidence,
  ExactResolution,
  FuzzyResolution,
  UnresolvedInstrument,
  ResolvedInstrument,
  RegistryEntry,
} from './ResolvedInstrument';
export type { PricePoint } from './PricePoint';
export type { ResolutionGap, PriceGap, ValuationGap, Valuation } from './Valuation';
export type { MonthKey, PerformancePoint, MonthBucketPolicy } from './PerformancePoint';
export type {
  ComparisonRow,
  AlphaSummary,
  Performer,
  MonthLeaders,
  ComparisonSummary,
} from './ComparisonRow';
export type {
  RollingVolatility,
  MonthReturn,
  InsufficientHistory,
  EntityPerformanceMetrics,
  EntityMetrics,
} from './EntityMetrics';
export type {
  FuzzyMatchRecord,
  PriceGapRecord,
  CoverageTrailEntry,
  ExcludedConstituent,
  EntityGapReport,
} from './GapReport';
export type { BenchmarkKind, BenchmarkDefinition } from './Benchmark';
