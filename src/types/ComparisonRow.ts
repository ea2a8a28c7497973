import type { MonthKey } from './PerformancePoint';

export interface ComparisonRow {
  month: MonthKey;
  entityId: string;
  isBenchmark: boolean;
  value: number;
  cumulativeReturn: number;
  rank: number;
  alphaVsBenchmark: Record<string, number | null>;
}

export interface AlphaSummary {
  entityId: string;
  benchmarkId: string;
  comparedMonths: number;
  outperformMonths: number;
  outperformRate: number | null;
  finalAlpha: number | null;
  averageAlpha: number | null;
}

export interface Performer {
  entityId: string;
  cumulativeReturn: number;
}

export interface MonthLeaders {
  month: MonthKey;
  best: Performer;
  worst: Performer;
}

export interface ComparisonSummary {
  finalMonth: MonthKey | null;
  bestPerformer: Performer | null;
  worstPerformer: Performer | null;
  monthLeaders: MonthLeaders[];
}
