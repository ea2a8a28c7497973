import type { MonthKey } from './PerformancePoint';

export interface RollingVolatility {
  month: MonthKey;
  volatility: number | null;
}

export interface MonthReturn {
  month: MonthKey;
  monthlyReturn: number;
}

export interface InsufficientHistory {
  entityId: string;
  status: 'not-applicable';
  reason: 'insufficient-history';
  monthsObserved: number;
}

export interface EntityPerformanceMetrics {
  entityId: string;
  status: 'ok';
  monthsObserved: number;
  returnMonths: number;
  averageMonthlyReturn: number | null;
  bestMonth: MonthReturn | null;
  worstMonth: MonthReturn | null;
  risingMonths: number;
  fallingMonths: number;
  flatMonths: number;
  rollingVolatility: RollingVolatility[];
  averageVolatility: number | null;
  maxDrawdown: number;
  finalCumulativeReturn: number;
}

export type EntityMetrics = EntityPerformanceMetrics | InsufficientHistory;
