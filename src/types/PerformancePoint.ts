export type MonthKey = string; // YYYY-MM

export interface PerformancePoint {
  entityId: string;
  month: MonthKey;
  date: string; // valuation date that won the month bucket
  value: number;
  monthlyReturn: number | null; // null for the first month and after a missing month
  cumulativeReturn: number;
  coveredQuantityFraction: number;
}

export type MonthBucketPolicy = 'latest' | 'earliest';
