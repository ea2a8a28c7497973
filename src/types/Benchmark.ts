import type { WeightEntry } from './Holding';

export type BenchmarkKind = 'index' | 'fund';

export interface BenchmarkDefinition {
  id: string;
  kind: BenchmarkKind;
  weights: WeightEntry[];
}
