import { describe, it, expect, vi, beforeEach } from 'vitest';
import { loadComparison } from '../utils/loadComparison';
import { fetchPriceHistory } from '../utils/marketData';
import { DEFAULT_ENGINE_CONFIG } from '../config/engineConfig';
import type { PricePoint } from '../types';

vi.mock('../utils/marketData', () => ({
  fetchPriceHistory: vi.fn(),
}));

vi.mock('../utils/logger', () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
  perf: {
    start: vi.fn(),
    end: vi.fn(),
    measure: (_name: string, fn: () => Promise<unknown>) => fn(),
    measureSync: (_name: string, fn: () => unknown) => fn(),
  },
}));

function makeHistory(instrumentId: string, closes: Array<[string, number]>): PricePoint[] {
  return closes.map(([date, price]) => ({ instrumentId, date, price }));
}

const holdingsCsv = [
  'NAME,Security Name,Holding',
  'Investor A,Infosys Limited,10',
  'Investor B,Infosiys Limited,5',
  'Investor B,Infosys Limited,',
].join('\n');

const weightsCsv = [
  'Portfolio,Security Name,Weight',
  'Multi Cap Fund,Infosys Limited,100%',
  'Mid & Small Cap Fund,Tata Steel Limited,100%',
].join('\n');

describe('loadComparison', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(fetchPriceHistory).mockResolvedValue({
      'INFY.NS': makeHistory('INFY.NS', [
        ['2024-04-01', 100],
        ['2024-05-31', 110],
      ]),
      '^NSEI': makeHistory('^NSEI', [
        ['2024-04-01', 200],
        ['2024-05-31', 220],
      ]),
      'TATASTEEL.NS': [],
    });
  });

  it('fetches every resolved instrument from before the start date', async () => {
    await loadComparison({ holdingsCsv, weightsCsv, endDate: '2024-05-31', config: DEFAULT_ENGINE_CONFIG });

    expect(fetchPriceHistory).toHaveBeenCalledWith(['INFY.NS', '^NSEI', 'TATASTEEL.NS'], '2024-03-22', '2024-05-31');
  });

  it('compares investors against the default benchmarks', async () => {
    const result = await loadComparison({ holdingsCsv, weightsCsv, endDate: '2024-05-31' });

    expect(result.schedule).toEqual(['2024-04-01', '2024-05-31']);
    expect(result.series['Investor A'].map(p => p.value)).toEqual([1000, 1100]);
    expect(result.series['Investor B'].map(p => p.value)).toEqual([500, 550]);
    expect(result.series['NIFTY 50'].map(p => p.value)).toEqual([100000, 110000]);
    expect(result.series['Multi Cap Fund'].map(p => p.value)).toEqual([100000, 110000]);
    expect(result.series['Mid & Small Cap Fund']).toEqual([]);
    expect(result.failures).toEqual([]);
  });

  it('returns skipped rows and resolver gaps alongside the comparison', async () => {
    const result = await loadComparison({ holdingsCsv, weightsCsv, endDate: '2024-05-31' });

    expect(result.skippedRows.holdings).toEqual([
      { row: 4, reason: 'invalid-number', content: 'Investor B,Infosys Limited,' },
    ]);
    expect(result.skippedRows.weights).toEqual([]);
    expect(result.resolverGaps.map(g => [g.securityName, g.resolutionConfidence])).toEqual([
      ['Infosiys Limited', 'fuzzy'],
    ]);

    const midSmall = result.gapReports.find(r => r.entityId === 'Mid & Small Cap Fund');
    expect(midSmall?.excludedWeight).toBe(1);
    expect(midSmall?.insufficientHistory).toBe(true);
    expect(midSmall?.missingMonths).toEqual(['2024-04', '2024-05']);
  });

  it('fails the funds on their own when no weights file is given', async () => {
    const result = await loadComparison({ holdingsCsv, endDate: '2024-05-31' });

    expect(result.failures.map(f => f.entityId)).toEqual(['Mid & Small Cap Fund', 'Multi Cap Fund']);
    expect(result.series['NIFTY 50'].map(p => p.value)).toEqual([100000, 110000]);
  });
});
