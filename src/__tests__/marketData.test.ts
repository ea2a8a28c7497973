import { describe, it, expect, vi, beforeEach } from 'vitest';

const { mockChart, mockLogger } = vi.hoisted(() => ({
  mockChart: vi.fn(),
  mockLogger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

vi.mock('yahoo-finance2', () => ({
  default: class {
    chart = mockChart;
  },
}));

vi.mock('../utils/logger', () => ({
  logger: mockLogger,
  perf: {
    start: vi.fn(),
    end: vi.fn(),
    measure: (_name: string, fn: () => Promise<unknown>) => fn(),
    measureSync: (_name: string, fn: () => unknown) => fn(),
  },
}));

interface ChartQuote {
  date: Date;
  close: number | null;
}

function makeQuote(date: string, close: number | null): ChartQuote {
  // Exchange closes arrive with an intraday timestamp
  return { date: new Date(`${date}T03:45:00Z`), close };
}

// Fresh module per test so the history cache starts empty
async function loadModule() {
  return import('../utils/marketData');
}

describe('fetchInstrumentHistory', () => {
  beforeEach(() => {
    vi.resetModules();
    mockChart.mockReset();
    vi.clearAllMocks();
  });

  it('requests daily bars through the end date', async () => {
    mockChart.mockResolvedValueOnce({ quotes: [makeQuote('2024-04-01', 1500)] });

    const { fetchInstrumentHistory } = await loadModule();
    await fetchInstrumentHistory('INFY.NS', '2024-04-01', '2024-04-05');

    expect(mockChart).toHaveBeenCalledWith('INFY.NS', {
      period1: '2024-04-01',
      period2: '2024-04-06',
      interval: '1d',
    });
  });

  it('maps closes to rounded price points and drops empty bars', async () => {
    mockChart.mockResolvedValueOnce({
      quotes: [makeQuote('2024-04-01', 1500.456), makeQuote('2024-04-02', null), makeQuote('2024-04-03', 1490)],
    });

    const { fetchInstrumentHistory } = await loadModule();
    const prices = await fetchInstrumentHistory('INFY.NS', '2024-04-01', '2024-04-05');

    expect(prices).toEqual([
      { instrumentId: 'INFY.NS', date: '2024-04-01', price: 1500.46 },
      { instrumentId: 'INFY.NS', date: '2024-04-03', price: 1490 },
    ]);
  });

  it('serves repeated requests from the cache', async () => {
    mockChart.mockResolvedValue({ quotes: [makeQuote('2024-04-01', 1500)] });

    const { fetchInstrumentHistory } = await loadModule();
    await fetchInstrumentHistory('INFY.NS', '2024-04-01', '2024-04-05');
    await fetchInstrumentHistory('INFY.NS', '2024-04-01', '2024-04-05');

    expect(mockChart).toHaveBeenCalledTimes(1);
  });

  it('propagates provider errors', async () => {
    mockChart.mockRejectedValueOnce(new Error('Not Found'));

    const { fetchInstrumentHistory } = await loadModule();
    await expect(fetchInstrumentHistory('BAD.NS', '2024-04-01', '2024-04-05')).rejects.toThrow('Not Found');
  });
});

describe('fetchPriceHistory', () => {
  beforeEach(() => {
    vi.resetModules();
    mockChart.mockReset();
    vi.clearAllMocks();
  });

  it('fetches each distinct instrument once', async () => {
    mockChart.mockResolvedValue({ quotes: [makeQuote('2024-04-01', 100)] });

    const { fetchPriceHistory } = await loadModule();
    const histories = await fetchPriceHistory(['TCS.NS', 'INFY.NS', 'TCS.NS'], '2024-04-01', '2024-04-05');

    expect(mockChart).toHaveBeenCalledTimes(2);
    expect(Object.keys(histories)).toEqual(['INFY.NS', 'TCS.NS']);
    expect(histories['TCS.NS']).toEqual([{ instrumentId: 'TCS.NS', date: '2024-04-01', price: 100 }]);
  });

  it('returns an empty history for failed instruments without throwing', async () => {
    mockChart.mockImplementation(async (instrumentId: string) => {
      if (instrumentId === 'BAD.NS') throw new Error('Not Found');
      return { quotes: [makeQuote('2024-04-01', 100)] };
    });

    const { fetchPriceHistory } = await loadModule();
    const histories = await fetchPriceHistory(['INFY.NS', 'BAD.NS'], '2024-04-01', '2024-04-05');

    expect(histories['INFY.NS']).toHaveLength(1);
    expect(histories['BAD.NS']).toEqual([]);
    expect(mockLogger.error).toHaveBeenCalledWith('Failed to fetch BAD.NS: Not Found');
  });
});
