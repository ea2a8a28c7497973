import { Logger, type ILogObj } from 'tslog';

const LOG_LEVELS: Record<string, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

function resolveMinLevel(): number {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  if (configured && configured in LOG_LEVELS) {
    return LOG_LEVELS[configured];
  }
  return process.env.NODE_ENV === 'production' ? LOG_LEVELS.warn : LOG_LEVELS.info;
}

export const logger = new Logger<ILogObj>({
  name: 'portfolio-benchmark',
  minLevel: resolveMinLevel(),
  type: process.env.NODE_ENV === 'test' ? 'hidden' : 'pretty',
});

interface PerfEntry {
  name: string;
  startTime: number;
}

const activeTimers: Map<string, PerfEntry> = new Map();

// Stage timings for the pipeline, logged at debug level
export const perf = {
  start(name: string): void {
    activeTimers.set(name, { name, startTime: performance.now() });
  },

  end(name: string): number {
    const entry = activeTimers.get(name);
    if (!entry) {
      logger.warn(`No timer found for: ${name}`);
      return 0;
    }

    const duration = performance.now() - entry.startTime;
    activeTimers.delete(name);
    logger.debug(`[PERF] ${name}: ${duration.toFixed(2)}ms`);
    return duration;
  },

  async measure<T>(name: string, fn: () => Promise<T>): Promise<T> {
    this.start(name);
    try {
      return await fn();
    } finally {
      this.end(name);
    }
  },

  measureSync<T>(name: string, fn: () => T): T {
    this.start(name);
    try {
      return fn();
    } finally {
      this.end(name);
    }
  },
};
