import type { MonthKey } from '../types';
import { IsoDateSchema } from '../config/engineConfig';
import { ConfigurationError } from './errors';

// Dates are ISO YYYY-MM-DD strings, so string comparison is chronological.

export function toMonthKey(date: string): MonthKey {
  return date.slice(0, 7);
}

function parseMonthKey(month: MonthKey): { year: number; month: number } {
  const [year, monthNumber] = month.split('-').map(Number);
  return { year, month: monthNumber };
}

function formatMonthKey(year: number, month: number): MonthKey {
  return `${year}-${String(month).padStart(2, '0')}`;
}

export function nextMonthKey(month: MonthKey): MonthKey {
  const parsed = parseMonthKey(month);
  return parsed.month === 12
    ? formatMonthKey(parsed.year + 1, 1)
    : formatMonthKey(parsed.year, parsed.month + 1);
}

export function previousMonthKey(month: MonthKey): MonthKey {
  const parsed = parseMonthKey(month);
  return parsed.month === 1
    ? formatMonthKey(parsed.year - 1, 12)
    : formatMonthKey(parsed.year, parsed.month - 1);
}

// Inclusive list of months from `first` to `last`
export function monthsBetween(first: MonthKey, last: MonthKey): MonthKey[] {
  const months: MonthKey[] = [];
  for (let month = first; month <= last; month = nextMonthKey(month)) {
    months.push(month);
  }
  return months;
}

export function lastDayOfMonth(month: MonthKey): string {
  const { year, month: monthNumber } = parseMonthKey(month);
  // Day 0 of the following month is the last day of this one
  const day = new Date(Date.UTC(year, monthNumber, 0)).getUTCDate();
  return `${month}-${String(day).padStart(2, '0')}`;
}

/**
 * Valuation dates for a run: the start date itself, then the last calendar day
 * of every later month. The final month is cut at `endDate` when it falls
 * mid-month.
 */
export function buildValuationSchedule(startDate: string, endDate: string): string[] {
  for (const [label, date] of [['start', startDate], ['end', endDate]]) {
    const result = IsoDateSchema.safeParse(date);
    if (!result.success) {
      throw ConfigurationError.fromZod('schedule', `Invalid ${label} date "${date}"`, result.error);
    }
  }

  if (endDate < startDate) {
    throw new ConfigurationError('schedule', `End date ${endDate} is before start date ${startDate}`);
  }

  const schedule = [startDate];
  const startMonth = toMonthKey(startDate);
  const endMonth = toMonthKey(endDate);

  for (let month = nextMonthKey(startMonth); month <= endMonth; month = nextMonthKey(month)) {
    const monthEnd = lastDayOfMonth(month);
    schedule.push(monthEnd <= endDate ? monthEnd : endDate);
  }

  return schedule;
}

export function todayIsoDate(): string {
  return new Date().toISOString().split('T')[0];
}

export function addDays(date: string, days: number): string {
  const shifted = new Date(`${date}T00:00:00Z`);
  shifted.setUTCDate(shifted.getUTCDate() + days);
  return shifted.toISOString().split('T')[0];
}
