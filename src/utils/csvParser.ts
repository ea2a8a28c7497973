import type { Holding, WeightEntry } from '../types';
import { ConfigurationError } from './errors';
import { logger } from './logger';
import { findColumn, parseMultiLineCSV, parseNumericField } from './parsers/shared';

export interface SkippedRow {
  row: number; // 1-based line of the row in the file, header included
  reason: 'blank-field' | 'invalid-number';
  content: string;
}

export interface HoldingsParseResult {
  holdings: Holding[];
  skippedRows: SkippedRow[];
}

export interface WeightsParseResult {
  portfolios: Record<string, WeightEntry[]>;
  skippedRows: SkippedRow[];
}

function skip(skippedRows: SkippedRow[], row: number, reason: SkippedRow['reason'], values: string[]): void {
  const content = values.join(',');
  logger.warn(`Skipping row ${row} (${reason}): ${content}`);
  skippedRows.push({ row, reason, content });
}

/**
 * Parse a holdings export with columns NAME, Security Name and Holding.
 * Repeated (investor, security) rows are kept as they are.
 */
export function parseHoldingsCSV(csvText: string): HoldingsParseResult {
  const rows = parseMultiLineCSV(csvText);
  if (rows.length === 0) {
    throw new ConfigurationError('holdings', 'Holdings file is empty');
  }

  const header = rows[0];
  const nameIndex = findColumn(header, 'name');
  const securityIndex = findColumn(header, 'security name');
  const holdingIndex = findColumn(header, 'holding');

  if (nameIndex === -1 || securityIndex === -1 || holdingIndex === -1) {
    throw new ConfigurationError('holdings', 'CSV must have columns: NAME, Security Name, Holding');
  }

  const holdings: Holding[] = [];
  const skippedRows: SkippedRow[] = [];

  for (let i = 1; i < rows.length; i++) {
    const values = rows[i];
    const investorId = values[nameIndex] ?? '';
    const securityName = values[securityIndex] ?? '';

    if (!investorId || !securityName) {
      skip(skippedRows, i + 1, 'blank-field', values);
      continue;
    }

    const quantity = parseNumericField(values[holdingIndex]);
    if (quantity === null) {
      skip(skippedRows, i + 1, 'invalid-number', values);
      continue;
    }

    holdings.push({ investorId, securityName, quantity });
  }

  return { holdings, skippedRows };
}

/**
 * Parse fund weightages with columns Portfolio, Security Name and Weight.
 * Weights may be fractions or percentages; only their ratios matter.
 */
export function parseWeightsCSV(csvText: string): WeightsParseResult {
  const rows = parseMultiLineCSV(csvText);
  if (rows.length === 0) {
    throw new ConfigurationError('weights', 'Weights file is empty');
  }

  const header = rows[0];
  const portfolioIndex = findColumn(header, 'portfolio');
  const securityIndex = findColumn(header, 'security name');
  const weightIndex = findColumn(header, 'weight');

  if (portfolioIndex === -1 || securityIndex === -1 || weightIndex === -1) {
    throw new ConfigurationError('weights', 'CSV must have columns: Portfolio, Security Name, Weight');
  }

  const portfolios: Record<string, WeightEntry[]> = {};
  const skippedRows: SkippedRow[] = [];

  for (let i = 1; i < rows.length; i++) {
    const values = rows[i];
    const portfolio = values[portfolioIndex] ?? '';
    const securityName = values[securityIndex] ?? '';

    // Fund factsheets end each block with a total line
    if (/^total\b/i.test(securityName)) continue;

    if (!portfolio || !securityName) {
      skip(skippedRows, i + 1, 'blank-field', values);
      continue;
    }

    const weight = parseNumericField(values[weightIndex]);
    if (weight === null) {
      skip(skippedRows, i + 1, 'invalid-number', values);
      continue;
    }

    if (!portfolios[portfolio]) {
      portfolios[portfolio] = [];
    }
    portfolios[portfolio].push({ securityName, weight });
  }

  return { portfolios, skippedRows };
}
