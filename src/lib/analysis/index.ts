/**
 * Price Analysis Engine
 *
 * Read-only reports over the price ledger: recent changes, volatility and a
 * summary of how much history each variation has. The pure functions take
 * the histories and an explicit `now`; `analyze` loads the ledger and applies
 * request/setting defaults.
 */

import { z } from 'zod';
import { getVariationsWithPriceHistory } from '../db/queries/prices';
import { getSettingNumber } from '../db/queries/settings';
import { currentPriceEntry, sortNewestFirst } from '../ledger';
import { fromZodError } from '../errors';

const DAY_MS = 24 * 60 * 60 * 1000;

export const ANALYSIS_TYPES = [
  'all_changes',
  'drops_only',
  'increases_only',
  'volatile_only',
  'summary_only'
] as const;

export type AnalysisType = (typeof ANALYSIS_TYPES)[number];
export type ChangeType = 'INCREASE' | 'DECREASE';
export type ChangeMode = 'all' | 'drops' | 'increases';

export interface HistoryPoint {
  id: number;
  price: number;
  dateTime: Date;
}

export interface VariationHistory {
  sku: string;
  productName: string;
  variationName: string;
  entries: HistoryPoint[];
}

export interface PriceChange {
  sku: string;
  productName: string;
  variationName: string;
  currentPrice: number;
  previousPrice: number;
  changeAmount: number;
  changePercent: number;
  changeType: ChangeType;
  lastChangeDate: Date;
  totalPriceEntries: number;
}

export interface VolatilityResult {
  sku: string;
  productName: string;
  variationName: string;
  currentPrice: number;
  minPrice: number;
  maxPrice: number;
  priceRange: number;
  volatilityPercent: number;
  directionChanges: number;
  totalPriceEntries: number;
}

export interface AnalysisSummary {
  totalVariations: number;
  totalPriceEntries: number;
  variationsWithNoHistory: number;
  variationsWithSingleHistory: number;
  variationsWithMultipleHistory: number;
  recentPriceDrops: number;
  recentPriceIncreases: number;
  daysAnalyzed: number;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function windowStart(now: Date, daysBack: number): number {
  return now.getTime() - daysBack * DAY_MS;
}

/**
 * Compare the two most recent entries inside the window. Null when there are
 * fewer than two or the previous price is not positive.
 */
export function latestChange(
  history: VariationHistory,
  now: Date,
  daysBack: number
): PriceChange | null {
  const since = windowStart(now, daysBack);
  const recent = sortNewestFirst(history.entries.filter((e) => e.dateTime.getTime() >= since));
  if (recent.length < 2) return null;

  const [latest, previous] = recent;
  if (previous.price <= 0) return null;

  const difference = latest.price - previous.price;
  return {
    sku: history.sku,
    productName: history.productName,
    variationName: history.variationName,
    currentPrice: latest.price,
    previousPrice: previous.price,
    changeAmount: round2(difference),
    changePercent: round2((difference / previous.price) * 100),
    changeType: difference > 0 ? 'INCREASE' : 'DECREASE',
    lastChangeDate: latest.dateTime,
    totalPriceEntries: history.entries.length
  };
}

export interface ChangeOptions {
  now: Date;
  daysBack: number;
  minChangePercent: number;
  limit: number;
  mode?: ChangeMode;
}

export function analyzeChanges(
  histories: readonly VariationHistory[],
  options: ChangeOptions
): PriceChange[] {
  const mode = options.mode ?? 'all';
  const changes: PriceChange[] = [];

  for (const history of histories) {
    const change = latestChange(history, options.now, options.daysBack);
    if (!change) continue;
    // Threshold applies to the exact percentage, not the rounded one in the row
    const exactPercent = ((change.currentPrice - change.previousPrice) / change.previousPrice) * 100;
    if (Math.abs(exactPercent) < options.minChangePercent) continue;
    if (mode === 'drops' && change.changeType !== 'DECREASE') continue;
    if (mode === 'increases' && change.changeType !== 'INCREASE') continue;
    changes.push(change);
  }

  // Array#sort is stable, so equal magnitudes keep ledger order
  changes.sort((a, b) => Math.abs(b.changePercent) - Math.abs(a.changePercent));
  return changes.slice(0, options.limit);
}

/**
 * Number of times the price turned around, walking the history oldest first.
 * Unchanged prices between two moves do not count as a turn.
 */
export function countDirectionChanges(entries: readonly HistoryPoint[]): number {
  const chronological = sortNewestFirst(entries).reverse();
  let lastDirection = 0;
  let changes = 0;

  for (let i = 1; i < chronological.length; i++) {
    const direction = Math.sign(chronological[i].price - chronological[i - 1].price);
    if (direction === 0) continue;
    if (lastDirection !== 0 && direction !== lastDirection) changes++;
    lastDirection = direction;
  }
  return changes;
}

export const MIN_ENTRIES_FOR_VOLATILITY = 3;

export function analyzeVolatility(
  histories: readonly VariationHistory[],
  options: { limit: number }
): VolatilityResult[] {
  const results: VolatilityResult[] = [];

  for (const history of histories) {
    if (history.entries.length < MIN_ENTRIES_FOR_VOLATILITY) continue;

    let minPrice = Infinity;
    let maxPrice = -Infinity;
    for (const entry of history.entries) {
      if (entry.price < minPrice) minPrice = entry.price;
      if (entry.price > maxPrice) maxPrice = entry.price;
    }
    if (minPrice <= 0 || maxPrice === minPrice) continue;

    const current = currentPriceEntry(history.entries);
    if (!current) continue;

    results.push({
      sku: history.sku,
      productName: history.productName,
      variationName: history.variationName,
      currentPrice: current.price,
      minPrice,
      maxPrice,
      priceRange: round2(maxPrice - minPrice),
      volatilityPercent: round2(((maxPrice - minPrice) / minPrice) * 100),
      directionChanges: countDirectionChanges(history.entries),
      totalPriceEntries: history.entries.length
    });
  }

  results.sort((a, b) => b.volatilityPercent - a.volatilityPercent);
  return results.slice(0, options.limit);
}

export function summarizeHistories(
  histories: readonly VariationHistory[],
  options: { now: Date; daysBack: number }
): AnalysisSummary {
  const summary: AnalysisSummary = {
    totalVariations: histories.length,
    totalPriceEntries: 0,
    variationsWithNoHistory: 0,
    variationsWithSingleHistory: 0,
    variationsWithMultipleHistory: 0,
    recentPriceDrops: 0,
    recentPriceIncreases: 0,
    daysAnalyzed: options.daysBack
  };

  for (const history of histories) {
    const count = history.entries.length;
    summary.totalPriceEntries += count;
    if (count === 0) summary.variationsWithNoHistory++;
    else if (count === 1) summary.variationsWithSingleHistory++;
    else summary.variationsWithMultipleHistory++;

    const change = latestChange(history, options.now, options.daysBack);
    if (!change || change.currentPrice === change.previousPrice) continue;
    if (change.changeType === 'DECREASE') summary.recentPriceDrops++;
    else summary.recentPriceIncreases++;
  }

  return summary;
}

export const analysisParamsSchema = z.object({
  daysBack: z.coerce.number().int().min(1).max(365),
  minChangePercent: z.coerce.number().min(0.1),
  limit: z.coerce.number().int().min(1).max(1000),
  analysisType: z.enum(ANALYSIS_TYPES)
});

// Query strings are accepted as-is and coerced
export interface AnalysisParams {
  daysBack?: number | string;
  minChangePercent?: number | string;
  limit?: number | string;
  analysisType?: string;
}

export interface ResolvedAnalysisParams {
  daysBack: number;
  minChangePercent: number;
  limit: number;
  analysisType: AnalysisType;
}

export interface AnalysisReport {
  summary: AnalysisSummary;
  results: (PriceChange | VolatilityResult)[];
  parameters: ResolvedAnalysisParams;
  generatedAt: Date;
}

// Request values over stored defaults, validated together
export function resolveAnalysisParams(params: AnalysisParams = {}): ResolvedAnalysisParams {
  const parsed = analysisParamsSchema.safeParse({
    daysBack: params.daysBack ?? getSettingNumber('analysis_days_back', 30),
    minChangePercent: params.minChangePercent ?? getSettingNumber('analysis_min_change_percent', 1),
    limit: params.limit ?? getSettingNumber('analysis_limit', 50),
    analysisType: params.analysisType ?? 'all_changes'
  });
  if (!parsed.success) {
    throw fromZodError(parsed.error, 'Invalid analysis parameters');
  }
  return parsed.data;
}

export async function loadHistories(): Promise<VariationHistory[]> {
  const variations = await getVariationsWithPriceHistory();
  return variations.map((v) => ({
    sku: v.sku,
    productName: v.product.name,
    variationName: v.name,
    entries: v.priceEntries
  }));
}

/**
 * @throws ValidationError when a parameter is out of range
 */
export async function analyze(params: AnalysisParams = {}, now: Date = new Date()): Promise<AnalysisReport> {
  const parameters = resolveAnalysisParams(params);
  const histories = await loadHistories();
  const { daysBack, minChangePercent, limit, analysisType } = parameters;

  const summary = summarizeHistories(histories, { now, daysBack });

  let results: (PriceChange | VolatilityResult)[] = [];
  switch (analysisType) {
    case 'all_changes':
      results = analyzeChanges(histories, { now, daysBack, minChangePercent, limit, mode: 'all' });
      break;
    case 'drops_only':
      results = analyzeChanges(histories, { now, daysBack, minChangePercent, limit, mode: 'drops' });
      break;
    case 'increases_only':
      results = analyzeChanges(histories, { now, daysBack, minChangePercent, limit, mode: 'increases' });
      break;
    case 'volatile_only':
      results = analyzeVolatility(histories, { limit });
      break;
    case 'summary_only':
      break;
  }

  return { summary, results, parameters, generatedAt: now };
}
