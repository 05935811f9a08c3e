import { eq } from 'drizzle-orm';
import { db, appSettings } from '../index';
import type { AppSetting, NewAppSetting } from '../schema';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36';

// Default settings with their metadata
export const DEFAULT_SETTINGS: Omit<NewAppSetting, 'id'>[] = [
  // Crawler
  { key: 'crawl_timeout_ms', value: '10000', type: 'number', label: 'Fetch Timeout (ms)', description: 'Per-request timeout when fetching a variation page', category: 'crawler' },
  { key: 'crawl_category_limit', value: '20', type: 'number', label: 'Category Batch Cap', description: 'Maximum variations crawled per category batch', category: 'crawler' },
  { key: 'crawl_user_agent', value: DEFAULT_USER_AGENT, type: 'string', label: 'User Agent', description: 'User-Agent header sent with crawl requests', category: 'crawler' },
  { key: 'crawl_runs_history_limit', value: '50', type: 'number', label: 'Crawl Runs Listed', description: 'Default number of crawl runs returned by the runs listing', category: 'crawler' },

  // Analysis
  { key: 'analysis_days_back', value: '30', type: 'number', label: 'Lookback (days)', description: 'Default window for price change analysis', category: 'analysis' },
  { key: 'analysis_min_change_percent', value: '1', type: 'number', label: 'Min Change (%)', description: 'Default threshold below which changes are ignored', category: 'analysis' },
  { key: 'analysis_limit', value: '50', type: 'number', label: 'Result Limit', description: 'Default number of rows returned by an analysis', category: 'analysis' },
];

export interface NumericRange {
  min: number;
  max?: number;
  integer?: boolean;
}

// Allowed values for the numeric settings
export const SETTING_RANGES: Record<string, NumericRange> = {
  crawl_timeout_ms: { min: 1, integer: true },
  crawl_category_limit: { min: 1, integer: true },
  crawl_runs_history_limit: { min: 1, integer: true },
  analysis_days_back: { min: 1, max: 365, integer: true },
  analysis_min_change_percent: { min: 0.1 },
  analysis_limit: { min: 1, max: 1000, integer: true }
};

export function isWithinRange(value: number, range: NumericRange): boolean {
  if (range.integer && !Number.isInteger(value)) return false;
  if (value < range.min) return false;
  return range.max === undefined || value <= range.max;
}

export function describeRange(range: NumericRange): string {
  const kind = range.integer ? 'an integer' : 'a number';
  return range.max === undefined
    ? `${kind} of at least ${range.min}`
    : `${kind} between ${range.min} and ${range.max}`;
}

/**
 * Seed default settings if they don't exist
 */
export function seedSettings() {
  for (const setting of DEFAULT_SETTINGS) {
    const existing = db.select().from(appSettings).where(eq(appSettings.key, setting.key)).get();
    if (!existing) {
      db.insert(appSettings).values(setting).run();
      console.log(`[Settings] Seeded: ${setting.key}`);
    }
  }
}

/**
 * Get all settings
 */
export function getAllSettings(): AppSetting[] {
  return db.select().from(appSettings).all();
}

/**
 * Get a single setting by key
 */
export function getSetting(key: string): AppSetting | undefined {
  return db.select().from(appSettings).where(eq(appSettings.key, key)).get();
}

/**
 * Get a setting value as a number with fallback
 */
export function getSettingNumber(key: string, defaultValue: number): number {
  const setting = getSetting(key);
  if (!setting) return defaultValue;
  const num = Number(setting.value);
  return isNaN(num) ? defaultValue : num;
}

/**
 * Get a setting value as a string with fallback
 */
export function getSettingString(key: string, defaultValue: string): string {
  const setting = getSetting(key);
  return setting?.value || defaultValue;
}

/**
 * Update a setting value
 */
export function updateSetting(key: string, value: string | number | boolean): AppSetting | undefined {
  const stringValue = String(value);
  const result = db
    .update(appSettings)
    .set({ value: stringValue, updatedAt: new Date() })
    .where(eq(appSettings.key, key))
    .returning()
    .get();
  return result;
}
