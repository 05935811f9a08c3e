import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema';
import { existsSync, mkdirSync, readFileSync } from 'fs';
import { dirname } from 'path';
import { fileURLToPath } from 'url';

const DATABASE_URL = process.env.DATABASE_URL || './data/pricewatch.db';
const IN_MEMORY = DATABASE_URL === ':memory:';

// Ensure data directory exists
if (!IN_MEMORY) {
  const dbDir = dirname(DATABASE_URL);
  if (!existsSync(dbDir)) {
    mkdirSync(dbDir, { recursive: true });
  }
}

const sqlite = new Database(DATABASE_URL);

// Enable WAL mode for better concurrent access
if (!IN_MEMORY) {
  sqlite.pragma('journal_mode = WAL');
}
sqlite.pragma('foreign_keys = ON');

export const db = drizzle(sqlite, { schema });

const SCHEMA_FILE = fileURLToPath(new URL('./schema.sql', import.meta.url));

// Create tables on startup; every statement is IF NOT EXISTS so this is safe to rerun
export function runMigrations() {
  if (!existsSync(SCHEMA_FILE)) {
    throw new Error(`[DB] Schema file not found: ${SCHEMA_FILE}`);
  }

  if (!IN_MEMORY) {
    console.log('[DB] Applying schema from:', SCHEMA_FILE);
  }
  sqlite.exec(readFileSync(SCHEMA_FILE, 'utf8'));
}

// Export schema for convenience
export * from './schema';
