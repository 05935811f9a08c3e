import { runMigrations } from './db';
import { seedSettings } from './db/queries/settings';

/**
 * Create tables and seed default settings. Startup stops here if the
 * database cannot be prepared.
 */
export function initializeServer() {
  console.log('[Server] Initializing...');

  runMigrations();
  seedSettings();
  console.log('[Server] Database ready');
}
