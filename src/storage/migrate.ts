/**
 * Database Migration Runner
 *
 * Applies the schema DDL in ./sql to the configured SQLite database and
 * lists the resulting tables. The DDL is idempotent, so running this script
 * repeatedly is safe.
 *
 * Usage:
 *   npm run db:migrate
 *   DATABASE_PATH=/path/to/db npm run db:migrate
 */

import Database from 'better-sqlite3';
import { getDatabasePath } from '../config';
import { ensureSchema } from './db';

const dbPath = getDatabasePath();

console.log(`[migrate] Database path: ${dbPath}`);

const sqlite = new Database(dbPath);

try {
  ensureSchema(sqlite);
  console.log('[migrate] Schema applied successfully.');

  const tables = sqlite
    .prepare(
      "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
    )
    .all();

  console.log('[migrate] Tables in database:');
  for (const table of tables) {
    if (typeof table === 'object' && table !== null && 'name' in table) {
      console.log(`  - ${String(table.name)}`);
    }
  }
} catch (error) {
  console.error('[migrate] Migration failed:', error);
  process.exitCode = 1;
} finally {
  sqlite.close();
}
