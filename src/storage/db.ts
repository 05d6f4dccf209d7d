/**
 * Database Connection Factory
 *
 * Database connections use better-sqlite3 wrapped with Drizzle ORM. Every
 * connection is bootstrapped with the schema in ./sql before it is handed
 * out, so a fresh file (or ':memory:') is immediately usable.
 *
 * Usage:
 *   import { createDatabase } from '@/storage/db';
 *   const db = createDatabase();            // DATABASE_PATH or default file
 *   const testDb = createDatabase(':memory:');
 */

import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { getDatabasePath } from '../config';
import * as schema from './schema';

const SCHEMA_SQL_PATH = fileURLToPath(new URL('./sql/0000_init.sql', import.meta.url));

/**
 * Applies the schema DDL to a raw connection. The statements are
 * idempotent (IF NOT EXISTS), so this is safe to run on every start.
 *
 * @param sqlite - Open better-sqlite3 connection
 */
export function ensureSchema(sqlite: Database.Database): void {
  sqlite.exec(readFileSync(SCHEMA_SQL_PATH, 'utf8'));
}

/**
 * Wraps an existing better-sqlite3 connection with Drizzle after applying
 * the schema. Tests use this to keep a handle on the raw connection.
 *
 * @param sqlite - Open better-sqlite3 connection
 * @returns A Drizzle ORM database instance with full schema awareness
 */
export function connectDatabase(sqlite: Database.Database) {
  sqlite.pragma('foreign_keys = ON');
  ensureSchema(sqlite);
  return drizzle(sqlite, { schema });
}

/**
 * Opens (or creates) the SQLite database at `dbPath`.
 *
 * @param dbPath - Path to the SQLite file; ':memory:' for an in-memory database.
 *                 Defaults to DATABASE_PATH from configuration.
 */
export function createDatabase(dbPath: string = getDatabasePath()) {
  return connectDatabase(new Database(dbPath));
}

/**
 * Type alias for the Drizzle database instance.
 */
export type AppDatabase = ReturnType<typeof connectDatabase>;
