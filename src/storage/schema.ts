/**
 * Database Schema Definitions
 *
 * Drizzle ORM schema for SQLite. One row per study project; the project's
 * mastery state lives in three JSON columns beside its metadata:
 *
 * - syllabus: canonical concept names (string[])
 * - ledger: per-concept attempt counters (ConceptRecord[])
 * - schedule: per-concept review entries (SRSEntry[])
 *
 * The JSON columns are typed `unknown` on purpose. Their contents are
 * validated by the repository on every read, so a hand-edited or legacy row
 * surfaces as a DataCorruptionError instead of flowing into the engine.
 *
 * Timestamps are stored as milliseconds since epoch (integer).
 * The matching DDL is in ./sql/0000_init.sql; tests/integration/schema.test.ts
 * checks that the two agree.
 */

import { sqliteTable, text, integer, uniqueIndex } from 'drizzle-orm/sqlite-core';

/**
 * Projects Table
 */
export const projects = sqliteTable(
  'projects',
  {
    // Unique identifier ('prj_' + UUID)
    id: text('id').primaryKey(),

    // Human-readable project name
    name: text('name').notNull(),

    // Study level the material targets (e.g. 'beginner')
    level: text('level').notNull().default('general'),

    // Extracted text of the source document
    sourceText: text('source_text').notNull(),

    notes: text('notes').notNull().default(''),

    syllabus: text('syllabus', { mode: 'json' }).$type<unknown>().notNull().default([]),

    ledger: text('ledger', { mode: 'json' }).$type<unknown>().notNull().default([]),

    schedule: text('schedule', { mode: 'json' }).$type<unknown>().notNull().default([]),

    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),

    updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => ({
    nameIdx: uniqueIndex('projects_name_unique').on(table.name),
  })
);

export type ProjectRow = typeof projects.$inferSelect;
export type NewProjectRow = typeof projects.$inferInsert;
