/**
 * Schema Consistency Tests
 *
 * The bootstrap DDL in src/storage/sql and the Drizzle table definition
 * describe the same table. These tests read the table SQLite actually built
 * and compare it with the Drizzle columns and indexes.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { getTableConfig } from 'drizzle-orm/sqlite-core';
import { z } from 'zod';
import { projects } from '../../src/storage/schema';
import { createTestContext, cleanupTestDatabase, type TestContext } from '../setup';

const tableInfoSchema = z.array(
  z.object({
    name: z.string(),
    type: z.string(),
    notnull: z.number(),
    dflt_value: z.string().nullable(),
    pk: z.number(),
  })
);

const indexListSchema = z.array(
  z.object({
    name: z.string(),
    unique: z.number(),
    origin: z.string(),
  })
);

const byName = (a: { name: string }, b: { name: string }) => a.name.localeCompare(b.name);

describe('projects table', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  afterEach(() => {
    cleanupTestDatabase(ctx);
  });

  it('should have the columns the Drizzle schema declares', () => {
    const actual = tableInfoSchema
      .parse(ctx.sqlite.prepare('PRAGMA table_info(projects)').all())
      .map((column) => ({
        name: column.name,
        type: column.type,
        notNull: column.notnull === 1,
        hasDefault: column.dflt_value !== null,
        primary: column.pk > 0,
      }))
      .sort(byName);

    const declared = getTableConfig(projects)
      .columns.map((column) => ({
        name: column.name,
        type: column.getSQLType().toUpperCase(),
        notNull: column.notNull,
        hasDefault: column.hasDefault,
        primary: column.primary,
      }))
      .sort(byName);

    expect(actual).toEqual(declared);
  });

  it('should have the indexes the Drizzle schema declares', () => {
    const actual = indexListSchema
      .parse(ctx.sqlite.prepare('PRAGMA index_list(projects)').all())
      // 'c' marks indexes from CREATE INDEX, not the primary key's own
      .filter((index) => index.origin === 'c')
      .map((index) => ({ name: index.name, unique: index.unique === 1 }))
      .sort(byName);

    const declared = getTableConfig(projects)
      .indexes.map((index) => ({ name: index.config.name, unique: index.config.unique }))
      .sort(byName);

    expect(actual).toEqual(declared);
  });
});
