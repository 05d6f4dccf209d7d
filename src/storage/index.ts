/**
 * Storage Module - Barrel Export
 *
 * Usage:
 *   import { createDatabase, ProjectRepository } from '@/storage';
 *   const repo = new ProjectRepository(createDatabase());
 */

export { createDatabase, connectDatabase, ensureSchema } from './db';
export type { AppDatabase } from './db';

export { projects } from './schema';
export type { ProjectRow, NewProjectRow } from './schema';

export * from './repositories';
