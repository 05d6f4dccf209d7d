/**
 * Study Mastery Engine
 *
 * Library entry point. Tracks per-concept mastery for study projects,
 * schedules reviews and targets generated quizzes at weak or due concepts.
 *
 * The HTTP server lives in src/api/server.ts and the command-line tool in
 * src/cli/index.ts.
 *
 * @example
 * ```typescript
 * import { createDatabase, createServices } from 'study-mastery-engine';
 *
 * const { engine } = createServices(createDatabase('./data/mastery.db'));
 * const outcome = await engine.generateQuiz('prj_abc');
 * ```
 */

export * from './core/errors';
export * from './core/models';
export * from './core/syllabus';
export * from './core/sanitizer';
export * from './core/ledger';
export * from './core/mastery';
export * from './core/srs';
export * from './core/generation';
export * from './core/targeting';
export * from './core/engine';

export { createDatabase, connectDatabase, ensureSchema, ProjectRepository } from './storage';
export type { AppDatabase } from './storage';
export { createApp, createServices, startServer } from './api';
export type { AppServices, ServiceOverrides, CreateAppOptions, RunningServer } from './api';
export { config, validateConfig } from './config';
