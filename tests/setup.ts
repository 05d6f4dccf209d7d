/**
 * Test Setup Module
 *
 * Provides utilities for creating isolated test environments with in-memory
 * databases, scripted generators and a Hono app wired to both.
 *
 * Features:
 * - In-memory SQLite database with the schema applied
 * - Scripted stand-ins for the quiz and syllabus generators
 * - Mastery engine and Hono app creation with test dependencies injected
 */

import Database from 'better-sqlite3';
import type { Hono } from 'hono';
import { connectDatabase, type AppDatabase } from '../src/storage/db';
import { ProjectRepository } from '../src/storage/repositories';
import { MasteryEngine, type MasteryEngineConfig } from '../src/core/engine';
import { SyllabusService } from '../src/core/syllabus';
import type {
  ContentGenerator,
  QuizGenerationRequest,
  SyllabusGenerator,
} from '../src/core/generation';
import type { QuizRoundEvent } from '../src/core/targeting';
import { createApp, type CreateAppOptions } from '../src/api/server';

// ============================================================================
// Scripted Generators
// ============================================================================

/**
 * One scripted generator reply:
 * - a string is returned as the raw response
 * - an Error is thrown
 * - 'hang' never settles until the request's signal aborts
 */
export type ScriptedReply = string | Error | 'hang';

/**
 * Content generator that replays scripted replies in order and records
 * every request it receives.
 */
export class FakeQuizGenerator implements ContentGenerator {
  readonly requests: QuizGenerationRequest[] = [];
  readonly signals: AbortSignal[] = [];
  private readonly replies: ScriptedReply[];

  constructor(replies: ScriptedReply[] = []) {
    this.replies = [...replies];
  }

  enqueue(...replies: ScriptedReply[]): void {
    this.replies.push(...replies);
  }

  async generate(request: QuizGenerationRequest, signal?: AbortSignal): Promise<string> {
    this.requests.push(request);
    if (signal) this.signals.push(signal);

    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error('FakeQuizGenerator has no scripted reply left');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    if (reply === 'hang') {
      return new Promise<string>((_, reject) => {
        signal?.addEventListener('abort', () => reject(new Error('generation aborted')), {
          once: true,
        });
      });
    }
    return reply;
  }
}

/**
 * Syllabus generator returning a fixed concept list (or throwing).
 */
export class FakeSyllabusGenerator implements SyllabusGenerator {
  calls = 0;

  constructor(private readonly reply: string[] | Error = ['Recursion', 'Sorting', 'Graphs']) {}

  async generate(): Promise<string[]> {
    this.calls++;
    if (this.reply instanceof Error) {
      throw this.reply;
    }
    return [...this.reply];
  }
}

// ============================================================================
// Test Context
// ============================================================================

export interface TestContext {
  db: AppDatabase;
  sqlite: Database.Database;
  projects: ProjectRepository;
  quizGenerator: FakeQuizGenerator;
  syllabusGenerator: FakeSyllabusGenerator;
  engine: MasteryEngine;
  /** Every quiz round event seen by the engine, in order */
  roundEvents: { projectId: string; event: QuizRoundEvent }[];
}

export interface TestContextOptions {
  syllabusReply?: string[] | Error;
  engineConfig?: Partial<MasteryEngineConfig>;
}

/**
 * Creates a fresh in-memory database and an engine over it.
 *
 * @example
 * ```typescript
 * const ctx = createTestContext();
 * ctx.quizGenerator.enqueue(quizJson([mcqItem({ id: 1 })]));
 * const outcome = await ctx.engine.generateQuiz(projectId);
 * cleanupTestDatabase(ctx);
 * ```
 */
export function createTestContext(options: TestContextOptions = {}): TestContext {
  const sqlite = new Database(':memory:');
  const db = connectDatabase(sqlite);
  const projects = new ProjectRepository(db);
  const quizGenerator = new FakeQuizGenerator();
  const syllabusGenerator = new FakeSyllabusGenerator(options.syllabusReply);
  const roundEvents: TestContext['roundEvents'] = [];

  const engine = new MasteryEngine(
    {
      store: projects,
      syllabus: new SyllabusService(projects, syllabusGenerator),
      generator: quizGenerator,
      onRoundEvent: (projectId, event) => roundEvents.push({ projectId, event }),
    },
    { generatorTimeoutMs: 1_000, ...options.engineConfig }
  );

  return { db, sqlite, projects, quizGenerator, syllabusGenerator, engine, roundEvents };
}

/**
 * Closes the in-memory database.
 */
export function cleanupTestDatabase(ctx: TestContext): void {
  ctx.sqlite.close();
}

/**
 * Creates the Hono app over a test context, without request logging.
 */
export function createTestApp(ctx: TestContext, options: CreateAppOptions = {}): Hono {
  return createApp({ engine: ctx.engine, projects: ctx.projects }, { logger: false, ...options });
}
