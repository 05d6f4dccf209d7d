/**
 * Mastery API Server
 *
 * Hono application serving the project and mastery endpoints, run on
 * Node.js through @hono/node-server.
 *
 * Features:
 * - Automatic port discovery (finds available port if preferred is in use)
 * - Request logging with response times
 * - Rate limiting, with a stricter tier for routes that call the model
 * - Consistent JSON error responses
 * - Health check endpoint
 *
 * Usage:
 *   npm run server
 *
 * Environment Variables:
 *   PORT, HOST - Preferred port (default: 3001) and bind address
 *   DATABASE_PATH - SQLite file (default: study-mastery.db)
 *   ANTHROPIC_API_KEY - Required for syllabus and quiz generation
 */

import { Hono, type MiddlewareHandler } from 'hono';
import { serve, type ServerType } from '@hono/node-server';
import { createServer } from 'net';
import { fileURLToPath } from 'url';
import Database from 'better-sqlite3';
import {
  errorHandler,
  loggerMiddleware,
  generalRateLimiter,
  llmRateLimiter,
  type LoggerConfig,
} from './middleware';
import { createApiRouter, healthRoutes } from './routes';
import { error } from './utils/response';
import { config, validateConfig } from '../config';
import { connectDatabase, type AppDatabase } from '../storage/db';
import { ProjectRepository } from '../storage/repositories';
import { MasteryEngine } from '../core/engine';
import { SyllabusService } from '../core/syllabus';
import {
  AnthropicQuizGenerator,
  AnthropicSyllabusGenerator,
  type CompletionClient,
  type ContentGenerator,
  type SyllabusGenerator,
} from '../core/generation';
import type { QuizRoundEvent } from '../core/targeting';
import { AnthropicClient } from '../llm';

// ============================================================================
// Service Wiring
// ============================================================================

export interface AppServices {
  engine: MasteryEngine;
  projects: ProjectRepository;
}

export interface ServiceOverrides {
  contentGenerator?: ContentGenerator;
  syllabusGenerator?: SyllabusGenerator;
}

/**
 * Defers constructing the Anthropic client until the first generation
 * request, so the server starts (and serves reports) without an API key.
 */
function lazyCompletionClient(): CompletionClient {
  let client: AnthropicClient | undefined;
  return {
    complete: async (request, options) => {
      client ??= new AnthropicClient();
      return client.complete(request, options);
    },
  };
}

function logRoundEvent(projectId: string, event: QuizRoundEvent): void {
  if (event.type === 'state_changed') {
    console.log(`[QuizRound] ${projectId}: ${event.from} -> ${event.to}`);
  } else {
    console.log(`[QuizRound] ${projectId}: ${event.rejected.length} ${event.mode} item(s) rejected`);
  }
}

/**
 * Builds the repository and engine on a database, using the Anthropic
 * generators unless replacements are given.
 */
export function createServices(db: AppDatabase, overrides: ServiceOverrides = {}): AppServices {
  const projects = new ProjectRepository(db);
  const { mastery } = config;
  const client = overrides.contentGenerator && overrides.syllabusGenerator
    ? undefined
    : lazyCompletionClient();

  const generatorOptions = {
    maxSourceChars: mastery.maxSourceChars,
    timeoutMs: mastery.generatorTimeoutMs,
  };

  const syllabusGenerator =
    overrides.syllabusGenerator ??
    new AnthropicSyllabusGenerator(client ?? lazyCompletionClient(), {
      ...generatorOptions,
      maxConcepts: 30,
      maxConceptLength: mastery.maxConceptLength,
    });

  const contentGenerator =
    overrides.contentGenerator ??
    new AnthropicQuizGenerator(client ?? lazyCompletionClient(), generatorOptions);

  const engine = new MasteryEngine(
    {
      store: projects,
      syllabus: new SyllabusService(projects, syllabusGenerator, {
        maxConceptLength: mastery.maxConceptLength,
      }),
      generator: contentGenerator,
      onRoundEvent: logRoundEvent,
    },
    {
      weakThreshold: mastery.weakThreshold,
      maxConceptLength: mastery.maxConceptLength,
      itemCount: mastery.quizItemCount,
      generatorTimeoutMs: mastery.generatorTimeoutMs,
    }
  );

  return { engine, projects };
}

// ============================================================================
// Hono Application Setup
// ============================================================================

export interface CreateAppOptions {
  /** Logger overrides; `false` disables request logging */
  logger?: Partial<LoggerConfig> | false;
  /** Replaces the general /api rate limiter */
  generalLimiter?: MiddlewareHandler;
  /** Replaces the limiter on routes that call the model */
  generationLimiter?: MiddlewareHandler;
}

/**
 * Creates and configures the Hono application.
 *
 * Middleware is applied in this order:
 * 1. Error Handler (onError) - formats errors from every layer
 * 2. Logger - logs all requests with timing
 * 3. Rate Limiters - general on /api/*, stricter on generation routes
 */
export function createApp(services: AppServices, options: CreateAppOptions = {}): Hono {
  const app = new Hono();

  app.onError(errorHandler());

  if (options.logger !== false) {
    app.use('*', loggerMiddleware(options.logger));
  }

  app.route('/health', healthRoutes());

  app.use('/api/*', options.generalLimiter ?? generalRateLimiter());

  app.route(
    '/api',
    createApiRouter({
      ...services,
      generationLimiter: options.generationLimiter ?? llmRateLimiter(),
    })
  );

  app.notFound((c) => error(c, 'NOT_FOUND', `Route ${c.req.method} ${c.req.path} not found`, 404));

  return app;
}

// ============================================================================
// Port Availability Check
// ============================================================================

/**
 * Finds an available port starting from the preferred port, trying each
 * following port up to `maxPort`.
 *
 * @throws Error if no available port is found within the range
 */
export async function findAvailablePort(preferredPort: number, maxPort: number = preferredPort + 100): Promise<number> {
  for (let port = preferredPort; port <= maxPort; port++) {
    const available = await new Promise<boolean>((resolve) => {
      const probe = createServer();
      probe.once('error', () => resolve(false));
      probe.listen(port, () => {
        probe.close(() => resolve(true));
      });
    });

    if (available) return port;
    console.log(`[Server] Port ${port} is in use, trying ${port + 1}...`);
  }

  throw new Error(`No available port found in range ${preferredPort}-${maxPort}`);
}

// ============================================================================
// Server Startup
// ============================================================================

export interface RunningServer {
  server: ServerType;
  port: number;
  close(): Promise<void>;
}

/**
 * Opens the database, wires the services and starts listening.
 */
export async function startServer(preferredPort: number = config.server.port): Promise<RunningServer> {
  validateConfig();

  const sqlite = new Database(config.database.path);
  const db = connectDatabase(sqlite);
  const app = createApp(createServices(db));
  const port = await findAvailablePort(preferredPort);

  const server = serve({ fetch: app.fetch, port, hostname: config.server.host });

  console.log('');
  console.log(`[Server] Study Mastery API listening on http://localhost:${port}`);
  console.log(`[Server] Environment: ${config.server.nodeEnv}`);
  console.log(`[Server] Database: ${config.database.path}`);
  console.log(
    `[Server] Rate limits: ${config.rateLimit.maxRequests} general / ${config.rateLimit.llmMaxRequests} generation requests per ${config.rateLimit.windowMs / 1000}s`
  );
  if (!config.anthropic.apiKey) {
    console.warn('[Server] ANTHROPIC_API_KEY is not set; syllabus and quiz generation will fail');
  }
  console.log('');

  const close = () =>
    new Promise<void>((resolve, reject) => {
      server.close((err) => {
        sqlite.close();
        if (err) reject(err);
        else resolve();
      });
    });

  return { server, port, close };
}

// Start the server when this file is run directly
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  startServer()
    .then((running) => {
      const shutdown = (signal: string) => {
        console.log(`\n[Server] Received ${signal}, shutting down...`);
        running.close().then(
          () => process.exit(0),
          (err: unknown) => {
            console.error('[Server] Error during shutdown:', err);
            process.exit(1);
          }
        );
      };
      process.on('SIGINT', () => shutdown('SIGINT'));
      process.on('SIGTERM', () => shutdown('SIGTERM'));
    })
    .catch((err: unknown) => {
      console.error('[Server] Failed to start:', err);
      process.exit(1);
    });
}
