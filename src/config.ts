/**
 * Centralized Configuration Module
 *
 * Loads configuration from environment variables and validates it with a Zod
 * schema at module load. The mastery section holds the knobs of the mastery
 * engine (weak threshold, quiz size, generator timeout, concept name bound).
 *
 * Usage:
 *   import { config, validateConfig } from './config';
 *
 *   console.log(config.server.port);
 *   console.log(config.mastery.weakThreshold);
 *
 *   // Stricter checks for production (throws if invalid)
 *   validateConfig();
 *
 * @module config
 */

import { z } from 'zod';

// =============================================================================
// Configuration Schema
// =============================================================================

/**
 * Zod schema for validating environment configuration.
 * This provides runtime validation and TypeScript type inference.
 */
const configSchema = z.object({
  server: z.object({
    port: z.number().int().positive().default(3001),
    host: z.string().default('0.0.0.0'),
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  }),

  database: z.object({
    path: z.string().min(1).default('study-mastery.db'),
  }),

  anthropic: z.object({
    apiKey: z.string().optional(),
    model: z.string().default('claude-sonnet-4-5-20250929'),
    maxTokens: z.number().int().positive().default(8192),
  }),

  mastery: z.object({
    // Accuracy below this ratio marks a concept as weak
    weakThreshold: z.number().gt(0).lte(1).default(0.8),
    // Number of items requested from the generator per round
    quizItemCount: z.number().int().positive().default(10),
    generatorTimeoutMs: z.number().int().positive().default(60000),
    maxConceptLength: z.number().int().positive().default(50),
    maxSourceChars: z.number().int().positive().default(12000),
  }),

  rateLimit: z.object({
    windowMs: z.number().int().positive().default(60000),
    maxRequests: z.number().int().positive().default(100),
    llmMaxRequests: z.number().int().positive().default(10),
  }),
});

// TypeScript type inferred from the Zod schema
export type Config = z.infer<typeof configSchema>;

// =============================================================================
// Environment Variable Loading
// =============================================================================

/**
 * Parse an integer from an environment variable string.
 * Returns undefined if the value is not a valid integer.
 */
function parseIntOrUndefined(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Parse a float from an environment variable string.
 * Returns undefined if the value is not a finite number.
 */
function parseFloatOrUndefined(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseFloat(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Load the raw configuration from process.env.
 * Values are left unvalidated here; the schema decides what is acceptable.
 */
function loadFromEnvironment() {
  return {
    server: {
      port: parseIntOrUndefined(process.env.PORT),
      host: process.env.HOST,
      nodeEnv: process.env.NODE_ENV,
    },
    database: {
      path: process.env.DATABASE_PATH,
    },
    anthropic: {
      apiKey: process.env.ANTHROPIC_API_KEY,
      model: process.env.ANTHROPIC_MODEL,
      maxTokens: parseIntOrUndefined(process.env.ANTHROPIC_MAX_TOKENS),
    },
    mastery: {
      weakThreshold: parseFloatOrUndefined(process.env.MASTERY_WEAK_THRESHOLD),
      quizItemCount: parseIntOrUndefined(process.env.MASTERY_QUIZ_ITEMS),
      generatorTimeoutMs: parseIntOrUndefined(process.env.MASTERY_GENERATOR_TIMEOUT_MS),
      maxConceptLength: parseIntOrUndefined(process.env.MASTERY_MAX_CONCEPT_LENGTH),
      maxSourceChars: parseIntOrUndefined(process.env.MASTERY_MAX_SOURCE_CHARS),
    },
    rateLimit: {
      windowMs: parseIntOrUndefined(process.env.RATE_LIMIT_WINDOW_MS),
      maxRequests: parseIntOrUndefined(process.env.RATE_LIMIT_MAX_REQUESTS),
      llmMaxRequests: parseIntOrUndefined(process.env.RATE_LIMIT_LLM_MAX_REQUESTS),
    },
  };
}

// =============================================================================
// Configuration Validation
// =============================================================================

/**
 * Configuration validation error with detailed information about missing/invalid values.
 */
export class ConfigValidationError extends Error {
  public readonly missingVars: string[];
  public readonly invalidVars: { name: string; reason: string }[];

  constructor(
    message: string,
    missingVars: string[] = [],
    invalidVars: { name: string; reason: string }[] = []
  ) {
    super(message);
    this.name = 'ConfigValidationError';
    this.missingVars = missingVars;
    this.invalidVars = invalidVars;
  }
}

/**
 * Validates the configuration and throws detailed errors for production requirements.
 *
 * In production mode ANTHROPIC_API_KEY is required, since quiz and syllabus
 * generation cannot run without it. In development/test mode it is optional.
 *
 * @throws {ConfigValidationError} If required configuration is missing in production
 */
export function validateConfig(): void {
  const missingVars: string[] = [];
  const invalidVars: { name: string; reason: string }[] = [];

  if (isProduction()) {
    if (!config.anthropic.apiKey) {
      missingVars.push('ANTHROPIC_API_KEY');
    }

    if (config.database.path === ':memory:') {
      invalidVars.push({
        name: 'DATABASE_PATH',
        reason: 'An in-memory database loses all progress on restart',
      });
    }
  }

  if (missingVars.length > 0 || invalidVars.length > 0) {
    const errorParts: string[] = [];

    if (missingVars.length > 0) {
      errorParts.push(`Missing required environment variables: ${missingVars.join(', ')}`);
    }

    if (invalidVars.length > 0) {
      const invalidDescriptions = invalidVars
        .map((v) => `${v.name}: ${v.reason}`)
        .join('; ');
      errorParts.push(`Invalid configuration: ${invalidDescriptions}`);
    }

    throw new ConfigValidationError(
      `Configuration error. ${errorParts.join('. ')}`,
      missingVars,
      invalidVars
    );
  }
}

// =============================================================================
// Configuration Export
// =============================================================================

const parseResult = configSchema.safeParse(loadFromEnvironment());

if (!parseResult.success) {
  console.error('Invalid configuration schema:');
  console.error(parseResult.error.format());
  process.exit(1);
}

/**
 * The validated, type-safe configuration object.
 */
export const config: Config = parseResult.data;

/**
 * Returns the Anthropic API key, or undefined when it is not configured.
 */
export function getAnthropicApiKey(): string | undefined {
  return config.anthropic.apiKey;
}

/**
 * Returns the SQLite database path.
 */
export function getDatabasePath(): string {
  return config.database.path;
}

/**
 * True when NODE_ENV is 'production'.
 */
export function isProduction(): boolean {
  return config.server.nodeEnv === 'production';
}

export default config;
