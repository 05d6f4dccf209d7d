/**
 * API Middleware - Barrel Export
 *
 * Applied in this order by createApp:
 *
 * 1. Error Handler (app.onError) - formats every thrown error
 * 2. Logger - logs request information
 * 3. Rate Limiters - general for /api/*, stricter for generation routes
 * 4. Validation - per route
 */

export {
  errorHandler,
  formatErrorResponse,
  AppError,
  ErrorCodes,
  MASTERY_ERROR_STATUS,
  notFoundError,
  validationError,
  type ErrorCode,
} from './error-handler';

export { loggerMiddleware, DEFAULT_LOGGER_CONFIG, type LoggerConfig } from './logger';

export {
  rateLimiter,
  generalRateLimiter,
  llmRateLimiter,
  RATE_LIMITS,
  type RateLimitConfig,
  type RateLimitEntry,
} from './rate-limit';

export { validate, validateQuery } from './validate';
