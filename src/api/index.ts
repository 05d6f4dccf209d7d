/**
 * API Module - Barrel Export
 *
 * The API server is built on Hono and served on Node.js through
 * @hono/node-server. It provides REST endpoints for project management,
 * syllabus resolution, quiz generation and grading, and mastery reports.
 *
 * @example
 * ```typescript
 * import { createApp, createServices } from '@/api';
 *
 * const app = createApp(createServices(db), { logger: false });
 * const res = await app.request('/api/projects');
 * ```
 */

export {
  createApp,
  createServices,
  findAvailablePort,
  startServer,
  type AppServices,
  type CreateAppOptions,
  type RunningServer,
  type ServiceOverrides,
} from './server';

export {
  errorHandler,
  formatErrorResponse,
  AppError,
  ErrorCodes,
  MASTERY_ERROR_STATUS,
  notFoundError,
  validationError,
  type ErrorCode,
  loggerMiddleware,
  DEFAULT_LOGGER_CONFIG,
  type LoggerConfig,
  rateLimiter,
  generalRateLimiter,
  llmRateLimiter,
  RATE_LIMITS,
  type RateLimitConfig,
  validate,
  validateQuery,
} from './middleware';

export { createApiRouter, healthRoutes, projectsRoutes, API_VERSION } from './routes';

export {
  type ApiResponse,
  type ApiError,
  type ApiErrorResponse,
  type ApiResult,
  type ValidationErrorDetail,
  createProjectSchema,
  defineSyllabusSchema,
  generateQuizSchema,
  gradeQuizSchema,
  masteryQuerySchema,
  toAsOfDate,
  type CreateProjectBody,
  type DefineSyllabusBody,
  type GenerateQuizBody,
  type GradeQuizBody,
} from './types';

export { success, error } from './utils/response';
