/**
 * Global Error Handler for the Mastery API
 *
 * All errors are transformed into a standardized JSON response format:
 *
 * ```json
 * {
 *   "success": false,
 *   "error": {
 *     "code": "ERROR_CODE",
 *     "message": "Human-readable error message",
 *     "details": { ... } // Optional additional context
 *   }
 * }
 * ```
 *
 * Three families of errors are recognized:
 * - AppError: controlled errors raised by route handlers
 * - MasteryError: engine errors, mapped to a status by their code
 * - LLMError: transport failures talking to the model provider
 *
 * Anything else is an unexpected 500.
 *
 * @example
 * ```typescript
 * import { Hono } from 'hono';
 * import { errorHandler, notFoundError } from '@/api/middleware/error-handler';
 *
 * const app = new Hono();
 * app.onError(errorHandler());
 *
 * app.get('/api/projects/:id', async (c) => {
 *   const project = await projects.findById(c.req.param('id'));
 *   if (!project) throw notFoundError('Project', c.req.param('id'));
 *   return success(c, project);
 * });
 * ```
 */

import type { ErrorHandler } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { MasteryError, MasteryErrorCodes, type MasteryErrorCode } from '../../core/errors';
import { LLMError } from '../../llm/types';
import { config } from '../../config';
import type { ApiErrorResponse } from '../types';

/**
 * Standard error codes used throughout the API.
 * These provide consistent error identification for clients.
 */
export const ErrorCodes = {
  // Client errors (4xx)
  NOT_FOUND: 'NOT_FOUND',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  RATE_LIMITED: 'RATE_LIMITED',
  CONFLICT: 'CONFLICT',

  // Server errors (5xx)
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  LLM_ERROR: 'LLM_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * HTTP status for each engine error code.
 */
export const MASTERY_ERROR_STATUS: Record<MasteryErrorCode, ContentfulStatusCode> = {
  [MasteryErrorCodes.PROJECT_NOT_FOUND]: 404,
  [MasteryErrorCodes.INCOMPLETE_QUIZ]: 400,
  [MasteryErrorCodes.SYLLABUS_LOCKED]: 409,
  [MasteryErrorCodes.DATA_CORRUPTION]: 409,
  [MasteryErrorCodes.SYLLABUS_UNAVAILABLE]: 503,
  [MasteryErrorCodes.GENERATION_FAILURE]: 502,
};

/**
 * Custom application error class for throwing controlled errors.
 *
 * @example
 * ```typescript
 * throw new AppError('CONFLICT', "A project named 'Algorithms' already exists", 409);
 * ```
 */
export class AppError extends Error {
  /** Machine-readable error code */
  public readonly code: ErrorCode | string;
  /** HTTP status code to return */
  public readonly statusCode: ContentfulStatusCode;
  /** Additional error context (optional) */
  public readonly details?: unknown;

  constructor(
    code: ErrorCode | string,
    message: string,
    statusCode: ContentfulStatusCode = 500,
    details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;

    // Maintains proper stack trace for where error was thrown (V8 engines)
    Error.captureStackTrace?.(this, AppError);
  }
}

function withDetails(details: unknown): { details?: unknown } {
  return details !== undefined ? { details } : {};
}

/**
 * Formats an error into the standard API error response structure.
 */
export function formatErrorResponse(error: unknown): {
  response: ApiErrorResponse;
  statusCode: ContentfulStatusCode;
} {
  if (error instanceof AppError) {
    return {
      response: {
        success: false,
        error: { code: error.code, message: error.message, ...withDetails(error.details) },
      },
      statusCode: error.statusCode,
    };
  }

  if (error instanceof MasteryError) {
    return {
      response: {
        success: false,
        error: { code: error.code, message: error.message, ...withDetails(error.details) },
      },
      statusCode: MASTERY_ERROR_STATUS[error.code],
    };
  }

  if (error instanceof LLMError) {
    return {
      response: {
        success: false,
        error: {
          code: ErrorCodes.LLM_ERROR,
          message: error.message,
          details: { type: error.type },
        },
      },
      statusCode: error.type === 'authentication' ? 503 : 502,
    };
  }

  const isDev = config.server.nodeEnv !== 'production';

  if (error instanceof Error) {
    return {
      response: {
        success: false,
        error: {
          code: ErrorCodes.INTERNAL_ERROR,
          message: isDev ? error.message : 'An unexpected error occurred. Please try again.',
          ...(isDev && { details: { stack: error.stack } }),
        },
      },
      statusCode: 500,
    };
  }

  // Non-Error throws (rare but possible)
  return {
    response: {
      success: false,
      error: {
        code: ErrorCodes.INTERNAL_ERROR,
        message: 'An unexpected error occurred',
        ...(isDev && { details: { rawError: String(error) } }),
      },
    },
    statusCode: 500,
  };
}

/**
 * Creates the global error handler, registered with `app.onError`.
 * Controlled errors (4xx) are logged as warnings, everything else as errors.
 */
export function errorHandler(): ErrorHandler {
  return (error, c) => {
    const { response, statusCode } = formatErrorResponse(error);

    if (statusCode >= 500) {
      console.error('[Error Handler]', error);
    } else {
      console.warn(`[Error Handler] ${response.error.code}: ${response.error.message}`);
    }

    return c.json(response, statusCode);
  };
}

/**
 * Helper function to create a not found error for resources.
 *
 * @example
 * ```typescript
 * const project = await projectRepo.findById(id);
 * if (!project) {
 *   throw notFoundError('Project', id);
 * }
 * ```
 */
export function notFoundError(resource: string, id: string | number): AppError {
  return new AppError(
    ErrorCodes.NOT_FOUND,
    `${resource} with ID '${id}' not found`,
    404,
    { resource, id }
  );
}

/**
 * Helper function to create a validation error.
 */
export function validationError(message: string, details?: unknown): AppError {
  return new AppError(ErrorCodes.VALIDATION_ERROR, message, 400, details);
}
