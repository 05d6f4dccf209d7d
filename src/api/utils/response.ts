/**
 * API Response Utilities
 *
 * Helpers that wrap route results in the standard envelope defined in
 * types.ts, so every endpoint answers `{ success: true, data }` or
 * `{ success: false, error: { code, message, details? } }`.
 *
 * @example
 * ```typescript
 * import { success } from '@/api/utils/response';
 *
 * router.get('/:id', async (c) => {
 *   const project = await projectRepo.findById(c.req.param('id'));
 *   if (!project) {
 *     return error(c, 'NOT_FOUND', 'Project not found', 404);
 *   }
 *   return success(c, project);
 * });
 * ```
 */

import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { ApiResponse, ApiErrorResponse } from '../types';

/**
 * Creates a standardized success response.
 *
 * @param statusCode - HTTP status code (default: 200)
 */
export function success<T>(
  c: Context,
  data: T,
  statusCode: ContentfulStatusCode = 200
): Response {
  const response: ApiResponse<T> = {
    success: true,
    data,
  };
  return c.json(response, statusCode);
}

/**
 * Creates a standardized error response. Most routes throw instead and let
 * the global error handler build this; use it where a handler answers an
 * error without an exception.
 *
 * @param statusCode - HTTP status code (default: 400)
 */
export function error(
  c: Context,
  code: string,
  message: string,
  statusCode: ContentfulStatusCode = 400,
  details?: unknown
): Response {
  const response: ApiErrorResponse = {
    success: false,
    error: {
      code,
      message,
      // Only include details if provided (avoids undefined in JSON)
      ...(details !== undefined && { details }),
    },
  };
  return c.json(response, statusCode);
}
