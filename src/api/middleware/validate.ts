/**
 * Request Validation Middleware
 *
 * Validates request bodies and query strings with Zod schemas. The parsed
 * value is stored on the context under a typed variable, so handlers
 * chained after the middleware read it without casting:
 *
 * @example
 * ```typescript
 * import { validate } from '@/api/middleware/validate';
 * import { createProjectSchema } from '@/api/types';
 *
 * router.post('/', validate(createProjectSchema), async (c) => {
 *   const body = c.get('validatedBody'); // z.infer<typeof createProjectSchema>
 *   const project = await projectRepo.create(body);
 *   return success(c, project, 201);
 * });
 * ```
 *
 * Invalid input never reaches the handler; the middleware responds with
 * 400 and a list of `{ path, message }` details.
 */

import type { Context, MiddlewareHandler } from 'hono';
import { z } from 'zod';
import type { ValidationErrorDetail, ApiErrorResponse } from '../types';

function toDetails(error: z.ZodError): ValidationErrorDetail[] {
  return error.errors.map((e) => ({
    path: e.path.join('.'),
    message: e.message,
  }));
}

function validationFailure(c: Context, message: string, error: z.ZodError): Response {
  const response: ApiErrorResponse = {
    success: false,
    error: {
      code: 'VALIDATION_ERROR',
      message,
      details: toDetails(error),
    },
  };
  return c.json(response, 400);
}

/**
 * Validates the JSON request body.
 *
 * @param schema - Zod schema to validate the body against
 * @param options.optional - Treat an empty body as `{}`
 */
export function validate<T extends z.ZodTypeAny>(
  schema: T,
  options: { optional?: boolean } = {}
): MiddlewareHandler<{ Variables: { validatedBody: z.infer<T> } }> {
  return async (c, next) => {
    let body: unknown;
    const text = await c.req.text();

    if (text.trim().length === 0 && options.optional) {
      body = {};
    } else {
      try {
        body = JSON.parse(text);
      } catch {
        const response: ApiErrorResponse = {
          success: false,
          error: {
            code: 'INVALID_JSON',
            message: 'Request body must be valid JSON',
          },
        };
        return c.json(response, 400);
      }
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return validationFailure(c, 'Invalid request body', result.error);
    }

    c.set('validatedBody', result.data);
    await next();
  };
}

/**
 * Validates URL query parameters.
 */
export function validateQuery<T extends z.ZodTypeAny>(
  schema: T
): MiddlewareHandler<{ Variables: { validatedQuery: z.infer<T> } }> {
  return async (c, next) => {
    const result = schema.safeParse(c.req.query());
    if (!result.success) {
      return validationFailure(c, 'Invalid query parameters', result.error);
    }

    c.set('validatedQuery', result.data);
    await next();
  };
}
