/**
 * API Response Types
 *
 * Standardized response type definitions for the mastery API.
 * All API endpoints return responses conforming to these types to ensure
 * consistent client-side handling.
 *
 * Two response types are defined:
 * 1. ApiResponse<T> - For successful responses with typed data
 * 2. ApiErrorResponse - For error responses with structured error info
 *
 * This type system enables:
 * - TypeScript type inference for response data
 * - Consistent error handling across all endpoints
 * - Clear API contracts for frontend development
 *
 * @example
 * ```typescript
 * // Success response
 * const response: ApiResponse<Project[]> = {
 *   success: true,
 *   data: [{ id: 'prj_1', name: 'Algorithms', ... }]
 * };
 *
 * // Error response
 * const error: ApiErrorResponse = {
 *   success: false,
 *   error: {
 *     code: 'NOT_FOUND',
 *     message: "Project with ID 'prj_1' not found",
 *   }
 * };
 * ```
 */

import { z } from 'zod';
import { quizItemSchema } from '../core/sanitizer';
import { parseDateKey } from '../core/srs';

// ============================================================================
// Success Response Types
// ============================================================================

/**
 * Standard success response wrapper for API endpoints.
 *
 * All successful API responses wrap their data in this structure,
 * allowing clients to reliably check the `success` field and access
 * strongly-typed data.
 *
 * @typeParam T - The type of data being returned
 *
 * @example
 * ```typescript
 * // Handler returning a typed response
 * app.get('/api/projects', async (c) => {
 *   const body: ApiResponse<Project[]> = { success: true, data: await projectRepo.findAll() };
 *   return c.json(body);
 * });
 * ```
 */
export interface ApiResponse<T> {
  /** Indicates the request was successful */
  success: true;
  /** The response payload with type T */
  data: T;
}

// ============================================================================
// Error Response Types
// ============================================================================

/**
 * Detailed error information structure.
 *
 * Contains all information needed for clients to understand and handle
 * errors appropriately, from displaying user-friendly messages to
 * highlighting specific validation failures.
 */
export interface ApiError {
  /**
   * Machine-readable error code for programmatic handling.
   * Examples: 'VALIDATION_ERROR', 'NOT_FOUND', 'UNAUTHORIZED'
   */
  code: string;

  /**
   * Human-readable error message suitable for display.
   */
  message: string;

  /**
   * Additional error context (optional).
   * For validation errors, this contains field-level error details.
   * For other errors, may contain debugging information.
   */
  details?: unknown;
}

/**
 * Standard error response wrapper for API endpoints.
 *
 * All error responses from the API conform to this structure,
 * enabling consistent error handling on the client side.
 *
 * @example
 * ```typescript
 * // Client-side error handling
 * const response = await fetch('/api/projects/prj_123/mastery');
 * const data = await response.json();
 *
 * if (!data.success) {
 *   // TypeScript knows this is ApiErrorResponse
 *   console.error(`Error ${data.error.code}: ${data.error.message}`);
 *   if (data.error.details) {
 *     // Handle validation errors or additional context
 *   }
 * }
 * ```
 */
export interface ApiErrorResponse {
  /** Indicates the request failed */
  success: false;
  /** Error information */
  error: ApiError;
}

/**
 * Union type for any API response (success or error).
 *
 * Useful for typing generic response handlers that need to
 * discriminate between success and error cases.
 *
 * @typeParam T - The type of data for successful responses
 */
export type ApiResult<T> = ApiResponse<T> | ApiErrorResponse;

// ============================================================================
// Validation Detail Types
// ============================================================================

/**
 * Structure for individual validation error details.
 *
 * When a Zod validation fails, errors are transformed into this
 * format to provide clear, field-specific error information.
 */
export interface ValidationErrorDetail {
  /** Dot-notation path to the invalid field (e.g., 'user.email') */
  path: string;
  /** Human-readable description of the validation failure */
  message: string;
}

// ============================================================================
// Request Schemas (Zod)
// ============================================================================

const dateKey = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be formatted YYYY-MM-DD')
  .refine((value) => parseDateKey(value) !== null, 'Invalid date');

/**
 * Schema for creating a project.
 */
export const createProjectSchema = z.object({
  /** Unique display name (1-100 characters) */
  name: z
    .string()
    .trim()
    .min(1, 'Name is required')
    .max(100, 'Name must be 100 characters or less'),

  /** Study material the syllabus and quizzes are drawn from */
  sourceText: z
    .string()
    .refine((value) => value.trim().length > 0, 'Source text is required')
    .refine((value) => value.length <= 200_000, 'Source text must be 200000 characters or less'),

  /** Study level, e.g. 'beginner' */
  level: z.string().trim().min(1).max(50).optional(),

  notes: z.string().max(5000, 'Notes must be 5000 characters or less').optional(),
});

export type CreateProjectBody = z.infer<typeof createProjectSchema>;

/**
 * Schema for an explicit syllabus definition.
 */
export const defineSyllabusSchema = z.object({
  concepts: z
    .array(z.string())
    .min(1, 'At least one concept is required')
    .max(100, 'At most 100 concepts may be submitted'),
});

export type DefineSyllabusBody = z.infer<typeof defineSyllabusSchema>;

/**
 * Optional body of a quiz generation request.
 */
export const generateQuizSchema = z.object({
  /** Day the review-priority list is computed for; defaults to today */
  asOf: dateKey.optional(),
});

export type GenerateQuizBody = z.infer<typeof generateQuizSchema>;

const quizAnswerSchema = z.object({
  itemId: z.number().int(),
  answer: z.string(),
  confidence: z.enum(['low', 'medium', 'high']),
});

/**
 * Schema for grading a quiz: the items as returned by the quiz endpoint and
 * one answer per item.
 */
export const gradeQuizSchema = z.object({
  items: z.array(quizItemSchema).min(1, 'At least one quiz item is required'),
  answers: z.array(quizAnswerSchema),
  asOf: dateKey.optional(),
});

export type GradeQuizBody = z.infer<typeof gradeQuizSchema>;

/**
 * Query parameters of the mastery report.
 */
export const masteryQuerySchema = z.object({
  asOf: dateKey.optional(),
});

/**
 * Converts a validated YYYY-MM-DD string to a Date at UTC midnight.
 */
export function toAsOfDate(value: string | undefined): Date | undefined {
  return value === undefined ? undefined : new Date(`${value}T00:00:00.000Z`);
}
