/**
 * Mastery Engine Errors
 *
 * Typed errors raised by the engine. Each carries a machine-readable `code`
 * so the API layer can map it to a status without string matching.
 *
 * Parse failures are not in this hierarchy. The sanitizer returns them as
 * values and the targeting protocol recovers from them locally (see
 * core/sanitizer).
 */

import { LLMError } from '@/llm/types';

/**
 * Machine-readable codes for every engine error.
 */
export const MasteryErrorCodes = {
  SYLLABUS_UNAVAILABLE: 'SYLLABUS_UNAVAILABLE',
  SYLLABUS_LOCKED: 'SYLLABUS_LOCKED',
  GENERATION_FAILURE: 'GENERATION_FAILURE',
  DATA_CORRUPTION: 'DATA_CORRUPTION',
  INCOMPLETE_QUIZ: 'INCOMPLETE_QUIZ',
  PROJECT_NOT_FOUND: 'PROJECT_NOT_FOUND',
} as const;

export type MasteryErrorCode =
  (typeof MasteryErrorCodes)[keyof typeof MasteryErrorCodes];

/**
 * Base class for all engine errors.
 */
export class MasteryError extends Error {
  public readonly code: MasteryErrorCode;
  public readonly details?: unknown;

  constructor(code: MasteryErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'MasteryError';
    this.code = code;
    this.details = details;
  }
}

/**
 * The project has no canonical vocabulary and none could be produced.
 */
export class SyllabusUnavailableError extends MasteryError {
  constructor(message: string, projectId?: string) {
    super(MasteryErrorCodes.SYLLABUS_UNAVAILABLE, message, { projectId });
    this.name = 'SyllabusUnavailableError';
  }
}

/**
 * An explicit syllabus redefinition was attempted while progress exists
 * under the current concept names.
 */
export class SyllabusLockedError extends MasteryError {
  constructor(projectId: string) {
    super(
      MasteryErrorCodes.SYLLABUS_LOCKED,
      `Project '${projectId}' has recorded progress under its current syllabus. ` +
        'Reset progress before redefining the syllabus.',
      { projectId }
    );
    this.name = 'SyllabusLockedError';
  }
}

/**
 * A quiz round ended in the failed state. Nothing was recorded.
 */
export class GenerationFailureError extends MasteryError {
  constructor(message: string, details?: unknown) {
    super(MasteryErrorCodes.GENERATION_FAILURE, message, details);
    this.name = 'GenerationFailureError';
  }
}

/** Instruction attached to every corruption report. */
export const CORRUPTION_RESOLUTION =
  'Only a full reset of this project\'s progress (ledger and review schedule) resolves corrupted concept entries.';

/**
 * Stored progress violates an invariant (over-length concept names, broken
 * counters). Never repaired automatically.
 */
export class DataCorruptionError extends MasteryError {
  public readonly concepts: string[];

  constructor(message: string, concepts: string[] = []) {
    super(MasteryErrorCodes.DATA_CORRUPTION, `${message} ${CORRUPTION_RESOLUTION}`, {
      concepts,
    });
    this.name = 'DataCorruptionError';
    this.concepts = concepts;
  }
}

/**
 * A quiz was submitted for grading with unanswered or unknown items.
 */
export class IncompleteQuizError extends MasteryError {
  constructor(message: string, details?: unknown) {
    super(MasteryErrorCodes.INCOMPLETE_QUIZ, message, details);
    this.name = 'IncompleteQuizError';
  }
}

export class ProjectNotFoundError extends MasteryError {
  constructor(projectId: string) {
    super(
      MasteryErrorCodes.PROJECT_NOT_FOUND,
      `Project with ID '${projectId}' not found`,
      { projectId }
    );
    this.name = 'ProjectNotFoundError';
  }
}

/**
 * A missing or rejected API key. Retrying or falling back cannot fix it, so
 * callers rethrow it instead of recording a failed attempt.
 */
export function isConfigurationError(error: unknown): error is LLMError {
  return error instanceof LLMError && error.type === 'authentication';
}
