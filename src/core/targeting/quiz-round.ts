/**
 * Quiz Round
 *
 * One instance per quiz request. The round chooses between a focused and a
 * general request, calls the content generator under a timeout, sanitizes
 * the response, resolves every item's concept label against the syllabus
 * and falls back from focused to general at most once.
 *
 * The round never touches the ledger or the schedule. Items it returns are
 * ready to be shown; recording happens only when they are graded.
 *
 * @example
 * ```typescript
 * const round = new QuizRound(generator, {
 *   syllabus: ['Recursion', 'Sorting'],
 *   priority: ['Recursion'],
 *   corrupted: [],
 *   sourceMaterial: notes,
 * });
 * round.setEventListener((event) => console.log(event.type));
 *
 * const outcome = await round.run(controller.signal);
 * if (outcome.status === 'ready') {
 *   render(outcome.items);
 * }
 * ```
 */

import type { QuizItem } from '../models';
import { CORRUPTION_RESOLUTION, SyllabusUnavailableError, isConfigurationError } from '../errors';
import type { ContentGenerator, GenerationMode } from '../generation/types';
import { sanitizeQuizResponse } from '../sanitizer';
import { ConceptResolver } from '../syllabus';
import type {
  AttemptFailure,
  QuizRoundConfig,
  QuizRoundEvent,
  QuizRoundInput,
  QuizRoundOutcome,
  QuizRoundState,
  RejectedItem,
  RoundNotice,
} from './types';

export const DEFAULT_QUIZ_ROUND_CONFIG: QuizRoundConfig = {
  itemCount: 10,
  generatorTimeoutMs: 60_000,
  resolver: {},
};

class GeneratorTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Content generator did not respond within ${timeoutMs}ms`);
    this.name = 'GeneratorTimeoutError';
  }
}

class RoundCancelledError extends Error {
  constructor() {
    super('Quiz round was cancelled by the caller');
    this.name = 'RoundCancelledError';
  }
}

type AttemptResult =
  | { status: 'ok'; items: QuizItem[]; rejected: RejectedItem[] }
  | { status: 'failed'; failure: AttemptFailure }
  | { status: 'cancelled' };

export class QuizRound {
  private state: QuizRoundState = 'selecting';
  private readonly config: QuizRoundConfig;
  private readonly resolver: ConceptResolver;
  private eventListener: ((event: QuizRoundEvent) => void) | undefined;

  /**
   * @throws SyllabusUnavailableError if the syllabus is empty
   */
  constructor(
    private readonly generator: ContentGenerator,
    private readonly input: QuizRoundInput,
    config: Partial<QuizRoundConfig> = {}
  ) {
    if (input.syllabus.length === 0) {
      throw new SyllabusUnavailableError('A quiz round needs a non-empty syllabus');
    }
    this.config = { ...DEFAULT_QUIZ_ROUND_CONFIG, ...config };
    this.resolver = new ConceptResolver(input.syllabus, this.config.resolver);
  }

  getState(): QuizRoundState {
    return this.state;
  }

  setEventListener(listener: ((event: QuizRoundEvent) => void) | undefined): void {
    this.eventListener = listener;
  }

  /**
   * Runs the round to a terminal state. A round runs once.
   *
   * @param signal - Aborting fails the round immediately, without fallback
   * @throws LLMError ('authentication') when the generation client has no
   *         usable API key; a general retry cannot succeed either
   * @throws Error if the round has already run
   */
  async run(signal?: AbortSignal): Promise<QuizRoundOutcome> {
    if (this.state !== 'selecting') {
      throw new Error(`Quiz round already ran (state: ${this.state})`);
    }

    const notices: RoundNotice[] = [];
    const attempts: AttemptFailure[] = [];
    const { priority, corrupted, syllabus } = this.input;

    if (corrupted.length > 0) {
      notices.push({
        type: 'data_corruption',
        message: `Corrupted concept entries block targeted review: ${corrupted.join(', ')}. ${CORRUPTION_RESOLUTION}`,
        concepts: [...corrupted],
      });
    }

    if (priority.length > 0 && corrupted.length === 0) {
      this.transition('requesting_focused');
      const focused = await this.attempt('focused', priority, signal);

      if (focused.status === 'ok') {
        return this.ready('focused', priority, focused.items, focused.rejected, notices);
      }
      if (focused.status === 'cancelled') {
        return this.fail('cancelled', attempts, notices);
      }

      attempts.push(focused.failure);
      notices.push({
        type: 'targeted_generation_degraded',
        message: `Targeted quiz generation failed (${focused.failure.kind}); falling back to a general quiz.`,
        reason: focused.failure.kind,
      });
      console.warn(
        `[QuizRound] Focused request failed (${focused.failure.kind}): ${focused.failure.message}`
      );
    }

    this.transition('requesting_general');
    const general = await this.attempt('general', syllabus, signal);

    if (general.status === 'ok') {
      return this.ready('general', syllabus, general.items, general.rejected, notices);
    }
    if (general.status === 'cancelled') {
      return this.fail('cancelled', attempts, notices);
    }

    attempts.push(general.failure);
    console.error(
      `[QuizRound] General request failed (${general.failure.kind}): ${general.failure.message}`
    );
    return this.fail('generation_failure', attempts, notices);
  }

  // ==========================================================================
  // Attempts
  // ==========================================================================

  private async attempt(
    mode: GenerationMode,
    concepts: string[],
    signal: AbortSignal | undefined
  ): Promise<AttemptResult> {
    if (signal?.aborted) {
      return { status: 'cancelled' };
    }

    let raw: string;
    try {
      raw = await this.callGenerator(mode, concepts, signal);
    } catch (error) {
      if (error instanceof RoundCancelledError || signal?.aborted) {
        return { status: 'cancelled' };
      }
      if (isConfigurationError(error)) {
        this.transition('failed');
        throw error;
      }
      return {
        status: 'failed',
        failure: {
          mode,
          kind: error instanceof GeneratorTimeoutError ? 'timeout' : 'generator_error',
          message: error instanceof Error ? error.message : String(error),
          issues: [],
        },
      };
    }

    this.transition('validating');

    const sanitized = sanitizeQuizResponse(raw);
    if (!sanitized.ok) {
      return {
        status: 'failed',
        failure: { mode, ...sanitized.failure },
      };
    }

    const items: QuizItem[] = [];
    const rejected: RejectedItem[] = [];
    for (const item of sanitized.value.quiz) {
      const resolution = this.resolver.resolve(item.primary_concept);
      if (resolution.status === 'resolved') {
        items.push({ ...item, primary_concept: resolution.concept });
      } else {
        rejected.push({
          itemId: item.id,
          label: resolution.label,
          reason: resolution.reason,
          closest: resolution.closest,
        });
      }
    }

    if (rejected.length > 0) {
      this.emit({ type: 'items_rejected', mode, rejected, timestamp: new Date() });
      console.warn(
        `[QuizRound] Rejected ${rejected.length} ${mode} item(s) with unresolvable concepts: ${rejected
          .map((r) => JSON.stringify(r.label))
          .join(', ')}`
      );
    }

    if (items.length === 0) {
      return {
        status: 'failed',
        failure: {
          mode,
          kind: 'no_valid_items',
          message: 'No generated item named a concept from the syllabus',
          issues: [],
        },
      };
    }

    return { status: 'ok', items, rejected };
  }

  /**
   * Calls the generator, bounded by the configured timeout and the caller's
   * signal. The generator receives its own signal, aborted on either.
   */
  private async callGenerator(
    mode: GenerationMode,
    concepts: string[],
    signal: AbortSignal | undefined
  ): Promise<string> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new GeneratorTimeoutError(this.config.generatorTimeoutMs));
        controller.abort();
      }, this.config.generatorTimeoutMs);
    });

    let rejectCancelled: (error: Error) => void = () => {};
    const cancelled = new Promise<never>((_, reject) => {
      rejectCancelled = reject;
    });
    const onAbort = () => {
      rejectCancelled(new RoundCancelledError());
      controller.abort();
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      return await Promise.race([
        this.generator.generate(
          {
            concepts,
            sourceMaterial: this.input.sourceMaterial,
            itemCount: this.config.itemCount,
            mode,
            level: this.input.level,
          },
          controller.signal
        ),
        timeout,
        cancelled,
      ]);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  // ==========================================================================
  // Terminal states
  // ==========================================================================

  private ready(
    mode: GenerationMode,
    targetConcepts: string[],
    items: QuizItem[],
    rejected: RejectedItem[],
    notices: RoundNotice[]
  ): QuizRoundOutcome {
    this.transition('ready');
    return { status: 'ready', mode, targetConcepts: [...targetConcepts], items, rejected, notices };
  }

  private fail(
    reason: 'generation_failure' | 'cancelled',
    attempts: AttemptFailure[],
    notices: RoundNotice[]
  ): QuizRoundOutcome {
    this.transition('failed');
    return { status: 'failed', reason, attempts, notices };
  }

  private transition(to: QuizRoundState): void {
    const from = this.state;
    this.state = to;
    this.emit({ type: 'state_changed', from, to, timestamp: new Date() });
  }

  private emit(event: QuizRoundEvent): void {
    if (this.eventListener) {
      this.eventListener(event);
    }
  }
}

