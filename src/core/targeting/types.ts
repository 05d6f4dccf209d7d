/**
 * Quiz Targeting Types
 *
 * A quiz round moves through a fixed set of states:
 *
 *   selecting -> requesting_focused -> validating -> ready
 *                        |                  |
 *                        +------------------+-> requesting_general -> validating -> ready | failed
 *
 * A focused request is only made when there is something to focus on and
 * no corrupted concept is present. Whatever goes wrong with it (generator
 * error, timeout, parse failure, no usable item) leads to exactly one
 * general request. Caller cancellation goes straight to failed.
 */

import type { QuizItem } from '../models';
import type { GenerationMode } from '../generation/types';
import type { ParseFailureKind } from '../sanitizer';
import type { CorruptionReason, ResolverOptions } from '../syllabus';

export type QuizRoundState =
  | 'selecting'
  | 'requesting_focused'
  | 'requesting_general'
  | 'validating'
  | 'ready'
  | 'failed';

/**
 * What the round knows about the project when it starts.
 */
export interface QuizRoundInput {
  syllabus: string[];
  /** Review-priority concepts: weak first, then due */
  priority: string[];
  /** Corrupted concept names; any entry blocks a focused request */
  corrupted: string[];
  sourceMaterial: string;
  level?: string;
}

export interface QuizRoundConfig {
  itemCount: number;
  generatorTimeoutMs: number;
  resolver: Partial<ResolverOptions>;
}

/**
 * A generated item dropped because its concept label did not resolve.
 */
export interface RejectedItem {
  itemId: number;
  label: string;
  reason: CorruptionReason;
  /** Closest syllabus entry, when one scored above zero */
  closest: string | null;
}

export type AttemptFailureKind = ParseFailureKind | 'generator_error' | 'timeout' | 'no_valid_items';

export interface AttemptFailure {
  mode: GenerationMode;
  kind: AttemptFailureKind;
  message: string;
  issues: string[];
}

export type RoundNotice =
  | {
      type: 'targeted_generation_degraded';
      message: string;
      /** Why the focused request was abandoned */
      reason: AttemptFailureKind;
    }
  | {
      type: 'data_corruption';
      message: string;
      concepts: string[];
    };

export type QuizRoundOutcome =
  | {
      status: 'ready';
      mode: GenerationMode;
      /** Concepts the successful request was asked to cover */
      targetConcepts: string[];
      items: QuizItem[];
      rejected: RejectedItem[];
      notices: RoundNotice[];
    }
  | {
      status: 'failed';
      reason: 'generation_failure' | 'cancelled';
      attempts: AttemptFailure[];
      notices: RoundNotice[];
    };

export type QuizRoundEvent =
  | {
      type: 'state_changed';
      from: QuizRoundState;
      to: QuizRoundState;
      timestamp: Date;
    }
  | {
      type: 'items_rejected';
      mode: GenerationMode;
      rejected: RejectedItem[];
      timestamp: Date;
    };
