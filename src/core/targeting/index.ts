/**
 * Quiz Targeting Module - Barrel Export
 */

export { QuizRound, DEFAULT_QUIZ_ROUND_CONFIG } from './quiz-round';
export type {
  QuizRoundState,
  QuizRoundInput,
  QuizRoundConfig,
  QuizRoundOutcome,
  QuizRoundEvent,
  RoundNotice,
  RejectedItem,
  AttemptFailure,
  AttemptFailureKind,
} from './types';
