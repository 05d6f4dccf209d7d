/**
 * Mastery Engine - Per-Project Orchestration
 *
 * Ties the components together for one project at a time:
 *
 * - reports: classification, due concepts and the review-priority list
 * - quiz rounds: ensures a syllabus, then runs a QuizRound over it
 * - grading: validates submitted items, grades answers and records the
 *   results in the ledger and the schedule with a single write
 * - reset: clears ledger and schedule together
 *
 * Every operation runs inside the project's ProjectLock, so two requests for
 * the same project never interleave their reads and writes.
 */

import type { ConceptRecord, EngineState, QuizAnswer, QuizItem, SRSEntry } from '../models';
import { IncompleteQuizError, ProjectNotFoundError } from '../errors';
import type { ContentGenerator } from '../generation/types';
import { ConceptLedger, applyAttempt } from '../ledger';
import { classify, findCorruptedEntries } from '../mastery';
import { quizPayloadSchema } from '../sanitizer';
import { ReviewScheduler, reviewPriority, toDateKey } from '../srs';
import type { SyllabusService } from '../syllabus';
import { QuizRound, type QuizRoundOutcome } from '../targeting';
import type { ProjectStore } from '@/storage/repositories';
import { ProjectLock } from './project-lock';
import type {
  GenerateQuizOptions,
  GradeQuizInput,
  GradeResult,
  GradedItem,
  MasteryEngineConfig,
  MasteryReport,
  RoundEventListener,
} from './types';

export const DEFAULT_ENGINE_CONFIG: MasteryEngineConfig = {
  weakThreshold: 0.8,
  maxConceptLength: 50,
  itemCount: 10,
  generatorTimeoutMs: 60_000,
  resolver: {},
};

export interface MasteryEngineDependencies {
  store: ProjectStore;
  syllabus: SyllabusService;
  generator: ContentGenerator;
  scheduler?: ReviewScheduler;
  lock?: ProjectLock;
  /** Receives every quiz round event, tagged with the project id */
  onRoundEvent?: RoundEventListener;
}

export class MasteryEngine {
  private readonly store: ProjectStore;
  private readonly syllabus: SyllabusService;
  private readonly generator: ContentGenerator;
  private readonly scheduler: ReviewScheduler;
  private readonly ledger: ConceptLedger;
  private readonly lock: ProjectLock;
  private readonly onRoundEvent: RoundEventListener | undefined;
  private readonly config: MasteryEngineConfig;

  constructor(deps: MasteryEngineDependencies, config: Partial<MasteryEngineConfig> = {}) {
    this.config = { ...DEFAULT_ENGINE_CONFIG, ...config };
    this.store = deps.store;
    this.syllabus = deps.syllabus;
    this.generator = deps.generator;
    this.scheduler =
      deps.scheduler ?? new ReviewScheduler({ maxConceptLength: this.config.maxConceptLength });
    this.ledger = new ConceptLedger(deps.store);
    this.lock = deps.lock ?? new ProjectLock();
    this.onRoundEvent = deps.onRoundEvent;
  }

  // ==========================================================================
  // State
  // ==========================================================================

  /**
   * Loads syllabus, ledger and schedule for a project.
   *
   * @throws ProjectNotFoundError if the project does not exist
   * @throws DataCorruptionError if stored state fails validation
   */
  async loadState(projectId: string): Promise<EngineState> {
    const [syllabus, ledger, schedule] = await Promise.all([
      this.store.getField(projectId, 'syllabus'),
      this.ledger.getAll(projectId),
      this.store.getField(projectId, 'schedule'),
    ]);
    if (syllabus === null || schedule === null) {
      throw new ProjectNotFoundError(projectId);
    }
    return { projectId, syllabus, ledger, schedule };
  }

  // ==========================================================================
  // Operations
  // ==========================================================================

  /**
   * Builds the mastery report for a project. Does not generate a syllabus.
   */
  getReport(projectId: string, asOf: Date = new Date()): Promise<MasteryReport> {
    return this.lock.run(projectId, async () => {
      const state = await this.loadState(projectId);
      return this.buildReport(state, asOf);
    });
  }

  /**
   * Returns the project's syllabus, generating it on first use.
   */
  getSyllabus(projectId: string, signal?: AbortSignal): Promise<string[]> {
    return this.lock.run(projectId, () => this.syllabus.ensureSyllabus(projectId, signal));
  }

  /**
   * Replaces the syllabus. Refused while progress exists.
   */
  defineSyllabus(projectId: string, concepts: readonly string[]): Promise<string[]> {
    return this.lock.run(projectId, () => this.syllabus.defineSyllabus(projectId, concepts));
  }

  /**
   * Runs one quiz round. Nothing is recorded; the returned items are graded
   * later through gradeQuiz.
   *
   * @throws ProjectNotFoundError if the project does not exist
   * @throws SyllabusUnavailableError if no syllabus exists or can be generated
   */
  generateQuiz(projectId: string, options: GenerateQuizOptions = {}): Promise<QuizRoundOutcome> {
    return this.lock.run(projectId, async () => {
      const project = await this.store.findById(projectId);
      if (!project) {
        throw new ProjectNotFoundError(projectId);
      }

      await this.syllabus.ensureSyllabus(projectId, options.signal);
      const report = this.buildReport(await this.loadState(projectId), options.asOf ?? new Date());

      const round = new QuizRound(
        this.generator,
        {
          syllabus: report.syllabus,
          priority: report.priority,
          corrupted: report.corrupted,
          sourceMaterial: project.sourceText,
          level: project.level,
        },
        {
          itemCount: this.config.itemCount,
          generatorTimeoutMs: this.config.generatorTimeoutMs,
          resolver: { maxConceptLength: this.config.maxConceptLength, ...this.config.resolver },
        }
      );

      const listener = this.onRoundEvent;
      if (listener) {
        round.setEventListener((event) => listener(projectId, event));
      }

      const outcome = await round.run(options.signal);
      console.log(
        `[MasteryEngine] Quiz round for ${projectId} ended ${outcome.status}` +
          (outcome.status === 'ready' ? ` (${outcome.mode}, ${outcome.items.length} items)` : ` (${outcome.reason})`)
      );
      return outcome;
    });
  }

  /**
   * Grades a quiz and records every graded attempt.
   *
   * Items are re-validated with the quiz schema. Items whose concept is not
   * an exact syllabus entry are returned as rejected and not graded. Every
   * remaining item needs exactly one answer.
   *
   * @throws IncompleteQuizError for invalid items, missing, duplicate or unknown answers
   * @throws ProjectNotFoundError if the project does not exist
   */
  gradeQuiz(projectId: string, input: GradeQuizInput): Promise<GradeResult> {
    return this.lock.run(projectId, async () => {
      const parsed = quizPayloadSchema.safeParse({ quiz: input.items });
      if (!parsed.success) {
        throw new IncompleteQuizError(
          'Submitted quiz items are not valid quiz items',
          parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        );
      }
      const items = parsed.data.quiz;

      const state = await this.loadState(projectId);
      const syllabus = new Set(state.syllabus);

      const gradable: QuizItem[] = [];
      const rejected: GradeResult['rejected'] = [];
      for (const item of items) {
        if (syllabus.has(item.primary_concept)) {
          gradable.push(item);
        } else {
          rejected.push({ itemId: item.id, concept: item.primary_concept });
        }
      }

      if (gradable.length === 0) {
        throw new IncompleteQuizError('No submitted item names a concept from the syllabus', {
          rejected,
        });
      }

      const answers = this.indexAnswers(items, gradable, input.answers);
      const today = input.asOf ?? new Date();

      let ledger: ConceptRecord[] = state.ledger;
      let schedule: SRSEntry[] = state.schedule;
      const results: GradedItem[] = [];

      for (const item of gradable) {
        const answer = answers.get(item.id);
        if (!answer) {
          // indexAnswers guarantees an answer per gradable item
          throw new IncompleteQuizError(`Item ${item.id} has no answer`);
        }
        const correct = answer.answer === item.correct_answer;

        ledger = applyAttempt(ledger, item.primary_concept, correct);
        schedule = this.scheduler.applyReview(
          schedule,
          { concept: item.primary_concept, correct, confidence: answer.confidence },
          today
        );

        results.push({
          itemId: item.id,
          concept: item.primary_concept,
          correct,
          given: answer.answer,
          correctAnswer: item.correct_answer,
          explanation: item.detailed_explanation,
        });
      }

      await this.store.saveProgress(projectId, ledger, schedule);

      const touched = new Set(gradable.map((item) => item.primary_concept));
      const correctCount = results.filter((result) => result.correct).length;
      console.log(
        `[MasteryEngine] Graded quiz for ${projectId}: ${correctCount}/${results.length} correct`
      );

      return {
        results,
        score: { correct: correctCount, total: results.length },
        rejected,
        updatedRecords: ledger.filter((record) => touched.has(record.concept)),
        updatedSchedule: schedule.filter((entry) => touched.has(entry.concept)),
      };
    });
  }

  /**
   * Clears the ledger and the schedule in one write. The syllabus is kept.
   *
   * @throws ProjectNotFoundError if the project does not exist
   */
  resetProgress(projectId: string): Promise<void> {
    return this.lock.run(projectId, async () => {
      const project = await this.store.findById(projectId);
      if (!project) {
        throw new ProjectNotFoundError(projectId);
      }
      await this.ledger.reset(projectId);
      console.log(`[MasteryEngine] Reset progress for ${projectId}`);
    });
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private buildReport(state: EngineState, asOf: Date): MasteryReport {
    const classification = classify(state.ledger, {
      threshold: this.config.weakThreshold,
      maxConceptLength: this.config.maxConceptLength,
    });
    const due = this.scheduler.dueConcepts(state.schedule, asOf);
    const corrupted = [
      ...new Set([
        ...classification.corrupted,
        ...findCorruptedEntries(state.schedule, this.config.maxConceptLength),
      ]),
    ].sort((a, b) => a.localeCompare(b));

    return {
      projectId: state.projectId,
      syllabus: state.syllabus,
      classification,
      due,
      priority: reviewPriority(classification.weak, due),
      corrupted,
      ledger: state.ledger,
      schedule: state.schedule,
      asOf: toDateKey(asOf),
    };
  }

  /**
   * Maps item id to answer, enforcing one answer per gradable item and no
   * answers for items that were not submitted.
   */
  private indexAnswers(
    submitted: readonly QuizItem[],
    gradable: readonly QuizItem[],
    answers: readonly QuizAnswer[]
  ): Map<number, QuizAnswer> {
    const submittedIds = new Set(submitted.map((item) => item.id));
    const byId = new Map<number, QuizAnswer>();
    const unknown: number[] = [];
    const duplicate: number[] = [];

    for (const answer of answers) {
      if (!submittedIds.has(answer.itemId)) {
        unknown.push(answer.itemId);
      } else if (byId.has(answer.itemId)) {
        duplicate.push(answer.itemId);
      } else {
        byId.set(answer.itemId, answer);
      }
    }

    const missing = gradable.filter((item) => !byId.has(item.id)).map((item) => item.id);

    if (unknown.length > 0 || duplicate.length > 0 || missing.length > 0) {
      const parts: string[] = [];
      if (missing.length > 0) parts.push(`unanswered items: ${missing.join(', ')}`);
      if (duplicate.length > 0) parts.push(`items answered more than once: ${duplicate.join(', ')}`);
      if (unknown.length > 0) parts.push(`answers for unknown items: ${unknown.join(', ')}`);
      throw new IncompleteQuizError(`Quiz cannot be graded (${parts.join('; ')})`, {
        missing,
        duplicate,
        unknown,
      });
    }

    return byId;
  }
}
