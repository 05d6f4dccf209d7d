/**
 * Mastery Engine Integration Tests
 *
 * Runs the engine against an in-memory database and scripted generators:
 * syllabus lifecycle, reports, quiz rounds end to end, grading and reset.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createTestContext, cleanupTestDatabase, type TestContext } from '../setup';
import { createProjectWithSyllabus, createTestProject, mcqItem, quizJson, tfItem } from '../helpers';
import {
  DataCorruptionError,
  IncompleteQuizError,
  ProjectNotFoundError,
  SyllabusLockedError,
  SyllabusUnavailableError,
} from '../../src/core/errors';
import type { QuizRoundOutcome } from '../../src/core/targeting';

const JAN_15 = new Date('2024-01-15T00:00:00.000Z');
const JAN_20 = new Date('2024-01-20T00:00:00.000Z');
const LONG_CONCEPT = 'c'.repeat(120);

function expectReady(outcome: QuizRoundOutcome): Extract<QuizRoundOutcome, { status: 'ready' }> {
  if (outcome.status !== 'ready') {
    throw new Error(`Expected a ready outcome, got ${outcome.status}`);
  }
  return outcome;
}

describe('MasteryEngine', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  afterEach(() => {
    cleanupTestDatabase(ctx);
  });

  // ==========================================================================
  // Syllabus
  // ==========================================================================

  describe('syllabus', () => {
    it('should generate the syllabus once and reuse it', async () => {
      const project = await createTestProject(ctx.projects);

      expect(await ctx.engine.getSyllabus(project.id)).toEqual(['Recursion', 'Sorting', 'Graphs']);
      expect(await ctx.engine.getSyllabus(project.id)).toEqual(['Recursion', 'Sorting', 'Graphs']);
      expect(ctx.syllabusGenerator.calls).toBe(1);
      expect(await ctx.projects.getField(project.id, 'syllabus')).toEqual([
        'Recursion',
        'Sorting',
        'Graphs',
      ]);
    });

    it('should report generation failures as an unavailable syllabus', async () => {
      cleanupTestDatabase(ctx);
      ctx = createTestContext({ syllabusReply: new Error('model unavailable') });
      const project = await createTestProject(ctx.projects);

      await expect(ctx.engine.getSyllabus(project.id)).rejects.toThrow(SyllabusUnavailableError);
      await expect(ctx.engine.getSyllabus(project.id)).rejects.toThrow(
        `Syllabus generation failed for project '${project.id}': model unavailable`
      );
    });

    it('should canonicalize generated names', async () => {
      cleanupTestDatabase(ctx);
      ctx = createTestContext({ syllabusReply: ['1. Recursion', 'recursion', LONG_CONCEPT, '- Heaps'] });
      const project = await createTestProject(ctx.projects);

      expect(await ctx.engine.getSyllabus(project.id)).toEqual(['Recursion', 'Heaps']);
    });

    it('should fail when nothing usable was generated', async () => {
      cleanupTestDatabase(ctx);
      ctx = createTestContext({ syllabusReply: [LONG_CONCEPT, '  '] });
      const project = await createTestProject(ctx.projects);

      await expect(ctx.engine.getSyllabus(project.id)).rejects.toThrow(
        `Syllabus generation produced no usable concepts for project '${project.id}'`
      );
    });

    it('should accept an explicit syllabus while no progress exists', async () => {
      const project = await createTestProject(ctx.projects);

      const syllabus = await ctx.engine.defineSyllabus(project.id, ['Heaps', ' heaps ', 'Tries']);

      expect(syllabus).toEqual(['Heaps', 'Tries']);
      expect(await ctx.engine.getSyllabus(project.id)).toEqual(['Heaps', 'Tries']);
      expect(ctx.syllabusGenerator.calls).toBe(0);
    });

    it('should lock the syllabus once progress exists', async () => {
      const project = await createProjectWithSyllabus(ctx.projects);
      await ctx.engine.gradeQuiz(project.id, {
        items: [mcqItem()],
        answers: [{ itemId: 1, answer: 'Recursion', confidence: 'high' }],
        asOf: JAN_15,
      });

      await expect(ctx.engine.defineSyllabus(project.id, ['Heaps'])).rejects.toThrow(
        SyllabusLockedError
      );

      await ctx.engine.resetProgress(project.id);
      await expect(ctx.engine.defineSyllabus(project.id, ['Heaps'])).resolves.toEqual(['Heaps']);
    });
  });

  // ==========================================================================
  // Reports
  // ==========================================================================

  describe('getReport', () => {
    it('should classify the ledger and list due concepts after weak ones', async () => {
      const project = await createProjectWithSyllabus(ctx.projects, ['Recursion', 'Sorting', 'Graphs', 'Heaps']);
      await ctx.projects.saveProgress(
        project.id,
        [
          { concept: 'Recursion', correct: 1, total: 5 },
          { concept: 'Sorting', correct: 5, total: 5 },
          { concept: 'Graphs', correct: 4, total: 4 },
        ],
        [
          { concept: 'Recursion', intervalDays: 1, nextReview: '2024-01-16' },
          { concept: 'Sorting', intervalDays: 10, nextReview: '2024-01-20' },
          { concept: 'Graphs', intervalDays: 5, nextReview: '2024-01-10' },
        ]
      );

      const report = await ctx.engine.getReport(project.id, JAN_20);

      expect(report.asOf).toBe('2024-01-20');
      expect(report.classification.weak).toEqual(['Recursion']);
      expect(report.classification.strong).toEqual(['Graphs', 'Sorting']);
      expect(report.due).toEqual(['Graphs', 'Recursion', 'Sorting']);
      expect(report.priority).toEqual(['Recursion', 'Graphs', 'Sorting']);
      expect(report.corrupted).toEqual([]);
    });

    it('should not generate a syllabus', async () => {
      const project = await createTestProject(ctx.projects);

      const report = await ctx.engine.getReport(project.id, JAN_15);

      expect(report.syllabus).toEqual([]);
      expect(ctx.syllabusGenerator.calls).toBe(0);
    });

    it('should collect corrupted names from the ledger and the schedule', async () => {
      const project = await createProjectWithSyllabus(ctx.projects);
      const otherLong = 'd'.repeat(60);
      await ctx.projects.saveProgress(
        project.id,
        [{ concept: LONG_CONCEPT, correct: 0, total: 2 }],
        [
          { concept: LONG_CONCEPT, intervalDays: 1, nextReview: '2024-01-01' },
          { concept: otherLong, intervalDays: 1, nextReview: '2024-01-01' },
        ]
      );

      const report = await ctx.engine.getReport(project.id, JAN_15);

      expect(report.corrupted).toEqual([LONG_CONCEPT, otherLong]);
      expect(report.due).toEqual([]);
      expect(report.priority).toEqual([]);
    });

    it('should raise DataCorruptionError for invalid stored counters', async () => {
      const project = await createProjectWithSyllabus(ctx.projects);
      ctx.sqlite
        .prepare('UPDATE projects SET ledger = ? WHERE id = ?')
        .run('[{"concept":"Recursion","correct":3,"total":1}]', project.id);

      await expect(ctx.engine.getReport(project.id)).rejects.toThrow(DataCorruptionError);
    });

    it('should raise ProjectNotFoundError for unknown projects', async () => {
      await expect(ctx.engine.getReport('prj_missing')).rejects.toThrow(ProjectNotFoundError);
    });
  });

  // ==========================================================================
  // Quiz rounds
  // ==========================================================================

  describe('generateQuiz', () => {
    it('should run a general quiz for a fresh project', async () => {
      const project = await createTestProject(ctx.projects, { level: 'advanced' });
      ctx.quizGenerator.enqueue(quizJson([mcqItem(), tfItem()]));

      const outcome = expectReady(await ctx.engine.generateQuiz(project.id, { asOf: JAN_15 }));

      expect(outcome.mode).toBe('general');
      expect(ctx.syllabusGenerator.calls).toBe(1);
      expect(ctx.quizGenerator.requests[0]).toMatchObject({
        concepts: ['Recursion', 'Sorting', 'Graphs'],
        itemCount: 10,
        mode: 'general',
        level: 'advanced',
      });
    });

    it('should fall back to general with a notice when focused output is malformed', async () => {
      const project = await createProjectWithSyllabus(ctx.projects);
      await ctx.projects.setField(project.id, 'ledger', [{ concept: 'Recursion', correct: 1, total: 5 }]);
      ctx.quizGenerator.enqueue('```json\n{"quiz": [{"id": 1,', quizJson([tfItem()]));

      const outcome = expectReady(await ctx.engine.generateQuiz(project.id, { asOf: JAN_15 }));

      expect(ctx.quizGenerator.requests[0]).toMatchObject({ concepts: ['Recursion'], mode: 'focused' });
      expect(outcome.mode).toBe('general');
      expect(outcome.notices).toEqual([
        {
          type: 'targeted_generation_degraded',
          message: 'Targeted quiz generation failed (unbalanced); falling back to a general quiz.',
          reason: 'unbalanced',
        },
      ]);
    });

    it('should refuse focused quizzes while a corrupted entry exists, until reset', async () => {
      const project = await createProjectWithSyllabus(ctx.projects);
      await ctx.projects.setField(project.id, 'ledger', [
        { concept: LONG_CONCEPT, correct: 0, total: 1 },
        { concept: 'Recursion', correct: 0, total: 3 },
      ]);
      ctx.quizGenerator.enqueue(quizJson([mcqItem()]), quizJson([mcqItem()]));

      const blocked = expectReady(await ctx.engine.generateQuiz(project.id, { asOf: JAN_15 }));
      expect(blocked.mode).toBe('general');
      expect(blocked.notices.map((notice) => notice.type)).toEqual(['data_corruption']);

      await ctx.engine.resetProgress(project.id);
      await ctx.projects.setField(project.id, 'ledger', [{ concept: 'Recursion', correct: 0, total: 3 }]);

      const focused = expectReady(await ctx.engine.generateQuiz(project.id, { asOf: JAN_15 }));
      expect(focused.mode).toBe('focused');
      expect(focused.notices).toEqual([]);
    });

    it('should not record anything when a round completes', async () => {
      const project = await createProjectWithSyllabus(ctx.projects);
      ctx.quizGenerator.enqueue(quizJson([mcqItem()]));

      await ctx.engine.generateQuiz(project.id);

      expect(await ctx.projects.getField(project.id, 'ledger')).toEqual([]);
      expect(await ctx.projects.getField(project.id, 'schedule')).toEqual([]);
    });

    it('should forward round events tagged with the project id', async () => {
      const project = await createProjectWithSyllabus(ctx.projects);
      ctx.quizGenerator.enqueue(quizJson([mcqItem()]));

      await ctx.engine.generateQuiz(project.id);

      expect(ctx.roundEvents.every((entry) => entry.projectId === project.id)).toBe(true);
      expect(ctx.roundEvents.map((entry) => entry.event.type)).toEqual([
        'state_changed',
        'state_changed',
        'state_changed',
      ]);
    });

    it('should reject unknown projects before calling any generator', async () => {
      await expect(ctx.engine.generateQuiz('prj_missing')).rejects.toThrow(ProjectNotFoundError);
      expect(ctx.syllabusGenerator.calls).toBe(0);
      expect(ctx.quizGenerator.requests).toHaveLength(0);
    });
  });

  // ==========================================================================
  // Grading
  // ==========================================================================

  describe('gradeQuiz', () => {
    it('should grade answers and write ledger and schedule together', async () => {
      const project = await createProjectWithSyllabus(ctx.projects);

      const result = await ctx.engine.gradeQuiz(project.id, {
        items: [mcqItem({ id: 1 }), tfItem({ id: 2 })],
        answers: [
          { itemId: 1, answer: 'Recursion', confidence: 'high' },
          { itemId: 2, answer: 'False', confidence: 'low' },
        ],
        asOf: JAN_15,
      });

      expect(result.score).toEqual({ correct: 1, total: 2 });
      expect(result.results.map((r) => [r.itemId, r.concept, r.correct, r.given])).toEqual([
        [1, 'Recursion', true, 'Recursion'],
        [2, 'Sorting', false, 'False'],
      ]);
      expect(result.results[1].correctAnswer).toBe('True');
      expect(result.rejected).toEqual([]);

      const expectedLedger = [
        { concept: 'Recursion', correct: 1, total: 1 },
        { concept: 'Sorting', correct: 0, total: 1 },
      ];
      const expectedSchedule = [
        { concept: 'Recursion', intervalDays: 5, nextReview: '2024-01-20' },
        { concept: 'Sorting', intervalDays: 1, nextReview: '2024-01-16' },
      ];
      expect(result.updatedRecords).toEqual(expectedLedger);
      expect(result.updatedSchedule).toEqual(expectedSchedule);
      expect(await ctx.projects.getField(project.id, 'ledger')).toEqual(expectedLedger);
      expect(await ctx.projects.getField(project.id, 'schedule')).toEqual(expectedSchedule);
    });

    it('should aggregate repeated attempts and grow the interval', async () => {
      const project = await createProjectWithSyllabus(ctx.projects);
      const answers = [{ itemId: 1, answer: 'Recursion', confidence: 'high' as const }];

      await ctx.engine.gradeQuiz(project.id, { items: [mcqItem()], answers, asOf: JAN_15 });
      const second = await ctx.engine.gradeQuiz(project.id, {
        items: [mcqItem()],
        answers,
        asOf: JAN_20,
      });

      expect(second.updatedRecords).toEqual([{ concept: 'Recursion', correct: 2, total: 2 }]);
      expect(second.updatedSchedule).toEqual([
        { concept: 'Recursion', intervalDays: 10, nextReview: '2024-01-30' },
      ]);
    });

    it('should count two items on one concept as two attempts', async () => {
      const project = await createProjectWithSyllabus(ctx.projects);

      const result = await ctx.engine.gradeQuiz(project.id, {
        items: [mcqItem({ id: 1 }), mcqItem({ id: 2 })],
        answers: [
          { itemId: 1, answer: 'Recursion', confidence: 'medium' },
          { itemId: 2, answer: 'Hashing', confidence: 'medium' },
        ],
        asOf: JAN_15,
      });

      expect(result.updatedRecords).toEqual([{ concept: 'Recursion', correct: 1, total: 2 }]);
      // medium correct: max(0 + 1, 2) = 2 days; then incorrect: 1 day
      expect(result.updatedSchedule).toEqual([
        { concept: 'Recursion', intervalDays: 1, nextReview: '2024-01-16' },
      ]);
    });

    it('should not grade items whose concept is not a syllabus entry', async () => {
      const project = await createProjectWithSyllabus(ctx.projects);

      const result = await ctx.engine.gradeQuiz(project.id, {
        items: [mcqItem({ id: 1 }), tfItem({ id: 2, primary_concept: 'sorting' })],
        answers: [
          { itemId: 1, answer: 'Recursion', confidence: 'high' },
          { itemId: 2, answer: 'True', confidence: 'high' },
        ],
        asOf: JAN_15,
      });

      expect(result.rejected).toEqual([{ itemId: 2, concept: 'sorting' }]);
      expect(result.score).toEqual({ correct: 1, total: 1 });
      expect(await ctx.projects.getField(project.id, 'ledger')).toEqual([
        { concept: 'Recursion', correct: 1, total: 1 },
      ]);
    });

    it('should reject a quiz with missing, duplicate or unknown answers and record nothing', async () => {
      const project = await createProjectWithSyllabus(ctx.projects);

      const attempt = ctx.engine.gradeQuiz(project.id, {
        items: [mcqItem({ id: 1 }), tfItem({ id: 2 })],
        answers: [
          { itemId: 1, answer: 'Recursion', confidence: 'high' },
          { itemId: 1, answer: 'Iteration', confidence: 'low' },
          { itemId: 9, answer: 'True', confidence: 'low' },
        ],
      });

      await expect(attempt).rejects.toThrow(IncompleteQuizError);
      await expect(attempt).rejects.toThrow(
        'Quiz cannot be graded (unanswered items: 2; items answered more than once: 1; answers for unknown items: 9)'
      );
      expect(await ctx.projects.getField(project.id, 'ledger')).toEqual([]);
    });

    it('should reject malformed items', async () => {
      const project = await createProjectWithSyllabus(ctx.projects);

      await expect(
        ctx.engine.gradeQuiz(project.id, {
          items: [mcqItem({ options: ['Recursion', 'Iteration', 'Hashing'] })],
          answers: [{ itemId: 1, answer: 'Recursion', confidence: 'high' }],
        })
      ).rejects.toThrow('Submitted quiz items are not valid quiz items');
    });

    it('should reject a quiz with no gradable item', async () => {
      const project = await createProjectWithSyllabus(ctx.projects);

      await expect(
        ctx.engine.gradeQuiz(project.id, {
          items: [mcqItem({ primary_concept: 'Photosynthesis' })],
          answers: [{ itemId: 1, answer: 'Recursion', confidence: 'high' }],
        })
      ).rejects.toThrow('No submitted item names a concept from the syllabus');
    });

    it('should not lose updates when gradings for one project overlap', async () => {
      const project = await createProjectWithSyllabus(ctx.projects);
      const grade = () =>
        ctx.engine.gradeQuiz(project.id, {
          items: [tfItem()],
          answers: [{ itemId: 2, answer: 'True', confidence: 'low' }],
          asOf: JAN_15,
        });

      await Promise.all([grade(), grade(), grade()]);

      expect(await ctx.projects.getField(project.id, 'ledger')).toEqual([
        { concept: 'Sorting', correct: 3, total: 3 },
      ]);
    });
  });

  // ==========================================================================
  // Reset
  // ==========================================================================

  describe('resetProgress', () => {
    it('should clear ledger and schedule but keep the syllabus', async () => {
      const project = await createProjectWithSyllabus(ctx.projects);
      await ctx.engine.gradeQuiz(project.id, {
        items: [mcqItem()],
        answers: [{ itemId: 1, answer: 'Iteration', confidence: 'low' }],
        asOf: JAN_15,
      });

      await ctx.engine.resetProgress(project.id);

      const report = await ctx.engine.getReport(project.id, JAN_20);
      expect(report.ledger).toEqual([]);
      expect(report.schedule).toEqual([]);
      expect(report.syllabus).toEqual(['Recursion', 'Sorting', 'Graphs']);
    });

    it('should raise ProjectNotFoundError for unknown projects', async () => {
      await expect(ctx.engine.resetProgress('prj_missing')).rejects.toThrow(ProjectNotFoundError);
    });
  });
});
