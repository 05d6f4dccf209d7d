/**
 * ReviewScheduler Unit Tests
 *
 * Covers the confidence-weighted interval rules, date arithmetic across
 * month boundaries, due-concept selection and the review-priority merge.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ReviewScheduler, reviewPriority } from './scheduler';
import type { IntervalPolicy } from './policy';
import { parseDateKey } from './dates';
import type { SRSEntry } from '../models';

describe('ReviewScheduler', () => {
  let scheduler: ReviewScheduler;
  const baseTime = new Date('2024-01-15T10:00:00Z');

  beforeEach(() => {
    scheduler = new ReviewScheduler();
  });

  describe('update', () => {
    it('schedules a first confident correct answer five days out', () => {
      const entry = scheduler.update(
        undefined,
        { concept: 'Recursion', correct: true, confidence: 'high' },
        baseTime
      );

      expect(entry).toEqual({ concept: 'Recursion', intervalDays: 5, nextReview: '2024-01-20' });
    });

    it('schedules a first unsure correct answer two days out', () => {
      const entry = scheduler.update(
        undefined,
        { concept: 'Recursion', correct: true, confidence: 'low' },
        baseTime
      );

      expect(entry).toEqual({ concept: 'Recursion', intervalDays: 2, nextReview: '2024-01-17' });
    });

    it('doubles the interval on a confident correct answer', () => {
      const previous: SRSEntry = { concept: 'Recursion', intervalDays: 5, nextReview: '2024-01-15' };
      const entry = scheduler.update(
        previous,
        { concept: 'Recursion', correct: true, confidence: 'high' },
        baseTime
      );

      expect(entry.intervalDays).toBe(10);
      expect(entry.nextReview).toBe('2024-01-25');
    });

    it('adds one day on a medium-confidence correct answer', () => {
      const previous: SRSEntry = { concept: 'Recursion', intervalDays: 5, nextReview: '2024-01-15' };
      const entry = scheduler.update(
        previous,
        { concept: 'Recursion', correct: true, confidence: 'medium' },
        baseTime
      );

      expect(entry.intervalDays).toBe(6);
      expect(entry.nextReview).toBe('2024-01-21');
    });

    it('resets to one day on an incorrect answer regardless of confidence', () => {
      const previous: SRSEntry = { concept: 'Recursion', intervalDays: 10, nextReview: '2024-01-15' };
      const entry = scheduler.update(
        previous,
        { concept: 'Recursion', correct: false, confidence: 'high' },
        baseTime
      );

      expect(entry).toEqual({ concept: 'Recursion', intervalDays: 1, nextReview: '2024-01-16' });
    });

    it('rolls the review date over a month boundary', () => {
      const entry = scheduler.update(
        undefined,
        { concept: 'Sorting', correct: true, confidence: 'high' },
        new Date('2024-01-30T23:30:00Z')
      );

      expect(entry.nextReview).toBe('2024-02-04');
    });

    it('never schedules an interval below one day', () => {
      const lazyPolicy: IntervalPolicy = { nextInterval: () => 0.4 };
      const custom = new ReviewScheduler({ policy: lazyPolicy });

      const entry = custom.update(
        undefined,
        { concept: 'Graphs', correct: true, confidence: 'high' },
        baseTime
      );

      expect(entry.intervalDays).toBe(1);
      expect(entry.nextReview).toBe('2024-01-16');
    });

    it('rejects an entry that belongs to another concept', () => {
      const previous: SRSEntry = { concept: 'Graphs', intervalDays: 2, nextReview: '2024-01-15' };

      expect(() =>
        scheduler.update(previous, { concept: 'Trees', correct: true, confidence: 'low' }, baseTime)
      ).toThrow("Schedule entry for 'Graphs' cannot be updated with an attempt on 'Trees'");
    });
  });

  describe('applyReview', () => {
    it('appends an entry for a concept not yet scheduled', () => {
      const schedule: SRSEntry[] = [
        { concept: 'Graphs', intervalDays: 2, nextReview: '2024-01-16' },
      ];

      const next = scheduler.applyReview(
        schedule,
        { concept: 'Trees', correct: false, confidence: 'low' },
        baseTime
      );

      expect(next).toEqual([
        { concept: 'Graphs', intervalDays: 2, nextReview: '2024-01-16' },
        { concept: 'Trees', intervalDays: 1, nextReview: '2024-01-16' },
      ]);
      expect(schedule).toHaveLength(1);
    });

    it('replaces the existing entry in place', () => {
      const schedule: SRSEntry[] = [
        { concept: 'Graphs', intervalDays: 2, nextReview: '2024-01-15' },
        { concept: 'Trees', intervalDays: 3, nextReview: '2024-01-18' },
      ];

      const next = scheduler.applyReview(
        schedule,
        { concept: 'Graphs', correct: true, confidence: 'low' },
        baseTime
      );

      expect(next).toEqual([
        { concept: 'Graphs', intervalDays: 3, nextReview: '2024-01-18' },
        { concept: 'Trees', intervalDays: 3, nextReview: '2024-01-18' },
      ]);
      expect(schedule[0].intervalDays).toBe(2);
    });
  });

  describe('dueConcepts', () => {
    const longName = 'A concept label that is far too long to be a real syllabus entry';

    const schedule: SRSEntry[] = [
      { concept: 'Trees', intervalDays: 1, nextReview: '2024-01-16' },
      { concept: 'Graphs', intervalDays: 2, nextReview: '2024-01-15' },
      { concept: longName, intervalDays: 1, nextReview: '2024-01-10' },
      { concept: 'Arrays', intervalDays: 4, nextReview: '2024-01-14' },
    ];

    it('returns concepts due on or before the given day, earliest first', () => {
      expect(scheduler.dueConcepts(schedule, new Date('2024-01-15T23:59:00Z'))).toEqual([
        'Arrays',
        'Graphs',
      ]);
    });

    it('never reports corrupted entries as due', () => {
      const due = scheduler.dueConcepts(schedule, new Date('2024-02-01T00:00:00Z'));

      expect(due).toEqual(['Arrays', 'Graphs', 'Trees']);
    });

    it('returns an empty list for an empty schedule', () => {
      expect(scheduler.dueConcepts([], baseTime)).toEqual([]);
    });
  });
});

describe('reviewPriority', () => {
  it('lists weak concepts first, then due concepts not already present', () => {
    expect(reviewPriority(['Trees', 'Graphs'], ['Graphs', 'Arrays'])).toEqual([
      'Trees',
      'Graphs',
      'Arrays',
    ]);
  });

  it('is empty when nothing is weak or due', () => {
    expect(reviewPriority([], [])).toEqual([]);
  });
});

describe('parseDateKey', () => {
  it('parses a calendar date at UTC midnight', () => {
    expect(parseDateKey('2024-02-29')?.toISOString()).toBe('2024-02-29T00:00:00.000Z');
  });

  it('rejects days that do not exist instead of rolling them over', () => {
    expect(parseDateKey('2024-02-30')).toBeNull();
    expect(parseDateKey('2023-02-29')).toBeNull();
    expect(parseDateKey('2024-13-01')).toBeNull();
  });

  it('rejects other formats', () => {
    expect(parseDateKey('2024-2-3')).toBeNull();
    expect(parseDateKey('2024-02-03T00:00:00Z')).toBeNull();
  });
});
