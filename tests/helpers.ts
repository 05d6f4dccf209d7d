/**
 * Test Helpers Module
 *
 * Builders for quiz items, generator replies and projects, plus a reader
 * for the API's JSON envelope.
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { MultipleChoiceItem, Project, QuizItem, TrueFalseItem } from '../src/core/models';
import type { ProjectRepository } from '../src/storage/repositories';

// ============================================================================
// Quiz Items
// ============================================================================

/**
 * Builds a valid MCQ item testing 'Recursion'.
 */
export function mcqItem(overrides: Partial<MultipleChoiceItem> = {}): MultipleChoiceItem {
  return {
    id: 1,
    type: 'MCQ',
    question_text: 'Which technique solves a problem by calling itself on smaller inputs?',
    options: ['Recursion', 'Iteration', 'Memoization', 'Hashing'],
    correct_answer: 'Recursion',
    primary_concept: 'Recursion',
    detailed_explanation: 'A recursive function calls itself until it reaches a base case.',
    ...overrides,
  };
}

/**
 * Builds a valid T/F item testing 'Sorting'.
 */
export function tfItem(overrides: Partial<TrueFalseItem> = {}): TrueFalseItem {
  return {
    id: 2,
    type: 'T/F',
    question_text: 'Merge sort runs in O(n log n) time in the worst case.',
    options: ['True', 'False'],
    correct_answer: 'True',
    primary_concept: 'Sorting',
    detailed_explanation: 'Merge sort always splits in half and merges in linear time.',
    ...overrides,
  };
}

/**
 * Serializes items the way a well-behaved generator would answer.
 */
export function quizJson(items: readonly QuizItem[]): string {
  return JSON.stringify({ quiz: items });
}

// ============================================================================
// Projects
// ============================================================================

let projectCounter = 0;

export async function createTestProject(
  projects: ProjectRepository,
  overrides: { name?: string; sourceText?: string; level?: string } = {}
): Promise<Project> {
  projectCounter++;
  return projects.create({
    id: `prj_${randomUUID()}`,
    name: overrides.name ?? `Test Project ${projectCounter}`,
    sourceText:
      overrides.sourceText ??
      'Recursion breaks a problem into smaller copies of itself. Sorting orders a collection. Graphs model pairwise relations.',
    level: overrides.level,
  });
}

/**
 * Creates a project whose syllabus is already set.
 */
export async function createProjectWithSyllabus(
  projects: ProjectRepository,
  syllabus: string[] = ['Recursion', 'Sorting', 'Graphs']
): Promise<Project> {
  const project = await createTestProject(projects);
  await projects.setField(project.id, 'syllabus', syllabus);
  return project;
}

// ============================================================================
// API Responses
// ============================================================================

const envelopeSchema = z.object({
  success: z.boolean(),
  data: z.unknown().optional(),
  error: z
    .object({
      code: z.string(),
      message: z.string(),
      details: z.unknown().optional(),
    })
    .optional(),
});

export type Envelope = z.infer<typeof envelopeSchema>;

/**
 * Reads and checks the `{ success, data | error }` envelope of a response.
 */
export async function getJsonResponse(response: Response): Promise<Envelope> {
  return envelopeSchema.parse(await response.json());
}

/**
 * Builds a JSON request init for app.request.
 */
export function jsonRequest(method: string, body: unknown): RequestInit {
  return {
    method,
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  };
}
