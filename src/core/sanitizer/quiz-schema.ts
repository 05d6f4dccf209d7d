/**
 * Quiz Payload Schema
 *
 * Zod schema for the quiz record generators are asked to return. Items are a
 * tagged union on `type`, so an MCQ item with two options or a T/F item
 * with four is rejected instead of being coerced.
 */

import { z } from 'zod';
import type { QuizPayload } from '../models';

const nonBlank = z
  .string()
  .refine((value) => value.trim().length > 0, { message: 'must not be blank' });

const itemFields = {
  id: z.number().int(),
  question_text: nonBlank,
  correct_answer: nonBlank,
  primary_concept: nonBlank,
  detailed_explanation: nonBlank,
};

const multipleChoiceItemSchema = z.object({
  ...itemFields,
  type: z.literal('MCQ'),
  options: z.array(nonBlank).length(4),
});

const trueFalseItemSchema = z.object({
  ...itemFields,
  type: z.literal('T/F'),
  options: z.array(nonBlank).length(2),
});

/**
 * Schema for a single quiz item.
 *
 * Beyond the per-variant shape, options must be distinct and the correct
 * answer must be one of them verbatim.
 */
export const quizItemSchema = z
  .discriminatedUnion('type', [multipleChoiceItemSchema, trueFalseItemSchema])
  .superRefine((item, ctx) => {
    if (new Set(item.options).size !== item.options.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['options'],
        message: 'options must be distinct',
      });
    }
    if (!item.options.includes(item.correct_answer)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['correct_answer'],
        message: 'correct_answer must be one of the options',
      });
    }
  });

/**
 * Schema for the whole payload: `{ "quiz": [item, ...] }` with at least one
 * item and ids unique within the quiz.
 */
export const quizPayloadSchema: z.ZodType<QuizPayload> = z
  .object({
    quiz: z.array(quizItemSchema).min(1),
  })
  .superRefine((payload, ctx) => {
    const seen = new Set<number>();
    payload.quiz.forEach((item, index) => {
      if (seen.has(item.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['quiz', index, 'id'],
          message: `duplicate item id ${item.id}`,
        });
      }
      seen.add(item.id);
    });
  });
