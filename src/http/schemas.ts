import { MAX_QUIZ_QUESTIONS, MIN_QUIZ_QUESTIONS } from '@/domain/quiz';
import { z } from 'zod';

/**
 * Request bodies as they arrive on the wire (snake_case).
 * Shapes and ranges are checked here; the services enforce the remaining domain rules.
 */

const optionalText = z.string().nullish().transform((value) => value ?? undefined);

export const tutorRequestSchema = z.object({
  subject: z.string(),
  level: z.string(),
  learning_style: z.string(),
  language: z.string(),
  background: optionalText,
  question: z.string(),
});

export const quizRequestSchema = z.object({
  subject: z.string(),
  level: z.string(),
  num_questions: z
    .number()
    .int()
    .min(MIN_QUIZ_QUESTIONS)
    .max(MAX_QUIZ_QUESTIONS)
    .nullish()
    .transform((value) => value ?? undefined),
  language: optionalText,
  topic: optionalText,
  reveal_format: z.boolean().default(false),
});

export const discussRequestSchema = z.object({
  question: z.string(),
  pdf_content: z.string(),
  pdf_summary: optionalText,
});
