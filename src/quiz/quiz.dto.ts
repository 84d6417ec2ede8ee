import { BadRequestException, PipeTransform } from '@nestjs/common';
import { z } from 'zod';

const MAX_QUESTIONS = 500;

const questionCount = z.coerce.number().int().positive().max(MAX_QUESTIONS);

/** Blank strings count as "not given". */
const blankToUndefined = (value: unknown) => {
  if (typeof value !== 'string') return value;
  const trimmed = value.trim().toLowerCase();
  return trimmed === '' ? undefined : trimmed;
};

export const difficultySchema = z.preprocess(
  blankToUndefined,
  z.enum(['easy', 'medium', 'hard', 'mixed', 'all', 'any']).optional(),
);

const sectionsSchema = z.array(z.coerce.number().int().nonnegative()).optional();

export const chapterQuizSchema = z.object({
  limit: questionCount.optional(),
  difficulty: difficultySchema,
});

export const categoryQuizSchema = z.object({
  category: z.string().trim().min(1),
  limit: questionCount.optional(),
  difficulty: difficultySchema,
});

export const randomQuizSchema = z.object({
  limit: questionCount.optional(),
  sections: sectionsSchema,
  difficulty: difficultySchema,
});

export const practiceTestSchema = z.object({
  question_count: questionCount.optional(),
  sections: sectionsSchema,
  difficulty: difficultySchema,
  time_limit: z
    .union([z.literal('auto'), z.literal('unlimited'), z.coerce.number().int().positive()])
    .optional(),
});

export const submitAnswerSchema = z.object({
  index: z.coerce.number().int().nonnegative(),
  answer: z.union([z.string().trim().min(1), z.number(), z.boolean()]),
  elapsed_seconds: z.coerce.number().nonnegative().default(0),
});

export const navigateSchema = z.object({
  direction: z.enum(['next', 'previous']),
});

export type ChapterQuizBody = z.infer<typeof chapterQuizSchema>;
export type CategoryQuizBody = z.infer<typeof categoryQuizSchema>;
export type RandomQuizBody = z.infer<typeof randomQuizSchema>;
export type PracticeTestBody = z.infer<typeof practiceTestSchema>;
export type SubmitAnswerBody = z.infer<typeof submitAnswerSchema>;
export type NavigateBody = z.infer<typeof navigateSchema>;

export class ZodValidationPipe<T extends z.ZodTypeAny> implements PipeTransform<unknown, z.output<T>> {
  constructor(private readonly schema: T) {}

  transform(value: unknown): z.output<T> {
    const result = this.schema.safeParse(value ?? {});
    if (!result.success) {
      throw new BadRequestException({
        success: false,
        error: 'VALIDATION_FAILED',
        message: 'Invalid request body',
        issues: result.error.issues,
      });
    }
    return result.data;
  }
}
