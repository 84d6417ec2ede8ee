import { z } from 'zod';

const seconds = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

export const envSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(3000),
    BOT_TOKEN: z.string().min(1).optional(),

    QUESTION_BANK_PATH: z.string().min(1).default('questions.json'),
    QUESTION_STORE_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

    QUIZ_DEFAULT_QUESTION_COUNT: z.coerce.number().int().positive().default(10),
    PRACTICE_TEST_DEFAULT_QUESTION_COUNT: z.coerce.number().int().positive().default(90),
    PRACTICE_TEST_SECONDS_PER_QUESTION: z.coerce.number().positive().default(75),

    SESSION_MAX_AGE_SECONDS: seconds(4 * 60 * 60),
    SESSION_RETENTION_SECONDS: seconds(24 * 60 * 60),
    SESSION_SWEEP_INTERVAL_SECONDS: seconds(5 * 60),

    PROGRESS_LOG_PATH: z.string().min(1).optional(),
    PROGRESS_QUEUE_CAPACITY: z.coerce.number().int().positive().default(100),
    PROGRESS_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  })
  .refine((env) => env.SESSION_RETENTION_SECONDS >= env.SESSION_MAX_AGE_SECONDS, {
    message: 'SESSION_RETENTION_SECONDS must not be shorter than SESSION_MAX_AGE_SECONDS',
    path: ['SESSION_RETENTION_SECONDS'],
  });

export type AppConfig = z.infer<typeof envSchema>;

/** `validate` hook for `ConfigModule.forRoot`. */
export function validateEnv(env: Record<string, unknown>): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment configuration:\n  ${problems.join('\n  ')}`);
  }
  return result.data;
}
