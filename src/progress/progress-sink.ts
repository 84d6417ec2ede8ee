import { Logger } from '@nestjs/common';
import * as fs from 'fs/promises';
import * as path from 'path';

import { QuizResult } from '../quiz/session';

export const PROGRESS_SINK = Symbol('PROGRESS_SINK');

/** One row of long-term quiz history. */
export interface ProgressRecord {
  user_id: string;
  quiz_id: string;
  quiz_type: string;
  section?: number;
  score: number;
  total_questions: number;
  percentage: number;
  duration_seconds: number;
  completed_at: string;
  outcome: 'completed' | 'expired';
}

export interface ProgressSink {
  write(record: ProgressRecord): Promise<void>;
}

export function toProgressRecord(userId: string, result: QuizResult): ProgressRecord {
  return {
    user_id: userId,
    quiz_id: result.quizId,
    quiz_type: result.quizType,
    ...(result.section !== undefined ? { section: result.section } : {}),
    score: result.score,
    total_questions: result.totalQuestions,
    percentage: result.percentage,
    duration_seconds: Math.round(result.durationSeconds),
    completed_at: result.completedAt.toISOString(),
    outcome: result.status,
  };
}

/** Appends each record as one JSON line. */
export class JsonLinesProgressSink implements ProgressSink {
  private directoryReady?: Promise<unknown>;

  constructor(private readonly filePath: string) {}

  async write(record: ProgressRecord): Promise<void> {
    this.directoryReady ??= fs.mkdir(path.dirname(this.filePath), { recursive: true }).catch((error: unknown) => {
      this.directoryReady = undefined;
      throw error;
    });
    await this.directoryReady;
    await fs.appendFile(this.filePath, `${JSON.stringify(record)}\n`, 'utf-8');
  }
}

/** Used when no progress store is configured. */
export class LoggerProgressSink implements ProgressSink {
  private readonly logger = new Logger('ProgressSink');

  async write(record: ProgressRecord): Promise<void> {
    this.logger.log(
      `📊 ${record.user_id} ${record.outcome} ${record.quiz_type} ${record.quiz_id}: ` +
        `${record.score}/${record.total_questions} (${record.percentage}%)`,
    );
  }
}
