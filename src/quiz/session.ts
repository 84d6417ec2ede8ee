import { Clock, secondsBetween } from '../common/clock';
import {
  EmptyQuestionSetError,
  InvalidPositionError,
  SessionNotFinishedError,
  SessionTerminatedError,
} from '../common/errors';
import {
  PublicQuestion,
  Question,
  SubmittedAnswer,
  checkAnswer,
  describeCorrectAnswer,
  toPublicQuestion,
} from '../questions/question.model';

export const QUIZ_MODES = ['chapter', 'category', 'random', 'practice_test'] as const;
export type QuizMode = (typeof QUIZ_MODES)[number];

export type SessionStatus = 'active' | 'completed' | 'expired';
export type Direction = 'next' | 'previous';

/** Stands in for "no time limit" wherever a number of seconds is expected. */
export const UNLIMITED_TIME_LIMIT_SECONDS = 999_999;

export interface SessionOptions {
  mode: QuizMode;
  timeLimitSeconds?: number;
  section?: number;
  category?: string;
  userId?: string;
}

export interface AnswerRecord {
  submittedAnswer: SubmittedAnswer;
  isCorrect: boolean;
  timeSpentSeconds: number;
  submittedAt: Date;
}

export interface QuizResult {
  quizId: string;
  quizType: QuizMode;
  status: Exclude<SessionStatus, 'active'>;
  section?: number;
  category?: string;
  score: number;
  totalQuestions: number;
  answeredCount: number;
  wrongCount: number;
  percentage: number;
  durationSeconds: number;
  startedAt: Date;
  completedAt: Date;
  answers: Array<{ position: number; questionId: string; isCorrect: boolean; timeSpentSeconds: number }>;
}

export interface WrongReviewItem {
  position: number;
  question: Question;
  submittedAnswer: SubmittedAnswer;
  correctAnswer: string;
  explanation: string;
}

const round2 = (value: number) => Math.round(value * 100) / 100;

/**
 * One quiz attempt. The question list is fixed at construction; answers
 * accumulate until the session is completed or expired, after which it is
 * read-only.
 */
export class QuizSession {
  readonly questions: readonly Question[];
  readonly mode: QuizMode;
  readonly timeLimitSeconds?: number;
  readonly section?: number;
  readonly category?: string;
  readonly userId?: string;
  readonly startedAt: Date;

  private readonly answers = new Map<number, AnswerRecord>();
  private index = 0;
  private state: SessionStatus = 'active';
  private endedAt?: Date;
  private result?: QuizResult;

  constructor(
    readonly id: string,
    questions: readonly Question[],
    options: SessionOptions,
    private readonly clock: Clock,
  ) {
    if (questions.length === 0) {
      throw new EmptyQuestionSetError();
    }
    this.questions = Object.freeze([...questions]);
    this.mode = options.mode;
    this.timeLimitSeconds = options.timeLimitSeconds;
    this.section = options.section;
    this.category = options.category;
    this.userId = options.userId;
    this.startedAt = clock.now();
  }

  get status(): SessionStatus {
    return this.state;
  }

  get currentIndex(): number {
    return this.index;
  }

  get totalQuestions(): number {
    return this.questions.length;
  }

  get answeredCount(): number {
    return this.answers.size;
  }

  /** Running count of correct answers. */
  get score(): number {
    let correct = 0;
    for (const record of this.answers.values()) {
      if (record.isCorrect) correct++;
    }
    return correct;
  }

  get isFullyAnswered(): boolean {
    return this.answers.size === this.questions.length;
  }

  /** Set only once the session has been finalized. */
  get completedAt(): Date | undefined {
    return this.state === 'completed' ? this.endedAt : undefined;
  }

  get deadline(): Date | undefined {
    if (this.timeLimitSeconds === undefined || this.timeLimitSeconds >= UNLIMITED_TIME_LIMIT_SECONDS) {
      return undefined;
    }
    return new Date(this.startedAt.getTime() + this.timeLimitSeconds * 1000);
  }

  timeRemainingSeconds(): number | undefined {
    const deadline = this.deadline;
    if (!deadline) return undefined;
    return Math.max(0, Math.ceil(secondsBetween(this.clock.now(), deadline)));
  }

  getCurrentQuestion(): PublicQuestion {
    this.assertActive();
    return toPublicQuestion(this.questions[this.index]);
  }

  getAnswer(position: number): AnswerRecord | undefined {
    return this.answers.get(position);
  }

  /** Jumps straight to a position. */
  goTo(position: number): number {
    this.assertActive();
    this.assertPosition(position);
    this.index = position;
    return this.index;
  }

  /** Moves one step; stays put at either end. */
  advance(direction: Direction): number {
    this.assertActive();
    const step = direction === 'next' ? 1 : -1;
    this.index = Math.min(this.questions.length - 1, Math.max(0, this.index + step));
    return this.index;
  }

  /**
   * Records an answer for a position, replacing any earlier one. Does not move
   * the current position.
   */
  submitAnswer(position: number, submitted: SubmittedAnswer, elapsedSeconds: number): AnswerRecord {
    this.assertActive();
    this.assertPosition(position);

    const record: AnswerRecord = {
      submittedAnswer: submitted,
      isCorrect: checkAnswer(this.questions[position], submitted),
      timeSpentSeconds: Number.isFinite(elapsedSeconds) && elapsedSeconds > 0 ? elapsedSeconds : 0,
      submittedAt: this.clock.now(),
    };
    this.answers.set(position, record);
    return record;
  }

  /**
   * Ends the attempt and scores it; unanswered positions count as wrong.
   * Later calls return the same result object.
   */
  finalize(): QuizResult {
    if (this.result) return this.result;
    this.state = 'completed';
    this.endedAt = this.clock.now();
    this.result = this.buildResult('completed');
    return this.result;
  }

  /** Marks an abandoned attempt. Returns false if it had already ended. */
  expire(): boolean {
    if (this.state !== 'active') return false;
    this.state = 'expired';
    this.endedAt = this.clock.now();
    this.result = this.buildResult('expired');
    return true;
  }

  /** Result of an ended session; undefined while it is active. */
  getResult(): QuizResult | undefined {
    return this.result;
  }

  /** Seconds since the session ended, or undefined if it has not. */
  secondsSinceEnded(now: Date): number | undefined {
    return this.endedAt ? secondsBetween(this.endedAt, now) : undefined;
  }

  getWrongReview(): Iterable<WrongReviewItem> {
    if (this.state === 'active') {
      throw new SessionNotFinishedError(this.id);
    }
    const questions = this.questions;
    const answers = this.answers;

    return {
      *[Symbol.iterator]() {
        for (let position = 0; position < questions.length; position++) {
          const record = answers.get(position);
          if (!record || record.isCorrect) continue;
          const question = questions[position];
          yield {
            position,
            question,
            submittedAnswer: record.submittedAnswer,
            correctAnswer: describeCorrectAnswer(question),
            explanation: question.explanation,
          };
        }
      },
    };
  }

  private buildResult(status: QuizResult['status']): QuizResult {
    const completedAt = this.endedAt ?? this.clock.now();
    const score = this.score;
    const total = this.questions.length;

    return {
      quizId: this.id,
      quizType: this.mode,
      status,
      ...(this.section !== undefined ? { section: this.section } : {}),
      ...(this.category !== undefined ? { category: this.category } : {}),
      score,
      totalQuestions: total,
      answeredCount: this.answers.size,
      wrongCount: this.answers.size - score,
      percentage: round2((score / total) * 100),
      durationSeconds: round2(secondsBetween(this.startedAt, completedAt)),
      startedAt: this.startedAt,
      completedAt,
      answers: [...this.answers.entries()]
        .sort(([a], [b]) => a - b)
        .map(([position, record]) => ({
          position,
          questionId: this.questions[position].id,
          isCorrect: record.isCorrect,
          timeSpentSeconds: record.timeSpentSeconds,
        })),
    };
  }

  private assertActive() {
    if (this.state !== 'active') {
      throw new SessionTerminatedError(this.id, this.state);
    }
  }

  private assertPosition(position: number) {
    if (!Number.isInteger(position) || position < 0 || position >= this.questions.length) {
      throw new InvalidPositionError(position, this.questions.length);
    }
  }
}
