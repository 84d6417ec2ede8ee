import { Inject, Injectable, Logger } from '@nestjs/common';

import { RANDOM, RandomSource } from '../common/clock';
import { InsufficientQuestionsError, QuestionStoreUnavailableError, QuizError } from '../common/errors';
import { ProgressQueue } from '../progress/progress-queue';
import { toProgressRecord } from '../progress/progress-sink';
import {
  Difficulty,
  PublicQuestion,
  SubmittedAnswer,
  describeCorrectAnswer,
} from '../questions/question.model';
import { QUESTION_STORE, QuestionFilter, QuestionStore } from '../questions/question-store';
import { CleanupReport, QuizManager } from './quiz-manager';
import { sample } from './sampling';
import {
  Direction,
  QuizMode,
  QuizResult,
  QuizSession,
  UNLIMITED_TIME_LIMIT_SECONDS,
  WrongReviewItem,
} from './session';

export const QUIZ_SETTINGS = Symbol('QUIZ_SETTINGS');

export interface QuizSettings {
  defaultQuestionCount: number;
  practiceTestDefaultQuestionCount: number;
  practiceTestSecondsPerQuestion: number;
  storeTimeoutMs: number;
  sessionMaxAgeSeconds: number;
  sessionRetentionSeconds: number;
}

/** "mixed", "all" and "any" mean no difficulty filter. */
export type DifficultyChoice = Difficulty | 'mixed' | 'all' | 'any';
export type TimeLimitChoice = 'auto' | 'unlimited' | number;

export interface QuizOptions {
  difficulty?: DifficultyChoice;
  userId?: string;
}

export interface RandomQuizOptions extends QuizOptions {
  sections?: number[];
}

export interface PracticeTestOptions extends RandomQuizOptions {
  timeLimit?: TimeLimitChoice;
}

export interface CreatedQuiz {
  quizId: string;
  mode: QuizMode;
  section?: number;
  category?: string;
  totalQuestions: number;
  timeLimitSeconds?: number;
  startedAt: Date;
}

export interface QuestionView {
  quizId: string;
  position: number;
  totalQuestions: number;
  progressPercentage: number;
  question: PublicQuestion;
  /** Present once the position has been answered. */
  answer?: {
    submittedAnswer: SubmittedAnswer;
    isCorrect: boolean;
    correctAnswer: string;
    explanation: string;
  };
  timeRemainingSeconds?: number;
}

export interface SubmissionResult {
  quizId: string;
  position: number;
  isCorrect: boolean;
  submittedAnswer: SubmittedAnswer;
  correctAnswer: string;
  explanation: string;
  score: number;
  answeredCount: number;
  totalQuestions: number;
  completed: boolean;
  result?: QuizResult;
}

export interface QuizProgress {
  quizId: string;
  status: QuizSession['status'];
  score: number;
  answeredCount: number;
  totalQuestions: number;
}

export interface SectionInfo {
  section: number;
  questionCount: number;
  categories: string[];
}

export interface QuizStatistics {
  totalQuestions: number;
  categories: string[];
  tags: string[];
  categoryBreakdown: Record<string, number>;
  sessionsInRegistry: number;
}

const round2 = (value: number) => Math.round(value * 100) / 100;

export function normalizeDifficulty(choice?: DifficultyChoice): Difficulty | undefined {
  return choice === undefined || choice === 'mixed' || choice === 'all' || choice === 'any' ? undefined : choice;
}

/**
 * Builds quiz sessions from the question store and mediates everything a
 * front end does with them. Completed results go to the progress queue and
 * never wait on it.
 */
@Injectable()
export class QuizService {
  private readonly logger = new Logger(QuizService.name);

  constructor(
    @Inject(QUESTION_STORE) private readonly questionStore: QuestionStore,
    private readonly quizManager: QuizManager,
    private readonly progressQueue: ProgressQueue,
    @Inject(QUIZ_SETTINGS) private readonly settings: QuizSettings,
    @Inject(RANDOM) private readonly random: RandomSource,
  ) {}

  /**
   * Quiz over one chapter. Asking for more questions than the chapter has
   * yields all of them.
   */
  async createChapterQuiz(section: number, questionCount?: number, options: QuizOptions = {}): Promise<CreatedQuiz> {
    const filter: QuestionFilter = { section, difficulty: normalizeDifficulty(options.difficulty) };
    const pool = await this.query('find', () => this.questionStore.find(filter));
    const questions = sample(pool, questionCount ?? this.settings.defaultQuestionCount, this.random);

    const session = this.quizManager.createSession(questions, { mode: 'chapter', section, userId: options.userId });
    return this.describe(session);
  }

  async createCategoryQuiz(category: string, questionCount?: number, options: QuizOptions = {}): Promise<CreatedQuiz> {
    const filter: QuestionFilter = { category, difficulty: normalizeDifficulty(options.difficulty) };
    const pool = await this.query('find', () => this.questionStore.find(filter));
    const questions = sample(pool, questionCount ?? this.settings.defaultQuestionCount, this.random);

    const session = this.quizManager.createSession(questions, { mode: 'category', category, userId: options.userId });
    return this.describe(session);
  }

  async createRandomQuiz(count?: number, options: RandomQuizOptions = {}): Promise<CreatedQuiz> {
    const questions = await this.samplePool(count ?? this.settings.defaultQuestionCount, options);
    const session = this.quizManager.createSession(questions, { mode: 'random', userId: options.userId });
    return this.describe(session);
  }

  async createPracticeTest(questionCount?: number, options: PracticeTestOptions = {}): Promise<CreatedQuiz> {
    const requested = questionCount ?? this.settings.practiceTestDefaultQuestionCount;
    const questions = await this.samplePool(requested, options);
    const session = this.quizManager.createSession(questions, {
      mode: 'practice_test',
      timeLimitSeconds: this.resolveTimeLimit(options.timeLimit, requested),
      userId: options.userId,
    });
    return this.describe(session);
  }

  getQuizQuestion(sessionId: string, position: number): QuestionView {
    const session = this.quizManager.getSession(sessionId);
    session.goTo(position);
    return this.viewCurrent(session);
  }

  navigate(sessionId: string, direction: Direction): QuestionView {
    const session = this.quizManager.getSession(sessionId);
    session.advance(direction);
    return this.viewCurrent(session);
  }

  /**
   * Records an answer. The answer that completes the quiz also finalizes it
   * and hands the result to the progress queue.
   */
  submitQuizAnswer(
    sessionId: string,
    position: number,
    value: SubmittedAnswer,
    elapsedSeconds: number,
  ): SubmissionResult {
    const session = this.quizManager.getSession(sessionId);
    const record = session.submitAnswer(position, value, elapsedSeconds);
    const question = session.questions[position];
    this.logger.debug(`📩 ${sessionId}#${position}: ${JSON.stringify(value)} -> ${record.isCorrect ? '✅' : '❌'}`);

    const result = session.isFullyAnswered ? this.finish(session) : undefined;

    return {
      quizId: session.id,
      position,
      isCorrect: record.isCorrect,
      submittedAnswer: record.submittedAnswer,
      correctAnswer: describeCorrectAnswer(question),
      explanation: question.explanation,
      score: session.score,
      answeredCount: session.answeredCount,
      totalQuestions: session.totalQuestions,
      completed: result !== undefined,
      ...(result ? { result } : {}),
    };
  }

  getQuizProgress(sessionId: string): QuizProgress {
    const session = this.quizManager.getSession(sessionId);
    return {
      quizId: session.id,
      status: session.status,
      score: session.score,
      answeredCount: session.answeredCount,
      totalQuestions: session.totalQuestions,
    };
  }

  /** Ends the attempt if it is still running. */
  getQuizResults(sessionId: string): QuizResult {
    return this.finish(this.quizManager.getSession(sessionId));
  }

  getWrongQuestionsReview(sessionId: string): Iterable<WrongReviewItem> {
    return this.quizManager.getSession(sessionId).getWrongReview();
  }

  cleanupQuizSession(sessionId: string): boolean {
    return this.quizManager.deleteSession(sessionId);
  }

  /** One maintenance pass: expire abandoned sessions and report them. */
  reapExpiredSessions(): CleanupReport {
    const report = this.quizManager.cleanupExpired(
      this.settings.sessionMaxAgeSeconds,
      this.settings.sessionRetentionSeconds,
    );
    for (const session of report.expired) {
      const result = session.getResult();
      if (result) this.report(session, result);
    }
    return report;
  }

  async listSections(): Promise<SectionInfo[]> {
    const questions = await this.query('find', () => this.questionStore.find({}));
    const sections = new Map<number, { count: number; categories: Set<string> }>();
    for (const question of questions) {
      const entry = sections.get(question.section) ?? { count: 0, categories: new Set<string>() };
      entry.count++;
      entry.categories.add(question.category);
      sections.set(question.section, entry);
    }
    return [...sections.entries()]
      .sort(([a], [b]) => a - b)
      .map(([section, entry]) => ({
        section,
        questionCount: entry.count,
        categories: [...entry.categories].sort(),
      }));
  }

  async getSectionInfo(section: number): Promise<SectionInfo | null> {
    const questions = await this.query('find', () => this.questionStore.find({ section }));
    if (questions.length === 0) return null;
    return {
      section,
      questionCount: questions.length,
      categories: [...new Set(questions.map((question) => question.category))].sort(),
    };
  }

  async getStatistics(): Promise<QuizStatistics> {
    const [totalQuestions, categories, tags] = await Promise.all([
      this.query('count', () => this.questionStore.count({})),
      this.query('getCategories', () => this.questionStore.getCategories()),
      this.query('getTags', () => this.questionStore.getTags()),
    ]);

    const sortedCategories = [...categories].sort();
    const counts = await Promise.all(
      sortedCategories.map((category) => this.query('count', () => this.questionStore.count({ category }))),
    );

    return {
      totalQuestions,
      categories: sortedCategories,
      tags: [...tags].sort(),
      categoryBreakdown: Object.fromEntries(sortedCategories.map((category, i) => [category, counts[i]])),
      sessionsInRegistry: this.quizManager.size,
    };
  }

  private async samplePool(count: number, options: RandomQuizOptions) {
    const filter: QuestionFilter = {
      ...(options.sections && options.sections.length > 0 ? { sections: options.sections } : {}),
      difficulty: normalizeDifficulty(options.difficulty),
    };
    const pool = await this.query('find', () => this.questionStore.find(filter));
    if (pool.length === 0) {
      throw new InsufficientQuestionsError(filter);
    }
    return sample(pool, count, this.random);
  }

  private resolveTimeLimit(choice: TimeLimitChoice | undefined, questionCount: number): number {
    if (choice === 'auto') {
      return Math.ceil(questionCount * this.settings.practiceTestSecondsPerQuestion);
    }
    if (typeof choice === 'number') return choice;
    return UNLIMITED_TIME_LIMIT_SECONDS;
  }

  private finish(session: QuizSession): QuizResult {
    const wasActive = session.status === 'active';
    const result = session.finalize();
    if (wasActive) {
      this.logger.log(`🏁 ${session.id} finished: ${result.score}/${result.totalQuestions} (${result.percentage}%)`);
      this.report(session, result);
    }
    return result;
  }

  private report(session: QuizSession, result: QuizResult) {
    if (!session.userId) {
      this.logger.debug(`Result of anonymous session ${session.id} not stored`);
      return;
    }
    this.progressQueue.enqueue(toProgressRecord(session.userId, result));
  }

  private viewCurrent(session: QuizSession): QuestionView {
    const position = session.currentIndex;
    const question = session.getCurrentQuestion();
    const record = session.getAnswer(position);
    const timeRemainingSeconds = session.timeRemainingSeconds();
    const full = session.questions[position];

    return {
      quizId: session.id,
      position,
      totalQuestions: session.totalQuestions,
      progressPercentage: round2(((position + 1) / session.totalQuestions) * 100),
      question,
      ...(record
        ? {
            answer: {
              submittedAnswer: record.submittedAnswer,
              isCorrect: record.isCorrect,
              correctAnswer: describeCorrectAnswer(full),
              explanation: full.explanation,
            },
          }
        : {}),
      ...(timeRemainingSeconds !== undefined ? { timeRemainingSeconds } : {}),
    };
  }

  private describe(session: QuizSession): CreatedQuiz {
    return {
      quizId: session.id,
      mode: session.mode,
      ...(session.section !== undefined ? { section: session.section } : {}),
      ...(session.category !== undefined ? { category: session.category } : {}),
      totalQuestions: session.totalQuestions,
      ...(session.timeLimitSeconds !== undefined ? { timeLimitSeconds: session.timeLimitSeconds } : {}),
      startedAt: session.startedAt,
    };
  }

  /** Store calls fail with `QuestionStoreUnavailableError` rather than hang. */
  private async query<T>(operation: string, call: () => Promise<T>): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new QuestionStoreUnavailableError(`${operation} timed out after ${this.settings.storeTimeoutMs}ms`)),
        this.settings.storeTimeoutMs,
      );
    });

    try {
      return await Promise.race([call(), timeout]);
    } catch (error) {
      if (error instanceof QuizError) throw error;
      this.logger.error(`❌ Question store ${operation} failed: ${error instanceof Error ? error.message : String(error)}`);
      throw new QuestionStoreUnavailableError(`${operation} failed`, { cause: error });
    } finally {
      clearTimeout(timer);
    }
  }
}
