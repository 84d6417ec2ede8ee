export type QuizErrorCode =
  | 'UNKNOWN_QUESTION_TYPE'
  | 'EMPTY_QUESTION_SET'
  | 'INSUFFICIENT_QUESTIONS'
  | 'SESSION_NOT_FOUND'
  | 'SESSION_TERMINATED'
  | 'SESSION_NOT_FINISHED'
  | 'INVALID_POSITION'
  | 'QUESTION_STORE_UNAVAILABLE'
  | 'PROGRESS_SINK_WRITE_FAILED';

/**
 * Base class of every failure the quiz engine raises on purpose.
 * The `code` is what front ends report; messages are for logs.
 */
export abstract class QuizError extends Error {
  abstract readonly code: QuizErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UnknownQuestionType extends QuizError {
  readonly code = 'UNKNOWN_QUESTION_TYPE';

  constructor(readonly type: unknown) {
    super(`Unknown question type: ${String(type)}`);
  }
}

export class EmptyQuestionSetError extends QuizError {
  readonly code = 'EMPTY_QUESTION_SET';

  constructor() {
    super('A quiz session needs at least one question');
  }
}

export class InsufficientQuestionsError extends QuizError {
  readonly code = 'INSUFFICIENT_QUESTIONS';

  constructor(readonly filter: object) {
    super(`No questions match ${JSON.stringify(filter)}`);
  }
}

export class SessionNotFoundError extends QuizError {
  readonly code = 'SESSION_NOT_FOUND';

  constructor(readonly sessionId: string) {
    super(`Quiz session not found: ${sessionId}`);
  }
}

export class SessionTerminatedError extends QuizError {
  readonly code = 'SESSION_TERMINATED';

  constructor(
    readonly sessionId: string,
    readonly status: string,
  ) {
    super(`Quiz session ${sessionId} is ${status}`);
  }
}

export class SessionNotFinishedError extends QuizError {
  readonly code = 'SESSION_NOT_FINISHED';

  constructor(readonly sessionId: string) {
    super(`Quiz session ${sessionId} is still active`);
  }
}

export class InvalidPositionError extends QuizError {
  readonly code = 'INVALID_POSITION';

  constructor(
    readonly position: number,
    readonly total: number,
  ) {
    super(`Position ${position} is outside 0..${total - 1}`);
  }
}

export class QuestionStoreUnavailableError extends QuizError {
  readonly code = 'QUESTION_STORE_UNAVAILABLE';

  constructor(reason: string, options?: { cause?: unknown }) {
    super(`Question store unavailable: ${reason}`, options);
  }
}

/** Never reaches a quiz taker; the progress queue logs it and moves on. */
export class ProgressSinkWriteError extends QuizError {
  readonly code = 'PROGRESS_SINK_WRITE_FAILED';

  constructor(
    readonly quizId: string,
    readonly attempts: number,
    options?: { cause?: unknown },
  ) {
    super(`Could not store result of ${quizId} after ${attempts} attempt(s)`, options);
  }
}

/**
 * A defect in a stored question record. Returned next to the parsed
 * question, never thrown.
 */
export class MalformedQuestionWarning extends Error {
  constructor(
    readonly questionId: string,
    readonly field: string,
    detail: string,
  ) {
    super(`Question ${questionId}: malformed ${field} (${detail})`);
    this.name = 'MalformedQuestionWarning';
  }
}
