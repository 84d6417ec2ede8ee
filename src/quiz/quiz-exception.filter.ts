import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';

import { QuizError, QuizErrorCode } from '../common/errors';

const STATUS_BY_CODE: Record<QuizErrorCode, HttpStatus> = {
  UNKNOWN_QUESTION_TYPE: HttpStatus.BAD_REQUEST,
  EMPTY_QUESTION_SET: HttpStatus.BAD_REQUEST,
  INSUFFICIENT_QUESTIONS: HttpStatus.BAD_REQUEST,
  INVALID_POSITION: HttpStatus.BAD_REQUEST,
  SESSION_NOT_FOUND: HttpStatus.NOT_FOUND,
  SESSION_TERMINATED: HttpStatus.CONFLICT,
  SESSION_NOT_FINISHED: HttpStatus.CONFLICT,
  QUESTION_STORE_UNAVAILABLE: HttpStatus.SERVICE_UNAVAILABLE,
  PROGRESS_SINK_WRITE_FAILED: HttpStatus.INTERNAL_SERVER_ERROR,
};

export function statusForCode(code: QuizErrorCode): HttpStatus {
  return STATUS_BY_CODE[code];
}

/** Turns engine errors into `{ success: false, error, message }` replies. */
@Catch(QuizError)
export class QuizExceptionFilter implements ExceptionFilter<QuizError> {
  private readonly logger = new Logger(QuizExceptionFilter.name);

  constructor(private readonly adapterHost: HttpAdapterHost) {}

  catch(exception: QuizError, host: ArgumentsHost) {
    const { httpAdapter } = this.adapterHost;
    const status = statusForCode(exception.code);
    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(`❌ ${exception.code}: ${exception.message}`);
    }

    httpAdapter.reply(
      host.switchToHttp().getResponse(),
      { success: false, error: exception.code, message: exception.message },
      status,
    );
  }
}
