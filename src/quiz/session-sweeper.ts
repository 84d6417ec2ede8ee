import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';

import { QuizService } from './quiz.service';

export const SWEEP_INTERVAL_SECONDS = Symbol('SWEEP_INTERVAL_SECONDS');

/** Runs the session cleanup on a timer for the lifetime of the module. */
@Injectable()
export class SessionSweeper implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(SessionSweeper.name);
  private timer?: NodeJS.Timeout;

  constructor(
    private readonly quizService: QuizService,
    @Inject(SWEEP_INTERVAL_SECONDS) private readonly intervalSeconds: number,
  ) {}

  onModuleInit() {
    if (this.intervalSeconds <= 0) {
      this.logger.log('Session sweep disabled');
      return;
    }
    this.timer = setInterval(() => this.sweep(), this.intervalSeconds * 1000);
    this.timer.unref();
  }

  onModuleDestroy() {
    clearInterval(this.timer);
    this.timer = undefined;
  }

  sweep() {
    try {
      this.quizService.reapExpiredSessions();
    } catch (error) {
      this.logger.error(`❌ Session sweep failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}
