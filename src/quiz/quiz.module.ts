import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';

import { CLOCK, RANDOM, systemClock } from '../common/clock';
import { AppConfig } from '../config/configuration';
import { ProgressModule } from '../progress/progress.module';
import { QuestionsModule } from '../questions/questions.module';
import { QuizController } from './quiz.controller';
import { QuizManager, SESSION_ID_GENERATOR } from './quiz-manager';
import { QUIZ_SETTINGS, QuizService, QuizSettings } from './quiz.service';
import { SWEEP_INTERVAL_SECONDS, SessionSweeper } from './session-sweeper';

@Module({
  imports: [QuestionsModule, ProgressModule],
  controllers: [QuizController],
  providers: [
    { provide: CLOCK, useValue: systemClock },
    { provide: RANDOM, useValue: Math.random },
    { provide: SESSION_ID_GENERATOR, useValue: randomUUID },
    {
      provide: QUIZ_SETTINGS,
      inject: [ConfigService],
      useFactory: (config: ConfigService<AppConfig, true>): QuizSettings => ({
        defaultQuestionCount: config.get('QUIZ_DEFAULT_QUESTION_COUNT', { infer: true }),
        practiceTestDefaultQuestionCount: config.get('PRACTICE_TEST_DEFAULT_QUESTION_COUNT', { infer: true }),
        practiceTestSecondsPerQuestion: config.get('PRACTICE_TEST_SECONDS_PER_QUESTION', { infer: true }),
        storeTimeoutMs: config.get('QUESTION_STORE_TIMEOUT_MS', { infer: true }),
        sessionMaxAgeSeconds: config.get('SESSION_MAX_AGE_SECONDS', { infer: true }),
        sessionRetentionSeconds: config.get('SESSION_RETENTION_SECONDS', { infer: true }),
      }),
    },
    {
      provide: SWEEP_INTERVAL_SECONDS,
      inject: [ConfigService],
      useFactory: (config: ConfigService<AppConfig, true>) =>
        config.get('SESSION_SWEEP_INTERVAL_SECONDS', { infer: true }),
    },
    QuizManager,
    QuizService,
    SessionSweeper,
  ],
  exports: [QuizService],
})
export class QuizModule {}
