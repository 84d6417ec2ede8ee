import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as path from 'path';

import { AppConfig } from '../config/configuration';
import { JsonQuestionStore } from './json-question.store';
import { QUESTION_STORE } from './question-store';

@Module({
  providers: [
    {
      provide: QUESTION_STORE,
      inject: [ConfigService],
      useFactory: (config: ConfigService<AppConfig, true>) =>
        new JsonQuestionStore(path.resolve(process.cwd(), config.get('QUESTION_BANK_PATH', { infer: true }))),
    },
  ],
  exports: [QUESTION_STORE],
})
export class QuestionsModule {}
