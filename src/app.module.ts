import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER } from '@nestjs/core';

import { BotModule } from './bot/bot.module';
import { validateEnv } from './config/configuration';
import { QuizExceptionFilter } from './quiz/quiz-exception.filter';
import { QuizModule } from './quiz/quiz.module';

@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }), QuizModule, BotModule],
  providers: [{ provide: APP_FILTER, useClass: QuizExceptionFilter }],
})
export class AppModule {}
