import { Module } from '@nestjs/common';
import { BotService } from './bot.service';
import { QuizModule } from '../quiz/quiz.module';

@Module({
  imports: [QuizModule],
  providers: [BotService],
})
export class BotModule {}
