import {
  Body,
  Controller,
  Delete,
  Get,
  Headers,
  HttpCode,
  HttpStatus,
  NotFoundException,
  Param,
  ParseIntPipe,
  Post,
} from '@nestjs/common';

import {
  CategoryQuizBody,
  ChapterQuizBody,
  NavigateBody,
  PracticeTestBody,
  RandomQuizBody,
  SubmitAnswerBody,
  ZodValidationPipe,
  categoryQuizSchema,
  chapterQuizSchema,
  navigateSchema,
  practiceTestSchema,
  randomQuizSchema,
  submitAnswerSchema,
} from './quiz.dto';
import { QuizService } from './quiz.service';

/** Caller identity comes from the auth layer in front of this service. */
const USER_HEADER = 'x-user-id';

@Controller('api/quiz')
export class QuizController {
  constructor(private readonly quizService: QuizService) {}

  @Get('sections')
  async listSections() {
    return { success: true, sections: await this.quizService.listSections() };
  }

  @Get('sections/:section')
  async getSection(@Param('section', ParseIntPipe) section: number) {
    const info = await this.quizService.getSectionInfo(section);
    if (!info) {
      throw new NotFoundException({ success: false, error: 'SECTION_NOT_FOUND', message: `Section ${section} not found` });
    }
    return { success: true, section: info };
  }

  @Get('statistics')
  async getStatistics() {
    return { success: true, statistics: await this.quizService.getStatistics() };
  }

  @Post('create/section/:section')
  async createSectionQuiz(
    @Param('section', ParseIntPipe) section: number,
    @Body(new ZodValidationPipe(chapterQuizSchema)) body: ChapterQuizBody,
    @Headers(USER_HEADER) userId?: string,
  ) {
    const quiz = await this.quizService.createChapterQuiz(section, body.limit, {
      difficulty: body.difficulty,
      userId,
    });
    return { success: true, quiz };
  }

  @Post('create/category')
  async createCategoryQuiz(
    @Body(new ZodValidationPipe(categoryQuizSchema)) body: CategoryQuizBody,
    @Headers(USER_HEADER) userId?: string,
  ) {
    const quiz = await this.quizService.createCategoryQuiz(body.category, body.limit, {
      difficulty: body.difficulty,
      userId,
    });
    return { success: true, quiz };
  }

  @Post('create/random')
  async createRandomQuiz(
    @Body(new ZodValidationPipe(randomQuizSchema)) body: RandomQuizBody,
    @Headers(USER_HEADER) userId?: string,
  ) {
    const quiz = await this.quizService.createRandomQuiz(body.limit, {
      sections: body.sections,
      difficulty: body.difficulty,
      userId,
    });
    return { success: true, quiz };
  }

  @Post('create/practice-test')
  async createPracticeTest(
    @Body(new ZodValidationPipe(practiceTestSchema)) body: PracticeTestBody,
    @Headers(USER_HEADER) userId?: string,
  ) {
    const quiz = await this.quizService.createPracticeTest(body.question_count, {
      sections: body.sections,
      difficulty: body.difficulty,
      timeLimit: body.time_limit,
      userId,
    });
    return { success: true, quiz };
  }

  @Get(':id/question/:index')
  getQuestion(@Param('id') quizId: string, @Param('index', ParseIntPipe) index: number) {
    return { success: true, question: this.quizService.getQuizQuestion(quizId, index) };
  }

  @Post(':id/navigate')
  @HttpCode(HttpStatus.OK)
  navigate(@Param('id') quizId: string, @Body(new ZodValidationPipe(navigateSchema)) body: NavigateBody) {
    return { success: true, question: this.quizService.navigate(quizId, body.direction) };
  }

  @Post(':id/submit')
  @HttpCode(HttpStatus.OK)
  submitAnswer(@Param('id') quizId: string, @Body(new ZodValidationPipe(submitAnswerSchema)) body: SubmitAnswerBody) {
    return {
      success: true,
      result: this.quizService.submitQuizAnswer(quizId, body.index, body.answer, body.elapsed_seconds),
    };
  }

  @Get(':id/results')
  getResults(@Param('id') quizId: string) {
    return { success: true, results: this.quizService.getQuizResults(quizId) };
  }

  @Get(':id/review')
  getReview(@Param('id') quizId: string) {
    const wrongQuestions = [...this.quizService.getWrongQuestionsReview(quizId)];
    return { success: true, wrongQuestions, count: wrongQuestions.length };
  }

  @Delete(':id')
  deleteQuiz(@Param('id') quizId: string) {
    return { success: true, removed: this.quizService.cleanupQuizSession(quizId) };
  }
}
