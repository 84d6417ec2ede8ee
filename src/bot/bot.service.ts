import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import TelegramBot from 'node-telegram-bot-api';
import { ConfigService } from '@nestjs/config';

import { QuizError, SessionNotFoundError } from '../common/errors';
import { optionLetter } from '../questions/question.model';
import { AppConfig } from '../config/configuration';
import { QuizResult } from '../quiz/session';
import { QuestionView, QuizService } from '../quiz/quiz.service';

interface ChatState {
  state: 'CHOOSING_LIMIT' | 'ANSWERING';
  section: number;
  available: number;
  quizId?: string;
  position: number;
  questionSentAt: number;
}

const SECTION_BUTTON = /^📘 Section (\d+)/;

/** Chat front end: one chapter quiz per chat, answered question by question. */
@Injectable()
export class BotService implements OnModuleInit {
  private readonly logger = new Logger(BotService.name);
  private readonly chats = new Map<number, ChatState>();
  private bot?: TelegramBot;

  constructor(
    private quizService: QuizService,
    private config: ConfigService<AppConfig, true>,
  ) { }

  onModuleInit() {
    const token = this.config.get('BOT_TOKEN', { infer: true });
    if (!token) {
      this.logger.log('BOT_TOKEN not set, Telegram front end disabled');
      return;
    }

    this.bot = new TelegramBot(token, { polling: true });

    this.bot.on('message', (msg) => {
      this.handleMessage(msg).catch((error: unknown) => {
        this.logger.error(`❌ Failed to handle message from ${msg.chat.id}: ${String(error)}`);
      });
    });
    this.bot.on('polling_error', (error) => {
      this.logger.error(`❌ Polling error: ${error.message}`);
    });

    this.logger.log('✅ Bot polling started');
  }

  async handleMessage(msg: TelegramBot.Message) {
    const chatId = msg.chat.id;
    const text = msg.text?.trim();
    if (!text) return;

    this.logger.debug(`📩 Message from ${chatId}: "${text}"`);

    try {
      await this.route(chatId, text, msg.from?.id ?? chatId);
    } catch (error) {
      if (!(error instanceof QuizError)) throw error;
      if (error instanceof SessionNotFoundError) this.chats.delete(chatId);
      await this.send(chatId, `⚠️ ${error.message}\n\nSend /start to begin again.`);
    }
  }

  private async route(chatId: number, text: string, userId: number) {
    const chat = this.chats.get(chatId);

    if (text === '/start') {
      await this.start(chatId);
      return;
    }

    if (text === '/score') {
      if (!chat?.quizId) {
        await this.send(chatId, '⚠️ No quiz in progress.');
        return;
      }
      const progress = this.quizService.getQuizProgress(chat.quizId);
      await this.send(
        chatId,
        `📊 Current score:\n✅ Correct: ${progress.score}\n❌ Wrong: ${progress.answeredCount - progress.score}\n` +
          `📝 Answered: ${progress.answeredCount} / ${progress.totalQuestions}`,
      );
      return;
    }

    const sectionMatch = SECTION_BUTTON.exec(text);
    if (sectionMatch) {
      await this.chooseSection(chatId, Number(sectionMatch[1]));
      return;
    }

    if (chat?.state === 'CHOOSING_LIMIT') {
      const limit = Number.parseInt(text, 10);
      if (Number.isNaN(limit) || limit <= 0 || limit > chat.available) {
        await this.send(chatId, `❌ Please enter a number between 1 and ${chat.available}.`);
        return;
      }
      const quiz = await this.quizService.createChapterQuiz(chat.section, limit, { userId: `telegram:${userId}` });
      chat.state = 'ANSWERING';
      chat.quizId = quiz.quizId;
      chat.position = 0;
      await this.send(chatId, `🚀 ${quiz.totalQuestions} question(s) from section ${chat.section}. Let's go!`);
      await this.sendQuestion(chatId, chat);
      return;
    }

    if (chat?.state === 'ANSWERING' && chat.quizId) {
      await this.answer(chatId, chat, chat.quizId, text);
      return;
    }

    await this.send(chatId, "⚠️ Start a quiz first with /start.");
  }

  private async start(chatId: number) {
    const previous = this.chats.get(chatId);
    if (previous?.quizId) this.quizService.cleanupQuizSession(previous.quizId);
    this.chats.delete(chatId);

    const sections = await this.quizService.listSections();
    if (sections.length === 0) {
      await this.send(chatId, '⚠️ The question bank is empty.');
      return;
    }

    await this.send(chatId, '👋 Welcome! Pick a section to practice:', {
      reply_markup: {
        keyboard: sections.map((info) => [
          { text: `📘 Section ${info.section} (${info.questionCount})` },
        ]),
        resize_keyboard: true,
        one_time_keyboard: false,
      },
    });
  }

  private async chooseSection(chatId: number, section: number) {
    const info = await this.quizService.getSectionInfo(section);
    if (!info) {
      await this.send(chatId, `❌ Section ${section} has no questions.`);
      return;
    }
    this.chats.set(chatId, {
      state: 'CHOOSING_LIMIT',
      section,
      available: info.questionCount,
      position: 0,
      questionSentAt: Date.now(),
    });
    await this.send(
      chatId,
      `✅ Section ${section} selected (${info.categories.join(', ')}).\n` +
        `🔢 How many questions? (1 to ${info.questionCount})`,
    );
  }

  private async answer(chatId: number, chat: ChatState, quizId: string, text: string) {
    const elapsed = (Date.now() - chat.questionSentAt) / 1000;
    const outcome = this.quizService.submitQuizAnswer(quizId, chat.position, text, elapsed);

    await this.send(
      chatId,
      outcome.isCorrect
        ? '✅ Correct!'
        : `❌ Wrong! Correct answer: ${outcome.correctAnswer}` +
            (outcome.explanation ? `\n💡 ${outcome.explanation}` : ''),
    );

    if (outcome.result) {
      await this.finish(chatId, quizId, outcome.result);
      return;
    }

    chat.position++;
    await this.sendQuestion(chatId, chat);
  }

  private async finish(chatId: number, quizId: string, result: QuizResult) {
    const review = [...this.quizService.getWrongQuestionsReview(quizId)];
    let summary = `🏁 Quiz finished!\n\n📊 Result: ${result.score}/${result.totalQuestions} (${result.percentage}%)`;
    if (review.length > 0) {
      summary +=
        '\n\n📖 Review:\n' +
        review.map((item) => `${item.position + 1}. ${item.question.text}\n   ✔️ ${item.correctAnswer}`).join('\n');
    }
    summary += '\n\nSend /start to play again.';

    this.quizService.cleanupQuizSession(quizId);
    this.chats.delete(chatId);
    await this.send(chatId, summary, { reply_markup: { remove_keyboard: true } });
  }

  private async sendQuestion(chatId: number, chat: ChatState) {
    if (!chat.quizId) return;
    const view = this.quizService.getQuizQuestion(chat.quizId, chat.position);
    chat.questionSentAt = Date.now();
    await this.send(chatId, formatQuestion(view), { reply_markup: answerKeyboard(view) });
  }

  private async send(chatId: number, text: string, options?: TelegramBot.SendMessageOptions) {
    if (!this.bot) return;
    await this.bot.sendMessage(chatId, text, options);
  }
}

export function formatQuestion(view: QuestionView): string {
  const { question } = view;
  let text = `📝 Question ${view.position + 1}/${view.totalQuestions}\n\n`;
  if (question.scenario) text += `${question.scenario}\n\n`;
  text += `${question.text}\n`;
  question.options?.forEach((option, index) => {
    text += `\n${optionLetter(index)}) ${option}`;
  });
  if (question.type === 'true_false') text += '\nTrue or False?';
  return text;
}

function answerKeyboard(view: QuestionView): TelegramBot.ReplyKeyboardMarkup | TelegramBot.ReplyKeyboardRemove {
  const { question } = view;
  if (question.type === 'true_false') {
    return { keyboard: [[{ text: 'True' }, { text: 'False' }]], resize_keyboard: true };
  }
  if (!question.options || question.options.length === 0) {
    return { remove_keyboard: true };
  }
  const letters = question.options.map((_, index) => ({ text: optionLetter(index) }));
  const rows: TelegramBot.KeyboardButton[][] = [];
  for (let i = 0; i < letters.length; i += 2) rows.push(letters.slice(i, i + 2));
  return { keyboard: rows, resize_keyboard: true };
}
