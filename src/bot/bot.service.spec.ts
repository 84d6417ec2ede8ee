import { ConfigService } from '@nestjs/config';
import TelegramBot from 'node-telegram-bot-api';

import { AppConfig } from '../config/configuration';
import { ProgressQueue } from '../progress/progress-queue';
import { ProgressRecord } from '../progress/progress-sink';
import { Question } from '../questions/question.model';
import { QuizManager } from '../quiz/quiz-manager';
import { QuizService } from '../quiz/quiz.service';
import { FakeClock, InMemoryQuestionStore, mcq } from '../testing/quiz-fixtures';
import { BotService, formatQuestion } from './bot.service';

const mockSendMessage = jest.fn();
const mockOn = jest.fn();

jest.mock('node-telegram-bot-api', () => ({
  __esModule: true,
  default: jest.fn().mockImplementation(() => ({ sendMessage: mockSendMessage, on: mockOn })),
}));

const message = (text: string): TelegramBot.Message => ({
  message_id: 1,
  date: 0,
  chat: { id: 42, type: 'private' },
  from: { id: 7, is_bot: false, first_name: 'Test' },
  text,
});

describe('BotService', () => {
  let write: jest.Mock<Promise<void>, [ProgressRecord]>;
  let queue: ProgressQueue;
  let quizService: QuizService;

  const createBot = (questions: Question[], env: Partial<AppConfig> = { BOT_TOKEN: 'test-token' }) => {
    queue = new ProgressQueue({ write }, { capacity: 10, maxAttempts: 1, retryDelayMs: 0 });
    quizService = new QuizService(
      new InMemoryQuestionStore(questions),
      new QuizManager(new FakeClock(), () => 'quiz-1'),
      queue,
      {
        defaultQuestionCount: 10,
        practiceTestDefaultQuestionCount: 90,
        practiceTestSecondsPerQuestion: 75,
        storeTimeoutMs: 1000,
        sessionMaxAgeSeconds: 3600,
        sessionRetentionSeconds: 3600,
      },
      () => 0,
    );
    const bot = new BotService(quizService, new ConfigService<AppConfig, true>(env));
    bot.onModuleInit();
    return bot;
  };

  const bank = () => [mcq('q1', { explanation: 'Because.' }), mcq('q2', { explanation: 'Because.' })];

  const send = async (bot: BotService, ...texts: string[]) => {
    for (const text of texts) await bot.handleMessage(message(text));
  };

  beforeEach(() => {
    mockSendMessage.mockReset().mockResolvedValue(undefined);
    mockOn.mockReset();
    jest.mocked(TelegramBot).mockClear();
    write = jest.fn<Promise<void>, [ProgressRecord]>().mockResolvedValue(undefined);
  });

  it('should stay offline without a token', () => {
    createBot(bank(), {});

    expect(TelegramBot).not.toHaveBeenCalled();
    expect(mockOn).not.toHaveBeenCalled();
  });

  it('should listen for messages when a token is set', () => {
    createBot(bank());

    expect(TelegramBot).toHaveBeenCalledWith('test-token', { polling: true });
    expect(mockOn).toHaveBeenCalledWith('message', expect.any(Function));
  });

  it('should offer the sections on /start', async () => {
    const bot = createBot(bank());

    await send(bot, '/start');

    expect(mockSendMessage).toHaveBeenCalledWith(42, '👋 Welcome! Pick a section to practice:', {
      reply_markup: {
        keyboard: [[{ text: '📘 Section 1 (2)' }]],
        resize_keyboard: true,
        one_time_keyboard: false,
      },
    });
  });

  it('should say so when the bank is empty', async () => {
    await send(createBot([]), '/start');

    expect(mockSendMessage).toHaveBeenCalledWith(42, '⚠️ The question bank is empty.', undefined);
  });

  it('should run a quiz from section choice to the final review', async () => {
    const bot = createBot(bank());

    await send(bot, '/start', '📘 Section 1 (2)');
    expect(mockSendMessage).toHaveBeenLastCalledWith(
      42,
      '✅ Section 1 selected (General).\n🔢 How many questions? (1 to 2)',
      undefined,
    );

    await send(bot, '5');
    expect(mockSendMessage).toHaveBeenLastCalledWith(42, '❌ Please enter a number between 1 and 2.', undefined);

    await send(bot, '2');
    expect(mockSendMessage).toHaveBeenCalledWith(42, "🚀 2 question(s) from section 1. Let's go!", undefined);
    expect(mockSendMessage).toHaveBeenLastCalledWith(
      42,
      '📝 Question 1/2\n\nQuestion q1\n\nA) Alpha\nB) Bravo\nC) Charlie\nD) Delta',
      {
        reply_markup: {
          keyboard: [
            [{ text: 'A' }, { text: 'B' }],
            [{ text: 'C' }, { text: 'D' }],
          ],
          resize_keyboard: true,
        },
      },
    );

    await send(bot, 'B');
    expect(mockSendMessage).toHaveBeenCalledWith(42, '✅ Correct!', undefined);

    await send(bot, '/score');
    expect(mockSendMessage).toHaveBeenLastCalledWith(
      42,
      '📊 Current score:\n✅ Correct: 1\n❌ Wrong: 0\n📝 Answered: 1 / 2',
      undefined,
    );

    await send(bot, 'A');
    expect(mockSendMessage).toHaveBeenCalledWith(42, '❌ Wrong! Correct answer: Bravo\n💡 Because.', undefined);
    expect(mockSendMessage).toHaveBeenLastCalledWith(
      42,
      '🏁 Quiz finished!\n\n📊 Result: 1/2 (50%)\n\n📖 Review:\n2. Question q2\n   ✔️ Bravo\n\nSend /start to play again.',
      { reply_markup: { remove_keyboard: true } },
    );

    await queue.flush();
    expect(write).toHaveBeenCalledWith(
      expect.objectContaining({ user_id: 'telegram:7', quiz_id: 'quiz-1', score: 1, total_questions: 2 }),
    );

    await send(bot, 'B');
    expect(mockSendMessage).toHaveBeenLastCalledWith(42, '⚠️ Start a quiz first with /start.', undefined);
  });

  it('should recover when the session disappears underneath the chat', async () => {
    const bot = createBot(bank());
    await send(bot, '/start', '📘 Section 1 (2)', '1');

    quizService.cleanupQuizSession('quiz-1');
    await send(bot, 'B');
    expect(mockSendMessage).toHaveBeenLastCalledWith(
      42,
      '⚠️ Quiz session not found: quiz-1\n\nSend /start to begin again.',
      undefined,
    );

    await send(bot, 'B');
    expect(mockSendMessage).toHaveBeenLastCalledWith(42, '⚠️ Start a quiz first with /start.', undefined);
  });

  it('should report that no quiz is running on /score', async () => {
    await send(createBot(bank()), '/score');

    expect(mockSendMessage).toHaveBeenLastCalledWith(42, '⚠️ No quiz in progress.', undefined);
  });
});

describe('formatQuestion', () => {
  it('should ask true/false statements without options', () => {
    expect(
      formatQuestion({
        quizId: 'quiz-1',
        position: 0,
        totalQuestions: 1,
        progressPercentage: 100,
        question: {
          id: 'q1',
          type: 'true_false',
          text: 'TLS encrypts traffic in transit.',
          category: 'General',
          section: 1,
          difficulty: 'easy',
          tags: [],
        },
      }),
    ).toBe('📝 Question 1/1\n\nTLS encrypts traffic in transit.\n\nTrue or False?');
  });

  it('should put the scenario before the question', () => {
    const text = formatQuestion({
      quizId: 'quiz-1',
      position: 1,
      totalQuestions: 3,
      progressPercentage: 66.67,
      question: {
        id: 's1',
        type: 'scenario',
        text: 'What is this?',
        scenario: 'A user reports a fake login page.',
        category: 'General',
        section: 1,
        difficulty: 'medium',
        tags: [],
      },
    });

    expect(text).toBe('📝 Question 2/3\n\nA user reports a fake login page.\n\nWhat is this?\n');
  });
});
