import { Logger } from '@nestjs/common';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { QuizResult } from '../quiz/session';
import { JsonLinesProgressSink, LoggerProgressSink, toProgressRecord } from './progress-sink';

const result: QuizResult = {
  quizId: 'quiz-1',
  quizType: 'chapter',
  status: 'completed',
  section: 3,
  score: 2,
  totalQuestions: 3,
  answeredCount: 3,
  wrongCount: 1,
  percentage: 66.67,
  durationSeconds: 90.6,
  startedAt: new Date('2026-01-01T00:00:00.000Z'),
  completedAt: new Date('2026-01-01T00:01:30.600Z'),
  answers: [],
};

describe('toProgressRecord', () => {
  it('should flatten a result into a history row', () => {
    expect(toProgressRecord('user-1', result)).toEqual({
      user_id: 'user-1',
      quiz_id: 'quiz-1',
      quiz_type: 'chapter',
      section: 3,
      score: 2,
      total_questions: 3,
      percentage: 66.67,
      duration_seconds: 91,
      completed_at: '2026-01-01T00:01:30.600Z',
      outcome: 'completed',
    });
  });

  it('should leave out the section of a quiz without one', () => {
    const { section: _section, ...random } = result;

    expect(toProgressRecord('user-1', { ...random, quizType: 'random', status: 'expired' })).not.toHaveProperty(
      'section',
    );
  });
});

describe('JsonLinesProgressSink', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'progress-sink-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should append one JSON line per record, creating the directory', async () => {
    const filePath = path.join(tempDir, 'nested', 'progress.jsonl');
    const sink = new JsonLinesProgressSink(filePath);

    await sink.write(toProgressRecord('user-1', result));
    await sink.write(toProgressRecord('user-2', result));

    const lines = fs.readFileSync(filePath, 'utf-8').split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[2]).toBe('');
    expect(JSON.parse(lines[0])).toMatchObject({ user_id: 'user-1', quiz_id: 'quiz-1' });
    expect(JSON.parse(lines[1])).toMatchObject({ user_id: 'user-2' });
  });
});

describe('LoggerProgressSink', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should log a one-line summary', async () => {
    const log = jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);

    await new LoggerProgressSink().write(toProgressRecord('user-1', result));

    expect(log).toHaveBeenCalledWith('📊 user-1 completed chapter quiz-1: 2/3 (66.67%)');
  });
});
