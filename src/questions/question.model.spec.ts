import { UnknownQuestionType } from '../common/errors';
import { fillInBlank, mcq, trueFalse } from '../testing/quiz-fixtures';
import {
  ScenarioQuestion,
  checkAnswer,
  isAnswerable,
  describeCorrectAnswer,
  resolveChoiceIndex,
  resolveQuestionType,
  toPublicQuestion,
} from './question.model';

const scenario = (response: ScenarioQuestion['response']): ScenarioQuestion => ({
  id: 's1',
  type: 'scenario',
  text: 'What happened?',
  scenario: 'Logs show repeated failed logins.',
  category: 'Threats',
  section: 2,
  difficulty: 'hard',
  tags: ['logs'],
  explanation: 'Brute force.',
  response,
});

describe('question model', () => {
  describe('resolveQuestionType', () => {
    it('should accept the four known types', () => {
      expect(resolveQuestionType('scenario')).toBe('scenario');
      expect(resolveQuestionType('fill_in_blank')).toBe('fill_in_blank');
    });

    it('should reject anything else', () => {
      expect(() => resolveQuestionType('essay')).toThrow(UnknownQuestionType);
      expect(() => resolveQuestionType(undefined)).toThrow('Unknown question type: undefined');
    });
  });

  describe('resolveChoiceIndex', () => {
    const options = ['Alpha', 'Bravo', 'Charlie'];

    it('should read letters, indexes and option text', () => {
      expect(resolveChoiceIndex(options, 'B')).toBe(1);
      expect(resolveChoiceIndex(options, 'c')).toBe(2);
      expect(resolveChoiceIndex(options, 2)).toBe(2);
      expect(resolveChoiceIndex(options, ' 0 ')).toBe(0);
      expect(resolveChoiceIndex(options, ' bravo ')).toBe(1);
    });

    it('should prefer option text over an index for numeric options', () => {
      const ports = ['21', '22', '23', '25'];

      expect(resolveChoiceIndex(ports, '22')).toBe(1);
      expect(resolveChoiceIndex(ports, ' 25 ')).toBe(3);
      expect(resolveChoiceIndex(ports, '2')).toBe(2);
      expect(resolveChoiceIndex(ports, 'b')).toBe(1);
    });

    it('should reject indexes outside the options', () => {
      expect(resolveChoiceIndex(options, '3')).toBeUndefined();
      expect(resolveChoiceIndex(options, 22)).toBeUndefined();
      expect(resolveChoiceIndex(options, -1)).toBeUndefined();
      expect(resolveChoiceIndex([], 0)).toBeUndefined();
    });

    it('should return undefined when nothing matches', () => {
      expect(resolveChoiceIndex(options, 'Z')).toBeUndefined();
      expect(resolveChoiceIndex(options, 1.5)).toBeUndefined();
      expect(resolveChoiceIndex(options, true)).toBeUndefined();
    });
  });

  describe('checkAnswer', () => {
    it('should compare multiple choice by index', () => {
      const question = mcq('q1');

      expect(checkAnswer(question, 'B')).toBe(true);
      expect(checkAnswer(question, 'C')).toBe(false);
      expect(checkAnswer(question, 1)).toBe(true);
      expect(checkAnswer(question, 'Bravo')).toBe(true);
      expect(checkAnswer(question, false)).toBe(false);
    });

    it('should accept numeric option text for multiple choice', () => {
      const question = mcq('ssh', { options: ['21', '22', '23', '25'], correctIndex: 1 });

      expect(checkAnswer(question, '22')).toBe(true);
      expect(checkAnswer(question, '21')).toBe(false);
      expect(checkAnswer(question, 'B')).toBe(true);
      expect(checkAnswer(question, 1)).toBe(true);
    });

    it('should never accept an answer for a choice question without options', () => {
      const question = mcq('q5', { options: [], correctIndex: 0 });

      expect(checkAnswer(question, 0)).toBe(false);
      expect(checkAnswer(question, 'A')).toBe(false);
    });

    it('should compare true/false as booleans', () => {
      const question = trueFalse('q2', { correctAnswer: false });

      expect(checkAnswer(question, false)).toBe(true);
      expect(checkAnswer(question, 'False')).toBe(true);
      expect(checkAnswer(question, 'no')).toBe(true);
      expect(checkAnswer(question, 'true')).toBe(false);
      expect(checkAnswer(question, 0)).toBe(false);
    });

    it('should match fill-in-blank case-insensitively after trimming', () => {
      const question = fillInBlank('q3', { acceptedAnswers: ['Firewall', 'packet filter'] });

      expect(checkAnswer(question, '  FIREWALL ')).toBe(true);
      expect(checkAnswer(question, 'Packet Filter')).toBe(true);
      expect(checkAnswer(question, 'fire wall')).toBe(false);
      expect(checkAnswer(question, 5)).toBe(false);
    });

    it('should never accept an empty submission for a blank accepted answer', () => {
      const question = fillInBlank('q4', { acceptedAnswers: [''] });

      expect(checkAnswer(question, '')).toBe(false);
    });

    it('should treat scenarios with options as multiple choice', () => {
      const question = scenario({ mode: 'choice', options: ['Brute force', 'Phishing'], correctIndex: 0 });

      expect(checkAnswer(question, 'A')).toBe(true);
      expect(checkAnswer(question, 'B')).toBe(false);
    });

    it('should treat free-text scenarios as fill-in-blank', () => {
      const question = scenario({ mode: 'free_text', acceptedAnswers: ['brute force'] });

      expect(checkAnswer(question, 'Brute Force')).toBe(true);
      expect(checkAnswer(question, 'A')).toBe(false);
    });
  });

  describe('isAnswerable', () => {
    it('should require options for choice questions and an accepted answer for free text', () => {
      expect(isAnswerable(mcq('q1'))).toBe(true);
      expect(isAnswerable(mcq('q1', { options: [], correctIndex: 0 }))).toBe(false);
      expect(isAnswerable(trueFalse('q2'))).toBe(true);
      expect(isAnswerable(fillInBlank('q3', { acceptedAnswers: [' '] }))).toBe(false);
      expect(isAnswerable(scenario({ mode: 'choice', options: [], correctIndex: 0 }))).toBe(false);
      expect(isAnswerable(scenario({ mode: 'free_text', acceptedAnswers: ['brute force'] }))).toBe(true);
    });
  });

  describe('describeCorrectAnswer', () => {
    it('should show the answer the way a quiz taker reads it', () => {
      expect(describeCorrectAnswer(mcq('q1'))).toBe('Bravo');
      expect(describeCorrectAnswer(trueFalse('q2', { correctAnswer: false }))).toBe('False');
      expect(describeCorrectAnswer(fillInBlank('q3', { acceptedAnswers: ['Firewall', 'fw'] }))).toBe('Firewall');
      expect(describeCorrectAnswer(scenario({ mode: 'free_text', acceptedAnswers: ['Brute force'] }))).toBe(
        'Brute force',
      );
    });
  });

  describe('toPublicQuestion', () => {
    it('should strip the answer key and explanation', () => {
      expect(toPublicQuestion(mcq('q1', { tags: ['net'] }))).toEqual({
        id: 'q1',
        type: 'multiple_choice',
        text: 'Question q1',
        category: 'General',
        section: 1,
        difficulty: 'easy',
        tags: ['net'],
        options: ['Alpha', 'Bravo', 'Charlie', 'Delta'],
      });
    });

    it('should keep the scenario text and choice options', () => {
      const view = toPublicQuestion(scenario({ mode: 'choice', options: ['Brute force', 'Phishing'], correctIndex: 0 }));

      expect(view.scenario).toBe('Logs show repeated failed logins.');
      expect(view.options).toEqual(['Brute force', 'Phishing']);
      expect(view).not.toHaveProperty('response');
      expect(view).not.toHaveProperty('explanation');
    });

    it('should omit options for free-text questions', () => {
      expect(toPublicQuestion(fillInBlank('q3'))).not.toHaveProperty('options');
    });
  });
});
