import { UnknownQuestionType } from '../common/errors';

export const QUESTION_TYPES = ['multiple_choice', 'true_false', 'fill_in_blank', 'scenario'] as const;
export type QuestionType = (typeof QUESTION_TYPES)[number];

export const DIFFICULTIES = ['easy', 'medium', 'hard'] as const;
export type Difficulty = (typeof DIFFICULTIES)[number];

/** What a quiz taker may send for one question. */
export type SubmittedAnswer = string | number | boolean;

interface QuestionBase {
  id: string;
  text: string;
  category: string;
  /** Chapter number. */
  section: number;
  difficulty: Difficulty;
  tags: string[];
  explanation: string;
  reference?: string;
}

export interface ChoicePayload {
  options: string[];
  correctIndex: number;
}

export interface FreeTextPayload {
  acceptedAnswers: string[];
}

export interface MultipleChoiceQuestion extends QuestionBase, ChoicePayload {
  type: 'multiple_choice';
}

export interface TrueFalseQuestion extends QuestionBase {
  type: 'true_false';
  correctAnswer: boolean;
}

export interface FillInBlankQuestion extends QuestionBase, FreeTextPayload {
  type: 'fill_in_blank';
}

export type ScenarioResponse = ({ mode: 'choice' } & ChoicePayload) | ({ mode: 'free_text' } & FreeTextPayload);

export interface ScenarioQuestion extends QuestionBase {
  type: 'scenario';
  scenario: string;
  response: ScenarioResponse;
}

export type Question = MultipleChoiceQuestion | TrueFalseQuestion | FillInBlankQuestion | ScenarioQuestion;

/** A question as shown before it is answered: no key, no explanation. */
export interface PublicQuestion {
  id: string;
  type: QuestionType;
  text: string;
  category: string;
  section: number;
  difficulty: Difficulty;
  tags: string[];
  scenario?: string;
  options?: string[];
}

const KNOWN_TYPES: ReadonlySet<string> = new Set(QUESTION_TYPES);

export function isQuestionType(value: unknown): value is QuestionType {
  return typeof value === 'string' && KNOWN_TYPES.has(value);
}

/**
 * Narrows a raw type tag. Every other decision about question kinds keys off
 * the narrowed value, so this is the only place that can reject one.
 */
export function resolveQuestionType(value: unknown): QuestionType {
  if (!isQuestionType(value)) {
    throw new UnknownQuestionType(value);
  }
  return value;
}

const OPTION_LETTERS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';

export function optionLetter(index: number): string {
  return OPTION_LETTERS.charAt(index);
}

const normalizeText = (value: string) => value.trim().toLowerCase();

/**
 * Maps a submission onto an option index. A string is matched against the
 * option text first, then read as an option letter, then as a numeric index.
 */
export function resolveChoiceIndex(options: string[], submitted: SubmittedAnswer): number | undefined {
  if (typeof submitted === 'boolean') return undefined;
  const inRange = (index: number) => Number.isInteger(index) && index >= 0 && index < options.length;
  if (typeof submitted === 'number') {
    return inRange(submitted) ? submitted : undefined;
  }

  const value = normalizeText(submitted);
  const byText = options.findIndex((option) => normalizeText(option) === value);
  if (byText !== -1) return byText;

  if (/^[a-z]$/.test(value)) {
    const index = OPTION_LETTERS.indexOf(value.toUpperCase());
    if (inRange(index)) return index;
  }

  if (/^\d+$/.test(value) && inRange(Number(value))) return Number(value);
  return undefined;
}

const TRUE_WORDS = new Set(['true', 't', 'yes']);
const FALSE_WORDS = new Set(['false', 'f', 'no']);

export function resolveBoolean(submitted: SubmittedAnswer): boolean | undefined {
  if (typeof submitted === 'boolean') return submitted;
  if (typeof submitted === 'number') return undefined;
  const value = normalizeText(submitted);
  if (TRUE_WORDS.has(value)) return true;
  if (FALSE_WORDS.has(value)) return false;
  return undefined;
}

function checkChoice(payload: ChoicePayload, submitted: SubmittedAnswer): boolean {
  return resolveChoiceIndex(payload.options, submitted) === payload.correctIndex;
}

function checkFreeText(payload: FreeTextPayload, submitted: SubmittedAnswer): boolean {
  if (typeof submitted !== 'string') return false;
  const value = normalizeText(submitted);
  return payload.acceptedAnswers.some((accepted) => accepted.trim() !== '' && normalizeText(accepted) === value);
}

export function checkAnswer(question: Question, submitted: SubmittedAnswer): boolean {
  switch (question.type) {
    case 'multiple_choice':
      return checkChoice(question, submitted);
    case 'true_false':
      return resolveBoolean(submitted) === question.correctAnswer;
    case 'fill_in_blank':
      return checkFreeText(question, submitted);
    case 'scenario':
      return question.response.mode === 'choice'
        ? checkChoice(question.response, submitted)
        : checkFreeText(question.response, submitted);
  }
}

const hasChoices = (payload: ChoicePayload) =>
  payload.options.length > 0 && payload.correctIndex >= 0 && payload.correctIndex < payload.options.length;

const hasAcceptedAnswer = (payload: FreeTextPayload) =>
  payload.acceptedAnswers.some((accepted) => accepted.trim() !== '');

/** False when a question cannot be answered correctly: no options, or no accepted answer. */
export function isAnswerable(question: Question): boolean {
  switch (question.type) {
    case 'multiple_choice':
      return hasChoices(question);
    case 'true_false':
      return true;
    case 'fill_in_blank':
      return hasAcceptedAnswer(question);
    case 'scenario':
      return question.response.mode === 'choice' ? hasChoices(question.response) : hasAcceptedAnswer(question.response);
  }
}

/** The correct answer in the form shown to a quiz taker after the fact. */
export function describeCorrectAnswer(question: Question): string {
  switch (question.type) {
    case 'multiple_choice':
      return question.options[question.correctIndex] ?? `Option ${question.correctIndex}`;
    case 'true_false':
      return question.correctAnswer ? 'True' : 'False';
    case 'fill_in_blank':
      return question.acceptedAnswers[0] ?? '';
    case 'scenario':
      return question.response.mode === 'choice'
        ? (question.response.options[question.response.correctIndex] ?? `Option ${question.response.correctIndex}`)
        : (question.response.acceptedAnswers[0] ?? '');
  }
}

export function toPublicQuestion(question: Question): PublicQuestion {
  const view: PublicQuestion = {
    id: question.id,
    type: question.type,
    text: question.text,
    category: question.category,
    section: question.section,
    difficulty: question.difficulty,
    tags: [...question.tags],
  };

  switch (question.type) {
    case 'multiple_choice':
      view.options = [...question.options];
      break;
    case 'scenario':
      view.scenario = question.scenario;
      if (question.response.mode === 'choice') view.options = [...question.response.options];
      break;
  }
  return view;
}
