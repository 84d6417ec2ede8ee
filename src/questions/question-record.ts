import { z } from 'zod';

import { MalformedQuestionWarning } from '../common/errors';
import {
  ChoicePayload,
  Difficulty,
  FreeTextPayload,
  Question,
  resolveBoolean,
  resolveChoiceIndex,
  resolveQuestionType,
} from './question.model';

/**
 * Shape of a question row as persisted by the question bank. List-valued
 * columns may arrive JSON-encoded, so they are left loose here and decoded
 * field by field.
 */
export const questionRecordSchema = z
  .object({
    id: z.union([z.string().min(1), z.number()]).transform(String),
    question_type: z.string().optional(),
    type: z.string().optional(),
    question_text: z.string().trim().min(1),
    category: z.string().default('General'),
    section: z.coerce.number().int().nonnegative().optional(),
    difficulty: z.string().optional(),
    explanation: z.string().nullish(),
    scenario_text: z.string().nullish(),
    reference: z.string().nullish(),
    options: z.unknown(),
    tags: z.unknown(),
    correct_answer: z.unknown(),
    correct_answers: z.unknown(),
  })
  .passthrough();

export type QuestionRecord = z.input<typeof questionRecordSchema>;

export interface ParsedQuestion {
  question: Question;
  warnings: MalformedQuestionWarning[];
}

const TYPE_ALIASES: Record<string, string> = {
  concept_multiple_choice: 'multiple_choice',
  scenario_based: 'scenario',
  scenario_multiple_choice: 'scenario',
  fill_in_the_blank: 'fill_in_blank',
};

const DIFFICULTY_ALIASES: Record<string, Difficulty> = {
  easy: 'easy',
  beginner: 'easy',
  medium: 'medium',
  intermediate: 'medium',
  hard: 'hard',
  advanced: 'hard',
  expert: 'hard',
};

class FieldReader {
  readonly warnings: MalformedQuestionWarning[] = [];

  constructor(private readonly questionId: string) {}

  warn(field: string, detail: string) {
    this.warnings.push(new MalformedQuestionWarning(this.questionId, field, detail));
  }

  /** Decodes a JSON-encoded column; a broken encoding yields undefined. */
  decode(field: string, value: unknown): unknown {
    if (typeof value !== 'string') return value;
    try {
      return JSON.parse(value);
    } catch {
      this.warn(field, 'invalid JSON');
      return undefined;
    }
  }

  stringList(field: string, value: unknown): string[] {
    const decoded = this.decode(field, value);
    if (decoded === undefined || decoded === null) return [];
    if (!Array.isArray(decoded)) {
      this.warn(field, 'expected a list');
      return [];
    }
    return decoded.filter((item) => item !== null && item !== undefined).map((item) => String(item));
  }

  /** Accepted answers: a list, a JSON-encoded list, or one plain string. */
  answerList(field: string, value: unknown): string[] {
    if (typeof value === 'string' && !value.trim().startsWith('[')) {
      return value.trim() === '' ? [] : [value];
    }
    return this.stringList(field, value);
  }

  choice(options: string[], correct: unknown): ChoicePayload {
    let correctIndex: number | undefined;
    if (typeof correct === 'number' || typeof correct === 'string') {
      correctIndex = resolveChoiceIndex(options, correct);
    }
    if (correctIndex === undefined || correctIndex < 0 || correctIndex >= options.length) {
      this.warn('correct_answer', `cannot resolve ${JSON.stringify(correct) ?? 'undefined'} against ${options.length} option(s)`);
      return { options, correctIndex: 0 };
    }
    return { options, correctIndex };
  }

  freeText(record: { correct_answers?: unknown; correct_answer?: unknown }): FreeTextPayload {
    let acceptedAnswers = this.answerList('correct_answers', record.correct_answers);
    if (acceptedAnswers.length === 0) {
      acceptedAnswers = this.answerList('correct_answer', record.correct_answer);
    }
    if (acceptedAnswers.length === 0) this.warn('correct_answers', 'no accepted answer');
    return { acceptedAnswers };
  }

  difficulty(value: string | undefined): Difficulty {
    const resolved = DIFFICULTY_ALIASES[(value ?? '').trim().toLowerCase()];
    if (!resolved) {
      this.warn('difficulty', `unknown level ${JSON.stringify(value ?? null)}`);
      return 'medium';
    }
    return resolved;
  }
}

/**
 * Builds a typed question from a stored record.
 *
 * Throws `UnknownQuestionType` for an unrecognised type tag and a `ZodError`
 * when the record lacks an id or text. Any other defect is reported as a
 * warning and the field falls back to an empty or default value.
 */
export function parseQuestionRecord(raw: unknown): ParsedQuestion {
  const record = questionRecordSchema.parse(raw);
  const rawType = (record.question_type ?? record.type ?? '').trim().toLowerCase();
  const type = resolveQuestionType(TYPE_ALIASES[rawType] ?? rawType);
  const reader = new FieldReader(record.id);

  if (record.section === undefined) reader.warn('section', 'missing');

  const base = {
    id: record.id,
    text: record.question_text,
    category: record.category,
    section: record.section ?? 0,
    difficulty: reader.difficulty(record.difficulty),
    tags: reader.stringList('tags', record.tags),
    explanation: record.explanation ?? '',
    ...(record.reference ? { reference: record.reference } : {}),
  };

  let question: Question;
  switch (type) {
    case 'multiple_choice': {
      const options = reader.stringList('options', record.options);
      question = { ...base, type, ...reader.choice(options, record.correct_answer) };
      break;
    }
    case 'true_false': {
      const value = record.correct_answer;
      let correctAnswer =
        typeof value === 'boolean' || typeof value === 'string' ? resolveBoolean(value) : undefined;
      if (correctAnswer === undefined) {
        reader.warn('correct_answer', 'expected true or false');
        correctAnswer = true;
      }
      question = { ...base, type, correctAnswer };
      break;
    }
    case 'fill_in_blank':
      question = { ...base, type, ...reader.freeText(record) };
      break;
    case 'scenario': {
      const options = reader.stringList('options', record.options);
      question = {
        ...base,
        type,
        scenario: record.scenario_text ?? '',
        response:
          options.length > 0
            ? { mode: 'choice', ...reader.choice(options, record.correct_answer) }
            : { mode: 'free_text', ...reader.freeText(record) },
      };
      break;
    }
  }

  return { question, warnings: reader.warnings };
}
