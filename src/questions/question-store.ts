import { Difficulty, Question, QuestionType } from './question.model';

export const QUESTION_STORE = Symbol('QUESTION_STORE');

export interface QuestionFilter {
  section?: number;
  /** Any of these sections. */
  sections?: number[];
  category?: string;
  difficulty?: Difficulty;
  type?: QuestionType;
  /** Any of these tags. */
  tags?: string[];
}

/**
 * Read-only catalog the quiz engine samples from. Implementations signal an
 * unreachable or misconfigured backend with `QuestionStoreUnavailableError`.
 */
export interface QuestionStore {
  find(filter: QuestionFilter, limit?: number): Promise<Question[]>;
  count(filter: QuestionFilter): Promise<number>;
  getCategories(): Promise<Set<string>>;
  getTags(): Promise<Set<string>>;
}

export function matchesFilter(question: Question, filter: QuestionFilter): boolean {
  if (filter.section !== undefined && question.section !== filter.section) return false;
  if (filter.sections && filter.sections.length > 0 && !filter.sections.includes(question.section)) return false;
  if (filter.category !== undefined && question.category.toLowerCase() !== filter.category.toLowerCase()) {
    return false;
  }
  if (filter.difficulty !== undefined && question.difficulty !== filter.difficulty) return false;
  if (filter.type !== undefined && question.type !== filter.type) return false;
  if (filter.tags && filter.tags.length > 0 && !filter.tags.some((tag) => question.tags.includes(tag))) {
    return false;
  }
  return true;
}
