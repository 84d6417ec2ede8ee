import { Logger } from '@nestjs/common';
import * as fs from 'fs';
import { ZodError } from 'zod';

import { QuestionStoreUnavailableError, UnknownQuestionType } from '../common/errors';
import { parseQuestionRecord } from './question-record';
import { Question, isAnswerable } from './question.model';
import { QuestionFilter, QuestionStore, matchesFilter } from './question-store';

/**
 * Question bank kept in a JSON file: either an array of records or an object
 * of arrays keyed by category. Read once; broken records and questions that
 * cannot be answered are skipped, other broken fields degrade with a warning.
 */
export class JsonQuestionStore implements QuestionStore {
  private readonly logger = new Logger(JsonQuestionStore.name);
  private questions: Question[] = [];
  private unavailableReason?: string;

  constructor(private readonly bankPath: string) {
    this.loadQuestions();
  }

  private loadQuestions() {
    this.logger.log(`📂 Loading question bank from ${this.bankPath}`);

    let rawData: unknown;
    try {
      rawData = JSON.parse(fs.readFileSync(this.bankPath, 'utf-8'));
    } catch (error) {
      this.unavailableReason = error instanceof Error ? error.message : String(error);
      this.logger.error(`❌ Question bank could not be read: ${this.unavailableReason}`);
      return;
    }

    const records = this.flattenRecords(rawData);
    if (!records) {
      this.unavailableReason = 'expected an array of questions or an object of arrays';
      this.logger.error(`❌ Question bank has an unexpected shape: ${this.unavailableReason}`);
      return;
    }

    const seen = new Set<string>();
    records.forEach((record, index) => {
      try {
        const { question, warnings } = parseQuestionRecord(record);
        for (const warning of warnings) {
          this.logger.warn(`⚠️ ${warning.message}`);
        }
        if (!isAnswerable(question)) {
          this.logger.warn(`⚠️ Skipping question ${question.id}: it has no usable answer key`);
          return;
        }
        if (seen.has(question.id)) {
          this.logger.warn(`⚠️ Skipping duplicate question id ${question.id}`);
          return;
        }
        seen.add(question.id);
        this.questions.push(question);
      } catch (error) {
        if (error instanceof UnknownQuestionType || error instanceof ZodError) {
          this.logger.warn(`⚠️ Skipping question record ${index}: ${error.message}`);
          return;
        }
        throw error;
      }
    });

    this.logger.log(`✅ Loaded ${this.questions.length} of ${records.length} question records`);
  }

  private flattenRecords(rawData: unknown): unknown[] | undefined {
    if (Array.isArray(rawData)) return rawData;
    if (typeof rawData !== 'object' || rawData === null) return undefined;

    const records: unknown[] = [];
    for (const [category, questions] of Object.entries(rawData)) {
      if (!Array.isArray(questions)) return undefined;
      for (const question of questions) {
        records.push(
          typeof question === 'object' && question !== null && !('category' in question)
            ? { ...question, category }
            : question,
        );
      }
    }
    return records;
  }

  private available(): Question[] {
    if (this.unavailableReason !== undefined) {
      throw new QuestionStoreUnavailableError(this.unavailableReason);
    }
    return this.questions;
  }

  async find(filter: QuestionFilter, limit?: number): Promise<Question[]> {
    const matches = this.available().filter((question) => matchesFilter(question, filter));
    return limit === undefined ? matches : matches.slice(0, limit);
  }

  async count(filter: QuestionFilter): Promise<number> {
    return (await this.find(filter)).length;
  }

  async getCategories(): Promise<Set<string>> {
    return new Set(this.available().map((question) => question.category));
  }

  async getTags(): Promise<Set<string>> {
    return new Set(this.available().flatMap((question) => question.tags));
  }
}
