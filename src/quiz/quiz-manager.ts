import { Inject, Injectable, Logger } from '@nestjs/common';

import { CLOCK, Clock } from '../common/clock';
import { SessionNotFoundError } from '../common/errors';
import { Question } from '../questions/question.model';
import { QuizSession, SessionOptions } from './session';

export const SESSION_ID_GENERATOR = Symbol('SESSION_ID_GENERATOR');
export type SessionIdGenerator = () => string;

const MAX_ID_ATTEMPTS = 10;

export interface CleanupReport {
  /** Sessions that were still active and got expired before eviction. */
  expired: QuizSession[];
  /** Ids of every session removed by the sweep, expired ones included. */
  evicted: string[];
}

/**
 * Registry of live quiz sessions. All registry access is synchronous, so a
 * sweep can never interleave with a lookup; a session evicted while a caller
 * holds it stays usable, it just can no longer be found by id.
 */
@Injectable()
export class QuizManager {
  private readonly logger = new Logger(QuizManager.name);
  private readonly sessions = new Map<string, QuizSession>();

  constructor(
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(SESSION_ID_GENERATOR) private readonly generateId: SessionIdGenerator,
  ) {}

  get size(): number {
    return this.sessions.size;
  }

  createSession(questions: readonly Question[], options: SessionOptions): QuizSession {
    const session = new QuizSession(this.nextId(), questions, options, this.clock);
    this.sessions.set(session.id, session);
    this.logger.log(`🆕 Created ${options.mode} session ${session.id} with ${session.totalQuestions} questions`);
    return session;
  }

  getSession(sessionId: string): QuizSession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }

  hasSession(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  deleteSession(sessionId: string): boolean {
    const removed = this.sessions.delete(sessionId);
    if (removed) this.logger.log(`🧹 Removed session ${sessionId}`);
    return removed;
  }

  /**
   * Expires and evicts active sessions older than `maxAgeSeconds`, and evicts
   * ended sessions once `retentionSeconds` have passed since they ended.
   */
  cleanupExpired(maxAgeSeconds: number, retentionSeconds = maxAgeSeconds): CleanupReport {
    const now = this.clock.now();
    const report: CleanupReport = { expired: [], evicted: [] };

    for (const [id, session] of [...this.sessions]) {
      if (session.status === 'active') {
        const ageSeconds = (now.getTime() - session.startedAt.getTime()) / 1000;
        if (ageSeconds <= maxAgeSeconds) continue;
        session.expire();
        report.expired.push(session);
      } else {
        const sinceEnded = session.secondsSinceEnded(now) ?? 0;
        if (sinceEnded <= retentionSeconds) continue;
      }
      this.sessions.delete(id);
      report.evicted.push(id);
    }

    if (report.evicted.length > 0) {
      this.logger.log(
        `🧹 Sweep evicted ${report.evicted.length} session(s), ${report.expired.length} of them abandoned`,
      );
    }
    return report;
  }

  private nextId(): string {
    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt++) {
      const id = this.generateId();
      if (!this.sessions.has(id)) return id;
      this.logger.warn(`⚠️ Session id collision on ${id}, retrying`);
    }
    throw new Error(`Could not generate a unique session id after ${MAX_ID_ATTEMPTS} attempts`);
  }
}
