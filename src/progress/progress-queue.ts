import { Logger, OnModuleDestroy } from '@nestjs/common';
import { setTimeout as delay } from 'timers/promises';

import { ProgressSinkWriteError } from '../common/errors';
import { ProgressRecord, ProgressSink } from './progress-sink';

export interface ProgressQueueOptions {
  capacity: number;
  maxAttempts: number;
  /** Grows linearly with each attempt. */
  retryDelayMs?: number;
}

/**
 * Bounded outbox between the quiz engine and the progress sink. `enqueue`
 * returns immediately; records are written in the background, retried a few
 * times, and dropped when the sink keeps failing or the queue overflows.
 */
export class ProgressQueue implements OnModuleDestroy {
  private readonly logger = new Logger(ProgressQueue.name);
  private readonly pending: ProgressRecord[] = [];
  private draining?: Promise<void>;
  private dropped = 0;

  constructor(
    private readonly sink: ProgressSink,
    private readonly options: ProgressQueueOptions,
  ) {}

  get size(): number {
    return this.pending.length;
  }

  get droppedCount(): number {
    return this.dropped;
  }

  enqueue(record: ProgressRecord): void {
    if (this.pending.length >= this.options.capacity) {
      const overflow = this.pending.shift();
      this.dropped++;
      this.logger.warn(`⚠️ Progress queue full, dropped result of ${overflow?.quiz_id}`);
    }
    this.pending.push(record);
    this.scheduleDrain();
  }

  /** Resolves once everything queued so far has been written or dropped. */
  async flush(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  async onModuleDestroy() {
    await this.flush();
  }

  private scheduleDrain() {
    if (this.draining) return;
    this.draining = this.drain().finally(() => {
      this.draining = undefined;
      if (this.pending.length > 0) this.scheduleDrain();
    });
  }

  private async drain(): Promise<void> {
    let record = this.pending.shift();
    while (record) {
      await this.deliver(record);
      record = this.pending.shift();
    }
  }

  private async deliver(record: ProgressRecord): Promise<void> {
    const { maxAttempts, retryDelayMs = 200 } = this.options;
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        await this.sink.write(record);
        this.logger.debug(`💾 Stored result of ${record.quiz_id} for ${record.user_id}`);
        return;
      } catch (error) {
        lastError = error;
        if (attempt < maxAttempts && retryDelayMs > 0) {
          await delay(retryDelayMs * attempt);
        }
      }
    }

    this.dropped++;
    const failure = new ProgressSinkWriteError(record.quiz_id, maxAttempts, { cause: lastError });
    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    this.logger.error(`❌ ${failure.message}: ${reason}`);
  }
}
