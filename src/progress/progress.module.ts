import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as path from 'path';

import { AppConfig } from '../config/configuration';
import { ProgressQueue } from './progress-queue';
import { JsonLinesProgressSink, LoggerProgressSink, PROGRESS_SINK, ProgressSink } from './progress-sink';

@Module({
  providers: [
    {
      provide: PROGRESS_SINK,
      inject: [ConfigService],
      useFactory: (config: ConfigService<AppConfig, true>): ProgressSink => {
        const logPath = config.get('PROGRESS_LOG_PATH', { infer: true });
        if (!logPath) {
          new Logger(ProgressModule.name).log('📝 PROGRESS_LOG_PATH not set, quiz results will only be logged');
          return new LoggerProgressSink();
        }
        return new JsonLinesProgressSink(path.resolve(process.cwd(), logPath));
      },
    },
    {
      provide: ProgressQueue,
      inject: [PROGRESS_SINK, ConfigService],
      useFactory: (sink: ProgressSink, config: ConfigService<AppConfig, true>) =>
        new ProgressQueue(sink, {
          capacity: config.get('PROGRESS_QUEUE_CAPACITY', { infer: true }),
          maxAttempts: config.get('PROGRESS_MAX_ATTEMPTS', { infer: true }),
        }),
    },
  ],
  exports: [ProgressQueue],
})
export class ProgressModule {}
