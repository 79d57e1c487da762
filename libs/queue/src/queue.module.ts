import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { REDIS_CLIENT } from './queue.constants';
import { JobQueueService } from './job-queue.service';
import { QueueHealthIndicator } from './queue.health';
import { WorkDispatcher } from './work-dispatcher';

/**
 * QueueModule: async dynamic module providing the document job queue.
 *
 * Usage:
 *   QueueModule.forRoot(): in AppModule of the api-gateway and the worker
 *
 * Exports:
 *   - WorkDispatcher:  submit(job), getJobStatus(jobId), allocateJobId()
 *   - JobQueueService: the Redis implementation, plus createConsumer(),
 *                      complete() and fail() for the worker
 *   - QueueHealthIndicator: Redis ping for /health
 *
 * A single ioredis connection serves producers and status writes;
 * consumers duplicate it because BLMOVE blocks its connection.
 */
@Module({})
export class QueueModule {
  static forRoot(): DynamicModule {
    const clientProvider = {
      provide: REDIS_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): Redis => {
        return new Redis({
          host: configService.get<string>('REDIS_HOST', 'localhost'),
          port: Number(configService.get<number>('REDIS_PORT', 6379)),
          // Retry strategy: exponential back-off capped at 10 s
          retryStrategy: (times: number) => Math.min(times * 100, 10_000),
          enableReadyCheck: true,
          // BLMOVE on duplicated connections may wait longer than any
          // per-request retry budget, so no limit is applied.
          maxRetriesPerRequest: null,
          lazyConnect: false,
        });
      },
    };

    return {
      module: QueueModule,
      imports: [ConfigModule],
      providers: [
        clientProvider,
        JobQueueService,
        { provide: WorkDispatcher, useExisting: JobQueueService },
        QueueHealthIndicator,
      ],
      exports: [JobQueueService, WorkDispatcher, QueueHealthIndicator],
      global: false,
    };
  }
}
