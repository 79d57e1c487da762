import {
  Inject,
  Injectable,
  Logger,
  OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis, { ChainableCommander } from 'ioredis';
import { randomUUID } from 'crypto';
import {
  DocumentJob,
  JobState,
  JobStatus,
  SubmitJobRequest,
} from './interfaces/job.interface';
import { JobConsumer } from './job-consumer';
import { serializeJob } from './job-payload';
import {
  PENDING_QUEUE_KEY,
  PROCESSING_QUEUE_KEY,
  REDIS_CLIENT,
  jobStateKey,
} from './queue.constants';
import { WorkDispatcher } from './work-dispatcher';

/** Default lifetime of a finished job's status hash: one day */
const DEFAULT_RESULT_TTL_SECONDS = 86_400;

const JOB_STATES: ReadonlySet<string> = new Set(Object.values(JobState));

function isJobState(value: string | undefined): value is JobState {
  return value !== undefined && JOB_STATES.has(value);
}

/**
 * JobQueueService: Redis-backed work dispatcher and result store.
 *
 * Layout:
 *   queue:documents:pending     LIST  JSON-encoded DocumentJob payloads
 *   queue:documents:processing  LIST  reserved payloads awaiting an outcome
 *   job:{jobId}:state           HASH  state, documentId, filePath, result,
 *                                     error, enqueuedAt, startedAt, finishedAt
 *
 * submit() writes the status hash and pushes the payload in one MULTI, so
 * a reserved job always has a hash to update and a status query never sees
 * a queued job without one. Finished hashes expire after
 * JOB_RESULT_TTL_SECONDS.
 *
 * Consumers block on BLMOVE, which parks the whole connection; each
 * JobConsumer therefore owns a duplicate of the shared client. The shared
 * client is closed on application shutdown, after every module's
 * onModuleDestroy, so a draining worker pool can still record outcomes.
 */
@Injectable()
export class JobQueueService
  extends WorkDispatcher
  implements OnApplicationShutdown
{
  private readonly logger = new Logger(JobQueueService.name);
  private readonly resultTtlSeconds: number;

  constructor(
    @Inject(REDIS_CLIENT)
    private readonly client: Redis,
    private readonly configService: ConfigService,
  ) {
    super();
    this.resultTtlSeconds = Number(
      this.configService.get<number>(
        'JOB_RESULT_TTL_SECONDS',
        DEFAULT_RESULT_TTL_SECONDS,
      ),
    );
  }

  // ── Producer side ────────────────────────────────────────

  allocateJobId(): string {
    return randomUUID();
  }

  async submit(request: SubmitJobRequest): Promise<string> {
    const job: DocumentJob = {
      jobId: request.jobId ?? this.allocateJobId(),
      documentId: request.documentId,
      filePath: request.filePath,
    };

    await this.execOrThrow(
      this.client
        .multi()
        .hset(jobStateKey(job.jobId), {
          state: JobState.PENDING,
          documentId: job.documentId,
          filePath: job.filePath,
          enqueuedAt: new Date().toISOString(),
        })
        .lpush(PENDING_QUEUE_KEY, serializeJob(job)),
    );

    this.logger.log(`Submitted job ${job.jobId} for document ${job.documentId}`);
    return job.jobId;
  }

  async getJobStatus(jobId: string): Promise<JobStatus | null> {
    const fields = await this.client.hgetall(jobStateKey(jobId));
    const state = fields['state'];

    if (!isJobState(state)) {
      return null;
    }

    return {
      jobId,
      state,
      documentId: fields['documentId'] ?? '',
      result: this.parseResult(jobId, fields['result']),
      error: fields['error'] ?? null,
      enqueuedAt: fields['enqueuedAt'] ?? null,
      startedAt: fields['startedAt'] ?? null,
      finishedAt: fields['finishedAt'] ?? null,
    };
  }

  // ── Consumer side ────────────────────────────────────────

  /** Opens a consumer on its own Redis connection */
  createConsumer(): JobConsumer {
    return new JobConsumer(this.client.duplicate(), this);
  }

  async markStarted(jobId: string): Promise<void> {
    await this.client.hset(jobStateKey(jobId), {
      state: JobState.STARTED,
      startedAt: new Date().toISOString(),
    });
  }

  async complete(job: DocumentJob, result: unknown): Promise<void> {
    await this.finish(job, {
      state: JobState.SUCCESS,
      result: JSON.stringify(result ?? null),
    });
    this.logger.debug(`Job ${job.jobId} marked SUCCESS`);
  }

  async fail(job: DocumentJob, errorMessage: string): Promise<void> {
    await this.finish(job, {
      state: JobState.FAILURE,
      error: errorMessage,
    });
    this.logger.debug(`Job ${job.jobId} marked FAILURE: ${errorMessage}`);
  }

  /** Returns a reserved payload to the end of the pending queue that is read next */
  async requeue(payload: string): Promise<void> {
    await this.execOrThrow(
      this.client
        .multi()
        .lrem(PROCESSING_QUEUE_KEY, 1, payload)
        .rpush(PENDING_QUEUE_KEY, payload),
    );
  }

  /** Drops a reserved payload that cannot be processed */
  async discard(payload: string): Promise<void> {
    await this.client.lrem(PROCESSING_QUEUE_KEY, 1, payload);
  }

  async onApplicationShutdown(): Promise<void> {
    this.logger.log('Closing Redis queue connection');
    await this.client.quit();
  }

  // ── Private helpers ──────────────────────────────────────

  private async finish(
    job: DocumentJob,
    fields: Record<string, string>,
  ): Promise<void> {
    const key = jobStateKey(job.jobId);
    await this.execOrThrow(
      this.client
        .multi()
        .hset(key, { ...fields, finishedAt: new Date().toISOString() })
        .expire(key, this.resultTtlSeconds)
        .lrem(PROCESSING_QUEUE_KEY, 1, serializeJob(job)),
    );
  }

  /** MULTI reports per-command errors in its reply instead of rejecting */
  private async execOrThrow(transaction: ChainableCommander): Promise<void> {
    const replies = await transaction.exec();
    if (!replies) {
      throw new Error('Redis transaction was aborted');
    }
    const failed = replies.find(([error]) => error !== null);
    if (failed?.[0]) {
      throw failed[0];
    }
  }

  private parseResult(jobId: string, raw: string | undefined): unknown {
    if (raw === undefined) {
      return null;
    }
    try {
      return JSON.parse(raw);
    } catch {
      this.logger.warn(
        `Malformed result stored for job ${jobId}: ${raw.slice(0, 120)}`,
      );
      return null;
    }
  }
}
