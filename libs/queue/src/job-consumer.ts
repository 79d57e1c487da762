import { Logger } from '@nestjs/common';
import Redis from 'ioredis';
import { DocumentJob } from './interfaces/job.interface';
import type { JobQueueService } from './job-queue.service';
import { parseJobPayload } from './job-payload';
import { PENDING_QUEUE_KEY, PROCESSING_QUEUE_KEY } from './queue.constants';

/**
 * JobConsumer: one blocking reader of the pending queue.
 *
 * Owns a dedicated ioredis connection: BLMOVE blocks the connection it runs
 * on, so consumers cannot share one with each other or with the producer.
 * Close it when the owning loop stops.
 *
 * Reservation moves the payload to the processing list rather than
 * deleting it; JobQueueService.complete() / fail() remove it from there.
 */
export class JobConsumer {
  private readonly logger = new Logger(JobConsumer.name);

  constructor(
    private readonly connection: Redis,
    private readonly queue: JobQueueService,
  ) {}

  /**
   * Waits up to `timeoutSeconds` for a job, marks it STARTED and returns it.
   * Returns null on timeout and for malformed payloads, which are dropped.
   *
   * When the job cannot be marked STARTED the payload goes back to the
   * pending queue and the error is rethrown.
   */
  async reserve(timeoutSeconds: number): Promise<DocumentJob | null> {
    const raw = await this.connection.blmove(
      PENDING_QUEUE_KEY,
      PROCESSING_QUEUE_KEY,
      'RIGHT',
      'LEFT',
      timeoutSeconds,
    );
    if (raw === null) {
      return null;
    }

    const job = parseJobPayload(raw);
    if (!job) {
      this.logger.warn(
        `Dropping malformed payload from "${PENDING_QUEUE_KEY}": ${raw.slice(0, 120)}`,
      );
      await this.queue.discard(raw);
      return null;
    }

    try {
      await this.queue.markStarted(job.jobId);
    } catch (error) {
      await this.queue.requeue(raw).catch((requeueError: unknown) => {
        const message =
          requeueError instanceof Error ? requeueError.message : String(requeueError);
        this.logger.error(
          `Job ${job.jobId} left in "${PROCESSING_QUEUE_KEY}": ${message}`,
        );
      });
      throw error;
    }

    this.logger.debug(`Reserved job ${job.jobId} (document ${job.documentId})`);
    return job;
  }

  async close(): Promise<void> {
    await this.connection.quit();
  }
}
