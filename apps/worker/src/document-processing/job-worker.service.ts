import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DocumentJob, JobConsumer, JobQueueService } from '@invoice-intake/queue';
import { DocumentProcessingService } from './document-processing.service';
import { ExtractionOutcome } from './interfaces/extraction-outcome.interface';

const DEFAULT_CONCURRENCY = 4;
const DEFAULT_POLL_TIMEOUT_SECONDS = 5;

/** Pause after a failed reservation before the loop polls again */
const RESERVE_BACKOFF_MS = 1_000;

type FailedOutcome = Exclude<ExtractionOutcome, { kind: 'success' }>;

/** Job failure message for outcomes that finished without an exception */
export function describeFailure(outcome: FailedOutcome): string {
  switch (outcome.kind) {
    case 'not_found':
      return `Document ${outcome.documentId} not found`;
    case 'file_not_found':
      return `File not found: ${outcome.filePath}`;
    case 'empty_document':
      return `Document ${outcome.documentId} has no text content`;
  }
}

/**
 * JobWorkerService: fixed-size pool of queue consumers.
 *
 * On bootstrap it starts WORKER_CONCURRENCY loops. Each loop owns one
 * JobConsumer (and thus one Redis connection) and repeats:
 *
 *   reserve → DocumentProcessingService.process() → complete() / fail()
 *
 * Different documents are processed concurrently; a single job is handled
 * by exactly one loop because reservation moves it off the pending queue.
 * Shutdown stops polling, waits for in-flight jobs, then closes consumers.
 * It runs in onModuleDestroy, ahead of the shared queue connection closing
 * on application shutdown, so in-flight outcomes are still recorded.
 */
@Injectable()
export class JobWorkerService implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = new Logger(JobWorkerService.name);
  private readonly concurrency: number;
  private readonly pollTimeoutSeconds: number;

  private running = false;
  private loops: Promise<void>[] = [];

  constructor(
    private readonly queue: JobQueueService,
    private readonly processing: DocumentProcessingService,
    private readonly configService: ConfigService,
  ) {
    this.concurrency = Math.max(
      1,
      Number(this.configService.get<number>('WORKER_CONCURRENCY', DEFAULT_CONCURRENCY)),
    );
    this.pollTimeoutSeconds = Number(
      this.configService.get<number>(
        'QUEUE_POLL_TIMEOUT_SECONDS',
        DEFAULT_POLL_TIMEOUT_SECONDS,
      ),
    );
  }

  onApplicationBootstrap(): void {
    this.start();
  }

  async onModuleDestroy(): Promise<void> {
    await this.stop();
  }

  // ── Pool lifecycle ───────────────────────────────────────

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.loops = Array.from({ length: this.concurrency }, (_, index) =>
      this.runLoop(index, this.queue.createConsumer()),
    );
    this.logger.log(
      `Started ${this.concurrency} worker loop(s), poll timeout ${this.pollTimeoutSeconds}s`,
    );
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.logger.log('Stopping worker loops; waiting for in-flight jobs');
    await Promise.all(this.loops);
    this.loops = [];
    this.logger.log('All worker loops stopped');
  }

  get isRunning(): boolean {
    return this.running;
  }

  // ── Per-job handling ─────────────────────────────────────

  /**
   * Processes one reserved job and records its outcome in the queue.
   * Never throws: failures to record the outcome are logged.
   */
  async handle(job: DocumentJob): Promise<void> {
    const { jobId, documentId, filePath } = job;
    this.logger.debug(`Job ${jobId}: processing document ${documentId}`);

    let outcome: ExtractionOutcome;
    try {
      outcome = await this.processing.process(documentId, filePath);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Job ${jobId} failed: ${message}`);
      await this.record(jobId, () => this.queue.fail(job, message));
      return;
    }

    if (outcome.kind === 'success') {
      const { fields } = outcome;
      await this.record(jobId, () =>
        this.queue.complete(job, { status: 'success', documentId, fields }),
      );
    } else {
      const message = describeFailure(outcome);
      await this.record(jobId, () => this.queue.fail(job, message));
    }
    this.logger.log(`Job ${jobId} finished: ${outcome.kind}`);
  }

  // ── Private helpers ──────────────────────────────────────

  private async record(jobId: string, write: () => Promise<void>): Promise<void> {
    try {
      await write();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Could not record outcome of job ${jobId}: ${message}`);
    }
  }

  private async runLoop(index: number, consumer: JobConsumer): Promise<void> {
    this.logger.debug(`Worker loop ${index} polling`);
    try {
      while (this.running) {
        let job: DocumentJob | null;
        try {
          job = await consumer.reserve(this.pollTimeoutSeconds);
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          this.logger.error(`Worker loop ${index} failed to reserve a job: ${message}`);
          await sleep(RESERVE_BACKOFF_MS);
          continue;
        }

        if (job) {
          await this.handle(job);
        }
      }
    } finally {
      await consumer.close().catch((error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Worker loop ${index} failed to close its connection: ${message}`);
      });
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
