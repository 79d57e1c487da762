/**
 * @invoice-intake/queue
 *
 * Redis-backed job queue for document processing.
 *
 * Exports:
 *   - QueueModule.forRoot(): import into any NestJS module
 *   - WorkDispatcher        : producer contract (submit / getJobStatus)
 *   - JobQueueService       : Redis implementation + consumer side
 *   - JobConsumer           : one blocking reader with its own connection
 *   - QueueHealthIndicator  : terminus check pinging Redis
 *   - REDIS_CLIENT          : ioredis injection token
 */
export { QueueModule } from './queue.module';
export { WorkDispatcher } from './work-dispatcher';
export { JobQueueService } from './job-queue.service';
export { JobConsumer } from './job-consumer';
export { parseJobPayload, serializeJob } from './job-payload';
export { QueueHealthIndicator } from './queue.health';
export {
  REDIS_CLIENT,
  PENDING_QUEUE_KEY,
  PROCESSING_QUEUE_KEY,
  jobStateKey,
} from './queue.constants';
export {
  JobState,
  JobStatus,
  DocumentJob,
  SubmitJobRequest,
} from './interfaces/job.interface';
