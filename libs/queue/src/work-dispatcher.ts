import { JobStatus, SubmitJobRequest } from './interfaces/job.interface';

/**
 * WorkDispatcher: the producer-side contract of the job queue.
 *
 * The api-gateway depends on this abstract class (it is also the injection
 * token) and never on the Redis implementation directly.
 */
export abstract class WorkDispatcher {
  /** Returns a fresh job id that submit() will accept */
  abstract allocateJobId(): string;

  /** Enqueues one document job and returns its id */
  abstract submit(job: SubmitJobRequest): Promise<string>;

  /** Status of a job, or null when the id is unknown or expired */
  abstract getJobStatus(jobId: string): Promise<JobStatus | null>;
}
