import { randomUUID } from 'crypto';
import {
  JobState,
  JobStatus,
  SubmitJobRequest,
} from '../interfaces/job.interface';
import { WorkDispatcher } from '../work-dispatcher';

/**
 * In-process WorkDispatcher for tests.
 *
 * Submitted jobs are kept in `submitted` and get a PENDING status; tests
 * drive later states with `setStatus`. Assign `submitError` to make the
 * next submissions reject.
 */
export class InMemoryWorkDispatcher extends WorkDispatcher {
  readonly submitted: SubmitJobRequest[] = [];
  submitError: Error | null = null;

  private readonly statuses = new Map<string, JobStatus>();

  allocateJobId(): string {
    return randomUUID();
  }

  async submit(request: SubmitJobRequest): Promise<string> {
    if (this.submitError) {
      throw this.submitError;
    }

    const jobId = request.jobId ?? this.allocateJobId();
    this.submitted.push({ ...request, jobId });
    this.statuses.set(jobId, {
      jobId,
      state: JobState.PENDING,
      documentId: request.documentId,
      result: null,
      error: null,
      enqueuedAt: new Date().toISOString(),
      startedAt: null,
      finishedAt: null,
    });
    return jobId;
  }

  async getJobStatus(jobId: string): Promise<JobStatus | null> {
    const status = this.statuses.get(jobId);
    return status ? { ...status } : null;
  }

  /** Test helper: overwrites fields of a known job's status */
  setStatus(jobId: string, changes: Partial<Omit<JobStatus, 'jobId'>>): void {
    const current = this.statuses.get(jobId);
    if (!current) {
      throw new Error(`Unknown job ${jobId}`);
    }
    this.statuses.set(jobId, { ...current, ...changes });
  }
}
