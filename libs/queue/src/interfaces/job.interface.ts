/**
 * State of a dispatched job as seen by status queries.
 *
 * Transitions:
 *   PENDING → STARTED → SUCCESS
 *                     → FAILURE
 */
export enum JobState {
  /** Submitted and waiting in the queue */
  PENDING = 'PENDING',

  /** Reserved by a worker */
  STARTED = 'STARTED',

  /** Worker finished and stored a result */
  SUCCESS = 'SUCCESS',

  /** Worker gave up; see `error` */
  FAILURE = 'FAILURE',
}

/** Payload carried through the queue for one document */
export interface DocumentJob {
  jobId: string;
  documentId: string;
  filePath: string;
}

/** Arguments to WorkDispatcher.submit(); the job id is allocated when omitted */
export interface SubmitJobRequest {
  jobId?: string;
  documentId: string;
  filePath: string;
}

/**
 * Snapshot of a job's status hash.
 *
 * Invariants:
 *   - result is set only when state === SUCCESS
 *   - error is set only when state === FAILURE
 *   - timestamps are ISO 8601 UTC strings
 */
export interface JobStatus {
  jobId: string;
  state: JobState;
  documentId: string;
  result: unknown;
  error: string | null;
  enqueuedAt: string | null;
  startedAt: string | null;
  finishedAt: string | null;
}
