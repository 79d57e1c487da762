import { JobState } from '@invoice-intake/queue';

/** Response body for GET /status/:jobId */
export class JobStatusResponseDto {
  jobId!: string;

  status!: JobState;

  /** Worker result on SUCCESS (`{ status, documentId, fields }`), else null */
  result!: unknown;

  /** Failure message on FAILURE, else null */
  error!: string | null;
}
