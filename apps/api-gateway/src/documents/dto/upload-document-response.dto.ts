import { DocumentStatus } from '@invoice-intake/database';

/**
 * Response body for POST /documents/upload (HTTP 201 Created).
 *
 * `jobId` is the key for GET /status/:jobId; `documentId` for
 * GET /documents/:id once the job has finished.
 */
export class UploadDocumentResponseDto {
  documentId!: string;

  jobId!: string;

  /** Always PENDING immediately after upload */
  status!: DocumentStatus;
}
