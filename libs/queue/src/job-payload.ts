import { DocumentJob } from './interfaces/job.interface';

function isDocumentJob(value: unknown): value is DocumentJob {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'jobId' in value &&
    typeof value.jobId === 'string' &&
    'documentId' in value &&
    typeof value.documentId === 'string' &&
    'filePath' in value &&
    typeof value.filePath === 'string'
  );
}

/**
 * Queue payload of a job. The key order is fixed, so serializing a parsed
 * payload gives back the exact list element (needed for LREM).
 */
export function serializeJob(job: DocumentJob): string {
  return JSON.stringify({
    jobId: job.jobId,
    documentId: job.documentId,
    filePath: job.filePath,
  });
}

/** Decodes a queue payload; returns null for anything that is not a DocumentJob */
export function parseJobPayload(raw: string): DocumentJob | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isDocumentJob(parsed)) {
    return null;
  }
  return {
    jobId: parsed.jobId,
    documentId: parsed.documentId,
    filePath: parsed.filePath,
  };
}
