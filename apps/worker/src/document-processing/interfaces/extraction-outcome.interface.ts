import { ExtractedFields } from '@invoice-intake/extraction';

/**
 * Result of one processing attempt, discriminated on `kind`.
 *
 * Only `success` leaves the record SUCCESS; `file_not_found` and
 * `empty_document` leave it FAILED; `not_found` performed no writes.
 */
export type ExtractionOutcome =
  | { kind: 'not_found'; documentId: string }
  | { kind: 'file_not_found'; documentId: string; filePath: string }
  | { kind: 'empty_document'; documentId: string }
  | { kind: 'success'; documentId: string; fields: ExtractedFields };
