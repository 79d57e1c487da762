/**
 * Lifecycle status of an uploaded document.
 *
 * Transitions (exactly one, performed by the worker):
 *   PENDING → SUCCESS
 *           → FAILED
 */
export enum DocumentStatus {
  /** Record created, extraction not finished yet */
  PENDING = 'PENDING',

  /** Text decoded and fields extracted */
  SUCCESS = 'SUCCESS',

  /** Processing failed; text and parsed fields stay empty */
  FAILED = 'FAILED',
}

/** Statuses that admit no further transition */
export const TERMINAL_DOCUMENT_STATUSES: ReadonlySet<DocumentStatus> = new Set([
  DocumentStatus.SUCCESS,
  DocumentStatus.FAILED,
]);

export function isTerminalStatus(status: DocumentStatus): boolean {
  return TERMINAL_DOCUMENT_STATUSES.has(status);
}
