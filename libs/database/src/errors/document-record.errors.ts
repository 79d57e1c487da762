/**
 * Errors raised by DocumentRecordStore implementations.
 *
 * Plain Error subclasses so that the store stays transport-agnostic; the
 * api-gateway maps them to HTTP exceptions and the worker reports them to
 * the job queue.
 */

export class DocumentRecordNotFoundError extends Error {
  constructor(readonly documentId: string) {
    super(`Document record ${documentId} not found`);
    this.name = 'DocumentRecordNotFoundError';
  }
}

/**
 * Thrown when a change set would break the record lifecycle, e.g. mutating
 * a terminal record or assigning a second job id.
 */
export class InvalidRecordTransitionError extends Error {
  constructor(
    readonly documentId: string,
    reason: string,
  ) {
    super(`Refused update of document record ${documentId}: ${reason}`);
    this.name = 'InvalidRecordTransitionError';
  }
}
