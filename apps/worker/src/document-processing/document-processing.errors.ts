/**
 * Raised when processing fails after the record was found: file read,
 * extraction, or the terminal SUCCESS write. The record has been marked
 * FAILED on a best-effort basis; `cause` holds the original failure.
 */
export class DocumentProcessingError extends Error {
  constructor(
    readonly documentId: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'DocumentProcessingError';
  }
}
