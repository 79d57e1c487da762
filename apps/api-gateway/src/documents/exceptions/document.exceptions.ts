import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Thrown when no document record exists for the requested id.
 * Maps to HTTP 404 Not Found.
 */
export class DocumentNotFoundException extends HttpException {
  constructor(documentId: string) {
    super(
      {
        statusCode: HttpStatus.NOT_FOUND,
        error: 'Not Found',
        message: `Document ${documentId} not found`,
      },
      HttpStatus.NOT_FOUND,
    );
  }
}

/**
 * Thrown when no file (or an empty one) is attached to the upload request.
 * Maps to HTTP 400 Bad Request.
 */
export class MissingFileException extends HttpException {
  constructor() {
    super(
      {
        statusCode: HttpStatus.BAD_REQUEST,
        error: 'Bad Request',
        message: 'A non-empty file must be attached to the "file" multipart field',
      },
      HttpStatus.BAD_REQUEST,
    );
  }
}

/**
 * Thrown when the uploaded file exceeds the configured size limit.
 * Maps to HTTP 413 Content Too Large.
 */
export class FileTooLargeException extends HttpException {
  constructor(maxSizeMb: number) {
    super(
      {
        statusCode: HttpStatus.PAYLOAD_TOO_LARGE,
        error: 'Payload Too Large',
        message: `File exceeds the maximum allowed size of ${maxSizeMb} MB`,
      },
      HttpStatus.PAYLOAD_TOO_LARGE,
    );
  }
}

/**
 * Thrown when the document record cannot be persisted.
 * Wraps internal DB errors without leaking implementation details.
 * Maps to HTTP 500 Internal Server Error.
 */
export class DocumentCreationException extends HttpException {
  constructor(cause: Error) {
    super(
      {
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        error: 'Internal Server Error',
        message: 'Failed to create document record. Please try again.',
      },
      HttpStatus.INTERNAL_SERVER_ERROR,
      { cause },
    );
  }
}

/**
 * Thrown when the job queue refuses the processing job after the document
 * record was created. The record stays PENDING with its allocated job id.
 *
 * Maps to HTTP 503 Service Unavailable.
 */
export class JobDispatchException extends HttpException {
  constructor(documentId: string, cause: Error) {
    super(
      {
        statusCode: HttpStatus.SERVICE_UNAVAILABLE,
        error: 'Service Unavailable',
        message: `Document ${documentId} was saved but could not be queued for processing`,
      },
      HttpStatus.SERVICE_UNAVAILABLE,
      { cause },
    );
  }
}
