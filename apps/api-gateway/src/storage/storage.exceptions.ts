import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Thrown when an uploaded file cannot be written to the storage directory.
 *
 * Maps to HTTP 500 Internal Server Error: the disk is local to the gateway,
 * so the failure is ours, not the client's.
 */
export class StorageWriteException extends HttpException {
  constructor(filename: string, cause: Error) {
    super(
      {
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        error: 'Internal Server Error',
        message: `Failed to store file "${filename}"`,
      },
      HttpStatus.INTERNAL_SERVER_ERROR,
      { cause },
    );
  }
}
