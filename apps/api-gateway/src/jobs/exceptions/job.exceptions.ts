import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Thrown when the queue holds no status for the job id, either because it
 * never existed or because its finished status has expired.
 * Maps to HTTP 404 Not Found.
 */
export class JobNotFoundException extends HttpException {
  constructor(jobId: string) {
    super(
      {
        statusCode: HttpStatus.NOT_FOUND,
        error: 'Not Found',
        message: `Job ${jobId} not found`,
      },
      HttpStatus.NOT_FOUND,
    );
  }
}
