import { Controller, Get, Param } from '@nestjs/common';
import { WorkDispatcher } from '@invoice-intake/queue';
import { JobStatusResponseDto } from './dto/job-status-response.dto';
import { JobNotFoundException } from './exceptions/job.exceptions';

/**
 * GET /status/:jobId: state of a processing job as reported by the queue.
 *
 * A SUCCESS job may still describe a document whose fields are all null;
 * FAILURE is the only job state that means processing did not complete.
 */
@Controller('status')
export class JobsController {
  constructor(private readonly dispatcher: WorkDispatcher) {}

  @Get(':jobId')
  async getStatus(@Param('jobId') jobId: string): Promise<JobStatusResponseDto> {
    const status = await this.dispatcher.getJobStatus(jobId);
    if (!status) {
      throw new JobNotFoundException(jobId);
    }

    return {
      jobId: status.jobId,
      status: status.state,
      result: status.result,
      error: status.error,
    };
  }
}
