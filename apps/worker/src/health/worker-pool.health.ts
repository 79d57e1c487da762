import { Injectable } from '@nestjs/common';
import {
  HealthCheckError,
  HealthIndicator,
  HealthIndicatorResult,
} from '@nestjs/terminus';
import { JobWorkerService } from '../document-processing/job-worker.service';

/** Up while the worker loops are polling the queue */
@Injectable()
export class WorkerPoolHealthIndicator extends HealthIndicator {
  constructor(private readonly worker: JobWorkerService) {
    super();
  }

  async isRunning(key: string): Promise<HealthIndicatorResult> {
    if (this.worker.isRunning) {
      return this.getStatus(key, true);
    }
    throw new HealthCheckError(
      'Worker pool check failed',
      this.getStatus(key, false, { message: 'Worker loops are stopped' }),
    );
  }
}
