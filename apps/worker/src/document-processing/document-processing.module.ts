import { Module } from '@nestjs/common';
import { DatabaseModule } from '@invoice-intake/database';
import { QueueModule } from '@invoice-intake/queue';
import { DocumentProcessingService } from './document-processing.service';
import { JobWorkerService } from './job-worker.service';

/**
 * Module for background document processing.
 *
 * DatabaseModule.forFeature() binds DocumentRecordStore to its TypeORM
 * implementation; QueueModule.forRoot() provides the JobQueueService the
 * worker pool consumes from. JobWorkerService is exported for the health
 * check.
 */
@Module({
  imports: [DatabaseModule.forFeature(), QueueModule.forRoot()],
  providers: [DocumentProcessingService, JobWorkerService],
  exports: [DocumentProcessingService, JobWorkerService],
})
export class DocumentProcessingModule {}
