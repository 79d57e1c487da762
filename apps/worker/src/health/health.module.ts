import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { QueueModule } from '@invoice-intake/queue';
import { DocumentProcessingModule } from '../document-processing/document-processing.module';
import { HealthController } from './health.controller';
import { WorkerPoolHealthIndicator } from './worker-pool.health';

@Module({
  imports: [TerminusModule, QueueModule.forRoot(), DocumentProcessingModule],
  controllers: [HealthController],
  providers: [WorkerPoolHealthIndicator],
})
export class HealthModule {}
