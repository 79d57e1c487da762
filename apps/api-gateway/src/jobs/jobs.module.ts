import { Module } from '@nestjs/common';
import { QueueModule } from '@invoice-intake/queue';
import { JobsController } from './jobs.controller';

@Module({
  imports: [QueueModule.forRoot()],
  controllers: [JobsController],
})
export class JobsModule {}
