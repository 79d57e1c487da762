import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { QueueModule } from '@invoice-intake/queue';
import { HealthController } from './health.controller';

@Module({
  imports: [TerminusModule, QueueModule.forRoot()],
  controllers: [HealthController],
})
export class HealthModule {}
