import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DatabaseModule } from '@invoice-intake/database';
import { QueueModule } from '@invoice-intake/queue';
import { StorageModule } from '../storage/storage.module';
import { DocumentsService } from './documents.service';
import { DocumentsController } from './documents.controller';

/**
 * DocumentsModule: feature module for document upload and queries.
 *
 * Imports:
 *   - ConfigModule:     reads UPLOAD_MAX_FILE_SIZE_MB for DocumentsService
 *   - DatabaseModule:   provides DocumentRecordStore (TypeORM)
 *   - QueueModule:      provides WorkDispatcher (Redis job queue)
 *   - StorageModule:    provides StorageService (local upload directory)
 */
@Module({
  imports: [
    ConfigModule,
    DatabaseModule.forFeature(),
    QueueModule.forRoot(),
    StorageModule,
  ],
  controllers: [DocumentsController],
  providers: [DocumentsService],
})
export class DocumentsModule {}
