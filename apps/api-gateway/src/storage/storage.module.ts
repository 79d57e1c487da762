import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { StorageService } from './storage.service';

/**
 * StorageModule: provides local file storage for uploads.
 *
 * ConfigModule is imported here to guarantee ConfigService is available
 * to StorageService even if consumers don't import it themselves.
 */
@Module({
  imports: [ConfigModule],
  providers: [StorageService],
  exports: [StorageService],
})
export class StorageModule {}
