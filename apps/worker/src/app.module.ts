import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { HealthModule } from './health/health.module';
import { DocumentProcessingModule } from './document-processing/document-processing.module';

@Module({
  imports: [
    // ── Configuration ─────────────────────────────────────
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env', '../../.env'],
    }),

    // ── Database ──────────────────────────────────────────
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        type: 'postgres' as const,
        host: configService.get<string>('POSTGRES_HOST', 'localhost'),
        port: Number(configService.get<number>('POSTGRES_PORT', 5432)),
        username: configService.get<string>('POSTGRES_USER', 'intake'),
        password: configService.get<string>(
          'POSTGRES_PASSWORD',
          'intake_secret',
        ),
        database: configService.get<string>('POSTGRES_DB', 'invoice_intake'),
        autoLoadEntities: true,
        synchronize: false,
        logging: configService.get<string>('NODE_ENV') !== 'production',
      }),
    }),

    // ── Feature Modules ───────────────────────────────────
    HealthModule,
    DocumentProcessingModule,
  ],
})
export class AppModule {}
