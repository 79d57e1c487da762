import { Module, DynamicModule } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Document } from './entities/document.entity';
import { DocumentRecordStore } from './stores/document-record.store';
import { TypeOrmDocumentRecordStore } from './stores/typeorm-document-record.store';

/** All entity classes registered in this database library */
const ENTITIES = [Document] as const;

/**
 * DatabaseModule: registers the entity repositories and binds the
 * DocumentRecordStore contract to its TypeORM implementation.
 *
 * Import this module in both api-gateway and worker; the DataSource itself
 * comes from TypeOrmModule.forRootAsync() in each AppModule.
 *
 * @example
 * ```ts
 * @Module({
 *   imports: [DatabaseModule.forFeature()],
 * })
 * export class SomeFeatureModule {}
 * ```
 */
@Module({})
export class DatabaseModule {
  static forFeature(): DynamicModule {
    return {
      module: DatabaseModule,
      imports: [TypeOrmModule.forFeature([...ENTITIES])],
      providers: [
        { provide: DocumentRecordStore, useClass: TypeOrmDocumentRecordStore },
      ],
      exports: [TypeOrmModule, DocumentRecordStore],
    };
  }
}
