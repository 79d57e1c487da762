import { Injectable, Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { Document } from '../entities/document.entity';
import { DocumentStatus } from '../enums/document-status.enum';
import { DocumentRecordNotFoundError } from '../errors/document-record.errors';
import { DocumentRecordChanges } from './document-record-changes';
import { assertChangesAllowed } from './document-record.guard';
import { DocumentRecordStore } from './document-record.store';

/**
 * PostgreSQL-backed DocumentRecordStore.
 *
 * updateRecord() reads the row with SELECT … FOR UPDATE, validates the
 * change set and saves it inside one transaction, so the multi-column
 * terminal write is never observable half-applied and two writers cannot
 * both pass the transition guard.
 */
@Injectable()
export class TypeOrmDocumentRecordStore extends DocumentRecordStore {
  private readonly logger = new Logger(TypeOrmDocumentRecordStore.name);

  constructor(private readonly dataSource: DataSource) {
    super();
  }

  async createRecord(filename: string | null): Promise<Document> {
    const repository = this.dataSource.getRepository(Document);
    const record = repository.create({
      filename,
      rawText: '',
      vendor: null,
      invoiceNo: null,
      invoiceDate: null,
      total: null,
      jobId: null,
      status: DocumentStatus.PENDING,
    });

    const saved = await repository.save(record);
    this.logger.debug(`Created document record ${saved.id}`);
    return saved;
  }

  getRecord(id: string): Promise<Document | null> {
    return this.dataSource.getRepository(Document).findOne({ where: { id } });
  }

  async updateRecord(
    id: string,
    changes: DocumentRecordChanges,
  ): Promise<Document> {
    return this.dataSource.transaction(async (manager) => {
      const record = await manager.findOne(Document, {
        where: { id },
        lock: { mode: 'pessimistic_write' },
      });

      if (!record) {
        throw new DocumentRecordNotFoundError(id);
      }

      assertChangesAllowed(record, changes);

      const updated = await manager.save(
        Document,
        manager.merge(Document, record, changes),
      );

      this.logger.debug(
        `Updated document record ${id}: ${Object.keys(changes).join(', ')}`,
      );

      return updated;
    });
  }

  listRecords(offset: number, limit: number): Promise<Document[]> {
    return this.dataSource.getRepository(Document).find({
      order: { createdAt: 'ASC', id: 'ASC' },
      skip: offset,
      take: limit,
    });
  }
}
