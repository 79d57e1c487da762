import { DataSource } from 'typeorm';
import { Document } from '../entities/document.entity';
import { DocumentStatus } from '../enums/document-status.enum';
import {
  DocumentRecordNotFoundError,
  InvalidRecordTransitionError,
} from '../errors/document-record.errors';
import { TypeOrmDocumentRecordStore } from './typeorm-document-record.store';

function pendingRecord(): Document {
  return Object.assign(new Document(), {
    id: 'doc-1',
    filename: 'invoice.txt',
    rawText: '',
    vendor: null,
    invoiceNo: null,
    invoiceDate: null,
    total: null,
    jobId: 'job-1',
    status: DocumentStatus.PENDING,
    createdAt: new Date('2026-01-01T00:00:00Z'),
    updatedAt: new Date('2026-01-01T00:00:00Z'),
  });
}

describe('TypeOrmDocumentRecordStore', () => {
  const manager = {
    findOne: jest.fn(),
    merge: jest.fn(
      (_entity: unknown, target: Document, changes: Partial<Document>) =>
        Object.assign(target, changes),
    ),
    save: jest.fn((_entity: unknown, record: Document) =>
      Promise.resolve(record),
    ),
  };
  const repository = {
    create: jest.fn((fields: Partial<Document>) =>
      Object.assign(new Document(), fields),
    ),
    save: jest.fn((record: Document) =>
      Promise.resolve(Object.assign(record, { id: 'doc-new' })),
    ),
    findOne: jest.fn(),
    find: jest.fn(),
  };
  const dataSource = {
    getRepository: jest.fn(() => repository),
    transaction: jest.fn(
      (work: (entityManager: typeof manager) => Promise<Document>) =>
        work(manager),
    ),
  };

  let store: TypeOrmDocumentRecordStore;

  beforeEach(() => {
    jest.clearAllMocks();
    store = new TypeOrmDocumentRecordStore(
      dataSource as unknown as DataSource,
    );
  });

  describe('createRecord', () => {
    it('saves a PENDING record with empty text and null fields', async () => {
      const created = await store.createRecord('invoice.txt');

      expect(repository.create).toHaveBeenCalledWith({
        filename: 'invoice.txt',
        rawText: '',
        vendor: null,
        invoiceNo: null,
        invoiceDate: null,
        total: null,
        jobId: null,
        status: DocumentStatus.PENDING,
      });
      expect(created.id).toBe('doc-new');
    });
  });

  describe('updateRecord', () => {
    it('locks the row and saves the merged record inside one transaction', async () => {
      manager.findOne.mockResolvedValue(pendingRecord());

      const updated = await store.updateRecord('doc-1', {
        rawText: 'Vendor: Acme',
        vendor: 'Acme',
        invoiceNo: null,
        invoiceDate: null,
        total: null,
        status: DocumentStatus.SUCCESS,
      });

      expect(dataSource.transaction).toHaveBeenCalledTimes(1);
      expect(manager.findOne).toHaveBeenCalledWith(Document, {
        where: { id: 'doc-1' },
        lock: { mode: 'pessimistic_write' },
      });
      expect(manager.save).toHaveBeenCalledTimes(1);
      expect(updated).toMatchObject({
        rawText: 'Vendor: Acme',
        vendor: 'Acme',
        status: DocumentStatus.SUCCESS,
      });
    });

    it('throws DocumentRecordNotFoundError for a missing row', async () => {
      manager.findOne.mockResolvedValue(null);

      await expect(
        store.updateRecord('doc-1', { status: DocumentStatus.FAILED }),
      ).rejects.toBeInstanceOf(DocumentRecordNotFoundError);
      expect(manager.save).not.toHaveBeenCalled();
    });

    it('does not save when the transition is refused', async () => {
      manager.findOne.mockResolvedValue(
        Object.assign(pendingRecord(), { status: DocumentStatus.FAILED }),
      );

      await expect(
        store.updateRecord('doc-1', { status: DocumentStatus.FAILED }),
      ).rejects.toBeInstanceOf(InvalidRecordTransitionError);
      expect(manager.save).not.toHaveBeenCalled();
    });
  });

  describe('queries', () => {
    it('looks a record up by id', async () => {
      repository.findOne.mockResolvedValue(null);

      await expect(store.getRecord('doc-1')).resolves.toBeNull();
      expect(repository.findOne).toHaveBeenCalledWith({
        where: { id: 'doc-1' },
      });
    });

    it('pages records in creation order', async () => {
      repository.find.mockResolvedValue([]);

      await store.listRecords(20, 10);

      expect(repository.find).toHaveBeenCalledWith({
        order: { createdAt: 'ASC', id: 'ASC' },
        skip: 20,
        take: 10,
      });
    });
  });
});
