import { ConfigService } from '@nestjs/config';
import { DocumentStatus } from '@invoice-intake/database';
import { InMemoryDocumentRecordStore } from '@invoice-intake/database/testing';
import { InMemoryWorkDispatcher } from '@invoice-intake/queue/testing';
import { StorageService } from '../storage/storage.service';
import { StorageWriteException } from '../storage/storage.exceptions';
import { DocumentsService } from './documents.service';
import {
  DocumentCreationException,
  DocumentNotFoundException,
  FileTooLargeException,
  JobDispatchException,
  MissingFileException,
} from './exceptions/document.exceptions';

const STORED_PATH = '/data/uploads/0000-invoice.txt';

function upload(content: string, originalname = 'invoice.txt') {
  const buffer = Buffer.from(content);
  return { buffer, originalname, size: buffer.length };
}

describe('DocumentsService', () => {
  let store: InMemoryDocumentRecordStore;
  let dispatcher: InMemoryWorkDispatcher;
  const storage = { saveFile: jest.fn() };
  let service: DocumentsService;

  beforeEach(() => {
    jest.clearAllMocks();
    storage.saveFile.mockResolvedValue(STORED_PATH);
    store = new InMemoryDocumentRecordStore();
    dispatcher = new InMemoryWorkDispatcher();
    service = new DocumentsService(
      store,
      dispatcher,
      storage as unknown as StorageService,
      new ConfigService({ UPLOAD_MAX_FILE_SIZE_MB: 1 }),
    );
  });

  describe('uploadDocument', () => {
    it('stores the file, creates a PENDING record and submits its job', async () => {
      const response = await service.uploadDocument(upload('Total: $1.00'));

      expect(storage.saveFile).toHaveBeenCalledWith(
        Buffer.from('Total: $1.00'),
        'invoice.txt',
      );
      expect(response.status).toBe(DocumentStatus.PENDING);
      expect(dispatcher.submitted).toEqual([
        {
          jobId: response.jobId,
          documentId: response.documentId,
          filePath: STORED_PATH,
        },
      ]);
      expect(await store.getRecord(response.documentId)).toMatchObject({
        filename: 'invoice.txt',
        jobId: response.jobId,
        status: DocumentStatus.PENDING,
        rawText: '',
      });
    });

    it('stores the job id on the record before submitting', async () => {
      const seenAtSubmit: Array<string | null | undefined> = [];
      const submit = dispatcher.submit.bind(dispatcher);
      jest.spyOn(dispatcher, 'submit').mockImplementation(async (request) => {
        seenAtSubmit.push((await store.getRecord(request.documentId))?.jobId);
        return submit(request);
      });

      const response = await service.uploadDocument(upload('Total: $1.00'));

      expect(seenAtSubmit).toEqual([response.jobId]);
    });

    it('rejects a missing file', async () => {
      await expect(service.uploadDocument(undefined)).rejects.toBeInstanceOf(
        MissingFileException,
      );
      expect(storage.saveFile).not.toHaveBeenCalled();
    });

    it('rejects an empty file', async () => {
      await expect(service.uploadDocument(upload(''))).rejects.toBeInstanceOf(
        MissingFileException,
      );
    });

    it('rejects a file above the size limit', async () => {
      const buffer = Buffer.alloc(1024 * 1024 + 1, 'a');

      await expect(
        service.uploadDocument({ buffer, originalname: 'big.txt', size: buffer.length }),
      ).rejects.toBeInstanceOf(FileTooLargeException);
      expect(store.size).toBe(0);
    });

    it('creates no record when the file cannot be stored', async () => {
      storage.saveFile.mockRejectedValue(
        new StorageWriteException('invoice.txt', new Error('EACCES')),
      );

      await expect(service.uploadDocument(upload('x'))).rejects.toBeInstanceOf(
        StorageWriteException,
      );
      expect(store.size).toBe(0);
      expect(dispatcher.submitted).toEqual([]);
    });

    it('maps record store failures to DocumentCreationException', async () => {
      jest.spyOn(store, 'createRecord').mockRejectedValue(new Error('db down'));

      await expect(service.uploadDocument(upload('x'))).rejects.toBeInstanceOf(
        DocumentCreationException,
      );
      expect(dispatcher.submitted).toEqual([]);
    });

    it('leaves the record PENDING with its job id when dispatch fails', async () => {
      dispatcher.submitError = new Error('redis down');

      await expect(service.uploadDocument(upload('x'))).rejects.toBeInstanceOf(
        JobDispatchException,
      );

      const [record] = await store.listRecords(0, 10);
      expect(record.status).toBe(DocumentStatus.PENDING);
      expect(record.jobId).toEqual(expect.any(String));
    });
  });

  describe('queries', () => {
    it('maps a record to the public document shape', async () => {
      const created = await store.createRecord('invoice.txt');
      await store.updateRecord(created.id, { jobId: 'job-1' });
      await store.updateRecord(created.id, {
        rawText: 'Vendor: Acme Ltd',
        vendor: 'Acme Ltd',
        invoiceNo: null,
        invoiceDate: null,
        total: null,
        status: DocumentStatus.SUCCESS,
      });

      const document = await service.getDocument(created.id);

      expect(document).toEqual({
        id: created.id,
        filename: 'invoice.txt',
        rawText: 'Vendor: Acme Ltd',
        parsed: { vendor: 'Acme Ltd', invoiceNo: null, date: null, total: null },
        jobId: 'job-1',
        status: DocumentStatus.SUCCESS,
        createdAt: created.createdAt.toISOString(),
        updatedAt: expect.any(String),
      });
    });

    it('throws DocumentNotFoundException for an unknown id', async () => {
      await expect(service.getDocument('missing')).rejects.toBeInstanceOf(
        DocumentNotFoundException,
      );
    });

    it('lists records page by page', async () => {
      const first = await store.createRecord('a.txt');
      const second = await store.createRecord('b.txt');

      const page = await service.listDocuments(1, 10);

      expect(page.map((document) => document.id)).toEqual([second.id]);
      expect((await service.listDocuments(0, 1))[0].id).toBe(first.id);
    });
  });
});
