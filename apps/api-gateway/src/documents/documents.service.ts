import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Document, DocumentRecordStore } from '@invoice-intake/database';
import { WorkDispatcher } from '@invoice-intake/queue';
import { StorageService } from '../storage/storage.service';
import { DocumentResponseDto } from './dto/document-response.dto';
import { UploadDocumentResponseDto } from './dto/upload-document-response.dto';
import {
  DocumentCreationException,
  DocumentNotFoundException,
  FileTooLargeException,
  JobDispatchException,
  MissingFileException,
} from './exceptions/document.exceptions';

const BYTES_PER_MB = 1024 * 1024;
const DEFAULT_MAX_FILE_SIZE_MB = 20;

/** The parts of a Multer file this service reads */
export interface UploadedDocumentFile {
  buffer: Buffer;
  originalname: string;
  size: number;
}

/**
 * DocumentsService: upload flow and read access to document records.
 *
 * Upload happy path:
 *   1. Validate file (presence, non-empty, size)
 *   2. Write the bytes to the storage directory
 *   3. Create the PENDING record (committed on return)
 *   4. Allocate a job id and store it on the record
 *   5. Submit (documentId, filePath) to the work dispatcher
 *
 * The job id is written before submission so a worker can never finish a
 * job whose record does not yet reference it.
 *
 * Failure invariants:
 *   - Storage write fails     → 500, no record created
 *   - Record write fails      → 500, stored file is orphaned
 *   - Dispatch fails          → 503, record stays PENDING with its job id
 */
@Injectable()
export class DocumentsService {
  private readonly logger = new Logger(DocumentsService.name);
  private readonly maxFileSizeBytes: number;

  constructor(
    private readonly records: DocumentRecordStore,
    private readonly dispatcher: WorkDispatcher,
    private readonly storageService: StorageService,
    private readonly configService: ConfigService,
  ) {
    const maxFileSizeMb = Number(
      this.configService.get<number>(
        'UPLOAD_MAX_FILE_SIZE_MB',
        DEFAULT_MAX_FILE_SIZE_MB,
      ),
    );
    this.maxFileSizeBytes = maxFileSizeMb * BYTES_PER_MB;
  }

  async uploadDocument(
    file: UploadedDocumentFile | undefined,
  ): Promise<UploadDocumentResponseDto> {
    // ── Step 1: Validate file ──────────────────────────────
    const validatedFile = this.validateFile(file);

    // ── Step 2: Store bytes ────────────────────────────────
    const filePath = await this.storageService.saveFile(
      validatedFile.buffer,
      validatedFile.originalname,
    );

    // ── Steps 3–4: Record + job id ─────────────────────────
    const jobId = this.dispatcher.allocateJobId();
    const document = await this.createRecordWithJobId(
      validatedFile.originalname || null,
      jobId,
    );

    // ── Step 5: Dispatch ───────────────────────────────────
    try {
      await this.dispatcher.submit({
        jobId,
        documentId: document.id,
        filePath,
      });
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      this.logger.warn(
        `Dispatch failed for document ${document.id} (job ${jobId}): ${cause.message}`,
      );
      throw new JobDispatchException(document.id, cause);
    }

    this.logger.log(`Document ${document.id} queued as job ${jobId}`);
    return { documentId: document.id, jobId, status: document.status };
  }

  async getDocument(documentId: string): Promise<DocumentResponseDto> {
    const record = await this.records.getRecord(documentId);
    if (!record) {
      throw new DocumentNotFoundException(documentId);
    }
    return DocumentResponseDto.fromRecord(record);
  }

  async listDocuments(skip: number, limit: number): Promise<DocumentResponseDto[]> {
    const records = await this.records.listRecords(skip, limit);
    return records.map((record) => DocumentResponseDto.fromRecord(record));
  }

  // ── Private methods ──────────────────────────────────────

  private validateFile(
    file: UploadedDocumentFile | undefined,
  ): UploadedDocumentFile {
    if (!file || !file.buffer || file.size === 0) {
      throw new MissingFileException();
    }

    if (file.size > this.maxFileSizeBytes) {
      throw new FileTooLargeException(this.maxFileSizeBytes / BYTES_PER_MB);
    }

    return file;
  }

  private async createRecordWithJobId(
    filename: string | null,
    jobId: string,
  ): Promise<Document> {
    try {
      const created = await this.records.createRecord(filename);
      return await this.records.updateRecord(created.id, { jobId });
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`Failed to create document record: ${cause.message}`);
      throw new DocumentCreationException(cause);
    }
  }
}
