import { Injectable, Logger } from '@nestjs/common';
import { open, stat } from 'fs/promises';
import { TextDecoder } from 'util';
import { DocumentRecordStore, DocumentStatus } from '@invoice-intake/database';
import { extract } from '@invoice-intake/extraction';
import { ExtractionOutcome } from './interfaces/extraction-outcome.interface';
import { DocumentProcessingError } from './document-processing.errors';

// A leading BOM is kept as U+FEFF in the stored text
const strictDecoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
const lenientDecoder = new TextDecoder('utf-8', { ignoreBOM: true });

/**
 * DocumentProcessingService: drives one document record from PENDING to a
 * terminal status.
 *
 * Pipeline for process(documentId, filePath):
 *   1. Load the record              : missing → `not_found`, no writes
 *   2. Check the uploaded file      : missing → FAILED, `file_not_found`
 *   3. Read and decode the bytes    : strict UTF-8, lossy fallback
 *   4. Extract fields               : synchronous, pattern based
 *   5. Persist text + fields        : one updateRecord(SUCCESS) call
 *
 * A failure in steps 3–5 marks the record FAILED (best effort) and is
 * rethrown as DocumentProcessingError. Each record is processed once;
 * retries are not attempted.
 */
@Injectable()
export class DocumentProcessingService {
  private readonly logger = new Logger(DocumentProcessingService.name);

  constructor(private readonly records: DocumentRecordStore) {}

  async process(
    documentId: string,
    filePath: string,
  ): Promise<ExtractionOutcome> {
    const record = await this.records.getRecord(documentId);
    if (!record) {
      this.logger.warn(`Document ${documentId} not found; nothing to process`);
      return { kind: 'not_found', documentId };
    }

    if (!(await this.isRegularFile(filePath))) {
      this.logger.warn(
        `File for document ${documentId} not found at "${filePath}"`,
      );
      await this.markFailedOrThrow(documentId);
      return { kind: 'file_not_found', documentId, filePath };
    }

    try {
      const text = this.decode(documentId, await this.readAll(filePath));

      if (text.length === 0) {
        this.logger.warn(`Document ${documentId} has no text content`);
        await this.markFailedOrThrow(documentId);
        return { kind: 'empty_document', documentId };
      }

      const fields = extract(text);

      await this.records.updateRecord(documentId, {
        rawText: text,
        vendor: fields.vendor,
        invoiceNo: fields.invoiceNo,
        invoiceDate: fields.date,
        total: fields.total,
        status: DocumentStatus.SUCCESS,
      });

      this.logger.log(`Document ${documentId} processed successfully`);
      return { kind: 'success', documentId, fields };
    } catch (error) {
      if (error instanceof DocumentProcessingError) {
        throw error;
      }

      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Processing of document ${documentId} failed: ${message}`);

      await this.records
        .updateRecord(documentId, { status: DocumentStatus.FAILED })
        .catch((writeError: unknown) => {
          const writeMessage =
            writeError instanceof Error ? writeError.message : String(writeError);
          this.logger.error(
            `CRITICAL: failed to persist FAILED status for document ${documentId}: ${writeMessage}`,
          );
        });

      throw new DocumentProcessingError(
        documentId,
        `Processing of document ${documentId} failed: ${message}`,
        { cause: error },
      );
    }
  }

  // ── File helpers ─────────────────────────────────────────

  private async isRegularFile(filePath: string): Promise<boolean> {
    try {
      return (await stat(filePath)).isFile();
    } catch {
      return false;
    }
  }

  private async readAll(filePath: string): Promise<Buffer> {
    const handle = await open(filePath, 'r');
    try {
      return await handle.readFile();
    } finally {
      await handle.close();
    }
  }

  /** Strict UTF-8; invalid sequences fall back to U+FFFD replacement */
  private decode(documentId: string, bytes: Buffer): string {
    try {
      return strictDecoder.decode(bytes);
    } catch {
      this.logger.debug(
        `Document ${documentId} is not valid UTF-8; decoding with replacement characters`,
      );
      return lenientDecoder.decode(bytes);
    }
  }

  /** Status-only FAILED write for outcomes that are not exceptions */
  private async markFailedOrThrow(documentId: string): Promise<void> {
    try {
      await this.records.updateRecord(documentId, {
        status: DocumentStatus.FAILED,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new DocumentProcessingError(
        documentId,
        `Could not mark document ${documentId} FAILED: ${message}`,
        { cause: error },
      );
    }
  }
}
