import { Document, DocumentStatus } from '@invoice-intake/database';

export class ParsedFieldsDto {
  vendor!: string | null;
  invoiceNo!: string | null;
  date!: string | null;
  total!: string | null;
}

/**
 * Public shape of a document record.
 *
 * A FAILED document has the same shape as a SUCCESS one with all-null
 * `parsed` fields; clients must read `status` to tell them apart.
 */
export class DocumentResponseDto {
  id!: string;
  filename!: string | null;
  rawText!: string;
  parsed!: ParsedFieldsDto;
  jobId!: string | null;
  status!: DocumentStatus;
  /** ISO timestamp */
  createdAt!: string;
  /** ISO timestamp */
  updatedAt!: string;

  static fromRecord(record: Document): DocumentResponseDto {
    return {
      id: record.id,
      filename: record.filename,
      rawText: record.rawText,
      parsed: {
        vendor: record.vendor,
        invoiceNo: record.invoiceNo,
        date: record.invoiceDate,
        total: record.total,
      },
      jobId: record.jobId,
      status: record.status,
      createdAt: record.createdAt.toISOString(),
      updatedAt: record.updatedAt.toISOString(),
    };
  }
}
