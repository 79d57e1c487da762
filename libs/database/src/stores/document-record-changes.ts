import { Document } from '../entities/document.entity';

/** Columns a caller may change after the record is created */
export type DocumentRecordChanges = Partial<
  Pick<
    Document,
    'rawText' | 'vendor' | 'invoiceNo' | 'invoiceDate' | 'total' | 'jobId' | 'status'
  >
>;

/** Columns that may only be written together with the SUCCESS transition */
export const EXTRACTION_COLUMNS = [
  'rawText',
  'vendor',
  'invoiceNo',
  'invoiceDate',
  'total',
] as const satisfies ReadonlyArray<keyof DocumentRecordChanges>;
