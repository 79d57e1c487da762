// ── Entities ────────────────────────────────────────────────
export { Document } from './entities/document.entity';

// ── Enums ───────────────────────────────────────────────────
export {
  DocumentStatus,
  TERMINAL_DOCUMENT_STATUSES,
  isTerminalStatus,
} from './enums/document-status.enum';

// ── Record store ────────────────────────────────────────────
export { DocumentRecordStore } from './stores/document-record.store';
export { TypeOrmDocumentRecordStore } from './stores/typeorm-document-record.store';
export {
  DocumentRecordChanges,
  EXTRACTION_COLUMNS,
} from './stores/document-record-changes';
export { assertChangesAllowed } from './stores/document-record.guard';

// ── Errors ──────────────────────────────────────────────────
export {
  DocumentRecordNotFoundError,
  InvalidRecordTransitionError,
} from './errors/document-record.errors';

// ── Module ──────────────────────────────────────────────────
export { DatabaseModule } from './database.module';
