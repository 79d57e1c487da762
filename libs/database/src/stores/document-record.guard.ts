import { Document } from '../entities/document.entity';
import {
  DocumentStatus,
  isTerminalStatus,
} from '../enums/document-status.enum';
import { InvalidRecordTransitionError } from '../errors/document-record.errors';
import {
  DocumentRecordChanges,
  EXTRACTION_COLUMNS,
} from './document-record-changes';

/**
 * Validates a change set against the current record state.
 *
 * Shared by every DocumentRecordStore implementation and called inside the
 * same transaction (or critical section) that applies the changes.
 *
 * @throws InvalidRecordTransitionError when the change set is refused
 */
export function assertChangesAllowed(
  record: Pick<Document, 'id' | 'status' | 'jobId'>,
  changes: DocumentRecordChanges,
): void {
  const refuse = (reason: string): never => {
    throw new InvalidRecordTransitionError(record.id, reason);
  };

  if (isTerminalStatus(record.status)) {
    refuse(`record is already ${record.status}`);
  }

  if (changes.jobId !== undefined) {
    if (record.jobId !== null) {
      refuse(`job id is already set to ${record.jobId}`);
    }
    if (!changes.jobId) {
      refuse('job id must be a non-empty string');
    }
  }

  if (changes.status !== undefined && !isTerminalStatus(changes.status)) {
    refuse(`cannot transition to ${changes.status}`);
  }

  const writesExtraction = EXTRACTION_COLUMNS.some(
    (column) => changes[column] !== undefined,
  );
  if (writesExtraction && changes.status !== DocumentStatus.SUCCESS) {
    refuse('raw text and parsed fields are only written on SUCCESS');
  }

  if (changes.status === DocumentStatus.SUCCESS && !changes.rawText) {
    refuse('SUCCESS requires non-empty raw text');
  }
}
