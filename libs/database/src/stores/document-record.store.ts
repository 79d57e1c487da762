import { Document } from '../entities/document.entity';
import { DocumentRecordChanges } from './document-record-changes';

/**
 * DocumentRecordStore: CRUD contract over document records.
 *
 * Declared as an abstract class so it doubles as the Nest injection token:
 * consumers inject `DocumentRecordStore` and receive whichever
 * implementation the module binds (TypeORM in the apps, in-memory in tests).
 */
export abstract class DocumentRecordStore {
  /** Creates a PENDING record with empty text; committed when the promise resolves */
  abstract createRecord(filename: string | null): Promise<Document>;

  abstract getRecord(id: string): Promise<Document | null>;

  /**
   * Applies every change in `changes` atomically: a concurrent reader sees
   * the record either entirely before or entirely after the update.
   *
   * @throws DocumentRecordNotFoundError when no record has this id
   * @throws InvalidRecordTransitionError when the lifecycle forbids the change
   */
  abstract updateRecord(
    id: string,
    changes: DocumentRecordChanges,
  ): Promise<Document>;

  /** Records ordered by creation time, oldest first */
  abstract listRecords(offset: number, limit: number): Promise<Document[]>;
}
