import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';
import { DocumentStatus } from '../enums/document-status.enum';

/**
 * Document entity: one uploaded file and its extraction outcome.
 *
 * Invariants:
 * - Created PENDING with empty raw_text and null parsed fields
 * - Transitions exactly once, to SUCCESS or FAILED, and is never mutated after
 * - SUCCESS carries non-empty raw_text; the four parsed columns are written
 *   in the same transaction as the status
 * - FAILED keeps raw_text empty and parsed columns null
 * - job_id is written at most once, before the job is submitted
 */
@Entity('documents')
@Index('IDX_documents_created_at', ['createdAt', 'id'])
export class Document {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 512, nullable: true })
  filename!: string | null;

  @Column({ type: 'text', name: 'raw_text', default: '' })
  rawText!: string;

  @Column({ type: 'varchar', name: 'parsed_vendor', nullable: true })
  vendor!: string | null;

  @Column({ type: 'varchar', name: 'parsed_invoice_no', nullable: true })
  invoiceNo!: string | null;

  @Column({ type: 'varchar', name: 'parsed_date', nullable: true })
  invoiceDate!: string | null;

  @Column({ type: 'varchar', name: 'parsed_total', nullable: true })
  total!: string | null;

  @Index('IDX_documents_job_id')
  @Column({ type: 'varchar', length: 64, name: 'job_id', nullable: true })
  jobId!: string | null;

  @Column({
    type: 'enum',
    enum: DocumentStatus,
    default: DocumentStatus.PENDING,
  })
  status!: DocumentStatus;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz', name: 'updated_at' })
  updatedAt!: Date;
}
