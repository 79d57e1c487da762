import { MigrationInterface, QueryRunner } from 'typeorm';

/**
 * Initial schema migration: creates the documents table.
 *
 * Hand-written to match the Document entity, since migration:generate
 * requires a running database connection. The SQL is PostgreSQL-specific
 * (uuid_generate_v4, timestamptz, CREATE TYPE).
 */
export class InitialSchema1760780000000 implements MigrationInterface {
  name = 'InitialSchema1760780000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    // ── Enable UUID extension ──────────────────────────────
    await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "uuid-ossp"`);

    // ── Create enum types ──────────────────────────────────
    await queryRunner.query(
      `CREATE TYPE "documents_status_enum" AS ENUM ('PENDING', 'SUCCESS', 'FAILED')`,
    );

    // ── Documents table ────────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "documents" (
        "id"                uuid NOT NULL DEFAULT uuid_generate_v4(),
        "filename"          varchar(512),
        "raw_text"          text NOT NULL DEFAULT '',
        "parsed_vendor"     varchar,
        "parsed_invoice_no" varchar,
        "parsed_date"       varchar,
        "parsed_total"      varchar,
        "job_id"            varchar(64),
        "status"            "documents_status_enum" NOT NULL DEFAULT 'PENDING',
        "created_at"        TIMESTAMPTZ NOT NULL DEFAULT now(),
        "updated_at"        TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_documents" PRIMARY KEY ("id")
      )
    `);

    await queryRunner.query(
      `CREATE INDEX "IDX_documents_job_id" ON "documents" ("job_id")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_documents_created_at" ON "documents" ("created_at", "id")`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS "documents"`);
    await queryRunner.query(`DROP TYPE IF EXISTS "documents_status_enum"`);
    await queryRunner.query(`DROP EXTENSION IF EXISTS "uuid-ossp"`);
  }
}
