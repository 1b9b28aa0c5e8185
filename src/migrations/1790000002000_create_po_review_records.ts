import type { MigrationBuilder } from 'node-pg-migrate';

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('po_review_records', {
    id: { type: 'uuid', primaryKey: true },
    created_at: { type: 'timestamptz', notNull: true, default: pgm.func('now()') },
    aggregate_doc_number: { type: 'text', notNull: true },
    breakdown_doc_number: { type: 'text' },
    summary: { type: 'jsonb', notNull: true },
    mismatch_count: { type: 'integer', notNull: true, default: 0 },
    warning_count: { type: 'integer', notNull: true, default: 0 }
  });

  pgm.createIndex('po_review_records', 'created_at', { name: 'idx_po_review_records_created_at' });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  pgm.dropTable('po_review_records');
}
