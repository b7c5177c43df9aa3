import type { Migration } from './types.ts';

export const migration0001CreateExtractedDocumentText: Migration = {
  name: '0001-create-extracted-document-text',
  up: async (db) => {
    await db.schema
      .createTable('extracted_document_text')
      .ifNotExists()
      .addColumn('document_id', 'text', (column) => column.primaryKey())
      .addColumn('patient_id', 'text', (column) => column.notNull())
      .addColumn('source_bucket', 'text', (column) => column.notNull())
      .addColumn('source_key', 'text', (column) => column.notNull())
      .addColumn('source_revision', 'text')
      .addColumn('document_type', 'text', (column) => column.notNull())
      .addColumn('document_date', 'text', (column) => column.notNull())
      .addColumn('content_type', 'text', (column) => column.notNull())
      .addColumn('extracted_text', 'text', (column) => column.notNull())
      .addColumn('text_length', 'integer', (column) => column.notNull())
      .addColumn('content_hash', 'text', (column) => column.notNull())
      .addColumn('extraction_timestamp', 'text', (column) => column.notNull())
      .addColumn('extraction_method', 'text', (column) => column.notNull())
      .addColumn('extraction_version', 'integer', (column) => column.notNull())
      .addColumn('extractor_name', 'text', (column) => column.notNull())
      .addColumn('extraction_success', 'integer', (column) => column.notNull())
      .addColumn('extraction_error', 'text')
      .execute();

    await db.schema
      .createIndex('idx_extracted_document_text_patient')
      .ifNotExists()
      .on('extracted_document_text')
      .columns(['patient_id', 'document_date'])
      .execute();
  },
};
