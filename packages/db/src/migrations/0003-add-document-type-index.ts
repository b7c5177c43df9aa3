import type { Migration } from './types.ts';

export const migration0003AddDocumentTypeIndex: Migration = {
  name: '0003-add-document-type-index',
  up: async (db) => {
    await db.schema
      .createIndex('idx_extracted_document_text_type')
      .ifNotExists()
      .on('extracted_document_text')
      .columns(['document_type', 'document_date'])
      .execute();
  },
};
