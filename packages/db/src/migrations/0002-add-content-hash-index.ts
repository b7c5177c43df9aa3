import type { Migration } from './types.ts';

export const migration0002AddContentHashIndex: Migration = {
  name: '0002-add-content-hash-index',
  up: async (db) => {
    await db.schema
      .createIndex('idx_extracted_document_text_hash')
      .ifNotExists()
      .on('extracted_document_text')
      .column('content_hash')
      .execute();
  },
};
