import { migration0001CreateExtractedDocumentText } from './0001-create-extracted-document-text.ts';
import { migration0002AddContentHashIndex } from './0002-add-content-hash-index.ts';
import { migration0003AddDocumentTypeIndex } from './0003-add-document-type-index.ts';
import type { Migration } from './types.ts';

export const migrations: Migration[] = [
  migration0001CreateExtractedDocumentText,
  migration0002AddContentHashIndex,
  migration0003AddDocumentTypeIndex,
];
