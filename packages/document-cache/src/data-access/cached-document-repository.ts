import type { CacheStats, CachedDocument } from '@clinical/api';
import type { DbClient, ExtractedDocumentTextTable } from '@clinical/db';

type CachedDocumentRow = ExtractedDocumentTextTable;

const mapCachedDocumentRow = (row: CachedDocumentRow): CachedDocument => ({
  documentId: row.document_id,
  patientId: row.patient_id,
  sourceLocation: {
    bucket: row.source_bucket,
    key: row.source_key,
    revision: row.source_revision,
  },
  documentType: row.document_type,
  documentDate: row.document_date,
  contentType: row.content_type,
  extractedText: row.extracted_text,
  textLength: row.text_length,
  contentHash: row.content_hash,
  extractionTimestamp: row.extraction_timestamp,
  extractionMethod: row.extraction_method,
  extractionVersion: row.extraction_version,
  extractorName: row.extractor_name,
  extractionSuccess: row.extraction_success === 1,
  extractionError: row.extraction_error,
});

const toCachedDocumentRow = (document: CachedDocument): CachedDocumentRow => ({
  document_id: document.documentId,
  patient_id: document.patientId,
  source_bucket: document.sourceLocation.bucket,
  source_key: document.sourceLocation.key,
  source_revision: document.sourceLocation.revision,
  document_type: document.documentType,
  document_date: document.documentDate,
  content_type: document.contentType,
  extracted_text: document.extractedText,
  text_length: document.textLength,
  content_hash: document.contentHash,
  extraction_timestamp: document.extractionTimestamp,
  extraction_method: document.extractionMethod,
  extraction_version: document.extractionVersion,
  extractor_name: document.extractorName,
  extraction_success: document.extractionSuccess ? 1 : 0,
  extraction_error: document.extractionError,
});

export const findCachedDocument = async (
  db: DbClient,
  documentId: string,
): Promise<CachedDocument | null> => {
  const row = await db
    .selectFrom('extracted_document_text')
    .selectAll()
    .where('document_id', '=', documentId)
    .executeTakeFirst();

  return row ? mapCachedDocumentRow(row) : null;
};

export const cachedDocumentExists = async (db: DbClient, documentId: string): Promise<boolean> => {
  const row = await db
    .selectFrom('extracted_document_text')
    .select('document_id')
    .where('document_id', '=', documentId)
    .executeTakeFirst();

  return row !== undefined;
};

/** Whole-record replacement: every column is rewritten on conflict. */
export const upsertCachedDocument = async (
  db: DbClient,
  document: CachedDocument,
): Promise<void> => {
  const row = toCachedDocumentRow(document);
  const { document_id: _key, ...columns } = row;

  await db
    .insertInto('extracted_document_text')
    .values(row)
    .onConflict((conflict) => conflict.column('document_id').doUpdateSet(columns))
    .executeTakeFirst();
};

export interface ListCachedDocumentsFilter {
  documentType?: string;
  successfulOnly?: boolean;
}

export const listCachedDocumentsByPatient = async (
  db: DbClient,
  patientId: string,
  filter: ListCachedDocumentsFilter = {},
): Promise<CachedDocument[]> => {
  let query = db
    .selectFrom('extracted_document_text')
    .selectAll()
    .where('patient_id', '=', patientId);

  if (filter.documentType !== undefined) {
    query = query.where('document_type', '=', filter.documentType);
  }

  if (filter.successfulOnly) {
    query = query.where('extraction_success', '=', 1);
  }

  const rows = await query.orderBy('document_date', 'asc').orderBy('document_id', 'asc').execute();
  return rows.map(mapCachedDocumentRow);
};

export const listCachedDocumentsByContentHash = async (
  db: DbClient,
  contentHash: string,
): Promise<CachedDocument[]> => {
  const rows = await db
    .selectFrom('extracted_document_text')
    .selectAll()
    .where('content_hash', '=', contentHash)
    .orderBy('document_id', 'asc')
    .execute();

  return rows.map(mapCachedDocumentRow);
};

export const deleteCachedDocumentsByPatient = async (
  db: DbClient,
  patientId: string,
): Promise<number> => {
  const result = await db
    .deleteFrom('extracted_document_text')
    .where('patient_id', '=', patientId)
    .executeTakeFirst();

  return Number(result.numDeletedRows);
};

const countBy = async (
  db: DbClient,
  patientId: string,
  column: 'document_type' | 'content_type',
): Promise<Record<string, number>> => {
  const rows = await db
    .selectFrom('extracted_document_text')
    .select((expressionBuilder) => [
      expressionBuilder.ref(column).as('key'),
      expressionBuilder.fn.countAll<number>().as('count'),
    ])
    .where('patient_id', '=', patientId)
    .groupBy(column)
    .orderBy('key')
    .execute();

  const counts: Record<string, number> = {};
  for (const row of rows) {
    counts[row.key] = Number(row.count);
  }
  return counts;
};

export const summarizeCachedDocuments = async (
  db: DbClient,
  patientId: string,
): Promise<CacheStats> => {
  const totals = await db
    .selectFrom('extracted_document_text')
    .select((expressionBuilder) => [
      expressionBuilder.fn.countAll<number>().as('total'),
      expressionBuilder.fn.sum<number | null>('extraction_success').as('succeeded'),
      expressionBuilder.fn.sum<number | null>('text_length').as('characters'),
    ])
    .where('patient_id', '=', patientId)
    .executeTakeFirstOrThrow();

  const total = Number(totals.total);
  const succeeded = Number(totals.succeeded ?? 0);

  return {
    total,
    successRate: total === 0 ? 0 : succeeded / total,
    charTotal: Number(totals.characters ?? 0),
    byDocumentType: await countBy(db, patientId, 'document_type'),
    byContentType: await countBy(db, patientId, 'content_type'),
  };
};
