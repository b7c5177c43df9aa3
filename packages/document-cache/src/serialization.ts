import type { CachedDocument } from '@clinical/api';
import { z } from 'zod';

export const EXPORT_FORMAT = 'cached-documents/v1';

const SerializedCachedDocumentZ = z.object({
  document_id: z.string().min(1),
  patient_id: z.string().min(1),
  source_location: z.object({
    bucket: z.string(),
    key: z.string(),
    revision: z.string().nullable(),
  }),
  document_type: z.string(),
  document_date: z.string(),
  content_type: z.string(),
  extracted_text: z.string(),
  text_length: z.number().int().min(0),
  content_hash: z.string().regex(/^[0-9a-f]{64}$/),
  extraction_timestamp: z.string(),
  extraction_method: z.string(),
  extraction_version: z.number().int().min(1),
  extractor_name: z.string(),
  extraction_success: z.boolean(),
  extraction_error: z.string().nullable(),
});

export const CachedDocumentExportZ = z.object({
  format: z.literal(EXPORT_FORMAT),
  patient_id: z.string(),
  exported_at: z.string(),
  document_count: z.number().int().min(0),
  documents: z.array(SerializedCachedDocumentZ),
});

export type SerializedCachedDocument = z.infer<typeof SerializedCachedDocumentZ>;
export type CachedDocumentExport = z.infer<typeof CachedDocumentExportZ>;

export const serializeCachedDocument = (document: CachedDocument): SerializedCachedDocument => ({
  document_id: document.documentId,
  patient_id: document.patientId,
  source_location: {
    bucket: document.sourceLocation.bucket,
    key: document.sourceLocation.key,
    revision: document.sourceLocation.revision,
  },
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
  extraction_success: document.extractionSuccess,
  extraction_error: document.extractionError,
});

export const deserializeCachedDocument = (document: SerializedCachedDocument): CachedDocument => ({
  documentId: document.document_id,
  patientId: document.patient_id,
  sourceLocation: {
    bucket: document.source_location.bucket,
    key: document.source_location.key,
    revision: document.source_location.revision,
  },
  documentType: document.document_type,
  documentDate: document.document_date,
  contentType: document.content_type,
  extractedText: document.extracted_text,
  textLength: document.text_length,
  contentHash: document.content_hash,
  extractionTimestamp: document.extraction_timestamp,
  extractionMethod: document.extraction_method,
  extractionVersion: document.extraction_version,
  extractorName: document.extractor_name,
  extractionSuccess: document.extraction_success,
  extractionError: document.extraction_error,
});

export class InvalidCacheExportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidCacheExportError';
  }
}

export const parseCachedDocumentExport = (serialized: string): CachedDocumentExport => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(serialized);
  } catch (error) {
    throw new InvalidCacheExportError(
      `Cache export is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const result = CachedDocumentExportZ.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const location = issue ? issue.path.join('.') : '';
    throw new InvalidCacheExportError(
      `Cache export is malformed at "${location}": ${issue?.message ?? 'unknown'}`,
    );
  }

  if (result.data.document_count !== result.data.documents.length) {
    throw new InvalidCacheExportError(
      `Cache export declares ${result.data.document_count} documents but contains ${result.data.documents.length}.`,
    );
  }

  return result.data;
};
