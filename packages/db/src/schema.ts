export interface MigrationsTable {
  name: string;
  applied_at: string;
}

export interface ExtractedDocumentTextTable {
  document_id: string;
  patient_id: string;
  source_bucket: string;
  source_key: string;
  source_revision: string | null;
  document_type: string;
  document_date: string;
  content_type: string;
  extracted_text: string;
  text_length: number;
  content_hash: string;
  extraction_timestamp: string;
  extraction_method: string;
  extraction_version: number;
  extractor_name: string;
  // SQLite has no boolean column type: 1 for success, 0 for a recorded failure.
  extraction_success: number;
  extraction_error: string | null;
}

export interface Database {
  _migrations: MigrationsTable;
  extracted_document_text: ExtractedDocumentTextTable;
}
