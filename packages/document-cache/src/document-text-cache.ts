import {
  type CacheStats,
  type CachedDocument,
  type DocumentDescriptor,
  ExtractionFailure,
  type Logger,
} from '@clinical/api';
import { type DbClient, closeDb, initializeRuntimeDatabase } from '@clinical/db';
import { computeContentHash } from './content-hash.js';
import {
  type ListCachedDocumentsFilter,
  cachedDocumentExists,
  deleteCachedDocumentsByPatient,
  findCachedDocument,
  listCachedDocumentsByContentHash,
  listCachedDocumentsByPatient,
  summarizeCachedDocuments,
  upsertCachedDocument,
} from './data-access/cached-document-repository.js';
import {
  type CachedDocumentExport,
  EXPORT_FORMAT,
  deserializeCachedDocument,
  parseCachedDocumentExport,
  serializeCachedDocument,
} from './serialization.js';
import type { ExtractedText, FetchAndExtract } from './text-extractors.js';

export const DEFAULT_EXTRACTION_VERSION = 1;

export type CacheableDocument = Omit<DocumentDescriptor, 'sourcePriority'>;

export type ExportSink = (chunk: string) => void | Promise<void>;

export interface DocumentTextCacheOptions {
  db: DbClient;
  extractionVersion?: number;
  logger?: Logger;
  now?: () => Date;
}

export interface OpenDocumentTextCacheOptions extends Omit<DocumentTextCacheOptions, 'db'> {
  dbPath: string;
}

interface Flight {
  promise: Promise<CachedDocument>;
  /** True when the flight always extracts afresh at the cache's current version. */
  refresh: boolean;
}

type ExtractionOutcome =
  | { ok: true; extracted: ExtractedText }
  | { ok: false; error: string; extractionMethod: string; extractorName: string };

/** Length in Unicode code points, so text outside the BMP counts one per character. */
export const countCharacters = (text: string): number => [...text].length;

const describeExtractionFailure = (error: unknown): string => {
  if (error instanceof ExtractionFailure) {
    return `${error.code}: ${error.message}`;
  }

  return `UNEXPECTED_ERROR: ${error instanceof Error ? error.message : String(error)}`;
};

/**
 * Durable store of extracted document text, one record per document id.
 *
 * Extraction for an uncached or stale id runs at most once at a time: concurrent callers share
 * the in-flight promise, which settles only after the record (success or failure) is written.
 */
export class DocumentTextCache {
  readonly extractionVersion: number;

  private readonly db: DbClient;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly ownsDb: boolean;
  private readonly inFlight = new Map<string, Flight>();
  private closed = false;

  constructor(options: DocumentTextCacheOptions, ownsDb = false) {
    const extractionVersion = options.extractionVersion ?? DEFAULT_EXTRACTION_VERSION;
    if (!Number.isInteger(extractionVersion) || extractionVersion < 1) {
      throw new Error(`extractionVersion must be a positive integer, got ${extractionVersion}.`);
    }

    this.db = options.db;
    this.extractionVersion = extractionVersion;
    this.logger = options.logger ?? console;
    this.now = options.now ?? (() => new Date());
    this.ownsDb = ownsDb;
  }

  static async open(options: OpenDocumentTextCacheOptions): Promise<DocumentTextCache> {
    const { dbPath, ...rest } = options;
    const db = await initializeRuntimeDatabase({ dbPath });
    return new DocumentTextCache({ ...rest, db }, true);
  }

  async isCached(documentId: string): Promise<boolean> {
    this.assertOpen();
    return cachedDocumentExists(this.db, documentId);
  }

  async get(documentId: string): Promise<CachedDocument | null> {
    this.assertOpen();
    return findCachedDocument(this.db, documentId);
  }

  async getOrExtract(
    document: CacheableDocument,
    fetchAndExtract: FetchAndExtract,
  ): Promise<CachedDocument> {
    this.assertOpen();

    const pending = this.inFlight.get(document.documentId);
    if (pending) {
      return pending.promise;
    }

    return this.startFlight(document.documentId, false, async () => {
      const existing = await findCachedDocument(this.db, document.documentId);
      if (existing && !this.isStale(existing)) {
        return existing;
      }

      if (existing) {
        this.logger.info(
          `Re-extracting ${existing.documentId} (version ${existing.extractionVersion} < ${this.extractionVersion})`,
        );
      }
      return this.extractAndStore(document, fetchAndExtract);
    });
  }

  /**
   * Extracts again even when a current record exists. Callers arriving while a re-extraction of
   * the same id is running share it.
   */
  async reextract(
    document: CacheableDocument,
    fetchAndExtract: FetchAndExtract,
  ): Promise<CachedDocument> {
    this.assertOpen();

    for (
      let pending = this.inFlight.get(document.documentId);
      pending;
      pending = this.inFlight.get(document.documentId)
    ) {
      if (pending.refresh) {
        return pending.promise;
      }
      await Promise.allSettled([pending.promise]);
    }

    return this.startFlight(document.documentId, true, () =>
      this.extractAndStore(document, fetchAndExtract),
    );
  }

  isStale(document: CachedDocument): boolean {
    return document.extractionVersion < this.extractionVersion;
  }

  async put(document: CachedDocument): Promise<void> {
    this.assertOpen();
    await upsertCachedDocument(this.db, document);
  }

  async listByPatient(
    patientId: string,
    filter: ListCachedDocumentsFilter = {},
  ): Promise<CachedDocument[]> {
    this.assertOpen();
    return listCachedDocumentsByPatient(this.db, patientId, filter);
  }

  async findByContentHash(contentHash: string): Promise<CachedDocument[]> {
    this.assertOpen();
    return listCachedDocumentsByContentHash(this.db, contentHash);
  }

  async stats(patientId: string): Promise<CacheStats> {
    this.assertOpen();
    return summarizeCachedDocuments(this.db, patientId);
  }

  async export(patientId: string, sink: ExportSink): Promise<number> {
    this.assertOpen();

    const documents = await listCachedDocumentsByPatient(this.db, patientId);
    const payload: CachedDocumentExport = {
      format: EXPORT_FORMAT,
      patient_id: patientId,
      exported_at: this.now().toISOString(),
      document_count: documents.length,
      documents: documents.map(serializeCachedDocument),
    };

    await sink(JSON.stringify(payload, null, 2));
    this.logger.info(`Exported ${documents.length} cached documents for patient ${patientId}`);

    return documents.length;
  }

  async import(serialized: string): Promise<number> {
    this.assertOpen();

    const payload = parseCachedDocumentExport(serialized);
    for (const document of payload.documents) {
      await upsertCachedDocument(this.db, deserializeCachedDocument(document));
    }

    this.logger.info(
      `Imported ${payload.documents.length} cached documents for patient ${payload.patient_id}`,
    );
    return payload.documents.length;
  }

  async purgePatient(patientId: string): Promise<number> {
    this.assertOpen();

    const deleted = await deleteCachedDocumentsByPatient(this.db, patientId);
    this.logger.info(`Purged ${deleted} cached documents for patient ${patientId}`);
    return deleted;
  }

  /** Waits for in-flight extractions, then releases the database if this cache opened it. */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.closed = true;
    await Promise.allSettled([...this.inFlight.values()].map((flight) => flight.promise));

    if (this.ownsDb) {
      await closeDb(this.db);
    }
  }

  private startFlight(
    documentId: string,
    refresh: boolean,
    work: () => Promise<CachedDocument>,
  ): Promise<CachedDocument> {
    const flight: Flight = { promise: work(), refresh };
    this.inFlight.set(documentId, flight);

    const settle = () => {
      if (this.inFlight.get(documentId) === flight) {
        this.inFlight.delete(documentId);
      }
    };
    void flight.promise.then(settle, settle);

    return flight.promise;
  }

  private async extractAndStore(
    document: CacheableDocument,
    fetchAndExtract: FetchAndExtract,
  ): Promise<CachedDocument> {
    const outcome = await this.runExtraction(fetchAndExtract);
    const extractedText = outcome.ok ? outcome.extracted.text : '';

    const cached: CachedDocument = {
      documentId: document.documentId,
      patientId: document.patientId,
      sourceLocation: { ...document.sourceLocation },
      documentType: document.documentType,
      documentDate: document.documentDate,
      contentType: document.contentType,
      extractedText,
      textLength: countCharacters(extractedText),
      contentHash: computeContentHash(extractedText),
      extractionTimestamp: this.now().toISOString(),
      extractionMethod: outcome.ok ? outcome.extracted.extractionMethod : outcome.extractionMethod,
      extractionVersion: this.extractionVersion,
      extractorName: outcome.ok ? outcome.extracted.extractorName : outcome.extractorName,
      extractionSuccess: outcome.ok,
      extractionError: outcome.ok ? null : outcome.error,
    };

    await upsertCachedDocument(this.db, cached);

    if (outcome.ok) {
      this.logger.info(`Cached document ${cached.documentId} (${cached.textLength} chars)`);
    } else {
      this.logger.warn(`Cached failed extraction for ${cached.documentId}: ${outcome.error}`);
    }

    return cached;
  }

  private async runExtraction(fetchAndExtract: FetchAndExtract): Promise<ExtractionOutcome> {
    try {
      const extracted = await fetchAndExtract();
      if (extracted.text.trim().length === 0) {
        return {
          ok: false,
          error: 'EXTRACT_ERROR: Extracted text is empty.',
          extractionMethod: extracted.extractionMethod,
          extractorName: extracted.extractorName,
        };
      }

      return { ok: true, extracted };
    } catch (error) {
      return {
        ok: false,
        error: describeExtractionFailure(error),
        extractionMethod: 'none',
        extractorName: 'none',
      };
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error('Document text cache is closed.');
    }
  }
}
