export { computeContentHash } from './content-hash.js';
export {
  type CacheableDocument,
  DEFAULT_EXTRACTION_VERSION,
  countCharacters,
  DocumentTextCache,
  type DocumentTextCacheOptions,
  type ExportSink,
  type OpenDocumentTextCacheOptions,
} from './document-text-cache.js';
export type { ListCachedDocumentsFilter } from './data-access/cached-document-repository.js';
export {
  type CachedDocumentExport,
  EXPORT_FORMAT,
  InvalidCacheExportError,
  parseCachedDocumentExport,
} from './serialization.js';
export {
  type ExtractedText,
  type FetchAndExtract,
  type TextExtractorAdapter,
  type TextExtractorRegistry,
  createFetchAndExtract,
  createTextExtractorRegistry,
  plainTextAdapter,
} from './text-extractors.js';
