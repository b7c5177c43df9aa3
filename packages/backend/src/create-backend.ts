import {
  type Api,
  type DocumentLocatorProvider,
  type FieldExtractor,
  type Logger,
  type RawBytesFetcher,
  type StructuredContextProvider,
  createApiFromHandlers,
} from '@clinical/api';
import {
  DocumentTextCache,
  type TextExtractorAdapter,
  createTextExtractorRegistry,
  plainTextAdapter,
} from '@clinical/document-cache';
import { createCompletionFieldExtractor } from '@clinical/field-extract';
import { radiationConcept } from './concepts/radiation.js';
import { type ConceptDefinition, createConceptRegistry } from './concepts/types.js';
import type { BackendConfig } from './config.js';
import { createBackendHandlers } from './create-api.js';

export interface BackendProviders {
  structuredContext: StructuredContextProvider;
  documentLocator: DocumentLocatorProvider;
  fetcher: RawBytesFetcher;
  /** Defaults to the completion-server extractor at `fieldExtractorUrl`. */
  fieldExtractor?: FieldExtractor;
  textExtractors?: TextExtractorAdapter[];
  concepts?: ConceptDefinition[];
  logger?: Logger;
}

export interface Backend {
  api: Api;
  cache: DocumentTextCache;
  close: () => Promise<void>;
}

export const createBackend = async (
  config: BackendConfig,
  providers: BackendProviders,
): Promise<Backend> => {
  const logger = providers.logger ?? console;
  const concepts = createConceptRegistry(providers.concepts ?? [radiationConcept]);
  const textExtractors = createTextExtractorRegistry(providers.textExtractors ?? [plainTextAdapter]);

  const cache = await DocumentTextCache.open({
    dbPath: config.dbPath,
    extractionVersion: config.extractionVersion,
    logger,
  });

  const fieldExtractor =
    providers.fieldExtractor ??
    createCompletionFieldExtractor({
      baseUrl: config.fieldExtractorUrl,
      timeoutMs: config.fieldExtractorTimeoutMs,
    });

  const handlers = createBackendHandlers({
    cache,
    concepts,
    structuredContext: providers.structuredContext,
    documentLocator: providers.documentLocator,
    fetcher: providers.fetcher,
    textExtractors,
    fieldExtractor,
    extractionConcurrency: config.extractionConcurrency,
    engineOptions: {
      maxRounds: config.maxClarificationRounds,
      agreementThreshold: config.agreementThreshold,
      corroborationBonus: config.corroborationBonus,
    },
    logger,
  });

  return {
    api: createApiFromHandlers(handlers),
    cache,
    close: () => cache.close(),
  };
};
