import {
  AdjudicationEngine,
  type Clarifier,
  type EngineOptionsInput,
  createSourceExtraction,
} from '@clinical/adjudication';
import {
  type AdjudicatedRecord,
  type CachedDocument,
  type DocumentDescriptor,
  type DocumentLocatorProvider,
  type FieldExtractor,
  type Logger,
  type RawBytesFetcher,
  RunCancelledError,
  type SourceExtraction,
  type StructuredContext,
  type StructuredContextProvider,
  describeError,
} from '@clinical/api';
import {
  type DocumentTextCache,
  type TextExtractorRegistry,
  createFetchAndExtract,
} from '@clinical/document-cache';
import { createStructuredRecordExtractor, routeFieldExtractors } from '@clinical/field-extract';
import type { ConceptDefinition } from '../concepts/types.js';
import { mapWithConcurrency } from '../lib/concurrency.js';

export const DEFAULT_EXTRACTION_CONCURRENCY = 4;

export interface ConceptPipelineDependencies {
  cache: DocumentTextCache;
  structuredContext: StructuredContextProvider;
  documentLocator: DocumentLocatorProvider;
  fetcher: RawBytesFetcher;
  textExtractors: TextExtractorRegistry;
  /** Reads document text and answers clarification questions. */
  fieldExtractor: FieldExtractor;
  /** Reads the structured record; defaults to a key-mapping reader built from the concept. */
  structuredExtractor?: FieldExtractor;
  extractionConcurrency?: number;
  engineOptions?: EngineOptionsInput;
  logger?: Logger;
}

export interface ConceptRunRequest {
  patientId: string;
  /** Anchor dates supplied by the caller; they override anchors read from the structured record. */
  anchors?: Record<string, string>;
  signal?: AbortSignal;
}

interface CachedSource {
  descriptor: DocumentDescriptor;
  document: CachedDocument;
}

const throwIfAborted = (signal: AbortSignal | undefined): void => {
  if (signal?.aborted) {
    throw new RunCancelledError();
  }
};

const readAnchors = (
  concept: ConceptDefinition,
  context: StructuredContext | null,
): Record<string, string> => {
  const anchors: Record<string, string> = {};
  if (!context) {
    return anchors;
  }

  for (const [anchorName, key] of Object.entries(concept.anchors)) {
    const value = context.record[key];
    if (typeof value === 'string' && value.trim().length > 0) {
      anchors[anchorName] = value.trim();
    }
  }
  return anchors;
};

/**
 * Runs one concept for one patient: fills the cache for every located document, extracts field
 * candidates from each source in parallel, then adjudicates once all sources have reported.
 * A source that fails to fetch, extract or parse contributes no candidates.
 */
export const runConceptExtraction = async (
  deps: ConceptPipelineDependencies,
  concept: ConceptDefinition,
  request: ConceptRunRequest,
): Promise<AdjudicatedRecord> => {
  const logger = deps.logger ?? console;
  const { patientId, signal } = request;
  throwIfAborted(signal);

  const engine = new AdjudicationEngine({
    concept: concept.name,
    fields: concept.fields,
    rules: concept.rules,
    options: deps.engineOptions,
    logger,
  });

  const [context, descriptors] = await Promise.all([
    deps.structuredContext.getStructuredContext(patientId, concept.name),
    deps.documentLocator.listDocuments(patientId, concept.name),
  ]);

  const cached = await mapWithConcurrency(
    descriptors,
    deps.extractionConcurrency ?? DEFAULT_EXTRACTION_CONCURRENCY,
    async (descriptor): Promise<CachedSource> => ({
      descriptor,
      document: await deps.cache.getOrExtract(
        descriptor,
        createFetchAndExtract(deps.fetcher, deps.textExtractors, descriptor),
      ),
    }),
    signal,
  );

  const extractor = routeFieldExtractors({
    structured: deps.structuredExtractor ?? createStructuredRecordExtractor(concept.structured),
    text: deps.fieldExtractor,
  });

  const structuredTask = context
    ? extractor
        .extractFields({ kind: 'structured', context: context.record }, concept.fields)
        .then((fields) =>
          createSourceExtraction(
            {
              sourceKind: 'structured',
              sourceId: context.contextId,
              sourcePriority: 0,
              documentDate: null,
            },
            fields,
          ),
        )
        .catch((error: unknown) => {
          logger.warn(`Structured extraction failed for ${context.contextId}: ${describeError(error)}`);
          return null;
        })
    : Promise.resolve(null);

  const documentTasks = cached.map(async ({ descriptor, document }): Promise<SourceExtraction | null> => {
    if (!document.extractionSuccess) {
      logger.warn(`Skipping ${document.documentId}: ${document.extractionError ?? 'extraction failed'}`);
      return null;
    }

    try {
      const fields = await extractor.extractFields(
        { kind: 'text', text: document.extractedText },
        concept.fields,
      );
      return createSourceExtraction(
        {
          sourceKind: 'document',
          sourceId: descriptor.documentId,
          sourcePriority: descriptor.sourcePriority,
          documentDate: descriptor.documentDate,
        },
        fields,
      );
    } catch (error) {
      logger.warn(`Field extraction failed for ${descriptor.documentId}: ${describeError(error)}`);
      return null;
    }
  });

  const [structured, ...documentSources] = await Promise.all([structuredTask, ...documentTasks]);
  const documents = documentSources.filter(
    (source): source is SourceExtraction => source !== null,
  );

  const clarifier: Clarifier = (clarification) => extractor.clarify(clarification);

  return engine.adjudicate(
    {
      patientId,
      structured,
      documents,
      anchors: { ...readAnchors(concept, context), ...request.anchors },
    },
    { clarifier, signal },
  );
};
