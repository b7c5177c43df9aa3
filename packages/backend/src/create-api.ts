import {
  type AppErrorCode,
  type ApiHandlers,
  type ApiInput,
  ConfigurationError,
  type Err,
  RunCancelledError,
  describeError,
  err,
  ok,
} from '@clinical/api';
import type { ConceptRegistry } from './concepts/types.js';
import {
  cacheStatsService,
  exportCacheService,
  getCachedDocumentService,
  importCacheService,
  listCachedDocumentsService,
} from './services/cache-service.js';
import {
  type ConceptPipelineDependencies,
  runConceptExtraction,
} from './services/concept-extraction-service.js';

export interface BackendDependencies extends ConceptPipelineDependencies {
  concepts: ConceptRegistry;
}

const failure = (
  code: AppErrorCode,
  message: string,
  error: unknown,
): Err<AppErrorCode, { cause: string }> => err(code, message, { cause: describeError(error) });

const conceptRunFailure = (error: unknown): Err<AppErrorCode, { cause: string }> => {
  if (error instanceof RunCancelledError) {
    return failure('CANCELLED', 'Concept run was cancelled.', error);
  }
  if (error instanceof ConfigurationError) {
    return failure('CONFIGURATION_ERROR', 'Concept is misconfigured.', error);
  }
  return failure('INTERNAL_ERROR', 'Failed to extract concept.', error);
};

export const createBackendHandlers = (deps: BackendDependencies): ApiHandlers => ({
  'health.ping': async () => ok({ status: 'ok' }),
  'cache.get': async (input: ApiInput<'cache.get'>) => {
    try {
      return await getCachedDocumentService(deps.cache, input);
    } catch (error) {
      return failure('DB_ERROR', 'Failed to read cached document.', error);
    }
  },
  'cache.listByPatient': async (input: ApiInput<'cache.listByPatient'>) => {
    try {
      return await listCachedDocumentsService(deps.cache, input);
    } catch (error) {
      return failure('DB_ERROR', 'Failed to list cached documents.', error);
    }
  },
  'cache.stats': async (input: ApiInput<'cache.stats'>) => {
    try {
      return await cacheStatsService(deps.cache, input);
    } catch (error) {
      return failure('DB_ERROR', 'Failed to summarize cached documents.', error);
    }
  },
  'cache.export': async (input: ApiInput<'cache.export'>) => {
    try {
      return await exportCacheService(deps.cache, input);
    } catch (error) {
      return failure('DB_ERROR', 'Failed to export cached documents.', error);
    }
  },
  'cache.import': async (input: ApiInput<'cache.import'>) => {
    try {
      return await importCacheService(deps.cache, input);
    } catch (error) {
      return failure('DB_ERROR', 'Failed to import cached documents.', error);
    }
  },
  'concept.extract': async (input: ApiInput<'concept.extract'>) => {
    const patientId = input.patientId.trim();
    if (!patientId) {
      return err('VALIDATION_ERROR', 'Patient id is required.');
    }

    const concept = deps.concepts.get(input.concept);
    if (!concept) {
      return err('NOT_FOUND', `Unknown concept: ${input.concept}.`);
    }

    try {
      const record = await runConceptExtraction(deps, concept, { patientId });
      return ok({ record });
    } catch (error) {
      return conceptRunFailure(error);
    }
  },
});
