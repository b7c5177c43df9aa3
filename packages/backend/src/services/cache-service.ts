import { type ApiMethodMap, err, ok } from '@clinical/api';
import { type DocumentTextCache, InvalidCacheExportError } from '@clinical/document-cache';

const requireId = (value: string, label: string) => {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return err('VALIDATION_ERROR', `${label} is required.`);
  }
  return ok(trimmed);
};

export const getCachedDocumentService = async (
  cache: DocumentTextCache,
  input: ApiMethodMap['cache.get']['input'],
): Promise<ApiMethodMap['cache.get']['output']> => {
  const documentId = requireId(input.documentId, 'Document id');
  if (!documentId.ok) {
    return documentId;
  }

  const document = await cache.get(documentId.data);
  if (!document) {
    return err('NOT_FOUND', `Document ${documentId.data} is not cached.`);
  }

  return ok({ document });
};

export const listCachedDocumentsService = async (
  cache: DocumentTextCache,
  input: ApiMethodMap['cache.listByPatient']['input'],
): Promise<ApiMethodMap['cache.listByPatient']['output']> => {
  const patientId = requireId(input.patientId, 'Patient id');
  if (!patientId.ok) {
    return patientId;
  }

  const documents = await cache.listByPatient(patientId.data, {
    documentType: input.documentType,
    successfulOnly: input.successfulOnly,
  });
  return ok({ documents });
};

export const cacheStatsService = async (
  cache: DocumentTextCache,
  input: ApiMethodMap['cache.stats']['input'],
): Promise<ApiMethodMap['cache.stats']['output']> => {
  const patientId = requireId(input.patientId, 'Patient id');
  if (!patientId.ok) {
    return patientId;
  }

  return ok({ stats: await cache.stats(patientId.data) });
};

export const exportCacheService = async (
  cache: DocumentTextCache,
  input: ApiMethodMap['cache.export']['input'],
): Promise<ApiMethodMap['cache.export']['output']> => {
  const patientId = requireId(input.patientId, 'Patient id');
  if (!patientId.ok) {
    return patientId;
  }

  const chunks: string[] = [];
  const documentCount = await cache.export(patientId.data, (chunk) => {
    chunks.push(chunk);
  });

  return ok({ serialized: chunks.join(''), documentCount });
};

export const importCacheService = async (
  cache: DocumentTextCache,
  input: ApiMethodMap['cache.import']['input'],
): Promise<ApiMethodMap['cache.import']['output']> => {
  try {
    return ok({ imported: await cache.import(input.serialized) });
  } catch (error) {
    if (error instanceof InvalidCacheExportError) {
      return err('VALIDATION_ERROR', error.message);
    }
    throw error;
  }
};
