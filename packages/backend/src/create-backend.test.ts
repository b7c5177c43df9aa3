import type { Logger } from '@clinical/api';
import { createInMemoryProviders, createScriptedFieldExtractor } from '@clinical/test-utils';
import { describe, expect, it } from 'vitest';
import { loadConfig } from './config.js';
import { createBackend } from './create-backend.js';

const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

describe('createBackend', () => {
  it('serves the api over a freshly migrated database', async () => {
    const providers = createInMemoryProviders({});
    const backend = await createBackend(loadConfig({ CLINICAL_DB_PATH: ':memory:' }), {
      structuredContext: providers.structuredContext,
      documentLocator: providers.documentLocator,
      fetcher: providers.fetcher,
      fieldExtractor: createScriptedFieldExtractor({ byText: {} }),
      logger: silentLogger,
    });

    try {
      expect(await backend.api.call('health.ping', {})).toEqual({ ok: true, data: { status: 'ok' } });

      const result = await backend.api.call('concept.extract', {
        patientId: 'patient-1',
        concept: 'radiation',
      });
      expect(result.ok).toBe(true);
      if (!result.ok) {
        return;
      }
      expect(result.data.record.completenessRatio).toBe(0);
      expect(result.data.record.overallConfidence).toBe(0);

      expect(await backend.api.call('cache.stats', { patientId: 'patient-1' })).toEqual({
        ok: true,
        data: {
          stats: { total: 0, successRate: 0, charTotal: 0, byDocumentType: {}, byContentType: {} },
        },
      });
    } finally {
      await backend.close();
    }
  });
});
