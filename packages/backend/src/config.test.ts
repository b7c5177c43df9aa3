import { ConfigurationError } from '@clinical/api';
import { describe, expect, it } from 'vitest';
import { loadConfig } from './config.js';

describe('loadConfig', () => {
  it('applies defaults for unset and empty variables', () => {
    expect(loadConfig({ CLINICAL_DB_PATH: '' })).toEqual({
      dbPath: './data/clinical-cache.sqlite',
      fieldExtractorUrl: 'http://127.0.0.1:8080',
      fieldExtractorTimeoutMs: 60_000,
      extractionConcurrency: 4,
      extractionVersion: 1,
      maxClarificationRounds: 3,
      agreementThreshold: 0.8,
      corroborationBonus: 0.05,
    });
  });

  it('coerces numeric variables', () => {
    const config = loadConfig({
      CLINICAL_DB_PATH: '/var/lib/clinical/cache.sqlite',
      EXTRACTION_CONCURRENCY: '8',
      EXTRACTION_VERSION: '3',
      AGREEMENT_THRESHOLD: '0.9',
    });

    expect(config.dbPath).toBe('/var/lib/clinical/cache.sqlite');
    expect(config.extractionConcurrency).toBe(8);
    expect(config.extractionVersion).toBe(3);
    expect(config.agreementThreshold).toBe(0.9);
  });

  it('rejects out-of-range values', () => {
    expect(() => loadConfig({ EXTRACTION_CONCURRENCY: '0' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ AGREEMENT_THRESHOLD: '1.5' })).toThrow(/^Invalid configuration: AGREEMENT_THRESHOLD: /);
    expect(() => loadConfig({ FIELD_EXTRACTOR_URL: 'not a url' })).toThrow(/FIELD_EXTRACTOR_URL/);
  });
});
