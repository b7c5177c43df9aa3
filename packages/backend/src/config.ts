import { ConfigurationError } from '@clinical/api';
import { z } from 'zod';

const EnvZ = z.object({
  CLINICAL_DB_PATH: z.string().min(1).default('./data/clinical-cache.sqlite'),
  FIELD_EXTRACTOR_URL: z.string().url().default('http://127.0.0.1:8080'),
  FIELD_EXTRACTOR_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  EXTRACTION_CONCURRENCY: z.coerce.number().int().min(1).default(4),
  EXTRACTION_VERSION: z.coerce.number().int().min(1).default(1),
  MAX_CLARIFICATION_ROUNDS: z.coerce.number().int().min(1).default(3),
  AGREEMENT_THRESHOLD: z.coerce.number().min(0).max(1).default(0.8),
  CORROBORATION_BONUS: z.coerce.number().min(0).max(1).default(0.05),
});

export interface BackendConfig {
  dbPath: string;
  fieldExtractorUrl: string;
  fieldExtractorTimeoutMs: number;
  extractionConcurrency: number;
  extractionVersion: number;
  maxClarificationRounds: number;
  agreementThreshold: number;
  corroborationBonus: number;
}

export type Env = Record<string, string | undefined>;

const dropEmpty = (env: Env): Env =>
  Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));

export const loadConfig = (env: Env = process.env): BackendConfig => {
  const parsed = EnvZ.safeParse(dropEmpty(env));
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${problems}`);
  }

  const values = parsed.data;
  return {
    dbPath: values.CLINICAL_DB_PATH,
    fieldExtractorUrl: values.FIELD_EXTRACTOR_URL,
    fieldExtractorTimeoutMs: values.FIELD_EXTRACTOR_TIMEOUT_MS,
    extractionConcurrency: values.EXTRACTION_CONCURRENCY,
    extractionVersion: values.EXTRACTION_VERSION,
    maxClarificationRounds: values.MAX_CLARIFICATION_ROUNDS,
    agreementThreshold: values.AGREEMENT_THRESHOLD,
    corroborationBonus: values.CORROBORATION_BONUS,
  };
};
