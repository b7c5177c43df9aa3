import { createHash } from 'node:crypto';
import type { Kysely } from 'kysely';
import type { Database } from '../schema.ts';

export type SeedProfile = 'fresh' | 'baseline';

export const BASELINE_PATIENT_ID = 'patient-baseline';

const nowIso = () => new Date().toISOString();

const baselineDocuments = [
  {
    documentId: 'doc-baseline-consult',
    documentType: 'radiation_consult',
    documentDate: '2019-07-01',
    text: 'Radiation oncology consult. Plan: 5400 cGy in 30 fractions to the posterior fossa.',
  },
  {
    documentId: 'doc-baseline-summary',
    documentType: 'treatment_summary',
    documentDate: '2019-09-02',
    text: 'Treatment summary. Completed 54 Gy in 30 fractions, 2019-07-15 through 2019-08-26.',
  },
];

export const runSeedProfile = async (db: Kysely<Database>, profile: SeedProfile): Promise<void> => {
  if (profile === 'fresh') {
    return;
  }

  const countRow = await db
    .selectFrom('extracted_document_text')
    .select((expressionBuilder) => expressionBuilder.fn.count<number>('document_id').as('count'))
    .where('patient_id', '=', BASELINE_PATIENT_ID)
    .executeTakeFirstOrThrow();

  if (Number(countRow.count) > 0) {
    return;
  }

  const timestamp = nowIso();
  for (const document of baselineDocuments) {
    await db
      .insertInto('extracted_document_text')
      .values({
        document_id: document.documentId,
        patient_id: BASELINE_PATIENT_ID,
        source_bucket: 'seed-bucket',
        source_key: `${BASELINE_PATIENT_ID}/${document.documentId}.txt`,
        source_revision: null,
        document_type: document.documentType,
        document_date: document.documentDate,
        content_type: 'text/plain',
        extracted_text: document.text,
        text_length: [...document.text].length,
        content_hash: createHash('sha256').update(document.text, 'utf8').digest('hex'),
        extraction_timestamp: timestamp,
        extraction_method: 'text_direct',
        extraction_version: 1,
        extractor_name: 'seed',
        extraction_success: 1,
        extraction_error: null,
      })
      .executeTakeFirst();
  }
};
