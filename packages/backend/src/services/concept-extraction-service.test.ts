import {
  type DocumentDescriptor,
  type ExtractedField,
  type Logger,
  RunCancelledError,
} from '@clinical/api';
import {
  DocumentTextCache,
  createTextExtractorRegistry,
  plainTextAdapter,
} from '@clinical/document-cache';
import { createStructuredRecordExtractor } from '@clinical/field-extract';
import {
  type DbHarness,
  type StoredDocument,
  createDbHarness,
  createInMemoryProviders,
  createScriptedFieldExtractor,
} from '@clinical/test-utils';
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { radiationConcept } from '../concepts/radiation.js';
import { type ConceptPipelineDependencies, runConceptExtraction } from './concept-extraction-service.js';

const FIXED_NOW = new Date('2024-03-01T12:00:00.000Z');

const createRecordingLogger = () => {
  const warnings: string[] = [];
  const logger: Logger = {
    info: () => undefined,
    warn: (message: string) => {
      warnings.push(message);
    },
    error: () => undefined,
  };
  return { logger, warnings };
};

const stored = (documentId: string, text: string, documentDate = '2019-09-02'): StoredDocument => {
  const descriptor: DocumentDescriptor = {
    documentId,
    patientId: 'patient-1',
    sourceLocation: { bucket: 'clinical-docs', key: `patient-1/${documentId}.txt`, revision: null },
    documentType: 'progress_note',
    documentDate,
    contentType: 'text/plain',
    sourcePriority: 2,
  };
  return { descriptor, text };
};

const dateField = (fieldName: string, value: string, confidence: number): ExtractedField => ({
  fieldName,
  value: { kind: 'date', value },
  confidence,
  complete: true,
  citation: value,
  reasoning: '',
});

describe('runConceptExtraction', () => {
  let harness: DbHarness | undefined;

  beforeAll(async () => {
    harness = await createDbHarness('fresh');
  });

  beforeEach(async () => {
    if (!harness) {
      throw new Error('DB harness was not initialized.');
    }
    await harness.beginTestCase();
  });

  afterEach(async () => {
    if (!harness) {
      return;
    }
    await harness.rollbackTestCase();
  });

  afterAll(async () => {
    if (!harness) {
      return;
    }

    await harness.close();
  });

  const createCache = (extractionVersion = 1): DocumentTextCache => {
    if (!harness) {
      throw new Error('DB harness was not initialized.');
    }
    return new DocumentTextCache({
      db: harness.db,
      extractionVersion,
      logger: createRecordingLogger().logger,
      now: () => FIXED_NOW,
    });
  };

  const dependencies = (
    providers: ReturnType<typeof createInMemoryProviders>,
    overrides: Partial<ConceptPipelineDependencies> & Pick<ConceptPipelineDependencies, 'fieldExtractor'>,
  ): ConceptPipelineDependencies => ({
    cache: createCache(),
    structuredContext: providers.structuredContext,
    documentLocator: providers.documentLocator,
    fetcher: providers.fetcher,
    textExtractors: createTextExtractorRegistry([plainTextAdapter]),
    ...overrides,
  });

  it('leaves out a document whose field extraction fails', async () => {
    const providers = createInMemoryProviders({
      documents: {
        'patient-1': [stored('doc-a', 'Course began 2019-07-15.'), stored('doc-b', 'Illegible.')],
      },
    });
    const fieldExtractor = createScriptedFieldExtractor({
      byText: { 'Course began 2019-07-15.': [dateField('start_date', '2019-07-15', 0.9)] },
    });
    const { logger, warnings } = createRecordingLogger();

    const record = await runConceptExtraction(
      dependencies(providers, { fieldExtractor, logger }),
      radiationConcept,
      { patientId: 'patient-1' },
    );

    expect(record.fields.start_date).toMatchObject({
      finalValue: { kind: 'date', value: '2019-07-15' },
      primarySourceId: 'doc-a',
      resolution: 'SINGLE_SOURCE',
    });
    expect(warnings).toContain(
      'Field extraction failed for doc-b: No scripted fields for text: Illegible.',
    );
  });

  it('asks the field extractor to settle a tie between documents', async () => {
    const providers = createInMemoryProviders({
      documents: {
        'patient-1': [stored('doc-a', 'Started 2019-07-15.'), stored('doc-b', 'Started 2019-07-29.')],
      },
    });
    const fieldExtractor = createScriptedFieldExtractor({
      byText: {
        'Started 2019-07-15.': [dateField('start_date', '2019-07-15', 0.8)],
        'Started 2019-07-29.': [dateField('start_date', '2019-07-29', 0.8)],
      },
      clarify: () => ({
        answer: 'Treatment began on 2019-07-22.',
        candidate: dateField('start_date', '2019-07-22', 0.9),
      }),
    });

    const record = await runConceptExtraction(
      dependencies(providers, { fieldExtractor, logger: createRecordingLogger().logger }),
      radiationConcept,
      { patientId: 'patient-1' },
    );

    expect(fieldExtractor.clarifications).toHaveLength(1);
    expect(fieldExtractor.clarifications[0]?.question).toBe(
      'The sources disagree on start_date (first fraction delivered): "2019-07-15" from doc-a, ' +
        '"2019-07-29" from doc-b. What is the correct value?',
    );
    expect(record.clarifications).toEqual([
      {
        roundNumber: 1,
        fieldName: 'start_date',
        question: fieldExtractor.clarifications[0]?.question,
        response: 'Treatment began on 2019-07-22.',
        outcome: 'resolved',
      },
    ]);
    expect(record.fields.start_date).toMatchObject({
      finalValue: { kind: 'date', value: '2019-07-22' },
      primarySourceId: 'clarification:start_date:1',
      resolution: 'RESOLVED_BY_PRECEDENCE',
      needsManualReview: false,
      confidence: 0.9,
    });
  });

  it('reads anchor dates from the structured record', async () => {
    const providers = createInMemoryProviders({
      structured: {
        'patient-1': {
          contextId: 'registry-1',
          record: { radiation_start_date: '2019-07-15', diagnosis_date: '2019-08-01' },
        },
      },
    });
    const fieldExtractor = createScriptedFieldExtractor({ byText: {} });

    const record = await runConceptExtraction(
      dependencies(providers, { fieldExtractor, logger: createRecordingLogger().logger }),
      radiationConcept,
      { patientId: 'patient-1' },
    );

    expect(record.inconsistencies).toEqual([
      {
        ruleId: 'start_date-not-before-diagnosis_date',
        fieldsInvolved: ['start_date'],
        severity: 'high',
        description: 'start_date must not precede diagnosis_date',
        resolved: false,
      },
    ]);
    expect(record.clarifications.map((round) => round.outcome)).toEqual([
      'unresolved',
      'unresolved',
      'exhausted',
    ]);
    expect(record.fields.start_date).toMatchObject({
      finalValue: { kind: 'date', value: '2019-07-15' },
      needsManualReview: true,
      confidence: 0.49,
    });
  });

  it('lets request anchors override those in the structured record', async () => {
    const providers = createInMemoryProviders({
      structured: {
        'patient-1': {
          contextId: 'registry-1',
          record: { radiation_start_date: '2019-07-15', diagnosis_date: '2019-08-01' },
        },
      },
    });
    const fieldExtractor = createScriptedFieldExtractor({ byText: {} });

    const record = await runConceptExtraction(
      dependencies(providers, { fieldExtractor, logger: createRecordingLogger().logger }),
      radiationConcept,
      { patientId: 'patient-1', anchors: { diagnosis_date: '2019-05-02' } },
    );

    expect(record.inconsistencies).toEqual([]);
    expect(fieldExtractor.clarifications).toEqual([]);
  });

  it('reads the structured record with the structured extractor only', async () => {
    const providers = createInMemoryProviders({
      structured: {
        'patient-1': { contextId: 'registry-1', record: { first_fraction: '2019-07-15' } },
      },
    });
    const fieldExtractor = createScriptedFieldExtractor({ byText: {} });

    const record = await runConceptExtraction(
      dependencies(providers, {
        fieldExtractor,
        structuredExtractor: createStructuredRecordExtractor({
          mapping: { start_date: 'first_fraction' },
          confidence: 0.7,
        }),
        logger: createRecordingLogger().logger,
      }),
      radiationConcept,
      { patientId: 'patient-1' },
    );

    expect(record.fields.start_date).toMatchObject({
      finalValue: { kind: 'date', value: '2019-07-15' },
      primarySourceId: 'registry-1',
      confidence: 0.7,
    });
    expect(fieldExtractor.inputs).toEqual([]);
  });

  it('re-extracts documents cached by an older extraction version', async () => {
    const providers = createInMemoryProviders({
      documents: { 'patient-1': [stored('doc-a', 'Course began 2019-07-15.')] },
    });
    const fieldExtractor = createScriptedFieldExtractor({
      byText: { 'Course began 2019-07-15.': [dateField('start_date', '2019-07-15', 0.9)] },
    });

    const oldCache = createCache(1);
    await oldCache.put({
      documentId: 'doc-a',
      patientId: 'patient-1',
      sourceLocation: { bucket: 'clinical-docs', key: 'patient-1/doc-a.txt', revision: null },
      documentType: 'progress_note',
      documentDate: '2019-09-02',
      contentType: 'text/plain',
      extractedText: 'stale text',
      textLength: 10,
      contentHash: 'stale-hash',
      extractionTimestamp: '2020-01-01T00:00:00.000Z',
      extractionMethod: 'text_direct',
      extractionVersion: 1,
      extractorName: 'plain-text',
      extractionSuccess: true,
      extractionError: null,
    });

    const cache = createCache(2);
    const record = await runConceptExtraction(
      dependencies(providers, { cache, fieldExtractor, logger: createRecordingLogger().logger }),
      radiationConcept,
      { patientId: 'patient-1' },
    );

    expect(providers.fetchedKeys).toEqual(['patient-1/doc-a.txt']);
    expect(await cache.get('doc-a')).toMatchObject({
      extractedText: 'Course began 2019-07-15.',
      extractionVersion: 2,
      extractionTimestamp: '2024-03-01T12:00:00.000Z',
    });
    expect(record.fields.start_date?.primarySourceId).toBe('doc-a');
  });

  it('does nothing when the run is cancelled before it starts', async () => {
    const providers = createInMemoryProviders({
      documents: { 'patient-1': [stored('doc-a', 'Course began 2019-07-15.')] },
    });
    let located = 0;
    const controller = new AbortController();
    controller.abort();

    await expect(
      runConceptExtraction(
        dependencies(providers, {
          fieldExtractor: createScriptedFieldExtractor({ byText: {} }),
          documentLocator: {
            listDocuments: async (patientId, concept) => {
              located += 1;
              return providers.documentLocator.listDocuments(patientId, concept);
            },
          },
        }),
        radiationConcept,
        { patientId: 'patient-1', signal: controller.signal },
      ),
    ).rejects.toBeInstanceOf(RunCancelledError);
    expect(located).toBe(0);
    expect(await harness?.countCachedDocuments()).toBe(0);
  });

  it('keeps finished extractions cached when cancelled mid-run', async () => {
    const providers = createInMemoryProviders({
      documents: {
        'patient-1': [
          stored('doc-1', 'First note.'),
          stored('doc-2', 'Second note.'),
          stored('doc-3', 'Third note.'),
        ],
      },
    });
    const controller = new AbortController();
    const cache = createCache();

    await expect(
      runConceptExtraction(
        dependencies(providers, {
          cache,
          fieldExtractor: createScriptedFieldExtractor({ byText: {} }),
          extractionConcurrency: 1,
          fetcher: {
            fetch: async (location) => {
              controller.abort();
              return providers.fetcher.fetch(location);
            },
          },
        }),
        radiationConcept,
        { patientId: 'patient-1', signal: controller.signal },
      ),
    ).rejects.toBeInstanceOf(RunCancelledError);

    expect(providers.fetchedKeys).toEqual(['patient-1/doc-1.txt']);
    expect(await cache.isCached('doc-1')).toBe(true);
    expect(await cache.isCached('doc-2')).toBe(false);
    expect(await harness?.countCachedDocuments('patient-1')).toBe(1);
  });
});
