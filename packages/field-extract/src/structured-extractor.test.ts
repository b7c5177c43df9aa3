import type { FieldDescriptor } from '@clinical/api';
import { describe, expect, it } from 'vitest';
import {
  createStructuredRecordExtractor,
  extractFromStructuredRecord,
  routeFieldExtractors,
} from './structured-extractor.js';

const schema: FieldDescriptor[] = [
  { name: 'start_date', kind: 'date' },
  { name: 'total_dose', kind: 'numeric', canonicalUnit: 'cGy' },
  { name: 'site', kind: 'text' },
];

describe('extractFromStructuredRecord', () => {
  it('reads mapped keys and marks absent values incomplete', () => {
    const fields = extractFromStructuredRecord(
      { start_date: '2019-07-15', dose: 5400, dose_unit: 'cGy' },
      schema,
      { mapping: { total_dose: { key: 'dose', unitKey: 'dose_unit' } } },
    );

    expect(fields).toEqual([
      {
        fieldName: 'start_date',
        value: { kind: 'date', value: '2019-07-15' },
        confidence: 0.95,
        complete: true,
        citation: 'start_date=2019-07-15',
        reasoning: 'Read from structured field start_date.',
      },
      {
        fieldName: 'total_dose',
        value: { kind: 'numeric', value: 5400, unit: 'cGy' },
        confidence: 0.95,
        complete: true,
        citation: 'dose=5400',
        reasoning: 'Read from structured field dose.',
      },
      {
        fieldName: 'site',
        value: null,
        confidence: 0,
        complete: false,
        citation: '',
        reasoning: 'No value under site.',
      },
    ]);
  });
});

describe('routeFieldExtractors', () => {
  it('sends structured inputs to the record reader only', async () => {
    const structured = createStructuredRecordExtractor();
    const text = createStructuredRecordExtractor({ confidence: 0.1 });
    const router = routeFieldExtractors({ structured, text });

    const fromRecord = await router.extractFields(
      { kind: 'structured', context: { site: 'brain' } },
      [{ name: 'site', kind: 'text' }],
    );
    const fromText = await router.extractFields({ kind: 'text', text: 'site: brain' }, [
      { name: 'site', kind: 'text' },
    ]);

    expect(fromRecord.map((field) => field.confidence)).toEqual([0.95]);
    expect(fromText).toEqual([]);
  });
});
