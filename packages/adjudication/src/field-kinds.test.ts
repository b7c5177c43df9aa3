import { ConfigurationError } from '@clinical/api';
import { describe, expect, it } from 'vitest';
import { createFieldKindRegistry, parseIsoDate, requireHandler } from './field-kinds.js';
import type { FieldSpec } from './types.js';

const registry = createFieldKindRegistry();

const doseField: FieldSpec = {
  name: 'total_dose',
  kind: 'numeric',
  canonicalUnit: 'cGy',
  unitConversions: { Gy: 100 },
};

describe('numeric fields', () => {
  const handler = requireHandler(registry, doseField);

  it('converts accepted units to the canonical unit', () => {
    expect(handler.normalize({ kind: 'numeric', value: 54, unit: 'Gy' }, doseField)).toEqual({
      kind: 'numeric',
      value: 5400,
      unit: 'cGy',
    });
    expect(handler.normalize({ kind: 'text', value: ' 54 gy ' }, doseField)).toEqual({
      kind: 'numeric',
      value: 5400,
      unit: 'cGy',
    });
  });

  it('assumes the canonical unit when none is given', () => {
    expect(handler.normalize({ kind: 'numeric', value: 5400, unit: null }, doseField)).toEqual({
      kind: 'numeric',
      value: 5400,
      unit: 'cGy',
    });
  });

  it('rejects units it cannot convert and text that is not a number', () => {
    expect(handler.normalize({ kind: 'numeric', value: 12, unit: 'mm' }, doseField)).toBeNull();
    expect(handler.normalize({ kind: 'text', value: 'about fifty' }, doseField)).toBeNull();
  });

  it('compares within the field tolerance', () => {
    const a = { kind: 'numeric', value: 5400, unit: 'cGy' } as const;
    const b = { kind: 'numeric', value: 5410, unit: 'cGy' } as const;

    expect(handler.equals(a, b, doseField)).toBe(false);
    expect(handler.equals(a, b, { ...doseField, tolerance: 10 })).toBe(true);
  });
});

describe('date fields', () => {
  const field: FieldSpec = { name: 'start_date', kind: 'date' };
  const handler = requireHandler(registry, field);

  it('folds date-times to calendar dates', () => {
    expect(handler.normalize({ kind: 'text', value: '2019-07-15T10:30:00Z' }, field)).toEqual({
      kind: 'date',
      value: '2019-07-15',
    });
  });

  it('rejects impossible dates', () => {
    expect(parseIsoDate('2019-02-30')).toBeNull();
    expect(handler.normalize({ kind: 'date', value: '15/07/2019' }, field)).toBeNull();
  });

  it('treats dates as equal only within the tolerance in days', () => {
    const start = { kind: 'date', value: '2019-07-15' } as const;

    expect(handler.equals(start, { kind: 'date', value: '2019-07-16' }, field)).toBe(false);
    expect(
      handler.equals(start, { kind: 'date', value: '2019-07-18' }, { ...field, tolerance: 3 }),
    ).toBe(true);
    expect(
      handler.equals(start, { kind: 'date', value: '2019-07-19' }, { ...field, tolerance: 3 }),
    ).toBe(false);
  });
});

describe('enum and text fields', () => {
  it('maps synonyms and allowed values to their canonical spelling', () => {
    const field: FieldSpec = {
      name: 'modality',
      kind: 'enum',
      allowedValues: ['IMRT', '3D-CRT'],
      synonyms: { 'left breast': ['L breast', 'breast, left'] },
    };
    const handler = requireHandler(registry, field);

    expect(handler.normalize({ kind: 'text', value: '  L   Breast ' }, field)).toEqual({
      kind: 'enum',
      value: 'left breast',
    });
    expect(handler.normalize({ kind: 'enum', value: 'imrt' }, field)).toEqual({
      kind: 'enum',
      value: 'IMRT',
    });
  });

  it('folds case and whitespace for free text', () => {
    const field: FieldSpec = { name: 'site', kind: 'text' };
    const handler = requireHandler(registry, field);

    expect(handler.normalize({ kind: 'text', value: 'Left  Breast\n' }, field)).toEqual({
      kind: 'text',
      value: 'left breast',
    });
    expect(handler.normalize({ kind: 'text', value: '   ' }, field)).toBeNull();
  });
});

describe('requireHandler', () => {
  it('fails for kinds without a registered normalization', () => {
    const field: FieldSpec = { name: 'start_date', kind: 'date' };

    expect(() => requireHandler(new Map(), field)).toThrow(ConfigurationError);
    expect(() => requireHandler(new Map(), field)).toThrow(
      'No normalization registered for kind "date" of field "start_date".',
    );
  });
});
