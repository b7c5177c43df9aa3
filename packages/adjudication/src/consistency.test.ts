import { type AdjudicatedField, ConfigurationError, type FieldValue } from '@clinical/api';
import { describe, expect, it } from 'vitest';
import {
  allowedWhenRule,
  createRuleContext,
  dateOrderRule,
  evaluateRules,
  notBeforeAnchorRule,
  numericRangeRule,
  validateRules,
} from './consistency.js';
import type { FieldSpec } from './types.js';

const adjudicated = (fieldName: string, finalValue: FieldValue | null): AdjudicatedField => ({
  fieldName,
  finalValue,
  confidence: finalValue ? 0.9 : 0,
  primarySourceId: finalValue ? 'doc-1' : null,
  supportingSourceIds: [],
  conflicts: [],
  needsManualReview: false,
  resolution: finalValue ? 'SINGLE_SOURCE' : 'MISSING',
});

const record = (values: Record<string, FieldValue | null>) =>
  Object.fromEntries(
    Object.entries(values).map(([name, value]) => [name, adjudicated(name, value)]),
  );

const fields: FieldSpec[] = [
  { name: 'start_date', kind: 'date' },
  { name: 'stop_date', kind: 'date' },
  { name: 'total_dose', kind: 'numeric', canonicalUnit: 'cGy' },
  { name: 'modality', kind: 'enum' },
];

describe('rule factories', () => {
  it('fires the date order rule only when the later date precedes the earlier one', () => {
    const rule = dateOrderRule('start_date', 'stop_date');
    const reversed = createRuleContext(
      record({
        start_date: { kind: 'date', value: '2019-08-10' },
        stop_date: { kind: 'date', value: '2019-07-01' },
      }),
    );
    const sameDay = createRuleContext(
      record({
        start_date: { kind: 'date', value: '2019-08-10' },
        stop_date: { kind: 'date', value: '2019-08-10' },
      }),
    );

    expect(rule.check(reversed)).toBe(false);
    expect(rule.check(sameDay)).toBe(true);
    expect(rule.id).toBe('start_date-before-stop_date');
    expect(rule.clarifyField).toBe('stop_date');
  });

  it('passes when a value the rule needs is missing', () => {
    const context = createRuleContext(record({ start_date: null, stop_date: null, total_dose: null }));

    expect(dateOrderRule('start_date', 'stop_date').check(context)).toBe(true);
    expect(notBeforeAnchorRule('start_date', 'diagnosis_date').check(context)).toBe(true);
    expect(numericRangeRule('total_dose', { min: 100 }).check(context)).toBe(true);
  });

  it('compares a date against a caller anchor', () => {
    const rule = notBeforeAnchorRule('start_date', 'diagnosis_date');
    const fieldsBefore = record({ start_date: { kind: 'date', value: '2019-01-15' } });

    expect(rule.check(createRuleContext(fieldsBefore, { diagnosis_date: '2019-05-02' }))).toBe(false);
    expect(rule.check(createRuleContext(fieldsBefore, {}))).toBe(true);
  });

  it('checks numeric bounds inclusively', () => {
    const rule = numericRangeRule('total_dose', { min: 100, max: 8000 });
    const at = (value: number) =>
      createRuleContext(record({ total_dose: { kind: 'numeric', value, unit: 'cGy' } }));

    expect(rule.check(at(8000))).toBe(true);
    expect(rule.check(at(8001))).toBe(false);
    expect(rule.check(at(99))).toBe(false);
    expect(rule.description).toBe('total_dose must fall within [100, 8000]');
  });

  it('allows a value only when the condition field has an accepted value', () => {
    const rule = allowedWhenRule('total_dose', 'modality', ['IMRT', 'VMAT']);
    const withModality = (modality: string) =>
      createRuleContext(
        record({
          total_dose: { kind: 'numeric', value: 5000, unit: 'cGy' },
          modality: { kind: 'enum', value: modality },
        }),
      );

    expect(rule.check(withModality('VMAT'))).toBe(true);
    expect(rule.check(withModality('brachytherapy'))).toBe(false);
    expect(rule.description).toBe('total_dose is only valid when modality is IMRT or VMAT');
  });
});

describe('evaluateRules', () => {
  it('yields one unresolved inconsistency per violated rule, in rule order', () => {
    const rules = [
      numericRangeRule('total_dose', { max: 8000 }, { severity: 'low' }),
      dateOrderRule('start_date', 'stop_date'),
    ];
    const context = createRuleContext(
      record({
        start_date: { kind: 'date', value: '2019-08-10' },
        stop_date: { kind: 'date', value: '2019-07-01' },
        total_dose: { kind: 'numeric', value: 9000, unit: 'cGy' },
      }),
    );

    expect(evaluateRules(rules, context)).toEqual([
      {
        ruleId: 'total_dose-range',
        fieldsInvolved: ['total_dose'],
        severity: 'low',
        description: 'total_dose must fall within [-inf, 8000]',
        resolved: false,
      },
      {
        ruleId: 'start_date-before-stop_date',
        fieldsInvolved: ['start_date', 'stop_date'],
        severity: 'high',
        description: 'stop_date must not precede start_date',
        resolved: false,
      },
    ]);
  });
});

describe('validateRules', () => {
  it('rejects rules over unknown fields', () => {
    expect(() => validateRules([dateOrderRule('start_date', 'end_date')], fields)).toThrow(
      new ConfigurationError(
        'Plausibility rule "start_date-before-end_date" references unknown field "end_date".',
      ),
    );
  });

  it('rejects duplicate rule ids', () => {
    const rule = dateOrderRule('start_date', 'stop_date');

    expect(() => validateRules([rule, rule], fields)).toThrow(
      'Duplicate plausibility rule id "start_date-before-stop_date".',
    );
  });

  it('rejects a clarify field the rule does not involve', () => {
    const rule = { ...numericRangeRule('total_dose', { max: 8000 }), clarifyField: 'modality' };

    expect(() => validateRules([rule], fields)).toThrow(
      'Plausibility rule "total_dose-range" clarifies "modality", which it does not involve.',
    );
  });
});
