import {
  type AdjudicatedField,
  ConfigurationError,
  type FieldValue,
  type Inconsistency,
  type Severity,
} from '@clinical/api';
import { parseIsoDate } from './field-kinds.js';
import type { FieldSpec } from './types.js';

export interface RuleContext {
  fields: Readonly<Record<string, AdjudicatedField>>;
  anchors: Readonly<Record<string, string>>;
  value: (fieldName: string) => FieldValue | null;
}

/** A pure predicate over final values; `check` returns true when the record is plausible. */
export interface PlausibilityRule {
  id: string;
  fields: string[];
  severity: Severity;
  description: string;
  /** Field re-read by the clarification loop when this rule fails. Defaults to `fields[0]`. */
  clarifyField?: string;
  check: (context: RuleContext) => boolean;
}

export const SEVERITY_RANK: Record<Severity, number> = { low: 0, medium: 1, high: 2 };

export const createRuleContext = (
  fields: Readonly<Record<string, AdjudicatedField>>,
  anchors: Readonly<Record<string, string>> = {},
): RuleContext => ({
  fields,
  anchors,
  value: (fieldName) => fields[fieldName]?.finalValue ?? null,
});

const dateDays = (value: FieldValue | null): number | null =>
  value && value.kind === 'date' ? parseIsoDate(value.value) : null;

const numberOf = (value: FieldValue | null): number | null =>
  value && value.kind === 'numeric' ? value.value : null;

const textOf = (value: FieldValue | null): string | null =>
  value && (value.kind === 'enum' || value.kind === 'text') ? value.value : null;

interface RuleOptions {
  id?: string;
  severity?: Severity;
  description?: string;
}

export const dateOrderRule = (
  earlierField: string,
  laterField: string,
  options: RuleOptions = {},
): PlausibilityRule => ({
  id: options.id ?? `${earlierField}-before-${laterField}`,
  fields: [earlierField, laterField],
  severity: options.severity ?? 'high',
  description: options.description ?? `${laterField} must not precede ${earlierField}`,
  clarifyField: laterField,
  check: (context) => {
    const earlier = dateDays(context.value(earlierField));
    const later = dateDays(context.value(laterField));
    return earlier === null || later === null || earlier <= later;
  },
});

export const notBeforeAnchorRule = (
  fieldName: string,
  anchorName: string,
  options: RuleOptions = {},
): PlausibilityRule => ({
  id: options.id ?? `${fieldName}-not-before-${anchorName}`,
  fields: [fieldName],
  severity: options.severity ?? 'high',
  description: options.description ?? `${fieldName} must not precede ${anchorName}`,
  clarifyField: fieldName,
  check: (context) => {
    const value = dateDays(context.value(fieldName));
    const anchorValue = context.anchors[anchorName];
    const anchor = anchorValue === undefined ? null : parseIsoDate(anchorValue);
    return value === null || anchor === null || value >= anchor;
  },
});

export const numericRangeRule = (
  fieldName: string,
  range: { min?: number; max?: number },
  options: RuleOptions = {},
): PlausibilityRule => ({
  id: options.id ?? `${fieldName}-range`,
  fields: [fieldName],
  severity: options.severity ?? 'medium',
  description:
    options.description ??
    `${fieldName} must fall within [${range.min ?? '-inf'}, ${range.max ?? 'inf'}]`,
  clarifyField: fieldName,
  check: (context) => {
    const value = numberOf(context.value(fieldName));
    if (value === null) {
      return true;
    }
    return (
      (range.min === undefined || value >= range.min) &&
      (range.max === undefined || value <= range.max)
    );
  },
});

/** `fieldName` may only carry a value when `conditionField` is one of `allowed`. */
export const allowedWhenRule = (
  fieldName: string,
  conditionField: string,
  allowed: string[],
  options: RuleOptions = {},
): PlausibilityRule => ({
  id: options.id ?? `${fieldName}-requires-${conditionField}`,
  fields: [fieldName, conditionField],
  severity: options.severity ?? 'medium',
  description:
    options.description ?? `${fieldName} is only valid when ${conditionField} is ${allowed.join(' or ')}`,
  clarifyField: conditionField,
  check: (context) => {
    if (context.value(fieldName) === null) {
      return true;
    }
    const condition = textOf(context.value(conditionField));
    return condition === null || allowed.includes(condition);
  },
});

export const validateRules = (rules: PlausibilityRule[], fields: FieldSpec[]): void => {
  const known = new Set(fields.map((field) => field.name));
  const seen = new Set<string>();

  for (const rule of rules) {
    if (seen.has(rule.id)) {
      throw new ConfigurationError(`Duplicate plausibility rule id "${rule.id}".`);
    }
    seen.add(rule.id);

    if (rule.fields.length === 0) {
      throw new ConfigurationError(`Plausibility rule "${rule.id}" names no fields.`);
    }

    for (const fieldName of rule.fields) {
      if (!known.has(fieldName)) {
        throw new ConfigurationError(
          `Plausibility rule "${rule.id}" references unknown field "${fieldName}".`,
        );
      }
    }

    if (rule.clarifyField !== undefined && !rule.fields.includes(rule.clarifyField)) {
      throw new ConfigurationError(
        `Plausibility rule "${rule.id}" clarifies "${rule.clarifyField}", which it does not involve.`,
      );
    }
  }
};

export const clarifyTarget = (rule: PlausibilityRule): string =>
  rule.clarifyField ?? rule.fields[0] ?? rule.id;

export const toInconsistency = (rule: PlausibilityRule): Inconsistency => ({
  ruleId: rule.id,
  fieldsInvolved: [...rule.fields],
  severity: rule.severity,
  description: rule.description,
  resolved: false,
});

/** Evaluates rules in order and returns one inconsistency per violated rule. */
export const evaluateRules = (rules: PlausibilityRule[], context: RuleContext): Inconsistency[] =>
  rules.filter((rule) => !rule.check(context)).map(toInconsistency);
