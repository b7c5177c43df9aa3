import { ConfigurationError, type FieldKind, type FieldValue } from '@clinical/api';
import type { FieldSpec } from './types.js';

export interface FieldKindHandler {
  normalize: (value: FieldValue, field: FieldSpec) => FieldValue | null;
  equals: (a: FieldValue, b: FieldValue, field: FieldSpec) => boolean;
  format: (value: FieldValue) => string;
}

export type FieldKindRegistry = ReadonlyMap<FieldKind, FieldKindHandler>;

/** Default agreement tolerances; a field's own `tolerance` overrides these. */
export const DEFAULT_TOLERANCES = {
  numeric: 0,
  dateDays: 0,
} as const;

const DAY_MS = 86_400_000;
const NUMERIC_TEXT_PATTERN = /^\s*(-?\d+(?:\.\d+)?)\s*([a-zA-Zµ%]+)?\s*$/;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:[T ].*)?$/;

const fold = (value: string): string => value.trim().replace(/\s+/g, ' ').toLowerCase();

/** Days since the epoch for a `YYYY-MM-DD` (or ISO date-time) string, or null if invalid. */
export const parseIsoDate = (value: string): number | null => {
  const match = ISO_DATE_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const time = Date.UTC(year, month - 1, day);
  const check = new Date(time);
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day
  ) {
    return null;
  }

  return time / DAY_MS;
};

const formatIsoDate = (days: number): string => new Date(days * DAY_MS).toISOString().slice(0, 10);

const withinTolerance = (a: number, b: number, tolerance: number): boolean =>
  Math.abs(a - b) <= tolerance + Number.EPSILON * Math.max(Math.abs(a), Math.abs(b), 1);

const findConversion = (unit: string, field: FieldSpec): number | null => {
  if (field.canonicalUnit && fold(unit) === fold(field.canonicalUnit)) {
    return 1;
  }

  for (const [candidate, factor] of Object.entries(field.unitConversions ?? {})) {
    if (fold(candidate) === fold(unit)) {
      return factor;
    }
  }

  return null;
};

const numericHandler: FieldKindHandler = {
  normalize: (value, field) => {
    let amount: number;
    let unit: string | null;

    if (value.kind === 'numeric') {
      amount = value.value;
      unit = value.unit;
    } else if (value.kind === 'text' || value.kind === 'enum') {
      const match = NUMERIC_TEXT_PATTERN.exec(value.value);
      if (!match) {
        return null;
      }
      amount = Number(match[1]);
      unit = match[2] ?? null;
    } else {
      return null;
    }

    if (!Number.isFinite(amount)) {
      return null;
    }

    if (!field.canonicalUnit) {
      return { kind: 'numeric', value: amount, unit };
    }

    const factor = findConversion(unit ?? field.canonicalUnit, field);
    if (factor === null) {
      return null;
    }

    return { kind: 'numeric', value: amount * factor, unit: field.canonicalUnit };
  },
  equals: (a, b, field) => {
    if (a.kind !== 'numeric' || b.kind !== 'numeric' || a.unit !== b.unit) {
      return false;
    }
    return withinTolerance(a.value, b.value, field.tolerance ?? DEFAULT_TOLERANCES.numeric);
  },
  format: (value) =>
    value.kind === 'numeric' && value.unit ? `${value.value} ${value.unit}` : String(value.value),
};

const dateHandler: FieldKindHandler = {
  normalize: (value) => {
    if (value.kind !== 'date' && value.kind !== 'text') {
      return null;
    }

    const days = parseIsoDate(value.value);
    return days === null ? null : { kind: 'date', value: formatIsoDate(days) };
  },
  equals: (a, b, field) => {
    if (a.kind !== 'date' || b.kind !== 'date') {
      return false;
    }

    const left = parseIsoDate(a.value);
    const right = parseIsoDate(b.value);
    if (left === null || right === null) {
      return false;
    }

    return Math.abs(left - right) <= (field.tolerance ?? DEFAULT_TOLERANCES.dateDays);
  },
  format: (value) => String(value.value),
};

const enumHandler: FieldKindHandler = {
  normalize: (value, field) => {
    if (value.kind !== 'enum' && value.kind !== 'text') {
      return null;
    }

    const folded = fold(value.value);
    if (folded.length === 0) {
      return null;
    }

    for (const [canonical, variants] of Object.entries(field.synonyms ?? {})) {
      if (fold(canonical) === folded || variants.some((variant) => fold(variant) === folded)) {
        return { kind: 'enum', value: canonical };
      }
    }

    const allowed = field.allowedValues?.find((candidate) => fold(candidate) === folded);
    return { kind: 'enum', value: allowed ?? folded };
  },
  equals: (a, b) => a.kind === 'enum' && b.kind === 'enum' && a.value === b.value,
  format: (value) => String(value.value),
};

const textHandler: FieldKindHandler = {
  normalize: (value) => {
    if (value.kind !== 'text' && value.kind !== 'enum') {
      return null;
    }

    const folded = fold(value.value);
    return folded.length === 0 ? null : { kind: 'text', value: folded };
  },
  equals: (a, b) => a.kind === 'text' && b.kind === 'text' && a.value === b.value,
  format: (value) => String(value.value),
};

export const createFieldKindRegistry = (
  overrides: Partial<Record<FieldKind, FieldKindHandler>> = {},
): FieldKindRegistry =>
  new Map<FieldKind, FieldKindHandler>([
    ['numeric', overrides.numeric ?? numericHandler],
    ['date', overrides.date ?? dateHandler],
    ['enum', overrides.enum ?? enumHandler],
    ['text', overrides.text ?? textHandler],
  ]);

export const requireHandler = (registry: FieldKindRegistry, field: FieldSpec): FieldKindHandler => {
  const handler = registry.get(field.kind);
  if (!handler) {
    throw new ConfigurationError(
      `No normalization registered for kind "${field.kind}" of field "${field.name}".`,
    );
  }
  return handler;
};
