import type { FieldDescriptor, FieldValue } from '@clinical/api';

export const isObject = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
};

/**
 * Wraps a raw reading in the field's value variant. Numbers given as text stay text so the
 * adjudication registry can parse units out of them.
 */
export const toFieldValue = (
  field: FieldDescriptor,
  raw: unknown,
  unit: string | null = null,
): FieldValue | null => {
  if (raw === null || raw === undefined) {
    return null;
  }

  if (typeof raw === 'number') {
    if (!Number.isFinite(raw)) {
      return null;
    }
    if (field.kind === 'numeric') {
      return { kind: 'numeric', value: raw, unit };
    }
    return field.kind === 'enum'
      ? { kind: 'enum', value: String(raw) }
      : { kind: 'text', value: String(raw) };
  }

  if (typeof raw !== 'string') {
    return null;
  }

  const value = raw.trim();
  if (value.length === 0) {
    return null;
  }

  switch (field.kind) {
    case 'numeric':
      return { kind: 'text', value: unit ? `${value} ${unit}` : value };
    case 'date':
      return { kind: 'date', value };
    case 'enum':
      return { kind: 'enum', value };
    case 'text':
      return { kind: 'text', value };
  }
};
