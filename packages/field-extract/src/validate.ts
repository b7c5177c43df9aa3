import type { ClarificationResponse, ExtractedField, FieldDescriptor } from '@clinical/api';
import { isObject, toFieldValue } from './values.js';

const parseNumber = (value: unknown, label: string): number => {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new Error(`${label} must be a finite number.`);
  }
  return value;
};

const parseString = (value: unknown, label: string): string => {
  if (typeof value !== 'string') {
    throw new Error(`${label} must be a string.`);
  }
  return value;
};

const parseConfidence = (value: unknown, label: string): number => {
  const confidence = parseNumber(value, label);
  if (confidence < 0 || confidence > 1) {
    throw new Error(`${label} must be in [0,1].`);
  }
  return confidence;
};

const optionalString = (value: unknown): string => (typeof value === 'string' ? value : '');

const optionalUnit = (value: unknown): string | null =>
  typeof value === 'string' && value.trim().length > 0 ? value.trim() : null;

export const findFirstJsonObject = (input: string): string | null => {
  const startIndex = input.indexOf('{');
  if (startIndex < 0) {
    return null;
  }

  let depth = 0;
  let inString = false;
  let escaping = false;

  for (let index = startIndex; index < input.length; index += 1) {
    const ch = input[index];

    if (inString) {
      if (escaping) {
        escaping = false;
        continue;
      }

      if (ch === '\\') {
        escaping = true;
        continue;
      }

      if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
      continue;
    }

    if (ch === '{') {
      depth += 1;
      continue;
    }

    if (ch === '}') {
      depth -= 1;
      if (depth === 0) {
        return input.slice(startIndex, index + 1);
      }
    }
  }

  return null;
};

type JsonParse = { ok: true; value: unknown } | { ok: false; message: string };

const tryParseJson = (input: string): JsonParse => {
  try {
    return { ok: true, value: JSON.parse(input) };
  } catch (error) {
    return { ok: false, message: error instanceof Error ? error.message : String(error) };
  }
};

/** Parses model output as JSON, falling back to the first balanced object inside it. */
export const parseModelJson = (rawOutput: string): unknown => {
  const trimmed = rawOutput.trim();

  const whole = tryParseJson(trimmed);
  if (whole.ok) {
    return whole.value;
  }

  const candidate = findFirstJsonObject(trimmed);
  const embedded = candidate ? tryParseJson(candidate) : null;
  if (embedded?.ok) {
    return embedded.value;
  }

  throw new Error(
    `Model output is not valid JSON: ${whole.message}. Raw output: ${trimmed.slice(0, 1200)}`,
  );
};

export const validateFieldExtraction = (
  raw: unknown,
  schema: FieldDescriptor[],
): ExtractedField[] => {
  if (!isObject(raw)) {
    throw new Error('Extraction must be an object.');
  }

  const fieldsRaw = raw.fields;
  if (!Array.isArray(fieldsRaw)) {
    throw new Error('fields must be an array.');
  }

  const byName = new Map(schema.map((field) => [field.name, field]));
  const seen = new Set<string>();

  return fieldsRaw.flatMap((fieldRaw: unknown, index): ExtractedField[] => {
    if (!isObject(fieldRaw)) {
      throw new Error(`fields[${index}] must be an object.`);
    }

    const name = parseString(fieldRaw.name, `fields[${index}].name`);
    const descriptor = byName.get(name);
    if (!descriptor || seen.has(name)) {
      return [];
    }
    seen.add(name);

    return [
      {
        fieldName: name,
        value: toFieldValue(descriptor, fieldRaw.value, optionalUnit(fieldRaw.unit)),
        confidence: parseConfidence(fieldRaw.confidence, `fields[${index}].confidence`),
        complete: fieldRaw.complete !== false,
        citation: optionalString(fieldRaw.citation),
        reasoning: optionalString(fieldRaw.reasoning),
      },
    ];
  });
};

export const parseFieldExtractionOutput = (
  rawOutput: string,
  schema: FieldDescriptor[],
): ExtractedField[] => validateFieldExtraction(parseModelJson(rawOutput), schema);

export const parseClarificationOutput = (
  rawOutput: string,
  field: FieldDescriptor,
): ClarificationResponse => {
  const raw = parseModelJson(rawOutput);
  if (!isObject(raw)) {
    throw new Error('Clarification must be an object.');
  }

  const answer = parseString(raw.answer, 'answer');
  const value = toFieldValue(field, raw.value, optionalUnit(raw.unit));
  if (value === null) {
    return { answer, candidate: null };
  }

  return {
    answer,
    candidate: {
      fieldName: field.name,
      value,
      confidence: parseConfidence(raw.confidence, 'confidence'),
      complete: raw.complete !== false,
      citation: optionalString(raw.citation),
      reasoning: optionalString(raw.reasoning),
    },
  };
};
