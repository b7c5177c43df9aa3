import type {
  ClarificationResponse,
  ExtractedField,
  FieldDescriptor,
  FieldExtractionInput,
  FieldExtractor,
} from '@clinical/api';
import { toFieldValue } from './values.js';

const DEFAULT_STRUCTURED_CONFIDENCE = 0.95;

export interface StructuredFieldMapping {
  /** Record key holding the value. */
  key: string;
  /** Record key holding the value's unit, for numeric fields. */
  unitKey?: string;
}

export interface StructuredRecordExtractorOptions {
  /** Field name to record key; fields without an entry read the key of the same name. */
  mapping?: Record<string, string | StructuredFieldMapping>;
  confidence?: number;
}

const resolveMapping = (
  mapping: StructuredRecordExtractorOptions['mapping'],
  fieldName: string,
): StructuredFieldMapping => {
  const entry = mapping?.[fieldName];
  if (entry === undefined) {
    return { key: fieldName };
  }
  return typeof entry === 'string' ? { key: entry } : entry;
};

/** Reads fields straight out of a structured record without a model call. */
export const extractFromStructuredRecord = (
  record: Record<string, unknown>,
  schema: FieldDescriptor[],
  options: StructuredRecordExtractorOptions = {},
): ExtractedField[] => {
  const confidence = options.confidence ?? DEFAULT_STRUCTURED_CONFIDENCE;

  return schema.map((field) => {
    const { key, unitKey } = resolveMapping(options.mapping, field.name);
    const raw = record[key];
    const unitRaw = unitKey === undefined ? undefined : record[unitKey];
    const value = toFieldValue(field, raw, typeof unitRaw === 'string' ? unitRaw : null);

    return {
      fieldName: field.name,
      value,
      confidence: value === null ? 0 : confidence,
      complete: value !== null,
      citation: value === null ? '' : `${key}=${String(raw)}`,
      reasoning: value === null ? `No value under ${key}.` : `Read from structured field ${key}.`,
    };
  });
};

export const createStructuredRecordExtractor = (
  options: StructuredRecordExtractorOptions = {},
): FieldExtractor => ({
  extractFields: async (input: FieldExtractionInput, schema: FieldDescriptor[]) =>
    input.kind === 'structured' ? extractFromStructuredRecord(input.context, schema, options) : [],
  clarify: async (): Promise<ClarificationResponse> => ({
    answer: 'Structured records cannot be re-read.',
    candidate: null,
  }),
});

/** Sends structured inputs to one extractor and text inputs and clarifications to the other. */
export const routeFieldExtractors = (extractors: {
  structured: FieldExtractor;
  text: FieldExtractor;
}): FieldExtractor => ({
  extractFields: (input, schema) =>
    input.kind === 'structured'
      ? extractors.structured.extractFields(input, schema)
      : extractors.text.extractFields(input, schema),
  clarify: (request) => extractors.text.clarify(request),
});
