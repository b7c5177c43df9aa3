import type { Result } from './result.js';

export type AppErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'INTERNAL_ERROR'
  | 'DB_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'CANCELLED';

export type Logger = Pick<Console, 'info' | 'warn' | 'error'>;

export interface SourceLocation {
  bucket: string;
  key: string;
  revision: string | null;
}

export interface CachedDocument {
  documentId: string;
  patientId: string;
  sourceLocation: SourceLocation;
  documentType: string;
  documentDate: string;
  contentType: string;
  extractedText: string;
  textLength: number;
  contentHash: string;
  extractionTimestamp: string;
  extractionMethod: string;
  extractionVersion: number;
  extractorName: string;
  extractionSuccess: boolean;
  extractionError: string | null;
}

/** Everything the locator provider knows about a document before it is fetched. */
export interface DocumentDescriptor {
  documentId: string;
  patientId: string;
  sourceLocation: SourceLocation;
  documentType: string;
  documentDate: string;
  contentType: string;
  sourcePriority: number;
}

export type FieldKind = 'numeric' | 'date' | 'enum' | 'text';

export type NumericValue = { kind: 'numeric'; value: number; unit: string | null };
export type DateValue = { kind: 'date'; value: string };
export type EnumValue = { kind: 'enum'; value: string };
export type TextValue = { kind: 'text'; value: string };

export type FieldValue = NumericValue | DateValue | EnumValue | TextValue;

export type SourceKind = 'structured' | 'document' | 'clarification';

export interface FieldCandidate {
  fieldName: string;
  value: FieldValue | null;
  confidence: number;
  sourceKind: SourceKind;
  sourceId: string;
  sourcePriority: number;
  documentDate: string | null;
  complete: boolean;
  citation: string;
  reasoning: string;
}

/** What a Field Extractor reports for one field, before source metadata is attached. */
export type ExtractedField = Pick<
  FieldCandidate,
  'fieldName' | 'value' | 'confidence' | 'complete' | 'citation' | 'reasoning'
>;

export interface SourceExtraction {
  readonly sourceKind: Exclude<SourceKind, 'clarification'>;
  readonly sourceId: string;
  readonly sourcePriority: number;
  readonly documentDate: string | null;
  readonly candidates: ReadonlyArray<FieldCandidate>;
}

export type ResolutionRuleId = string;

export interface FieldConflict {
  competingValue: FieldValue;
  competingSourceId: string;
  resolutionRule: ResolutionRuleId;
  resolved: boolean;
}

export type FieldResolution =
  | 'MISSING'
  | 'SINGLE_SOURCE'
  | 'MERGED'
  | 'RESOLVED_BY_PRECEDENCE'
  | 'NEEDS_CLARIFICATION';

export interface AdjudicatedField {
  fieldName: string;
  finalValue: FieldValue | null;
  confidence: number;
  primarySourceId: string | null;
  supportingSourceIds: string[];
  conflicts: FieldConflict[];
  needsManualReview: boolean;
  resolution: FieldResolution;
}

export type Severity = 'low' | 'medium' | 'high';

export interface Inconsistency {
  ruleId: string;
  fieldsInvolved: string[];
  severity: Severity;
  description: string;
  resolved: boolean;
}

export type ClarificationOutcome = 'resolved' | 'unresolved' | 'exhausted';

export interface ClarificationRound {
  roundNumber: number;
  fieldName: string;
  question: string;
  response: string | null;
  outcome: ClarificationOutcome;
}

export interface AdjudicatedRecord {
  patientId: string;
  concept: string;
  fields: Record<string, AdjudicatedField>;
  inconsistencies: Inconsistency[];
  clarifications: ClarificationRound[];
  overallConfidence: number;
  completenessRatio: number;
}

export interface FieldDescriptor {
  name: string;
  kind: FieldKind;
  description?: string;
  allowedValues?: string[];
  canonicalUnit?: string;
}

export interface ClarificationRequest {
  fieldName: string;
  field: FieldDescriptor;
  roundNumber: number;
  question: string;
  evidence: FieldCandidate[];
}

export interface ClarificationResponse {
  answer: string;
  candidate: ExtractedField | null;
}

export type FieldExtractionInput =
  | { kind: 'text'; text: string }
  | { kind: 'structured'; context: Record<string, unknown> };

export interface FieldExtractor {
  extractFields(input: FieldExtractionInput, schema: FieldDescriptor[]): Promise<ExtractedField[]>;
  clarify(request: ClarificationRequest): Promise<ClarificationResponse>;
}

export interface StructuredContext {
  contextId: string;
  record: Record<string, unknown>;
}

export interface StructuredContextProvider {
  getStructuredContext(patientId: string, concept: string): Promise<StructuredContext | null>;
}

export interface DocumentLocatorProvider {
  listDocuments(patientId: string, concept: string): Promise<DocumentDescriptor[]>;
}

export interface RawBytesFetcher {
  fetch(location: SourceLocation): Promise<Uint8Array>;
}

export interface CacheStats {
  total: number;
  successRate: number;
  charTotal: number;
  byDocumentType: Record<string, number>;
  byContentType: Record<string, number>;
}

export interface ApiMethodMap {
  'health.ping': {
    input: Record<string, never>;
    output: Result<{ status: 'ok' }, AppErrorCode>;
  };
  'cache.get': {
    input: { documentId: string };
    output: Result<{ document: CachedDocument }, AppErrorCode>;
  };
  'cache.listByPatient': {
    input: { patientId: string; documentType?: string; successfulOnly?: boolean };
    output: Result<{ documents: CachedDocument[] }, AppErrorCode>;
  };
  'cache.stats': {
    input: { patientId: string };
    output: Result<{ stats: CacheStats }, AppErrorCode>;
  };
  'cache.export': {
    input: { patientId: string };
    output: Result<{ serialized: string; documentCount: number }, AppErrorCode>;
  };
  'cache.import': {
    input: { serialized: string };
    output: Result<{ imported: number }, AppErrorCode>;
  };
  'concept.extract': {
    input: { patientId: string; concept: string };
    output: Result<{ record: AdjudicatedRecord }, AppErrorCode>;
  };
}

export type ApiMethodName = keyof ApiMethodMap;

export type ApiInput<K extends ApiMethodName> = ApiMethodMap[K]['input'];
export type ApiOutput<K extends ApiMethodName> = ApiMethodMap[K]['output'];

export type ApiHandlers = {
  [K in ApiMethodName]: (input: ApiInput<K>) => Promise<ApiOutput<K>>;
};

export interface Api {
  call<K extends ApiMethodName>(method: K, input: ApiInput<K>): Promise<ApiOutput<K>>;
}

export const createApiFromHandlers = (handlers: ApiHandlers): Api => ({
  call: async (method, input) => handlers[method](input),
});
