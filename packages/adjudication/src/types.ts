import type {
  ClarificationRequest,
  ClarificationResponse,
  FieldCandidate,
  FieldDescriptor,
  FieldValue,
} from '@clinical/api';

export interface FieldSpec extends FieldDescriptor {
  /** Counts toward the completeness ratio. Defaults to true. */
  required?: boolean;
  /** Weight in the record's overall confidence. Defaults to 1. */
  weight?: number;
  /** Absolute tolerance for numeric fields, in canonical units; days for date fields. */
  tolerance?: number;
  /** Multiplier from each accepted unit to `canonicalUnit`, e.g. `{ Gy: 100 }` for cGy. */
  unitConversions?: Record<string, number>;
  /** Canonical enum value mapped to the spellings that mean the same thing. */
  synonyms?: Record<string, string[]>;
}

export interface NormalizedCandidate {
  candidate: FieldCandidate;
  value: FieldValue;
}

export type Clarifier = (request: ClarificationRequest) => Promise<ClarificationResponse>;
