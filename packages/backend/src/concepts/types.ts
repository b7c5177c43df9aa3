import type { FieldSpec, PlausibilityRule } from '@clinical/adjudication';
import type { StructuredRecordExtractorOptions } from '@clinical/field-extract';

export interface ConceptDefinition {
  name: string;
  fields: FieldSpec[];
  rules: PlausibilityRule[];
  /** How the structured record's keys map onto the concept's fields. */
  structured: StructuredRecordExtractorOptions;
  /** Anchor name to the structured record key holding its date, e.g. the diagnosis date. */
  anchors: Record<string, string>;
}

export type ConceptRegistry = ReadonlyMap<string, ConceptDefinition>;

export const createConceptRegistry = (concepts: ConceptDefinition[]): ConceptRegistry => {
  const registry = new Map<string, ConceptDefinition>();
  for (const concept of concepts) {
    if (registry.has(concept.name)) {
      throw new Error(`Concept ${concept.name} is defined more than once.`);
    }
    registry.set(concept.name, concept);
  }
  return registry;
};
