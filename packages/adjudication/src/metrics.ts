import type { AdjudicatedField, AdjudicatedRecord } from '@clinical/api';
import type { FieldSpec } from './types.js';

export type RecordMetrics = Pick<AdjudicatedRecord, 'overallConfidence' | 'completenessRatio'>;

export const computeRecordMetrics = (
  specs: FieldSpec[],
  fields: Readonly<Record<string, AdjudicatedField>>,
): RecordMetrics => {
  let weightedConfidence = 0;
  let totalWeight = 0;
  let required = 0;
  let present = 0;

  for (const spec of specs) {
    const field = fields[spec.name];
    const hasValue = field !== undefined && field.finalValue !== null;

    // Missing fields count at their confidence of 0.
    const weight = spec.weight ?? 1;
    weightedConfidence += (field?.confidence ?? 0) * weight;
    totalWeight += weight;

    if (spec.required ?? true) {
      required += 1;
      if (hasValue) {
        present += 1;
      }
    }
  }

  return {
    overallConfidence: totalWeight > 0 ? weightedConfidence / totalWeight : 0,
    completenessRatio: required > 0 ? present / required : 1,
  };
};
