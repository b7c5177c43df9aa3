import {
  allowedWhenRule,
  dateOrderRule,
  notBeforeAnchorRule,
  numericRangeRule,
} from '@clinical/adjudication';
import type { ConceptDefinition } from './types.js';

const EXTERNAL_BEAM = ['IMRT', 'VMAT', '3D-CRT', 'proton'];

/** A course of radiation treatment. Doses are kept in cGy. */
export const radiationConcept: ConceptDefinition = {
  name: 'radiation',
  fields: [
    { name: 'start_date', kind: 'date', description: 'first fraction delivered', weight: 2 },
    { name: 'stop_date', kind: 'date', description: 'last fraction delivered', tolerance: 1 },
    {
      name: 'total_dose',
      kind: 'numeric',
      description: 'total prescribed dose of the course',
      canonicalUnit: 'cGy',
      unitConversions: { Gy: 100 },
      weight: 2,
    },
    {
      name: 'fractions',
      kind: 'numeric',
      description: 'number of fractions',
      canonicalUnit: 'fx',
      unitConversions: { fraction: 1, fractions: 1 },
    },
    {
      name: 'boost_dose',
      kind: 'numeric',
      description: 'boost dose, if a boost was given',
      canonicalUnit: 'cGy',
      unitConversions: { Gy: 100 },
      required: false,
    },
    {
      name: 'site',
      kind: 'enum',
      description: 'treated anatomical site',
      allowedValues: ['brain', 'posterior fossa', 'spine', 'craniospinal'],
      synonyms: { craniospinal: ['CSI', 'cranio-spinal'], 'posterior fossa': ['PF'] },
    },
    {
      name: 'modality',
      kind: 'enum',
      description: 'treatment technique',
      allowedValues: [...EXTERNAL_BEAM, 'brachytherapy'],
      synonyms: { proton: ['proton therapy', 'PBS', 'pencil beam scanning'] },
    },
  ],
  rules: [
    dateOrderRule('start_date', 'stop_date'),
    notBeforeAnchorRule('start_date', 'diagnosis_date'),
    numericRangeRule('total_dose', { min: 100, max: 8000 }),
    numericRangeRule('fractions', { min: 1, max: 60 }, { severity: 'low' }),
    allowedWhenRule('boost_dose', 'modality', EXTERNAL_BEAM),
  ],
  structured: {
    mapping: {
      start_date: 'radiation_start_date',
      stop_date: 'radiation_stop_date',
      total_dose: { key: 'total_dose', unitKey: 'total_dose_unit' },
      fractions: 'fraction_count',
      site: 'treatment_site',
      modality: 'modality',
    },
  },
  anchors: { diagnosis_date: 'diagnosis_date' },
};
