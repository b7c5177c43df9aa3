import type { ClarificationRequest, FieldDescriptor } from '@clinical/api';

const describeField = (field: FieldDescriptor): string => {
  const parts = [`- ${field.name} (${field.kind})`];
  if (field.description) {
    parts.push(`: ${field.description}`);
  }
  if (field.canonicalUnit) {
    parts.push(`; report the unit, preferably ${field.canonicalUnit}`);
  }
  if (field.allowedValues && field.allowedValues.length > 0) {
    parts.push(`; one of ${field.allowedValues.map((value) => JSON.stringify(value)).join(', ')}`);
  }
  if (field.kind === 'date') {
    parts.push('; format YYYY-MM-DD');
  }
  return parts.join('');
};

export const buildFieldSystemPrompt = (schema: FieldDescriptor[]): string => {
  return [
    'Extract the requested clinical fields from the source. Return exactly one JSON object and nothing else.',
    'No markdown, no explanations, no code fences.',
    'Schema:',
    '{"fields":[{"name":string,"value":string|number|null,"unit"?:string,"confidence":number,"complete":boolean,"citation":string,"reasoning":string}]}',
    'Fields:',
    ...schema.map(describeField),
    'Rules:',
    '- Report each requested field exactly once, using the field name as given.',
    '- Use null when the source does not state the value; never guess.',
    '- confidence is in [0,1] and reflects how explicitly the source states the value.',
    '- complete is false when the source mentions the value only partially or provisionally.',
    '- citation is the shortest verbatim snippet that supports the value.',
  ].join('\n');
};

export const buildFieldPrompt = (source: string, schema: FieldDescriptor[]): string => {
  return [buildFieldSystemPrompt(schema), '', 'Input:', source].join('\n');
};

export const buildClarificationPrompt = (request: ClarificationRequest): string => {
  const evidence = request.evidence.map((candidate) => {
    const value = candidate.value ? JSON.stringify(candidate.value.value) : 'null';
    const citation = candidate.citation ? ` ("${candidate.citation}")` : '';
    return `- ${candidate.sourceId}: ${value}${citation}`;
  });

  return [
    `Answer a clarification question about one clinical field (round ${request.roundNumber}). Return exactly one JSON object and nothing else.`,
    'Schema:',
    '{"answer":string,"value":string|number|null,"unit"?:string,"confidence":number,"complete":boolean,"citation":string,"reasoning":string}',
    'Field:',
    describeField(request.field),
    'Evidence:',
    ...evidence,
    'Rules:',
    '- Use null for value when the evidence does not settle the question.',
    '- answer is one short sentence for a human reviewer.',
    '',
    'Question:',
    request.question,
  ].join('\n');
};
