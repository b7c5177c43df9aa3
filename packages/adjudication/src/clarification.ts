import type {
  AdjudicatedField,
  ClarificationOutcome,
  ClarificationRequest,
  ClarificationResponse,
  ClarificationRound,
  FieldCandidate,
  Logger,
} from '@clinical/api';
import { describeError } from '@clinical/api';
import { type PlausibilityRule, createRuleContext } from './consistency.js';
import { requireHandler } from './field-kinds.js';
import { type ResolutionContext, normalizeCandidates, resolveField } from './resolve-field.js';
import type { Clarifier, FieldSpec } from './types.js';

export interface ClarificationTask {
  field: FieldSpec;
  initial: AdjudicatedField;
  candidates: FieldCandidate[];
  /** Violated rules this field was targeted for; they must pass for the field to be clean. */
  violatedRules: PlausibilityRule[];
}

export interface ClarificationSettings {
  clarifier: Clarifier;
  maxRounds: number;
  exhaustedConfidenceCap: number;
  resolution: ResolutionContext;
  /** Adjudicated fields as they stood before clarification began. */
  snapshot: Readonly<Record<string, AdjudicatedField>>;
  anchors: Readonly<Record<string, string>>;
  logger: Logger;
}

export interface ClarificationResult {
  field: AdjudicatedField;
  rounds: ClarificationRound[];
}

export const finalizeExhausted = (field: AdjudicatedField, cap: number): AdjudicatedField => ({
  ...field,
  needsManualReview: true,
  confidence: Math.min(field.confidence, cap),
});

export const buildClarificationQuestion = (
  task: ClarificationTask,
  current: AdjudicatedField,
  resolution: ResolutionContext,
): string => {
  const { field } = task;
  const handler = requireHandler(resolution.registry, field);
  const label = field.description ? `${field.name} (${field.description})` : field.name;

  if (current.needsManualReview) {
    const readings = normalizeCandidates(field, task.candidates, resolution)
      .map((entry) => `"${handler.format(entry.value)}" from ${entry.candidate.sourceId}`)
      .join(', ');
    return `The sources disagree on ${label}: ${readings}. What is the correct value?`;
  }

  const reading = current.finalValue ? `"${handler.format(current.finalValue)}"` : 'missing';
  const problems = task.violatedRules.map((rule) => rule.description).join('; ');
  return `${label} was read as ${reading}, but ${problems}. What is the correct value?`;
};

const isClean = (
  task: ClarificationTask,
  field: AdjudicatedField,
  settings: ClarificationSettings,
): boolean => {
  if (field.needsManualReview || field.finalValue === null) {
    return false;
  }

  const context = createRuleContext({ ...settings.snapshot, [field.fieldName]: field }, settings.anchors);
  return task.violatedRules.every((rule) => rule.check(context));
};

const askClarifier = async (
  settings: ClarificationSettings,
  request: ClarificationRequest,
): Promise<ClarificationResponse | null> => {
  try {
    return await settings.clarifier(request);
  } catch (error) {
    settings.logger.warn(
      `Clarification round ${request.roundNumber} for ${request.fieldName} failed: ${describeError(error)}`,
    );
    return null;
  }
};

/**
 * Runs clarification rounds for one field until it resolves cleanly or `maxRounds` is reached.
 * Rounds are strictly sequential: each question includes the answers gathered so far.
 */
export const clarifyField = async (
  task: ClarificationTask,
  settings: ClarificationSettings,
): Promise<ClarificationResult> => {
  const { field } = task;
  const candidates = [...task.candidates];
  const rounds: ClarificationRound[] = [];
  let current = task.initial;

  for (let roundNumber = 1; roundNumber <= settings.maxRounds; roundNumber += 1) {
    const question = buildClarificationQuestion({ ...task, candidates }, current, settings.resolution);
    const response = await askClarifier(settings, {
      fieldName: field.name,
      field: {
        name: field.name,
        kind: field.kind,
        description: field.description,
        allowedValues: field.allowedValues,
        canonicalUnit: field.canonicalUnit,
      },
      roundNumber,
      question,
      evidence: [...candidates],
    });

    if (response?.candidate && response.candidate.value !== null) {
      candidates.push({
        ...response.candidate,
        fieldName: field.name,
        sourceKind: 'clarification',
        sourceId: `clarification:${field.name}:${roundNumber}`,
        sourcePriority: 0,
        documentDate: null,
      });
      current = resolveField(field, candidates, settings.resolution);
    }

    const clean = isClean(task, current, settings);
    const outcome: ClarificationOutcome = clean
      ? 'resolved'
      : roundNumber === settings.maxRounds
        ? 'exhausted'
        : 'unresolved';

    rounds.push({
      roundNumber,
      fieldName: field.name,
      question,
      response: response?.answer ?? null,
      outcome,
    });

    if (clean) {
      settings.logger.info(`Clarified ${field.name} in round ${roundNumber}`);
      return { field: current, rounds };
    }
  }

  settings.logger.warn(
    `Clarification exhausted for ${field.name} after ${settings.maxRounds} rounds`,
  );
  return { field: finalizeExhausted(task.initial, settings.exhaustedConfidenceCap), rounds };
};
