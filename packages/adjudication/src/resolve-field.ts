import type { AdjudicatedField, FieldCandidate, FieldConflict, Logger } from '@clinical/api';
import { type FieldKindHandler, type FieldKindRegistry, requireHandler } from './field-kinds.js';
import type { PrecedenceRule } from './precedence.js';
import type { FieldSpec, NormalizedCandidate } from './types.js';

export const UNRESOLVED_RULE = 'unresolved';

export interface ResolutionContext {
  registry: FieldKindRegistry;
  precedence: readonly PrecedenceRule[];
  agreementThreshold: number;
  corroborationBonus: number;
  logger: Logger;
}

const unique = (values: string[]): string[] => [...new Set(values)];

const corroboratedConfidence = (group: NormalizedCandidate[], bonus: number): number => {
  const best = Math.max(...group.map((entry) => entry.candidate.confidence));
  return Math.min(1, best + bonus * (group.length - 1));
};

const allAgree = (
  pool: NormalizedCandidate[],
  handler: FieldKindHandler,
  field: FieldSpec,
): boolean =>
  pool.every((left, index) =>
    pool.slice(index + 1).every((right) => handler.equals(left.value, right.value, field)),
  );

export const normalizeCandidates = (
  field: FieldSpec,
  candidates: FieldCandidate[],
  context: Pick<ResolutionContext, 'registry' | 'logger'>,
): NormalizedCandidate[] => {
  const handler = requireHandler(context.registry, field);
  const normalized: NormalizedCandidate[] = [];

  for (const candidate of candidates) {
    if (candidate.value === null) {
      continue;
    }

    const value = handler.normalize(candidate.value, field);
    if (value === null) {
      context.logger.warn(
        `Dropping ${field.name} candidate from ${candidate.sourceId}: cannot normalize ${JSON.stringify(candidate.value)}`,
      );
      continue;
    }

    normalized.push({ candidate, value });
  }

  return normalized;
};

const pickMergePrimary = (
  pool: NormalizedCandidate[],
  agreementThreshold: number,
): NormalizedCandidate | undefined =>
  pool.find(
    (entry) =>
      entry.candidate.sourceKind === 'structured' &&
      entry.candidate.confidence >= agreementThreshold,
  ) ??
  pool.find((entry) => entry.candidate.sourceKind === 'document') ??
  pool[0];

const buildResolvedField = (
  field: FieldSpec,
  handler: FieldKindHandler,
  all: NormalizedCandidate[],
  primary: NormalizedCandidate,
  rule: string,
  resolved: boolean,
  bonus: number,
): AdjudicatedField => {
  const agreeing = all.filter((entry) => handler.equals(entry.value, primary.value, field));
  const competing = all.filter((entry) => !handler.equals(entry.value, primary.value, field));

  const conflicts: FieldConflict[] = competing.map((entry) => ({
    competingValue: entry.value,
    competingSourceId: entry.candidate.sourceId,
    resolutionRule: rule,
    resolved,
  }));

  return {
    fieldName: field.name,
    finalValue: primary.value,
    confidence: corroboratedConfidence(agreeing, bonus),
    primarySourceId: primary.candidate.sourceId,
    supportingSourceIds: unique(
      agreeing
        .filter((entry) => entry !== primary)
        .map((entry) => entry.candidate.sourceId)
        .filter((sourceId) => sourceId !== primary.candidate.sourceId),
    ),
    conflicts,
    needsManualReview: !resolved,
    resolution: resolved ? 'RESOLVED_BY_PRECEDENCE' : 'NEEDS_CLARIFICATION',
  };
};

/**
 * Resolves one field's candidates into a single adjudicated value. Pure and deterministic:
 * the same candidates in the same order always produce the same result.
 */
export const resolveField = (
  field: FieldSpec,
  candidates: FieldCandidate[],
  context: ResolutionContext,
): AdjudicatedField => {
  const handler = requireHandler(context.registry, field);
  const normalized = normalizeCandidates(field, candidates, context);

  const [first] = normalized;
  if (!first) {
    return {
      fieldName: field.name,
      finalValue: null,
      confidence: 0,
      primarySourceId: null,
      supportingSourceIds: [],
      conflicts: [],
      needsManualReview: false,
      resolution: 'MISSING',
    };
  }

  if (normalized.length === 1) {
    return {
      fieldName: field.name,
      finalValue: first.value,
      confidence: first.candidate.confidence,
      primarySourceId: first.candidate.sourceId,
      supportingSourceIds: [],
      conflicts: [],
      needsManualReview: false,
      resolution: 'SINGLE_SOURCE',
    };
  }

  if (allAgree(normalized, handler, field)) {
    const primary = pickMergePrimary(normalized, context.agreementThreshold) ?? first;
    return {
      fieldName: field.name,
      finalValue: primary.value,
      confidence: corroboratedConfidence(normalized, context.corroborationBonus),
      primarySourceId: primary.candidate.sourceId,
      supportingSourceIds: unique(
        normalized
          .filter((entry) => entry !== primary)
          .map((entry) => entry.candidate.sourceId)
          .filter((sourceId) => sourceId !== primary.candidate.sourceId),
      ),
      conflicts: [],
      needsManualReview: false,
      resolution: 'MERGED',
    };
  }

  const precedenceContext = { field, agreementThreshold: context.agreementThreshold };
  let pool = normalized;
  for (const rule of context.precedence) {
    const narrowed = rule.narrow(pool, precedenceContext);
    if (!narrowed || narrowed.length === 0) {
      continue;
    }

    pool = narrowed;
    const [winner] = pool;
    if (winner && allAgree(pool, handler, field)) {
      return buildResolvedField(
        field,
        handler,
        normalized,
        winner,
        rule.id,
        true,
        context.corroborationBonus,
      );
    }
  }

  return buildResolvedField(
    field,
    handler,
    normalized,
    pool[0] ?? first,
    UNRESOLVED_RULE,
    false,
    context.corroborationBonus,
  );
};
