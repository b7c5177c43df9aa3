import { compareDocumentDates } from './aggregate.js';
import type { FieldSpec, NormalizedCandidate } from './types.js';

export interface PrecedenceContext {
  field: FieldSpec;
  agreementThreshold: number;
}

/**
 * Narrows the contender pool for a disputed field. Returning null (or an empty list) means the
 * rule does not apply and the pool passes through unchanged.
 */
export interface PrecedenceRule {
  id: string;
  narrow: (pool: NormalizedCandidate[], context: PrecedenceContext) => NormalizedCandidate[] | null;
}

export const clarificationResponseRule: PrecedenceRule = {
  id: 'clarification-response',
  narrow: (pool, context) => {
    const answers = pool.filter(
      (entry) =>
        entry.candidate.sourceKind === 'clarification' &&
        entry.candidate.confidence >= context.agreementThreshold,
    );
    const latest = answers.at(-1);
    return latest ? [latest] : null;
  },
};

export const structuredCompleteRule: PrecedenceRule = {
  id: 'structured-complete',
  narrow: (pool, context) => {
    const structured = pool.find((entry) => entry.candidate.sourceKind === 'structured');
    if (
      !structured ||
      !structured.candidate.complete ||
      structured.candidate.confidence < context.agreementThreshold
    ) {
      return null;
    }
    return [structured];
  },
};

export const documentPriorityRule: PrecedenceRule = {
  id: 'document-priority',
  narrow: (pool) => {
    const documents = pool.filter((entry) => entry.candidate.sourceKind === 'document');
    if (documents.length === 0) {
      return null;
    }

    const best = Math.min(...documents.map((entry) => entry.candidate.sourcePriority));
    return documents.filter((entry) => entry.candidate.sourcePriority === best);
  },
};

export const documentRecencyRule: PrecedenceRule = {
  id: 'document-recency',
  narrow: (pool) => {
    const documents = pool.filter((entry) => entry.candidate.sourceKind === 'document');
    if (documents.length === 0) {
      return null;
    }

    let newest: NormalizedCandidate[] = [];
    for (const entry of documents) {
      const latest = newest[0];
      const order = latest
        ? compareDocumentDates(entry.candidate.documentDate, latest.candidate.documentDate)
        : 1;
      if (order > 0) {
        newest = [entry];
      } else if (order === 0) {
        newest.push(entry);
      }
    }
    return newest;
  },
};

export const DEFAULT_PRECEDENCE: readonly PrecedenceRule[] = [
  clarificationResponseRule,
  structuredCompleteRule,
  documentPriorityRule,
  documentRecencyRule,
];
