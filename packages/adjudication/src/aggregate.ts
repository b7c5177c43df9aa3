import type { ExtractedField, FieldCandidate, SourceExtraction } from '@clinical/api';

export interface SourceIdentity {
  sourceKind: SourceExtraction['sourceKind'];
  sourceId: string;
  sourcePriority: number;
  documentDate: string | null;
}

export interface AggregationInput {
  structured?: SourceExtraction | null;
  documents: SourceExtraction[];
}

export type CandidatesByField = Map<string, FieldCandidate[]>;

const ZONELESS_DATE_TIME = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?$/;

// Date-only strings parse as UTC, so date-times without an offset are read as UTC too.
const dateRank = (value: string | null): number => {
  if (value === null) {
    return Number.NEGATIVE_INFINITY;
  }
  const trimmed = value.trim();
  const time = Date.parse(
    ZONELESS_DATE_TIME.test(trimmed) ? `${trimmed.replace(' ', 'T')}Z` : trimmed,
  );
  return Number.isNaN(time) ? Number.NEGATIVE_INFINITY : time;
};

/** Compares two instants the way `documentDate` ordering does: missing dates are oldest. */
export const compareDocumentDates = (a: string | null, b: string | null): number => {
  const left = dateRank(a);
  const right = dateRank(b);
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
};

export const compareDocumentSources = (
  a: Pick<SourceExtraction, 'sourcePriority' | 'documentDate' | 'sourceId'>,
  b: Pick<SourceExtraction, 'sourcePriority' | 'documentDate' | 'sourceId'>,
): number => {
  if (a.sourcePriority !== b.sourcePriority) {
    return a.sourcePriority - b.sourcePriority;
  }

  const byDate = compareDocumentDates(b.documentDate, a.documentDate);
  if (byDate !== 0) {
    return byDate;
  }

  if (a.sourceId === b.sourceId) {
    return 0;
  }
  return a.sourceId < b.sourceId ? -1 : 1;
};

const stamp = (candidate: FieldCandidate, source: SourceExtraction): FieldCandidate => ({
  ...candidate,
  sourceKind: source.sourceKind,
  sourceId: source.sourceId,
  sourcePriority: source.sourcePriority,
  documentDate: source.documentDate,
});

export const createSourceExtraction = (
  source: SourceIdentity,
  fields: ExtractedField[],
): SourceExtraction =>
  Object.freeze({
    ...source,
    candidates: Object.freeze(
      fields.map((field) =>
        Object.freeze({
          ...field,
          sourceKind: source.sourceKind,
          sourceId: source.sourceId,
          sourcePriority: source.sourcePriority,
          documentDate: source.documentDate,
        }),
      ),
    ),
  });

/**
 * Groups candidates by field: the structured source first, then documents by ascending
 * priority, most recent first within a priority, then by source id.
 */
export const aggregateCandidates = (input: AggregationInput): CandidatesByField => {
  const sources: SourceExtraction[] = [];
  if (input.structured) {
    sources.push(input.structured);
  }
  sources.push(...[...input.documents].sort(compareDocumentSources));

  const byField: CandidatesByField = new Map();
  for (const source of sources) {
    for (const candidate of source.candidates) {
      const bucket = byField.get(candidate.fieldName);
      if (bucket) {
        bucket.push(stamp(candidate, source));
      } else {
        byField.set(candidate.fieldName, [stamp(candidate, source)]);
      }
    }
  }

  return byField;
};
