import {
  type AdjudicatedField,
  type AdjudicatedRecord,
  ConfigurationError,
  type FieldCandidate,
  type Inconsistency,
  type Logger,
  RunCancelledError,
  type SourceExtraction,
} from '@clinical/api';
import { z } from 'zod';
import { aggregateCandidates } from './aggregate.js';
import { type ClarificationResult, clarifyField, finalizeExhausted } from './clarification.js';
import {
  type PlausibilityRule,
  SEVERITY_RANK,
  clarifyTarget,
  createRuleContext,
  evaluateRules,
  validateRules,
} from './consistency.js';
import { type FieldKindRegistry, createFieldKindRegistry, requireHandler } from './field-kinds.js';
import { computeRecordMetrics } from './metrics.js';
import { DEFAULT_PRECEDENCE, type PrecedenceRule } from './precedence.js';
import { type ResolutionContext, resolveField } from './resolve-field.js';
import type { Clarifier, FieldSpec } from './types.js';

const EngineOptionsZ = z
  .object({
    agreementThreshold: z.number().min(0).max(1).default(0.8),
    corroborationBonus: z.number().min(0).max(1).default(0.05),
    maxRounds: z.number().int().min(1).default(3),
    reviewThreshold: z.number().min(0).max(1).default(0.5),
    exhaustedConfidenceCap: z.number().min(0).max(1).default(0.49),
  })
  .refine((options) => options.exhaustedConfidenceCap < options.reviewThreshold, {
    message: 'exhaustedConfidenceCap must be below reviewThreshold',
    path: ['exhaustedConfidenceCap'],
  });

export type EngineOptionsInput = z.input<typeof EngineOptionsZ>;
export type EngineOptions = z.output<typeof EngineOptionsZ>;

export interface AdjudicationEngineConfig {
  concept: string;
  fields: FieldSpec[];
  rules?: PlausibilityRule[];
  precedence?: readonly PrecedenceRule[];
  registry?: FieldKindRegistry;
  options?: EngineOptionsInput;
  logger?: Logger;
}

export interface AdjudicationInput {
  patientId: string;
  structured?: SourceExtraction | null;
  documents: SourceExtraction[];
  /** Dates supplied by the caller for anchor rules, e.g. `{ diagnosis_date: '2019-05-02' }`. */
  anchors?: Record<string, string>;
}

export interface AdjudicationRunOptions {
  clarifier?: Clarifier;
  signal?: AbortSignal;
}

export const parseEngineOptions = (input: EngineOptionsInput = {}): EngineOptions => {
  const parsed = EngineOptionsZ.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue?.path.join('.') ?? '';
    throw new ConfigurationError(
      `Invalid adjudication options at "${path}": ${issue?.message ?? 'unknown issue'}`,
    );
  }
  return parsed.data;
};

const deepFreeze = <T>(value: T): T => {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
};

const throwIfAborted = (signal: AbortSignal | undefined): void => {
  if (signal?.aborted) {
    throw new RunCancelledError();
  }
};

/**
 * Fuses the structured source and document sources of one concept into an adjudicated record.
 * Holds configuration only; every `adjudicate` call is independent.
 */
export class AdjudicationEngine {
  readonly concept: string;
  readonly options: EngineOptions;

  private readonly fields: FieldSpec[];
  private readonly rules: PlausibilityRule[];
  private readonly resolution: ResolutionContext;
  private readonly logger: Logger;

  constructor(config: AdjudicationEngineConfig) {
    this.concept = config.concept;
    this.options = parseEngineOptions(config.options);
    this.logger = config.logger ?? console;

    const registry = config.registry ?? createFieldKindRegistry();
    const names = new Set<string>();
    for (const field of config.fields) {
      if (names.has(field.name)) {
        throw new ConfigurationError(`Field "${field.name}" is defined more than once.`);
      }
      names.add(field.name);
      requireHandler(registry, field);
    }

    this.fields = [...config.fields];
    this.rules = [...(config.rules ?? [])];
    validateRules(this.rules, this.fields);

    this.resolution = {
      registry,
      precedence: config.precedence ?? DEFAULT_PRECEDENCE,
      agreementThreshold: this.options.agreementThreshold,
      corroborationBonus: this.options.corroborationBonus,
      logger: this.logger,
    };
  }

  get fieldSpecs(): readonly FieldSpec[] {
    return this.fields;
  }

  async adjudicate(
    input: AdjudicationInput,
    runOptions: AdjudicationRunOptions = {},
  ): Promise<AdjudicatedRecord> {
    const { signal, clarifier } = runOptions;
    throwIfAborted(signal);

    const byField = aggregateCandidates({
      structured: input.structured,
      documents: input.documents,
    });
    for (const fieldName of byField.keys()) {
      if (!this.fields.some((field) => field.name === fieldName)) {
        this.logger.warn(`Ignoring candidates for unknown field ${fieldName} in ${this.concept}`);
      }
    }

    const candidatesFor = (fieldName: string): FieldCandidate[] => byField.get(fieldName) ?? [];
    const fields: Record<string, AdjudicatedField> = {};
    for (const field of this.fields) {
      fields[field.name] = resolveField(field, candidatesFor(field.name), this.resolution);
    }

    throwIfAborted(signal);

    const anchors = input.anchors ?? {};
    const inconsistencies = evaluateRules(this.rules, createRuleContext(fields, anchors));
    const targets = this.collectTargets(fields, inconsistencies);

    const snapshot = { ...fields };
    const results = await Promise.all(
      targets.map(async ([field, violatedRules]): Promise<ClarificationResult> => {
        const initial = snapshot[field.name] ?? resolveField(field, [], this.resolution);
        if (!clarifier) {
          return {
            field: finalizeExhausted(initial, this.options.exhaustedConfidenceCap),
            rounds: [],
          };
        }

        return clarifyField(
          { field, initial, candidates: candidatesFor(field.name), violatedRules },
          {
            clarifier,
            maxRounds: this.options.maxRounds,
            exhaustedConfidenceCap: this.options.exhaustedConfidenceCap,
            resolution: this.resolution,
            snapshot,
            anchors,
            logger: this.logger,
          },
        );
      }),
    );

    for (const result of results) {
      fields[result.field.fieldName] = result.field;
    }

    const finalContext = createRuleContext(fields, anchors);
    const reconciled: Inconsistency[] = inconsistencies.map((inconsistency) => {
      const rule = this.rules.find((candidate) => candidate.id === inconsistency.ruleId);
      return { ...inconsistency, resolved: rule ? rule.check(finalContext) : false };
    });
    const seen = new Set(reconciled.map((inconsistency) => inconsistency.ruleId));
    for (const inconsistency of evaluateRules(this.rules, finalContext)) {
      if (!seen.has(inconsistency.ruleId)) {
        reconciled.push(inconsistency);
      }
    }

    const record: AdjudicatedRecord = {
      patientId: input.patientId,
      concept: this.concept,
      fields,
      inconsistencies: reconciled,
      clarifications: results.flatMap((result) => result.rounds),
      ...computeRecordMetrics(this.fields, fields),
    };

    this.logger.info(
      `Adjudicated ${this.concept} for patient ${input.patientId}: ` +
        `${reconciled.length} inconsistencies, ${record.clarifications.length} clarification rounds`,
    );

    return deepFreeze(record);
  }

  private collectTargets(
    fields: Record<string, AdjudicatedField>,
    inconsistencies: Inconsistency[],
  ): Array<[FieldSpec, PlausibilityRule[]]> {
    const targets = new Map<string, PlausibilityRule[]>();

    for (const field of this.fields) {
      if (fields[field.name]?.needsManualReview) {
        targets.set(field.name, []);
      }
    }

    for (const inconsistency of inconsistencies) {
      if (SEVERITY_RANK[inconsistency.severity] < SEVERITY_RANK.medium) {
        continue;
      }
      const rule = this.rules.find((candidate) => candidate.id === inconsistency.ruleId);
      if (!rule) {
        continue;
      }
      const target = clarifyTarget(rule);
      targets.set(target, [...(targets.get(target) ?? []), rule]);
    }

    return this.fields.flatMap((field): Array<[FieldSpec, PlausibilityRule[]]> => {
      const violated = targets.get(field.name);
      return violated ? [[field, violated]] : [];
    });
  }
}
