import type { CountryCode } from 'libphonenumber-js';
import type {
  ConfidenceAdjustment,
  FieldKind,
  NormalizationOutcome,
  NormalizationSignal,
  NormalizationFailure,
  TypedValue,
} from '../../domain/types.js';

export interface NormalizeContext {
  defaultCountry: CountryCode;
  defaultCurrency: string;
  currencyAliases: Record<string, string>;
}

export interface Normalized {
  ruleId: string;
  outcome: NormalizationOutcome;
}

export type ParsedOutcome = Exclude<NormalizationOutcome, { status: 'failed' }>;

export interface FixProposal {
  suggestedValue: string;
  confidence: number;
}

/**
 * Everything the review pipeline needs to know about one field kind.
 * Implemented once per kind and looked up through the registry.
 */
export interface FieldKindHandler {
  kind: FieldKind;
  normalize(raw: string, ctx: NormalizeContext): Normalized;
  /** Kind-specific confidence adjustments for a parsed value. */
  score(outcome: ParsedOutcome): ConfidenceAdjustment[];
  /** Formatting-only correction of the raw surface, or null when none is safe. */
  proposeFix(raw: string, value: TypedValue): FixProposal | null;
  /** Equality key: two values are the same fact iff their keys match. */
  semanticKey(value: TypedValue): string;
}

export function valid(ruleId: string, value: TypedValue, signals: NormalizationSignal[] = []): Normalized {
  return { ruleId, outcome: { status: 'valid', value, signals } };
}

export function plausible(
  ruleId: string,
  value: TypedValue,
  violation: string,
  signals: NormalizationSignal[] = [],
): Normalized {
  return { ruleId, outcome: { status: 'plausible', value, signals, violation } };
}

export function failed(ruleId: string, failure: NormalizationFailure): Normalized {
  return { ruleId, outcome: { status: 'failed', failure } };
}

export function penaltiesFor(
  signals: NormalizationSignal[],
  table: Partial<Record<NormalizationSignal, number>>,
): ConfidenceAdjustment[] {
  const adjustments: ConfidenceAdjustment[] = [];
  for (const signal of signals) {
    const penalty = table[signal];
    if (penalty !== undefined) {
      adjustments.push({ reason: signal, penalty });
    }
  }
  return adjustments;
}
