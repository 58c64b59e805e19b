import { logger } from '../../infrastructure/logger.js';
import type { ConfidenceAdjustment, NormalizedField } from '../../domain/types.js';
import { getHandler } from '../normalization/index.js';
import type { ConfidenceResult, ScoringContext } from './types.js';

const log = logger.child({ module: 'confidence' });

export const PENALTIES = {
  PLAUSIBLE_ONLY: 0.08,
  CORROBORATION_CONFLICT: 0.15,
} as const;

/** A plausible value never scores below 0.85 on its own signals. */
export const PLAUSIBLE_MAX_PENALTY = 0.15;

function sumPenalties(adjustments: ConfidenceAdjustment[]): number {
  return adjustments.reduce((sum, a) => sum + a.penalty, 0);
}

function round(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Confidence in [0, 1] for one normalized field. Pure: the same field and
 * context always give the same result.
 */
export function computeFieldConfidence(
  field: NormalizedField,
  context: ScoringContext = {},
): ConfidenceResult {
  const { outcome } = field;

  if (outcome.status === 'failed') {
    return {
      confidence: 0,
      adjustments: [{ reason: `normalization_failed:${outcome.failure.code}`, penalty: 1 }],
    };
  }

  const adjustments: ConfidenceAdjustment[] = [...getHandler(field.kind).score(outcome)];

  if (outcome.status === 'plausible') {
    adjustments.push({ reason: 'plausible_only', penalty: PENALTIES.PLAUSIBLE_ONLY });
  }

  const intrinsic = sumPenalties(adjustments);
  let totalPenalty = outcome.status === 'plausible' ? Math.min(intrinsic, PLAUSIBLE_MAX_PENALTY) : intrinsic;

  if (context.corroborationConflict !== undefined) {
    adjustments.push({
      reason: 'corroboration_conflict',
      penalty: PENALTIES.CORROBORATION_CONFLICT,
      field: context.corroborationConflict,
    });
    totalPenalty += PENALTIES.CORROBORATION_CONFLICT;
  }

  const confidence = round(Math.max(0, Math.min(1, 1 - totalPenalty)));

  if (adjustments.length > 0) {
    log.debug(
      { recordId: field.recordId, field: field.fieldName, confidence, adjustmentCount: adjustments.length },
      'Confidence adjusted',
    );
  }

  return { confidence, adjustments };
}
