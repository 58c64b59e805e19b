import type { ConfidenceThresholds } from '../../infrastructure/config.js';
import type { ConfidenceAdjustment, FieldScore, IssueFinding } from '../../domain/types.js';

export type { ConfidenceThresholds } from '../../infrastructure/config.js';

export interface ScoringContext {
  /** Field of the same record that contradicts this one. */
  corroborationConflict?: string;
}

export interface ConfidenceResult {
  confidence: number;
  adjustments: ConfidenceAdjustment[];
}

export interface RecordScoring {
  scores: FieldScore[];
  findings: IssueFinding[];
}

export interface ScoringOptions {
  thresholds: ConfidenceThresholds;
}
