import type { FieldCatalog } from '../../infrastructure/field-catalog.js';
import type { ReviewConfig } from '../../infrastructure/config.js';
import type { IssueFinding, RawRecord } from '../../domain/types.js';

export interface ParsedCase {
  caseId: string;
  records: RawRecord[];
  /** Findings for records excluded before normalization. */
  findings: IssueFinding[];
  /** Every record in the input, malformed ones included. */
  recordCount: number;
}

export interface ReviewOptions {
  catalog?: FieldCatalog;
  config?: ReviewConfig;
  /** Overrides `config.autoApplyThreshold`. */
  autoApplyThreshold?: number;
  /** Overrides `config.timeoutMs`. */
  timeoutMs?: number;
  /** Millisecond clock used for the deadline. */
  now?: () => number;
  runId?: string;
}
