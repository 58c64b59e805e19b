import { logger } from '../../infrastructure/logger.js';
import {
  getRecordTypeSpec,
  resolveFieldSpec,
  type FieldCatalog,
  type FieldSpec,
  type RecordTypeSpec,
} from '../../infrastructure/field-catalog.js';
import type {
  FieldKind,
  FieldScore,
  IssueFinding,
  NormalizedField,
  NormalizedRecord,
  Severity,
} from '../../domain/types.js';
import { decodeBirthDate, evidenceOf, parsedValue } from '../normalization/index.js';
import { computeFieldConfidence } from './confidence.js';
import type { ConfidenceThresholds, RecordScoring, ScoringOptions } from './types.js';

export type { ConfidenceResult, RecordScoring, ScoringContext, ScoringOptions } from './types.js';
export { computeFieldConfidence, PENALTIES, PLAUSIBLE_MAX_PENALTY } from './confidence.js';

const log = logger.child({ module: 'scoring' });

const CONTACT_KINDS: ReadonlySet<FieldKind> = new Set(['phone', 'email', 'fiscal_code', 'iban']);

export function thresholdFor(kind: FieldKind, thresholds: ConfidenceThresholds): number {
  if (CONTACT_KINDS.has(kind)) return thresholds.contact;
  if (kind === 'free_text') return thresholds.freeText;
  return thresholds.default;
}

export function failureSeverity(kind: FieldKind, spec: FieldSpec): Severity {
  if (CONTACT_KINDS.has(kind) || spec.impact !== 'none') return 'high';
  return kind === 'free_text' ? 'low' : 'medium';
}

export function lowConfidenceSeverity(field: NormalizedField): Severity {
  if (field.outcome.status === 'plausible' && CONTACT_KINDS.has(field.kind)) return 'high';
  return field.kind === 'free_text' ? 'low' : 'medium';
}

/**
 * Pairs of fields in one record that disagree with each other, keyed both
 * ways. Today the only pairing is a birth date against the date encoded in
 * a personal fiscal code.
 */
export function findCorroborationConflicts(
  record: NormalizedRecord,
  spec: RecordTypeSpec,
): Map<string, string> {
  const conflicts = new Map<string, string>();

  for (const [fieldName, fieldSpec] of Object.entries(spec.fields)) {
    if (fieldSpec.corroborates === undefined) continue;

    const date = parsedValue(record.fields[fieldName]);
    const code = parsedValue(record.fields[fieldSpec.corroborates]);
    if (date?.kind !== 'date' || date.day === null) continue;
    if (code?.kind !== 'fiscal_code' || code.form !== 'personal') continue;

    const encoded = decodeBirthDate(code.code);
    if (!encoded) continue;

    const agrees =
      encoded.yearTwoDigits === date.year % 100 &&
      encoded.month === date.month &&
      encoded.day === date.day;

    if (!agrees) {
      conflicts.set(fieldName, fieldSpec.corroborates);
      conflicts.set(fieldSpec.corroborates, fieldName);
    }
  }

  return conflicts;
}

function describeLowConfidence(field: NormalizedField, confidence: number, threshold: number): string {
  const prefix = field.outcome.status === 'plausible' ? `${field.outcome.violation}; ` : '';
  return `${prefix}confidence ${confidence} below threshold ${threshold}`;
}

export function scoreRecord(
  record: NormalizedRecord,
  catalog: FieldCatalog,
  options: ScoringOptions,
): RecordScoring {
  const conflicts = findCorroborationConflicts(record, getRecordTypeSpec(catalog, record.recordType));
  const scores: FieldScore[] = [];
  const findings: IssueFinding[] = [];

  for (const field of Object.values(record.fields)) {
    const { confidence, adjustments } = computeFieldConfidence(field, {
      corroborationConflict: conflicts.get(field.fieldName),
    });
    const threshold = thresholdFor(field.kind, options.thresholds);
    scores.push({ recordId: record.recordId, fieldName: field.fieldName, confidence, threshold, adjustments });

    if (field.outcome.status === 'failed') {
      const spec = resolveFieldSpec(catalog, record.recordType, field.fieldName, field.kind);
      findings.push({
        issueId: `normalization_failure:${record.recordId}:${field.fieldName}`,
        type: 'normalization_failure',
        severity: failureSeverity(field.kind, spec),
        fieldName: field.fieldName,
        recordRef: record.recordId,
        confidence,
        reason: field.outcome.failure.reason,
        evidence: [evidenceOf(field)],
      });
    } else if (confidence < threshold) {
      findings.push({
        issueId: `low_confidence:${record.recordId}:${field.fieldName}`,
        type: 'low_confidence',
        severity: lowConfidenceSeverity(field),
        fieldName: field.fieldName,
        recordRef: record.recordId,
        confidence,
        reason: describeLowConfidence(field, confidence, threshold),
        evidence: [evidenceOf(field)],
      });
    }
  }

  if (findings.length > 0) {
    log.debug({ recordId: record.recordId, findingCount: findings.length }, 'Record scored with findings');
  }

  return { scores, findings };
}
