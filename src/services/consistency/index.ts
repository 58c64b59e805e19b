import { logger } from '../../infrastructure/logger.js';
import { getRecordTypeSpec, type FieldCatalog } from '../../infrastructure/field-catalog.js';
import type {
  EvidenceRef,
  IssueFinding,
  NormalizedField,
  NormalizedRecord,
  TypedValue,
  ValueVariant,
} from '../../domain/types.js';
import { amountMagnitudeKey, evidenceOf, parsedValue, semanticKeyOf } from '../normalization/index.js';
import { groupByEntity, partitionByEvent } from './grouping.js';
import type { ConsistencyReport, EventPartition } from './types.js';

export type { ConsistencyReport, EntityGroup, EventPartition } from './types.js';
export { entityKeysOf, eventKeyOf, groupByEntity, identifierKey, partitionByEvent } from './grouping.js';

const log = logger.child({ module: 'consistency' });

export interface Observation {
  record: NormalizedRecord;
  field: NormalizedField;
  value: TypedValue;
  key: string;
}

interface VariantBucket {
  variant: ValueVariant;
  minPage: number;
}

/** Most frequent first, then earliest page, then value. Frequency is presentation only. */
export function orderVariants(observations: Observation[]): ValueVariant[] {
  const buckets = new Map<string, VariantBucket>();

  for (const { field, key } of observations) {
    const evidence: EvidenceRef = evidenceOf(field);
    const bucket = buckets.get(key);
    if (bucket) {
      bucket.variant.occurrences += 1;
      bucket.variant.evidence.push(evidence);
      bucket.minPage = Math.min(bucket.minPage, evidence.page);
    } else {
      buckets.set(key, { variant: { value: key, occurrences: 1, evidence: [evidence] }, minPage: evidence.page });
    }
  }

  return [...buckets.values()]
    .sort(
      (a, b) =>
        b.variant.occurrences - a.variant.occurrences ||
        a.minPage - b.minPage ||
        (a.variant.value < b.variant.value ? -1 : a.variant.value > b.variant.value ? 1 : 0),
    )
    .map((b) => b.variant);
}

function describeConflict(fieldName: string, observations: Observation[], variants: ValueVariant[]): string {
  const values = variants.map((v) => v.value).join(', ');
  const parsed = observations.map((o) => o.value);

  const granularities = new Set(parsed.flatMap((v) => (v.kind === 'date' ? [v.granularity] : [])));
  if (granularities.size > 1) {
    return `Date granularity conflict on '${fieldName}': ${values}`;
  }

  const magnitudes = new Set(parsed.flatMap((v) => (v.kind === 'amount' ? [amountMagnitudeKey(v)] : [])));
  const signs = new Set(parsed.flatMap((v) => (v.kind === 'amount' ? [v.sign] : [])));
  if (magnitudes.size === 1 && signs.size > 1) {
    return `Sign conflict on '${fieldName}': ${values}`;
  }

  return `Conflicting values on '${fieldName}': ${values}`;
}

function partitionLabel(partition: EventPartition): string {
  return partition.eventKey === null ? partition.recordType : `${partition.recordType}/${partition.eventKey}`;
}

function checkPartition(partition: EventPartition, catalog: FieldCatalog, seen: Set<string>): IssueFinding[] {
  const spec = getRecordTypeSpec(catalog, partition.recordType);
  const findings: IssueFinding[] = [];

  for (const [fieldName, fieldSpec] of Object.entries(spec.fields)) {
    if (!fieldSpec.pointValue) continue;

    const observations: Observation[] = [];
    for (const record of partition.records) {
      const field = record.fields[fieldName];
      const value = parsedValue(field);
      if (field && value) observations.push({ record, field, value, key: semanticKeyOf(value) });
    }

    if (new Set(observations.map((o) => o.key)).size < 2) continue;

    // A record under several identifiers would otherwise report the same conflict twice.
    const recordIds = observations.map((o) => o.record.recordId);
    const dedupeKey = `${fieldName}|${[...recordIds].sort().join(',')}`;
    if (seen.has(dedupeKey)) continue;
    seen.add(dedupeKey);

    const variants = orderVariants(observations);
    findings.push({
      issueId: `inconsistency:${partition.entityKey}:${partitionLabel(partition)}:${fieldName}`,
      type: 'inconsistency',
      severity: fieldSpec.impact === 'none' ? 'medium' : 'high',
      fieldName,
      recordRef: recordIds[0] ?? '',
      confidence: null,
      reason: describeConflict(fieldName, observations, variants),
      evidence: variants.flatMap((v) => v.evidence),
      variants,
    });
  }

  return findings;
}

function wordsOf(text: string): Set<string> {
  return new Set(text.toLowerCase().split(/[^\p{L}]+/u).filter((w) => w.length > 0));
}

/**
 * Refund-labelled records must carry negative amounts and payment-labelled
 * ones positive amounts. Checked per record; no entity group is needed.
 */
export function checkAmountSigns(record: NormalizedRecord, catalog: FieldCatalog): IssueFinding[] {
  const spec = getRecordTypeSpec(catalog, record.recordType);
  if (spec.descriptorFields.length === 0) return [];

  const words = new Set<string>();
  for (const name of spec.descriptorFields) {
    const field = record.fields[name];
    if (field) for (const word of wordsOf(field.rawValue)) words.add(word);
  }

  const isRefund = catalog.refundKeywords.some((k) => words.has(k.toLowerCase()));
  const isPayment = !isRefund && catalog.paymentKeywords.some((k) => words.has(k.toLowerCase()));
  if (!isRefund && !isPayment) return [];

  const findings: IssueFinding[] = [];
  for (const [fieldName, fieldSpec] of Object.entries(spec.fields)) {
    if (fieldSpec.kind !== 'amount' || fieldSpec.impact !== 'financial') continue;

    const field = record.fields[fieldName];
    const value = parsedValue(field);
    if (!field || value?.kind !== 'amount' || value.minorUnits === 0) continue;

    const expectedSign = isRefund ? -1 : 1;
    if (value.sign === expectedSign) continue;

    findings.push({
      issueId: `inconsistency:${record.recordId}:${fieldName}:sign`,
      type: 'inconsistency',
      severity: 'high',
      fieldName,
      recordRef: record.recordId,
      confidence: null,
      reason: isRefund
        ? `Refund recorded with a positive amount on '${fieldName}'`
        : `Payment recorded with a negative amount on '${fieldName}'`,
      evidence: [evidenceOf(field)],
    });
  }
  return findings;
}

/**
 * Cross-record contradictions. Records are only compared inside an entity
 * group, and inside that only with records of the same type describing the
 * same event. The checker never picks a winning value.
 */
export function checkConsistency(records: NormalizedRecord[], catalog: FieldCatalog): ConsistencyReport {
  const groups = groupByEntity(records, catalog);
  const seen = new Set<string>();
  const findings: IssueFinding[] = [];

  for (const group of groups) {
    for (const partition of partitionByEvent(group, catalog)) {
      findings.push(...checkPartition(partition, catalog, seen));
    }
  }

  for (const record of records) {
    findings.push(...checkAmountSigns(record, catalog));
  }

  log.debug({ recordCount: records.length, groupCount: groups.length, findingCount: findings.length }, 'Consistency checked');

  return { groupCount: groups.length, findings };
}
