import { getRecordTypeSpec, type FieldCatalog, type RecordTypeSpec } from '../../infrastructure/field-catalog.js';
import type { NormalizedRecord, TypedValue } from '../../domain/types.js';
import { amountMagnitudeKey, parsedValue, semanticKeyOf } from '../normalization/index.js';
import type { EntityGroup, EventPartition } from './types.js';

const IDENTIFIER_SEPARATORS = /[\s\-./_]+/g;

/**
 * Canonical form of an identifier. Free-text identifiers are written many
 * ways (`PLZ-RCA-77821`, `plz rca 77821`), so case and separators are dropped.
 */
export function identifierKey(value: TypedValue): string {
  const key = semanticKeyOf(value);
  return value.kind === 'free_text' ? key.toUpperCase().replace(IDENTIFIER_SEPARATORS, '') : key;
}

/**
 * Every identifier a record carries, as `<namespace>:<canonical value>`.
 * Identifiers that failed normalization do not group anything.
 */
export function entityKeysOf(record: NormalizedRecord, catalog: FieldCatalog): string[] {
  const keys = new Set<string>();
  const spec = getRecordTypeSpec(catalog, record.recordType);

  for (const [fieldName, fieldSpec] of Object.entries(spec.fields)) {
    if (fieldSpec.entityKey === undefined) continue;
    const value = parsedValue(record.fields[fieldName]);
    if (value) keys.add(`${fieldSpec.entityKey}:${identifierKey(value)}`);
  }

  return [...keys];
}

export function groupByEntity(records: NormalizedRecord[], catalog: FieldCatalog): EntityGroup[] {
  const buckets = new Map<string, NormalizedRecord[]>();

  for (const record of records) {
    for (const key of entityKeysOf(record, catalog)) {
      const bucket = buckets.get(key) ?? [];
      bucket.push(record);
      buckets.set(key, bucket);
    }
  }

  const groups: EntityGroup[] = [];
  for (const [entityKey, members] of buckets) {
    if (members.length > 1) groups.push({ entityKey, records: members });
  }
  return groups;
}

/**
 * Key of the event a record describes, or null when one of the event fields
 * is missing or unparsed. Amounts contribute their magnitude only, so that a
 * sign disagreement stays inside one event.
 */
export function eventKeyOf(record: NormalizedRecord, spec: RecordTypeSpec): string | null {
  const parts: string[] = [];
  for (const fieldName of spec.eventKey) {
    const value = parsedValue(record.fields[fieldName]);
    if (!value) return null;
    parts.push(value.kind === 'amount' ? amountMagnitudeKey(value) : semanticKeyOf(value));
  }
  return parts.join('|');
}

export function partitionByEvent(group: EntityGroup, catalog: FieldCatalog): EventPartition[] {
  const partitions = new Map<string, EventPartition>();

  for (const record of group.records) {
    const spec = getRecordTypeSpec(catalog, record.recordType);
    const eventKey = eventKeyOf(record, spec);
    if (eventKey === null) continue;

    const id = `${record.recordType}/${eventKey}`;
    const partition = partitions.get(id) ?? {
      entityKey: group.entityKey,
      recordType: record.recordType,
      eventKey: spec.eventKey.length > 0 ? eventKey : null,
      records: [],
    };
    partition.records.push(record);
    partitions.set(id, partition);
  }

  return [...partitions.values()].filter((p) => p.records.length > 1);
}
