import { DEFAULT_REVIEW_CONFIG } from '../src/infrastructure/config.js';
import { getFieldCatalog } from '../src/infrastructure/field-catalog.js';
import { createNormalizeContext, normalizeRecord } from '../src/services/normalization/index.js';
import type { NormalizedRecord, RawRecord, RecordType } from '../src/domain/types.js';

export const catalog = getFieldCatalog();
export const ctx = createNormalizeContext(DEFAULT_REVIEW_CONFIG, catalog);

/** [fieldName, rawValue, page?] */
export type FieldRow = [string, string, number?];

export function rawRecord(recordId: string, recordType: RecordType, rows: FieldRow[]): RawRecord {
  return {
    recordId,
    recordType,
    fields: rows.map(([fieldName, rawValue, page]) => ({
      recordId,
      fieldName,
      rawValue,
      source: { page: page ?? 1 },
    })),
  };
}

export function normalized(
  recordId: string,
  recordType: RecordType,
  rows: FieldRow[],
  position = 0,
): NormalizedRecord {
  return normalizeRecord(rawRecord(recordId, recordType, rows), position, catalog, ctx).record;
}
