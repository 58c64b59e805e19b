import { logger } from '../../infrastructure/logger.js';
import { resolveFieldSpec, type FieldCatalog } from '../../infrastructure/field-catalog.js';
import type { ReviewConfig } from '../../infrastructure/config.js';
import type {
  EvidenceRef,
  FieldKind,
  IssueFinding,
  NormalizedField,
  NormalizedRecord,
  RawField,
  RawRecord,
  TypedValue,
} from '../../domain/types.js';
import { getHandler } from './registry.js';
import type { NormalizeContext } from './types.js';

export type { NormalizeContext, FieldKindHandler, FixProposal } from './types.js';
export { getHandler, semanticKeyOf } from './registry.js';
export { decodeBirthDate } from './kinds/fiscal-code.js';
export { amountMagnitudeKey } from './kinds/amount.js';
export { formatIsoDate } from './kinds/date.js';

const log = logger.child({ module: 'normalization' });

export interface RecordNormalization {
  record: NormalizedRecord;
  findings: IssueFinding[];
}

export function createNormalizeContext(config: ReviewConfig, catalog: FieldCatalog): NormalizeContext {
  return {
    defaultCountry: config.defaultCountry,
    defaultCurrency: config.defaultCurrency,
    currencyAliases: catalog.currencyAliases,
  };
}

export function normalizeField(raw: RawField, kind: FieldKind, ctx: NormalizeContext): NormalizedField {
  const base = {
    recordId: raw.recordId,
    fieldName: raw.fieldName,
    kind,
    rawValue: raw.rawValue,
    source: raw.source,
  };

  if (raw.rawValue.trim() === '') {
    return {
      ...base,
      ruleId: `${kind}.empty`,
      outcome: { status: 'failed', failure: { code: 'empty_value', reason: 'empty value' } },
    };
  }

  const { ruleId, outcome } = getHandler(kind).normalize(raw.rawValue, ctx);
  return { ...base, ruleId, outcome };
}

export function evidenceOf(field: Pick<NormalizedField, 'recordId' | 'source' | 'rawValue'>): EvidenceRef {
  return {
    recordId: field.recordId,
    page: field.source.page,
    ...(field.source.section !== undefined && { section: field.source.section }),
    rawValue: field.rawValue,
  };
}

export function parsedValue(field: NormalizedField | undefined): TypedValue | null {
  if (!field || field.outcome.status === 'failed') return null;
  return field.outcome.value;
}

export function normalizeRecord(
  raw: RawRecord,
  position: number,
  catalog: FieldCatalog,
  ctx: NormalizeContext,
): RecordNormalization {
  const fields = new Map<string, NormalizedField>();
  const findings: IssueFinding[] = [];
  const duplicates = new Map<string, number>();

  for (const field of raw.fields) {
    if (fields.has(field.fieldName)) {
      const count = (duplicates.get(field.fieldName) ?? 0) + 1;
      duplicates.set(field.fieldName, count);
      findings.push({
        issueId: `normalization_failure:${raw.recordId}:${field.fieldName}:duplicate-${count}`,
        type: 'normalization_failure',
        severity: 'medium',
        fieldName: field.fieldName,
        recordRef: raw.recordId,
        confidence: 0,
        reason: 'duplicate field in record; first occurrence kept',
        evidence: [evidenceOf(field)],
      });
      continue;
    }

    const spec = resolveFieldSpec(catalog, raw.recordType, field.fieldName, field.expectedType);
    fields.set(field.fieldName, normalizeField(field, spec.kind, ctx));
  }

  const failures = [...fields.values()].filter((f) => f.outcome.status === 'failed').length;
  log.debug(
    { recordId: raw.recordId, recordType: raw.recordType, fieldCount: fields.size, failures },
    'Record normalized',
  );

  return {
    record: {
      recordId: raw.recordId,
      recordType: raw.recordType,
      position,
      fields: Object.fromEntries(fields),
    },
    findings,
  };
}
