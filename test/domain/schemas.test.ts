import { describe, it, expect } from 'vitest';
import {
  autoApplyRequestInput,
  caseFileInput,
  decisionsRequestInput,
  rawRecordInput,
  reviewBundleSchema,
  reviewCaseRequestInput,
} from '../../src/domain/schemas.js';

describe('caseFileInput', () => {
  it('accepts records of any shape', () => {
    const result = caseFileInput.safeParse({ caseId: 'case-1', records: [{}, 'not a record'] });
    expect(result.success).toBe(true);
  });

  it('rejects a missing case id', () => {
    const result = caseFileInput.safeParse({ caseId: '', records: [] });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe('Case id is required');
    }
  });

  it('rejects records that are not an array', () => {
    expect(caseFileInput.safeParse({ caseId: 'case-1', records: {} }).success).toBe(false);
  });
});

describe('reviewCaseRequestInput', () => {
  it('accepts an auto-apply threshold in [0, 1]', () => {
    expect(reviewCaseRequestInput.safeParse({ caseId: 'c', records: [], autoApplyThreshold: 0.9 }).success).toBe(true);
    expect(reviewCaseRequestInput.safeParse({ caseId: 'c', records: [], autoApplyThreshold: 1.5 }).success).toBe(false);
  });
});

describe('rawRecordInput', () => {
  const record = {
    recordId: 'c1',
    recordType: 'customer',
    fields: [{ fieldName: 'telefono', rawValue: '333 1234567', source: { page: 1, section: 'Anagrafica' } }],
  };

  it('accepts a well-formed record', () => {
    expect(rawRecordInput.safeParse(record).success).toBe(true);
  });

  it('accepts a declared field type', () => {
    const declared = { ...record, fields: [{ ...record.fields[0], expectedType: 'phone' }] };
    expect(rawRecordInput.safeParse(declared).success).toBe(true);
  });

  it('rejects an unknown record type', () => {
    expect(rawRecordInput.safeParse({ ...record, recordType: 'invoice' }).success).toBe(false);
  });

  it('rejects a page below 1', () => {
    const result = rawRecordInput.safeParse({
      ...record,
      fields: [{ fieldName: 'telefono', rawValue: 'x', source: { page: 0 } }],
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['fields', 0, 'source', 'page']);
    }
  });
});

describe('decisionsRequestInput', () => {
  it('accepts decisions with optional value and notes', () => {
    const result = decisionsRequestInput.safeParse({
      decisions: [{ issueId: 'low_confidence:c1:email', resolution: 'accepted', resolvedValue: 'a@example.com', notes: 'ok' }],
    });
    expect(result.success).toBe(true);
  });

  it('rejects an empty batch', () => {
    const result = decisionsRequestInput.safeParse({ decisions: [] });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe('At least one decision is required');
    }
  });

  it('rejects unknown resolutions', () => {
    const result = decisionsRequestInput.safeParse({ decisions: [{ issueId: 'x', resolution: 'approved' }] });
    expect(result.success).toBe(false);
  });
});

describe('autoApplyRequestInput', () => {
  it('accepts a threshold with optional issue ids', () => {
    expect(autoApplyRequestInput.safeParse({ threshold: 0.95 }).success).toBe(true);
    expect(autoApplyRequestInput.safeParse({ threshold: 0.95, issueIds: ['a'] }).success).toBe(true);
  });

  it('rejects a threshold outside [0, 1]', () => {
    expect(autoApplyRequestInput.safeParse({ threshold: -0.1 }).success).toBe(false);
  });
});

describe('reviewBundleSchema', () => {
  const bundle = {
    caseId: 'case-1',
    recordCount: 1,
    issueCount: 1,
    issues: [
      {
        issueId: 'low_confidence:c1:telefono',
        type: 'low_confidence',
        severity: 'medium',
        fieldName: 'telefono',
        recordRef: 'c1',
        confidence: 0.9,
        reason: 'confidence 0.9 below threshold 0.95',
        evidence: [{ recordId: 'c1', page: 1, rawValue: '333 1234567' }],
        decisionRequired: false,
        state: 'resolved',
        autoFixId: 'fix:c1:telefono',
        resolution: { source: 'auto_apply', fixId: 'fix:c1:telefono', threshold: 0.8 },
      },
    ],
    autoFixSuggestions: [
      {
        fixId: 'fix:c1:telefono',
        fieldName: 'telefono',
        recordRef: 'c1',
        originalValue: '333 1234567',
        suggestedValue: '+393331234567',
        confidence: 0.8,
        issueId: 'low_confidence:c1:telefono',
      },
    ],
    overallRecommendation: 'APPROVE',
  };

  it('accepts a stored bundle', () => {
    expect(reviewBundleSchema.parse(bundle)).toEqual(bundle);
  });

  it('rejects an unknown issue state', () => {
    const broken = { ...bundle, issues: [{ ...bundle.issues[0], state: 'closed' }] };
    expect(reviewBundleSchema.safeParse(broken).success).toBe(false);
  });
});
