import { readFileSync } from 'node:fs';
import { describe, it, expect } from 'vitest';
import { parseCaseFile, reviewCase, runReview } from '../../src/services/pipeline/index.js';

const caseFile: unknown = JSON.parse(
  readFileSync(new URL('../fixtures/case-file.json', import.meta.url), 'utf-8'),
);

describe('parseCaseFile', () => {
  it('rejects an invalid envelope', () => {
    const result = parseCaseFile({ records: [] });
    expect(result).toEqual({
      ok: false,
      error: {
        code: 'CASE_INPUT_INVALID',
        message: 'Case file failed validation',
        retryable: false,
        details: 'caseId: Required',
      },
    });
  });

  it('isolates malformed records and keeps the rest', () => {
    const result = parseCaseFile({
      caseId: 'case-1',
      records: [
        { recordId: 'c-002', recordType: 'customer', fields: [{ fieldName: '', rawValue: 'x', source: { page: 1 } }] },
        'oops',
        { recordId: 'c-003', recordType: 'customer', fields: [] },
      ],
    });
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.value.recordCount).toBe(3);
    expect(result.value.records.map((r) => r.recordId)).toEqual(['c-003']);
    expect(result.value.findings).toEqual([
      {
        issueId: 'normalization_failure:record-0:fields.0.fieldName',
        type: 'normalization_failure',
        severity: 'high',
        fieldName: 'fields.0.fieldName',
        recordRef: 'c-002',
        confidence: 0,
        reason: 'Malformed record: fields.0.fieldName: Field name is required',
        evidence: [],
      },
      {
        issueId: 'normalization_failure:record-1:record',
        type: 'normalization_failure',
        severity: 'high',
        fieldName: 'record',
        recordRef: 'record-1',
        confidence: 0,
        reason: 'Malformed record: record: Expected object, received string',
        evidence: [],
      },
    ]);
  });

  it('keeps the first of two records with the same id', () => {
    const result = parseCaseFile(caseFile);
    if (!result.ok) throw new Error('fixture should parse');

    const duplicate = result.value.findings.find((f) => f.fieldName === 'recordId');
    expect(duplicate).toEqual({
      issueId: 'normalization_failure:record-6:recordId',
      type: 'normalization_failure',
      severity: 'high',
      fieldName: 'recordId',
      recordRef: 'c-001',
      confidence: 0,
      reason: 'Duplicate record id; first occurrence kept',
      evidence: [{ recordId: 'c-001', page: 6, rawValue: 'Maria' }],
    });
    expect(result.value.records.find((r) => r.recordId === 'c-001')?.fields).toHaveLength(6);
  });
});

describe('reviewCase', () => {
  it('routes every finding of the case', async () => {
    const result = await reviewCase(caseFile);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const bundle = result.value;

    expect(bundle.caseId).toBe('case-2024-0117');
    expect(bundle.recordCount).toBe(7);
    expect(bundle.overallRecommendation).toBe('REVIEW_REQUIRED');
    expect(bundle.issues.map((i) => [i.issueId, i.severity, i.state, i.decisionRequired])).toEqual([
      ['inconsistency:policy_number:PLZRCA77821:transaction/120000EUR:data', 'high', 'needs_human', true],
      ['low_confidence:c-001:email', 'high', 'needs_human', true],
      ['normalization_failure:record-6:recordId', 'high', 'needs_human', true],
      ['normalization_failure:record-5:recordType', 'high', 'needs_human', true],
      ['low_confidence:c-001:telefono', 'medium', 'auto_fix_available', false],
    ]);
    expect(bundle.issueCount).toBe(5);
    expect(bundle.autoFixSuggestions).toEqual([
      {
        fixId: 'fix:c-001:telefono',
        fieldName: 'telefono',
        recordRef: 'c-001',
        originalValue: '333 1234567',
        suggestedValue: '+393331234567',
        confidence: 0.8,
        issueId: 'low_confidence:c-001:telefono',
      },
    ]);
  });

  it('explains the email issue', async () => {
    const result = await reviewCase(caseFile);
    if (!result.ok) throw new Error('review should succeed');

    const email = result.value.issues.find((i) => i.fieldName === 'email');
    expect(email?.confidence).toBe(0.92);
    expect(email?.reason).toBe('domain has no top-level domain; confidence 0.92 below threshold 0.95');
    expect(email?.autoFixId).toBeNull();
  });

  it('reports the malformed record by its zod path', async () => {
    const result = await reviewCase(caseFile);
    if (!result.ok) throw new Error('review should succeed');

    const malformed = result.value.issues.find((i) => i.issueId === 'normalization_failure:record-5:recordType');
    expect(malformed?.recordRef).toBe('x-9');
    expect(malformed?.reason.startsWith('Malformed record: recordType: ')).toBe(true);
  });

  it('is deterministic', async () => {
    const first = await reviewCase(caseFile);
    const second = await reviewCase(caseFile);
    expect(first).toEqual(second);
  });

  it('auto-applies eligible fixes when a threshold is given', async () => {
    const result = await reviewCase(caseFile, { autoApplyThreshold: 0.8 });
    if (!result.ok) throw new Error('review should succeed');

    const phone = result.value.issues.find((i) => i.fieldName === 'telefono');
    expect(phone?.state).toBe('resolved');
    expect(result.value.overallRecommendation).toBe('REVIEW_REQUIRED');
  });

  it('reports the date granularity conflict between three transactions', async () => {
    const transaction = (recordId: string, data: string, page: number) => ({
      recordId,
      recordType: 'transaction',
      fields: [
        { fieldName: 'riferimento_polizza', rawValue: 'PLZ-RCA-77821', source: { page } },
        { fieldName: 'data', rawValue: data, source: { page } },
        { fieldName: 'importo', rawValue: '1200.00', source: { page } },
      ],
    });
    const result = await reviewCase({
      caseId: 'case-dates',
      records: [transaction('t-1', '13/01/24', 1), transaction('t-2', '13-01-2024', 2), transaction('t-3', '01/2024', 3)],
    });
    if (!result.ok) throw new Error('review should succeed');

    expect(result.value.issues.map((i) => [i.issueId, i.type, i.severity, i.confidence, i.decisionRequired])).toEqual([
      ['inconsistency:policy_number:PLZRCA77821:transaction/120000EUR:data', 'inconsistency', 'high', null, true],
    ]);
    expect(result.value.issues[0]?.reason).toBe("Date granularity conflict on 'data': 2024-01-13, 2024-01");
    expect(result.value.overallRecommendation).toBe('REVIEW_REQUIRED');
  });

  it('proposes a formatting fix without raising an issue', async () => {
    const result = await reviewCase({
      caseId: 'case-phone',
      records: [
        {
          recordId: 'c-1',
          recordType: 'customer',
          fields: [{ fieldName: 'telefono', rawValue: '+39 333 1234567', source: { page: 1 } }],
        },
      ],
    });
    if (!result.ok) throw new Error('review should succeed');

    expect(result.value.issues).toEqual([]);
    expect(result.value.autoFixSuggestions).toEqual([
      {
        fixId: 'fix:c-1:telefono',
        fieldName: 'telefono',
        recordRef: 'c-1',
        originalValue: '+39 333 1234567',
        suggestedValue: '+393331234567',
        confidence: 0.98,
        issueId: null,
      },
    ]);
    expect(result.value.overallRecommendation).toBe('APPROVE');
  });

  it('approves a clean case', async () => {
    const result = await reviewCase({
      caseId: 'case-clean',
      records: [
        {
          recordId: 'c-1',
          recordType: 'customer',
          fields: [
            { fieldName: 'email', rawValue: 'anna.bianchi@example.com', source: { page: 1 } },
            { fieldName: 'telefono', rawValue: '+393331234567', source: { page: 1 } },
          ],
        },
      ],
    });
    expect(result.ok && result.value).toEqual({
      caseId: 'case-clean',
      recordCount: 1,
      issueCount: 0,
      issues: [],
      autoFixSuggestions: [],
      overallRecommendation: 'APPROVE',
    });
  });
});

describe('runReview', () => {
  it('keeps two transitions per issue', async () => {
    const result = await runReview(caseFile);
    if (!result.ok) throw new Error('review should succeed');
    expect(result.value.transitions).toHaveLength(10);
  });

  it('fails the whole run when the deadline passes', async () => {
    let clock = 0;
    const now = () => {
      clock += 6;
      return clock;
    };

    const result = await runReview(caseFile, { timeoutMs: 10, now });
    expect(result).toEqual({
      ok: false,
      error: {
        code: 'REVIEW_TIMED_OUT',
        message: "Review of case 'case-2024-0117' exceeded 10ms",
        retryable: true,
        details: 'normalization: 1 of 5 records processed',
      },
    });
  });

  it('finishes within a generous deadline', async () => {
    const result = await runReview(caseFile, { timeoutMs: 60_000 });
    expect(result.ok).toBe(true);
  });
});
