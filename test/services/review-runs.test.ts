import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  confirmRunAutoApply,
  createReviewRun,
  getReviewRun,
  submitDecisions,
} from '../../src/services/review-runs/index.js';
import { routeFindings } from '../../src/services/routing/index.js';
import type { Database } from '../../src/infrastructure/db/client.js';
import type { IssueStateLog, ReviewBundle, ReviewRun } from '../../src/domain/types.js';

vi.mock('../../src/services/review-runs/repository.js', () => ({
  insertReviewRun: vi.fn(),
  findReviewRunById: vi.fn(),
  saveRouting: vi.fn(),
  findStateLogs: vi.fn(),
}));

import {
  findReviewRunById,
  findStateLogs,
  insertReviewRun,
  saveRouting,
} from '../../src/services/review-runs/repository.js';

const db = {} as Database;

const RUN_ID = '6f1c2a34-8d5e-4b7a-9c10-2e3f4a5b6c7d';
const REVISION = '0b7e4d2c-1a3f-4e5d-8c9b-7a6f5e4d3c2b';

const BUNDLE: ReviewBundle = routeFindings({
  caseId: 'case-1',
  recordCount: 1,
  findings: [
    {
      issueId: 'low_confidence:c1:email',
      type: 'low_confidence',
      severity: 'high',
      fieldName: 'email',
      recordRef: 'c1',
      confidence: 0.92,
      reason: 'domain has no top-level domain; confidence 0.92 below threshold 0.95',
      evidence: [{ recordId: 'c1', page: 1, rawValue: 'mario.rossi@gmail' }],
    },
    {
      issueId: 'low_confidence:c1:telefono',
      type: 'low_confidence',
      severity: 'medium',
      fieldName: 'telefono',
      recordRef: 'c1',
      confidence: 0.9,
      reason: 'confidence 0.9 below threshold 0.95',
      evidence: [{ recordId: 'c1', page: 1, rawValue: '333 1234567' }],
    },
  ],
  suggestions: [
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
}).bundle;

const RUN: ReviewRun = {
  id: RUN_ID,
  caseId: 'case-1',
  bundle: BUNDLE,
  recommendation: BUNDLE.overallRecommendation,
  revision: REVISION,
  createdAt: new Date('2024-02-01T10:00:00Z'),
  updatedAt: new Date('2024-02-01T10:00:00Z'),
};

const CASE_FILE = {
  caseId: 'case-1',
  records: [
    {
      recordId: 'c1',
      recordType: 'customer',
      fields: [
        { fieldName: 'email', rawValue: 'mario.rossi@gmail', source: { page: 1 } },
        { fieldName: 'telefono', rawValue: '333 1234567', source: { page: 1 } },
      ],
    },
  ],
};

beforeEach(() => {
  vi.clearAllMocks();
  vi.mocked(saveRouting).mockImplementation(async (_db, _id, _revision, { bundle }) => ({
    ...RUN,
    bundle,
    recommendation: bundle.overallRecommendation,
  }));
});

describe('createReviewRun', () => {
  it('stores the bundle and its initial transitions', async () => {
    vi.mocked(insertReviewRun).mockImplementation(async (_db, bundle) => ({
      ...RUN,
      bundle,
      recommendation: bundle.overallRecommendation,
    }));

    const result = await createReviewRun(db, CASE_FILE);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.bundle).toEqual(BUNDLE);
    expect(insertReviewRun).toHaveBeenCalledTimes(1);
    const [, bundle, transitions] = vi.mocked(insertReviewRun).mock.calls[0] ?? [];
    expect(bundle).toEqual(BUNDLE);
    expect(transitions).toHaveLength(4);
  });

  it('does not touch the store for an invalid case file', async () => {
    const result = await createReviewRun(db, { records: [] });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('CASE_INPUT_INVALID');
    }
    expect(insertReviewRun).not.toHaveBeenCalled();
  });

  it('returns DB error on exception', async () => {
    vi.mocked(insertReviewRun).mockRejectedValue(new Error('connection lost'));

    const result = await createReviewRun(db, CASE_FILE);
    expect(result).toEqual({
      ok: false,
      error: {
        code: 'DB_CONNECTION_ERROR',
        message: 'Failed to create review run',
        retryable: true,
        details: 'connection lost',
      },
    });
  });
});

describe('getReviewRun', () => {
  it('returns the run with its issue history', async () => {
    const history: IssueStateLog[] = [
      {
        id: 'log-1',
        runId: RUN_ID,
        issueId: 'low_confidence:c1:email',
        fromState: null,
        toState: 'detected',
        metadata: null,
        createdAt: new Date('2024-02-01T10:00:00Z'),
      },
    ];
    vi.mocked(findReviewRunById).mockResolvedValue(RUN);
    vi.mocked(findStateLogs).mockResolvedValue(history);

    const result = await getReviewRun(db, RUN_ID);
    expect(result).toEqual({ ok: true, value: { run: RUN, history } });
  });

  it('returns not found for an unknown run', async () => {
    vi.mocked(findReviewRunById).mockResolvedValue(null);

    const result = await getReviewRun(db, RUN_ID);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('REVIEW_RUN_NOT_FOUND');
      expect(result.error.message).toBe(`Review run '${RUN_ID}' not found`);
    }
  });

  it('does not query the store for ids that are not UUIDs', async () => {
    const result = await getReviewRun(db, 'run-1');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('REVIEW_RUN_NOT_FOUND');
    }
    expect(findReviewRunById).not.toHaveBeenCalled();
  });
});

describe('submitDecisions', () => {
  it('persists decisions, the new bundle and the transitions', async () => {
    vi.mocked(findReviewRunById).mockResolvedValue(RUN);
    const decisions = [{ issueId: 'low_confidence:c1:email', resolution: 'accepted' as const }];

    const result = await submitDecisions(db, RUN_ID, decisions);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.recommendation).toBe('APPROVE');
    expect(saveRouting).toHaveBeenCalledTimes(1);
    const [, runId, revision, write] = vi.mocked(saveRouting).mock.calls[0] ?? [];
    expect([runId, revision]).toEqual([RUN_ID, REVISION]);
    expect(write?.decisions).toEqual(decisions);
    expect(write?.bundle.overallRecommendation).toBe('APPROVE');
    expect(write?.transitions).toEqual([
      {
        issueId: 'low_confidence:c1:email',
        fromState: 'needs_human',
        toState: 'resolved',
        metadata: { resolution: 'accepted' },
      },
    ]);
  });

  it('persists nothing when a decision is rejected', async () => {
    vi.mocked(findReviewRunById).mockResolvedValue(RUN);

    const result = await submitDecisions(db, RUN_ID, [{ issueId: 'low_confidence:c9:email', resolution: 'accepted' }]);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('REVIEW_ISSUE_NOT_FOUND');
    }
    expect(saveRouting).not.toHaveBeenCalled();
  });

  it('writes decisions, bundle and transitions in a single call that fails as a whole', async () => {
    vi.mocked(findReviewRunById).mockResolvedValue(RUN);
    vi.mocked(saveRouting).mockRejectedValue(new Error('connection lost'));

    const result = await submitDecisions(db, RUN_ID, [{ issueId: 'low_confidence:c1:email', resolution: 'deferred' }]);
    expect(result).toEqual({
      ok: false,
      error: {
        code: 'DB_CONNECTION_ERROR',
        message: 'Failed to update review run',
        retryable: true,
        details: 'connection lost',
      },
    });
    expect(saveRouting).toHaveBeenCalledTimes(1);
  });

  it('reports a conflict when the run changed since it was read', async () => {
    vi.mocked(findReviewRunById).mockResolvedValue(RUN);
    vi.mocked(saveRouting).mockResolvedValue(null);

    const result = await submitDecisions(db, RUN_ID, [{ issueId: 'low_confidence:c1:email', resolution: 'accepted' }]);
    expect(result).toEqual({
      ok: false,
      error: {
        code: 'REVIEW_RUN_CONFLICT',
        message: `Review run '${RUN_ID}' was changed by another request`,
        retryable: false,
      },
    });
  });
});

describe('confirmRunAutoApply', () => {
  it('resolves eligible issues and logs the transition', async () => {
    vi.mocked(findReviewRunById).mockResolvedValue(RUN);

    const result = await confirmRunAutoApply(db, RUN_ID, { threshold: 0.8 });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.bundle.issues.find((i) => i.fieldName === 'telefono')?.state).toBe('resolved');
    expect(result.value.recommendation).toBe('REVIEW_REQUIRED');
    const [, , , write] = vi.mocked(saveRouting).mock.calls[0] ?? [];
    expect(write?.decisions).toEqual([]);
    expect(write?.transitions).toEqual([
      {
        issueId: 'low_confidence:c1:telefono',
        fromState: 'auto_fix_available',
        toState: 'resolved',
        metadata: { fixId: 'fix:c1:telefono', threshold: 0.8 },
      },
    ]);
  });

  it('refuses a listed issue that needs a human', async () => {
    vi.mocked(findReviewRunById).mockResolvedValue(RUN);

    const result = await confirmRunAutoApply(db, RUN_ID, { threshold: 0.8, issueIds: ['low_confidence:c1:email'] });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('AUTO_APPLY_NOT_ALLOWED');
    }
    expect(saveRouting).not.toHaveBeenCalled();
  });
});
