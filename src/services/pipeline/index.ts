import { randomUUID } from 'node:crypto';
import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { createRunLogger } from '../../infrastructure/logger.js';
import { DEFAULT_REVIEW_CONFIG } from '../../infrastructure/config.js';
import { getFieldCatalog } from '../../infrastructure/field-catalog.js';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, type AppError } from '../../domain/errors.js';
import { caseFileInput, rawRecordInput } from '../../domain/schemas.js';
import type { EvidenceRef, IssueFinding, NormalizedRecord, RawRecord, ReviewBundle } from '../../domain/types.js';
import { createNormalizeContext, normalizeRecord } from '../normalization/index.js';
import { scoreRecord } from '../scoring/index.js';
import { checkConsistency } from '../consistency/index.js';
import { proposeFixes } from '../autofix/index.js';
import { routeFindings, type RoutingResult } from '../routing/index.js';
import type { ParsedCase, ReviewOptions } from './types.js';

export type { ParsedCase, ReviewOptions } from './types.js';

function describeZodPath(path: (string | number)[]): string {
  return path.length > 0 ? path.join('.') : 'record';
}

function recordIdOf(value: unknown): string | null {
  if (typeof value !== 'object' || value === null || !('recordId' in value)) return null;
  const { recordId } = value;
  return typeof recordId === 'string' && recordId.length > 0 ? recordId : null;
}

function evidenceOfRecord(record: RawRecord): EvidenceRef[] {
  return record.fields.map((f) => ({
    recordId: record.recordId,
    page: f.source.page,
    ...(f.source.section !== undefined && { section: f.source.section }),
    rawValue: f.rawValue,
  }));
}

/**
 * Validates the case envelope and each record on its own. A malformed or
 * duplicated record is excluded and reported; the rest of the case goes on.
 */
export function parseCaseFile(input: unknown): Result<ParsedCase, AppError> {
  const envelope = caseFileInput.safeParse(input);
  if (!envelope.success) {
    const details = envelope.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    return err(createAppError('CASE_INPUT_INVALID', 'Case file failed validation', false, details));
  }

  const records: RawRecord[] = [];
  const findings: IssueFinding[] = [];
  const seenIds = new Set<string>();

  envelope.data.records.forEach((candidate, index) => {
    const parsed = rawRecordInput.safeParse(candidate);

    if (!parsed.success) {
      const [first] = parsed.error.issues;
      const fieldName = describeZodPath(first?.path ?? []);
      findings.push({
        issueId: `normalization_failure:record-${index}:${fieldName}`,
        type: 'normalization_failure',
        severity: 'high',
        fieldName,
        recordRef: recordIdOf(candidate) ?? `record-${index}`,
        confidence: 0,
        reason: `Malformed record: ${fieldName}: ${first?.message ?? 'invalid'}`,
        evidence: [],
      });
      return;
    }

    const { recordId, recordType, fields } = parsed.data;
    const record: RawRecord = {
      recordId,
      recordType,
      fields: fields.map((f) => ({ ...f, recordId })),
    };

    if (seenIds.has(recordId)) {
      findings.push({
        issueId: `normalization_failure:record-${index}:recordId`,
        type: 'normalization_failure',
        severity: 'high',
        fieldName: 'recordId',
        recordRef: recordId,
        confidence: 0,
        reason: 'Duplicate record id; first occurrence kept',
        evidence: evidenceOfRecord(record),
      });
      return;
    }

    seenIds.add(recordId);
    records.push(record);
  });

  return ok({
    caseId: envelope.data.caseId,
    records,
    findings,
    recordCount: envelope.data.records.length,
  });
}

/**
 * Runs a case through normalization, scoring, consistency checking, fix
 * proposal and routing, keeping the issue state transitions. Yields to the
 * event loop between records; when the deadline passes the whole run fails
 * with REVIEW_TIMED_OUT and no bundle.
 */
export async function runReview(
  input: unknown,
  options: ReviewOptions = {},
): Promise<Result<RoutingResult, AppError>> {
  const parsed = parseCaseFile(input);
  if (!parsed.ok) return parsed;

  const { caseId, records, recordCount } = parsed.value;
  const config = options.config ?? DEFAULT_REVIEW_CONFIG;
  const catalog = options.catalog ?? getFieldCatalog();
  const now = options.now ?? Date.now;
  const timeoutMs = options.timeoutMs ?? config.timeoutMs;
  const autoApplyThreshold = options.autoApplyThreshold ?? config.autoApplyThreshold;
  const log = createRunLogger(options.runId ?? randomUUID(), caseId);

  const deadline = timeoutMs !== undefined ? now() + timeoutMs : Number.POSITIVE_INFINITY;
  const timedOut = (stage: string, done: number) => {
    log.warn({ stage, done, total: records.length, timeoutMs }, 'Review timed out');
    return err(
      createAppError(
        'REVIEW_TIMED_OUT',
        `Review of case '${caseId}' exceeded ${timeoutMs}ms`,
        true,
        `${stage}: ${done} of ${records.length} records processed`,
      ),
    );
  };

  log.info({ recordCount, malformed: parsed.value.findings.length }, 'Review started');
  if (parsed.value.findings.length > 0) {
    log.warn({ malformed: parsed.value.findings.map((f) => f.issueId) }, 'Malformed records excluded');
  }

  const ctx = createNormalizeContext(config, catalog);
  const normalized: NormalizedRecord[] = [];
  const findings: IssueFinding[] = [...parsed.value.findings];

  for (const [position, raw] of records.entries()) {
    if (now() > deadline) return timedOut('normalization', position);

    const { record, findings: normalizationFindings } = normalizeRecord(raw, position, catalog, ctx);
    const { findings: scoringFindings } = scoreRecord(record, catalog, { thresholds: config.thresholds });
    normalized.push(record);
    findings.push(...normalizationFindings, ...scoringFindings);

    await yieldToEventLoop();
  }

  if (now() > deadline) return timedOut('consistency', records.length);

  const consistency = checkConsistency(normalized, catalog);
  findings.push(...consistency.findings);

  const suggestions = proposeFixes(normalized, findings, ctx);
  const routed = routeFindings({ caseId, recordCount, findings, suggestions, autoApplyThreshold });
  const { bundle } = routed;

  log.info(
    {
      issueCount: bundle.issueCount,
      fixCount: bundle.autoFixSuggestions.length,
      groupCount: consistency.groupCount,
      recommendation: bundle.overallRecommendation,
    },
    'Review completed',
  );

  return ok(routed);
}

export async function reviewCase(
  input: unknown,
  options: ReviewOptions = {},
): Promise<Result<ReviewBundle, AppError>> {
  const result = await runReview(input, options);
  return result.ok ? ok(result.value.bundle) : result;
}
