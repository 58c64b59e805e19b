import { logger } from '../../infrastructure/logger.js';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, RouterInvariantError, type AppError } from '../../domain/errors.js';
import {
  ISSUE_TYPES,
  SEVERITIES,
  type AutoFixSuggestion,
  type IssueFinding,
  type IssueResolution,
  type IssueState,
  type RawRecord,
  type Recommendation,
  type ReviewBundle,
  type ReviewDecision,
  type RoutedIssue,
} from '../../domain/types.js';
import { VALID_TRANSITIONS, isTerminalState } from './types.js';
import type { AutoApplyPolicy, RoutingResult, StateTransition } from './types.js';

export type { AutoApplyPolicy, RoutingResult, StateTransition, TransitionMetadata } from './types.js';
export { isTerminalState, VALID_TRANSITIONS } from './types.js';

const log = logger.child({ module: 'routing' });

export interface RoutingInput {
  caseId: string;
  recordCount: number;
  findings: IssueFinding[];
  suggestions: AutoFixSuggestion[];
  /** Confirm auto-apply for eligible issues right away; never when omitted. */
  autoApplyThreshold?: number;
}

export function isValidTransition(from: IssueState, to: IssueState): boolean {
  return VALID_TRANSITIONS[from].has(to);
}

export function isDecisionRequired(finding: Pick<IssueFinding, 'type' | 'severity'>, hasFix: boolean): boolean {
  return finding.severity === 'high' || (finding.type === 'inconsistency' && !hasFix);
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Severity, then type, then field name; record and id break the remaining ties. */
export function compareIssues(a: IssueFinding, b: IssueFinding): number {
  return (
    SEVERITIES.indexOf(a.severity) - SEVERITIES.indexOf(b.severity) ||
    ISSUE_TYPES.indexOf(a.type) - ISSUE_TYPES.indexOf(b.type) ||
    compareText(a.fieldName, b.fieldName) ||
    compareText(a.recordRef, b.recordRef) ||
    compareText(a.issueId, b.issueId)
  );
}

export function recommendationFor(issues: RoutedIssue[]): Recommendation {
  const blocking = issues.some((i) => i.decisionRequired && i.state !== 'resolved');
  return blocking ? 'REVIEW_REQUIRED' : 'APPROVE';
}

function withIssues(bundle: ReviewBundle, issues: RoutedIssue[]): ReviewBundle {
  return {
    ...bundle,
    issueCount: issues.length,
    issues,
    overallRecommendation: recommendationFor(issues),
  };
}

/**
 * Re-checks a bundle against the router's contract. A violation means the
 * routing logic is broken, so it throws instead of returning an error.
 */
export function assertRoutingInvariants(bundle: ReviewBundle): void {
  const fixes = new Map(bundle.autoFixSuggestions.map((f) => [f.fixId, f]));
  const ids = new Set<string>();

  for (const issue of bundle.issues) {
    if (ids.has(issue.issueId)) {
      throw new RouterInvariantError(issue.issueId, 'duplicate issue id');
    }
    ids.add(issue.issueId);

    if (issue.autoFixId !== null && !fixes.has(issue.autoFixId)) {
      throw new RouterInvariantError(issue.issueId, `unknown auto-fix '${issue.autoFixId}'`);
    }
    if (issue.decisionRequired !== isDecisionRequired(issue, issue.autoFixId !== null)) {
      throw new RouterInvariantError(issue.issueId, 'decisionRequired does not match severity and type');
    }
    if (issue.type === 'low_confidence' && issue.confidence === null) {
      throw new RouterInvariantError(issue.issueId, 'low_confidence issue without a confidence');
    }
    if (issue.state === 'auto_fix_available' && (issue.decisionRequired || issue.autoFixId === null)) {
      throw new RouterInvariantError(issue.issueId, 'auto_fix_available requires a fix and no required decision');
    }
    if (issue.state === 'detected') {
      throw new RouterInvariantError(issue.issueId, 'issue left in detected state');
    }

    const { resolution } = issue;
    if (issue.state === 'resolved') {
      if (resolution === null) {
        throw new RouterInvariantError(issue.issueId, 'resolved without a decision or auto-apply confirmation');
      }
      if (resolution.source === 'auto_apply' && (issue.decisionRequired || resolution.fixId !== issue.autoFixId)) {
        throw new RouterInvariantError(issue.issueId, 'auto-applied although not eligible');
      }
    }
  }

  if (bundle.issueCount !== bundle.issues.length) {
    throw new RouterInvariantError('*', 'issueCount does not match issues');
  }
  if (bundle.overallRecommendation !== recommendationFor(bundle.issues)) {
    throw new RouterInvariantError('*', 'recommendation does not match unresolved decision-required issues');
  }
}

function resolveByAutoApply(
  bundle: ReviewBundle,
  policy: AutoApplyPolicy,
  strict: boolean,
): Result<RoutingResult, AppError> {
  const fixes = new Map(bundle.autoFixSuggestions.map((f) => [f.fixId, f]));
  const byId = new Map(bundle.issues.map((i) => [i.issueId, i]));
  const targets = new Set<string>();

  const candidates = policy.issueIds ?? bundle.issues.map((i) => i.issueId);
  for (const issueId of candidates) {
    const issue = byId.get(issueId);
    if (!issue) {
      return err(createAppError('REVIEW_ISSUE_NOT_FOUND', `Issue '${issueId}' not found`, false));
    }

    const fix = issue.autoFixId !== null ? fixes.get(issue.autoFixId) : undefined;
    const eligible = issue.state === 'auto_fix_available' && fix !== undefined && fix.confidence >= policy.threshold;
    if (eligible) {
      targets.add(issueId);
    } else if (strict) {
      return err(
        createAppError(
          'AUTO_APPLY_NOT_ALLOWED',
          `Issue '${issueId}' cannot be auto-applied at threshold ${policy.threshold}`,
          false,
          `state=${issue.state}, fixConfidence=${fix?.confidence ?? 'none'}`,
        ),
      );
    }
  }

  const transitions: StateTransition[] = [];
  const issues = bundle.issues.map((issue): RoutedIssue => {
    if (!targets.has(issue.issueId) || issue.autoFixId === null) return issue;
    const resolution: IssueResolution = { source: 'auto_apply', fixId: issue.autoFixId, threshold: policy.threshold };
    transitions.push({
      issueId: issue.issueId,
      fromState: issue.state,
      toState: 'resolved',
      metadata: { fixId: issue.autoFixId, threshold: policy.threshold },
    });
    return { ...issue, state: 'resolved', resolution };
  });

  const next = withIssues(bundle, issues);
  assertRoutingInvariants(next);

  if (transitions.length > 0) {
    log.info({ caseId: bundle.caseId, applied: transitions.length, threshold: policy.threshold }, 'Auto-apply confirmed');
  }
  return ok({ bundle: next, transitions });
}

/**
 * First phase: turns scorer and checker findings into routed issues.
 * Every issue passes through `detected` and halts at `needs_human` or
 * `auto_fix_available`; nothing is resolved here unless the caller set an
 * auto-apply threshold.
 */
export function routeFindings(input: RoutingInput): RoutingResult {
  const fixByIssue = new Map<string, AutoFixSuggestion>();
  for (const fix of input.suggestions) {
    if (fix.issueId !== null && !fixByIssue.has(fix.issueId)) fixByIssue.set(fix.issueId, fix);
  }

  const transitions: StateTransition[] = [];
  const issues = [...input.findings].sort(compareIssues).map((finding): RoutedIssue => {
    const fix = fixByIssue.get(finding.issueId);
    const decisionRequired = isDecisionRequired(finding, fix !== undefined);
    const state: IssueState = !decisionRequired && fix ? 'auto_fix_available' : 'needs_human';

    transitions.push(
      { issueId: finding.issueId, fromState: null, toState: 'detected', metadata: null },
      { issueId: finding.issueId, fromState: 'detected', toState: state, metadata: null },
    );

    return { ...finding, decisionRequired, state, autoFixId: fix?.fixId ?? null, resolution: null };
  });

  const bundle = withIssues(
    {
      caseId: input.caseId,
      recordCount: input.recordCount,
      issueCount: 0,
      issues: [],
      autoFixSuggestions: input.suggestions,
      overallRecommendation: 'APPROVE',
    },
    issues,
  );
  assertRoutingInvariants(bundle);

  if (input.autoApplyThreshold === undefined) {
    return { bundle, transitions };
  }

  const applied = resolveByAutoApply(bundle, { threshold: input.autoApplyThreshold }, false);
  if (!applied.ok) {
    // Non-strict application only fails on unknown ids, and none are passed.
    throw new RouterInvariantError('*', applied.error.message);
  }
  return { bundle: applied.value.bundle, transitions: [...transitions, ...applied.value.transitions] };
}

/**
 * Second phase: applies external decisions. All-or-nothing; one bad
 * decision rejects the whole batch.
 */
export function applyDecisions(
  bundle: ReviewBundle,
  decisions: ReviewDecision[],
): Result<RoutingResult, AppError> {
  const states = new Map<string, IssueState>(bundle.issues.map((i) => [i.issueId, i.state]));
  const accepted = new Map<string, ReviewDecision>();
  const transitions: StateTransition[] = [];

  for (const decision of decisions) {
    const from = states.get(decision.issueId);
    if (from === undefined) {
      return err(createAppError('REVIEW_ISSUE_NOT_FOUND', `Issue '${decision.issueId}' not found`, false));
    }
    if (isTerminalState(from)) {
      return err(
        createAppError('REVIEW_ALREADY_RESOLVED', `Issue '${decision.issueId}' is already ${from}`, false),
      );
    }

    const to: IssueState = decision.resolution === 'deferred' ? 'deferred' : 'resolved';
    if (!isValidTransition(from, to)) {
      log.warn({ issueId: decision.issueId, fromState: from, toState: to }, 'Invalid issue transition attempted');
      return err(
        createAppError('INVALID_STATE_TRANSITION', `Cannot transition from '${from}' to '${to}'`, false),
      );
    }

    states.set(decision.issueId, to);
    accepted.set(decision.issueId, decision);
    transitions.push({
      issueId: decision.issueId,
      fromState: from,
      toState: to,
      metadata: { resolution: decision.resolution },
    });
  }

  const issues = bundle.issues.map((issue): RoutedIssue => {
    const decision = accepted.get(issue.issueId);
    const state = states.get(issue.issueId);
    if (!decision || state === undefined) return issue;
    return { ...issue, state, resolution: { source: 'review_decision', decision } };
  });

  const next = withIssues(bundle, issues);
  assertRoutingInvariants(next);

  log.info(
    { caseId: bundle.caseId, decisions: decisions.length, recommendation: next.overallRecommendation },
    'Review decisions applied',
  );
  return ok({ bundle: next, transitions });
}

/**
 * Explicit auto-apply confirmation. With `issueIds`, every listed issue must
 * be eligible; without, all eligible issues at the threshold are resolved.
 */
export function confirmAutoApply(bundle: ReviewBundle, policy: AutoApplyPolicy): Result<RoutingResult, AppError> {
  return resolveByAutoApply(bundle, policy, policy.issueIds !== undefined);
}

/**
 * Fixes whose issue was resolved by auto-apply or by an accepted decision.
 * An accepted decision carrying a `resolvedValue` replaces the suggested
 * value with the reviewer's. Fixes not linked to any issue are included only
 * at or above `standaloneThreshold`, and never when it is omitted.
 */
export function acceptedFixes(bundle: ReviewBundle, standaloneThreshold?: number): AutoFixSuggestion[] {
  const accepted = new Map<string, string | undefined>();
  for (const issue of bundle.issues) {
    if (issue.state !== 'resolved' || issue.autoFixId === null || issue.resolution === null) continue;
    const { resolution } = issue;
    if (resolution.source === 'auto_apply') {
      accepted.set(issue.autoFixId, undefined);
    } else if (resolution.decision.resolution === 'accepted') {
      accepted.set(issue.autoFixId, resolution.decision.resolvedValue);
    }
  }

  const fixes: AutoFixSuggestion[] = [];
  for (const fix of bundle.autoFixSuggestions) {
    if (accepted.has(fix.fixId)) {
      const resolvedValue = accepted.get(fix.fixId);
      fixes.push(resolvedValue === undefined ? fix : { ...fix, suggestedValue: resolvedValue });
    } else if (fix.issueId === null && standaloneThreshold !== undefined && fix.confidence >= standaloneThreshold) {
      fixes.push(fix);
    }
  }
  return fixes;
}

/** New raw records with the given suggestions substituted; inputs are untouched. */
export function applyFixes(records: RawRecord[], suggestions: AutoFixSuggestion[]): RawRecord[] {
  const byField = new Map(suggestions.map((s) => [`${s.recordRef}|${s.fieldName}`, s]));

  return records.map((record) => ({
    ...record,
    fields: record.fields.map((field) => {
      const fix = byField.get(`${record.recordId}|${field.fieldName}`);
      return fix && fix.originalValue === field.rawValue ? { ...field, rawValue: fix.suggestedValue } : field;
    }),
  }));
}
