import type { IssueState, ReviewBundle } from '../../domain/types.js';

export interface TransitionMetadata {
  resolution?: string;
  fixId?: string;
  threshold?: number;
  [key: string]: unknown;
}

export interface StateTransition {
  issueId: string;
  fromState: IssueState | null;
  toState: IssueState;
  metadata: TransitionMetadata | null;
}

export interface RoutingResult {
  bundle: ReviewBundle;
  transitions: StateTransition[];
}

export interface AutoApplyPolicy {
  threshold: number;
  /** Restrict confirmation to these issues; every eligible issue when omitted. */
  issueIds?: string[];
}

const TERMINAL_STATES: ReadonlySet<IssueState> = new Set(['resolved', 'deferred']);

export function isTerminalState(state: IssueState): boolean {
  return TERMINAL_STATES.has(state);
}

/**
 * Per-issue state machine. Key = from state, Value = set of allowed target states.
 */
export const VALID_TRANSITIONS: Record<IssueState, ReadonlySet<IssueState>> = {
  detected: new Set<IssueState>(['auto_fix_available', 'needs_human']),
  auto_fix_available: new Set<IssueState>(['resolved', 'deferred']),
  needs_human: new Set<IssueState>(['resolved', 'deferred']),
  resolved: new Set<IssueState>(),
  deferred: new Set<IssueState>(),
};
