export const ErrorCode = {
  // Input
  CASE_INPUT_INVALID: 'CASE_INPUT_INVALID',
  FIELD_CATALOG_INVALID: 'FIELD_CATALOG_INVALID',

  // Pipeline
  REVIEW_TIMED_OUT: 'REVIEW_TIMED_OUT',

  // Review runs
  REVIEW_RUN_NOT_FOUND: 'REVIEW_RUN_NOT_FOUND',
  REVIEW_RUN_CONFLICT: 'REVIEW_RUN_CONFLICT',
  REVIEW_ISSUE_NOT_FOUND: 'REVIEW_ISSUE_NOT_FOUND',
  REVIEW_ALREADY_RESOLVED: 'REVIEW_ALREADY_RESOLVED',
  INVALID_STATE_TRANSITION: 'INVALID_STATE_TRANSITION',
  AUTO_APPLY_NOT_ALLOWED: 'AUTO_APPLY_NOT_ALLOWED',

  // Infrastructure
  DB_CONNECTION_ERROR: 'DB_CONNECTION_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface AppError {
  code: ErrorCode;
  message: string;
  details?: string;
  retryable: boolean;
}

export function createAppError(
  code: ErrorCode,
  message: string,
  retryable: boolean,
  details?: string,
): AppError {
  return { code, message, retryable, details };
}

/**
 * Raised when the router produces a bundle that breaks its own contract
 * (e.g. an issue resolved without a decision). Never caused by input.
 */
export class RouterInvariantError extends Error {
  readonly issueId: string;

  constructor(issueId: string, message: string) {
    super(`Router invariant violated for '${issueId}': ${message}`);
    this.name = 'RouterInvariantError';
    this.issueId = issueId;
  }
}
