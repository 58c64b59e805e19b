import type { Request, Response, NextFunction } from 'express';
import type { AppError } from '../../domain/errors.js';
import { RouterInvariantError } from '../../domain/errors.js';
import { logger } from '../../infrastructure/logger.js';

export interface ApiResponse<T> {
  success: boolean;
  data: T | null;
  error: { code: string; message: string; details?: string; retryable?: boolean } | null;
}

export function successResponse<T>(data: T): ApiResponse<T> {
  return { success: true, data, error: null };
}

export function errorResponse(code: string, message: string, details?: string, retryable?: boolean): ApiResponse<null> {
  return { success: false, data: null, error: { code, message, details, retryable } };
}

function isAppError(value: unknown): value is AppError {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    'message' in value &&
    'retryable' in value
  );
}

export function mapErrorCodeToStatus(code: string): number {
  switch (code) {
    case 'CASE_INPUT_INVALID':
      return 400;

    case 'REVIEW_RUN_NOT_FOUND':
    case 'REVIEW_ISSUE_NOT_FOUND':
      return 404;

    case 'REVIEW_RUN_CONFLICT':
    case 'INVALID_STATE_TRANSITION':
    case 'REVIEW_ALREADY_RESOLVED':
    case 'AUTO_APPLY_NOT_ALLOWED':
      return 409;

    case 'VALIDATION_ERROR':
      return 422;

    case 'REVIEW_TIMED_OUT':
    case 'DB_CONNECTION_ERROR':
      return 503;

    default:
      return 500;
  }
}

export function sendAppError(res: Response, appError: AppError): void {
  const status = mapErrorCodeToStatus(appError.code);
  res.status(status).json(errorResponse(appError.code, appError.message, appError.details, appError.retryable));
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  if (isAppError(err)) {
    sendAppError(res, err);
    return;
  }

  if (err instanceof RouterInvariantError) {
    logger.fatal({ issueId: err.issueId, err: err.message }, 'Router invariant violated');
    res.status(500).json(errorResponse('ROUTER_INVARIANT_VIOLATED', err.message, undefined, false));
    return;
  }

  logger.error({ err: err.message }, 'Unhandled error');
  res.status(500).json(errorResponse('INTERNAL_ERROR', 'An unexpected error occurred', undefined, false));
}
