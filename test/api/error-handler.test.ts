import { describe, it, expect, vi } from 'vitest';
import type { Request, Response, NextFunction } from 'express';
import {
  errorHandler,
  errorResponse,
  mapErrorCodeToStatus,
  sendAppError,
  successResponse,
} from '../../src/api/middleware/error-handler.js';
import { createAppError, RouterInvariantError } from '../../src/domain/errors.js';

function fakeResponse() {
  const res = { status: vi.fn(), json: vi.fn() };
  res.status.mockReturnValue(res);
  return res;
}

describe('mapErrorCodeToStatus', () => {
  it.each([
    ['CASE_INPUT_INVALID', 400],
    ['REVIEW_RUN_NOT_FOUND', 404],
    ['REVIEW_ISSUE_NOT_FOUND', 404],
    ['REVIEW_ALREADY_RESOLVED', 409],
    ['REVIEW_RUN_CONFLICT', 409],
    ['AUTO_APPLY_NOT_ALLOWED', 409],
    ['INVALID_STATE_TRANSITION', 409],
    ['VALIDATION_ERROR', 422],
    ['REVIEW_TIMED_OUT', 503],
    ['DB_CONNECTION_ERROR', 503],
    ['FIELD_CATALOG_INVALID', 500],
  ])('maps %s to %i', (code, status) => {
    expect(mapErrorCodeToStatus(code)).toBe(status);
  });
});

describe('response envelopes', () => {
  it('wraps data', () => {
    expect(successResponse({ id: 1 })).toEqual({ success: true, data: { id: 1 }, error: null });
  });

  it('wraps errors', () => {
    expect(errorResponse('VALIDATION_ERROR', 'Invalid request body', 'threshold: Required')).toEqual({
      success: false,
      data: null,
      error: { code: 'VALIDATION_ERROR', message: 'Invalid request body', details: 'threshold: Required' },
    });
  });
});

describe('sendAppError', () => {
  it('sends the mapped status and the error envelope', () => {
    const res = fakeResponse();
    sendAppError(
      res as unknown as Response,
      createAppError('REVIEW_TIMED_OUT', "Review of case 'c' exceeded 10ms", true, 'normalization: 1 of 5 records processed'),
    );

    expect(res.status).toHaveBeenCalledWith(503);
    expect(res.json).toHaveBeenCalledWith({
      success: false,
      data: null,
      error: {
        code: 'REVIEW_TIMED_OUT',
        message: "Review of case 'c' exceeded 10ms",
        details: 'normalization: 1 of 5 records processed',
        retryable: true,
      },
    });
  });
});

describe('errorHandler', () => {
  const req = {} as Request;
  const next: NextFunction = vi.fn();

  it('reports a router invariant violation as a 500', () => {
    const res = fakeResponse();
    errorHandler(new RouterInvariantError('*', 'issueCount does not match issues'), req, res as unknown as Response, next);

    expect(res.status).toHaveBeenCalledWith(500);
    expect(res.json).toHaveBeenCalledWith({
      success: false,
      data: null,
      error: {
        code: 'ROUTER_INVARIANT_VIOLATED',
        message: "Router invariant violated for '*': issueCount does not match issues",
        retryable: false,
      },
    });
  });

  it('hides the message of unexpected errors', () => {
    const res = fakeResponse();
    errorHandler(new Error('boom'), req, res as unknown as Response, next);

    expect(res.status).toHaveBeenCalledWith(500);
    expect(res.json).toHaveBeenCalledWith(
      errorResponse('INTERNAL_ERROR', 'An unexpected error occurred', undefined, false),
    );
  });
});
