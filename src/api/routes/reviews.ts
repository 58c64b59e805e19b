import { Router, type Request, type Response } from 'express';
import type { ZodError } from 'zod';
import {
  autoApplyRequestInput,
  decisionsRequestInput,
  reviewCaseRequestInput,
} from '../../domain/schemas.js';
import { createAppError } from '../../domain/errors.js';
import type { Database } from '../../infrastructure/db/client.js';
import type { ReviewConfig } from '../../infrastructure/config.js';
import { successResponse, errorResponse, sendAppError } from '../middleware/error-handler.js';
import { reviewCase } from '../../services/pipeline/index.js';
import * as reviewRuns from '../../services/review-runs/index.js';

export interface ReviewRouterDeps {
  /** Absent when no DATABASE_URL is configured; stateless analysis still works. */
  db: Database | null;
  review: ReviewConfig;
}

function paramString(val: string | string[] | undefined): string {
  return (Array.isArray(val) ? val[0] : val) ?? '';
}

function sendValidationError(res: Response, error: ZodError): void {
  const details = error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
  res.status(422).json(errorResponse('VALIDATION_ERROR', 'Invalid request body', details));
}

export function createReviewRouter(deps: ReviewRouterDeps): Router {
  const router = Router();

  const requireDb = (res: Response): Database | null => {
    if (!deps.db) {
      sendAppError(res, createAppError('DB_CONNECTION_ERROR', 'Review-run store is not configured', false));
    }
    return deps.db;
  };

  router.post('/cases/analyze', async (req: Request, res: Response) => {
    const parsed = reviewCaseRequestInput.safeParse(req.body);
    if (!parsed.success) return sendValidationError(res, parsed.error);

    const result = await reviewCase(parsed.data, {
      config: deps.review,
      autoApplyThreshold: parsed.data.autoApplyThreshold,
    });
    if (!result.ok) return sendAppError(res, result.error);

    res.json(successResponse(result.value));
  });

  router.post('/reviews', async (req: Request, res: Response) => {
    const db = requireDb(res);
    if (!db) return;

    const parsed = reviewCaseRequestInput.safeParse(req.body);
    if (!parsed.success) return sendValidationError(res, parsed.error);

    const result = await reviewRuns.createReviewRun(db, parsed.data, {
      config: deps.review,
      autoApplyThreshold: parsed.data.autoApplyThreshold,
    });
    if (!result.ok) return sendAppError(res, result.error);

    res.status(201).json(successResponse(result.value));
  });

  router.get('/reviews/:id', async (req: Request, res: Response) => {
    const db = requireDb(res);
    if (!db) return;

    const result = await reviewRuns.getReviewRun(db, paramString(req.params.id));
    if (!result.ok) return sendAppError(res, result.error);

    res.json(successResponse(result.value));
  });

  router.post('/reviews/:id/decisions', async (req: Request, res: Response) => {
    const db = requireDb(res);
    if (!db) return;

    const parsed = decisionsRequestInput.safeParse(req.body);
    if (!parsed.success) return sendValidationError(res, parsed.error);

    const result = await reviewRuns.submitDecisions(db, paramString(req.params.id), parsed.data.decisions);
    if (!result.ok) return sendAppError(res, result.error);

    res.json(successResponse(result.value));
  });

  router.post('/reviews/:id/auto-apply', async (req: Request, res: Response) => {
    const db = requireDb(res);
    if (!db) return;

    const parsed = autoApplyRequestInput.safeParse(req.body);
    if (!parsed.success) return sendValidationError(res, parsed.error);

    const result = await reviewRuns.confirmRunAutoApply(db, paramString(req.params.id), parsed.data);
    if (!result.ok) return sendAppError(res, result.error);

    res.json(successResponse(result.value));
  });

  return router;
}
