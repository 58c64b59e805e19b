import { z } from 'zod';
import type { Database } from '../../infrastructure/db/client.js';
import { logger } from '../../infrastructure/logger.js';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, type AppError } from '../../domain/errors.js';
import type { ReviewDecision, ReviewRun } from '../../domain/types.js';
import { runReview, type ReviewOptions } from '../pipeline/index.js';
import { applyDecisions, confirmAutoApply, type AutoApplyPolicy, type RoutingResult } from '../routing/index.js';
import { findReviewRunById, findStateLogs, insertReviewRun, saveRouting } from './repository.js';
import type { ReviewRunWithHistory } from './types.js';

export type { ReviewRunWithHistory } from './types.js';

const log = logger.child({ module: 'review-runs' });

const runIdSchema = z.string().uuid();

function databaseError(action: string, error: unknown, context: Record<string, unknown>): AppError {
  const message = error instanceof Error ? error.message : String(error);
  log.error({ ...context, error: message }, `Failed to ${action}`);
  return createAppError('DB_CONNECTION_ERROR', `Failed to ${action}`, true, message);
}

function notFound(runId: string): AppError {
  return createAppError('REVIEW_RUN_NOT_FOUND', `Review run '${runId}' not found`, false);
}

async function loadRun(db: Database, runId: string): Promise<Result<ReviewRun, AppError>> {
  if (!runIdSchema.safeParse(runId).success) {
    return err(notFound(runId));
  }
  try {
    const run = await findReviewRunById(db, runId);
    return run ? ok(run) : err(notFound(runId));
  } catch (error) {
    return err(databaseError('fetch review run', error, { runId }));
  }
}

async function persistRouting(
  db: Database,
  loaded: ReviewRun,
  routed: RoutingResult,
  decisions: ReviewDecision[],
): Promise<Result<ReviewRun, AppError>> {
  const runId = loaded.id;
  try {
    const run = await saveRouting(db, runId, loaded.revision, {
      bundle: routed.bundle,
      decisions,
      transitions: routed.transitions,
    });
    if (!run) {
      log.warn({ runId, revision: loaded.revision }, 'Review run changed since it was read');
      return err(
        createAppError('REVIEW_RUN_CONFLICT', `Review run '${runId}' was changed by another request`, false),
      );
    }
    return ok(run);
  } catch (error) {
    return err(databaseError('update review run', error, { runId }));
  }
}

/** Reviews a case and stores the bundle together with every initial transition. */
export async function createReviewRun(
  db: Database,
  input: unknown,
  options: ReviewOptions = {},
): Promise<Result<ReviewRun, AppError>> {
  const reviewed = await runReview(input, options);
  if (!reviewed.ok) return reviewed;

  const { bundle, transitions } = reviewed.value;
  try {
    const run = await insertReviewRun(db, bundle, transitions);

    log.info(
      { runId: run.id, caseId: bundle.caseId, issueCount: bundle.issueCount, recommendation: run.recommendation },
      'Review run created',
    );
    return ok(run);
  } catch (error) {
    return err(databaseError('create review run', error, { caseId: bundle.caseId }));
  }
}

export async function getReviewRun(db: Database, runId: string): Promise<Result<ReviewRunWithHistory, AppError>> {
  const loaded = await loadRun(db, runId);
  if (!loaded.ok) return loaded;

  try {
    const history = await findStateLogs(db, runId);
    return ok({ run: loaded.value, history });
  } catch (error) {
    return err(databaseError('fetch issue history', error, { runId }));
  }
}

export async function submitDecisions(
  db: Database,
  runId: string,
  decisions: ReviewDecision[],
): Promise<Result<ReviewRun, AppError>> {
  const loaded = await loadRun(db, runId);
  if (!loaded.ok) return loaded;

  const routed = applyDecisions(loaded.value.bundle, decisions);
  if (!routed.ok) {
    log.warn({ runId, errorCode: routed.error.code }, routed.error.message);
    return routed;
  }

  const saved = await persistRouting(db, loaded.value, routed.value, decisions);
  if (saved.ok) {
    log.info({ runId, decisions: decisions.length, recommendation: saved.value.recommendation }, 'Decisions recorded');
  }
  return saved;
}

export async function confirmRunAutoApply(
  db: Database,
  runId: string,
  policy: AutoApplyPolicy,
): Promise<Result<ReviewRun, AppError>> {
  const loaded = await loadRun(db, runId);
  if (!loaded.ok) return loaded;

  const routed = confirmAutoApply(loaded.value.bundle, policy);
  if (!routed.ok) {
    log.warn({ runId, errorCode: routed.error.code }, routed.error.message);
    return routed;
  }

  return persistRouting(db, loaded.value, routed.value, []);
}
