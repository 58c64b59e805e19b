import { randomUUID } from 'node:crypto';
import { and, asc, eq, sql, type SQL } from 'drizzle-orm';
import { z } from 'zod';
import type { Database } from '../../infrastructure/db/client.js';
import { issueStateLogs, reviewDecisions, reviewRuns } from '../../infrastructure/db/schema.js';
import { issueStateSchema, reviewBundleSchema } from '../../domain/schemas.js';
import type { IssueStateLog, ReviewBundle, ReviewDecision, ReviewRun } from '../../domain/types.js';
import type { StateTransition } from '../routing/index.js';

const fromStateSchema = issueStateSchema.nullable();
const metadataSchema = z.record(z.string(), z.unknown()).nullable().catch(null);

function toReviewRun(row: typeof reviewRuns.$inferSelect): ReviewRun {
  const bundle = reviewBundleSchema.parse(row.bundle);
  return {
    id: row.id,
    caseId: row.caseId,
    bundle,
    recommendation: bundle.overallRecommendation,
    revision: row.revision,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function toStateLog(row: typeof issueStateLogs.$inferSelect): IssueStateLog {
  return {
    id: row.id,
    runId: row.runId,
    issueId: row.issueId,
    fromState: fromStateSchema.parse(row.fromState),
    toState: issueStateSchema.parse(row.toState),
    metadata: metadataSchema.parse(row.metadata),
    createdAt: row.createdAt,
  };
}

const NOT_NULL_VIOLATION = '23502';

function firstRow<T>(rows: T[], action: string): T {
  const [row] = rows;
  if (row === undefined) {
    throw new Error(`${action} returned no row`);
  }
  return row;
}

function decisionRows(runId: string | SQL, decisions: ReviewDecision[]) {
  return decisions.map((d) => ({
    runId,
    issueId: d.issueId,
    resolution: d.resolution,
    resolvedValue: d.resolvedValue ?? null,
    notes: d.notes ?? null,
  }));
}

function stateLogRows(runId: string | SQL, transitions: StateTransition[]) {
  return transitions.map((t) => ({
    runId,
    issueId: t.issueId,
    fromState: t.fromState,
    toState: t.toState,
    metadata: t.metadata ?? {},
  }));
}

// Rows written against a revision that never landed get a null run id.
function isStaleRevision(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === NOT_NULL_VIOLATION &&
    'column' in error &&
    error.column === 'run_id'
  );
}

/** Inserts a run together with its initial transitions, in one batch. */
export async function insertReviewRun(
  db: Database,
  bundle: ReviewBundle,
  transitions: StateTransition[],
): Promise<ReviewRun> {
  const id = randomUUID();
  const logs = stateLogRows(id, transitions);

  const [rows] = await db.batch([
    db
      .insert(reviewRuns)
      .values({
        id,
        caseId: bundle.caseId,
        recommendation: bundle.overallRecommendation,
        recordCount: bundle.recordCount,
        issueCount: bundle.issueCount,
        bundle,
      })
      .returning(),
    ...(logs.length > 0 ? [db.insert(issueStateLogs).values(logs)] : []),
  ]);

  return toReviewRun(firstRow(rows, 'insert review run'));
}

export async function findReviewRunById(db: Database, id: string): Promise<ReviewRun | null> {
  const rows = await db.select().from(reviewRuns).where(eq(reviewRuns.id, id));
  const [row] = rows;
  return row ? toReviewRun(row) : null;
}

export interface RoutingWrite {
  bundle: ReviewBundle;
  decisions: ReviewDecision[];
  transitions: StateTransition[];
}

/**
 * Stores a routed bundle with its decisions and transitions in one batch.
 * The update only matches while the run is still at `expectedRevision`, and
 * the decision and log rows point at the run through the new revision, so a
 * write that lost a race fails as a whole. Returns null in that case.
 */
export async function saveRouting(
  db: Database,
  runId: string,
  expectedRevision: string,
  write: RoutingWrite,
): Promise<ReviewRun | null> {
  const revision = randomUUID();
  const guardedRunId = sql`(select ${reviewRuns.id} from ${reviewRuns} where ${reviewRuns.id} = ${runId} and ${reviewRuns.revision} = ${revision})`;
  const decisions = decisionRows(guardedRunId, write.decisions);
  const logs = stateLogRows(guardedRunId, write.transitions);

  try {
    const [rows] = await db.batch([
      db
        .update(reviewRuns)
        .set({
          bundle: write.bundle,
          recommendation: write.bundle.overallRecommendation,
          issueCount: write.bundle.issueCount,
          revision,
          updatedAt: new Date(),
        })
        .where(and(eq(reviewRuns.id, runId), eq(reviewRuns.revision, expectedRevision)))
        .returning(),
      ...(decisions.length > 0 ? [db.insert(reviewDecisions).values(decisions)] : []),
      ...(logs.length > 0 ? [db.insert(issueStateLogs).values(logs)] : []),
    ]);

    const [row] = rows;
    return row ? toReviewRun(row) : null;
  } catch (error) {
    if (isStaleRevision(error)) return null;
    throw error;
  }
}

export async function findStateLogs(db: Database, runId: string): Promise<IssueStateLog[]> {
  const rows = await db
    .select()
    .from(issueStateLogs)
    .where(eq(issueStateLogs.runId, runId))
    .orderBy(asc(issueStateLogs.createdAt));

  return rows.map(toStateLog);
}
