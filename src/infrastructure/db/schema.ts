import {
  pgTable,
  uuid,
  text,
  timestamp,
  jsonb,
  integer,
  index,
  check,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';

export const reviewRuns = pgTable(
  'review_runs',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    caseId: text('case_id').notNull(),
    recommendation: text('recommendation').notNull(),
    recordCount: integer('record_count').notNull(),
    issueCount: integer('issue_count').notNull(),
    bundle: jsonb('bundle').notNull(),
    // Replaced on every write; updates are guarded by the revision they read.
    revision: uuid('revision').notNull().defaultRandom(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('idx_review_runs_case').on(table.caseId),
    index('idx_review_runs_pending')
      .on(table.recommendation)
      .where(sql`recommendation = 'REVIEW_REQUIRED'`),
    check('review_runs_recommendation_check', sql`recommendation IN ('APPROVE', 'REVIEW_REQUIRED')`),
  ],
);

export const reviewDecisions = pgTable(
  'review_decisions',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    runId: uuid('run_id')
      .notNull()
      .references(() => reviewRuns.id),
    issueId: text('issue_id').notNull(),
    resolution: text('resolution').notNull(),
    resolvedValue: text('resolved_value'),
    notes: text('notes'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('idx_review_decisions_run').on(table.runId),
    check('review_decisions_resolution_check', sql`resolution IN ('accepted', 'rejected', 'deferred')`),
  ],
);

export const issueStateLogs = pgTable(
  'issue_state_logs',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    runId: uuid('run_id')
      .notNull()
      .references(() => reviewRuns.id),
    issueId: text('issue_id').notNull(),
    fromState: text('from_state'),
    toState: text('to_state').notNull(),
    metadata: jsonb('metadata').notNull().default({}),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('idx_issue_state_logs_run_issue').on(table.runId, table.issueId)],
);
