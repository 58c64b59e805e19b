import { z } from 'zod';
import {
  DECISION_RESOLUTIONS,
  FIELD_KINDS,
  ISSUE_STATES,
  ISSUE_TYPES,
  RECOMMENDATIONS,
  RECORD_TYPES,
  SEVERITIES,
} from './types.js';

export const recordTypeSchema = z.enum(RECORD_TYPES);

export const fieldKindSchema = z.enum(FIELD_KINDS);

export const issueStateSchema = z.enum(ISSUE_STATES);

export const sourceLocationSchema = z.object({
  page: z.number().int().positive(),
  section: z.string().optional(),
});

export const rawFieldInput = z.object({
  fieldName: z.string().min(1, 'Field name is required'),
  rawValue: z.string(),
  source: sourceLocationSchema,
  expectedType: fieldKindSchema.optional(),
});

export const rawRecordInput = z.object({
  recordId: z.string().min(1, 'Record id is required'),
  recordType: recordTypeSchema,
  fields: z.array(rawFieldInput),
});

// Records stay loosely typed here so one malformed record does not reject the case.
export const caseFileInput = z.object({
  caseId: z.string().min(1, 'Case id is required'),
  records: z.array(z.unknown()),
});

export const reviewDecisionInput = z.object({
  issueId: z.string().min(1),
  resolution: z.enum(DECISION_RESOLUTIONS),
  resolvedValue: z.string().optional(),
  notes: z.string().optional(),
});

export const decisionsRequestInput = z.object({
  decisions: z.array(reviewDecisionInput).min(1, 'At least one decision is required'),
});

export const autoApplyRequestInput = z.object({
  threshold: z.number().min(0).max(1),
  issueIds: z.array(z.string().min(1)).optional(),
});

export const reviewCaseRequestInput = caseFileInput.extend({
  autoApplyThreshold: z.number().min(0).max(1).optional(),
});

// Stored bundles are re-validated on read so JSONB columns never need a cast.
const evidenceRefSchema = z.object({
  recordId: z.string(),
  page: z.number().int(),
  section: z.string().optional(),
  rawValue: z.string(),
});

const issueResolutionSchema = z.discriminatedUnion('source', [
  z.object({ source: z.literal('review_decision'), decision: reviewDecisionInput }),
  z.object({ source: z.literal('auto_apply'), fixId: z.string(), threshold: z.number() }),
]);

export const routedIssueSchema = z.object({
  issueId: z.string(),
  type: z.enum(ISSUE_TYPES),
  severity: z.enum(SEVERITIES),
  fieldName: z.string(),
  recordRef: z.string(),
  confidence: z.number().nullable(),
  reason: z.string(),
  evidence: z.array(evidenceRefSchema),
  variants: z
    .array(z.object({ value: z.string(), occurrences: z.number().int(), evidence: z.array(evidenceRefSchema) }))
    .optional(),
  decisionRequired: z.boolean(),
  state: issueStateSchema,
  autoFixId: z.string().nullable(),
  resolution: issueResolutionSchema.nullable(),
});

export const autoFixSuggestionSchema = z.object({
  fixId: z.string(),
  fieldName: z.string(),
  recordRef: z.string(),
  originalValue: z.string(),
  suggestedValue: z.string(),
  confidence: z.number(),
  issueId: z.string().nullable(),
});

export const reviewBundleSchema = z.object({
  caseId: z.string(),
  recordCount: z.number().int(),
  issueCount: z.number().int(),
  issues: z.array(routedIssueSchema),
  autoFixSuggestions: z.array(autoFixSuggestionSchema),
  overallRecommendation: z.enum(RECOMMENDATIONS),
});

export type RawFieldInput = z.infer<typeof rawFieldInput>;
export type RawRecordInput = z.infer<typeof rawRecordInput>;
export type CaseFileInput = z.infer<typeof caseFileInput>;
export type ReviewDecisionInput = z.infer<typeof reviewDecisionInput>;
export type AutoApplyRequestInput = z.infer<typeof autoApplyRequestInput>;
export type ReviewCaseRequestInput = z.infer<typeof reviewCaseRequestInput>;
