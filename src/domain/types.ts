export const RECORD_TYPES = ['customer', 'transaction', 'policy', 'ticket'] as const;

export type RecordType = (typeof RECORD_TYPES)[number];

export const FIELD_KINDS = [
  'phone',
  'date',
  'amount',
  'fiscal_code',
  'iban',
  'email',
  'free_text',
] as const;

export type FieldKind = (typeof FIELD_KINDS)[number];

export const ISSUE_TYPES = ['inconsistency', 'low_confidence', 'normalization_failure'] as const;

export type IssueType = (typeof ISSUE_TYPES)[number];

export const SEVERITIES = ['high', 'medium', 'low'] as const;

export type Severity = (typeof SEVERITIES)[number];

export const ISSUE_STATES = [
  'detected',
  'auto_fix_available',
  'needs_human',
  'resolved',
  'deferred',
] as const;

export type IssueState = (typeof ISSUE_STATES)[number];

export const DECISION_RESOLUTIONS = ['accepted', 'rejected', 'deferred'] as const;

export type DecisionResolution = (typeof DECISION_RESOLUTIONS)[number];

export const RECOMMENDATIONS = ['APPROVE', 'REVIEW_REQUIRED'] as const;

export type Recommendation = (typeof RECOMMENDATIONS)[number];

// --- Extraction input ---

export interface SourceLocation {
  page: number;
  section?: string;
}

export interface RawField {
  recordId: string;
  fieldName: string;
  rawValue: string;
  source: SourceLocation;
  expectedType?: FieldKind;
}

export interface RawRecord {
  recordId: string;
  recordType: RecordType;
  fields: RawField[];
}

// --- Typed values ---

export interface PhoneValue {
  kind: 'phone';
  countryCode: string;
  nationalNumber: string;
}

export interface DateValue {
  kind: 'date';
  year: number;
  month: number;
  day: number | null;
  granularity: 'day' | 'month';
}

export interface AmountValue {
  kind: 'amount';
  sign: 1 | -1;
  minorUnits: number;
  currency: string;
}

export interface FiscalCodeValue {
  kind: 'fiscal_code';
  code: string;
  form: 'personal' | 'numeric';
}

export interface IbanValue {
  kind: 'iban';
  code: string;
  country: string;
}

export interface EmailValue {
  kind: 'email';
  local: string;
  domain: string;
}

export interface TextValue {
  kind: 'free_text';
  text: string;
}

export type TypedValue =
  | PhoneValue
  | DateValue
  | AmountValue
  | FiscalCodeValue
  | IbanValue
  | EmailValue
  | TextValue;

// --- Normalization ---

export const NORMALIZATION_SIGNALS = [
  'two_digit_year',
  'month_granularity',
  'textual_month',
  'ambiguous_separator',
  'currency_assumed',
  'country_code_inferred',
] as const;

export type NormalizationSignal = (typeof NORMALIZATION_SIGNALS)[number];

export interface NormalizationFailure {
  code: string;
  reason: string;
}

export type NormalizationOutcome =
  | { status: 'valid'; value: TypedValue; signals: NormalizationSignal[] }
  | { status: 'plausible'; value: TypedValue; signals: NormalizationSignal[]; violation: string }
  | { status: 'failed'; failure: NormalizationFailure };

export interface NormalizedField {
  recordId: string;
  fieldName: string;
  kind: FieldKind;
  ruleId: string;
  rawValue: string;
  source: SourceLocation;
  outcome: NormalizationOutcome;
}

export interface NormalizedRecord {
  recordId: string;
  recordType: RecordType;
  position: number;
  fields: Record<string, NormalizedField>;
}

// --- Scoring ---

export interface ConfidenceAdjustment {
  reason: string;
  penalty: number;
  field?: string;
}

export interface FieldScore {
  recordId: string;
  fieldName: string;
  confidence: number;
  threshold: number;
  adjustments: ConfidenceAdjustment[];
}

// --- Findings ---

export interface EvidenceRef {
  recordId: string;
  page: number;
  section?: string;
  rawValue: string;
}

export interface ValueVariant {
  value: string;
  occurrences: number;
  evidence: EvidenceRef[];
}

export interface Issue {
  issueId: string;
  type: IssueType;
  severity: Severity;
  fieldName: string;
  recordRef: string;
  /** null when the issue cannot be scored (conflicts between records). */
  confidence: number | null;
  reason: string;
  evidence: EvidenceRef[];
  variants?: ValueVariant[];
  decisionRequired: boolean;
}

export type IssueFinding = Omit<Issue, 'decisionRequired'>;

export interface AutoFixSuggestion {
  fixId: string;
  fieldName: string;
  recordRef: string;
  originalValue: string;
  suggestedValue: string;
  confidence: number;
  issueId: string | null;
}

export interface ReviewDecision {
  issueId: string;
  resolution: DecisionResolution;
  resolvedValue?: string;
  notes?: string;
}

export type IssueResolution =
  | { source: 'review_decision'; decision: ReviewDecision }
  | { source: 'auto_apply'; fixId: string; threshold: number };

export interface RoutedIssue extends Issue {
  state: IssueState;
  autoFixId: string | null;
  resolution: IssueResolution | null;
}

export interface ReviewBundle {
  caseId: string;
  recordCount: number;
  issueCount: number;
  issues: RoutedIssue[];
  autoFixSuggestions: AutoFixSuggestion[];
  overallRecommendation: Recommendation;
}

// --- Review runs ---

export interface ReviewRun {
  id: string;
  caseId: string;
  bundle: ReviewBundle;
  recommendation: Recommendation;
  revision: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface IssueStateLog {
  id: string;
  runId: string;
  issueId: string;
  fromState: IssueState | null;
  toState: IssueState;
  metadata: Record<string, unknown> | null;
  createdAt: Date;
}
