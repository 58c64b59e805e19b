import { logger } from '../../infrastructure/logger.js';
import type {
  AutoFixSuggestion,
  IssueFinding,
  NormalizedRecord,
} from '../../domain/types.js';
import { getHandler, normalizeField, semanticKeyOf, type NormalizeContext } from '../normalization/index.js';

const log = logger.child({ module: 'autofix' });

/**
 * Formatting-only corrections for fields that normalized. A proposal is kept
 * only if normalizing the suggested value yields the same semantic key as the
 * original, so a fix can never change identity or amount.
 */
export function proposeFixes(
  records: NormalizedRecord[],
  findings: IssueFinding[],
  ctx: NormalizeContext,
): AutoFixSuggestion[] {
  const findingByField = new Map<string, string>();
  for (const finding of findings) {
    if (finding.type === 'inconsistency') continue;
    const key = `${finding.recordRef}|${finding.fieldName}`;
    if (!findingByField.has(key)) findingByField.set(key, finding.issueId);
  }

  const suggestions: AutoFixSuggestion[] = [];
  let discarded = 0;

  for (const record of records) {
    const fieldNames = Object.keys(record.fields).sort();
    for (const fieldName of fieldNames) {
      const field = record.fields[fieldName];
      if (!field || field.outcome.status === 'failed') continue;

      const proposal = getHandler(field.kind).proposeFix(field.rawValue, field.outcome.value);
      if (!proposal) continue;

      const check = normalizeField({ ...field, rawValue: proposal.suggestedValue }, field.kind, ctx);
      if (
        check.outcome.status === 'failed' ||
        semanticKeyOf(check.outcome.value) !== semanticKeyOf(field.outcome.value)
      ) {
        discarded += 1;
        continue;
      }

      suggestions.push({
        fixId: `fix:${record.recordId}:${fieldName}`,
        fieldName,
        recordRef: record.recordId,
        originalValue: field.rawValue,
        suggestedValue: proposal.suggestedValue,
        confidence: proposal.confidence,
        issueId: findingByField.get(`${record.recordId}|${fieldName}`) ?? null,
      });
    }
  }

  if (discarded > 0) {
    log.warn({ discarded }, 'Fix proposals dropped: suggested value changes the semantic value');
  }
  log.debug({ suggestionCount: suggestions.length }, 'Fixes proposed');

  return suggestions;
}
