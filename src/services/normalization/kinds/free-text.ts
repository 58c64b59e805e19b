import type { TextValue, TypedValue } from '../../../domain/types.js';
import { valid, type FieldKindHandler } from '../types.js';

const RULE_ID = 'free_text.collapse';

function asText(value: TypedValue): TextValue {
  if (value.kind !== 'free_text') {
    throw new Error(`Expected a text value, got '${value.kind}'`);
  }
  return value;
}

export function collapseWhitespace(raw: string): string {
  return raw.replace(/\s+/g, ' ').trim();
}

export const freeTextHandler: FieldKindHandler = {
  kind: 'free_text',

  // Empty values are rejected before any handler runs.
  normalize(raw) {
    return valid(RULE_ID, { kind: 'free_text', text: collapseWhitespace(raw) });
  },

  score() {
    return [];
  },

  proposeFix(raw, value) {
    const { text } = asText(value);
    return raw === text ? null : { suggestedValue: text, confidence: 0.99 };
  },

  semanticKey(value) {
    return asText(value).text;
  },
};
