import { z } from 'zod';
import type { EmailValue, TypedValue } from '../../../domain/types.js';
import { failed, plausible, valid, type FieldKindHandler } from '../types.js';

const RULE_ID = 'email.address';
const strictEmail = z.string().email();
const DOMAIN_WITHOUT_TLD = /^[^\s@]+@[A-Za-z0-9-]+$/;

function asEmail(value: TypedValue): EmailValue {
  if (value.kind !== 'email') {
    throw new Error(`Expected an email value, got '${value.kind}'`);
  }
  return value;
}

function toValue(address: string): EmailValue {
  const at = address.lastIndexOf('@');
  return { kind: 'email', local: address.slice(0, at), domain: address.slice(at + 1) };
}

function canonical(value: EmailValue): string {
  return `${value.local}@${value.domain}`.toLowerCase();
}

export const emailHandler: FieldKindHandler = {
  kind: 'email',

  normalize(raw) {
    const address = raw.trim();

    if (strictEmail.safeParse(address).success) {
      return valid(RULE_ID, toValue(address));
    }
    if (DOMAIN_WITHOUT_TLD.test(address)) {
      return plausible(RULE_ID, toValue(address), 'domain has no top-level domain');
    }
    return failed(RULE_ID, { code: 'invalid_format', reason: 'not a valid email address' });
  },

  score() {
    return [];
  },

  proposeFix(raw, value) {
    const suggestedValue = canonical(asEmail(value));
    if (raw === suggestedValue) return null;
    return { suggestedValue, confidence: raw.trim() === suggestedValue ? 0.98 : 0.9 };
  },

  semanticKey(value) {
    return canonical(asEmail(value));
  },
};
