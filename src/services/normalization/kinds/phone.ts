import { parsePhoneNumberFromString } from 'libphonenumber-js';
import type { NormalizationSignal, PhoneValue, TypedValue } from '../../../domain/types.js';
import { failed, penaltiesFor, plausible, valid, type FieldKindHandler } from '../types.js';

const RULE_ID = 'phone.e164';
const ALLOWED_CHARACTERS = /^\+?[\d\s().\/-]+$/;
const SEPARATORS = /[\s().\/-]/g;

const PENALTIES = {
  country_code_inferred: 0.1,
} as const;

function asPhone(value: TypedValue): PhoneValue {
  if (value.kind !== 'phone') {
    throw new Error(`Expected a phone value, got '${value.kind}'`);
  }
  return value;
}

export function formatE164(value: PhoneValue): string {
  return `+${value.countryCode}${value.nationalNumber}`;
}

export const phoneHandler: FieldKindHandler = {
  kind: 'phone',

  normalize(raw, ctx) {
    const trimmed = raw.trim();
    if (!ALLOWED_CHARACTERS.test(trimmed)) {
      return failed(RULE_ID, { code: 'invalid_characters', reason: 'unexpected characters in phone number' });
    }

    const compact = trimmed.replace(SEPARATORS, '');
    const international = compact.startsWith('+') || compact.startsWith('00');
    const candidate = compact.startsWith('00') ? `+${compact.slice(2)}` : compact;

    const parsed = parsePhoneNumberFromString(candidate, ctx.defaultCountry);
    if (!parsed || !parsed.isPossible()) {
      return failed(RULE_ID, { code: 'not_e164', reason: 'number does not have an E.164 shape' });
    }

    const value: PhoneValue = {
      kind: 'phone',
      countryCode: parsed.countryCallingCode,
      nationalNumber: parsed.nationalNumber,
    };
    const signals: NormalizationSignal[] = international ? [] : ['country_code_inferred'];

    if (!parsed.isValid()) {
      return plausible(RULE_ID, value, 'number is not assigned in its numbering plan', signals);
    }
    return valid(RULE_ID, value, signals);
  },

  score(outcome) {
    return penaltiesFor(outcome.signals, PENALTIES);
  },

  proposeFix(raw, value) {
    const canonical = formatE164(asPhone(value));
    const trimmed = raw.trim();
    if (trimmed === canonical) return null;

    const compact = trimmed.replace(SEPARATORS, '');
    if (!compact.startsWith('+') && !compact.startsWith('00')) {
      return { suggestedValue: canonical, confidence: 0.8 };
    }
    if (trimmed.replace(/\s+/g, '') === canonical) {
      return { suggestedValue: canonical, confidence: 0.98 };
    }
    return { suggestedValue: canonical, confidence: 0.9 };
  },

  semanticKey(value) {
    return formatE164(asPhone(value));
  },
};
