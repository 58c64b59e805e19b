import { z } from 'zod';
import type { IbanValue, TypedValue } from '../../../domain/types.js';
import { readConfigFile } from '../../../infrastructure/field-catalog.js';
import { failed, valid, type FieldKindHandler } from '../types.js';

const RULE_ID = 'iban.iso13616';
const STRUCTURE = /^[A-Z]{2}\d{2}[A-Z0-9]{11,30}$/;

const countryLengths = z
  .record(z.string().length(2), z.number().int().min(15).max(34))
  .parse(JSON.parse(readConfigFile('iban-lengths.json')));

/** ISO 7064 mod 97-10 over the rearranged IBAN, one digit at a time. */
export function ibanRemainder(code: string): number {
  const rearranged = code.slice(4) + code.slice(0, 4);
  let remainder = 0;
  for (const ch of rearranged) {
    const digits = /\d/.test(ch) ? ch : String(ch.charCodeAt(0) - 55);
    for (const digit of digits) {
      remainder = (remainder * 10 + Number(digit)) % 97;
    }
  }
  return remainder;
}

function asIban(value: TypedValue): IbanValue {
  if (value.kind !== 'iban') {
    throw new Error(`Expected an IBAN value, got '${value.kind}'`);
  }
  return value;
}

export const ibanHandler: FieldKindHandler = {
  kind: 'iban',

  normalize(raw) {
    const code = raw.replace(/\s+/g, '').toUpperCase();

    if (!STRUCTURE.test(code)) {
      return failed(RULE_ID, { code: 'invalid_structure', reason: 'IBAN structure invalid' });
    }

    const country = code.slice(0, 2);
    const expectedLength = countryLengths[country];
    if (expectedLength !== undefined && code.length !== expectedLength) {
      return failed(RULE_ID, {
        code: 'invalid_length',
        reason: `IBAN for ${country} must have ${expectedLength} characters`,
      });
    }

    if (ibanRemainder(code) !== 1) {
      return failed(RULE_ID, { code: 'checksum_invalid', reason: 'checksum invalid' });
    }

    return valid(RULE_ID, { kind: 'iban', code, country });
  },

  score() {
    return [];
  },

  proposeFix(raw, value) {
    const { code } = asIban(value);
    return raw === code ? null : { suggestedValue: code, confidence: 0.95 };
  },

  semanticKey(value) {
    return asIban(value).code;
  },
};
