import type { FiscalCodeValue, TypedValue } from '../../../domain/types.js';
import { failed, valid, type FieldKindHandler } from '../types.js';

const PERSONAL_RULE = 'fiscal_code.personal';
const NUMERIC_RULE = 'fiscal_code.numeric';

// Digit positions may carry letters when the code was reassigned to avoid a collision.
const OMOCODIA_LETTERS = 'LMNPQRSTUV';
const MONTH_LETTERS = 'ABCDEHLMPRST';
const DIGIT = `[0-9${OMOCODIA_LETTERS}]`;
const PERSONAL_PATTERN = new RegExp(
  `^[A-Z]{6}${DIGIT}{2}[${MONTH_LETTERS}]${DIGIT}{2}[A-Z]${DIGIT}{3}[A-Z]$`,
);

// Check-character weights for odd positions, indexed 0-9 then A-Z (digits share A-J weights).
const ODD_WEIGHTS = [1, 0, 5, 7, 9, 13, 15, 17, 19, 21, 2, 4, 18, 20, 11, 3, 6, 8, 12, 14, 16, 10, 22, 25, 24, 23];

function charIndex(ch: string): number {
  return /\d/.test(ch) ? Number(ch) : ch.charCodeAt(0) - 65;
}

export function personalCheckCharacter(body: string): string {
  let sum = 0;
  for (let i = 0; i < 15; i++) {
    const index = charIndex(body[i]);
    sum += i % 2 === 0 ? ODD_WEIGHTS[index] : index;
  }
  return String.fromCharCode(65 + (sum % 26));
}

export function numericCheckDigit(body: string): number {
  let sum = 0;
  for (let i = 0; i < 10; i++) {
    const digit = Number(body[i]);
    if (i % 2 === 0) {
      sum += digit;
    } else {
      const doubled = digit * 2;
      sum += doubled > 9 ? doubled - 9 : doubled;
    }
  }
  return (10 - (sum % 10)) % 10;
}

function decodeDigits(chars: string): number {
  let out = '';
  for (const ch of chars) {
    const omocodia = OMOCODIA_LETTERS.indexOf(ch);
    out += omocodia >= 0 ? String(omocodia) : ch;
  }
  return Number(out);
}

export interface EncodedBirthDate {
  yearTwoDigits: number;
  month: number;
  day: number;
}

/** Birth date embedded in a personal fiscal code (day + 40 for women). */
export function decodeBirthDate(code: string): EncodedBirthDate | null {
  if (!PERSONAL_PATTERN.test(code)) return null;
  const dayField = decodeDigits(code.slice(9, 11));
  return {
    yearTwoDigits: decodeDigits(code.slice(6, 8)),
    month: MONTH_LETTERS.indexOf(code[8]) + 1,
    day: dayField > 40 ? dayField - 40 : dayField,
  };
}

function asFiscalCode(value: TypedValue): FiscalCodeValue {
  if (value.kind !== 'fiscal_code') {
    throw new Error(`Expected a fiscal code value, got '${value.kind}'`);
  }
  return value;
}

export const fiscalCodeHandler: FieldKindHandler = {
  kind: 'fiscal_code',

  normalize(raw) {
    const code = raw.replace(/\s+/g, '').toUpperCase();

    if (/^\d{11}$/.test(code)) {
      if (numericCheckDigit(code) !== Number(code[10])) {
        return failed(NUMERIC_RULE, { code: 'checksum_invalid', reason: 'checksum invalid' });
      }
      return valid(NUMERIC_RULE, { kind: 'fiscal_code', code, form: 'numeric' });
    }

    if (code.length !== 16) {
      return failed(PERSONAL_RULE, {
        code: 'invalid_length',
        reason: 'fiscal code must have 16 characters (or 11 digits)',
      });
    }
    if (!PERSONAL_PATTERN.test(code)) {
      return failed(PERSONAL_RULE, { code: 'invalid_structure', reason: 'fiscal code structure invalid' });
    }
    if (personalCheckCharacter(code) !== code[15]) {
      return failed(PERSONAL_RULE, { code: 'checksum_invalid', reason: 'checksum invalid' });
    }
    return valid(PERSONAL_RULE, { kind: 'fiscal_code', code, form: 'personal' });
  },

  score() {
    return [];
  },

  proposeFix(raw, value) {
    const { code } = asFiscalCode(value);
    return raw === code ? null : { suggestedValue: code, confidence: 0.95 };
  },

  semanticKey(value) {
    return asFiscalCode(value).code;
  },
};
