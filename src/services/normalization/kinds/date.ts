import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';
import { z } from 'zod';
import type { DateValue, NormalizationSignal, TypedValue } from '../../../domain/types.js';
import { readConfigFile } from '../../../infrastructure/field-catalog.js';
import { failed, penaltiesFor, valid, type FieldKindHandler, type Normalized } from '../types.js';

dayjs.extend(customParseFormat);

const monthNames = z
  .record(z.string(), z.number().int().min(1).max(12))
  .parse(JSON.parse(readConfigFile('month-names.json')));

const PENALTIES = {
  two_digit_year: 0.03,
  month_granularity: 0.05,
  textual_month: 0.02,
} as const;

interface DateParts {
  day: string | null;
  month: string;
  year: string;
}

interface DatePattern {
  ruleId: string;
  regex: RegExp;
  extract(match: RegExpExecArray): DateParts | null;
  signals: NormalizationSignal[];
}

function monthFromName(name: string): string | null {
  const month = monthNames[name.toLowerCase()];
  return month === undefined ? null : String(month);
}

// Numeric patterns require the same separator on both sides of the month.
const PATTERNS: DatePattern[] = [
  {
    ruleId: 'date.iso',
    regex: /^(\d{4})-(\d{1,2})-(\d{1,2})$/,
    extract: (m) => ({ year: m[1], month: m[2], day: m[3] }),
    signals: [],
  },
  {
    ruleId: 'date.dd_mm_yyyy',
    regex: /^(\d{1,2})([/.-])(\d{1,2})\2(\d{4})$/,
    extract: (m) => ({ day: m[1], month: m[3], year: m[4] }),
    signals: [],
  },
  {
    ruleId: 'date.dd_mm_yy',
    regex: /^(\d{1,2})([/.-])(\d{1,2})\2(\d{2})$/,
    extract: (m) => ({ day: m[1], month: m[3], year: m[4] }),
    signals: ['two_digit_year'],
  },
  {
    ruleId: 'date.mm_yyyy',
    regex: /^(\d{1,2})[/.-](\d{4})$/,
    extract: (m) => ({ day: null, month: m[1], year: m[2] }),
    signals: ['month_granularity'],
  },
  {
    ruleId: 'date.d_month_yyyy',
    regex: /^(\d{1,2})\s+([\p{L}]+)\.?\s+(\d{4})$/u,
    extract: (m) => {
      const month = monthFromName(m[2]);
      return month === null ? null : { day: m[1], month, year: m[3] };
    },
    signals: ['textual_month'],
  },
  {
    ruleId: 'date.month_yyyy',
    regex: /^([\p{L}]+)\.?\s+(\d{4})$/u,
    extract: (m) => {
      const month = monthFromName(m[1]);
      return month === null ? null : { day: null, month, year: m[2] };
    },
    signals: ['textual_month', 'month_granularity'],
  },
];

function pad(part: string): string {
  return part.padStart(2, '0');
}

function toDateValue(parts: DateParts): DateValue | null {
  const twoDigitYear = parts.year.length === 2;
  const yearFormat = twoDigitYear ? 'YY' : 'YYYY';
  const text = parts.day === null
    ? `${pad(parts.month)}/${parts.year}`
    : `${pad(parts.day)}/${pad(parts.month)}/${parts.year}`;
  const format = parts.day === null ? `MM/${yearFormat}` : `DD/MM/${yearFormat}`;

  const parsed = dayjs(text, format, true);
  if (!parsed.isValid()) return null;

  return {
    kind: 'date',
    year: parsed.year(),
    month: parsed.month() + 1,
    day: parts.day === null ? null : parsed.date(),
    granularity: parts.day === null ? 'month' : 'day',
  };
}

function asDate(value: TypedValue): DateValue {
  if (value.kind !== 'date') {
    throw new Error(`Expected a date value, got '${value.kind}'`);
  }
  return value;
}

export function formatIsoDate(value: DateValue): string {
  const yearMonth = `${String(value.year).padStart(4, '0')}-${pad(String(value.month))}`;
  return value.day === null ? yearMonth : `${yearMonth}-${pad(String(value.day))}`;
}

export const dateHandler: FieldKindHandler = {
  kind: 'date',

  normalize(raw): Normalized {
    const text = raw.trim().replace(/\s+/g, ' ');

    for (const pattern of PATTERNS) {
      const match = pattern.regex.exec(text);
      if (!match) continue;

      const parts = pattern.extract(match);
      if (parts === null) {
        return failed(pattern.ruleId, { code: 'unknown_month_name', reason: 'unrecognized month name' });
      }

      const value = toDateValue(parts);
      if (value === null) {
        return failed(pattern.ruleId, { code: 'invalid_calendar_date', reason: 'not a valid calendar date' });
      }
      return valid(pattern.ruleId, value, pattern.signals);
    }

    return failed('date.none', { code: 'unrecognized_pattern', reason: 'no recognized date pattern' });
  },

  score(outcome) {
    return penaltiesFor(outcome.signals, PENALTIES);
  },

  // Rewriting a date is never formatting-only: two-digit years and partial dates carry assumptions.
  proposeFix() {
    return null;
  },

  semanticKey(value) {
    return formatIsoDate(asDate(value));
  },
};
