import type { AmountValue, NormalizationSignal, TypedValue } from '../../../domain/types.js';
import { failed, penaltiesFor, valid, type FieldKindHandler, type NormalizeContext } from '../types.js';

const RULE_ID = 'amount.decimal';

const PENALTIES = {
  ambiguous_separator: 0.03,
  currency_assumed: 0.03,
} as const;

interface Magnitude {
  minorUnits: number;
  ambiguous: boolean;
}

interface CurrencyMatch {
  currency: string;
  rest: string;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function matchCurrency(text: string, aliases: Record<string, string>, at: 'start' | 'end'): CurrencyMatch | null {
  const lower = text.toLowerCase();
  const tokens = Object.keys(aliases).sort((a, b) => b.length - a.length || a.localeCompare(b));

  for (const token of tokens) {
    const t = token.toLowerCase();
    if (at === 'start' && lower.startsWith(t)) {
      return { currency: aliases[token], rest: text.slice(t.length).trim() };
    }
    if (at === 'end' && lower.endsWith(t)) {
      return { currency: aliases[token], rest: text.slice(0, text.length - t.length).trim() };
    }
  }

  // Bare ISO 4217 codes not listed as aliases.
  const iso = at === 'start' ? /^([A-Z]{3})(?![A-Za-z])\s*/.exec(text) : /\s*(?<![A-Za-z])([A-Z]{3})$/.exec(text);
  if (iso) {
    const rest = at === 'start' ? text.slice(iso[0].length) : text.slice(0, text.length - iso[0].length);
    return { currency: iso[1], rest: rest.trim() };
  }
  return null;
}

function splitGroups(integerPart: string, separator: string): string | null {
  const groups = integerPart.split(separator);
  const pattern = new RegExp(`^\\d{1,3}(${escapeRegExp(separator)}\\d{3})*$`);
  return pattern.test(integerPart) ? groups.join('') : null;
}

/**
 * Reads the digits of an amount with either `.` or `,` as decimal separator.
 * A single separator followed by exactly three digits is read as a thousands
 * separator (`1.200` is 1200) and reported as ambiguous.
 */
export function parseMagnitude(body: string): Magnitude | null {
  if (!/^\d[\d.,]*$/.test(body) || /[.,]$/.test(body)) return null;

  const lastDot = body.lastIndexOf('.');
  const lastComma = body.lastIndexOf(',');
  let integerDigits: string | null;
  let fraction = '';
  let ambiguous = false;

  if (lastDot >= 0 && lastComma >= 0) {
    const decimalIndex = Math.max(lastDot, lastComma);
    const thousands = lastDot > lastComma ? ',' : '.';
    fraction = body.slice(decimalIndex + 1);
    integerDigits = splitGroups(body.slice(0, decimalIndex), thousands);
  } else if (lastDot >= 0 || lastComma >= 0) {
    const separator = lastDot >= 0 ? '.' : ',';
    const parts = body.split(separator);
    if (parts.length === 2 && parts[1].length !== 3) {
      integerDigits = parts[0];
      fraction = parts[1];
    } else {
      integerDigits = splitGroups(body, separator);
      ambiguous = parts.length === 2;
    }
  } else {
    integerDigits = body;
  }

  if (integerDigits === null || !/^\d*$/.test(fraction) || fraction.length > 2) return null;

  const minorUnits = Number(integerDigits) * 100 + Number(fraction.padEnd(2, '0'));
  if (!Number.isSafeInteger(minorUnits)) return null;

  return { minorUnits, ambiguous };
}

function asAmount(value: TypedValue): AmountValue {
  if (value.kind !== 'amount') {
    throw new Error(`Expected an amount value, got '${value.kind}'`);
  }
  return value;
}

export function formatAmount(value: AmountValue): string {
  const major = Math.floor(value.minorUnits / 100);
  const minor = String(value.minorUnits % 100).padStart(2, '0');
  return `${value.sign < 0 ? '-' : ''}${major}.${minor} ${value.currency}`;
}

/** Magnitude and currency without the sign: identifies the event an amount describes. */
export function amountMagnitudeKey(value: AmountValue): string {
  return `${value.minorUnits}${value.currency}`;
}

function normalizeAmount(raw: string, ctx: NormalizeContext) {
  let text = raw.trim();
  let signMarkers = 0;
  let negative = false;

  const parenthesized = /^\((.*)\)$/.exec(text);
  if (parenthesized) {
    negative = true;
    signMarkers += 1;
    text = parenthesized[1].trim();
  }

  const readLeadingSign = () => {
    const sign = /^([+-])\s*/.exec(text);
    if (sign) {
      signMarkers += 1;
      negative = negative || sign[1] === '-';
      text = text.slice(sign[0].length);
    }
  };

  readLeadingSign();
  let currency: string | null = null;
  const prefix = matchCurrency(text, ctx.currencyAliases, 'start');
  if (prefix) {
    currency = prefix.currency;
    text = prefix.rest;
    readLeadingSign();
  }

  const suffix = currency === null ? matchCurrency(text, ctx.currencyAliases, 'end') : null;
  if (suffix) {
    currency = suffix.currency;
    text = suffix.rest;
  }

  const trailingSign = /\s*-$/.exec(text);
  if (trailingSign) {
    signMarkers += 1;
    negative = true;
    text = text.slice(0, text.length - trailingSign[0].length);
  }

  if (signMarkers > 1) {
    return failed(RULE_ID, { code: 'conflicting_sign', reason: 'amount carries more than one sign marker' });
  }

  const magnitude = parseMagnitude(text.replace(/[\s']/g, ''));
  if (magnitude === null) {
    return failed(RULE_ID, { code: 'unrecognized_amount', reason: 'no recognized amount format' });
  }

  const signals: NormalizationSignal[] = [];
  if (magnitude.ambiguous) signals.push('ambiguous_separator');
  if (currency === null) signals.push('currency_assumed');

  const value: AmountValue = {
    kind: 'amount',
    sign: negative && magnitude.minorUnits > 0 ? -1 : 1,
    minorUnits: magnitude.minorUnits,
    currency: (currency ?? ctx.defaultCurrency).toUpperCase(),
  };
  return valid(RULE_ID, value, signals);
}

export const amountHandler: FieldKindHandler = {
  kind: 'amount',

  normalize: normalizeAmount,

  score(outcome) {
    return penaltiesFor(outcome.signals, PENALTIES);
  },

  // Separator conventions decide the magnitude, so no rewrite is value-preserving by construction.
  proposeFix() {
    return null;
  },

  semanticKey(value) {
    return formatAmount(asAmount(value));
  },
};
