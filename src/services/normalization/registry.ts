import type { FieldKind, TypedValue } from '../../domain/types.js';
import type { FieldKindHandler } from './types.js';
import { amountHandler } from './kinds/amount.js';
import { dateHandler } from './kinds/date.js';
import { emailHandler } from './kinds/email.js';
import { fiscalCodeHandler } from './kinds/fiscal-code.js';
import { freeTextHandler } from './kinds/free-text.js';
import { ibanHandler } from './kinds/iban.js';
import { phoneHandler } from './kinds/phone.js';

const HANDLERS: Record<FieldKind, FieldKindHandler> = {
  phone: phoneHandler,
  date: dateHandler,
  amount: amountHandler,
  fiscal_code: fiscalCodeHandler,
  iban: ibanHandler,
  email: emailHandler,
  free_text: freeTextHandler,
};

export function getHandler(kind: FieldKind): FieldKindHandler {
  return HANDLERS[kind];
}

export function semanticKeyOf(value: TypedValue): string {
  return HANDLERS[value.kind].semanticKey(value);
}
