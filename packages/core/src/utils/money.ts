/**
 * Fixed-point amount parsing and formatting.
 * Amounts go from text straight to integer pence; no floating point arithmetic is involved.
 */

import type { Money } from '../types/index.js';

export type AmountParseResult =
  | { ok: true; amount: Money }
  | { ok: false; reason: string };

// Bank exports sometimes use the typographic minus sign
const TRUE_MINUS = /−/g;
const NON_NUMERIC = /[^\d.-]/g;
const DECIMAL_PATTERN = /^(-)?(\d*)(?:\.(\d*))?$/;

/**
 * Parse a currency-formatted amount such as "£1,234.50" into pence.
 * Only strictly positive amounts with at most two decimal places are accepted.
 */
export function parseAmount(input: string): AmountParseResult {
  const cleaned = input.replace(TRUE_MINUS, '-').replace(NON_NUMERIC, '');
  if (!/\d/.test(cleaned)) {
    return { ok: false, reason: 'No amount given' };
  }

  const match = DECIMAL_PATTERN.exec(cleaned);
  if (!match) {
    return { ok: false, reason: 'Amount is not a number' };
  }

  const negative = match[1] === '-';
  const whole = match[2] ?? '';
  const fraction = match[3] ?? '';

  if (fraction.length > 2) {
    return { ok: false, reason: 'Amount has more than two decimal places' };
  }

  const pence = Number(whole || '0') * 100 + Number(fraction.padEnd(2, '0'));
  if (!Number.isSafeInteger(pence)) {
    return { ok: false, reason: 'Amount is too large' };
  }
  if (negative || pence === 0) {
    return { ok: false, reason: 'Amount must be greater than zero' };
  }

  return { ok: true, amount: { pence } };
}

/**
 * "1234.5" style output with exactly two decimal places and no separators
 */
export function formatMoney(money: Money): string {
  const sign = money.pence < 0 ? '-' : '';
  const abs = Math.abs(money.pence);
  const pounds = Math.floor(abs / 100);
  const pence = String(abs % 100).padStart(2, '0');
  return `${sign}${pounds}.${pence}`;
}

export function sumMoney(amounts: Iterable<Money>): Money {
  let pence = 0;
  for (const amount of amounts) {
    pence += amount.pence;
  }
  return { pence };
}

/**
 * Pounds as a number, for spreadsheet cells only.
 */
export function toPounds(money: Money): number {
  return money.pence / 100;
}
