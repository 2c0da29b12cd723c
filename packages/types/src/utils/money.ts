import { DEFAULT_CURRENCY } from './constants.js';

/**
 * A decimal amount with exactly two fraction digits, e.g. `"7500.00"`.
 * Arithmetic goes through integer minor units so no binary floating point
 * is ever involved.
 */
export type DecimalString = string;

const DECIMAL_PATTERN = /^(-?)(\d+)(?:\.(\d{1,2}))?$/;

export function toMinorUnits(amountStr: string): bigint {
  const match = DECIMAL_PATTERN.exec(amountStr.trim());
  if (match === null) {
    throw new Error(`Unable to parse amount: ${amountStr}`);
  }

  const [, sign, whole, fraction] = match;
  if (whole === undefined) {
    throw new Error(`Unable to parse amount: ${amountStr}`);
  }

  const cents = BigInt(whole) * 100n + BigInt((fraction ?? '').padEnd(2, '0'));
  return sign === '-' ? -cents : cents;
}

export function fromMinorUnits(units: bigint): DecimalString {
  const negative = units < 0n;
  const abs = negative ? -units : units;
  const whole = abs / 100n;
  const fraction = (abs % 100n).toString().padStart(2, '0');
  return `${negative ? '-' : ''}${whole.toString()}.${fraction}`;
}

/**
 * Turn a Swiss-formatted amount (`7'500.00`, `45,80`, `12`) into a
 * two-decimal string. Apostrophe grouping is dropped and a comma decimal
 * separator becomes a period.
 */
export function normalizeAmount(amountStr: string): DecimalString {
  const cleaned = amountStr.replace(/['\s]/g, '').replace(',', '.');
  return fromMinorUnits(toMinorUnits(cleaned));
}

export function sumAmounts(amounts: readonly DecimalString[]): DecimalString {
  return fromMinorUnits(amounts.reduce((sum, amt) => sum + toMinorUnits(amt), 0n));
}

export function subtractAmounts(a: DecimalString, b: DecimalString): DecimalString {
  return fromMinorUnits(toMinorUnits(a) - toMinorUnits(b));
}

/** `CHF 7'500.00`, with the Swiss apostrophe as grouping separator. */
export function formatCurrency(amount: DecimalString, currency: string = DEFAULT_CURRENCY): string {
  const normalized = fromMinorUnits(toMinorUnits(amount));
  const negative = normalized.startsWith('-');
  const [whole = '0', fraction = '00'] = normalized.replace(/^-/, '').split('.');
  const grouped = whole.replace(/\B(?=(\d{3})+(?!\d))/g, "'");
  const formatted = `${currency} ${grouped}.${fraction}`;
  return negative ? `-${formatted}` : formatted;
}
