/**
 * Fixed-point money helpers
 *
 * Amounts are integer minor units. Nothing here goes through
 * floating-point multiplication of decimal values.
 */

import type { Cents } from '@/types/index.js';

const DECIMAL_PATTERN = /^(-)?(\d+)(?:\.(\d{1,2}))?$/;

/**
 * Parse "123.45" / "123.4" / "123" into cents
 * Returns null for anything that is not a plain decimal with at most two places
 */
export function parseMoney(value: string): Cents | null {
  const match = DECIMAL_PATTERN.exec(value.trim());
  if (match === null) {
    return null;
  }
  const [, sign, whole, fraction = ''] = match;
  const cents =
    Number(whole) * 100 + Number(fraction.padEnd(2, '0'));
  if (!Number.isSafeInteger(cents)) {
    return null;
  }
  return sign === '-' ? -cents : cents;
}

/**
 * Format cents as a decimal string with two places
 */
export function formatMoney(amount: Cents): string {
  const sign = amount < 0 ? '-' : '';
  const abs = Math.abs(amount);
  const whole = Math.floor(abs / 100);
  const fraction = String(abs % 100).padStart(2, '0');
  return `${sign}${whole}.${fraction}`;
}

export function isValidAmount(amount: number): amount is Cents {
  return Number.isSafeInteger(amount);
}

export function multiplyMoney(unitPrice: Cents, quantity: number): Cents {
  return unitPrice * quantity;
}

export function sumMoney(amounts: readonly Cents[]): Cents {
  return amounts.reduce((total, amount) => total + amount, 0);
}
