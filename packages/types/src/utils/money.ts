import { CURRENCY } from './constants.js';

const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

/**
 * Parse a statement amount such as "50.00" or "1'250.00".
 * Returns null when the value is not a plain decimal.
 */
export function parseDecimalAmount(value: string): number | null {
  const cleaned = value.replace(/['\s]/g, '');
  if (!DECIMAL.test(cleaned)) {
    return null;
  }
  const num = parseFloat(cleaned);
  return Number.isFinite(num) ? num : null;
}

export function roundToTwoDecimals(num: number): number {
  return Math.round(num * 100) / 100;
}

export function sumAmounts(amounts: number[]): number {
  return roundToTwoDecimals(amounts.reduce((sum, amt) => sum + amt, 0));
}

export function formatAmount(amount: number, currency: string = CURRENCY): string {
  return `${amount.toFixed(2)} ${currency}`;
}
