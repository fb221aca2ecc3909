export const MONTH_LABELS = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
] as const;

export type MonthLabel = (typeof MONTH_LABELS)[number];

export function monthLabel(month: number): MonthLabel {
  const label = MONTH_LABELS[month - 1];
  if (label === undefined) {
    throw new Error(`Month out of range: ${month}`);
  }
  return label;
}

/** Two-digit ledger key for a month number, e.g. 3 → "03". */
export function monthKey(month: number): string {
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new Error(`Month out of range: ${month}`);
  }
  return month.toString().padStart(2, '0');
}

/**
 * Resolve an operator-entered month: a label ("March", "march") or a
 * number ("3", "03"). Returns null when it names no month.
 */
export function resolveMonth(value: string | null | undefined): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  if (/^\d{1,2}$/.test(trimmed)) {
    const num = parseInt(trimmed, 10);
    return num >= 1 && num <= 12 ? num : null;
  }
  const index = MONTH_LABELS.findIndex((label) => label.toLowerCase() === trimmed.toLowerCase());
  return index === -1 ? null : index + 1;
}
