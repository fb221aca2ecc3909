/**
 * Default member and month assignment for freshly parsed transactions.
 * Fields the operator already filled in are left alone; anything ambiguous
 * stays blank for the review step.
 */

import {
  LATE_PAYMENT_CUTOFF_DAY,
  monthLabel,
  splitISODate,
  type CandidateTransaction,
} from '@duesledger/types';
import type { MappingStore } from '@duesledger/store';

function isBlank(value: string | null): boolean {
  return value === null || value.trim() === '';
}

/**
 * Month default: blank for credits dated on or before the cutoff day (likely
 * a late payment for the previous period), otherwise the credit's own month.
 */
export function defaultMonth(date: string): string | null {
  const { month, day } = splitISODate(date);
  return day <= LATE_PAYMENT_CUTOFF_DAY ? null : monthLabel(month);
}

export function assignDefaults(
  candidates: readonly CandidateTransaction[],
  mappings: MappingStore
): CandidateTransaction[] {
  return candidates.map((candidate) => {
    const assigned: CandidateTransaction = { ...candidate };

    if (isBlank(assigned.month)) {
      assigned.month = defaultMonth(assigned.date);
    }

    if (isBlank(assigned.member)) {
      assigned.member = mappings.match(assigned.details)?.member ?? null;
    }

    return assigned;
  });
}
