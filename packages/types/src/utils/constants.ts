import type { MembershipClass } from '../schemas/ledger.js';

export const CURRENCY = 'CHF';

export const MONTHLY_FEES: Readonly<Record<MembershipClass, number>> = {
  active: 50.0,
  passive: 25.0,
  inactive: 0.0,
};

export const PURPOSES = {
  MEMBERSHIP_FEE: 'membership-fee',
  INTRODUCTION_COURSE: 'introduction-course',
} as const;

export const DEFAULT_PURPOSE = PURPOSES.MEMBERSHIP_FEE;

/** Credits on or before this day of the month are usually late payments for the previous period. */
export const LATE_PAYMENT_CUTOFF_DAY = 7;
