/**
 * Outstanding contributions per member, read-only over the ledger.
 * Consumed by reminder and export tooling outside this package.
 */

import {
  MONTHLY_FEES,
  monthKey,
  roundToTwoDecimals,
  type MembershipClass,
} from '@duesledger/types';
import type { Ledger } from '@duesledger/store';

export interface MemberOutstanding {
  memberId: string;
  name: string;
  membershipClass: MembershipClass;
  monthlyFee: number;
  /** Month keys ("01".."12") without a record */
  outstandingMonths: string[];
  totalOwed: number;
}

export interface OutstandingSummary {
  year: number;
  /** Last month included (1..12) */
  throughMonth: number;
  members: MemberOutstanding[];
  totalMembers: number;
  membersWithOutstanding: number;
  totalOutstanding: number;
}

export function summarizeOutstanding(ledger: Ledger, asOf: Date = new Date()): OutstandingSummary {
  const year = asOf.getFullYear();
  const throughMonth = asOf.getMonth() + 1;
  const members: MemberOutstanding[] = [];

  for (const { id, member } of ledger.listMembers()) {
    const monthlyFee = MONTHLY_FEES[member.membershipClass];
    if (member.membershipClass === 'inactive') continue;

    const paid = new Set(ledger.paidMonths(id, year));
    const outstandingMonths: string[] = [];
    for (let month = 1; month <= throughMonth; month++) {
      const key = monthKey(month);
      if (!paid.has(key)) outstandingMonths.push(key);
    }

    members.push({
      memberId: id,
      name: member.name,
      membershipClass: member.membershipClass,
      monthlyFee,
      outstandingMonths,
      totalOwed: roundToTwoDecimals(outstandingMonths.length * monthlyFee),
    });
  }

  const withOutstanding = members.filter((m) => m.outstandingMonths.length > 0);
  return {
    year,
    throughMonth,
    members,
    totalMembers: members.length,
    membersWithOutstanding: withOutstanding.length,
    totalOutstanding: roundToTwoDecimals(withOutstanding.reduce((sum, m) => sum + m.totalOwed, 0)),
  };
}
