/**
 * Plain-text operator reports for imports, validation and commits.
 */

import {
  PURPOSES,
  formatAmount,
  monthLabel,
  resolveMonth,
  sumAmounts,
  type CandidateTransaction,
} from '@duesledger/types';
import type { CommitResult } from './commit.js';
import type { OutstandingSummary } from './outstanding.js';
import type { ValidationFailure } from './validation.js';

export interface BatchBreakdownRow {
  member: string | null;
  month: string | null;
  purpose: string | null;
  amount: number;
  count: number;
}

export interface BatchSummary {
  transactionCount: number;
  totalAmount: number;
  memberCount: number;
  membershipFeeCount: number;
  breakdown: BatchBreakdownRow[];
}

const UNASSIGNED = '(unassigned)';

function blankToNull(value: string | null): string | null {
  if (value === null) return null;
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

export function summarizeBatch(batch: readonly CandidateTransaction[]): BatchSummary {
  const members = new Set<string>();
  const breakdown = new Map<string, BatchBreakdownRow>();
  let membershipFeeCount = 0;

  for (const tx of batch) {
    const member = blankToNull(tx.member);
    const month = blankToNull(tx.month);
    const purpose = blankToNull(tx.purpose);

    if (member !== null) members.add(member);
    if (purpose === PURPOSES.MEMBERSHIP_FEE) membershipFeeCount++;

    const key = JSON.stringify([member, month, purpose]);
    const row = breakdown.get(key);
    if (row === undefined) {
      breakdown.set(key, { member, month, purpose, amount: tx.amount, count: 1 });
    } else {
      row.amount = sumAmounts([row.amount, tx.amount]);
      row.count++;
    }
  }

  return {
    transactionCount: batch.length,
    totalAmount: sumAmounts(batch.map((tx) => tx.amount)),
    memberCount: members.size,
    membershipFeeCount,
    breakdown: Array.from(breakdown.values()),
  };
}

export function formatBatchSummary(summary: BatchSummary): string {
  const lines: string[] = [];

  lines.push('=== Import Summary ===');
  lines.push(`  Transactions:      ${summary.transactionCount}`);
  lines.push(`  Total amount:      ${formatAmount(summary.totalAmount)}`);
  lines.push(`  Members:           ${summary.memberCount}`);
  lines.push(`  Membership fees:   ${summary.membershipFeeCount}`);

  if (summary.breakdown.length > 0) {
    lines.push('');
    lines.push('Breakdown:');
    for (const row of summary.breakdown) {
      lines.push(
        `  ${row.member ?? UNASSIGNED} / ${row.month ?? UNASSIGNED} / ${row.purpose ?? UNASSIGNED}: ` +
          `${formatAmount(row.amount)} (${row.count})`
      );
    }
  }

  return lines.join('\n');
}

function displayMonth(value: string | null): string {
  const month = resolveMonth(value);
  return month === null ? (value ?? UNASSIGNED) : monthLabel(month);
}

export function formatValidationFailure(failure: ValidationFailure): string {
  const lines: string[] = [];

  switch (failure.kind) {
    case 'MissingField':
      lines.push(`Missing fields in ${failure.rows.length} transaction(s):`);
      for (const row of failure.rows) {
        lines.push(`  Row ${row.index + 1}: ${row.missing.join(', ')}`);
      }
      break;
    case 'DuplicateInBatch':
      lines.push('Several transactions for the same member, month and purpose:');
      for (const group of failure.groups) {
        const rows = group.rows.map((index) => index + 1).join(', ');
        lines.push(`  ${group.member} / ${monthLabel(group.month)} / ${group.purpose}: rows ${rows}`);
      }
      break;
    case 'AlreadyRecorded':
      lines.push('Already recorded in the ledger:');
      for (const conflict of failure.conflicts) {
        lines.push(
          `  Row ${conflict.index + 1}: ${conflict.member} - ${monthLabel(conflict.month)} ${conflict.year} ` +
            `(existing: ${formatAmount(conflict.existing.amount)}, ${conflict.existing.source})`
        );
      }
      break;
  }

  return lines.join('\n');
}

export function formatCommitReport(result: CommitResult): string {
  const lines: string[] = [];

  lines.push('=== Commit Report ===');
  lines.push(`  Records written:   ${result.written.length}`);
  lines.push(`  Rows skipped:      ${result.warnings.length}`);
  lines.push(`  Mappings learned:  ${result.learnedMappings.length}`);

  if (result.written.length > 0) {
    lines.push('');
    lines.push('Written:');
    for (const written of result.written) {
      lines.push(
        `  ${written.member} - ${monthLabel(written.month)} ${written.year}: ` +
          `${formatAmount(written.record.amount)} (${written.record.purpose ?? 'unknown purpose'})`
      );
    }
  }

  if (result.warnings.length > 0) {
    lines.push('');
    lines.push('Warnings:');
    for (const warning of result.warnings) {
      lines.push(`  ${warning.message}`);
    }
  }

  if (result.persistErrors.length > 0) {
    lines.push('');
    lines.push('Persist errors (re-run the commit):');
    for (const error of result.persistErrors) {
      lines.push(`  ${error.message}`);
    }
  }

  return lines.join('\n');
}

export function formatOutstandingReport(summary: OutstandingSummary): string {
  const lines: string[] = [];

  lines.push(`=== Outstanding Contributions ${summary.year} (through ${monthLabel(summary.throughMonth)}) ===`);
  for (const member of summary.members) {
    if (member.outstandingMonths.length === 0) continue;
    const months = member.outstandingMonths.map((key) => displayMonth(key)).join(', ');
    lines.push(`  ${member.name} (${member.membershipClass}): ${months} - ${formatAmount(member.totalOwed)}`);
  }
  lines.push('');
  lines.push(`  Members:           ${summary.totalMembers}`);
  lines.push(`  With outstanding:  ${summary.membersWithOutstanding}`);
  lines.push(`  Total outstanding: ${formatAmount(summary.totalOutstanding)}`);

  return lines.join('\n');
}
