/**
 * Batch validation ahead of a ledger merge.
 *
 * Checks run in a fixed order and only the first failing category is
 * reported; the operator fixes it and validates again.
 */

import {
  resolveMonth,
  splitISODate,
  type CandidateTransaction,
  type ContributionRecord,
} from '@duesledger/types';
import type { Ledger } from '@duesledger/store';

export type RequiredField = 'purpose' | 'member' | 'month';

export interface MissingFieldRow {
  /** Zero-based position in the batch */
  index: number;
  missing: RequiredField[];
}

export interface DuplicateGroup {
  member: string;
  month: number;
  purpose: string;
  rows: number[];
}

export interface LedgerConflict {
  index: number;
  member: string;
  memberId: string;
  year: number;
  month: number;
  existing: ContributionRecord;
}

export type ValidationFailure =
  | { kind: 'MissingField'; rows: MissingFieldRow[] }
  | { kind: 'DuplicateInBatch'; groups: DuplicateGroup[] }
  | { kind: 'AlreadyRecorded'; conflicts: LedgerConflict[] };

export type ValidationResult = { passed: true } | { passed: false; failure: ValidationFailure };

/**
 * A transaction whose purpose, member and month are all filled in.
 */
export interface ResolvedTransaction {
  index: number;
  transaction: CandidateTransaction;
  member: string;
  purpose: string;
  year: number;
  month: number;
}

function trimmedOrNull(value: string | null): string | null {
  if (value === null) return null;
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

export function findMissingFields(transaction: CandidateTransaction): RequiredField[] {
  const missing: RequiredField[] = [];
  if (trimmedOrNull(transaction.purpose) === null) missing.push('purpose');
  if (trimmedOrNull(transaction.member) === null) missing.push('member');
  if (resolveMonth(transaction.month) === null) missing.push('month');
  return missing;
}

/**
 * Resolve the assignment fields of a transaction, or null if any is missing.
 * The year always comes from the transaction date.
 */
export function resolveTransaction(transaction: CandidateTransaction, index: number): ResolvedTransaction | null {
  const member = trimmedOrNull(transaction.member);
  const purpose = trimmedOrNull(transaction.purpose);
  const month = resolveMonth(transaction.month);
  if (member === null || purpose === null || month === null) {
    return null;
  }
  return { index, transaction, member, purpose, year: splitISODate(transaction.date).year, month };
}

function checkCompleteness(batch: readonly CandidateTransaction[]): MissingFieldRow[] {
  const rows: MissingFieldRow[] = [];
  batch.forEach((transaction, index) => {
    const missing = findMissingFields(transaction);
    if (missing.length > 0) {
      rows.push({ index, missing });
    }
  });
  return rows;
}

function checkDuplicates(resolved: readonly ResolvedTransaction[]): DuplicateGroup[] {
  const groups = new Map<string, DuplicateGroup>();
  for (const tx of resolved) {
    const key = JSON.stringify([tx.member, tx.month, tx.purpose]);
    const group = groups.get(key);
    if (group === undefined) {
      groups.set(key, { member: tx.member, month: tx.month, purpose: tx.purpose, rows: [tx.index] });
    } else {
      group.rows.push(tx.index);
    }
  }
  return Array.from(groups.values()).filter((group) => group.rows.length > 1);
}

function checkLedgerConflicts(resolved: readonly ResolvedTransaction[], ledger: Ledger): LedgerConflict[] {
  const conflicts: LedgerConflict[] = [];
  for (const tx of resolved) {
    // Unknown members cannot conflict; commit reports them as warnings.
    const ref = ledger.findMemberByName(tx.member);
    if (ref === undefined) continue;

    const existing = ledger.getRecord(ref.id, tx.year, tx.month);
    if (existing !== undefined) {
      conflicts.push({
        index: tx.index,
        member: tx.member,
        memberId: ref.id,
        year: tx.year,
        month: tx.month,
        existing,
      });
    }
  }
  return conflicts;
}

export function validateBatch(batch: readonly CandidateTransaction[], ledger: Ledger): ValidationResult {
  const missing = checkCompleteness(batch);
  if (missing.length > 0) {
    return { passed: false, failure: { kind: 'MissingField', rows: missing } };
  }

  const resolved: ResolvedTransaction[] = [];
  batch.forEach((transaction, index) => {
    const tx = resolveTransaction(transaction, index);
    if (tx !== null) resolved.push(tx);
  });

  const groups = checkDuplicates(resolved);
  if (groups.length > 0) {
    return { passed: false, failure: { kind: 'DuplicateInBatch', groups } };
  }

  const conflicts = checkLedgerConflicts(resolved, ledger);
  if (conflicts.length > 0) {
    return { passed: false, failure: { kind: 'AlreadyRecorded', conflicts } };
  }

  return { passed: true };
}
