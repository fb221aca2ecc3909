/**
 * Ledger merge for a validated batch.
 *
 * The merge is tolerant per row: a row that cannot be applied is skipped with
 * a warning and the rest of the batch goes through. Records already written
 * are never rolled back. Both stores are saved once, after the whole batch:
 * mappings first, and the ledger only once they are on disk, so a re-run
 * after any save failure still learns the batch's mappings.
 */

import {
  DEFAULT_PURPOSE,
  PURPOSES,
  PersistError,
  monthKey,
  monthLabel,
  resolveMonth,
  splitISODate,
  type CandidateTransaction,
  type ContributionRecord,
  type DocumentStore,
  type LedgerDocument,
  type MappingDocument,
  type MappingEntry,
} from '@duesledger/types';
import type { Ledger, MappingStore } from '@duesledger/store';
import { validateBatch, type ValidationFailure } from './validation.js';

export type CommitWarningKind = 'MemberResolution' | 'SlotOccupied';

export interface CommitWarning {
  kind: CommitWarningKind;
  /** Zero-based position in the batch */
  index: number;
  member: string | null;
  message: string;
}

export interface WrittenRecord {
  index: number;
  memberId: string;
  member: string;
  year: number;
  month: number;
  record: ContributionRecord;
}

export interface ApplyOptions {
  /** Clock used for synthesized transaction ids (default: current time) */
  now?: () => Date;
  onWarning?: (warning: CommitWarning) => void;
}

export interface ApplyResult {
  written: WrittenRecord[];
  warnings: CommitWarning[];
  learnedMappings: MappingEntry[];
  /** Member ids whose introduction course was marked as completed */
  introductionCourses: string[];
}

export interface CommitContext {
  ledger: Ledger;
  mappings: MappingStore;
  ledgerStore: DocumentStore<LedgerDocument>;
  mappingStore: DocumentStore<MappingDocument>;
}

export interface CommitResult extends ApplyResult {
  /** Empty when both stores were saved */
  persistErrors: PersistError[];
}

export type ReconcileOutcome =
  | { status: 'rejected'; failure: ValidationFailure }
  | { status: 'committed'; result: CommitResult };

/**
 * Bank reference when there is one, otherwise an id built from member,
 * period and the commit time.
 */
export function effectiveTransactionId(
  transaction: CandidateTransaction,
  memberId: string,
  year: number,
  month: number,
  now: Date
): string {
  const reference = transaction.bankReference?.trim() ?? '';
  if (reference !== '') {
    return reference;
  }
  return `stmt_${memberId}_${year}${monthKey(month)}_${Math.floor(now.getTime() / 1000)}`;
}

function groupByMember(batch: readonly CandidateTransaction[]): Map<string, number[]> {
  const groups = new Map<string, number[]>();
  batch.forEach((transaction, index) => {
    const key = transaction.member?.trim() ?? '';
    const rows = groups.get(key);
    if (rows === undefined) {
      groups.set(key, [index]);
    } else {
      rows.push(index);
    }
  });
  return groups;
}

/**
 * Apply a batch to the in-memory ledger and mapping store. Does not validate;
 * run validateBatch first.
 */
export function applyBatch(
  batch: readonly CandidateTransaction[],
  ledger: Ledger,
  mappings: MappingStore,
  options: ApplyOptions = {}
): ApplyResult {
  const now = options.now ?? (() => new Date());
  const result: ApplyResult = { written: [], warnings: [], learnedMappings: [], introductionCourses: [] };
  const touchedSlots = new Set<string>();

  const warn = (warning: CommitWarning): void => {
    result.warnings.push(warning);
    options.onWarning?.(warning);
  };

  for (const [memberName, rows] of groupByMember(batch)) {
    const ref = memberName === '' ? undefined : ledger.findMemberByName(memberName);

    for (const index of rows) {
      const transaction = batch[index];
      if (transaction === undefined) continue;

      if (ref === undefined) {
        warn({
          kind: 'MemberResolution',
          index,
          member: memberName === '' ? null : memberName,
          message:
            memberName === ''
              ? `Row ${index + 1}: no member assigned, skipped`
              : `Row ${index + 1}: member "${memberName}" not found in ledger, skipped`,
        });
        continue;
      }

      const { year, month: dateMonth } = splitISODate(transaction.date);
      const month = resolveMonth(transaction.month) ?? dateMonth;
      const slot = `${ref.id}/${year}/${monthKey(month)}`;
      if (touchedSlots.has(slot)) {
        warn({
          kind: 'SlotOccupied',
          index,
          member: memberName,
          message: `Row ${index + 1}: ${memberName} ${monthLabel(month)} ${year} was already written by this batch, skipped`,
        });
        continue;
      }
      touchedSlots.add(slot);

      const purpose = transaction.purpose?.trim() || DEFAULT_PURPOSE;
      const details = transaction.details.trim();
      const reference = transaction.bankReference?.trim() ?? '';
      const record: ContributionRecord = {
        amount: transaction.amount,
        paymentDate: transaction.date,
        transactionId: effectiveTransactionId(transaction, ref.id, year, month, now()),
        source: 'statement-import',
        purpose,
        monthLabel: monthLabel(month),
      };
      if (details !== '') record.details = details;
      if (reference !== '') record.bankReference = reference;

      ledger.putRecord(ref.id, year, month, record);
      result.written.push({ index, memberId: ref.id, member: memberName, year, month, record });

      if (purpose === PURPOSES.INTRODUCTION_COURSE) {
        ledger.markIntroductionCourseCompleted(ref.id);
        if (!result.introductionCourses.includes(ref.id)) {
          result.introductionCourses.push(ref.id);
        }
      }

      if (mappings.add(details, ref.member.name)) {
        result.learnedMappings.push({ details, member: ref.member.name });
      }
    }
  }

  return result;
}

function asPersistError(err: unknown, location: string): PersistError {
  return err instanceof PersistError ? err : new PersistError('save', location, err);
}

/**
 * Apply the batch, then save the whole mapping document and the whole ledger.
 * A failed save is reported in persistErrors; the in-memory state is kept and
 * the commit can be re-run.
 */
export async function commitBatch(
  batch: readonly CandidateTransaction[],
  context: CommitContext,
  options: ApplyOptions = {}
): Promise<CommitResult> {
  const applied = applyBatch(batch, context.ledger, context.mappings, options);
  const persistErrors: PersistError[] = [];

  try {
    await context.mappingStore.save(context.mappings.toDocument());
  } catch (err) {
    // Ledger stays unsaved so that a re-run applies the whole batch again.
    persistErrors.push(asPersistError(err, context.mappingStore.location));
    return { ...applied, persistErrors };
  }

  try {
    await context.ledgerStore.save(context.ledger.toDocument());
  } catch (err) {
    persistErrors.push(asPersistError(err, context.ledgerStore.location));
  }

  return { ...applied, persistErrors };
}

/**
 * Validate, and commit only if validation passed.
 */
export async function reconcileBatch(
  batch: readonly CandidateTransaction[],
  context: CommitContext,
  options: ApplyOptions = {}
): Promise<ReconcileOutcome> {
  const validation = validateBatch(batch, context.ledger);
  if (!validation.passed) {
    return { status: 'rejected', failure: validation.failure };
  }
  return { status: 'committed', result: await commitBatch(batch, context, options) };
}
