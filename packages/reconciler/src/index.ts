/**
 * Reconciliation of bank statement credits against the contribution ledger.
 */

export { assignDefaults, defaultMonth } from './assigner.js';

export {
  validateBatch,
  findMissingFields,
  resolveTransaction,
  type RequiredField,
  type MissingFieldRow,
  type DuplicateGroup,
  type LedgerConflict,
  type ValidationFailure,
  type ValidationResult,
  type ResolvedTransaction,
} from './validation.js';

export {
  applyBatch,
  commitBatch,
  reconcileBatch,
  effectiveTransactionId,
  type ApplyOptions,
  type ApplyResult,
  type CommitContext,
  type CommitResult,
  type CommitWarning,
  type CommitWarningKind,
  type ReconcileOutcome,
  type WrittenRecord,
} from './commit.js';

export {
  summarizeOutstanding,
  type MemberOutstanding,
  type OutstandingSummary,
} from './outstanding.js';

export {
  summarizeBatch,
  formatBatchSummary,
  formatValidationFailure,
  formatCommitReport,
  formatOutstandingReport,
  type BatchSummary,
  type BatchBreakdownRow,
} from './report.js';
