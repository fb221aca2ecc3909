export {
  MembershipClassSchema,
  RecordSourceSchema,
  YearKeySchema,
  MonthKeySchema,
  ContributionRecordSchema,
  ContributionsByYearSchema,
  MemberSchema,
  LedgerDocumentSchema,
  type MembershipClass,
  type RecordSource,
  type ContributionRecord,
  type ContributionsByYear,
  type Member,
  type LedgerDocument,
} from './ledger.js';

export {
  MappingEntrySchema,
  MappingDocumentSchema,
  type MappingEntry,
  type MappingDocument,
} from './mapping.js';

export {
  CandidateTransactionSchema,
  CandidateBatchSchema,
  type CandidateTransaction,
  type CandidateBatch,
} from './candidate.js';

export { formatZodError } from './format.js';
