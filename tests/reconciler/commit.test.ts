import { describe, it, expect, vi } from 'vitest';
import { InMemoryDocumentStore, Ledger, MappingStore } from '@duesledger/store';
import {
  applyBatch,
  assignDefaults,
  commitBatch,
  effectiveTransactionId,
  reconcileBatch,
  type CommitContext,
  type CommitWarning,
} from '@duesledger/reconciler';
import {
  PersistError,
  type CandidateTransaction,
  type DocumentStore,
  type LedgerDocument,
  type LoadResult,
  type MappingDocument,
} from '@duesledger/types';

const createTransaction = (overrides: Partial<CandidateTransaction> = {}): CandidateTransaction => ({
  date: '2025-03-10',
  details: 'ACME Corp Payment, Jane Doe',
  amount: 50,
  purpose: 'membership-fee',
  member: 'Jane Doe',
  month: 'March',
  bankReference: 'ZKB-001',
  ...overrides,
});

const createLedgerDocument = (): LedgerDocument => ({
  members: {
    M001: { name: 'Jane Doe', membershipClass: 'active', introductionCourseCompleted: false, contributions: {} },
    M002: { name: 'John Roe', membershipClass: 'passive', introductionCourseCompleted: false, contributions: {} },
  },
});

interface TestContext extends CommitContext {
  ledgerStore: InMemoryDocumentStore<LedgerDocument>;
  mappingStore: InMemoryDocumentStore<MappingDocument>;
}

const createContext = (mappingDoc: MappingDocument = []): TestContext => ({
  ledger: Ledger.fromDocument(createLedgerDocument()),
  mappings: MappingStore.fromDocument(mappingDoc),
  ledgerStore: new InMemoryDocumentStore<LedgerDocument>(() => ({ members: {} }), undefined, 'memory:ledger'),
  mappingStore: new InMemoryDocumentStore<MappingDocument>(() => [], undefined, 'memory:mappings'),
});

class FailingStore<T> implements DocumentStore<T> {
  readonly location: string;
  private createEmpty: () => T;

  constructor(location: string, createEmpty: () => T) {
    this.location = location;
    this.createEmpty = createEmpty;
  }

  load(): Promise<LoadResult<T>> {
    return Promise.resolve({ ok: true, value: this.createEmpty(), created: true });
  }

  save(): Promise<void> {
    return Promise.reject(new Error('disk full'));
  }
}

const failingLedgerStore = () => new FailingStore<LedgerDocument>('broken-ledger', () => ({ members: {} }));
const failingMappingStore = () => new FailingStore<MappingDocument>('broken-mappings', () => []);

const fixedClock = () => new Date('2025-03-20T12:00:00Z');

describe('effectiveTransactionId', () => {
  it('should prefer the bank reference', () => {
    expect(effectiveTransactionId(createTransaction(), 'M001', 2025, 3, fixedClock())).toBe('ZKB-001');
  });

  it('should synthesize an id from member, period and time', () => {
    const tx = createTransaction({ bankReference: undefined });
    expect(effectiveTransactionId(tx, 'M001', 2025, 3, fixedClock())).toBe('stmt_M001_202503_1742472000');
  });
});

describe('applyBatch', () => {
  it('should write the full contribution record', () => {
    const context = createContext();
    const tx = createTransaction({ details: '  ACME Corp Payment, Jane Doe ' });

    const result = applyBatch([tx], context.ledger, context.mappings);

    expect(context.ledger.getRecord('M001', 2025, 3)).toEqual({
      amount: 50,
      paymentDate: '2025-03-10',
      transactionId: 'ZKB-001',
      source: 'statement-import',
      purpose: 'membership-fee',
      monthLabel: 'March',
      details: 'ACME Corp Payment, Jane Doe',
      bankReference: 'ZKB-001',
    });
    expect(result.written).toHaveLength(1);
    expect(result.written[0]).toMatchObject({ index: 0, memberId: 'M001', member: 'Jane Doe', year: 2025, month: 3 });
    expect(result.warnings).toEqual([]);
  });

  it('should synthesize a transaction id when there is no bank reference', () => {
    const context = createContext();

    applyBatch([createTransaction({ bankReference: undefined })], context.ledger, context.mappings, { now: fixedClock });

    const record = context.ledger.getRecord('M001', 2025, 3);
    expect(record?.transactionId).toBe('stmt_M001_202503_1742472000');
    expect(record).not.toHaveProperty('bankReference');
  });

  it('should skip unknown and missing members with a warning', () => {
    const context = createContext();
    const onWarning = vi.fn<(warning: CommitWarning) => void>();
    const batch = [
      createTransaction({ member: 'Nobody' }),
      createTransaction({ member: null }),
      createTransaction({ bankReference: 'ZKB-003' }),
    ];

    const result = applyBatch(batch, context.ledger, context.mappings, { onWarning });

    expect(result.warnings.map((w) => w.message)).toEqual([
      'Row 1: member "Nobody" not found in ledger, skipped',
      'Row 2: no member assigned, skipped',
    ]);
    expect(result.warnings.map((w) => w.kind)).toEqual(['MemberResolution', 'MemberResolution']);
    expect(onWarning).toHaveBeenCalledTimes(2);
    expect(result.written.map((w) => w.index)).toEqual([2]);
  });

  it('should skip a second row for a slot written earlier in the batch', () => {
    const context = createContext();
    const batch = [createTransaction(), createTransaction({ purpose: 'introduction-course', bankReference: 'ZKB-002' })];

    const result = applyBatch(batch, context.ledger, context.mappings);

    expect(result.warnings).toEqual([
      {
        kind: 'SlotOccupied',
        index: 1,
        member: 'Jane Doe',
        message: 'Row 2: Jane Doe March 2025 was already written by this batch, skipped',
      },
    ]);
    expect(context.ledger.getRecord('M001', 2025, 3)?.transactionId).toBe('ZKB-001');
    expect(result.introductionCourses).toEqual([]);
  });

  it('should mark the introduction course as completed', () => {
    const context = createContext();

    const result = applyBatch(
      [createTransaction({ purpose: 'introduction-course' })],
      context.ledger,
      context.mappings
    );

    expect(context.ledger.getMember('M001')?.introductionCourseCompleted).toBe(true);
    expect(result.introductionCourses).toEqual(['M001']);
  });

  it('should fall back to the date month and the default purpose', () => {
    const context = createContext();

    applyBatch([createTransaction({ month: null, purpose: ' ' })], context.ledger, context.mappings);

    expect(context.ledger.getRecord('M001', 2025, 3)?.purpose).toBe('membership-fee');
  });

  it('should learn mappings that let the next import assign the member', () => {
    const context = createContext();

    const result = applyBatch([createTransaction()], context.ledger, context.mappings);

    expect(result.learnedMappings).toEqual([{ details: 'ACME Corp Payment, Jane Doe', member: 'Jane Doe' }]);
    const [next] = assignDefaults(
      [createTransaction({ date: '2025-04-15', member: null, month: null })],
      context.mappings
    );
    expect(next?.member).toBe('Jane Doe');
    expect(next?.month).toBe('April');
  });

  it('should not overwrite an existing mapping', () => {
    const context = createContext([{ details: 'ACME Corp Payment, Jane Doe', member: 'John Roe' }]);

    const result = applyBatch([createTransaction()], context.ledger, context.mappings);

    expect(result.learnedMappings).toEqual([]);
    expect(context.mappings.list()).toEqual([{ details: 'ACME Corp Payment, Jane Doe', member: 'John Roe' }]);
  });
});

describe('commitBatch', () => {
  it('should save each store once', async () => {
    const context = createContext();
    const batch = [createTransaction(), createTransaction({ member: 'John Roe', amount: 25, details: 'J. Roe' })];

    const result = await commitBatch(batch, context);

    expect(result.persistErrors).toEqual([]);
    expect(context.ledgerStore.saves).toBe(1);
    expect(context.mappingStore.saves).toBe(1);
    expect(context.ledgerStore.peek()).toEqual(context.ledger.toDocument());
    expect(context.mappingStore.peek()).toEqual([
      { details: 'ACME Corp Payment, Jane Doe', member: 'Jane Doe' },
      { details: 'J. Roe', member: 'John Roe' },
    ]);
  });

  it('should save even when every row was skipped', async () => {
    const context = createContext();

    const result = await commitBatch([createTransaction({ member: 'Nobody' })], context);

    expect(result.written).toEqual([]);
    expect(context.ledgerStore.saves).toBe(1);
  });

  it('should collect save failures and keep the other store', async () => {
    const context = createContext();
    const failing: CommitContext = { ...context, ledgerStore: failingLedgerStore() };

    const result = await commitBatch([createTransaction()], failing);

    expect(result.persistErrors).toHaveLength(1);
    expect(result.persistErrors[0]).toBeInstanceOf(PersistError);
    expect(result.persistErrors[0]?.message).toBe('Failed to save broken-ledger: disk full');
    expect(context.mappingStore.saves).toBe(1);
    expect(result.written).toHaveLength(1);
  });

  it('should not save the ledger when the mappings cannot be saved', async () => {
    const context = createContext();

    const result = await commitBatch([createTransaction()], { ...context, mappingStore: failingMappingStore() });

    expect(result.persistErrors.map((error) => error.message)).toEqual(['Failed to save broken-mappings: disk full']);
    expect(context.ledgerStore.saves).toBe(0);
  });

  it('should learn the mappings when re-run from the stored state after a mapping save failure', async () => {
    const context = createContext();
    await commitBatch([createTransaction()], { ...context, mappingStore: failingMappingStore() });

    const reloaded = createContext();
    const outcome = await reconcileBatch([createTransaction()], reloaded);

    expect(outcome.status).toBe('committed');
    expect(reloaded.mappingStore.peek()).toEqual([{ details: 'ACME Corp Payment, Jane Doe', member: 'Jane Doe' }]);
    expect(reloaded.ledgerStore.saves).toBe(1);
  });

  it('should succeed when re-run after a failed save', async () => {
    const context = createContext();
    await commitBatch([createTransaction()], { ...context, ledgerStore: failingLedgerStore() });

    const retry = await commitBatch([createTransaction()], context);

    expect(retry.persistErrors).toEqual([]);
    expect(retry.written).toHaveLength(1);
    expect(context.ledgerStore.peek()?.members['M001']?.contributions['2025']?.['03']?.transactionId).toBe('ZKB-001');
  });
});

describe('reconcileBatch', () => {
  it('should commit a valid batch and reject it the second time', async () => {
    const context = createContext();
    const batch = [createTransaction(), createTransaction({ member: 'John Roe', amount: 25, bankReference: 'ZKB-002' })];

    const first = await reconcileBatch(batch, context);
    expect(first.status).toBe('committed');
    if (first.status === 'committed') {
      expect(first.result.written).toHaveLength(2);
    }

    const second = await reconcileBatch(batch, context);
    expect(second.status).toBe('rejected');
    if (second.status === 'rejected') {
      expect(second.failure.kind).toBe('AlreadyRecorded');
    }
    expect(context.ledgerStore.saves).toBe(1);
  });

  it('should not touch the stores when validation fails', async () => {
    const context = createContext();

    const outcome = await reconcileBatch([createTransaction({ member: null })], context);

    expect(outcome).toEqual({
      status: 'rejected',
      failure: { kind: 'MissingField', rows: [{ index: 0, missing: ['member'] }] },
    });
    expect(context.ledgerStore.saves).toBe(0);
    expect(context.mappingStore.saves).toBe(0);
  });
});
