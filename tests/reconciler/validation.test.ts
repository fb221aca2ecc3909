import { describe, it, expect } from 'vitest';
import { Ledger } from '@duesledger/store';
import { findMissingFields, resolveTransaction, validateBatch } from '@duesledger/reconciler';
import type { CandidateTransaction, LedgerDocument } from '@duesledger/types';

const createTransaction = (overrides: Partial<CandidateTransaction> = {}): CandidateTransaction => ({
  date: '2025-03-15',
  details: 'ACME Corp Payment, Jane Doe',
  amount: 50,
  purpose: 'membership-fee',
  member: 'Jane Doe',
  month: 'March',
  ...overrides,
});

const createLedger = (): Ledger => {
  const doc: LedgerDocument = {
    members: {
      M001: { name: 'Jane Doe', membershipClass: 'active', introductionCourseCompleted: false, contributions: {} },
      M002: {
        name: 'John Roe',
        membershipClass: 'passive',
        introductionCourseCompleted: true,
        contributions: { '2025': { '01': { amount: 25, source: 'manual' } } },
      },
    },
  };
  return Ledger.fromDocument(doc);
};

describe('findMissingFields', () => {
  it('should report nothing for a complete transaction', () => {
    expect(findMissingFields(createTransaction())).toEqual([]);
  });

  it('should report blank, whitespace and unknown values', () => {
    const tx = createTransaction({ purpose: null, member: '   ', month: 'Marchember' });
    expect(findMissingFields(tx)).toEqual(['purpose', 'member', 'month']);
  });

  it('should accept numeric months', () => {
    expect(findMissingFields(createTransaction({ month: '03' }))).toEqual([]);
  });
});

describe('resolveTransaction', () => {
  it('should take the year from the date and trim the fields', () => {
    const tx = createTransaction({ date: '2024-12-30', member: ' Jane Doe ', month: 'january' });

    expect(resolveTransaction(tx, 4)).toEqual({
      index: 4,
      transaction: tx,
      member: 'Jane Doe',
      purpose: 'membership-fee',
      year: 2024,
      month: 1,
    });
  });

  it('should return null for an incomplete transaction', () => {
    expect(resolveTransaction(createTransaction({ member: null }), 0)).toBeNull();
  });
});

describe('validateBatch', () => {
  it('should pass an empty batch', () => {
    expect(validateBatch([], createLedger())).toEqual({ passed: true });
  });

  it('should pass a complete batch without conflicts', () => {
    const batch = [
      createTransaction(),
      createTransaction({ member: 'John Roe', amount: 25 }),
      createTransaction({ month: 'April' }),
    ];

    expect(validateBatch(batch, createLedger())).toEqual({ passed: true });
  });

  it('should list every incomplete row', () => {
    const batch = [
      createTransaction({ member: null }),
      createTransaction({ month: 'April' }),
      createTransaction({ purpose: '', month: null }),
    ];

    expect(validateBatch(batch, createLedger())).toEqual({
      passed: false,
      failure: {
        kind: 'MissingField',
        rows: [
          { index: 0, missing: ['member'] },
          { index: 2, missing: ['purpose', 'month'] },
        ],
      },
    });
  });

  it('should report missing fields before duplicates', () => {
    const batch = [createTransaction(), createTransaction(), createTransaction({ member: null })];

    const result = validateBatch(batch, createLedger());

    expect(result.passed).toBe(false);
    if (!result.passed) {
      expect(result.failure.kind).toBe('MissingField');
    }
  });

  it('should group rows for the same member, month and purpose', () => {
    const batch = [
      createTransaction({ month: 'March' }),
      createTransaction({ month: 'April' }),
      createTransaction({ month: '3' }),
    ];

    expect(validateBatch(batch, createLedger())).toEqual({
      passed: false,
      failure: {
        kind: 'DuplicateInBatch',
        groups: [{ member: 'Jane Doe', month: 3, purpose: 'membership-fee', rows: [0, 2] }],
      },
    });
  });

  it('should not treat different purposes as duplicates', () => {
    const batch = [createTransaction(), createTransaction({ purpose: 'introduction-course' })];

    expect(validateBatch(batch, createLedger())).toEqual({ passed: true });
  });

  it('should report periods already recorded in the ledger', () => {
    const batch = [
      createTransaction(),
      createTransaction({ date: '2025-01-15', member: 'John Roe', month: 'January', amount: 25 }),
    ];

    expect(validateBatch(batch, createLedger())).toEqual({
      passed: false,
      failure: {
        kind: 'AlreadyRecorded',
        conflicts: [
          {
            index: 1,
            member: 'John Roe',
            memberId: 'M002',
            year: 2025,
            month: 1,
            existing: { amount: 25, source: 'manual' },
          },
        ],
      },
    });
  });

  it('should check conflicts against the year of the transaction date', () => {
    const batch = [createTransaction({ date: '2024-01-15', member: 'John Roe', month: 'January' })];

    expect(validateBatch(batch, createLedger())).toEqual({ passed: true });
  });

  it('should leave unknown members to the commit step', () => {
    const batch = [createTransaction({ member: 'Nobody' })];

    expect(validateBatch(batch, createLedger())).toEqual({ passed: true });
  });
});
