import { z } from 'zod';
import { isValidISODate } from '../utils/date.js';

export const CandidateTransactionSchema = z.object({
  date: z.string().refine(isValidISODate, 'Date must be a calendar date in YYYY-MM-DD format'),
  details: z.string(),
  amount: z.number().positive(),
  purpose: z.string().nullable(),
  member: z.string().nullable(),
  month: z.string().nullable(),
  bankReference: z.string().min(1).optional(),
  remarks: z.string().min(1).optional(),
});
export type CandidateTransaction = z.infer<typeof CandidateTransactionSchema>;

/**
 * Review file written after import and edited by the operator before
 * validation and commit.
 */
export const CandidateBatchSchema = z.object({
  source: z.string().optional(),
  createdAt: z.string().datetime().optional(),
  transactions: z.array(CandidateTransactionSchema),
});
export type CandidateBatch = z.infer<typeof CandidateBatchSchema>;
