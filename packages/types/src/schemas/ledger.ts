import { z } from 'zod';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export const MembershipClassSchema = z.enum(['active', 'passive', 'inactive']);
export type MembershipClass = z.infer<typeof MembershipClassSchema>;

export const RecordSourceSchema = z.enum(['manual', 'statement-import']);
export type RecordSource = z.infer<typeof RecordSourceSchema>;

export const YearKeySchema = z.string().regex(/^\d{4}$/, 'Year must be four digits');
export const MonthKeySchema = z.string().regex(/^(0[1-9]|1[0-2])$/, 'Month must be 01..12');

export const ContributionRecordSchema = z.object({
  amount: z.number().nonnegative(),
  paymentDate: z.string().regex(ISO_DATE, 'Date must be in YYYY-MM-DD format').optional(),
  transactionId: z.string().min(1).optional(),
  source: RecordSourceSchema,
  purpose: z.string().min(1).optional(),
  details: z.string().optional(),
  monthLabel: z.string().min(1).optional(),
  bankReference: z.string().min(1).optional(),
});
export type ContributionRecord = z.infer<typeof ContributionRecordSchema>;

export const ContributionsByYearSchema = z.record(
  YearKeySchema,
  z.record(MonthKeySchema, ContributionRecordSchema)
);
export type ContributionsByYear = z.infer<typeof ContributionsByYearSchema>;

export const MemberSchema = z.object({
  name: z.string().min(1),
  membershipClass: MembershipClassSchema,
  introductionCourseCompleted: z.boolean(),
  phone: z.string().min(1).optional(),
  email: z.string().min(1).optional(),
  contributions: ContributionsByYearSchema,
});
export type Member = z.infer<typeof MemberSchema>;

export const LedgerDocumentSchema = z
  .object({
    members: z.record(z.string().min(1), MemberSchema),
  })
  .superRefine((doc, ctx) => {
    const seen = new Map<string, string>();
    for (const [id, member] of Object.entries(doc.members)) {
      const previous = seen.get(member.name);
      if (previous !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['members', id, 'name'],
          message: `Member name "${member.name}" is already used by ${previous}`,
        });
      }
      seen.set(member.name, id);
    }
  });
export type LedgerDocument = z.infer<typeof LedgerDocumentSchema>;
