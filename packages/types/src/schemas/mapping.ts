import { z } from 'zod';

export const MappingEntrySchema = z.object({
  details: z.string().trim().min(1),
  member: z.string().min(1),
});
export type MappingEntry = z.infer<typeof MappingEntrySchema>;

/**
 * Learned details → member associations, stored as an array so that
 * insertion order (the lookup order) survives any key shape.
 */
export const MappingDocumentSchema = z.array(MappingEntrySchema).superRefine((entries, ctx) => {
  const keys = new Set<string>();
  entries.forEach((entry, index) => {
    if (keys.has(entry.details)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, 'details'],
        message: `Duplicate mapping key "${entry.details}"`,
      });
    }
    keys.add(entry.details);
  });
});
export type MappingDocument = z.infer<typeof MappingDocumentSchema>;
