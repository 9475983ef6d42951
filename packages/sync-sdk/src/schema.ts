import { z } from 'zod';

const isoDateTime = z.string().datetime({ offset: true });

export const sourceEntrySchema = z.object({
  sourceId: z.string().min(1),
  description: z.string(),
  start: isoDateTime,
  stop: isoDateTime.nullable(),
  durationSeconds: z.number().int(),
  userName: z.string().min(1),
  projectName: z.string().min(1).nullable(),
  workspaceId: z.string().min(1),
});

export type ValidatedSourceEntry = z.infer<typeof sourceEntrySchema>;

export const dateRangeSchema = z
  .object({
    startDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD'),
    endDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD'),
  })
  .refine((range) => range.startDate <= range.endDate, {
    message: 'startDate must not be after endDate',
    path: ['endDate'],
  });

export interface ValidateSourceEntryOptions {
  onInvalid?: (issues: z.ZodIssue[], entry: unknown) => void;
}

export function validateSourceEntry(entry: unknown, options?: ValidateSourceEntryOptions): ValidatedSourceEntry | null {
  const result = sourceEntrySchema.safeParse(entry);
  if (result.success) {
    return result.data;
  }

  options?.onInvalid?.(result.error.issues, entry);
  return null;
}
