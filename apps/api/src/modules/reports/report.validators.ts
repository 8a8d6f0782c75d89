import { z } from 'zod';

export const ReportQuerySchema = z
  .object({
    range: z.enum(['today', 'week', 'month', 'quarter', 'year', 'custom']).default('month'),
    from: z.coerce.date().optional(),
    to: z.coerce.date().optional(),
  })
  .refine((value) => value.range !== 'custom' || (value.from !== undefined && value.to !== undefined), {
    message: 'Custom ranges need both from and to',
    path: ['from'],
  });

export type ReportQuery = z.infer<typeof ReportQuerySchema>;
