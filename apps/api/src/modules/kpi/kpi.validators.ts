import { z } from 'zod';
import { KpiTypeSchema } from '@salesdesk/core';

export const CreateKpiTargetSchema = z
  .object({
    kpiType: KpiTypeSchema,
    targetValue: z.coerce.number().positive().max(9_999_999_999),
    periodStart: z.coerce.date(),
    periodEnd: z.coerce.date(),
  })
  .refine((value) => value.periodEnd >= value.periodStart, {
    message: 'Period end must not be before period start',
    path: ['periodEnd'],
  });

export const UpdateKpiProgressSchema = z.object({
  value: z.coerce.number().min(0),
});

export const ListKpiTargetsQuerySchema = z.object({
  activeOnly: z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => value === 'true'),
});

export const KpiTargetIdParamSchema = z.object({
  targetId: z.string().uuid(),
});

export type CreateKpiTargetInput = z.infer<typeof CreateKpiTargetSchema>;
export type ListKpiTargetsQuery = z.infer<typeof ListKpiTargetsQuerySchema>;
