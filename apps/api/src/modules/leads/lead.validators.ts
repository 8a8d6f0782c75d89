import { z } from 'zod';
import { LeadActivityTypeSchema, LeadPrioritySchema, LeadStatusSchema, PaginationSchema } from '@salesdesk/core';

const optionalText = (max: number) =>
  z
    .string()
    .trim()
    .max(max)
    .nullish()
    .transform((value) => (value ? value : null));

const listParam = <T extends z.ZodTypeAny>(item: T) =>
  z.preprocess((value) => {
    if (typeof value === 'string') {
      return value
        .split(',')
        .map((entry) => entry.trim())
        .filter(Boolean);
    }
    return value;
  }, z.array(item).optional());

const leadFields = {
  firstName: z.string().trim().min(1).max(100),
  lastName: optionalText(100),
  email: z.string().trim().toLowerCase().email(),
  phone: optionalText(20),
  company: optionalText(200),
  jobTitle: optionalText(100),
  sourceId: z.string().uuid().nullish(),
  assignedToId: z.string().uuid().nullish(),
  address: optionalText(500),
  city: optionalText(100),
  state: optionalText(100),
  country: optionalText(100),
  postalCode: optionalText(20),
  budget: z.coerce.number().nonnegative().nullish(),
  requirements: optionalText(5000),
  notes: optionalText(5000),
};

export const CreateLeadSchema = z.object({
  ...leadFields,
  status: LeadStatusSchema.default('new'),
  priority: LeadPrioritySchema.default('warm'),
});

export const UpdateLeadSchema = z
  .object({
    ...leadFields,
    status: LeadStatusSchema,
    priority: LeadPrioritySchema,
  })
  .partial()
  .refine((value) => Object.keys(value).length > 0, { message: 'At least one field must be provided.' });

export const ListLeadsQuerySchema = PaginationSchema.extend({
  search: z.string().trim().min(1).max(120).optional(),
  status: listParam(LeadStatusSchema),
  priority: listParam(LeadPrioritySchema),
  sourceId: z.string().uuid().optional(),
  assignedToId: z.string().uuid().optional(),
});

export const LeadIdParamSchema = z.object({
  leadId: z.string().uuid(),
});

export const LogActivitySchema = z.object({
  type: LeadActivityTypeSchema,
  subject: z.string().trim().min(1).max(200),
  description: optionalText(5000),
});

export const CreateLeadSourceSchema = z.object({
  name: z.string().trim().min(1).max(100),
  description: optionalText(1000),
  isActive: z.boolean().default(true),
});

export type CreateLeadInput = z.infer<typeof CreateLeadSchema>;
export type UpdateLeadInput = z.infer<typeof UpdateLeadSchema>;
export type ListLeadsQuery = z.infer<typeof ListLeadsQuerySchema>;
export type LogActivityInput = z.infer<typeof LogActivitySchema>;
export type CreateLeadSourceInput = z.infer<typeof CreateLeadSourceSchema>;
