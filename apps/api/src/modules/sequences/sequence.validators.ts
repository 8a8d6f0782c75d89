import { z } from 'zod';
import { LeadPrioritySchema, LeadStatusSchema } from '@salesdesk/core';

const sequenceFields = {
  name: z.string().trim().min(1).max(200),
  description: z
    .string()
    .trim()
    .max(2000)
    .nullish()
    .transform((value) => value || null),
  isActive: z.boolean(),
  triggerOnLeadCreation: z.boolean(),
  triggerOnStatusChange: z.array(LeadStatusSchema),
  triggerOnPriorityChange: z.array(LeadPrioritySchema),
  delayStartDays: z.number().int().min(0).max(365),
};

export const CreateSequenceSchema = z.object({
  ...sequenceFields,
  isActive: sequenceFields.isActive.default(true),
  triggerOnLeadCreation: sequenceFields.triggerOnLeadCreation.default(false),
  triggerOnStatusChange: sequenceFields.triggerOnStatusChange.default([]),
  triggerOnPriorityChange: sequenceFields.triggerOnPriorityChange.default([]),
  delayStartDays: sequenceFields.delayStartDays.default(0),
});

export const UpdateSequenceSchema = z
  .object(sequenceFields)
  .partial()
  .refine((value) => Object.keys(value).length > 0, { message: 'Nothing to update' });

export const AddStepSchema = z.object({
  stepNumber: z.number().int().min(1).max(100),
  templateId: z.string().uuid(),
  delayDays: z.number().int().min(0).max(365).default(1),
  sendOnlyIfNotReplied: z.boolean().default(true),
  sendOnlyIfStatus: z.array(LeadStatusSchema).default([]),
  isActive: z.boolean().default(true),
});

export const EnrollLeadSchema = z.object({
  leadId: z.string().uuid(),
});

export const SequenceIdParamSchema = z.object({
  sequenceId: z.string().uuid(),
});

export const EnrollmentParamSchema = SequenceIdParamSchema.extend({
  enrollmentId: z.string().uuid(),
});

export type CreateSequenceInput = z.infer<typeof CreateSequenceSchema>;
export type UpdateSequenceInput = z.infer<typeof UpdateSequenceSchema>;
export type AddStepInput = z.infer<typeof AddStepSchema>;
