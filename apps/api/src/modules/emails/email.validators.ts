import { z } from 'zod';
import { EmailStatusSchema, MAX_SUBJECT_LENGTH, PaginationSchema } from '@salesdesk/core';

export const QuickEmailSchema = z
  .object({
    leadId: z.string().uuid(),
    templateId: z.string().uuid().optional(),
    emailConfigId: z.string().uuid().optional(),
    subject: z.string().trim().max(MAX_SUBJECT_LENGTH).optional(),
    bodyHtml: z.string().optional(),
  })
  .refine((value) => Boolean(value.templateId) || Boolean(value.subject && value.bodyHtml?.trim()), {
    message: 'Choose a template or provide a subject and body',
    path: ['subject'],
  });

export const ListEmailsQuerySchema = PaginationSchema.extend({
  status: EmailStatusSchema.optional(),
  leadId: z.string().uuid().optional(),
  campaignId: z.string().uuid().optional(),
});

export const EmailIdParamSchema = z.object({
  emailId: z.string().uuid(),
});

export type QuickEmailInput = z.infer<typeof QuickEmailSchema>;
export type ListEmailsQuery = z.infer<typeof ListEmailsQuerySchema>;
