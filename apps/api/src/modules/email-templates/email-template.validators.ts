import { z } from 'zod';
import { MAX_SUBJECT_LENGTH, TemplateTypeSchema } from '@salesdesk/core';

const templateFields = {
  name: z.string().trim().min(1).max(200),
  templateType: TemplateTypeSchema,
  subject: z.string().trim().min(1).max(MAX_SUBJECT_LENGTH),
  bodyHtml: z.string().min(1),
  bodyText: z
    .string()
    .nullish()
    .transform((value) => (value && value.trim() ? value : null)),
  isActive: z.boolean(),
  isShared: z.boolean(),
};

export const CreateTemplateSchema = z.object({
  ...templateFields,
  templateType: templateFields.templateType.default('custom'),
  isActive: templateFields.isActive.default(true),
  isShared: templateFields.isShared.default(false),
});

export const UpdateTemplateSchema = z.object(templateFields).partial();

export const TemplateIdParamSchema = z.object({
  templateId: z.string().uuid(),
});

export const PreviewTemplateSchema = z.object({
  leadId: z.string().uuid().optional(),
});

export type CreateTemplateInput = z.infer<typeof CreateTemplateSchema>;
export type UpdateTemplateInput = z.infer<typeof UpdateTemplateSchema>;
