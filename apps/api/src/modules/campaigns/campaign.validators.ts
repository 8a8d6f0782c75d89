import { z } from 'zod';
import {
  CampaignStatusSchema,
  CampaignTargetingSchema,
  DEFAULT_BATCH_SIZE,
  DEFAULT_DELAY_BETWEEN_BATCHES_SECONDS,
  PaginationSchema,
} from '@salesdesk/core';

const hasTargeting = (value: z.infer<typeof CampaignTargetingSchema>): boolean =>
  value.targetAllLeads ||
  value.targetStatuses.length > 0 ||
  value.targetPriorities.length > 0 ||
  value.targetSourceIds.length > 0 ||
  value.specificLeadIds.length > 0;

export const CreateCampaignSchema = CampaignTargetingSchema.extend({
  name: z.string().trim().min(1).max(200),
  description: z
    .string()
    .trim()
    .max(2000)
    .nullish()
    .transform((value) => value || null),
  templateId: z.string().uuid(),
  emailConfigId: z.string().uuid(),
  sendNow: z.boolean().default(false),
  scheduledAt: z.coerce.date().nullish().transform((value) => value ?? null),
  batchSize: z.number().int().min(1).max(500).default(DEFAULT_BATCH_SIZE),
  delayBetweenBatches: z.number().int().min(30).max(3600).default(DEFAULT_DELAY_BETWEEN_BATCHES_SECONDS),
}).refine(hasTargeting, {
  message: 'Select targeting criteria or target all leads',
  path: ['targetAllLeads'],
});

export const BulkEmailSchema = z.object({
  leadIds: z.array(z.string().uuid()).min(1).max(1000),
  templateId: z.string().uuid(),
  emailConfigId: z.string().uuid().optional(),
  scheduledAt: z.coerce.date().optional(),
});

export const ListCampaignsQuerySchema = PaginationSchema.extend({
  status: CampaignStatusSchema.optional(),
});

export const CampaignIdParamSchema = z.object({
  campaignId: z.string().uuid(),
});

export type CreateCampaignInput = z.infer<typeof CreateCampaignSchema>;
export type BulkEmailInput = z.infer<typeof BulkEmailSchema>;
export type ListCampaignsQuery = z.infer<typeof ListCampaignsQuerySchema>;
