import { z } from 'zod';

import type { BaseEntity, EntityId } from '../common/types';
import { LeadPrioritySchema, LeadStatusSchema, type LeadPriority, type LeadStatus } from '../leads/types';

// ============================================================================
// Email Configuration
// ============================================================================

export const EmailProviderSchema = z.enum(['smtp', 'gmail', 'outlook', 'sendgrid', 'ses']);
export type EmailProvider = z.infer<typeof EmailProviderSchema>;

export const DEFAULT_SMTP_PORT = 587;
export const DEFAULT_DAILY_LIMIT = 500;

export interface EmailConfiguration extends BaseEntity {
  userId: EntityId;
  name: string;
  provider: EmailProvider;
  smtpHost: string;
  smtpPort: number;
  smtpUsername: string;
  smtpPassword: string;
  useTls: boolean;
  useSsl: boolean;
  fromEmail: string;
  fromName: string;
  replyTo: string | null;
  isActive: boolean;
  isDefault: boolean;
  dailyLimit: number;
}

// ============================================================================
// Templates
// ============================================================================

export const TemplateTypeSchema = z.enum([
  'welcome',
  'follow_up',
  'quote_request',
  'proposal',
  'thank_you',
  'nurture',
  'appointment',
  'custom',
]);
export type TemplateType = z.infer<typeof TemplateTypeSchema>;

export const MAX_SUBJECT_LENGTH = 300;

export interface EmailTemplate extends BaseEntity {
  userId: EntityId;
  name: string;
  templateType: TemplateType;
  subject: string;
  bodyHtml: string;
  bodyText: string | null;
  isActive: boolean;
  isShared: boolean;
  usageCount: number;
  lastUsedAt: Date | null;
}

// ============================================================================
// Campaigns
// ============================================================================

export const CampaignStatusSchema = z.enum(['draft', 'scheduled', 'sending', 'sent', 'paused', 'cancelled']);
export type CampaignStatus = z.infer<typeof CampaignStatusSchema>;

export const DEFAULT_BATCH_SIZE = 50;
export const DEFAULT_DELAY_BETWEEN_BATCHES_SECONDS = 60;

export interface CampaignTargeting {
  targetAllLeads: boolean;
  targetStatuses: LeadStatus[];
  targetPriorities: LeadPriority[];
  targetSourceIds: EntityId[];
  specificLeadIds: EntityId[];
}

export const CampaignTargetingSchema = z.object({
  targetAllLeads: z.boolean().default(false),
  targetStatuses: z.array(LeadStatusSchema).default([]),
  targetPriorities: z.array(LeadPrioritySchema).default([]),
  targetSourceIds: z.array(z.string().uuid()).default([]),
  specificLeadIds: z.array(z.string().uuid()).default([]),
});

export interface EmailCampaign extends BaseEntity, CampaignTargeting {
  userId: EntityId;
  name: string;
  description: string | null;
  templateId: EntityId;
  emailConfigId: EntityId;
  status: CampaignStatus;
  scheduledAt: Date | null;
  sendNow: boolean;
  batchSize: number;
  delayBetweenBatches: number;
  totalRecipients: number;
  emailsSent: number;
  emailsFailed: number;
  startedAt: Date | null;
  completedAt: Date | null;
}

// ============================================================================
// Emails
// ============================================================================

export const EmailStatusSchema = z.enum([
  'queued',
  'sending',
  'sent',
  'delivered',
  'opened',
  'clicked',
  'replied',
  'bounced',
  'failed',
  'spam',
]);
export type EmailStatus = z.infer<typeof EmailStatusSchema>;

export const DEFAULT_MAX_RETRIES = 3;

export interface Email extends BaseEntity {
  trackingId: string;
  userId: EntityId;
  leadId: EntityId;
  campaignId: EntityId | null;
  templateId: EntityId | null;
  subject: string;
  bodyHtml: string;
  bodyText: string;
  fromEmail: string;
  fromName: string;
  toEmail: string;
  toName: string;
  replyTo: string | null;
  status: EmailStatus;
  externalId: string | null;
  sentAt: Date | null;
  deliveredAt: Date | null;
  openedAt: Date | null;
  clickedAt: Date | null;
  repliedAt: Date | null;
  openCount: number;
  clickCount: number;
  errorMessage: string | null;
  retryCount: number;
  maxRetries: number;
}

export const TrackingEventTypeSchema = z.enum([
  'sent',
  'delivered',
  'opened',
  'clicked',
  'replied',
  'bounced',
  'spam',
  'unsubscribed',
]);
export type TrackingEventType = z.infer<typeof TrackingEventTypeSchema>;

export interface EmailTrackingEvent {
  id: EntityId;
  emailId: EntityId;
  eventType: TrackingEventType;
  ipAddress: string | null;
  userAgent: string | null;
  clickedUrl: string | null;
  bounceReason: string | null;
  providerData: Record<string, unknown>;
  occurredAt: Date;
}

// ============================================================================
// Sequences
// ============================================================================

export interface EmailSequence extends BaseEntity {
  userId: EntityId;
  name: string;
  description: string | null;
  isActive: boolean;
  triggerOnLeadCreation: boolean;
  triggerOnStatusChange: LeadStatus[];
  triggerOnPriorityChange: LeadPriority[];
  delayStartDays: number;
}

export interface EmailSequenceStep extends BaseEntity {
  sequenceId: EntityId;
  stepNumber: number;
  templateId: EntityId;
  delayDays: number;
  sendOnlyIfNotReplied: boolean;
  sendOnlyIfStatus: LeadStatus[];
  isActive: boolean;
}

export interface EmailSequenceEnrollment extends BaseEntity {
  sequenceId: EntityId;
  leadId: EntityId;
  currentStep: number;
  isActive: boolean;
  emailsSent: number;
  lastEmailSentAt: Date | null;
  hasReplied: boolean;
  enrolledAt: Date;
  completedAt: Date | null;
}

// ============================================================================
// KPI targets
// ============================================================================

export const KpiTypeSchema = z.enum([
  'leads_created',
  'leads_converted',
  'revenue_generated',
  'calls_made',
  'emails_sent',
  'meetings_scheduled',
]);
export type KpiType = z.infer<typeof KpiTypeSchema>;

export interface KpiTarget extends BaseEntity {
  userId: EntityId;
  kpiType: KpiType;
  targetValue: number;
  currentValue: number;
  periodStart: Date;
  periodEnd: Date;
  isActive: boolean;
}

export const getKpiCompletion = (target: Pick<KpiTarget, 'targetValue' | 'currentValue'>): number => {
  if (target.targetValue <= 0) {
    return 0;
  }
  return Math.min((target.currentValue / target.targetValue) * 100, 100);
};
