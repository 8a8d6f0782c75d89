import { sql } from 'drizzle-orm';
import {
  boolean,
  index,
  integer,
  jsonb,
  numeric,
  pgEnum,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
  uuid,
  varchar,
} from 'drizzle-orm/pg-core';
import {
  CampaignStatusSchema,
  EmailProviderSchema,
  EmailStatusSchema,
  KpiTypeSchema,
  LeadActivityTypeSchema,
  LeadPrioritySchema,
  LeadStatusSchema,
  TemplateTypeSchema,
  TrackingEventTypeSchema,
  UserRoleSchema,
  type LeadPriority,
  type LeadStatus,
} from '@salesdesk/core';

export const userRoleEnum = pgEnum('user_role', UserRoleSchema.options);
export const leadStatusEnum = pgEnum('lead_status', LeadStatusSchema.options);
export const leadPriorityEnum = pgEnum('lead_priority', LeadPrioritySchema.options);
export const leadActivityTypeEnum = pgEnum('lead_activity_type', LeadActivityTypeSchema.options);
export const emailProviderEnum = pgEnum('email_provider', EmailProviderSchema.options);
export const templateTypeEnum = pgEnum('email_template_type', TemplateTypeSchema.options);
export const campaignStatusEnum = pgEnum('email_campaign_status', CampaignStatusSchema.options);
export const emailStatusEnum = pgEnum('email_status', EmailStatusSchema.options);
export const trackingEventTypeEnum = pgEnum('email_tracking_event', TrackingEventTypeSchema.options);
export const kpiTypeEnum = pgEnum('kpi_type', KpiTypeSchema.options);

const timestamps = {
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
};

// ============================================================================
// Users & leads
// ============================================================================

export const users = pgTable(
  'users',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    tenantId: text('tenant_id').notNull(),
    email: varchar('email', { length: 320 }).notNull(),
    firstName: varchar('first_name', { length: 150 }).notNull().default(''),
    lastName: varchar('last_name', { length: 150 }).notNull().default(''),
    role: userRoleEnum('role').notNull().default('sales_rep'),
    department: varchar('department', { length: 100 }),
    isActive: boolean('is_active').notNull().default(true),
    ...timestamps,
  },
  (table) => [
    uniqueIndex('users_tenant_email_idx').on(table.tenantId, table.email),
    index('users_tenant_role_idx').on(table.tenantId, table.role, table.department),
  ]
);

export const leadSources = pgTable(
  'lead_sources',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    tenantId: text('tenant_id').notNull(),
    name: varchar('name', { length: 100 }).notNull(),
    description: text('description'),
    isActive: boolean('is_active').notNull().default(true),
    ...timestamps,
  },
  (table) => [uniqueIndex('lead_sources_tenant_name_idx').on(table.tenantId, table.name)]
);

export const leads = pgTable(
  'leads',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    tenantId: text('tenant_id').notNull(),
    firstName: varchar('first_name', { length: 100 }).notNull(),
    lastName: varchar('last_name', { length: 100 }),
    email: varchar('email', { length: 320 }).notNull().default(''),
    phone: varchar('phone', { length: 20 }),
    company: varchar('company', { length: 200 }),
    jobTitle: varchar('job_title', { length: 100 }),
    sourceId: uuid('source_id').references(() => leadSources.id, { onDelete: 'set null' }),
    status: leadStatusEnum('status').notNull().default('new'),
    priority: leadPriorityEnum('priority').notNull().default('warm'),
    assignedToId: uuid('assigned_to_id').references(() => users.id, { onDelete: 'set null' }),
    createdById: uuid('created_by_id')
      .references(() => users.id)
      .notNull(),
    address: text('address'),
    city: varchar('city', { length: 100 }),
    state: varchar('state', { length: 100 }),
    country: varchar('country', { length: 100 }),
    postalCode: varchar('postal_code', { length: 20 }),
    budget: numeric('budget', { precision: 12, scale: 2 }),
    requirements: text('requirements'),
    notes: text('notes'),
    lastContactedAt: timestamp('last_contacted_at', { withTimezone: true }),
    ...timestamps,
  },
  (table) => [
    index('leads_tenant_status_idx').on(table.tenantId, table.status),
    index('leads_tenant_assignee_idx').on(table.tenantId, table.assignedToId),
    index('leads_tenant_created_idx').on(table.tenantId, table.createdAt),
  ]
);

export const leadActivities = pgTable(
  'lead_activities',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    tenantId: text('tenant_id').notNull(),
    leadId: uuid('lead_id')
      .references(() => leads.id, { onDelete: 'cascade' })
      .notNull(),
    userId: uuid('user_id')
      .references(() => users.id)
      .notNull(),
    type: leadActivityTypeEnum('type').notNull(),
    subject: varchar('subject', { length: 200 }).notNull(),
    description: text('description'),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [index('lead_activities_lead_idx').on(table.leadId, table.createdAt)]
);

// ============================================================================
// Email configuration & templates
// ============================================================================

export const emailConfigurations = pgTable(
  'email_configurations',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    tenantId: text('tenant_id').notNull(),
    userId: uuid('user_id')
      .references(() => users.id, { onDelete: 'cascade' })
      .notNull(),
    name: varchar('name', { length: 100 }).notNull(),
    provider: emailProviderEnum('provider').notNull().default('smtp'),
    smtpHost: varchar('smtp_host', { length: 255 }).notNull(),
    smtpPort: integer('smtp_port').notNull().default(587),
    smtpUsername: varchar('smtp_username', { length: 255 }).notNull(),
    smtpPassword: varchar('smtp_password', { length: 255 }).notNull(),
    useTls: boolean('use_tls').notNull().default(true),
    useSsl: boolean('use_ssl').notNull().default(false),
    fromEmail: varchar('from_email', { length: 320 }).notNull(),
    fromName: varchar('from_name', { length: 100 }).notNull(),
    replyTo: varchar('reply_to', { length: 320 }),
    isActive: boolean('is_active').notNull().default(true),
    isDefault: boolean('is_default').notNull().default(false),
    dailyLimit: integer('daily_limit').notNull().default(500),
    ...timestamps,
  },
  (table) => [
    uniqueIndex('email_configurations_user_name_idx').on(table.userId, table.name),
    uniqueIndex('email_configurations_single_default_idx')
      .on(table.userId)
      .where(sql`${table.isDefault} = true`),
  ]
);

export const emailTemplates = pgTable(
  'email_templates',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    tenantId: text('tenant_id').notNull(),
    userId: uuid('user_id')
      .references(() => users.id, { onDelete: 'cascade' })
      .notNull(),
    name: varchar('name', { length: 200 }).notNull(),
    templateType: templateTypeEnum('template_type').notNull().default('custom'),
    subject: varchar('subject', { length: 300 }).notNull(),
    bodyHtml: text('body_html').notNull(),
    bodyText: text('body_text'),
    isActive: boolean('is_active').notNull().default(true),
    isShared: boolean('is_shared').notNull().default(false),
    usageCount: integer('usage_count').notNull().default(0),
    lastUsedAt: timestamp('last_used_at', { withTimezone: true }),
    ...timestamps,
  },
  (table) => [index('email_templates_tenant_user_idx').on(table.tenantId, table.userId)]
);

// ============================================================================
// Campaigns & emails
// ============================================================================

export const emailCampaigns = pgTable(
  'email_campaigns',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    tenantId: text('tenant_id').notNull(),
    userId: uuid('user_id')
      .references(() => users.id, { onDelete: 'cascade' })
      .notNull(),
    name: varchar('name', { length: 200 }).notNull(),
    description: text('description'),
    templateId: uuid('template_id')
      .references(() => emailTemplates.id)
      .notNull(),
    emailConfigId: uuid('email_config_id')
      .references(() => emailConfigurations.id)
      .notNull(),
    status: campaignStatusEnum('status').notNull().default('draft'),
    scheduledAt: timestamp('scheduled_at', { withTimezone: true }),
    sendNow: boolean('send_now').notNull().default(false),
    targetAllLeads: boolean('target_all_leads').notNull().default(false),
    targetStatuses: jsonb('target_statuses').$type<LeadStatus[]>().notNull().default([]),
    targetPriorities: jsonb('target_priorities').$type<LeadPriority[]>().notNull().default([]),
    targetSourceIds: jsonb('target_source_ids').$type<string[]>().notNull().default([]),
    specificLeadIds: jsonb('specific_lead_ids').$type<string[]>().notNull().default([]),
    batchSize: integer('batch_size').notNull().default(50),
    delayBetweenBatches: integer('delay_between_batches').notNull().default(60),
    totalRecipients: integer('total_recipients').notNull().default(0),
    emailsSent: integer('emails_sent').notNull().default(0),
    emailsFailed: integer('emails_failed').notNull().default(0),
    startedAt: timestamp('started_at', { withTimezone: true }),
    completedAt: timestamp('completed_at', { withTimezone: true }),
    ...timestamps,
  },
  (table) => [
    index('email_campaigns_status_idx').on(table.status, table.scheduledAt),
    index('email_campaigns_tenant_user_idx').on(table.tenantId, table.userId),
  ]
);

export const emails = pgTable(
  'emails',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    tenantId: text('tenant_id').notNull(),
    trackingId: uuid('tracking_id').notNull().defaultRandom(),
    userId: uuid('user_id')
      .references(() => users.id, { onDelete: 'cascade' })
      .notNull(),
    leadId: uuid('lead_id')
      .references(() => leads.id, { onDelete: 'cascade' })
      .notNull(),
    campaignId: uuid('campaign_id').references(() => emailCampaigns.id, { onDelete: 'set null' }),
    templateId: uuid('template_id').references(() => emailTemplates.id, { onDelete: 'set null' }),
    subject: varchar('subject', { length: 300 }).notNull(),
    bodyHtml: text('body_html').notNull(),
    bodyText: text('body_text').notNull().default(''),
    fromEmail: varchar('from_email', { length: 320 }).notNull(),
    fromName: varchar('from_name', { length: 100 }).notNull(),
    toEmail: varchar('to_email', { length: 320 }).notNull(),
    toName: varchar('to_name', { length: 200 }).notNull(),
    replyTo: varchar('reply_to', { length: 320 }),
    status: emailStatusEnum('status').notNull().default('queued'),
    externalId: varchar('external_id', { length: 255 }),
    sentAt: timestamp('sent_at', { withTimezone: true }),
    deliveredAt: timestamp('delivered_at', { withTimezone: true }),
    openedAt: timestamp('opened_at', { withTimezone: true }),
    clickedAt: timestamp('clicked_at', { withTimezone: true }),
    repliedAt: timestamp('replied_at', { withTimezone: true }),
    openCount: integer('open_count').notNull().default(0),
    clickCount: integer('click_count').notNull().default(0),
    errorMessage: text('error_message'),
    retryCount: integer('retry_count').notNull().default(0),
    maxRetries: integer('max_retries').notNull().default(3),
    ...timestamps,
  },
  (table) => [
    uniqueIndex('emails_tracking_id_idx').on(table.trackingId),
    uniqueIndex('emails_campaign_lead_idx')
      .on(table.campaignId, table.leadId)
      .where(sql`${table.campaignId} is not null`),
    index('emails_campaign_status_idx').on(table.campaignId, table.status),
    index('emails_status_retry_idx').on(table.status, table.retryCount),
    index('emails_tenant_user_idx').on(table.tenantId, table.userId, table.createdAt),
    index('emails_lead_idx').on(table.leadId),
  ]
);

export const emailTrackingEvents = pgTable(
  'email_tracking_events',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    emailId: uuid('email_id')
      .references(() => emails.id, { onDelete: 'cascade' })
      .notNull(),
    eventType: trackingEventTypeEnum('event_type').notNull(),
    ipAddress: varchar('ip_address', { length: 64 }),
    userAgent: text('user_agent'),
    clickedUrl: text('clicked_url'),
    bounceReason: text('bounce_reason'),
    providerData: jsonb('provider_data').$type<Record<string, unknown>>().notNull().default({}),
    occurredAt: timestamp('occurred_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [index('email_tracking_events_email_idx').on(table.emailId, table.occurredAt)]
);

// ============================================================================
// Sequences
// ============================================================================

export const emailSequences = pgTable(
  'email_sequences',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    tenantId: text('tenant_id').notNull(),
    userId: uuid('user_id')
      .references(() => users.id, { onDelete: 'cascade' })
      .notNull(),
    name: varchar('name', { length: 200 }).notNull(),
    description: text('description'),
    isActive: boolean('is_active').notNull().default(true),
    triggerOnLeadCreation: boolean('trigger_on_lead_creation').notNull().default(false),
    triggerOnStatusChange: jsonb('trigger_on_status_change').$type<LeadStatus[]>().notNull().default([]),
    triggerOnPriorityChange: jsonb('trigger_on_priority_change').$type<LeadPriority[]>().notNull().default([]),
    delayStartDays: integer('delay_start_days').notNull().default(0),
    ...timestamps,
  },
  (table) => [index('email_sequences_tenant_active_idx').on(table.tenantId, table.isActive)]
);

export const emailSequenceSteps = pgTable(
  'email_sequence_steps',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    tenantId: text('tenant_id').notNull(),
    sequenceId: uuid('sequence_id')
      .references(() => emailSequences.id, { onDelete: 'cascade' })
      .notNull(),
    stepNumber: integer('step_number').notNull(),
    templateId: uuid('template_id')
      .references(() => emailTemplates.id)
      .notNull(),
    delayDays: integer('delay_days').notNull().default(1),
    sendOnlyIfNotReplied: boolean('send_only_if_not_replied').notNull().default(true),
    sendOnlyIfStatus: jsonb('send_only_if_status').$type<LeadStatus[]>().notNull().default([]),
    isActive: boolean('is_active').notNull().default(true),
    ...timestamps,
  },
  (table) => [uniqueIndex('email_sequence_steps_number_idx').on(table.sequenceId, table.stepNumber)]
);

export const emailSequenceEnrollments = pgTable(
  'email_sequence_enrollments',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    tenantId: text('tenant_id').notNull(),
    sequenceId: uuid('sequence_id')
      .references(() => emailSequences.id, { onDelete: 'cascade' })
      .notNull(),
    leadId: uuid('lead_id')
      .references(() => leads.id, { onDelete: 'cascade' })
      .notNull(),
    currentStep: integer('current_step').notNull().default(0),
    isActive: boolean('is_active').notNull().default(true),
    emailsSent: integer('emails_sent').notNull().default(0),
    lastEmailSentAt: timestamp('last_email_sent_at', { withTimezone: true }),
    hasReplied: boolean('has_replied').notNull().default(false),
    enrolledAt: timestamp('enrolled_at', { withTimezone: true }).defaultNow().notNull(),
    completedAt: timestamp('completed_at', { withTimezone: true }),
    ...timestamps,
  },
  (table) => [
    uniqueIndex('email_sequence_enrollments_pair_idx').on(table.sequenceId, table.leadId),
    index('email_sequence_enrollments_active_idx').on(table.isActive),
  ]
);

// ============================================================================
// KPI targets
// ============================================================================

export const kpiTargets = pgTable(
  'kpi_targets',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    tenantId: text('tenant_id').notNull(),
    userId: uuid('user_id')
      .references(() => users.id, { onDelete: 'cascade' })
      .notNull(),
    kpiType: kpiTypeEnum('kpi_type').notNull(),
    targetValue: numeric('target_value', { precision: 12, scale: 2 }).notNull(),
    currentValue: numeric('current_value', { precision: 12, scale: 2 }).notNull().default('0'),
    periodStart: timestamp('period_start', { withTimezone: true }).notNull(),
    periodEnd: timestamp('period_end', { withTimezone: true }).notNull(),
    isActive: boolean('is_active').notNull().default(true),
    ...timestamps,
  },
  (table) => [uniqueIndex('kpi_targets_period_idx').on(table.userId, table.kpiType, table.periodStart, table.periodEnd)]
);

export type UserRecord = typeof users.$inferSelect;
export type LeadSourceRecord = typeof leadSources.$inferSelect;
export type LeadRecord = typeof leads.$inferSelect;
export type LeadActivityRecord = typeof leadActivities.$inferSelect;
export type EmailConfigurationRecord = typeof emailConfigurations.$inferSelect;
export type EmailTemplateRecord = typeof emailTemplates.$inferSelect;
export type EmailCampaignRecord = typeof emailCampaigns.$inferSelect;
export type EmailRecord = typeof emails.$inferSelect;
export type EmailTrackingEventRecord = typeof emailTrackingEvents.$inferSelect;
export type EmailSequenceRecord = typeof emailSequences.$inferSelect;
export type EmailSequenceStepRecord = typeof emailSequenceSteps.$inferSelect;
export type EmailSequenceEnrollmentRecord = typeof emailSequenceEnrollments.$inferSelect;
export type KpiTargetRecord = typeof kpiTargets.$inferSelect;
