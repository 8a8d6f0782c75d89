import type {
  CampaignStatus,
  CampaignTargeting,
  CreateInput,
  Email,
  EmailCampaign,
  EmailConfiguration,
  EmailSequence,
  EmailSequenceEnrollment,
  EmailSequenceStep,
  EmailStatus,
  EmailTemplate,
  EmailTrackingEvent,
  KpiTarget,
  KpiType,
  Lead,
  LeadActivity,
  LeadPriority,
  LeadSource,
  LeadStatus,
  PaginatedResult,
  Pagination,
  User,
  UserRole,
} from '@salesdesk/core';

/**
 * Lead visibility resolved from the actor. `assignees` restricts rows to leads
 * assigned to one of the listed users.
 */
export type LeadScope = { kind: 'tenant' } | { kind: 'assignees'; userIds: string[] };

export interface ScopedLeadFilter {
  tenantId: string;
  scope: LeadScope;
  createdFrom?: Date;
  createdTo?: Date;
}

export interface LeadListFilters extends ScopedLeadFilter {
  search?: string;
  statuses?: LeadStatus[];
  priorities?: LeadPriority[];
  sourceId?: string;
  assignedToId?: string;
}

export type LeadGroupBy = 'none' | 'status' | 'priority' | 'source' | 'assignee' | 'month';

export interface LeadAggregateRow {
  /** Group key: the status, priority, source id, assignee id or `yyyy-MM`; null for ungrouped or unset. */
  key: string | null;
  total: number;
  won: number;
  lost: number;
  hot: number;
  hotWon: number;
  wonRevenue: number;
  wonWithBudget: number;
  openRevenue: number;
}

export type LeadPatch = Partial<
  Omit<Lead, 'id' | 'tenantId' | 'createdById' | 'createdAt' | 'updatedAt'>
>;

export interface LeadRepository {
  create(input: CreateInput<Lead>): Promise<Lead>;
  findById(tenantId: string, id: string): Promise<Lead | null>;
  findByIds(tenantId: string, ids: string[]): Promise<Lead[]>;
  update(tenantId: string, id: string, patch: LeadPatch): Promise<Lead | null>;
  list(filters: LeadListFilters, pagination: Pagination): Promise<PaginatedResult<Lead>>;
  /** OR of the targeting predicates, distinct, leads without an email left out. */
  findCampaignTargets(tenantId: string, targeting: CampaignTargeting): Promise<Lead[]>;
  listOverdue(filter: ScopedLeadFilter, contactedBefore: Date, limit: number): Promise<Lead[]>;
  countOverdue(filter: ScopedLeadFilter, contactedBefore: Date): Promise<number>;
  aggregate(filter: ScopedLeadFilter, groupBy: LeadGroupBy): Promise<LeadAggregateRow[]>;
}

export interface LeadSourceRepository {
  create(input: CreateInput<LeadSource>): Promise<LeadSource>;
  findById(tenantId: string, id: string): Promise<LeadSource | null>;
  list(tenantId: string, options?: { activeOnly?: boolean }): Promise<LeadSource[]>;
}

export interface LeadActivityRepository {
  append(input: Omit<LeadActivity, 'id' | 'createdAt'> & { createdAt?: Date }): Promise<LeadActivity>;
  listByLead(tenantId: string, leadId: string, limit?: number): Promise<LeadActivity[]>;
  listRecent(filter: { tenantId: string; scope: LeadScope }, limit: number): Promise<LeadActivity[]>;
}

export interface UserRepository {
  findById(id: string): Promise<User | null>;
  findByIds(tenantId: string, ids: string[]): Promise<User[]>;
  listActive(tenantId: string, filters?: { role?: UserRole; department?: string | null }): Promise<User[]>;
}

export type EmailConfigurationPatch = Partial<
  Omit<EmailConfiguration, 'id' | 'tenantId' | 'userId' | 'isDefault' | 'createdAt' | 'updatedAt'>
>;

export interface EmailConfigurationRepository {
  create(input: CreateInput<EmailConfiguration>): Promise<EmailConfiguration>;
  findById(tenantId: string, id: string): Promise<EmailConfiguration | null>;
  /** Default first, then by name. */
  listByUser(tenantId: string, userId: string): Promise<EmailConfiguration[]>;
  update(tenantId: string, id: string, patch: EmailConfigurationPatch): Promise<EmailConfiguration | null>;
  /** Flags `id` as the user's default and clears the flag on every other row, atomically. */
  markDefault(tenantId: string, userId: string, id: string): Promise<EmailConfiguration | null>;
}

export type EmailTemplatePatch = Partial<
  Pick<EmailTemplate, 'name' | 'templateType' | 'subject' | 'bodyHtml' | 'bodyText' | 'isActive' | 'isShared'>
>;

export interface EmailTemplateRepository {
  create(input: CreateInput<EmailTemplate>): Promise<EmailTemplate>;
  findById(tenantId: string, id: string): Promise<EmailTemplate | null>;
  /** Templates the user owns plus shared templates of the tenant. */
  listAccessible(tenantId: string, userId: string): Promise<EmailTemplate[]>;
  update(tenantId: string, id: string, patch: EmailTemplatePatch): Promise<EmailTemplate | null>;
  recordUsage(id: string, usedAt: Date): Promise<void>;
}

export type CampaignPatch = Partial<
  Pick<
    EmailCampaign,
    'name' | 'description' | 'status' | 'scheduledAt' | 'totalRecipients' | 'startedAt' | 'completedAt' | 'batchSize'
  >
>;

export interface CampaignRepository {
  create(input: CreateInput<EmailCampaign>): Promise<EmailCampaign>;
  findById(tenantId: string, id: string): Promise<EmailCampaign | null>;
  list(
    filters: { tenantId: string; userId?: string; status?: CampaignStatus },
    pagination: Pagination
  ): Promise<PaginatedResult<EmailCampaign>>;
  update(id: string, patch: CampaignPatch): Promise<EmailCampaign | null>;
  incrementCounters(id: string, delta: { sent?: number; failed?: number }): Promise<void>;
  /** Across tenants: scheduled campaigns due at `now`. */
  listDueScheduled(now: Date): Promise<EmailCampaign[]>;
  /** Across tenants. */
  listByStatus(status: CampaignStatus): Promise<EmailCampaign[]>;
}

export interface EmailListFilters {
  tenantId: string;
  userId?: string;
  leadId?: string;
  campaignId?: string;
  templateId?: string;
  status?: EmailStatus;
  createdFrom?: Date;
  createdTo?: Date;
}

export type EmailPatch = Partial<
  Pick<
    Email,
    | 'status'
    | 'externalId'
    | 'sentAt'
    | 'deliveredAt'
    | 'openedAt'
    | 'clickedAt'
    | 'repliedAt'
    | 'openCount'
    | 'clickCount'
    | 'errorMessage'
    | 'retryCount'
    | 'fromEmail'
    | 'fromName'
    | 'replyTo'
  >
>;

export type EmailStatusCounts = Record<EmailStatus, number>;

export type NewEmail = Omit<CreateInput<Email>, 'trackingId'> & { trackingId?: string };

export interface EmailRepository {
  create(input: NewEmail): Promise<Email>;
  /** Inserts unless the (campaign, lead) pair already has a row; returns null when skipped. */
  createForCampaign(input: NewEmail & { campaignId: string }): Promise<Email | null>;
  findById(tenantId: string, id: string): Promise<Email | null>;
  findByTrackingId(trackingId: string): Promise<Email | null>;
  update(id: string, patch: EmailPatch): Promise<Email | null>;
  listLeadIdsForCampaign(campaignId: string): Promise<Set<string>>;
  listQueuedForCampaign(campaignId: string, limit: number): Promise<Email[]>;
  countQueuedForCampaign(campaignId: string): Promise<number>;
  /** Across tenants: failed rows still under their retry budget, oldest first. */
  listRetryable(limit: number): Promise<Email[]>;
  list(filters: EmailListFilters, pagination: Pagination): Promise<PaginatedResult<Email>>;
  countByStatus(filters: EmailListFilters): Promise<EmailStatusCounts>;
}

export interface EmailTrackingRepository {
  append(input: Omit<EmailTrackingEvent, 'id'>): Promise<EmailTrackingEvent>;
  listByEmail(emailId: string): Promise<EmailTrackingEvent[]>;
}

export type SequencePatch = Partial<
  Pick<
    EmailSequence,
    | 'name'
    | 'description'
    | 'isActive'
    | 'triggerOnLeadCreation'
    | 'triggerOnStatusChange'
    | 'triggerOnPriorityChange'
    | 'delayStartDays'
  >
>;

export type SequenceTrigger =
  | { kind: 'lead_created' }
  | { kind: 'status_changed'; status: LeadStatus }
  | { kind: 'priority_changed'; priority: LeadPriority };

export interface SequenceRepository {
  create(input: CreateInput<EmailSequence>): Promise<EmailSequence>;
  findById(tenantId: string, id: string): Promise<EmailSequence | null>;
  listByTenant(tenantId: string, filters?: { userId?: string }): Promise<EmailSequence[]>;
  update(tenantId: string, id: string, patch: SequencePatch): Promise<EmailSequence | null>;
  /** Active sequences of the tenant that fire on the trigger. */
  listTriggered(tenantId: string, trigger: SequenceTrigger): Promise<EmailSequence[]>;
  addStep(input: CreateInput<EmailSequenceStep>): Promise<EmailSequenceStep>;
  listSteps(sequenceId: string): Promise<EmailSequenceStep[]>;
  findActiveStep(sequenceId: string, stepNumber: number): Promise<EmailSequenceStep | null>;
}

export type EnrollmentPatch = Partial<
  Pick<EmailSequenceEnrollment, 'currentStep' | 'isActive' | 'emailsSent' | 'lastEmailSentAt' | 'hasReplied' | 'completedAt'>
>;

export interface EnrollmentRepository {
  /** Returns the existing row for the pair when there is one. */
  findOrCreate(input: {
    tenantId: string;
    sequenceId: string;
    leadId: string;
    enrolledAt: Date;
  }): Promise<{ enrollment: EmailSequenceEnrollment; created: boolean }>;
  findById(id: string): Promise<EmailSequenceEnrollment | null>;
  update(id: string, patch: EnrollmentPatch): Promise<EmailSequenceEnrollment | null>;
  /** Across tenants. */
  listActive(): Promise<EmailSequenceEnrollment[]>;
  listActiveForLead(tenantId: string, leadId: string): Promise<EmailSequenceEnrollment[]>;
  listBySequence(sequenceId: string): Promise<EmailSequenceEnrollment[]>;
}

export type KpiTargetPatch = Partial<Pick<KpiTarget, 'targetValue' | 'currentValue' | 'isActive'>>;

export interface KpiTargetRepository {
  create(input: CreateInput<KpiTarget>): Promise<KpiTarget>;
  findById(tenantId: string, id: string): Promise<KpiTarget | null>;
  update(tenantId: string, id: string, patch: KpiTargetPatch): Promise<KpiTarget | null>;
  listForUser(tenantId: string, userId: string, options?: { activeOn?: Date }): Promise<KpiTarget[]>;
  /** Adds `amount` to every active target of the type whose period covers `at`; returns how many moved. */
  incrementActive(tenantId: string, userId: string, kpiType: KpiType, amount: number, at: Date): Promise<number>;
}

export interface StorageRepositories {
  users: UserRepository;
  leads: LeadRepository;
  leadSources: LeadSourceRepository;
  activities: LeadActivityRepository;
  emailConfigurations: EmailConfigurationRepository;
  emailTemplates: EmailTemplateRepository;
  campaigns: CampaignRepository;
  emails: EmailRepository;
  tracking: EmailTrackingRepository;
  sequences: SequenceRepository;
  enrollments: EnrollmentRepository;
  kpiTargets: KpiTargetRepository;
}
