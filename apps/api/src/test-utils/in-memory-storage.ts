import { randomUUID } from 'node:crypto';
import {
  CLOSED_STATUSES,
  DEFAULT_BATCH_SIZE,
  DEFAULT_DAILY_LIMIT,
  DEFAULT_DELAY_BETWEEN_BATCHES_SECONDS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_SMTP_PORT,
  FOLLOW_UP_STATUSES,
  buildPaginatedResult,
  type CampaignStatus,
  type CampaignTargeting,
  type CreateInput,
  type Email,
  type EmailCampaign,
  type EmailConfiguration,
  type EmailSequence,
  type EmailSequenceEnrollment,
  type EmailSequenceStep,
  type EmailTemplate,
  type EmailTrackingEvent,
  type KpiTarget,
  type KpiType,
  type Lead,
  type LeadActivity,
  type LeadSource,
  type PaginatedResult,
  type Pagination,
  type User,
  type UserRole,
} from '@salesdesk/core';
import type {
  CampaignPatch,
  CampaignRepository,
  EmailConfigurationPatch,
  EmailConfigurationRepository,
  EmailListFilters,
  EmailPatch,
  EmailRepository,
  EmailStatusCounts,
  EmailTemplatePatch,
  EmailTemplateRepository,
  EmailTrackingRepository,
  EnrollmentPatch,
  EnrollmentRepository,
  KpiTargetPatch,
  KpiTargetRepository,
  LeadActivityRepository,
  LeadAggregateRow,
  LeadGroupBy,
  LeadListFilters,
  LeadPatch,
  LeadRepository,
  LeadScope,
  LeadSourceRepository,
  NewEmail,
  ScopedLeadFilter,
  SequencePatch,
  SequenceRepository,
  SequenceTrigger,
  StorageRepositories,
  UserRepository,
} from '@salesdesk/storage';
import { emptyStatusCounts } from '@salesdesk/storage';

const byCreatedAtDesc = <T extends { createdAt: Date }>(a: T, b: T): number =>
  b.createdAt.getTime() - a.createdAt.getTime();

const byCreatedAtAsc = <T extends { createdAt: Date }>(a: T, b: T): number =>
  a.createdAt.getTime() - b.createdAt.getTime();

const paginate = <T>(rows: T[], pagination: Pagination): PaginatedResult<T> => {
  const offset = (pagination.page - 1) * pagination.limit;
  return buildPaginatedResult(rows.slice(offset, offset + pagination.limit), rows.length, pagination);
};

const stamp = () => {
  const now = new Date();
  return { id: randomUUID(), createdAt: now, updatedAt: now };
};

const inScope = (lead: Lead, scope: LeadScope): boolean =>
  scope.kind === 'tenant' || (lead.assignedToId !== null && scope.userIds.includes(lead.assignedToId));

const matchesScopedFilter = (lead: Lead, filter: ScopedLeadFilter): boolean =>
  lead.tenantId === filter.tenantId &&
  inScope(lead, filter.scope) &&
  (!filter.createdFrom || lead.createdAt >= filter.createdFrom) &&
  (!filter.createdTo || lead.createdAt < filter.createdTo);

const isOverdue = (lead: Lead, contactedBefore: Date): boolean =>
  FOLLOW_UP_STATUSES.includes(lead.status) && (lead.lastContactedAt === null || lead.lastContactedAt < contactedBefore);

const groupKeyOf = (lead: Lead, groupBy: LeadGroupBy): string | null => {
  switch (groupBy) {
    case 'none':
      return null;
    case 'status':
      return lead.status;
    case 'priority':
      return lead.priority;
    case 'source':
      return lead.sourceId;
    case 'assignee':
      return lead.assignedToId;
    case 'month':
      return `${lead.createdAt.getUTCFullYear()}-${String(lead.createdAt.getUTCMonth() + 1).padStart(2, '0')}`;
  }
};

const emptyAggregate = (key: string | null): LeadAggregateRow => ({
  key,
  total: 0,
  won: 0,
  lost: 0,
  hot: 0,
  hotWon: 0,
  wonRevenue: 0,
  wonWithBudget: 0,
  openRevenue: 0,
});

export class InMemoryUserRepository implements UserRepository {
  readonly rows = new Map<string, User>();

  async findById(id: string): Promise<User | null> {
    return this.rows.get(id) ?? null;
  }

  async findByIds(tenantId: string, ids: string[]): Promise<User[]> {
    return ids
      .map((id) => this.rows.get(id))
      .filter((user): user is User => user !== undefined && user.tenantId === tenantId);
  }

  async listActive(tenantId: string, filters: { role?: UserRole; department?: string | null } = {}): Promise<User[]> {
    return [...this.rows.values()].filter(
      (user) =>
        user.tenantId === tenantId &&
        user.isActive &&
        (!filters.role || user.role === filters.role) &&
        (!filters.department || user.department === filters.department)
    );
  }
}

export class InMemoryLeadRepository implements LeadRepository {
  readonly rows = new Map<string, Lead>();

  async create(input: CreateInput<Lead>): Promise<Lead> {
    const lead: Lead = { ...input, ...stamp() };
    this.rows.set(lead.id, lead);
    return lead;
  }

  async findById(tenantId: string, id: string): Promise<Lead | null> {
    const lead = this.rows.get(id);
    return lead && lead.tenantId === tenantId ? lead : null;
  }

  async findByIds(tenantId: string, ids: string[]): Promise<Lead[]> {
    return ids
      .map((id) => this.rows.get(id))
      .filter((lead): lead is Lead => lead !== undefined && lead.tenantId === tenantId);
  }

  async update(tenantId: string, id: string, patch: LeadPatch): Promise<Lead | null> {
    const current = await this.findById(tenantId, id);
    if (!current) {
      return null;
    }
    const next: Lead = { ...current, ...patch, updatedAt: new Date() };
    this.rows.set(id, next);
    return next;
  }

  async list(filters: LeadListFilters, pagination: Pagination): Promise<PaginatedResult<Lead>> {
    const search = filters.search?.trim().toLowerCase();
    const rows = [...this.rows.values()]
      .filter((lead) => matchesScopedFilter(lead, filters))
      .filter((lead) => !filters.statuses?.length || filters.statuses.includes(lead.status))
      .filter((lead) => !filters.priorities?.length || filters.priorities.includes(lead.priority))
      .filter((lead) => !filters.sourceId || lead.sourceId === filters.sourceId)
      .filter((lead) => !filters.assignedToId || lead.assignedToId === filters.assignedToId)
      .filter(
        (lead) =>
          !search ||
          [lead.firstName, lead.lastName, lead.email, lead.company, lead.phone].some((value) =>
            value?.toLowerCase().includes(search)
          )
      )
      .sort(byCreatedAtDesc);
    return paginate(rows, pagination);
  }

  async findCampaignTargets(tenantId: string, targeting: CampaignTargeting): Promise<Lead[]> {
    const predicates: Array<(lead: Lead) => boolean> = [];
    if (targeting.targetStatuses.length) predicates.push((lead) => targeting.targetStatuses.includes(lead.status));
    if (targeting.targetPriorities.length) predicates.push((lead) => targeting.targetPriorities.includes(lead.priority));
    if (targeting.targetSourceIds.length)
      predicates.push((lead) => lead.sourceId !== null && targeting.targetSourceIds.includes(lead.sourceId));
    if (targeting.specificLeadIds.length) predicates.push((lead) => targeting.specificLeadIds.includes(lead.id));

    if (!targeting.targetAllLeads && predicates.length === 0) {
      return [];
    }

    return [...this.rows.values()]
      .filter((lead) => lead.tenantId === tenantId && lead.email.trim() !== '')
      .filter((lead) => targeting.targetAllLeads || predicates.some((predicate) => predicate(lead)))
      .sort(byCreatedAtAsc);
  }

  async listOverdue(filter: ScopedLeadFilter, contactedBefore: Date, limit: number): Promise<Lead[]> {
    return [...this.rows.values()]
      .filter((lead) => matchesScopedFilter(lead, filter) && isOverdue(lead, contactedBefore))
      .sort((a, b) => (a.lastContactedAt?.getTime() ?? 0) - (b.lastContactedAt?.getTime() ?? 0))
      .slice(0, limit);
  }

  async countOverdue(filter: ScopedLeadFilter, contactedBefore: Date): Promise<number> {
    return [...this.rows.values()].filter(
      (lead) => matchesScopedFilter(lead, filter) && isOverdue(lead, contactedBefore)
    ).length;
  }

  async aggregate(filter: ScopedLeadFilter, groupBy: LeadGroupBy): Promise<LeadAggregateRow[]> {
    const groups = new Map<string | null, LeadAggregateRow>();
    if (groupBy === 'none') {
      groups.set(null, emptyAggregate(null));
    }

    for (const lead of this.rows.values()) {
      if (!matchesScopedFilter(lead, filter)) {
        continue;
      }
      const key = groupKeyOf(lead, groupBy);
      const row = groups.get(key) ?? emptyAggregate(key);
      const won = lead.status === 'won';
      row.total += 1;
      row.won += won ? 1 : 0;
      row.lost += lead.status === 'lost' ? 1 : 0;
      row.hot += lead.priority === 'hot' ? 1 : 0;
      row.hotWon += lead.priority === 'hot' && won ? 1 : 0;
      row.wonRevenue += won ? lead.budget ?? 0 : 0;
      row.wonWithBudget += won && lead.budget !== null ? 1 : 0;
      row.openRevenue += CLOSED_STATUSES.includes(lead.status) ? 0 : lead.budget ?? 0;
      groups.set(key, row);
    }

    return [...groups.values()];
  }
}

export class InMemoryLeadSourceRepository implements LeadSourceRepository {
  readonly rows = new Map<string, LeadSource>();

  async create(input: CreateInput<LeadSource>): Promise<LeadSource> {
    const source: LeadSource = { ...input, ...stamp() };
    this.rows.set(source.id, source);
    return source;
  }

  async findById(tenantId: string, id: string): Promise<LeadSource | null> {
    const source = this.rows.get(id);
    return source && source.tenantId === tenantId ? source : null;
  }

  async list(tenantId: string, options: { activeOnly?: boolean } = {}): Promise<LeadSource[]> {
    return [...this.rows.values()]
      .filter((source) => source.tenantId === tenantId && (!options.activeOnly || source.isActive))
      .sort((a, b) => a.name.localeCompare(b.name));
  }
}

export class InMemoryLeadActivityRepository implements LeadActivityRepository {
  readonly rows: LeadActivity[] = [];

  constructor(private readonly leads: InMemoryLeadRepository) {}

  async append(input: Omit<LeadActivity, 'id' | 'createdAt'> & { createdAt?: Date }): Promise<LeadActivity> {
    const activity: LeadActivity = { ...input, id: randomUUID(), createdAt: input.createdAt ?? new Date() };
    this.rows.push(activity);
    return activity;
  }

  async listByLead(tenantId: string, leadId: string, limit?: number): Promise<LeadActivity[]> {
    const rows = this.rows
      .filter((activity) => activity.tenantId === tenantId && activity.leadId === leadId)
      .sort(byCreatedAtDesc);
    return limit === undefined ? rows : rows.slice(0, limit);
  }

  async listRecent(filter: { tenantId: string; scope: LeadScope }, limit: number): Promise<LeadActivity[]> {
    return this.rows
      .filter((activity) => {
        const lead = this.leads.rows.get(activity.leadId);
        return activity.tenantId === filter.tenantId && lead !== undefined && inScope(lead, filter.scope);
      })
      .sort(byCreatedAtDesc)
      .slice(0, limit);
  }
}

export class InMemoryEmailConfigurationRepository implements EmailConfigurationRepository {
  readonly rows = new Map<string, EmailConfiguration>();

  async create(input: CreateInput<EmailConfiguration>): Promise<EmailConfiguration> {
    const config: EmailConfiguration = { ...input, ...stamp() };
    this.rows.set(config.id, config);
    return config;
  }

  async findById(tenantId: string, id: string): Promise<EmailConfiguration | null> {
    const config = this.rows.get(id);
    return config && config.tenantId === tenantId ? config : null;
  }

  async listByUser(tenantId: string, userId: string): Promise<EmailConfiguration[]> {
    return [...this.rows.values()]
      .filter((config) => config.tenantId === tenantId && config.userId === userId)
      .sort((a, b) => Number(b.isDefault) - Number(a.isDefault) || a.name.localeCompare(b.name));
  }

  async update(tenantId: string, id: string, patch: EmailConfigurationPatch): Promise<EmailConfiguration | null> {
    const current = await this.findById(tenantId, id);
    if (!current) {
      return null;
    }
    const next: EmailConfiguration = { ...current, ...patch, updatedAt: new Date() };
    this.rows.set(id, next);
    return next;
  }

  async markDefault(tenantId: string, userId: string, id: string): Promise<EmailConfiguration | null> {
    const target = this.rows.get(id);
    if (!target || target.tenantId !== tenantId || target.userId !== userId) {
      return null;
    }
    for (const config of this.rows.values()) {
      if (config.userId === userId && config.isDefault && config.id !== id) {
        this.rows.set(config.id, { ...config, isDefault: false });
      }
    }
    const next: EmailConfiguration = { ...target, isDefault: true, updatedAt: new Date() };
    this.rows.set(id, next);
    return next;
  }
}

export class InMemoryEmailTemplateRepository implements EmailTemplateRepository {
  readonly rows = new Map<string, EmailTemplate>();

  async create(input: CreateInput<EmailTemplate>): Promise<EmailTemplate> {
    const template: EmailTemplate = { ...input, ...stamp() };
    this.rows.set(template.id, template);
    return template;
  }

  async findById(tenantId: string, id: string): Promise<EmailTemplate | null> {
    const template = this.rows.get(id);
    return template && template.tenantId === tenantId ? template : null;
  }

  async listAccessible(tenantId: string, userId: string): Promise<EmailTemplate[]> {
    return [...this.rows.values()]
      .filter((template) => template.tenantId === tenantId && (template.userId === userId || template.isShared))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  async update(tenantId: string, id: string, patch: EmailTemplatePatch): Promise<EmailTemplate | null> {
    const current = await this.findById(tenantId, id);
    if (!current) {
      return null;
    }
    const next: EmailTemplate = { ...current, ...patch, updatedAt: new Date() };
    this.rows.set(id, next);
    return next;
  }

  async recordUsage(id: string, usedAt: Date): Promise<void> {
    const current = this.rows.get(id);
    if (current) {
      this.rows.set(id, { ...current, usageCount: current.usageCount + 1, lastUsedAt: usedAt });
    }
  }
}

export class InMemoryCampaignRepository implements CampaignRepository {
  readonly rows = new Map<string, EmailCampaign>();

  async create(input: CreateInput<EmailCampaign>): Promise<EmailCampaign> {
    const campaign: EmailCampaign = { ...input, ...stamp() };
    this.rows.set(campaign.id, campaign);
    return campaign;
  }

  async findById(tenantId: string, id: string): Promise<EmailCampaign | null> {
    const campaign = this.rows.get(id);
    return campaign && campaign.tenantId === tenantId ? campaign : null;
  }

  async list(
    filters: { tenantId: string; userId?: string; status?: CampaignStatus },
    pagination: Pagination
  ): Promise<PaginatedResult<EmailCampaign>> {
    const rows = [...this.rows.values()]
      .filter(
        (campaign) =>
          campaign.tenantId === filters.tenantId &&
          (!filters.userId || campaign.userId === filters.userId) &&
          (!filters.status || campaign.status === filters.status)
      )
      .sort(byCreatedAtDesc);
    return paginate(rows, pagination);
  }

  async update(id: string, patch: CampaignPatch): Promise<EmailCampaign | null> {
    const current = this.rows.get(id);
    if (!current) {
      return null;
    }
    const next: EmailCampaign = { ...current, ...patch, updatedAt: new Date() };
    this.rows.set(id, next);
    return next;
  }

  async incrementCounters(id: string, delta: { sent?: number; failed?: number }): Promise<void> {
    const current = this.rows.get(id);
    if (current) {
      this.rows.set(id, {
        ...current,
        emailsSent: current.emailsSent + (delta.sent ?? 0),
        emailsFailed: Math.max(current.emailsFailed + (delta.failed ?? 0), 0),
      });
    }
  }

  async listDueScheduled(now: Date): Promise<EmailCampaign[]> {
    return [...this.rows.values()].filter(
      (campaign) => campaign.status === 'scheduled' && campaign.scheduledAt !== null && campaign.scheduledAt <= now
    );
  }

  async listByStatus(status: CampaignStatus): Promise<EmailCampaign[]> {
    return [...this.rows.values()].filter((campaign) => campaign.status === status);
  }
}

const matchesEmailFilters = (email: Email, filters: EmailListFilters): boolean =>
  email.tenantId === filters.tenantId &&
  (!filters.userId || email.userId === filters.userId) &&
  (!filters.leadId || email.leadId === filters.leadId) &&
  (!filters.campaignId || email.campaignId === filters.campaignId) &&
  (!filters.templateId || email.templateId === filters.templateId) &&
  (!filters.status || email.status === filters.status) &&
  (!filters.createdFrom || email.createdAt >= filters.createdFrom) &&
  (!filters.createdTo || email.createdAt < filters.createdTo);

export class InMemoryEmailRepository implements EmailRepository {
  readonly rows = new Map<string, Email>();

  async create(input: NewEmail): Promise<Email> {
    const email: Email = { ...input, trackingId: input.trackingId ?? randomUUID(), ...stamp() };
    this.rows.set(email.id, email);
    return email;
  }

  async createForCampaign(input: NewEmail & { campaignId: string }): Promise<Email | null> {
    for (const email of this.rows.values()) {
      if (email.campaignId === input.campaignId && email.leadId === input.leadId) {
        return null;
      }
    }
    return this.create(input);
  }

  async findById(tenantId: string, id: string): Promise<Email | null> {
    const email = this.rows.get(id);
    return email && email.tenantId === tenantId ? email : null;
  }

  async findByTrackingId(trackingId: string): Promise<Email | null> {
    for (const email of this.rows.values()) {
      if (email.trackingId === trackingId) {
        return email;
      }
    }
    return null;
  }

  async update(id: string, patch: EmailPatch): Promise<Email | null> {
    const current = this.rows.get(id);
    if (!current) {
      return null;
    }
    const next: Email = { ...current, ...patch, updatedAt: new Date() };
    this.rows.set(id, next);
    return next;
  }

  async listLeadIdsForCampaign(campaignId: string): Promise<Set<string>> {
    return new Set([...this.rows.values()].filter((email) => email.campaignId === campaignId).map((email) => email.leadId));
  }

  async listQueuedForCampaign(campaignId: string, limit: number): Promise<Email[]> {
    return [...this.rows.values()]
      .filter((email) => email.campaignId === campaignId && email.status === 'queued')
      .sort(byCreatedAtAsc)
      .slice(0, limit);
  }

  async countQueuedForCampaign(campaignId: string): Promise<number> {
    return [...this.rows.values()].filter((email) => email.campaignId === campaignId && email.status === 'queued')
      .length;
  }

  async listRetryable(limit: number): Promise<Email[]> {
    return [...this.rows.values()]
      .filter((email) => email.status === 'failed' && email.retryCount < email.maxRetries)
      .sort(byCreatedAtAsc)
      .slice(0, limit);
  }

  async list(filters: EmailListFilters, pagination: Pagination): Promise<PaginatedResult<Email>> {
    const rows = [...this.rows.values()].filter((email) => matchesEmailFilters(email, filters)).sort(byCreatedAtDesc);
    return paginate(rows, pagination);
  }

  async countByStatus(filters: EmailListFilters): Promise<EmailStatusCounts> {
    const result = emptyStatusCounts();
    for (const email of this.rows.values()) {
      if (matchesEmailFilters(email, filters)) {
        result[email.status] += 1;
      }
    }
    return result;
  }
}

export class InMemoryEmailTrackingRepository implements EmailTrackingRepository {
  readonly rows: EmailTrackingEvent[] = [];

  async append(input: Omit<EmailTrackingEvent, 'id'>): Promise<EmailTrackingEvent> {
    const event: EmailTrackingEvent = { ...input, id: randomUUID() };
    this.rows.push(event);
    return event;
  }

  async listByEmail(emailId: string): Promise<EmailTrackingEvent[]> {
    return this.rows.filter((event) => event.emailId === emailId);
  }
}

export class InMemorySequenceRepository implements SequenceRepository {
  readonly rows = new Map<string, EmailSequence>();
  readonly steps = new Map<string, EmailSequenceStep>();

  async create(input: CreateInput<EmailSequence>): Promise<EmailSequence> {
    const sequence: EmailSequence = { ...input, ...stamp() };
    this.rows.set(sequence.id, sequence);
    return sequence;
  }

  async findById(tenantId: string, id: string): Promise<EmailSequence | null> {
    const sequence = this.rows.get(id);
    return sequence && sequence.tenantId === tenantId ? sequence : null;
  }

  async listByTenant(tenantId: string, filters: { userId?: string } = {}): Promise<EmailSequence[]> {
    return [...this.rows.values()]
      .filter((sequence) => sequence.tenantId === tenantId && (!filters.userId || sequence.userId === filters.userId))
      .sort(byCreatedAtDesc);
  }

  async update(tenantId: string, id: string, patch: SequencePatch): Promise<EmailSequence | null> {
    const current = await this.findById(tenantId, id);
    if (!current) {
      return null;
    }
    const next: EmailSequence = { ...current, ...patch, updatedAt: new Date() };
    this.rows.set(id, next);
    return next;
  }

  async listTriggered(tenantId: string, trigger: SequenceTrigger): Promise<EmailSequence[]> {
    return [...this.rows.values()].filter((sequence) => {
      if (sequence.tenantId !== tenantId || !sequence.isActive) {
        return false;
      }
      switch (trigger.kind) {
        case 'lead_created':
          return sequence.triggerOnLeadCreation;
        case 'status_changed':
          return sequence.triggerOnStatusChange.includes(trigger.status);
        case 'priority_changed':
          return sequence.triggerOnPriorityChange.includes(trigger.priority);
      }
    });
  }

  async addStep(input: CreateInput<EmailSequenceStep>): Promise<EmailSequenceStep> {
    const step: EmailSequenceStep = { ...input, ...stamp() };
    this.steps.set(step.id, step);
    return step;
  }

  async listSteps(sequenceId: string): Promise<EmailSequenceStep[]> {
    return [...this.steps.values()]
      .filter((step) => step.sequenceId === sequenceId)
      .sort((a, b) => a.stepNumber - b.stepNumber);
  }

  async findActiveStep(sequenceId: string, stepNumber: number): Promise<EmailSequenceStep | null> {
    for (const step of this.steps.values()) {
      if (step.sequenceId === sequenceId && step.stepNumber === stepNumber && step.isActive) {
        return step;
      }
    }
    return null;
  }
}

export class InMemoryEnrollmentRepository implements EnrollmentRepository {
  readonly rows = new Map<string, EmailSequenceEnrollment>();

  async findOrCreate(input: {
    tenantId: string;
    sequenceId: string;
    leadId: string;
    enrolledAt: Date;
  }): Promise<{ enrollment: EmailSequenceEnrollment; created: boolean }> {
    for (const enrollment of this.rows.values()) {
      if (enrollment.sequenceId === input.sequenceId && enrollment.leadId === input.leadId) {
        return { enrollment, created: false };
      }
    }
    const enrollment: EmailSequenceEnrollment = {
      ...stamp(),
      tenantId: input.tenantId,
      sequenceId: input.sequenceId,
      leadId: input.leadId,
      currentStep: 0,
      isActive: true,
      emailsSent: 0,
      lastEmailSentAt: null,
      hasReplied: false,
      enrolledAt: input.enrolledAt,
      completedAt: null,
    };
    this.rows.set(enrollment.id, enrollment);
    return { enrollment, created: true };
  }

  async findById(id: string): Promise<EmailSequenceEnrollment | null> {
    return this.rows.get(id) ?? null;
  }

  async update(id: string, patch: EnrollmentPatch): Promise<EmailSequenceEnrollment | null> {
    const current = this.rows.get(id);
    if (!current) {
      return null;
    }
    const next: EmailSequenceEnrollment = { ...current, ...patch, updatedAt: new Date() };
    this.rows.set(id, next);
    return next;
  }

  async listActive(): Promise<EmailSequenceEnrollment[]> {
    return [...this.rows.values()].filter((enrollment) => enrollment.isActive);
  }

  async listActiveForLead(tenantId: string, leadId: string): Promise<EmailSequenceEnrollment[]> {
    return [...this.rows.values()].filter(
      (enrollment) => enrollment.tenantId === tenantId && enrollment.leadId === leadId && enrollment.isActive
    );
  }

  async listBySequence(sequenceId: string): Promise<EmailSequenceEnrollment[]> {
    return [...this.rows.values()].filter((enrollment) => enrollment.sequenceId === sequenceId);
  }
}

export class InMemoryKpiTargetRepository implements KpiTargetRepository {
  readonly rows = new Map<string, KpiTarget>();

  async create(input: CreateInput<KpiTarget>): Promise<KpiTarget> {
    const target: KpiTarget = { ...input, ...stamp() };
    this.rows.set(target.id, target);
    return target;
  }

  async findById(tenantId: string, id: string): Promise<KpiTarget | null> {
    const target = this.rows.get(id);
    return target && target.tenantId === tenantId ? target : null;
  }

  async update(tenantId: string, id: string, patch: KpiTargetPatch): Promise<KpiTarget | null> {
    const current = await this.findById(tenantId, id);
    if (!current) {
      return null;
    }
    const next: KpiTarget = { ...current, ...patch, updatedAt: new Date() };
    this.rows.set(id, next);
    return next;
  }

  async listForUser(tenantId: string, userId: string, options: { activeOn?: Date } = {}): Promise<KpiTarget[]> {
    const { activeOn } = options;
    return [...this.rows.values()].filter(
      (target) =>
        target.tenantId === tenantId &&
        target.userId === userId &&
        (!activeOn || (target.isActive && target.periodStart <= activeOn && target.periodEnd >= activeOn))
    );
  }

  async incrementActive(tenantId: string, userId: string, kpiType: KpiType, amount: number, at: Date): Promise<number> {
    let moved = 0;
    for (const target of this.rows.values()) {
      if (
        target.tenantId === tenantId &&
        target.userId === userId &&
        target.kpiType === kpiType &&
        target.isActive &&
        target.periodStart <= at &&
        target.periodEnd >= at
      ) {
        this.rows.set(target.id, { ...target, currentValue: target.currentValue + amount });
        moved += 1;
      }
    }
    return moved;
  }
}

export interface InMemoryStorage extends StorageRepositories {
  users: InMemoryUserRepository;
  leads: InMemoryLeadRepository;
  leadSources: InMemoryLeadSourceRepository;
  activities: InMemoryLeadActivityRepository;
  emailConfigurations: InMemoryEmailConfigurationRepository;
  emailTemplates: InMemoryEmailTemplateRepository;
  campaigns: InMemoryCampaignRepository;
  emails: InMemoryEmailRepository;
  tracking: InMemoryEmailTrackingRepository;
  sequences: InMemorySequenceRepository;
  enrollments: InMemoryEnrollmentRepository;
  kpiTargets: InMemoryKpiTargetRepository;
}

export const createInMemoryStorage = (): InMemoryStorage => {
  const leads = new InMemoryLeadRepository();
  return {
    users: new InMemoryUserRepository(),
    leads,
    leadSources: new InMemoryLeadSourceRepository(),
    activities: new InMemoryLeadActivityRepository(leads),
    emailConfigurations: new InMemoryEmailConfigurationRepository(),
    emailTemplates: new InMemoryEmailTemplateRepository(),
    campaigns: new InMemoryCampaignRepository(),
    emails: new InMemoryEmailRepository(),
    tracking: new InMemoryEmailTrackingRepository(),
    sequences: new InMemorySequenceRepository(),
    enrollments: new InMemoryEnrollmentRepository(),
    kpiTargets: new InMemoryKpiTargetRepository(),
  };
};

// ============================================================================
// Seed helpers
// ============================================================================

export const TEST_TENANT_ID = 'tenant-1';

export const seedUser = (storage: InMemoryStorage, overrides: Partial<User> = {}): User => {
  const user: User = {
    ...stamp(),
    tenantId: TEST_TENANT_ID,
    email: 'sam@example.com',
    firstName: 'Sam',
    lastName: 'Rep',
    role: 'sales_rep',
    department: 'north',
    isActive: true,
    ...overrides,
  };
  storage.users.rows.set(user.id, user);
  return user;
};

export const seedLead = (storage: InMemoryStorage, overrides: Partial<Lead> = {}): Lead => {
  const lead: Lead = {
    ...stamp(),
    tenantId: TEST_TENANT_ID,
    firstName: 'Ann',
    lastName: 'Lee',
    email: 'ann@example.com',
    phone: null,
    company: 'Acme Corp',
    jobTitle: null,
    sourceId: null,
    status: 'new',
    priority: 'warm',
    assignedToId: null,
    createdById: randomUUID(),
    address: null,
    city: null,
    state: null,
    country: null,
    postalCode: null,
    budget: null,
    requirements: null,
    notes: null,
    lastContactedAt: null,
    ...overrides,
  };
  storage.leads.rows.set(lead.id, lead);
  return lead;
};

export const seedEmailConfiguration = (
  storage: InMemoryStorage,
  overrides: Partial<EmailConfiguration> & Pick<EmailConfiguration, 'userId'>
): EmailConfiguration => {
  const config: EmailConfiguration = {
    ...stamp(),
    tenantId: TEST_TENANT_ID,
    name: 'Primary',
    provider: 'smtp',
    smtpHost: 'smtp.example.com',
    smtpPort: DEFAULT_SMTP_PORT,
    smtpUsername: 'mailer',
    smtpPassword: 'test-secret',
    useTls: true,
    useSsl: false,
    fromEmail: 'sales@example.com',
    fromName: 'Sales Team',
    replyTo: null,
    isActive: true,
    isDefault: false,
    dailyLimit: DEFAULT_DAILY_LIMIT,
    ...overrides,
  };
  storage.emailConfigurations.rows.set(config.id, config);
  return config;
};

export const seedTemplate = (
  storage: InMemoryStorage,
  overrides: Partial<EmailTemplate> & Pick<EmailTemplate, 'userId'>
): EmailTemplate => {
  const template: EmailTemplate = {
    ...stamp(),
    tenantId: TEST_TENANT_ID,
    name: 'Intro',
    templateType: 'custom',
    subject: 'Hello {{first_name}}',
    bodyHtml: '<p>Hi {{first_name}}</p>',
    bodyText: null,
    isActive: true,
    isShared: false,
    usageCount: 0,
    lastUsedAt: null,
    ...overrides,
  };
  storage.emailTemplates.rows.set(template.id, template);
  return template;
};

export const seedEmail = (storage: InMemoryStorage, overrides: Partial<Email> & Pick<Email, 'userId' | 'leadId'>): Email => {
  const email: Email = {
    ...stamp(),
    tenantId: TEST_TENANT_ID,
    trackingId: randomUUID(),
    campaignId: null,
    templateId: null,
    subject: 'Hello',
    bodyHtml: '<p>Hello</p>',
    bodyText: 'Hello',
    fromEmail: 'sales@example.com',
    fromName: 'Sales Team',
    toEmail: 'ann@example.com',
    toName: 'Ann Lee',
    replyTo: null,
    status: 'queued',
    externalId: null,
    sentAt: null,
    deliveredAt: null,
    openedAt: null,
    clickedAt: null,
    repliedAt: null,
    openCount: 0,
    clickCount: 0,
    errorMessage: null,
    retryCount: 0,
    maxRetries: DEFAULT_MAX_RETRIES,
    ...overrides,
  };
  storage.emails.rows.set(email.id, email);
  return email;
};

export const seedCampaign = (
  storage: InMemoryStorage,
  overrides: Partial<EmailCampaign> & Pick<EmailCampaign, 'userId' | 'templateId' | 'emailConfigId'>
): EmailCampaign => {
  const campaign: EmailCampaign = {
    ...stamp(),
    tenantId: TEST_TENANT_ID,
    name: 'Spring promo',
    description: null,
    status: 'draft',
    scheduledAt: null,
    sendNow: false,
    batchSize: DEFAULT_BATCH_SIZE,
    delayBetweenBatches: DEFAULT_DELAY_BETWEEN_BATCHES_SECONDS,
    totalRecipients: 0,
    emailsSent: 0,
    emailsFailed: 0,
    startedAt: null,
    completedAt: null,
    targetAllLeads: true,
    targetStatuses: [],
    targetPriorities: [],
    targetSourceIds: [],
    specificLeadIds: [],
    ...overrides,
  };
  storage.campaigns.rows.set(campaign.id, campaign);
  return campaign;
};

export const seedSequence = (
  storage: InMemoryStorage,
  overrides: Partial<EmailSequence> & Pick<EmailSequence, 'userId'>
): EmailSequence => {
  const sequence: EmailSequence = {
    ...stamp(),
    tenantId: TEST_TENANT_ID,
    name: 'Onboarding',
    description: null,
    isActive: true,
    triggerOnLeadCreation: false,
    triggerOnStatusChange: [],
    triggerOnPriorityChange: [],
    delayStartDays: 0,
    ...overrides,
  };
  storage.sequences.rows.set(sequence.id, sequence);
  return sequence;
};

export const seedSequenceStep = (
  storage: InMemoryStorage,
  overrides: Partial<EmailSequenceStep> & Pick<EmailSequenceStep, 'sequenceId' | 'templateId' | 'stepNumber'>
): EmailSequenceStep => {
  const step: EmailSequenceStep = {
    ...stamp(),
    tenantId: TEST_TENANT_ID,
    delayDays: 0,
    sendOnlyIfNotReplied: true,
    sendOnlyIfStatus: [],
    isActive: true,
    ...overrides,
  };
  storage.sequences.steps.set(step.id, step);
  return step;
};
