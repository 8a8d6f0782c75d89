import {
  ForbiddenError,
  LEAD_PRIORITY_LABELS,
  LEAD_STATUS_LABELS,
  NotFoundError,
  ValidationError,
  getUserFullName,
  isAdminRole,
  type Actor,
  type Lead,
  type LeadActivity,
  type LeadSource,
  type PaginatedResult,
} from '@salesdesk/core';
import type { LeadPatch, StorageRepositories } from '@salesdesk/storage';

import { logger as defaultLogger, type Logger } from '../../config/logger';
import { recordLeadActivity } from './lead-activity-recorder';
import type { LeadEventBus } from './lead-event-bus';
import { canEditLead, isLeadInScope, resolveLeadScope } from './lead-scope';
import type {
  CreateLeadInput,
  CreateLeadSourceInput,
  ListLeadsQuery,
  LogActivityInput,
  UpdateLeadInput,
} from './lead.validators';

export interface LeadServiceDependencies {
  repositories: Pick<StorageRepositories, 'leads' | 'leadSources' | 'activities' | 'users'>;
  events: LeadEventBus;
  logger?: Logger;
  now?: () => Date;
}

export interface LeadServicePort {
  createLead(actor: Actor, input: CreateLeadInput): Promise<Lead>;
  updateLead(actor: Actor, leadId: string, input: UpdateLeadInput): Promise<Lead>;
  getLead(actor: Actor, leadId: string): Promise<Lead>;
  listLeads(actor: Actor, query: ListLeadsQuery): Promise<PaginatedResult<Lead>>;
  logActivity(actor: Actor, leadId: string, input: LogActivityInput): Promise<LeadActivity>;
  listActivities(actor: Actor, leadId: string): Promise<LeadActivity[]>;
  listSources(actor: Actor): Promise<LeadSource[]>;
  createSource(actor: Actor, input: CreateLeadSourceInput): Promise<LeadSource>;
}

export class LeadService implements LeadServicePort {
  private readonly repositories: LeadServiceDependencies['repositories'];
  private readonly events: LeadEventBus;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: LeadServiceDependencies) {
    this.repositories = deps.repositories;
    this.events = deps.events;
    this.logger = deps.logger ?? defaultLogger;
    this.now = deps.now ?? (() => new Date());
  }

  async createLead(actor: Actor, input: CreateLeadInput): Promise<Lead> {
    const assignedToId = input.assignedToId ?? actor.id;
    await this.assertAssignee(actor.tenantId, assignedToId);
    await this.assertSource(actor.tenantId, input.sourceId ?? null);

    const lead = await this.repositories.leads.create({
      tenantId: actor.tenantId,
      firstName: input.firstName,
      lastName: input.lastName,
      email: input.email,
      phone: input.phone,
      company: input.company,
      jobTitle: input.jobTitle,
      sourceId: input.sourceId ?? null,
      status: input.status,
      priority: input.priority,
      assignedToId,
      createdById: actor.id,
      address: input.address,
      city: input.city,
      state: input.state,
      country: input.country,
      postalCode: input.postalCode,
      budget: input.budget ?? null,
      requirements: input.requirements,
      notes: input.notes,
      lastContactedAt: null,
    });

    const actorName = await this.describeUser(actor.id);
    await this.repositories.activities.append({
      tenantId: lead.tenantId,
      leadId: lead.id,
      userId: actor.id,
      type: 'note',
      subject: 'Lead Created',
      description: `New lead created by ${actorName}`,
      createdAt: this.now(),
    });

    this.logger.info('[leads] lead created', { tenantId: lead.tenantId, leadId: lead.id, assignedToId });
    await this.events.publish('lead.created', { lead, actorId: actor.id });

    return lead;
  }

  async updateLead(actor: Actor, leadId: string, input: UpdateLeadInput): Promise<Lead> {
    const existing = await this.getLead(actor, leadId);
    await this.assertCanEdit(actor, existing);

    const patch: LeadPatch = { ...input };
    if (input.assignedToId !== undefined && input.assignedToId !== null) {
      await this.assertAssignee(actor.tenantId, input.assignedToId);
    }
    if (input.sourceId !== undefined) {
      await this.assertSource(actor.tenantId, input.sourceId);
    }

    const updated = await this.repositories.leads.update(actor.tenantId, leadId, patch);
    if (!updated) {
      throw new NotFoundError('Lead', leadId);
    }

    const actorName = await this.describeUser(actor.id);
    const at = this.now();

    if (existing.status !== updated.status) {
      await this.repositories.activities.append({
        tenantId: updated.tenantId,
        leadId: updated.id,
        userId: actor.id,
        type: 'status_change',
        subject: `Status changed to ${LEAD_STATUS_LABELS[updated.status]}`,
        description: `Status updated by ${actorName}`,
        createdAt: at,
      });
      await this.events.publish('lead.status_changed', {
        lead: updated,
        previousStatus: existing.status,
        actorId: actor.id,
      });
    }

    if (existing.priority !== updated.priority) {
      await this.repositories.activities.append({
        tenantId: updated.tenantId,
        leadId: updated.id,
        userId: actor.id,
        type: 'note',
        subject: `Priority changed to ${LEAD_PRIORITY_LABELS[updated.priority]}`,
        description: `Priority updated by ${actorName}`,
        createdAt: at,
      });
      await this.events.publish('lead.priority_changed', {
        lead: updated,
        previousPriority: existing.priority,
        actorId: actor.id,
      });
    }

    if (existing.assignedToId !== updated.assignedToId) {
      const assigneeName = updated.assignedToId ? await this.describeUser(updated.assignedToId) : 'Unassigned';
      await this.repositories.activities.append({
        tenantId: updated.tenantId,
        leadId: updated.id,
        userId: actor.id,
        type: 'assignment',
        subject: `Lead assigned to ${assigneeName}`,
        description: `Assignment updated by ${actorName}`,
        createdAt: at,
      });
      await this.events.publish('lead.assigned', {
        lead: updated,
        previousAssigneeId: existing.assignedToId,
        actorId: actor.id,
      });
    }

    this.logger.info('[leads] lead updated', { tenantId: updated.tenantId, leadId: updated.id });
    return updated;
  }

  async getLead(actor: Actor, leadId: string): Promise<Lead> {
    const lead = await this.repositories.leads.findById(actor.tenantId, leadId);
    if (!lead) {
      throw new NotFoundError('Lead', leadId);
    }

    const scope = await resolveLeadScope(actor, this.repositories.users);
    if (!isLeadInScope(lead, scope)) {
      throw new NotFoundError('Lead', leadId);
    }

    return lead;
  }

  async listLeads(actor: Actor, query: ListLeadsQuery): Promise<PaginatedResult<Lead>> {
    const scope = await resolveLeadScope(actor, this.repositories.users);
    return this.repositories.leads.list(
      {
        tenantId: actor.tenantId,
        scope,
        search: query.search,
        statuses: query.status,
        priorities: query.priority,
        sourceId: query.sourceId,
        assignedToId: query.assignedToId,
      },
      { page: query.page, limit: query.limit }
    );
  }

  async logActivity(actor: Actor, leadId: string, input: LogActivityInput): Promise<LeadActivity> {
    const lead = await this.getLead(actor, leadId);
    await this.assertCanEdit(actor, lead);

    const { activity } = await recordLeadActivity(
      { leads: this.repositories.leads, activities: this.repositories.activities, events: this.events },
      lead,
      { userId: actor.id, type: input.type, subject: input.subject, description: input.description },
      this.now()
    );

    return activity;
  }

  async listActivities(actor: Actor, leadId: string): Promise<LeadActivity[]> {
    const lead = await this.getLead(actor, leadId);
    return this.repositories.activities.listByLead(actor.tenantId, lead.id);
  }

  async listSources(actor: Actor): Promise<LeadSource[]> {
    return this.repositories.leadSources.list(actor.tenantId);
  }

  async createSource(actor: Actor, input: CreateLeadSourceInput): Promise<LeadSource> {
    if (!isAdminRole(actor.role) && actor.role !== 'sales_manager') {
      throw new ForbiddenError('Only admins and sales managers can manage lead sources');
    }

    const source = await this.repositories.leadSources.create({
      tenantId: actor.tenantId,
      name: input.name,
      description: input.description,
      isActive: input.isActive,
    });

    this.logger.info('[leads] lead source created', { tenantId: source.tenantId, sourceId: source.id });
    return source;
  }

  private async assertCanEdit(actor: Actor, lead: Lead): Promise<void> {
    const assignee = lead.assignedToId ? await this.repositories.users.findById(lead.assignedToId) : null;
    if (!canEditLead(actor, lead, assignee)) {
      throw new ForbiddenError('You do not have permission to modify this lead');
    }
  }

  private async assertAssignee(tenantId: string, userId: string): Promise<void> {
    const user = await this.repositories.users.findById(userId);
    if (!user || user.tenantId !== tenantId || !user.isActive) {
      throw new ValidationError('Assigned user not found', { assignedToId: userId });
    }
  }

  private async assertSource(tenantId: string, sourceId: string | null): Promise<void> {
    if (sourceId === null) {
      return;
    }
    const source = await this.repositories.leadSources.findById(tenantId, sourceId);
    if (!source) {
      throw new ValidationError('Lead source not found', { sourceId });
    }
  }

  private async describeUser(userId: string): Promise<string> {
    const user = await this.repositories.users.findById(userId);
    return user ? getUserFullName(user) : 'Unknown user';
  }
}
