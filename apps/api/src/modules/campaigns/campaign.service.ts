import { format } from 'date-fns';
import {
  ConflictError,
  DEFAULT_BATCH_SIZE,
  DEFAULT_DELAY_BETWEEN_BATCHES_SECONDS,
  DEFAULT_MAX_RETRIES,
  NotFoundError,
  TERMINAL_CAMPAIGN_STATUSES,
  ValidationError,
  assertCampaignTransition,
  getLeadFullName,
  percentage,
  renderTemplate,
  summarizeEmailTotals,
  type Actor,
  type CampaignTargeting,
  type Email,
  type EmailCampaign,
  type EmailConfiguration,
  type EmailDeliverySummary,
  type EmailStatus,
  type EmailTemplate,
  type Lead,
  type PaginatedResult,
} from '@salesdesk/core';
import type { StorageRepositories } from '@salesdesk/storage';

import { logger as defaultLogger, type Logger } from '../../config/logger';
import type { EmailDeliveryServicePort } from '../email-delivery/email-delivery.service';
import { resolveSendingConfiguration } from '../email-config/sending-configuration';
import type { BulkEmailInput, CreateCampaignInput, ListCampaignsQuery } from './campaign.validators';

export interface BatchResult {
  sent: number;
  failed: number;
}

export interface CampaignStats extends EmailDeliverySummary {
  totalRecipients: number;
  progress: number;
}

export interface CampaignProcessingSummary {
  started: number;
  processed: number;
  sent: number;
  failed: number;
}

export interface CampaignServiceDependencies {
  repositories: Pick<
    StorageRepositories,
    'campaigns' | 'emails' | 'leads' | 'emailTemplates' | 'emailConfigurations' | 'users'
  >;
  delivery: EmailDeliveryServicePort;
  logger?: Logger;
  now?: () => Date;
}

export interface CampaignServicePort {
  listCampaigns(actor: Actor, query: ListCampaignsQuery): Promise<PaginatedResult<EmailCampaign>>;
  getCampaign(actor: Actor, id: string): Promise<EmailCampaign>;
  createCampaign(actor: Actor, input: CreateCampaignInput): Promise<EmailCampaign>;
  startCampaign(actor: Actor, id: string): Promise<EmailCampaign>;
  pauseCampaign(actor: Actor, id: string): Promise<EmailCampaign>;
  resumeCampaign(actor: Actor, id: string): Promise<EmailCampaign>;
  cancelCampaign(actor: Actor, id: string): Promise<EmailCampaign>;
  getCampaignStats(actor: Actor, id: string): Promise<CampaignStats>;
  sendBulkEmail(actor: Actor, input: BulkEmailInput): Promise<EmailCampaign>;
}

const targetingOf = (campaign: CampaignTargeting): CampaignTargeting => ({
  targetAllLeads: campaign.targetAllLeads,
  targetStatuses: campaign.targetStatuses,
  targetPriorities: campaign.targetPriorities,
  targetSourceIds: campaign.targetSourceIds,
  specificLeadIds: campaign.specificLeadIds,
});

const describeFailure = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Resolves a campaign audience once, materializes one queued email per
 * recipient and drains the queue in bounded batches. Pacing between batches
 * belongs to the caller.
 */
export class CampaignService implements CampaignServicePort {
  private readonly repositories: CampaignServiceDependencies['repositories'];
  private readonly delivery: EmailDeliveryServicePort;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: CampaignServiceDependencies) {
    this.repositories = deps.repositories;
    this.delivery = deps.delivery;
    this.logger = deps.logger ?? defaultLogger;
    this.now = deps.now ?? (() => new Date());
  }

  async listCampaigns(actor: Actor, query: ListCampaignsQuery): Promise<PaginatedResult<EmailCampaign>> {
    return this.repositories.campaigns.list(
      { tenantId: actor.tenantId, userId: actor.id, status: query.status },
      { page: query.page, limit: query.limit }
    );
  }

  async getCampaign(actor: Actor, id: string): Promise<EmailCampaign> {
    const campaign = await this.repositories.campaigns.findById(actor.tenantId, id);
    if (!campaign || campaign.userId !== actor.id) {
      throw new NotFoundError('EmailCampaign', id);
    }
    return campaign;
  }

  async createCampaign(actor: Actor, input: CreateCampaignInput): Promise<EmailCampaign> {
    await this.requireTemplate(actor, input.templateId);
    await this.requireConfiguration(actor, input.emailConfigId);

    const scheduledAt = input.sendNow ? null : input.scheduledAt;
    if (scheduledAt && scheduledAt <= this.now()) {
      throw new ValidationError('Scheduled time must be in the future', { scheduledAt });
    }

    const targeting = targetingOf(input);
    const recipients = await this.resolveTargets({ tenantId: actor.tenantId, ...targeting });

    const campaign = await this.repositories.campaigns.create({
      tenantId: actor.tenantId,
      userId: actor.id,
      name: input.name,
      description: input.description,
      templateId: input.templateId,
      emailConfigId: input.emailConfigId,
      status: scheduledAt ? 'scheduled' : 'draft',
      scheduledAt,
      sendNow: input.sendNow,
      batchSize: input.batchSize,
      delayBetweenBatches: input.delayBetweenBatches,
      totalRecipients: recipients.length,
      emailsSent: 0,
      emailsFailed: 0,
      startedAt: null,
      completedAt: null,
      ...targeting,
    });

    const materialized = await this.materialize(campaign, recipients);
    this.logger.info('[campaigns] campaign created', {
      campaignId: campaign.id,
      userId: actor.id,
      status: campaign.status,
      totalRecipients: recipients.length,
      materialized,
    });

    if (input.sendNow) {
      return this.launch(campaign);
    }
    return campaign;
  }

  /** Every lead of the tenant matching any targeting predicate, each once, none without an email. */
  async resolveTargets(campaign: CampaignTargeting & Pick<EmailCampaign, 'tenantId'>): Promise<Lead[]> {
    const leads = await this.repositories.leads.findCampaignTargets(campaign.tenantId, targetingOf(campaign));

    const seen = new Set<string>();
    return leads.filter((lead) => {
      if (seen.has(lead.id) || !lead.email.trim()) {
        return false;
      }
      seen.add(lead.id);
      return true;
    });
  }

  /**
   * Creates the queued email of every recipient that has none for this
   * campaign yet. Returns how many rows were created.
   */
  async materialize(campaign: EmailCampaign, recipients?: Lead[]): Promise<number> {
    const template = await this.repositories.emailTemplates.findById(campaign.tenantId, campaign.templateId);
    if (!template) {
      throw new NotFoundError('EmailTemplate', campaign.templateId);
    }
    const config = await this.repositories.emailConfigurations.findById(campaign.tenantId, campaign.emailConfigId);
    if (!config) {
      throw new NotFoundError('EmailConfiguration', campaign.emailConfigId);
    }
    const owner = await this.repositories.users.findById(campaign.userId);
    if (!owner) {
      throw new NotFoundError('User', campaign.userId);
    }

    const leads = recipients ?? (await this.resolveTargets(campaign));
    const existing = await this.repositories.emails.listLeadIdsForCampaign(campaign.id);
    const now = this.now();

    let created = 0;
    for (const lead of leads) {
      if (existing.has(lead.id)) {
        continue;
      }

      const rendered = renderTemplate(template, lead, owner, now);
      const email = await this.repositories.emails.createForCampaign({
        tenantId: campaign.tenantId,
        userId: campaign.userId,
        leadId: lead.id,
        campaignId: campaign.id,
        templateId: template.id,
        subject: rendered.subject,
        bodyHtml: rendered.htmlBody,
        bodyText: rendered.textBody,
        fromEmail: config.fromEmail,
        fromName: config.fromName,
        toEmail: lead.email,
        toName: getLeadFullName(lead),
        replyTo: config.replyTo,
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
      });
      if (email) {
        created += 1;
        existing.add(lead.id);
      }
    }

    if (created > 0) {
      await this.repositories.emailTemplates.recordUsage(template.id, now);
    }
    return created;
  }

  /**
   * Delivers up to `batchSize` queued emails of a `sending` campaign. Once
   * nothing is left queued the campaign is marked `sent`.
   */
  async sendBatch(campaign: EmailCampaign, batchSize?: number): Promise<BatchResult> {
    if (campaign.status !== 'sending') {
      throw new ConflictError('Campaign is not sending', { campaignId: campaign.id, status: campaign.status });
    }

    const queued = await this.repositories.emails.listQueuedForCampaign(campaign.id, batchSize ?? campaign.batchSize);
    if (queued.length === 0) {
      await this.complete(campaign);
      return { sent: 0, failed: 0 };
    }

    const config = await this.repositories.emailConfigurations.findById(campaign.tenantId, campaign.emailConfigId);
    if (!config || !config.isActive) {
      this.logger.warn('[campaigns] no usable email configuration, batch skipped', {
        campaignId: campaign.id,
        emailConfigId: campaign.emailConfigId,
      });
      return { sent: 0, failed: 0 };
    }

    const result: BatchResult = { sent: 0, failed: 0 };
    for (const email of queued) {
      try {
        const outcome = await this.delivery.deliver(email, config, 'campaign');
        if (outcome.ok) {
          result.sent += 1;
        } else {
          result.failed += 1;
        }
      } catch (error) {
        this.logger.error('[campaigns] email delivery crashed', {
          campaignId: campaign.id,
          emailId: email.id,
          error: describeFailure(error),
        });
        if ((await this.markCrashed(email, describeFailure(error))) === 'sent') {
          result.sent += 1;
        } else {
          result.failed += 1;
        }
      }
    }

    await this.repositories.campaigns.incrementCounters(campaign.id, result);
    this.logger.info('[campaigns] batch processed', { campaignId: campaign.id, ...result });

    if ((await this.repositories.emails.countQueuedForCampaign(campaign.id)) === 0) {
      await this.complete(campaign);
    }

    return result;
  }

  async startCampaign(actor: Actor, id: string): Promise<EmailCampaign> {
    const campaign = await this.getCampaign(actor, id);
    if (campaign.status !== 'draft' && campaign.status !== 'scheduled') {
      throw new ConflictError('Only draft or scheduled campaigns can be started', { status: campaign.status });
    }
    return this.launch(campaign);
  }

  async pauseCampaign(actor: Actor, id: string): Promise<EmailCampaign> {
    const campaign = await this.getCampaign(actor, id);
    assertCampaignTransition(campaign.status, 'paused');
    return this.setStatus(campaign, { status: 'paused' });
  }

  async resumeCampaign(actor: Actor, id: string): Promise<EmailCampaign> {
    const campaign = await this.getCampaign(actor, id);
    if (campaign.status !== 'paused') {
      throw new ConflictError('Only paused campaigns can be resumed', { status: campaign.status });
    }
    return this.setStatus(campaign, { status: 'sending' });
  }

  async cancelCampaign(actor: Actor, id: string): Promise<EmailCampaign> {
    const campaign = await this.getCampaign(actor, id);
    if (TERMINAL_CAMPAIGN_STATUSES.has(campaign.status)) {
      throw new ConflictError(`Campaign is already ${campaign.status}`, { status: campaign.status });
    }
    return this.setStatus(campaign, { status: 'cancelled', completedAt: this.now() });
  }

  async getCampaignStats(actor: Actor, id: string): Promise<CampaignStats> {
    const campaign = await this.getCampaign(actor, id);
    const totals = await this.repositories.emails.countByStatus({ tenantId: campaign.tenantId, campaignId: campaign.id });
    const summary = summarizeEmailTotals(totals);

    return {
      ...summary,
      totalRecipients: campaign.totalRecipients,
      progress: percentage(summary.totalSent, campaign.totalRecipients),
    };
  }

  /** Wraps an explicit lead list into a campaign that sends now or at `scheduledAt`. */
  async sendBulkEmail(actor: Actor, input: BulkEmailInput): Promise<EmailCampaign> {
    const template = await this.requireTemplate(actor, input.templateId);
    const config = input.emailConfigId
      ? await this.requireConfiguration(actor, input.emailConfigId)
      : await resolveSendingConfiguration(this.repositories.emailConfigurations, actor.tenantId, actor.id);
    if (!config) {
      throw new ValidationError('No email configuration available');
    }

    const now = this.now();
    const scheduledAt = input.scheduledAt ?? null;
    if (scheduledAt && scheduledAt <= now) {
      throw new ValidationError('Scheduled time must be in the future', { scheduledAt });
    }

    const targeting: CampaignTargeting = {
      targetAllLeads: false,
      targetStatuses: [],
      targetPriorities: [],
      targetSourceIds: [],
      specificLeadIds: [...new Set(input.leadIds)],
    };
    const recipients = await this.resolveTargets({ tenantId: actor.tenantId, ...targeting });

    const campaign = await this.repositories.campaigns.create({
      tenantId: actor.tenantId,
      userId: actor.id,
      name: `Bulk Email - ${format(now, 'yyyy-MM-dd HH:mm')}`,
      description: null,
      templateId: template.id,
      emailConfigId: config.id,
      status: scheduledAt ? 'scheduled' : 'draft',
      scheduledAt,
      sendNow: !scheduledAt,
      batchSize: DEFAULT_BATCH_SIZE,
      delayBetweenBatches: DEFAULT_DELAY_BETWEEN_BATCHES_SECONDS,
      totalRecipients: recipients.length,
      emailsSent: 0,
      emailsFailed: 0,
      startedAt: null,
      completedAt: null,
      ...targeting,
    });

    await this.materialize(campaign, recipients);
    this.logger.info('[campaigns] bulk email created', { campaignId: campaign.id, recipients: recipients.length });

    return scheduledAt ? campaign : this.launch(campaign);
  }

  /** Scheduler entry point: starts due campaigns, then sends one batch of every sending campaign. */
  async processDueCampaigns(): Promise<CampaignProcessingSummary> {
    const summary: CampaignProcessingSummary = { started: 0, processed: 0, sent: 0, failed: 0 };

    for (const campaign of await this.repositories.campaigns.listDueScheduled(this.now())) {
      try {
        await this.setStatus(campaign, { status: 'sending', startedAt: this.now() });
        summary.started += 1;
      } catch (error) {
        this.logger.error('[campaigns] failed to start scheduled campaign', {
          campaignId: campaign.id,
          error: describeFailure(error),
        });
      }
    }

    for (const campaign of await this.repositories.campaigns.listByStatus('sending')) {
      try {
        const result = await this.sendBatch(campaign);
        summary.processed += 1;
        summary.sent += result.sent;
        summary.failed += result.failed;
      } catch (error) {
        this.logger.error('[campaigns] failed to process campaign batch', {
          campaignId: campaign.id,
          error: describeFailure(error),
        });
      }
    }

    return summary;
  }

  private async launch(campaign: EmailCampaign): Promise<EmailCampaign> {
    const sending = await this.setStatus(campaign, { status: 'sending', startedAt: this.now() });
    const result = await this.sendBatch(sending);
    this.logger.info('[campaigns] campaign started', { campaignId: campaign.id, ...result });

    return (await this.repositories.campaigns.findById(campaign.tenantId, campaign.id)) ?? sending;
  }

  private async complete(campaign: EmailCampaign): Promise<void> {
    assertCampaignTransition(campaign.status, 'sent');
    await this.repositories.campaigns.update(campaign.id, { status: 'sent', completedAt: this.now() });
    this.logger.info('[campaigns] campaign completed', { campaignId: campaign.id });
  }

  private async setStatus(
    campaign: EmailCampaign,
    patch: Pick<EmailCampaign, 'status'> & Partial<Pick<EmailCampaign, 'startedAt' | 'completedAt'>>
  ): Promise<EmailCampaign> {
    assertCampaignTransition(campaign.status, patch.status);
    const updated = await this.repositories.campaigns.update(campaign.id, patch);
    if (!updated) {
      throw new NotFoundError('EmailCampaign', campaign.id);
    }
    this.logger.info('[campaigns] status changed', { campaignId: campaign.id, from: campaign.status, to: patch.status });
    return updated;
  }

  /**
   * Flags a row whose delivery threw. Rows that already left `queued`/`sending`
   * keep their status, which is returned so the batch counts them as they are.
   */
  private async markCrashed(email: Email, message: string): Promise<EmailStatus | null> {
    try {
      const current = await this.repositories.emails.findById(email.tenantId, email.id);
      if (!current || (current.status !== 'queued' && current.status !== 'sending')) {
        return current?.status ?? null;
      }
      await this.repositories.emails.update(email.id, {
        status: 'failed',
        errorMessage: message,
        retryCount: current.retryCount + 1,
      });
      return 'failed';
    } catch (error) {
      this.logger.error('[campaigns] could not flag crashed email', { emailId: email.id, error: describeFailure(error) });
      return null;
    }
  }

  private async requireTemplate(actor: Actor, id: string): Promise<EmailTemplate> {
    const template = await this.repositories.emailTemplates.findById(actor.tenantId, id);
    if (!template || (template.userId !== actor.id && !template.isShared)) {
      throw new ValidationError('Email template not found', { templateId: id });
    }
    if (!template.isActive) {
      throw new ValidationError('Email template is inactive', { templateId: id });
    }
    return template;
  }

  private async requireConfiguration(actor: Actor, id: string): Promise<EmailConfiguration> {
    const config = await this.repositories.emailConfigurations.findById(actor.tenantId, id);
    if (!config || config.userId !== actor.id) {
      throw new ValidationError('Email configuration not found', { emailConfigId: id });
    }
    if (!config.isActive) {
      throw new ValidationError('Email configuration is inactive', { emailConfigId: id });
    }
    return config;
  }
}
