import {
  ConflictError,
  DEFAULT_MAX_RETRIES,
  NotFoundError,
  ValidationError,
  getLeadFullName,
  hasBeenSent,
  renderTemplate,
  validateTemplate,
  type Actor,
  type Email,
  type EmailConfiguration,
  type EmailTemplate,
  type EmailTrackingEvent,
  type PaginatedResult,
  type TemplateContent,
} from '@salesdesk/core';
import type { StorageRepositories } from '@salesdesk/storage';

import { getConfig } from '../../config/env';
import { logger as defaultLogger, type Logger } from '../../config/logger';
import type { DeliveryResult, EmailDeliveryServicePort } from '../email-delivery/email-delivery.service';
import type { TrackingServicePort } from '../email-delivery/tracking.service';
import { resolveSendingConfiguration } from '../email-config/sending-configuration';
import { isLeadInScope, resolveLeadScope } from '../leads/lead-scope';
import type { ListEmailsQuery, QuickEmailInput } from './email.validators';

export type EmailDetail = Email & { events: EmailTrackingEvent[] };

export interface RetrySummary {
  attempted: number;
  sent: number;
  failed: number;
  skipped: number;
}

export interface EmailServiceDependencies {
  repositories: Pick<
    StorageRepositories,
    'emails' | 'tracking' | 'leads' | 'emailTemplates' | 'emailConfigurations' | 'users' | 'campaigns'
  >;
  delivery: EmailDeliveryServicePort;
  tracking: TrackingServicePort;
  retryBatchLimit?: number;
  logger?: Logger;
  now?: () => Date;
}

export interface EmailServicePort {
  sendQuickEmail(actor: Actor, input: QuickEmailInput): Promise<DeliveryResult>;
  listEmails(actor: Actor, query: ListEmailsQuery): Promise<PaginatedResult<Email>>;
  getEmail(actor: Actor, id: string): Promise<EmailDetail>;
  markReplied(actor: Actor, id: string): Promise<Email>;
}

const describeFailure = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export class EmailService implements EmailServicePort {
  private readonly repositories: EmailServiceDependencies['repositories'];
  private readonly delivery: EmailDeliveryServicePort;
  private readonly tracking: TrackingServicePort;
  private readonly retryBatchLimit: number;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: EmailServiceDependencies) {
    this.repositories = deps.repositories;
    this.delivery = deps.delivery;
    this.tracking = deps.tracking;
    this.retryBatchLimit = deps.retryBatchLimit ?? getConfig().EMAIL_RETRY_BATCH_LIMIT;
    this.logger = deps.logger ?? defaultLogger;
    this.now = deps.now ?? (() => new Date());
  }

  /** One-off email to a single lead, rendered from a template or from the given subject and body. */
  async sendQuickEmail(actor: Actor, input: QuickEmailInput): Promise<DeliveryResult> {
    const lead = await this.repositories.leads.findById(actor.tenantId, input.leadId);
    const scope = await resolveLeadScope(actor, this.repositories.users);
    if (!lead || !isLeadInScope(lead, scope)) {
      throw new NotFoundError('Lead', input.leadId);
    }
    if (!lead.email.trim()) {
      throw new ValidationError('Lead has no email address', { leadId: lead.id });
    }

    const config = await this.pickConfiguration(actor, input.emailConfigId);
    const template = input.templateId ? await this.requireTemplate(actor, input.templateId) : null;
    const content = this.composeContent(template, input);

    const problems = validateTemplate(content);
    if (problems.length > 0) {
      throw new ValidationError('Email content is invalid', { errors: problems });
    }

    const sender = await this.repositories.users.findById(actor.id);
    if (!sender) {
      throw new NotFoundError('User', actor.id);
    }

    const now = this.now();
    const rendered = renderTemplate(content, lead, sender, now);
    const email = await this.repositories.emails.create({
      tenantId: actor.tenantId,
      userId: actor.id,
      leadId: lead.id,
      campaignId: null,
      templateId: template?.id ?? null,
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

    const result = await this.delivery.deliver(email, config, 'quick');
    if (template && result.ok) {
      await this.repositories.emailTemplates.recordUsage(template.id, now);
    }

    this.logger.info('[emails] quick email processed', { emailId: email.id, leadId: lead.id, ok: result.ok });
    return result;
  }

  async listEmails(actor: Actor, query: ListEmailsQuery): Promise<PaginatedResult<Email>> {
    return this.repositories.emails.list(
      {
        tenantId: actor.tenantId,
        userId: actor.id,
        status: query.status,
        leadId: query.leadId,
        campaignId: query.campaignId,
      },
      { page: query.page, limit: query.limit }
    );
  }

  async getEmail(actor: Actor, id: string): Promise<EmailDetail> {
    const email = await this.requireOwnEmail(actor, id);
    const events = await this.repositories.tracking.listByEmail(email.id);
    return { ...email, events };
  }

  /** Manual reply flag for replies noticed outside the tracking callback. */
  async markReplied(actor: Actor, id: string): Promise<Email> {
    const email = await this.requireOwnEmail(actor, id);
    if (!hasBeenSent(email)) {
      throw new ConflictError('Email has not been sent yet', { emailId: email.id, status: email.status });
    }
    return this.tracking.applyEvent(email, 'replied', {});
  }

  /**
   * Scheduler entry point: resends failed emails still under their retry
   * budget through the owner's current sending configuration.
   */
  async retryFailedEmails(limit: number = this.retryBatchLimit): Promise<RetrySummary> {
    const summary: RetrySummary = { attempted: 0, sent: 0, failed: 0, skipped: 0 };
    const configurations = new Map<string, EmailConfiguration | null>();

    for (const email of await this.repositories.emails.listRetryable(limit)) {
      const ownerKey = `${email.tenantId}:${email.userId}`;
      try {
        let config = configurations.get(ownerKey);
        if (config === undefined) {
          config = await resolveSendingConfiguration(this.repositories.emailConfigurations, email.tenantId, email.userId);
          configurations.set(ownerKey, config);
        }
        if (!config) {
          summary.skipped += 1;
          this.logger.warn('[emails] retry skipped, owner has no active configuration', {
            emailId: email.id,
            userId: email.userId,
          });
          continue;
        }

        summary.attempted += 1;
        const result = await this.delivery.deliver(email, config, 'retry');
        if (!result.ok) {
          summary.failed += 1;
          continue;
        }

        summary.sent += 1;
        if (email.campaignId) {
          await this.repositories.campaigns.incrementCounters(email.campaignId, { sent: 1, failed: -1 });
        }
      } catch (error) {
        summary.failed += 1;
        this.logger.error('[emails] retry crashed', { emailId: email.id, error: describeFailure(error) });
      }
    }

    this.logger.info('[emails] failed email retry finished', { ...summary });
    return summary;
  }

  private composeContent(template: EmailTemplate | null, input: QuickEmailInput): TemplateContent {
    if (!template) {
      return { subject: input.subject ?? '', bodyHtml: input.bodyHtml ?? '', bodyText: null };
    }

    const bodyOverridden = Boolean(input.bodyHtml?.trim());
    return {
      subject: input.subject || template.subject,
      bodyHtml: bodyOverridden ? (input.bodyHtml ?? '') : template.bodyHtml,
      bodyText: bodyOverridden ? null : template.bodyText,
    };
  }

  private async pickConfiguration(actor: Actor, id: string | undefined): Promise<EmailConfiguration> {
    if (id) {
      const config = await this.repositories.emailConfigurations.findById(actor.tenantId, id);
      if (!config || config.userId !== actor.id || !config.isActive) {
        throw new ValidationError('Email configuration not found or inactive', { emailConfigId: id });
      }
      return config;
    }

    const config = await resolveSendingConfiguration(this.repositories.emailConfigurations, actor.tenantId, actor.id);
    if (!config) {
      throw new ValidationError('No email configuration available');
    }
    return config;
  }

  private async requireTemplate(actor: Actor, id: string): Promise<EmailTemplate> {
    const template = await this.repositories.emailTemplates.findById(actor.tenantId, id);
    if (!template || (template.userId !== actor.id && !template.isShared) || !template.isActive) {
      throw new ValidationError('Email template not found', { templateId: id });
    }
    return template;
  }

  private async requireOwnEmail(actor: Actor, id: string): Promise<Email> {
    const email = await this.repositories.emails.findById(actor.tenantId, id);
    if (!email || email.userId !== actor.id) {
      throw new NotFoundError('Email', id);
    }
    return email;
  }
}
