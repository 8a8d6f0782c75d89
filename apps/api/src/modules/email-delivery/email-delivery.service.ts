import { assertEmailTransition, type Email, type EmailConfiguration } from '@salesdesk/core';
import type { StorageRepositories } from '@salesdesk/storage';

import { getConfig } from '../../config/env';
import { logger as defaultLogger, type Logger } from '../../config/logger';
import { recordEmailDelivery, type EmailDeliveryOrigin } from '../../metrics/email-metrics';
import { recordLeadActivity } from '../leads/lead-activity-recorder';
import type { LeadEventBus } from '../leads/lead-event-bus';
import type { EmailTransport, TransportResult } from './email-transport';
import { buildTrackingPixel } from './tracking-pixel';

export interface DeliveryResult {
  ok: boolean;
  message: string;
  email: Email;
}

export interface EmailDeliveryServiceDependencies {
  repositories: Pick<StorageRepositories, 'emails' | 'tracking' | 'leads' | 'activities'>;
  transport: EmailTransport;
  events: LeadEventBus;
  trackingBaseUrl?: string;
  logger?: Logger;
  now?: () => Date;
}

export interface EmailDeliveryServicePort {
  deliver(email: Email, config: EmailConfiguration, origin: EmailDeliveryOrigin): Promise<DeliveryResult>;
}

const describeFailure = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Single send path for every outbound email. Transport failures land on the
 * row (`failed`, `errorMessage`, `retryCount + 1`) and are never rethrown.
 */
export class EmailDeliveryService implements EmailDeliveryServicePort {
  private readonly repositories: EmailDeliveryServiceDependencies['repositories'];
  private readonly transport: EmailTransport;
  private readonly events: LeadEventBus;
  private readonly trackingBaseUrl: string;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: EmailDeliveryServiceDependencies) {
    this.repositories = deps.repositories;
    this.transport = deps.transport;
    this.events = deps.events;
    this.trackingBaseUrl = deps.trackingBaseUrl ?? getConfig().TRACKING_BASE_URL;
    this.logger = deps.logger ?? defaultLogger;
    this.now = deps.now ?? (() => new Date());
  }

  async deliver(email: Email, config: EmailConfiguration, origin: EmailDeliveryOrigin): Promise<DeliveryResult> {
    assertEmailTransition(email.status, 'sending');

    const sending = (await this.repositories.emails.update(email.id, { status: 'sending' })) ?? email;
    const html = sending.bodyHtml ? sending.bodyHtml + buildTrackingPixel(this.trackingBaseUrl, sending.trackingId) : null;

    let result: TransportResult;
    try {
      result = await this.transport.send(
        {
          from: { name: sending.fromName, address: sending.fromEmail },
          to: { name: sending.toName, address: sending.toEmail },
          replyTo: sending.replyTo,
          subject: sending.subject,
          html,
          text: sending.bodyText,
        },
        config
      );
    } catch (error) {
      result = { ok: false, message: describeFailure(error) };
    }

    if (!result.ok) {
      const failed =
        (await this.repositories.emails.update(sending.id, {
          status: 'failed',
          errorMessage: result.message,
          retryCount: sending.retryCount + 1,
        })) ?? sending;

      recordEmailDelivery(origin, 'failed');
      this.logger.warn('[email-delivery] email failed', {
        emailId: failed.id,
        origin,
        retryCount: failed.retryCount,
        error: result.message,
      });
      return { ok: false, message: result.message, email: failed };
    }

    const sentAt = this.now();
    let sent: Email = { ...sending, status: 'sent', sentAt, externalId: result.externalId ?? null, errorMessage: null };
    try {
      sent = await this.recordSent(sent, sentAt, result);
    } catch (error) {
      // Transport accepted the message; the row stays sent.
      this.logger.error('[email-delivery] bookkeeping failed after send', {
        emailId: sent.id,
        origin,
        error: describeFailure(error),
      });
    }

    recordEmailDelivery(origin, 'sent');
    this.logger.info('[email-delivery] email sent', { emailId: sent.id, origin, externalId: sent.externalId });

    return { ok: true, message: result.message, email: sent };
  }

  private async recordSent(pending: Email, sentAt: Date, result: TransportResult): Promise<Email> {
    const sent =
      (await this.repositories.emails.update(pending.id, {
        status: 'sent',
        sentAt,
        externalId: pending.externalId,
        errorMessage: null,
      })) ?? pending;

    await this.repositories.tracking.append({
      emailId: sent.id,
      eventType: 'sent',
      ipAddress: null,
      userAgent: null,
      clickedUrl: null,
      bounceReason: null,
      providerData: result.externalId ? { messageId: result.externalId } : {},
      occurredAt: sentAt,
    });

    const lead = await this.repositories.leads.findById(sent.tenantId, sent.leadId);
    if (!lead) {
      this.logger.warn('[email-delivery] lead missing for sent email', { emailId: sent.id, leadId: sent.leadId });
      return sent;
    }

    await recordLeadActivity(
      { leads: this.repositories.leads, activities: this.repositories.activities, events: this.events },
      lead,
      {
        userId: sent.userId,
        type: 'email',
        subject: `Email sent: ${sent.subject}`,
        description: `Email sent to ${sent.toEmail}`,
      },
      sentAt
    );
    return sent;
  }
}
