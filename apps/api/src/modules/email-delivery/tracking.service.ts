import {
  ENGAGEMENT_EVENTS,
  TrackingEventTypeSchema,
  applyEngagementEvent,
  type Email,
  type TrackingEventType,
} from '@salesdesk/core';
import type { StorageRepositories } from '@salesdesk/storage';

import { logger as defaultLogger, type Logger } from '../../config/logger';
import { recordTrackingEvent } from '../../metrics/email-metrics';

export interface TrackingContext {
  ipAddress?: string | null;
  userAgent?: string | null;
  clickedUrl?: string | null;
  bounceReason?: string | null;
  providerData?: Record<string, unknown>;
}

export interface TrackingOutcome {
  event: TrackingEventType | null;
  email: Email | null;
}

export interface TrackingServiceDependencies {
  repositories: Pick<StorageRepositories, 'emails' | 'tracking' | 'enrollments'>;
  logger?: Logger;
  now?: () => Date;
}

export interface TrackingServicePort {
  recordCallback(trackingId: string, event: string, context: TrackingContext): Promise<TrackingOutcome>;
  applyEvent(email: Email, event: TrackingEventType, context: TrackingContext): Promise<Email>;
}

const parseEngagementEvent = (value: string): TrackingEventType | null => {
  const parsed = TrackingEventTypeSchema.safeParse(value);
  return parsed.success && ENGAGEMENT_EVENTS.has(parsed.data) ? parsed.data : null;
};

// Anyone holding a tracking id can hit the public route, so only the pixel and
// link events move an email. Replies are flagged through the authenticated API.
const PUBLIC_STATUS_EVENTS: ReadonlySet<TrackingEventType> = new Set(['opened', 'clicked']);

export class TrackingService implements TrackingServicePort {
  private readonly repositories: TrackingServiceDependencies['repositories'];
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: TrackingServiceDependencies) {
    this.repositories = deps.repositories;
    this.logger = deps.logger ?? defaultLogger;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Public callback entry point: unknown ids and events are dropped without a
   * trace row. Known events other than opens and clicks are traced only.
   */
  async recordCallback(trackingId: string, event: string, context: TrackingContext): Promise<TrackingOutcome> {
    const eventType = parseEngagementEvent(event);
    if (!eventType) {
      recordTrackingEvent('unknown', false);
      return { event: null, email: null };
    }

    const email = await this.repositories.emails.findByTrackingId(trackingId);
    if (!email) {
      recordTrackingEvent(eventType, false);
      this.logger.debug('[tracking] unknown tracking id', { trackingId, event: eventType });
      return { event: eventType, email: null };
    }

    recordTrackingEvent(eventType, true);
    if (!PUBLIC_STATUS_EVENTS.has(eventType)) {
      await this.appendTrace(email, eventType, context, this.now());
      this.logger.info('[tracking] callback traced without status change', { emailId: email.id, event: eventType });
      return { event: eventType, email };
    }

    const updated = await this.applyEvent(email, eventType, context);
    return { event: eventType, email: updated };
  }

  /**
   * Appends the trace row and moves the email forward. Replies also flag the
   * lead's active enrollments so reply-gated steps are skipped.
   */
  async applyEvent(email: Email, event: TrackingEventType, context: TrackingContext): Promise<Email> {
    const occurredAt = this.now();
    await this.appendTrace(email, event, context, occurredAt);

    const patch = applyEngagementEvent(email, event, occurredAt, { bounceReason: context.bounceReason });
    if (!patch || Object.keys(patch).length === 0) {
      return email;
    }

    const updated = (await this.repositories.emails.update(email.id, patch)) ?? email;

    if (event === 'replied') {
      const enrollments = await this.repositories.enrollments.listActiveForLead(email.tenantId, email.leadId);
      for (const enrollment of enrollments) {
        await this.repositories.enrollments.update(enrollment.id, { hasReplied: true });
      }
      this.logger.info('[tracking] reply recorded', { emailId: email.id, enrollments: enrollments.length });
    }

    return updated;
  }

  private async appendTrace(
    email: Email,
    event: TrackingEventType,
    context: TrackingContext,
    occurredAt: Date
  ): Promise<void> {
    await this.repositories.tracking.append({
      emailId: email.id,
      eventType: event,
      ipAddress: context.ipAddress ?? null,
      userAgent: context.userAgent ?? null,
      clickedUrl: context.clickedUrl ?? null,
      bounceReason: context.bounceReason ?? null,
      providerData: context.providerData ?? {},
      occurredAt,
    });
  }
}
