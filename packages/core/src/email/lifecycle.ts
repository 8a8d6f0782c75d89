import { ConflictError } from '../common/types';
import type { CampaignStatus, Email, EmailStatus, TrackingEventType } from './types';

// ============================================================================
// Campaign status machine
// ============================================================================

const campaignEntries: Array<[CampaignStatus, ReadonlySet<CampaignStatus>]> = [
  ['draft', new Set(['draft', 'scheduled', 'sending', 'cancelled'])],
  ['scheduled', new Set(['scheduled', 'sending', 'cancelled'])],
  ['sending', new Set(['sending', 'sent', 'paused', 'cancelled'])],
  ['paused', new Set(['paused', 'sending', 'cancelled'])],
  ['sent', new Set(['sent'])],
  ['cancelled', new Set(['cancelled'])],
];

export const CAMPAIGN_STATUS_TRANSITIONS: ReadonlyMap<CampaignStatus, ReadonlySet<CampaignStatus>> = new Map(
  campaignEntries.map(([status, targets]) => [status, new Set(targets)])
);

export const TERMINAL_CAMPAIGN_STATUSES: ReadonlySet<CampaignStatus> = new Set(['sent', 'cancelled']);

export const canTransitionCampaign = (from: CampaignStatus, to: CampaignStatus): boolean => {
  const targets = CAMPAIGN_STATUS_TRANSITIONS.get(from);
  return targets ? targets.has(to) : false;
};

export const assertCampaignTransition = (from: CampaignStatus, to: CampaignStatus): void => {
  if (!canTransitionCampaign(from, to)) {
    throw new ConflictError(`Invalid campaign status transition from "${from}" to "${to}"`, { from, to });
  }
};

// ============================================================================
// Email status machine
// ============================================================================

const emailEntries: Array<[EmailStatus, ReadonlySet<EmailStatus>]> = [
  ['queued', new Set(['queued', 'sending', 'failed'])],
  ['sending', new Set(['sending', 'sent', 'failed'])],
  ['sent', new Set(['sent', 'delivered', 'opened', 'clicked', 'replied', 'bounced', 'spam'])],
  ['delivered', new Set(['delivered', 'opened', 'clicked', 'replied', 'spam'])],
  ['opened', new Set(['opened', 'clicked', 'replied', 'spam'])],
  ['clicked', new Set(['clicked', 'replied', 'spam'])],
  ['replied', new Set(['replied'])],
  ['bounced', new Set(['bounced'])],
  // retry path
  ['failed', new Set(['failed', 'sending'])],
  ['spam', new Set(['spam'])],
];

export const EMAIL_STATUS_TRANSITIONS: ReadonlyMap<EmailStatus, ReadonlySet<EmailStatus>> = new Map(
  emailEntries.map(([status, targets]) => [status, new Set(targets)])
);

/** Statuses reached only after the transport accepted the message. */
export const SENT_EMAIL_STATUSES: readonly EmailStatus[] = ['sent', 'delivered', 'opened', 'clicked', 'replied'];
export const DELIVERED_EMAIL_STATUSES: readonly EmailStatus[] = ['delivered', 'opened', 'clicked', 'replied'];
export const OPENED_EMAIL_STATUSES: readonly EmailStatus[] = ['opened', 'clicked', 'replied'];
export const CLICKED_EMAIL_STATUSES: readonly EmailStatus[] = ['clicked', 'replied'];

export const canTransitionEmail = (from: EmailStatus, to: EmailStatus): boolean => {
  const targets = EMAIL_STATUS_TRANSITIONS.get(from);
  return targets ? targets.has(to) : false;
};

export const assertEmailTransition = (from: EmailStatus, to: EmailStatus): void => {
  if (!canTransitionEmail(from, to)) {
    throw new ConflictError(`Invalid email status transition from "${from}" to "${to}"`, { from, to });
  }
};

export const hasBeenSent = (email: Pick<Email, 'status' | 'sentAt'>): boolean =>
  email.sentAt !== null || SENT_EMAIL_STATUSES.includes(email.status);

// ============================================================================
// Engagement events
// ============================================================================

export type EmailEngagementPatch = Partial<
  Pick<
    Email,
    'status' | 'deliveredAt' | 'openedAt' | 'clickedAt' | 'repliedAt' | 'openCount' | 'clickCount' | 'errorMessage'
  >
>;

/** Events a recipient or provider may report through the tracking callback. */
export const ENGAGEMENT_EVENTS: ReadonlySet<TrackingEventType> = new Set([
  'delivered',
  'opened',
  'clicked',
  'replied',
  'bounced',
  'spam',
  'unsubscribed',
]);

const forwardStatus = (current: EmailStatus, target: EmailStatus): EmailStatus | undefined =>
  current !== target && canTransitionEmail(current, target) ? target : undefined;

/**
 * Computes the row update for an engagement event. Counters grow on every
 * repeat; status only moves forward. Returns null for emails that never
 * left the outbox, whose events are ignored.
 */
export const applyEngagementEvent = (
  email: Pick<Email, 'status' | 'sentAt' | 'deliveredAt' | 'openedAt' | 'clickedAt' | 'repliedAt' | 'openCount' | 'clickCount'>,
  event: TrackingEventType,
  at: Date,
  details: { bounceReason?: string | null } = {}
): EmailEngagementPatch | null => {
  if (!hasBeenSent(email)) {
    return null;
  }

  const patch: EmailEngagementPatch = {};

  switch (event) {
    case 'delivered':
      patch.deliveredAt = email.deliveredAt ?? at;
      break;
    case 'opened':
      patch.openCount = email.openCount + 1;
      patch.openedAt = email.openedAt ?? at;
      break;
    case 'clicked':
      patch.clickCount = email.clickCount + 1;
      patch.clickedAt = email.clickedAt ?? at;
      if (!email.openedAt) {
        patch.openedAt = at;
        patch.openCount = email.openCount + 1;
      }
      break;
    case 'replied':
      patch.repliedAt = email.repliedAt ?? at;
      break;
    case 'bounced':
      patch.errorMessage = details.bounceReason ?? 'Bounced';
      break;
    case 'spam':
    case 'unsubscribed':
    case 'sent':
      break;
  }

  const target: EmailStatus | undefined =
    event === 'delivered' || event === 'opened' || event === 'clicked' || event === 'replied' || event === 'bounced' || event === 'spam'
      ? event
      : undefined;

  const nextStatus = target ? forwardStatus(email.status, target) : undefined;
  if (nextStatus) {
    patch.status = nextStatus;
  }

  return patch;
};
