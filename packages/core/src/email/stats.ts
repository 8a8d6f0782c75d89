import { CLICKED_EMAIL_STATUSES, DELIVERED_EMAIL_STATUSES, OPENED_EMAIL_STATUSES, SENT_EMAIL_STATUSES } from './lifecycle';
import type { EmailStatus } from './types';

export type EmailStatusTotals = Record<EmailStatus, number>;

export interface EmailDeliverySummary {
  totalSent: number;
  delivered: number;
  opened: number;
  clicked: number;
  replied: number;
  bounced: number;
  failed: number;
  queued: number;
  deliveryRate: number;
  openRate: number;
  clickRate: number;
  bounceRate: number;
}

/** Percentage rounded to two decimals; 0 when the base is empty. */
export const percentage = (part: number, whole: number): number =>
  whole > 0 ? Math.round((part / whole) * 10_000) / 100 : 0;

const sumOf = (totals: EmailStatusTotals, statuses: readonly EmailStatus[]): number =>
  statuses.reduce((sum, status) => sum + totals[status], 0);

export const summarizeEmailTotals = (totals: EmailStatusTotals): EmailDeliverySummary => {
  const totalSent = sumOf(totals, SENT_EMAIL_STATUSES);
  const delivered = sumOf(totals, DELIVERED_EMAIL_STATUSES);
  const opened = sumOf(totals, OPENED_EMAIL_STATUSES);
  const clicked = sumOf(totals, CLICKED_EMAIL_STATUSES);

  return {
    totalSent,
    delivered,
    opened,
    clicked,
    replied: totals.replied,
    bounced: totals.bounced,
    failed: totals.failed,
    queued: totals.queued + totals.sending,
    deliveryRate: percentage(delivered, totalSent),
    openRate: percentage(opened, delivered),
    clickRate: percentage(clicked, delivered),
    bounceRate: percentage(totals.bounced, totalSent + totals.bounced),
  };
};
