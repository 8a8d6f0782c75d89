import { Counter, Registry, collectDefaultMetrics } from 'prom-client';
import type { TrackingEventType } from '@salesdesk/core';

export type EmailDeliveryOrigin = 'campaign' | 'sequence' | 'retry' | 'quick' | 'test';
export type EmailDeliveryOutcome = 'sent' | 'failed';
export type SchedulerJob = 'campaigns' | 'sequences' | 'retry_failed';

export const emailMetricsRegistry = new Registry();

collectDefaultMetrics({ register: emailMetricsRegistry });

const emailDeliveriesCounter = new Counter<'origin' | 'outcome'>({
  name: 'email_deliveries_total',
  help: 'Outbound email delivery attempts grouped by origin and outcome.',
  labelNames: ['origin', 'outcome'],
  registers: [emailMetricsRegistry],
});

const trackingEventsCounter = new Counter<'event' | 'matched'>({
  name: 'email_tracking_events_total',
  help: 'Tracking callbacks received, split by whether the tracking id matched an email.',
  labelNames: ['event', 'matched'],
  registers: [emailMetricsRegistry],
});

const schedulerRunsCounter = new Counter<'job' | 'result'>({
  name: 'email_scheduler_runs_total',
  help: 'Scheduler job executions grouped by job and result.',
  labelNames: ['job', 'result'],
  registers: [emailMetricsRegistry],
});

export const recordEmailDelivery = (origin: EmailDeliveryOrigin, outcome: EmailDeliveryOutcome): void => {
  emailDeliveriesCounter.inc({ origin, outcome });
};

export const recordTrackingEvent = (event: TrackingEventType | 'unknown', matched: boolean): void => {
  trackingEventsCounter.inc({ event, matched: matched ? 'yes' : 'no' });
};

export const recordSchedulerRun = (job: SchedulerJob, result: 'success' | 'error'): void => {
  schedulerRunsCounter.inc({ job, result });
};

export const renderMetrics = (): Promise<string> => emailMetricsRegistry.metrics();

export const resetEmailMetrics = (): void => {
  emailMetricsRegistry.resetMetrics();
};
