import { logger } from '../config/logger';
import { recordSchedulerRun, type SchedulerJob } from '../metrics/email-metrics';
import type { CampaignProcessingSummary } from '../modules/campaigns/campaign.service';
import type { RetrySummary } from '../modules/emails/email.service';
import type { SequenceTickSummary } from '../modules/sequences/sequence.service';

export type EmailJob = SchedulerJob;

export const EMAIL_JOBS: readonly EmailJob[] = ['campaigns', 'sequences', 'retry_failed'];

export interface EmailProcessingServices {
  campaigns: { processDueCampaigns(): Promise<CampaignProcessingSummary> };
  sequences: { tick(): Promise<SequenceTickSummary> };
  emails: { retryFailedEmails(): Promise<RetrySummary> };
}

const runJob = (job: EmailJob, services: EmailProcessingServices): Promise<object> => {
  switch (job) {
    case 'campaigns':
      return services.campaigns.processDueCampaigns();
    case 'sequences':
      return services.sequences.tick();
    case 'retry_failed':
      return services.emails.retryFailedEmails();
  }
};

/**
 * Runs the requested jobs in order. A failing job is logged and counted;
 * the remaining jobs still run. Returns the jobs that failed.
 */
export const processEmailJobs = async (
  jobs: readonly EmailJob[],
  services: EmailProcessingServices
): Promise<EmailJob[]> => {
  const failed: EmailJob[] = [];

  for (const job of jobs) {
    const startedAt = Date.now();
    try {
      const summary = await runJob(job, services);
      recordSchedulerRun(job, 'success');
      logger.info('[email-worker] job finished', { job, durationMs: Date.now() - startedAt, ...summary });
    } catch (error) {
      failed.push(job);
      recordSchedulerRun(job, 'error');
      logger.error('[email-worker] job failed', {
        job,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return failed;
};
