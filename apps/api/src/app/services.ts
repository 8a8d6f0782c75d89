import { closeDatabase, createDrizzleStorage, type StorageRepositories } from '@salesdesk/storage';

import { getConfig } from '../config/env';
import { logger as defaultLogger, type Logger } from '../config/logger';
import { CampaignService } from '../modules/campaigns/campaign.service';
import { EmailConfigService } from '../modules/email-config/email-config.service';
import { EmailDeliveryService } from '../modules/email-delivery/email-delivery.service';
import { SmtpEmailTransport, type EmailTransport } from '../modules/email-delivery/email-transport';
import { TrackingService } from '../modules/email-delivery/tracking.service';
import { EmailTemplateService } from '../modules/email-templates/email-template.service';
import { EmailService } from '../modules/emails/email.service';
import { KpiService } from '../modules/kpi/kpi.service';
import { createLeadEventBus, type LeadEventBus } from '../modules/leads/lead-event-bus';
import { LeadService } from '../modules/leads/lead.service';
import { ReportService } from '../modules/reports/report.service';
import { SequenceService } from '../modules/sequences/sequence.service';

export interface ApplicationServices {
  repositories: StorageRepositories;
  events: LeadEventBus;
  leads: LeadService;
  emailConfigs: EmailConfigService;
  emailTemplates: EmailTemplateService;
  delivery: EmailDeliveryService;
  tracking: TrackingService;
  emails: EmailService;
  campaigns: CampaignService;
  sequences: SequenceService;
  reports: ReportService;
  kpi: KpiService;
  /** Drops lead event subscriptions and releases the database pool. */
  close: () => Promise<void>;
}

export interface ApplicationServicesOptions {
  repositories?: StorageRepositories;
  transport?: EmailTransport;
  logger?: Logger;
  now?: () => Date;
  /** Defaults to closing the shared drizzle pool. */
  closeStorage?: () => Promise<void>;
}

export const createApplicationServices = (options: ApplicationServicesOptions = {}): ApplicationServices => {
  const config = getConfig();
  const logger = options.logger ?? defaultLogger;
  const now = options.now;
  const repositories = options.repositories ?? createDrizzleStorage();
  const transport = options.transport ?? new SmtpEmailTransport({ timeoutMs: config.SMTP_TIMEOUT_MS, logger });
  const closeStorage = options.closeStorage ?? closeDatabase;

  const events = createLeadEventBus({ logger });
  const delivery = new EmailDeliveryService({
    repositories,
    transport,
    events,
    trackingBaseUrl: config.TRACKING_BASE_URL,
    logger,
    now,
  });
  const tracking = new TrackingService({ repositories, logger, now });
  const sequences = new SequenceService({ repositories, delivery, logger, now });
  const kpi = new KpiService({ repositories, logger, now });

  const unsubscribers = [sequences.subscribeToLeadEvents(events), kpi.subscribeToLeadEvents(events)];

  return {
    repositories,
    events,
    leads: new LeadService({ repositories, events, logger, now }),
    emailConfigs: new EmailConfigService({ configurations: repositories.emailConfigurations, transport, logger, now }),
    emailTemplates: new EmailTemplateService({ repositories, logger, now }),
    delivery,
    tracking,
    emails: new EmailService({
      repositories,
      delivery,
      tracking,
      retryBatchLimit: config.EMAIL_RETRY_BATCH_LIMIT,
      logger,
      now,
    }),
    campaigns: new CampaignService({ repositories, delivery, logger, now }),
    sequences,
    reports: new ReportService({ repositories, logger, now }),
    kpi,
    close: async () => {
      for (const unsubscribe of unsubscribers) {
        unsubscribe();
      }
      await closeStorage();
    },
  };
};
