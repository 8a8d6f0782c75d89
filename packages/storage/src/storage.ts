import type { Database } from './db-client';
import { DrizzleCampaignRepository } from './repositories/campaign-repository';
import { DrizzleEmailConfigurationRepository } from './repositories/email-configuration-repository';
import { DrizzleEmailRepository, DrizzleEmailTrackingRepository } from './repositories/email-repository';
import { DrizzleEmailTemplateRepository } from './repositories/email-template-repository';
import { DrizzleKpiTargetRepository } from './repositories/kpi-target-repository';
import { DrizzleLeadActivityRepository } from './repositories/lead-activity-repository';
import { DrizzleLeadRepository } from './repositories/lead-repository';
import { DrizzleLeadSourceRepository } from './repositories/lead-source-repository';
import { DrizzleEnrollmentRepository, DrizzleSequenceRepository } from './repositories/sequence-repository';
import { DrizzleUserRepository } from './repositories/user-repository';
import type { StorageRepositories } from './types';

export const createDrizzleStorage = (db?: Database): StorageRepositories => {
  const deps = { db };

  return {
    users: new DrizzleUserRepository(deps),
    leads: new DrizzleLeadRepository(deps),
    leadSources: new DrizzleLeadSourceRepository(deps),
    activities: new DrizzleLeadActivityRepository(deps),
    emailConfigurations: new DrizzleEmailConfigurationRepository(deps),
    emailTemplates: new DrizzleEmailTemplateRepository(deps),
    campaigns: new DrizzleCampaignRepository(deps),
    emails: new DrizzleEmailRepository(deps),
    tracking: new DrizzleEmailTrackingRepository(deps),
    sequences: new DrizzleSequenceRepository(deps),
    enrollments: new DrizzleEnrollmentRepository(deps),
    kpiTargets: new DrizzleKpiTargetRepository(deps),
  };
};
