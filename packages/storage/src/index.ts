export const STORAGE_VERSION = '1.0.0';

export { closeDatabase, createDatabase, getDatabase, setDatabase, type Database } from './db-client';
export * as schema from './schema';
export * from './types';

export { DrizzleUserRepository } from './repositories/user-repository';
export { DrizzleLeadRepository } from './repositories/lead-repository';
export { DrizzleLeadSourceRepository } from './repositories/lead-source-repository';
export { DrizzleLeadActivityRepository } from './repositories/lead-activity-repository';
export { DrizzleEmailConfigurationRepository } from './repositories/email-configuration-repository';
export { DrizzleEmailTemplateRepository } from './repositories/email-template-repository';
export { DrizzleCampaignRepository } from './repositories/campaign-repository';
export {
  DrizzleEmailRepository,
  DrizzleEmailTrackingRepository,
  emptyStatusCounts,
} from './repositories/email-repository';
export { DrizzleSequenceRepository, DrizzleEnrollmentRepository } from './repositories/sequence-repository';
export { DrizzleKpiTargetRepository } from './repositories/kpi-target-repository';
export { createDrizzleStorage } from './storage';
