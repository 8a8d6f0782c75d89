import type { EmailConfiguration } from '@salesdesk/core';
import type { EmailConfigurationRepository } from '@salesdesk/storage';

/** The user's active default configuration, else their first active one, else null. */
export const resolveSendingConfiguration = async (
  configurations: Pick<EmailConfigurationRepository, 'listByUser'>,
  tenantId: string,
  userId: string
): Promise<EmailConfiguration | null> => {
  const owned = await configurations.listByUser(tenantId, userId);
  return owned.find((config) => config.isActive && config.isDefault) ?? owned.find((config) => config.isActive) ?? null;
};
