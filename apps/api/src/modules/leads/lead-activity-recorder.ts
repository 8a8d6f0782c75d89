import { CONTACT_ACTIVITY_TYPES, type Lead, type LeadActivity, type LeadActivityType } from '@salesdesk/core';
import type { LeadActivityRepository, LeadRepository } from '@salesdesk/storage';

import type { LeadEventBus } from './lead-event-bus';

export interface LeadActivityRecorderDependencies {
  leads: Pick<LeadRepository, 'update'>;
  activities: Pick<LeadActivityRepository, 'append'>;
  events: LeadEventBus;
}

export interface RecordActivityInput {
  userId: string;
  type: LeadActivityType;
  subject: string;
  description: string | null;
}

/**
 * Appends an activity, stamps `lastContactedAt` for contact activities and
 * publishes `lead.activity_logged` with the refreshed lead.
 */
export const recordLeadActivity = async (
  deps: LeadActivityRecorderDependencies,
  lead: Lead,
  input: RecordActivityInput,
  at: Date = new Date()
): Promise<{ activity: LeadActivity; lead: Lead }> => {
  const activity = await deps.activities.append({
    tenantId: lead.tenantId,
    leadId: lead.id,
    userId: input.userId,
    type: input.type,
    subject: input.subject,
    description: input.description,
    createdAt: at,
  });

  let current = lead;
  if (CONTACT_ACTIVITY_TYPES.has(input.type)) {
    current = (await deps.leads.update(lead.tenantId, lead.id, { lastContactedAt: at })) ?? lead;
  }

  await deps.events.publish('lead.activity_logged', { lead: current, activity });

  return { activity, lead: current };
};
