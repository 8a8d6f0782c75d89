import { z } from 'zod';

import type { BaseEntity, EntityId } from '../common/types';

// ============================================================================
// Lead Status
// ============================================================================

export const LeadStatusSchema = z.enum([
  'new',
  'contacted',
  'qualified',
  'proposal',
  'negotiation',
  'won',
  'lost',
  'on_hold',
]);

export type LeadStatus = z.infer<typeof LeadStatusSchema>;

export const LEAD_STATUS_LABELS: Record<LeadStatus, string> = {
  new: 'New',
  contacted: 'Contacted',
  qualified: 'Qualified',
  proposal: 'Proposal Sent',
  negotiation: 'Negotiation',
  won: 'Won',
  lost: 'Lost',
  on_hold: 'On Hold',
};

/** Statuses that still need follow-up; a lead in one of them goes overdue after a week of silence. */
export const FOLLOW_UP_STATUSES: readonly LeadStatus[] = ['new', 'contacted', 'qualified'];

export const CLOSED_STATUSES: readonly LeadStatus[] = ['won', 'lost'];

export const OVERDUE_AFTER_DAYS = 7;

// ============================================================================
// Lead Priority
// ============================================================================

export const LeadPrioritySchema = z.enum(['hot', 'warm', 'cold']);
export type LeadPriority = z.infer<typeof LeadPrioritySchema>;

export const LEAD_PRIORITY_LABELS: Record<LeadPriority, string> = {
  hot: 'Hot',
  warm: 'Warm',
  cold: 'Cold',
};

// ============================================================================
// Activities
// ============================================================================

export const LeadActivityTypeSchema = z.enum(['call', 'email', 'meeting', 'note', 'status_change', 'assignment']);
export type LeadActivityType = z.infer<typeof LeadActivityTypeSchema>;

/** Activity types that count as talking to the lead. */
export const CONTACT_ACTIVITY_TYPES: ReadonlySet<LeadActivityType> = new Set(['call', 'email', 'meeting']);

// ============================================================================
// Entities
// ============================================================================

export interface LeadSource extends BaseEntity {
  name: string;
  description: string | null;
  isActive: boolean;
}

export interface Lead extends BaseEntity {
  firstName: string;
  lastName: string | null;
  email: string;
  phone: string | null;
  company: string | null;
  jobTitle: string | null;
  sourceId: EntityId | null;
  status: LeadStatus;
  priority: LeadPriority;
  assignedToId: EntityId | null;
  createdById: EntityId;
  address: string | null;
  city: string | null;
  state: string | null;
  country: string | null;
  postalCode: string | null;
  budget: number | null;
  requirements: string | null;
  notes: string | null;
  lastContactedAt: Date | null;
}

export interface LeadActivity {
  id: EntityId;
  tenantId: string;
  leadId: EntityId;
  userId: EntityId;
  type: LeadActivityType;
  subject: string;
  description: string | null;
  createdAt: Date;
}

export const getLeadFullName = (lead: Pick<Lead, 'firstName' | 'lastName'>): string =>
  `${lead.firstName} ${lead.lastName ?? ''}`.trim();

export const isLeadOverdue = (lead: Pick<Lead, 'status' | 'lastContactedAt'>, now: Date = new Date()): boolean => {
  if (!FOLLOW_UP_STATUSES.includes(lead.status)) {
    return false;
  }

  if (!lead.lastContactedAt) {
    return true;
  }

  const threshold = now.getTime() - OVERDUE_AFTER_DAYS * 24 * 60 * 60 * 1000;
  return lead.lastContactedAt.getTime() < threshold;
};
