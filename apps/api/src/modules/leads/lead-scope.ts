import { isAdminRole, type Actor, type Lead, type User } from '@salesdesk/core';
import type { LeadScope, UserRepository } from '@salesdesk/storage';

/**
 * Reps see their own leads, managers their own plus the active reps of their
 * department, everyone else the whole tenant.
 */
export const resolveLeadScope = async (
  actor: Actor,
  users: Pick<UserRepository, 'listActive'>
): Promise<LeadScope> => {
  switch (actor.role) {
    case 'sales_rep':
      return { kind: 'assignees', userIds: [actor.id] };
    case 'sales_manager': {
      const team = actor.department
        ? await users.listActive(actor.tenantId, { role: 'sales_rep', department: actor.department })
        : [];
      return { kind: 'assignees', userIds: [actor.id, ...team.map((member) => member.id)] };
    }
    default:
      return { kind: 'tenant' };
  }
};

export const isLeadInScope = (lead: Pick<Lead, 'assignedToId'>, scope: LeadScope): boolean =>
  scope.kind === 'tenant' || (lead.assignedToId !== null && scope.userIds.includes(lead.assignedToId));

export const canEditLead = (
  actor: Actor,
  lead: Pick<Lead, 'assignedToId'>,
  assignee: Pick<User, 'department'> | null
): boolean => {
  if (isAdminRole(actor.role)) {
    return true;
  }

  switch (actor.role) {
    case 'sales_manager':
      return (
        lead.assignedToId === actor.id ||
        (actor.department !== null && assignee !== null && assignee.department === actor.department)
      );
    case 'sales_rep':
      return lead.assignedToId === actor.id;
    default:
      return false;
  }
};
