import { z } from 'zod';

import type { BaseEntity, EntityId, TenantId } from '../common/types';

export const UserRoleSchema = z.enum(['superadmin', 'admin', 'sales_manager', 'sales_rep', 'marketing']);
export type UserRole = z.infer<typeof UserRoleSchema>;

export interface User extends BaseEntity {
  email: string;
  firstName: string;
  lastName: string;
  role: UserRole;
  department: string | null;
  isActive: boolean;
}

/**
 * Identity threaded through every service call. Carries what role-based
 * scoping needs, nothing more.
 */
export interface Actor {
  id: EntityId;
  tenantId: TenantId;
  role: UserRole;
  department: string | null;
}

export const ADMIN_ROLES: ReadonlySet<UserRole> = new Set(['superadmin', 'admin']);

export const isAdminRole = (role: UserRole): boolean => ADMIN_ROLES.has(role);

export const getUserFullName = (user: Pick<User, 'firstName' | 'lastName' | 'email'>): string => {
  const fullName = `${user.firstName} ${user.lastName}`.trim();
  return fullName || user.email;
};

export const toActor = (user: Pick<User, 'id' | 'tenantId' | 'role' | 'department'>): Actor => ({
  id: user.id,
  tenantId: user.tenantId,
  role: user.role,
  department: user.department,
});
