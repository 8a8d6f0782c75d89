import { and, asc, eq, inArray } from 'drizzle-orm';
import type { User, UserRole } from '@salesdesk/core';

import { getDatabase, type Database } from '../db-client';
import { users, type UserRecord } from '../schema';
import type { UserRepository } from '../types';

const mapUser = (record: UserRecord): User => ({
  id: record.id,
  tenantId: record.tenantId,
  email: record.email,
  firstName: record.firstName,
  lastName: record.lastName,
  role: record.role,
  department: record.department,
  isActive: record.isActive,
  createdAt: record.createdAt,
  updatedAt: record.updatedAt,
});

export class DrizzleUserRepository implements UserRepository {
  constructor(private readonly deps: { db?: Database } = {}) {}

  private get db(): Database {
    return this.deps.db ?? getDatabase();
  }

  async findById(id: string): Promise<User | null> {
    const [record] = await this.db.select().from(users).where(eq(users.id, id)).limit(1);
    return record ? mapUser(record) : null;
  }

  async findByIds(tenantId: string, ids: string[]): Promise<User[]> {
    if (ids.length === 0) {
      return [];
    }
    const records = await this.db
      .select()
      .from(users)
      .where(and(eq(users.tenantId, tenantId), inArray(users.id, ids)));
    return records.map(mapUser);
  }

  async listActive(tenantId: string, filters: { role?: UserRole; department?: string | null } = {}): Promise<User[]> {
    const records = await this.db
      .select()
      .from(users)
      .where(
        and(
          eq(users.tenantId, tenantId),
          eq(users.isActive, true),
          filters.role ? eq(users.role, filters.role) : undefined,
          filters.department ? eq(users.department, filters.department) : undefined
        )
      )
      .orderBy(asc(users.firstName), asc(users.lastName));
    return records.map(mapUser);
  }
}
