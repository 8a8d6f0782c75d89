import { and, desc, eq, inArray } from 'drizzle-orm';
import type { LeadActivity } from '@salesdesk/core';

import { getDatabase, type Database } from '../db-client';
import { leadActivities, leads, type LeadActivityRecord } from '../schema';
import type { LeadActivityRepository, LeadScope } from '../types';

const mapActivity = (record: LeadActivityRecord): LeadActivity => ({
  id: record.id,
  tenantId: record.tenantId,
  leadId: record.leadId,
  userId: record.userId,
  type: record.type,
  subject: record.subject,
  description: record.description,
  createdAt: record.createdAt,
});

export class DrizzleLeadActivityRepository implements LeadActivityRepository {
  constructor(private readonly deps: { db?: Database } = {}) {}

  private get db(): Database {
    return this.deps.db ?? getDatabase();
  }

  async append(input: Omit<LeadActivity, 'id' | 'createdAt'> & { createdAt?: Date }): Promise<LeadActivity> {
    const [record] = await this.db.insert(leadActivities).values(input).returning();
    if (!record) {
      throw new Error('Lead activity insert returned no row');
    }
    return mapActivity(record);
  }

  async listByLead(tenantId: string, leadId: string, limit = 50): Promise<LeadActivity[]> {
    const records = await this.db
      .select()
      .from(leadActivities)
      .where(and(eq(leadActivities.tenantId, tenantId), eq(leadActivities.leadId, leadId)))
      .orderBy(desc(leadActivities.createdAt))
      .limit(limit);
    return records.map(mapActivity);
  }

  async listRecent(filter: { tenantId: string; scope: LeadScope }, limit: number): Promise<LeadActivity[]> {
    const { scope } = filter;
    if (scope.kind === 'assignees' && scope.userIds.length === 0) {
      return [];
    }

    const rows = await this.db
      .select({ activity: leadActivities })
      .from(leadActivities)
      .innerJoin(leads, eq(leads.id, leadActivities.leadId))
      .where(
        and(
          eq(leadActivities.tenantId, filter.tenantId),
          scope.kind === 'assignees' ? inArray(leads.assignedToId, scope.userIds) : undefined
        )
      )
      .orderBy(desc(leadActivities.createdAt))
      .limit(limit);
    return rows.map((row) => mapActivity(row.activity));
  }
}
