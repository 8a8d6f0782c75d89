import { and, asc, eq } from 'drizzle-orm';
import type { CreateInput, LeadSource } from '@salesdesk/core';

import { getDatabase, type Database } from '../db-client';
import { leadSources, type LeadSourceRecord } from '../schema';
import type { LeadSourceRepository } from '../types';

const mapLeadSource = (record: LeadSourceRecord): LeadSource => ({
  id: record.id,
  tenantId: record.tenantId,
  name: record.name,
  description: record.description,
  isActive: record.isActive,
  createdAt: record.createdAt,
  updatedAt: record.updatedAt,
});

export class DrizzleLeadSourceRepository implements LeadSourceRepository {
  constructor(private readonly deps: { db?: Database } = {}) {}

  private get db(): Database {
    return this.deps.db ?? getDatabase();
  }

  async create(input: CreateInput<LeadSource>): Promise<LeadSource> {
    const [record] = await this.db.insert(leadSources).values(input).returning();
    if (!record) {
      throw new Error('Lead source insert returned no row');
    }
    return mapLeadSource(record);
  }

  async findById(tenantId: string, id: string): Promise<LeadSource | null> {
    const [record] = await this.db
      .select()
      .from(leadSources)
      .where(and(eq(leadSources.tenantId, tenantId), eq(leadSources.id, id)))
      .limit(1);
    return record ? mapLeadSource(record) : null;
  }

  async list(tenantId: string, options: { activeOnly?: boolean } = {}): Promise<LeadSource[]> {
    const records = await this.db
      .select()
      .from(leadSources)
      .where(and(eq(leadSources.tenantId, tenantId), options.activeOnly ? eq(leadSources.isActive, true) : undefined))
      .orderBy(asc(leadSources.name));
    return records.map(mapLeadSource);
  }
}
