import { and, asc, count, desc, eq, lte, sql } from 'drizzle-orm';
import {
  buildPaginatedResult,
  type CampaignStatus,
  type CreateInput,
  type EmailCampaign,
  type PaginatedResult,
  type Pagination,
} from '@salesdesk/core';

import { getDatabase, type Database } from '../db-client';
import { emailCampaigns, type EmailCampaignRecord } from '../schema';
import type { CampaignPatch, CampaignRepository } from '../types';

const mapCampaign = (record: EmailCampaignRecord): EmailCampaign => ({
  id: record.id,
  tenantId: record.tenantId,
  userId: record.userId,
  name: record.name,
  description: record.description,
  templateId: record.templateId,
  emailConfigId: record.emailConfigId,
  status: record.status,
  scheduledAt: record.scheduledAt,
  sendNow: record.sendNow,
  targetAllLeads: record.targetAllLeads,
  targetStatuses: record.targetStatuses,
  targetPriorities: record.targetPriorities,
  targetSourceIds: record.targetSourceIds,
  specificLeadIds: record.specificLeadIds,
  batchSize: record.batchSize,
  delayBetweenBatches: record.delayBetweenBatches,
  totalRecipients: record.totalRecipients,
  emailsSent: record.emailsSent,
  emailsFailed: record.emailsFailed,
  startedAt: record.startedAt,
  completedAt: record.completedAt,
  createdAt: record.createdAt,
  updatedAt: record.updatedAt,
});

export class DrizzleCampaignRepository implements CampaignRepository {
  constructor(private readonly deps: { db?: Database } = {}) {}

  private get db(): Database {
    return this.deps.db ?? getDatabase();
  }

  async create(input: CreateInput<EmailCampaign>): Promise<EmailCampaign> {
    const [record] = await this.db.insert(emailCampaigns).values(input).returning();
    if (!record) {
      throw new Error('Campaign insert returned no row');
    }
    return mapCampaign(record);
  }

  async findById(tenantId: string, id: string): Promise<EmailCampaign | null> {
    const [record] = await this.db
      .select()
      .from(emailCampaigns)
      .where(and(eq(emailCampaigns.tenantId, tenantId), eq(emailCampaigns.id, id)))
      .limit(1);
    return record ? mapCampaign(record) : null;
  }

  async list(
    filters: { tenantId: string; userId?: string; status?: CampaignStatus },
    pagination: Pagination
  ): Promise<PaginatedResult<EmailCampaign>> {
    const where = and(
      eq(emailCampaigns.tenantId, filters.tenantId),
      filters.userId ? eq(emailCampaigns.userId, filters.userId) : undefined,
      filters.status ? eq(emailCampaigns.status, filters.status) : undefined
    );

    const [records, [totals]] = await Promise.all([
      this.db
        .select()
        .from(emailCampaigns)
        .where(where)
        .orderBy(desc(emailCampaigns.createdAt))
        .limit(pagination.limit)
        .offset((pagination.page - 1) * pagination.limit),
      this.db.select({ total: count() }).from(emailCampaigns).where(where),
    ]);

    return buildPaginatedResult(records.map(mapCampaign), totals?.total ?? 0, pagination);
  }

  async update(id: string, patch: CampaignPatch): Promise<EmailCampaign | null> {
    const [record] = await this.db
      .update(emailCampaigns)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(emailCampaigns.id, id))
      .returning();
    return record ? mapCampaign(record) : null;
  }

  async incrementCounters(id: string, delta: { sent?: number; failed?: number }): Promise<void> {
    await this.db
      .update(emailCampaigns)
      .set({
        emailsSent: sql`${emailCampaigns.emailsSent} + ${delta.sent ?? 0}`,
        emailsFailed: sql`greatest(${emailCampaigns.emailsFailed} + ${delta.failed ?? 0}, 0)`,
        updatedAt: new Date(),
      })
      .where(eq(emailCampaigns.id, id));
  }

  async listDueScheduled(now: Date): Promise<EmailCampaign[]> {
    const records = await this.db
      .select()
      .from(emailCampaigns)
      .where(and(eq(emailCampaigns.status, 'scheduled'), lte(emailCampaigns.scheduledAt, now)))
      .orderBy(asc(emailCampaigns.scheduledAt));
    return records.map(mapCampaign);
  }

  async listByStatus(status: CampaignStatus): Promise<EmailCampaign[]> {
    const records = await this.db
      .select()
      .from(emailCampaigns)
      .where(eq(emailCampaigns.status, status))
      .orderBy(asc(emailCampaigns.startedAt));
    return records.map(mapCampaign);
  }
}
