import { and, asc, count, desc, eq, gte, lt, sql } from 'drizzle-orm';
import {
  buildPaginatedResult,
  type Email,
  type EmailTrackingEvent,
  type PaginatedResult,
  type Pagination,
} from '@salesdesk/core';

import { getDatabase, type Database } from '../db-client';
import { emailTrackingEvents, emails, type EmailRecord, type EmailTrackingEventRecord } from '../schema';
import type {
  EmailListFilters,
  EmailPatch,
  EmailRepository,
  EmailStatusCounts,
  EmailTrackingRepository,
  NewEmail,
} from '../types';

export const mapEmail = (record: EmailRecord): Email => ({
  id: record.id,
  tenantId: record.tenantId,
  trackingId: record.trackingId,
  userId: record.userId,
  leadId: record.leadId,
  campaignId: record.campaignId,
  templateId: record.templateId,
  subject: record.subject,
  bodyHtml: record.bodyHtml,
  bodyText: record.bodyText,
  fromEmail: record.fromEmail,
  fromName: record.fromName,
  toEmail: record.toEmail,
  toName: record.toName,
  replyTo: record.replyTo,
  status: record.status,
  externalId: record.externalId,
  sentAt: record.sentAt,
  deliveredAt: record.deliveredAt,
  openedAt: record.openedAt,
  clickedAt: record.clickedAt,
  repliedAt: record.repliedAt,
  openCount: record.openCount,
  clickCount: record.clickCount,
  errorMessage: record.errorMessage,
  retryCount: record.retryCount,
  maxRetries: record.maxRetries,
  createdAt: record.createdAt,
  updatedAt: record.updatedAt,
});

export const emptyStatusCounts = (): EmailStatusCounts => ({
  queued: 0,
  sending: 0,
  sent: 0,
  delivered: 0,
  opened: 0,
  clicked: 0,
  replied: 0,
  bounced: 0,
  failed: 0,
  spam: 0,
});

const filterConditions = (filters: EmailListFilters) =>
  and(
    eq(emails.tenantId, filters.tenantId),
    filters.userId ? eq(emails.userId, filters.userId) : undefined,
    filters.leadId ? eq(emails.leadId, filters.leadId) : undefined,
    filters.campaignId ? eq(emails.campaignId, filters.campaignId) : undefined,
    filters.templateId ? eq(emails.templateId, filters.templateId) : undefined,
    filters.status ? eq(emails.status, filters.status) : undefined,
    filters.createdFrom ? gte(emails.createdAt, filters.createdFrom) : undefined,
    filters.createdTo ? lt(emails.createdAt, filters.createdTo) : undefined
  );

export class DrizzleEmailRepository implements EmailRepository {
  constructor(private readonly deps: { db?: Database } = {}) {}

  private get db(): Database {
    return this.deps.db ?? getDatabase();
  }

  async create(input: NewEmail): Promise<Email> {
    const [record] = await this.db.insert(emails).values(input).returning();
    if (!record) {
      throw new Error('Email insert returned no row');
    }
    return mapEmail(record);
  }

  async createForCampaign(input: NewEmail & { campaignId: string }): Promise<Email | null> {
    const [record] = await this.db
      .insert(emails)
      .values(input)
      .onConflictDoNothing({
        target: [emails.campaignId, emails.leadId],
        where: sql`${emails.campaignId} is not null`,
      })
      .returning();
    return record ? mapEmail(record) : null;
  }

  async findById(tenantId: string, id: string): Promise<Email | null> {
    const [record] = await this.db
      .select()
      .from(emails)
      .where(and(eq(emails.tenantId, tenantId), eq(emails.id, id)))
      .limit(1);
    return record ? mapEmail(record) : null;
  }

  async findByTrackingId(trackingId: string): Promise<Email | null> {
    const [record] = await this.db.select().from(emails).where(eq(emails.trackingId, trackingId)).limit(1);
    return record ? mapEmail(record) : null;
  }

  async update(id: string, patch: EmailPatch): Promise<Email | null> {
    const [record] = await this.db
      .update(emails)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(emails.id, id))
      .returning();
    return record ? mapEmail(record) : null;
  }

  async listLeadIdsForCampaign(campaignId: string): Promise<Set<string>> {
    const rows = await this.db.select({ leadId: emails.leadId }).from(emails).where(eq(emails.campaignId, campaignId));
    return new Set(rows.map((row) => row.leadId));
  }

  async listQueuedForCampaign(campaignId: string, limit: number): Promise<Email[]> {
    const records = await this.db
      .select()
      .from(emails)
      .where(and(eq(emails.campaignId, campaignId), eq(emails.status, 'queued')))
      .orderBy(asc(emails.createdAt))
      .limit(limit);
    return records.map(mapEmail);
  }

  async countQueuedForCampaign(campaignId: string): Promise<number> {
    const [row] = await this.db
      .select({ total: count() })
      .from(emails)
      .where(and(eq(emails.campaignId, campaignId), eq(emails.status, 'queued')));
    return row?.total ?? 0;
  }

  async listRetryable(limit: number): Promise<Email[]> {
    const records = await this.db
      .select()
      .from(emails)
      .where(and(eq(emails.status, 'failed'), lt(emails.retryCount, emails.maxRetries)))
      .orderBy(asc(emails.updatedAt))
      .limit(limit);
    return records.map(mapEmail);
  }

  async list(filters: EmailListFilters, pagination: Pagination): Promise<PaginatedResult<Email>> {
    const where = filterConditions(filters);
    const [records, [totals]] = await Promise.all([
      this.db
        .select()
        .from(emails)
        .where(where)
        .orderBy(desc(emails.createdAt))
        .limit(pagination.limit)
        .offset((pagination.page - 1) * pagination.limit),
      this.db.select({ total: count() }).from(emails).where(where),
    ]);
    return buildPaginatedResult(records.map(mapEmail), totals?.total ?? 0, pagination);
  }

  async countByStatus(filters: EmailListFilters): Promise<EmailStatusCounts> {
    const rows = await this.db
      .select({ status: emails.status, total: count() })
      .from(emails)
      .where(filterConditions(filters))
      .groupBy(emails.status);

    const counts = emptyStatusCounts();
    for (const row of rows) {
      counts[row.status] = row.total;
    }
    return counts;
  }
}

const mapTrackingEvent = (record: EmailTrackingEventRecord): EmailTrackingEvent => ({
  id: record.id,
  emailId: record.emailId,
  eventType: record.eventType,
  ipAddress: record.ipAddress,
  userAgent: record.userAgent,
  clickedUrl: record.clickedUrl,
  bounceReason: record.bounceReason,
  providerData: record.providerData,
  occurredAt: record.occurredAt,
});

export class DrizzleEmailTrackingRepository implements EmailTrackingRepository {
  constructor(private readonly deps: { db?: Database } = {}) {}

  private get db(): Database {
    return this.deps.db ?? getDatabase();
  }

  async append(input: Omit<EmailTrackingEvent, 'id'>): Promise<EmailTrackingEvent> {
    const [record] = await this.db.insert(emailTrackingEvents).values(input).returning();
    if (!record) {
      throw new Error('Tracking event insert returned no row');
    }
    return mapTrackingEvent(record);
  }

  async listByEmail(emailId: string): Promise<EmailTrackingEvent[]> {
    const records = await this.db
      .select()
      .from(emailTrackingEvents)
      .where(eq(emailTrackingEvents.emailId, emailId))
      .orderBy(asc(emailTrackingEvents.occurredAt));
    return records.map(mapTrackingEvent);
  }
}
