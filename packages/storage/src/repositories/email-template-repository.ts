import { and, asc, eq, or, sql } from 'drizzle-orm';
import type { CreateInput, EmailTemplate } from '@salesdesk/core';

import { getDatabase, type Database } from '../db-client';
import { emailTemplates, type EmailTemplateRecord } from '../schema';
import type { EmailTemplatePatch, EmailTemplateRepository } from '../types';

const mapTemplate = (record: EmailTemplateRecord): EmailTemplate => ({
  id: record.id,
  tenantId: record.tenantId,
  userId: record.userId,
  name: record.name,
  templateType: record.templateType,
  subject: record.subject,
  bodyHtml: record.bodyHtml,
  bodyText: record.bodyText,
  isActive: record.isActive,
  isShared: record.isShared,
  usageCount: record.usageCount,
  lastUsedAt: record.lastUsedAt,
  createdAt: record.createdAt,
  updatedAt: record.updatedAt,
});

export class DrizzleEmailTemplateRepository implements EmailTemplateRepository {
  constructor(private readonly deps: { db?: Database } = {}) {}

  private get db(): Database {
    return this.deps.db ?? getDatabase();
  }

  async create(input: CreateInput<EmailTemplate>): Promise<EmailTemplate> {
    const [record] = await this.db.insert(emailTemplates).values(input).returning();
    if (!record) {
      throw new Error('Email template insert returned no row');
    }
    return mapTemplate(record);
  }

  async findById(tenantId: string, id: string): Promise<EmailTemplate | null> {
    const [record] = await this.db
      .select()
      .from(emailTemplates)
      .where(and(eq(emailTemplates.tenantId, tenantId), eq(emailTemplates.id, id)))
      .limit(1);
    return record ? mapTemplate(record) : null;
  }

  async listAccessible(tenantId: string, userId: string): Promise<EmailTemplate[]> {
    const records = await this.db
      .select()
      .from(emailTemplates)
      .where(
        and(
          eq(emailTemplates.tenantId, tenantId),
          or(eq(emailTemplates.userId, userId), eq(emailTemplates.isShared, true))
        )
      )
      .orderBy(asc(emailTemplates.name));
    return records.map(mapTemplate);
  }

  async update(tenantId: string, id: string, patch: EmailTemplatePatch): Promise<EmailTemplate | null> {
    const [record] = await this.db
      .update(emailTemplates)
      .set({ ...patch, updatedAt: new Date() })
      .where(and(eq(emailTemplates.tenantId, tenantId), eq(emailTemplates.id, id)))
      .returning();
    return record ? mapTemplate(record) : null;
  }

  async recordUsage(id: string, usedAt: Date): Promise<void> {
    await this.db
      .update(emailTemplates)
      .set({ usageCount: sql`${emailTemplates.usageCount} + 1`, lastUsedAt: usedAt })
      .where(eq(emailTemplates.id, id));
  }
}
