import { and, asc, desc, eq, ne } from 'drizzle-orm';
import type { CreateInput, EmailConfiguration } from '@salesdesk/core';

import { getDatabase, type Database } from '../db-client';
import { emailConfigurations, type EmailConfigurationRecord } from '../schema';
import type { EmailConfigurationPatch, EmailConfigurationRepository } from '../types';

const mapConfiguration = (record: EmailConfigurationRecord): EmailConfiguration => ({
  id: record.id,
  tenantId: record.tenantId,
  userId: record.userId,
  name: record.name,
  provider: record.provider,
  smtpHost: record.smtpHost,
  smtpPort: record.smtpPort,
  smtpUsername: record.smtpUsername,
  smtpPassword: record.smtpPassword,
  useTls: record.useTls,
  useSsl: record.useSsl,
  fromEmail: record.fromEmail,
  fromName: record.fromName,
  replyTo: record.replyTo,
  isActive: record.isActive,
  isDefault: record.isDefault,
  dailyLimit: record.dailyLimit,
  createdAt: record.createdAt,
  updatedAt: record.updatedAt,
});

export class DrizzleEmailConfigurationRepository implements EmailConfigurationRepository {
  constructor(private readonly deps: { db?: Database } = {}) {}

  private get db(): Database {
    return this.deps.db ?? getDatabase();
  }

  async create(input: CreateInput<EmailConfiguration>): Promise<EmailConfiguration> {
    const [record] = await this.db.insert(emailConfigurations).values(input).returning();
    if (!record) {
      throw new Error('Email configuration insert returned no row');
    }
    return mapConfiguration(record);
  }

  async findById(tenantId: string, id: string): Promise<EmailConfiguration | null> {
    const [record] = await this.db
      .select()
      .from(emailConfigurations)
      .where(and(eq(emailConfigurations.tenantId, tenantId), eq(emailConfigurations.id, id)))
      .limit(1);
    return record ? mapConfiguration(record) : null;
  }

  async listByUser(tenantId: string, userId: string): Promise<EmailConfiguration[]> {
    const records = await this.db
      .select()
      .from(emailConfigurations)
      .where(and(eq(emailConfigurations.tenantId, tenantId), eq(emailConfigurations.userId, userId)))
      .orderBy(desc(emailConfigurations.isDefault), asc(emailConfigurations.name));
    return records.map(mapConfiguration);
  }

  async update(tenantId: string, id: string, patch: EmailConfigurationPatch): Promise<EmailConfiguration | null> {
    const [record] = await this.db
      .update(emailConfigurations)
      .set({ ...patch, updatedAt: new Date() })
      .where(and(eq(emailConfigurations.tenantId, tenantId), eq(emailConfigurations.id, id)))
      .returning();
    return record ? mapConfiguration(record) : null;
  }

  async markDefault(tenantId: string, userId: string, id: string): Promise<EmailConfiguration | null> {
    return this.db.transaction(async (tx) => {
      const ownedByUser = and(
        eq(emailConfigurations.tenantId, tenantId),
        eq(emailConfigurations.userId, userId)
      );
      const [target] = await tx
        .select({ id: emailConfigurations.id })
        .from(emailConfigurations)
        .where(and(ownedByUser, eq(emailConfigurations.id, id)))
        .limit(1);

      if (!target) {
        return null;
      }

      const now = new Date();
      // Clear first: the partial unique index admits a single default per user.
      await tx
        .update(emailConfigurations)
        .set({ isDefault: false, updatedAt: now })
        .where(and(ownedByUser, eq(emailConfigurations.isDefault, true), ne(emailConfigurations.id, id)));

      const [record] = await tx
        .update(emailConfigurations)
        .set({ isDefault: true, updatedAt: now })
        .where(eq(emailConfigurations.id, id))
        .returning();

      return record ? mapConfiguration(record) : null;
    });
  }
}
