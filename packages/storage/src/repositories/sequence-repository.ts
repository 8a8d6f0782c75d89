import { and, asc, eq, sql } from 'drizzle-orm';
import type {
  CreateInput,
  EmailSequence,
  EmailSequenceEnrollment,
  EmailSequenceStep,
} from '@salesdesk/core';

import { getDatabase, type Database } from '../db-client';
import {
  emailSequenceEnrollments,
  emailSequenceSteps,
  emailSequences,
  type EmailSequenceEnrollmentRecord,
  type EmailSequenceRecord,
  type EmailSequenceStepRecord,
} from '../schema';
import type {
  EnrollmentPatch,
  EnrollmentRepository,
  SequencePatch,
  SequenceRepository,
  SequenceTrigger,
} from '../types';

const mapSequence = (record: EmailSequenceRecord): EmailSequence => ({
  id: record.id,
  tenantId: record.tenantId,
  userId: record.userId,
  name: record.name,
  description: record.description,
  isActive: record.isActive,
  triggerOnLeadCreation: record.triggerOnLeadCreation,
  triggerOnStatusChange: record.triggerOnStatusChange,
  triggerOnPriorityChange: record.triggerOnPriorityChange,
  delayStartDays: record.delayStartDays,
  createdAt: record.createdAt,
  updatedAt: record.updatedAt,
});

const mapStep = (record: EmailSequenceStepRecord): EmailSequenceStep => ({
  id: record.id,
  tenantId: record.tenantId,
  sequenceId: record.sequenceId,
  stepNumber: record.stepNumber,
  templateId: record.templateId,
  delayDays: record.delayDays,
  sendOnlyIfNotReplied: record.sendOnlyIfNotReplied,
  sendOnlyIfStatus: record.sendOnlyIfStatus,
  isActive: record.isActive,
  createdAt: record.createdAt,
  updatedAt: record.updatedAt,
});

const mapEnrollment = (record: EmailSequenceEnrollmentRecord): EmailSequenceEnrollment => ({
  id: record.id,
  tenantId: record.tenantId,
  sequenceId: record.sequenceId,
  leadId: record.leadId,
  currentStep: record.currentStep,
  isActive: record.isActive,
  emailsSent: record.emailsSent,
  lastEmailSentAt: record.lastEmailSentAt,
  hasReplied: record.hasReplied,
  enrolledAt: record.enrolledAt,
  completedAt: record.completedAt,
  createdAt: record.createdAt,
  updatedAt: record.updatedAt,
});

const triggerCondition = (trigger: SequenceTrigger) => {
  switch (trigger.kind) {
    case 'lead_created':
      return eq(emailSequences.triggerOnLeadCreation, true);
    case 'status_changed':
      return sql`${emailSequences.triggerOnStatusChange} @> ${JSON.stringify([trigger.status])}::jsonb`;
    case 'priority_changed':
      return sql`${emailSequences.triggerOnPriorityChange} @> ${JSON.stringify([trigger.priority])}::jsonb`;
  }
};

export class DrizzleSequenceRepository implements SequenceRepository {
  constructor(private readonly deps: { db?: Database } = {}) {}

  private get db(): Database {
    return this.deps.db ?? getDatabase();
  }

  async create(input: CreateInput<EmailSequence>): Promise<EmailSequence> {
    const [record] = await this.db.insert(emailSequences).values(input).returning();
    if (!record) {
      throw new Error('Sequence insert returned no row');
    }
    return mapSequence(record);
  }

  async findById(tenantId: string, id: string): Promise<EmailSequence | null> {
    const [record] = await this.db
      .select()
      .from(emailSequences)
      .where(and(eq(emailSequences.tenantId, tenantId), eq(emailSequences.id, id)))
      .limit(1);
    return record ? mapSequence(record) : null;
  }

  async listByTenant(tenantId: string, filters: { userId?: string } = {}): Promise<EmailSequence[]> {
    const records = await this.db
      .select()
      .from(emailSequences)
      .where(
        and(eq(emailSequences.tenantId, tenantId), filters.userId ? eq(emailSequences.userId, filters.userId) : undefined)
      )
      .orderBy(asc(emailSequences.name));
    return records.map(mapSequence);
  }

  async update(tenantId: string, id: string, patch: SequencePatch): Promise<EmailSequence | null> {
    const [record] = await this.db
      .update(emailSequences)
      .set({ ...patch, updatedAt: new Date() })
      .where(and(eq(emailSequences.tenantId, tenantId), eq(emailSequences.id, id)))
      .returning();
    return record ? mapSequence(record) : null;
  }

  async listTriggered(tenantId: string, trigger: SequenceTrigger): Promise<EmailSequence[]> {
    const records = await this.db
      .select()
      .from(emailSequences)
      .where(and(eq(emailSequences.tenantId, tenantId), eq(emailSequences.isActive, true), triggerCondition(trigger)))
      .orderBy(asc(emailSequences.createdAt));
    return records.map(mapSequence);
  }

  async addStep(input: CreateInput<EmailSequenceStep>): Promise<EmailSequenceStep> {
    const [record] = await this.db.insert(emailSequenceSteps).values(input).returning();
    if (!record) {
      throw new Error('Sequence step insert returned no row');
    }
    return mapStep(record);
  }

  async listSteps(sequenceId: string): Promise<EmailSequenceStep[]> {
    const records = await this.db
      .select()
      .from(emailSequenceSteps)
      .where(eq(emailSequenceSteps.sequenceId, sequenceId))
      .orderBy(asc(emailSequenceSteps.stepNumber));
    return records.map(mapStep);
  }

  async findActiveStep(sequenceId: string, stepNumber: number): Promise<EmailSequenceStep | null> {
    const [record] = await this.db
      .select()
      .from(emailSequenceSteps)
      .where(
        and(
          eq(emailSequenceSteps.sequenceId, sequenceId),
          eq(emailSequenceSteps.stepNumber, stepNumber),
          eq(emailSequenceSteps.isActive, true)
        )
      )
      .limit(1);
    return record ? mapStep(record) : null;
  }
}

export class DrizzleEnrollmentRepository implements EnrollmentRepository {
  constructor(private readonly deps: { db?: Database } = {}) {}

  private get db(): Database {
    return this.deps.db ?? getDatabase();
  }

  async findOrCreate(input: {
    tenantId: string;
    sequenceId: string;
    leadId: string;
    enrolledAt: Date;
  }): Promise<{ enrollment: EmailSequenceEnrollment; created: boolean }> {
    const [inserted] = await this.db
      .insert(emailSequenceEnrollments)
      .values(input)
      .onConflictDoNothing({ target: [emailSequenceEnrollments.sequenceId, emailSequenceEnrollments.leadId] })
      .returning();

    if (inserted) {
      return { enrollment: mapEnrollment(inserted), created: true };
    }

    const [existing] = await this.db
      .select()
      .from(emailSequenceEnrollments)
      .where(
        and(
          eq(emailSequenceEnrollments.sequenceId, input.sequenceId),
          eq(emailSequenceEnrollments.leadId, input.leadId)
        )
      )
      .limit(1);

    if (!existing) {
      throw new Error(`Enrollment for sequence ${input.sequenceId} and lead ${input.leadId} vanished`);
    }

    return { enrollment: mapEnrollment(existing), created: false };
  }

  async findById(id: string): Promise<EmailSequenceEnrollment | null> {
    const [record] = await this.db
      .select()
      .from(emailSequenceEnrollments)
      .where(eq(emailSequenceEnrollments.id, id))
      .limit(1);
    return record ? mapEnrollment(record) : null;
  }

  async update(id: string, patch: EnrollmentPatch): Promise<EmailSequenceEnrollment | null> {
    const [record] = await this.db
      .update(emailSequenceEnrollments)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(emailSequenceEnrollments.id, id))
      .returning();
    return record ? mapEnrollment(record) : null;
  }

  async listActive(): Promise<EmailSequenceEnrollment[]> {
    const records = await this.db
      .select()
      .from(emailSequenceEnrollments)
      .where(eq(emailSequenceEnrollments.isActive, true))
      .orderBy(asc(emailSequenceEnrollments.enrolledAt));
    return records.map(mapEnrollment);
  }

  async listActiveForLead(tenantId: string, leadId: string): Promise<EmailSequenceEnrollment[]> {
    const records = await this.db
      .select()
      .from(emailSequenceEnrollments)
      .where(
        and(
          eq(emailSequenceEnrollments.tenantId, tenantId),
          eq(emailSequenceEnrollments.leadId, leadId),
          eq(emailSequenceEnrollments.isActive, true)
        )
      );
    return records.map(mapEnrollment);
  }

  async listBySequence(sequenceId: string): Promise<EmailSequenceEnrollment[]> {
    const records = await this.db
      .select()
      .from(emailSequenceEnrollments)
      .where(eq(emailSequenceEnrollments.sequenceId, sequenceId))
      .orderBy(asc(emailSequenceEnrollments.enrolledAt));
    return records.map(mapEnrollment);
  }
}
