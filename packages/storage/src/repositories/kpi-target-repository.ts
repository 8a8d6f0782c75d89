import { and, desc, eq, gte, lte, sql } from 'drizzle-orm';
import type { CreateInput, KpiTarget, KpiType } from '@salesdesk/core';

import { getDatabase, type Database } from '../db-client';
import { kpiTargets, type KpiTargetRecord } from '../schema';
import type { KpiTargetPatch, KpiTargetRepository } from '../types';

const mapKpiTarget = (record: KpiTargetRecord): KpiTarget => ({
  id: record.id,
  tenantId: record.tenantId,
  userId: record.userId,
  kpiType: record.kpiType,
  targetValue: Number(record.targetValue),
  currentValue: Number(record.currentValue),
  periodStart: record.periodStart,
  periodEnd: record.periodEnd,
  isActive: record.isActive,
  createdAt: record.createdAt,
  updatedAt: record.updatedAt,
});

export class DrizzleKpiTargetRepository implements KpiTargetRepository {
  constructor(private readonly deps: { db?: Database } = {}) {}

  private get db(): Database {
    return this.deps.db ?? getDatabase();
  }

  async create(input: CreateInput<KpiTarget>): Promise<KpiTarget> {
    const [record] = await this.db
      .insert(kpiTargets)
      .values({
        ...input,
        targetValue: input.targetValue.toFixed(2),
        currentValue: input.currentValue.toFixed(2),
      })
      .returning();
    if (!record) {
      throw new Error('KPI target insert returned no row');
    }
    return mapKpiTarget(record);
  }

  async findById(tenantId: string, id: string): Promise<KpiTarget | null> {
    const [record] = await this.db
      .select()
      .from(kpiTargets)
      .where(and(eq(kpiTargets.tenantId, tenantId), eq(kpiTargets.id, id)))
      .limit(1);
    return record ? mapKpiTarget(record) : null;
  }

  async update(tenantId: string, id: string, patch: KpiTargetPatch): Promise<KpiTarget | null> {
    const [record] = await this.db
      .update(kpiTargets)
      .set({
        isActive: patch.isActive,
        targetValue: patch.targetValue?.toFixed(2),
        currentValue: patch.currentValue?.toFixed(2),
        updatedAt: new Date(),
      })
      .where(and(eq(kpiTargets.tenantId, tenantId), eq(kpiTargets.id, id)))
      .returning();
    return record ? mapKpiTarget(record) : null;
  }

  async listForUser(tenantId: string, userId: string, options: { activeOn?: Date } = {}): Promise<KpiTarget[]> {
    const { activeOn } = options;
    const records = await this.db
      .select()
      .from(kpiTargets)
      .where(
        and(
          eq(kpiTargets.tenantId, tenantId),
          eq(kpiTargets.userId, userId),
          activeOn ? eq(kpiTargets.isActive, true) : undefined,
          activeOn ? lte(kpiTargets.periodStart, activeOn) : undefined,
          activeOn ? gte(kpiTargets.periodEnd, activeOn) : undefined
        )
      )
      .orderBy(desc(kpiTargets.periodStart));
    return records.map(mapKpiTarget);
  }

  async incrementActive(tenantId: string, userId: string, kpiType: KpiType, amount: number, at: Date): Promise<number> {
    const updated = await this.db
      .update(kpiTargets)
      .set({ currentValue: sql`${kpiTargets.currentValue} + ${amount}`, updatedAt: new Date() })
      .where(
        and(
          eq(kpiTargets.tenantId, tenantId),
          eq(kpiTargets.userId, userId),
          eq(kpiTargets.kpiType, kpiType),
          eq(kpiTargets.isActive, true),
          lte(kpiTargets.periodStart, at),
          gte(kpiTargets.periodEnd, at)
        )
      )
      .returning({ id: kpiTargets.id });
    return updated.length;
  }
}
