import {
  and,
  asc,
  count,
  desc,
  eq,
  gte,
  ilike,
  inArray,
  isNull,
  lt,
  notInArray,
  or,
  sql,
  type SQL,
} from 'drizzle-orm';
import {
  CLOSED_STATUSES,
  FOLLOW_UP_STATUSES,
  buildPaginatedResult,
  type CampaignTargeting,
  type CreateInput,
  type Lead,
  type PaginatedResult,
  type Pagination,
} from '@salesdesk/core';

import { getDatabase, type Database } from '../db-client';
import { leads, type LeadRecord } from '../schema';
import type {
  LeadAggregateRow,
  LeadGroupBy,
  LeadListFilters,
  LeadPatch,
  LeadRepository,
  LeadScope,
  ScopedLeadFilter,
} from '../types';

export interface LeadRepositoryDependencies {
  db?: Database;
}

const toBudget = (value: string | null): number | null => {
  if (value === null) {
    return null;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
};

const fromBudget = (value: number | null | undefined): string | null | undefined =>
  value === undefined ? undefined : value === null ? null : value.toFixed(2);

export const mapLead = (record: LeadRecord): Lead => ({
  id: record.id,
  tenantId: record.tenantId,
  firstName: record.firstName,
  lastName: record.lastName,
  email: record.email,
  phone: record.phone,
  company: record.company,
  jobTitle: record.jobTitle,
  sourceId: record.sourceId,
  status: record.status,
  priority: record.priority,
  assignedToId: record.assignedToId,
  createdById: record.createdById,
  address: record.address,
  city: record.city,
  state: record.state,
  country: record.country,
  postalCode: record.postalCode,
  budget: toBudget(record.budget),
  requirements: record.requirements,
  notes: record.notes,
  lastContactedAt: record.lastContactedAt,
  createdAt: record.createdAt,
  updatedAt: record.updatedAt,
});

const scopeCondition = (scope: LeadScope): SQL | undefined => {
  if (scope.kind === 'tenant') {
    return undefined;
  }
  return scope.userIds.length > 0 ? inArray(leads.assignedToId, scope.userIds) : sql`false`;
};

const scopedConditions = (filter: ScopedLeadFilter): Array<SQL | undefined> => [
  eq(leads.tenantId, filter.tenantId),
  scopeCondition(filter.scope),
  filter.createdFrom ? gte(leads.createdAt, filter.createdFrom) : undefined,
  filter.createdTo ? lt(leads.createdAt, filter.createdTo) : undefined,
];

const overdueCondition = (contactedBefore: Date): SQL | undefined =>
  and(
    inArray(leads.status, [...FOLLOW_UP_STATUSES]),
    or(isNull(leads.lastContactedAt), lt(leads.lastContactedAt, contactedBefore))
  );

const countWhere = (condition: SQL) => sql<number>`count(*) filter (where ${condition})`.mapWith(Number);
const sumWhere = (condition: SQL) =>
  sql<number>`coalesce(sum(${leads.budget}) filter (where ${condition}), 0)`.mapWith(Number);

const groupKeys: Record<Exclude<LeadGroupBy, 'none'>, SQL<string | null>> = {
  status: sql<string | null>`${leads.status}::text`,
  priority: sql<string | null>`${leads.priority}::text`,
  source: sql<string | null>`${leads.sourceId}::text`,
  assignee: sql<string | null>`${leads.assignedToId}::text`,
  month: sql<string | null>`to_char(date_trunc('month', ${leads.createdAt}), 'YYYY-MM')`,
};

export class DrizzleLeadRepository implements LeadRepository {
  constructor(private readonly deps: LeadRepositoryDependencies = {}) {}

  private get db(): Database {
    return this.deps.db ?? getDatabase();
  }

  async create(input: CreateInput<Lead>): Promise<Lead> {
    const [record] = await this.db
      .insert(leads)
      .values({ ...input, budget: fromBudget(input.budget) ?? null })
      .returning();
    if (!record) {
      throw new Error('Lead insert returned no row');
    }
    return mapLead(record);
  }

  async findById(tenantId: string, id: string): Promise<Lead | null> {
    const [record] = await this.db
      .select()
      .from(leads)
      .where(and(eq(leads.tenantId, tenantId), eq(leads.id, id)))
      .limit(1);
    return record ? mapLead(record) : null;
  }

  async findByIds(tenantId: string, ids: string[]): Promise<Lead[]> {
    if (ids.length === 0) {
      return [];
    }
    const records = await this.db
      .select()
      .from(leads)
      .where(and(eq(leads.tenantId, tenantId), inArray(leads.id, ids)));
    return records.map(mapLead);
  }

  async update(tenantId: string, id: string, patch: LeadPatch): Promise<Lead | null> {
    const { budget, ...rest } = patch;
    const [record] = await this.db
      .update(leads)
      .set({ ...rest, budget: fromBudget(budget), updatedAt: new Date() })
      .where(and(eq(leads.tenantId, tenantId), eq(leads.id, id)))
      .returning();
    return record ? mapLead(record) : null;
  }

  async list(filters: LeadListFilters, pagination: Pagination): Promise<PaginatedResult<Lead>> {
    const search = filters.search?.trim();
    const pattern = search ? `%${search}%` : null;

    const where = and(
      ...scopedConditions(filters),
      filters.statuses?.length ? inArray(leads.status, filters.statuses) : undefined,
      filters.priorities?.length ? inArray(leads.priority, filters.priorities) : undefined,
      filters.sourceId ? eq(leads.sourceId, filters.sourceId) : undefined,
      filters.assignedToId ? eq(leads.assignedToId, filters.assignedToId) : undefined,
      pattern
        ? or(
            ilike(leads.firstName, pattern),
            ilike(leads.lastName, pattern),
            ilike(leads.email, pattern),
            ilike(leads.company, pattern),
            ilike(leads.phone, pattern)
          )
        : undefined
    );

    const [records, [totals]] = await Promise.all([
      this.db
        .select()
        .from(leads)
        .where(where)
        .orderBy(desc(leads.createdAt))
        .limit(pagination.limit)
        .offset((pagination.page - 1) * pagination.limit),
      this.db.select({ total: count() }).from(leads).where(where),
    ]);

    return buildPaginatedResult(records.map(mapLead), totals?.total ?? 0, pagination);
  }

  async findCampaignTargets(tenantId: string, targeting: CampaignTargeting): Promise<Lead[]> {
    const hasEmail = sql`trim(${leads.email}) <> ''`;

    let audience: SQL | undefined;
    if (!targeting.targetAllLeads) {
      const predicates = [
        targeting.targetStatuses.length ? inArray(leads.status, targeting.targetStatuses) : undefined,
        targeting.targetPriorities.length ? inArray(leads.priority, targeting.targetPriorities) : undefined,
        targeting.targetSourceIds.length ? inArray(leads.sourceId, targeting.targetSourceIds) : undefined,
        targeting.specificLeadIds.length ? inArray(leads.id, targeting.specificLeadIds) : undefined,
      ].filter((predicate): predicate is SQL => predicate !== undefined);

      if (predicates.length === 0) {
        return [];
      }
      audience = or(...predicates);
    }

    const records = await this.db
      .select()
      .from(leads)
      .where(and(eq(leads.tenantId, tenantId), hasEmail, audience))
      .orderBy(asc(leads.createdAt));

    return records.map(mapLead);
  }

  async listOverdue(filter: ScopedLeadFilter, contactedBefore: Date, limit: number): Promise<Lead[]> {
    const records = await this.db
      .select()
      .from(leads)
      .where(and(...scopedConditions(filter), overdueCondition(contactedBefore)))
      .orderBy(sql`${leads.lastContactedAt} asc nulls first`)
      .limit(limit);
    return records.map(mapLead);
  }

  async countOverdue(filter: ScopedLeadFilter, contactedBefore: Date): Promise<number> {
    const [row] = await this.db
      .select({ total: count() })
      .from(leads)
      .where(and(...scopedConditions(filter), overdueCondition(contactedBefore)));
    return row?.total ?? 0;
  }

  async aggregate(filter: ScopedLeadFilter, groupBy: LeadGroupBy): Promise<LeadAggregateRow[]> {
    const key = groupBy === 'none' ? sql<string | null>`null` : groupKeys[groupBy];
    const isWon = eq(leads.status, 'won');

    const query = this.db
      .select({
        key,
        total: count(),
        won: countWhere(isWon),
        lost: countWhere(eq(leads.status, 'lost')),
        hot: countWhere(eq(leads.priority, 'hot')),
        hotWon: countWhere(sql`${leads.priority} = 'hot' and ${leads.status} = 'won'`),
        wonRevenue: sumWhere(isWon),
        wonWithBudget: countWhere(sql`${leads.status} = 'won' and ${leads.budget} is not null`),
        openRevenue: sumWhere(notInArray(leads.status, [...CLOSED_STATUSES])),
      })
      .from(leads)
      .where(and(...scopedConditions(filter)));

    const rows = groupBy === 'none' ? await query : await query.groupBy(key);
    return rows;
  }
}
