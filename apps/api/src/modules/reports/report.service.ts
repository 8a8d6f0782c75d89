import { format, subDays } from 'date-fns';
import {
  LEAD_PRIORITY_LABELS,
  LEAD_STATUS_LABELS,
  LeadPrioritySchema,
  LeadStatusSchema,
  OVERDUE_AFTER_DAYS,
  getUserFullName,
  isAdminRole,
  summarizeEmailTotals,
  type Actor,
  type EmailDeliverySummary,
  type Lead,
  type LeadActivity,
  type LeadPriority,
  type LeadStatus,
  type User,
} from '@salesdesk/core';
import type { LeadAggregateRow, LeadScope, ScopedLeadFilter, StorageRepositories } from '@salesdesk/storage';

import { logger as defaultLogger, type Logger } from '../../config/logger';
import { toKpiProgress, type KpiProgress } from '../kpi/kpi-progress';
import { resolveLeadScope } from '../leads/lead-scope';
import { resolveReportRange, type ReportRange } from './report-range';
import type { ReportQuery } from './report.validators';

const TREND_MONTHS = 6;
const DASHBOARD_LIST_LIMIT = 10;
const DASHBOARD_TOP_LIMIT = 5;

export interface DashboardStats {
  totalLeads: number;
  byStatus: Record<LeadStatus, number>;
  byPriority: Record<LeadPriority, number>;
  createdToday: number;
  createdThisWeek: number;
  createdThisMonth: number;
  conversionRate: number;
  hotConversionRate: number;
  wonRevenue: number;
  pipelineRevenue: number;
  averageDealSize: number;
  overdueLeads: number;
}

export interface FunnelStage {
  stage: string;
  count: number;
  percentage: number;
}

export interface StatusShare {
  status: LeadStatus;
  label: string;
  count: number;
  percentage: number;
}

export interface PriorityShare {
  priority: LeadPriority;
  label: string;
  count: number;
  percentage: number;
}

export interface MonthlyTrendPoint {
  month: string;
  label: string;
  total: number;
  won: number;
  lost: number;
  inProgress: number;
  conversionRate: number;
}

export interface SourcePerformance {
  sourceId: string;
  name: string;
  isActive: boolean;
  totalLeads: number;
  wonLeads: number;
  conversionRate: number;
}

export interface TeamMemberPerformance {
  userId: string;
  name: string;
  totalLeads: number;
  wonLeads: number;
  revenue: number;
  conversionRate: number;
}

export interface TemplatePerformance extends EmailDeliverySummary {
  templateId: string;
  name: string;
  usageCount: number;
}

export interface DashboardReport {
  range: ReportRange;
  stats: DashboardStats;
  funnel: FunnelStage[];
  recentActivities: LeadActivity[];
  overdueLeads: Lead[];
  topSources: SourcePerformance[];
  topPerformers: TeamMemberPerformance[];
  kpiTargets: KpiProgress[];
}

export interface AnalyticsReport {
  range: ReportRange;
  funnel: FunnelStage[];
  monthlyTrend: MonthlyTrendPoint[];
  statusDistribution: StatusShare[];
  priorityBreakdown: PriorityShare[];
  sourcePerformance: SourcePerformance[];
  teamPerformance: TeamMemberPerformance[];
}

export interface EmailAnalyticsReport {
  range: ReportRange;
  summary: EmailDeliverySummary;
  templates: TemplatePerformance[];
}

export interface ReportServiceDependencies {
  repositories: Pick<
    StorageRepositories,
    'leads' | 'leadSources' | 'activities' | 'users' | 'emails' | 'emailTemplates' | 'kpiTargets'
  >;
  logger?: Logger;
  now?: () => Date;
}

export interface ReportServicePort {
  getDashboard(actor: Actor, query: ReportQuery): Promise<DashboardReport>;
  getAnalytics(actor: Actor, query: ReportQuery): Promise<AnalyticsReport>;
  getEmailAnalytics(actor: Actor, query: ReportQuery): Promise<EmailAnalyticsReport>;
}

/** Share of `whole` in percent with one decimal; zero for an empty base. */
export const rate = (part: number, whole: number): number => (whole > 0 ? Number(((part / whole) * 100).toFixed(1)) : 0);

const FUNNEL_STAGES: ReadonlyArray<{ stage: string; statuses: readonly LeadStatus[] | null }> = [
  { stage: 'Total Leads', statuses: null },
  { stage: 'Contacted', statuses: ['contacted', 'qualified', 'proposal', 'negotiation', 'won'] },
  { stage: 'Qualified', statuses: ['qualified', 'proposal', 'negotiation', 'won'] },
  { stage: 'Proposal', statuses: ['proposal', 'negotiation', 'won'] },
  { stage: 'Won', statuses: ['won'] },
];

const sumTotals = (rows: LeadAggregateRow[]): LeadAggregateRow =>
  rows.reduce<LeadAggregateRow>(
    (acc, row) => ({
      key: null,
      total: acc.total + row.total,
      won: acc.won + row.won,
      lost: acc.lost + row.lost,
      hot: acc.hot + row.hot,
      hotWon: acc.hotWon + row.hotWon,
      wonRevenue: acc.wonRevenue + row.wonRevenue,
      wonWithBudget: acc.wonWithBudget + row.wonWithBudget,
      openRevenue: acc.openRevenue + row.openRevenue,
    }),
    { key: null, total: 0, won: 0, lost: 0, hot: 0, hotWon: 0, wonRevenue: 0, wonWithBudget: 0, openRevenue: 0 }
  );

const zeroStatusCounts = (): Record<LeadStatus, number> => ({
  new: 0,
  contacted: 0,
  qualified: 0,
  proposal: 0,
  negotiation: 0,
  won: 0,
  lost: 0,
  on_hold: 0,
});

const zeroPriorityCounts = (): Record<LeadPriority, number> => ({ hot: 0, warm: 0, cold: 0 });

const countsByKey = <K extends string>(zero: Record<K, number>, rows: LeadAggregateRow[]): Record<K, number> => {
  const counts = { ...zero };
  const isKnown = (key: string): key is K => Object.prototype.hasOwnProperty.call(counts, key);

  for (const row of rows) {
    if (row.key !== null && isKnown(row.key)) {
      counts[row.key] += row.total;
    }
  }
  return counts;
};

const monthKeyOf = (date: Date): string =>
  `${date.getUTCFullYear()}-${String(date.getUTCMonth() + 1).padStart(2, '0')}`;

/**
 * Role-scoped lead and email reporting. Every figure is computed from
 * repository aggregates over the leads visible to the actor.
 */
export class ReportService implements ReportServicePort {
  private readonly repositories: ReportServiceDependencies['repositories'];
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: ReportServiceDependencies) {
    this.repositories = deps.repositories;
    this.logger = deps.logger ?? defaultLogger;
    this.now = deps.now ?? (() => new Date());
  }

  async getDashboard(actor: Actor, query: ReportQuery): Promise<DashboardReport> {
    const now = this.now();
    const range = resolveReportRange(query.range, now, query);
    const scope = await resolveLeadScope(actor, this.repositories.users);
    const filter = this.scopedFilter(actor, scope, range);

    const [stats, funnel, topSources, topPerformers] = await Promise.all([
      this.computeStats(actor, scope, filter, now),
      this.computeFunnel(filter),
      this.computeSourcePerformance(filter, { activeOnly: true }),
      this.computeTeamPerformance(actor, range),
    ]);

    const [recentActivities, overdueLeads, kpiTargets] = await Promise.all([
      this.repositories.activities.listRecent({ tenantId: actor.tenantId, scope }, DASHBOARD_LIST_LIMIT),
      this.repositories.leads.listOverdue(
        { tenantId: actor.tenantId, scope },
        subDays(now, OVERDUE_AFTER_DAYS),
        DASHBOARD_LIST_LIMIT
      ),
      this.repositories.kpiTargets.listForUser(actor.tenantId, actor.id),
    ]);

    this.logger.debug('[reports] dashboard computed', { userId: actor.id, range: range.kind });

    return {
      range,
      stats,
      funnel,
      recentActivities,
      overdueLeads,
      topSources: topSources.slice(0, DASHBOARD_TOP_LIMIT),
      topPerformers: topPerformers.slice(0, DASHBOARD_TOP_LIMIT),
      kpiTargets: kpiTargets
        .filter((target) => target.isActive && target.periodStart < range.to && target.periodEnd >= range.from)
        .map(toKpiProgress),
    };
  }

  async getAnalytics(actor: Actor, query: ReportQuery): Promise<AnalyticsReport> {
    const now = this.now();
    const range = resolveReportRange(query.range, now, query);
    const scope = await resolveLeadScope(actor, this.repositories.users);
    const filter = this.scopedFilter(actor, scope, range);

    const [funnel, monthlyTrend, statusRows, priorityRows, sourcePerformance, teamPerformance] = await Promise.all([
      this.computeFunnel(filter),
      this.computeMonthlyTrend(actor, scope, now),
      this.repositories.leads.aggregate(filter, 'status'),
      this.repositories.leads.aggregate(filter, 'priority'),
      this.computeSourcePerformance(filter, { activeOnly: false }),
      this.computeTeamPerformance(actor, range),
    ]);

    const statusTotal = sumTotals(statusRows).total;
    const statusCounts = countsByKey(zeroStatusCounts(), statusRows);
    const priorityCounts = countsByKey(zeroPriorityCounts(), priorityRows);
    const priorityTotal = sumTotals(priorityRows).total;

    return {
      range,
      funnel,
      monthlyTrend,
      statusDistribution: LeadStatusSchema.options
        .filter((status) => statusCounts[status] > 0)
        .map((status) => ({
          status,
          label: LEAD_STATUS_LABELS[status],
          count: statusCounts[status],
          percentage: rate(statusCounts[status], statusTotal),
        })),
      priorityBreakdown: LeadPrioritySchema.options.map((priority) => ({
        priority,
        label: LEAD_PRIORITY_LABELS[priority],
        count: priorityCounts[priority],
        percentage: rate(priorityCounts[priority], priorityTotal),
      })),
      sourcePerformance,
      teamPerformance,
    };
  }

  /** Delivery funnel of the actor's own emails plus per-template performance. */
  async getEmailAnalytics(actor: Actor, query: ReportQuery): Promise<EmailAnalyticsReport> {
    const range = resolveReportRange(query.range, this.now(), query);
    const base = { tenantId: actor.tenantId, userId: actor.id, createdFrom: range.from, createdTo: range.to };

    const summary = summarizeEmailTotals(await this.repositories.emails.countByStatus(base));
    const owned = (await this.repositories.emailTemplates.listAccessible(actor.tenantId, actor.id)).filter(
      (template) => template.userId === actor.id
    );

    const templates = await Promise.all(
      owned.map(async (template) => ({
        templateId: template.id,
        name: template.name,
        usageCount: template.usageCount,
        ...summarizeEmailTotals(await this.repositories.emails.countByStatus({ ...base, templateId: template.id })),
      }))
    );

    return {
      range,
      summary,
      templates: templates
        .filter((entry) => entry.totalSent > 0 || entry.failed > 0)
        .sort((a, b) => b.totalSent - a.totalSent || a.name.localeCompare(b.name)),
    };
  }

  private scopedFilter(actor: Actor, scope: LeadScope, range: ReportRange): ScopedLeadFilter {
    return { tenantId: actor.tenantId, scope, createdFrom: range.from, createdTo: range.to };
  }

  private async computeStats(
    actor: Actor,
    scope: LeadScope,
    filter: ScopedLeadFilter,
    now: Date
  ): Promise<DashboardStats> {
    const scopedFrom = (createdFrom: Date): ScopedLeadFilter => ({ tenantId: actor.tenantId, scope, createdFrom });
    const today = resolveReportRange('today', now);
    const week = resolveReportRange('week', now);
    const month = resolveReportRange('month', now);

    const [statusRows, priorityRows, todayRows, weekRows, monthRows, overdue] = await Promise.all([
      this.repositories.leads.aggregate(filter, 'status'),
      this.repositories.leads.aggregate(filter, 'priority'),
      this.repositories.leads.aggregate(scopedFrom(today.from), 'none'),
      this.repositories.leads.aggregate(scopedFrom(week.from), 'none'),
      this.repositories.leads.aggregate(scopedFrom(month.from), 'none'),
      this.repositories.leads.countOverdue(filter, subDays(now, OVERDUE_AFTER_DAYS)),
    ]);

    const totals = sumTotals(statusRows);
    return {
      totalLeads: totals.total,
      byStatus: countsByKey(zeroStatusCounts(), statusRows),
      byPriority: countsByKey(zeroPriorityCounts(), priorityRows),
      createdToday: sumTotals(todayRows).total,
      createdThisWeek: sumTotals(weekRows).total,
      createdThisMonth: sumTotals(monthRows).total,
      conversionRate: rate(totals.won, totals.total),
      hotConversionRate: rate(totals.hotWon, totals.hot),
      wonRevenue: totals.wonRevenue,
      pipelineRevenue: totals.openRevenue,
      averageDealSize: totals.wonWithBudget > 0 ? Number((totals.wonRevenue / totals.wonWithBudget).toFixed(2)) : 0,
      overdueLeads: overdue,
    };
  }

  private async computeFunnel(filter: ScopedLeadFilter): Promise<FunnelStage[]> {
    const rows = await this.repositories.leads.aggregate(filter, 'status');
    const counts = countsByKey(zeroStatusCounts(), rows);
    const total = sumTotals(rows).total;

    return FUNNEL_STAGES.map(({ stage, statuses }) => {
      const count = statuses ? statuses.reduce((sum, status) => sum + counts[status], 0) : total;
      return { stage, count, percentage: statuses ? rate(count, total) : 100 };
    });
  }

  /** Last six calendar months (UTC), oldest first, current month included. */
  private async computeMonthlyTrend(actor: Actor, scope: LeadScope, now: Date): Promise<MonthlyTrendPoint[]> {
    const year = now.getUTCFullYear();
    const month = now.getUTCMonth();
    const createdFrom = new Date(Date.UTC(year, month - (TREND_MONTHS - 1), 1));

    const rows = await this.repositories.leads.aggregate({ tenantId: actor.tenantId, scope, createdFrom }, 'month');
    const byMonth = new Map(rows.map((row) => [row.key, row]));

    return Array.from({ length: TREND_MONTHS }, (_, index) => {
      const midMonth = new Date(Date.UTC(year, month - (TREND_MONTHS - 1) + index, 15, 12));
      const key = monthKeyOf(midMonth);
      const row = byMonth.get(key);
      const total = row?.total ?? 0;
      const won = row?.won ?? 0;
      const lost = row?.lost ?? 0;

      return {
        month: key,
        label: format(midMonth, 'MMM yyyy'),
        total,
        won,
        lost,
        inProgress: total - won - lost,
        conversionRate: rate(won, total),
      };
    });
  }

  private async computeSourcePerformance(
    filter: ScopedLeadFilter,
    options: { activeOnly: boolean }
  ): Promise<SourcePerformance[]> {
    const [rows, sources] = await Promise.all([
      this.repositories.leads.aggregate(filter, 'source'),
      this.repositories.leadSources.list(filter.tenantId, { activeOnly: options.activeOnly }),
    ]);
    const byId = new Map(rows.map((row) => [row.key, row]));

    return sources
      .map((source) => {
        const row = byId.get(source.id);
        const totalLeads = row?.total ?? 0;
        const wonLeads = row?.won ?? 0;
        return {
          sourceId: source.id,
          name: source.name,
          isActive: source.isActive,
          totalLeads,
          wonLeads,
          conversionRate: rate(wonLeads, totalLeads),
        };
      })
      .filter((entry) => entry.totalLeads > 0)
      .sort((a, b) => b.totalLeads - a.totalLeads);
  }

  /** Sales reps ranked by won leads: all of them for admins, the own department for managers. */
  private async computeTeamPerformance(actor: Actor, range: ReportRange): Promise<TeamMemberPerformance[]> {
    let members: User[];
    if (isAdminRole(actor.role)) {
      members = await this.repositories.users.listActive(actor.tenantId, { role: 'sales_rep' });
    } else if (actor.role === 'sales_manager' && actor.department) {
      members = await this.repositories.users.listActive(actor.tenantId, {
        role: 'sales_rep',
        department: actor.department,
      });
    } else {
      return [];
    }

    if (members.length === 0) {
      return [];
    }

    const rows = await this.repositories.leads.aggregate(
      {
        tenantId: actor.tenantId,
        scope: { kind: 'assignees', userIds: members.map((member) => member.id) },
        createdFrom: range.from,
        createdTo: range.to,
      },
      'assignee'
    );
    const byAssignee = new Map(rows.map((row) => [row.key, row]));

    return members
      .map((member) => {
        const row = byAssignee.get(member.id);
        const totalLeads = row?.total ?? 0;
        const wonLeads = row?.won ?? 0;
        return {
          userId: member.id,
          name: getUserFullName(member),
          totalLeads,
          wonLeads,
          revenue: row?.wonRevenue ?? 0,
          conversionRate: rate(wonLeads, totalLeads),
        };
      })
      .sort((a, b) => b.wonLeads - a.wonLeads);
  }
}
