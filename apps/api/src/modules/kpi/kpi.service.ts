import { endOfDay, startOfDay } from 'date-fns';
import {
  ConflictError,
  NotFoundError,
  type Actor,
  type KpiType,
  type LeadActivityType,
} from '@salesdesk/core';
import type { StorageRepositories } from '@salesdesk/storage';

import { logger as defaultLogger, type Logger } from '../../config/logger';
import type { LeadEventBus } from '../leads/lead-event-bus';
import { toKpiProgress, type KpiProgress } from './kpi-progress';
import type { CreateKpiTargetInput, ListKpiTargetsQuery } from './kpi.validators';

export interface KpiServiceDependencies {
  repositories: Pick<StorageRepositories, 'kpiTargets'>;
  logger?: Logger;
  now?: () => Date;
}

export interface KpiServicePort {
  listTargets(actor: Actor, query: ListKpiTargetsQuery): Promise<KpiProgress[]>;
  createTarget(actor: Actor, input: CreateKpiTargetInput): Promise<KpiProgress>;
  updateProgress(actor: Actor, targetId: string, value: number): Promise<KpiProgress>;
}

const ACTIVITY_KPIS: Partial<Record<LeadActivityType, KpiType>> = {
  call: 'calls_made',
  email: 'emails_sent',
  meeting: 'meetings_scheduled',
};

export class KpiService implements KpiServicePort {
  private readonly repositories: KpiServiceDependencies['repositories'];
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: KpiServiceDependencies) {
    this.repositories = deps.repositories;
    this.logger = deps.logger ?? defaultLogger;
    this.now = deps.now ?? (() => new Date());
  }

  async listTargets(actor: Actor, query: ListKpiTargetsQuery): Promise<KpiProgress[]> {
    const targets = await this.repositories.kpiTargets.listForUser(
      actor.tenantId,
      actor.id,
      query.activeOnly ? { activeOn: this.now() } : {}
    );
    return targets.map(toKpiProgress);
  }

  /** Periods cover whole days: from the start of the first to the end of the last. */
  async createTarget(actor: Actor, input: CreateKpiTargetInput): Promise<KpiProgress> {
    const periodStart = startOfDay(input.periodStart);
    const periodEnd = endOfDay(input.periodEnd);

    const existing = await this.repositories.kpiTargets.listForUser(actor.tenantId, actor.id);
    const duplicate = existing.find(
      (target) =>
        target.kpiType === input.kpiType &&
        target.periodStart.getTime() === periodStart.getTime() &&
        target.periodEnd.getTime() === periodEnd.getTime()
    );
    if (duplicate) {
      throw new ConflictError('A target for this KPI and period already exists', { targetId: duplicate.id });
    }

    const target = await this.repositories.kpiTargets.create({
      tenantId: actor.tenantId,
      userId: actor.id,
      kpiType: input.kpiType,
      targetValue: input.targetValue,
      currentValue: 0,
      periodStart,
      periodEnd,
      isActive: true,
    });

    this.logger.info('[kpi] target created', { targetId: target.id, userId: actor.id, kpiType: target.kpiType });
    return toKpiProgress(target);
  }

  async updateProgress(actor: Actor, targetId: string, value: number): Promise<KpiProgress> {
    const target = await this.repositories.kpiTargets.findById(actor.tenantId, targetId);
    if (!target || target.userId !== actor.id) {
      throw new NotFoundError('KpiTarget', targetId);
    }

    const updated = await this.repositories.kpiTargets.update(actor.tenantId, targetId, { currentValue: value });
    if (!updated) {
      throw new NotFoundError('KpiTarget', targetId);
    }
    return toKpiProgress(updated);
  }

  /**
   * Moves progress from lead lifecycle events: created leads for the
   * assignee, won leads and their budget, and logged calls, emails and
   * meetings for the user who logged them.
   */
  subscribeToLeadEvents(events: LeadEventBus): () => void {
    const unsubscribers = [
      events.on('lead.created', async ({ lead }) => {
        await this.credit(lead.tenantId, lead.assignedToId, 'leads_created', 1, lead.createdAt);
      }),
      events.on('lead.status_changed', async ({ lead, previousStatus }) => {
        if (lead.status !== 'won' || previousStatus === 'won') {
          return;
        }
        const at = this.now();
        await this.credit(lead.tenantId, lead.assignedToId, 'leads_converted', 1, at);
        if (lead.budget !== null && lead.budget > 0) {
          await this.credit(lead.tenantId, lead.assignedToId, 'revenue_generated', lead.budget, at);
        }
      }),
      events.on('lead.activity_logged', async ({ activity }) => {
        const kpiType = ACTIVITY_KPIS[activity.type];
        if (kpiType) {
          await this.credit(activity.tenantId, activity.userId, kpiType, 1, activity.createdAt);
        }
      }),
    ];

    return () => {
      for (const unsubscribe of unsubscribers) {
        unsubscribe();
      }
    };
  }

  private async credit(tenantId: string, userId: string | null, kpiType: KpiType, amount: number, at: Date): Promise<void> {
    if (!userId) {
      return;
    }
    const moved = await this.repositories.kpiTargets.incrementActive(tenantId, userId, kpiType, amount, at);
    if (moved > 0) {
      this.logger.debug('[kpi] progress recorded', { userId, kpiType, amount, targets: moved });
    }
  }
}
