import type { Lead, LeadActivity, LeadPriority, LeadStatus } from '@salesdesk/core';

import { logger as defaultLogger, type Logger } from '../../config/logger';

export type LeadEventPayloads = {
  'lead.created': { lead: Lead; actorId: string };
  'lead.status_changed': { lead: Lead; previousStatus: LeadStatus; actorId: string };
  'lead.priority_changed': { lead: Lead; previousPriority: LeadPriority; actorId: string };
  'lead.assigned': { lead: Lead; previousAssigneeId: string | null; actorId: string };
  'lead.activity_logged': { lead: Lead; activity: LeadActivity };
};

export type LeadEventName = keyof LeadEventPayloads;

export type LeadEventHandler<E extends LeadEventName> = (payload: LeadEventPayloads[E]) => Promise<void> | void;

type HandlerRegistry = { [E in LeadEventName]: Set<LeadEventHandler<E>> };

export type LeadEventBus = {
  /** Runs every subscriber in registration order; a failing subscriber is logged and skipped. */
  publish: <E extends LeadEventName>(event: E, payload: LeadEventPayloads[E]) => Promise<void>;
  on: <E extends LeadEventName>(event: E, handler: LeadEventHandler<E>) => () => void;
};

export const createLeadEventBus = (deps: { logger?: Logger } = {}): LeadEventBus => {
  const logger = deps.logger ?? defaultLogger;
  const registry: HandlerRegistry = {
    'lead.created': new Set(),
    'lead.status_changed': new Set(),
    'lead.priority_changed': new Set(),
    'lead.assigned': new Set(),
    'lead.activity_logged': new Set(),
  };

  return {
    async publish(event, payload) {
      const handlers: Set<LeadEventHandler<typeof event>> = registry[event];

      for (const handler of handlers) {
        try {
          await handler(payload);
        } catch (error) {
          logger.error('[lead-events] subscriber failed', {
            event,
            leadId: payload.lead.id,
            error: error instanceof Error ? error.message : String(error),
          });
        }
      }
    },
    on(event, handler) {
      const handlers: Set<LeadEventHandler<typeof event>> = registry[event];
      handlers.add(handler);

      return () => {
        handlers.delete(handler);
      };
    },
  };
};
