import { differenceInDays } from 'date-fns';
import {
  ConflictError,
  DEFAULT_MAX_RETRIES,
  NotFoundError,
  ValidationError,
  getLeadFullName,
  renderTemplate,
  type Actor,
  type EmailSequence,
  type EmailSequenceEnrollment,
  type EmailSequenceStep,
  type Lead,
} from '@salesdesk/core';
import type { SequenceTrigger, StorageRepositories } from '@salesdesk/storage';

import { logger as defaultLogger, type Logger } from '../../config/logger';
import type { EmailDeliveryServicePort } from '../email-delivery/email-delivery.service';
import { resolveSendingConfiguration } from '../email-config/sending-configuration';
import type { LeadEventBus } from '../leads/lead-event-bus';
import { isLeadInScope, resolveLeadScope } from '../leads/lead-scope';
import type { AddStepInput, CreateSequenceInput, UpdateSequenceInput } from './sequence.validators';

export type SequenceDetail = EmailSequence & { steps: EmailSequenceStep[] };

export interface SequenceTickSummary {
  checked: number;
  advanced: number;
  failed: number;
}

export interface SequenceServiceDependencies {
  repositories: Pick<
    StorageRepositories,
    'sequences' | 'enrollments' | 'leads' | 'emails' | 'emailTemplates' | 'emailConfigurations' | 'users'
  >;
  delivery: EmailDeliveryServicePort;
  logger?: Logger;
  now?: () => Date;
}

export interface SequenceServicePort {
  listSequences(actor: Actor): Promise<EmailSequence[]>;
  getSequence(actor: Actor, id: string): Promise<SequenceDetail>;
  createSequence(actor: Actor, input: CreateSequenceInput): Promise<EmailSequence>;
  updateSequence(actor: Actor, id: string, input: UpdateSequenceInput): Promise<EmailSequence>;
  addStep(actor: Actor, sequenceId: string, input: AddStepInput): Promise<EmailSequenceStep>;
  enrollLead(actor: Actor, sequenceId: string, leadId: string): Promise<EmailSequenceEnrollment>;
  listEnrollments(actor: Actor, sequenceId: string): Promise<EmailSequenceEnrollment[]>;
  stopEnrollment(actor: Actor, sequenceId: string, enrollmentId: string): Promise<EmailSequenceEnrollment>;
}

const describeFailure = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const skipReasonFor = (step: EmailSequenceStep, enrollment: EmailSequenceEnrollment, lead: Lead): string | null => {
  if (step.sendOnlyIfNotReplied && enrollment.hasReplied) {
    return 'lead replied';
  }
  if (step.sendOnlyIfStatus.length > 0 && !step.sendOnlyIfStatus.includes(lead.status)) {
    return 'lead status not targeted';
  }
  return null;
};

/**
 * Drip sequences. Each (sequence, lead) enrollment is a cursor over the
 * sequence steps: `currentStep` is the last step sent or skipped.
 */
export class SequenceService implements SequenceServicePort {
  private readonly repositories: SequenceServiceDependencies['repositories'];
  private readonly delivery: EmailDeliveryServicePort;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: SequenceServiceDependencies) {
    this.repositories = deps.repositories;
    this.delivery = deps.delivery;
    this.logger = deps.logger ?? defaultLogger;
    this.now = deps.now ?? (() => new Date());
  }

  async listSequences(actor: Actor): Promise<EmailSequence[]> {
    return this.repositories.sequences.listByTenant(actor.tenantId, { userId: actor.id });
  }

  async getSequence(actor: Actor, id: string): Promise<SequenceDetail> {
    const sequence = await this.requireOwnedSequence(actor, id);
    const steps = await this.repositories.sequences.listSteps(sequence.id);
    return { ...sequence, steps };
  }

  async createSequence(actor: Actor, input: CreateSequenceInput): Promise<EmailSequence> {
    const sequence = await this.repositories.sequences.create({
      tenantId: actor.tenantId,
      userId: actor.id,
      ...input,
    });

    this.logger.info('[sequences] sequence created', { sequenceId: sequence.id, userId: actor.id });
    return sequence;
  }

  async updateSequence(actor: Actor, id: string, input: UpdateSequenceInput): Promise<EmailSequence> {
    await this.requireOwnedSequence(actor, id);
    const updated = await this.repositories.sequences.update(actor.tenantId, id, input);
    if (!updated) {
      throw new NotFoundError('EmailSequence', id);
    }
    return updated;
  }

  async addStep(actor: Actor, sequenceId: string, input: AddStepInput): Promise<EmailSequenceStep> {
    const sequence = await this.requireOwnedSequence(actor, sequenceId);

    const template = await this.repositories.emailTemplates.findById(actor.tenantId, input.templateId);
    if (!template || (template.userId !== actor.id && !template.isShared)) {
      throw new ValidationError('Email template not found', { templateId: input.templateId });
    }

    const steps = await this.repositories.sequences.listSteps(sequence.id);
    if (steps.some((step) => step.stepNumber === input.stepNumber)) {
      throw new ConflictError(`Step ${input.stepNumber} already exists in this sequence`, {
        stepNumber: input.stepNumber,
      });
    }

    return this.repositories.sequences.addStep({ tenantId: sequence.tenantId, sequenceId: sequence.id, ...input });
  }

  async enrollLead(actor: Actor, sequenceId: string, leadId: string): Promise<EmailSequenceEnrollment> {
    const sequence = await this.requireOwnedSequence(actor, sequenceId);
    if (!sequence.isActive) {
      throw new ConflictError('Sequence is inactive', { sequenceId });
    }

    const lead = await this.repositories.leads.findById(actor.tenantId, leadId);
    const scope = await resolveLeadScope(actor, this.repositories.users);
    if (!lead || !isLeadInScope(lead, scope)) {
      throw new NotFoundError('Lead', leadId);
    }

    const enrollment = await this.enroll(lead, sequence);
    if (!enrollment) {
      throw new ConflictError('Sequence is inactive', { sequenceId });
    }
    return enrollment;
  }

  async listEnrollments(actor: Actor, sequenceId: string): Promise<EmailSequenceEnrollment[]> {
    const sequence = await this.requireOwnedSequence(actor, sequenceId);
    return this.repositories.enrollments.listBySequence(sequence.id);
  }

  async stopEnrollment(actor: Actor, sequenceId: string, enrollmentId: string): Promise<EmailSequenceEnrollment> {
    const sequence = await this.requireOwnedSequence(actor, sequenceId);
    const enrollment = await this.repositories.enrollments.findById(enrollmentId);
    if (!enrollment || enrollment.sequenceId !== sequence.id) {
      throw new NotFoundError('EmailSequenceEnrollment', enrollmentId);
    }
    if (!enrollment.isActive) {
      return enrollment;
    }

    const stopped = await this.repositories.enrollments.update(enrollment.id, { isActive: false });
    this.logger.info('[sequences] enrollment stopped', { enrollmentId, sequenceId, userId: actor.id });
    return stopped ?? enrollment;
  }

  /**
   * Enrolls the lead once per sequence. A fresh enrollment in a sequence
   * without a start delay sends its first step straight away. Inactive
   * sequences enroll nobody and yield null.
   */
  async enroll(lead: Lead, sequence: EmailSequence): Promise<EmailSequenceEnrollment | null> {
    if (!sequence.isActive) {
      this.logger.debug('[sequences] inactive sequence, enrollment skipped', { sequenceId: sequence.id, leadId: lead.id });
      return null;
    }
    if (lead.tenantId !== sequence.tenantId) {
      throw new ValidationError('Lead and sequence belong to different tenants');
    }

    const { enrollment, created } = await this.repositories.enrollments.findOrCreate({
      tenantId: sequence.tenantId,
      sequenceId: sequence.id,
      leadId: lead.id,
      enrolledAt: this.now(),
    });

    if (!created) {
      return enrollment;
    }

    this.logger.info('[sequences] lead enrolled', { sequenceId: sequence.id, leadId: lead.id, enrollmentId: enrollment.id });
    return sequence.delayStartDays === 0 ? this.advance(enrollment) : enrollment;
  }

  /**
   * Moves the enrollment to its next step: skipped steps only bump the
   * cursor, a sendable step creates and delivers one email, and running out
   * of steps completes the enrollment. Calling it on a completed enrollment
   * changes nothing.
   */
  async advance(enrollment: EmailSequenceEnrollment): Promise<EmailSequenceEnrollment> {
    if (!enrollment.isActive) {
      return enrollment;
    }

    const sequence = await this.repositories.sequences.findById(enrollment.tenantId, enrollment.sequenceId);
    if (!sequence) {
      throw new NotFoundError('EmailSequence', enrollment.sequenceId);
    }
    const lead = await this.repositories.leads.findById(enrollment.tenantId, enrollment.leadId);
    if (!lead) {
      throw new NotFoundError('Lead', enrollment.leadId);
    }

    let current = enrollment;
    for (;;) {
      const step = await this.repositories.sequences.findActiveStep(sequence.id, current.currentStep + 1);
      if (!step) {
        return this.complete(current);
      }

      const skipReason = skipReasonFor(step, current, lead);
      if (!skipReason) {
        return this.sendStep(current, sequence, step, lead);
      }

      this.logger.info('[sequences] step skipped', {
        enrollmentId: current.id,
        stepNumber: step.stepNumber,
        reason: skipReason,
      });
      current = (await this.repositories.enrollments.update(current.id, { currentStep: step.stepNumber })) ?? {
        ...current,
        currentStep: step.stepNumber,
      };
    }
  }

  /**
   * Scheduler entry point. Advances every active enrollment whose next step
   * is due, counting whole days since the last email (or the enrollment).
   */
  async tick(): Promise<SequenceTickSummary> {
    const now = this.now();
    const summary: SequenceTickSummary = { checked: 0, advanced: 0, failed: 0 };
    const stepsBySequence = new Map<string, EmailSequenceStep[]>();

    for (const enrollment of await this.repositories.enrollments.listActive()) {
      summary.checked += 1;
      try {
        let steps = stepsBySequence.get(enrollment.sequenceId);
        if (!steps) {
          steps = await this.repositories.sequences.listSteps(enrollment.sequenceId);
          stepsBySequence.set(enrollment.sequenceId, steps);
        }

        const next = steps.find((step) => step.stepNumber === enrollment.currentStep + 1);
        if (!next) {
          continue;
        }

        const elapsedDays = differenceInDays(now, enrollment.lastEmailSentAt ?? enrollment.enrolledAt);
        if (elapsedDays >= next.delayDays) {
          await this.advance(enrollment);
          summary.advanced += 1;
        }
      } catch (error) {
        summary.failed += 1;
        this.logger.error('[sequences] failed to advance enrollment', {
          enrollmentId: enrollment.id,
          error: describeFailure(error),
        });
      }
    }

    return summary;
  }

  /** Enrolls leads into the tenant's triggered sequences as lead events arrive. */
  subscribeToLeadEvents(events: LeadEventBus): () => void {
    const unsubscribers = [
      events.on('lead.created', ({ lead }) => this.enrollTriggered(lead, { kind: 'lead_created' })),
      events.on('lead.status_changed', ({ lead }) =>
        this.enrollTriggered(lead, { kind: 'status_changed', status: lead.status })
      ),
      events.on('lead.priority_changed', ({ lead }) =>
        this.enrollTriggered(lead, { kind: 'priority_changed', priority: lead.priority })
      ),
    ];

    return () => {
      for (const unsubscribe of unsubscribers) {
        unsubscribe();
      }
    };
  }

  private async enrollTriggered(lead: Lead, trigger: SequenceTrigger): Promise<void> {
    const sequences = await this.repositories.sequences.listTriggered(lead.tenantId, trigger);

    for (const sequence of sequences) {
      try {
        await this.enroll(lead, sequence);
      } catch (error) {
        this.logger.error('[sequences] triggered enrollment failed', {
          sequenceId: sequence.id,
          leadId: lead.id,
          trigger: trigger.kind,
          error: describeFailure(error),
        });
      }
    }
  }

  private async sendStep(
    enrollment: EmailSequenceEnrollment,
    sequence: EmailSequence,
    step: EmailSequenceStep,
    lead: Lead
  ): Promise<EmailSequenceEnrollment> {
    const config = await resolveSendingConfiguration(
      this.repositories.emailConfigurations,
      sequence.tenantId,
      sequence.userId
    );
    if (!config) {
      this.logger.warn('[sequences] no email configuration for sequence owner, step postponed', {
        sequenceId: sequence.id,
        userId: sequence.userId,
        enrollmentId: enrollment.id,
      });
      return enrollment;
    }

    const template = await this.repositories.emailTemplates.findById(sequence.tenantId, step.templateId);
    if (!template) {
      throw new NotFoundError('EmailTemplate', step.templateId);
    }
    const owner = await this.repositories.users.findById(sequence.userId);
    if (!owner) {
      throw new NotFoundError('User', sequence.userId);
    }

    const now = this.now();
    const rendered = renderTemplate(template, lead, owner, now);
    const email = await this.repositories.emails.create({
      tenantId: sequence.tenantId,
      userId: sequence.userId,
      leadId: lead.id,
      campaignId: null,
      templateId: template.id,
      subject: rendered.subject,
      bodyHtml: rendered.htmlBody,
      bodyText: rendered.textBody,
      fromEmail: config.fromEmail,
      fromName: config.fromName,
      toEmail: lead.email,
      toName: getLeadFullName(lead),
      replyTo: config.replyTo,
      status: 'queued',
      externalId: null,
      sentAt: null,
      deliveredAt: null,
      openedAt: null,
      clickedAt: null,
      repliedAt: null,
      openCount: 0,
      clickCount: 0,
      errorMessage: null,
      retryCount: 0,
      maxRetries: DEFAULT_MAX_RETRIES,
    });

    const advanced =
      (await this.repositories.enrollments.update(enrollment.id, {
        currentStep: step.stepNumber,
        emailsSent: enrollment.emailsSent + 1,
        lastEmailSentAt: now,
      })) ?? enrollment;
    await this.repositories.emailTemplates.recordUsage(template.id, now);

    const result = await this.delivery.deliver(email, config, 'sequence');
    this.logger.info('[sequences] step sent', {
      enrollmentId: enrollment.id,
      stepNumber: step.stepNumber,
      emailId: email.id,
      ok: result.ok,
    });

    return advanced;
  }

  private async complete(enrollment: EmailSequenceEnrollment): Promise<EmailSequenceEnrollment> {
    const completed = await this.repositories.enrollments.update(enrollment.id, {
      isActive: false,
      completedAt: this.now(),
    });
    this.logger.info('[sequences] enrollment completed', { enrollmentId: enrollment.id });
    return completed ?? enrollment;
  }

  private async requireOwnedSequence(actor: Actor, id: string): Promise<EmailSequence> {
    const sequence = await this.repositories.sequences.findById(actor.tenantId, id);
    if (!sequence || sequence.userId !== actor.id) {
      throw new NotFoundError('EmailSequence', id);
    }
    return sequence;
  }
}
