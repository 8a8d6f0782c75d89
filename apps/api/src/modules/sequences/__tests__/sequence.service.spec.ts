import { randomUUID } from 'node:crypto';
import { beforeEach, describe, expect, it } from 'vitest';
import {
  ConflictError,
  toActor,
  type Actor,
  type EmailSequence,
  type EmailSequenceEnrollment,
  type EmailTemplate,
  type Lead,
  type User,
} from '@salesdesk/core';

import { FakeEmailTransport } from '../../../test-utils/fake-transport';
import {
  createInMemoryStorage,
  seedEmailConfiguration,
  seedLead,
  seedSequence,
  seedSequenceStep,
  seedTemplate,
  seedUser,
  type InMemoryStorage,
} from '../../../test-utils/in-memory-storage';
import { EmailDeliveryService } from '../../email-delivery/email-delivery.service';
import { createLeadEventBus, type LeadEventBus } from '../../leads/lead-event-bus';
import { SequenceService } from '../sequence.service';
import { AddStepSchema } from '../sequence.validators';

const DAY_MS = 24 * 60 * 60 * 1000;

describe('SequenceService', () => {
  let clock: Date;
  let storage: InMemoryStorage;
  let transport: FakeEmailTransport;
  let events: LeadEventBus;
  let service: SequenceService;
  let owner: User;
  let actor: Actor;
  let lead: Lead;
  let intro: EmailTemplate;
  let followUp: EmailTemplate;

  const enrollmentFor = async (
    sequence: EmailSequence,
    overrides: Partial<EmailSequenceEnrollment> = {},
    target: Lead = lead
  ): Promise<EmailSequenceEnrollment> => {
    const { enrollment } = await storage.enrollments.findOrCreate({
      tenantId: sequence.tenantId,
      sequenceId: sequence.id,
      leadId: target.id,
      enrolledAt: overrides.enrolledAt ?? clock,
    });
    const next = { ...enrollment, ...overrides };
    storage.enrollments.rows.set(next.id, next);
    return next;
  };

  const current = (enrollment: EmailSequenceEnrollment): EmailSequenceEnrollment | undefined =>
    storage.enrollments.rows.get(enrollment.id);

  beforeEach(() => {
    clock = new Date('2024-06-10T12:00:00Z');
    storage = createInMemoryStorage();
    transport = new FakeEmailTransport();
    events = createLeadEventBus();
    const delivery = new EmailDeliveryService({
      repositories: storage,
      transport,
      events,
      trackingBaseUrl: 'http://track.test',
      now: () => clock,
    });
    service = new SequenceService({ repositories: storage, delivery, now: () => clock });

    owner = seedUser(storage);
    actor = toActor(owner);
    lead = seedLead(storage, { assignedToId: owner.id });
    intro = seedTemplate(storage, { userId: owner.id });
    followUp = seedTemplate(storage, {
      userId: owner.id,
      name: 'Follow-up',
      subject: 'Checking in, {{first_name}}',
      bodyHtml: '<p>Any questions?</p>',
    });
    seedEmailConfiguration(storage, { userId: owner.id, isDefault: true });
  });

  describe('enroll', () => {
    it('enrolls a lead once and sends the first step immediately', async () => {
      const sequence = seedSequence(storage, { userId: owner.id });
      seedSequenceStep(storage, { sequenceId: sequence.id, templateId: intro.id, stepNumber: 1 });
      seedSequenceStep(storage, { sequenceId: sequence.id, templateId: followUp.id, stepNumber: 2, delayDays: 3 });

      const first = await service.enroll(lead, sequence);
      const second = await service.enroll(lead, sequence);

      expect(storage.enrollments.rows.size).toBe(1);
      expect(first).toMatchObject({ currentStep: 1, emailsSent: 1, lastEmailSentAt: clock, isActive: true });
      expect(second?.id).toBe(first?.id);
      expect([...storage.emails.rows.values()].map((email) => email.subject)).toEqual(['Hello Ann']);
      expect(transport.sent).toHaveLength(1);
    });

    it('waits for the scheduler when the sequence has a start delay', async () => {
      const sequence = seedSequence(storage, { userId: owner.id, delayStartDays: 2 });
      seedSequenceStep(storage, { sequenceId: sequence.id, templateId: intro.id, stepNumber: 1 });

      const enrollment = await service.enroll(lead, sequence);

      expect(enrollment).toMatchObject({ currentStep: 0, emailsSent: 0, enrolledAt: clock });
      expect(storage.emails.rows.size).toBe(0);
    });

    it('ignores inactive sequences', async () => {
      const sequence = seedSequence(storage, { userId: owner.id, isActive: false });

      expect(await service.enroll(lead, sequence)).toBeNull();
      expect(storage.enrollments.rows.size).toBe(0);
    });
  });

  describe('advance', () => {
    it('skips a not-replied step for a lead that replied and sends the next one', async () => {
      const sequence = seedSequence(storage, { userId: owner.id, delayStartDays: 1 });
      seedSequenceStep(storage, { sequenceId: sequence.id, templateId: intro.id, stepNumber: 1 });
      seedSequenceStep(storage, {
        sequenceId: sequence.id,
        templateId: followUp.id,
        stepNumber: 2,
        sendOnlyIfNotReplied: false,
      });
      const enrollment = await enrollmentFor(sequence, { hasReplied: true });

      const advanced = await service.advance(enrollment);

      expect(advanced).toMatchObject({ currentStep: 2, emailsSent: 1 });
      expect([...storage.emails.rows.values()].map((email) => email.subject)).toEqual(['Checking in, Ann']);
    });

    it('sends a not-replied step while the lead has not replied', async () => {
      const sequence = seedSequence(storage, { userId: owner.id, delayStartDays: 1 });
      seedSequenceStep(storage, { sequenceId: sequence.id, templateId: intro.id, stepNumber: 1 });
      const enrollment = await enrollmentFor(sequence);

      const advanced = await service.advance(enrollment);

      expect(advanced).toMatchObject({ currentStep: 1, emailsSent: 1, isActive: true });
      expect(storage.emails.rows.size).toBe(1);
    });

    it('skips steps reserved for other lead statuses', async () => {
      const sequence = seedSequence(storage, { userId: owner.id, delayStartDays: 1 });
      seedSequenceStep(storage, {
        sequenceId: sequence.id,
        templateId: intro.id,
        stepNumber: 1,
        sendOnlyIfStatus: ['qualified', 'proposal'],
      });
      const enrollment = await enrollmentFor(sequence);

      const advanced = await service.advance(enrollment);

      expect(advanced).toMatchObject({ currentStep: 1, emailsSent: 0, isActive: false, completedAt: clock });
      expect(storage.emails.rows.size).toBe(0);
    });

    it('completes once past the last step and stays completed', async () => {
      const sequence = seedSequence(storage, { userId: owner.id, delayStartDays: 1 });
      seedSequenceStep(storage, { sequenceId: sequence.id, templateId: intro.id, stepNumber: 1 });
      const enrollment = await enrollmentFor(sequence, { currentStep: 1, emailsSent: 1 });
      const completedAt = clock;

      const completed = await service.advance(enrollment);
      clock = new Date(clock.getTime() + DAY_MS);
      const again = await service.advance(completed);

      expect(completed).toMatchObject({ isActive: false, completedAt });
      expect(again).toEqual(completed);
      expect(current(enrollment)).toMatchObject({ isActive: false, completedAt });
    });

    it('leaves the cursor alone when the owner has no usable configuration', async () => {
      storage.emailConfigurations.rows.clear();
      const sequence = seedSequence(storage, { userId: owner.id, delayStartDays: 1 });
      seedSequenceStep(storage, { sequenceId: sequence.id, templateId: intro.id, stepNumber: 1 });
      const enrollment = await enrollmentFor(sequence);

      const advanced = await service.advance(enrollment);

      expect(advanced).toMatchObject({ currentStep: 0, emailsSent: 0, isActive: true });
      expect(storage.emails.rows.size).toBe(0);
    });

    it('moves on even when the transport rejects the email', async () => {
      transport.failNext('Mailbox full');
      const sequence = seedSequence(storage, { userId: owner.id, delayStartDays: 1 });
      seedSequenceStep(storage, { sequenceId: sequence.id, templateId: intro.id, stepNumber: 1 });
      const enrollment = await enrollmentFor(sequence);

      const advanced = await service.advance(enrollment);

      expect(advanced.currentStep).toBe(1);
      expect([...storage.emails.rows.values()]).toEqual([
        expect.objectContaining({ status: 'failed', errorMessage: 'Mailbox full', retryCount: 1 }),
      ]);
    });
  });

  describe('tick', () => {
    it('advances enrollments whose next step is due', async () => {
      const due = seedSequence(storage, { userId: owner.id, delayStartDays: 1 });
      seedSequenceStep(storage, { sequenceId: due.id, templateId: intro.id, stepNumber: 1, delayDays: 3 });
      const waiting = seedSequence(storage, { userId: owner.id, name: 'Nurture', delayStartDays: 1 });
      seedSequenceStep(storage, { sequenceId: waiting.id, templateId: intro.id, stepNumber: 1, delayDays: 5 });
      const dueEnrollment = await enrollmentFor(due, { enrolledAt: new Date(clock.getTime() - 3 * DAY_MS) });
      const waitingEnrollment = await enrollmentFor(waiting, { enrolledAt: new Date(clock.getTime() - 4 * DAY_MS) });

      const summary = await service.tick();

      expect(summary).toEqual({ checked: 2, advanced: 1, failed: 0 });
      expect(current(dueEnrollment)?.currentStep).toBe(1);
      expect(current(waitingEnrollment)?.currentStep).toBe(0);
    });

    it('measures the delay from the last email sent', async () => {
      const sequence = seedSequence(storage, { userId: owner.id, delayStartDays: 1 });
      seedSequenceStep(storage, { sequenceId: sequence.id, templateId: intro.id, stepNumber: 1 });
      seedSequenceStep(storage, {
        sequenceId: sequence.id,
        templateId: followUp.id,
        stepNumber: 2,
        delayDays: 2,
      });
      const enrollment = await enrollmentFor(sequence, {
        enrolledAt: new Date(clock.getTime() - 10 * DAY_MS),
        currentStep: 1,
        emailsSent: 1,
        lastEmailSentAt: new Date(clock.getTime() - DAY_MS - 60_000),
      });

      expect(await service.tick()).toEqual({ checked: 1, advanced: 0, failed: 0 });
      expect(current(enrollment)?.currentStep).toBe(1);
    });

    it('leaves enrollments without a next step for a later advance', async () => {
      const sequence = seedSequence(storage, { userId: owner.id, delayStartDays: 1 });
      seedSequenceStep(storage, { sequenceId: sequence.id, templateId: intro.id, stepNumber: 1 });
      const enrollment = await enrollmentFor(sequence, { currentStep: 1, emailsSent: 1 });

      expect(await service.tick()).toEqual({ checked: 1, advanced: 0, failed: 0 });
      expect(current(enrollment)?.isActive).toBe(true);
    });

    it('keeps going when one enrollment fails', async () => {
      const sequence = seedSequence(storage, { userId: owner.id, delayStartDays: 1 });
      seedSequenceStep(storage, { sequenceId: sequence.id, templateId: intro.id, stepNumber: 1 });
      const ghost = { ...lead, id: randomUUID() };
      await enrollmentFor(sequence, {}, ghost);
      const healthy = await enrollmentFor(sequence);

      const summary = await service.tick();

      expect(summary).toEqual({ checked: 2, advanced: 1, failed: 1 });
      expect(current(healthy)?.currentStep).toBe(1);
    });
  });

  describe('lead event triggers', () => {
    it('enrolls new leads into creation-triggered sequences', async () => {
      const triggered = seedSequence(storage, { userId: owner.id, triggerOnLeadCreation: true, delayStartDays: 1 });
      seedSequence(storage, { userId: owner.id, name: 'Manual', delayStartDays: 1 });
      seedSequence(storage, { userId: owner.id, name: 'Paused', triggerOnLeadCreation: true, isActive: false });
      service.subscribeToLeadEvents(events);

      await events.publish('lead.created', { lead, actorId: owner.id });

      expect([...storage.enrollments.rows.values()].map((enrollment) => enrollment.sequenceId)).toEqual([triggered.id]);
    });

    it('enrolls on status and priority changes into the configured values', async () => {
      const onQualified = seedSequence(storage, {
        userId: owner.id,
        triggerOnStatusChange: ['qualified'],
        delayStartDays: 1,
      });
      const onHot = seedSequence(storage, { userId: owner.id, triggerOnPriorityChange: ['hot'], delayStartDays: 1 });
      const unsubscribe = service.subscribeToLeadEvents(events);

      await events.publish('lead.status_changed', {
        lead: { ...lead, status: 'qualified' },
        previousStatus: 'new',
        actorId: owner.id,
      });
      await events.publish('lead.priority_changed', {
        lead: { ...lead, priority: 'cold' },
        previousPriority: 'warm',
        actorId: owner.id,
      });
      unsubscribe();
      await events.publish('lead.priority_changed', {
        lead: { ...lead, priority: 'hot' },
        previousPriority: 'warm',
        actorId: owner.id,
      });

      const enrolled = [...storage.enrollments.rows.values()].map((enrollment) => enrollment.sequenceId);
      expect(enrolled).toEqual([onQualified.id]);
      expect(enrolled).not.toContain(onHot.id);
    });
  });

  describe('authoring', () => {
    it('rejects a duplicate step number', async () => {
      const sequence = await service.createSequence(actor, {
        name: 'Onboarding',
        description: null,
        isActive: true,
        triggerOnLeadCreation: false,
        triggerOnStatusChange: [],
        triggerOnPriorityChange: [],
        delayStartDays: 0,
      });
      const step = AddStepSchema.parse({ stepNumber: 1, templateId: intro.id });
      await service.addStep(actor, sequence.id, step);

      await expect(service.addStep(actor, sequence.id, step)).rejects.toBeInstanceOf(ConflictError);
      expect((await service.getSequence(actor, sequence.id)).steps).toHaveLength(1);
    });

    it('stops an enrollment without completing it', async () => {
      const sequence = seedSequence(storage, { userId: owner.id, delayStartDays: 1 });
      const enrollment = await enrollmentFor(sequence);

      const stopped = await service.stopEnrollment(actor, sequence.id, enrollment.id);

      expect(stopped).toMatchObject({ isActive: false, completedAt: null });
    });

    it('enrolls leads through the API only when they are in scope', async () => {
      const sequence = seedSequence(storage, { userId: owner.id, delayStartDays: 1 });
      const stranger = seedLead(storage, { email: 'stranger@example.com', assignedToId: randomUUID() });

      await expect(service.enrollLead(actor, sequence.id, stranger.id)).rejects.toThrow(
        `Lead with id ${stranger.id} not found`
      );
      await expect(service.enrollLead(actor, sequence.id, lead.id)).resolves.toMatchObject({ leadId: lead.id });
    });
  });
});
