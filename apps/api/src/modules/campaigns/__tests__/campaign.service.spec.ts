import { beforeEach, describe, expect, it } from 'vitest';
import {
  ConflictError,
  ValidationError,
  toActor,
  type Actor,
  type EmailCampaign,
  type EmailConfiguration,
  type EmailTemplate,
  type User,
} from '@salesdesk/core';

import { FakeEmailTransport } from '../../../test-utils/fake-transport';
import {
  createInMemoryStorage,
  seedCampaign,
  seedEmailConfiguration,
  seedLead,
  seedTemplate,
  seedUser,
  type InMemoryStorage,
} from '../../../test-utils/in-memory-storage';
import { EmailDeliveryService, type EmailDeliveryServicePort } from '../../email-delivery/email-delivery.service';
import { createLeadEventBus } from '../../leads/lead-event-bus';
import { CampaignService } from '../campaign.service';
import { CreateCampaignSchema } from '../campaign.validators';

const now = new Date('2024-06-01T09:00:00Z');

describe('CampaignService', () => {
  let storage: InMemoryStorage;
  let transport: FakeEmailTransport;
  let service: CampaignService;
  let owner: User;
  let actor: Actor;
  let template: EmailTemplate;
  let config: EmailConfiguration;

  const campaignInput = (overrides: Record<string, unknown> = {}) =>
    CreateCampaignSchema.parse({
      name: 'Spring promo',
      templateId: template.id,
      emailConfigId: config.id,
      targetAllLeads: true,
      ...overrides,
    });

  const reload = (campaign: EmailCampaign): EmailCampaign => {
    const current = storage.campaigns.rows.get(campaign.id);
    if (!current) {
      throw new Error(`campaign ${campaign.id} vanished`);
    }
    return current;
  };

  const campaignEmails = (campaign: EmailCampaign) =>
    [...storage.emails.rows.values()].filter((email) => email.campaignId === campaign.id);

  beforeEach(() => {
    storage = createInMemoryStorage();
    transport = new FakeEmailTransport();
    const delivery = new EmailDeliveryService({
      repositories: storage,
      transport,
      events: createLeadEventBus(),
      trackingBaseUrl: 'http://track.test',
      now: () => now,
    });
    service = new CampaignService({ repositories: storage, delivery, now: () => now });

    owner = seedUser(storage, { firstName: 'Sam', lastName: 'Rep', email: 'sam@example.com' });
    actor = toActor(owner);
    template = seedTemplate(storage, { userId: owner.id });
    config = seedEmailConfiguration(storage, { userId: owner.id, isDefault: true });
  });

  describe('resolveTargets', () => {
    it('returns every lead with an email when targeting all leads', async () => {
      const ann = seedLead(storage, { status: 'won' });
      const bob = seedLead(storage, { firstName: 'Bob', email: 'bob@example.com', priority: 'cold' });
      seedLead(storage, { firstName: 'Nomail', email: '' });
      seedLead(storage, { tenantId: 'tenant-2', email: 'other@example.com' });

      const targets = await service.resolveTargets({
        tenantId: actor.tenantId,
        targetAllLeads: true,
        targetStatuses: ['lost'],
        targetPriorities: ['hot'],
        targetSourceIds: [],
        specificLeadIds: [],
      });

      expect(targets.map((lead) => lead.id)).toEqual([ann.id, bob.id]);
    });

    it('unions the predicates without duplicating leads', async () => {
      const hotWon = seedLead(storage, { status: 'won', priority: 'hot' });
      const picked = seedLead(storage, { email: 'picked@example.com' });
      seedLead(storage, { email: 'ignored@example.com' });

      const targets = await service.resolveTargets({
        tenantId: actor.tenantId,
        targetAllLeads: false,
        targetStatuses: ['won'],
        targetPriorities: ['hot'],
        targetSourceIds: [],
        specificLeadIds: [picked.id],
      });

      expect(targets.map((lead) => lead.id)).toEqual([hotWon.id, picked.id]);
    });
  });

  describe('createCampaign', () => {
    it('stores a draft with the resolved recipient count and queued emails', async () => {
      const lead = seedLead(storage);
      seedLead(storage, { firstName: 'Bob', lastName: null, email: 'bob@example.com' });

      const campaign = await service.createCampaign(actor, campaignInput());

      expect(campaign).toMatchObject({ status: 'draft', totalRecipients: 2, emailsSent: 0, scheduledAt: null });
      const emails = campaignEmails(campaign);
      expect(emails).toHaveLength(2);
      expect(emails.find((email) => email.leadId === lead.id)).toMatchObject({
        status: 'queued',
        subject: 'Hello Ann',
        bodyHtml: '<p>Hi Ann</p>',
        bodyText: 'Hi Ann',
        toEmail: 'ann@example.com',
        toName: 'Ann Lee',
        fromEmail: 'sales@example.com',
        fromName: 'Sales Team',
        templateId: template.id,
      });
      expect(emails.map((email) => email.toName)).toContain('Bob');
      expect(storage.emailTemplates.rows.get(template.id)).toMatchObject({ usageCount: 1, lastUsedAt: now });
    });

    it('schedules campaigns with a future send time', async () => {
      const scheduledAt = new Date('2024-06-02T09:00:00Z');

      const campaign = await service.createCampaign(actor, campaignInput({ scheduledAt: scheduledAt.toISOString() }));

      expect(campaign).toMatchObject({ status: 'scheduled', scheduledAt });
    });

    it('rejects a send time in the past', async () => {
      await expect(
        service.createCampaign(actor, campaignInput({ scheduledAt: '2024-05-01T09:00:00Z' }))
      ).rejects.toBeInstanceOf(ValidationError);
      expect(storage.campaigns.rows.size).toBe(0);
    });

    it('sends the first batch right away when asked to send now', async () => {
      seedLead(storage);
      seedLead(storage, { firstName: 'Bob', email: 'bob@example.com' });

      const campaign = await service.createCampaign(actor, campaignInput({ sendNow: true }));

      expect(campaign).toMatchObject({ status: 'sent', emailsSent: 2, emailsFailed: 0, startedAt: now, completedAt: now });
      expect(transport.sent.map((entry) => entry.message.to.address)).toEqual(['ann@example.com', 'bob@example.com']);
    });

    it('refuses configurations owned by someone else', async () => {
      const colleague = seedUser(storage, { email: 'kim@example.com' });
      const foreign = seedEmailConfiguration(storage, { userId: colleague.id });

      await expect(
        service.createCampaign(actor, campaignInput({ emailConfigId: foreign.id }))
      ).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('materialize', () => {
    it('creates one email per recipient however often it runs', async () => {
      seedLead(storage);
      seedLead(storage, { firstName: 'Bob', email: 'bob@example.com' });
      const campaign = seedCampaign(storage, { userId: owner.id, templateId: template.id, emailConfigId: config.id });

      expect(await service.materialize(campaign)).toBe(2);
      expect(await service.materialize(campaign)).toBe(0);
      expect(campaignEmails(campaign)).toHaveLength(2);
    });

    it('only adds the recipients that are missing', async () => {
      seedLead(storage);
      const campaign = seedCampaign(storage, { userId: owner.id, templateId: template.id, emailConfigId: config.id });
      await service.materialize(campaign);

      seedLead(storage, { firstName: 'Bob', email: 'bob@example.com' });

      expect(await service.materialize(campaign)).toBe(1);
      expect(campaignEmails(campaign)).toHaveLength(2);
    });
  });

  describe('sendBatch', () => {
    it('completes a campaign with nothing queued without touching its counters', async () => {
      const campaign = seedCampaign(storage, {
        userId: owner.id,
        templateId: template.id,
        emailConfigId: config.id,
        status: 'sending',
        emailsSent: 4,
        emailsFailed: 1,
      });

      const result = await service.sendBatch(campaign);

      expect(result).toEqual({ sent: 0, failed: 0 });
      expect(reload(campaign)).toMatchObject({ status: 'sent', completedAt: now, emailsSent: 4, emailsFailed: 1 });
      expect(transport.sent).toHaveLength(0);
    });

    it('drains five emails in batches of two over three calls', async () => {
      for (let index = 0; index < 5; index += 1) {
        seedLead(storage, { email: `lead${index}@example.com` });
      }
      const campaign = seedCampaign(storage, {
        userId: owner.id,
        templateId: template.id,
        emailConfigId: config.id,
        status: 'sending',
        batchSize: 2,
      });
      await service.materialize(campaign);

      expect(await service.sendBatch(reload(campaign))).toEqual({ sent: 2, failed: 0 });
      expect(reload(campaign)).toMatchObject({ emailsSent: 2, status: 'sending' });

      expect(await service.sendBatch(reload(campaign))).toEqual({ sent: 2, failed: 0 });
      expect(reload(campaign)).toMatchObject({ emailsSent: 4, status: 'sending' });

      expect(await service.sendBatch(reload(campaign))).toEqual({ sent: 1, failed: 0 });
      expect(reload(campaign)).toMatchObject({ emailsSent: 5, status: 'sent', completedAt: now });
      expect(campaignEmails(campaign).every((email) => email.status === 'sent')).toBe(true);
    });

    it('honours an explicit batch size override', async () => {
      for (let index = 0; index < 3; index += 1) {
        seedLead(storage, { email: `lead${index}@example.com` });
      }
      const campaign = seedCampaign(storage, {
        userId: owner.id,
        templateId: template.id,
        emailConfigId: config.id,
        status: 'sending',
      });
      await service.materialize(campaign);

      expect(await service.sendBatch(campaign, 1)).toEqual({ sent: 1, failed: 0 });
      expect(reload(campaign).status).toBe('sending');
    });

    it('keeps going when a recipient fails', async () => {
      seedLead(storage, { email: 'one@example.com' });
      seedLead(storage, { email: 'two@example.com' });
      seedLead(storage, { email: 'three@example.com' });
      const campaign = seedCampaign(storage, {
        userId: owner.id,
        templateId: template.id,
        emailConfigId: config.id,
        status: 'sending',
      });
      await service.materialize(campaign);
      transport.results.push({ ok: true, message: 'Email sent successfully', externalId: 'msg-a' });
      transport.failNext('Mailbox unavailable');

      const result = await service.sendBatch(campaign);

      expect(result).toEqual({ sent: 2, failed: 1 });
      expect(reload(campaign)).toMatchObject({ emailsSent: 2, emailsFailed: 1, status: 'sent' });
      const failed = campaignEmails(campaign).find((email) => email.status === 'failed');
      expect(failed).toMatchObject({ toEmail: 'two@example.com', errorMessage: 'Mailbox unavailable', retryCount: 1 });
    });

    it('does not flag an email as failed when delivery throws after it went out', async () => {
      seedLead(storage, { email: 'one@example.com' });
      const campaign = seedCampaign(storage, {
        userId: owner.id,
        templateId: template.id,
        emailConfigId: config.id,
        status: 'sending',
      });
      const inner = new EmailDeliveryService({
        repositories: storage,
        transport,
        events: createLeadEventBus(),
        trackingBaseUrl: 'http://track.test',
        now: () => now,
      });
      const delivery: EmailDeliveryServicePort = {
        deliver: async (email, configuration, origin) => {
          await inner.deliver(email, configuration, origin);
          throw new Error('lost connection while recording');
        },
      };
      const crashing = new CampaignService({ repositories: storage, delivery, now: () => now });
      await crashing.materialize(campaign);

      expect(await crashing.sendBatch(campaign)).toEqual({ sent: 1, failed: 0 });

      expect(reload(campaign)).toMatchObject({ emailsSent: 1, emailsFailed: 0 });
      expect(campaignEmails(campaign)).toEqual([
        expect.objectContaining({ status: 'sent', retryCount: 0, errorMessage: null }),
      ]);
      expect(await storage.emails.listRetryable(10)).toEqual([]);
      expect(transport.sent).toHaveLength(1);
    });

    it('flags a queued email as failed when delivery throws before sending', async () => {
      seedLead(storage, { email: 'one@example.com' });
      const campaign = seedCampaign(storage, {
        userId: owner.id,
        templateId: template.id,
        emailConfigId: config.id,
        status: 'sending',
      });
      const delivery: EmailDeliveryServicePort = {
        deliver: async () => {
          throw new Error('template engine exploded');
        },
      };
      const crashing = new CampaignService({ repositories: storage, delivery, now: () => now });
      await crashing.materialize(campaign);

      expect(await crashing.sendBatch(campaign)).toEqual({ sent: 0, failed: 1 });

      expect(campaignEmails(campaign)).toEqual([
        expect.objectContaining({ status: 'failed', retryCount: 1, errorMessage: 'template engine exploded' }),
      ]);
    });

    it('leaves the queue alone when the configuration was disabled', async () => {
      seedLead(storage);
      const campaign = seedCampaign(storage, {
        userId: owner.id,
        templateId: template.id,
        emailConfigId: config.id,
        status: 'sending',
      });
      await service.materialize(campaign);
      storage.emailConfigurations.rows.set(config.id, { ...config, isActive: false });

      expect(await service.sendBatch(campaign)).toEqual({ sent: 0, failed: 0 });
      expect(campaignEmails(campaign).map((email) => email.status)).toEqual(['queued']);
      expect(reload(campaign).status).toBe('sending');
    });

    it('refuses campaigns that are not sending', async () => {
      const campaign = seedCampaign(storage, {
        userId: owner.id,
        templateId: template.id,
        emailConfigId: config.id,
        status: 'paused',
      });

      await expect(service.sendBatch(campaign)).rejects.toBeInstanceOf(ConflictError);
    });
  });

  describe('lifecycle', () => {
    it('pauses, resumes and cancels', async () => {
      const campaign = seedCampaign(storage, {
        userId: owner.id,
        templateId: template.id,
        emailConfigId: config.id,
        status: 'sending',
      });

      expect((await service.pauseCampaign(actor, campaign.id)).status).toBe('paused');
      expect((await service.resumeCampaign(actor, campaign.id)).status).toBe('sending');
      expect(await service.cancelCampaign(actor, campaign.id)).toMatchObject({ status: 'cancelled', completedAt: now });
    });

    it('rejects transitions outside the lifecycle', async () => {
      const draft = seedCampaign(storage, { userId: owner.id, templateId: template.id, emailConfigId: config.id });
      const sent = seedCampaign(storage, {
        userId: owner.id,
        templateId: template.id,
        emailConfigId: config.id,
        status: 'sent',
      });

      await expect(service.pauseCampaign(actor, draft.id)).rejects.toBeInstanceOf(ConflictError);
      await expect(service.resumeCampaign(actor, draft.id)).rejects.toBeInstanceOf(ConflictError);
      await expect(service.cancelCampaign(actor, sent.id)).rejects.toBeInstanceOf(ConflictError);
      await expect(service.startCampaign(actor, sent.id)).rejects.toBeInstanceOf(ConflictError);
    });

    it('starts a draft and sends its first batch', async () => {
      seedLead(storage);
      const campaign = await service.createCampaign(actor, campaignInput());

      const started = await service.startCampaign(actor, campaign.id);

      expect(started).toMatchObject({ status: 'sent', startedAt: now, emailsSent: 1 });
    });
  });

  describe('processDueCampaigns', () => {
    it('starts due scheduled campaigns and sends a batch for every sending one', async () => {
      seedLead(storage);
      const due = seedCampaign(storage, {
        userId: owner.id,
        templateId: template.id,
        emailConfigId: config.id,
        status: 'scheduled',
        scheduledAt: new Date('2024-06-01T08:00:00Z'),
      });
      const later = seedCampaign(storage, {
        userId: owner.id,
        templateId: template.id,
        emailConfigId: config.id,
        status: 'scheduled',
        scheduledAt: new Date('2024-06-03T08:00:00Z'),
      });
      await service.materialize(due);

      const summary = await service.processDueCampaigns();

      expect(summary).toEqual({ started: 1, processed: 1, sent: 1, failed: 0 });
      expect(reload(due)).toMatchObject({ status: 'sent', startedAt: now, emailsSent: 1 });
      expect(reload(later).status).toBe('scheduled');
    });
  });

  describe('sendBulkEmail', () => {
    it('wraps the selected leads into a campaign sent with the default configuration', async () => {
      const ann = seedLead(storage);
      seedLead(storage, { email: 'skipped@example.com' });

      const campaign = await service.sendBulkEmail(actor, { leadIds: [ann.id, ann.id], templateId: template.id });

      expect(campaign.name).toMatch(/^Bulk Email - \d{4}-\d{2}-\d{2} \d{2}:\d{2}$/);
      expect(campaign).toMatchObject({
        emailConfigId: config.id,
        specificLeadIds: [ann.id],
        totalRecipients: 1,
        status: 'sent',
        emailsSent: 1,
      });
    });

    it('fails when the user has no sending configuration', async () => {
      storage.emailConfigurations.rows.clear();

      await expect(
        service.sendBulkEmail(actor, { leadIds: [seedLead(storage).id], templateId: template.id })
      ).rejects.toThrow('No email configuration available');
    });
  });

  it('reports delivery stats with progress', async () => {
    seedLead(storage);
    seedLead(storage, { email: 'bob@example.com' });
    const campaign = seedCampaign(storage, {
      userId: owner.id,
      templateId: template.id,
      emailConfigId: config.id,
      status: 'sending',
      totalRecipients: 2,
    });
    await service.materialize(campaign);
    transport.failNext('Rejected');
    await service.sendBatch(campaign);

    const stats = await service.getCampaignStats(actor, campaign.id);

    expect(stats).toMatchObject({ totalSent: 1, failed: 1, totalRecipients: 2, progress: 50, deliveryRate: 0 });
  });
});
