import { beforeEach, describe, expect, it } from 'vitest';
import { ForbiddenError, NotFoundError, ValidationError, toActor, type Actor, type User } from '@salesdesk/core';

import {
  createInMemoryStorage,
  seedLead,
  seedTemplate,
  seedUser,
  type InMemoryStorage,
} from '../../../test-utils/in-memory-storage';
import { EmailTemplateService } from '../email-template.service';
import { CreateTemplateSchema } from '../email-template.validators';

describe('EmailTemplateService', () => {
  let storage: InMemoryStorage;
  let service: EmailTemplateService;
  let owner: User;
  let actor: Actor;

  beforeEach(() => {
    storage = createInMemoryStorage();
    service = new EmailTemplateService({ repositories: storage, now: () => new Date(2024, 3, 1, 14, 0) });
    owner = seedUser(storage, { firstName: 'Sam', lastName: 'Rep', email: 'sam@example.com' });
    actor = toActor(owner);
  });

  it('rejects templates with unknown placeholders', async () => {
    const input = CreateTemplateSchema.parse({ name: 'Bad', subject: 'Hi {{nickname}}', bodyHtml: '<p>x</p>' });

    const error = await service.createTemplate(actor, input).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({
      message: 'Unknown template variable: {{nickname}}',
      details: { errors: ['Unknown template variable: {{nickname}}'] },
    });
    expect(storage.emailTemplates.rows.size).toBe(0);
  });

  it('stores a blank text body as null', async () => {
    const input = CreateTemplateSchema.parse({ name: 'Intro', subject: 'Hi', bodyHtml: '<p>x</p>', bodyText: '  ' });

    const template = await service.createTemplate(actor, input);

    expect(template).toMatchObject({ bodyText: null, templateType: 'custom', isShared: false, usageCount: 0 });
  });

  it('validates the merged content on update', async () => {
    const template = seedTemplate(storage, { userId: owner.id });

    await expect(service.updateTemplate(actor, template.id, { bodyHtml: '{{deal}}' })).rejects.toBeInstanceOf(
      ValidationError
    );
  });

  it('shares templates for reading but not for editing', async () => {
    const colleague = toActor(seedUser(storage, { email: 'kim@example.com' }));
    const shared = seedTemplate(storage, { userId: owner.id, isShared: true });
    const personal = seedTemplate(storage, { userId: owner.id, name: 'Private' });

    await expect(service.getTemplate(colleague, shared.id)).resolves.toMatchObject({ id: shared.id });
    await expect(service.getTemplate(colleague, personal.id)).rejects.toBeInstanceOf(NotFoundError);
    await expect(service.updateTemplate(colleague, shared.id, { name: 'Mine' })).rejects.toBeInstanceOf(ForbiddenError);
  });

  it('previews with sample data or a real lead', async () => {
    const template = seedTemplate(storage, {
      userId: owner.id,
      subject: 'For {{company}}',
      bodyHtml: '<p>Hi {{first_name}}, {{user_name}} here at {{current_time}}</p>',
    });
    const lead = seedLead(storage, { firstName: 'Ann', company: 'Acme Corp', assignedToId: owner.id });

    const sample = await service.previewTemplate(actor, template.id);
    const real = await service.previewTemplate(actor, template.id, lead.id);

    expect(sample).toEqual({
      subject: 'For Sample Company',
      htmlBody: '<p>Hi John, Sam Rep here at 14:00</p>',
      textBody: 'Hi John, Sam Rep here at 14:00',
    });
    expect(real.subject).toBe('For Acme Corp');
  });

  it('installs the default templates once', async () => {
    const first = await service.installDefaultTemplates(actor);
    const second = await service.installDefaultTemplates(actor);

    expect(first.map((template) => template.name)).toEqual(['Welcome Email', 'Follow-up Email']);
    expect(second).toEqual([]);
  });
});
