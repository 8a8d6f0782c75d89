import {
  ForbiddenError,
  NotFoundError,
  ValidationError,
  isAdminRole,
  renderTemplate,
  validateTemplate,
  type Actor,
  type EmailTemplate,
  type RenderLead,
  type RenderedEmail,
  type TemplateContent,
} from '@salesdesk/core';
import type { StorageRepositories } from '@salesdesk/storage';

import { logger as defaultLogger, type Logger } from '../../config/logger';
import { isLeadInScope, resolveLeadScope } from '../leads/lead-scope';
import { DEFAULT_TEMPLATES } from './default-templates';
import type { CreateTemplateInput, UpdateTemplateInput } from './email-template.validators';

export interface EmailTemplateServiceDependencies {
  repositories: Pick<StorageRepositories, 'emailTemplates' | 'leads' | 'users'>;
  logger?: Logger;
  now?: () => Date;
}

export interface EmailTemplateServicePort {
  listTemplates(actor: Actor): Promise<EmailTemplate[]>;
  getTemplate(actor: Actor, id: string): Promise<EmailTemplate>;
  createTemplate(actor: Actor, input: CreateTemplateInput): Promise<EmailTemplate>;
  updateTemplate(actor: Actor, id: string, input: UpdateTemplateInput): Promise<EmailTemplate>;
  previewTemplate(actor: Actor, id: string, leadId?: string): Promise<RenderedEmail>;
  installDefaultTemplates(actor: Actor): Promise<EmailTemplate[]>;
}

const SAMPLE_LEAD: RenderLead = {
  firstName: 'John',
  lastName: 'Doe',
  email: 'john.doe@example.com',
  company: 'Sample Company',
  phone: '+1 555-0123',
};

const assertValidContent = (content: TemplateContent): void => {
  const errors = validateTemplate(content);
  if (errors.length > 0) {
    throw new ValidationError(errors[0] ?? 'Template is invalid', { errors });
  }
};

export class EmailTemplateService implements EmailTemplateServicePort {
  private readonly repositories: EmailTemplateServiceDependencies['repositories'];
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: EmailTemplateServiceDependencies) {
    this.repositories = deps.repositories;
    this.logger = deps.logger ?? defaultLogger;
    this.now = deps.now ?? (() => new Date());
  }

  async listTemplates(actor: Actor): Promise<EmailTemplate[]> {
    return this.repositories.emailTemplates.listAccessible(actor.tenantId, actor.id);
  }

  /** Owners see their templates; everyone in the tenant sees shared ones. */
  async getTemplate(actor: Actor, id: string): Promise<EmailTemplate> {
    const template = await this.repositories.emailTemplates.findById(actor.tenantId, id);
    if (!template || (template.userId !== actor.id && !template.isShared)) {
      throw new NotFoundError('EmailTemplate', id);
    }
    return template;
  }

  async createTemplate(actor: Actor, input: CreateTemplateInput): Promise<EmailTemplate> {
    assertValidContent(input);

    const template = await this.repositories.emailTemplates.create({
      tenantId: actor.tenantId,
      userId: actor.id,
      name: input.name,
      templateType: input.templateType,
      subject: input.subject,
      bodyHtml: input.bodyHtml,
      bodyText: input.bodyText,
      isActive: input.isActive,
      isShared: input.isShared,
      usageCount: 0,
      lastUsedAt: null,
    });

    this.logger.info('[email-templates] template created', { templateId: template.id, userId: actor.id });
    return template;
  }

  async updateTemplate(actor: Actor, id: string, input: UpdateTemplateInput): Promise<EmailTemplate> {
    const current = await this.getTemplate(actor, id);
    if (current.userId !== actor.id && !isAdminRole(actor.role)) {
      throw new ForbiddenError('Only the owner can edit this template');
    }

    assertValidContent({
      subject: input.subject ?? current.subject,
      bodyHtml: input.bodyHtml ?? current.bodyHtml,
      bodyText: input.bodyText === undefined ? current.bodyText : input.bodyText,
    });

    const updated = await this.repositories.emailTemplates.update(actor.tenantId, id, input);
    if (!updated) {
      throw new NotFoundError('EmailTemplate', id);
    }
    return updated;
  }

  async previewTemplate(actor: Actor, id: string, leadId?: string): Promise<RenderedEmail> {
    const template = await this.getTemplate(actor, id);
    const user = await this.repositories.users.findById(actor.id);
    if (!user) {
      throw new NotFoundError('User', actor.id);
    }

    let lead: RenderLead = SAMPLE_LEAD;
    if (leadId) {
      const found = await this.repositories.leads.findById(actor.tenantId, leadId);
      const scope = await resolveLeadScope(actor, this.repositories.users);
      if (!found || !isLeadInScope(found, scope)) {
        throw new NotFoundError('Lead', leadId);
      }
      lead = found;
    }

    return renderTemplate(template, lead, user, this.now());
  }

  /** Adds the stock templates the user does not have yet, matched by name. */
  async installDefaultTemplates(actor: Actor): Promise<EmailTemplate[]> {
    const existing = await this.repositories.emailTemplates.listAccessible(actor.tenantId, actor.id);
    const owned = new Set(existing.filter((template) => template.userId === actor.id).map((template) => template.name));

    const created: EmailTemplate[] = [];
    for (const template of DEFAULT_TEMPLATES) {
      if (owned.has(template.name)) {
        continue;
      }
      created.push(
        await this.repositories.emailTemplates.create({
          tenantId: actor.tenantId,
          userId: actor.id,
          name: template.name,
          templateType: template.templateType,
          subject: template.subject,
          bodyHtml: template.bodyHtml,
          bodyText: null,
          isActive: true,
          isShared: false,
          usageCount: 0,
          lastUsedAt: null,
        })
      );
    }

    if (created.length > 0) {
      this.logger.info('[email-templates] default templates installed', { userId: actor.id, count: created.length });
    }
    return created;
  }
}
