import { format } from 'date-fns';
import { ConflictError, NotFoundError, type Actor, type EmailConfiguration } from '@salesdesk/core';
import type { EmailConfigurationPatch, EmailConfigurationRepository } from '@salesdesk/storage';

import { logger as defaultLogger, type Logger } from '../../config/logger';
import { recordEmailDelivery } from '../../metrics/email-metrics';
import type { EmailTransport, TransportResult } from '../email-delivery/email-transport';
import type { CreateEmailConfigurationInput, UpdateEmailConfigurationInput } from './email-config.validators';
import { resolveSendingConfiguration } from './sending-configuration';

export interface EmailConfigServiceDependencies {
  configurations: EmailConfigurationRepository;
  transport: EmailTransport;
  logger?: Logger;
  now?: () => Date;
}

export interface EmailConfigServicePort {
  listConfigurations(actor: Actor): Promise<EmailConfiguration[]>;
  getConfiguration(actor: Actor, id: string): Promise<EmailConfiguration>;
  createConfiguration(actor: Actor, input: CreateEmailConfigurationInput): Promise<EmailConfiguration>;
  updateConfiguration(actor: Actor, id: string, input: UpdateEmailConfigurationInput): Promise<EmailConfiguration>;
  setDefault(actor: Actor, id: string): Promise<EmailConfiguration>;
  testConnection(actor: Actor, id: string): Promise<TransportResult>;
  sendTestEmail(actor: Actor, id: string, to: string): Promise<TransportResult>;
  getSendingConfiguration(actor: Actor): Promise<EmailConfiguration | null>;
}

/** Stored passwords never leave the service. */
export const redactConfiguration = (config: EmailConfiguration): EmailConfiguration => ({
  ...config,
  smtpPassword: config.smtpPassword ? '********' : '',
});

export class EmailConfigService implements EmailConfigServicePort {
  private readonly configurations: EmailConfigurationRepository;
  private readonly transport: EmailTransport;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: EmailConfigServiceDependencies) {
    this.configurations = deps.configurations;
    this.transport = deps.transport;
    this.logger = deps.logger ?? defaultLogger;
    this.now = deps.now ?? (() => new Date());
  }

  async listConfigurations(actor: Actor): Promise<EmailConfiguration[]> {
    return this.configurations.listByUser(actor.tenantId, actor.id);
  }

  async getConfiguration(actor: Actor, id: string): Promise<EmailConfiguration> {
    const config = await this.configurations.findById(actor.tenantId, id);
    if (!config || config.userId !== actor.id) {
      throw new NotFoundError('EmailConfiguration', id);
    }
    return config;
  }

  async createConfiguration(actor: Actor, input: CreateEmailConfigurationInput): Promise<EmailConfiguration> {
    const existing = await this.configurations.listByUser(actor.tenantId, actor.id);
    if (existing.some((config) => config.name.toLowerCase() === input.name.toLowerCase())) {
      throw new ConflictError('An email configuration with this name already exists', { name: input.name });
    }

    const created = await this.configurations.create({
      tenantId: actor.tenantId,
      userId: actor.id,
      name: input.name,
      provider: input.provider,
      smtpHost: input.smtpHost,
      smtpPort: input.smtpPort,
      smtpUsername: input.smtpUsername,
      smtpPassword: input.smtpPassword,
      useTls: input.useTls,
      useSsl: input.useSsl,
      fromEmail: input.fromEmail,
      fromName: input.fromName,
      replyTo: input.replyTo ?? null,
      isActive: input.isActive,
      isDefault: false,
      dailyLimit: input.dailyLimit,
    });

    this.logger.info('[email-config] configuration created', { userId: actor.id, configurationId: created.id });

    // The first configuration a user adds becomes their default.
    if (input.isDefault || existing.length === 0) {
      return this.markDefault(actor, created.id);
    }

    return created;
  }

  async updateConfiguration(
    actor: Actor,
    id: string,
    input: UpdateEmailConfigurationInput
  ): Promise<EmailConfiguration> {
    const current = await this.getConfiguration(actor, id);

    if (input.name && input.name.toLowerCase() !== current.name.toLowerCase()) {
      const siblings = await this.configurations.listByUser(actor.tenantId, actor.id);
      if (siblings.some((config) => config.id !== id && config.name.toLowerCase() === input.name?.toLowerCase())) {
        throw new ConflictError('An email configuration with this name already exists', { name: input.name });
      }
    }

    const { isDefault, ...fields } = input;
    const patch: EmailConfigurationPatch = { ...fields };
    if (input.useSsl === true && input.useTls === undefined) {
      patch.useTls = false;
    }
    if (input.useTls === true && input.useSsl === undefined) {
      patch.useSsl = false;
    }

    const updated = await this.configurations.update(actor.tenantId, id, patch);
    if (!updated) {
      throw new NotFoundError('EmailConfiguration', id);
    }

    if (isDefault === true && !updated.isDefault) {
      return this.markDefault(actor, id);
    }

    return updated;
  }

  async setDefault(actor: Actor, id: string): Promise<EmailConfiguration> {
    await this.getConfiguration(actor, id);
    return this.markDefault(actor, id);
  }

  async testConnection(actor: Actor, id: string): Promise<TransportResult> {
    const config = await this.getConfiguration(actor, id);
    const result = await this.transport.testConnection(config);

    this.logger.info('[email-config] connection tested', { configurationId: id, ok: result.ok });
    return result;
  }

  async sendTestEmail(actor: Actor, id: string, to: string): Promise<TransportResult> {
    const config = await this.getConfiguration(actor, id);
    const sentAt = format(this.now(), 'yyyy-MM-dd HH:mm:ss');

    const result = await this.transport.send(
      {
        from: { name: config.fromName, address: config.fromEmail },
        to: { name: '', address: to },
        replyTo: config.replyTo,
        subject: `Test Email from ${config.name}`,
        html: null,
        text: [
          'This is a test email from your CRM system.',
          '',
          `Configuration: ${config.name}`,
          `Provider: ${config.provider.toUpperCase()}`,
          `From: ${config.fromName} <${config.fromEmail}>`,
          '',
          'If you received this email, your configuration is working correctly!',
          '',
          `Sent at: ${sentAt}`,
        ].join('\n'),
      },
      config
    );

    recordEmailDelivery('test', result.ok ? 'sent' : 'failed');

    return result.ok
      ? { ok: true, message: `Test email sent successfully to ${to}`, externalId: result.externalId }
      : { ok: false, message: `Test email failed: ${result.message}` };
  }

  async getSendingConfiguration(actor: Actor): Promise<EmailConfiguration | null> {
    return resolveSendingConfiguration(this.configurations, actor.tenantId, actor.id);
  }

  private async markDefault(actor: Actor, id: string): Promise<EmailConfiguration> {
    const config = await this.configurations.markDefault(actor.tenantId, actor.id, id);
    if (!config) {
      throw new NotFoundError('EmailConfiguration', id);
    }

    this.logger.info('[email-config] default configuration switched', { userId: actor.id, configurationId: id });
    return config;
  }
}
