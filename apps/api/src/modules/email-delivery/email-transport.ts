import nodemailer from 'nodemailer';
import type SMTPTransport from 'nodemailer/lib/smtp-transport';
import type { EmailConfiguration } from '@salesdesk/core';

import { logger as defaultLogger, type Logger } from '../../config/logger';

export interface MailAddress {
  name: string;
  address: string;
}

export interface OutboundEmail {
  from: MailAddress;
  to: MailAddress;
  replyTo: string | null;
  subject: string;
  html: string | null;
  text: string;
}

export interface TransportResult {
  ok: boolean;
  message: string;
  externalId?: string;
}

export interface EmailTransport {
  testConnection(config: EmailConfiguration): Promise<TransportResult>;
  send(message: OutboundEmail, config: EmailConfiguration): Promise<TransportResult>;
}

export type SmtpTransporter = {
  verify(): Promise<true>;
  sendMail(mail: SMTPTransport.MailOptions): Promise<SMTPTransport.SentMessageInfo>;
  close(): void;
};

export type SmtpTransporterFactory = (options: SMTPTransport.Options) => SmtpTransporter;

export interface SmtpEmailTransportDependencies {
  createTransporter?: SmtpTransporterFactory;
  timeoutMs?: number;
  logger?: Logger;
}

const errorCode = (error: unknown): string | null =>
  error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : null;

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const describeConnectionError = (error: unknown): string => {
  switch (errorCode(error)) {
    case 'EAUTH':
      return 'Authentication failed. Check username and password.';
    case 'ECONNECTION':
    case 'ETIMEDOUT':
    case 'EDNS':
      return 'Could not connect to SMTP server. Check host and port.';
    default:
      return `Connection error: ${errorMessage(error)}`;
  }
};

export const toSmtpOptions = (config: EmailConfiguration, timeoutMs?: number): SMTPTransport.Options => ({
  host: config.smtpHost,
  port: config.smtpPort,
  secure: config.useSsl,
  requireTLS: !config.useSsl && config.useTls,
  ignoreTLS: !config.useSsl && !config.useTls,
  auth: config.smtpUsername ? { user: config.smtpUsername, pass: config.smtpPassword } : undefined,
  connectionTimeout: timeoutMs,
  greetingTimeout: timeoutMs,
  socketTimeout: timeoutMs,
});

/**
 * SMTP delivery over nodemailer. One transporter per call; nothing pooled
 * across configurations.
 */
export class SmtpEmailTransport implements EmailTransport {
  private readonly createTransporter: SmtpTransporterFactory;
  private readonly timeoutMs?: number;
  private readonly logger: Logger;

  constructor(deps: SmtpEmailTransportDependencies = {}) {
    this.createTransporter = deps.createTransporter ?? ((options) => nodemailer.createTransport(options));
    this.timeoutMs = deps.timeoutMs;
    this.logger = deps.logger ?? defaultLogger;
  }

  async testConnection(config: EmailConfiguration): Promise<TransportResult> {
    const transporter = this.createTransporter(toSmtpOptions(config, this.timeoutMs));

    try {
      await transporter.verify();
      return { ok: true, message: 'Connection successful' };
    } catch (error) {
      this.logger.warn('[email-transport] connection test failed', {
        configurationId: config.id,
        host: config.smtpHost,
        error: errorMessage(error),
      });
      return { ok: false, message: describeConnectionError(error) };
    } finally {
      transporter.close();
    }
  }

  async send(message: OutboundEmail, config: EmailConfiguration): Promise<TransportResult> {
    const transporter = this.createTransporter(toSmtpOptions(config, this.timeoutMs));

    try {
      const info = await transporter.sendMail({
        from: message.from,
        to: message.to,
        replyTo: message.replyTo ?? undefined,
        subject: message.subject,
        text: message.text,
        html: message.html ?? undefined,
      });

      if (info.rejected.length > 0 && info.accepted.length === 0) {
        return { ok: false, message: 'Failed to send email' };
      }

      return { ok: true, message: 'Email sent successfully', externalId: info.messageId };
    } catch (error) {
      this.logger.error('[email-transport] send failed', {
        configurationId: config.id,
        to: message.to.address,
        error: errorMessage(error),
      });
      return { ok: false, message: errorMessage(error) };
    } finally {
      transporter.close();
    }
  }
}
