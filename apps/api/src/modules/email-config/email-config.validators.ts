import { z } from 'zod';
import { DEFAULT_DAILY_LIMIT, DEFAULT_SMTP_PORT, EmailProviderSchema } from '@salesdesk/core';

const configurationFields = {
  name: z.string().trim().min(1).max(100),
  provider: EmailProviderSchema,
  smtpHost: z.string().trim().min(1).max(255),
  smtpPort: z.coerce.number().int().min(1).max(65_535),
  smtpUsername: z.string().trim().max(255),
  smtpPassword: z.string().max(255),
  useTls: z.boolean(),
  useSsl: z.boolean(),
  fromEmail: z.string().trim().toLowerCase().email(),
  fromName: z.string().trim().min(1).max(100),
  replyTo: z.string().trim().toLowerCase().email().nullish(),
  isActive: z.boolean(),
  isDefault: z.boolean(),
  dailyLimit: z.coerce.number().int().positive().max(100_000),
};

const tlsXorSsl = (value: { useTls?: boolean; useSsl?: boolean }) => !(value.useTls && value.useSsl);
const tlsXorSslMessage = { message: 'Use either TLS or SSL, not both.', path: ['useSsl'] };

export const CreateEmailConfigurationSchema = z
  .object({
    ...configurationFields,
    provider: configurationFields.provider.default('smtp'),
    smtpPort: configurationFields.smtpPort.default(DEFAULT_SMTP_PORT),
    smtpUsername: configurationFields.smtpUsername.default(''),
    smtpPassword: configurationFields.smtpPassword.default(''),
    useTls: configurationFields.useTls.default(true),
    useSsl: configurationFields.useSsl.default(false),
    isActive: configurationFields.isActive.default(true),
    isDefault: configurationFields.isDefault.default(false),
    dailyLimit: configurationFields.dailyLimit.default(DEFAULT_DAILY_LIMIT),
  })
  .refine(tlsXorSsl, tlsXorSslMessage);

export const UpdateEmailConfigurationSchema = z
  .object(configurationFields)
  .partial()
  .refine(tlsXorSsl, tlsXorSslMessage);

export const ConfigurationIdParamSchema = z.object({
  configurationId: z.string().uuid(),
});

export const SendTestEmailSchema = z.object({
  to: z.string().trim().toLowerCase().email(),
});

export type CreateEmailConfigurationInput = z.infer<typeof CreateEmailConfigurationSchema>;
export type UpdateEmailConfigurationInput = z.infer<typeof UpdateEmailConfigurationSchema>;
