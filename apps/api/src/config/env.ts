import { z } from 'zod';

const numberFromEnv = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((value) => {
      const parsed = value === undefined || value.trim() === '' ? Number.NaN : Number(value);
      return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
    });

const listFromEnv = z
  .string()
  .optional()
  .transform((value) =>
    (value ?? '')
      .split(',')
      .map((entry) => entry.trim())
      .filter(Boolean)
  );

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: numberFromEnv(4000),
  LOG_LEVEL: z.string().default('info'),
  DATABASE_URL: z.string().optional(),
  TRACKING_BASE_URL: z
    .string()
    .url()
    .default('http://localhost:4000')
    .transform((value) => value.replace(/\/+$/, '')),
  CORS_ALLOWED_ORIGINS: listFromEnv,
  RATE_LIMIT_WINDOW_MS: numberFromEnv(15 * 60 * 1000),
  RATE_LIMIT_MAX_REQUESTS: numberFromEnv(100),
  SMTP_TIMEOUT_MS: numberFromEnv(30_000),
  EMAIL_SCHEDULER_INTERVAL_MS: numberFromEnv(60_000),
  EMAIL_SCHEDULER_MAX_RUNS: numberFromEnv(0),
  EMAIL_RETRY_BATCH_LIMIT: numberFromEnv(100),
});

export type AppConfig = z.infer<typeof EnvSchema>;

let cachedConfig: AppConfig | null = null;

export const loadConfig = (source: NodeJS.ProcessEnv = process.env): AppConfig => EnvSchema.parse(source);

export const getConfig = (): AppConfig => {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
};

export const resetConfigCache = (): void => {
  cachedConfig = null;
};
