import { getConfig } from './config/env';

export type HealthPayload = {
  status: 'ok';
  timestamp: string;
  uptime: number;
  environment: string;
  storage: 'postgres' | 'unconfigured';
  alerts: {
    insecureFallbacks: string[];
  };
};

const LOCAL_TRACKING_HOST = /^https?:\/\/(localhost|127\.0\.0\.1)(:\d+)?$/i;

export const buildHealthPayload = ({ environment }: { environment: string }): HealthPayload => {
  const config = getConfig();

  const insecureFallbacks: string[] = [];
  if (environment === 'production' && LOCAL_TRACKING_HOST.test(config.TRACKING_BASE_URL)) {
    insecureFallbacks.push('tracking_base_url_localhost');
  }

  return {
    status: 'ok',
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    environment,
    storage: config.DATABASE_URL?.trim() ? 'postgres' : 'unconfigured',
    alerts: {
      insecureFallbacks,
    },
  };
};
