import type { CorsOptions } from 'cors';
import express, { type Application } from 'express';

import type { AppConfig } from '../config/env';
import type { Logger } from '../config/logger';
import { requestLogger } from '../middleware/request-logger';
import { registerRouters } from './routers';
import { configureSecurityMiddleware } from './security';
import type { ApplicationServices } from './services';

const normalizeOrigin = (origin: string): string => {
  const trimmed = origin.trim();

  if (!trimmed || trimmed === '*') {
    return trimmed;
  }

  return trimmed.toLowerCase().replace(/\/+$/, '');
};

export const buildCorsOptions = (allowedOrigins: readonly string[]): CorsOptions => {
  const origins = new Set(allowedOrigins.map(normalizeOrigin).filter(Boolean));
  const shared = {
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['content-type', 'authorization', 'accept', 'x-request-id'],
  };

  if (origins.size === 0 || origins.has('*')) {
    return { origin: true, ...shared };
  }

  return {
    origin: (origin, callback) => {
      if (!origin || origins.has(normalizeOrigin(origin))) {
        callback(null, true);
        return;
      }

      callback(new Error(`Origin ${origin} not allowed by CORS`));
    },
    ...shared,
  };
};

export interface CreateHttpAppDeps {
  services: ApplicationServices;
  config: AppConfig;
  logger: Logger;
}

export const createHttpApp = ({ services, config, logger }: CreateHttpAppDeps): Application => {
  const app = express();

  configureSecurityMiddleware(app, {
    corsOptions: buildCorsOptions(config.CORS_ALLOWED_ORIGINS),
    nodeEnv: config.NODE_ENV,
    requestLogger,
    logger,
    rateLimit: {
      windowMs: config.RATE_LIMIT_WINDOW_MS,
      maxRequests: config.RATE_LIMIT_MAX_REQUESTS,
    },
  });

  registerRouters(app, { services, logger, nodeEnv: config.NODE_ENV });

  return app;
};
