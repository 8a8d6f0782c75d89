import compression from 'compression';
import cors, { type CorsOptions } from 'cors';
import express, { type Application, type RequestHandler } from 'express';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';

import type { Logger } from '../config/logger';

export interface RateLimitSettings {
  windowMs: number;
  maxRequests: number;
}

type ConfigureSecurityMiddlewareDeps = {
  corsOptions: CorsOptions;
  nodeEnv: string;
  requestLogger: RequestHandler;
  logger: Logger;
  rateLimit: RateLimitSettings;
};

const REQUEST_ID_HEADER = 'x-request-id';

const assignRequestId: RequestHandler = (req, res, next) => {
  const headerValue = req.headers[REQUEST_ID_HEADER];
  const fromHeader = Array.isArray(headerValue) ? headerValue[0] : headerValue;
  const trimmed = typeof fromHeader === 'string' ? fromHeader.trim() : '';
  const requestId =
    trimmed.length > 0 ? trimmed : `rid_${Date.now().toString(36)}${Math.random().toString(36).slice(2, 8)}`;

  req.rid = requestId;
  res.setHeader('X-Request-Id', requestId);
  next();
};

export const configureSecurityMiddleware = (
  app: Application,
  { corsOptions, nodeEnv, requestLogger, logger, rateLimit: limits }: ConfigureSecurityMiddlewareDeps
) => {
  const limiter = rateLimit({
    windowMs: limits.windowMs,
    limit: limits.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (_req, res, _next, options) => {
      res.status(options.statusCode).json({
        success: false,
        error: {
          code: 'RATE_LIMITED',
          message: 'Too many requests from this IP, please try again later.',
        },
      });
    },
  });

  app.set('trust proxy', 1);
  app.use(cors(corsOptions));
  app.use(
    helmet({
      contentSecurityPolicy: false,
      crossOriginEmbedderPolicy: false,
    })
  );
  app.use(compression());
  app.use(express.json({ limit: '2mb' }));
  app.use(express.urlencoded({ extended: true, limit: '2mb' }));
  app.use(assignRequestId);
  app.use(requestLogger);

  if (nodeEnv === 'production') {
    app.use('/api', limiter);
  }

  logger.info('[http] security middleware configured', {
    nodeEnv,
    rateLimitWindowMs: limits.windowMs,
    rateLimitMaxRequests: limits.maxRequests,
  });
};
