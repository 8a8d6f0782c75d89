import type { NextFunction, Request, Response } from 'express';

import { logger } from '../config/logger';

export const requestLogger = (req: Request, res: Response, next: NextFunction): void => {
  const startedAt = Date.now();

  res.on('finish', () => {
    logger.info('HTTP Request', {
      requestId: req.rid ?? null,
      method: req.method,
      path: req.originalUrl,
      status: res.statusCode,
      durationMs: Date.now() - startedAt,
      ip: req.ip,
      userAgent: req.get('user-agent') ?? undefined,
      contentLength: res.get('content-length') ?? undefined,
      tenantId: req.user?.tenantId ?? null,
      userId: req.user?.id ?? null,
    });
  });

  next();
};
