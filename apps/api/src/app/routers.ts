import { Router, type Application } from 'express';

import { getJwtSecret } from '../config/auth';
import type { Logger } from '../config/logger';
import { buildHealthPayload } from '../health';
import { renderMetrics } from '../metrics/email-metrics';
import { createAuthMiddleware } from '../middleware/auth';
import { errorHandler } from '../middleware/error-handler';
import { createCampaignsRouter } from '../modules/campaigns/campaigns.routes';
import { createEmailConfigRouter } from '../modules/email-config/email-config.routes';
import { createTrackingRouter } from '../modules/email-delivery/tracking.routes';
import { createEmailTemplatesRouter } from '../modules/email-templates/email-templates.routes';
import { createEmailsRouter } from '../modules/emails/emails.routes';
import { createKpiRouter } from '../modules/kpi/kpi.routes';
import { createLeadsRouter } from '../modules/leads/leads.routes';
import { createReportsRouter } from '../modules/reports/reports.routes';
import { createSequencesRouter } from '../modules/sequences/sequences.routes';
import { getReadinessState } from './readiness';
import type { ApplicationServices } from './services';

type RegisterRoutersDeps = {
  services: ApplicationServices;
  logger: Logger;
  nodeEnv: string;
};

export const registerRouters = (app: Application, { services, logger, nodeEnv }: RegisterRoutersDeps) => {
  app.get('/metrics', async (_req, res) => {
    const payload = await renderMetrics();
    res.setHeader('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
    res.status(200).send(payload);
  });

  app.get(['/health', '/healthz'], (_req, res) => {
    res.json({
      ...buildHealthPayload({ environment: nodeEnv }),
      readiness: getReadinessState(),
    });
  });

  app.get(['/ready', '/readiness'], (_req, res) => {
    const readiness = getReadinessState();
    res.status(readiness.ready ? 200 : 503).json({
      ok: readiness.ready,
      status: readiness.status,
      reason: readiness.reason,
      since: readiness.since,
    });
  });

  app.use('/track', createTrackingRouter(services.tracking));

  const api = Router();
  api.use(createAuthMiddleware({ users: services.repositories.users, getSecret: getJwtSecret }));
  api.use('/leads', createLeadsRouter(services.leads));
  api.use('/email-configurations', createEmailConfigRouter(services.emailConfigs));
  api.use('/email-templates', createEmailTemplatesRouter(services.emailTemplates));
  api.use('/emails', createEmailsRouter(services.emails));
  api.use('/campaigns', createCampaignsRouter(services.campaigns));
  api.use('/sequences', createSequencesRouter(services.sequences));
  api.use('/reports', createReportsRouter(services.reports));
  api.use('/kpi-targets', createKpiRouter(services.kpi));
  app.use('/api', api);

  app.get('/', (_req, res) => {
    res.status(200).json({ status: 'ok', environment: nodeEnv });
  });

  app.use((req, res) => {
    res.status(404).json({
      success: false,
      error: {
        code: 'NOT_FOUND',
        message: `Route ${req.originalUrl} not found`,
      },
    });
  });

  app.use(errorHandler);

  logger.debug('[http] routers registered');
};
