import { Router, type Request, type Response } from 'express';

import { asyncHandler } from '../../middleware/error-handler';
import { parseOrFail, requireActor } from '../../utils/http-validation';
import type { ReportServicePort } from './report.service';
import { ReportQuerySchema } from './report.validators';

export const createReportsRouter = (service: ReportServicePort): Router => {
  const router = Router();

  router.get(
    '/dashboard',
    asyncHandler(async (req: Request, res: Response) => {
      const query = parseOrFail(ReportQuerySchema, req.query);
      res.json({ success: true, data: await service.getDashboard(requireActor(req), query) });
    })
  );

  router.get(
    '/analytics',
    asyncHandler(async (req: Request, res: Response) => {
      const query = parseOrFail(ReportQuerySchema, req.query);
      res.json({ success: true, data: await service.getAnalytics(requireActor(req), query) });
    })
  );

  router.get(
    '/emails',
    asyncHandler(async (req: Request, res: Response) => {
      const query = parseOrFail(ReportQuerySchema, req.query);
      res.json({ success: true, data: await service.getEmailAnalytics(requireActor(req), query) });
    })
  );

  return router;
};
