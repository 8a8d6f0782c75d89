import { Router, type Request, type Response } from 'express';

import { asyncHandler } from '../../middleware/error-handler';
import { parseOrFail, requireActor } from '../../utils/http-validation';
import type { KpiServicePort } from './kpi.service';
import {
  CreateKpiTargetSchema,
  KpiTargetIdParamSchema,
  ListKpiTargetsQuerySchema,
  UpdateKpiProgressSchema,
} from './kpi.validators';

export const createKpiRouter = (service: KpiServicePort): Router => {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const query = parseOrFail(ListKpiTargetsQuerySchema, req.query);
      res.json({ success: true, data: await service.listTargets(requireActor(req), query) });
    })
  );

  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const body = parseOrFail(CreateKpiTargetSchema, req.body);
      const target = await service.createTarget(requireActor(req), body);
      res.status(201).json({ success: true, data: target });
    })
  );

  router.patch(
    '/:targetId/progress',
    asyncHandler(async (req: Request, res: Response) => {
      const params = parseOrFail(KpiTargetIdParamSchema, req.params);
      const body = parseOrFail(UpdateKpiProgressSchema, req.body);
      const target = await service.updateProgress(requireActor(req), params.targetId, body.value);
      res.json({ success: true, data: target });
    })
  );

  return router;
};
