import { Router, type Request, type Response } from 'express';

import { asyncHandler } from '../../middleware/error-handler';
import { parseOrFail, requireActor } from '../../utils/http-validation';
import type { LeadServicePort } from './lead.service';
import {
  CreateLeadSchema,
  CreateLeadSourceSchema,
  LeadIdParamSchema,
  ListLeadsQuerySchema,
  LogActivitySchema,
  UpdateLeadSchema,
} from './lead.validators';

export const createLeadsRouter = (service: LeadServicePort): Router => {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const query = parseOrFail(ListLeadsQuerySchema, req.query);
      const result = await service.listLeads(requireActor(req), query);
      res.json({ success: true, data: result });
    })
  );

  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const body = parseOrFail(CreateLeadSchema, req.body);
      const lead = await service.createLead(requireActor(req), body);
      res.status(201).json({ success: true, data: lead });
    })
  );

  router.get(
    '/sources',
    asyncHandler(async (req: Request, res: Response) => {
      const sources = await service.listSources(requireActor(req));
      res.json({ success: true, data: sources });
    })
  );

  router.post(
    '/sources',
    asyncHandler(async (req: Request, res: Response) => {
      const body = parseOrFail(CreateLeadSourceSchema, req.body);
      const source = await service.createSource(requireActor(req), body);
      res.status(201).json({ success: true, data: source });
    })
  );

  router.get(
    '/:leadId',
    asyncHandler(async (req: Request, res: Response) => {
      const params = parseOrFail(LeadIdParamSchema, req.params);
      const lead = await service.getLead(requireActor(req), params.leadId);
      res.json({ success: true, data: lead });
    })
  );

  router.patch(
    '/:leadId',
    asyncHandler(async (req: Request, res: Response) => {
      const params = parseOrFail(LeadIdParamSchema, req.params);
      const body = parseOrFail(UpdateLeadSchema, req.body);
      const lead = await service.updateLead(requireActor(req), params.leadId, body);
      res.json({ success: true, data: lead });
    })
  );

  router.get(
    '/:leadId/activities',
    asyncHandler(async (req: Request, res: Response) => {
      const params = parseOrFail(LeadIdParamSchema, req.params);
      const activities = await service.listActivities(requireActor(req), params.leadId);
      res.json({ success: true, data: activities });
    })
  );

  router.post(
    '/:leadId/activities',
    asyncHandler(async (req: Request, res: Response) => {
      const params = parseOrFail(LeadIdParamSchema, req.params);
      const body = parseOrFail(LogActivitySchema, req.body);
      const activity = await service.logActivity(requireActor(req), params.leadId, body);
      res.status(201).json({ success: true, data: activity });
    })
  );

  return router;
};
