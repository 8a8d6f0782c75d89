import { Router, type Request, type Response } from 'express';

import { asyncHandler } from '../../middleware/error-handler';
import { parseOrFail, requireActor } from '../../utils/http-validation';
import type { CampaignServicePort } from './campaign.service';
import {
  BulkEmailSchema,
  CampaignIdParamSchema,
  CreateCampaignSchema,
  ListCampaignsQuerySchema,
} from './campaign.validators';

type CampaignAction = 'startCampaign' | 'pauseCampaign' | 'resumeCampaign' | 'cancelCampaign';

export const createCampaignsRouter = (service: CampaignServicePort): Router => {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const query = parseOrFail(ListCampaignsQuerySchema, req.query);
      const result = await service.listCampaigns(requireActor(req), query);
      res.json({ success: true, data: result });
    })
  );

  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const body = parseOrFail(CreateCampaignSchema, req.body);
      const campaign = await service.createCampaign(requireActor(req), body);
      res.status(201).json({ success: true, data: campaign });
    })
  );

  router.post(
    '/bulk',
    asyncHandler(async (req: Request, res: Response) => {
      const body = parseOrFail(BulkEmailSchema, req.body);
      const campaign = await service.sendBulkEmail(requireActor(req), body);
      res.status(201).json({ success: true, data: campaign });
    })
  );

  router.get(
    '/:campaignId',
    asyncHandler(async (req: Request, res: Response) => {
      const params = parseOrFail(CampaignIdParamSchema, req.params);
      const campaign = await service.getCampaign(requireActor(req), params.campaignId);
      res.json({ success: true, data: campaign });
    })
  );

  router.get(
    '/:campaignId/stats',
    asyncHandler(async (req: Request, res: Response) => {
      const params = parseOrFail(CampaignIdParamSchema, req.params);
      const stats = await service.getCampaignStats(requireActor(req), params.campaignId);
      res.json({ success: true, data: stats });
    })
  );

  const actions: Array<[string, CampaignAction]> = [
    ['start', 'startCampaign'],
    ['pause', 'pauseCampaign'],
    ['resume', 'resumeCampaign'],
    ['cancel', 'cancelCampaign'],
  ];

  for (const [path, action] of actions) {
    router.post(
      `/:campaignId/${path}`,
      asyncHandler(async (req: Request, res: Response) => {
        const params = parseOrFail(CampaignIdParamSchema, req.params);
        const campaign = await service[action](requireActor(req), params.campaignId);
        res.json({ success: true, data: campaign });
      })
    );
  }

  return router;
};
