import { Router, type Request, type Response } from 'express';

import { asyncHandler } from '../../middleware/error-handler';
import { parseOrFail, requireActor } from '../../utils/http-validation';
import { redactConfiguration, type EmailConfigServicePort } from './email-config.service';
import {
  ConfigurationIdParamSchema,
  CreateEmailConfigurationSchema,
  SendTestEmailSchema,
  UpdateEmailConfigurationSchema,
} from './email-config.validators';

export const createEmailConfigRouter = (service: EmailConfigServicePort): Router => {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const configurations = await service.listConfigurations(requireActor(req));
      res.json({ success: true, data: configurations.map(redactConfiguration) });
    })
  );

  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const body = parseOrFail(CreateEmailConfigurationSchema, req.body);
      const configuration = await service.createConfiguration(requireActor(req), body);
      res.status(201).json({ success: true, data: redactConfiguration(configuration) });
    })
  );

  router.get(
    '/:configurationId',
    asyncHandler(async (req: Request, res: Response) => {
      const params = parseOrFail(ConfigurationIdParamSchema, req.params);
      const configuration = await service.getConfiguration(requireActor(req), params.configurationId);
      res.json({ success: true, data: redactConfiguration(configuration) });
    })
  );

  router.patch(
    '/:configurationId',
    asyncHandler(async (req: Request, res: Response) => {
      const params = parseOrFail(ConfigurationIdParamSchema, req.params);
      const body = parseOrFail(UpdateEmailConfigurationSchema, req.body);
      const configuration = await service.updateConfiguration(requireActor(req), params.configurationId, body);
      res.json({ success: true, data: redactConfiguration(configuration) });
    })
  );

  router.post(
    '/:configurationId/default',
    asyncHandler(async (req: Request, res: Response) => {
      const params = parseOrFail(ConfigurationIdParamSchema, req.params);
      const configuration = await service.setDefault(requireActor(req), params.configurationId);
      res.json({ success: true, data: redactConfiguration(configuration) });
    })
  );

  router.post(
    '/:configurationId/test-connection',
    asyncHandler(async (req: Request, res: Response) => {
      const params = parseOrFail(ConfigurationIdParamSchema, req.params);
      const result = await service.testConnection(requireActor(req), params.configurationId);
      res.json({ success: true, data: result });
    })
  );

  router.post(
    '/:configurationId/test-email',
    asyncHandler(async (req: Request, res: Response) => {
      const params = parseOrFail(ConfigurationIdParamSchema, req.params);
      const body = parseOrFail(SendTestEmailSchema, req.body);
      const result = await service.sendTestEmail(requireActor(req), params.configurationId, body.to);
      res.json({ success: true, data: result });
    })
  );

  return router;
};
