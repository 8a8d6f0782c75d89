import { Router, type Request, type Response } from 'express';

import { asyncHandler } from '../../middleware/error-handler';
import { parseOrFail, requireActor } from '../../utils/http-validation';
import type { EmailTemplateServicePort } from './email-template.service';
import {
  CreateTemplateSchema,
  PreviewTemplateSchema,
  TemplateIdParamSchema,
  UpdateTemplateSchema,
} from './email-template.validators';

export const createEmailTemplatesRouter = (service: EmailTemplateServicePort): Router => {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const templates = await service.listTemplates(requireActor(req));
      res.json({ success: true, data: templates });
    })
  );

  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const body = parseOrFail(CreateTemplateSchema, req.body);
      const template = await service.createTemplate(requireActor(req), body);
      res.status(201).json({ success: true, data: template });
    })
  );

  router.post(
    '/defaults',
    asyncHandler(async (req: Request, res: Response) => {
      const templates = await service.installDefaultTemplates(requireActor(req));
      res.status(201).json({ success: true, data: templates });
    })
  );

  router.get(
    '/:templateId',
    asyncHandler(async (req: Request, res: Response) => {
      const params = parseOrFail(TemplateIdParamSchema, req.params);
      const template = await service.getTemplate(requireActor(req), params.templateId);
      res.json({ success: true, data: template });
    })
  );

  router.patch(
    '/:templateId',
    asyncHandler(async (req: Request, res: Response) => {
      const params = parseOrFail(TemplateIdParamSchema, req.params);
      const body = parseOrFail(UpdateTemplateSchema, req.body);
      const template = await service.updateTemplate(requireActor(req), params.templateId, body);
      res.json({ success: true, data: template });
    })
  );

  router.post(
    '/:templateId/preview',
    asyncHandler(async (req: Request, res: Response) => {
      const params = parseOrFail(TemplateIdParamSchema, req.params);
      const body = parseOrFail(PreviewTemplateSchema, req.body ?? {});
      const rendered = await service.previewTemplate(requireActor(req), params.templateId, body.leadId);
      res.json({ success: true, data: rendered });
    })
  );

  return router;
};
