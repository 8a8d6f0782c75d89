import { Router, type Request, type Response } from 'express';

import { asyncHandler } from '../../middleware/error-handler';
import { parseOrFail, requireActor } from '../../utils/http-validation';
import type { EmailServicePort } from './email.service';
import { EmailIdParamSchema, ListEmailsQuerySchema, QuickEmailSchema } from './email.validators';

export const createEmailsRouter = (service: EmailServicePort): Router => {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const query = parseOrFail(ListEmailsQuerySchema, req.query);
      const result = await service.listEmails(requireActor(req), query);
      res.json({ success: true, data: result });
    })
  );

  router.post(
    '/quick',
    asyncHandler(async (req: Request, res: Response) => {
      const body = parseOrFail(QuickEmailSchema, req.body);
      const result = await service.sendQuickEmail(requireActor(req), body);
      res.status(result.ok ? 201 : 502).json({
        success: result.ok,
        data: result.email,
        ...(result.ok ? {} : { error: { code: 'EMAIL_DELIVERY_FAILED', message: result.message } }),
      });
    })
  );

  router.get(
    '/:emailId',
    asyncHandler(async (req: Request, res: Response) => {
      const params = parseOrFail(EmailIdParamSchema, req.params);
      const email = await service.getEmail(requireActor(req), params.emailId);
      res.json({ success: true, data: email });
    })
  );

  router.post(
    '/:emailId/replied',
    asyncHandler(async (req: Request, res: Response) => {
      const params = parseOrFail(EmailIdParamSchema, req.params);
      const email = await service.markReplied(requireActor(req), params.emailId);
      res.json({ success: true, data: email });
    })
  );

  return router;
};
