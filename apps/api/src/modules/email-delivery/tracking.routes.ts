import { Router, type Request, type Response } from 'express';

import { asyncHandler } from '../../middleware/error-handler';
import type { TrackingServicePort } from './tracking.service';
import { TRANSPARENT_GIF } from './tracking-pixel';

const firstHeader = (value: string | string[] | undefined): string | null =>
  (Array.isArray(value) ? value[0] : value) ?? null;

/** Public, unauthenticated tracking callbacks. */
export const createTrackingRouter = (service: TrackingServicePort): Router => {
  const router = Router();

  router.get(
    '/:trackingId/:event',
    asyncHandler(async (req: Request, res: Response) => {
      const { trackingId, event } = req.params;
      const clickedUrl = typeof req.query.url === 'string' ? req.query.url : null;

      const outcome = await service.recordCallback(trackingId, event, {
        ipAddress: req.ip ?? null,
        userAgent: firstHeader(req.headers['user-agent']),
        clickedUrl,
      });

      if (outcome.event === 'opened' && outcome.email) {
        res.set({
          'Content-Type': 'image/gif',
          'Cache-Control': 'no-cache, no-store, must-revalidate',
          Pragma: 'no-cache',
          Expires: '0',
        });
        res.status(200).send(TRANSPARENT_GIF);
        return;
      }

      res.status(204).end();
    })
  );

  return router;
};
