import { Router, type Request, type Response } from 'express';

import { asyncHandler } from '../../middleware/error-handler';
import { parseOrFail, requireActor } from '../../utils/http-validation';
import type { SequenceServicePort } from './sequence.service';
import {
  AddStepSchema,
  CreateSequenceSchema,
  EnrollLeadSchema,
  EnrollmentParamSchema,
  SequenceIdParamSchema,
  UpdateSequenceSchema,
} from './sequence.validators';

export const createSequencesRouter = (service: SequenceServicePort): Router => {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const sequences = await service.listSequences(requireActor(req));
      res.json({ success: true, data: sequences });
    })
  );

  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const body = parseOrFail(CreateSequenceSchema, req.body);
      const sequence = await service.createSequence(requireActor(req), body);
      res.status(201).json({ success: true, data: sequence });
    })
  );

  router.get(
    '/:sequenceId',
    asyncHandler(async (req: Request, res: Response) => {
      const params = parseOrFail(SequenceIdParamSchema, req.params);
      const sequence = await service.getSequence(requireActor(req), params.sequenceId);
      res.json({ success: true, data: sequence });
    })
  );

  router.patch(
    '/:sequenceId',
    asyncHandler(async (req: Request, res: Response) => {
      const params = parseOrFail(SequenceIdParamSchema, req.params);
      const body = parseOrFail(UpdateSequenceSchema, req.body);
      const sequence = await service.updateSequence(requireActor(req), params.sequenceId, body);
      res.json({ success: true, data: sequence });
    })
  );

  router.post(
    '/:sequenceId/steps',
    asyncHandler(async (req: Request, res: Response) => {
      const params = parseOrFail(SequenceIdParamSchema, req.params);
      const body = parseOrFail(AddStepSchema, req.body);
      const step = await service.addStep(requireActor(req), params.sequenceId, body);
      res.status(201).json({ success: true, data: step });
    })
  );

  router.get(
    '/:sequenceId/enrollments',
    asyncHandler(async (req: Request, res: Response) => {
      const params = parseOrFail(SequenceIdParamSchema, req.params);
      const enrollments = await service.listEnrollments(requireActor(req), params.sequenceId);
      res.json({ success: true, data: enrollments });
    })
  );

  router.post(
    '/:sequenceId/enrollments',
    asyncHandler(async (req: Request, res: Response) => {
      const params = parseOrFail(SequenceIdParamSchema, req.params);
      const body = parseOrFail(EnrollLeadSchema, req.body);
      const enrollment = await service.enrollLead(requireActor(req), params.sequenceId, body.leadId);
      res.status(201).json({ success: true, data: enrollment });
    })
  );

  router.post(
    '/:sequenceId/enrollments/:enrollmentId/stop',
    asyncHandler(async (req: Request, res: Response) => {
      const params = parseOrFail(EnrollmentParamSchema, req.params);
      const enrollment = await service.stopEnrollment(requireActor(req), params.sequenceId, params.enrollmentId);
      res.json({ success: true, data: enrollment });
    })
  );

  return router;
};
