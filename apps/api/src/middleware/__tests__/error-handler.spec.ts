import express from 'express';
import request from 'supertest';
import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { ConflictError, ForbiddenError, NotFoundError } from '@salesdesk/core';

import { parseOrFail } from '../../utils/http-validation';
import { asyncHandler, errorHandler } from '../error-handler';

const buildApp = (failure: () => unknown) => {
  const app = express();
  app.use(express.json());
  app.post(
    '/boom',
    asyncHandler(async (_req, res) => {
      failure();
      res.json({ ok: true });
    })
  );
  app.use(errorHandler);
  return app;
};

describe('errorHandler', () => {
  it('maps not found errors to 404 with their details', async () => {
    const response = await request(
      buildApp(() => {
        throw new NotFoundError('Lead', 'lead-1');
      })
    ).post('/boom');

    expect(response.status).toBe(404);
    expect(response.body.success).toBe(false);
    expect(response.body.error).toMatchObject({
      code: 'NOT_FOUND',
      message: 'Lead with id lead-1 not found',
      details: { resource: 'Lead', id: 'lead-1' },
    });
  });

  it('maps conflicts and forbidden errors', async () => {
    const conflict = await request(
      buildApp(() => {
        throw new ConflictError('Step 1 already exists');
      })
    ).post('/boom');
    const forbidden = await request(
      buildApp(() => {
        throw new ForbiddenError();
      })
    ).post('/boom');

    expect(conflict.status).toBe(409);
    expect(conflict.body.error.message).toBe('Step 1 already exists');
    expect(forbidden.status).toBe(403);
    expect(forbidden.body.error.code).toBe('FORBIDDEN');
  });

  it('reports the first issue per field from parseOrFail', async () => {
    const schema = z.object({ name: z.string().min(3), size: z.number() });

    const response = await request(buildApp(() => parseOrFail(schema, { name: 'ab' }))).post('/boom');

    expect(response.status).toBe(400);
    expect(response.body.error.code).toBe('VALIDATION_ERROR');
    expect(response.body.error.details.errors).toEqual([
      { field: 'name', message: 'String must contain at least 3 character(s)' },
      { field: 'size', message: 'Required' },
    ]);
  });

  it('answers malformed json bodies with 400', async () => {
    const response = await request(buildApp(() => undefined))
      .post('/boom')
      .set('Content-Type', 'application/json')
      .send('{"name":');

    expect(response.status).toBe(400);
    expect(response.body.error.code).toBe('INVALID_JSON');
  });

  it('passes unexpected error messages through outside production', async () => {
    const response = await request(
      buildApp(() => {
        throw new Error('database went away');
      })
    ).post('/boom');

    expect(response.status).toBe(500);
    expect(response.body.error.code).toBe('INTERNAL_SERVER_ERROR');
    expect(response.body.error.message).toBe('database went away');
  });
});
