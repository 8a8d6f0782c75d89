import express from 'express';
import request from 'supertest';
import { beforeEach, describe, expect, it, vi } from 'vitest';

import { errorHandler } from '../../../middleware/error-handler';
import { createLeadsRouter } from '../leads.routes';
import type { LeadServicePort } from '../lead.service';

const service = {
  createLead: vi.fn(),
  updateLead: vi.fn(),
  getLead: vi.fn(),
  listLeads: vi.fn(),
  logActivity: vi.fn(),
  listActivities: vi.fn(),
  listSources: vi.fn(),
  createSource: vi.fn(),
} satisfies LeadServicePort;

const actor = {
  id: '9a4c1f5e-8a5b-4a0e-9f43-1d6f3f4c2b10',
  tenantId: 'tenant-1',
  role: 'sales_rep' as const,
  department: 'north',
};

const buildApp = (authenticated = true) => {
  const app = express();
  app.use(express.json());
  app.use((req, _res, next) => {
    if (authenticated) {
      req.user = { ...actor, email: 'sam@example.com', firstName: 'Sam', lastName: 'Rep' };
    }
    next();
  });
  app.use('/leads', createLeadsRouter(service));
  app.use(errorHandler);
  return app;
};

describe('leads routes', () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  it('rejects a lead without an email before reaching the service', async () => {
    const response = await request(buildApp()).post('/leads').send({ firstName: 'Ann' });

    expect(response.status).toBe(400);
    expect(response.body).toMatchObject({ success: false, error: { code: 'VALIDATION_ERROR' } });
    expect(service.createLead).not.toHaveBeenCalled();
  });

  it('passes the actor and parsed filters to listLeads', async () => {
    service.listLeads.mockResolvedValue({ items: [], total: 0, page: 2, limit: 5 });

    const response = await request(buildApp()).get('/leads?page=2&limit=5&status=new,contacted');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ success: true, data: { items: [], total: 0, page: 2, limit: 5 } });
    expect(service.listLeads).toHaveBeenCalledWith(actor, { page: 2, limit: 5, status: ['new', 'contacted'] });
  });

  it('rejects malformed lead ids', async () => {
    const response = await request(buildApp()).get('/leads/not-a-uuid');

    expect(response.status).toBe(400);
    expect(service.getLead).not.toHaveBeenCalled();
  });

  it('answers 401 without an authenticated user', async () => {
    const response = await request(buildApp(false)).get('/leads');

    expect(response.status).toBe(401);
    expect(response.body.error.code).toBe('UNAUTHORIZED');
  });
});
