import express from 'express';
import request from 'supertest';
import { beforeEach, describe, expect, it, vi } from 'vitest';

import { errorHandler } from '../../../middleware/error-handler';
import type { ReportServicePort } from '../report.service';
import { createReportsRouter } from '../reports.routes';

const service = {
  getDashboard: vi.fn(),
  getAnalytics: vi.fn(),
  getEmailAnalytics: vi.fn(),
} satisfies ReportServicePort;

const actor = {
  id: '9a4c1f5e-8a5b-4a0e-9f43-1d6f3f4c2b10',
  tenantId: 'tenant-1',
  role: 'sales_manager' as const,
  department: 'north',
};

const buildApp = () => {
  const app = express();
  app.use((req, _res, next) => {
    req.user = { ...actor, email: 'max@example.com', firstName: 'Max', lastName: 'Lead' };
    next();
  });
  app.use('/reports', createReportsRouter(service));
  app.use(errorHandler);
  return app;
};

describe('reports routes', () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  it('defaults the dashboard to the current month', async () => {
    service.getDashboard.mockResolvedValue({ stats: { totalLeads: 0 } });

    const response = await request(buildApp()).get('/reports/dashboard');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ success: true, data: { stats: { totalLeads: 0 } } });
    expect(service.getDashboard).toHaveBeenCalledWith(actor, { range: 'month' });
  });

  it('rejects unknown ranges', async () => {
    const response = await request(buildApp()).get('/reports/analytics').query({ range: 'decade' });

    expect(response.status).toBe(400);
    expect(response.body.error.details.errors[0].field).toBe('range');
    expect(service.getAnalytics).not.toHaveBeenCalled();
  });

  it('requires both ends of a custom range', async () => {
    const response = await request(buildApp()).get('/reports/emails').query({ range: 'custom', from: '2024-05-01' });

    expect(response.status).toBe(400);
    expect(response.body.error.details.errors).toEqual([{ field: 'from', message: 'Custom ranges need both from and to' }]);
  });
});
