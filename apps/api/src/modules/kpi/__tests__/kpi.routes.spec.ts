import express from 'express';
import request from 'supertest';
import { beforeEach, describe, expect, it, vi } from 'vitest';

import { errorHandler } from '../../../middleware/error-handler';
import { createKpiRouter } from '../kpi.routes';
import type { KpiServicePort } from '../kpi.service';

const service = {
  listTargets: vi.fn(),
  createTarget: vi.fn(),
  updateProgress: vi.fn(),
} satisfies KpiServicePort;

const actor = {
  id: '9a4c1f5e-8a5b-4a0e-9f43-1d6f3f4c2b10',
  tenantId: 'tenant-1',
  role: 'sales_rep' as const,
  department: 'north',
};

const targetId = '2f1e0d9c-8b7a-4695-8483-72615049382a';

const buildApp = () => {
  const app = express();
  app.use(express.json());
  app.use((req, _res, next) => {
    req.user = { ...actor, email: 'sam@example.com', firstName: 'Sam', lastName: 'Rep' };
    next();
  });
  app.use('/kpi', createKpiRouter(service));
  app.use(errorHandler);
  return app;
};

describe('kpi routes', () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  it('rejects periods that end before they start', async () => {
    const response = await request(buildApp())
      .post('/kpi')
      .send({ kpiType: 'calls_made', targetValue: 20, periodStart: '2024-06-30', periodEnd: '2024-06-01' });

    expect(response.status).toBe(400);
    expect(response.body.error.details.errors).toEqual([
      { field: 'periodEnd', message: 'Period end must not be before period start' },
    ]);
  });

  it('creates a target', async () => {
    service.createTarget.mockResolvedValue({ id: targetId, completion: 0 });

    const response = await request(buildApp())
      .post('/kpi')
      .send({ kpiType: 'calls_made', targetValue: '20', periodStart: '2024-06-01', periodEnd: '2024-06-30' });

    expect(response.status).toBe(201);
    expect(service.createTarget).toHaveBeenCalledWith(actor, {
      kpiType: 'calls_made',
      targetValue: 20,
      periodStart: new Date('2024-06-01'),
      periodEnd: new Date('2024-06-30'),
    });
  });

  it('passes the activeOnly flag as a boolean', async () => {
    service.listTargets.mockResolvedValue([]);

    await request(buildApp()).get('/kpi').query({ activeOnly: 'true' });

    expect(service.listTargets).toHaveBeenCalledWith(actor, { activeOnly: true });
  });

  it('updates progress', async () => {
    service.updateProgress.mockResolvedValue({ id: targetId, completion: 50 });

    const response = await request(buildApp()).patch(`/kpi/${targetId}/progress`).send({ value: 5 });

    expect(response.status).toBe(200);
    expect(service.updateProgress).toHaveBeenCalledWith(actor, targetId, 5);
  });
});
