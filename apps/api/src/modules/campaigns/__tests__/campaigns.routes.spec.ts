import express from 'express';
import request from 'supertest';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ConflictError } from '@salesdesk/core';

import { errorHandler } from '../../../middleware/error-handler';
import type { CampaignServicePort } from '../campaign.service';
import { createCampaignsRouter } from '../campaigns.routes';

const service = {
  listCampaigns: vi.fn(),
  getCampaign: vi.fn(),
  createCampaign: vi.fn(),
  startCampaign: vi.fn(),
  pauseCampaign: vi.fn(),
  resumeCampaign: vi.fn(),
  cancelCampaign: vi.fn(),
  getCampaignStats: vi.fn(),
  sendBulkEmail: vi.fn(),
} satisfies CampaignServicePort;

const actor = {
  id: '9a4c1f5e-8a5b-4a0e-9f43-1d6f3f4c2b10',
  tenantId: 'tenant-1',
  role: 'sales_rep' as const,
  department: 'north',
};

const campaignId = '0d6f3c8e-2b7a-4f61-9c3e-5a8b7d6e4f21';
const templateId = '3b1e7c2a-6d4f-4e8a-b9c0-1f2e3d4c5b6a';
const emailConfigId = '7f6e5d4c-3b2a-4190-8e7d-6c5b4a392817';

const buildApp = () => {
  const app = express();
  app.use(express.json());
  app.use((req, _res, next) => {
    req.user = { ...actor, email: 'sam@example.com', firstName: 'Sam', lastName: 'Rep' };
    next();
  });
  app.use('/campaigns', createCampaignsRouter(service));
  app.use(errorHandler);
  return app;
};

describe('campaigns routes', () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  it('requires targeting criteria', async () => {
    const response = await request(buildApp())
      .post('/campaigns')
      .send({ name: 'Spring promo', templateId, emailConfigId });

    expect(response.status).toBe(400);
    expect(response.body.error.details.errors).toEqual([
      { field: 'targetAllLeads', message: 'Select targeting criteria or target all leads' },
    ]);
    expect(service.createCampaign).not.toHaveBeenCalled();
  });

  it('rejects batch sizes above the limit', async () => {
    const response = await request(buildApp())
      .post('/campaigns')
      .send({ name: 'Spring promo', templateId, emailConfigId, targetAllLeads: true, batchSize: 501 });

    expect(response.status).toBe(400);
    expect(response.body.error.details.errors[0].field).toBe('batchSize');
  });

  it('creates a campaign with defaults applied', async () => {
    service.createCampaign.mockResolvedValue({ id: campaignId, status: 'draft' });

    const response = await request(buildApp())
      .post('/campaigns')
      .send({ name: 'Spring promo', templateId, emailConfigId, targetStatuses: ['new'] });

    expect(response.status).toBe(201);
    expect(response.body).toEqual({ success: true, data: { id: campaignId, status: 'draft' } });
    expect(service.createCampaign).toHaveBeenCalledWith(
      actor,
      expect.objectContaining({
        batchSize: 50,
        delayBetweenBatches: 60,
        sendNow: false,
        scheduledAt: null,
        targetAllLeads: false,
        targetStatuses: ['new'],
        description: null,
      })
    );
  });

  it('maps lifecycle conflicts to 409', async () => {
    service.pauseCampaign.mockRejectedValue(new ConflictError('Invalid campaign status transition from "draft" to "paused"'));

    const response = await request(buildApp()).post(`/campaigns/${campaignId}/pause`);

    expect(response.status).toBe(409);
    expect(service.pauseCampaign).toHaveBeenCalledWith(actor, campaignId);
  });

  it('routes each lifecycle action to its service method', async () => {
    service.resumeCampaign.mockResolvedValue({ id: campaignId, status: 'sending' });

    const response = await request(buildApp()).post(`/campaigns/${campaignId}/resume`);

    expect(response.status).toBe(200);
    expect(response.body.data).toEqual({ id: campaignId, status: 'sending' });
    expect(service.startCampaign).not.toHaveBeenCalled();
  });

  it('validates bulk email lead ids', async () => {
    const response = await request(buildApp()).post('/campaigns/bulk').send({ leadIds: [], templateId });

    expect(response.status).toBe(400);
    expect(service.sendBulkEmail).not.toHaveBeenCalled();
  });
});
