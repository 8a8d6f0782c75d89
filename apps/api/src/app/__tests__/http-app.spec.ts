import jwt from 'jsonwebtoken';
import request from 'supertest';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { loadConfig } from '../../config/env';
import { logger } from '../../config/logger';
import { FakeEmailTransport } from '../../test-utils/fake-transport';
import {
  TEST_TENANT_ID,
  createInMemoryStorage,
  seedEmail,
  seedLead,
  seedUser,
  type InMemoryStorage,
} from '../../test-utils/in-memory-storage';
import { createHttpApp } from '../http-server';
import { createApplicationServices, type ApplicationServices } from '../services';

const DAY_MS = 24 * 60 * 60 * 1000;

describe('http app', () => {
  let storage: InMemoryStorage;
  let services: ApplicationServices;
  let closeStorage: ReturnType<typeof vi.fn>;

  const buildApp = () =>
    createHttpApp({ services, config: loadConfig({ NODE_ENV: 'test', TRACKING_BASE_URL: 'http://track.test' }), logger });

  const tokenFor = (userId: string) => jwt.sign({ sub: userId, tenantId: TEST_TENANT_ID }, 'test-secret');

  beforeEach(() => {
    storage = createInMemoryStorage();
    closeStorage = vi.fn().mockResolvedValue(undefined);
    services = createApplicationServices({
      repositories: storage,
      transport: new FakeEmailTransport(),
      closeStorage,
    });
  });

  afterEach(async () => {
    await services.close();
  });

  it('serves health without authentication', async () => {
    const response = await request(buildApp()).get('/health');

    expect(response.status).toBe(200);
    expect(response.body.status).toBe('ok');
    expect(response.body.environment).toBe('test');
  });

  it('rejects api calls without a bearer token', async () => {
    const response = await request(buildApp()).get('/api/leads');

    expect(response.status).toBe(401);
    expect(response.body).toEqual({
      success: false,
      error: { code: 'UNAUTHORIZED', message: 'Missing or invalid token' },
    });
  });

  it('lists leads for an authenticated user', async () => {
    const user = seedUser(storage);
    seedLead(storage, { assignedToId: user.id });

    const response = await request(buildApp()).get('/api/leads').set('Authorization', `Bearer ${tokenFor(user.id)}`);

    expect(response.status).toBe(200);
    expect(response.body.data.total).toBe(1);
    expect(response.body.data.items[0].firstName).toBe('Ann');
  });

  it('credits lead creation to the assignee KPI target', async () => {
    const user = seedUser(storage);
    const auth = `Bearer ${tokenFor(user.id)}`;
    const app = buildApp();

    const created = await request(app)
      .post('/api/kpi-targets')
      .set('Authorization', auth)
      .send({
        kpiType: 'leads_created',
        targetValue: 4,
        periodStart: new Date(Date.now() - DAY_MS).toISOString(),
        periodEnd: new Date(Date.now() + DAY_MS).toISOString(),
      });
    expect(created.status).toBe(201);

    const lead = await request(app)
      .post('/api/leads')
      .set('Authorization', auth)
      .send({ firstName: 'Bea', email: 'bea@example.com' });
    expect(lead.status).toBe(201);

    const targets = await request(app).get('/api/kpi-targets').set('Authorization', auth);

    expect(targets.status).toBe(200);
    expect(targets.body.data).toHaveLength(1);
    expect(targets.body.data[0]).toMatchObject({ currentValue: 1, completion: 25, achieved: false });
  });

  it('returns the tracking pixel for an open of a sent email', async () => {
    const user = seedUser(storage);
    const lead = seedLead(storage, { assignedToId: user.id });
    const email = seedEmail(storage, {
      userId: user.id,
      leadId: lead.id,
      trackingId: 'trk-open-1',
      status: 'sent',
      sentAt: new Date(),
    });

    const response = await request(buildApp()).get('/track/trk-open-1/opened');

    expect(response.status).toBe(200);
    expect(response.headers['content-type']).toBe('image/gif');
    expect(storage.emails.rows.get(email.id)?.openCount).toBe(1);
  });

  it('answers unknown tracking ids with no content', async () => {
    const response = await request(buildApp()).get('/track/missing/clicked');

    expect(response.status).toBe(204);
  });

  it('answers unknown routes with a 404 envelope', async () => {
    const response = await request(buildApp()).get('/nope');

    expect(response.status).toBe(404);
    expect(response.body.error.code).toBe('NOT_FOUND');
  });

  it('releases storage on close', async () => {
    await services.close();

    expect(closeStorage).toHaveBeenCalled();
  });
});
