import express from 'express';
import jwt from 'jsonwebtoken';
import request from 'supertest';
import { beforeEach, describe, expect, it } from 'vitest';

import { TEST_TENANT_ID, createInMemoryStorage, seedUser, type InMemoryStorage } from '../../test-utils/in-memory-storage';
import { createAuthMiddleware } from '../auth';

const SECRET = 'test-secret';

describe('auth middleware', () => {
  let storage: InMemoryStorage;

  const buildApp = () => {
    const app = express();
    app.use(createAuthMiddleware({ users: storage.users, getSecret: () => SECRET }));
    app.get('/me', (req, res) => {
      res.json({ user: req.user });
    });
    return app;
  };

  beforeEach(() => {
    storage = createInMemoryStorage();
  });

  it('resolves the actor from a valid bearer token', async () => {
    const user = seedUser(storage);
    const token = jwt.sign({ sub: user.id, tenantId: TEST_TENANT_ID }, SECRET);

    const response = await request(buildApp()).get('/me').set('Authorization', `Bearer ${token}`);

    expect(response.status).toBe(200);
    expect(response.body.user).toEqual({
      id: user.id,
      tenantId: TEST_TENANT_ID,
      role: 'sales_rep',
      department: 'north',
      email: 'sam@example.com',
      firstName: 'Sam',
      lastName: 'Rep',
    });
  });

  it('rejects requests without a bearer token', async () => {
    const response = await request(buildApp()).get('/me');

    expect(response.status).toBe(401);
    expect(response.body.error).toEqual({ code: 'UNAUTHORIZED', message: 'Missing or invalid token' });
  });

  it('rejects tokens signed with another secret', async () => {
    const user = seedUser(storage);
    const token = jwt.sign({ sub: user.id, tenantId: TEST_TENANT_ID }, 'other-secret');

    const response = await request(buildApp()).get('/me').set('Authorization', `Bearer ${token}`);

    expect(response.status).toBe(401);
    expect(response.body.error.code).toBe('INVALID_TOKEN');
  });

  it('reports expired tokens', async () => {
    const user = seedUser(storage);
    const token = jwt.sign(
      { sub: user.id, tenantId: TEST_TENANT_ID, exp: Math.floor(Date.now() / 1000) - 60 },
      SECRET
    );

    const response = await request(buildApp()).get('/me').set('Authorization', `Bearer ${token}`);

    expect(response.status).toBe(401);
    expect(response.body.error).toEqual({ code: 'TOKEN_EXPIRED', message: 'Authentication token has expired' });
  });

  it('rejects refresh tokens', async () => {
    const user = seedUser(storage);
    const token = jwt.sign({ sub: user.id, tenantId: TEST_TENANT_ID, type: 'refresh' }, SECRET);

    const response = await request(buildApp()).get('/me').set('Authorization', `Bearer ${token}`);

    expect(response.status).toBe(401);
    expect(response.body.error.code).toBe('UNAUTHORIZED');
  });

  it('rejects inactive users and tenant mismatches', async () => {
    const inactive = seedUser(storage, { isActive: false });
    const other = seedUser(storage, { email: 'other@example.com' });

    const inactiveResponse = await request(buildApp())
      .get('/me')
      .set('Authorization', `Bearer ${jwt.sign({ sub: inactive.id, tenantId: TEST_TENANT_ID }, SECRET)}`);
    const mismatchResponse = await request(buildApp())
      .get('/me')
      .set('Authorization', `Bearer ${jwt.sign({ sub: other.id, tenantId: 'tenant-2' }, SECRET)}`);

    expect(inactiveResponse.status).toBe(401);
    expect(inactiveResponse.body.error.message).toBe('User not found or inactive');
    expect(mismatchResponse.status).toBe(401);
    expect(mismatchResponse.body.error.message).toBe('User not found or inactive');
  });
});
