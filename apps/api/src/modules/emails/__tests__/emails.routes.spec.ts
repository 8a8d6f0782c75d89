import express from 'express';
import request from 'supertest';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { NotFoundError } from '@salesdesk/core';

import { errorHandler } from '../../../middleware/error-handler';
import type { EmailServicePort } from '../email.service';
import { createEmailsRouter } from '../emails.routes';

const service = {
  sendQuickEmail: vi.fn(),
  listEmails: vi.fn(),
  getEmail: vi.fn(),
  markReplied: vi.fn(),
} satisfies EmailServicePort;

const actor = {
  id: '9a4c1f5e-8a5b-4a0e-9f43-1d6f3f4c2b10',
  tenantId: 'tenant-1',
  role: 'sales_rep' as const,
  department: 'north',
};

const leadId = '5c2d8e1f-4a3b-4c6d-8e9f-0a1b2c3d4e5f';
const emailId = '6d3e9f20-5b4c-4d7e-9f0a-1b2c3d4e5f60';

const buildApp = () => {
  const app = express();
  app.use(express.json());
  app.use((req, _res, next) => {
    req.user = { ...actor, email: 'sam@example.com', firstName: 'Sam', lastName: 'Rep' };
    next();
  });
  app.use('/emails', createEmailsRouter(service));
  app.use(errorHandler);
  return app;
};

describe('emails routes', () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  it('needs a template or a subject and body', async () => {
    const response = await request(buildApp()).post('/emails/quick').send({ leadId, subject: 'Hi' });

    expect(response.status).toBe(400);
    expect(response.body.error.details.errors).toEqual([
      { field: 'subject', message: 'Choose a template or provide a subject and body' },
    ]);
    expect(service.sendQuickEmail).not.toHaveBeenCalled();
  });

  it('returns 201 for a delivered quick email', async () => {
    service.sendQuickEmail.mockResolvedValue({ ok: true, message: 'Email sent successfully', email: { id: emailId } });

    const response = await request(buildApp())
      .post('/emails/quick')
      .send({ leadId, subject: 'Hi', bodyHtml: '<p>Hello</p>' });

    expect(response.status).toBe(201);
    expect(response.body).toEqual({ success: true, data: { id: emailId } });
  });

  it('returns 502 with the transport message when delivery fails', async () => {
    service.sendQuickEmail.mockResolvedValue({ ok: false, message: 'Connection refused', email: { id: emailId } });

    const response = await request(buildApp())
      .post('/emails/quick')
      .send({ leadId, subject: 'Hi', bodyHtml: '<p>Hello</p>' });

    expect(response.status).toBe(502);
    expect(response.body).toEqual({
      success: false,
      data: { id: emailId },
      error: { code: 'EMAIL_DELIVERY_FAILED', message: 'Connection refused' },
    });
  });

  it('parses list filters from the query string', async () => {
    service.listEmails.mockResolvedValue({ items: [], total: 0 });

    const response = await request(buildApp()).get('/emails').query({ status: 'failed', page: '2' });

    expect(response.status).toBe(200);
    expect(service.listEmails).toHaveBeenCalledWith(actor, { status: 'failed', page: 2, limit: 20 });
  });

  it('maps missing emails to 404', async () => {
    service.markReplied.mockRejectedValue(new NotFoundError('Email', emailId));

    const response = await request(buildApp()).post(`/emails/${emailId}/replied`);

    expect(response.status).toBe(404);
    expect(response.body.error.message).toBe(`Email with id ${emailId} not found`);
  });
});
