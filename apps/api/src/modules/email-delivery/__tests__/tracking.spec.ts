import express from 'express';
import request from 'supertest';
import { beforeEach, describe, expect, it } from 'vitest';

import { errorHandler } from '../../../middleware/error-handler';
import {
  createInMemoryStorage,
  seedEmail,
  seedLead,
  seedUser,
  type InMemoryStorage,
} from '../../../test-utils/in-memory-storage';
import { createTrackingRouter } from '../tracking.routes';
import { TrackingService } from '../tracking.service';
import { TRANSPARENT_GIF } from '../tracking-pixel';

const now = new Date('2024-06-02T10:00:00Z');
const sentAt = new Date('2024-06-01T09:00:00Z');

describe('tracking callbacks', () => {
  let storage: InMemoryStorage;
  let app: express.Express;
  let userId: string;
  let leadId: string;

  beforeEach(() => {
    storage = createInMemoryStorage();
    const service = new TrackingService({ repositories: storage, now: () => now });
    app = express();
    app.use('/track', createTrackingRouter(service));
    app.use(errorHandler);
    userId = seedUser(storage).id;
    leadId = seedLead(storage).id;
  });

  it('serves the pixel and records the first open', async () => {
    const email = seedEmail(storage, { userId, leadId, trackingId: 'trk-open', status: 'sent', sentAt });

    const response = await request(app).get('/track/trk-open/opened').set('User-Agent', 'MailClient/1.0');

    expect(response.status).toBe(200);
    expect(response.headers['content-type']).toBe('image/gif');
    expect(response.headers['cache-control']).toBe('no-cache, no-store, must-revalidate');
    expect(Buffer.compare(response.body, TRANSPARENT_GIF)).toBe(0);
    expect(TRANSPARENT_GIF).toHaveLength(43);
    expect(storage.emails.rows.get(email.id)).toMatchObject({ status: 'opened', openedAt: now, openCount: 1 });
    expect(storage.tracking.rows).toEqual([
      expect.objectContaining({ emailId: email.id, eventType: 'opened', userAgent: 'MailClient/1.0' }),
    ]);
  });

  it('counts repeat opens without regressing a clicked email', async () => {
    const email = seedEmail(storage, {
      userId,
      leadId,
      trackingId: 'trk-clicked',
      status: 'clicked',
      sentAt,
      openedAt: sentAt,
      clickedAt: sentAt,
      openCount: 1,
      clickCount: 1,
    });

    await request(app).get('/track/trk-clicked/opened');

    expect(storage.emails.rows.get(email.id)).toMatchObject({ status: 'clicked', openCount: 2, openedAt: sentAt });
  });

  it('answers 204 for clicks and stores the target url', async () => {
    const email = seedEmail(storage, { userId, leadId, trackingId: 'trk-click', status: 'opened', sentAt, openedAt: sentAt, openCount: 1 });

    const response = await request(app).get('/track/trk-click/clicked?url=https%3A%2F%2Fexample.com%2Fpricing');

    expect(response.status).toBe(204);
    expect(storage.emails.rows.get(email.id)).toMatchObject({ status: 'clicked', clickCount: 1, openCount: 1 });
    expect(storage.tracking.rows[0]?.clickedUrl).toBe('https://example.com/pricing');
  });

  it('ignores unknown tracking ids', async () => {
    const response = await request(app).get('/track/does-not-exist/opened');

    expect(response.status).toBe(204);
    expect(storage.tracking.rows).toHaveLength(0);
  });

  it('ignores unknown events', async () => {
    seedEmail(storage, { userId, leadId, trackingId: 'trk-x', status: 'sent', sentAt });

    const response = await request(app).get('/track/trk-x/forwarded');

    expect(response.status).toBe(204);
    expect(storage.tracking.rows).toHaveLength(0);
  });

  it('only traces a reply reported through the public route', async () => {
    const email = seedEmail(storage, { userId, leadId, trackingId: 'trk-reply', status: 'sent', sentAt });
    const { enrollment } = await storage.enrollments.findOrCreate({
      tenantId: 'tenant-1',
      sequenceId: 'sequence-1',
      leadId,
      enrolledAt: sentAt,
    });

    const response = await request(app).get('/track/trk-reply/replied');

    expect(response.status).toBe(204);
    expect(storage.emails.rows.get(email.id)).toMatchObject({ status: 'sent', repliedAt: null });
    expect(storage.enrollments.rows.get(enrollment.id)?.hasReplied).toBe(false);
    expect(storage.tracking.rows).toEqual([
      expect.objectContaining({ emailId: email.id, eventType: 'replied', occurredAt: now }),
    ]);
  });

  it('does not let the public route bounce or flag an email as spam', async () => {
    const email = seedEmail(storage, { userId, leadId, trackingId: 'trk-bounce', status: 'sent', sentAt });

    await request(app).get('/track/trk-bounce/bounced');
    await request(app).get('/track/trk-bounce/spam');

    expect(storage.emails.rows.get(email.id)).toMatchObject({ status: 'sent', errorMessage: null });
    expect(storage.tracking.rows.map((row) => row.eventType)).toEqual(['bounced', 'spam']);
  });

  it('flags active enrollments when a reply is applied', async () => {
    const email = seedEmail(storage, { userId, leadId, trackingId: 'trk-applied', status: 'opened', sentAt, openedAt: sentAt });
    const { enrollment } = await storage.enrollments.findOrCreate({
      tenantId: 'tenant-1',
      sequenceId: 'sequence-1',
      leadId,
      enrolledAt: sentAt,
    });
    const service = new TrackingService({ repositories: storage, now: () => now });

    const updated = await service.applyEvent(email, 'replied', {});

    expect(updated).toMatchObject({ status: 'replied', repliedAt: now });
    expect(storage.enrollments.rows.get(enrollment.id)?.hasReplied).toBe(true);
  });
});
