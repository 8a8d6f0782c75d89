import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('../db-client', async () => {
  const { recordingDatabase } = await import('../testing/recording-database');
  return { getDatabase: () => recordingDatabase };
});

import { recordedStep, recordingDatabase, renderSql } from '../testing/recording-database';
import { DrizzleCampaignRepository } from './campaign-repository';

describe('DrizzleCampaignRepository.incrementCounters', () => {
  const repository = new DrizzleCampaignRepository();

  beforeEach(() => {
    recordingDatabase.reset();
  });

  it('adds to the counters in place and never lets failures drop below zero', async () => {
    await repository.incrementCounters('campaign-1', { sent: 1, failed: -1 });

    const [query] = recordingDatabase.queries;
    const patch = recordedStep(query, 'set');
    if (typeof patch !== 'object' || patch === null || !('emailsSent' in patch) || !('emailsFailed' in patch)) {
      throw new Error('counter patch is missing');
    }
    expect(renderSql(patch.emailsSent)).toEqual({ sql: '"email_campaigns"."emails_sent" + $1', params: [1] });
    expect(renderSql(patch.emailsFailed)).toEqual({
      sql: 'greatest("email_campaigns"."emails_failed" + $1, 0)',
      params: [-1],
    });
    expect(renderSql(recordedStep(query, 'where'))).toEqual({
      sql: '"email_campaigns"."id" = $1',
      params: ['campaign-1'],
    });
  });

  it('treats a missing delta as zero', async () => {
    await repository.incrementCounters('campaign-1', { failed: 2 });

    const patch = recordedStep(recordingDatabase.queries[0], 'set');
    if (typeof patch !== 'object' || patch === null || !('emailsSent' in patch)) {
      throw new Error('counter patch is missing');
    }
    expect(renderSql(patch.emailsSent).params).toEqual([0]);
  });
});
