import { beforeEach, describe, expect, it, vi } from 'vitest';

const processEmailJobsMock = vi.hoisted(() => vi.fn());
const loggerInfoMock = vi.hoisted(() => vi.fn());
const loggerErrorMock = vi.hoisted(() => vi.fn());

vi.mock('../../workers/email-processing', () => ({
  EMAIL_JOBS: ['campaigns', 'sequences', 'retry_failed'],
  processEmailJobs: processEmailJobsMock,
}));

vi.mock('../../config/logger', () => ({
  logger: {
    info: loggerInfoMock,
    error: loggerErrorMock,
  },
}));

const services = {
  campaigns: { processDueCampaigns: vi.fn() },
  sequences: { tick: vi.fn() },
  emails: { retryFailedEmails: vi.fn() },
};

describe('email scheduler CLI', () => {
  beforeEach(() => {
    processEmailJobsMock.mockReset();
    processEmailJobsMock.mockResolvedValue([]);
    loggerInfoMock.mockClear();
    loggerErrorMock.mockClear();
  });

  it('runs every job on each cycle until maxRuns is reached', async () => {
    const { runEmailScheduler } = await import('../email-scheduler');

    await runEmailScheduler({ services, intervalMs: 0, maxRuns: 2 });

    expect(processEmailJobsMock).toHaveBeenCalledTimes(2);
    expect(processEmailJobsMock).toHaveBeenCalledWith(['campaigns', 'sequences', 'retry_failed'], services);
    expect(loggerInfoMock).toHaveBeenCalledWith(
      '[email-scheduler] started',
      expect.objectContaining({ intervalMs: 0, maxRuns: 2 })
    );
    expect(loggerInfoMock).toHaveBeenCalledWith('[email-scheduler] stopped', { runs: 2, aborted: false });
  });

  it('keeps running after a failed cycle and reports the error', async () => {
    const { runEmailScheduler } = await import('../email-scheduler');
    processEmailJobsMock.mockRejectedValueOnce(new Error('boom'));

    await runEmailScheduler({ services, jobs: ['sequences'], intervalMs: 0, maxRuns: 2 });

    expect(loggerErrorMock).toHaveBeenCalledWith('[email-scheduler] cycle failed', { error: 'boom' });
    expect(processEmailJobsMock).toHaveBeenCalledTimes(2);
    expect(processEmailJobsMock).toHaveBeenLastCalledWith(['sequences'], services);
  });

  it('does not start a cycle once the signal is aborted', async () => {
    const { runEmailScheduler } = await import('../email-scheduler');
    const controller = new AbortController();
    controller.abort();

    await runEmailScheduler({ services, intervalMs: 0, maxRuns: 5, signal: controller.signal });

    expect(processEmailJobsMock).not.toHaveBeenCalled();
    expect(loggerInfoMock).toHaveBeenCalledWith('[email-scheduler] stopped', { runs: 0, aborted: true });
  });

  it('stops waiting for the next cycle as soon as the signal is aborted', async () => {
    const { runEmailScheduler } = await import('../email-scheduler');
    const controller = new AbortController();

    const running = runEmailScheduler({ services, intervalMs: 60_000, maxRuns: 5, signal: controller.signal });
    await vi.waitFor(() =>
      expect(loggerInfoMock).toHaveBeenCalledWith('[email-scheduler] cycle finished', { run: 1, failed: [] })
    );
    controller.abort();
    await running;

    expect(processEmailJobsMock).toHaveBeenCalledTimes(1);
    expect(loggerInfoMock).toHaveBeenLastCalledWith('[email-scheduler] stopped', { runs: 1, aborted: true });
  });

  it('maps flags to jobs and falls back to all jobs', async () => {
    const { parseSchedulerArgs } = await import('../email-scheduler');

    expect(parseSchedulerArgs(['--retry-failed', '--campaigns', '--once'])).toEqual({
      jobs: ['campaigns', 'retry_failed'],
      once: true,
    });
    expect(parseSchedulerArgs([])).toEqual({ jobs: ['campaigns', 'sequences', 'retry_failed'], once: false });
  });
});
