import path from 'node:path';
import process from 'node:process';
import { setTimeout as sleep } from 'node:timers/promises';
import { fileURLToPath } from 'node:url';
import { parseArgs } from 'node:util';
import dotenv from 'dotenv';

import { getConfig } from '../config/env';
import { logger } from '../config/logger';
import { EMAIL_JOBS, processEmailJobs, type EmailJob, type EmailProcessingServices } from '../workers/email-processing';

export interface EmailSchedulerArgs {
  jobs: EmailJob[];
  once: boolean;
}

/** `--campaigns`, `--sequences` and `--retry-failed` pick jobs; none picks all of them. */
export const parseSchedulerArgs = (argv: string[]): EmailSchedulerArgs => {
  const { values } = parseArgs({
    args: argv,
    options: {
      campaigns: { type: 'boolean', default: false },
      sequences: { type: 'boolean', default: false },
      'retry-failed': { type: 'boolean', default: false },
      once: { type: 'boolean', default: false },
    },
    strict: true,
  });

  const selected: EmailJob[] = [];
  if (values.campaigns) selected.push('campaigns');
  if (values.sequences) selected.push('sequences');
  if (values['retry-failed']) selected.push('retry_failed');

  return { jobs: selected.length > 0 ? selected : [...EMAIL_JOBS], once: values.once ?? false };
};

/** Resolves false when the signal fires before the interval has elapsed. */
const waitForNextCycle = async (ms: number, signal?: AbortSignal): Promise<boolean> => {
  try {
    await sleep(ms, undefined, { signal });
    return true;
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      return false;
    }
    throw error;
  }
};

export interface RunEmailSchedulerOptions {
  services: EmailProcessingServices;
  jobs?: readonly EmailJob[];
  intervalMs?: number;
  /** 0 runs until aborted. */
  maxRuns?: number;
  signal?: AbortSignal;
}

const runCycle = async (run: number, jobs: readonly EmailJob[], services: EmailProcessingServices): Promise<void> => {
  try {
    const failed = await processEmailJobs(jobs, services);
    logger.info('[email-scheduler] cycle finished', { run, failed });
  } catch (error) {
    logger.error('[email-scheduler] cycle failed', {
      error: error instanceof Error ? error.message : String(error),
    });
  }
};

export const runEmailScheduler = async (options: RunEmailSchedulerOptions): Promise<void> => {
  const config = getConfig();
  const jobs = options.jobs ?? EMAIL_JOBS;
  const intervalMs = options.intervalMs ?? config.EMAIL_SCHEDULER_INTERVAL_MS;
  const maxRunsSetting = options.maxRuns ?? config.EMAIL_SCHEDULER_MAX_RUNS;
  const maxRuns = maxRunsSetting > 0 ? maxRunsSetting : Number.POSITIVE_INFINITY;
  const { signal } = options;

  logger.info('[email-scheduler] started', {
    jobs,
    intervalMs,
    maxRuns: Number.isFinite(maxRuns) ? maxRuns : null,
  });

  let runs = 0;
  while (!signal?.aborted && runs < maxRuns) {
    runs += 1;
    await runCycle(runs, jobs, options.services);

    // Aborting cancels the pending wait.
    if (runs >= maxRuns || !(await waitForNextCycle(intervalMs, signal))) {
      break;
    }
  }

  logger.info('[email-scheduler] stopped', { runs, aborted: signal?.aborted ?? false });
};

const isDirectExecution = (): boolean => {
  if (!process.argv[1]) {
    return false;
  }

  const currentFilePath = fileURLToPath(import.meta.url);
  return path.resolve(currentFilePath) === path.resolve(process.argv[1]);
};

const main = async (): Promise<void> => {
  dotenv.config();
  const args = parseSchedulerArgs(process.argv.slice(2));
  const { createApplicationServices } = await import('../app/services');
  const container = createApplicationServices();

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());
  process.once('SIGTERM', () => controller.abort());

  try {
    await runEmailScheduler({
      services: container,
      jobs: args.jobs,
      maxRuns: args.once ? 1 : undefined,
      signal: controller.signal,
    });
  } finally {
    await container.close();
  }
};

if (isDirectExecution()) {
  main().catch((error) => {
    logger.error('[email-scheduler] fatal error', {
      error: error instanceof Error ? error.stack ?? error.message : String(error),
    });
    process.exitCode = 1;
  });
}
