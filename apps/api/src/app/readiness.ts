import type { Server } from 'node:http';

import type { Logger } from '../config/logger';

export type ReadinessStatus = 'starting' | 'ready' | 'stopping';

export type ReadinessState = {
  ready: boolean;
  status: ReadinessStatus;
  reason: string;
  since: string;
};

const nowIso = () => new Date().toISOString();

const state: ReadinessState = {
  ready: false,
  status: 'starting',
  reason: 'booting',
  since: nowIso(),
};

const transition = (status: ReadinessStatus, reason: string) => {
  state.ready = status === 'ready';
  state.status = status;
  state.reason = reason;
  state.since = nowIso();
};

export const markApplicationNotReady = (reason: string) => transition('starting', reason);
export const markApplicationStopping = (reason: string) => transition('stopping', reason);
export const markApplicationReady = (reason: string) => transition('ready', reason);

export const getReadinessState = (): ReadinessState => ({ ...state });

export const registerGracefulShutdown = (options: {
  logger: Logger;
  server: Server;
  onClose?: () => Promise<void>;
  shutdownTimeoutMs?: number;
}) => {
  const { logger, server, onClose, shutdownTimeoutMs = 30_000 } = options;

  const shutdownHandler = (signal: NodeJS.Signals) => {
    markApplicationStopping(`received ${signal}`);
    logger.warn('[http] shutdown signal received', { signal, pid: process.pid });

    const forceExit = setTimeout(() => {
      logger.error('[http] forcing exit after shutdown timeout', { signal, shutdownTimeoutMs });
      process.exit(1);
    }, shutdownTimeoutMs);

    server.close((error) => {
      const finish = async () => {
        if (error) {
          throw error;
        }
        await onClose?.();
      };

      finish().then(
        () => {
          clearTimeout(forceExit);
          logger.info('[http] server closed cleanly', { signal });
          process.exit(0);
        },
        (closeError: unknown) => {
          clearTimeout(forceExit);
          logger.error('[http] error while shutting down', {
            signal,
            error: closeError instanceof Error ? closeError.message : String(closeError),
          });
          process.exit(1);
        }
      );
    });
  };

  process.once('SIGTERM', shutdownHandler);
  process.once('SIGINT', shutdownHandler);
};
