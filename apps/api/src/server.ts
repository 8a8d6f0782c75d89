import process from 'node:process';
import dotenv from 'dotenv';

import { createHttpApp } from './app/http-server';
import { markApplicationNotReady, markApplicationReady, registerGracefulShutdown } from './app/readiness';
import { createApplicationServices } from './app/services';
import { getConfig } from './config/env';
import { logger } from './config/logger';

if (process.env.NODE_ENV !== 'production') {
  dotenv.config();
}

const config = getConfig();

markApplicationNotReady('booting API process');

const services = createApplicationServices({ logger });
const app = createHttpApp({ services, config, logger });

const server = app.listen(config.PORT, () => {
  logger.info('[http] server listening', {
    port: config.PORT,
    nodeEnv: config.NODE_ENV,
    trackingBaseUrl: config.TRACKING_BASE_URL,
  });
  markApplicationReady('http server bound to port');
});

registerGracefulShutdown({ logger, server, onClose: services.close });

process.on('unhandledRejection', (reason) => {
  logger.error('[process] unhandled promise rejection', {
    reason: reason instanceof Error ? reason.message : String(reason),
  });
});

export { app };
