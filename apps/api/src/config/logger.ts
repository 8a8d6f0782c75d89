import winston from 'winston';

const { combine, timestamp, errors, json, simple, colorize } = winston.format;

const isProduction = process.env.NODE_ENV === 'production';

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: combine(timestamp(), errors({ stack: true }), json()),
  defaultMeta: {
    service: 'salesdesk-api',
    environment: process.env.NODE_ENV || 'development',
  },
  silent: process.env.NODE_ENV === 'test' && !process.env.LOG_LEVEL,
  transports: isProduction
    ? [
        new winston.transports.File({
          filename: 'logs/error.log',
          level: 'error',
          maxsize: 5242880, // 5MB
          maxFiles: 5,
        }),
        new winston.transports.File({
          filename: 'logs/combined.log',
          maxsize: 5242880,
          maxFiles: 5,
        }),
        new winston.transports.Console({ format: combine(timestamp(), json()) }),
      ]
    : [new winston.transports.Console({ format: combine(colorize(), simple()) })],
});

export type Logger = Pick<winston.Logger, 'info' | 'warn' | 'error' | 'debug'>;
