/**
 * Pino Logger Instance
 * 
 * Structured JSON logging for production observability. Fastify builds its
 * request logger from the same options.
 */

import { pino, type LoggerOptions } from 'pino';
import { config } from '../config/index.js';

export const loggerOptions: LoggerOptions = {
  level: config.logLevel,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: 'contacts-hub-api',
    env: config.nodeEnv,
  },
};

export const logger = pino(loggerOptions);
