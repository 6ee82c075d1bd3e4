/**
 * Logger
 * 
 * Pino-based structured logger for all packages.
 */

import { pino } from 'pino';

const LOG_LEVEL = process.env['LOG_LEVEL'] ?? 'info';
const NODE_ENV = process.env['NODE_ENV'] ?? 'development';

export const logger = pino({
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: 'contacts-hub',
    env: NODE_ENV,
  },
  transport: NODE_ENV === 'development' ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      ignore: 'pid,hostname',
    },
  } : undefined,
});

export type Logger = typeof logger;

const children: Logger[] = [];

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  const child = logger.child(context);
  children.push(child);
  return child;
}

/**
 * Set the level of the root logger and of every child created so far
 */
export function setLogLevel(level: string): void {
  logger.level = level;
  for (const child of children) {
    child.level = level;
  }
}
