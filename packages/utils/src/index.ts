/**
 * @contacts-hub/utils
 * 
 * Shared utilities package containing:
 * - Structured logger
 * - Calendar date helpers
 * - Type guards
 */

// Type guards
export { isString, isNonEmptyString } from './guards.js';

// Date utilities
export {
  addDays,
  toIsoDate,
  parseIsoDate,
  isLeapYear,
  monthDayKey,
  birthdayKeysBetween,
} from './time.js';

// Logger
export { logger, createLogger, setLogLevel, type Logger } from './logger.js';
