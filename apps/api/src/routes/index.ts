/**
 * Routes Index
 * 
 * Barrel export for all API routes.
 */

export { healthRoutes } from './health.js';
export { authRoutes } from './auth.js';
export { userRoutes } from './users.js';
export { contactRoutes, BIRTHDAY_WINDOW_DAYS } from './contacts.js';
