/**
 * Database Layer Index
 * 
 * Export all database-related functionality.
 */

// SQLite client
export {
  openDatabase,
  closeDatabase,
  checkDatabaseHealth,
  IN_MEMORY,
  type Database,
  type DatabaseHandle,
  type OpenDatabaseOptions,
} from './client.js';

// Schema
export { users, contacts } from './schema.js';

// Base Repository
export {
  BaseRepository,
  DEFAULT_PAGE_SIZE,
  type PaginationOptions,
} from './baseRepository.js';

// Repositories
export { UserRepository, ContactRepository } from './repositories/index.js';
